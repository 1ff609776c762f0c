/**
 * Shapes of the tenant objects the catalog reads, and helpers shared by
 * the technique modules.
 */

import type { ActionModule, ModuleContext, ModuleFactory, ModuleOutcome } from '../core/modules/action-module.js';
import { RemoteError } from '../core/sim-error.js';
import type { PlannedAction } from '../types/run.js';
import type { JsonSchemaProperty } from '../types/schema.js';

// ---------------------------------------------------------------------------
// Tenant objects
// ---------------------------------------------------------------------------

export interface TenantUser {
  id: string;
  status: string;
  profile: { login: string; email?: string; firstName?: string; lastName?: string };
}

export interface TenantGroup {
  id: string;
  profile: { name: string; description?: string };
}

export interface TenantRole {
  id: string;
  type: string;
}

export interface TenantFactor {
  id: string;
  factorType: string;
  provider: string;
  status: string;
}

export interface TenantPolicy {
  id: string;
  type: string;
  name: string;
  status: string;
}

export interface TenantRule {
  id: string;
  type: string;
  name: string;
  status: string;
  actions: Record<string, unknown>;
}

export interface TenantZone {
  id: string;
  type: string;
  name: string;
  status: string;
  gateways: unknown[] | null;
  proxies: unknown[] | null;
}

export interface TenantApp {
  id: string;
  label: string;
  status: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Role types that grant administrative access. */
export const ADMIN_ROLES = [
  'API_ACCESS_MANAGEMENT_ADMIN',
  'APP_ADMIN',
  'GROUP_MEMBERSHIP_ADMIN',
  'HELP_DESK_ADMIN',
  'MOBILE_ADMIN',
  'ORG_ADMIN',
  'READ_ONLY_ADMIN',
  'REPORT_ADMIN',
  'SUPER_ADMIN',
  'USER_ADMIN',
] as const;

export const POLICY_TYPES = [
  'OKTA_SIGN_ON',
  'PASSWORD',
  'MFA_ENROLL',
  'OAUTH_AUTHORIZATION_POLICY',
  'IDP_DISCOVERY',
] as const;

export const USER_STATUSES = [
  'STAGED',
  'PROVISIONED',
  'ACTIVE',
  'RECOVERY',
  'PASSWORD_EXPIRED',
  'LOCKED_OUT',
  'SUSPENDED',
  'DEPROVISIONED',
] as const;

const ADMIN_ROLE_SET: ReadonlySet<string> = new Set(ADMIN_ROLES);

export function isAdminRole(type: string): boolean {
  return ADMIN_ROLE_SET.has(type);
}

// ---------------------------------------------------------------------------
// Schema fragments
// ---------------------------------------------------------------------------

export const ID_PARAM: JsonSchemaProperty = { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9_.@-]+$' };

export const STATE_PARAM: JsonSchemaProperty = {
  type: 'string',
  enum: ['ACTIVE', 'INACTIVE'],
  description: 'State to move the object to',
};

export const ADMIN_ROLE_PARAM: JsonSchemaProperty = {
  type: 'string',
  enum: ADMIN_ROLES,
  default: 'SUPER_ADMIN',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function defineModule(execute: ActionModule['execute']): ModuleFactory {
  return () => ({ execute });
}

/** Report the mutating calls a dry run would have made. */
export function planned(context: ModuleContext, actions: PlannedAction[]): ModuleOutcome {
  for (const action of actions) {
    context.plan(action);
  }
  return { status: 'success', output: { dryRun: true, plannedActions: actions.length } };
}

/** A 403 means the principal lacks the role, not that the call can succeed later. */
export function isForbidden(err: unknown): boolean {
  return err instanceof RemoteError && err.status === 403;
}

export function summarizeUser(user: TenantUser): Record<string, unknown> {
  return { id: user.id, login: user.profile.login, status: user.status };
}

/** `****abcd`: enough to tell tokens apart in a report, never the value. */
export function tokenHint(token: string): string {
  return `****${token.slice(-4)}`;
}
