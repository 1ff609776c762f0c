/**
 * Discovery techniques: read-only enumeration of users, groups, admin
 * role holders, MFA coverage and policies.
 */

import type { TenantApi } from '../core/api/api-client.js';
import {
  booleanParam,
  optionalStringParam,
  stringParam,
} from '../core/modules/action-module.js';
import type { ModuleRegistry } from '../core/registry/module-registry.js';
import { NO_PARAMS } from '../types/schema.js';
import type { ModuleDescriptor } from '../types/technique.js';
import {
  ID_PARAM,
  POLICY_TYPES,
  USER_STATUSES,
  defineModule,
  isAdminRole,
  isForbidden,
  summarizeUser,
  type TenantGroup,
  type TenantPolicy,
  type TenantRole,
  type TenantRule,
  type TenantUser,
  type TenantFactor,
} from './shared.js';

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

const READ_ONLY = ['READ_ONLY_ADMIN'] as const;

const USER_FILTER_PARAMS = {
  query: { type: 'string', minLength: 1, description: 'Prefix match on login, first or last name' },
  status: { type: 'string', enum: USER_STATUSES, description: 'Only users in this status' },
} as const;

export const WHOAMI: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'whoami' },
  description: 'Show the principal the API credentials act as',
  attack: ['T1033'],
  permissions: [],
  artifactKinds: [],
  mutating: false,
  params: NO_PARAMS,
};

export const LIST_USERS: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'list-users' },
  description: 'Enumerate users',
  attack: ['T1087.004'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: { type: 'object', additionalProperties: false, properties: USER_FILTER_PARAMS },
};

export const GET_USER: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'get-user' },
  description: 'Get a user with its assigned roles and groups',
  attack: ['T1087.004'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['user'],
    properties: { user: { ...ID_PARAM, description: 'User id or login' } },
  },
};

export const LIST_GROUPS: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'list-groups' },
  description: 'Enumerate groups',
  attack: ['T1069.003'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: NO_PARAMS,
};

export const FIND_ADMINS: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'find-admins' },
  description: 'Identify users with admin roles assigned',
  attack: ['T1087.004', 'T1069.003'],
  // Only super admins can read role assignments.
  permissions: ['SUPER_ADMIN'],
  artifactKinds: [],
  mutating: false,
  params: { type: 'object', additionalProperties: false, properties: USER_FILTER_PARAMS },
};

export const FIND_ADMIN_GROUPS: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'find-admin-groups' },
  description: 'Identify groups with admin roles assigned',
  attack: ['T1069.003'],
  permissions: ['SUPER_ADMIN'],
  artifactKinds: [],
  mutating: false,
  params: NO_PARAMS,
};

export const FIND_USERS_WITHOUT_MFA: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'find-users-without-mfa' },
  description: 'Identify users with no MFA factors enrolled',
  attack: ['T1087.004'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: { type: 'object', additionalProperties: false, properties: USER_FILTER_PARAMS },
};

export const GET_POLICIES: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'get-policies' },
  description: 'List policies of one type, or of every type',
  attack: ['T1201'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: {
    type: 'object',
    additionalProperties: false,
    properties: { type: { type: 'string', enum: POLICY_TYPES } },
  },
};

export const GET_POLICY: ModuleDescriptor = {
  id: { tactic: 'discovery', name: 'get-policy' },
  description: 'Get a policy and its rules',
  attack: ['T1201'],
  permissions: READ_ONLY,
  artifactKinds: [],
  mutating: false,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['policyId'],
    properties: {
      policyId: ID_PARAM,
      includeRules: { type: 'boolean', default: true },
    },
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function listUsers(
  api: TenantApi,
  params: Record<string, unknown>,
  signal: AbortSignal,
): Promise<TenantUser[]> {
  const status = optionalStringParam(params, 'status');
  return api.list<TenantUser>('/users', {
    query: {
      q: optionalStringParam(params, 'query'),
      filter: status ? `status eq "${status}"` : undefined,
    },
    signal,
  });
}

// ---------------------------------------------------------------------------
// Modules
// ---------------------------------------------------------------------------

const whoami = defineModule(async (api) => {
  const { body: me } = await api.call<TenantUser>('GET', '/users/me');
  return { status: 'success', output: summarizeUser(me) };
});

const listUsersModule = defineModule(async (api, params, _ledger, context) => {
  const users = await listUsers(api, params, context.signal);
  return { status: 'success', output: { count: users.length, users: users.map(summarizeUser) } };
});

const getUser = defineModule(async (api, params) => {
  const userId = encodeURIComponent(stringParam(params, 'user'));
  const { body: user } = await api.call<TenantUser>('GET', `/users/${userId}`);
  const { body: roles } = await api.call<TenantRole[]>('GET', `/users/${user.id}/roles`);
  return {
    status: 'success',
    output: { user: summarizeUser(user), roles: roles.map((role) => role.type) },
  };
});

const listGroups = defineModule(async (api, _params, _ledger, context) => {
  const groups = await api.list<TenantGroup>('/groups', { signal: context.signal });
  return {
    status: 'success',
    output: {
      count: groups.length,
      groups: groups.map((group) => ({ id: group.id, name: group.profile.name })),
    },
  };
});

/**
 * There is no endpoint listing the holders of a role, so every user's
 * assignments are read one by one. A 403 part way through (the principal
 * is not a super admin) ends the scan with what was found so far.
 */
const findAdmins = defineModule(async (api, params, _ledger, context) => {
  const users = await listUsers(api, params, context.signal);
  const admins: Array<{ id: string; login: string; roles: string[] }> = [];
  let checked = 0;
  let incomplete = false;

  for (const user of users) {
    let roles: TenantRole[];
    try {
      ({ body: roles } = await api.call<TenantRole[]>('GET', `/users/${user.id}/roles`));
    } catch (err) {
      if (!isForbidden(err)) throw err;
      context.logger.warn('role lookup refused; stopping scan', { userId: user.id });
      incomplete = true;
      break;
    }
    checked += 1;

    const adminRoles = roles.map((role) => role.type).filter(isAdminRole);
    if (adminRoles.length > 0) {
      admins.push({ id: user.id, login: user.profile.login, roles: adminRoles });
    }
  }

  return { status: 'success', output: { checked, incomplete, admins } };
});

const findAdminGroups = defineModule(async (api, _params, _ledger, context) => {
  const groups = await api.list<TenantGroup>('/groups', { signal: context.signal });
  const adminGroups: Array<{ id: string; name: string; roles: string[] }> = [];
  let checked = 0;
  let incomplete = false;

  for (const group of groups) {
    let roles: TenantRole[];
    try {
      ({ body: roles } = await api.call<TenantRole[]>('GET', `/groups/${group.id}/roles`));
    } catch (err) {
      if (!isForbidden(err)) throw err;
      context.logger.warn('role lookup refused; stopping scan', { groupId: group.id });
      incomplete = true;
      break;
    }
    checked += 1;

    const adminRoles = roles.map((role) => role.type).filter(isAdminRole);
    if (adminRoles.length > 0) {
      adminGroups.push({ id: group.id, name: group.profile.name, roles: adminRoles });
    }
  }

  return { status: 'success', output: { checked, incomplete, groups: adminGroups } };
});

const findUsersWithoutMfa = defineModule(async (api, params, _ledger, context) => {
  const users = await listUsers(api, params, context.signal);
  const withoutMfa: Array<Record<string, unknown>> = [];
  let checked = 0;
  let incomplete = false;

  for (const user of users) {
    let factors: TenantFactor[];
    try {
      ({ body: factors } = await api.call<TenantFactor[]>('GET', `/users/${user.id}/factors`));
    } catch (err) {
      if (!isForbidden(err)) throw err;
      context.logger.warn('factor lookup refused; stopping scan', { userId: user.id });
      incomplete = true;
      break;
    }
    checked += 1;

    if (factors.length === 0) {
      withoutMfa.push(summarizeUser(user));
    }
  }

  return { status: 'success', output: { checked, incomplete, users: withoutMfa } };
});

const getPolicies = defineModule(async (api, params) => {
  const requested = optionalStringParam(params, 'type');
  const types: readonly string[] = requested ? [requested] : POLICY_TYPES;
  const policies: Array<Record<string, unknown>> = [];

  for (const type of types) {
    const { body } = await api.call<TenantPolicy[]>('GET', '/policies', { query: { type } });
    for (const policy of body) {
      policies.push({ id: policy.id, type: policy.type, name: policy.name, status: policy.status });
    }
  }

  return { status: 'success', output: { count: policies.length, policies } };
});

const getPolicy = defineModule(async (api, params) => {
  const policyId = stringParam(params, 'policyId');
  const { body: policy } = await api.call<TenantPolicy>('GET', `/policies/${policyId}`);
  const output: Record<string, unknown> = {
    policy: { id: policy.id, type: policy.type, name: policy.name, status: policy.status },
  };

  if (booleanParam(params, 'includeRules', true)) {
    const { body: rules } = await api.call<TenantRule[]>('GET', `/policies/${policyId}/rules`);
    output['rules'] = rules.map((rule) => ({
      id: rule.id,
      type: rule.type,
      name: rule.name,
      status: rule.status,
    }));
  }

  return { status: 'success', output };
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerDiscoveryTechniques(registry: ModuleRegistry): void {
  registry.register(WHOAMI, whoami);
  registry.register(LIST_USERS, listUsersModule);
  registry.register(GET_USER, getUser);
  registry.register(LIST_GROUPS, listGroups);
  registry.register(FIND_ADMINS, findAdmins);
  registry.register(FIND_ADMIN_GROUPS, findAdminGroups);
  registry.register(FIND_USERS_WITHOUT_MFA, findUsersWithoutMfa);
  registry.register(GET_POLICIES, getPolicies);
  registry.register(GET_POLICY, getPolicy);
}
