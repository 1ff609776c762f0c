/**
 * Defense-evasion techniques: switching apps, policies, rules and
 * network zones on or off, and temporarily renaming policies, rules and
 * zones to simulate tampering.
 *
 * The state-change modules are also registered under the impact tactic
 * (see impact.ts), so they are built from a per-tactic descriptor.
 */

import type { TenantApi } from '../core/api/api-client.js';
import { renameBody } from '../core/cleanup/reversal-actions.js';
import { booleanParam, stringParam, type ModuleFactory } from '../core/modules/action-module.js';
import type { ModuleRegistry } from '../core/registry/module-registry.js';
import { isRecord } from '../core/redactor.js';
import type { JsonSchemaProperty } from '../types/schema.js';
import type { PlannedAction } from '../types/run.js';
import type { ArtifactKind, ModuleDescriptor } from '../types/technique.js';
import { ID_PARAM, STATE_PARAM, defineModule, planned } from './shared.js';

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

interface ObjectTarget {
  kind: ArtifactKind;
  noun: string;
  /** Id parameters, in path order. */
  idParams: readonly string[];
  path(params: Record<string, unknown>): string;
}

const APP: ObjectTarget = {
  kind: 'app',
  noun: 'app',
  idParams: ['appId'],
  path: (params) => `/apps/${stringParam(params, 'appId')}`,
};

const POLICY: ObjectTarget = {
  kind: 'policy',
  noun: 'policy',
  idParams: ['policyId'],
  path: (params) => `/policies/${stringParam(params, 'policyId')}`,
};

const RULE: ObjectTarget = {
  kind: 'policy-rule',
  noun: 'policy rule',
  idParams: ['policyId', 'ruleId'],
  path: (params) => `/policies/${stringParam(params, 'policyId')}/rules/${stringParam(params, 'ruleId')}`,
};

const ZONE: ObjectTarget = {
  kind: 'zone',
  noun: 'network zone',
  idParams: ['zoneId'],
  path: (params) => `/zones/${stringParam(params, 'zoneId')}`,
};

function idProperties(target: ObjectTarget): Record<string, JsonSchemaProperty> {
  return Object.fromEntries(target.idParams.map((key) => [key, ID_PARAM]));
}

/** Apps carry a `label`; everything else a `name`. */
function displayName(resource: Record<string, unknown>): string {
  const name = resource['label'] ?? resource['name'];
  return typeof name === 'string' ? name : '';
}

async function fetchObject(api: TenantApi, path: string): Promise<Record<string, unknown>> {
  const { body } = await api.call<unknown>('GET', path);
  if (!isRecord(body)) {
    throw new Error(`GET ${path} returned no object`);
  }
  return body;
}

// ---------------------------------------------------------------------------
// State changes
// ---------------------------------------------------------------------------

interface StateTechnique {
  target: ObjectTarget;
  name: string;
  attack: Readonly<Record<'defense-evasion' | 'impact', readonly string[]>>;
  permissions: readonly string[];
}

const STATE_TECHNIQUES: readonly StateTechnique[] = [
  {
    target: APP,
    name: 'change-app-state',
    attack: { 'defense-evasion': ['T1562'], impact: ['T1489'] },
    permissions: ['APP_ADMIN'],
  },
  {
    target: POLICY,
    name: 'change-policy-state',
    attack: { 'defense-evasion': ['T1556'], impact: ['T1531'] },
    permissions: ['SUPER_ADMIN'],
  },
  {
    target: RULE,
    name: 'change-rule-state',
    attack: { 'defense-evasion': ['T1556'], impact: ['T1531'] },
    permissions: ['SUPER_ADMIN'],
  },
  {
    target: ZONE,
    name: 'change-zone-state',
    attack: { 'defense-evasion': ['T1562'], impact: ['T1531'] },
    permissions: ['SUPER_ADMIN'],
  },
];

function stateDescriptor(technique: StateTechnique, tactic: 'defense-evasion' | 'impact'): ModuleDescriptor {
  return {
    id: { tactic, name: technique.name },
    description: `Activate or deactivate a ${technique.target.noun}`,
    attack: technique.attack[tactic],
    permissions: technique.permissions,
    artifactKinds: [technique.target.kind],
    mutating: true,
    params: {
      type: 'object',
      additionalProperties: false,
      required: [...technique.target.idParams, 'state'],
      properties: { ...idProperties(technique.target), state: STATE_PARAM },
    },
  };
}

function stateModule(target: ObjectTarget): ModuleFactory {
  return defineModule(async (api, params, ledger, context) => {
    const path = target.path(params);
    const state = stringParam(params, 'state');
    const current = await fetchObject(api, path);
    const name = displayName(current);

    if (current['status'] === state) {
      return { status: 'skipped', reason: `The ${target.noun} "${name}" is already ${state}` };
    }

    const operation = state === 'ACTIVE' ? 'activate' : 'deactivate';
    const lifecyclePath = `${path}/lifecycle/${operation}`;
    if (context.dryRun) {
      return planned(context, [
        { method: 'POST', path: lifecyclePath, description: `${operation} ${target.noun} "${name}"` },
      ]);
    }

    await api.call('POST', lifecyclePath);
    const previous = String(current['status'] ?? 'unknown');
    ledger.record({
      kind: target.kind,
      remoteId: String(current['id'] ?? path),
      description: `${target.noun} "${name}" moved from ${previous} to ${state}`,
      reversal: {
        action: 'set-lifecycle',
        args: { path, operation: operation === 'activate' ? 'deactivate' : 'activate' },
      },
    });

    return { status: 'success', output: { path, name, previousStatus: previous, status: state } };
  });
}

// ---------------------------------------------------------------------------
// Temporary renames
// ---------------------------------------------------------------------------

const DEFAULT_SUFFIX = ' TEMP_STRING';

const RENAME_TECHNIQUES: ReadonlyArray<{ target: ObjectTarget; name: string; attack: readonly string[] }> = [
  { target: POLICY, name: 'modify-policy', attack: ['T1556'] },
  { target: RULE, name: 'modify-policy-rule', attack: ['T1556'] },
  { target: ZONE, name: 'modify-zone', attack: ['T1562'] },
];

function renameDescriptor(target: ObjectTarget, name: string, attack: readonly string[]): ModuleDescriptor {
  return {
    id: { tactic: 'defense-evasion', name },
    description: `Rename a ${target.noun}, then change it back`,
    attack,
    permissions: ['SUPER_ADMIN'],
    artifactKinds: [target.kind],
    mutating: true,
    params: {
      type: 'object',
      additionalProperties: false,
      required: [...target.idParams],
      properties: {
        ...idProperties(target),
        suffix: { type: 'string', minLength: 1, maxLength: 50, default: DEFAULT_SUFFIX },
        restore: {
          type: 'boolean',
          default: true,
          description: 'Rename back immediately; otherwise leave it to cleanup',
        },
      },
    },
  };
}

/**
 * The rename is recorded before the name is restored, so if restoring
 * fails the record stays open and cleanup puts the name back.
 */
function renameModule(target: ObjectTarget): ModuleFactory {
  return defineModule(async (api, params, ledger, context) => {
    const path = target.path(params);
    const current = await fetchObject(api, path);
    const originalName = displayName(current);
    const temporaryName = originalName + stringParam(params, 'suffix');
    const restore = booleanParam(params, 'restore', true);

    if (context.dryRun) {
      const actions: PlannedAction[] = [
        { method: 'PUT', path, description: `Rename ${target.noun} to "${temporaryName}"` },
      ];
      if (restore) {
        actions.push({ method: 'PUT', path, description: `Rename ${target.noun} back to "${originalName}"` });
      }
      return planned(context, actions);
    }

    await api.call('PUT', path, { body: renameBody(target.kind, current, temporaryName) });
    const record = ledger.record({
      kind: target.kind,
      remoteId: String(current['id'] ?? path),
      description: `${target.noun} "${originalName}" renamed to "${temporaryName}"`,
      reversal: { action: 'rename-resource', args: { path, name: originalName } },
    });

    if (restore) {
      await api.call('PUT', path, { body: renameBody(target.kind, current, originalName) });
      ledger.markReversed(record.seq);
    }

    return { status: 'success', output: { path, originalName, temporaryName, restored: restore } };
  });
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/** Register the state-change modules under `tactic`. */
export function registerStateTechniques(registry: ModuleRegistry, tactic: 'defense-evasion' | 'impact'): void {
  for (const technique of STATE_TECHNIQUES) {
    registry.register(stateDescriptor(technique, tactic), stateModule(technique.target));
  }
}

export function registerDefenseEvasionTechniques(registry: ModuleRegistry): void {
  registerStateTechniques(registry, 'defense-evasion');
  for (const technique of RENAME_TECHNIQUES) {
    registry.register(
      renameDescriptor(technique.target, technique.name, technique.attack),
      renameModule(technique.target),
    );
  }
}
