/**
 * The reversal table: what each named reversal action does against the
 * tenant.
 *
 * Artifact records only carry `{ action, args }`, so the ledger stays
 * plain JSON; this table turns that reference back into API calls.
 * Handlers throw to fail. Deleting something that is already gone
 * counts as reversed.
 */

import type { TenantApi } from '../api/api-client.js';
import { isRecord } from '../redactor.js';
import { RemoteError } from '../sim-error.js';
import type { ArtifactRecord, ReversalActionName } from '../../types/run.js';
import type { ArtifactKind } from '../../types/technique.js';

export type ReversalStep =
  | { outcome: 'reversed'; note?: string }
  | { outcome: 'skipped'; note: string };

export type ReversalHandler = (api: TenantApi, record: ArtifactRecord) => Promise<ReversalStep>;

const ALREADY_ABSENT: ReversalStep = { outcome: 'reversed', note: 'already absent' };
const REVERSED: ReversalStep = { outcome: 'reversed' };

/** Fields a PUT must carry besides `name`, per renamed resource kind. */
const RENAME_FIELDS: Partial<Record<ArtifactKind, readonly string[]>> = {
  policy: ['type'],
  'policy-rule': ['type', 'actions'],
  zone: ['type', 'gateways', 'proxies'],
};

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export const REVERSAL_HANDLERS: Readonly<Record<ReversalActionName, ReversalHandler>> = {
  'delete-user': async (api, record) => {
    const userId = arg(record, 'userId');
    const user = await getOrAbsent(api, `/users/${userId}`);
    if (user === undefined) {
      return ALREADY_ABSENT;
    }
    // A user must be deprovisioned before it can be deleted.
    if (!isRecord(user) || user['status'] !== 'DEPROVISIONED') {
      await api.call('POST', `/users/${userId}/lifecycle/deactivate`);
    }
    return deleteOrAbsent(api, `/users/${userId}`);
  },

  'revoke-api-token': (api, record) => deleteOrAbsent(api, `/api-tokens/${arg(record, 'tokenId')}`),

  'unassign-user-role': (api, record) =>
    deleteOrAbsent(api, `/users/${arg(record, 'userId')}/roles/${arg(record, 'roleId')}`),

  'unassign-group-role': (api, record) =>
    deleteOrAbsent(api, `/groups/${arg(record, 'groupId')}/roles/${arg(record, 'roleId')}`),

  'revoke-session': (api, record) => deleteOrAbsent(api, `/sessions/${arg(record, 'sessionId')}`),

  'user-lifecycle': async (api, record) => {
    await api.call('POST', `/users/${arg(record, 'userId')}/lifecycle/${arg(record, 'operation')}`);
    return REVERSED;
  },

  'set-lifecycle': async (api, record) => {
    await api.call('POST', `${arg(record, 'path')}/lifecycle/${arg(record, 'operation')}`);
    return REVERSED;
  },

  'rename-resource': async (api, record) => {
    const path = arg(record, 'path');
    const name = arg(record, 'name');
    const { body: current } = await api.call<unknown>('GET', path);
    if (!isRecord(current)) {
      throw new Error(`GET ${path} returned no object`);
    }
    if (current['name'] === name) {
      return { outcome: 'reversed', note: 'name already restored' };
    }

    await api.call('PUT', path, { body: renameBody(record.kind, current, name) });
    return REVERSED;
  },

  manual: async (_api, record) => ({
    outcome: 'skipped',
    note: record.reversal.args['instructions'] ?? 'requires manual reversal',
  }),
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * The PUT body that renames `current`: the new name plus the fields the
 * provider requires for that kind of object.
 */
export function renameBody(
  kind: ArtifactKind,
  current: Record<string, unknown>,
  name: string,
): Record<string, unknown> {
  const fields = RENAME_FIELDS[kind];
  if (!fields) {
    throw new Error(`Cannot rename a ${kind} artifact`);
  }
  const body: Record<string, unknown> = { name };
  for (const field of fields) {
    body[field] = current[field];
  }
  return body;
}

function arg(record: ArtifactRecord, key: string): string {
  const value = record.reversal.args[key];
  if (value === undefined || value.length === 0) {
    throw new Error(
      `Reversal "${record.reversal.action}" of record ${record.seq} is missing argument "${key}"`,
    );
  }
  return value;
}

function isNotFound(err: unknown): boolean {
  return err instanceof RemoteError && err.status === 404;
}

async function getOrAbsent(api: TenantApi, path: string): Promise<unknown> {
  try {
    const { body } = await api.call<unknown>('GET', path);
    return body;
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

async function deleteOrAbsent(api: TenantApi, path: string): Promise<ReversalStep> {
  try {
    await api.call('DELETE', path);
    return REVERSED;
  } catch (err) {
    if (isNotFound(err)) return ALREADY_ABSENT;
    throw err;
  }
}
