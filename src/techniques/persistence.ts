/**
 * Persistence techniques: footholds an attacker leaves behind in the
 * tenant (new accounts, admin roles, API tokens, credential resets).
 *
 * Every remote change is recorded the moment it succeeds. Changes that
 * cannot be undone through the API (password and factor resets) are
 * recorded with a `manual` reversal so they still show up in cleanup.
 */

import {
  booleanParam,
  optionalStringParam,
  stringListParam,
  stringParam,
} from '../core/modules/action-module.js';
import type { ModuleRegistry } from '../core/registry/module-registry.js';
import type { ReversalRef } from '../types/run.js';
import type { ModuleDescriptor, Tactic } from '../types/technique.js';
import {
  ADMIN_ROLE_PARAM,
  ID_PARAM,
  defineModule,
  planned,
  summarizeUser,
  tokenHint,
  type TenantFactor,
  type TenantRole,
  type TenantUser,
} from './shared.js';

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export const CREATE_USER: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'create-user' },
  description: 'Create a user account',
  attack: ['T1136.003'],
  permissions: ['USER_ADMIN'],
  artifactKinds: ['user'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['login'],
    properties: {
      login: { type: 'string', minLength: 3, maxLength: 100, pattern: '^[^\\s@]+@[^\\s@]+$' },
      firstName: { type: 'string', minLength: 1, default: 'Tinman' },
      lastName: { type: 'string', minLength: 1, default: 'Simulation' },
      email: { type: 'string', pattern: '^[^\\s@]+@[^\\s@]+$' },
      password: { type: 'string', minLength: 8 },
      groupIds: { type: 'array', items: ID_PARAM },
      activate: { type: 'boolean', default: true },
    },
  },
};

export const CREATE_ADMIN_USER: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'create-admin-user' },
  description: 'Assign an admin role to a user',
  attack: ['T1098.003'],
  permissions: ['SUPER_ADMIN'],
  artifactKinds: ['role-assignment'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['userId'],
    properties: { userId: ID_PARAM, roleType: ADMIN_ROLE_PARAM },
  },
};

export const CREATE_API_TOKEN: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'create-api-token' },
  description: 'Create an API token for the current principal',
  attack: ['T1098.001'],
  permissions: ['READ_ONLY_ADMIN'],
  artifactKinds: ['api-token'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    properties: { name: { type: 'string', minLength: 1, maxLength: 100, default: 'tinman' } },
  },
};

const USER_OPERATIONS = [
  'ACTIVATE',
  'REACTIVATE',
  'DEACTIVATE',
  'SUSPEND',
  'UNSUSPEND',
  'DELETE',
  'UNLOCK',
  'EXPIRE_PASSWORD',
] as const;

export function changeUserStateDescriptor(tactic: Tactic): ModuleDescriptor {
  return {
    id: { tactic, name: 'change-user-state' },
    description: 'Run a lifecycle operation on a user',
    attack: tactic === 'impact' ? ['T1531'] : ['T1098'],
    permissions: ['USER_ADMIN'],
    artifactKinds: ['user-state'],
    mutating: true,
    params: {
      type: 'object',
      additionalProperties: false,
      required: ['userId', 'operation'],
      properties: {
        userId: ID_PARAM,
        operation: { type: 'string', enum: USER_OPERATIONS },
        sendEmail: { type: 'boolean', default: false },
      },
    },
  };
}

export const RESET_PASSWORD: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'reset-password' },
  description: 'Generate a one-time password reset link for a user',
  attack: ['T1098'],
  permissions: ['HELP_DESK_ADMIN'],
  artifactKinds: ['credential'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['userId'],
    properties: { userId: ID_PARAM, sendEmail: { type: 'boolean', default: false } },
  },
};

export const RESET_FACTORS: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'reset-factors' },
  description: 'Reset every MFA factor enrolled for a user',
  attack: ['T1556.006'],
  permissions: ['HELP_DESK_ADMIN'],
  artifactKinds: ['credential'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['userId'],
    properties: { userId: ID_PARAM },
  },
};

export const DELETE_FACTOR: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'delete-factor' },
  description: 'Delete one MFA factor enrolled for a user',
  attack: ['T1556.006'],
  permissions: ['HELP_DESK_ADMIN'],
  artifactKinds: ['credential'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['userId', 'factorId'],
    properties: { userId: ID_PARAM, factorId: ID_PARAM },
  },
};

export const SET_RECOVERY_QUESTION: ModuleDescriptor = {
  id: { tactic: 'persistence', name: 'set-recovery-question' },
  description: "Overwrite a user's recovery question and answer",
  attack: ['T1098'],
  permissions: ['USER_ADMIN'],
  artifactKinds: ['credential'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['userId', 'question', 'answer'],
    properties: {
      userId: ID_PARAM,
      question: { type: 'string', minLength: 1, maxLength: 100 },
      answer: { type: 'string', minLength: 4, maxLength: 100 },
    },
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function manual(instructions: string): ReversalRef {
  return { action: 'manual', args: { instructions } };
}

/**
 * How to undo a lifecycle operation, given the status the user had
 * before it. Operations with no API inverse fall back to manual.
 */
function lifecycleReversal(userId: string, operation: string, previous: string): ReversalRef {
  const undo = (op: string): ReversalRef => ({ action: 'user-lifecycle', args: { userId, operation: op } });

  switch (operation) {
    case 'SUSPEND':
      return undo('unsuspend');
    case 'UNSUSPEND':
      return undo('suspend');
    case 'DEACTIVATE':
      return undo('activate');
    case 'ACTIVATE':
      return previous === 'DEPROVISIONED' ? undo('deactivate') : manual(`Return user ${userId} to ${previous}`);
    case 'DELETE':
      return manual(`User ${userId} was deprovisioned or deleted; recreate it if needed`);
    default:
      return manual(`Return user ${userId} to ${previous}`);
  }
}

// ---------------------------------------------------------------------------
// Modules
// ---------------------------------------------------------------------------

const createUser = defineModule(async (api, params, ledger, context) => {
  const login = stringParam(params, 'login');
  const profile = {
    firstName: stringParam(params, 'firstName'),
    lastName: stringParam(params, 'lastName'),
    email: optionalStringParam(params, 'email') ?? login,
    login,
  };
  const activate = booleanParam(params, 'activate', true);
  const path = `/users?activate=${String(activate)}`;

  if (context.dryRun) {
    return planned(context, [
      { method: 'POST', path, description: `Create user ${login}`, body: { profile } },
    ]);
  }

  const body: Record<string, unknown> = { profile };
  const groupIds = stringListParam(params, 'groupIds');
  if (groupIds.length > 0) {
    body['groupIds'] = groupIds;
  }
  const password = optionalStringParam(params, 'password');
  if (password !== undefined) {
    body['credentials'] = { password: { value: password } };
  }

  const { body: user } = await api.call<TenantUser>('POST', '/users', {
    query: { activate },
    body,
  });
  ledger.record({
    kind: 'user',
    remoteId: user.id,
    description: `User ${login}`,
    reversal: { action: 'delete-user', args: { userId: user.id } },
  });

  return { status: 'success', output: summarizeUser(user) };
});

const createAdminUser = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const roleType = stringParam(params, 'roleType');
  const path = `/users/${userId}/roles`;

  if (context.dryRun) {
    // Fails the dry run early if the user does not exist.
    await api.call<TenantUser>('GET', `/users/${userId}`);
    return planned(context, [
      { method: 'POST', path, description: `Assign ${roleType} to user ${userId}`, body: { type: roleType } },
    ]);
  }

  const { body: role } = await api.call<TenantRole>('POST', path, { body: { type: roleType } });
  ledger.record({
    kind: 'role-assignment',
    remoteId: role.id,
    description: `${roleType} assigned to user ${userId}`,
    reversal: { action: 'unassign-user-role', args: { userId, roleId: role.id } },
  });

  return { status: 'success', output: { userId, roleId: role.id, roleType } };
});

const createApiToken = defineModule(async (api, params, ledger, context) => {
  const name = stringParam(params, 'name');

  if (context.dryRun) {
    return planned(context, [
      { method: 'POST', path: '/api-tokens', description: `Create API token "${name}"`, body: { name } },
    ]);
  }

  const { body: token } = await api.call<{ id: string; userId: string; tokenValue: string }>(
    'POST',
    '/api-tokens',
    { body: { name } },
  );
  ledger.record({
    kind: 'api-token',
    remoteId: token.id,
    description: `API token "${name}"`,
    reversal: { action: 'revoke-api-token', args: { tokenId: token.id } },
  });

  return {
    status: 'success',
    output: { tokenId: token.id, name, userId: token.userId, tokenHint: tokenHint(token.tokenValue) },
  };
});

export const changeUserState = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const operation = stringParam(params, 'operation');
  const sendEmail = booleanParam(params, 'sendEmail', false);
  const { body: user } = await api.call<TenantUser>('GET', `/users/${userId}`);

  const isDelete = operation === 'DELETE';
  const path = isDelete ? `/users/${userId}` : `/users/${userId}/lifecycle/${operation.toLowerCase()}`;
  const method = isDelete ? 'DELETE' : 'POST';

  if (context.dryRun) {
    return planned(context, [
      { method, path, description: `${operation} user ${userId} (currently ${user.status})` },
    ]);
  }

  await api.call(method, path, { query: { sendEmail } });
  ledger.record({
    kind: 'user-state',
    remoteId: userId,
    description: `${operation} on user ${user.profile.login} (was ${user.status})`,
    reversal: lifecycleReversal(userId, operation, user.status),
  });

  return { status: 'success', output: { userId, operation, previousStatus: user.status } };
});

const resetPassword = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const sendEmail = booleanParam(params, 'sendEmail', false);
  const path = `/users/${userId}/lifecycle/reset_password`;

  if (context.dryRun) {
    await api.call<TenantUser>('GET', `/users/${userId}`);
    return planned(context, [{ method: 'POST', path, description: `Reset password of user ${userId}` }]);
  }

  const { body } = await api.call<{ resetPasswordUrl?: string } | null>('POST', path, {
    query: { sendEmail },
  });
  ledger.record({
    kind: 'credential',
    remoteId: userId,
    description: `Password reset for user ${userId}`,
    reversal: manual(`User ${userId} must set a new password`),
  });

  const output: Record<string, unknown> = { userId, emailSent: sendEmail };
  if (body?.resetPasswordUrl) {
    output['resetPasswordUrl'] = body.resetPasswordUrl;
  }
  return { status: 'success', output };
});

const resetFactors = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const path = `/users/${userId}/lifecycle/reset_factors`;
  const { body: factors } = await api.call<TenantFactor[]>('GET', `/users/${userId}/factors`);

  if (context.dryRun) {
    return planned(context, [
      { method: 'POST', path, description: `Reset ${factors.length} factor(s) of user ${userId}` },
    ]);
  }

  await api.call('POST', path);
  ledger.record({
    kind: 'credential',
    remoteId: userId,
    description: `All factors reset for user ${userId}`,
    reversal: manual(
      `User ${userId} must re-enroll: ${factors.map((factor) => factor.factorType).join(', ') || 'no factors were enrolled'}`,
    ),
  });

  return { status: 'success', output: { userId, factorsReset: factors.length } };
});

const deleteFactor = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const factorId = stringParam(params, 'factorId');
  const { body: factors } = await api.call<TenantFactor[]>('GET', `/users/${userId}/factors`);
  const factor = factors.find((candidate) => candidate.id === factorId);
  if (!factor) {
    return { status: 'skipped', reason: `User ${userId} has no factor ${factorId}` };
  }

  const path = `/users/${userId}/factors/${factorId}`;
  if (context.dryRun) {
    return planned(context, [
      { method: 'DELETE', path, description: `Delete ${factor.factorType} factor of user ${userId}` },
    ]);
  }

  await api.call('DELETE', path);
  ledger.record({
    kind: 'credential',
    remoteId: factorId,
    description: `${factor.factorType} factor deleted for user ${userId}`,
    reversal: manual(`User ${userId} must re-enroll a ${factor.factorType} factor`),
  });

  return { status: 'success', output: { userId, factorId, factorType: factor.factorType } };
});

const setRecoveryQuestion = defineModule(async (api, params, ledger, context) => {
  const userId = stringParam(params, 'userId');
  const question = stringParam(params, 'question');
  const path = `/users/${userId}`;

  if (context.dryRun) {
    await api.call<TenantUser>('GET', path);
    return planned(context, [
      { method: 'POST', path, description: `Set recovery question of user ${userId}` },
    ]);
  }

  await api.call('POST', path, {
    body: { credentials: { recovery_question: { question, answer: stringParam(params, 'answer') } } },
  });
  ledger.record({
    kind: 'credential',
    remoteId: userId,
    description: `Recovery question set for user ${userId}`,
    reversal: manual(`User ${userId} must choose a new recovery question`),
  });

  return { status: 'success', output: { userId, question } };
});

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerPersistenceTechniques(registry: ModuleRegistry): void {
  registry.register(CREATE_USER, createUser);
  registry.register(CREATE_ADMIN_USER, createAdminUser);
  registry.register(CREATE_API_TOKEN, createApiToken);
  registry.register(changeUserStateDescriptor('persistence'), changeUserState);
  registry.register(RESET_PASSWORD, resetPassword);
  registry.register(RESET_FACTORS, resetFactors);
  registry.register(DELETE_FACTOR, deleteFactor);
  registry.register(SET_RECOVERY_QUESTION, setRecoveryQuestion);
}
