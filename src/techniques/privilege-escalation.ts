/**
 * Privilege escalation: granting an admin role to a whole group, so
 * every member (including ones added later) inherits it.
 */

import { stringParam } from '../core/modules/action-module.js';
import type { ModuleRegistry } from '../core/registry/module-registry.js';
import type { ModuleDescriptor } from '../types/technique.js';
import {
  ADMIN_ROLE_PARAM,
  ID_PARAM,
  defineModule,
  planned,
  type TenantGroup,
  type TenantRole,
} from './shared.js';

export const ASSIGN_GROUP_ADMIN_ROLE: ModuleDescriptor = {
  id: { tactic: 'privilege-escalation', name: 'assign-group-admin-role' },
  description: 'Assign an admin role to a group',
  attack: ['T1098.003'],
  permissions: ['SUPER_ADMIN'],
  artifactKinds: ['role-assignment'],
  mutating: true,
  params: {
    type: 'object',
    additionalProperties: false,
    required: ['groupId'],
    properties: { groupId: ID_PARAM, roleType: ADMIN_ROLE_PARAM },
  },
};

const assignGroupAdminRole = defineModule(async (api, params, ledger, context) => {
  const groupId = stringParam(params, 'groupId');
  const roleType = stringParam(params, 'roleType');
  const { body: group } = await api.call<TenantGroup>('GET', `/groups/${groupId}`);
  const path = `/groups/${groupId}/roles`;

  if (context.dryRun) {
    return planned(context, [
      {
        method: 'POST',
        path,
        description: `Assign ${roleType} to group "${group.profile.name}"`,
        body: { type: roleType },
      },
    ]);
  }

  const { body: role } = await api.call<TenantRole>('POST', path, { body: { type: roleType } });
  ledger.record({
    kind: 'role-assignment',
    remoteId: role.id,
    description: `${roleType} assigned to group "${group.profile.name}"`,
    reversal: { action: 'unassign-group-role', args: { groupId, roleId: role.id } },
  });

  return { status: 'success', output: { groupId, groupName: group.profile.name, roleId: role.id, roleType } };
});

export function registerPrivilegeEscalationTechniques(registry: ModuleRegistry): void {
  registry.register(ASSIGN_GROUP_ADMIN_ROLE, assignGroupAdminRole);
}
