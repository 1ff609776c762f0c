import type { ModuleRegistry } from '../core/registry/module-registry.js';
import { registerDefenseEvasionTechniques } from './defense-evasion.js';
import { registerDiscoveryTechniques } from './discovery.js';
import { registerImpactTechniques } from './impact.js';
import { registerPersistenceTechniques } from './persistence.js';
import { registerPrivilegeEscalationTechniques } from './privilege-escalation.js';

/** Register the built-in catalog, in tactic order. */
export function registerBuiltinTechniques(registry: ModuleRegistry): void {
  registerDiscoveryTechniques(registry);
  registerPersistenceTechniques(registry);
  registerPrivilegeEscalationTechniques(registry);
  registerDefenseEvasionTechniques(registry);
  registerImpactTechniques(registry);
}

export { ADMIN_ROLES, POLICY_TYPES } from './shared.js';
