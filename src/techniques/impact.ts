/**
 * Impact: the state-change modules again, filed under the tactic an
 * attacker uses them for when the goal is disruption (locking users
 * out, switching apps off).
 */

import type { ModuleRegistry } from '../core/registry/module-registry.js';
import { registerStateTechniques } from './defense-evasion.js';
import { changeUserState, changeUserStateDescriptor } from './persistence.js';

export function registerImpactTechniques(registry: ModuleRegistry): void {
  registry.register(changeUserStateDescriptor('impact'), changeUserState);
  registerStateTechniques(registry, 'impact');
}
