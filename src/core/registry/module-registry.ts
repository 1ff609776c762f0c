/**
 * Module registry: the catalog of action modules, keyed by technique id.
 *
 * Populated once at startup and then sealed; the engine only reads it.
 * Descriptors are frozen at registration and their parameter schemas
 * compiled, so a bad schema fails at load rather than mid-run.
 */

import { createLogger, type Logger } from '../logger.js';
import type { ModuleFactory } from '../modules/action-module.js';
import {
  DuplicateModuleError,
  InvalidParamsError,
  RegistrySealedError,
  UnknownModuleError,
} from '../sim-error.js';
import { isArtifactKind } from '../ledger/ledger-store.js';
import {
  formatTechniqueId,
  parseTechniqueId,
  type ModuleDescriptor,
  type Tactic,
  type TechniqueId,
} from '../../types/technique.js';
import { ParamValidator } from './param-validator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegisteredModule {
  descriptor: ModuleDescriptor;
  factory: ModuleFactory;
}

// ---------------------------------------------------------------------------
// ModuleRegistry
// ---------------------------------------------------------------------------

export class ModuleRegistry {
  private readonly entries: Map<string, RegisteredModule> = new Map();
  private readonly validator = new ParamValidator();
  private readonly logger: Logger;
  private sealed = false;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('registry');
  }

  /**
   * Add a module.
   *
   * @throws RegistrySealedError after `seal()`.
   * @throws DuplicateModuleError if the technique id is taken.
   * @throws Error if the descriptor is inconsistent or its schema invalid.
   */
  register(descriptor: ModuleDescriptor, factory: ModuleFactory): void {
    const key = formatTechniqueId(descriptor.id);
    if (this.sealed) {
      throw new RegistrySealedError(key);
    }
    if (this.entries.has(key)) {
      throw new DuplicateModuleError(key);
    }

    // Round-trip through the parser to reject malformed ids.
    parseTechniqueId(key);
    for (const kind of descriptor.artifactKinds) {
      if (!isArtifactKind(kind)) {
        throw new Error(`Module "${key}" declares unknown artifact kind "${kind}"`);
      }
    }
    if (!descriptor.mutating && descriptor.artifactKinds.length > 0) {
      throw new Error(`Module "${key}" declares artifact kinds but is not mutating`);
    }

    this.validator.compile(key, descriptor.params);
    this.entries.set(key, { descriptor: freezeDescriptor(descriptor), factory });
    this.logger.debug('module registered', { moduleId: key });
  }

  /** Refuse further registrations. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Descriptors in registration order, optionally for one tactic. */
  list(tactic?: Tactic): ModuleDescriptor[] {
    return [...this.entries.values()]
      .map((entry) => entry.descriptor)
      .filter((descriptor) => tactic === undefined || descriptor.id.tactic === tactic);
  }

  has(id: TechniqueId | string): boolean {
    return this.entries.has(keyOf(id));
  }

  /** @throws UnknownModuleError */
  resolve(id: TechniqueId | string): RegisteredModule {
    const key = keyOf(id);
    const entry = this.entries.get(key);
    if (!entry) {
      throw new UnknownModuleError(key);
    }
    return entry;
  }

  describe(id: TechniqueId | string): ModuleDescriptor {
    return this.resolve(id).descriptor;
  }

  /**
   * Validate parameters against the module's schema.
   *
   * @returns A copy of `params` with schema defaults applied.
   * @throws UnknownModuleError, InvalidParamsError
   */
  validateParams(id: TechniqueId | string, params: unknown = {}): Record<string, unknown> {
    const key = formatTechniqueId(this.resolve(id).descriptor.id);
    const result = this.validator.validate(key, params);
    if (!result.valid) {
      throw new InvalidParamsError(key, result.errors);
    }
    return result.value;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function keyOf(id: TechniqueId | string): string {
  return typeof id === 'string' ? id : formatTechniqueId(id);
}

function freezeDescriptor(descriptor: ModuleDescriptor): ModuleDescriptor {
  return Object.freeze({
    ...descriptor,
    id: Object.freeze({ tactic: descriptor.id.tactic, name: descriptor.id.name }),
    attack: Object.freeze([...descriptor.attack]),
    permissions: Object.freeze([...descriptor.permissions]),
    artifactKinds: Object.freeze([...descriptor.artifactKinds]),
    params: deepFreeze(structuredClone(descriptor.params)),
  });
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
