/**
 * Run plans: YAML files describing a run request.
 *
 * ```yaml
 * mode: sequential
 * dryRun: false
 * abortOnFailure: true
 * modules:
 *   - id: persistence/create-api-token
 *     params: { name: tinman-sim }
 *   - id: discovery/list-users
 *     bestEffort: true
 * ```
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import _Ajv from 'ajv';
import { formatAjvErrors } from './registry/param-validator.js';
import type { ExecutionMode, ModuleInvocation, RunRequest } from '../types/run.js';
import { parseTechniqueId, type TechniqueId } from '../types/technique.js';

// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

interface RawPlanModule {
  id: string;
  params?: Record<string, unknown>;
  bestEffort?: boolean;
}

interface RawPlan {
  mode: ExecutionMode;
  dryRun: boolean;
  abortOnFailure: boolean;
  modules: RawPlanModule[];
}

export const RUN_PLAN_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: ['modules'],
  properties: {
    mode: { type: 'string', enum: ['sequential', 'concurrent'], default: 'sequential' },
    dryRun: { type: 'boolean', default: false },
    abortOnFailure: { type: 'boolean', default: false },
    modules: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['id'],
        properties: {
          id: { type: 'string', minLength: 3 },
          params: { type: 'object' },
          bestEffort: { type: 'boolean' },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
const validatePlan = ajv.compile<RawPlan>(RUN_PLAN_SCHEMA);

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Command-line switches that override what the plan says. */
export interface PlanOverrides {
  dryRun?: boolean;
  mode?: ExecutionMode;
}

/**
 * Parse plan text into a RunRequest.
 *
 * @param source - File name used in error messages.
 * @throws On YAML syntax errors, schema violations or malformed ids.
 */
export function parseRunPlan(text: string, source = 'run plan', overrides: PlanOverrides = {}): RunRequest {
  const raw: unknown = parseYaml(text);
  if (!validatePlan(raw)) {
    throw new Error(`Invalid ${source}: ${formatAjvErrors(validatePlan.errors).join('; ')}`);
  }

  const modules = raw.modules.map((entry, index): ModuleInvocation => {
    const invocation: ModuleInvocation = {
      id: planTechniqueId(entry.id, source, index),
      params: entry.params ?? {},
    };
    if (entry.bestEffort !== undefined) {
      invocation.bestEffort = entry.bestEffort;
    }
    return invocation;
  });

  return {
    modules,
    mode: overrides.mode ?? raw.mode,
    dryRun: overrides.dryRun || raw.dryRun,
    abortOnFailure: raw.abortOnFailure,
  };
}

export function loadRunPlan(path: string, overrides: PlanOverrides = {}): RunRequest {
  return parseRunPlan(readFileSync(path, 'utf-8'), path, overrides);
}

function planTechniqueId(value: string, source: string, index: number): TechniqueId {
  try {
    return parseTechniqueId(value);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid ${source}: module ${index + 1}: ${message}`);
  }
}
