import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadRunPlan, parseRunPlan } from './run-plan.js';

const PLAN = `
mode: concurrent
abortOnFailure: true
modules:
  - id: persistence/create-api-token
    params: { name: tinman-sim }
  - id: discovery/list-users
    bestEffort: true
`;

describe('parseRunPlan', () => {
  it('builds a run request', () => {
    expect(parseRunPlan(PLAN)).toEqual({
      mode: 'concurrent',
      dryRun: false,
      abortOnFailure: true,
      modules: [
        { id: { tactic: 'persistence', name: 'create-api-token' }, params: { name: 'tinman-sim' } },
        { id: { tactic: 'discovery', name: 'list-users' }, params: {}, bestEffort: true },
      ],
    });
  });

  it('applies defaults for omitted settings', () => {
    expect(parseRunPlan('modules:\n  - id: discovery/whoami\n')).toMatchObject({
      mode: 'sequential',
      dryRun: false,
      abortOnFailure: false,
    });
  });

  it('lets the command line force a dry run and a mode', () => {
    expect(parseRunPlan(PLAN, 'plan.yaml', { dryRun: true, mode: 'sequential' })).toMatchObject({
      mode: 'sequential',
      dryRun: true,
    });
  });

  it('keeps a dry run the plan asks for', () => {
    expect(parseRunPlan('dryRun: true\nmodules:\n  - id: discovery/whoami\n', 'plan.yaml', { dryRun: false }).dryRun).toBe(
      true,
    );
  });

  it('rejects a plan without modules', () => {
    expect(() => parseRunPlan('mode: sequential\n', 'plan.yaml')).toThrow(
      'Invalid plan.yaml: : required property "modules" is missing',
    );
  });

  it('rejects an unknown setting', () => {
    expect(() => parseRunPlan('parallel: 3\nmodules:\n  - id: discovery/whoami\n', 'plan.yaml')).toThrow(
      'Invalid plan.yaml: : additional property "parallel" not allowed',
    );
  });

  it('rejects an unknown mode', () => {
    expect(() => parseRunPlan('mode: random\nmodules:\n  - id: discovery/whoami\n', 'plan.yaml')).toThrow(
      'Invalid plan.yaml: /mode: must be equal to one of the allowed values',
    );
  });

  it('names the module with a malformed id', () => {
    expect(() =>
      parseRunPlan('modules:\n  - id: discovery/whoami\n  - id: exfiltration/dump\n', 'plan.yaml'),
    ).toThrow('Invalid plan.yaml: module 2: Invalid technique id "exfiltration/dump": unknown tactic "exfiltration"');
  });

  it('throws on YAML syntax errors', () => {
    expect(() => parseRunPlan('modules: [\n')).toThrow();
  });
});

describe('loadRunPlan', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('reads the plan from disk and names the file in errors', () => {
    dir = mkdtempSync(join(tmpdir(), 'tinman-plan-'));
    const good = join(dir, 'good.yaml');
    const bad = join(dir, 'bad.yaml');
    writeFileSync(good, PLAN);
    writeFileSync(bad, 'modules: []\n');

    expect(loadRunPlan(good).modules).toHaveLength(2);
    expect(() => loadRunPlan(bad)).toThrow(`Invalid ${bad}: /modules: must NOT have fewer than 1 items`);
  });
});
