import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, statSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, TINMAN_SUBDIRS, ensureDirectoryStructure, parseConfig, resolveHome } from './config.js';

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

describe('resolveHome', () => {
  it('returns $TINMAN_HOME when set', () => {
    expect(resolveHome({ TINMAN_HOME: '/custom/path' })).toBe('/custom/path');
  });

  it('strips a trailing slash', () => {
    expect(resolveHome({ TINMAN_HOME: '/custom/path/' })).toBe('/custom/path');
  });

  it('expands a leading ~', () => {
    expect(resolveHome({ TINMAN_HOME: '~/sim' })).toBe(join(homedir(), 'sim'));
  });

  it('falls back to ~/.tinman when unset or empty', () => {
    expect(resolveHome({})).toBe(join(homedir(), '.tinman'));
    expect(resolveHome({ TINMAN_HOME: '' })).toBe(join(homedir(), '.tinman'));
  });
});

// ---------------------------------------------------------------------------
// ensureDirectoryStructure()
// ---------------------------------------------------------------------------

describe('ensureDirectoryStructure', () => {
  let root: string;

  beforeEach(() => {
    root = join(mkdtempSync(join(tmpdir(), 'tinman-home-')), 'home');
  });

  afterEach(() => {
    rmSync(join(root, '..'), { recursive: true, force: true });
  });

  it('creates every subdirectory', () => {
    const dirs = ensureDirectoryStructure(root);

    for (const subdir of TINMAN_SUBDIRS) {
      expect(existsSync(join(root, subdir))).toBe(true);
    }
    expect(dirs).toEqual({
      root,
      ledger: join(root, 'data/ledger'),
      reports: join(root, 'data/reports'),
      logs: join(root, 'data/logs'),
      plans: join(root, 'plans'),
      credentials: join(root, 'credentials'),
      configFile: join(root, 'config.toml'),
    });
  });

  it('restricts the credentials directory to its owner', () => {
    ensureDirectoryStructure(root);
    expect(statSync(join(root, 'credentials')).mode & 0o777).toBe(0o700);
  });

  it('is idempotent', () => {
    ensureDirectoryStructure(root);
    expect(() => ensureDirectoryStructure(root)).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns the defaults for an empty table', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('merges partial sections over the defaults', () => {
    const config = parseConfig({ engine: { concurrency: 8 }, retry: { multiplier: 1.5 } });

    expect(config.engine).toEqual({ ...DEFAULT_CONFIG.engine, concurrency: 8 });
    expect(config.retry.multiplier).toBe(1.5);
    expect(config.retry.max_attempts).toBe(5);
  });

  it('reads profiles and the default profile', () => {
    const config = parseConfig({
      default_profile: 'lab',
      profiles: {
        lab: { org_url: 'https://lab.example.com', description: 'Lab tenant' },
        staging: { org_url: 'https://staging.example.com' },
      },
    });

    expect(config.default_profile).toBe('lab');
    expect(config.profiles).toEqual({
      lab: { org_url: 'https://lab.example.com', description: 'Lab tenant' },
      staging: { org_url: 'https://staging.example.com', description: '' },
    });
  });

  it('keeps unknown top-level keys', () => {
    expect(parseConfig({ experimental: { fast: true } })['experimental']).toEqual({ fast: true });
  });

  it('rejects a concurrency below one', () => {
    expect(() => parseConfig({ engine: { concurrency: 0 } })).toThrow('engine.concurrency must be a positive integer');
  });

  it('rejects a fractional attempt count', () => {
    expect(() => parseConfig({ retry: { max_attempts: 2.5 } })).toThrow('retry.max_attempts must be a positive integer');
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ rate_limit: 10 })).toThrow('[rate_limit] must be a table');
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig({ logging: { level: 'verbose' } })).toThrow(
      'Invalid logging.level: "verbose". Must be one of: debug, info, warn, error',
    );
  });

  it('rejects a profile without an org url', () => {
    expect(() => parseConfig({ profiles: { lab: { description: 'Lab' } } })).toThrow(
      'profiles.lab.org_url must be a non-empty string',
    );
  });

  it('rejects a profile name with a space', () => {
    expect(() => parseConfig({ profiles: { 'my lab': { org_url: 'https://lab.example.com' } } })).toThrow(
      'Invalid profile name: "my lab"',
    );
  });

  it('leaves the Elasticsearch export off unless configured', () => {
    expect(parseConfig({}).elasticsearch).toBeUndefined();
  });

  it('reads the Elasticsearch section with its defaults', () => {
    expect(parseConfig({ elasticsearch: { url: 'https://es.example.com:9200', username: 'tinman' } }).elasticsearch).toEqual({
      url: 'https://es.example.com:9200',
      username: 'tinman',
      index: 'tinman',
      level: 'info',
    });
    expect(
      parseConfig({ elasticsearch: { url: 'http://localhost:9200', index: 'sim-events', level: 'warn' } }).elasticsearch,
    ).toEqual({ url: 'http://localhost:9200', index: 'sim-events', level: 'warn' });
  });

  it.each([
    [{ username: 'tinman' }, 'elasticsearch.url must be an http or https URL'],
    [{ url: 'es.example.com' }, 'elasticsearch.url must be an http or https URL'],
    [{ url: 'https://es.example.com', index: '' }, 'elasticsearch.index must be a non-empty string'],
    [
      { url: 'https://es.example.com', level: 'trace' },
      'Invalid elasticsearch.level: "trace". Must be one of: debug, info, warn, error',
    ],
    [{ url: 'https://es.example.com', username: 7 }, 'elasticsearch.username must be a string'],
  ])('rejects Elasticsearch settings %j', (elasticsearch, message) => {
    expect(() => parseConfig({ elasticsearch })).toThrow(message);
  });

  it('rejects a default profile that is not configured', () => {
    expect(() => parseConfig({ default_profile: 'prod' })).toThrow(
      'default_profile must name a configured profile, got "prod"',
    );
  });
});
