/**
 * Tests for the config loader.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import {
  loadConfig,
  validateConfig,
  applyDefaults,
  substituteEnvVars,
  resolveDatabasePath,
  ConfigValidationError,
} from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `config-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(testDir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for an empty file', async () => {
    const configPath = join(testDir, 'config.yaml');
    await writeFile(configPath, '');

    expect(await loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over defaults', async () => {
    const configPath = join(testDir, 'config.yaml');
    await writeFile(configPath, `
server:
  port: 8080
  cors:
    enabled: false
listing:
  pageSize: 10
`);

    const config = await loadConfig({ configPath });

    expect(config.server).toEqual({
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      cors: { enabled: false, origins: ['*'] },
    });
    expect(config.listing.pageSize).toBe(10);
    expect(config.storage.databasePath).toBe('data/users.db');
  });

  it('substitutes environment variables', async () => {
    vi.stubEnv('INTAKE_TEST_DB', '/var/lib/intake/users.db');
    const configPath = join(testDir, 'config.yaml');
    await writeFile(configPath, `
storage:
  databasePath: \${INTAKE_TEST_DB}
provider:
  url: \${INTAKE_TEST_PROVIDER:-http://localhost:4000/api/}
`);

    const config = await loadConfig({ configPath });

    expect(config.storage.databasePath).toBe('/var/lib/intake/users.db');
    expect(config.provider.url).toBe('http://localhost:4000/api/');
  });

  it('rejects an invalid port', async () => {
    const configPath = join(testDir, 'config.yaml');
    await writeFile(configPath, 'server:\n  port: 70000\n');

    await expect(loadConfig({ configPath })).rejects.toThrow(
      "Config validation error at 'server.port': port must be a number between 1 and 65535"
    );
  });

  it('rejects malformed YAML', async () => {
    const configPath = join(testDir, 'config.yaml');
    await writeFile(configPath, 'server: [unclosed');

    await expect(loadConfig({ configPath })).rejects.toThrow('Failed to parse config file');
  });

  describe('validateConfig', () => {
    it('rejects an unknown log level', () => {
      expect(() => validateConfig({ server: { logLevel: 'verbose' } })).toThrow(ConfigValidationError);
    });

    it('rejects a relative provider url', () => {
      try {
        validateConfig({ provider: { url: 'randomuser.me/api' } });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        expect(err).toMatchObject({ path: 'provider.url', value: 'randomuser.me/api' });
      }
    });

    it('rejects a zero page size', () => {
      expect(() => validateConfig({ listing: { pageSize: 0 } })).toThrow(
        "Config validation error at 'listing.pageSize': pageSize must be a positive integer"
      );
    });

    it('rejects an empty database path', () => {
      expect(() => validateConfig({ storage: { databasePath: '' } })).toThrow(ConfigValidationError);
    });

    it('accepts a complete config', () => {
      expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
    });
  });

  it('substituteEnvVars leaves an unset variable without default empty', () => {
    expect(substituteEnvVars('x${INTAKE_TEST_UNSET_VAR}y')).toBe('xy');
  });

  it('applyDefaults gives each config its own cors origins list', () => {
    const first = applyDefaults({});
    first.server.cors.origins.push('http://localhost:5173');

    expect(applyDefaults({}).server.cors.origins).toEqual(['*']);
    expect(DEFAULT_CONFIG.server.cors.origins).toEqual(['*']);
  });

  describe('resolveDatabasePath', () => {
    it('resolves relative paths against the base path', () => {
      const config = applyDefaults({});
      expect(resolveDatabasePath(config, '/srv/app')).toBe('/srv/app/data/users.db');
    });

    it('keeps absolute paths and :memory:', () => {
      expect(resolveDatabasePath(applyDefaults({ storage: { databasePath: '/tmp/u.db' } }), '/srv')).toBe('/tmp/u.db');
      expect(resolveDatabasePath(applyDefaults({ storage: { databasePath: ':memory:' } }), '/srv')).toBe(':memory:');
    });
  });
});
