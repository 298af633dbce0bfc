import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  findDanglingReferences,
  loadSampleConfig,
  parseAmbryConfig,
  readAmbryConfig,
  serializeAmbryConfig,
  withFilesystemRoot,
  writeAmbryConfig,
} from '../../../src/ambry-config/document';
import { CONFIG_KEY_GROUPS, type AmbryConfig } from '../../../src/ambry-config/schema';
import { ConfigurationError, ErrorCodes, ValidationError } from '../../../src/lib/errors';

describe('sample configuration', () => {
  it('contains every documented key group', () => {
    const config = loadSampleConfig();

    for (const group of CONFIG_KEY_GROUPS) {
      expect(config[group]).toBeDefined();
    }
  });

  it('keeps the {root} placeholders for ambry to expand', () => {
    const config = loadSampleConfig();

    expect(config.filesystem?.root).toBe('/var/lib/ambry');
    expect(config.filesystem?.downloads).toBe('{root}/cache/downloads');
    expect(config.database?.default).toEqual({ dbname: '{root}/library.db', driver: 'sqlite' });
  });

  it('accepts both DSN strings and described warehouses', () => {
    const config = loadSampleConfig();

    expect(config.warehouse?.sqlite).toBe('sqlite:////var/lib/ambry/warehouses/sqlite_warehouse.db');
    expect(config.warehouse?.health).toEqual({
      database: 'sqlite:////var/lib/ambry/warehouses/health.db',
      title: 'Health Warehouse',
      name: 'health',
      local_cache: '/var/lib/ambry/cache/health',
    });
  });

  it('describes servers with an optional redis backend', () => {
    const config = loadSampleConfig();

    expect(config.servers?.documentation).toEqual({ host: 'localhost', port: 5001, library: 'default' });
    expect(config.servers?.numbers?.redis).toEqual({ host: 'redis', port: 6379 });
  });

  it('round-trips through YAML without loss', () => {
    const config = loadSampleConfig();
    const text = serializeAmbryConfig(config);

    expect(yaml.load(text)).toEqual(config);
    expect(parseAmbryConfig(text)).toEqual(config);
  });

  it('has no dangling references', () => {
    expect(findDanglingReferences(loadSampleConfig())).toEqual([]);
  });
});

describe('parseAmbryConfig', () => {
  it('keeps keys it does not know about', () => {
    const config = parseAmbryConfig('accounts:\n  s3:\n    user: test\nfilesystem:\n  root: /data\n');

    expect(config).toEqual({ accounts: { s3: { user: 'test' } }, filesystem: { root: '/data' } });
  });

  it('treats an empty document as an empty configuration', () => {
    expect(parseAmbryConfig('')).toEqual({});
  });

  it('reports schema violations with their paths', () => {
    expect.assertions(2);
    try {
      parseAmbryConfig('servers:\n  web:\n    host: localhost\n    port: 70000\n', 'bad.yaml');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.violations.map((v) => v.path) : []).toEqual([
        'servers.web.port',
      ]);
    }
  });

  it('reports malformed YAML as a configuration error', () => {
    expect(() => parseAmbryConfig('database: [unclosed', 'broken.yaml')).toThrow(ConfigurationError);
  });
});

describe('findDanglingReferences', () => {
  it('names references to undefined sections', () => {
    const config: AmbryConfig = {
      database: { default: { driver: 'sqlite', dbname: '/tmp/l.db' } },
      filesystem: { root: '/tmp' },
      library: { main: { database: 'missing', filesystem: 'default' } },
      servers: { api: { host: 'localhost', port: 8080, library: 'other' } },
    };

    expect(findDanglingReferences(config)).toEqual([
      "library.main.database refers to unknown database 'missing'",
      "library.main.filesystem refers to unknown filesystem 'default'",
      "servers.api.library refers to unknown library 'other'",
    ]);
  });
});

describe('writing configuration files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ambry-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes YAML that reads back identically, creating parent directories', async () => {
    const config = withFilesystemRoot(loadSampleConfig(), '/srv/ambry');
    const path = join(dir, 'nested', 'ambry.yaml');

    await writeAmbryConfig(path, config);

    expect(readFileSync(path, 'utf-8').split('\n')[0]).toBe(
      '# ambry configuration written by ambry-provision',
    );
    const reread = await readAmbryConfig(path);
    expect(reread).toEqual(config);
    expect(reread.filesystem?.root).toBe('/srv/ambry');
    expect(reread.filesystem?.build).toBe('{root}/build');
  });

  it('refuses to overwrite without force', async () => {
    const path = join(dir, 'ambry.yaml');
    writeFileSync(path, 'filesystem:\n  root: /keep\n');

    await expect(writeAmbryConfig(path, loadSampleConfig())).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_EXISTS,
    });
    expect(readFileSync(path, 'utf-8')).toBe('filesystem:\n  root: /keep\n');
  });

  it('overwrites with force', async () => {
    const path = join(dir, 'ambry.yaml');
    writeFileSync(path, 'filesystem:\n  root: /keep\n');

    await writeAmbryConfig(path, loadSampleConfig(), { force: true });

    expect((await readAmbryConfig(path)).filesystem?.root).toBe('/var/lib/ambry');
  });

  it('reports a missing file', async () => {
    await expect(readAmbryConfig(join(dir, 'absent.yaml'))).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_NOT_FOUND,
    });
  });
});
