import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigManager } from '../../src/core/config.js';
import { getArchiveCacheDir, getSysbundleDirectories } from '../../src/core/directory.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

let home: string;

function managerFor(dir: string): ConfigManager {
  return new ConfigManager({ config: dir, cache: join(dir, 'cache') });
}

beforeEach(async () => {
  home = await makeTempDir('config');
});

afterEach(async () => {
  await removeTempDir(home);
});

describe('ConfigManager', () => {
  it('uses defaults when there is no config file', async () => {
    const config = managerFor(home);

    assert.deepEqual(await config.load(), { overwrite: true });
    assert.equal(await config.get('catalog'), undefined);
    assert.equal(await config.getCacheDir(), join(home, 'cache'));
  });

  it('reads JSONC with comments and trailing commas', async () => {
    await writeFile(
      join(home, 'config.jsonc'),
      [
        '{',
        '  // default catalog',
        '  "catalog": "/srv/dist/catalog.yml",',
        '  "overwrite": false,',
        '}',
        ''
      ].join('\n')
    );

    const config = managerFor(home);

    assert.deepEqual(await config.load(), { catalog: '/srv/dist/catalog.yml', overwrite: false });
  });

  it('prefers config.jsonc over config.json', async () => {
    await writeFile(join(home, 'config.json'), '{ "catalog": "/from/json.yml" }');
    await writeFile(join(home, 'config.jsonc'), '{ "catalog": "/from/jsonc.yml" }');

    assert.equal(await managerFor(home).get('catalog'), '/from/jsonc.yml');
  });

  it('resolves relative paths against the config directory', async () => {
    await writeFile(join(home, 'config.json'), '{ "catalog": "dist/catalog.yml", "cacheDir": "../shared-cache" }');

    const config = managerFor(home);

    assert.equal(await config.get('catalog'), join(home, 'dist/catalog.yml'));
    assert.equal(await config.getCacheDir(), join(home, '../shared-cache'));
  });

  it('leaves URLs alone', async () => {
    await writeFile(join(home, 'config.json'), '{ "catalog": "https://example.test/catalog.yml" }');

    assert.equal(await managerFor(home).get('catalog'), 'https://example.test/catalog.yml');
  });

  it('ignores unknown keys', async () => {
    await writeFile(join(home, 'config.json'), '{ "colour": "blue", "overwrite": true }');

    assert.deepEqual(await managerFor(home).load(), { overwrite: true });
  });

  it('rejects values of the wrong type', async () => {
    await writeFile(join(home, 'config.json'), '{ "overwrite": "yes" }');

    await assert.rejects(managerFor(home).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.message, `Configuration key 'overwrite' must be a boolean`);
      return true;
    });
  });

  it('rejects empty paths and non-object documents', async () => {
    const emptyCatalog = await makeTempDir('config-empty');
    const arrayDoc = await makeTempDir('config-array');
    try {
      await writeFile(join(emptyCatalog, 'config.json'), '{ "catalog": "  " }');
      await writeFile(join(arrayDoc, 'config.json'), '[1, 2]');

      await assert.rejects(managerFor(emptyCatalog).load(), /Configuration key 'catalog' must be a non-empty string/);
      await assert.rejects(managerFor(arrayDoc).load(), /must be an object/);
    } finally {
      await removeTempDir(emptyCatalog);
      await removeTempDir(arrayDoc);
    }
  });

  it('wraps unparseable files in ConfigError', async () => {
    await writeFile(join(home, 'config.json'), '{ "catalog": ');

    await assert.rejects(managerFor(home).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.message, `Failed to load configuration from ${join(home, 'config.json')}`);
      return true;
    });
  });
});

describe('directories', () => {
  const saved = process.env.SYSBUNDLE_HOME;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.SYSBUNDLE_HOME;
    } else {
      process.env.SYSBUNDLE_HOME = saved;
    }
  });

  it('honours SYSBUNDLE_HOME', () => {
    process.env.SYSBUNDLE_HOME = home;

    assert.deepEqual(getSysbundleDirectories(), { config: home, cache: join(home, 'cache') });
  });

  it('keeps archives in their own cache subdirectory', () => {
    assert.equal(getArchiveCacheDir('/var/cache/sysbundle'), '/var/cache/sysbundle/archives');
  });
});
