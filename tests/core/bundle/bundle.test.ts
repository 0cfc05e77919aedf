/**
 * Bundle model: lookups, ensure semantics and the release/system consistency invariant.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Bundle } from '../../../src/core/bundle/bundle.js';
import { ReleaseNotFoundError, SystemNotFoundError } from '../../../src/utils/errors.js';
import { ErrorCodes } from '../../../src/types/index.js';
import { normalizeName } from '../../../src/utils/package-name.js';
import { ALPHA_BETA, MemoryCatalog, type FixtureRelease } from '../../test-helpers.js';

const MULTI: FixtureRelease[] = [
  {
    name: 'tools-3.1',
    systems: [
      { name: 'tools', files: ['tools.src'] },
      { name: 'tools-tests', files: ['tests.src'], depends: ['tools'] }
    ]
  },
  ...ALPHA_BETA
];

function assertConsistent(bundle: Bundle): void {
  const systemKeys = new Set(bundle.providedSystems().map(system => normalizeName(system.name)));
  for (const system of bundle.providedSystems()) {
    assert.ok(bundle.findRelease(system.release), `release of ${system.name} is registered`);
  }
  for (const release of bundle.providedReleases()) {
    for (const name of release.systems) {
      assert.ok(systemKeys.has(normalizeName(name)), `${name} of ${release.name} is registered`);
    }
  }
}

describe('Bundle', () => {
  it('finds nothing in an empty bundle', () => {
    const bundle = new Bundle(new MemoryCatalog(ALPHA_BETA));

    assert.equal(bundle.findSystem('alpha'), undefined);
    assert.equal(bundle.findRelease('alpha-1.0'), undefined);
    assert.deepEqual(bundle.providedSystems(), []);
    assert.deepEqual(bundle.providedReleases(), []);
  });

  it('ensureSystem registers the owning release and every sibling', async () => {
    const bundle = new Bundle(new MemoryCatalog(MULTI));

    const system = await bundle.ensureSystem('tools-tests');

    assert.equal(system.name, 'tools-tests');
    assert.deepEqual(system.dependencies, ['tools']);
    assert.deepEqual(bundle.providedReleases().map(release => release.name), ['tools-3.1']);
    assert.deepEqual(bundle.providedSystems().map(s => s.name), ['tools', 'tools-tests']);
    assertConsistent(bundle);
  });

  it('ensureSystem is idempotent and does not query the catalog twice', async () => {
    const catalog = new MemoryCatalog(ALPHA_BETA);
    const bundle = new Bundle(catalog);

    const first = await bundle.ensureSystem('beta');
    const second = await bundle.ensureSystem('beta');

    assert.equal(first, second);
    assert.deepEqual(catalog.systemLookups, ['beta']);
    assert.deepEqual(catalog.releaseLookups, ['beta-2.0']);
    assert.equal(bundle.providedSystems().length, 1);
  });

  it('ensureRelease is idempotent', async () => {
    const catalog = new MemoryCatalog(ALPHA_BETA);
    const bundle = new Bundle(catalog);

    const first = await bundle.ensureRelease('alpha-1.0');
    const second = await bundle.ensureRelease('alpha-1.0');

    assert.equal(first, second);
    assert.deepEqual(catalog.releaseLookups, ['alpha-1.0']);
    assert.deepEqual(bundle.providedSystems().map(s => s.name), ['alpha']);
    assertConsistent(bundle);
  });

  it('compares names case-insensitively', async () => {
    const catalog = new MemoryCatalog(ALPHA_BETA);
    const bundle = new Bundle(catalog);

    const system = await bundle.ensureSystem('ALPHA');

    assert.equal(system.name, 'alpha');
    assert.equal(bundle.findSystem('Alpha'), system);
    assert.equal(await bundle.ensureSystem('alpha'), system);
    assert.equal(bundle.findRelease('ALPHA-1.0')?.name, 'alpha-1.0');
    assert.deepEqual(catalog.systemLookups, ['ALPHA']);
  });

  it('fails with SystemNotFoundError for an unknown system', async () => {
    const bundle = new Bundle(new MemoryCatalog(ALPHA_BETA));

    await assert.rejects(bundle.ensureSystem('gamma'), (error: unknown) => {
      assert.ok(error instanceof SystemNotFoundError);
      assert.equal(error.objectName, 'gamma');
      assert.equal(error.kind, 'system');
      assert.equal(error.code, ErrorCodes.SYSTEM_NOT_FOUND);
      assert.equal(error.message, "System 'gamma' not found");
      return true;
    });
    assert.deepEqual(bundle.providedReleases(), []);
  });

  it('fails with ReleaseNotFoundError when the owning release is missing', async () => {
    const catalog = new MemoryCatalog(ALPHA_BETA);
    catalog.removeRelease('alpha-1.0');
    const bundle = new Bundle(catalog);

    await assert.rejects(bundle.ensureSystem('alpha'), (error: unknown) => {
      assert.ok(error instanceof ReleaseNotFoundError);
      assert.equal(error.objectName, 'alpha-1.0');
      assert.equal(error.message, "Release 'alpha-1.0' not found");
      return true;
    });
    assert.equal(bundle.findSystem('alpha'), undefined);
  });

  it('fails with ReleaseNotFoundError for an unknown release name', async () => {
    const bundle = new Bundle(new MemoryCatalog(ALPHA_BETA));

    await assert.rejects(bundle.ensureRelease('omega-9'), ReleaseNotFoundError);
  });

  it('registers a system its release does not list and keeps it with that release', async () => {
    const catalog = new MemoryCatalog(ALPHA_BETA);
    catalog.addUnlistedSystem({
      name: 'alpha-extras',
      release: 'alpha-1.0',
      sourceFiles: ['extras.src'],
      dependencies: []
    });
    const bundle = new Bundle(catalog);

    await bundle.ensureSystem('alpha-extras');

    const release = bundle.findRelease('alpha-1.0');
    assert.ok(release);
    assert.deepEqual(bundle.systemsOf(release).map(s => s.name), ['alpha', 'alpha-extras']);
    assertConsistent(bundle);
  });

  it('returns releases and systems sorted by name regardless of insertion order', async () => {
    const bundle = new Bundle(new MemoryCatalog(MULTI));

    await bundle.ensureSystem('tools');
    await bundle.ensureSystem('beta');
    await bundle.ensureSystem('alpha');

    assert.deepEqual(
      bundle.providedReleases().map(release => release.name),
      ['alpha-1.0', 'beta-2.0', 'tools-3.1']
    );
    assert.deepEqual(
      bundle.providedSystems().map(system => system.name),
      ['alpha', 'beta', 'tools', 'tools-tests']
    );
  });

  it('hands out frozen entities', async () => {
    const bundle = new Bundle(new MemoryCatalog(ALPHA_BETA));

    const system = await bundle.ensureSystem('beta');

    assert.ok(Object.isFrozen(system));
    assert.ok(Object.isFrozen(system.dependencies));
    assert.ok(Object.isFrozen(bundle.releaseOf(system)));
  });

  it('markExpanded reports the first expansion only', async () => {
    const bundle = new Bundle(new MemoryCatalog(MULTI));
    await bundle.ensureSystem('tools');

    assert.deepEqual(bundle.unexpandedSystems().map(s => s.name), ['tools', 'tools-tests']);
    assert.equal(bundle.markExpanded('tools'), true);
    assert.equal(bundle.markExpanded('TOOLS'), false);
    assert.deepEqual(bundle.unexpandedSystems().map(s => s.name), ['tools-tests']);
    assert.throws(() => bundle.markExpanded('alpha'), SystemNotFoundError);
  });

  it('records requested names once, keeping the first spelling', () => {
    const bundle = new Bundle(new MemoryCatalog(ALPHA_BETA));

    bundle.recordRequest('Beta');
    bundle.recordRequest('alpha');
    bundle.recordRequest('beta');

    assert.deepEqual(bundle.requestedSystems, ['Beta', 'alpha']);
  });
});
