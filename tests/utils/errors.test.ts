import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ArchiveError,
  BundleDirectoryExistsError,
  CatalogError,
  ConfigError,
  FileSystemError,
  ReleaseNotFoundError,
  SystemNotFoundError,
  handleError
} from '../../src/utils/errors.js';
import { BundleError, ErrorCodes } from '../../src/types/index.js';

describe('error classes', () => {
  it('formats not-found errors for both kinds', () => {
    const system = new SystemNotFoundError('gamma');
    const release = new ReleaseNotFoundError('gamma-1.0');

    assert.equal(system.message, "System 'gamma' not found");
    assert.equal(system.code, ErrorCodes.SYSTEM_NOT_FOUND);
    assert.equal(system.name, 'SystemNotFoundError');
    assert.deepEqual(system.details, { kind: 'system', name: 'gamma' });
    assert.equal(release.message, "Release 'gamma-1.0' not found");
    assert.equal(release.code, ErrorCodes.RELEASE_NOT_FOUND);
    assert.ok(release instanceof BundleError);
  });

  it('names the release in archive errors', () => {
    const error = new ArchiveError('alpha-1.0', 'disk full', { tarPath: '/tmp/a.tar' });

    assert.equal(error.message, "Archive error for release 'alpha-1.0': disk full");
    assert.equal(error.releaseName, 'alpha-1.0');
    assert.deepEqual(error.details, { releaseName: 'alpha-1.0', tarPath: '/tmp/a.tar' });
  });

  it('carries codes for the remaining failures', () => {
    assert.equal(new FileSystemError('no space').message, 'File system error: no space');
    assert.equal(new CatalogError('/c.yml', 'broken').code, ErrorCodes.CATALOG_ERROR);
    assert.equal(new ConfigError('bad').code, ErrorCodes.CONFIG_ERROR);
    assert.equal(
      new BundleDirectoryExistsError('/out').message,
      'Bundle directory /out already exists and is not empty (pass --overwrite to reuse it)'
    );
  });
});

describe('handleError', () => {
  it('turns bundle errors into a failed result with their message', () => {
    assert.deepEqual(handleError(new SystemNotFoundError('gamma')), {
      success: false,
      error: "System 'gamma' not found"
    });
  });

  it('keeps the message of plain errors', () => {
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
  });

  it('describes non-error values generically', () => {
    assert.deepEqual(handleError('boom'), { success: false, error: 'An unknown error occurred' });
  });
});
