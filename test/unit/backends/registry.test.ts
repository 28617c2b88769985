/**
 * Backend registry Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { BackendError, appFromJson, appToJson, getBackend, isBackendId, listBackends } from '@styx/core';
import { dummyApp, makePackage } from '../../helpers/fixtures.js';

describe('backend registry', () => {
  it('lists every backend', () => {
    assert.deepStrictEqual(
      listBackends().map(b => b.id),
      ['python', 'typescript', 'ir']
    );
  });

  it('recognizes backend ids', () => {
    assert.strictEqual(isBackendId('python'), true);
    assert.strictEqual(isBackendId('rust'), false);
  });

  it('rejects an unknown backend', () => {
    assert.throws(
      () => getBackend('rust'),
      (error: unknown) =>
        error instanceof BackendError &&
        error.code === 'ERR_UNKNOWN_BACKEND' &&
        error.message === 'Unknown backend "rust"' &&
        error.suggestion === 'Available backends: python, typescript, ir'
    );
  });
});

describe('IR dump backend', () => {
  it('writes one document per App that reads back', () => {
    const files = [...getBackend('ir').compile([{ package: makePackage('pkg'), apps: [dummyApp()] }])];

    assert.deepStrictEqual(
      files.map(f => f.path),
      ['pkg/dummy.json']
    );
    const [file] = files;
    assert.ok(file !== undefined);
    assert.strictEqual(file.appUid, 'dummy-uid');
    assert.strictEqual(file.content, `${appToJson(dummyApp())}\n`);
    assert.strictEqual(appFromJson(file.content).command.base.name, 'dummy');
  });
});
