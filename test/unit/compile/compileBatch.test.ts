/**
 * compileBatch Tests
 *
 * Failures stay scoped to their input, backend or input/backend pair and the
 * rest of the batch still runs.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  DiagnosticCollector,
  carg,
  compileBatch,
  createParam,
  emptyDocs,
  group,
  structBody,
  unitFromApp,
  unitFromJson,
  type BatchRecord,
  type CompileUnit,
} from '@styx/core';
import { dummyApp, makeApp, makePackage, toolApp } from '../../helpers/fixtures.js';

function run(
  units: CompileUnit[],
  backends: string[]
): { records: BatchRecord[]; diagnostics: DiagnosticCollector } {
  const generator = compileBatch(units, { backends, package: makePackage('pkg') });
  const records: BatchRecord[] = [];
  let step = generator.next();
  while (!step.done) {
    records.push(step.value);
    step = generator.next();
  }
  return { records, diagnostics: step.value };
}

function brokenUnit(): CompileUnit {
  const app = makeApp(
    createParam({
      id: 1,
      name: 'broken',
      body: structBody('broken', [group(carg('broken'))]),
      outputs: [
        { id: 2, name: 'o', tokens: [{ refId: 99, fileRemoveSuffixes: [] }], docs: emptyDocs(), mediaTypes: [] },
      ],
    })
  );
  return unitFromApp(app, 'broken.json');
}

describe('compileBatch', () => {
  it('runs every backend over every input', () => {
    const { records, diagnostics } = run(
      [unitFromApp(dummyApp(), 'dummy.json'), unitFromApp(toolApp(), 'tool.json')],
      ['python', 'ir']
    );

    assert.strictEqual(diagnostics.count(), 0);
    assert.deepStrictEqual(
      records.filter(r => r.backend === 'ir').map(r => [r.file.path, r.input]),
      [
        ['pkg/dummy.json', 'dummy.json'],
        ['pkg/tool.json', 'tool.json'],
      ]
    );
    assert.strictEqual(records.filter(r => r.backend === 'python').length, 7);
  });

  it('traces App modules back to their input', () => {
    const { records } = run([unitFromApp(dummyApp(), 'dummy.json')], ['python']);

    assert.deepStrictEqual(
      records.map(r => [r.file.path, r.input]),
      [
        ['pkg/dummy.py', 'dummy.json'],
        ['symbolmaps/pkg/dummy.json', undefined],
        ['symbolmaps/pkg.json', undefined],
        ['pkg/__init__.py', undefined],
        ['symbolmaps/index.json', undefined],
      ]
    );
  });

  it('records an input that does not load and carries on', () => {
    const { records, diagnostics } = run(
      [unitFromJson('bad.json', '{'), unitFromApp(dummyApp(), 'dummy.json')],
      ['ir']
    );

    const [failure] = diagnostics.getAll();
    assert.strictEqual(diagnostics.count(), 1);
    assert.ok(failure !== undefined);
    assert.strictEqual(failure.code, 'ERR_IR_FORMAT');
    assert.strictEqual(failure.input, 'bad.json');
    assert.strictEqual(failure.backend, undefined);
    assert.deepStrictEqual(
      records.map(r => r.file.path),
      ['pkg/dummy.json']
    );
  });

  it('records an unknown backend and runs the others', () => {
    const { records, diagnostics } = run([unitFromApp(dummyApp(), 'dummy.json')], ['rust', 'ir']);

    assert.deepStrictEqual(
      diagnostics.getAll().map(d => [d.code, d.backend, d.input]),
      [['ERR_UNKNOWN_BACKEND', 'rust', undefined]]
    );
    assert.strictEqual(records.length, 1);
  });

  it('scopes a codegen failure to its input and backend', () => {
    const { records, diagnostics } = run(
      [brokenUnit(), unitFromApp(dummyApp(), 'dummy.json')],
      ['python', 'ir']
    );

    assert.deepStrictEqual(
      diagnostics.getAll().map(d => [d.code, d.input, d.backend]),
      [['ERR_OUTPUT_REFERENCE', 'broken.json', 'python']]
    );
    assert.ok(records.some(r => r.backend === 'python' && r.file.path === 'pkg/dummy.py'));
    assert.ok(records.some(r => r.backend === 'ir' && r.file.path === 'pkg/broken.json'));
  });

  it('fills a collector it is given', () => {
    const diagnostics = new DiagnosticCollector();

    const generator = compileBatch([unitFromJson('bad.json', '[]')], {
      backends: ['ir'],
      package: makePackage('pkg'),
      diagnostics,
    });
    let step = generator.next();
    while (!step.done) step = generator.next();

    assert.strictEqual(step.value, diagnostics);
    assert.strictEqual(diagnostics.getByInput('bad.json').length, 1);
  });
});
