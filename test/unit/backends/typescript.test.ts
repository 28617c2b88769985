/**
 * TypeScript backend Tests
 *
 * Generated modules are transpiled to CommonJS and run against an in-process
 * stand-in of the styxdefs runtime that records the command line.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import ts from 'typescript';

import {
  TypeScriptLanguageProvider,
  carg,
  compileLanguage,
  createParam,
  group,
  renderCommandLine,
  stringBody,
  structBody,
  type App,
} from '@styx/core';
import { dummyApp, makeApp, makePackage, toolApp } from '../../helpers/fixtures.js';

class StyxValidationError extends Error {}

interface Recorded {
  cargs: string[][];
  metadata: unknown[];
}

function fakeRunner(recorded: Recorded) {
  return {
    startExecution(metadata: unknown) {
      recorded.metadata.push(metadata);
      return {
        params: (params: unknown) => params,
        inputFile: (file: string) => file,
        outputFile: (file: string) => `out/${file}`,
        run: (cargs: string[]) => {
          recorded.cargs.push(cargs);
        },
      };
    },
  };
}

function moduleSource(app: App): string {
  const lang = new TypeScriptLanguageProvider();
  for (const file of compileLanguage(lang, [{ package: makePackage('pkg'), apps: [app] }])) {
    if (file.appUid === app.uid) return file.content;
  }
  assert.fail(`no module for ${app.uid}`);
}

/**
 * Exports of the generated module for `app`.
 */
function load(app: App): Record<string, unknown> {
  const { outputText } = ts.transpileModule(moduleSource(app), {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2020 },
  });
  const exports: Record<string, unknown> = {};
  const runtime = {
    getGlobalRunner: () => assert.fail('no global runner in tests'),
    StyxValidationError,
  };
  const requireStub = (name: string): unknown => {
    assert.strictEqual(name, 'styxdefs');
    return runtime;
  };
  Reflect.apply(new Function('require', 'exports', outputText), undefined, [requireStub, exports]);
  return exports;
}

function call(exports: Record<string, unknown>, name: string, ...args: unknown[]): unknown {
  const fn = exports[name];
  assert.ok(typeof fn === 'function', `${name} is not exported`);
  return Reflect.apply(fn, undefined, args);
}

describe('TypeScript backend', () => {
  it('imports the runtime types', () => {
    const source = moduleSource(dummyApp());

    assert.ok(
      source.includes(
        'import type { Runner, Execution, Metadata, InputPathType, OutputPathType } from "styxdefs";\n' +
          'import { getGlobalRunner, StyxValidationError } from "styxdefs";\n'
      )
    );
  });

  it('exports functions from one trailing list', () => {
    const source = moduleSource(dummyApp());

    assert.ok(source.endsWith('export {\n    DUMMY_METADATA,\n    dummy,\n    dummyExecute,\n    dummyParams,\n};\n'));
  });

  it('runs the dummy command line', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    const ret = call(load(dummyApp()), 'dummy', 'v', fakeRunner(recorded));

    assert.deepStrictEqual(recorded.cargs, [['dummy', 'v']]);
    assert.deepStrictEqual(recorded.metadata, [{ id: 'dummy-uid', name: 'dummy', package: 'pkg' }]);
    assert.deepStrictEqual(ret, { root: 'out/.' });
  });

  it('renders optional and flag arguments', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    call(load(toolApp()), 'tool', 'a.nii', 'res', 3, true, null, fakeRunner(recorded));

    assert.deepStrictEqual(recorded.cargs, [['tool', 'a.nii', '-o', 'res', '-n3', '-v']]);
  });

  it('leaves unset optionals off the command line', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    call(load(toolApp()), 'tool', 'a.nii', null, null, false, null, fakeRunner(recorded));

    assert.deepStrictEqual(recorded.cargs, [['tool', 'a.nii']]);
  });

  it('resolves outputs named after a param', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    const ret = call(load(toolApp()), 'tool', 'a.nii', 'res', null, false, null, fakeRunner(recorded));

    assert.deepStrictEqual(ret, { root: 'out/.', result: 'out/res.nii.gz', mode: null });
  });

  it('dispatches union alternatives by their tag', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    call(load(toolApp()), 'tool', 'a.nii', null, null, false, { '@type': 'fast', level: 2 }, fakeRunner(recorded));

    assert.deepStrictEqual(recorded.cargs, [['tool', 'a.nii', 'fast', '2']]);
  });

  it('fills absent params of a guarded group with placeholders', () => {
    const a = createParam({ id: 2, name: 'a', body: stringBody(), nullable: true });
    const b = createParam({ id: 3, name: 'b', body: stringBody(), nullable: true });
    const app = makeApp(
      createParam({ id: 1, name: 'pair', body: structBody('pair', [group(carg('pair')), group(carg('-a', a), carg('-b', b))]) })
    );
    const recorded: Recorded = { cargs: [], metadata: [] };
    const exports = load(app);

    call(exports, 'pair', 'x', null, fakeRunner(recorded));
    call(exports, 'pair', null, null, fakeRunner(recorded));

    assert.deepStrictEqual(recorded.cargs, [['pair', '-ax', '-b'], ['pair']]);
    assert.deepStrictEqual(recorded.cargs[0], renderCommandLine(app.command, { a: 'x' }));
  });

  it('validates params before starting an execution', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };
    const exports = load(toolApp());

    assert.throws(
      () => call(exports, 'tool', 5, null, null, false, null, fakeRunner(recorded)),
      (error: unknown) =>
        error instanceof StyxValidationError &&
        error.message === 'Parameter `infile` has the wrong type, expected InputPathType'
    );
    assert.deepStrictEqual(recorded.metadata, []);
  });

  it('checks numeric ranges', () => {
    const recorded: Recorded = { cargs: [], metadata: [] };

    assert.throws(
      () => call(load(toolApp()), 'tool', 'a.nii', null, 11, false, null, fakeRunner(recorded)),
      (error: unknown) =>
        error instanceof StyxValidationError &&
        error.message === 'Parameter `n` must be between 1 and 10 (inclusive)'
    );
  });
});
