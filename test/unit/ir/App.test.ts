/**
 * App Tests
 *
 * - id uniqueness across params, outputs, streams
 * - setup() derives public names once
 * - parent index: parentOf, pathToRoot, fullPath, rootOf, relink
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  App,
  ContractError,
  IrError,
  carg,
  createParam,
  emptyDocs,
  group,
  stringBody,
  structBody,
} from '@styx/core';
import type { Param, StructBody } from '@styx/types';
import { dummyApp, makeApp, toolApp } from '../../helpers/fixtures.js';

function paramNamed(app: App, name: string): Param {
  const stack: Param[] = [app.command];
  while (stack.length > 0) {
    const p = stack.pop();
    if (p === undefined) break;
    if (p.base.name === name) return p;
    if (p.body.kind === 'struct') {
      for (const g of p.body.groups) for (const c of g.cargs) for (const t of c.tokens) if (typeof t !== 'string') stack.push(t);
    } else if (p.body.kind === 'struct_union') {
      stack.push(...p.body.alts);
    }
  }
  throw new Error(`no param ${name}`);
}

describe('App', () => {
  describe('construction', () => {
    it('should reject two params sharing an id', () => {
      const a = createParam({ id: 2, name: 'a', body: stringBody() });
      const b = createParam({ id: 2, name: 'b', body: stringBody() });
      const root = createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(a), carg(b))]) });

      assert.throws(() => makeApp(root), (error: unknown) => {
        assert.ok(error instanceof IrError);
        assert.strictEqual(error.code, 'ERR_IR_DUPLICATE_ID');
        assert.strictEqual(error.message, 'Id 2 is used by both param "a" and param "b"');
        return true;
      });
    });

    it('should reject an output sharing an id with a param', () => {
      const a = createParam({
        id: 2,
        name: 'a',
        body: stringBody(),
        outputs: [{ id: 1, name: 'o', tokens: ['x'], docs: emptyDocs(), mediaTypes: [] }],
      });
      const root = createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(a))]) });
      assert.throws(() => makeApp(root), { code: 'ERR_IR_DUPLICATE_ID' });
    });

    it('should reject a captured stream sharing an id', () => {
      const root = createParam({ id: 1, name: 'r', body: structBody('r', []) });
      assert.throws(
        () => makeApp(root, { captureStdout: { id: 1, name: 'stdout', docs: emptyDocs() } }),
        { code: 'ERR_IR_DUPLICATE_ID' }
      );
    });
  });

  describe('setup()', () => {
    it('should derive public names', () => {
      const app = toolApp();
      app.setup('pkg');

      assert.strictEqual(app.isSetUp, true);
      assert.strictEqual(app.command.body.publicName, 'pkg/tool');
      const fast = paramNamed(app, 'fast');
      assert.ok(fast.body.kind === 'struct');
      assert.strictEqual(fast.body.publicName, 'fast');
    });

    it('should ignore later calls', () => {
      const app = dummyApp();
      app.setup('first');
      app.setup('second');
      assert.strictEqual(app.command.body.publicName, 'first/dummy');
    });

    it('assertSetUp() should throw before setup', () => {
      const app = dummyApp();
      assert.throws(() => app.assertSetUp(), (error: unknown) => {
        assert.ok(error instanceof ContractError);
        assert.strictEqual(error.code, 'ERR_APP_NOT_SET_UP');
        return true;
      });
    });
  });

  describe('parent index', () => {
    it('should answer parentOf and isRoot', () => {
      const app = toolApp();
      const level = paramNamed(app, 'level');
      const fast = paramNamed(app, 'fast');
      const mode = paramNamed(app, 'mode');

      assert.strictEqual(app.parentOf(level), fast);
      assert.strictEqual(app.parentOf(fast), mode);
      assert.strictEqual(app.parentOf(mode), app.command);
      assert.strictEqual(app.parentOf(app.command), undefined);
      assert.strictEqual(app.isRoot(app.command), true);
      assert.strictEqual(app.isRoot(mode), false);
    });

    it('should build paths in both directions', () => {
      const app = toolApp();
      const level = paramNamed(app, 'level');

      assert.deepStrictEqual(app.pathToRoot(level).map(p => p.base.name), ['level', 'fast', 'mode', 'tool']);
      assert.deepStrictEqual(app.fullPath(level), ['tool', 'mode', 'fast', 'level']);
      assert.strictEqual(app.rootOf(level), app.command);
    });

    it('should fail for params added without relink, and find them after', () => {
      const app = dummyApp();
      const extra = createParam({ id: 9, name: 'extra', body: stringBody() });
      const body: StructBody = app.command.body;
      body.groups.push(group(carg(extra)));

      assert.throws(() => app.parentOf(extra), { code: 'ERR_PARENT_MISSING' });
      app.relink();
      assert.strictEqual(app.parentOf(extra), app.command);
    });
  });
});
