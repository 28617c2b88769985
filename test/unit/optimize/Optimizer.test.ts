/**
 * Optimizer Tests
 *
 * Each pass is checked twice: for the shape it produces, and for rendering
 * the same command line before and after (values translated to the new tree).
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  App,
  FlattenSingleParamStructsPass,
  FoldConstantOptionalStructsPass,
  MergeStringTokensPass,
  Optimizer,
  TruthyChoicesPass,
  appToJson,
  boolBody,
  carg,
  createParam,
  emptyDocs,
  group,
  intBody,
  joinedCarg,
  joinedGroup,
  optimize,
  renderCommandLine,
  silentLogger,
  stringBody,
  structBody,
  truthyPair,
  type ParamValue,
  type ParamValues,
} from '@styx/core';
import { SET_TO_NONE, type CmdArg, type ParamBody, type Param, type StructBody } from '@styx/types';
import { makeApp, toolApp } from '../../helpers/fixtures.js';

function tokenAt(app: App, groupIndex: number, cargIndex = 0, tokenIndex = 0): Param {
  const token = app.command.body.groups[groupIndex]?.cargs[cargIndex]?.tokens[tokenIndex];
  assert.ok(token !== undefined && typeof token !== 'string', 'expected a param token');
  return token;
}

function assertSameLine(
  before: Param<StructBody>,
  after: Param<StructBody>,
  cases: Array<[ParamValues, ParamValues]>
): void {
  for (const [oldValues, newValues] of cases) {
    assert.deepStrictEqual(renderCommandLine(after, newValues), renderCommandLine(before, oldValues));
  }
}

/**
 * Candidate counts before the first rewrite and after each one.
 */
function candidateCounts(
  pass: FoldConstantOptionalStructsPass | FlattenSingleParamStructsPass,
  app: App
): number[] {
  const context = { logger: silentLogger() };
  const counts = [pass.countCandidates(app)];
  while (pass.step(app, context)) counts.push(pass.countCandidates(app));
  return counts;
}

const BOTH = [false, true];

/**
 * `combo [-verbose?] [S{--y Y}] [--mode MODE(yes|no)]`
 */
function comboApp(): App {
  const verbose = createParam({
    id: 2,
    name: 'verbose',
    body: structBody('verbose', [group(carg('--verbose'))]),
    nullable: true,
  });
  const y = createParam({ id: 4, name: 'y', body: stringBody(), docs: { title: 'Inner' } });
  const s = createParam({
    id: 3,
    name: 's',
    body: structBody('s', [group(carg('--y'), carg(y))]),
    docs: { title: 'Outer' },
  });
  const mode = createParam({
    id: 5,
    name: 'mode',
    body: stringBody(),
    choices: ['yes', 'no'],
    defaultValue: 'no',
  });
  const root = createParam({
    id: 1,
    name: 'combo',
    body: structBody('combo', [
      group(carg('combo')),
      group(carg(verbose)),
      group(carg(s)),
      group(carg('--mode'), carg(mode)),
    ]),
  });
  return makeApp(root);
}

type FoldNeighbour = 'none' | 'literal' | 'string' | 'list';

interface FoldShape {
  neighbour: FoldNeighbour;
  neighbourFirst: boolean;
  /** The flag shares its CmdArg with a literal */
  shared: boolean;
  /** The flag renders two arguments */
  twoTokens: boolean;
  joined: boolean;
}

function foldShapes(): FoldShape[] {
  const neighbours: FoldNeighbour[] = ['none', 'literal', 'string', 'list'];
  return neighbours.flatMap(neighbour =>
    BOTH.flatMap(neighbourFirst =>
      BOTH.flatMap(shared =>
        BOTH.flatMap(twoTokens => BOTH.map(joined => ({ neighbour, neighbourFirst, shared, twoTokens, joined })))
      )
    )
  );
}

/**
 * `r [<neighbour> <flag>]` with flag a parameter-free optional struct.
 */
function foldTree(shape: FoldShape): Param<StructBody> {
  const flag = createParam({
    id: 2,
    name: 'flag',
    body: structBody('flag', shape.twoTokens ? [group(carg('--f'), carg('1'))] : [group(carg('--f'))]),
    nullable: true,
  });
  const x = createParam({ id: 3, name: 'x', body: stringBody(), nullable: true });
  const xs = createParam({ id: 4, name: 'xs', body: stringBody(), list: {}, nullable: true });
  const neighbours: Record<FoldNeighbour, CmdArg[]> = {
    none: [],
    literal: [carg('-l')],
    string: [carg('-x', x)],
    list: [carg(xs)],
  };
  const own = shape.shared ? carg('--o', flag) : carg(flag);
  const others = neighbours[shape.neighbour];
  const cargs = shape.neighbourFirst ? [...others, own] : [own, ...others];
  return createParam({
    id: 1,
    name: 'r',
    body: structBody('r', [group(carg('r')), shape.joined ? joinedGroup('=', ...cargs) : group(...cargs)]),
  });
}

function foldAssignments(shape: FoldShape, folded: boolean): Array<[ParamValues, ParamValues]> {
  const neighbourValues: ParamValues[] =
    shape.neighbour === 'string' ? [{}, { x: 'v' }] : shape.neighbour === 'list' ? [{}, { xs: ['a', 'b'] }] : [{}];
  return neighbourValues.flatMap((values): Array<[ParamValues, ParamValues]> => [
    [values, values],
    [{ ...values, flag: {} }, { ...values, flag: folded ? true : {} }],
  ]);
}

type ChildKind = 'string' | 'int' | 'flag' | 'switch';

interface FlattenShape {
  child: ChildKind;
  structNullable: boolean;
  childNullable: boolean;
  /** A literal precedes the child inside the struct */
  innerLiteral: boolean;
  /** A literal CmdArg precedes the struct in its group */
  groupLiteral: boolean;
  groupJoined: boolean;
  parentJoined: boolean;
}

function childBody(kind: ChildKind): ParamBody {
  switch (kind) {
    case 'string':
      return stringBody();
    case 'int':
      return intBody();
    case 'flag':
      return boolBody(['-c']);
    case 'switch':
      return boolBody(['on'], ['off']);
  }
}

function flattenShapes(): FlattenShape[] {
  const kinds: ChildKind[] = ['string', 'int', 'flag', 'switch'];
  return kinds.flatMap(child =>
    BOTH.flatMap(structNullable =>
      BOTH.flatMap(childNullable =>
        BOTH.flatMap(innerLiteral =>
          BOTH.flatMap(groupLiteral =>
            BOTH.flatMap(groupJoined =>
              BOTH.map(parentJoined => ({
                child,
                structNullable,
                childNullable,
                innerLiteral,
                groupLiteral,
                groupJoined,
                parentJoined,
              }))
            )
          )
        )
      )
    )
  );
}

/**
 * `r [-s?] [S{--c? C}] [-z Z?]` with the group and the root optionally joined.
 */
function flattenTree(shape: FlattenShape): Param<StructBody> {
  const c = createParam({ id: 3, name: 'c', body: childBody(shape.child), nullable: shape.childNullable });
  const s = createParam({
    id: 2,
    name: 's',
    body: structBody('s', [group(shape.innerLiteral ? carg('--c', c) : carg(c))]),
    nullable: shape.structNullable,
  });
  const z = createParam({ id: 4, name: 'z', body: stringBody(), nullable: true });
  const cargs = shape.groupLiteral ? [carg('-s'), carg(s)] : [carg(s)];
  return createParam({
    id: 1,
    name: 'r',
    body: structBody(
      'r',
      [group(carg('r')), shape.groupJoined ? joinedGroup('=', ...cargs) : group(...cargs), group(carg('-z', z))],
      shape.parentJoined ? { join: ',' } : {}
    ),
  });
}

function flattenAssignments(shape: FlattenShape, flattened: boolean): Array<[ParamValues, ParamValues]> {
  const present: ParamValue[] = shape.child === 'string' ? ['v'] : shape.child === 'int' ? [3] : [true, false];
  const childValues = shape.childNullable ? [...present, null] : present;
  const extras: ParamValues[] = [{}, { z: 'w' }];
  return extras.flatMap(extra => {
    const pairs: Array<[ParamValues, ParamValues]> = [];
    if (shape.structNullable) pairs.push([extra, extra]);
    for (const c of childValues) {
      pairs.push([{ ...extra, s: { c } }, flattened ? { ...extra, c } : { ...extra, s: { c } }]);
    }
    return pairs;
  });
}

describe('MergeStringTokensPass', () => {
  it('merges neighbouring literals', () => {
    const x = createParam({ id: 2, name: 'x', body: stringBody() });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg('--out', '=', x))]) }));
    const before = structuredClone(app.command);

    const [report] = new Optimizer([new MergeStringTokensPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'MergeStringTokens', changes: 1 });
    assert.strictEqual(app.command.body.groups[0]?.cargs[0]?.tokens.length, 2);
    assert.strictEqual(app.command.body.groups[0]?.cargs[0]?.tokens[0], '--out=');
    assertSameLine(before, app.command, [[{ x: 'f' }, { x: 'f' }]]);
  });

  it('keeps literals of a joined CmdArg apart', () => {
    const app = makeApp(
      createParam({ id: 1, name: 'r', body: structBody('r', [group(joinedCarg(',', 'a', 'b'))]) })
    );

    const [report] = new Optimizer([new MergeStringTokensPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'MergeStringTokens', changes: 0 });
    assert.deepStrictEqual(app.command.body.groups[0]?.cargs[0]?.tokens, ['a', 'b']);
  });
});

describe('FoldConstantOptionalStructsPass', () => {
  it('turns a parameter-free optional struct into a flag', () => {
    const app = comboApp();
    const before = structuredClone(app.command);

    new Optimizer([new FoldConstantOptionalStructsPass()]).run(app);

    const verbose = tokenAt(app, 1);
    assert.deepStrictEqual(verbose.body, { kind: 'bool', valueTrue: ['--verbose'], valueFalse: [] });
    assert.strictEqual(verbose.nullable, false);
    assert.strictEqual(verbose.defaultValue, false);
    assertSameLine(before, app.command, [
      [{ s: { y: 'v' }, verbose: {} }, { s: { y: 'v' }, verbose: true }],
      [{ s: { y: 'v' } }, { s: { y: 'v' } }],
    ]);
  });

  it('moves the flag into a group of its own', () => {
    const xs = createParam({ id: 2, name: 'xs', body: stringBody(), list: {}, nullable: true });
    const flag = createParam({
      id: 3,
      name: 'flag',
      body: structBody('flag', [group(carg('--f'))]),
      nullable: true,
    });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(xs), carg(flag))]) }));
    const before = structuredClone(app.command);

    new Optimizer([new FoldConstantOptionalStructsPass()]).run(app);

    assert.strictEqual(app.command.body.groups.length, 2);
    assert.strictEqual(tokenAt(app, 0).base.name, 'xs');
    assert.strictEqual(tokenAt(app, 1).base.name, 'flag');
    assertSameLine(before, app.command, [
      [{ xs: ['a', 'b'], flag: {} }, { xs: ['a', 'b'], flag: true }],
      [{ flag: {} }, { flag: true }],
      [{ xs: ['a'] }, { xs: ['a'] }],
      [{}, {}],
    ]);
  });

  it('keeps a one-token struct whose absence would leave an empty argument', () => {
    const x = createParam({ id: 2, name: 'x', body: stringBody(), nullable: true });
    const flag = createParam({
      id: 3,
      name: 'flag',
      body: structBody('flag', [group(carg('--f'))]),
      nullable: true,
    });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg('-x', x), carg(flag))]) }));

    const [report] = new Optimizer([new FoldConstantOptionalStructsPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'FoldConstantOptionalStructs', changes: 0 });
    assert.strictEqual(tokenAt(app, 0, 1).body.kind, 'struct');
    assert.deepStrictEqual(renderCommandLine(app.command, { x: 'v' }), ['-xv']);
    assert.deepStrictEqual(renderCommandLine(app.command, { flag: {} }), ['-x', '--f']);
  });

  it('keeps the command line for every placement of a flag', () => {
    let folded = 0;
    for (const shape of foldShapes()) {
      const before = foldTree(shape);
      const app = makeApp(foldTree(shape));

      const [report] = new Optimizer([new FoldConstantOptionalStructsPass()]).run(app);

      const changed = report?.changes === 1;
      if (changed) folded++;
      for (const [oldValues, newValues] of foldAssignments(shape, changed)) {
        assert.deepStrictEqual(
          renderCommandLine(app.command, newValues),
          renderCommandLine(before, oldValues),
          JSON.stringify({ shape, oldValues })
        );
      }
    }
    assert.strictEqual(folded, 58);
  });

  it('has one candidate fewer after every fold', () => {
    const flag = (id: number, name: string) =>
      createParam({ id, name, body: structBody(name, [group(carg(`--${name}`))]), nullable: true });
    const xs = createParam({ id: 5, name: 'xs', body: stringBody(), list: {}, nullable: true });
    const app = makeApp(
      createParam({
        id: 1,
        name: 'r',
        body: structBody('r', [
          group(carg('r')),
          group(carg(flag(2, 'a'))),
          group(carg(xs), carg(flag(3, 'b'))),
          group(carg('--o', flag(4, 'c'))),
        ]),
      })
    );

    assert.deepStrictEqual(candidateCounts(new FoldConstantOptionalStructsPass(), app), [3, 2, 1, 0]);
  });

  it('leaves a struct that renders nothing alone', () => {
    const empty = createParam({ id: 2, name: 'empty', body: structBody('empty', []), nullable: true });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(empty))]) }));

    const [report] = new Optimizer([new FoldConstantOptionalStructsPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'FoldConstantOptionalStructs', changes: 0 });
    assert.strictEqual(tokenAt(app, 0).body.kind, 'struct');
  });
});

describe('FlattenSingleParamStructsPass', () => {
  it('inlines a struct wrapping one param and merges docs', () => {
    const app = comboApp();
    const before = structuredClone(app.command);

    new Optimizer([new FlattenSingleParamStructsPass()]).run(app);

    const cargs = app.command.body.groups[2]?.cargs ?? [];
    assert.strictEqual(cargs.length, 2);
    assert.deepStrictEqual(cargs[0]?.tokens, ['--y']);
    const y = tokenAt(app, 2, 1);
    assert.strictEqual(y.base.name, 'y');
    assert.strictEqual(y.base.docs.title, 'Outer: Inner');
    assert.strictEqual(app.parentOf(y), app.command);
    assertSameLine(before, app.command, [[{ s: { y: 'v' } }, { y: 'v' }]]);
  });

  it('makes the child optional when the struct was', () => {
    const y = createParam({ id: 3, name: 'y', body: stringBody() });
    const s = createParam({ id: 2, name: 's', body: structBody('s', [group(carg('--y'), carg(y))]), nullable: true });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg('r')), group(carg(s))]) }));
    const before = structuredClone(app.command);

    new Optimizer([new FlattenSingleParamStructsPass()]).run(app);

    assert.strictEqual(y.nullable, true);
    assert.strictEqual(y.defaultValue, SET_TO_NONE);
    assertSameLine(before, app.command, [
      [{}, {}],
      [{ s: { y: 'v' } }, { y: 'v' }],
    ]);
  });

  it('flattens nested wrappers down to the leaf', () => {
    const y = createParam({ id: 5, name: 'y', body: stringBody() });
    const s3 = createParam({ id: 4, name: 's3', body: structBody('s3', [group(carg(y))]) });
    const s2 = createParam({ id: 3, name: 's2', body: structBody('s2', [group(carg(s3))]) });
    const s1 = createParam({ id: 2, name: 's1', body: structBody('s1', [group(carg(s2))]) });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg('r')), group(carg(s1))]) }));
    const before = structuredClone(app.command);

    const [report] = new Optimizer([new FlattenSingleParamStructsPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'FlattenSingleParamStructs', changes: 3 });
    assert.strictEqual(tokenAt(app, 1), y);
    assertSameLine(before, app.command, [[{ s1: { s2: { s3: { y: 'v' } } } }, { y: 'v' }]]);
  });

  it('keeps a nullable struct around a nullable child', () => {
    const y = createParam({ id: 3, name: 'y', body: stringBody(), nullable: true });
    const s = createParam({ id: 2, name: 's', body: structBody('s', [group(carg(y))]), nullable: true });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(s))]) }));

    assert.strictEqual(new FlattenSingleParamStructsPass().countCandidates(app), 0);
  });

  it('keeps a struct whose child would clash with a sibling name', () => {
    const inner = createParam({ id: 3, name: 'y', body: stringBody() });
    const s = createParam({ id: 2, name: 's', body: structBody('s', [group(carg(inner))]) });
    const sibling = createParam({ id: 4, name: 'y', body: stringBody() });
    const app = makeApp(
      createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(s)), group(carg(sibling))]) })
    );

    assert.strictEqual(new FlattenSingleParamStructsPass().countCandidates(app), 0);
  });

  it('keeps a list struct', () => {
    const y = createParam({ id: 3, name: 'y', body: stringBody() });
    const s = createParam({ id: 2, name: 's', body: structBody('s', [group(carg(y))]), list: {} });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(s))]) }));

    assert.strictEqual(new FlattenSingleParamStructsPass().countCandidates(app), 0);
  });

  it('keeps a struct whose child may vanish inside a joined group', () => {
    const c = createParam({ id: 3, name: 'c', body: stringBody(), nullable: true });
    const s = createParam({ id: 2, name: 's', body: structBody('s', [group(carg('--s', c))]) });
    const app = makeApp(
      createParam({ id: 1, name: 'r', body: structBody('r', [group(carg('r')), joinedGroup('=', carg(s))]) })
    );

    assert.deepStrictEqual(renderCommandLine(app.command, { s: {} }), ['r', '']);
    assert.strictEqual(new FlattenSingleParamStructsPass().countCandidates(app), 0);
  });

  it('keeps the command line for every shape around a wrapped param', () => {
    let flattened = 0;
    for (const shape of flattenShapes()) {
      const before = flattenTree(shape);
      const app = makeApp(flattenTree(shape));

      const [report] = new Optimizer([new FlattenSingleParamStructsPass()]).run(app);

      const changed = report?.changes === 1;
      if (changed) flattened++;
      for (const [oldValues, newValues] of flattenAssignments(shape, changed)) {
        assert.deepStrictEqual(
          renderCommandLine(app.command, newValues),
          renderCommandLine(before, oldValues),
          JSON.stringify({ shape, oldValues })
        );
      }
    }
    assert.strictEqual(flattened, 108);
  });

  it('has one candidate fewer after every flatten', () => {
    const y = createParam({ id: 5, name: 'y', body: stringBody() });
    const s3 = createParam({ id: 4, name: 's3', body: structBody('s3', [group(carg(y))]) });
    const s2 = createParam({ id: 3, name: 's2', body: structBody('s2', [group(carg(s3))]) });
    const s1 = createParam({ id: 2, name: 's1', body: structBody('s1', [group(carg(s2))]) });
    const z = createParam({ id: 7, name: 'z', body: stringBody() });
    const s4 = createParam({ id: 6, name: 's4', body: structBody('s4', [group(carg('--z'), carg(z))]) });
    const app = makeApp(
      createParam({
        id: 1,
        name: 'r',
        body: structBody('r', [group(carg('r')), group(carg(s1)), group(carg(s4))]),
      })
    );

    assert.deepStrictEqual(candidateCounts(new FlattenSingleParamStructsPass(), app), [4, 3, 2, 1, 0]);
  });
});

describe('TruthyChoicesPass', () => {
  it('turns yes/no choices into a bool', () => {
    const app = comboApp();
    const before = structuredClone(app.command);

    new Optimizer([new TruthyChoicesPass()]).run(app);

    const mode = tokenAt(app, 3, 1);
    assert.deepStrictEqual(mode.body, { kind: 'bool', valueTrue: ['yes'], valueFalse: ['no'] });
    assert.strictEqual(mode.choices, undefined);
    assert.strictEqual(mode.defaultValue, false);
    assertSameLine(before, app.command, [
      [{ s: { y: 'v' }, mode: 'yes' }, { s: { y: 'v' }, mode: true }],
      [{ s: { y: 'v' } }, { s: { y: 'v' } }],
    ]);
  });

  it('recognises pairs in either order and case', () => {
    assert.deepStrictEqual(truthyPair(['No', 'Yes']), ['Yes', 'No']);
    assert.deepStrictEqual(truthyPair([0, 1]), ['1', '0']);
    assert.deepStrictEqual(truthyPair(['on', 'off']), ['on', 'off']);
    assert.strictEqual(truthyPair(['fast', 'slow']), undefined);
    assert.strictEqual(truthyPair(['yes', 'no', 'maybe']), undefined);
  });

  it('converts int choices on their text', () => {
    const flag = createParam({ id: 2, name: 'flag', body: intBody(), choices: [0, 1], defaultValue: 1 });
    const app = makeApp(createParam({ id: 1, name: 'r', body: structBody('r', [group(carg(flag))]) }));

    new Optimizer([new TruthyChoicesPass()]).run(app);

    assert.deepStrictEqual(flag.body, { kind: 'bool', valueTrue: ['1'], valueFalse: ['0'] });
    assert.strictEqual(flag.defaultValue, true);
  });

  it('keeps choices that an output refers to', () => {
    const answer = createParam({ id: 2, name: 'answer', body: stringBody(), choices: ['yes', 'no'] });
    const root = createParam({
      id: 1,
      name: 'r',
      body: structBody('r', [group(carg(answer))]),
      outputs: [
        { id: 3, name: 'o', tokens: [{ refId: 2, fileRemoveSuffixes: [] }, '.txt'], docs: emptyDocs(), mediaTypes: [] },
      ],
    });
    const app = makeApp(root);

    const [report] = new Optimizer([new TruthyChoicesPass()]).run(app);

    assert.deepStrictEqual(report, { pass: 'TruthyChoices', changes: 0 });
    assert.deepStrictEqual(answer.choices, ['yes', 'no']);
  });
});

describe('Optimizer', () => {
  it('runs the passes in order and reports each', () => {
    const app = comboApp();

    const reports = new Optimizer().run(app);

    assert.deepStrictEqual(reports, [
      { pass: 'MergeStringTokens', changes: 0 },
      { pass: 'FoldConstantOptionalStructs', changes: 1 },
      { pass: 'FlattenSingleParamStructs', changes: 1 },
      { pass: 'TruthyChoices', changes: 1 },
    ]);
  });

  it('keeps the command line of every pass combined', () => {
    const app = comboApp();
    const before = structuredClone(app.command);

    optimize(app);

    assertSameLine(before, app.command, [
      [{ verbose: {}, s: { y: 'a' }, mode: 'yes' }, { verbose: true, y: 'a', mode: true }],
      [{ s: { y: 'a' } }, { y: 'a' }],
      [{ s: { y: 'a' }, mode: 'no' }, { y: 'a', mode: false }],
    ]);
  });

  it('changes nothing on a second run', () => {
    const app = comboApp();
    optimize(app);
    const once = appToJson(app);

    const reports = new Optimizer().run(app);

    assert.ok(reports.every(r => r.changes === 0));
    assert.strictEqual(appToJson(app), once);
  });

  it('leaves an already minimal tree unchanged', () => {
    const app = toolApp();
    const before = appToJson(app);

    optimize(app);

    assert.strictEqual(appToJson(app), before);
  });
});
