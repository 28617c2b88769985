/**
 * compileApp - generic code generation for one App
 *
 * Walks the optimized, set-up IR bottom-up and fills a GenericModule through
 * the LanguageProvider only:
 *
 *   per struct:  params type, build-params, validate?, build-cargs,
 *                outputs structure + build-outputs (root or has outputs),
 *                execute (root only)
 *   per union:   dispatch functions by "@type"
 *   per App:     metadata constant, root wrapper (build-params + execute)
 */

import type {
  GenericArg,
  GenericFunc,
  GenericModule,
  GenericStructure,
  LineBuffer,
  MStr,
  Output,
  Package,
  Param,
  StructBody,
} from '@styx/types';
import { CodegenError } from '../errors/StyxError.js';
import type { App } from '../ir/App.js';
import { isParamToken, isOutputReference, isStruct, isStructUnion } from '../ir/guards.js';
import { hasOutputsDeep, iterOutputChildren, iterParamsShallow, iterUnionsDeep, ownOutputs } from '../ir/traverse.js';
import { compileValidate } from './compileValidate.js';
import type { Expr, LanguageProvider } from './LanguageProvider.js';
import { blankBefore, docsToDocstring } from './lineBuffer.js';
import { generateStaticMetadata } from './metadata.js';
import { defaultValueExpr, paramValueExpr } from './paramValues.js';
import type { Scope } from './Scope.js';
import { SymbolLUT } from './SymbolLUT.js';

const PARAMS = 'params';
const CARGS = 'cargs';
const RET = 'ret';

export function emptyModule(): GenericModule {
  return { imports: [], header: [], definitions: [], footer: [], exports: [] };
}

/**
 * Arguments of a struct's build-params function: one per child, required
 * ones first (declaration order is kept within each half).
 */
export function paramArgs(lang: LanguageProvider, lut: SymbolLUT, struct: Param<StructBody>): GenericArg[] {
  const args = [...iterParamsShallow(struct)].map((child): GenericArg => {
    const arg: GenericArg = {
      name: lut.varParam.get(child.base.id),
      type: lut.typeParam.get(child.base.id),
    };
    const fallback = lang.paramDefaultValue(child);
    if (fallback !== undefined) arg.default = fallback;
    if (child.base.docs.description) arg.docstring = child.base.docs.description;
    return arg;
  });
  return [...args.filter(a => a.default === undefined), ...args.filter(a => a.default !== undefined)];
}

function compileBuildParams(lang: LanguageProvider, struct: Param<StructBody>, lut: SymbolLUT): GenericFunc {
  const body: LineBuffer = [];
  const children = [...iterParamsShallow(struct)];
  const eager = children.filter(p => !p.nullable).map((p): [Param, Expr] => [p, lut.varParam.get(p.base.id)]);
  body.push(...lang.paramDictCreate(lut, PARAMS, struct, eager));

  for (const child of children) {
    if (!child.nullable) continue;
    const symbol = lut.varParam.get(child.base.id);
    body.push(...lang.ifElse(lang.exprIsNotNull(symbol), lang.paramDictSet(PARAMS, child, symbol)));
  }
  body.push(lang.returnStatement(PARAMS));

  return {
    name: lut.fnStructMakeParams.get(struct.base.id),
    docstringBody: 'Build parameters.',
    returnType: lut.typeStructParamsTagged.get(struct.base.id),
    returnDescr: 'Parameter dictionary',
    args: paramArgs(lang, lut, struct),
    body,
  };
}

interface CargExprs {
  /** Every referenced param assumed set */
  assumeSet: MStr[];
  /** Absent optional params replaced by an empty placeholder */
  maybeNull: MStr[];
  /** "Is set" conditions of the params in this CmdArg */
  conditions: Expr[];
}

function compileBuildCargs(lang: LanguageProvider, struct: Param<StructBody>, lut: SymbolLUT): GenericFunc {
  const body: LineBuffer = [...lang.cargsDeclare(CARGS)];
  const structJoin = struct.body.join;

  for (const group of struct.body.groups) {
    const cargs = group.cargs.map((carg): CargExprs => {
      const exprs: CargExprs = { assumeSet: [], maybeNull: [], conditions: [] };
      for (const token of carg.tokens) {
        if (!isParamToken(token)) {
          const literal: MStr = { expr: lang.exprStr(token), isList: false };
          exprs.assumeSet.push(literal);
          exprs.maybeNull.push(literal);
          continue;
        }
        const value = paramValueExpr(lang, PARAMS, token);
        const mstr = lang.paramVarToMStr(lut, token, value);
        exprs.assumeSet.push(mstr);
        const condition = lang.paramVarIsSetByUser(token, value);
        if (condition === undefined) {
          exprs.maybeNull.push(mstr);
        } else {
          exprs.conditions.push(condition);
          exprs.maybeNull.push({
            expr: lang.exprTernary(condition, mstr.expr, lang.mstrEmptyLiteralLike(mstr)),
            isList: mstr.isList,
          });
        }
      }
      return exprs;
    });

    const conditions = cargs.flatMap(c => c.conditions);
    const guarded = conditions.length > 1;

    let values: MStr[] = [];
    group.cargs.forEach((carg, i) => {
      const exprs = cargs[i];
      if (exprs === undefined) return;
      const pieces = guarded ? exprs.maybeNull : exprs.assumeSet;
      const first = pieces[0];
      if (first === undefined) return;
      values.push(pieces.length === 1 ? first : lang.mstrConcat(pieces, carg.join ?? ''));
    });

    const join = group.join ?? (structJoin !== undefined ? '' : undefined);
    if (join !== undefined) values = [lang.mstrJoin(values, join)];
    if (values.length === 0) continue;

    const append = lang.cargsAdd(CARGS, values);
    body.push(...(conditions.length > 0 ? lang.ifElse(lang.exprOr(conditions), append) : append));
  }

  if (structJoin !== undefined) body.push(...lang.cargsCollapse(CARGS, structJoin));
  body.push(lang.returnStatement(CARGS));

  return {
    name: lut.fnStructMakeCargs.get(struct.base.id),
    docstringBody: 'Build command-line arguments from parameters.',
    returnType: lang.typeStringList(),
    returnDescr: 'Command-line arguments.',
    args: [
      { name: PARAMS, type: lut.typeStructParams.get(struct.base.id), docstring: 'The parameters.' },
      {
        name: lang.symbolExecution(),
        type: lang.typeExecution(),
        docstring: 'The execution object for resolving input paths.',
      },
    ],
    body,
  };
}

/**
 * The param an output token refers to; it must be a child of `struct`.
 */
function referencedParam(struct: Param<StructBody>, lut: SymbolLUT, output: Output, refId: number): Param {
  const param = lut.paramById.has(refId) ? lut.paramById.get(refId) : undefined;
  if (param === undefined || ![...iterParamsShallow(struct)].includes(param)) {
    throw new CodegenError(
      `Output "${output.name}" references id ${refId}, which is not a param of "${struct.base.name}"`,
      'ERR_OUTPUT_REFERENCE',
      { paramId: refId, paramName: struct.base.name }
    );
  }
  return param;
}

function outputIsOptional(struct: Param<StructBody>, lut: SymbolLUT, output: Output): boolean {
  return output.tokens.some(
    token =>
      isOutputReference(token) &&
      token.fallback === undefined &&
      referencedParam(struct, lut, output, token.refId).nullable
  );
}

/**
 * Type of the outputs field for a nested struct or union child.
 */
function childOutputsType(lang: LanguageProvider, lut: SymbolLUT, child: Param): string {
  let type: string;
  if (isStructUnion(child)) {
    const alts = child.body.alts.filter(alt => hasOutputsDeep(alt));
    type = lang.typeUnion(alts.map(alt => lut.typeStructOutputs.get(alt.base.id)));
    if (alts.length < child.body.alts.length) type = lang.typeOptional(type);
  } else {
    type = lut.typeStructOutputs.get(child.base.id);
  }
  if (child.list) type = lang.typeList(type);
  if (child.nullable) type = lang.typeOptional(type);
  return type;
}

function compileOutputsStructure(
  lang: LanguageProvider,
  struct: Param<StructBody>,
  lut: SymbolLUT,
  app: App,
  isRoot: boolean
): GenericStructure {
  const fields: GenericArg[] = [
    {
      name: 'root',
      type: lang.typeOutputPath(),
      docstring: 'Output root folder. This is the root folder for all outputs.',
    },
  ];

  if (isRoot) {
    for (const stream of [app.captureStdout, app.captureStderr]) {
      if (stream === undefined) continue;
      fields.push({
        name: lut.varOutput.get(stream.id),
        type: lang.typeStringList(),
        docstring: stream.docs.description ?? `Captured ${stream.name} lines.`,
      });
    }
  }

  for (const output of ownOutputs(struct)) {
    const type = lang.typeOutputPath();
    fields.push({
      name: lut.varOutput.get(output.id),
      type: outputIsOptional(struct, lut, output) ? lang.typeOptional(type) : type,
      docstring: output.docs.description ?? output.docs.title ?? output.name,
    });
  }

  for (const child of iterOutputChildren(struct)) {
    const listNote = child.list ? ' This is a list of outputs with the same length and order as the inputs.' : '';
    fields.push({
      name: lut.varOutput.get(child.base.id),
      type: childOutputsType(lang, lut, child),
      docstring: `Outputs from \`${child.base.name}\`.${listNote}`,
    });
  }

  return {
    name: lut.typeStructOutputs.get(struct.base.id),
    docstring: `Output object returned when calling \`${
      isRoot ? lut.fnStructExecute.get(struct.base.id) : lut.fnStructMakeOutputs.get(struct.base.id)
    }(...)\`.`,
    fields,
  };
}

function outputReferenceExpr(lang: LanguageProvider, param: Param, value: Expr, suffixes: string[]): Expr {
  if (param.list !== undefined) {
    throw new CodegenError(
      `Output path templates cannot reference list param "${param.base.name}"`,
      'ERR_OUTPUT_REFERENCE',
      { paramId: param.base.id, paramName: param.base.name }
    );
  }
  switch (param.body.kind) {
    case 'string':
      return lang.exprRemoveSuffixes(value, suffixes);
    case 'int':
    case 'float':
      return lang.exprNumericToStr(value);
    case 'file':
      return lang.exprRemoveSuffixes(lang.exprPathFilename(value), suffixes);
    default:
      throw new CodegenError(
        `Output path templates cannot reference ${param.body.kind} param "${param.base.name}"`,
        'ERR_OUTPUT_REFERENCE',
        { paramId: param.base.id, paramName: param.base.name }
      );
  }
}

function compileBuildOutputs(
  lang: LanguageProvider,
  struct: Param<StructBody>,
  lut: SymbolLUT,
  app: App,
  isRoot: boolean
): GenericFunc {
  const execution = lang.symbolExecution();
  const members: [string, Expr][] = [];

  if (isRoot) {
    for (const stream of [app.captureStdout, app.captureStderr]) {
      if (stream !== undefined) members.push([lut.varOutput.get(stream.id), lang.exprList([])]);
    }
  }

  for (const output of ownOutputs(struct)) {
    const segments: Expr[] = [];
    const conditions: Expr[] = [];
    for (const token of output.tokens) {
      if (!isOutputReference(token)) {
        segments.push(lang.exprStr(token));
        continue;
      }
      const param = referencedParam(struct, lut, output, token.refId);
      const fallback =
        token.fallback !== undefined ? lang.exprStr(token.fallback) : defaultValueExpr(lang, param.defaultValue);
      const value = lang.paramDictGetOrDefault(PARAMS, param, fallback);
      segments.push(outputReferenceExpr(lang, param, value, token.fileRemoveSuffixes));
      if (token.fallback === undefined && param.nullable) {
        conditions.push(lang.exprIsNotNull(lang.paramDictGetOrNull(PARAMS, param)));
      }
    }
    const path = lang.resolveOutputFile(execution, lang.exprConcatStrs(segments));
    members.push([
      lut.varOutput.get(output.id),
      conditions.length > 0 ? lang.exprTernary(lang.exprAnd(conditions), path, lang.exprNull()) : path,
    ]);
  }

  for (const child of iterOutputChildren(struct)) {
    if (!isStruct(child) && !isStructUnion(child)) continue;
    members.push([
      lut.varOutput.get(child.base.id),
      lang.structCollectOutputs(lut, child, lang.paramDictGetOrNull(PARAMS, child)),
    ]);
  }

  const outputsType = lut.typeStructOutputs.get(struct.base.id);
  return {
    name: lut.fnStructMakeOutputs.get(struct.base.id),
    docstringBody: 'Build outputs object containing output file paths and possibly stdout/stderr.',
    returnType: outputsType,
    returnDescr: 'Outputs object.',
    args: [
      { name: PARAMS, type: lut.typeStructParams.get(struct.base.id), docstring: 'The parameters.' },
      { name: execution, type: lang.typeExecution(), docstring: 'The execution object for resolving input paths.' },
    ],
    body: [...lang.retObjectCreation(execution, outputsType, members), lang.returnStatement(RET)],
  };
}

function runnerArg(lang: LanguageProvider): GenericArg {
  return {
    name: lang.symbolRunner(),
    type: lang.typeOptional(lang.typeRunner()),
    default: lang.exprNull(),
    docstring: 'Command runner',
  };
}

function compileExecute(lang: LanguageProvider, struct: Param<StructBody>, lut: SymbolLUT, app: App): GenericFunc {
  const runner = lang.symbolRunner();
  const execution = lang.symbolExecution();
  const outputsType = lut.typeStructOutputs.get(struct.base.id);
  const stdout = app.captureStdout ? lut.varOutput.get(app.captureStdout.id) : undefined;
  const stderr = app.captureStderr ? lut.varOutput.get(app.captureStderr.id) : undefined;

  const func: GenericFunc = {
    name: lut.fnStructExecute.get(struct.base.id),
    returnType: outputsType,
    returnDescr: `Outputs object (described in \`${outputsType}\`).`,
    args: [
      { name: PARAMS, type: lut.typeStructParams.get(struct.base.id), docstring: 'The parameters.' },
      runnerArg(lang),
    ],
    body: [
      ...(lang.doesValidate() ? lang.callValidate(lut, PARAMS) : []),
      ...lang.runnerDeclare(runner),
      ...lang.executionDeclare(execution, lut.objMetadata),
      ...lang.executionProcessParams(execution, PARAMS),
      ...lang.callBuildCargs(lut, struct, PARAMS, execution, CARGS),
      ...lang.callBuildOutputs(lut, struct, PARAMS, execution, RET),
      ...lang.executionRun(execution, CARGS, stdout, stderr),
      lang.returnStatement(RET),
    ],
  };
  const docstring = docsToDocstring(struct.base.docs);
  if (docstring !== undefined) func.docstringBody = docstring;
  return func;
}

function compileWrapperRoot(lang: LanguageProvider, struct: Param<StructBody>, lut: SymbolLUT): GenericFunc {
  const args = paramArgs(lang, lut, struct);
  const outputsType = lut.typeStructOutputs.get(struct.base.id);
  const func: GenericFunc = {
    name: lut.fnRootMakeParamsAndExecute,
    returnType: outputsType,
    returnDescr: `Outputs object (described in \`${outputsType}\`).`,
    args: [...args, runnerArg(lang)],
    body: lang.buildParamsAndExecute(
      lut,
      struct,
      args.map(a => a.name),
      lang.symbolRunner()
    ),
  };
  const docstring = docsToDocstring(struct.base.docs);
  if (docstring !== undefined) func.docstringBody = docstring;
  return func;
}

function compileStruct(
  lang: LanguageProvider,
  struct: Param<StructBody>,
  module: GenericModule,
  lut: SymbolLUT,
  app: App
): void {
  for (const child of iterParamsShallow(struct)) {
    if (isStruct(child)) {
      compileStruct(lang, child, module, lut, app);
    } else if (isStructUnion(child)) {
      for (const alt of child.body.alts) compileStruct(lang, alt, module, lut, app);
    }
  }

  const isRoot = struct === app.command;
  const withOutputs = isRoot || hasOutputsDeep(struct);

  if (withOutputs) {
    const structure = compileOutputsStructure(lang, struct, lut, app, isRoot);
    module.definitions.push({ kind: 'structure', structure });
    module.exports.push(structure.name);
  }

  const buildParams = compileBuildParams(lang, struct, lut);
  module.definitions.push({ kind: 'func', func: buildParams });
  module.exports.push(buildParams.name);

  module.header.push(...blankBefore(lang.paramDictTypeDeclare(lut, struct), 2));

  if (lang.doesValidate()) {
    module.definitions.push({ kind: 'func', func: compileValidate(lang, struct, lut) });
  }

  module.definitions.push({ kind: 'func', func: compileBuildCargs(lang, struct, lut) });

  if (withOutputs) {
    module.definitions.push({ kind: 'func', func: compileBuildOutputs(lang, struct, lut, app, isRoot) });
  }

  if (isRoot) {
    const execute = compileExecute(lang, struct, lut, app);
    module.definitions.push({ kind: 'func', func: execute });
    module.exports.push(execute.name);
  }
}

function compileDispatchTables(lang: LanguageProvider, app: App, lut: SymbolLUT, module: GenericModule): void {
  for (const union of iterUnionsDeep(app.command)) {
    for (const func of lang.dynDeclare(lut, union)) {
      module.definitions.push({ kind: 'func', func });
    }
  }
}

/**
 * Generate `app` into `module`. Sets the App up for `pkg` first and returns
 * the symbols it allocated in `packageScope`.
 */
export function compileApp(
  lang: LanguageProvider,
  pkg: Package,
  app: App,
  packageScope: Scope,
  module: GenericModule
): SymbolLUT {
  app.setup(pkg.name);
  const lut = SymbolLUT.create(lang, app, packageScope);

  module.imports.push(...lang.wrapperModuleImports());
  generateStaticMetadata(lang, module, lut, pkg, app);
  module.exports.push(lut.objMetadata);

  compileDispatchTables(lang, app, lut, module);
  compileStruct(lang, app.command, module, lut, app);

  const wrapper = compileWrapperRoot(lang, app.command, lut);
  module.definitions.push({ kind: 'func', func: wrapper });
  module.exports.push(wrapper.name);

  return lut;
}
