/**
 * PythonLanguageProvider - Python 3.10+ wrappers against the styxdefs runtime
 *
 * Params objects are TypedDicts (plain dicts at runtime), outputs are
 * NamedTuples, functions carry Google-style docstrings.
 */

import type {
  BackendId,
  GenericArg,
  GenericFunc,
  GenericModule,
  GenericStructure,
  LineBuffer,
  MStr,
  Param,
  StructBody,
  StructUnionBody,
} from '@styx/types';
import { hasOutputsDeep, iterParamsShallow } from '../../ir/traverse.js';
import { presenceRule } from '../../ir/presence.js';
import { rendersAsList } from '../../ir/render.js';
import type {
  CompareOp,
  Expr,
  LanguageProvider,
  LiteralValue,
  PackageIndexEntry,
  TypeCheckKind,
} from '../../codegen/LanguageProvider.js';
import {
  blankAfter,
  blankBefore,
  comment,
  enquote,
  ensureEndsWith,
  indent,
  linebreakParagraph,
} from '../../codegen/lineBuffer.js';
import { boolTokens } from '../../codegen/paramValues.js';
import { Scope } from '../../codegen/Scope.js';
import { pascalCase, screamingSnakeCase, snakeCase } from '../../codegen/stringCase.js';
import type { SymbolLUT } from '../../codegen/SymbolLUT.js';
import { allReservedWords, loadReservedWords } from '../reservedWords.js';

const LINE_WIDTH = 80;

function escapeBackslash(text: string): string {
  return text.replace(/\\/g, '\\\\');
}

function discriminator(struct: Param<StructBody>): string {
  return struct.body.publicName ?? struct.body.name;
}

export class PythonLanguageProvider implements LanguageProvider {
  readonly id: BackendId = 'python';

  // === TYPES ===

  typeStr(): string {
    return 'str';
  }

  typeInt(): string {
    return 'int';
  }

  typeFloat(): string {
    return 'float';
  }

  typeBool(): string {
    return 'bool';
  }

  typeInputPath(): string {
    return 'InputPathType';
  }

  typeOutputPath(): string {
    return 'OutputPathType';
  }

  typeRunner(): string {
    return 'Runner';
  }

  typeExecution(): string {
    return 'Execution';
  }

  typeLiteralUnion(values: readonly (string | number)[]): string {
    return `typing.Literal[${values.map(v => this.exprLiteral(v)).join(', ')}]`;
  }

  typeList(element: string): string {
    return `list[${element}]`;
  }

  typeOptional(element: string): string {
    return `${element} | None`;
  }

  typeUnion(elements: string[]): string {
    if (elements.length === 1) return elements[0] ?? 'typing.Any';
    return `typing.Union[${elements.join(', ')}]`;
  }

  typeStringList(): string {
    return 'list[str]';
  }

  typeAny(): string {
    return 'typing.Any';
  }

  // === SYMBOLS ===

  languageScope(): Scope {
    return Scope.withReserved(allReservedWords('python'));
  }

  symbolLegal(name: string): boolean {
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && !loadReservedWords('python').keywords.includes(name);
  }

  symbolFrom(name: string): string {
    const replaced = name.replace(/[^a-zA-Z0-9_]/g, '_');
    return /^[0-9_]/.test(replaced) || replaced.length === 0 ? `v_${replaced}` : replaced;
  }

  symbolVarCase(name: string): string {
    return this.symbolFrom(snakeCase(this.symbolFrom(name)));
  }

  symbolClassCase(name: string): string {
    return this.symbolFrom(pascalCase(this.symbolFrom(name)));
  }

  symbolConstantCase(name: string): string {
    return this.symbolFrom(screamingSnakeCase(this.symbolFrom(name)));
  }

  metadataSymbol(appName: string): string {
    return this.symbolConstantCase(`${appName}_METADATA`);
  }

  // === EXPRESSIONS ===

  exprLiteral(value: LiteralValue): Expr {
    if (value === null) return 'None';
    if (typeof value === 'boolean') return value ? 'True' : 'False';
    if (typeof value === 'number') return String(value);
    if (typeof value === 'string') return this.exprStr(value);
    if (Array.isArray(value)) return this.exprList(value.map(v => this.exprLiteral(v)));
    return this.exprDict(Object.entries(value).map(([k, v]): [Expr, Expr] => [this.exprStr(k), this.exprLiteral(v)]));
  }

  exprStr(value: string): Expr {
    return JSON.stringify(value);
  }

  exprNull(): Expr {
    return 'None';
  }

  exprList(items: Expr[]): Expr {
    return `[${items.join(', ')}]`;
  }

  exprDict(entries: [Expr, Expr][]): Expr {
    return `{${entries.map(([k, v]) => `${k}: ${v}`).join(', ')}}`;
  }

  exprTernary(condition: Expr, truthy: Expr, falsy: Expr): Expr {
    return `(${truthy} if ${condition} else ${falsy})`;
  }

  exprAnd(conditions: Expr[]): Expr {
    if (conditions.length === 0) return 'True';
    if (conditions.length === 1) return conditions[0] ?? 'True';
    return `(${conditions.join(' and ')})`;
  }

  exprOr(conditions: Expr[]): Expr {
    if (conditions.length === 0) return 'False';
    if (conditions.length === 1) return conditions[0] ?? 'False';
    return `(${conditions.join(' or ')})`;
  }

  exprNot(condition: Expr): Expr {
    return `not ${condition}`;
  }

  exprIsNull(value: Expr): Expr {
    return `${value} is None`;
  }

  exprIsNotNull(value: Expr): Expr {
    return `${value} is not None`;
  }

  exprTypeCheck(value: Expr, kind: TypeCheckKind): Expr {
    switch (kind) {
      case 'str':
        return `isinstance(${value}, str)`;
      case 'int':
        return `isinstance(${value}, int)`;
      case 'float':
        return `isinstance(${value}, (float, int))`;
      case 'bool':
        return `isinstance(${value}, bool)`;
      case 'file':
        return `isinstance(${value}, (pathlib.Path, str))`;
      case 'list':
        return `isinstance(${value}, list)`;
      case 'dict':
        return `isinstance(${value}, dict)`;
    }
  }

  exprLength(value: Expr): Expr {
    return `len(${value})`;
  }

  exprCompare(left: Expr, op: CompareOp, right: Expr): Expr {
    return `${left} ${op} ${right}`;
  }

  exprIn(value: Expr, list: Expr): Expr {
    return `(${value} in ${list})`;
  }

  exprNumericToStr(value: Expr): Expr {
    return `str(${value})`;
  }

  exprRemoveSuffixes(value: Expr, suffixes: string[]): Expr {
    return suffixes.reduce((expr, suffix) => `${expr}.removesuffix(${this.exprStr(suffix)})`, value);
  }

  exprPathFilename(value: Expr): Expr {
    return `pathlib.Path(${value}).name`;
  }

  exprConcatStrs(values: Expr[], join = ''): Expr {
    if (join.length > 0) return `${this.exprStr(join)}.join(${this.exprList(values)})`;
    if (values.length === 0) return '""';
    if (values.length === 1) return values[0] ?? '""';
    return values.join(' + ');
  }

  // === STATEMENTS ===

  lineComment(lines: LineBuffer): LineBuffer {
    return comment(lines, '#');
  }

  returnStatement(value: Expr): string {
    return `return ${value}`;
  }

  exprStatement(value: Expr): string {
    return value;
  }

  ifElse(condition: Expr, truthy: LineBuffer, falsy?: LineBuffer): LineBuffer {
    const buf = [`if ${condition}:`, ...indent(truthy.length > 0 ? truthy : ['pass'])];
    if (falsy !== undefined && falsy.length > 0) {
      buf.push('else:', ...indent(falsy));
    }
    return buf;
  }

  forEach(element: string, list: Expr, body: LineBuffer): LineBuffer {
    return [`for ${element} in ${list}:`, ...indent(body.length > 0 ? body : ['pass'])];
  }

  cargsDeclare(cargs: string): LineBuffer {
    return [`${cargs} = []`];
  }

  cargsAdd(cargs: string, values: MStr[]): LineBuffer {
    const [only] = values;
    if (only !== undefined && values.length === 1) {
      return [only.isList ? `${cargs}.extend(${only.expr})` : `${cargs}.append(${only.expr})`];
    }
    return [`${cargs}.extend([`, ...indent(values.map(v => `${v.isList ? '*' : ''}${v.expr},`)), '])'];
  }

  cargsCollapse(cargs: string, join: string): LineBuffer {
    return [`${cargs} = [${this.exprStr(join)}.join(${cargs})] if ${cargs} else []`];
  }

  raiseValidationError(message: string): LineBuffer {
    return [`raise StyxValidationError(${this.exprStr(message)})`];
  }

  // === IR ===

  typeParam(param: Param, lut: SymbolLUT): string {
    let type: string;
    const { body } = param;
    switch (body.kind) {
      case 'string':
        type = this.typeStr();
        break;
      case 'int':
        type = this.typeInt();
        break;
      case 'float':
        type = this.typeFloat();
        break;
      case 'bool':
        type = this.typeBool();
        break;
      case 'file':
        type = this.typeInputPath();
        break;
      case 'struct':
        type = lut.typeStructParamsTagged.get(param.base.id);
        break;
      case 'struct_union':
        type = this.typeUnion(body.alts.map(alt => lut.typeStructParamsTagged.get(alt.base.id)));
        break;
    }
    if (param.choices !== undefined) type = this.typeLiteralUnion(param.choices);
    if (param.list) type = this.typeList(type);
    if (param.nullable) type = this.typeOptional(type);
    return type;
  }

  paramDefaultValue(param: Param): Expr | undefined {
    const { defaultValue } = param;
    if (defaultValue === undefined) return param.nullable ? this.exprNull() : undefined;
    if (typeof defaultValue === 'symbol') return this.exprNull();
    return this.exprLiteral(defaultValue);
  }

  private inputFile(param: Param, symbol: Expr): Expr {
    let extra = '';
    if (param.body.kind === 'file') {
      if (param.body.resolveParent) extra += ', resolve_parent=True';
      if (param.body.mutable) extra += ', mutable=True';
    }
    return `execution.input_file(${symbol}${extra})`;
  }

  /**
   * List expression of the arguments every element of a list param yields.
   */
  private listElements(lut: SymbolLUT, param: Param, symbol: Expr): Expr {
    const { body } = param;
    switch (body.kind) {
      case 'string':
        return symbol;
      case 'int':
      case 'float':
        return `[str(v) for v in ${symbol}]`;
      case 'bool': {
        const tokens = boolTokens(body);
        const whenTrue = this.exprStr(tokens.whenTrue.join(''));
        const whenFalse = this.exprStr(tokens.whenFalse.join(''));
        return tokens.twoSided
          ? `[${whenTrue} if v else ${whenFalse} for v in ${symbol}]`
          : `[${whenTrue} for v in ${symbol}]`;
      }
      case 'file':
        return `[${this.inputFile(param, 'f')} for f in ${symbol}]`;
      case 'struct':
        return `[a for c in [${lut.fnStructMakeCargs.get(param.base.id)}(s, execution) for s in ${symbol}] for a in c]`;
      case 'struct_union': {
        const dyn = lut.fnDynUnionMakeCargs.get(param.base.id);
        return `[a for c in [${dyn}(s["@type"])(s, execution) for s in ${symbol}] for a in c]`;
      }
    }
  }

  private elementValue(lut: SymbolLUT, param: Param, symbol: Expr, isList: boolean): Expr {
    const { body } = param;
    switch (body.kind) {
      case 'string':
        return symbol;
      case 'int':
      case 'float':
        return `str(${symbol})`;
      case 'bool': {
        const tokens = boolTokens(body);
        const literal = (side: string[]): Expr =>
          isList ? this.exprLiteral(side) : this.exprStr(side[0] ?? '');
        if (!tokens.twoSided) return literal(tokens.whenTrue);
        return this.exprTernary(symbol, literal(tokens.whenTrue), literal(tokens.whenFalse));
      }
      case 'file':
        return this.inputFile(param, symbol);
      case 'struct':
        return `${lut.fnStructMakeCargs.get(param.base.id)}(${symbol}, execution)`;
      case 'struct_union':
        return `${lut.fnDynUnionMakeCargs.get(param.base.id)}(${symbol}["@type"])(${symbol}, execution)`;
    }
  }

  paramVarToMStr(lut: SymbolLUT, param: Param, symbol: Expr): MStr {
    const isList = rendersAsList(param);
    if (!param.list) return { expr: this.elementValue(lut, param, symbol, isList), isList };
    const elements = this.listElements(lut, param, symbol);
    if (param.list.join === undefined) return { expr: elements, isList };
    return { expr: `${this.exprStr(param.list.join)}.join(${elements})`, isList };
  }

  paramVarIsSetByUser(param: Param, symbol: Expr): Expr | undefined {
    const rule = presenceRule(param);
    if (rule === undefined) return undefined;
    const conditions: Expr[] = [];
    if (rule.nullable) conditions.push(this.exprIsNotNull(symbol));
    switch (rule.bool) {
      case 'when-true':
        conditions.push(symbol);
        break;
      case 'when-false':
        conditions.push(this.exprNot(symbol));
        break;
      case 'never':
        return 'False';
      case undefined:
        break;
    }
    return this.exprAnd(conditions);
  }

  paramDictCreate(lut: SymbolLUT, dict: string, struct: Param<StructBody>, items: [Param, Expr][]): LineBuffer {
    return [
      `${dict}: ${lut.typeStructParamsTagged.get(struct.base.id)} = {`,
      ...indent([
        `"@type": ${this.exprStr(discriminator(struct))},`,
        ...items.map(([param, value]) => `${this.exprStr(param.base.name)}: ${value},`),
      ]),
      '}',
    ];
  }

  paramDictSet(dict: string, param: Param, value: Expr): LineBuffer {
    return [`${this.paramDictGet(dict, param)} = ${value}`];
  }

  paramDictGet(dict: string, param: Param): Expr {
    return `${dict}[${this.exprStr(param.base.name)}]`;
  }

  paramDictGetOrDefault(dict: string, param: Param, fallback: Expr): Expr {
    return `${dict}.get(${this.exprStr(param.base.name)}, ${fallback})`;
  }

  paramDictGetOrNull(dict: string, param: Param): Expr {
    return `${dict}.get(${this.exprStr(param.base.name)})`;
  }

  private typedDict(symbol: string, items: [string, string][]): LineBuffer {
    if (items.length === 0) return [`${symbol} = typing.TypedDict('${symbol}', {})`];
    return [
      `${symbol} = typing.TypedDict('${symbol}', {`,
      ...indent(items.map(([key, type]) => `${key}: ${type},`)),
      '})',
    ];
  }

  paramDictTypeDeclare(lut: SymbolLUT, struct: Param<StructBody>): LineBuffer {
    const items = [...iterParamsShallow(struct)].map((param): [string, string] => {
      const type = lut.typeParam.get(param.base.id);
      return [this.exprStr(param.base.name), param.nullable ? `typing.NotRequired[${type}]` : type];
    });
    const tag = this.typeLiteralUnion([discriminator(struct)]);
    const typeKey = this.exprStr('@type');
    return [
      ...this.typedDict(lut.typeStructParams.get(struct.base.id), [[typeKey, `typing.NotRequired[${tag}]`], ...items]),
      ...this.typedDict(lut.typeStructParamsTagged.get(struct.base.id), [[typeKey, tag], ...items]),
    ];
  }

  exprGetDiscriminator(value: Expr): Expr {
    return `${value}.get("@type", None)`;
  }

  mstrCollapse(value: MStr, join = ''): MStr {
    return value.isList ? { expr: `${this.exprStr(join)}.join(${value.expr})`, isList: false } : value;
  }

  mstrConcat(values: MStr[], join: string): MStr {
    return { expr: this.exprConcatStrs(values.map(v => this.mstrCollapse(v).expr), join), isList: false };
  }

  mstrJoin(values: MStr[], join: string): MStr {
    const elements = values.map(v => (v.isList ? `*${v.expr}` : v.expr));
    return { expr: `${this.exprStr(join)}.join(${this.exprList(elements)})`, isList: false };
  }

  mstrEmptyLiteralLike(value: MStr): Expr {
    return value.isList ? '[]' : '""';
  }

  private dispatchFunc(name: string, what: string, items: [string, string][]): GenericFunc {
    return {
      name,
      docstringBody: `Get ${what} function by command type.`,
      returnType: 'typing.Any',
      returnDescr: `${what.charAt(0).toUpperCase()}${what.slice(1)} function.`,
      args: [{ name: 't', type: 'str', docstring: 'Command type' }],
      body: ['return {', ...indent(items.map(([key, fn]) => `${this.exprStr(key)}: ${fn},`)), '}.get(t)'],
    };
  }

  dynDeclare(lut: SymbolLUT, union: Param<StructUnionBody>): GenericFunc[] {
    const { alts } = union.body;
    const funcs = [
      this.dispatchFunc(
        lut.fnDynUnionMakeCargs.get(union.base.id),
        'build cargs',
        alts.map(alt => [discriminator(alt), lut.fnStructMakeCargs.get(alt.base.id)])
      ),
    ];
    const withOutputs = alts.filter(alt => hasOutputsDeep(alt));
    if (withOutputs.length > 0) {
      funcs.push(
        this.dispatchFunc(
          lut.fnDynUnionMakeOutputs.get(union.base.id),
          'build outputs',
          withOutputs.map(alt => [discriminator(alt), lut.fnStructMakeOutputs.get(alt.base.id)])
        )
      );
    }
    funcs.push(
      this.dispatchFunc(
        lut.fnDynUnionValidate.get(union.base.id),
        'validate params',
        alts.map(alt => [discriminator(alt), lut.fnStructValidate.get(alt.base.id)])
      )
    );
    return funcs;
  }

  structCollectOutputs(lut: SymbolLUT, child: Param<StructBody> | Param<StructUnionBody>, symbol: Expr): Expr {
    const execution = this.symbolExecution();
    let one: (value: Expr) => Expr;
    if (child.body.kind === 'struct') {
      const fn = lut.fnStructMakeOutputs.get(child.base.id);
      one = value => `${fn}(${value}, ${execution})`;
    } else {
      const dyn = lut.fnDynUnionMakeOutputs.get(child.base.id);
      const partial = child.body.alts.some(alt => !hasOutputsDeep(alt));
      one = value => {
        const call = `${dyn}(${value}["@type"])`;
        return partial ? `(${call}(${value}, ${execution}) if ${call} else None)` : `${call}(${value}, ${execution})`;
      };
    }
    const collected = child.list ? `[${one('i')} for i in ${symbol}]` : one(symbol);
    return child.nullable ? this.exprTernary(this.exprIsNotNull(symbol), collected, this.exprNull()) : collected;
  }

  resolveOutputFile(execution: string, file: Expr): Expr {
    return `${execution}.output_file(${file})`;
  }

  callBuildCargs(lut: SymbolLUT, struct: Param<StructBody>, params: Expr, execution: Expr, target: string): LineBuffer {
    return [`${target} = ${lut.fnStructMakeCargs.get(struct.base.id)}(${params}, ${execution})`];
  }

  callBuildOutputs(
    lut: SymbolLUT,
    struct: Param<StructBody>,
    params: Expr,
    execution: Expr,
    target: string
  ): LineBuffer {
    return [`${target} = ${lut.fnStructMakeOutputs.get(struct.base.id)}(${params}, ${execution})`];
  }

  callValidate(lut: SymbolLUT, params: Expr): LineBuffer {
    return [`${lut.fnStructValidate.get(lut.root.base.id)}(${params})`];
  }

  exprCallStructValidate(lut: SymbolLUT, struct: Param<StructBody>, value: Expr): Expr {
    return `${lut.fnStructValidate.get(struct.base.id)}(${value})`;
  }

  exprCallUnionValidate(lut: SymbolLUT, union: Param<StructUnionBody>, value: Expr): Expr {
    return `${lut.fnDynUnionValidate.get(union.base.id)}(${value}["@type"])(${value})`;
  }

  buildParamsAndExecute(lut: SymbolLUT, struct: Param<StructBody>, args: string[], runner: string): LineBuffer {
    return [
      `params = ${lut.fnStructMakeParams.get(struct.base.id)}(`,
      ...indent(args.map(a => `${a}=${a},`)),
      ')',
      this.returnStatement(`${lut.fnStructExecute.get(struct.base.id)}(params, ${runner})`),
    ];
  }

  doesValidate(): boolean {
    return true;
  }

  // === RUNTIME ===

  symbolRunner(): string {
    return 'runner';
  }

  symbolExecution(): string {
    return 'execution';
  }

  runnerDeclare(runner: string): LineBuffer {
    return [`${runner} = ${runner} or get_global_runner()`];
  }

  executionDeclare(execution: string, metadata: string): LineBuffer {
    return [`${execution} = ${this.symbolRunner()}.start_execution(${metadata})`];
  }

  executionProcessParams(execution: string, params: string): LineBuffer {
    return [`${params} = ${execution}.params(${params})`];
  }

  executionRun(execution: string, cargs: string, stdoutField?: string, stderrField?: string): LineBuffer {
    const stdout = stdoutField === undefined ? '' : `, handle_stdout=lambda s: ret.${stdoutField}.append(s)`;
    const stderr = stderrField === undefined ? '' : `, handle_stderr=lambda s: ret.${stderrField}.append(s)`;
    return [`${execution}.run(${cargs}${stdout}${stderr})`];
  }

  retObjectCreation(execution: string, outputType: string, members: [string, Expr][]): LineBuffer {
    return [
      `ret = ${outputType}(`,
      ...indent([`root=${execution}.output_file("."),`, ...members.map(([name, value]) => `${name}=${value},`)]),
      ')',
    ];
  }

  // === EMIT ===

  wrapperModuleImports(): LineBuffer {
    return ['import typing', 'import pathlib', 'from styxdefs import *'];
  }

  private argDeclaration(arg: GenericArg): string {
    const type = arg.type !== undefined ? `: ${arg.type}` : '';
    return arg.default === undefined ? `${arg.name}${type}` : `${arg.name}${type} = ${arg.default}`;
  }

  generateFunc(func: GenericFunc): LineBuffer {
    const argDocs: LineBuffer = [];
    for (const arg of func.args) {
      const wrapped = linebreakParagraph(
        `${arg.name}: ${arg.docstring !== undefined ? escapeBackslash(arg.docstring) : ''}`,
        LINE_WIDTH - 4 * 3 - 1,
        LINE_WIDTH - 4 * 2 - 1
      );
      const lines = ensureEndsWith(wrapped.join('\\\n'), '.').split('\n');
      argDocs.push(lines[0] ?? '', ...indent(lines.slice(1)));
    }

    const docstring = func.docstringBody
      ? linebreakParagraph(escapeBackslash(func.docstringBody), LINE_WIDTH - 4)
      : [''];

    return [
      `def ${func.name}(`,
      ...indent(func.args.map(arg => `${this.argDeclaration(arg)},`)),
      `) -> ${func.returnType ?? 'None'}:`,
      ...indent([
        '"""',
        ...docstring,
        '',
        'Args:',
        ...indent(argDocs),
        ...(func.returnDescr ? ['Returns:', ...indent([escapeBackslash(func.returnDescr)])] : []),
        '"""',
      ]),
      ...indent(func.body.length > 0 ? func.body : ['pass']),
    ];
  }

  generateStructure(structure: GenericStructure): LineBuffer {
    const fields = structure.fields.flatMap(field => [
      this.argDeclaration(field),
      ...(field.docstring
        ? linebreakParagraph(`"""${escapeBackslash(field.docstring)}"""`, LINE_WIDTH - 4, LINE_WIDTH - 4)
        : []),
    ]);
    return [
      `class ${structure.name}(typing.NamedTuple):`,
      ...indent([
        ...(structure.docstring ? ['"""', escapeBackslash(structure.docstring), '"""'] : []),
        ...(fields.length > 0 ? fields : ['pass']),
      ]),
    ];
  }

  generateModule(module: GenericModule): LineBuffer {
    const exports =
      module.exports.length > 0
        ? ['__all__ = [', ...indent([...module.exports].sort().map(name => `${enquote(name)},`)), ']']
        : [];
    const definitions = module.definitions.flatMap(definition =>
      blankBefore(
        definition.kind === 'func' ? this.generateFunc(definition.func) : this.generateStructure(definition.structure),
        2
      )
    );
    return blankAfter([
      ...(module.docstring ? ['"""', ...linebreakParagraph(escapeBackslash(module.docstring)), '"""'] : []),
      ...this.lineComment(['This file was auto generated by Styx.', 'Do not edit this file directly.']),
      ...blankBefore(module.imports),
      ...blankBefore(module.header),
      ...definitions,
      ...blankBefore(module.footer),
      ...blankBefore(exports, 2),
    ]);
  }

  generateMetadata(symbol: string, entries: [string, LiteralValue][]): LineBuffer {
    return [`${symbol} = Metadata(`, ...indent(entries.map(([k, v]) => `${k}=${this.exprLiteral(v)},`)), ')'];
  }

  appModulePath(packageSymbol: string, moduleSymbol: string): string {
    return `${packageSymbol}/${moduleSymbol}.py`;
  }

  packageIndexPath(packageSymbol: string): string {
    return `${packageSymbol}/__init__.py`;
  }

  packageIndexModule(entries: PackageIndexEntry[], docstring?: string): GenericModule {
    const execute: GenericFunc = {
      name: 'execute',
      docstringBody: 'Run a command in this package dynamically from a params object.',
      returnType: 'typing.Any',
      returnDescr: 'Outputs object of the command.',
      args: [
        { name: 'params', type: 'typing.Any', docstring: 'The parameters.' },
        { name: 'runner', type: this.typeOptional('Runner'), default: 'None', docstring: 'Command runner' },
      ],
      body: [
        'return {',
        ...indent(entries.map(e => `${this.exprStr(e.publicName)}: ${e.executeSymbol},`)),
        '}[params["@type"]](params, runner)',
      ],
    };
    const module: GenericModule = {
      imports: [
        'import typing',
        'from styxdefs import Runner',
        ...entries.map(e => `from .${e.moduleSymbol} import *`),
      ],
      header: [],
      definitions: [{ kind: 'func', func: execute }],
      footer: [],
      exports: [],
    };
    if (docstring !== undefined) module.docstring = docstring;
    return module;
  }
}
