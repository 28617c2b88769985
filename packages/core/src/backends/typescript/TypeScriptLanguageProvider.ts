/**
 * TypeScriptLanguageProvider - TypeScript wrappers against the styxdefs npm runtime
 *
 * Params objects are interfaces over plain objects, outputs are interfaces,
 * functions carry TSDoc. Module-level names are exported from one trailing
 * `export { ... }` list; interfaces are exported where they are declared.
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
import { presenceRule } from '../../ir/presence.js';
import { rendersAsList } from '../../ir/render.js';
import { hasOutputsDeep, iterParamsShallow } from '../../ir/traverse.js';
import type {
  CompareOp,
  Expr,
  LanguageProvider,
  LiteralValue,
  PackageIndexEntry,
  TypeCheckKind,
} from '../../codegen/LanguageProvider.js';
import { blankAfter, blankBefore, comment, indent, linebreakParagraph } from '../../codegen/lineBuffer.js';
import { boolTokens } from '../../codegen/paramValues.js';
import { Scope } from '../../codegen/Scope.js';
import { camelCase, pascalCase, screamingSnakeCase } from '../../codegen/stringCase.js';
import type { SymbolLUT } from '../../codegen/SymbolLUT.js';
import { allReservedWords, loadReservedWords } from '../reservedWords.js';

const LINE_WIDTH = 80;

function discriminator(struct: Param<StructBody>): string {
  return struct.body.publicName ?? struct.body.name;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Drop one pair of parentheses that encloses the whole expression.
 */
function unwrap(expr: Expr): Expr {
  if (!expr.startsWith('(') || !expr.endsWith(')')) return expr;
  let depth = 0;
  for (let i = 0; i < expr.length; i++) {
    if (expr[i] === '(') depth++;
    else if (expr[i] === ')') depth--;
    if (depth === 0 && i < expr.length - 1) return expr;
  }
  return expr.slice(1, -1);
}

function docComment(lines: LineBuffer): LineBuffer {
  if (lines.length === 0) return [];
  return ['/**', ...lines.map(line => (line.length > 0 ? ` * ${line}` : ' *')), ' */'];
}

export class TypeScriptLanguageProvider implements LanguageProvider {
  readonly id: BackendId = 'typescript';

  // === TYPES ===

  typeStr(): string {
    return 'string';
  }

  typeInt(): string {
    return 'number';
  }

  typeFloat(): string {
    return 'number';
  }

  typeBool(): string {
    return 'boolean';
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
    return values.map(v => this.exprLiteral(v)).join(' | ');
  }

  typeList(element: string): string {
    return /^[\w.]+$/.test(element) ? `${element}[]` : `Array<${element}>`;
  }

  typeOptional(element: string): string {
    return `${element} | null`;
  }

  typeUnion(elements: string[]): string {
    return elements.length > 0 ? elements.join(' | ') : 'never';
  }

  typeStringList(): string {
    return 'string[]';
  }

  typeAny(): string {
    return 'any';
  }

  // === SYMBOLS ===

  languageScope(): Scope {
    return Scope.withReserved(allReservedWords('typescript'));
  }

  symbolLegal(name: string): boolean {
    return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name) && !loadReservedWords('typescript').keywords.includes(name);
  }

  symbolFrom(name: string): string {
    const replaced = name.replace(/[^a-zA-Z0-9_]/g, '_');
    return /^[0-9_]/.test(replaced) || replaced.length === 0 ? `v_${replaced}` : replaced;
  }

  symbolVarCase(name: string): string {
    return this.symbolFrom(camelCase(this.symbolFrom(name)));
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
    if (value === null) return 'null';
    if (typeof value === 'boolean' || typeof value === 'number') return String(value);
    if (typeof value === 'string') return this.exprStr(value);
    if (Array.isArray(value)) return this.exprList(value.map(v => this.exprLiteral(v)));
    return this.exprDict(Object.entries(value).map(([k, v]): [Expr, Expr] => [this.exprStr(k), this.exprLiteral(v)]));
  }

  exprStr(value: string): Expr {
    return JSON.stringify(value);
  }

  exprNull(): Expr {
    return 'null';
  }

  exprList(items: Expr[]): Expr {
    return `[${items.join(', ')}]`;
  }

  exprDict(entries: [Expr, Expr][]): Expr {
    return entries.length > 0 ? `{ ${entries.map(([k, v]) => `${k}: ${v}`).join(', ')} }` : '{}';
  }

  exprTernary(condition: Expr, truthy: Expr, falsy: Expr): Expr {
    return `(${condition} ? ${truthy} : ${falsy})`;
  }

  exprAnd(conditions: Expr[]): Expr {
    if (conditions.length === 0) return 'true';
    if (conditions.length === 1) return conditions[0] ?? 'true';
    return `(${conditions.join(' && ')})`;
  }

  exprOr(conditions: Expr[]): Expr {
    if (conditions.length === 0) return 'false';
    if (conditions.length === 1) return conditions[0] ?? 'false';
    return `(${conditions.join(' || ')})`;
  }

  exprNot(condition: Expr): Expr {
    return `!(${unwrap(condition)})`;
  }

  exprIsNull(value: Expr): Expr {
    return `${value} == null`;
  }

  exprIsNotNull(value: Expr): Expr {
    return `${value} != null`;
  }

  exprTypeCheck(value: Expr, kind: TypeCheckKind): Expr {
    switch (kind) {
      case 'str':
      case 'file':
        return `typeof ${value} === "string"`;
      case 'int':
        return `Number.isInteger(${value})`;
      case 'float':
        return `typeof ${value} === "number"`;
      case 'bool':
        return `typeof ${value} === "boolean"`;
      case 'list':
        return `Array.isArray(${value})`;
      case 'dict':
        return `(typeof ${value} === "object" && ${value} !== null && !Array.isArray(${value}))`;
    }
  }

  exprLength(value: Expr): Expr {
    return `${value}.length`;
  }

  exprCompare(left: Expr, op: CompareOp, right: Expr): Expr {
    const strict = op === '==' ? '===' : op === '!=' ? '!==' : op;
    return `${left} ${strict} ${right}`;
  }

  exprIn(value: Expr, list: Expr): Expr {
    return `${list}.includes(${value})`;
  }

  exprNumericToStr(value: Expr): Expr {
    return `String(${value})`;
  }

  exprRemoveSuffixes(value: Expr, suffixes: string[]): Expr {
    return suffixes.reduce((expr, suffix) => `${expr}.replace(/${escapeRegExp(suffix)}$/, "")`, value);
  }

  exprPathFilename(value: Expr): Expr {
    return `${value}.replace(/^.*[\\\\/]/, "")`;
  }

  exprConcatStrs(values: Expr[], join = ''): Expr {
    if (join.length > 0) return `${this.exprList(values)}.join(${this.exprStr(join)})`;
    if (values.length === 0) return '""';
    if (values.length === 1) return values[0] ?? '""';
    return values.join(' + ');
  }

  // === STATEMENTS ===

  lineComment(lines: LineBuffer): LineBuffer {
    return comment(lines, '//');
  }

  returnStatement(value: Expr): string {
    return `return ${value};`;
  }

  exprStatement(value: Expr): string {
    return `${value};`;
  }

  ifElse(condition: Expr, truthy: LineBuffer, falsy?: LineBuffer): LineBuffer {
    const buf = [`if (${unwrap(condition)}) {`, ...indent(truthy)];
    if (falsy !== undefined && falsy.length > 0) {
      buf.push('} else {', ...indent(falsy));
    }
    buf.push('}');
    return buf;
  }

  forEach(element: string, list: Expr, body: LineBuffer): LineBuffer {
    return [`for (const ${element} of ${list}) {`, ...indent(body), '}'];
  }

  cargsDeclare(cargs: string): LineBuffer {
    return [`const ${cargs}: string[] = [];`];
  }

  cargsAdd(cargs: string, values: MStr[]): LineBuffer {
    const [only] = values;
    if (only !== undefined && values.length === 1) {
      return [`${cargs}.push(${only.isList ? '...' : ''}${only.expr});`];
    }
    return [`${cargs}.push(`, ...indent(values.map(v => `${v.isList ? '...' : ''}${v.expr},`)), ');'];
  }

  cargsCollapse(cargs: string, join: string): LineBuffer {
    return this.ifElse(`${cargs}.length > 0`, [
      `${cargs}.splice(0, ${cargs}.length, ${cargs}.join(${this.exprStr(join)}));`,
    ]);
  }

  raiseValidationError(message: string): LineBuffer {
    return [`throw new StyxValidationError(${this.exprStr(message)});`];
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
    if (param.body.kind !== 'file') return `execution.inputFile(${symbol})`;
    const { resolveParent, mutable } = param.body;
    if (mutable) return `execution.inputFile(${symbol}, ${String(resolveParent)}, true)`;
    if (resolveParent) return `execution.inputFile(${symbol}, true)`;
    return `execution.inputFile(${symbol})`;
  }

  private listElements(lut: SymbolLUT, param: Param, symbol: Expr): Expr {
    const { body } = param;
    switch (body.kind) {
      case 'string':
        return symbol;
      case 'int':
      case 'float':
        return `${symbol}.map(String)`;
      case 'bool': {
        const tokens = boolTokens(body);
        const whenTrue = this.exprStr(tokens.whenTrue.join(''));
        const whenFalse = this.exprStr(tokens.whenFalse.join(''));
        return tokens.twoSided
          ? `${symbol}.map((v: boolean) => (v ? ${whenTrue} : ${whenFalse}))`
          : `${symbol}.map(() => ${whenTrue})`;
      }
      case 'file':
        return `${symbol}.map((f: InputPathType) => ${this.inputFile(param, 'f')})`;
      case 'struct':
        return `${symbol}.flatMap((s: any) => ${lut.fnStructMakeCargs.get(param.base.id)}(s, execution))`;
      case 'struct_union': {
        const dyn = lut.fnDynUnionMakeCargs.get(param.base.id);
        return `${symbol}.flatMap((s: any) => ${dyn}(s["@type"])(s, execution))`;
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
        return `String(${symbol})`;
      case 'bool': {
        const tokens = boolTokens(body);
        const literal = (side: string[]): Expr => (isList ? this.exprLiteral(side) : this.exprStr(side[0] ?? ''));
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
    return { expr: `${elements}.join(${this.exprStr(param.list.join)})`, isList };
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
        return 'false';
      case undefined:
        break;
    }
    return this.exprAnd(conditions);
  }

  paramDictCreate(lut: SymbolLUT, dict: string, struct: Param<StructBody>, items: [Param, Expr][]): LineBuffer {
    return [
      `const ${dict}: ${lut.typeStructParamsTagged.get(struct.base.id)} = {`,
      ...indent([
        `"@type": ${this.exprStr(discriminator(struct))},`,
        ...items.map(([param, value]) => `${this.exprStr(param.base.name)}: ${value},`),
      ]),
      '};',
    ];
  }

  paramDictSet(dict: string, param: Param, value: Expr): LineBuffer {
    return [`${this.paramDictGet(dict, param)} = ${value};`];
  }

  paramDictGet(dict: string, param: Param): Expr {
    return `${dict}[${this.exprStr(param.base.name)}]`;
  }

  paramDictGetOrDefault(dict: string, param: Param, fallback: Expr): Expr {
    return `(${this.paramDictGet(dict, param)} ?? ${fallback})`;
  }

  paramDictGetOrNull(dict: string, param: Param): Expr {
    return this.paramDictGetOrDefault(dict, param, 'null');
  }

  paramDictTypeDeclare(lut: SymbolLUT, struct: Param<StructBody>): LineBuffer {
    const name = lut.typeStructParams.get(struct.base.id);
    const tag = this.exprStr(discriminator(struct));
    const fields = [...iterParamsShallow(struct)].map(
      param => `${this.exprStr(param.base.name)}${param.nullable ? '?' : ''}: ${lut.typeParam.get(param.base.id)};`
    );
    return [
      `export interface ${name} {`,
      ...indent([`"@type"?: ${tag};`, ...fields]),
      '}',
      `export interface ${lut.typeStructParamsTagged.get(struct.base.id)} extends ${name} {`,
      ...indent([`"@type": ${tag};`]),
      '}',
    ];
  }

  exprGetDiscriminator(value: Expr): Expr {
    return `(${value}["@type"] ?? null)`;
  }

  mstrCollapse(value: MStr, join = ''): MStr {
    return value.isList ? { expr: `${value.expr}.join(${this.exprStr(join)})`, isList: false } : value;
  }

  mstrConcat(values: MStr[], join: string): MStr {
    return { expr: this.exprConcatStrs(values.map(v => this.mstrCollapse(v).expr), join), isList: false };
  }

  mstrJoin(values: MStr[], join: string): MStr {
    const elements = values.map(v => (v.isList ? `...${v.expr}` : v.expr));
    return { expr: `${this.exprList(elements)}.join(${this.exprStr(join)})`, isList: false };
  }

  mstrEmptyLiteralLike(value: MStr): Expr {
    return value.isList ? '[]' : '""';
  }

  private dispatchFunc(name: string, what: string, items: [string, string][]): GenericFunc {
    return {
      name,
      docstringBody: `Get ${what} function by command type.`,
      returnType: 'any',
      returnDescr: `${what.charAt(0).toUpperCase()}${what.slice(1)} function.`,
      args: [{ name: 't', type: 'string', docstring: 'Command type' }],
      body: [
        'return ({',
        ...indent(items.map(([key, fn]) => `${this.exprStr(key)}: ${fn},`)),
        '} as Record<string, any>)[t];',
      ],
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
        return partial ? `(${call} ? ${call}(${value}, ${execution}) : null)` : `${call}(${value}, ${execution})`;
      };
    }
    const collected = child.list ? `${symbol}.map((i: any) => ${one('i')})` : one(symbol);
    return child.nullable ? this.exprTernary(this.exprIsNotNull(symbol), collected, this.exprNull()) : collected;
  }

  resolveOutputFile(execution: string, file: Expr): Expr {
    return `${execution}.outputFile(${file})`;
  }

  callBuildCargs(lut: SymbolLUT, struct: Param<StructBody>, params: Expr, execution: Expr, target: string): LineBuffer {
    return [`const ${target} = ${lut.fnStructMakeCargs.get(struct.base.id)}(${params}, ${execution});`];
  }

  callBuildOutputs(
    lut: SymbolLUT,
    struct: Param<StructBody>,
    params: Expr,
    execution: Expr,
    target: string
  ): LineBuffer {
    return [`const ${target} = ${lut.fnStructMakeOutputs.get(struct.base.id)}(${params}, ${execution});`];
  }

  callValidate(lut: SymbolLUT, params: Expr): LineBuffer {
    return [`${lut.fnStructValidate.get(lut.root.base.id)}(${params});`];
  }

  exprCallStructValidate(lut: SymbolLUT, struct: Param<StructBody>, value: Expr): Expr {
    return `${lut.fnStructValidate.get(struct.base.id)}(${value})`;
  }

  exprCallUnionValidate(lut: SymbolLUT, union: Param<StructUnionBody>, value: Expr): Expr {
    return `${lut.fnDynUnionValidate.get(union.base.id)}(${value}["@type"])(${value})`;
  }

  buildParamsAndExecute(lut: SymbolLUT, struct: Param<StructBody>, args: string[], runner: string): LineBuffer {
    return [
      `const params = ${lut.fnStructMakeParams.get(struct.base.id)}(${args.join(', ')});`,
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
    return [`${runner} = ${runner} || getGlobalRunner();`];
  }

  executionDeclare(execution: string, metadata: string): LineBuffer {
    return [`const ${execution} = ${this.symbolRunner()}.startExecution(${metadata});`];
  }

  executionProcessParams(execution: string, params: string): LineBuffer {
    return [`${params} = ${execution}.params(${params});`];
  }

  executionRun(execution: string, cargs: string, stdoutField?: string, stderrField?: string): LineBuffer {
    const handlers: string[] = [];
    if (stdoutField !== undefined) handlers.push(`(s: string) => ret.${stdoutField}.push(s)`);
    if (stderrField !== undefined) {
      if (handlers.length === 0) handlers.push('undefined');
      handlers.push(`(s: string) => ret.${stderrField}.push(s)`);
    }
    return [`${execution}.run(${[cargs, ...handlers].join(', ')});`];
  }

  retObjectCreation(execution: string, outputType: string, members: [string, Expr][]): LineBuffer {
    return [
      `const ret: ${outputType} = {`,
      ...indent([`root: ${execution}.outputFile("."),`, ...members.map(([name, value]) => `${name}: ${value},`)]),
      '};',
    ];
  }

  // === EMIT ===

  wrapperModuleImports(): LineBuffer {
    return [
      'import type { Runner, Execution, Metadata, InputPathType, OutputPathType } from "styxdefs";',
      'import { getGlobalRunner, StyxValidationError } from "styxdefs";',
    ];
  }

  private argDeclaration(arg: GenericArg): string {
    const type = arg.type !== undefined ? `: ${arg.type}` : '';
    return arg.default === undefined ? `${arg.name}${type}` : `${arg.name}${type} = ${arg.default}`;
  }

  generateFunc(func: GenericFunc): LineBuffer {
    const doc: LineBuffer = func.docstringBody ? linebreakParagraph(func.docstringBody, LINE_WIDTH - 3) : [];
    const argDocs = func.args.map(arg => `@param ${arg.name} ${arg.docstring ?? ''}`.trimEnd());
    if (argDocs.length > 0) doc.push(...(doc.length > 0 ? [''] : []), ...argDocs);
    if (func.returnDescr) doc.push('', `@returns ${func.returnDescr}`);

    return [
      ...docComment(doc),
      `function ${func.name}(`,
      ...indent(func.args.map(arg => `${this.argDeclaration(arg)},`)),
      `): ${func.returnType ?? 'void'} {`,
      ...indent(func.body),
      '}',
    ];
  }

  generateStructure(structure: GenericStructure): LineBuffer {
    const fields = structure.fields.flatMap(field => [
      ...(field.docstring ? docComment(linebreakParagraph(field.docstring, LINE_WIDTH - 7)) : []),
      `${field.name}: ${field.type ?? 'unknown'};`,
    ]);
    return [
      ...(structure.docstring ? docComment(linebreakParagraph(structure.docstring, LINE_WIDTH - 3)) : []),
      `export interface ${structure.name} {`,
      ...indent(fields),
      '}',
    ];
  }

  generateModule(module: GenericModule): LineBuffer {
    const structures = new Set(
      module.definitions.flatMap(d => (d.kind === 'structure' ? [d.structure.name] : []))
    );
    const exported = [...module.exports].filter(name => !structures.has(name)).sort();
    const exports = exported.length > 0 ? ['export {', ...indent(exported.map(name => `${name},`)), '};'] : [];
    const definitions = module.definitions.flatMap(definition =>
      blankBefore(
        definition.kind === 'func' ? this.generateFunc(definition.func) : this.generateStructure(definition.structure),
        2
      )
    );
    return blankAfter([
      ...this.lineComment(['This file was auto generated by Styx.', 'Do not edit this file directly.']),
      ...(module.docstring ? blankBefore(docComment(linebreakParagraph(module.docstring, LINE_WIDTH - 3))) : []),
      ...blankBefore(module.imports),
      ...blankBefore(module.header),
      ...definitions,
      ...blankBefore(module.footer),
      ...blankBefore(exports, 2),
    ]);
  }

  generateMetadata(symbol: string, entries: [string, LiteralValue][]): LineBuffer {
    return [
      `const ${symbol}: Metadata = {`,
      ...indent(entries.map(([k, v]) => `${k}: ${this.exprLiteral(v)},`)),
      '};',
    ];
  }

  appModulePath(packageSymbol: string, moduleSymbol: string): string {
    return `${packageSymbol}/${moduleSymbol}.ts`;
  }

  packageIndexPath(packageSymbol: string): string {
    return `${packageSymbol}/index.ts`;
  }

  packageIndexModule(entries: PackageIndexEntry[], docstring?: string): GenericModule {
    const execute: GenericFunc = {
      name: 'execute',
      docstringBody: 'Run a command in this package dynamically from a params object.',
      returnType: 'any',
      returnDescr: 'Outputs object of the command.',
      args: [
        { name: 'params', type: 'any', docstring: 'The parameters.' },
        { name: 'runner', type: this.typeOptional('Runner'), default: 'null', docstring: 'Command runner' },
      ],
      body: [
        'return ({',
        ...indent(entries.map(e => `${this.exprStr(e.publicName)}: ${e.executeSymbol},`)),
        '} as Record<string, any>)[params["@type"]](params, runner);',
      ],
    };
    const module: GenericModule = {
      imports: [
        'import type { Runner } from "styxdefs";',
        ...entries.map(e => `import { ${e.executeSymbol} } from "./${e.moduleSymbol}.js";`),
      ],
      header: [],
      definitions: [{ kind: 'func', func: execute }],
      footer: entries.map(e => `export * from "./${e.moduleSymbol}.js";`),
      exports: ['execute'],
    };
    if (docstring !== undefined) module.docstring = docstring;
    return module;
  }
}
