/**
 * LanguageProvider - everything the generic driver needs from a target language
 *
 * The driver (compileApp, compileLanguage) never writes target syntax itself.
 * It asks the provider for type names, literals, statements and IR-aware
 * fragments, then hands the assembled GenericModule back for printing.
 *
 * Capability groups:
 * - types: type names for primitives and type constructors
 * - symbols: reserved words, legal identifiers, case conventions
 * - expressions: literals and operators over already-built expressions
 * - statements: blocks and the cargs buffer
 * - ir: how params, MStr values, dispatch tables and calls look in the target
 * - runtime: the wrapper runtime's runner/execution protocol
 * - emit: printing definitions, modules and the package layout
 *
 * Each backend implements the whole interface in one class.
 */

import type {
  BackendId,
  GenericFunc,
  GenericModule,
  GenericStructure,
  LineBuffer,
  MStr,
  Param,
  StructBody,
  StructUnionBody,
} from '@styx/types';
import type { Scope } from './Scope.js';
import type { SymbolLUT } from './SymbolLUT.js';

/** Target-language source of one expression */
export type Expr = string;

export type LiteralValue = string | number | boolean | null | LiteralValue[] | { [key: string]: LiteralValue };

/** Runtime type tests used by generated validators */
export type TypeCheckKind = 'str' | 'int' | 'float' | 'bool' | 'file' | 'list' | 'dict';

export type CompareOp = '<' | '<=' | '>' | '>=' | '==' | '!=';

export interface LanguageTypeProvider {
  typeStr(): string;
  typeInt(): string;
  typeFloat(): string;
  typeBool(): string;
  typeInputPath(): string;
  typeOutputPath(): string;
  typeRunner(): string;
  typeExecution(): string;
  typeLiteralUnion(values: readonly (string | number)[]): string;
  typeList(element: string): string;
  typeOptional(element: string): string;
  typeUnion(elements: string[]): string;
  typeStringList(): string;
  /** Type of a params object a validator receives unchecked */
  typeAny(): string;
}

export interface LanguageSymbolProvider {
  /** Outermost scope, seeded with the target's reserved words */
  languageScope(): Scope;
  symbolLegal(name: string): boolean;
  /** Replace illegal characters; prefix names that cannot start an identifier */
  symbolFrom(name: string): string;
  symbolVarCase(name: string): string;
  symbolClassCase(name: string): string;
  symbolConstantCase(name: string): string;
  metadataSymbol(appName: string): string;
}

export interface LanguageExprProvider {
  exprLiteral(value: LiteralValue): Expr;
  exprStr(value: string): Expr;
  exprNull(): Expr;
  exprList(items: Expr[]): Expr;
  /** Entries are [key expression, value expression] */
  exprDict(entries: [Expr, Expr][]): Expr;
  /** Parenthesized conditional expression */
  exprTernary(condition: Expr, truthy: Expr, falsy: Expr): Expr;
  exprAnd(conditions: Expr[]): Expr;
  exprOr(conditions: Expr[]): Expr;
  exprNot(condition: Expr): Expr;
  exprIsNull(value: Expr): Expr;
  exprIsNotNull(value: Expr): Expr;
  /** True when `value` has the runtime type `kind` */
  exprTypeCheck(value: Expr, kind: TypeCheckKind): Expr;
  exprLength(value: Expr): Expr;
  exprCompare(left: Expr, op: CompareOp, right: Expr): Expr;
  exprIn(value: Expr, list: Expr): Expr;
  exprNumericToStr(value: Expr): Expr;
  /** Strip each of `suffixes` in turn, where present */
  exprRemoveSuffixes(value: Expr, suffixes: string[]): Expr;
  exprPathFilename(value: Expr): Expr;
  exprConcatStrs(values: Expr[], join?: string): Expr;
}

export interface LanguageStatementProvider {
  lineComment(lines: LineBuffer): LineBuffer;
  returnStatement(value: Expr): string;
  /** An expression evaluated for its effect */
  exprStatement(value: Expr): string;
  ifElse(condition: Expr, truthy: LineBuffer, falsy?: LineBuffer): LineBuffer;
  forEach(element: string, list: Expr, body: LineBuffer): LineBuffer;
  cargsDeclare(cargs: string): LineBuffer;
  /** Append every MStr in order, spreading lists */
  cargsAdd(cargs: string, values: MStr[]): LineBuffer;
  /** Replace a non-empty cargs buffer by its elements joined with `join` */
  cargsCollapse(cargs: string, join: string): LineBuffer;
  raiseValidationError(message: string): LineBuffer;
}

export interface LanguageIrProvider {
  /** Declared type of a param's value */
  typeParam(param: Param, lut: SymbolLUT): string;
  /** Default of the generated argument for `param`; undefined means required */
  paramDefaultValue(param: Param): Expr | undefined;
  /** Command-line fragments for the value held in `symbol` */
  paramVarToMStr(lut: SymbolLUT, param: Param, symbol: Expr): MStr;
  /** Condition under which `param` counts as set; undefined when always set */
  paramVarIsSetByUser(param: Param, symbol: Expr): Expr | undefined;

  paramDictCreate(lut: SymbolLUT, dict: string, struct: Param<StructBody>, items: [Param, Expr][]): LineBuffer;
  paramDictSet(dict: string, param: Param, value: Expr): LineBuffer;
  paramDictGet(dict: string, param: Param): Expr;
  paramDictGetOrDefault(dict: string, param: Param, fallback: Expr): Expr;
  paramDictGetOrNull(dict: string, param: Param): Expr;
  paramDictTypeDeclare(lut: SymbolLUT, struct: Param<StructBody>): LineBuffer;
  /** The "@type" entry of a params object, null when missing */
  exprGetDiscriminator(value: Expr): Expr;

  /** One string: a list is joined with `join` */
  mstrCollapse(value: MStr, join?: string): MStr;
  /** Each value collapsed with "", the pieces joined with `join` */
  mstrConcat(values: MStr[], join: string): MStr;
  /** Every element of every value (lists spread) joined with `join` */
  mstrJoin(values: MStr[], join: string): MStr;
  /** "" for strings, an empty list for lists */
  mstrEmptyLiteralLike(value: MStr): Expr;

  /** Dispatch functions of a union: cargs, outputs (when an alternative has outputs), validate */
  dynDeclare(lut: SymbolLUT, union: Param<StructUnionBody>): GenericFunc[];
  structCollectOutputs(lut: SymbolLUT, child: Param<StructBody> | Param<StructUnionBody>, symbol: Expr): Expr;
  resolveOutputFile(execution: string, file: Expr): Expr;

  callBuildCargs(lut: SymbolLUT, struct: Param<StructBody>, params: Expr, execution: Expr, target: string): LineBuffer;
  callBuildOutputs(lut: SymbolLUT, struct: Param<StructBody>, params: Expr, execution: Expr, target: string): LineBuffer;
  callValidate(lut: SymbolLUT, params: Expr): LineBuffer;
  exprCallStructValidate(lut: SymbolLUT, struct: Param<StructBody>, value: Expr): Expr;
  exprCallUnionValidate(lut: SymbolLUT, union: Param<StructUnionBody>, value: Expr): Expr;
  /** `args` are the build-params argument names in declaration order */
  buildParamsAndExecute(lut: SymbolLUT, struct: Param<StructBody>, args: string[], runner: string): LineBuffer;
  /** Whether generated modules carry runtime validators */
  doesValidate(): boolean;
}

export interface LanguageRuntimeProvider {
  symbolRunner(): string;
  symbolExecution(): string;
  runnerDeclare(runner: string): LineBuffer;
  executionDeclare(execution: string, metadata: string): LineBuffer;
  executionProcessParams(execution: string, params: string): LineBuffer;
  executionRun(execution: string, cargs: string, stdoutField?: string, stderrField?: string): LineBuffer;
  /** Declares `ret` of type `outputType` with `root` plus `members` */
  retObjectCreation(execution: string, outputType: string, members: [string, Expr][]): LineBuffer;
}

/**
 * One App module of a package, as the package index sees it.
 */
export interface PackageIndexEntry {
  moduleSymbol: string;
  publicName: string;
  executeSymbol: string;
}

export interface LanguageEmitProvider {
  wrapperModuleImports(): LineBuffer;
  generateFunc(func: GenericFunc): LineBuffer;
  generateStructure(structure: GenericStructure): LineBuffer;
  generateModule(module: GenericModule): LineBuffer;
  generateMetadata(symbol: string, entries: [string, LiteralValue][]): LineBuffer;

  /** Path of an App module, relative to the backend root */
  appModulePath(packageSymbol: string, moduleSymbol: string): string;
  /** Path of a package's index module */
  packageIndexPath(packageSymbol: string): string;
  /** Index module re-exporting every App and dispatching on "@type" */
  packageIndexModule(entries: PackageIndexEntry[], docstring?: string): GenericModule;
}

export interface LanguageProvider
  extends LanguageTypeProvider,
    LanguageSymbolProvider,
    LanguageExprProvider,
    LanguageStatementProvider,
    LanguageIrProvider,
    LanguageRuntimeProvider,
    LanguageEmitProvider {
  readonly id: BackendId;
}
