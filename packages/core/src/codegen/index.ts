export { Scope } from './Scope.js';
export { SymbolLUT, IdTable, type SymbolMap, type SymbolMapEntry } from './SymbolLUT.js';
export type {
  CompareOp,
  Expr,
  LanguageEmitProvider,
  LanguageExprProvider,
  LanguageIrProvider,
  LanguageProvider,
  LanguageRuntimeProvider,
  LanguageStatementProvider,
  LanguageSymbolProvider,
  LanguageTypeProvider,
  LiteralValue,
  PackageIndexEntry,
  TypeCheckKind,
} from './LanguageProvider.js';
export { compileApp, emptyModule, paramArgs } from './compileApp.js';
export { compileLanguage, type CompileOptions, type PackageApps } from './compileLanguage.js';
export { compileValidate } from './compileValidate.js';
export { generateStaticMetadata } from './metadata.js';
export { boolTokens, defaultValueExpr, paramValueExpr, type BoolTokens } from './paramValues.js';
export * from './lineBuffer.js';
export * from './stringCase.js';
