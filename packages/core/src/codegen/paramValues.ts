/**
 * Expressions for reading a param's value out of a params object
 */

import { SET_TO_NONE, type BoolBody, type DefaultValue, type Param } from '@styx/types';
import type { Expr, LanguageProvider } from './LanguageProvider.js';

export function defaultValueExpr(lang: LanguageProvider, defaultValue: DefaultValue | undefined): Expr {
  if (defaultValue === undefined || defaultValue === SET_TO_NONE) return lang.exprNull();
  return lang.exprLiteral(defaultValue);
}

/**
 * `dict[name]`, falling back to the param's default (or null) when absent.
 */
export function paramValueExpr(lang: LanguageProvider, dict: string, param: Param): Expr {
  return lang.paramDictGetOrDefault(dict, param, defaultValueExpr(lang, param.defaultValue));
}

export interface BoolTokens {
  whenTrue: string[];
  whenFalse: string[];
  /** Both sides carry tokens, so the value picks one */
  twoSided: boolean;
}

/**
 * Tokens a bool renders to. A one-sided bool renders its only side whatever
 * the value; presence rules decide whether it is emitted at all.
 */
export function boolTokens(body: BoolBody): BoolTokens {
  const { valueTrue, valueFalse } = body;
  if (valueTrue.length > 0 && valueFalse.length > 0) {
    return { whenTrue: valueTrue, whenFalse: valueFalse, twoSided: true };
  }
  const side = valueTrue.length > 0 ? valueTrue : valueFalse;
  return { whenTrue: side, whenFalse: side, twoSided: false };
}
