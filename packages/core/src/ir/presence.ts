/**
 * Presence rules - when a param counts as "set" for conditional groups
 *
 * Shared by the command-line interpreter and the code generator so both read
 * the tree the same way.
 */

import type { Param } from '@styx/types';

export type BoolCondition = 'when-true' | 'when-false' | 'never';

export interface PresenceRule {
  /** Set only when the value is not null */
  nullable: boolean;
  /** Extra condition on a non-list bool with one-sided tokens */
  bool?: BoolCondition;
}

/**
 * Rule for `param`, or undefined when the param is always considered set.
 */
export function presenceRule(param: Param): PresenceRule | undefined {
  let bool: BoolCondition | undefined;
  if (param.body.kind === 'bool' && param.list === undefined) {
    const hasTrue = param.body.valueTrue.length > 0;
    const hasFalse = param.body.valueFalse.length > 0;
    if (hasTrue && !hasFalse) bool = 'when-true';
    else if (hasFalse && !hasTrue) bool = 'when-false';
    else if (!hasTrue && !hasFalse) bool = 'never';
  }
  if (!param.nullable && bool === undefined) return undefined;
  return bool === undefined ? { nullable: param.nullable } : { nullable: param.nullable, bool };
}

export function hasPresenceRule(param: Param): boolean {
  return presenceRule(param) !== undefined;
}

/**
 * True when a bool param's own tokens (not its nullability) decide its presence.
 */
export function hasOwnPresenceRule(param: Param): boolean {
  return presenceRule(param)?.bool !== undefined;
}

export function satisfiesPresence(rule: PresenceRule, value: unknown): boolean {
  if (rule.nullable && (value === null || value === undefined)) return false;
  switch (rule.bool) {
    case undefined:
      return true;
    case 'when-true':
      return value === true;
    case 'when-false':
      return value === false;
    case 'never':
      return false;
  }
}
