/**
 * TruthyChoicesPass - two-valued yes/no choices become bools
 *
 *   mode: String choices=["yes", "no"]  ->  mode: Bool(true=["yes"], false=["no"])
 *
 * Matching is case-insensitive; int choices compare on their decimal text, so
 * [0, 1] becomes Bool(true=["1"], false=["0"]). Defaults follow the conversion.
 * Params referenced by output templates keep their choices, since a path
 * cannot be built from a bool.
 */

import type { IdType, Param, ScalarValue } from '@styx/types';
import type { App } from '../ir/App.js';
import { isOutputReference } from '../ir/guards.js';
import { iterOutputsDeep, iterParamsDeep } from '../ir/traverse.js';
import { OptimizerPass, type PassContext, type PassMetadata, type PassResult } from './OptimizerPass.js';

export const TRUTHY: ReadonlySet<string> = new Set([
  'true', '1', 'yes', 'y', 'on', 'enabled', 'enable', 'ok', 'okay', 'active', 'accept', 'accepted', 'confirm',
  'confirmed',
]);

export const FALSY: ReadonlySet<string> = new Set([
  'false', '0', 'no', 'n', 'off', 'disabled', 'disable', 'none', 'null', 'nil', '', 'empty', 'nope', 'nah',
  'negative', 'inactive', 'deny', 'denied', 'reject', 'rejected', 'cancel', 'cancelled',
]);

/**
 * [truthy, falsy] texts when the two choices form a yes/no pair.
 */
export function truthyPair(choices: readonly ScalarValue[]): [string, string] | undefined {
  if (choices.length !== 2) return undefined;
  const [a, b] = choices.map(String);
  if (a === undefined || b === undefined) return undefined;
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (TRUTHY.has(la) && FALSY.has(lb)) return [a, b];
  if (TRUTHY.has(lb) && FALSY.has(la)) return [b, a];
  return undefined;
}

export class TruthyChoicesPass extends OptimizerPass {
  get metadata(): PassMetadata {
    return {
      name: 'TruthyChoices',
      description: 'Rewrite yes/no choice params as bools',
      structural: false,
    };
  }

  run(app: App, context: PassContext): PassResult {
    const referenced = new Set<IdType>();
    for (const output of iterOutputsDeep(app.command)) {
      for (const token of output.tokens) {
        if (isOutputReference(token)) referenced.add(token.refId);
      }
    }

    let changes = 0;
    for (const param of iterParamsDeep(app.command)) {
      if (param.body.kind !== 'string' && param.body.kind !== 'int') continue;
      if (param.choices === undefined || referenced.has(param.base.id)) continue;
      const pair = truthyPair([...param.choices]);
      if (pair === undefined) continue;

      this.convert(param, pair);
      changes++;
      context.logger.debug('Converted yes/no choices to bool', {
        id: param.base.id,
        name: param.base.name,
        valueTrue: pair[0],
        valueFalse: pair[1],
      });
    }
    return { changes };
  }

  private convert(param: Param, [valueTrue, valueFalse]: [string, string]): void {
    const toBool = (value: ScalarValue): boolean => String(value) === valueTrue;
    const { defaultValue } = param;
    if (Array.isArray(defaultValue)) {
      param.defaultValue = defaultValue.map(toBool);
    } else if (typeof defaultValue === 'string' || typeof defaultValue === 'number') {
      param.defaultValue = toBool(defaultValue);
    }
    param.body = { kind: 'bool', valueTrue: [valueTrue], valueFalse: [valueFalse] };
    delete param.choices;
  }
}
