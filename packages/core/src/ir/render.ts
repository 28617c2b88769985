/**
 * Command-line interpreter for the IR
 *
 * renderCommandLine(root, params) produces the argument list a generated
 * wrapper builds for the same parameter mapping, without an execution
 * environment: file values are passed through as given. The optimizer's
 * rewrites are checked against this function.
 *
 * Rules:
 * - a param's value is its entry in the mapping, else its default
 * - a group with presence rules is skipped unless one of them holds
 * - in a group with several rules every CmdArg is emitted; an absent param
 *   renders as an empty placeholder (nothing for a list, "" for a string)
 * - a CmdArg of several tokens collapses to one string (pieces joined by
 *   CmdArg.join, lists inside a piece joined by "")
 * - group and struct joins collapse their content to one argument
 */

import { SET_TO_NONE, type ConditionalGroup, type Param, type StructBody } from '@styx/types';
import { RenderError } from '../errors/StyxError.js';
import { isParamToken } from './guards.js';
import { presenceRule, satisfiesPresence } from './presence.js';

export type ParamValue = string | number | boolean | null | undefined | ParamValue[] | ParamValues;

export interface ParamValues {
  [key: string]: ParamValue;
}

export interface Rendered {
  values: string[];
  isList: boolean;
}

const EMPTY_LIST: Rendered = { values: [], isList: true };

export function renderCommandLine(root: Param<StructBody>, params: ParamValues): string[] {
  return renderStruct(root, params);
}

/**
 * The value a param takes under `params`: explicit entry, else default.
 */
export function resolveValue(param: Param, params: ParamValues): ParamValue {
  const value = params[param.base.name];
  if (value !== undefined) return value;
  const fallback = param.defaultValue;
  if (fallback === undefined || fallback === SET_TO_NONE) return null;
  return Array.isArray(fallback) ? [...fallback] : fallback;
}

function isParamValues(value: ParamValue): value is ParamValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function badValue(param: Param, value: ParamValue, expected: string): never {
  throw new RenderError(
    `Param "${param.base.name}" expects ${expected}, got ${JSON.stringify(value) ?? String(value)}`,
    'ERR_RENDER_VALUE',
    { paramId: param.base.id, paramName: param.base.name }
  );
}

function renderStruct(struct: Param<StructBody>, params: ParamValues): string[] {
  const { join } = struct.body;
  const args: string[] = [];
  for (const group of struct.body.groups) {
    const out = renderGroup(group, params);
    if (out === undefined) continue;
    if (join !== undefined) args.push(out.join(''));
    else args.push(...out);
  }
  if (join !== undefined && args.length > 0) return [args.join(join)];
  return args;
}

function renderGroup(group: ConditionalGroup, params: ParamValues): string[] | undefined {
  const rules = group.cargs.flatMap(carg =>
    carg.tokens.filter(isParamToken).flatMap(param => {
      const rule = presenceRule(param);
      return rule === undefined ? [] : [satisfiesPresence(rule, resolveValue(param, params))];
    })
  );
  if (rules.length > 0 && !rules.includes(true)) return undefined;
  const guarded = rules.length > 1;

  const out: string[] = [];
  for (const carg of group.cargs) {
    const pieces = carg.tokens.map((token): Rendered => {
      if (!isParamToken(token)) return { values: [token], isList: false };
      const value = resolveValue(token, params);
      const rule = presenceRule(token);
      if (guarded && rule !== undefined && !satisfiesPresence(rule, value)) {
        return emptyLike(token);
      }
      return renderParam(token, value);
    });

    if (pieces.length === 1) {
      out.push(...(pieces[0]?.values ?? []));
    } else if (pieces.length > 1) {
      out.push(pieces.map(piece => piece.values.join('')).join(carg.join ?? ''));
    }
  }

  if (group.join !== undefined) return [out.join(group.join)];
  return out;
}

/**
 * Placeholder for an absent param inside an emitted CmdArg.
 */
function emptyLike(param: Param): Rendered {
  return rendersAsList(param) ? EMPTY_LIST : { values: [''], isList: false };
}

/**
 * Whether `param`'s value renders as a list of arguments rather than one string.
 */
export function rendersAsList(param: Param): boolean {
  if (param.list) return param.list.join === undefined;
  switch (param.body.kind) {
    case 'bool': {
      const { valueTrue, valueFalse } = param.body;
      return valueTrue.length > 1 || valueFalse.length > 1 || (valueTrue.length === 0 && valueFalse.length === 0);
    }
    case 'struct':
    case 'struct_union':
      return true;
    default:
      return false;
  }
}

export function renderParam(param: Param, value: ParamValue): Rendered {
  if (value === null || value === undefined) {
    throw new RenderError(`Param "${param.base.name}" has no value`, 'ERR_RENDER_MISSING', {
      paramId: param.base.id,
      paramName: param.base.name,
    });
  }
  if (!param.list) {
    return { values: renderElement(param, value), isList: rendersAsList(param) };
  }
  if (!Array.isArray(value)) badValue(param, value, 'a list');
  const items = value.map(item => {
    const parts = renderElement(param, item);
    return param.body.kind === 'bool' ? [parts.join('')] : parts;
  });
  if (param.list.join !== undefined) {
    return { values: [items.flat().join(param.list.join)], isList: false };
  }
  return { values: items.flat(), isList: true };
}

/**
 * Strings produced by one (non-list) value of `param`.
 */
function renderElement(param: Param, value: ParamValue): string[] {
  const { body } = param;
  switch (body.kind) {
    case 'bool':
      if (typeof value !== 'boolean') return badValue(param, value, 'a boolean');
      if (body.valueTrue.length > 0 && body.valueFalse.length > 0) {
        return [...(value ? body.valueTrue : body.valueFalse)];
      }
      return [...(body.valueTrue.length > 0 ? body.valueTrue : body.valueFalse)];
    case 'int':
    case 'float':
      if (typeof value !== 'number') return badValue(param, value, 'a number');
      return [String(value)];
    case 'string':
    case 'file':
      if (typeof value !== 'string') return badValue(param, value, 'a string');
      return [value];
    case 'struct':
      if (!isParamValues(value)) return badValue(param, value, 'an object');
      return renderStruct({ ...param, body }, value);
    case 'struct_union': {
      if (!isParamValues(value)) return badValue(param, value, 'an object');
      const tag = value['@type'];
      const alt = body.alts.find(a => a.body.publicName === tag || (a.body.publicName === undefined && a.body.name === tag));
      if (alt === undefined) {
        throw new RenderError(
          `Param "${param.base.name}" has no alternative named ${JSON.stringify(tag) ?? 'undefined'}`,
          'ERR_RENDER_DISCRIMINATOR',
          { paramId: param.base.id, paramName: param.base.name }
        );
      }
      return renderStruct(alt, value);
    }
  }
}
