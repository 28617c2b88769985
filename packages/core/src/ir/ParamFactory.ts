/**
 * ParamFactory - validated construction of IR params
 *
 * Every param the compiler sees goes through createParam (directly, or via
 * appFromJson), so the coherence of body, list, nullable, choices and default
 * is checked once at construction. A violation throws IrError.
 */

import {
  SET_TO_NONE,
  type BoolBody,
  type CmdArg,
  type CmdArgToken,
  type ConditionalGroup,
  type DefaultValue,
  type Documentation,
  type FileBody,
  type FloatBody,
  type IdType,
  type IntBody,
  type Output,
  type Param,
  type ParamBody,
  type ParamList,
  type ScalarValue,
  type StringBody,
  type StructBody,
  type StructUnionBody,
} from '@styx/types';
import { IrError } from '../errors/StyxError.js';
import { createDocs } from './docs.js';

export interface ParamOptions<B extends ParamBody> {
  id: IdType;
  name: string;
  body: B;
  outputs?: Output[];
  docs?: Partial<Documentation>;
  list?: ParamList;
  nullable?: boolean;
  choices?: string[] | number[];
  defaultValue?: DefaultValue;
}

export function createParam<B extends ParamBody>(options: ParamOptions<B>): Param<B> {
  const param: Param<B> = {
    base: {
      id: options.id,
      name: options.name,
      outputs: options.outputs ?? [],
      docs: createDocs(options.docs),
    },
    body: options.body,
    nullable: options.nullable ?? false,
  };
  if (options.list !== undefined) param.list = { ...options.list };
  if (options.choices !== undefined) param.choices = options.choices;
  if (options.defaultValue !== undefined) param.defaultValue = options.defaultValue;
  validateParam(param);
  return param;
}

// === BODIES ===

export function boolBody(valueTrue: string[] = [], valueFalse: string[] = []): BoolBody {
  return { kind: 'bool', valueTrue, valueFalse };
}

export function intBody(minValue?: number, maxValue?: number): IntBody {
  return { kind: 'int', minValue, maxValue };
}

export function floatBody(minValue?: number, maxValue?: number): FloatBody {
  return { kind: 'float', minValue, maxValue };
}

export function stringBody(): StringBody {
  return { kind: 'string' };
}

export function fileBody(options: Partial<Omit<FileBody, 'kind'>> = {}): FileBody {
  return {
    kind: 'file',
    resolveParent: options.resolveParent ?? false,
    mutable: options.mutable ?? false,
    mediaTypes: options.mediaTypes ?? [],
  };
}

export function structBody(
  name: string,
  groups: ConditionalGroup[],
  options: { join?: string; docs?: Documentation } = {}
): StructBody {
  const body: StructBody = { kind: 'struct', name, groups };
  if (options.join !== undefined) body.join = options.join;
  if (options.docs !== undefined) body.docs = options.docs;
  return body;
}

export function unionBody(alts: Param<StructBody>[]): StructUnionBody {
  return { kind: 'struct_union', alts };
}

// === COMMAND LINE STRUCTURE ===

export function carg(...tokens: CmdArgToken[]): CmdArg {
  return { tokens };
}

export function joinedCarg(join: string, ...tokens: CmdArgToken[]): CmdArg {
  return { tokens, join };
}

export function group(...cargs: CmdArg[]): ConditionalGroup {
  return { cargs };
}

export function joinedGroup(join: string, ...cargs: CmdArg[]): ConditionalGroup {
  return { cargs, join };
}

// === VALIDATION ===

type ScalarCheck = { label: string; test: (value: ScalarValue) => boolean };

/**
 * Scalar type accepted by a body, or undefined when the body takes no literal values.
 */
function scalarCheck(body: ParamBody): ScalarCheck | undefined {
  switch (body.kind) {
    case 'bool':
      return { label: 'boolean', test: value => typeof value === 'boolean' };
    case 'int':
      return { label: 'integer', test: value => typeof value === 'number' && Number.isInteger(value) };
    case 'float':
      return { label: 'number', test: value => typeof value === 'number' && Number.isFinite(value) };
    case 'string':
      return { label: 'string', test: value => typeof value === 'string' };
    case 'file':
    case 'struct':
    case 'struct_union':
      return undefined;
  }
}

/**
 * Validate a param's own coherence (children are validated when they are created).
 */
export function validateParam(param: Param): void {
  const { body, list, choices, defaultValue } = param;
  const context = { paramId: param.base.id, paramName: param.base.name };
  const check = scalarCheck(body);
  const choiceValues: ScalarValue[] | undefined = choices === undefined ? undefined : [...choices];

  if (choiceValues !== undefined) {
    if ((body.kind !== 'string' && body.kind !== 'int') || check === undefined) {
      throw new IrError(`Param "${param.base.name}" of kind ${body.kind} cannot have choices`, 'ERR_IR_CHOICES', context);
    }
    if (!choiceValues.every(check.test)) {
      throw new IrError(`All choices of "${param.base.name}" must be of type ${check.label}`, 'ERR_IR_CHOICES', context);
    }
  }

  if (body.kind === 'int' || body.kind === 'float') {
    if (body.minValue !== undefined && body.maxValue !== undefined && body.minValue > body.maxValue) {
      throw new IrError(
        `minValue (${body.minValue}) of "${param.base.name}" is greater than maxValue (${body.maxValue})`,
        'ERR_IR_BOUNDS',
        context
      );
    }
  }

  if (list?.countMin !== undefined && list.countMax !== undefined && list.countMin > list.countMax) {
    throw new IrError(
      `countMin (${list.countMin}) of "${param.base.name}" is greater than countMax (${list.countMax})`,
      'ERR_IR_BOUNDS',
      context
    );
  }

  if (defaultValue === undefined) return;

  if (defaultValue === SET_TO_NONE) {
    if (!param.nullable) {
      throw new IrError(
        `Default of "${param.base.name}" is SET_TO_NONE but the param is not nullable`,
        'ERR_IR_SET_TO_NONE',
        context
      );
    }
    return;
  }

  if (check === undefined) {
    throw new IrError(`Param "${param.base.name}" of kind ${body.kind} cannot have a default`, 'ERR_IR_DEFAULT_TYPE', context);
  }

  let values: ScalarValue[];
  if (list) {
    if (!Array.isArray(defaultValue)) {
      throw new IrError(`Default of list param "${param.base.name}" must be a list`, 'ERR_IR_DEFAULT_TYPE', context);
    }
    if (list.countMin !== undefined && defaultValue.length < list.countMin) {
      throw new IrError(
        `Default of "${param.base.name}" has ${defaultValue.length} items, fewer than countMin (${list.countMin})`,
        'ERR_IR_LIST_LENGTH',
        context
      );
    }
    if (list.countMax !== undefined && defaultValue.length > list.countMax) {
      throw new IrError(
        `Default of "${param.base.name}" has ${defaultValue.length} items, more than countMax (${list.countMax})`,
        'ERR_IR_LIST_LENGTH',
        context
      );
    }
    values = defaultValue;
  } else {
    if (Array.isArray(defaultValue)) {
      throw new IrError(`Default of "${param.base.name}" must not be a list`, 'ERR_IR_DEFAULT_TYPE', context);
    }
    values = [defaultValue];
  }

  for (const value of values) {
    if (!check.test(value)) {
      throw new IrError(
        `Default of "${param.base.name}" must be of type ${check.label}, got ${JSON.stringify(value)}`,
        'ERR_IR_DEFAULT_TYPE',
        context
      );
    }
    if ((body.kind === 'int' || body.kind === 'float') && typeof value === 'number') {
      if (body.minValue !== undefined && value < body.minValue) {
        throw new IrError(
          `Default of "${param.base.name}" (${value}) is less than minValue (${body.minValue})`,
          'ERR_IR_DEFAULT_RANGE',
          context
        );
      }
      if (body.maxValue !== undefined && value > body.maxValue) {
        throw new IrError(
          `Default of "${param.base.name}" (${value}) is greater than maxValue (${body.maxValue})`,
          'ERR_IR_DEFAULT_RANGE',
          context
        );
      }
    }
    if (choiceValues !== undefined && !choiceValues.includes(value)) {
      throw new IrError(`Default of "${param.base.name}" is not one of its choices`, 'ERR_IR_CHOICES', context);
    }
  }
}
