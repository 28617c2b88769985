/**
 * Type guards for the closed set of param bodies
 */

import type {
  Param,
  BoolBody,
  IntBody,
  FloatBody,
  StringBody,
  FileBody,
  StructBody,
  StructUnionBody,
  CmdArgToken,
  OutputToken,
  OutputParamReference,
} from '@styx/types';

export function isBool(param: Param): param is Param<BoolBody> {
  return param.body.kind === 'bool';
}

export function isInt(param: Param): param is Param<IntBody> {
  return param.body.kind === 'int';
}

export function isFloat(param: Param): param is Param<FloatBody> {
  return param.body.kind === 'float';
}

export function isString(param: Param): param is Param<StringBody> {
  return param.body.kind === 'string';
}

export function isFile(param: Param): param is Param<FileBody> {
  return param.body.kind === 'file';
}

export function isStruct(param: Param): param is Param<StructBody> {
  return param.body.kind === 'struct';
}

export function isStructUnion(param: Param): param is Param<StructUnionBody> {
  return param.body.kind === 'struct_union';
}

export function isParamToken(token: CmdArgToken): token is Param {
  return typeof token !== 'string';
}

export function isOutputReference(token: OutputToken): token is OutputParamReference {
  return typeof token !== 'string';
}
