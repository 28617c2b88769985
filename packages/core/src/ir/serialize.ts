/**
 * IR <-> JSON
 *
 * Document shape: { uid, command, captureStdout, captureStderr, project }.
 * Keys are camelCase, a param body carries its variant under `type`, absent
 * optionals are null, and the SET_TO_NONE default is { "_special": "SET_TO_NONE" }.
 *
 * appFromJson checks the structure (ERR_IR_FORMAT, with a JSON path) and
 * rebuilds every param through createParam, so construction rules apply to
 * documents exactly as they apply to frontends.
 */

import {
  SET_TO_NONE,
  type CmdArg,
  type CmdArgToken,
  type ConditionalGroup,
  type DefaultValue,
  type Documentation,
  type Output,
  type OutputToken,
  type Param,
  type ParamBody,
  type ParamList,
  type Project,
  type ScalarValue,
  type StreamOutput,
  type StructBody,
} from '@styx/types';
import { IrError } from '../errors/StyxError.js';
import { App } from './App.js';
import { isOutputReference } from './guards.js';
import { createParam } from './ParamFactory.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const SET_TO_NONE_JSON: JsonObject = { _special: 'SET_TO_NONE' };

// =============================================================================
// Writing
// =============================================================================

function optional<T extends JsonValue>(value: T | undefined): T | null {
  return value === undefined ? null : value;
}

function docsToJson(docs: Documentation): JsonObject {
  return {
    title: optional(docs.title),
    description: optional(docs.description),
    authors: [...docs.authors],
    literature: [...docs.literature],
    urls: [...docs.urls],
  };
}

function outputToJson(output: Output): JsonObject {
  return {
    id: output.id,
    name: output.name,
    tokens: output.tokens.map((token): JsonValue =>
      isOutputReference(token)
        ? { refId: token.refId, fileRemoveSuffixes: [...token.fileRemoveSuffixes], fallback: optional(token.fallback) }
        : token
    ),
    docs: docsToJson(output.docs),
    mediaTypes: [...output.mediaTypes],
  };
}

function streamToJson(stream: StreamOutput | undefined): JsonValue {
  if (stream === undefined) return null;
  return { id: stream.id, name: stream.name, docs: docsToJson(stream.docs) };
}

function bodyToJson(body: ParamBody): JsonObject {
  switch (body.kind) {
    case 'bool':
      return { type: 'bool', valueTrue: [...body.valueTrue], valueFalse: [...body.valueFalse] };
    case 'int':
    case 'float':
      return { type: body.kind, minValue: optional(body.minValue), maxValue: optional(body.maxValue) };
    case 'string':
      return { type: 'string' };
    case 'file':
      return {
        type: 'file',
        resolveParent: body.resolveParent,
        mutable: body.mutable,
        mediaTypes: [...body.mediaTypes],
      };
    case 'struct':
      return {
        type: 'struct',
        name: body.name,
        publicName: optional(body.publicName),
        groups: body.groups.map(group => ({
          cargs: group.cargs.map(carg => ({
            tokens: carg.tokens.map((token): JsonValue => (typeof token === 'string' ? token : paramToJson(token))),
            join: optional(carg.join),
          })),
          join: optional(group.join),
        })),
        join: optional(body.join),
        docs: body.docs === undefined ? null : docsToJson(body.docs),
      };
    case 'struct_union':
      return { type: 'struct_union', alts: body.alts.map(paramToJson) };
  }
}

function defaultToJson(value: DefaultValue | undefined): JsonValue {
  if (value === undefined) return null;
  if (value === SET_TO_NONE) return { ...SET_TO_NONE_JSON };
  return Array.isArray(value) ? [...value] : value;
}

export function paramToJson(param: Param): JsonObject {
  return {
    base: {
      id: param.base.id,
      name: param.base.name,
      outputs: param.base.outputs.map(outputToJson),
      docs: docsToJson(param.base.docs),
    },
    body: bodyToJson(param.body),
    list: param.list === undefined
      ? null
      : { countMin: optional(param.list.countMin), countMax: optional(param.list.countMax), join: optional(param.list.join) },
    nullable: param.nullable,
    choices: param.choices === undefined ? null : [...param.choices],
    defaultValue: defaultToJson(param.defaultValue),
  };
}

export function appToJsonValue(app: App): JsonObject {
  return {
    uid: app.uid,
    command: paramToJson(app.command),
    captureStdout: streamToJson(app.captureStdout),
    captureStderr: streamToJson(app.captureStderr),
    project: {
      name: optional(app.project.name),
      version: optional(app.project.version),
      license: optional(app.project.license),
      docs: docsToJson(app.project.docs),
    },
  };
}

export function appToJson(app: App, indent = 2): string {
  return JSON.stringify(appToJsonValue(app), null, indent);
}

// =============================================================================
// Reading
// =============================================================================

function fail(path: string, expected: string): never {
  throw new IrError(`Malformed IR at ${path}: expected ${expected}`, 'ERR_IR_FORMAT', { path });
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) fail(path, 'an object');
  return value;
}

function readArray(value: unknown, path: string): JsonValue[] {
  if (!Array.isArray(value)) fail(path, 'an array');
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string') fail(path, 'a string');
  return value;
}

function readOptionalString(value: unknown, path: string): string | undefined {
  return value === undefined || value === null ? undefined : readString(value, path);
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== 'number') fail(path, 'a number');
  return value;
}

function readOptionalNumber(value: unknown, path: string): number | undefined {
  return value === undefined || value === null ? undefined : readNumber(value, path);
}

function readBoolean(value: unknown, path: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') fail(path, 'a boolean');
  return value;
}

function readStrings(value: unknown, path: string): string[] {
  if (value === undefined || value === null) return [];
  return readArray(value, path).map((item, i) => readString(item, `${path}[${i}]`));
}

function readScalar(value: unknown, path: string): ScalarValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  fail(path, 'a string, number or boolean');
}

function readDocs(value: unknown, path: string): Documentation {
  if (value === undefined || value === null) return { authors: [], literature: [], urls: [] };
  const obj = readObject(value, path);
  return {
    title: readOptionalString(obj.title, `${path}.title`),
    description: readOptionalString(obj.description, `${path}.description`),
    authors: readStrings(obj.authors, `${path}.authors`),
    literature: readStrings(obj.literature, `${path}.literature`),
    urls: readStrings(obj.urls, `${path}.urls`),
  };
}

function readOutputToken(value: unknown, path: string): OutputToken {
  if (typeof value === 'string') return value;
  const obj = readObject(value, path);
  return {
    refId: readNumber(obj.refId, `${path}.refId`),
    fileRemoveSuffixes: readStrings(obj.fileRemoveSuffixes, `${path}.fileRemoveSuffixes`),
    fallback: readOptionalString(obj.fallback, `${path}.fallback`),
  };
}

function readOutput(value: unknown, path: string): Output {
  const obj = readObject(value, path);
  return {
    id: readNumber(obj.id, `${path}.id`),
    name: readString(obj.name, `${path}.name`),
    tokens: readArray(obj.tokens ?? [], `${path}.tokens`).map((t, i) => readOutputToken(t, `${path}.tokens[${i}]`)),
    docs: readDocs(obj.docs, `${path}.docs`),
    mediaTypes: readStrings(obj.mediaTypes, `${path}.mediaTypes`),
  };
}

function readStream(value: unknown, path: string): StreamOutput | undefined {
  if (value === undefined || value === null) return undefined;
  const obj = readObject(value, path);
  return {
    id: readNumber(obj.id, `${path}.id`),
    name: readString(obj.name, `${path}.name`),
    docs: readDocs(obj.docs, `${path}.docs`),
  };
}

function readCarg(value: unknown, path: string): CmdArg {
  const obj = readObject(value, path);
  const tokens = readArray(obj.tokens, `${path}.tokens`).map((token, i): CmdArgToken =>
    typeof token === 'string' ? token : readParam(token, `${path}.tokens[${i}]`)
  );
  const carg: CmdArg = { tokens };
  const join = readOptionalString(obj.join, `${path}.join`);
  if (join !== undefined) carg.join = join;
  return carg;
}

function readGroup(value: unknown, path: string): ConditionalGroup {
  const obj = readObject(value, path);
  const group: ConditionalGroup = {
    cargs: readArray(obj.cargs, `${path}.cargs`).map((c, i) => readCarg(c, `${path}.cargs[${i}]`)),
  };
  const join = readOptionalString(obj.join, `${path}.join`);
  if (join !== undefined) group.join = join;
  return group;
}

function readStructBody(obj: JsonObject, path: string): StructBody {
  const body: StructBody = {
    kind: 'struct',
    name: readString(obj.name, `${path}.name`),
    groups: readArray(obj.groups, `${path}.groups`).map((g, i) => readGroup(g, `${path}.groups[${i}]`)),
  };
  const publicName = readOptionalString(obj.publicName, `${path}.publicName`);
  if (publicName !== undefined) body.publicName = publicName;
  const join = readOptionalString(obj.join, `${path}.join`);
  if (join !== undefined) body.join = join;
  if (obj.docs !== undefined && obj.docs !== null) body.docs = readDocs(obj.docs, `${path}.docs`);
  return body;
}

function readBody(value: unknown, path: string): ParamBody {
  const obj = readObject(value, path);
  const type = readString(obj.type, `${path}.type`);
  switch (type) {
    case 'bool':
      return {
        kind: 'bool',
        valueTrue: readStrings(obj.valueTrue, `${path}.valueTrue`),
        valueFalse: readStrings(obj.valueFalse, `${path}.valueFalse`),
      };
    case 'int':
    case 'float':
      return {
        kind: type,
        minValue: readOptionalNumber(obj.minValue, `${path}.minValue`),
        maxValue: readOptionalNumber(obj.maxValue, `${path}.maxValue`),
      };
    case 'string':
      return { kind: 'string' };
    case 'file':
      return {
        kind: 'file',
        resolveParent: readBoolean(obj.resolveParent, `${path}.resolveParent`, false),
        mutable: readBoolean(obj.mutable, `${path}.mutable`, false),
        mediaTypes: readStrings(obj.mediaTypes, `${path}.mediaTypes`),
      };
    case 'struct':
      return readStructBody(obj, path);
    case 'struct_union':
      return {
        kind: 'struct_union',
        alts: readArray(obj.alts, `${path}.alts`).map((alt, i) => {
          const param = readParam(alt, `${path}.alts[${i}]`);
          if (param.body.kind !== 'struct') fail(`${path}.alts[${i}].body.type`, '"struct"');
          return { ...param, body: param.body };
        }),
      };
    default:
      return fail(`${path}.type`, 'one of bool, int, float, string, file, struct, struct_union');
  }
}

function readList(value: unknown, path: string): ParamList | undefined {
  if (value === undefined || value === null) return undefined;
  const obj = readObject(value, path);
  const list: ParamList = {};
  const countMin = readOptionalNumber(obj.countMin, `${path}.countMin`);
  const countMax = readOptionalNumber(obj.countMax, `${path}.countMax`);
  const join = readOptionalString(obj.join, `${path}.join`);
  if (countMin !== undefined) list.countMin = countMin;
  if (countMax !== undefined) list.countMax = countMax;
  if (join !== undefined) list.join = join;
  return list;
}

function readChoices(value: unknown, path: string): string[] | number[] | undefined {
  if (value === undefined || value === null) return undefined;
  const items = readArray(value, path);
  if (items.every((item): item is string => typeof item === 'string')) return items;
  if (items.every((item): item is number => typeof item === 'number')) return items;
  return fail(path, 'an array of strings or an array of numbers');
}

function readDefault(value: unknown, path: string): DefaultValue | undefined {
  if (value === undefined || value === null) return undefined;
  if (isObject(value)) {
    if (value._special === 'SET_TO_NONE') return SET_TO_NONE;
    fail(path, 'a literal or { "_special": "SET_TO_NONE" }');
  }
  if (Array.isArray(value)) return value.map((item, i) => readScalar(item, `${path}[${i}]`));
  return readScalar(value, path);
}

function readParam(value: unknown, path: string): Param {
  const obj = readObject(value, path);
  const base = readObject(obj.base, `${path}.base`);
  return createParam({
    id: readNumber(base.id, `${path}.base.id`),
    name: readString(base.name, `${path}.base.name`),
    outputs: readArray(base.outputs ?? [], `${path}.base.outputs`).map((o, i) => readOutput(o, `${path}.base.outputs[${i}]`)),
    docs: readDocs(base.docs, `${path}.base.docs`),
    body: readBody(obj.body, `${path}.body`),
    list: readList(obj.list, `${path}.list`),
    nullable: readBoolean(obj.nullable, `${path}.nullable`, false),
    choices: readChoices(obj.choices, `${path}.choices`),
    defaultValue: readDefault(obj.defaultValue, `${path}.defaultValue`),
  });
}

function readProject(value: unknown, path: string): Project {
  if (value === undefined || value === null) return { docs: { authors: [], literature: [], urls: [] } };
  const obj = readObject(value, path);
  return {
    name: readOptionalString(obj.name, `${path}.name`),
    version: readOptionalString(obj.version, `${path}.version`),
    license: readOptionalString(obj.license, `${path}.license`),
    docs: readDocs(obj.docs, `${path}.docs`),
  };
}

export function appFromJsonValue(value: unknown): App {
  const obj = readObject(value, '$');
  const command = readParam(obj.command, '$.command');
  if (command.body.kind !== 'struct') fail('$.command.body.type', '"struct"');
  return new App({
    uid: readString(obj.uid, '$.uid'),
    command: { ...command, body: command.body },
    captureStdout: readStream(obj.captureStdout, '$.captureStdout'),
    captureStderr: readStream(obj.captureStderr, '$.captureStderr'),
    project: readProject(obj.project, '$.project'),
  });
}

export function appFromJson(text: string): App {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new IrError(`IR document is not valid JSON: ${message}`, 'ERR_IR_FORMAT', { path: '$' });
  }
  return appFromJsonValue(value);
}
