/**
 * IR Types - the parameter tree that describes a command-line tool
 *
 * An App owns one root struct param. Structs own ConditionalGroups, groups own
 * CmdArgs, CmdArgs own tokens (literal text or child params). Unions own their
 * alternative structs. Parent links are never stored on nodes; they live in a
 * derived index rebuilt by App.relink().
 */

// === IDENTIFIERS ===
export type IdType = number;

// === DOCUMENTATION ===
export interface Documentation {
  title?: string;
  description?: string;
  authors: string[];
  literature: string[];
  urls: string[];
}

// === PROJECT METADATA ===
export interface Project {
  name?: string;
  version?: string;
  license?: string;
  docs: Documentation;
}

export interface Package {
  name: string;
  version?: string;
  /** Container image tag the tool runs in */
  docker?: string;
  docs: Documentation;
}

// === OUTPUTS ===
export interface OutputParamReference {
  refId: IdType;
  /** Suffixes stripped from the referenced value, each in turn */
  fileRemoveSuffixes: string[];
  /** Literal used when the referenced param is absent */
  fallback?: string;
}

export type OutputToken = string | OutputParamReference;

export interface Output {
  id: IdType;
  name: string;
  tokens: OutputToken[];
  docs: Documentation;
  mediaTypes: string[];
}

export interface StreamOutput {
  id: IdType;
  name: string;
  docs: Documentation;
}

// === PARAM BODIES ===
export type ParamKind = 'bool' | 'int' | 'float' | 'string' | 'file' | 'struct' | 'struct_union';

export interface BoolBody {
  kind: 'bool';
  valueTrue: string[];
  valueFalse: string[];
}

export interface IntBody {
  kind: 'int';
  minValue?: number;
  maxValue?: number;
}

export interface FloatBody {
  kind: 'float';
  minValue?: number;
  maxValue?: number;
}

export interface StringBody {
  kind: 'string';
}

export interface FileBody {
  kind: 'file';
  /** Mount the parent directory instead of the file itself */
  resolveParent: boolean;
  /** The tool writes to the file in place */
  mutable: boolean;
  mediaTypes: string[];
}

export interface StructBody {
  kind: 'struct';
  name: string;
  /** Runtime discriminator, derived by App.setup() */
  publicName?: string;
  groups: ConditionalGroup[];
  join?: string;
  docs?: Documentation;
}

export interface StructUnionBody {
  kind: 'struct_union';
  alts: Param<StructBody>[];
}

export type ParamBody =
  | BoolBody
  | IntBody
  | FloatBody
  | StringBody
  | FileBody
  | StructBody
  | StructUnionBody;

export type LeafBody = BoolBody | IntBody | FloatBody | StringBody | FileBody;

// === PARAM ===
/**
 * Marks an explicit "absent" default on a nullable param.
 */
export const SET_TO_NONE: unique symbol = Symbol('SET_TO_NONE');
export type SetToNone = typeof SET_TO_NONE;

export type ScalarValue = string | number | boolean;

export type DefaultValue = ScalarValue | ScalarValue[] | SetToNone;

export interface ParamBase {
  id: IdType;
  name: string;
  outputs: Output[];
  docs: Documentation;
}

export interface ParamList {
  countMin?: number;
  countMax?: number;
  join?: string;
}

export interface Param<B extends ParamBody = ParamBody> {
  base: ParamBase;
  body: B;
  list?: ParamList;
  nullable: boolean;
  choices?: string[] | number[];
  defaultValue?: DefaultValue;
}

// === COMMAND LINE STRUCTURE ===
export type CmdArgToken = string | Param;

export interface CmdArg {
  tokens: CmdArgToken[];
  join?: string;
}

export interface ConditionalGroup {
  cargs: CmdArg[];
  join?: string;
}

// === APP ===
export interface AppData {
  uid: string;
  command: Param<StructBody>;
  captureStdout?: StreamOutput;
  captureStderr?: StreamOutput;
  project: Project;
}
