/**
 * Codegen Types - language-neutral model of generated source
 *
 * The generic driver assembles functions, structures and modules out of these
 * records; a LanguageProvider turns each record into text.
 */

// === TEXT ===
export type LineBuffer = string[];

/**
 * An expression that evaluates either to one string or to a list of strings
 * spread into the command line.
 */
export interface MStr {
  expr: string;
  isList: boolean;
}

// === DEFINITIONS ===
export interface GenericArg {
  name: string;
  type?: string;
  default?: string;
  docstring?: string;
}

export interface GenericFunc {
  name: string;
  args: GenericArg[];
  returnType?: string;
  returnDescr?: string;
  docstringBody?: string;
  body: LineBuffer;
}

export interface GenericStructure {
  name: string;
  fields: GenericArg[];
  docstring?: string;
}

export type GenericDefinition =
  | { kind: 'func'; func: GenericFunc }
  | { kind: 'structure'; structure: GenericStructure };

export interface GenericModule {
  imports: LineBuffer;
  header: LineBuffer;
  definitions: GenericDefinition[];
  footer: LineBuffer;
  exports: string[];
  docstring?: string;
}

// === OUTPUT ===
export interface CompiledFile {
  /** Path relative to the backend's output root, forward slashes */
  path: string;
  content: string;
  /** uid of the App the file was generated from; unset for package-level files */
  appUid?: string;
}

// === BACKENDS ===
export type BackendId = 'python' | 'typescript' | 'ir';

export interface BackendDescriptor {
  id: BackendId;
  name: string;
  description: string;
}
