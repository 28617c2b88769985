/**
 * Backend registry - backend ids to generators of file records
 */

import type { BackendDescriptor, BackendId, CompiledFile } from '@styx/types';
import { compileLanguage, type CompileOptions, type PackageApps } from '../codegen/compileLanguage.js';
import { BackendError } from '../errors/StyxError.js';
import { dumpIr } from './ir/IrDumpBackend.js';
import { PythonLanguageProvider } from './python/PythonLanguageProvider.js';
import { TypeScriptLanguageProvider } from './typescript/TypeScriptLanguageProvider.js';

export interface Backend extends BackendDescriptor {
  compile(packages: Iterable<PackageApps>, options?: CompileOptions): Generator<CompiledFile>;
}

const BACKENDS: readonly Backend[] = [
  {
    id: 'python',
    name: 'Python',
    description: 'Python 3.10+ wrappers for the styxdefs runtime',
    compile: (packages, options) => compileLanguage(new PythonLanguageProvider(), packages, options),
  },
  {
    id: 'typescript',
    name: 'TypeScript',
    description: 'TypeScript wrappers for the styxdefs npm runtime',
    compile: (packages, options) => compileLanguage(new TypeScriptLanguageProvider(), packages, options),
  },
  {
    id: 'ir',
    name: 'IR',
    description: 'JSON dump of the (optimized) intermediate representation',
    compile: (packages, options) => dumpIr(packages, options),
  },
];

export function listBackends(): BackendDescriptor[] {
  return BACKENDS.map(({ id, name, description }) => ({ id, name, description }));
}

export function isBackendId(value: string): value is BackendId {
  return BACKENDS.some(backend => backend.id === value);
}

/**
 * Backend registered under `id`; throws BackendError (ERR_UNKNOWN_BACKEND) otherwise.
 */
export function getBackend(id: string): Backend {
  const backend = BACKENDS.find(b => b.id === id);
  if (backend === undefined) {
    throw new BackendError(
      `Unknown backend "${id}"`,
      'ERR_UNKNOWN_BACKEND',
      { backend: id },
      `Available backends: ${BACKENDS.map(b => b.id).join(', ')}`
    );
  }
  return backend;
}
