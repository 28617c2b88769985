/**
 * compileBatch - many IR inputs through many backends
 *
 * Stages per batch:
 *   1. load each unit (and optimize it unless disabled)
 *   2. run every requested backend over the Apps that loaded
 *
 * A failure is scoped to the unit (load/optimize), to the backend (unknown id)
 * or to one input/backend pair (codegen). It is logged, recorded in the
 * DiagnosticCollector and the batch carries on with the rest.
 */

import { readFileSync } from 'node:fs';
import type { BackendId, CompiledFile, Logger, Package } from '@styx/types';
import { getBackend, type Backend } from '../backends/registry.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import type { App } from '../ir/App.js';
import { appFromJson } from '../ir/serialize.js';
import { silentLogger } from '../logging/Logger.js';
import { optimize } from '../optimize/Optimizer.js';

/**
 * One input of a batch. `load` runs inside the batch so a malformed input
 * becomes a diagnostic instead of aborting the caller.
 */
export interface CompileUnit {
  input: string;
  load(): App;
}

export interface CompileBatchOptions {
  backends: readonly string[];
  package: Package;
  /** Run the optimizer over every App first (default true) */
  optimize?: boolean;
  logger?: Logger;
  diagnostics?: DiagnosticCollector;
}

export interface BatchRecord {
  backend: BackendId;
  /** Input the file was generated from; package-level files have none */
  input?: string;
  file: CompiledFile;
}

export function unitFromFile(path: string): CompileUnit {
  return { input: path, load: () => appFromJson(readFileSync(path, 'utf-8')) };
}

export function unitFromJson(input: string, json: string): CompileUnit {
  return { input, load: () => appFromJson(json) };
}

export function unitFromApp(app: App, input: string = app.uid): CompileUnit {
  return { input, load: () => app };
}

/**
 * Yields file records as backends produce them. The generator's return value
 * is the collector holding every failure of the batch.
 */
export function* compileBatch(
  units: Iterable<CompileUnit>,
  options: CompileBatchOptions
): Generator<BatchRecord, DiagnosticCollector> {
  const baseLogger = options.logger ?? silentLogger();
  const logger = baseLogger.child('compile');
  const diagnostics = options.diagnostics ?? new DiagnosticCollector();
  const shouldOptimize = options.optimize ?? true;

  const apps: App[] = [];
  const inputs = new Map<string, string>();

  for (const unit of units) {
    try {
      const app = unit.load();
      if (shouldOptimize) {
        optimize(app, { logger: baseLogger });
      }
      apps.push(app);
      inputs.set(app.uid, unit.input);
      logger.debug('Loaded input', { input: unit.input, app: app.uid });
    } catch (error) {
      const diagnostic = diagnostics.addError(error, { input: unit.input });
      logger.error(`Failed to load ${unit.input}: ${diagnostic.message}`, { code: diagnostic.code });
    }
  }

  for (const id of options.backends) {
    const backend = resolveBackend(id, diagnostics, logger);
    if (backend === undefined) continue;

    const onAppError = (app: App, error: unknown): void => {
      const input = inputs.get(app.uid) ?? app.uid;
      const diagnostic = diagnostics.addError(error, { input, backend: backend.id });
      logger.error(`Failed to compile ${input} for ${backend.id}: ${diagnostic.message}`, {
        code: diagnostic.code,
      });
    };

    let count = 0;
    for (const file of backend.compile([{ package: options.package, apps }], { logger, onAppError })) {
      count++;
      const input = file.appUid === undefined ? undefined : inputs.get(file.appUid);
      yield { backend: backend.id, input, file };
    }
    logger.info(`${backend.name}: ${count} files`);
  }

  return diagnostics;
}

function resolveBackend(id: string, diagnostics: DiagnosticCollector, logger: Logger): Backend | undefined {
  try {
    return getBackend(id);
  } catch (error) {
    const diagnostic = diagnostics.addError(error, { backend: id });
    logger.error(diagnostic.message, { code: diagnostic.code });
    return undefined;
  }
}
