/**
 * Writes batch records below the output directory:
 *   <outputDir>/<backend>/<file path>
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { BackendError, type BatchRecord } from '@styx/core';

export interface WriteOptions {
  outputDir: string;
  force: boolean;
  dryRun: boolean;
}

export type WriteOutcome = 'created' | 'overwritten' | 'planned';

export function outputPath(outputDir: string, record: BatchRecord): string {
  return join(outputDir, record.backend, ...record.file.path.split('/'));
}

/**
 * Throws BackendError (ERR_WRITE_CONFLICT) when the file exists and `force` is off.
 * In dry-run mode nothing touches the disk.
 */
export function writeRecord(record: BatchRecord, options: WriteOptions): { path: string; outcome: WriteOutcome } {
  const path = outputPath(options.outputDir, record);
  if (options.dryRun) {
    return { path, outcome: 'planned' };
  }

  const exists = existsSync(path);
  if (exists && !options.force) {
    throw new BackendError(
      `File ${path} already exists`,
      'ERR_WRITE_CONFLICT',
      { input: record.input, backend: record.backend, path },
      'Use --force to overwrite existing files'
    );
  }

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, record.file.content, 'utf-8');
  return { path, outcome: exists ? 'overwritten' : 'created' };
}
