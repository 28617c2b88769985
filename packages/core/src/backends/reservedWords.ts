/**
 * Reserved-word tables per target language
 *
 * Static JSON files under packages/core/data/reserved/, one per target:
 *   { "keywords": [...], "builtins": [...], "modules": [...], "runtime": [...] }
 * "runtime" lists the names generated modules import from the wrapper runtime.
 */

import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { ConfigError } from '../errors/StyxError.js';

export type ReservedTarget = 'python' | 'typescript';

export interface ReservedWords {
  keywords: string[];
  builtins: string[];
  modules: string[];
  runtime: string[];
}

const cache = new Map<ReservedTarget, ReservedWords>();

function dataDir(): string {
  const require = createRequire(import.meta.url);
  return join(dirname(require.resolve('@styx/core/package.json')), 'data', 'reserved');
}

function readSection(raw: Record<string, unknown>, section: string, path: string): string[] {
  const value = raw[section];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${section} must be a list of strings`, 'ERR_CONFIG_INVALID', { path });
  }
  return value;
}

export function loadReservedWords(target: ReservedTarget): ReservedWords {
  const cached = cache.get(target);
  if (cached) return cached;

  const path = join(dataDir(), `${target}.json`);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Reserved-word table must be an object', 'ERR_CONFIG_INVALID', { path });
  }
  const record = Object.fromEntries(Object.entries(raw));
  const words: ReservedWords = {
    keywords: readSection(record, 'keywords', path),
    builtins: readSection(record, 'builtins', path),
    modules: readSection(record, 'modules', path),
    runtime: readSection(record, 'runtime', path),
  };
  cache.set(target, words);
  return words;
}

export function allReservedWords(target: ReservedTarget): string[] {
  const words = loadReservedWords(target);
  return [...words.keywords, ...words.builtins, ...words.modules, ...words.runtime];
}
