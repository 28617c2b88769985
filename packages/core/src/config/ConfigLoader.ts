import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYAML } from 'yaml';
import { isLogLevel, type BackendId, type LogLevel } from '@styx/types';
import { isBackendId } from '../backends/registry.js';
import { ConfigError } from '../errors/StyxError.js';

/**
 * Styx configuration schema.
 *
 * Location: styx.config.yaml (preferred) or styx.config.json (fallback)
 * in the working directory.
 *
 * Example styx.config.yaml:
 *
 * ```yaml
 * backends: [python, typescript]
 * outputDir: build
 * optimize: true
 * logLevel: info
 *
 * package:
 *   name: sampletools
 *   version: "1.0.0"
 *   docker: example/sampletools:1.0.0
 *   docs:
 *     title: Sample Tools
 *     authors: [Jane Doe]
 * ```
 *
 * CLI flags override every field.
 */
export interface StyxConfig {
  backends: BackendId[];
  outputDir: string;
  optimize: boolean;
  logLevel: LogLevel;
  /** Overwrite files that already exist in the output directory */
  force: boolean;
  project?: ProjectConfig;
  package?: PackageConfig;
}

export interface DocsConfig {
  title?: string;
  description?: string;
  authors?: string[];
  literature?: string[];
  urls?: string[];
}

export interface ProjectConfig {
  name?: string;
  version?: string;
  license?: string;
  docs?: DocsConfig;
}

export interface PackageConfig {
  name?: string;
  version?: string;
  docker?: string;
  docs?: DocsConfig;
}

export const CONFIG_FILE_YAML = 'styx.config.yaml';
export const CONFIG_FILE_JSON = 'styx.config.json';

export const DEFAULT_CONFIG: StyxConfig = {
  backends: ['python'],
  outputDir: 'build',
  optimize: true,
  logLevel: 'info',
  force: false,
};

/**
 * Load Styx config from a directory.
 *
 * Priority:
 * 1. styx.config.yaml
 * 2. styx.config.json
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Unreadable files and invalid fields throw ConfigError (ERR_CONFIG_INVALID).
 */
export function loadConfig(
  directory: string,
  logger: { debug: (msg: string) => void } = { debug: () => undefined }
): StyxConfig {
  const yamlPath = join(directory, CONFIG_FILE_YAML);
  const jsonPath = join(directory, CONFIG_FILE_JSON);

  if (existsSync(yamlPath)) {
    logger.debug(`Loading ${yamlPath}`);
    return parseConfig(readConfigFile(yamlPath, content => parseYAML(content)), yamlPath);
  }

  if (existsSync(jsonPath)) {
    logger.debug(`Loading ${jsonPath}`);
    return parseConfig(readConfigFile(jsonPath, content => JSON.parse(content)), jsonPath);
  }

  return { ...DEFAULT_CONFIG, backends: [...DEFAULT_CONFIG.backends] };
}

function readConfigFile(path: string, parse: (content: string) => unknown): unknown {
  try {
    return parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(
      `Failed to parse ${path}: ${error.message}`,
      'ERR_CONFIG_INVALID',
      { path },
      'Fix the syntax error or delete the file to use defaults'
    );
  }
}

/**
 * Validate a parsed config document and merge it with the defaults.
 * THROWS ConfigError naming the first invalid field.
 */
export function parseConfig(value: unknown, source = 'config'): StyxConfig {
  // An empty YAML document parses to null
  if (value === undefined || value === null) {
    return { ...DEFAULT_CONFIG, backends: [...DEFAULT_CONFIG.backends] };
  }
  const obj = expectObject(value, '', source);

  return {
    backends: validateBackends(obj.backends, source),
    outputDir: optionalString(obj.outputDir, 'outputDir', source) ?? DEFAULT_CONFIG.outputDir,
    optimize: optionalBoolean(obj.optimize, 'optimize', source) ?? DEFAULT_CONFIG.optimize,
    logLevel: validateLogLevel(obj.logLevel, source),
    force: optionalBoolean(obj.force, 'force', source) ?? DEFAULT_CONFIG.force,
    project: validateProject(obj.project, source),
    package: validatePackage(obj.package, source),
  };
}

export function validateBackends(value: unknown, source = 'config'): BackendId[] {
  if (value === undefined || value === null) {
    return [...DEFAULT_CONFIG.backends];
  }
  if (!Array.isArray(value)) {
    invalid('backends', `must be an array, got ${typeof value}`, source);
  }
  const backends: BackendId[] = [];
  value.forEach((entry: unknown, i) => {
    if (typeof entry !== 'string' || !isBackendId(entry)) {
      invalid(`backends[${i}]`, `is not a known backend: ${JSON.stringify(entry)}`, source);
    }
    backends.push(entry);
  });
  return backends;
}

function validateLogLevel(value: unknown, source: string): LogLevel {
  if (value === undefined || value === null) return DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(value)) {
    invalid('logLevel', `must be one of silent, errors, warnings, info, debug, got ${JSON.stringify(value)}`, source);
  }
  return value;
}

function validateProject(value: unknown, source: string): ProjectConfig | undefined {
  if (value === undefined || value === null) return undefined;
  const obj = expectObject(value, 'project', source);
  return {
    name: optionalString(obj.name, 'project.name', source),
    version: optionalString(obj.version, 'project.version', source),
    license: optionalString(obj.license, 'project.license', source),
    docs: validateDocs(obj.docs, 'project.docs', source),
  };
}

function validatePackage(value: unknown, source: string): PackageConfig | undefined {
  if (value === undefined || value === null) return undefined;
  const obj = expectObject(value, 'package', source);
  return {
    name: optionalString(obj.name, 'package.name', source),
    version: optionalString(obj.version, 'package.version', source),
    docker: optionalString(obj.docker, 'package.docker', source),
    docs: validateDocs(obj.docs, 'package.docs', source),
  };
}

function validateDocs(value: unknown, field: string, source: string): DocsConfig | undefined {
  if (value === undefined || value === null) return undefined;
  const obj = expectObject(value, field, source);
  return {
    title: optionalString(obj.title, `${field}.title`, source),
    description: optionalString(obj.description, `${field}.description`, source),
    authors: optionalStringList(obj.authors, `${field}.authors`, source),
    literature: optionalStringList(obj.literature, `${field}.literature`, source),
    urls: optionalStringList(obj.urls, `${field}.urls`, source),
  };
}

function expectObject(value: unknown, field: string, source: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    invalid(field || '(root)', `must be an object, got ${Array.isArray(value) ? 'array' : typeof value}`, source);
  }
  return Object.fromEntries(Object.entries(value));
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    invalid(field, `must be a string, got ${typeof value}`, source);
  }
  if (!value.trim()) {
    invalid(field, 'cannot be empty or whitespace-only', source);
  }
  return value;
}

function optionalBoolean(value: unknown, field: string, source: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    invalid(field, `must be a boolean, got ${typeof value}`, source);
  }
  return value;
}

function optionalStringList(value: unknown, field: string, source: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    invalid(field, `must be an array, got ${typeof value}`, source);
  }
  return value.map((entry: unknown, i) => {
    if (typeof entry !== 'string') {
      invalid(`${field}[${i}]`, `must be a string, got ${typeof entry}`, source);
    }
    return entry;
  });
}

function invalid(field: string, problem: string, source: string): never {
  throw new ConfigError(
    `Config error: ${field} ${problem}`,
    'ERR_CONFIG_INVALID',
    { path: source, field }
  );
}
