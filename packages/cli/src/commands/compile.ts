/**
 * Compile command - IR JSON inputs to wrapper sources via compileBatch
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import {
  DiagnosticCollector,
  MultiLogger,
  StyxError,
  compileBatch,
  createDocs,
  createLogger,
  loadConfig,
  unitFromFile,
  type CompileUnit,
  type Logger,
  type StyxConfig,
} from '@styx/core';
import { isLogLevel, type Documentation, type LogLevel, type Package, type Project } from '@styx/types';
import { formatDiagnostic, formatError } from '../utils/errorFormatter.js';
import { writeRecord } from '../utils/outputWriter.js';

export interface CompileCommandOptions {
  backend?: string;
  outputDir?: string;
  packageName?: string;
  packageVersion?: string;
  packageDocker?: string;
  packageTitle?: string;
  packageDescription?: string;
  packageAuthors?: string;
  packageLiterature?: string;
  packageUrls?: string;
  /** false only when --no-optimize is given */
  optimize?: boolean;
  dryRun?: boolean;
  force?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

/**
 * Where the command reads config from and prints to. Tests swap these.
 */
export interface CompileEnv {
  cwd: string;
  out: (line: string) => void;
  err: (line: string) => void;
}

const defaultEnv = (): CompileEnv => ({
  cwd: process.cwd(),
  out: line => console.log(line),
  err: line => console.error(line),
});

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * --log-level wins, then --verbose, then the config file.
 * Returns undefined for an unknown --log-level.
 */
export function resolveLogLevel(options: CompileCommandOptions, config: StyxConfig): LogLevel | undefined {
  if (options.logLevel !== undefined) {
    return isLogLevel(options.logLevel) ? options.logLevel : undefined;
  }
  if (options.verbose) return 'debug';
  return config.logLevel;
}

export function resolvePackage(options: CompileCommandOptions, config: StyxConfig): Package {
  const fromConfig = config.package;
  const docs = fromConfig?.docs;
  return {
    name: options.packageName ?? fromConfig?.name ?? 'unknown',
    version: options.packageVersion ?? fromConfig?.version,
    docker: options.packageDocker ?? fromConfig?.docker,
    docs: createDocs({
      title: options.packageTitle ?? docs?.title,
      description: options.packageDescription ?? docs?.description,
      authors: options.packageAuthors !== undefined ? splitList(options.packageAuthors) : docs?.authors,
      literature: options.packageLiterature !== undefined ? splitList(options.packageLiterature) : docs?.literature,
      urls: options.packageUrls !== undefined ? splitList(options.packageUrls) : docs?.urls,
    }),
  };
}

function resolveProject(config: StyxConfig): Project | undefined {
  if (config.project === undefined) return undefined;
  const docs: Documentation = createDocs(config.project.docs);
  return {
    name: config.project.name,
    version: config.project.version,
    license: config.project.license,
    docs,
  };
}

/**
 * Runs one compile and returns the exit status: 1 when anything failed.
 */
export async function runCompile(
  inputs: string[],
  options: CompileCommandOptions,
  env: CompileEnv = defaultEnv()
): Promise<number> {
  let config: StyxConfig;
  try {
    config = loadConfig(env.cwd);
  } catch (error) {
    if (!(error instanceof StyxError)) throw error;
    formatError(error.message, error.suggestion ? [error.suggestion] : undefined).forEach(env.err);
    return 1;
  }

  const logLevel = resolveLogLevel(options, config);
  if (logLevel === undefined) {
    formatError(`Unknown log level "${options.logLevel}"`, [
      'Use one of: silent, errors, warnings, info, debug',
    ]).forEach(env.err);
    return 1;
  }

  const logFile = options.logFile ? resolve(env.cwd, options.logFile) : undefined;
  const logger: Logger = createLogger(logLevel, logFile ? { logFile } : undefined);

  const outputDir = resolve(env.cwd, options.outputDir ?? config.outputDir);
  const backends = options.backend !== undefined ? splitList(options.backend) : config.backends;
  const force = options.force ?? config.force;
  const dryRun = options.dryRun ?? false;
  const project = resolveProject(config);

  const units: CompileUnit[] = inputs.map(input => {
    const unit = unitFromFile(resolve(env.cwd, input));
    return {
      input,
      load: () => {
        const app = unit.load();
        if (project !== undefined) app.project = project;
        return app;
      },
    };
  });

  const diagnostics = new DiagnosticCollector();
  let written = 0;

  for (const record of compileBatch(units, {
    backends,
    package: resolvePackage(options, config),
    optimize: options.optimize === false ? false : config.optimize,
    logger,
    diagnostics,
  })) {
    try {
      const { path, outcome } = writeRecord(record, { outputDir, force, dryRun });
      if (outcome === 'planned') {
        env.out(`Would create: ${path}`);
      } else {
        written++;
        logger.debug(outcome === 'created' ? 'Created' : 'Overwrote', { path });
      }
    } catch (error) {
      if (!(error instanceof StyxError)) throw error;
      const diagnostic = diagnostics.addError(error);
      logger.warn(diagnostic.message, { code: diagnostic.code });
    }
  }

  if (!dryRun) {
    env.out(`Wrote ${written} files to ${outputDir}`);
  }

  if (diagnostics.count() > 0) {
    for (const diagnostic of diagnostics.getAll()) {
      formatDiagnostic(diagnostic).forEach(env.err);
    }
    env.err(diagnostics.summary());
  }

  if (logger instanceof MultiLogger) {
    await logger.close();
  }

  return diagnostics.hasErrors() ? 1 : 0;
}

export const compileCommand = new Command('compile')
  .description('Compile IR documents into wrapper libraries')
  .argument('<inputs...>', 'IR JSON files')
  .option('-b, --backend <ids>', 'Comma-separated backend ids (see: styx backends)')
  .option('-o, --output-dir <dir>', 'Output directory')
  .option('--package-name <name>', 'Package name for generated code')
  .option('--package-version <version>', 'Package version')
  .option('--package-docker <image>', 'Container image the tools run in')
  .option('--package-title <title>', 'Package documentation title')
  .option('--package-description <text>', 'Package description')
  .option('--package-authors <names>', 'Comma-separated package authors')
  .option('--package-literature <refs>', 'Comma-separated literature references')
  .option('--package-urls <urls>', 'Comma-separated documentation URLs')
  .option('--no-optimize', 'Skip the IR optimizer')
  .option('--dry-run', 'List the files that would be written, write nothing')
  .option('--force', 'Overwrite existing output files')
  .option('-v, --verbose', 'Show debug logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  styx compile bet.json                          Python wrappers in ./build/python
  styx compile *.json -b python,typescript       Several backends at once
  styx compile bet.json -b ir --no-optimize      Dump the IR as read
  styx compile bet.json --dry-run                Show what would be written
`)
  .action(async (inputs: string[], options: CompileCommandOptions) => {
    process.exitCode = await runCompile(inputs, options);
  });
