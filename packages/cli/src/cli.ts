#!/usr/bin/env -S node --import tsx
/**
 * @styx/cli - command line front door of the Styx compiler
 */

import { Command } from 'commander';
import { STYX_VERSION } from '@styx/core';
import { compileCommand } from './commands/compile.js';
import { backendsCommand } from './commands/backends.js';

const program = new Command();

program
  .name('styx')
  .description('Styx: compile command-line tool descriptions into typed wrappers')
  .version(STYX_VERSION);

program.addCommand(compileCommand);
program.addCommand(backendsCommand);

await program.parseAsync();
