/**
 * Base class for IR rewrite passes
 *
 * PASS CONTRACT:
 *
 * 1. Metadata - name, description, whether the pass edits tree structure
 * 2. Run - rewrites the App in place and reports how many rewrites it made
 * 3. Semantics - for every parameter assignment the rewritten tree renders the
 *    same command line as the input tree (see renderCommandLine)
 */

import type { Logger } from '@styx/types';
import type { App } from '../ir/App.js';

export interface PassMetadata {
  name: string;
  description: string;
  /** Moves params between structs/groups; the App is relinked afterwards */
  structural: boolean;
}

export interface PassContext {
  logger: Logger;
}

export interface PassResult {
  changes: number;
}

export abstract class OptimizerPass {
  abstract get metadata(): PassMetadata;

  abstract run(app: App, context: PassContext): PassResult;
}
