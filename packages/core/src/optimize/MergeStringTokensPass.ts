/**
 * MergeStringTokensPass - coalesce adjacent literal tokens of a CmdArg
 *
 * "--out" "=" becomes "--out=". CmdArgs with a non-empty join keep their
 * tokens: the join text would otherwise be lost between them.
 */

import type { CmdArgToken } from '@styx/types';
import type { App } from '../ir/App.js';
import { iterCargs, iterStructsDeep } from '../ir/traverse.js';
import { OptimizerPass, type PassContext, type PassMetadata, type PassResult } from './OptimizerPass.js';

export class MergeStringTokensPass extends OptimizerPass {
  get metadata(): PassMetadata {
    return {
      name: 'MergeStringTokens',
      description: 'Merge neighbouring literal tokens',
      structural: false,
    };
  }

  run(app: App, context: PassContext): PassResult {
    let changes = 0;
    for (const struct of iterStructsDeep(app.command, false)) {
      for (const carg of iterCargs(struct.body)) {
        if (carg.join !== undefined && carg.join !== '') continue;

        const merged: CmdArgToken[] = [];
        for (const token of carg.tokens) {
          const last = merged[merged.length - 1];
          if (typeof token === 'string' && typeof last === 'string') {
            merged[merged.length - 1] = last + token;
          } else {
            merged.push(token);
          }
        }
        if (merged.length < carg.tokens.length) {
          changes += carg.tokens.length - merged.length;
          context.logger.debug('Merged literal tokens', { struct: struct.base.name, tokens: merged.length });
          carg.tokens = merged;
        }
      }
    }
    return { changes };
  }
}
