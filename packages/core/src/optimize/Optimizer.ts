/**
 * Optimizer - runs the rewrite passes over an App in their fixed order
 *
 * Order matters: literal merging first so folding sees whole tokens, folding
 * before flattening so flag structs are not inlined, yes/no conversion last.
 * The App is relinked before the first pass and after every structural one.
 */

import type { Logger } from '@styx/types';
import type { App } from '../ir/App.js';
import { silentLogger } from '../logging/Logger.js';
import { FlattenSingleParamStructsPass } from './FlattenSingleParamStructsPass.js';
import { FoldConstantOptionalStructsPass } from './FoldConstantOptionalStructsPass.js';
import { MergeStringTokensPass } from './MergeStringTokensPass.js';
import type { OptimizerPass } from './OptimizerPass.js';
import { TruthyChoicesPass } from './TruthyChoicesPass.js';

export interface OptimizeOptions {
  logger?: Logger;
}

export interface PassReport {
  pass: string;
  changes: number;
}

export function defaultPasses(): OptimizerPass[] {
  return [
    new MergeStringTokensPass(),
    new FoldConstantOptionalStructsPass(),
    new FlattenSingleParamStructsPass(),
    new TruthyChoicesPass(),
  ];
}

export class Optimizer {
  private readonly logger: Logger;

  constructor(
    private readonly passes: OptimizerPass[] = defaultPasses(),
    options: OptimizeOptions = {}
  ) {
    this.logger = (options.logger ?? silentLogger()).child('optimizer');
  }

  run(app: App): PassReport[] {
    const reports: PassReport[] = [];
    app.relink();
    for (const pass of this.passes) {
      const { name, structural } = pass.metadata;
      const { changes } = pass.run(app, { logger: this.logger.child(name) });
      if (structural) app.relink();
      reports.push({ pass: name, changes });
      this.logger.debug('Pass finished', { pass: name, changes });
    }
    const total = reports.reduce((sum, r) => sum + r.changes, 0);
    this.logger.info(`Optimized "${app.command.base.name}"`, { rewrites: total });
    return reports;
  }
}

/**
 * Rewrite `app` in place with the default passes. Returns the same App.
 */
export function optimize(app: App, options: OptimizeOptions = {}): App {
  new Optimizer(defaultPasses(), options).run(app);
  return app;
}
