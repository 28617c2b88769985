/**
 * IR dump - every App as the JSON document appFromJson reads back
 */

import type { CompiledFile } from '@styx/types';
import type { CompileOptions, PackageApps } from '../../codegen/compileLanguage.js';
import { appToJson } from '../../ir/serialize.js';

export function* dumpIr(packages: Iterable<PackageApps>, options: CompileOptions = {}): Generator<CompiledFile> {
  const { logger, onAppError } = options;
  for (const { package: pkg, apps } of packages) {
    for (const app of apps) {
      const path = `${pkg.name}/${app.command.base.name}.json`;
      let content: string;
      try {
        content = `${appToJson(app)}\n`;
      } catch (error) {
        if (onAppError === undefined) throw error;
        onAppError(app, error);
        continue;
      }
      logger?.debug('Dumped IR', { backend: 'ir', app: app.uid, path });
      yield { path, content, appUid: app.uid };
    }
  }
}
