/**
 * compileLanguage - every package of a batch through one LanguageProvider
 *
 * Per package:
 *   <package>/<app module>     one module per App
 *   <package>/<index module>   re-exports plus execute(params) by "@type"
 *   symbolmaps/<package>/<app>.json, symbolmaps/<package>.json
 *
 * Files are yielded as soon as they are generated; nothing is written here.
 * With `onAppError`, an App that fails to compile is reported and left out of
 * its package; without it the error propagates. An App whose public name is
 * already taken in its package fails the same way.
 */

import type { CompiledFile, Logger, Package } from '@styx/types';
import { CodegenError } from '../errors/StyxError.js';
import type { App } from '../ir/App.js';
import { compileApp, emptyModule } from './compileApp.js';
import type { LanguageProvider, PackageIndexEntry } from './LanguageProvider.js';
import { collapse, docsToDocstring } from './lineBuffer.js';
import type { SymbolLUT } from './SymbolLUT.js';

export interface PackageApps {
  package: Package;
  apps: App[];
}

export interface CompileOptions {
  logger?: Logger;
  onAppError?: (app: App, error: unknown) => void;
}

function jsonFile(path: string, value: unknown): CompiledFile {
  return { path, content: `${JSON.stringify(value, null, 2)}\n` };
}

export function* compileLanguage(
  lang: LanguageProvider,
  packages: Iterable<PackageApps>,
  options: CompileOptions = {}
): Generator<CompiledFile> {
  const { logger, onAppError } = options;
  const globalScope = lang.languageScope();
  const packageIndex: Record<string, string> = {};

  for (const { package: pkg, apps } of packages) {
    const packageSymbol = globalScope.addOrDodge(lang.symbolVarCase(pkg.name));
    const packageScope = globalScope.child();
    const moduleScope = globalScope.child();
    const entries: PackageIndexEntry[] = [];
    const symbolMaps: Record<string, string> = {};

    for (const app of apps) {
      app.setup(pkg.name);
      const publicName = app.command.body.publicName ?? app.command.base.name;
      let lut: SymbolLUT;
      let content: string;
      try {
        const taken = symbolMaps[publicName];
        if (taken !== undefined) {
          throw new CodegenError(
            `App "${app.uid}" has the public name "${publicName}", already used in package "${pkg.name}"`,
            'ERR_DUPLICATE_APP',
            { app: app.uid, publicName, symbolMap: taken },
            'Rename the root struct of one of the Apps'
          );
        }
        const module = emptyModule();
        lut = compileApp(lang, pkg, app, packageScope, module);
        content = collapse(lang.generateModule(module));
      } catch (error) {
        if (onAppError === undefined) throw error;
        onAppError(app, error);
        continue;
      }
      const moduleSymbol = moduleScope.addOrDodge(lang.symbolVarCase(app.command.base.name));

      const path = lang.appModulePath(packageSymbol, moduleSymbol);
      logger?.debug('Generated module', { backend: lang.id, app: app.uid, path });
      yield { path, content, appUid: app.uid };

      const mapPath = `${pkg.name}/${lut.fnRootMakeParamsAndExecute}.json`;
      symbolMaps[publicName] = mapPath;
      yield jsonFile(`symbolmaps/${mapPath}`, lut.symbolMap());

      entries.push({ moduleSymbol, publicName, executeSymbol: lut.fnRootExecute });
    }

    yield jsonFile(`symbolmaps/${pkg.name}.json`, symbolMaps);
    packageIndex[pkg.name] = `${pkg.name}.json`;

    const index = lang.packageIndexModule(entries, docsToDocstring(pkg.docs));
    const indexPath = lang.packageIndexPath(packageSymbol);
    logger?.debug('Generated package index', { backend: lang.id, package: pkg.name, path: indexPath });
    yield { path: indexPath, content: collapse(lang.generateModule(index)) };
  }

  yield jsonFile('symbolmaps/index.json', packageIndex);
}
