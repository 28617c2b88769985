import type { GenericModule, Package } from '@styx/types';
import type { App } from '../ir/App.js';
import type { LanguageProvider, LiteralValue } from './LanguageProvider.js';
import type { SymbolLUT } from './SymbolLUT.js';

/**
 * Static metadata constant the runtime receives when an execution starts.
 */
export function generateStaticMetadata(
  lang: LanguageProvider,
  module: GenericModule,
  lut: SymbolLUT,
  pkg: Package,
  app: App
): void {
  const entries: [string, LiteralValue][] = [
    ['id', app.uid],
    ['name', app.command.base.name],
    ['package', pkg.name],
  ];
  if (app.command.base.docs.literature.length > 0) {
    entries.push(['citations', [...app.command.base.docs.literature]]);
  }
  if (pkg.docker) {
    entries.push(['container_image_tag', pkg.docker]);
  }
  module.header.push(...lang.generateMetadata(lut.objMetadata, entries));
}
