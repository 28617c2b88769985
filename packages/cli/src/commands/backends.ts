/**
 * Backends command - list backend ids with descriptions
 */

import { Command } from 'commander';
import { listBackends } from '@styx/core';

export function formatBackendList(): string[] {
  const backends = listBackends();
  const idWidth = Math.max(...backends.map(b => b.id.length));
  const nameWidth = Math.max(...backends.map(b => b.name.length));
  return [
    'Available backends:',
    '',
    ...backends.map(b => `  ${b.id.padEnd(idWidth)} - ${b.name.padEnd(nameWidth)} (${b.description})`),
  ];
}

export const backendsCommand = new Command('backends')
  .description('List available backends')
  .action(() => {
    for (const line of formatBackendList()) {
      console.log(line);
    }
  });
