/**
 * IR fixtures shared by unit tests
 */

import {
  App,
  carg,
  createParam,
  emptyDocs,
  fileBody,
  group,
  intBody,
  stringBody,
  structBody,
  boolBody,
  unionBody,
} from '@styx/core';
import type { AppData, Package, Param, StructBody } from '@styx/types';

export function makeApp(command: Param<StructBody>, extra: Partial<Omit<AppData, 'command'>> = {}): App {
  return new App({
    uid: extra.uid ?? `${command.base.name}-uid`,
    command,
    captureStdout: extra.captureStdout,
    captureStderr: extra.captureStderr,
    project: extra.project ?? { docs: emptyDocs() },
  });
}

export function makePackage(name = 'pkg'): Package {
  return { name, docs: emptyDocs() };
}

/**
 * `dummy [X]` with one string positional X.
 */
export function dummyApp(): App {
  const x = createParam({ id: 2, name: 'x', body: stringBody() });
  const root = createParam({
    id: 1,
    name: 'dummy',
    body: structBody('dummy', [group(carg('dummy')), group(carg(x))]),
  });
  return makeApp(root);
}

/**
 * `tool [IN] [-o OUT] [-n N] [-v] [MODE]` with an output named after OUT and
 * a union MODE of two alternatives.
 *
 * ids: root 1, infile 2, out 3 (output 4), n 5, verbose 6, mode 7,
 *      fast 8 (level 9), slow 10 (output 11)
 */
export function toolApp(): App {
  const infile = createParam({ id: 2, name: 'infile', body: fileBody(), docs: { description: 'Input image' } });
  const out = createParam({
    id: 3,
    name: 'out',
    body: stringBody(),
    nullable: true,
    outputs: [
      {
        id: 4,
        name: 'result',
        tokens: [{ refId: 3, fileRemoveSuffixes: [] }, '.nii.gz'],
        docs: emptyDocs(),
        mediaTypes: [],
      },
    ],
  });
  const n = createParam({ id: 5, name: 'n', body: intBody(1, 10), nullable: true });
  const verbose = createParam({ id: 6, name: 'verbose', body: boolBody(['-v']), defaultValue: false });

  const level = createParam({ id: 9, name: 'level', body: intBody(0, 3) });
  const fast = createParam({
    id: 8,
    name: 'fast',
    body: structBody('fast', [group(carg('fast')), group(carg(level))]),
  });
  const slow = createParam({
    id: 10,
    name: 'slow',
    body: structBody('slow', [group(carg('slow'))]),
    outputs: [{ id: 11, name: 'log', tokens: ['slow.log'], docs: emptyDocs(), mediaTypes: [] }],
  });
  const mode = createParam({ id: 7, name: 'mode', body: unionBody([fast, slow]), nullable: true });

  const root = createParam({
    id: 1,
    name: 'tool',
    body: structBody('tool', [
      group(carg('tool')),
      group(carg(infile)),
      group(carg('-o'), carg(out)),
      group(carg('-n', n)),
      group(carg(verbose)),
      group(carg(mode)),
    ]),
  });
  return makeApp(root);
}
