/**
 * App - one command-line tool: its root struct, captured streams and project
 *
 * Lifecycle: built once by a frontend (or appFromJson), rewritten in place by
 * the optimizer, then set up and treated as read-only by code generation.
 */

import type { AppData, IdType, Param, Project, StreamOutput, StructBody } from '@styx/types';
import { ContractError, IrError } from '../errors/StyxError.js';
import { ParentIndex } from './ParentIndex.js';
import { iterParamsDeep, iterStructsDeep } from './traverse.js';

export class App implements AppData {
  uid: string;
  command: Param<StructBody>;
  captureStdout?: StreamOutput;
  captureStderr?: StreamOutput;
  project: Project;

  private parents: ParentIndex;
  private setUp = false;

  constructor(data: AppData) {
    this.uid = data.uid;
    this.command = data.command;
    this.captureStdout = data.captureStdout;
    this.captureStderr = data.captureStderr;
    this.project = data.project;
    checkUniqueIds(this);
    this.parents = new ParentIndex(this.command);
  }

  /**
   * Recompute every parent reference from the root down.
   */
  relink(): void {
    this.parents = new ParentIndex(this.command);
  }

  /**
   * Link parents and derive discriminators. Later calls do nothing.
   */
  setup(packageName: string): void {
    if (this.setUp) return;
    this.relink();
    this.command.body.publicName = `${packageName}/${this.command.base.name}`;
    for (const struct of iterStructsDeep(this.command)) {
      struct.body.publicName = struct.body.name;
    }
    this.setUp = true;
  }

  get isSetUp(): boolean {
    return this.setUp;
  }

  assertSetUp(): void {
    if (!this.setUp) {
      throw new ContractError(
        `App "${this.command.base.name}" was not set up`,
        'ERR_APP_NOT_SET_UP',
        { paramName: this.command.base.name },
        'Call app.setup(packageName) before building symbols'
      );
    }
  }

  parentOf(param: Param): Param | undefined {
    return this.parents.parentOf(param);
  }

  pathToRoot(param: Param): Param[] {
    return this.parents.pathToRoot(param);
  }

  fullPath(param: Param): string[] {
    return this.parents.fullPath(param);
  }

  rootOf(param: Param): Param {
    return this.parents.rootOf(param);
  }

  isRoot(param: Param): boolean {
    return this.parents.isRoot(param);
  }
}

/**
 * Ids are shared by params, outputs and captured streams.
 */
function checkUniqueIds(app: AppData): void {
  const seen = new Map<IdType, string>();
  const claim = (id: IdType, what: string): void => {
    const previous = seen.get(id);
    if (previous !== undefined) {
      throw new IrError(`Id ${id} is used by both ${previous} and ${what}`, 'ERR_IR_DUPLICATE_ID', { paramId: id });
    }
    seen.set(id, what);
  };

  const visited = new Set<Param>();
  for (const param of iterParamsDeep(app.command, false)) {
    if (visited.has(param)) continue;
    visited.add(param);
    claim(param.base.id, `param "${param.base.name}"`);
    for (const output of param.base.outputs) {
      claim(output.id, `output "${output.name}"`);
    }
  }
  if (app.captureStdout) claim(app.captureStdout.id, `stream "${app.captureStdout.name}"`);
  if (app.captureStderr) claim(app.captureStderr.id, `stream "${app.captureStderr.name}"`);
}
