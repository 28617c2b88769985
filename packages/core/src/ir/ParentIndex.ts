/**
 * ParentIndex - derived child → parent lookup for one param tree
 *
 * Nodes never store their parent. The index is rebuilt in one top-down pass
 * (App.relink) and must be rebuilt after any structural edit; a stale index
 * answers for nodes that are no longer in the tree.
 */

import type { Param } from '@styx/types';
import { ContractError } from '../errors/StyxError.js';
import { iterParamsShallow } from './traverse.js';

export class ParentIndex {
  private readonly parents = new Map<Param, Param>();
  private readonly root: Param;

  constructor(root: Param) {
    this.root = root;
    const stack: Param[] = [root];
    while (stack.length > 0) {
      const parent = stack.pop();
      if (parent === undefined) break;
      for (const child of iterParamsShallow(parent)) {
        this.parents.set(child, parent);
        stack.push(child);
      }
    }
  }

  /**
   * Parent of `param`, undefined for the root.
   */
  parentOf(param: Param): Param | undefined {
    if (param === this.root) return undefined;
    const parent = this.parents.get(param);
    if (parent === undefined) {
      throw new ContractError(
        `Param "${param.base.name}" is not part of the indexed tree`,
        'ERR_PARENT_MISSING',
        { paramId: param.base.id, paramName: param.base.name },
        'Relink the App after structural edits'
      );
    }
    return parent;
  }

  isRoot(param: Param): boolean {
    return param === this.root;
  }

  /**
   * Params from `param` up to and including the root.
   */
  pathToRoot(param: Param): Param[] {
    const path: Param[] = [param];
    let current = this.parentOf(param);
    while (current !== undefined) {
      path.push(current);
      current = this.parentOf(current);
    }
    return path;
  }

  /**
   * Names from the root down to `param`.
   */
  fullPath(param: Param): string[] {
    return this.pathToRoot(param).reverse().map(p => p.base.name);
  }

  rootOf(param: Param): Param {
    const path = this.pathToRoot(param);
    return path[path.length - 1] ?? param;
  }

  get size(): number {
    return this.parents.size;
  }
}
