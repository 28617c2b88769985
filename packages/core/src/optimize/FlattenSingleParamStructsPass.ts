/**
 * FlattenSingleParamStructsPass - inline structs that wrap a single param
 *
 *   parent: [ ["-x"], [S] ]   S{ [["--y"], [y]] }
 *     ->
 *   parent: [ ["-x"], ["--y"], [y] ]
 *
 * S is inlined only where the parent renders the same argument list for every
 * assignment (checked against renderCommandLine in the optimizer tests):
 * - S sits in a struct (not a union), is not a list, has no outputs of its own
 * - S has one group, no group or struct join, and references one param C once
 * - S and C are not both nullable
 * - S is the only token of its CmdArg and the only param of its group
 * - when C can be absent while S is present (S nullable and C with a presence
 *   rule of its own, or S required and C with any presence rule), S's CmdArg
 *   is alone in an unjoined group of an unjoined parent
 * - no other child of the parent is named like C
 *
 * When S was nullable, C becomes nullable with a SET_TO_NONE default.
 */

import { SET_TO_NONE, type Param, type StructBody } from '@styx/types';
import type { App } from '../ir/App.js';
import { mergeDocs } from '../ir/docs.js';
import { isParamToken, isStruct } from '../ir/guards.js';
import { hasOwnPresenceRule, hasPresenceRule } from '../ir/presence.js';
import { countReferences, iterParamsShallow, iterStructsDeep } from '../ir/traverse.js';
import { locateToken, type TokenLocation } from './locate.js';
import { OptimizerPass, type PassContext, type PassMetadata, type PassResult } from './OptimizerPass.js';

interface Candidate {
  struct: Param<StructBody>;
  child: Param;
  location: TokenLocation;
}

export class FlattenSingleParamStructsPass extends OptimizerPass {
  get metadata(): PassMetadata {
    return {
      name: 'FlattenSingleParamStructs',
      description: 'Inline structs that wrap exactly one param',
      structural: true,
    };
  }

  run(app: App, context: PassContext): PassResult {
    let changes = 0;
    while (this.step(app, context)) changes++;
    return { changes };
  }

  step(app: App, context: PassContext): boolean {
    const candidate = this.findCandidate(app);
    if (candidate === undefined) return false;
    this.flatten(candidate, context);
    app.relink();
    return true;
  }

  /**
   * Number of structs the next run could flatten right now.
   */
  countCandidates(app: App): number {
    let count = 0;
    for (const struct of iterStructsDeep(app.command)) {
      if (this.check(app, struct) !== undefined) count++;
    }
    return count;
  }

  private findCandidate(app: App): Candidate | undefined {
    for (const struct of iterStructsDeep(app.command)) {
      const candidate = this.check(app, struct);
      if (candidate !== undefined) return candidate;
    }
    return undefined;
  }

  private check(app: App, struct: Param<StructBody>): Candidate | undefined {
    const parent = app.parentOf(struct);
    if (parent === undefined || !isStruct(parent)) return undefined;
    if (struct.list !== undefined || struct.base.outputs.length > 0) return undefined;

    const { body } = struct;
    const inner = body.groups[0];
    if (body.groups.length !== 1 || inner === undefined) return undefined;
    if (inner.join !== undefined || body.join !== undefined) return undefined;

    const children = [...iterParamsShallow(struct)];
    const child = children[0];
    if (children.length !== 1 || child === undefined) return undefined;
    if (countReferences(body, child) !== 1) return undefined;
    if (struct.nullable && child.nullable) return undefined;

    const location = locateToken(parent, struct);
    if (location === undefined) return undefined;
    const { carg, group } = location;
    if (carg.tokens.length !== 1) return undefined;

    const groupParams = group.cargs.flatMap(c => c.tokens.filter(isParamToken));
    if (groupParams.some(p => p !== struct)) return undefined;

    // While S is present its group is always emitted; if C can still be
    // absent, the group must render nothing without it
    const childGates = struct.nullable ? hasOwnPresenceRule(child) : hasPresenceRule(child);
    if (childGates && (group.cargs.length > 1 || group.join !== undefined || parent.body.join !== undefined)) {
      return undefined;
    }

    for (const sibling of iterParamsShallow(parent)) {
      if (sibling !== struct && sibling.base.name === child.base.name) return undefined;
    }

    return { struct, child, location };
  }

  private flatten({ struct, child, location }: Candidate, context: PassContext): void {
    const inner = struct.body.groups[0];
    if (inner === undefined) return;

    if (struct.nullable && !child.nullable) {
      child.nullable = true;
      child.defaultValue = SET_TO_NONE;
    }
    child.base.docs = mergeDocs(struct.base.docs, child.base.docs);

    location.group.cargs.splice(location.cargIndex, 1, ...inner.cargs);

    context.logger.debug('Flattened single-param struct', {
      id: struct.base.id,
      name: struct.base.name,
      child: child.base.name,
      parent: location.parent.base.name,
    });
  }
}
