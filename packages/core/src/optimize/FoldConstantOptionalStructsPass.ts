/**
 * FoldConstantOptionalStructsPass - parameter-free optional structs become flags
 *
 * A nullable, non-list struct without any descendant param always renders the
 * same literal text when present, so it is a presence flag:
 *
 *   S?{ "--verbose" }   ->   S: Bool(true=["--verbose"], false=[]) = false
 *
 * In a group guarded by several params an absent struct renders nothing, while
 * an absent single-token flag renders "". Where that difference would show, the
 * flag moves into a group of its own, which is exact only when every other
 * CmdArg of the group is a lone param that also renders nothing when absent.
 * Structs where neither placement keeps the command line are left alone.
 */

import type { ConditionalGroup, Param, StructBody } from '@styx/types';
import { ContractError } from '../errors/StyxError.js';
import type { App } from '../ir/App.js';
import { isParamToken, isStruct } from '../ir/guards.js';
import { hasPresenceRule } from '../ir/presence.js';
import { renderCommandLine, rendersAsList } from '../ir/render.js';
import { iterCargs, iterParamsDeep, iterStructsDeep } from '../ir/traverse.js';
import { locateToken, type TokenLocation } from './locate.js';
import { OptimizerPass, type PassContext, type PassMetadata, type PassResult } from './OptimizerPass.js';

type Placement = 'in-place' | 'own-group';

interface Candidate {
  struct: Param<StructBody>;
  valueTrue: string[];
  location: TokenLocation;
  placement: Placement;
}

export class FoldConstantOptionalStructsPass extends OptimizerPass {
  get metadata(): PassMetadata {
    return {
      name: 'FoldConstantOptionalStructs',
      description: 'Turn parameter-free optional structs into bool flags',
      structural: true,
    };
  }

  run(app: App, context: PassContext): PassResult {
    let changes = 0;
    while (this.step(app, context)) changes++;
    return { changes };
  }

  /**
   * Fold the first candidate and relink. False when there is none.
   */
  step(app: App, context: PassContext): boolean {
    const candidate = this.findCandidate(app);
    if (candidate === undefined) return false;
    this.fold(candidate, context);
    app.relink();
    return true;
  }

  /**
   * Number of structs the next run could fold right now.
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
    if (!struct.nullable || struct.list !== undefined) return undefined;
    const parent = app.parentOf(struct);
    if (parent === undefined || !isStruct(parent)) return undefined;
    if (iterParamsDeep(struct).next().done !== true) return undefined;
    // A struct rendering nothing would become a flag that is never set
    const valueTrue = renderCommandLine(struct, {});
    if (valueTrue.length === 0) return undefined;

    const location = locateToken(parent, struct);
    if (location === undefined) return undefined;
    const placement = this.placement(struct, valueTrue, location);
    if (placement === undefined) return undefined;
    return { struct, valueTrue, location, placement };
  }

  private placement(struct: Param<StructBody>, valueTrue: string[], location: TokenLocation): Placement | undefined {
    const { group, carg } = location;
    const guarded = group.cargs.some(other =>
      other.tokens.some(token => isParamToken(token) && token !== struct && hasPresenceRule(token))
    );
    // Unguarded, the group is gated on the struct alone; a multi-token flag
    // renders as a list and a shared CmdArg collapses to one string either way
    if (!guarded || valueTrue.length > 1 || carg.tokens.length > 1) return 'in-place';

    if (group.join !== undefined) return undefined;
    const splittable = group.cargs.every(other => {
      if (other === carg) return true;
      const [only] = other.tokens;
      return other.tokens.length === 1 && only !== undefined && isParamToken(only) && hasPresenceRule(only) && rendersAsList(only);
    });
    return splittable ? 'own-group' : undefined;
  }

  private fold({ struct, valueTrue, location, placement }: Candidate, context: PassContext): void {
    for (const carg of iterCargs(struct.body)) {
      if (carg.tokens.some(isParamToken)) {
        throw new ContractError(
          `Struct "${struct.base.name}" has no params but references one in its tokens`,
          'ERR_OPTIMIZER_CONTRACT',
          { paramId: struct.base.id, paramName: struct.base.name }
        );
      }
    }

    const param: Param = struct;
    param.body = { kind: 'bool', valueTrue, valueFalse: [] };
    param.nullable = false;
    param.defaultValue = false;
    delete param.choices;

    if (placement === 'own-group') this.isolate(location);
    context.logger.debug('Folded constant optional struct', {
      id: param.base.id,
      name: param.base.name,
      valueTrue,
      placement,
    });
  }

  /**
   * Split the group around the CmdArg at `location`, keeping order.
   */
  private isolate({ parent, group, groupIndex, carg, cargIndex }: TokenLocation): void {
    if (group.cargs.length === 1) return;
    const before = group.cargs.slice(0, cargIndex);
    const after = group.cargs.slice(cargIndex + 1);
    const replacement: ConditionalGroup[] = [];
    if (before.length > 0) replacement.push({ cargs: before });
    replacement.push({ cargs: [carg] });
    if (after.length > 0) replacement.push({ cargs: after });
    parent.body.groups.splice(groupIndex, 1, ...replacement);
  }
}
