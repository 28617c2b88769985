/**
 * Where a param token sits inside its parent struct
 */

import type { CmdArg, ConditionalGroup, Param, StructBody } from '@styx/types';

export interface TokenLocation {
  parent: Param<StructBody>;
  groupIndex: number;
  group: ConditionalGroup;
  cargIndex: number;
  carg: CmdArg;
  tokenIndex: number;
}

/**
 * First occurrence of `param` among the tokens of `parent`.
 */
export function locateToken(parent: Param<StructBody>, param: Param): TokenLocation | undefined {
  for (const [groupIndex, group] of parent.body.groups.entries()) {
    for (const [cargIndex, carg] of group.cargs.entries()) {
      const tokenIndex = carg.tokens.indexOf(param);
      if (tokenIndex >= 0) {
        return { parent, groupIndex, group, cargIndex, carg, tokenIndex };
      }
    }
  }
  return undefined;
}
