/**
 * Traversal over the IR param tree
 *
 * Children of a struct are the param tokens of its CmdArgs, in command-line
 * order. Children of a union are its alternatives.
 */

import type { CmdArg, IdType, Output, Param, StructBody, StructUnionBody } from '@styx/types';
import { isParamToken, isStruct, isStructUnion } from './guards.js';

export function* iterCargs(struct: StructBody): Generator<CmdArg> {
  for (const group of struct.groups) {
    yield* group.cargs;
  }
}

/**
 * Direct children: the param tokens of a struct, or the alternatives of a union.
 */
export function* iterParamsShallow(param: Param): Generator<Param> {
  if (isStruct(param)) {
    for (const carg of iterCargs(param.body)) {
      for (const token of carg.tokens) {
        if (isParamToken(token)) yield token;
      }
    }
  } else if (isStructUnion(param)) {
    yield* param.body.alts;
  }
}

/**
 * Pre-order walk below `param` (and `param` itself unless skipSelf).
 */
export function* iterParamsDeep(param: Param, skipSelf = true): Generator<Param> {
  if (!skipSelf) yield param;
  for (const child of iterParamsShallow(param)) {
    yield* iterParamsDeep(child, false);
  }
}

export function* iterStructsDeep(param: Param, skipSelf = true): Generator<Param<StructBody>> {
  for (const p of iterParamsDeep(param, skipSelf)) {
    if (isStruct(p)) yield p;
  }
}

export function* iterUnionsDeep(param: Param, skipSelf = true): Generator<Param<StructUnionBody>> {
  for (const p of iterParamsDeep(param, skipSelf)) {
    if (isStructUnion(p)) yield p;
  }
}

export function* iterOutputsDeep(param: Param): Generator<Output> {
  for (const p of iterParamsDeep(param, false)) {
    yield* p.base.outputs;
  }
}

export function hasOutputsDeep(param: Param): boolean {
  return !iterOutputsDeep(param).next().done;
}

/**
 * Outputs a struct's outputs object carries directly: its own, plus those
 * declared on its non-struct children.
 */
export function ownOutputs(struct: Param<StructBody>): Output[] {
  const outputs = [...struct.base.outputs];
  for (const child of iterParamsShallow(struct)) {
    if (!isStruct(child) && !isStructUnion(child)) {
      outputs.push(...child.base.outputs);
    }
  }
  return outputs;
}

/**
 * Children whose own outputs objects nest inside this struct's outputs.
 */
export function* iterOutputChildren(struct: Param<StructBody>): Generator<Param> {
  for (const child of iterParamsShallow(struct)) {
    if ((isStruct(child) || isStructUnion(child)) && hasOutputsDeep(child)) {
      yield child;
    }
  }
}

export function findParamById(root: Param, id: IdType): Param | undefined {
  for (const p of iterParamsDeep(root, false)) {
    if (p.base.id === id) return p;
  }
  return undefined;
}

/**
 * Count of param tokens referencing `param` inside `struct`.
 */
export function countReferences(struct: StructBody, param: Param): number {
  let count = 0;
  for (const carg of iterCargs(struct)) {
    for (const token of carg.tokens) {
      if (token === param) count++;
    }
  }
  return count;
}
