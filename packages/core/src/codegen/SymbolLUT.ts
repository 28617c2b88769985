/**
 * SymbolLUT - every identifier the code generator will reference, by IR id
 *
 * Built in one pass over a set-up App before any code is emitted. Tables are
 * keyed by immutable ids, never by names, so lookups stay stable however the
 * names were legalized or dodged.
 */

import type { IdType, Param, StructBody } from '@styx/types';
import { ContractError } from '../errors/StyxError.js';
import type { App } from '../ir/App.js';
import { isStruct, isStructUnion } from '../ir/guards.js';
import { iterParamsDeep, iterParamsShallow, iterStructsDeep, ownOutputs } from '../ir/traverse.js';
import type { LanguageProvider } from './LanguageProvider.js';
import type { Scope } from './Scope.js';

/**
 * Map from IR id to a value that fails loudly on a missing or repeated id.
 */
export class IdTable<V> {
  private readonly entries = new Map<IdType, V>();

  constructor(readonly name: string) {}

  get(id: IdType): V {
    const value = this.entries.get(id);
    if (value === undefined) {
      throw new ContractError(`No ${this.name} symbol for id ${id}`, 'ERR_SYMBOL_MISSING', { paramId: id });
    }
    return value;
  }

  set(id: IdType, value: V): void {
    if (this.entries.has(id)) {
      throw new ContractError(`Duplicate ${this.name} symbol for id ${id}`, 'ERR_SYMBOL_DUPLICATE', { paramId: id });
    }
    this.entries.set(id, value);
  }

  has(id: IdType): boolean {
    return this.entries.has(id);
  }

  keys(): IdType[] {
    return [...this.entries.keys()];
  }

  values(): V[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

/** JSON view of one param in a symbol map */
export interface SymbolMapEntry {
  id: IdType;
  path: string[];
  /** Argument name in the parent's build-params function; absent for union alternatives */
  varParam?: string;
  typeParam: string;
  fnStructMakeParams?: string;
  properties?: Record<string, SymbolMapEntry>;
  variants?: Record<string, SymbolMapEntry>;
}

export interface SymbolMap {
  fnRootMakeParamsAndExecute: string;
  fnRootExecute: string;
  typeRootParams: string;
  properties: Record<string, SymbolMapEntry>;
}

export class SymbolLUT {
  // === ROOT ===
  /** Static metadata constant */
  objMetadata = '';
  /** Native arguments -> outputs: build-params followed by execute */
  fnRootMakeParamsAndExecute = '';
  fnRootExecute = '';

  // === PER STRUCT ===
  readonly typeStructParams = new IdTable<string>('params type');
  readonly typeStructParamsTagged = new IdTable<string>('tagged params type');
  readonly typeStructOutputs = new IdTable<string>('outputs type');
  readonly fnStructMakeParams = new IdTable<string>('build-params function');
  readonly fnStructMakeCargs = new IdTable<string>('build-cargs function');
  readonly fnStructMakeOutputs = new IdTable<string>('build-outputs function');
  readonly fnStructExecute = new IdTable<string>('execute function');
  readonly fnStructValidate = new IdTable<string>('validate function');

  // === PER UNION ===
  readonly fnDynUnionMakeCargs = new IdTable<string>('cargs dispatch function');
  readonly fnDynUnionMakeOutputs = new IdTable<string>('outputs dispatch function');
  readonly fnDynUnionValidate = new IdTable<string>('validate dispatch function');

  // === PER PARAM / OUTPUT ===
  readonly paramById = new IdTable<Param>('param');
  readonly typeParam = new IdTable<string>('param type');
  readonly varParam = new IdTable<string>('param variable');
  readonly varOutput = new IdTable<string>('output field');

  private constructor(private readonly app: App) {}

  get root(): Param<StructBody> {
    return this.app.command;
  }

  /**
   * Allocate every symbol of `app`. Module-level symbols go to `packageScope`
   * so Apps of one package never collide.
   */
  static create(lang: LanguageProvider, app: App, packageScope: Scope): SymbolLUT {
    app.assertSetUp();
    const lut = new SymbolLUT(app);
    const root = app.command;
    const appName = root.body.name;

    const functionScope = lang.languageScope().child();
    for (const local of ['runner', 'execution', 'cargs', 'ret', 'params']) {
      functionScope.addOrDie(local);
    }

    const varSym = (name: string): string => packageScope.addOrDodge(lang.symbolVarCase(name));
    const classSym = (name: string): string => packageScope.addOrDodge(lang.symbolClassCase(name));

    lut.objMetadata = packageScope.addOrDodge(lang.metadataSymbol(root.base.name));
    lut.fnRootMakeParamsAndExecute = varSym(root.base.name);
    lut.fnRootExecute = varSym(`${appName}_execute`);

    const registerStruct = (struct: Param<StructBody>, prefix: string): void => {
      const id = struct.base.id;
      lut.typeStructParams.set(id, classSym(`${prefix}_Parameters`));
      lut.typeStructParamsTagged.set(id, classSym(`${prefix}_ParametersTagged`));
      lut.typeStructOutputs.set(id, classSym(`${prefix}_Outputs`));
      lut.fnStructMakeParams.set(id, varSym(`${prefix}_params`));
      lut.fnStructMakeCargs.set(id, varSym(`${prefix}_cargs`));
      lut.fnStructMakeOutputs.set(id, varSym(`${prefix}_outputs`));
      lut.fnStructValidate.set(id, varSym(`${prefix}_validate`));
      lut.fnStructExecute.set(id, id === root.base.id ? lut.fnRootExecute : varSym(`${prefix}_execute`));
    };

    registerStruct(root, appName);
    for (const struct of iterStructsDeep(root)) {
      registerStruct(struct, `${appName}_${struct.body.name}`);
    }

    lut.paramById.set(root.base.id, root);
    for (const param of iterParamsDeep(root)) {
      lut.paramById.set(param.base.id, param);
      if (isStructUnion(param)) {
        const prefix = `${appName}_${param.base.name}`;
        lut.fnDynUnionMakeCargs.set(param.base.id, varSym(`${prefix}_cargs_dyn_fn`));
        lut.fnDynUnionMakeOutputs.set(param.base.id, varSym(`${prefix}_outputs_dyn_fn`));
        lut.fnDynUnionValidate.set(param.base.id, varSym(`${prefix}_validate_dyn_fn`));
      }
    }

    for (const struct of [root, ...iterStructsDeep(root)]) {
      lut.collectParamVars(lang, struct, functionScope);
      lut.collectOutputFields(lang, struct, packageScope);
    }

    lut.typeParam.set(root.base.id, lut.typeStructParams.get(root.base.id));
    for (const param of iterParamsDeep(root)) {
      lut.typeParam.set(param.base.id, lang.typeParam(param, lut));
    }

    return lut;
  }

  private collectParamVars(lang: LanguageProvider, struct: Param<StructBody>, functionScope: Scope): void {
    const scope = functionScope.child();
    for (const child of iterParamsShallow(struct)) {
      this.varParam.set(child.base.id, scope.addOrDodge(lang.symbolVarCase(child.base.name)));
    }
  }

  private collectOutputFields(lang: LanguageProvider, struct: Param<StructBody>, packageScope: Scope): void {
    const scope = packageScope.child();
    scope.addOrDie('root');
    const isRoot = struct === this.app.command;
    const streams = isRoot ? [this.app.captureStdout, this.app.captureStderr] : [];
    for (const stream of streams) {
      if (stream === undefined) continue;
      this.varOutput.set(stream.id, scope.addOrDodge(lang.symbolVarCase(stream.name)));
    }
    for (const output of ownOutputs(struct)) {
      this.varOutput.set(output.id, scope.addOrDodge(lang.symbolVarCase(output.name)));
    }
    for (const child of iterParamsShallow(struct)) {
      if (isStruct(child) || isStructUnion(child)) {
        this.varOutput.set(child.base.id, scope.addOrDodge(lang.symbolVarCase(child.base.name)));
      }
    }
  }

  /**
   * JSON-friendly view: for every param its name path and symbols, nested
   * the way the params object nests.
   */
  symbolMap(): SymbolMap {
    const root = this.app.command;
    const describe = (struct: Param<StructBody>): Record<string, SymbolMapEntry> => {
      const out: Record<string, SymbolMapEntry> = {};
      for (const child of iterParamsShallow(struct)) {
        const entry: SymbolMapEntry = {
          id: child.base.id,
          path: this.app.fullPath(child),
          varParam: this.varParam.get(child.base.id),
          typeParam: this.typeParam.get(child.base.id),
        };
        if (isStruct(child)) {
          entry.fnStructMakeParams = this.fnStructMakeParams.get(child.base.id);
          entry.properties = describe(child);
        } else if (isStructUnion(child)) {
          entry.variants = {};
          for (const alt of child.body.alts) {
            entry.variants[alt.body.publicName ?? alt.body.name] = {
              id: alt.base.id,
              path: this.app.fullPath(alt),
              typeParam: this.typeParam.get(alt.base.id),
              fnStructMakeParams: this.fnStructMakeParams.get(alt.base.id),
              properties: describe(alt),
            };
          }
        }
        out[child.base.name] = entry;
      }
      return out;
    };

    return {
      fnRootMakeParamsAndExecute: this.fnRootMakeParamsAndExecute,
      fnRootExecute: this.fnRootExecute,
      typeRootParams: this.typeStructParams.get(root.base.id),
      properties: describe(root),
    };
  }
}
