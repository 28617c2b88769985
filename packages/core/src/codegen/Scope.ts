/**
 * Scope - a namespace of generated identifiers
 *
 * Scopes nest: a symbol taken in any enclosing scope is taken here too, while
 * siblings stay independent. The outermost scope of a target is seeded with its
 * reserved words.
 *
 *   language scope (keywords, builtins, runtime names)
 *     └─ package scope (module-level symbols of every App in the package)
 *          └─ function scope (locals)
 */

import { ScopeError } from '../errors/StyxError.js';

export class Scope {
  private readonly symbols = new Set<string>();

  constructor(private readonly parent?: Scope) {}

  /**
   * Root scope holding `reserved`.
   */
  static withReserved(reserved: Iterable<string>): Scope {
    const scope = new Scope();
    for (const word of reserved) scope.symbols.add(word);
    return scope;
  }

  child(): Scope {
    return new Scope(this);
  }

  has(symbol: string): boolean {
    return this.symbols.has(symbol) || (this.parent?.has(symbol) ?? false);
  }

  /**
   * Take `symbol` or fail if it is taken here or in an enclosing scope.
   */
  addOrDie(symbol: string): string {
    if (this.has(symbol)) {
      throw new ScopeError(`Symbol "${symbol}" is already taken`, 'ERR_SYMBOL_TAKEN', {},
        'Use addOrDodge() when a suffixed name is acceptable');
    }
    this.symbols.add(symbol);
    return symbol;
  }

  /**
   * Take `symbol`, or the first free `symbol_1`, `symbol_2`, ...
   */
  addOrDodge(symbol: string): string {
    let candidate = symbol;
    for (let i = 1; this.has(candidate); i++) {
      candidate = `${symbol}_${i}`;
    }
    this.symbols.add(candidate);
    return candidate;
  }

  /**
   * Symbols taken directly in this scope, in insertion order.
   */
  get ownSymbols(): string[] {
    return [...this.symbols];
  }
}
