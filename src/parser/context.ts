import * as AST from "../ast";
import { DuplicateDefinitionError, MalformedTreeError } from "./shared";

/** What the declaration pre-pass knows about a module-valued binding before its body is transformed. */
export interface ModuleSignature {
  arity: number;
}

interface Entry {
  symbol: AST.SymbolBinding;
  defined: boolean;
  signature?: ModuleSignature;
}

class Scope {
  readonly entries = new Map<string, Entry>();
  readonly order: string[] = [];

  get(name: string): Entry | undefined {
    return this.entries.get(name);
  }

  set(name: string, entry: Entry): void {
    if (!this.entries.has(name)) {
      this.order.push(name);
    }
    this.entries.set(name, entry);
  }

  symbols(): AST.SymbolBinding[] {
    const result: AST.SymbolBinding[] = [];
    for (const name of this.order) {
      const entry = this.entries.get(name);
      if (entry) result.push(entry.symbol);
    }
    return result;
  }
}

/**
 * Name table threaded through one transform pass. Scopes nest for module
 * bodies; entries are only ever added. Every named statement gets a slot in
 * the definition arena, and a symbol's `owner` is that slot's index.
 */
export class SymbolContext {
  private readonly scopes: Scope[] = [new Scope()];
  private readonly arena: (AST.Stmt | undefined)[] = [];

  get depth(): number {
    return this.scopes.length;
  }

  enterScope(): void {
    this.scopes.push(new Scope());
  }

  exitScope(): void {
    if (this.scopes.length === 1) {
      throw new MalformedTreeError("cannot leave the top-level scope");
    }
    this.scopes.pop();
  }

  lookup(name: string): AST.SymbolBinding | undefined {
    return this.lookupEntry(name)?.symbol;
  }

  /**
   * Reserves an arena slot for a name the current scope will define later,
   * so references that precede the definition already point at it. A second
   * declaration of the same name is left for `define` to reject.
   */
  declare(name: string, signature?: ModuleSignature): AST.SymbolBinding {
    const scope = this.current();
    const existing = scope.get(name);
    if (existing) {
      return existing.symbol;
    }
    const owner = this.arena.length;
    this.arena.push(undefined);
    const entry: Entry = { symbol: AST.symbol(name, owner), defined: false };
    if (signature) entry.signature = signature;
    scope.set(name, entry);
    return entry.symbol;
  }

  define(name: string, stmt: AST.Stmt, span?: AST.Span): AST.SymbolBinding {
    const scope = this.current();
    const existing = scope.get(name);
    if (existing?.defined) {
      throw new DuplicateDefinitionError(name, span);
    }
    if (existing && existing.symbol.owner !== null) {
      this.arena[existing.symbol.owner] = stmt;
      existing.defined = true;
      return existing.symbol;
    }
    const owner = this.arena.length;
    this.arena.push(stmt);
    const created = AST.symbol(name, owner);
    scope.set(name, { symbol: created, defined: true });
    return created;
  }

  defineParameter(name: string, span?: AST.Span): AST.SymbolBinding {
    const scope = this.current();
    if (scope.get(name)) {
      throw new DuplicateDefinitionError(name, span);
    }
    const created = AST.symbol(name, null);
    scope.set(name, { symbol: created, defined: true });
    return created;
  }

  definitionOf(target: AST.SymbolBinding): AST.Stmt | null {
    if (target.owner === null) return null;
    return this.arena[target.owner] ?? null;
  }

  isModule(target: AST.SymbolBinding): boolean {
    return this.arityOf(target) !== null;
  }

  /** Parameter count of a module-valued symbol, or null when the symbol is not a module. */
  arityOf(target: AST.SymbolBinding): number | null {
    const definition = this.definitionOf(target);
    if (definition) {
      return definition.type === "Bind" && definition.value.type === "Module" ? definition.value.params.length : null;
    }
    const entry = this.lookupEntry(target.name);
    if (entry && entry.symbol.owner === target.owner && entry.signature) {
      return entry.signature.arity;
    }
    return null;
  }

  toReference(target: AST.SymbolBinding): AST.SymbolRef {
    return AST.symbolRef(target);
  }

  /** Top-level symbols and the filled definition arena. */
  snapshot(): { context: AST.SymbolBinding[]; definitions: AST.Stmt[] } {
    const definitions: AST.Stmt[] = [];
    this.arena.forEach((stmt, index) => {
      if (!stmt) {
        throw new MalformedTreeError(`declared name at slot ${index} was never defined`);
      }
      definitions.push(stmt);
    });
    return { context: this.scopes[0].symbols(), definitions };
  }

  private current(): Scope {
    return this.scopes[this.scopes.length - 1];
  }

  private lookupEntry(name: string): Entry | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const entry = this.scopes[i].get(name);
      if (entry) return entry;
    }
    return undefined;
  }
}
