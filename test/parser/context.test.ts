import { describe, expect, test } from "vitest";

import * as AST from "../../src/ast";
import { SymbolContext } from "../../src/parser/context";
import { DuplicateDefinitionError, MalformedTreeError } from "../../src/parser/shared";

const ref = (name: string) => AST.symbolRef(AST.symbol(name));

describe("SymbolContext", () => {
  test("define gives each named statement an arena slot", () => {
    const symbols = new SymbolContext();
    const a: AST.SymbolBinding = symbols.define("A", AST.reg("A", AST.zero(), ref("A")));
    const x = symbols.define("x", AST.bind("x", AST.one()));
    expect(a).toEqual({ name: "A", owner: 0 });
    expect(x).toEqual({ name: "x", owner: 1 });
    expect(symbols.lookup("x")).toEqual(x);
    expect(symbols.lookup("missing")).toBeUndefined();
  });

  test("a second definition in one scope is rejected", () => {
    const symbols = new SymbolContext();
    symbols.define("A", AST.reg("A", AST.zero(), ref("A")));
    expect(() => symbols.define("A", AST.reg("A", AST.one(), ref("A")))).toThrow(DuplicateDefinitionError);
  });

  test("declared names keep their slot once defined", () => {
    const symbols = new SymbolContext();
    const declared = symbols.declare("f", { arity: 2 });
    expect(symbols.arityOf(declared)).toBe(2);
    const module = AST.moduleDefinition(["a", "b", "c"], [], AST.out(ref("a")));
    const defined = symbols.define("f", AST.bind("f", module));
    expect(defined).toEqual(declared);
    expect(symbols.arityOf(defined)).toBe(3);
  });

  test("inner scopes shadow and are discarded on exit", () => {
    const symbols = new SymbolContext();
    const outer = symbols.define("t", AST.bind("t", AST.zero()));
    symbols.enterScope();
    const param = symbols.defineParameter("t");
    expect(symbols.depth).toBe(2);
    expect(symbols.lookup("t")).toEqual(param);
    expect(param.owner).toBeNull();
    symbols.exitScope();
    expect(symbols.lookup("t")).toEqual(outer);
  });

  test("leaving the top-level scope is a malformed pass", () => {
    expect(() => new SymbolContext().exitScope()).toThrow(MalformedTreeError);
  });

  test("only module-valued bindings have an arity", () => {
    const symbols = new SymbolContext();
    const value = symbols.define("v", AST.bind("v", AST.one()));
    const register = symbols.define("r", AST.reg("r", AST.zero(), ref("r")));
    expect(symbols.isModule(value)).toBe(false);
    expect(symbols.arityOf(register)).toBeNull();
    expect(symbols.arityOf(AST.symbol("free"))).toBeNull();
  });

  test("snapshot lists top-level symbols and every definition", () => {
    const symbols = new SymbolContext();
    symbols.define("a", AST.bind("a", AST.one()));
    symbols.enterScope();
    symbols.define("inner", AST.bind("inner", AST.zero()));
    symbols.exitScope();
    const { context, definitions } = symbols.snapshot();
    expect(context).toEqual([{ name: "a", owner: 0 }]);
    expect(definitions.map(AST.definedName)).toEqual(["a", "inner"]);
  });

  test("snapshot rejects a declaration that was never defined", () => {
    const symbols = new SymbolContext();
    symbols.declare("ghost");
    expect(() => symbols.snapshot()).toThrow(MalformedTreeError);
  });
});
