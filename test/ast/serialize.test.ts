import { describe, expect, test } from "vitest";

import * as AST from "../../src/ast";
import { serialize, serializeCircuit } from "../../src/serialize";

const ref = (name: string) => AST.symbolRef(AST.symbol(name));

describe("serialize", () => {
  test("values, orders and names", () => {
    expect(serialize(AST.zero())).toBe("0");
    expect(serialize(AST.one())).toBe("1");
    expect(serialize(AST.skip())).toBe("skip");
    expect(serialize(AST.fail())).toBe("fail");
    expect(serialize(ref("A"))).toBe("A");
  });

  test("logic operators are written in prefix form", () => {
    const expr = AST.exprXor(ref("C"), AST.exprAnd(ref("a"), AST.one()));
    expect(serialize(expr)).toBe("xor C and a 1");
    expect(serialize(AST.exprOr(ref("a"), ref("b")))).toBe("or a b");
  });

  test("mux of constants", () => {
    expect(serialize(AST.mux(AST.one(), AST.zero(), AST.one()))).toBe("mux 1 0 1");
  });

  test("module instance", () => {
    const instance = AST.moduleInstance(ref("add2"), [AST.zero(), ref("b")]);
    expect(serialize(instance)).toBe("add2(0, b)");
    expect(serialize(AST.moduleInstance(ref("k"), []))).toBe("k()");
  });

  test("assertion terms", () => {
    expect(serialize(AST.eq(AST.res(), AST.add(ref("a"), ref("b"))))).toBe("eq res + a b");
    expect(serialize(AST.impl(ref("p"), AST.sub(ref("q"), AST.one())))).toBe("impl p - q 1");
    expect(serialize(AST.not(AST.arithOr(ref("x"), ref("y"))))).toBe("not or x y");
    expect(serialize(AST.desugarNot(AST.not(ref("x"))))).toBe("xor x 1");
  });

  test("statements", () => {
    expect(serialize(AST.reg("A", AST.zero(), ref("A")))).toBe("A -> 0, A");
    expect(serialize(AST.bind("x", AST.exprAnd(ref("a"), ref("b"))))).toBe("x = and a b");
    expect(serialize(AST.assertStmt(AST.arithXor(ref("A"), ref("Ap"))))).toBe("assert xor A Ap");
    expect(serialize(AST.assumeStmt(AST.eq(ref("en"), AST.one())))).toBe("assume eq en 1");
  });

  test("module with contract and out", () => {
    const module = AST.moduleDefinition(
      ["a", "b"],
      [AST.bind("t", AST.exprXor(ref("a"), ref("b")))],
      AST.out(ref("t")),
      AST.contract(AST.preCond(ref("a")), AST.postCond(AST.eq(AST.res(), AST.add(ref("a"), ref("b"))))),
    );
    expect(serialize(module)).toBe("mod(a, b)[req a; ens eq res + a b]{t = xor a b; out t}");
  });

  test("module without contract has no brackets", () => {
    const module = AST.moduleDefinition(["a"], [], AST.out(ref("a")));
    expect(module.contract).toBeUndefined();
    expect(serialize(module)).toBe("mod(a){out a}");
    expect(serialize(AST.bind("id", module))).toBe("id = mod(a){out a}");
  });

  test("circuit is one newline-terminated line per statement", () => {
    const circuit = AST.circuit([
      AST.reg("A", AST.zero(), ref("A")),
      AST.assertStmt(ref("A")),
    ]);
    expect(serializeCircuit(circuit)).toBe("A -> 0, A\nassert A\n");
    expect(serializeCircuit(AST.circuit([]))).toBe("");
  });
});
