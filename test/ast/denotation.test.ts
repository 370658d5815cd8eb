import { describe, expect, test } from "vitest";

import * as AST from "../../src/ast";
import {
  OpenTermError,
  evaluateArith,
  evaluateExpr,
  implBit,
  muxBit,
  xorBit,
} from "../../src/denotation";

describe("denotation", () => {
  test("truth tables", () => {
    expect([xorBit(0, 0), xorBit(0, 1), xorBit(1, 0), xorBit(1, 1)]).toEqual([0, 1, 1, 0]);
    expect([implBit(0, 0), implBit(0, 1), implBit(1, 0), implBit(1, 1)]).toEqual([1, 1, 0, 1]);
    expect(muxBit(1, 0, 1)).toBe(0);
    expect(muxBit(0, 0, 1)).toBe(1);
  });

  test("mux 1 0 1 evaluates to 0", () => {
    expect(evaluateExpr(AST.mux(AST.one(), AST.zero(), AST.one()))).toBe(0);
  });

  test("closed logic expressions", () => {
    const expr = AST.exprOr(AST.exprAnd(AST.one(), AST.zero()), AST.exprXor(AST.one(), AST.zero()));
    expect(evaluateExpr(expr)).toBe(1);
  });

  test("arithmetic terms are integers", () => {
    expect(evaluateArith(AST.add(AST.one(), AST.one()))).toBe(2);
    expect(evaluateArith(AST.sub(AST.zero(), AST.one()))).toBe(-1);
    expect(evaluateArith(AST.eq(AST.add(AST.one(), AST.one()), AST.add(AST.one(), AST.one())))).toBe(1);
    expect(evaluateArith(AST.impl(AST.add(AST.one(), AST.one()), AST.zero()))).toBe(0);
  });

  test("not agrees with its xor desugaring", () => {
    for (const value of [AST.zero(), AST.one()]) {
      const negated = AST.not(value);
      expect(evaluateArith(negated)).toBe(evaluateArith(AST.desugarNot(negated)));
    }
  });

  test("open terms are rejected", () => {
    expect(() => evaluateExpr(AST.symbolRef(AST.symbol("a")))).toThrow(OpenTermError);
    expect(() => evaluateArith(AST.res())).toThrow(OpenTermError);
  });
});
