import type { Arith, Expr, LogicOperator, TermOperator } from "./ast";
import { toInt } from "./ast";

// Reference semantics of the operators. Nothing here simulates a circuit:
// only closed terms (no symbols, instances or `res`) can be evaluated.

export type Bit = 0 | 1;

export class OpenTermError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OpenTermError";
  }
}

export function xorBit(a: Bit, b: Bit): Bit { return a === b ? 0 : 1; }
export function andBit(a: Bit, b: Bit): Bit { return a === 1 && b === 1 ? 1 : 0; }
export function orBit(a: Bit, b: Bit): Bit { return a === 1 || b === 1 ? 1 : 0; }
export function notBit(a: Bit): Bit { return xorBit(a, 1); }
export function eqBit(a: Bit, b: Bit): Bit { return notBit(xorBit(a, b)); }
export function implBit(a: Bit, b: Bit): Bit { return orBit(notBit(a), b); }
export function muxBit(selector: Bit, whenTrue: Bit, whenFalse: Bit): Bit {
  return orBit(andBit(selector, whenTrue), andBit(notBit(selector), whenFalse));
}

export function applyLogic(operator: LogicOperator, a: Bit, b: Bit): Bit {
  switch (operator) {
    case "xor":
      return xorBit(a, b);
    case "and":
      return andBit(a, b);
    case "or":
      return orBit(a, b);
  }
}

export function evaluateExpr(expr: Expr): Bit {
  switch (expr.type) {
    case "Zero":
    case "One":
      return toInt(expr);
    case "BinaryExpression":
      return applyLogic(expr.operator, evaluateExpr(expr.lhs), evaluateExpr(expr.rhs));
    case "Mux":
      return muxBit(evaluateExpr(expr.selector), evaluateExpr(expr.whenTrue), evaluateExpr(expr.whenFalse));
    case "SymbolRef":
      throw new OpenTermError(`cannot evaluate free name '${expr.symbol.name}'`);
    case "ModuleInstance":
      throw new OpenTermError(`cannot evaluate instance of '${expr.callee.symbol.name}'`);
  }
}

/**
 * Evaluates a closed assertion term. `+` and `-` are integer arithmetic;
 * the logical operators read any non-zero operand as 1.
 */
export function evaluateArith(term: Arith): number {
  switch (term.type) {
    case "BinaryTerm":
      return applyTerm(term.operator, evaluateArith(term.lhs), evaluateArith(term.rhs));
    case "Not":
      return notBit(asBit(evaluateArith(term.operand)));
    case "Res":
      throw new OpenTermError("cannot evaluate 'res' outside of a module");
    default:
      return evaluateExpr(term);
  }
}

function applyTerm(operator: TermOperator, a: number, b: number): number {
  switch (operator) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "eq":
      return a === b ? 1 : 0;
    case "impl":
      return implBit(asBit(a), asBit(b));
    case "xor":
    case "and":
    case "or":
      return applyLogic(operator, asBit(a), asBit(b));
  }
}

function asBit(value: number): Bit {
  return value === 0 ? 0 : 1;
}
