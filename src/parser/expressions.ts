import * as AST from "../ast";
import type { ParseChild, ParseTree } from "./shared";
import {
  ArityMismatchError,
  MalformedTreeError,
  MisplacedResultError,
  UnknownModuleError,
  childAt,
  describeChild,
  expectArity,
  expectLabel,
  isToken,
  tokenText,
} from "./shared";
import type { MutableTransformContext, TransformContext } from "./transform-context";
import { annotate } from "./transform-context";

const LOGIC_LABELS = new Map<string, AST.LogicOperator>([
  ["expr_xor", "xor"],
  ["expr_and", "and"],
  ["expr_or", "or"],
]);

const TERM_LABELS = new Map<string, AST.TermOperator>([
  ["impl", "impl"],
  ["add", "+"],
  ["sub", "-"],
  ["eq", "eq"],
  ["arith_xor", "xor"],
  ["arith_and", "and"],
  ["arith_or", "or"],
]);

export function registerExpressionTransformers(ctx: MutableTransformContext): void {
  ctx.transformExpression = node => transformExpression(ctx, node);
  ctx.transformArith = (node, allowResult) => transformArith(ctx, node, allowResult);
  ctx.transformCall = node => transformCall(ctx, node);
}

function transformExpression(ctx: TransformContext, node: ParseChild | undefined): AST.Expr {
  if (!node) {
    throw new MalformedTreeError("missing expression");
  }
  if (isToken(node)) {
    return annotate(transformToken(ctx, node.value), node);
  }
  const operator = LOGIC_LABELS.get(node.label);
  if (operator) {
    expectArity(node, 2);
    const lhs = ctx.transformExpression(node.children[0]);
    const rhs = ctx.transformExpression(node.children[1]);
    return annotate(AST.binaryExpression(operator, lhs, rhs), node);
  }
  switch (node.label) {
    case "zero":
      return annotate(AST.zero(), node);
    case "one":
      return annotate(AST.one(), node);
    case "identifier":
      return annotate(resolveReference(ctx, tokenText(node)), node);
    case "mux": {
      expectArity(node, 3);
      const selector = ctx.transformExpression(node.children[0]);
      const whenTrue = ctx.transformExpression(node.children[1]);
      const whenFalse = ctx.transformExpression(node.children[2]);
      return annotate(AST.mux(selector, whenTrue, whenFalse), node);
    }
    case "scoped_expr":
      expectArity(node, 1);
      return ctx.transformExpression(node.children[0]);
    case "call":
      return ctx.transformCall(node);
    default:
      throw new MalformedTreeError(`unsupported expression ${describeChild(node)}`, node.span);
  }
}

function transformToken(ctx: TransformContext, text: string): AST.Expr {
  if (text === "0") return AST.zero();
  if (text === "1") return AST.one();
  return resolveReference(ctx, text);
}

/**
 * A name that is already bound resolves to its symbol; anything else becomes
 * a fresh unbound symbol (free input or a name defined later).
 */
function resolveReference(ctx: TransformContext, name: string): AST.SymbolRef {
  const existing = ctx.symbols.lookup(name);
  return ctx.symbols.toReference(existing ?? AST.symbol(name, null));
}

function transformArith(ctx: TransformContext, node: ParseChild | undefined, allowResult: boolean): AST.Arith {
  if (!node) {
    throw new MalformedTreeError("missing arithmetic term");
  }
  if (isToken(node)) {
    return ctx.transformExpression(node);
  }
  const operator = TERM_LABELS.get(node.label);
  if (operator) {
    expectArity(node, 2);
    const lhs = ctx.transformArith(node.children[0], allowResult);
    const rhs = ctx.transformArith(node.children[1], allowResult);
    return annotate(AST.binaryTerm(operator, lhs, rhs), node);
  }
  switch (node.label) {
    case "arith_not":
      expectArity(node, 1);
      return annotate(AST.not(ctx.transformArith(node.children[0], allowResult)), node);
    case "scoped_arith":
      expectArity(node, 1);
      return ctx.transformArith(node.children[0], allowResult);
    case "res":
      if (!allowResult) {
        throw new MisplacedResultError(node.span);
      }
      return annotate(AST.res(), node);
    default:
      return ctx.transformExpression(node);
  }
}

function transformCall(ctx: TransformContext, node: ParseTree): AST.ModuleInstance {
  expectArity(node, 2);
  const callee = childAt(node, 0);
  const name = tokenText(callee);
  const argsNode = expectLabel(node.children[1], "list_of_expr");
  const args = argsNode.children.map(child => ctx.transformExpression(child));

  const target = ctx.symbols.lookup(name);
  if (!target) {
    throw new UnknownModuleError(name, node.span);
  }
  const arity = ctx.symbols.arityOf(target);
  if (arity === null) {
    throw new UnknownModuleError(name, node.span);
  }
  if (arity !== args.length) {
    throw new ArityMismatchError(name, arity, args.length, node.span);
  }
  const calleeRef = annotate(ctx.symbols.toReference(target), callee);
  return annotate(AST.moduleInstance(calleeRef, args), node);
}
