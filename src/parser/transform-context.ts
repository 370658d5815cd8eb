import type * as AST from "../ast";
import { SymbolContext } from "./context";
import type { ParseChild, ParseTree } from "./shared";
import { MalformedTreeError } from "./shared";

/**
 * `hoisted` declares every name of a scope before its statements are
 * transformed, so a module may be called above its definition.
 * `sequential` resolves a name only once its definition has been visited.
 */
export type ResolutionMode = "hoisted" | "sequential";

export interface TransformOptions {
  resolution?: ResolutionMode;
}

/**
 * Whether a module is the value of a binding or an anonymous statement.
 * Only a top-level anonymous module may omit its `out` clause.
 */
export type ModuleRole = { kind: "bound"; name: string } | { kind: "anonymous"; topLevel: boolean };

type TransformFns = {
  transformExpression: (node: ParseChild | undefined) => AST.Expr;
  transformArith: (node: ParseChild | undefined, allowResult: boolean) => AST.Arith;
  transformCall: (node: ParseTree) => AST.ModuleInstance;
  transformStatement: (node: ParseChild) => AST.Stmt[];
  transformStatements: (nodes: ParseChild[]) => AST.Stmt[];
  transformModule: (node: ParseTree, role: ModuleRole) => AST.Module;
};

export interface TransformContext extends TransformFns {
  readonly symbols: SymbolContext;
  readonly resolution: ResolutionMode;
}

export type MutableTransformContext = TransformFns & { symbols: SymbolContext; resolution: ResolutionMode };

export function createTransformContext(options: TransformOptions = {}): MutableTransformContext {
  const uninitialized = (name: string) => (): never => {
    throw new MalformedTreeError(`${name} has not been configured on the TransformContext`);
  };
  return {
    symbols: new SymbolContext(),
    resolution: options.resolution ?? "hoisted",
    transformExpression: uninitialized("transformExpression"),
    transformArith: uninitialized("transformArith"),
    transformCall: uninitialized("transformCall"),
    transformStatement: uninitialized("transformStatement"),
    transformStatements: uninitialized("transformStatements"),
    transformModule: uninitialized("transformModule"),
  };
}

export function annotate<T extends AST.AstNode>(value: T, node: ParseChild | undefined): T {
  if (node?.span && !value.span) {
    value.span = node.span;
  }
  return value;
}
