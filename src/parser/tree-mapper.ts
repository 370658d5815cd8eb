import * as AST from "../ast";
import type { ParseTree } from "./shared";
import { MalformedTreeError } from "./shared";
import type { TransformOptions } from "./transform-context";
import { createTransformContext } from "./transform-context";
import { registerDefinitionTransformers } from "./definitions";
import { registerExpressionTransformers } from "./expressions";
import { registerStatementTransformers } from "./statements";

/**
 * Turns a labeled parse tree into a `Circuit`. Each call owns a fresh symbol
 * context, so independent trees can be transformed side by side. Any
 * well-formedness violation throws a `TransformError`; nothing partial is
 * returned.
 */
export function transformTree(root: ParseTree, options: TransformOptions = {}): AST.Circuit {
  if (!root || root.kind !== "tree") {
    throw new MalformedTreeError("missing root node");
  }
  if (root.label !== "start") {
    throw new MalformedTreeError(`unexpected root node ${root.label}`, root.span);
  }

  const ctx = createTransformContext(options);
  registerExpressionTransformers(ctx);
  registerDefinitionTransformers(ctx);
  registerStatementTransformers(ctx);

  const statements = ctx.transformStatements(root.children);
  const { context, definitions } = ctx.symbols.snapshot();
  return AST.circuit(statements, context, definitions);
}
