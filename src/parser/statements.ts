import * as AST from "../ast";
import type { ParseChild } from "./shared";
import {
  MalformedTreeError,
  describeChild,
  expectArity,
  expectLabel,
  isTree,
  tokenText,
} from "./shared";
import type { MutableTransformContext, TransformContext } from "./transform-context";
import { annotate } from "./transform-context";
import { collectDeclarations } from "./declarations";

export function registerStatementTransformers(ctx: MutableTransformContext): void {
  ctx.transformStatement = node => transformStatement(ctx, node);
  ctx.transformStatements = nodes => transformStatements(ctx, nodes);
}

/** Transforms one scope's statements in order, after the declaration pre-pass when hoisting. */
function transformStatements(ctx: TransformContext, nodes: ParseChild[]): AST.Stmt[] {
  if (ctx.resolution === "hoisted") {
    for (const declaration of collectDeclarations(nodes)) {
      ctx.symbols.declare(declaration.name, declaration.signature);
    }
  }
  const statements: AST.Stmt[] = [];
  for (const node of nodes) {
    statements.push(...ctx.transformStatement(node));
  }
  return statements;
}

function transformStatement(ctx: TransformContext, node: ParseChild): AST.Stmt[] {
  if (!isTree(node)) {
    throw new MalformedTreeError(`expected a statement but found ${describeChild(node)}`, node.span);
  }
  switch (node.label) {
    case "register": {
      expectArity(node, 3);
      const name = tokenText(node.children[0]);
      const init = ctx.transformExpression(node.children[1]);
      if (!AST.isValue(init)) {
        throw new MalformedTreeError(`register '${name}' must start from 0 or 1`, node.span);
      }
      const next = ctx.transformExpression(node.children[2]);
      const stmt = annotate(AST.reg(name, init, next), node);
      ctx.symbols.define(name, stmt, node.span);
      return [stmt];
    }
    case "bind": {
      expectArity(node, 2);
      const name = tokenText(node.children[0]);
      const valueNode = node.children[1];
      const value = isTree(valueNode) && valueNode.label === "module"
        ? ctx.transformModule(valueNode, { kind: "bound", name })
        : ctx.transformExpression(valueNode);
      const stmt = annotate(AST.bind(name, value), node);
      ctx.symbols.define(name, stmt, node.span);
      return [stmt];
    }
    case "assert":
      expectArity(node, 1);
      return [annotate(AST.assertStmt(ctx.transformArith(node.children[0], false)), node)];
    case "assume":
      expectArity(node, 1);
      return [annotate(AST.assumeStmt(ctx.transformArith(node.children[0], false)), node)];
    case "ano_module": {
      expectArity(node, 1);
      const moduleNode = expectLabel(node.children[0], "module");
      return [ctx.transformModule(moduleNode, { kind: "anonymous", topLevel: ctx.symbols.depth === 1 })];
    }
    case "stmt_seq":
      return node.children.flatMap(child => ctx.transformStatement(child));
    default:
      throw new MalformedTreeError(`unsupported statement ${node.label}`, node.span);
  }
}
