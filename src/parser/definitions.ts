import * as AST from "../ast";
import type { ParseChild, ParseTree } from "./shared";
import {
  MalformedTreeError,
  MissingOutputError,
  expectArity,
  expectLabel,
  isTree,
  tokenText,
} from "./shared";
import type { ModuleRole, MutableTransformContext, TransformContext } from "./transform-context";
import { annotate } from "./transform-context";
import { collectDeclarations } from "./declarations";

export const STATEMENT_LABELS = new Set(["register", "bind", "assert", "assume", "ano_module", "stmt_seq"]);

export function registerDefinitionTransformers(ctx: MutableTransformContext): void {
  ctx.transformModule = (node, role) => transformModule(ctx, node, role);
}

interface ModuleShape {
  params: ParseTree;
  contract?: ParseTree;
  statements: ParseChild[];
  out?: ParseChild;
}

/**
 * Splits `module` children into parameters, the optional contract, body
 * statements and the optional output. The contract is recognized by label;
 * the body is either a `body` node or the remaining children, and a trailing
 * `out` node (or bare expression) is the output.
 */
function readModuleShape(node: ParseTree): ModuleShape {
  if (node.children.length === 0) {
    throw new MalformedTreeError("module is missing its parameter list", node.span);
  }
  const params = expectLabel(node.children[0], "list_of_variables");
  let rest = node.children.slice(1);

  let contract: ParseTree | undefined;
  const first = rest[0];
  if (isTree(first) && first.label === "contract") {
    contract = first;
    rest = rest.slice(1);
  }

  const only = rest[0];
  if (rest.length === 1 && isTree(only) && only.label === "body") {
    rest = only.children;
  }

  const last = rest[rest.length - 1];
  let out: ParseChild | undefined;
  if (isTree(last) && last.label === "out") {
    expectArity(last, 1);
    out = last;
    rest = rest.slice(0, -1);
  } else if (last && !(isTree(last) && STATEMENT_LABELS.has(last.label))) {
    out = last;
    rest = rest.slice(0, -1);
  }

  for (const stmt of rest) {
    if (!isTree(stmt) || !STATEMENT_LABELS.has(stmt.label)) {
      throw new MalformedTreeError(`module body expects statements but found ${isTree(stmt) ? stmt.label : "a token"}`, node.span);
    }
  }
  return { params, contract, statements: rest, out };
}

function transformModule(ctx: TransformContext, node: ParseTree, role: ModuleRole): AST.Module {
  const shape = readModuleShape(node);
  if (!shape.out) {
    if (role.kind === "bound") {
      throw new MissingOutputError(role.name, node.span);
    }
    if (!role.topLevel) {
      throw new MissingOutputError(null, node.span);
    }
  }

  const params = shape.params.children.map(param => ({ name: tokenText(param), span: param.span }));

  ctx.symbols.enterScope();
  try {
    for (const param of params) {
      ctx.symbols.defineParameter(param.name, param.span);
    }
    if (ctx.resolution === "hoisted") {
      for (const declaration of collectDeclarations(shape.statements)) {
        ctx.symbols.declare(declaration.name, declaration.signature);
      }
    }
    const contract = shape.contract ? transformContract(ctx, shape.contract) : undefined;
    const body = shape.statements.flatMap(stmt => ctx.transformStatement(stmt));
    const out = shape.out ? transformOut(ctx, shape.out) : undefined;
    return annotate(AST.moduleDefinition(params.map(param => param.name), body, out, contract), node);
  } finally {
    ctx.symbols.exitScope();
  }
}

function transformContract(ctx: TransformContext, node: ParseTree): AST.Contract {
  expectArity(node, 2);
  const preNode = expectLabel(node.children[0], "precond");
  const postNode = expectLabel(node.children[1], "postcond");
  expectArity(preNode, 1);
  expectArity(postNode, 1);
  const pre = annotate(AST.preCond(ctx.transformArith(preNode.children[0], false)), preNode);
  const post = annotate(AST.postCond(ctx.transformArith(postNode.children[0], true)), postNode);
  return annotate(AST.contract(pre, post), node);
}

function transformOut(ctx: TransformContext, node: ParseChild): AST.Out {
  const valueNode = isTree(node) && node.label === "out" ? node.children[0] : node;
  return annotate(AST.out(ctx.transformExpression(valueNode)), node);
}
