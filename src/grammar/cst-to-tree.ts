import type { CstElement, CstNode, CstNodeLocation, IToken } from "chevrotain";
import type * as AST from "../ast";
import type { ParseChild, ParseTree, Token } from "../parser/shared";
import { token, tree } from "../parser/shared";
import { GrammarError } from "./errors";

// Walks the chevrotain CST and emits the labeled, ordered parse tree.
// Infix chains are folded left to right into nested binary productions;
// `impl` folds to the right.

const PREFIX_TERM_LABELS = new Map<string, string>([
  ["impl", "impl"],
  ["eq", "eq"],
  ["xor", "arith_xor"],
  ["and", "arith_and"],
  ["or", "arith_or"],
  ["+", "add"],
  ["-", "sub"],
]);

export function cstToParseTree(cst: CstNode, origin?: string): ParseTree {
  const converter = new CstConverter(origin);
  return converter.circuit(cst);
}

class CstConverter {
  constructor(private readonly origin: string | undefined) {}

  circuit(node: CstNode): ParseTree {
    return tree("start", nodesOf(node, "statement").map(stmt => this.statement(stmt)), spanOfNode(node));
  }

  // ── Statements ─────────────────────────────────────────────────────────

  private statement(node: CstNode): ParseTree {
    const inner = onlyNode(node);
    switch (inner.name) {
      case "register":
        return this.register(inner);
      case "binding":
        return this.binding(inner);
      case "assertion":
        return tree("assert", [this.arith(firstNode(inner, "arith"))], spanOfNode(inner));
      case "assumption":
        return tree("assume", [this.arith(firstNode(inner, "arith"))], spanOfNode(inner));
      case "moduleDefinition":
        return tree("ano_module", [this.moduleDefinition(inner)], spanOfNode(inner));
      default:
        throw new GrammarError(`grammar: unexpected statement ${inner.name}`, { origin: this.origin });
    }
  }

  private register(node: CstNode): ParseTree {
    const name = nameToken(firstToken(node, "Identifier"));
    const init = this.bit(firstToken(node, "BitLiteral"));
    const next = this.expression(firstNode(node, "expression"));
    return tree("register", [name, init, next], spanOfNode(node));
  }

  private binding(node: CstNode): ParseTree {
    const name = nameToken(firstToken(node, "Identifier"));
    const moduleNode = nodesOf(node, "moduleDefinition")[0];
    const value = moduleNode ? this.moduleDefinition(moduleNode) : this.expression(firstNode(node, "expression"));
    return tree("bind", [name, value], spanOfNode(node));
  }

  // ── Modules ────────────────────────────────────────────────────────────

  private moduleDefinition(node: CstNode): ParseTree {
    const params = tree("list_of_variables", tokensOf(node, "params").map(nameToken));
    const children: ParseChild[] = [params];
    const contractNode = nodesOf(node, "contract")[0];
    if (contractNode) {
      const pre = this.arith(firstNode(contractNode, "pre"));
      const post = this.arith(firstNode(contractNode, "post"));
      children.push(tree("contract", [tree("precond", [pre]), tree("postcond", [post])], spanOfNode(contractNode)));
    }
    const bodyNode = firstNode(node, "body");
    const body: ParseChild[] = nodesOf(bodyNode, "statement").map(stmt => this.statement(stmt));
    const outNode = nodesOf(bodyNode, "outClause")[0];
    if (outNode) {
      body.push(tree("out", [this.expression(firstNode(outNode, "expression"))], spanOfNode(outNode)));
    }
    children.push(tree("body", body, spanOfNode(bodyNode)));
    return tree("module", children, spanOfNode(node));
  }

  // ── Expressions ────────────────────────────────────────────────────────

  private expression(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.xorExpression(operand)), "expr_or");
  }

  private xorExpression(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.andExpression(operand)), "expr_xor");
  }

  private andExpression(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.exprTerm(operand)), "expr_and");
  }

  private exprTerm(node: CstNode): ParseTree {
    const bitToken = tokensOf(node, "BitLiteral")[0];
    if (bitToken) {
      return this.bit(bitToken);
    }
    const inner = onlyNode(node);
    switch (inner.name) {
      case "reference":
        return this.reference(inner);
      case "scopedExpression":
        return tree("scoped_expr", [this.expression(firstNode(inner, "expression"))], spanOfNode(inner));
      case "muxExpression":
        return this.mux(inner);
      case "prefixExpression": {
        const operator = firstToken(inner, "operator").image;
        const [lhs, rhs] = nodesOf(inner, "operands").map(operand => this.exprTerm(operand));
        return tree(`expr_${operator}`, [lhs, rhs], spanOfNode(inner));
      }
      default:
        throw new GrammarError(`grammar: unexpected expression ${inner.name}`, { origin: this.origin });
    }
  }

  private reference(node: CstNode): ParseTree {
    const name = nameToken(firstToken(node, "Identifier"));
    if (tokensOf(node, "LParen").length === 0) {
      return tree("identifier", [name], name.span);
    }
    const args = nodesOf(node, "arguments").map(arg => this.expression(arg));
    return tree("call", [name, tree("list_of_expr", args)], spanOfNode(node));
  }

  private mux(node: CstNode): ParseTree {
    const operands = nodesOf(node, "operands").map(operand => this.exprTerm(operand));
    return tree("mux", operands, spanOfNode(node));
  }

  private bit(tok: IToken): ParseTree {
    const span = spanOfToken(tok);
    if (tok.image === "0") return tree("zero", [token("BitLiteral", "0", span)], span);
    if (tok.image === "1") return tree("one", [token("BitLiteral", "1", span)], span);
    throw new GrammarError(`grammar: expected a bit (0 or 1) but found '${tok.image}'`, {
      line: tok.startLine,
      column: tok.startColumn,
      origin: this.origin,
    });
  }

  // ── Assertion language ─────────────────────────────────────────────────

  private arith(node: CstNode): ParseTree {
    const lhs = this.eqArith(firstNode(node, "lhs"));
    const rhsNode = nodesOf(node, "rhs")[0];
    if (!rhsNode) {
      return lhs;
    }
    const rhs = this.arith(rhsNode);
    return tree("impl", [lhs, rhs], spanBetween(lhs.span, rhs.span));
  }

  private eqArith(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.orArith(operand)), "eq");
  }

  private orArith(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.xorArith(operand)), "arith_or");
  }

  private xorArith(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.andArith(operand)), "arith_xor");
  }

  private andArith(node: CstNode): ParseTree {
    return foldLeft(nodesOf(node, "operands").map(operand => this.addArith(operand)), "arith_and");
  }

  private addArith(node: CstNode): ParseTree {
    const operands = nodesOf(node, "operands").map(operand => this.arithTerm(operand));
    const operators = tokensOf(node, "operators");
    let acc = operands[0];
    for (let i = 1; i < operands.length; i++) {
      const label = operators[i - 1]?.image === "-" ? "sub" : "add";
      acc = tree(label, [acc, operands[i]], spanBetween(acc.span, operands[i].span));
    }
    return acc;
  }

  private arithTerm(node: CstNode): ParseTree {
    const resToken = tokensOf(node, "Res")[0];
    if (resToken) {
      return tree("res", [], spanOfToken(resToken));
    }
    const bitToken = tokensOf(node, "BitLiteral")[0];
    if (bitToken) {
      return this.bit(bitToken);
    }
    const inner = onlyNode(node);
    switch (inner.name) {
      case "notArith":
        return tree("arith_not", [this.arithTerm(firstNode(inner, "arithTerm"))], spanOfNode(inner));
      case "scopedArith":
        return tree("scoped_arith", [this.arith(firstNode(inner, "arith"))], spanOfNode(inner));
      case "prefixArith": {
        const operator = firstToken(inner, "operator").image;
        const label = PREFIX_TERM_LABELS.get(operator);
        if (!label) {
          throw new GrammarError(`grammar: unknown operator '${operator}'`, { origin: this.origin });
        }
        const [lhs, rhs] = nodesOf(inner, "operands").map(operand => this.arithTerm(operand));
        return tree(label, [lhs, rhs], spanOfNode(inner));
      }
      case "reference":
        return this.reference(inner);
      case "muxExpression":
        return this.mux(inner);
      default:
        throw new GrammarError(`grammar: unexpected term ${inner.name}`, { origin: this.origin });
    }
  }
}

// ── CST access ───────────────────────────────────────────────────────────

function isCstNode(element: CstElement): element is CstNode {
  return "children" in element;
}

function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isCstNode);
}

function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter((element): element is IToken => !isCstNode(element));
}

function firstNode(node: CstNode, key: string): CstNode {
  const found = nodesOf(node, key)[0];
  if (!found) {
    throw new GrammarError(`grammar: ${node.name} is missing ${key}`);
  }
  return found;
}

function firstToken(node: CstNode, key: string): IToken {
  const found = tokensOf(node, key)[0];
  if (!found) {
    throw new GrammarError(`grammar: ${node.name} is missing ${key}`);
  }
  return found;
}

function onlyNode(node: CstNode): CstNode {
  for (const elements of Object.values(node.children)) {
    for (const element of elements) {
      if (isCstNode(element)) return element;
    }
  }
  throw new GrammarError(`grammar: ${node.name} has no nested production`);
}

function foldLeft(operands: ParseTree[], label: string): ParseTree {
  let acc = operands[0];
  for (let i = 1; i < operands.length; i++) {
    acc = tree(label, [acc, operands[i]], spanBetween(acc.span, operands[i].span));
  }
  return acc;
}

function nameToken(tok: IToken): Token {
  return token("Identifier", tok.image, spanOfToken(tok));
}

// ── Spans ────────────────────────────────────────────────────────────────

function position(line: number | undefined, column: number | undefined): AST.Position | undefined {
  if (line === undefined || column === undefined || !Number.isFinite(line) || !Number.isFinite(column)) {
    return undefined;
  }
  return { line, column };
}

function spanOfToken(tok: IToken): AST.Span | undefined {
  const start = position(tok.startLine, tok.startColumn);
  const end = position(tok.endLine, tok.endColumn);
  return start && end ? { start, end } : undefined;
}

function spanOfNode(node: CstNode): AST.Span | undefined {
  const location: CstNodeLocation | undefined = node.location;
  if (!location) return undefined;
  const start = position(location.startLine, location.startColumn);
  const end = position(location.endLine, location.endColumn);
  return start && end ? { start, end } : undefined;
}

function spanBetween(first: AST.Span | undefined, last: AST.Span | undefined): AST.Span | undefined {
  return first && last ? { start: first.start, end: last.end } : undefined;
}
