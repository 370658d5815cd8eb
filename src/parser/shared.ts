import type * as AST from "../ast";

// Labeled parse tree handed over by the grammar. The transformer only reads
// labels, ordered children and token text.

export interface Token {
  kind: "token";
  type: string;
  value: string;
  span?: AST.Span;
}

export interface ParseTree {
  kind: "tree";
  label: string;
  children: ParseChild[];
  span?: AST.Span;
}

export type ParseChild = ParseTree | Token;

export function tree(label: string, children: ParseChild[] = [], span?: AST.Span): ParseTree {
  return span ? { kind: "tree", label, children, span } : { kind: "tree", label, children };
}

export function token(type: string, value: string, span?: AST.Span): Token {
  return span ? { kind: "token", type, value, span } : { kind: "token", type, value };
}

export function isTree(child: ParseChild | undefined): child is ParseTree {
  return child !== undefined && child.kind === "tree";
}

export function isToken(child: ParseChild | undefined): child is Token {
  return child !== undefined && child.kind === "token";
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export type TransformErrorCode =
  | "duplicate-definition"
  | "unknown-module"
  | "arity-mismatch"
  | "malformed-tree"
  | "missing-output"
  | "misplaced-result";

export class TransformError extends Error {
  readonly code: TransformErrorCode;
  readonly span?: AST.Span;

  constructor(code: TransformErrorCode, message: string, span?: AST.Span) {
    super(message);
    this.name = "TransformError";
    this.code = code;
    this.span = span;
  }
}

export class DuplicateDefinitionError extends TransformError {
  readonly symbolName: string;

  constructor(symbolName: string, span?: AST.Span) {
    super("duplicate-definition", `transformer: '${symbolName}' is already defined`, span);
    this.name = "DuplicateDefinitionError";
    this.symbolName = symbolName;
  }
}

export class UnknownModuleError extends TransformError {
  readonly symbolName: string;

  constructor(symbolName: string, span?: AST.Span) {
    super("unknown-module", `transformer: '${symbolName}' does not name a module`, span);
    this.name = "UnknownModuleError";
    this.symbolName = symbolName;
  }
}

export class ArityMismatchError extends TransformError {
  readonly symbolName: string;
  readonly expected: number;
  readonly actual: number;

  constructor(symbolName: string, expected: number, actual: number, span?: AST.Span) {
    super(
      "arity-mismatch",
      `transformer: module '${symbolName}' expects ${expected} argument(s) but was called with ${actual}`,
      span,
    );
    this.name = "ArityMismatchError";
    this.symbolName = symbolName;
    this.expected = expected;
    this.actual = actual;
  }
}

export class MalformedTreeError extends TransformError {
  constructor(message: string, span?: AST.Span) {
    super("malformed-tree", `transformer: ${message}`, span);
    this.name = "MalformedTreeError";
  }
}

/** `symbolName` is null for an anonymous module nested in another module. */
export class MissingOutputError extends TransformError {
  readonly symbolName: string | null;

  constructor(symbolName: string | null, span?: AST.Span) {
    super(
      "missing-output",
      symbolName === null
        ? "transformer: nested anonymous module has no out clause"
        : `transformer: module bound to '${symbolName}' has no out clause`,
      span,
    );
    this.name = "MissingOutputError";
    this.symbolName = symbolName;
  }
}

export class MisplacedResultError extends TransformError {
  constructor(span?: AST.Span) {
    super("misplaced-result", "transformer: 'res' is only allowed in a post-condition", span);
    this.name = "MisplacedResultError";
  }
}

// -----------------------------------------------------------------------------
// Child access
// -----------------------------------------------------------------------------

export function expectLabel(node: ParseChild | undefined, ...labels: string[]): ParseTree {
  if (!isTree(node)) {
    throw new MalformedTreeError(`expected ${labels.join(" or ")} but found ${describeChild(node)}`, node?.span);
  }
  if (labels.length > 0 && !labels.includes(node.label)) {
    throw new MalformedTreeError(`expected ${labels.join(" or ")} but found ${node.label}`, node.span);
  }
  return node;
}

export function expectArity(node: ParseTree, count: number): void {
  if (node.children.length !== count) {
    throw new MalformedTreeError(
      `${node.label} expects ${count} child(ren) but has ${node.children.length}`,
      node.span,
    );
  }
}

/** Name carried by an `Identifier` token or an `identifier` production. */
export function tokenText(node: ParseChild | undefined): string {
  if (isToken(node) && node.type === "Identifier") {
    return node.value;
  }
  if (isTree(node) && node.label === "identifier" && node.children.length === 1) {
    const inner = node.children[0];
    if (isToken(inner) && inner.type === "Identifier") {
      return inner.value;
    }
  }
  throw new MalformedTreeError(`expected a name but found ${describeChild(node)}`, node?.span);
}

export function childAt(node: ParseTree, index: number): ParseChild {
  const child = node.children[index];
  if (!child) {
    throw new MalformedTreeError(`${node.label} is missing child ${index}`, node.span);
  }
  return child;
}

export function describeChild(node: ParseChild | undefined): string {
  if (!node) return "nothing";
  return node.kind === "tree" ? node.label : `token '${node.value}'`;
}
