// =============================================================================
// dvrtl AST (registers, combinational expressions, contract-carrying modules)
// =============================================================================

export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export interface AstNode {
  type: string;
  span?: Span;
}

// -----------------------------------------------------------------------------
// Values v ::= 0 | 1
// -----------------------------------------------------------------------------

export interface Zero extends AstNode { type: 'Zero'; }
export interface One extends AstNode { type: 'One'; }

export type Value = Zero | One;

export function zero(): Zero { return { type: 'Zero' }; }
export function one(): One { return { type: 'One' }; }
export function bit(value: 0 | 1): Value { return value === 1 ? one() : zero(); }

export function toInt(value: Value): 0 | 1 {
  switch (value.type) {
    case 'Zero':
      return 0;
    case 'One':
      return 1;
  }
}

export function isValue(node: AstNode): node is Value {
  return node.type === 'Zero' || node.type === 'One';
}

// -----------------------------------------------------------------------------
// Orders o ::= skip | fail
// Outcome of a verification statement; produced and consumed downstream.
// -----------------------------------------------------------------------------

export interface Skip extends AstNode { type: 'Skip'; }
export interface Fail extends AstNode { type: 'Fail'; }

export type Order = Skip | Fail;

export function skip(): Skip { return { type: 'Skip' }; }
export function fail(): Fail { return { type: 'Fail' }; }

// -----------------------------------------------------------------------------
// Symbols
// -----------------------------------------------------------------------------

/**
 * A name paired with the index of the statement that introduced it in the
 * circuit's definition arena. `owner` is null for free names and module
 * parameters. Identity is the name alone; see {@link sameSymbol}.
 */
export interface SymbolBinding {
  readonly name: string;
  readonly owner: number | null;
}

export function symbol(name: string, owner: number | null = null): SymbolBinding {
  return { name, owner };
}

export function sameSymbol(a: SymbolBinding, b: SymbolBinding): boolean {
  return a.name === b.name;
}

// -----------------------------------------------------------------------------
// Expressions e ::= e xor e | e and e | e or e | mux e e e | v | r | x | x (e,...,e)
// -----------------------------------------------------------------------------

export type LogicOperator = 'xor' | 'and' | 'or';

export interface SymbolRef extends AstNode {
  type: 'SymbolRef';
  symbol: SymbolBinding;
}

export interface BinaryExpression extends AstNode {
  type: 'BinaryExpression';
  operator: LogicOperator;
  operands: [Expr, Expr];
  lhs: Expr;
  rhs: Expr;
}

export interface Mux extends AstNode {
  type: 'Mux';
  operands: [Expr, Expr, Expr];
  selector: Expr;
  whenTrue: Expr;
  whenFalse: Expr;
}

export interface ModuleInstance extends AstNode {
  type: 'ModuleInstance';
  callee: SymbolRef;
  arguments: Expr[];
}

export type Expr = Value | SymbolRef | BinaryExpression | Mux | ModuleInstance;

export function symbolRef(target: SymbolBinding): SymbolRef {
  return { type: 'SymbolRef', symbol: target };
}

export function binaryExpression(operator: LogicOperator, lhs: Expr, rhs: Expr): BinaryExpression {
  return { type: 'BinaryExpression', operator, operands: [lhs, rhs], lhs, rhs };
}
export function exprXor(lhs: Expr, rhs: Expr): BinaryExpression { return binaryExpression('xor', lhs, rhs); }
export function exprAnd(lhs: Expr, rhs: Expr): BinaryExpression { return binaryExpression('and', lhs, rhs); }
export function exprOr(lhs: Expr, rhs: Expr): BinaryExpression { return binaryExpression('or', lhs, rhs); }

export function mux(selector: Expr, whenTrue: Expr, whenFalse: Expr): Mux {
  return { type: 'Mux', operands: [selector, whenTrue, whenFalse], selector, whenTrue, whenFalse };
}

export function moduleInstance(callee: SymbolRef, args: Expr[]): ModuleInstance {
  return { type: 'ModuleInstance', callee, arguments: args };
}

export function isExpr(node: AstNode): node is Expr {
  switch (node.type) {
    case 'Zero':
    case 'One':
    case 'SymbolRef':
    case 'BinaryExpression':
    case 'Mux':
    case 'ModuleInstance':
      return true;
    default:
      return false;
  }
}

// -----------------------------------------------------------------------------
// Arithmetic a ::= a impl a | a + a | a - a | a eq a | a xor a | a and a | a or a | not a | e
// Only used inside assertions, assumptions and contracts.
// -----------------------------------------------------------------------------

export type TermOperator = 'impl' | '+' | '-' | 'eq' | LogicOperator;

export interface BinaryTerm extends AstNode {
  type: 'BinaryTerm';
  operator: TermOperator;
  operands: [Arith, Arith];
  lhs: Arith;
  rhs: Arith;
}

/** Logical negation; means `xor a 1`. */
export interface Not extends AstNode {
  type: 'Not';
  operand: Arith;
}

/** The enclosing module's output, valid only in a post-condition. */
export interface Res extends AstNode { type: 'Res'; }

export type Arith = BinaryTerm | Not | Res | Expr;

export function binaryTerm(operator: TermOperator, lhs: Arith, rhs: Arith): BinaryTerm {
  return { type: 'BinaryTerm', operator, operands: [lhs, rhs], lhs, rhs };
}
export function impl(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('impl', lhs, rhs); }
export function add(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('+', lhs, rhs); }
export function sub(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('-', lhs, rhs); }
export function eq(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('eq', lhs, rhs); }
export function arithXor(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('xor', lhs, rhs); }
export function arithAnd(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('and', lhs, rhs); }
export function arithOr(lhs: Arith, rhs: Arith): BinaryTerm { return binaryTerm('or', lhs, rhs); }
export function not(operand: Arith): Not { return { type: 'Not', operand }; }
export function res(): Res { return { type: 'Res' }; }

export function desugarNot(node: Not): BinaryTerm {
  return arithXor(node.operand, one());
}

// -----------------------------------------------------------------------------
// Contracts h ::= res | a ; Modules m ::= mod(x,...,x)[req a; ens h]{b} | mod(x,...,x){b}
// -----------------------------------------------------------------------------

export interface PreCond extends AstNode { type: 'PreCond'; cond: Arith; }
export interface PostCond extends AstNode { type: 'PostCond'; cond: Arith; }

export interface Contract extends AstNode {
  type: 'Contract';
  pre: PreCond;
  post: PostCond;
}

export interface Out extends AstNode { type: 'Out'; value: Expr; }

export interface Module extends AstNode {
  type: 'Module';
  params: string[];
  contract?: Contract;
  body: Stmt[];
  out?: Out;
}

export function preCond(cond: Arith): PreCond { return { type: 'PreCond', cond }; }
export function postCond(cond: Arith): PostCond { return { type: 'PostCond', cond }; }
export function contract(pre: PreCond, post: PostCond): Contract { return { type: 'Contract', pre, post }; }
export function out(value: Expr): Out { return { type: 'Out', value }; }

export function moduleDefinition(params: string[], body: Stmt[], outClause?: Out, contractClause?: Contract): Module {
  const node: Module = { type: 'Module', params, body };
  if (contractClause) node.contract = contractClause;
  if (outClause) node.out = outClause;
  return node;
}

// -----------------------------------------------------------------------------
// Statements s ::= r -> v, e | x = e | x = m | assert a | assume a | m
// -----------------------------------------------------------------------------

/** Clocked register: `init` at cycle 0, then `next` evaluated against the previous cycle. */
export interface Reg extends AstNode {
  type: 'Reg';
  name: string;
  init: Value;
  next: Expr;
}

export interface Bind extends AstNode {
  type: 'Bind';
  name: string;
  value: Expr | Module;
}

export interface Assert extends AstNode { type: 'Assert'; cond: Arith; }
export interface Assume extends AstNode { type: 'Assume'; cond: Arith; }

export type Stmt = Reg | Bind | Assert | Assume | Module;

export function reg(name: string, init: Value, next: Expr): Reg { return { type: 'Reg', name, init, next }; }
export function bind(name: string, value: Expr | Module): Bind { return { type: 'Bind', name, value }; }
export function assertStmt(cond: Arith): Assert { return { type: 'Assert', cond }; }
export function assumeStmt(cond: Arith): Assume { return { type: 'Assume', cond }; }

/** Name introduced by a statement, if any. */
export function definedName(stmt: Stmt): string | null {
  switch (stmt.type) {
    case 'Reg':
    case 'Bind':
      return stmt.name;
    case 'Assert':
    case 'Assume':
    case 'Module':
      return null;
  }
}

// -----------------------------------------------------------------------------
// Circuit c ::= [s]*
// -----------------------------------------------------------------------------

export interface Circuit {
  type: 'Circuit';
  statements: Stmt[];
  /** Top-level symbols in definition order; names are unique. */
  context: SymbolBinding[];
  /** Every named statement of the pass, nested ones included; `SymbolBinding.owner` indexes here. */
  definitions: Stmt[];
}

export function circuit(statements: Stmt[], context: SymbolBinding[] = [], definitions: Stmt[] = []): Circuit {
  return { type: 'Circuit', statements, context, definitions };
}

export type Node =
  | Value
  | Order
  | SymbolRef
  | BinaryExpression
  | Mux
  | ModuleInstance
  | BinaryTerm
  | Not
  | Res
  | PreCond
  | PostCond
  | Contract
  | Out
  | Module
  | Reg
  | Bind
  | Assert
  | Assume;
