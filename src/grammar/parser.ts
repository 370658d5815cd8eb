/**
 * Chevrotain grammar for dvrtl source text.
 *
 *   circuit    ::= (statement ;?)*
 *   statement  ::= r -> v, e | x = e | x = module | assert a | assume a | module
 *   module     ::= mod(x, ..., x) [req a; ens a]? { (statement ;?)* (out? e)? }
 *   e          ::= infix or / xor / and over terms, or prefix `xor e e`, `mux e e e`, `x(e, ...)`
 *   a          ::= impl (right) < eq < or < xor < and < + - over terms, prefix forms, `not a`, `res`
 *
 * Operators are accepted both infix and in the prefix form the serializer
 * writes. A call needs its `(` directly after the callee name, so
 * `mux s (a) b` keeps `(a)` as an operand.
 */
import { CstParser } from "chevrotain";
import type { CstNode, IToken } from "chevrotain";
import {
  AdditiveOperator,
  And,
  Arrow,
  Assert,
  Assume,
  BitLiteral,
  Comma,
  DvrtlLexer,
  Ens,
  Eq,
  Equals,
  Identifier,
  Impl,
  LCurly,
  LParen,
  LSquare,
  LogicOperator,
  Mod,
  Mux,
  Not,
  Or,
  Out,
  RCurly,
  RParen,
  RSquare,
  Req,
  Res,
  Semicolon,
  TermOperator,
  Xor,
  allTokens,
} from "./lexer";
import type { ParseTree } from "../parser/shared";
import { GrammarError } from "./errors";
import { cstToParseTree } from "./cst-to-tree";

function isAdjacent(previous: IToken, next: IToken): boolean {
  return previous.startOffset + previous.image.length === next.startOffset;
}

class DvrtlGrammar extends CstParser {
  constructor() {
    super(allTokens, { maxLookahead: 3, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  // ── Statements ─────────────────────────────────────────────────────────

  public circuit = this.RULE("circuit", () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
      this.OPTION(() => this.CONSUME(Semicolon));
    });
  });

  public statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.register) },
      { ALT: () => this.SUBRULE(this.binding) },
      { ALT: () => this.SUBRULE(this.assertion) },
      { ALT: () => this.SUBRULE(this.assumption) },
      { ALT: () => this.SUBRULE(this.moduleDefinition) },
    ]);
  });

  /** A -> 0, next */
  public register = this.RULE("register", () => {
    this.CONSUME(Identifier);
    this.CONSUME(Arrow);
    this.CONSUME(BitLiteral);
    this.CONSUME(Comma);
    this.SUBRULE(this.expression);
  });

  /** x = e | x = mod(...){...} */
  public binding = this.RULE("binding", () => {
    this.CONSUME(Identifier);
    this.CONSUME(Equals);
    this.OR([
      { ALT: () => this.SUBRULE(this.moduleDefinition) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
  });

  public assertion = this.RULE("assertion", () => {
    this.CONSUME(Assert);
    this.SUBRULE(this.arith);
  });

  public assumption = this.RULE("assumption", () => {
    this.CONSUME(Assume);
    this.SUBRULE(this.arith);
  });

  // ── Modules ────────────────────────────────────────────────────────────

  public moduleDefinition = this.RULE("moduleDefinition", () => {
    this.CONSUME(Mod);
    this.CONSUME(LParen);
    this.MANY_SEP({ SEP: Comma, DEF: () => this.CONSUME(Identifier, { LABEL: "params" }) });
    this.CONSUME(RParen);
    this.OPTION(() => this.SUBRULE(this.contract));
    this.CONSUME(LCurly);
    this.SUBRULE(this.body);
    this.CONSUME(RCurly);
  });

  /** [req a; ens a] */
  public contract = this.RULE("contract", () => {
    this.CONSUME(LSquare);
    this.CONSUME(Req);
    this.SUBRULE(this.arith, { LABEL: "pre" });
    this.CONSUME(Semicolon);
    this.CONSUME(Ens);
    this.SUBRULE2(this.arith, { LABEL: "post" });
    this.CONSUME(RSquare);
  });

  public body = this.RULE("body", () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
      this.OPTION(() => this.CONSUME(Semicolon));
    });
    this.OPTION2(() => this.SUBRULE(this.outClause));
  });

  public outClause = this.RULE("outClause", () => {
    this.OPTION(() => this.CONSUME(Out));
    this.SUBRULE(this.expression);
  });

  // ── Synthesizable expressions ──────────────────────────────────────────

  public expression = this.RULE("expression", () => {
    this.SUBRULE(this.xorExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.xorExpression, { LABEL: "operands" });
    });
  });

  public xorExpression = this.RULE("xorExpression", () => {
    this.SUBRULE(this.andExpression, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Xor);
      this.SUBRULE2(this.andExpression, { LABEL: "operands" });
    });
  });

  public andExpression = this.RULE("andExpression", () => {
    this.SUBRULE(this.exprTerm, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.exprTerm, { LABEL: "operands" });
    });
  });

  public exprTerm = this.RULE("exprTerm", () => {
    this.OR([
      { ALT: () => this.CONSUME(BitLiteral) },
      { ALT: () => this.SUBRULE(this.reference) },
      { ALT: () => this.SUBRULE(this.scopedExpression) },
      { ALT: () => this.SUBRULE(this.muxExpression) },
      { ALT: () => this.SUBRULE(this.prefixExpression) },
    ]);
  });

  /** x | x(e, ..., e) */
  public reference = this.RULE("reference", () => {
    const name = this.CONSUME(Identifier);
    this.OPTION({
      GATE: () => isAdjacent(name, this.LA(1)),
      DEF: () => {
        this.CONSUME(LParen);
        this.MANY_SEP({ SEP: Comma, DEF: () => this.SUBRULE(this.expression, { LABEL: "arguments" }) });
        this.CONSUME(RParen);
      },
    });
  });

  public scopedExpression = this.RULE("scopedExpression", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  public muxExpression = this.RULE("muxExpression", () => {
    this.CONSUME(Mux);
    this.SUBRULE(this.exprTerm, { LABEL: "operands" });
    this.SUBRULE2(this.exprTerm, { LABEL: "operands" });
    this.SUBRULE3(this.exprTerm, { LABEL: "operands" });
  });

  /** xor e e | and e e | or e e */
  public prefixExpression = this.RULE("prefixExpression", () => {
    this.CONSUME(LogicOperator, { LABEL: "operator" });
    this.SUBRULE(this.exprTerm, { LABEL: "operands" });
    this.SUBRULE2(this.exprTerm, { LABEL: "operands" });
  });

  // ── Assertion language ─────────────────────────────────────────────────

  public arith = this.RULE("arith", () => {
    this.SUBRULE(this.eqArith, { LABEL: "lhs" });
    this.OPTION(() => {
      this.CONSUME(Impl);
      this.SUBRULE(this.arith, { LABEL: "rhs" });
    });
  });

  public eqArith = this.RULE("eqArith", () => {
    this.SUBRULE(this.orArith, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Eq);
      this.SUBRULE2(this.orArith, { LABEL: "operands" });
    });
  });

  public orArith = this.RULE("orArith", () => {
    this.SUBRULE(this.xorArith, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.xorArith, { LABEL: "operands" });
    });
  });

  public xorArith = this.RULE("xorArith", () => {
    this.SUBRULE(this.andArith, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(Xor);
      this.SUBRULE2(this.andArith, { LABEL: "operands" });
    });
  });

  public andArith = this.RULE("andArith", () => {
    this.SUBRULE(this.addArith, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.addArith, { LABEL: "operands" });
    });
  });

  public addArith = this.RULE("addArith", () => {
    this.SUBRULE(this.arithTerm, { LABEL: "operands" });
    this.MANY(() => {
      this.CONSUME(AdditiveOperator, { LABEL: "operators" });
      this.SUBRULE2(this.arithTerm, { LABEL: "operands" });
    });
  });

  public arithTerm = this.RULE("arithTerm", () => {
    this.OR([
      { ALT: () => this.CONSUME(Res) },
      { ALT: () => this.SUBRULE(this.notArith) },
      { ALT: () => this.SUBRULE(this.scopedArith) },
      { ALT: () => this.SUBRULE(this.prefixArith) },
      { ALT: () => this.CONSUME(BitLiteral) },
      { ALT: () => this.SUBRULE(this.reference) },
      { ALT: () => this.SUBRULE(this.muxExpression) },
    ]);
  });

  public notArith = this.RULE("notArith", () => {
    this.CONSUME(Not);
    this.SUBRULE(this.arithTerm);
  });

  public scopedArith = this.RULE("scopedArith", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.arith);
    this.CONSUME(RParen);
  });

  /** impl a a | eq a a | xor a a | and a a | or a a | + a a | - a a */
  public prefixArith = this.RULE("prefixArith", () => {
    this.CONSUME(TermOperator, { LABEL: "operator" });
    this.SUBRULE(this.arithTerm, { LABEL: "operands" });
    this.SUBRULE2(this.arithTerm, { LABEL: "operands" });
  });
}

let grammar: DvrtlGrammar | null = null;

function getGrammar(): DvrtlGrammar {
  if (!grammar) {
    grammar = new DvrtlGrammar();
  }
  return grammar;
}

/** Lexes and parses `source` into the labeled tree the transformer consumes. */
export function parseTree(source: string, origin?: string): ParseTree {
  const lexed = DvrtlLexer.tokenize(source);
  const lexError = lexed.errors[0];
  if (lexError) {
    throw new GrammarError(`grammar: ${lexError.message}`, { line: lexError.line, column: lexError.column, origin });
  }

  const parser = getGrammar();
  parser.input = lexed.tokens;
  const cst: CstNode = parser.circuit();
  const parseError = parser.errors[0];
  if (parseError) {
    throw new GrammarError(`grammar: ${parseError.message}`, {
      line: parseError.token.startLine,
      column: parseError.token.startColumn,
      origin,
    });
  }
  return cstToParseTree(cst, origin);
}
