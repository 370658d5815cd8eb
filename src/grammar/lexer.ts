import { Lexer, createToken } from "chevrotain";
import type { TokenType } from "chevrotain";

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED });
export const LineComment = createToken({ name: "LineComment", pattern: /\/\/[^\n\r]*/, group: Lexer.SKIPPED });

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Operator categories: one CST label can then collect a mixed run of operators in order.
export const LogicOperator = createToken({ name: "LogicOperator", pattern: Lexer.NA });
export const TermOperator = createToken({ name: "TermOperator", pattern: Lexer.NA });
export const AdditiveOperator = createToken({ name: "AdditiveOperator", pattern: Lexer.NA });

function keyword(name: string, word: string, categories: TokenType[] = []) {
  return createToken({ name, pattern: new RegExp(word), longer_alt: Identifier, categories });
}

export const Mod = keyword("Mod", "mod");
export const Req = keyword("Req", "req");
export const Ens = keyword("Ens", "ens");
export const Out = keyword("Out", "out");
export const Res = keyword("Res", "res");
export const Assert = keyword("Assert", "assert");
export const Assume = keyword("Assume", "assume");
export const Mux = keyword("Mux", "mux");
export const Not = keyword("Not", "not");
export const Xor = keyword("Xor", "xor", [LogicOperator, TermOperator]);
export const And = keyword("And", "and", [LogicOperator, TermOperator]);
export const Or = keyword("Or", "or", [LogicOperator, TermOperator]);
export const Impl = keyword("Impl", "impl", [TermOperator]);
export const Eq = keyword("Eq", "eq", [TermOperator]);

export const BitLiteral = createToken({ name: "BitLiteral", pattern: /[0-9]+/ });

export const Arrow = createToken({ name: "Arrow", pattern: /->/ });
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [TermOperator, AdditiveOperator] });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [TermOperator, AdditiveOperator] });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LSquare = createToken({ name: "LSquare", pattern: /\[/ });
export const RSquare = createToken({ name: "RSquare", pattern: /\]/ });
export const LCurly = createToken({ name: "LCurly", pattern: /\{/ });
export const RCurly = createToken({ name: "RCurly", pattern: /\}/ });

// Keywords precede Identifier and `->` precedes `-`.
export const allTokens = [
  WhiteSpace,
  LineComment,
  LogicOperator,
  TermOperator,
  AdditiveOperator,
  Mod,
  Req,
  Ens,
  Out,
  Res,
  Assert,
  Assume,
  Mux,
  Not,
  Xor,
  And,
  Or,
  Impl,
  Eq,
  Identifier,
  BitLiteral,
  Arrow,
  Plus,
  Minus,
  Equals,
  Comma,
  Semicolon,
  LParen,
  RParen,
  LSquare,
  RSquare,
  LCurly,
  RCurly,
];

export const DvrtlLexer = new Lexer(allTokens);
