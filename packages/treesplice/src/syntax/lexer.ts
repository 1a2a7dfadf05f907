/**
 * Chevrotain lexer for treesplice documents.
 *
 * The grammar is generic (identifiers, strings, numbers,
 * brackets, punctuation). Whitespace, newlines and comments go to the
 * `trivia` group instead of being skipped, so the tree builder can attach
 * them to neighbouring tokens and reproduce the input text exactly.
 */
import { createToken, Lexer, type IToken, type TokenType } from "chevrotain";

const TRIVIA = "trivia";

// ── Trivia ─────────────────────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  group: TRIVIA,
  line_breaks: true,
});

export const Whitespace = createToken({
  name: "Whitespace",
  pattern: /[ \t\f\v]+/,
  group: TRIVIA,
});

export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\r\n]*/,
  group: TRIVIA,
});

export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: TRIVIA,
  line_breaks: true,
});

// ── Literals & names ───────────────────────────────────────────────────────

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\\r\n]|\\.)*"|'(?:[^'\\\r\n]|\\.)*'/,
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/,
});

export const Identifier = createToken({
  name: "Identifier",
  pattern: /[A-Za-z_$][\w$]*/,
});

// ── Brackets ───────────────────────────────────────────────────────────────

export const LParen  = createToken({ name: "LParen",  pattern: /\(/ });
export const RParen  = createToken({ name: "RParen",  pattern: /\)/ });
export const LCurly  = createToken({ name: "LCurly",  pattern: /\{/ });
export const RCurly  = createToken({ name: "RCurly",  pattern: /\}/ });
export const LSquare = createToken({ name: "LSquare", pattern: /\[/ });
export const RSquare = createToken({ name: "RSquare", pattern: /\]/ });

// ── Everything else ────────────────────────────────────────────────────────

export const Operator = createToken({
  name: "Operator",
  pattern: /[+\-*/%=<>!&|^~?:;,.@#`\\]/,
});

/** Catch-all so lexing never reports errors; one character per token. */
export const Unknown = createToken({
  name: "Unknown",
  pattern: /[\s\S]/,
  line_breaks: true,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens: TokenType[] = [
  Newline,
  Whitespace,
  // Comments before Operator so `/` does not steal the prefix
  LineComment,
  BlockComment,
  StringLiteral,
  NumberLiteral,
  Identifier,
  LParen,
  RParen,
  LCurly,
  RCurly,
  LSquare,
  RSquare,
  Operator,
  Unknown,
];

export const SpliceLexer = new Lexer(allTokens, {
  positionTracking: "onlyOffset",
});

/** Kinds a green token can carry, derived from the chevrotain token names. */
export type TokenKind =
  | "identifier"
  | "string"
  | "number"
  | "open"
  | "close"
  | "operator"
  | "unknown";

const OPENERS = new Set<TokenType>([LParen, LCurly, LSquare]);
const CLOSERS = new Set<TokenType>([RParen, RCurly, RSquare]);

export const CLOSER_FOR: Readonly<Record<string, string>> = {
  "(": ")",
  "{": "}",
  "[": "]",
};

export function tokenKind(token: IToken): TokenKind {
  const type = token.tokenType;
  if (type === Identifier) return "identifier";
  if (type === StringLiteral) return "string";
  if (type === NumberLiteral) return "number";
  if (OPENERS.has(type)) return "open";
  if (CLOSERS.has(type)) return "close";
  if (type === Operator) return "operator";
  return "unknown";
}

export type LexedDocument = {
  /** Significant tokens in source order */
  tokens: IToken[];
  /** Trivia tokens (whitespace, newlines, comments) in source order */
  trivia: IToken[];
};

export function lex(text: string): LexedDocument {
  const result = SpliceLexer.tokenize(text);
  if (result.errors.length > 0) {
    // Unknown matches any character, so this only happens on a lexer bug.
    const first = result.errors[0];
    throw new Error(`Lexing failed at offset ${first.offset}: ${first.message}`);
  }
  return { tokens: result.tokens, trivia: result.groups[TRIVIA] ?? [] };
}
