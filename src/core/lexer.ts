// src/core/lexer.ts
//
// Glint Lexer (Tokenizer)
// -----------------------
// Converts raw source text into a stream of tokens with precise source ranges.
//
// - Comments: // line (skipped)
// - Strings: "double" with escapes (\" \\ \n \t \r \0)
// - Numbers: 123 (int), 12.34 (float); a '.' only belongs to the number when a
//   digit follows it
// - Operators: + - * / = == != < <= > >= && || ! += -= *= /= ->
// - Punctuation: ( ) { } , ; : . @
//
// The token list always ends with exactly one EOF token, even when errors
// were reported.

import type { Position, Range } from "./ast";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  EOF = "EOF",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  INT = "INT",
  FLOAT = "FLOAT",
  STRING = "STRING",

  // Keywords
  KW_FN = "KW_FN",
  KW_LET = "KW_LET",
  KW_MUT = "KW_MUT",
  KW_IF = "KW_IF",
  KW_ELSE = "KW_ELSE",
  KW_WHILE = "KW_WHILE",
  KW_RETURN = "KW_RETURN",
  KW_SELF = "KW_SELF",
  KW_SIGNAL = "KW_SIGNAL",
  TRUE = "TRUE",
  FALSE = "FALSE",

  // Operators
  ASSIGN = "ASSIGN", // =
  PLUS_ASSIGN = "PLUS_ASSIGN", // +=
  MINUS_ASSIGN = "MINUS_ASSIGN", // -=
  STAR_ASSIGN = "STAR_ASSIGN", // *=
  SLASH_ASSIGN = "SLASH_ASSIGN", // /=
  EQ = "EQ", // ==
  NEQ = "NEQ", // !=
  LT = "LT",
  LTE = "LTE",
  GT = "GT",
  GTE = "GTE",
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  AND = "AND", // &&
  OR = "OR", // ||
  NOT = "NOT", // !
  ARROW = "ARROW", // ->

  // Punctuation
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  LBRACE = "LBRACE",
  RBRACE = "RBRACE",
  COMMA = "COMMA",
  SEMICOLON = "SEMICOLON",
  COLON = "COLON",
  DOT = "DOT",
  AT = "AT",
}

export type TokenCategory =
  | "keyword"
  | "identifier"
  | "int-literal"
  | "float-literal"
  | "string-literal"
  | "operator"
  | "punctuation"
  | "eof";

/* =========================================================
   Token Types
   ========================================================= */

export type Token = {
  kind: TokenKind;
  /** Raw source text of the token. */
  lexeme: string;
  range: Range;
  /** Decoded payload for INT/FLOAT/STRING tokens. */
  value?: number | string;
};

export type LexError = {
  code: "E001" | "E002" | "E003" | "E004";
  message: string;
  range: Range;
};

export type LexResult = {
  tokens: Token[];
  errors: LexError[];
};

export type LexerOptions = {
  /** Stop at the first error instead of collecting all of them. */
  stopOnError: boolean;
};

export const DEFAULT_LEXER_OPTIONS: LexerOptions = {
  stopOnError: false,
};

export const KEYWORDS: Readonly<Record<string, TokenKind>> = Object.freeze({
  fn: TokenKind.KW_FN,
  let: TokenKind.KW_LET,
  mut: TokenKind.KW_MUT,
  if: TokenKind.KW_IF,
  else: TokenKind.KW_ELSE,
  while: TokenKind.KW_WHILE,
  return: TokenKind.KW_RETURN,
  self: TokenKind.KW_SELF,
  signal: TokenKind.KW_SIGNAL,
  true: TokenKind.TRUE,
  false: TokenKind.FALSE,
});

export const I32_MAX = 2147483647;
/** Magnitude of the smallest i32; only valid as the operand of a unary minus. */
export const I32_MIN_MAGNITUDE = 2147483648;

/* =========================================================
   Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly opts: LexerOptions;

  private i = 0;
  private line = 0;
  private col = 0;

  private tokens: Token[] = [];
  private errors: LexError[] = [];

  constructor(source: string, options?: Partial<LexerOptions>) {
    this.src = source;
    this.opts = { ...DEFAULT_LEXER_OPTIONS, ...(options ?? {}) };
  }

  lex(): LexResult {
    this.i = 0;
    this.line = 0;
    this.col = 0;
    this.tokens = [];
    this.errors = [];

    while (!this.isEOF()) {
      if (this.opts.stopOnError && this.errors.length > 0) break;

      const c = this.peek();

      if (c === " " || c === "\t" || c === "\r" || c === "\n") {
        this.advance();
        continue;
      }

      if (c === "/" && this.peek(1) === "/") {
        this.skipLineComment();
        continue;
      }

      if (c === '"') {
        this.lexString();
        continue;
      }

      if (isDigit(c)) {
        this.lexNumber();
        continue;
      }

      if (isIdentStart(c)) {
        this.lexIdentifierOrKeyword();
        continue;
      }

      if (this.lexOperatorOrPunct()) continue;

      const start = this.position();
      this.advance();
      this.addError("E001", `Invalid character '${printable(c)}'`, start, this.position());
    }

    const p = this.position();
    this.tokens.push({ kind: TokenKind.EOF, lexeme: "", range: { start: { ...p }, end: { ...p } } });

    return { tokens: this.tokens, errors: this.errors };
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx < 0 || idx >= this.src.length) return "\0";
    return this.src[idx];
  }

  private advance(): string {
    const c = this.peek();
    this.i++;

    if (c === "\n") {
      this.line++;
      this.col = 0;
    } else {
      this.col++;
    }

    return c;
  }

  private position(): Position {
    return { offset: this.i, line: this.line, column: this.col };
  }

  private push(kind: TokenKind, start: Position, value?: number | string): void {
    const end = this.position();
    const tok: Token = { kind, lexeme: this.src.slice(start.offset, end.offset), range: { start, end } };
    if (value !== undefined) tok.value = value;
    this.tokens.push(tok);
  }

  private addError(code: LexError["code"], message: string, start: Position, end: Position): void {
    this.errors.push({ code, message, range: { start, end } });
  }

  /* =========================================================
     Trivia
     ========================================================= */

  private skipLineComment(): void {
    while (!this.isEOF() && this.peek() !== "\n") this.advance();
  }

  /* =========================================================
     Literals
     ========================================================= */

  private lexString(): void {
    const start = this.position();
    this.advance(); // opening quote

    let out = "";

    while (true) {
      if (this.isEOF() || this.peek() === "\n") {
        this.addError("E002", "Unterminated string literal", start, this.position());
        return;
      }

      const c = this.advance();
      if (c === '"') break;

      if (c === "\\") {
        const escStart = { offset: this.i - 1, line: this.line, column: this.col - 1 };
        if (this.isEOF()) {
          this.addError("E002", "Unterminated string literal", start, this.position());
          return;
        }
        const e = this.advance();
        const decoded = decodeEscape(e);
        if (decoded === null) {
          this.addError("E003", `Invalid escape sequence '\\${printable(e)}'`, escStart, this.position());
          continue;
        }
        out += decoded;
        continue;
      }

      out += c;
    }

    this.push(TokenKind.STRING, start, out);
  }

  private lexNumber(): void {
    const start = this.position();

    while (isDigit(this.peek())) this.advance();

    let isFloat = false;
    if (this.peek() === "." && isDigit(this.peek(1))) {
      isFloat = true;
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    // 12abc is one bad literal, not a number followed by a name
    if (isIdentStart(this.peek())) {
      while (isIdentPart(this.peek())) this.advance();
      const text = this.src.slice(start.offset, this.i);
      this.addError("E004", `Invalid number format '${text}'`, start, this.position());
      return;
    }

    const text = this.src.slice(start.offset, this.i);

    if (isFloat) {
      this.push(TokenKind.FLOAT, start, Number(text));
      return;
    }

    // 2147483648 is left to the parser, which accepts it only after '-'
    const n = Number(text);
    if (n > I32_MIN_MAGNITUDE) {
      this.addError("E004", `Integer literal '${text}' does not fit in i32`, start, this.position());
      return;
    }
    this.push(TokenKind.INT, start, n);
  }

  private lexIdentifierOrKeyword(): void {
    const start = this.position();
    while (isIdentPart(this.peek())) this.advance();

    const text = this.src.slice(start.offset, this.i);
    const kw = Object.prototype.hasOwnProperty.call(KEYWORDS, text) ? KEYWORDS[text] : undefined;
    this.push(kw ?? TokenKind.IDENTIFIER, start);
  }

  /* =========================================================
     Operators / punctuation
     ========================================================= */

  private lexOperatorOrPunct(): boolean {
    const start = this.position();
    const c = this.peek();
    const n = this.peek(1);

    const two = (kind: TokenKind): true => {
      this.advance();
      this.advance();
      this.push(kind, start);
      return true;
    };
    const one = (kind: TokenKind): true => {
      this.advance();
      this.push(kind, start);
      return true;
    };

    switch (c) {
      case "=":
        return n === "=" ? two(TokenKind.EQ) : one(TokenKind.ASSIGN);
      case "!":
        return n === "=" ? two(TokenKind.NEQ) : one(TokenKind.NOT);
      case "<":
        return n === "=" ? two(TokenKind.LTE) : one(TokenKind.LT);
      case ">":
        return n === "=" ? two(TokenKind.GTE) : one(TokenKind.GT);
      case "+":
        return n === "=" ? two(TokenKind.PLUS_ASSIGN) : one(TokenKind.PLUS);
      case "-":
        if (n === ">") return two(TokenKind.ARROW);
        return n === "=" ? two(TokenKind.MINUS_ASSIGN) : one(TokenKind.MINUS);
      case "*":
        return n === "=" ? two(TokenKind.STAR_ASSIGN) : one(TokenKind.STAR);
      case "/":
        return n === "=" ? two(TokenKind.SLASH_ASSIGN) : one(TokenKind.SLASH);
      case "&":
        if (n === "&") return two(TokenKind.AND);
        return false;
      case "|":
        if (n === "|") return two(TokenKind.OR);
        return false;
      case "(":
        return one(TokenKind.LPAREN);
      case ")":
        return one(TokenKind.RPAREN);
      case "{":
        return one(TokenKind.LBRACE);
      case "}":
        return one(TokenKind.RBRACE);
      case ",":
        return one(TokenKind.COMMA);
      case ";":
        return one(TokenKind.SEMICOLON);
      case ":":
        return one(TokenKind.COLON);
      case ".":
        return one(TokenKind.DOT);
      case "@":
        return one(TokenKind.AT);
      default:
        return false;
    }
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function tokenize(source: string, options?: Partial<LexerOptions>): LexResult {
  return new Lexer(source, options).lex();
}

export function tokenCategory(kind: TokenKind): TokenCategory {
  switch (kind) {
    case TokenKind.EOF:
      return "eof";
    case TokenKind.IDENTIFIER:
      return "identifier";
    case TokenKind.INT:
      return "int-literal";
    case TokenKind.FLOAT:
      return "float-literal";
    case TokenKind.STRING:
      return "string-literal";
    case TokenKind.KW_FN:
    case TokenKind.KW_LET:
    case TokenKind.KW_MUT:
    case TokenKind.KW_IF:
    case TokenKind.KW_ELSE:
    case TokenKind.KW_WHILE:
    case TokenKind.KW_RETURN:
    case TokenKind.KW_SELF:
    case TokenKind.KW_SIGNAL:
    case TokenKind.TRUE:
    case TokenKind.FALSE:
      return "keyword";
    case TokenKind.LPAREN:
    case TokenKind.RPAREN:
    case TokenKind.LBRACE:
    case TokenKind.RBRACE:
    case TokenKind.COMMA:
    case TokenKind.SEMICOLON:
    case TokenKind.COLON:
    case TokenKind.DOT:
    case TokenKind.AT:
      return "punctuation";
    default:
      return "operator";
  }
}

/** Human form used in parser messages: `';'`, `identifier`, `end of file`. */
export function describeToken(t: Token): string {
  switch (t.kind) {
    case TokenKind.EOF:
      return "end of file";
    case TokenKind.IDENTIFIER:
      return `identifier '${t.lexeme}'`;
    case TokenKind.INT:
    case TokenKind.FLOAT:
      return `number '${t.lexeme}'`;
    case TokenKind.STRING:
      return `string ${t.lexeme}`;
    default:
      return `'${t.lexeme}'`;
  }
}

/* =========================================================
   Character classes
   ========================================================= */

function decodeEscape(c: string): string | null {
  switch (c) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "0":
      return "\0";
    case "\\":
      return "\\";
    case '"':
      return '"';
    default:
      return null;
  }
}

function printable(c: string): string {
  if (c === "\0") return "\\0";
  if (c === "\t") return "\\t";
  return c;
}

export function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

export function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

export function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}
