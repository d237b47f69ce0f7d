// src/core/parser.ts
//
// Glint Parser
// ------------
// Turns tokens (from src/core/lexer.ts) into an AST (src/core/ast.ts) plus
// syntax diagnostics.
//
// Recursive descent for declarations and statements, precedence climbing for
// binary operators. On a syntax error the parser records one diagnostic,
// unwinds to the nearest statement or declaration loop and skips tokens until
// a boundary (';', '}', 'fn', 'let', 'signal', '@'), so independent errors in
// one file are all reported.
//
// Exports:
//   - parseSource(source): ParseResult
//   - parseTokens(tokens): ParseResult
//   - Parser class

import type {
  AssignOperator,
  AssignTarget,
  BinaryOperator,
  BlockStatement,
  Declaration,
  ExportAnnotation,
  Expression,
  FieldAccess,
  FunctionDeclaration,
  GlobalDeclaration,
  HintCall,
  Identifier,
  IfStatement,
  LetStatement,
  Parameter,
  Position,
  Program,
  Range,
  ReturnStatement,
  SelfExpression,
  SignalDeclaration,
  Statement,
  StructField,
  StructLiteral,
  TypeRef,
  WhileStatement,
} from "./ast";
import { describeToken, I32_MAX, I32_MIN_MAGNITUDE, tokenize, TokenKind, type Token } from "./lexer";
import { error as mkError, type Diagnostic } from "../diagnostics/errors";

/* =========================================================
   Parse result
   ========================================================= */

export type ParseResult = {
  program: Program;
  diagnostics: Diagnostic[];
};

/* =========================================================
   Public helpers
   ========================================================= */

/**
 * Lexes and parses in one go. Lexical errors are returned as diagnostics and
 * the parser does not run when there are any.
 */
export function parseSource(source: string): ParseResult {
  const lex = tokenize(source);
  if (lex.errors.length > 0) {
    const eof = lex.tokens[lex.tokens.length - 1];
    return {
      program: { kind: "Program", range: eof.range, body: [] },
      diagnostics: lex.errors.map((e) => mkError(e.code, e.message, e.range, "lexer")),
    };
  }
  return parseTokens(lex.tokens);
}

export function parseTokens(tokens: Token[]): ParseResult {
  const parser = new Parser(tokens);
  const program = parser.parseProgram();
  return { program, diagnostics: parser.diagnostics };
}

/* =========================================================
   Parser
   ========================================================= */

type BinOpInfo = {
  precedence: number;
  op: BinaryOperator;
};

// All binary operators are left-associative.
const BIN_OP_TABLE: Partial<Record<TokenKind, BinOpInfo>> = {
  [TokenKind.OR]: { precedence: 1, op: "||" },
  [TokenKind.AND]: { precedence: 2, op: "&&" },

  [TokenKind.EQ]: { precedence: 3, op: "==" },
  [TokenKind.NEQ]: { precedence: 3, op: "!=" },

  [TokenKind.LT]: { precedence: 4, op: "<" },
  [TokenKind.LTE]: { precedence: 4, op: "<=" },
  [TokenKind.GT]: { precedence: 4, op: ">" },
  [TokenKind.GTE]: { precedence: 4, op: ">=" },

  [TokenKind.PLUS]: { precedence: 5, op: "+" },
  [TokenKind.MINUS]: { precedence: 5, op: "-" },

  [TokenKind.STAR]: { precedence: 6, op: "*" },
  [TokenKind.SLASH]: { precedence: 6, op: "/" },
};

const ASSIGN_OP_TABLE: Partial<Record<TokenKind, AssignOperator>> = {
  [TokenKind.ASSIGN]: "=",
  [TokenKind.PLUS_ASSIGN]: "+=",
  [TokenKind.MINUS_ASSIGN]: "-=",
  [TokenKind.STAR_ASSIGN]: "*=",
  [TokenKind.SLASH_ASSIGN]: "/=",
};

/** Thrown after a diagnostic is recorded; caught by the enclosing item loop. */
class SyntaxPanic extends Error {
  constructor() {
    super("syntax panic");
  }
}

type SyncMode = "declaration" | "statement";

export class Parser {
  private readonly tokens: Token[];
  private idx = 0;

  public readonly diagnostics: Diagnostic[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens.length > 0 ? tokens : [eofToken()];
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parseProgram(): Program {
    const start = this.current().range.start;
    const body: Declaration[] = [];

    while (!this.isAtEnd()) {
      try {
        const decl = this.parseDeclaration();
        if (decl) body.push(decl);
      } catch (e) {
        if (!(e instanceof SyntaxPanic)) throw e;
        this.synchronize("declaration");
      }
    }

    return {
      kind: "Program",
      range: { start, end: this.current().range.end },
      body,
    };
  }

  private parseDeclaration(): Declaration | null {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.AT: {
        const annotation = this.parseExportAnnotation();
        if (!this.is(TokenKind.KW_LET)) {
          throw this.panic("E101", `An '@export' annotation must be followed by a global 'let', found ${describeToken(this.current())}`);
        }
        return this.parseGlobal(annotation);
      }
      case TokenKind.KW_LET:
        return this.parseGlobal(null);
      case TokenKind.KW_FN:
        return this.parseFunction();
      case TokenKind.KW_SIGNAL:
        return this.parseSignal();
      case TokenKind.SEMICOLON:
        // stray ';' between items
        this.advance();
        return null;
      default:
        throw this.panic("E101", `Expected 'fn', 'let' or 'signal' at top level, found ${describeToken(t)}`);
    }
  }

  private parseExportAnnotation(): ExportAnnotation {
    const at = this.advance();
    const name = this.expectIdentifier("Expected annotation name after '@'");
    if (name.name !== "export") {
      throw this.panicAt(name.range, "E101", `Unknown annotation '@${name.name}'`, "The only annotation is '@export'.");
    }

    let hint: HintCall | null = null;
    if (this.match(TokenKind.LPAREN)) {
      const hintName = this.expectIdentifier("Expected a hint such as range(...), enum(...) or file(...)");
      this.expect(TokenKind.LPAREN, "E100", `Expected '(' after hint '${hintName.name}'`);
      const args = this.parseArgumentsAfterParen();
      this.expectClosing(TokenKind.RPAREN, `')' to close '${hintName.name}(...)'`);
      hint = {
        kind: "HintCall",
        range: { start: hintName.range.start, end: this.previous().range.end },
        name: hintName,
        args,
      };
      this.expectClosing(TokenKind.RPAREN, "')' to close '@export(...)'");
    }

    return {
      kind: "ExportAnnotation",
      range: { start: at.range.start, end: this.previous().range.end },
      hint,
    };
  }

  private parseGlobal(exportAnnotation: ExportAnnotation | null): GlobalDeclaration {
    const decl = this.parseLetLike();
    return {
      kind: "GlobalDeclaration",
      range: { start: exportAnnotation?.range.start ?? decl.range.start, end: decl.range.end },
      name: decl.name,
      mutable: decl.mutable,
      typeAnnotation: decl.typeAnnotation,
      initializer: decl.initializer,
      exportAnnotation,
    };
  }

  private parseFunction(): FunctionDeclaration {
    const fnTok = this.advance();
    const name = this.expectIdentifier("Expected function name after 'fn'");

    if (!this.is(TokenKind.LPAREN)) {
      throw this.panic("E105", `Expected '(' after function name '${name.name}', found ${describeToken(this.current())}`);
    }
    this.advance();
    const params = this.parseParameters();

    let returnType: TypeRef | null = null;
    if (this.match(TokenKind.ARROW)) {
      if (!this.is(TokenKind.IDENTIFIER)) {
        throw this.panic("E112", `Expected return type after '->', found ${describeToken(this.current())}`);
      }
      returnType = this.typeRefFrom(this.advance());
    }

    if (!this.is(TokenKind.LBRACE)) {
      throw this.panic("E105", `Expected '{' to start the body of '${name.name}', found ${describeToken(this.current())}`);
    }
    const body = this.parseBlock();

    return {
      kind: "FunctionDeclaration",
      range: { start: fnTok.range.start, end: body.range.end },
      name,
      params,
      returnType,
      body,
    };
  }

  private parseSignal(): SignalDeclaration {
    const kw = this.advance();
    const name = this.expectIdentifier("Expected signal name after 'signal'");
    this.expect(TokenKind.LPAREN, "E100", `Expected '(' after signal name '${name.name}'`);
    const params = this.parseParameters();
    this.expectSemicolon("signal declaration");

    return {
      kind: "SignalDeclaration",
      range: { start: kw.range.start, end: this.previous().range.end },
      name,
      params,
    };
  }

  /** Parses `name: type, ...` up to and including ')'. The '(' is already consumed. */
  private parseParameters(): Parameter[] {
    const params: Parameter[] = [];
    if (this.match(TokenKind.RPAREN)) return params;

    while (true) {
      const t = this.current();
      if (t.kind !== TokenKind.IDENTIFIER) {
        if (t.kind === TokenKind.EOF) throw this.panic("E108", "Unexpected end of file in parameter list");
        throw this.panic("E111", `Expected parameter name, found ${describeToken(t)}`);
      }
      const name = this.identifierFrom(this.advance());

      if (!this.match(TokenKind.COLON)) {
        throw this.panicAt(
          name.range,
          "E110",
          `Parameter '${name.name}' is missing a type annotation`,
          `Write '${name.name}: f32' (or another type).`
        );
      }
      const typeAnnotation = this.parseTypeRef();

      params.push({
        kind: "Parameter",
        range: { start: name.range.start, end: typeAnnotation.range.end },
        name,
        typeAnnotation,
      });

      if (this.match(TokenKind.COMMA)) continue;
      this.expectClosing(TokenKind.RPAREN, "')' to close the parameter list");
      return params;
    }
  }

  private parseTypeRef(): TypeRef {
    const t = this.current();
    if (t.kind !== TokenKind.IDENTIFIER) {
      if (t.kind === TokenKind.EOF) throw this.panic("E108", "Unexpected end of file, expected a type");
      throw this.panic("E106", `Expected a type name, found ${describeToken(t)}`);
    }
    return this.typeRefFrom(this.advance());
  }

  /* =========================================================
     Statements
     ========================================================= */

  /** Parses `{ ... }`; the current token must be '{'. */
  private parseBlock(): BlockStatement {
    const open = this.advance();
    const body: Statement[] = [];

    while (!this.is(TokenKind.RBRACE)) {
      const t = this.current();

      if (t.kind === TokenKind.EOF) {
        this.recordAt(t.range, "E108", "Unexpected end of file, expected '}'");
        return { kind: "BlockStatement", range: { start: open.range.start, end: t.range.end }, body };
      }

      // A declaration keyword here means the block was never closed; let the
      // top-level loop pick it up.
      if (t.kind === TokenKind.KW_FN || t.kind === TokenKind.KW_SIGNAL || t.kind === TokenKind.AT) {
        this.recordAt(open.range, "E102", "Missing '}' to close this block");
        return { kind: "BlockStatement", range: { start: open.range.start, end: this.previous().range.end }, body };
      }

      try {
        body.push(this.parseStatement());
      } catch (e) {
        if (!(e instanceof SyntaxPanic)) throw e;
        this.synchronize("statement");
      }
    }

    const close = this.advance();
    return { kind: "BlockStatement", range: { start: open.range.start, end: close.range.end }, body };
  }

  private parseStatement(): Statement {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.KW_LET:
        return this.parseLetLike();
      case TokenKind.KW_IF:
        return this.parseIf();
      case TokenKind.KW_WHILE:
        return this.parseWhile();
      case TokenKind.KW_RETURN:
        return this.parseReturn();
      case TokenKind.LBRACE:
        return this.parseBlock();
      case TokenKind.KW_ELSE:
        throw this.panic("E104", "'else' without a matching 'if'");
      default:
        return this.parseAssignOrExpression();
    }
  }

  /** `let mut? name (: type)? = expr ;` used for both globals and locals. */
  private parseLetLike(): LetStatement {
    const kw = this.advance();
    const mutable = this.match(TokenKind.KW_MUT);
    const name = this.expectIdentifier("Expected variable name after 'let'");

    let typeAnnotation: TypeRef | null = null;
    if (this.match(TokenKind.COLON)) typeAnnotation = this.parseTypeRef();

    if (!this.match(TokenKind.ASSIGN)) {
      throw this.panic("E100", `Expected '=' after '${name.name}', found ${describeToken(this.current())}`);
    }
    const initializer = this.parseExpression();
    this.expectSemicolon("variable declaration");

    return {
      kind: "LetStatement",
      range: { start: kw.range.start, end: this.previous().range.end },
      name,
      mutable,
      typeAnnotation,
      initializer,
    };
  }

  private parseIf(): IfStatement {
    const kw = this.advance();
    const test = this.parseExpression();
    const consequent = this.expectBlock("'if' condition");

    let alternate: BlockStatement | IfStatement | null = null;
    if (this.match(TokenKind.KW_ELSE)) {
      alternate = this.is(TokenKind.KW_IF) ? this.parseIf() : this.expectBlock("'else'");
    }

    return {
      kind: "IfStatement",
      range: { start: kw.range.start, end: (alternate ?? consequent).range.end },
      test,
      consequent,
      alternate,
    };
  }

  private parseWhile(): WhileStatement {
    const kw = this.advance();
    const test = this.parseExpression();
    const body = this.expectBlock("'while' condition");
    return { kind: "WhileStatement", range: { start: kw.range.start, end: body.range.end }, test, body };
  }

  private parseReturn(): ReturnStatement {
    const kw = this.advance();
    const argument = this.is(TokenKind.SEMICOLON) ? null : this.parseExpression();
    this.expectSemicolon("return statement");
    return { kind: "ReturnStatement", range: { start: kw.range.start, end: this.previous().range.end }, argument };
  }

  private parseAssignOrExpression(): Statement {
    const expr = this.parseExpression();

    const op = ASSIGN_OP_TABLE[this.current().kind];
    if (op) {
      const target = this.toAssignTarget(expr);
      this.advance();
      const value = this.parseExpression();
      this.expectSemicolon("assignment");
      return {
        kind: "AssignStatement",
        range: { start: target.range.start, end: this.previous().range.end },
        target,
        operator: op,
        value,
      };
    }

    this.expectSemicolon("expression");
    return {
      kind: "ExpressionStatement",
      range: { start: expr.range.start, end: this.previous().range.end },
      expression: expr,
    };
  }

  /** Flattens `a.b.c` / `self.a` into root + field path. */
  private toAssignTarget(expr: Expression): AssignTarget {
    const path: Identifier[] = [];
    let cur: Expression = expr;

    while (cur.kind === "FieldAccess") {
      path.unshift(cur.field);
      cur = cur.object;
    }

    if (cur.kind === "Identifier" || cur.kind === "SelfExpression") {
      return { kind: "AssignTarget", range: expr.range, root: cur, path };
    }

    throw this.panicAt(
      expr.range,
      "E217",
      "Invalid assignment target",
      "Only variables, 'self' and their fields can be assigned to."
    );
  }

  /* =========================================================
     Expressions
     ========================================================= */

  public parseExpression(): Expression {
    return this.parseBinary(1);
  }

  private parseBinary(minPrec: number): Expression {
    let left = this.parseUnary();

    while (true) {
      const opInfo = BIN_OP_TABLE[this.current().kind];
      if (!opInfo || opInfo.precedence < minPrec) break;

      this.advance();
      const right = this.parseBinary(opInfo.precedence + 1);

      left = {
        kind: "BinaryExpression",
        range: { start: left.range.start, end: right.range.end },
        operator: opInfo.op,
        left,
        right,
      };
    }

    return left;
  }

  private parseUnary(): Expression {
    if (this.is(TokenKind.MINUS)) {
      const next = this.peekToken(1);
      if (next.kind === TokenKind.INT && numberValue(next) === I32_MIN_MAGNITUDE) {
        const op = this.advance();
        this.advance();
        return {
          kind: "IntLiteral",
          range: { start: op.range.start, end: next.range.end },
          value: -I32_MIN_MAGNITUDE,
          raw: `-${next.lexeme}`,
        };
      }
    }

    if (this.is(TokenKind.NOT) || this.is(TokenKind.MINUS)) {
      const op = this.advance();
      const argument = this.parseUnary();
      return {
        kind: "UnaryExpression",
        range: { start: op.range.start, end: argument.range.end },
        operator: op.kind === TokenKind.NOT ? "!" : "-",
        argument,
      };
    }

    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();

    while (this.is(TokenKind.DOT)) {
      this.advance();
      const field = this.expectIdentifier("Expected field name after '.'");
      if (this.is(TokenKind.LPAREN)) {
        throw this.panic("E103", `Method calls are not supported ('${field.name}(...)')`);
      }
      const access: FieldAccess = {
        kind: "FieldAccess",
        range: { start: expr.range.start, end: field.range.end },
        object: expr,
        field,
      };
      expr = access;
    }

    return expr;
  }

  private parsePrimary(): Expression {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.INT:
        this.advance();
        if (numberValue(t) > I32_MAX) {
          this.recordAt(t.range, "E004", `Integer literal '${t.lexeme}' does not fit in i32`, "Only '-2147483648' may use this magnitude.");
        }
        return { kind: "IntLiteral", range: t.range, value: numberValue(t), raw: t.lexeme };
      case TokenKind.FLOAT:
        this.advance();
        return { kind: "FloatLiteral", range: t.range, value: numberValue(t), raw: t.lexeme };
      case TokenKind.TRUE:
      case TokenKind.FALSE:
        this.advance();
        return { kind: "BoolLiteral", range: t.range, value: t.kind === TokenKind.TRUE };
      case TokenKind.STRING:
        this.advance();
        return { kind: "StringLiteral", range: t.range, value: typeof t.value === "string" ? t.value : "" };
      case TokenKind.KW_SELF: {
        this.advance();
        const self: SelfExpression = { kind: "SelfExpression", range: t.range };
        return self;
      }
      case TokenKind.LPAREN: {
        this.advance();
        const inner = this.parseExpression();
        this.expectClosing(TokenKind.RPAREN, "')' to close the parenthesized expression");
        return inner;
      }
      case TokenKind.IDENTIFIER: {
        if (this.peekKind(1) === TokenKind.LPAREN) return this.parseCall();
        if (this.looksLikeStructLiteral()) return this.parseStructLiteral();
        this.advance();
        return this.identifierFrom(t);
      }
      case TokenKind.EOF:
        throw this.panic("E108", "Unexpected end of file, expected an expression");
      default: {
        const op = ASSIGN_OP_TABLE[t.kind];
        if (op) throw this.panic("E113", `Assignment operator '${op}' cannot be used inside an expression`);
        throw this.panic("E103", `Expected expression, found ${describeToken(t)}`);
      }
    }
  }

  private parseCall(): Expression {
    const callee = this.identifierFrom(this.advance());
    this.advance(); // (
    const args = this.parseArgumentsAfterParen();
    this.expectClosing(TokenKind.RPAREN, `')' to close the call to '${callee.name}'`);
    return {
      kind: "CallExpression",
      range: { start: callee.range.start, end: this.previous().range.end },
      callee,
      args,
    };
  }

  /** Comma separated expressions up to (not including) ')'. */
  private parseArgumentsAfterParen(): Expression[] {
    const args: Expression[] = [];
    if (this.is(TokenKind.RPAREN)) return args;

    args.push(this.parseExpression());
    while (this.match(TokenKind.COMMA)) args.push(this.parseExpression());
    return args;
  }

  // `Name {` starts a literal only for an upper-case name followed by `}` or
  // `field:`; `if x > limit {` keeps its block.
  private looksLikeStructLiteral(): boolean {
    const name = this.current().lexeme;
    if (!(name[0] >= "A" && name[0] <= "Z")) return false;
    if (this.peekKind(1) !== TokenKind.LBRACE) return false;
    const k2 = this.peekKind(2);
    if (k2 === TokenKind.RBRACE) return true;
    return k2 === TokenKind.IDENTIFIER && this.peekKind(3) === TokenKind.COLON;
  }

  private parseStructLiteral(): StructLiteral {
    const typeName = this.identifierFrom(this.advance());
    this.advance(); // {

    const fields: StructField[] = [];
    while (!this.is(TokenKind.RBRACE)) {
      const name = this.expectIdentifier(`Expected field name in '${typeName.name}' literal`);
      this.expect(TokenKind.COLON, "E100", `Expected ':' after field '${name.name}'`);
      const value = this.parseExpression();
      fields.push({ kind: "StructField", range: { start: name.range.start, end: value.range.end }, name, value });

      if (!this.match(TokenKind.COMMA)) break;
    }

    this.expectClosing(TokenKind.RBRACE, `'}' to close the '${typeName.name}' literal`);
    return {
      kind: "StructLiteral",
      range: { start: typeName.range.start, end: this.previous().range.end },
      typeName,
      fields,
    };
  }

  /* =========================================================
     Token helpers
     ========================================================= */

  private current(): Token {
    return this.tokens[this.idx] ?? this.tokens[this.tokens.length - 1];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)] ?? this.tokens[0];
  }

  private peekKind(ahead: number): TokenKind {
    const t: Token | undefined = this.tokens[this.idx + ahead];
    return t?.kind ?? TokenKind.EOF;
  }

  private peekToken(ahead: number): Token {
    return this.tokens[this.idx + ahead] ?? this.tokens[this.tokens.length - 1];
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.EOF;
  }

  private is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (this.is(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.idx++;
    return this.previous();
  }

  private expect(kind: TokenKind, code: string, message: string): Token {
    if (this.is(kind)) return this.advance();
    if (this.isAtEnd()) throw this.panic("E108", `Unexpected end of file. ${message}`);
    throw this.panic(code, `${message}, found ${describeToken(this.current())}`);
  }

  private expectClosing(kind: TokenKind, what: string): Token {
    if (this.is(kind)) return this.advance();
    if (this.isAtEnd()) throw this.panic("E108", `Unexpected end of file, expected ${what}`);
    throw this.panic("E102", `Expected ${what}, found ${describeToken(this.current())}`);
  }

  private expectSemicolon(after: string): Token {
    if (this.is(TokenKind.SEMICOLON)) return this.advance();
    this.rejectStrayAssignOperator();
    // Point just past the previous token: that is where the ';' belongs.
    const end = this.previous().range.end;
    const at: Range = { start: end, end: { ...end, offset: end.offset + 1, column: end.column + 1 } };
    throw this.panicAt(at, "E100", `Expected ';' after ${after}, found ${describeToken(this.current())}`);
  }

  private expectBlock(after: string): BlockStatement {
    if (!this.is(TokenKind.LBRACE)) {
      this.rejectStrayAssignOperator();
      if (this.isAtEnd()) throw this.panic("E108", `Unexpected end of file, expected '{' after ${after}`);
      throw this.panic("E100", `Expected '{' after ${after}, found ${describeToken(this.current())}`);
    }
    return this.parseBlock();
  }

  // `if x = 3 {` or `let a = b += 1;`
  private rejectStrayAssignOperator(): void {
    const op = ASSIGN_OP_TABLE[this.current().kind];
    if (!op) return;
    const hint = op === "=" ? "Use '==' to compare values." : undefined;
    throw this.panic("E113", `Assignment operator '${op}' cannot be used inside an expression`, hint);
  }

  private expectIdentifier(message: string): Identifier {
    const t = this.current();
    if (t.kind === TokenKind.IDENTIFIER) return this.identifierFrom(this.advance());
    if (t.kind === TokenKind.EOF) throw this.panic("E108", `Unexpected end of file. ${message}`);
    throw this.panic("E109", `${message}, found ${describeToken(t)}`);
  }

  private identifierFrom(t: Token): Identifier {
    return { kind: "Identifier", range: t.range, name: t.lexeme };
  }

  private typeRefFrom(t: Token): TypeRef {
    return { kind: "TypeRef", range: t.range, name: t.lexeme };
  }

  /* =========================================================
     Errors & recovery
     ========================================================= */

  private recordAt(range: Range, code: string, message: string, hint?: string): void {
    this.diagnostics.push(mkError(code, message, range, "parser", hint));
  }

  /** Records a diagnostic at the current token and returns the panic to throw. */
  private panic(code: string, message: string, hint?: string): SyntaxPanic {
    return this.panicAt(this.current().range, code, message, hint);
  }

  private panicAt(range: Range, code: string, message: string, hint?: string): SyntaxPanic {
    this.recordAt(range, code, message, hint);
    return new SyntaxPanic();
  }

  /**
   * Skips to the next boundary. Braces opened while skipping are balanced so a
   * broken `if` header does not close the enclosing function early.
   */
  private synchronize(mode: SyncMode): void {
    let depth = 0;

    while (!this.isAtEnd()) {
      const k = this.current().kind;

      if (k === TokenKind.KW_FN || k === TokenKind.KW_SIGNAL || k === TokenKind.AT) return;

      if (depth === 0) {
        if (k === TokenKind.SEMICOLON) {
          this.advance();
          return;
        }
        if (k === TokenKind.KW_LET) return;
        if (k === TokenKind.RBRACE) {
          if (mode === "declaration") this.advance();
          return;
        }
      }

      if (k === TokenKind.LBRACE) depth++;
      if (k === TokenKind.RBRACE) {
        depth--;
        this.advance();
        if (depth === 0) return;
        continue;
      }

      this.advance();
    }
  }
}

/* =========================================================
   Helpers
   ========================================================= */

function numberValue(t: Token): number {
  return typeof t.value === "number" ? t.value : Number(t.lexeme);
}

function eofToken(): Token {
  const p: Position = { offset: 0, line: 0, column: 0 };
  return { kind: TokenKind.EOF, lexeme: "", range: { start: p, end: p } };
}
