// src/core/ast.ts
//
// Glint AST (Abstract Syntax Tree)
// --------------------------------
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Checker -> types, metadata, diagnostics
//   Evaluator -> execution
//
// The tree is owned top-down: no node points back at its parent. Every node
// carries a source range so later passes can report precise locations.

export type Integer = number;

/* =========================================================
   Source locations
   ========================================================= */

export type Position = {
  /** Absolute offset from file start (0-based). */
  offset: Integer;
  /** Line index (0-based). */
  line: Integer;
  /** Column index (0-based). */
  column: Integer;
};

export type Range = {
  start: Position;
  end: Position;
};

export const UNKNOWN_POSITION: Position = Object.freeze({
  offset: 0,
  line: 0,
  column: 0,
});

export const UNKNOWN_RANGE: Range = Object.freeze({
  start: UNKNOWN_POSITION,
  end: UNKNOWN_POSITION,
});

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = [
  // Program / declarations
  "Program",
  "GlobalDeclaration",
  "FunctionDeclaration",
  "SignalDeclaration",
  "Parameter",
  "ExportAnnotation",
  "HintCall",
  "TypeRef",

  // Statements
  "BlockStatement",
  "LetStatement",
  "AssignStatement",
  "IfStatement",
  "WhileStatement",
  "ReturnStatement",
  "ExpressionStatement",
  "AssignTarget",

  // Expressions
  "Identifier",
  "SelfExpression",
  "FieldAccess",
  "CallExpression",
  "UnaryExpression",
  "BinaryExpression",
  "StructLiteral",
  "StructField",

  // Literals
  "IntLiteral",
  "FloatLiteral",
  "BoolLiteral",
  "StringLiteral",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  kind: NodeKind;
  range: Range;
};

/* =========================================================
   Program / declarations
   ========================================================= */

export type Program = NodeBase & {
  kind: "Program";
  body: Declaration[];
};

export type Declaration = GlobalDeclaration | FunctionDeclaration | SignalDeclaration;

export type TypeRef = NodeBase & {
  kind: "TypeRef";
  /** Written name; resolved (or rejected) by the checker. */
  name: string;
};

export type GlobalDeclaration = NodeBase & {
  kind: "GlobalDeclaration";
  name: Identifier;
  mutable: boolean;
  typeAnnotation: TypeRef | null;
  initializer: Expression;
  exportAnnotation: ExportAnnotation | null;
};

/** `@export` or `@export(range(0, 10, 1))`. */
export type ExportAnnotation = NodeBase & {
  kind: "ExportAnnotation";
  hint: HintCall | null;
};

export type HintCall = NodeBase & {
  kind: "HintCall";
  name: Identifier;
  args: Expression[];
};

export type Parameter = NodeBase & {
  kind: "Parameter";
  name: Identifier;
  typeAnnotation: TypeRef;
};

export type FunctionDeclaration = NodeBase & {
  kind: "FunctionDeclaration";
  name: Identifier;
  params: Parameter[];
  returnType: TypeRef | null;
  body: BlockStatement;
};

export type SignalDeclaration = NodeBase & {
  kind: "SignalDeclaration";
  name: Identifier;
  params: Parameter[];
};

/* =========================================================
   Statements
   ========================================================= */

export type Statement =
  | BlockStatement
  | LetStatement
  | AssignStatement
  | IfStatement
  | WhileStatement
  | ReturnStatement
  | ExpressionStatement;

export type BlockStatement = NodeBase & {
  kind: "BlockStatement";
  body: Statement[];
};

export type LetStatement = NodeBase & {
  kind: "LetStatement";
  name: Identifier;
  mutable: boolean;
  typeAnnotation: TypeRef | null;
  initializer: Expression;
};

export const ASSIGN_OPERATORS = ["=", "+=", "-=", "*=", "/="] as const;
export type AssignOperator = (typeof ASSIGN_OPERATORS)[number];

/** `root.a.b`: a root binding followed by a flat list of field names. */
export type AssignTarget = NodeBase & {
  kind: "AssignTarget";
  root: Identifier | SelfExpression;
  path: Identifier[];
};

export type AssignStatement = NodeBase & {
  kind: "AssignStatement";
  target: AssignTarget;
  operator: AssignOperator;
  value: Expression;
};

export type IfStatement = NodeBase & {
  kind: "IfStatement";
  test: Expression;
  consequent: BlockStatement;
  /** `else if` chains nest as an IfStatement. */
  alternate: BlockStatement | IfStatement | null;
};

export type WhileStatement = NodeBase & {
  kind: "WhileStatement";
  test: Expression;
  body: BlockStatement;
};

export type ReturnStatement = NodeBase & {
  kind: "ReturnStatement";
  argument: Expression | null;
};

export type ExpressionStatement = NodeBase & {
  kind: "ExpressionStatement";
  expression: Expression;
};

/* =========================================================
   Expressions
   ========================================================= */

export type Expression =
  | Identifier
  | SelfExpression
  | FieldAccess
  | CallExpression
  | UnaryExpression
  | BinaryExpression
  | StructLiteral
  | Literal;

export type Literal = IntLiteral | FloatLiteral | BoolLiteral | StringLiteral;

export type Identifier = NodeBase & {
  kind: "Identifier";
  name: string;
};

export type SelfExpression = NodeBase & {
  kind: "SelfExpression";
};

export type FieldAccess = NodeBase & {
  kind: "FieldAccess";
  object: Expression;
  field: Identifier;
};

export type CallExpression = NodeBase & {
  kind: "CallExpression";
  callee: Identifier;
  args: Expression[];
};

export type UnaryOperator = "-" | "!";

export type UnaryExpression = NodeBase & {
  kind: "UnaryExpression";
  operator: UnaryOperator;
  argument: Expression;
};

export type BinaryOperator = "+" | "-" | "*" | "/" | "==" | "!=" | "<" | "<=" | ">" | ">=" | "&&" | "||";

export type BinaryExpression = NodeBase & {
  kind: "BinaryExpression";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
};

export type StructField = NodeBase & {
  kind: "StructField";
  name: Identifier;
  value: Expression;
};

export type StructLiteral = NodeBase & {
  kind: "StructLiteral";
  typeName: Identifier;
  /** Source order, duplicates kept. */
  fields: StructField[];
};

export type IntLiteral = NodeBase & {
  kind: "IntLiteral";
  value: number;
  raw: string;
};

export type FloatLiteral = NodeBase & {
  kind: "FloatLiteral";
  value: number;
  raw: string;
};

export type BoolLiteral = NodeBase & {
  kind: "BoolLiteral";
  value: boolean;
};

export type StringLiteral = NodeBase & {
  kind: "StringLiteral";
  value: string;
};

export type AstNode =
  | Program
  | Declaration
  | Parameter
  | ExportAnnotation
  | HintCall
  | TypeRef
  | Statement
  | AssignTarget
  | Expression
  | StructField;

/* =========================================================
   Declaration accessors
   ========================================================= */

export function programGlobals(p: Program): GlobalDeclaration[] {
  return p.body.filter((d): d is GlobalDeclaration => d.kind === "GlobalDeclaration");
}

export function programFunctions(p: Program): FunctionDeclaration[] {
  return p.body.filter((d): d is FunctionDeclaration => d.kind === "FunctionDeclaration");
}

export function programSignals(p: Program): SignalDeclaration[] {
  return p.body.filter((d): d is SignalDeclaration => d.kind === "SignalDeclaration");
}

/** `self.position.x` style text for an assignment target. */
export function targetToString(t: AssignTarget): string {
  const root = t.root.kind === "SelfExpression" ? "self" : t.root.name;
  return [root, ...t.path.map((p) => p.name)].join(".");
}

/* =========================================================
   Visitor / walker
   ========================================================= */

export type Visitor = {
  enter?: (node: AstNode, parent: AstNode | null) => void;
  leave?: (node: AstNode, parent: AstNode | null) => void;
};

export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case "Program":
      return node.body;
    case "GlobalDeclaration": {
      const out: AstNode[] = [];
      if (node.exportAnnotation) out.push(node.exportAnnotation);
      out.push(node.name);
      if (node.typeAnnotation) out.push(node.typeAnnotation);
      out.push(node.initializer);
      return out;
    }
    case "ExportAnnotation":
      return node.hint ? [node.hint] : [];
    case "HintCall":
      return [node.name, ...node.args];
    case "FunctionDeclaration": {
      const out: AstNode[] = [node.name, ...node.params];
      if (node.returnType) out.push(node.returnType);
      out.push(node.body);
      return out;
    }
    case "SignalDeclaration":
      return [node.name, ...node.params];
    case "Parameter":
      return [node.name, node.typeAnnotation];
    case "BlockStatement":
      return node.body;
    case "LetStatement": {
      const out: AstNode[] = [node.name];
      if (node.typeAnnotation) out.push(node.typeAnnotation);
      out.push(node.initializer);
      return out;
    }
    case "AssignStatement":
      return [node.target, node.value];
    case "AssignTarget":
      return [node.root, ...node.path];
    case "IfStatement": {
      const out: AstNode[] = [node.test, node.consequent];
      if (node.alternate) out.push(node.alternate);
      return out;
    }
    case "WhileStatement":
      return [node.test, node.body];
    case "ReturnStatement":
      return node.argument ? [node.argument] : [];
    case "ExpressionStatement":
      return [node.expression];
    case "FieldAccess":
      return [node.object, node.field];
    case "CallExpression":
      return [node.callee, ...node.args];
    case "UnaryExpression":
      return [node.argument];
    case "BinaryExpression":
      return [node.left, node.right];
    case "StructLiteral":
      return [node.typeName, ...node.fields];
    case "StructField":
      return [node.name, node.value];
    case "TypeRef":
    case "Identifier":
    case "SelfExpression":
    case "IntLiteral":
    case "FloatLiteral":
    case "BoolLiteral":
    case "StringLiteral":
      return [];
  }
}

export function walkAst(root: AstNode, visitor: Visitor): void {
  const visit = (node: AstNode, parent: AstNode | null): void => {
    visitor.enter?.(node, parent);
    for (const child of childrenOf(node)) visit(child, node);
    visitor.leave?.(node, parent);
  };
  visit(root, null);
}
