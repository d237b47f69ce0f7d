import { describe, expect, it } from "vitest";

import type { GlobalDeclaration, Statement } from "../../src/core/ast";
import { parseSource } from "../../src/core/parser";

function firstGlobal(src: string): GlobalDeclaration {
  const { program, diagnostics } = parseSource(src);
  expect(diagnostics).toEqual([]);
  const decl = program.body[0];
  if (decl?.kind !== "GlobalDeclaration") throw new Error(`expected a global, got ${decl?.kind}`);
  return decl;
}

function bodyOf(src: string): Statement[] {
  const { program, diagnostics } = parseSource(src);
  expect(diagnostics).toEqual([]);
  const decl = program.body[0];
  if (decl?.kind !== "FunctionDeclaration") throw new Error(`expected a function, got ${decl?.kind}`);
  return decl.body.body;
}

describe("parser: declarations", () => {
  it("parses globals, functions and signals in order", () => {
    const { program, diagnostics } = parseSource(`
      signal hit(amount: i32);
      let mut hp: i32 = 10;
      fn damage(n: i32) -> i32 { return hp - n; }
    `);
    expect(diagnostics).toEqual([]);
    expect(program.body.map((d) => d.kind)).toEqual(["SignalDeclaration", "GlobalDeclaration", "FunctionDeclaration"]);

    const fn = program.body[2];
    if (fn.kind !== "FunctionDeclaration") throw new Error(fn.kind);
    expect(fn.name.name).toBe("damage");
    expect(fn.params.map((p) => `${p.name.name}: ${p.typeAnnotation.name}`)).toEqual(["n: i32"]);
    expect(fn.returnType?.name).toBe("i32");
  });

  it("attaches an export annotation with its hint call", () => {
    const g = firstGlobal("@export(range(0, 10, 2)) let mut hp: i32 = 5;");
    expect(g.mutable).toBe(true);
    expect(g.typeAnnotation?.name).toBe("i32");
    expect(g.exportAnnotation?.hint?.name.name).toBe("range");
    expect(g.exportAnnotation?.hint?.args).toHaveLength(3);
  });

  it("accepts a bare @export", () => {
    const g = firstGlobal("@export let speed: f32 = 1.0;");
    expect(g.exportAnnotation).not.toBeNull();
    expect(g.exportAnnotation?.hint).toBeNull();
  });
});

describe("parser: expressions", () => {
  it("binds '*' tighter than '+'", () => {
    const init = firstGlobal("let x = 1 + 2 * 3;").initializer;
    if (init.kind !== "BinaryExpression") throw new Error(init.kind);
    expect(init.operator).toBe("+");
    expect(init.left.kind).toBe("IntLiteral");
    expect(init.right.kind).toBe("BinaryExpression");
    if (init.right.kind === "BinaryExpression") expect(init.right.operator).toBe("*");
  });

  it("is left-associative", () => {
    const init = firstGlobal("let x = 10 - 4 - 3;").initializer;
    if (init.kind !== "BinaryExpression") throw new Error(init.kind);
    expect(init.left.kind).toBe("BinaryExpression");
    expect(init.right.kind).toBe("IntLiteral");
  });

  it("folds a minus into the smallest i32 literal", () => {
    const init = firstGlobal("let x = -2147483648;").initializer;
    if (init.kind !== "IntLiteral") throw new Error(init.kind);
    expect(init.value).toBe(-2147483648);
    expect(init.raw).toBe("-2147483648");
  });

  it("keeps other negative literals as unary expressions", () => {
    const init = firstGlobal("let x = -5;").initializer;
    if (init.kind !== "UnaryExpression") throw new Error(init.kind);
    expect(init.operator).toBe("-");
    expect(init.argument.kind).toBe("IntLiteral");
  });

  it("rejects 2147483648 without a leading minus", () => {
    const { diagnostics } = parseSource("let x = 2147483648;");
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["E004", "Integer literal '2147483648' does not fit in i32"],
    ]);
    expect(parseSource("let x = -(2147483648);").diagnostics.map((d) => d.code)).toEqual(["E004"]);
  });

  it("puts '&&' above '||'", () => {
    const init = firstGlobal("let b = true || false && false;").initializer;
    if (init.kind !== "BinaryExpression") throw new Error(init.kind);
    expect(init.operator).toBe("||");
    expect(init.right.kind).toBe("BinaryExpression");
  });

  it("parses a struct literal", () => {
    const init = firstGlobal("let v = Vector2 { x: 1.0, y: 2.0 };").initializer;
    if (init.kind !== "StructLiteral") throw new Error(init.kind);
    expect(init.typeName.name).toBe("Vector2");
    expect(init.fields.map((f) => f.name.name)).toEqual(["x", "y"]);
  });

  it("keeps the block of 'if x > limit {'", () => {
    const [st] = bodyOf("fn f(x: i32, limit: i32) { if x > limit { print(x); } }");
    if (st.kind !== "IfStatement") throw new Error(st.kind);
    expect(st.test.kind).toBe("BinaryExpression");
    expect(st.consequent.body).toHaveLength(1);
  });

  it("flattens a field assignment target", () => {
    const [st] = bodyOf("fn f() { self.position.x += 1.0; }");
    if (st.kind !== "AssignStatement") throw new Error(st.kind);
    expect(st.operator).toBe("+=");
    expect(st.target.root.kind).toBe("SelfExpression");
    expect(st.target.path.map((p) => p.name)).toEqual(["position", "x"]);
  });

  it("chains else-if", () => {
    const [st] = bodyOf("fn f(a: bool) { if a { } else if !a { } else { } }");
    if (st.kind !== "IfStatement") throw new Error(st.kind);
    expect(st.alternate?.kind).toBe("IfStatement");
  });
});

describe("parser: errors and recovery", () => {
  it("reports a missing ';' just past the previous token", () => {
    const { diagnostics } = parseSource("fn _ready() {\n    let x = 5\n    print(x);\n}");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("E100");
    expect(diagnostics[0].message).toBe("Expected ';' after variable declaration, found identifier 'print'");
    expect(diagnostics[0].line).toBe(2);
    expect(diagnostics[0].column).toBe(14);
  });

  it("reports one error per broken function", () => {
    const { program, diagnostics } = parseSource(`
      fn a() { let x = 1 }
      fn b() { let y = 2 }
      fn c() { let z = 3 }
    `);
    expect(diagnostics.map((d) => d.code)).toEqual(["E100", "E100", "E100"]);
    expect(program.body).toHaveLength(3);
  });

  it("rejects '=' in a condition with a hint", () => {
    const { diagnostics } = parseSource("fn f(x: i32) { if x = 3 { } }");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("E113");
    expect(diagnostics[0].hint).toBe("Use '==' to compare values.");
  });

  it("rejects a literal as an assignment target", () => {
    const { diagnostics } = parseSource("fn f() { 1 = 2; }");
    expect(diagnostics.map((d) => d.code)).toEqual(["E217"]);
  });

  it("reports an unclosed block and still parses the next function", () => {
    const { program, diagnostics } = parseSource("fn a() {\n  let x = 1;\nfn b() { }");
    expect(diagnostics.map((d) => d.code)).toEqual(["E102"]);
    expect(program.body.map((d) => (d.kind === "FunctionDeclaration" ? d.name.name : d.kind))).toEqual(["a", "b"]);
  });

  it("reports an unexpected end of file", () => {
    const { diagnostics } = parseSource("fn a() { let x = 1;");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("E108");
    expect(diagnostics[0].message).toBe("Unexpected end of file, expected '}'");
  });

  it("requires parameter types", () => {
    const { diagnostics } = parseSource("fn a(x) { }");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("E110");
    expect(diagnostics[0].message).toBe("Parameter 'x' is missing a type annotation");
  });

  it("rejects method calls", () => {
    const { diagnostics } = parseSource("fn a() { self.move(1); }");
    expect(diagnostics.map((d) => d.code)).toEqual(["E103"]);
  });

  it("returns lexer errors without parsing", () => {
    const { program, diagnostics } = parseSource("let x = #;");
    expect(program.body).toEqual([]);
    expect(diagnostics.map((d) => [d.code, d.source])).toEqual([["E001", "lexer"]]);
  });
});
