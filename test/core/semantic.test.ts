import { describe, expect, it } from "vitest";

import { parseSource } from "../../src/core/parser";
import { checkProgram, type CheckResult } from "../../src/core/semantic";
import { color, float, str } from "../../src/core/values";

function check(src: string): CheckResult {
  const { program, diagnostics } = parseSource(src);
  expect(diagnostics).toEqual([]);
  return checkProgram(program);
}

function codes(src: string): string[] {
  return check(src).diagnostics.map((d) => d.code);
}

describe("checker: bindings and assignment", () => {
  it("widens i32 to f32 but never narrows", () => {
    expect(codes("let x: f32 = 1;")).toEqual([]);

    const [d] = check("let x: i32 = 1.5;").diagnostics;
    expect(d.code).toBe("E200");
    expect(d.message).toBe("Type mismatch: 'x' is declared as i32 but initialized with f32");
    expect(d.hint).toBe("f32 never converts to i32 implicitly.");
  });

  it("reports an assignment to an immutable local exactly once", () => {
    const { diagnostics } = check("fn f() { let x = 1; x = 2; }");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("E207");
    expect(diagnostics[0].message).toBe("Cannot assign to immutable variable 'x'");
    expect(diagnostics[0].hint).toBe("Declare it as 'let mut x'.");
  });

  it("treats parameters as immutable", () => {
    const [d] = check("fn f(n: i32) { n += 1; }").diagnostics;
    expect(d.code).toBe("E216");
    expect(d.hint).toBe("Parameters are immutable.");
  });

  it("rejects a float assigned to an i32 variable", () => {
    const [d] = check("fn f() { let mut n = 1; n = 2.5; }").diagnostics;
    expect(d.code).toBe("E219");
    expect(d.message).toBe("Cannot assign a value of type f32 to 'n' of type i32");
  });

  it("allows writes through a Node handle held in an immutable binding", () => {
    expect(
      codes(`
        fn _ready() {
          self.position.x = 3.0;
          let p = get_parent();
          p.position = Vector2 { x: 0.0, y: 1 };
        }
      `)
    ).toEqual([]);
  });

  it("rejects assigning to self", () => {
    expect(codes("fn f() { self = get_parent(); }")).toEqual(["E217"]);
  });

  it("suggests a close name for an undefined variable", () => {
    const [d] = check("fn f() { let mut velocity = 1; velocty += 1; }").diagnostics;
    expect(d.code).toBe("E201");
    expect(d.message).toBe("Undefined variable 'velocty'");
    expect(d.hint).toBe("Did you mean 'velocity'?");
  });

  it("only lets a global see the globals declared before it", () => {
    expect(codes("let a = b; let b = 1;")).toEqual(["E201"]);
  });

  it("suggests the real name for a foreign type", () => {
    const [d] = check("let x: int = 1;").diagnostics;
    expect(d.code).toBe("E203");
    expect(d.hint).toBe("Did you mean 'i32'?");
  });
});

describe("checker: expressions and control flow", () => {
  it("requires bool conditions", () => {
    const [d] = check("fn f() { if 1 { } }").diagnostics;
    expect(d.code).toBe("E211");
    expect(d.message).toBe("Condition of 'if' must be bool, found i32");
  });

  it("rejects arithmetic on bools and negation of strings", () => {
    expect(codes('fn f() { let a = true + 1; let b = -"s"; }')).toEqual(["E212", "E213"]);
  });

  it("concatenates strings", () => {
    expect(codes('let s = "a" + "b";')).toEqual([]);
  });

  it("requires a return on every path", () => {
    const [d] = check("fn f(a: bool) -> i32 { if a { return 1; } }").diagnostics;
    expect(d.code).toBe("E206");
    expect(d.message).toBe("Function 'f' must return a value of type i32 on every path");
    expect(codes("fn f(a: bool) -> i32 { if a { return 1; } else { return 2; } }")).toEqual([]);
  });

  it("checks call arity and argument types", () => {
    const src = `
      fn add(a: i32, b: i32) -> i32 { return a + b; }
      fn _ready() { add(1); add(1, 2.0); }
    `;
    const { diagnostics } = check(src);
    expect(diagnostics.map((d) => d.code)).toEqual(["E204", "E205"]);
    expect(diagnostics[0].message).toBe("Function 'add' expects 2 arguments, found 1");
    expect(diagnostics[1].message).toBe("Argument 'b' of 'add' expects i32, found f32");
  });

  it("lets a function call one declared later", () => {
    expect(codes("fn _ready() { helper(); } fn helper() { }")).toEqual([]);
  });

  it("forbids user calls in global initializers", () => {
    expect(codes("fn five() -> i32 { return 5; } let g = five();")).toEqual(["E220"]);
  });

  it("refuses functions named after built-ins", () => {
    expect(codes("fn print() { }")).toEqual(["E208"]);
  });

  it("reports unknown fields with the available ones", () => {
    const [d] = check("fn f(e: InputEvent) { print(e.key); }").diagnostics;
    expect(d.code).toBe("E215");
    expect(d.hint).toBe("Available fields: action, pressed.");
  });
});

describe("checker: struct literals", () => {
  it("reports missing and duplicate fields", () => {
    const { diagnostics } = check("let a = Vector2 { x: 1.0 }; let b = Vector2 { x: 1.0, x: 2.0, y: 0.0 };");
    expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["E701", "Missing field 'y' in Vector2 literal"],
      ["E702", "Duplicate field 'x' in Vector2 literal"],
    ]);
  });

  it("reports unknown fields and mistyped values", () => {
    expect(codes('let c = Color { r: 1.0, g: 1.0, b: 1.0, alpha: 1.0, a: "x" };')).toEqual(["E703", "E704"]);
  });
});

describe("checker: signals and lifecycle", () => {
  it("validates emit_signal against the declaration", () => {
    const { diagnostics } = check(`
      signal hit(amount: i32);
      fn _ready() {
        emit_signal("hitt", 1);
        emit_signal("hit");
        emit_signal("hit", true);
        emit_signal("hit", 3);
      }
    `);
    expect(diagnostics.map((d) => d.code)).toEqual(["E302", "E303", "E304"]);
    expect(diagnostics[0].hint).toBe("Did you mean 'hit'?");
    expect(diagnostics[1].message).toBe("Signal 'hit' expects 1 argument, found 0");
    expect(diagnostics[2].message).toBe("Argument 'amount' of signal 'hit' expects i32, found bool");
  });

  it("rejects duplicate signals", () => {
    expect(codes("signal a(); signal a();")).toEqual(["E301"]);
  });

  it("checks lifecycle signatures", () => {
    const [d] = check("fn _process(delta: i32) { }").diagnostics;
    expect(d.code).toBe("E305");
    expect(d.hint).toBe("Expected 'fn _process(delta: f32)' returning void.");
  });

  it("records lifecycle functions and signal metadata", () => {
    const result = check("signal died(); fn _ready() { } fn _input(event: InputEvent) { }");
    expect(result.diagnostics).toEqual([]);
    expect([...result.lifecycle.entries()]).toEqual([
      ["ready", "_ready"],
      ["input", "_input"],
    ]);
    expect(result.signals).toEqual([{ name: "died", params: [] }]);
  });
});

describe("checker: exported properties", () => {
  it("builds property metadata with hints and defaults", () => {
    const result = check(`
      @export(range(0.0, 1.0)) let mut volume: f32 = 0.5;
      @export(enum("Easy", "Hard")) let mut mode: String = "Easy";
      @export let mut tint: Color = Color { r: 1.0, g: 0.5, b: 0.0, a: 1.0 };
    `);
    expect(result.diagnostics).toEqual([]);
    expect(result.properties).toEqual([
      { name: "volume", type: "f32", hint: { kind: "range", min: 0, max: 1, step: 0.001 }, defaultValue: float(0.5) },
      { name: "mode", type: "String", hint: { kind: "enum", values: ["Easy", "Hard"] }, defaultValue: str("Easy") },
      { name: "tint", type: "Color", hint: { kind: "none" }, defaultValue: color(1, 0.5, 0, 1) },
    ]);
  });

  it("defaults an i32 range step to 1", () => {
    const [prop] = check("@export(range(0, 10)) let mut hp: i32 = 5;").properties;
    expect(prop.hint).toEqual({ kind: "range", min: 0, max: 10, step: 1 });
  });

  it("requires exported variables to be mutable", () => {
    const result = check("@export let speed: f32 = 1.0;");
    expect(result.diagnostics.map((d) => d.code)).toEqual(["E812"]);
    expect(result.properties).toEqual([]);
  });

  it("rejects non-constant defaults and bad hints", () => {
    expect(codes("let base = 1.0; @export let mut s: f32 = base;")).toEqual(["E813"]);
    expect(codes("@export(range(5, 1)) let mut n: i32 = 3;")).toEqual(["E805"]);
    expect(codes('@export(range(0, 1)) let mut s: String = "";')).toEqual(["E802"]);
    expect(codes('@export(enum("a", "b")) let mut m: String = "c";')).toEqual(["E807"]);
    expect(codes('@export(file("*.png")) let mut n: i32 = 0;')).toEqual(["E804"]);
  });

  it("suggests the closest hint name", () => {
    const [d] = check("@export(rnge(0, 1)) let mut n: i32 = 0;").diagnostics;
    expect(d.code).toBe("E806");
    expect(d.hint).toBe("Did you mean 'range'?");
  });
});
