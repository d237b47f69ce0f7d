import { describe, expect, it } from "vitest";

import { analyzeText, compile } from "../../src/language/compile";
import { createLogger } from "../../src/utils/logger";

const SCRIPT = `
signal scored(points: i32);
@export(range(0, 100)) let mut score: i32 = 0;
@export(enum("Low", "High")) let mut quality: String = "High";

fn add(points: i32) {
  score += points;
  emit_signal("scored", points);
}
`;

describe("compile", () => {
  it("produces the same metadata on every compile", () => {
    const a = compile(SCRIPT, { filename: "score.glint" });
    const b = compile(SCRIPT, { filename: "score.glint" });
    if (!a.ok || !b.ok) throw new Error("expected both compiles to succeed");

    expect(a.value.properties).toEqual(b.value.properties);
    expect(a.value.signals).toEqual(b.value.signals);
    expect(a.value.properties.map((p) => p.name)).toEqual(["score", "quality"]);
    expect(a.value.signals).toEqual([{ name: "scored", params: [{ name: "points", type: "i32" }] }]);
    expect(a.value.program.filename).toBe("score.glint");
  });

  it("returns identical diagnostics and programs on every compile", () => {
    const src = 'fn f() { let _x: i32 = 1.5; velocty += 1; emit_signal("nope"); }';
    const a = compile(src);
    const b = compile(src);
    if (a.ok || b.ok) throw new Error("expected both compiles to fail");
    expect(a.error.map((d) => d.code)).toEqual(["E200", "E201", "E302"]);
    expect(JSON.stringify(a.error)).toBe(JSON.stringify(b.error));

    expect(analyzeText(SCRIPT).program).toEqual(analyzeText(SCRIPT).program);
  });

  it("returns warnings alongside a successful compile", () => {
    const r = compile("fn _ready() { let unused = 1; }");
    if (!r.ok) throw new Error("expected success");
    expect(r.value.warnings.map((d) => d.code)).toEqual(["W001"]);
  });

  it("honours the lint selection", () => {
    const off = compile("fn _ready() { let unused = 1; }", { lint: false });
    const partial = compile("fn _ready() { let unused = 1; }", { lint: { unusedVariables: false } });
    if (!off.ok || !partial.ok) throw new Error("expected success");
    expect(off.value.warnings).toEqual([]);
    expect(partial.value.warnings).toEqual([]);
  });

  it("returns every diagnostic on failure", () => {
    const r = compile("fn f() { let _x: i32 = 1.5; let unused = 1; }");
    if (r.ok) throw new Error("expected failure");
    expect(r.error.map((d) => d.code).sort()).toEqual(["E200", "W001"]);
  });

  it("logs stage timings through the given logger", () => {
    const lines: string[] = [];
    const sink = { error: () => {}, warn: () => {}, info: () => {}, debug: (m: string) => lines.push(m) };
    const logger = createLogger({ name: "t", level: "debug", sink, timestamp: false, includePayload: false });

    compile("let x = 1;", { logger, filename: "x.glint" });
    expect(lines.some((l) => l.startsWith("[t:compile] DEBUG: compile x.glint took "))).toBe(true);
    expect(lines.some((l) => l.startsWith("[t:compile] DEBUG: lex took "))).toBe(true);
  });
});

describe("analyzeText", () => {
  it("stops after lexing when the lexer fails", () => {
    const a = analyzeText("let x = #;");
    expect(a.ok).toBe(false);
    expect(a.program).toBeNull();
    expect(a.check).toBeNull();
    expect(a.diagnostics.map((d) => [d.code, d.source])).toEqual([["E001", "lexer"]]);
  });

  it("skips checking when parsing fails", () => {
    const a = analyzeText("let x = 1 let y = 2;");
    expect(a.program).not.toBeNull();
    expect(a.check).toBeNull();
    expect(a.diagnostics.map((d) => d.code)).toEqual(["E100"]);
  });

  it("caps the number of diagnostics", () => {
    const src = "let a = p; let b = q; let c = r;";
    expect(analyzeText(src).diagnostics).toHaveLength(3);
    expect(analyzeText(src, { maxDiagnostics: 2 }).diagnostics).toHaveLength(2);
  });

  it("never lets warnings push an error out of a failed compile", () => {
    const locals = Array.from({ length: 210 }, (_, i) => `let u${i} = ${i};`).join(" ");
    const src = `fn _ready() { ${locals} let bad: i32 = 1.5; print(bad); }`;

    const r = compile(src);
    if (r.ok) throw new Error("expected the type error to fail the compile");
    expect(r.error).toHaveLength(200);
    expect(r.error.filter((d) => d.code === "E200")).toHaveLength(1);
    expect(r.error[199].code).toBe("E200");

    const capped = analyzeText(src, { maxDiagnostics: 1 });
    expect(capped.ok).toBe(false);
    expect(capped.diagnostics.map((d) => d.code)).toEqual(["E200"]);
  });

  it("reports a clean script as ok", () => {
    const a = analyzeText(SCRIPT);
    expect(a.ok).toBe(true);
    expect(a.diagnostics).toEqual([]);
    expect(a.check?.properties).toHaveLength(2);
  });
});
