import { describe, expect, it } from "vitest";

import { parseSource } from "../../src/core/parser";
import { getDocumentSymbols } from "../../src/lsp/symbols";
import { SCRIPT } from "./fixture";

describe("getDocumentSymbols", () => {
  it("lists top-level declarations in source order", () => {
    const symbols = getDocumentSymbols(parseSource(SCRIPT).program);
    expect(symbols.map((s) => [s.name, s.kind, s.detail])).toEqual([
      ["hp", "property", "@export let mut: i32"],
      ["hit", "event", "signal(amount: i32)"],
      ["heal", "function", "fn(n: i32) -> i32"],
      ["_ready", "function", "fn()"],
    ]);
  });

  it("nests parameters under functions", () => {
    const heal = getDocumentSymbols(parseSource(SCRIPT).program).find((s) => s.name === "heal");
    expect(heal?.children?.map((c) => [c.name, c.kind, c.detail])).toEqual([["n", "variable", "i32"]]);
    expect(heal?.selectionRange.start).toEqual({ offset: 71, line: 2, column: 3 });
  });

  it("marks immutable globals as constants", () => {
    const [sym] = getDocumentSymbols(parseSource("let base = 1;").program);
    expect(sym.kind).toBe("constant");
    expect(sym.detail).toBe("let");
  });

  it("returns nothing without a program", () => {
    expect(getDocumentSymbols(null)).toEqual([]);
  });
});
