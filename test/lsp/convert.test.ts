import { CompletionItemKind, DiagnosticSeverity, SymbolKind } from "vscode-languageserver";
import { describe, expect, it } from "vitest";

import type { Range } from "../../src/core/ast";
import { error, warn } from "../../src/diagnostics/errors";
import {
  DIAGNOSTIC_SOURCE,
  toDocumentSymbol,
  toLspCompletionItem,
  toLspDiagnostic,
  toLspDiagnostics,
} from "../../src/lsp/convert";

const RANGE: Range = {
  start: { offset: 8, line: 0, column: 8 },
  end: { offset: 9, line: 0, column: 9 },
};

describe("LSP conversion", () => {
  it("maps a diagnostic with its hint folded into the message", () => {
    expect(toLspDiagnostic(error("E201", "Undefined variable 'y'", RANGE, "checker", "Did you mean 'x'?"))).toEqual({
      severity: DiagnosticSeverity.Error,
      range: { start: { line: 0, character: 8 }, end: { line: 0, character: 9 } },
      message: "Undefined variable 'y'\nHint: Did you mean 'x'?",
      code: "E201",
      source: DIAGNOSTIC_SOURCE,
    });
  });

  it("maps warnings and caps the list", () => {
    const list = [warn("W001", "a", RANGE, "lint"), warn("W001", "b", RANGE, "lint")];
    const out = toLspDiagnostics(list, 1);
    expect(out).toHaveLength(1);
    expect(out[0].severity).toBe(DiagnosticSeverity.Warning);
    expect(out[0].message).toBe("a");
    expect(toLspDiagnostics(list, -1)).toEqual([]);
  });

  it("defaults a completion's insert text to its label", () => {
    const item = toLspCompletionItem({ label: "speed", kind: "variable", detail: "let mut speed: f32" });
    expect(item.kind).toBe(CompletionItemKind.Variable);
    expect(item.insertText).toBe("speed");
    expect(item.detail).toBe("let mut speed: f32");
  });

  it("converts nested document symbols", () => {
    const sym = toDocumentSymbol({
      name: "heal",
      kind: "function",
      range: RANGE,
      selectionRange: RANGE,
      detail: "fn(n: i32)",
      children: [{ name: "n", kind: "variable", range: RANGE, selectionRange: RANGE }],
    });
    expect(sym.kind).toBe(SymbolKind.Function);
    expect(sym.children?.map((c) => [c.name, c.kind])).toEqual([["n", SymbolKind.Variable]]);
  });
});
