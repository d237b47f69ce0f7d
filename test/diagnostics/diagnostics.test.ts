import { describe, expect, it } from "vitest";

import { analyzeText } from "../../src/language/compile";
import { describeErrorCode, isKnownErrorCode, listErrorCodes } from "../../src/diagnostics/codes";
import {
  capDiagnostics,
  error,
  formatDiagnostic,
  mergeDiagnostics,
  renderDiagnostic,
  sortDiagnostics,
  warn,
} from "../../src/diagnostics/errors";
import { didYouMean, isSimilarIdentifier, levenshtein, similarity, suggestSimilar } from "../../src/diagnostics/suggest";
import type { Range } from "../../src/core/ast";

const SOURCE = "fn f() {\n    let mut velocity = 1;\n    velocty += 1;\n}";

function at(offset: number): Range {
  return { start: { offset, line: 0, column: offset }, end: { offset: offset + 1, line: 0, column: offset + 1 } };
}

describe("suggestions", () => {
  it("measures edit distance and similarity", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(similarity("abc", "abd")).toBe(66);
  });

  it("scales the allowed distance with name length", () => {
    expect(isSimilarIdentifier("hpp", "hp")).toBe(true);
    expect(isSimilarIdentifier("spd", "speed")).toBe(false);
    expect(isSimilarIdentifier("positon", "position")).toBe(true);
  });

  it("orders candidates by distance, then name", () => {
    expect(suggestSimilar("postion", ["position", "potion", "portion", "rotation"])).toEqual([
      "portion",
      "position",
      "potion",
    ]);
  });

  it("never suggests the name itself", () => {
    expect(didYouMean("hp", ["hp"])).toBeUndefined();
    expect(didYouMean("sped", ["speed", "hp"])).toBe("Did you mean 'speed'?");
  });
});

describe("diagnostic formatting", () => {
  const [d] = analyzeText(SOURCE, { lint: false }).diagnostics;

  it("uses 1-based positions", () => {
    expect(d.code).toBe("E201");
    expect([d.line, d.column, d.length]).toEqual([3, 5, 7]);
  });

  it("formats a one-line summary with the hint", () => {
    expect(formatDiagnostic(d)).toBe("3:5: error[E201]: Undefined variable 'velocty'\n  help: Did you mean 'velocity'?");
  });

  it("renders the source line with a caret under the span", () => {
    expect(renderDiagnostic(SOURCE, d, "player.glint").split("\n")).toEqual([
      "player.glint:3:5: error[E201]: Undefined variable 'velocty'",
      "  |",
      "3 |     velocty += 1;",
      "  |     ^^^^^^^",
      "help: Did you mean 'velocity'?",
    ]);
  });

  it("sorts by offset, errors first at the same place", () => {
    const sorted = sortDiagnostics([warn("W001", "b", at(4)), error("E201", "c", at(9)), error("E200", "a", at(4))]);
    expect(sorted.map((x) => x.code)).toEqual(["E200", "W001", "E201"]);
  });

  it("merges lists into position order", () => {
    const merged = mergeDiagnostics([error("E201", "c", at(9))], null, [warn("W001", "b", at(2))]);
    expect(merged.map((x) => x.code)).toEqual(["W001", "E201"]);
  });

  it("keeps errors when capping a list", () => {
    const list = [warn("W001", "a", at(1)), warn("W001", "b", at(2)), warn("W001", "c", at(3)), error("E200", "d", at(8))];
    expect(capDiagnostics(list, 2).map((x) => x.message)).toEqual(["a", "d"]);
    expect(capDiagnostics(list, 1).map((x) => x.code)).toEqual(["E200"]);
    expect(capDiagnostics(list, 10)).toHaveLength(4);
    expect(capDiagnostics(list, 0)).toEqual([]);
  });
});

describe("error code registry", () => {
  it("describes known codes", () => {
    expect(describeErrorCode("E201")).toEqual({ code: "E201", family: "type", title: "Undefined variable" });
    expect(describeErrorCode("E400")?.family).toBe("runtime");
    expect(isKnownErrorCode("E999")).toBe(false);
  });

  it("lists a family", () => {
    expect(listErrorCodes("lexical").map((c) => c.code)).toEqual(["E001", "E002", "E003", "E004"]);
  });

  it("has unique codes", () => {
    const all = listErrorCodes().map((c) => c.code);
    expect(new Set(all).size).toBe(all.length);
  });
});
