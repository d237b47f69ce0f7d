import type { CheckResult } from "../../src/core/semantic";
import { analyzeText } from "../../src/language/compile";

export const SCRIPT = [
  "@export(range(0, 10)) let mut hp: i32 = 5;",
  "signal hit(amount: i32);",
  "fn heal(n: i32) -> i32 { let total = hp + n; return total; }",
  "fn _ready() { self.position.x = 1.0; print(hp); }",
].join("\n");

export function checkScript(source: string = SCRIPT): CheckResult {
  const analysis = analyzeText(source);
  if (!analysis.check) throw new Error("expected the script to parse");
  return analysis.check;
}

/** Offset of the `nth` occurrence of `needle` plus `shift`. */
export function offsetOf(needle: string, shift = 0, nth = 0, source: string = SCRIPT): number {
  let at = -1;
  for (let i = 0; i <= nth; i++) {
    at = source.indexOf(needle, at + 1);
    if (at < 0) throw new Error(`'${needle}' not found`);
  }
  return at + shift;
}
