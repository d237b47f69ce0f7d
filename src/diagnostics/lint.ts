// src/diagnostics/lint.ts
//
// Glint Lint Rules
// ----------------
// Lint sits "above" type checking:
// - semantic.ts reports what makes a script invalid
// - lint.ts reports suspicious but valid code
//
// Warnings never stop a script from compiling. Names starting with `_` are
// exempt from the usage rules.
//
// Export:
//   - lintProgram(program, symbols): Diagnostic[]

import type { BlockStatement, Program } from "../core/ast";
import { walkAst } from "../core/ast";
import { alwaysReturns, type SymbolInfo } from "../core/semantic";
import { warn, type Diagnostic } from "./errors";

export type LintOptions = {
  unusedVariables: boolean;
  unreachableCode: boolean;
  needlessMut: boolean;
};

export const DEFAULT_LINT_OPTIONS: LintOptions = {
  unusedVariables: true,
  unreachableCode: true,
  needlessMut: true,
};

export function lintProgram(
  program: Program,
  symbols: readonly SymbolInfo[],
  options: Partial<LintOptions> = {}
): Diagnostic[] {
  const linter = new Linter({ ...DEFAULT_LINT_OPTIONS, ...options });
  linter.lint(program, symbols);
  return linter.diagnostics;
}

class Linter {
  public readonly diagnostics: Diagnostic[] = [];
  private readonly opts: LintOptions;

  constructor(opts: LintOptions) {
    this.opts = opts;
  }

  lint(program: Program, symbols: readonly SymbolInfo[]): void {
    for (const sym of symbols) this.lintSymbol(sym);

    if (this.opts.unreachableCode) {
      walkAst(program, {
        enter: (node) => {
          if (node.kind === "BlockStatement") this.lintBlock(node);
        },
      });
    }
  }

  /* =========================================================
     Rules
     ========================================================= */

  private lintSymbol(sym: SymbolInfo): void {
    if (sym.kind !== "local" || sym.name.startsWith("_")) return;

    if (this.opts.unusedVariables && sym.reads === 0) {
      this.diagnostics.push(
        warn("W001", `Variable '${sym.name}' is never used`, sym.range, "lint", `Rename it to '_${sym.name}' to silence this.`)
      );
    }

    if (this.opts.needlessMut && sym.mutable && sym.writes === 0) {
      this.diagnostics.push(
        warn("W003", `Variable '${sym.name}' is declared 'mut' but never reassigned`, sym.range, "lint", "Remove 'mut'.")
      );
    }
  }

  // Only the first dead statement of a block is reported.
  private lintBlock(block: BlockStatement): void {
    const exit = block.body.findIndex((st) => alwaysReturns(st));
    if (exit < 0 || exit === block.body.length - 1) return;

    const dead = block.body[exit + 1];
    this.diagnostics.push(warn("W002", "Unreachable code", dead.range, "lint"));
  }
}
