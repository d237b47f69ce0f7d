// src/language/compile.ts
//
// Glint Language Service (high-level)
// -----------------------------------
// The single entry point for turning source text into something runnable.
// It coordinates:
// - Lexer
// - Parser
// - Type checker (+ property / signal metadata)
// - Lint
//
// Exports:
//   - compile(source, options): Result<CompiledScript, Diagnostic[]>
//   - analyzeText(source, options): AnalysisResult (every diagnostic, for tooling)
//
// Stages stop early: lexical errors skip parsing, syntax errors skip checking.

import type { Program } from "../core/ast";
import { tokenize, type Token } from "../core/lexer";
import type { PropertyMetadata, SignalMetadata } from "../core/metadata";
import { parseTokens } from "../core/parser";
import { createCompiledProgram, type CompiledProgram } from "../core/program";
import { checkProgram, type CheckResult } from "../core/semantic";
import { capDiagnostics, dedupeDiagnostics, error as mkError, hasErrors, type Diagnostic } from "../diagnostics/errors";
import { lintProgram, type LintOptions } from "../diagnostics/lint";
import { SILENT_LOGGER, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

/* =========================================================
   Public types
   ========================================================= */

export type CompileOptions = {
  /** Used in the compiled program and log lines. */
  filename?: string;
  /** Emit lint warnings (all rules, or a selection). */
  lint?: boolean | Partial<LintOptions>;
  /** Diagnostics beyond this count are dropped, warnings before errors. */
  maxDiagnostics?: number;
  logger?: Logger;
};

export const DEFAULT_COMPILE_OPTIONS = Object.freeze({
  lint: true,
  maxDiagnostics: 200,
});

export type StageTimings = {
  lexMs: number;
  parseMs: number;
  checkMs: number;
  lintMs: number;
  totalMs: number;
};

export type AnalysisResult = {
  ok: boolean;
  tokens: Token[];
  /** Null when lexing failed. */
  program: Program | null;
  /** Sorted, de-duplicated, errors and warnings together; errors survive the cap first. */
  diagnostics: Diagnostic[];
  /** Null when lexing or parsing failed. */
  check: CheckResult | null;
  timings: StageTimings;
};

export type CompiledScript = {
  program: CompiledProgram;
  properties: readonly PropertyMetadata[];
  signals: readonly SignalMetadata[];
  warnings: Diagnostic[];
};

/* =========================================================
   Main entrypoints
   ========================================================= */

export function analyzeText(source: string, options: CompileOptions = {}): AnalysisResult {
  const log = (options.logger ?? SILENT_LOGGER).child("compile");
  const maxDiagnostics = options.maxDiagnostics ?? DEFAULT_COMPILE_OPTIONS.maxDiagnostics;
  const lintSetting = options.lint ?? DEFAULT_COMPILE_OPTIONS.lint;
  const total = log.time(`compile ${options.filename ?? "<source>"}`);

  const timings: StageTimings = { lexMs: 0, parseMs: 0, checkMs: 0, lintMs: 0, totalMs: 0 };
  const finish = (
    tokens: Token[],
    program: Program | null,
    check: CheckResult | null,
    collected: Diagnostic[]
  ): AnalysisResult => {
    const all = dedupeDiagnostics(collected);
    const diagnostics = capDiagnostics(all, maxDiagnostics);
    timings.totalMs = total.end({ diagnostics: all.length });
    return { ok: !hasErrors(all), tokens, program, diagnostics, check, timings };
  };

  // -------- LEX --------
  let t = log.time("lex");
  const lex = tokenize(source);
  timings.lexMs = t.end();

  if (lex.errors.length > 0) {
    return finish(
      lex.tokens,
      null,
      null,
      lex.errors.map((e) => mkError(e.code, e.message, e.range, "lexer"))
    );
  }

  // -------- PARSE --------
  t = log.time("parse");
  const parse = parseTokens(lex.tokens);
  timings.parseMs = t.end();

  if (hasErrors(parse.diagnostics)) return finish(lex.tokens, parse.program, null, parse.diagnostics);

  // -------- CHECK --------
  t = log.time("check");
  const check = checkProgram(parse.program);
  timings.checkMs = t.end();

  // -------- LINT --------
  let lintDiags: Diagnostic[] = [];
  if (lintSetting !== false) {
    t = log.time("lint");
    lintDiags = lintProgram(parse.program, check.symbols, lintSetting === true ? {} : lintSetting);
    timings.lintMs = t.end();
  }

  return finish(lex.tokens, parse.program, check, [...parse.diagnostics, ...check.diagnostics, ...lintDiags]);
}

/**
 * Compiles a script for execution. On failure the full diagnostic list is
 * returned (warnings included), never just the first error.
 */
export function compile(source: string, options: CompileOptions = {}): Result<CompiledScript, Diagnostic[]> {
  const analysis = analyzeText(source, options);

  if (!analysis.ok || !analysis.program || !analysis.check) return err(analysis.diagnostics);

  const program = createCompiledProgram(analysis.program, analysis.check, options.filename ?? null);
  return ok({
    program,
    properties: program.properties,
    signals: [...program.signals.values()],
    warnings: analysis.diagnostics.filter((d) => d.severity !== "error"),
  });
}
