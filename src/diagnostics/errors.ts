// src/diagnostics/errors.ts
//
// Glint diagnostics model + helpers
// ---------------------------------
// One shared format for:
// - Lexer errors
// - Parser errors
// - Type checker diagnostics
// - Lint warnings
//
// Ranges are stored 0-based (as produced by the lexer); the public
// line/column pair on every Diagnostic is 1-based.

import type { Range } from "../core/ast";

export type Severity = "error" | "warning";

export type DiagnosticSource = "lexer" | "parser" | "checker" | "lint" | "runtime";

export type Diagnostic = {
  severity: Severity;
  /** Stable registry code, e.g. "E201". */
  code: string;
  message: string;

  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
  length: number;

  range: Range;
  source?: DiagnosticSource;
  hint?: string;
};

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: string,
  message: string,
  range: Range,
  source?: DiagnosticSource,
  hint?: string
): Diagnostic {
  const length = Math.max(1, range.end.offset - range.start.offset);
  const d: Diagnostic = {
    severity,
    code,
    message,
    line: range.start.line + 1,
    column: range.start.column + 1,
    length,
    range,
  };
  if (source) d.source = source;
  if (hint) d.hint = hint;
  return d;
}

export function error(code: string, message: string, range: Range, source?: DiagnosticSource, hint?: string): Diagnostic {
  return diag("error", code, message, range, source, hint);
}

export function warn(code: string, message: string, range: Range, source?: DiagnosticSource, hint?: string): Diagnostic {
  return diag("warning", code, message, range, source, hint);
}

export function hasErrors(list: readonly Diagnostic[]): boolean {
  return list.some((d) => d.severity === "error");
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<readonly Diagnostic[] | undefined | null>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (!l) continue;
    out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start.offset;
    const bo = b.range.start.offset;
    if (ao !== bo) return ao - bo;

    // errors first
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
  }
}

/**
 * Keeps at most `max` diagnostics, errors before warnings, returned in
 * position order.
 */
export function capDiagnostics(list: readonly Diagnostic[], max: number): Diagnostic[] {
  const limit = Math.max(0, max);
  if (list.length <= limit) return sortDiagnostics(list);

  const errors = list.filter((d) => d.severity === "error").slice(0, limit);
  const warnings = list.filter((d) => d.severity !== "error").slice(0, limit - errors.length);
  return mergeDiagnostics(errors, warnings);
}

/* =========================================================
   De-duplication
   ========================================================= */

export function dedupeDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.range.start.offset}|${d.range.end.offset}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

/* =========================================================
   Pretty printing
   ========================================================= */

export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = filename ? `${filename}:${d.line}:${d.column}` : `${d.line}:${d.column}`;
  const head = `${loc}: ${d.severity}[${d.code}]: ${d.message}`;
  return d.hint ? `${head}\n  help: ${d.hint}` : head;
}

export function formatDiagnostics(list: readonly Diagnostic[], filename?: string): string {
  return sortDiagnostics(list)
    .map((d) => formatDiagnostic(d, filename))
    .join("\n");
}

/**
 * Renders a diagnostic with its source line and a caret pointer:
 *
 *   3:5: error[E201]: Undefined variable 'velocty'
 *     |
 *   3 |     velocty += 1;
 *     |     ^^^^^^^
 *   help: Did you mean 'velocity'?
 */
export function renderDiagnostic(source: string, d: Diagnostic, filename?: string): string {
  const lines = source.split(/\r?\n/);
  const text = lines[d.line - 1] ?? "";
  const gutter = String(d.line).length;
  const pad = " ".repeat(gutter);
  const caretLen = Math.max(1, Math.min(d.length, Math.max(1, text.length - (d.column - 1))));

  const loc = filename ? `${filename}:${d.line}:${d.column}` : `${d.line}:${d.column}`;
  const out = [
    `${loc}: ${d.severity}[${d.code}]: ${d.message}`,
    `${pad} |`,
    `${d.line} | ${text}`,
    `${pad} | ${" ".repeat(d.column - 1)}${"^".repeat(caretLen)}`,
  ];
  if (d.hint) out.push(`help: ${d.hint}`);
  return out.join("\n");
}
