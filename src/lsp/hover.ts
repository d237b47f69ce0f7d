// src/lsp/hover.ts
//
// Glint Hover Provider
// --------------------
// Given source + offset and the analysis of that source, return markdown.
//
// Lookup order for the word under the cursor:
// - field after `.` (Node / struct / InputEvent field tables)
// - built-in function
// - lifecycle callback name
// - type name
// - global (exported globals also show their inspector hint and default)
// - user function or signal
// - local or parameter declared before the cursor
//
// Like the completion engine this works on the text around the cursor; the
// checker result only supplies names and types.
//
// Exports:
//   - getHover(req): HoverResult | null

import { BUILTINS, LIFECYCLE, isBuiltinName, lifecycleKindOf, builtinSignatureText, lifecycleSignatureText } from "../core/builtins";
import { formatHintString, type PropertyMetadata } from "../core/metadata";
import type { CheckResult, SymbolInfo } from "../core/semantic";
import { INPUT_EVENT_FIELDS, NODE_FIELDS, STRUCT_FIELDS, fieldsOf, isStructType, isTypeName } from "../core/types";
import { formatValue } from "../core/values";

export type HoverResult = {
  markdown: string;
};

export type HoverRequest = {
  source: string;
  offset: number;
  check: CheckResult | null;
};

export function getHover(req: HoverRequest): HoverResult | null {
  const at = wordAt(req.source, req.offset);
  if (!at) return null;
  const { word, start } = at;

  if (req.source[start - 1] === ".") return fieldHover(word);

  if (isBuiltinName(word)) {
    const sig = BUILTINS[word];
    return md([code(builtinSignatureText(sig)), sig.doc]);
  }

  const lifecycle = lifecycleKindOf(word);
  if (lifecycle) {
    const sig = LIFECYCLE[lifecycle];
    return md([code(lifecycleSignatureText(sig)), sig.doc, `**Lifecycle:** \`${lifecycle}\``]);
  }

  if (isTypeName(word) && word !== "unknown") return typeHover(word);

  const check = req.check;
  if (!check) return null;

  const global = check.globals.find((g) => g.name === word);
  if (global) {
    const prop = check.properties.find((p) => p.name === word);
    const lines = [code(`${global.mutable ? "let mut" : "let"} ${global.name}: ${global.type}`)];
    if (prop) lines.push(propertyLines(prop));
    return md(lines);
  }

  const fn = check.functions.get(word);
  if (fn) {
    const params = fn.params.map((p) => `${p.name}: ${p.type}`).join(", ");
    const ret = fn.returns === "void" ? "" : ` -> ${fn.returns}`;
    return md([code(`fn ${fn.name}(${params})${ret}`)]);
  }

  const signal = check.signals.find((s) => s.name === word);
  if (signal) {
    return md([code(`signal ${signal.name}(${signal.params.map((p) => `${p.name}: ${p.type}`).join(", ")})`)]);
  }

  const local = nearestLocal(check.symbols, word, req.offset);
  if (local) {
    const head = local.kind === "param" ? "(parameter)" : local.mutable ? "let mut" : "let";
    return md([code(`${head} ${local.name}: ${local.type}`)]);
  }

  return null;
}

/* =========================================================
   Sections
   ========================================================= */

function typeHover(name: string): HoverResult | null {
  if (!isTypeName(name)) return null;
  const fields = fieldsOf(name);
  const lines = [code(`type ${name}`)];
  if (fields) {
    const kind = isStructType(name) ? "Fields" : "Host fields";
    lines.push(`**${kind}:** ${Object.entries(fields).map(([f, t]) => `\`${f}: ${t}\``).join(", ")}`);
  }
  return md(lines);
}

function fieldHover(field: string): HoverResult | null {
  const owners: string[] = [];
  let type: string | null = null;

  const tables: Array<[string, Readonly<Record<string, string>>]> = [
    ["Node", NODE_FIELDS],
    ["InputEvent", INPUT_EVENT_FIELDS],
    ...Object.entries(STRUCT_FIELDS),
  ];
  for (const [owner, table] of tables) {
    if (!Object.prototype.hasOwnProperty.call(table, field)) continue;
    owners.push(owner);
    type = type ?? table[field];
  }

  if (!type) return null;
  return md([code(`${field}: ${type}`), `**On:** ${owners.map((o) => `\`${o}\``).join(", ")}`]);
}

function propertyLines(prop: PropertyMetadata): string {
  const parts = [`**Exported** · default \`${formatValue(prop.defaultValue)}\``];
  if (prop.hint.kind !== "none") parts.push(`hint \`${prop.hint.kind}(${formatHintString(prop.hint)})\``);
  return parts.join(" · ");
}

/** The same-named local declared closest before the cursor. */
function nearestLocal(symbols: readonly SymbolInfo[], name: string, offset: number): SymbolInfo | null {
  let best: SymbolInfo | null = null;
  for (const s of symbols) {
    if (s.kind === "global" || s.name !== name) continue;
    if (s.range.start.offset > offset) continue;
    if (!best || s.range.start.offset > best.range.start.offset) best = s;
  }
  return best;
}

/* =========================================================
   Text utilities
   ========================================================= */

function wordAt(src: string, offset: number): { word: string; start: number } | null {
  if (offset < 0 || offset > src.length) return null;

  let s = offset;
  let e = offset;
  while (s > 0 && isWordChar(src.charCodeAt(s - 1))) s--;
  while (e < src.length && isWordChar(src.charCodeAt(e))) e++;

  if (e <= s) return null;
  const word = src.slice(s, e);
  return /^[A-Za-z_]/.test(word) ? { word, start: s } : null;
}

function isWordChar(c: number): boolean {
  return (c >= 65 && c <= 90) || (c >= 97 && c <= 122) || (c >= 48 && c <= 57) || c === 95;
}

function code(text: string): string {
  return "```glint\n" + text + "\n```";
}

function md(lines: string[]): HoverResult {
  return { markdown: lines.join("\n\n") };
}
