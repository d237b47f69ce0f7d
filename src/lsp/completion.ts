// src/lsp/completion.ts
//
// Glint Completions Engine
// ------------------------
// Takes source text, a cursor offset and the checker result, and returns
// generic completion items (server.ts maps them to LSP types).
//
// No parsing at completion time: the text left of the cursor decides the
// context.
//   - `expr.`          -> fields (Node fields after `self.`, otherwise every
//                         field table that could apply)
//   - `@export(`       -> hint names
//   - `emit_signal("`  -> declared signals
//   - anything else    -> keywords, types, built-ins, lifecycle snippets and
//                         declared names
//
// Exports:
//   - getCompletions(req): CompletionItem[]

import { BUILTINS, BUILTIN_NAMES, LIFECYCLE, LIFECYCLE_KINDS, builtinSignatureText, lifecycleSignatureText } from "../core/builtins";
import { KEYWORDS } from "../core/lexer";
import type { CheckResult } from "../core/semantic";
import { ANNOTATABLE_TYPES, INPUT_EVENT_FIELDS, NODE_FIELDS, STRUCT_FIELDS, type FieldTable } from "../core/types";

export type CompletionKind = "keyword" | "variable" | "function" | "type" | "property" | "event";

export type CompletionItem = {
  label: string;
  kind: CompletionKind;
  detail?: string;
  documentation?: string;
  insertText?: string;
  sortText?: string;
};

export type CompletionRequest = {
  source: string;
  offset: number;
  check: CheckResult | null;
  maxItems?: number;
};

export const DEFAULT_MAX_COMPLETIONS = 200;

export function getCompletions(req: CompletionRequest): CompletionItem[] {
  const maxItems = req.maxItems ?? DEFAULT_MAX_COMPLETIONS;
  const ctx = detectContext(req.source.slice(0, req.offset));

  switch (ctx.kind) {
    case "member":
      return limit(memberItems(ctx.receiver), maxItems);
    case "exportHint":
      return limit(hintItems(), maxItems);
    case "signalName":
      return limit(signalItems(req.check), maxItems);
    case "general":
      return limit(dedupe([...keywordItems(), ...typeItems(), ...builtinItems(), ...lifecycleItems(), ...declaredItems(req.check)]), maxItems);
  }
}

/* =========================================================
   Context detection
   ========================================================= */

type DetectedContext =
  | { kind: "member"; receiver: string }
  | { kind: "exportHint" }
  | { kind: "signalName" }
  | { kind: "general" };

function detectContext(left: string): DetectedContext {
  if (/@export\s*\(\s*[A-Za-z_]*$/.test(left)) return { kind: "exportHint" };
  if (/\bemit_signal\s*\(\s*"[A-Za-z0-9_]*$/.test(left)) return { kind: "signalName" };

  const member = left.match(/([A-Za-z_][A-Za-z0-9_]*)\s*\.\s*[A-Za-z_]*$/);
  if (member) return { kind: "member", receiver: member[1] };

  return { kind: "general" };
}

/* =========================================================
   Item builders
   ========================================================= */

function keywordItems(): CompletionItem[] {
  return Object.keys(KEYWORDS).map((k) => ({ label: k, kind: "keyword", sortText: `3_${k}` }));
}

function typeItems(): CompletionItem[] {
  return ANNOTATABLE_TYPES.map((t) => ({ label: t, kind: "type", sortText: `2_${t}` }));
}

function builtinItems(): CompletionItem[] {
  return BUILTIN_NAMES.map((name) => ({
    label: name,
    kind: "function",
    detail: builtinSignatureText(BUILTINS[name]),
    documentation: BUILTINS[name].doc,
    sortText: `1_${name}`,
  }));
}

function lifecycleItems(): CompletionItem[] {
  return LIFECYCLE_KINDS.map((kind) => {
    const sig = LIFECYCLE[kind];
    return {
      label: sig.functionName,
      kind: "function",
      detail: lifecycleSignatureText(sig),
      documentation: sig.doc,
      insertText: `${lifecycleSignatureText(sig)} {\n    \n}`,
      sortText: `4_${sig.functionName}`,
    };
  });
}

function declaredItems(check: CheckResult | null): CompletionItem[] {
  if (!check) return [];
  const out: CompletionItem[] = [];

  for (const g of check.globals) {
    out.push({ label: g.name, kind: "variable", detail: `${g.mutable ? "let mut" : "let"} ${g.name}: ${g.type}`, sortText: `0_${g.name}` });
  }
  for (const fn of check.functions.values()) {
    if (fn.lifecycle) continue;
    const params = fn.params.map((p) => `${p.name}: ${p.type}`).join(", ");
    out.push({ label: fn.name, kind: "function", detail: `fn ${fn.name}(${params}) -> ${fn.returns}`, sortText: `0_${fn.name}` });
  }

  return out;
}

function memberItems(receiver: string): CompletionItem[] {
  if (receiver === "self") return fieldItems("Node", NODE_FIELDS);

  const out: CompletionItem[] = [...fieldItems("Node", NODE_FIELDS), ...fieldItems("InputEvent", INPUT_EVENT_FIELDS)];
  for (const [owner, table] of Object.entries(STRUCT_FIELDS)) out.push(...fieldItems(owner, table));
  return dedupe(out);
}

function fieldItems(owner: string, table: FieldTable): CompletionItem[] {
  return Object.entries(table).map(([name, type]) => ({ label: name, kind: "property", detail: `${owner}.${name}: ${type}` }));
}

function hintItems(): CompletionItem[] {
  return [
    { label: "range", kind: "function", detail: "range(min, max[, step])", insertText: "range(${1:0}, ${2:100})" },
    { label: "enum", kind: "function", detail: 'enum("a", "b", ...)', insertText: 'enum("${1:a}", "${2:b}")' },
    { label: "file", kind: "function", detail: 'file("*.ext")', insertText: 'file("${1:*.png}")' },
  ];
}

function signalItems(check: CheckResult | null): CompletionItem[] {
  if (!check) return [];
  return check.signals.map((s) => ({
    label: s.name,
    kind: "event",
    detail: `signal ${s.name}(${s.params.map((p) => `${p.name}: ${p.type}`).join(", ")})`,
  }));
}

/* =========================================================
   Helpers
   ========================================================= */

function dedupe(items: CompletionItem[]): CompletionItem[] {
  const seen = new Set<string>();
  const out: CompletionItem[] = [];
  for (const it of items) {
    if (seen.has(it.label)) continue;
    seen.add(it.label);
    out.push(it);
  }
  return out;
}

function limit(items: CompletionItem[], max: number): CompletionItem[] {
  return items.slice(0, Math.max(0, max));
}
