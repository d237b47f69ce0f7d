// src/lsp/convert.ts
//
// Core -> LSP converters. Kept apart from server.ts so they can be tested
// without a connection.

import {
  CompletionItemKind,
  DiagnosticSeverity,
  SymbolKind as LspSymbolKind,
  type CompletionItem as LspCompletionItem,
  type Diagnostic as LspDiagnostic,
  type DocumentSymbol,
  type Range as LspRange,
} from "vscode-languageserver";

import type { Range } from "../core/ast";
import type { Diagnostic } from "../diagnostics/errors";
import type { CompletionItem, CompletionKind } from "./completion";
import type { GlintSymbol, GlintSymbolKind } from "./symbols";

export const DIAGNOSTIC_SOURCE = "glint";

export function toLspRange(r: Range): LspRange {
  return {
    start: { line: r.start.line, character: r.start.column },
    end: { line: r.end.line, character: r.end.column },
  };
}

export function toLspSeverity(sev: Diagnostic["severity"]): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
  }
}

export function toLspDiagnostic(d: Diagnostic): LspDiagnostic {
  return {
    severity: toLspSeverity(d.severity),
    range: toLspRange(d.range),
    message: d.hint ? `${d.message}\nHint: ${d.hint}` : d.message,
    code: d.code,
    source: DIAGNOSTIC_SOURCE,
  };
}

export function toLspDiagnostics(list: readonly Diagnostic[], max: number): LspDiagnostic[] {
  return list.slice(0, Math.max(0, max)).map(toLspDiagnostic);
}

export function toLspCompletionItem(item: CompletionItem): LspCompletionItem {
  return {
    label: item.label,
    kind: toLspCompletionKind(item.kind),
    detail: item.detail,
    documentation: item.documentation,
    insertText: item.insertText ?? item.label,
    sortText: item.sortText,
  };
}

function toLspCompletionKind(kind: CompletionKind): CompletionItemKind {
  switch (kind) {
    case "keyword":
      return CompletionItemKind.Keyword;
    case "variable":
      return CompletionItemKind.Variable;
    case "function":
      return CompletionItemKind.Function;
    case "type":
      return CompletionItemKind.Class;
    case "property":
      return CompletionItemKind.Property;
    case "event":
      return CompletionItemKind.Event;
  }
}

export function toDocumentSymbol(sym: GlintSymbol): DocumentSymbol {
  return {
    name: sym.name,
    detail: sym.detail,
    kind: toLspSymbolKind(sym.kind),
    range: toLspRange(sym.range),
    selectionRange: toLspRange(sym.selectionRange),
    children: sym.children?.map(toDocumentSymbol),
  };
}

function toLspSymbolKind(kind: GlintSymbolKind): LspSymbolKind {
  switch (kind) {
    case "function":
      return LspSymbolKind.Function;
    case "variable":
      return LspSymbolKind.Variable;
    case "constant":
      return LspSymbolKind.Constant;
    case "property":
      return LspSymbolKind.Property;
    case "event":
      return LspSymbolKind.Event;
  }
}
