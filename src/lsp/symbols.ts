// src/lsp/symbols.ts
//
// Glint Document Symbols
// ----------------------
// Outline, breadcrumbs and "Go to Symbol in File". Top-level declarations
// only; functions carry their parameters as children.
//
// Exports:
//   - getDocumentSymbols(program): GlintSymbol[]

import type {
  FunctionDeclaration,
  GlobalDeclaration,
  Parameter,
  Program,
  Range,
  SignalDeclaration,
  TypeRef,
} from "../core/ast";

export type GlintSymbolKind = "function" | "variable" | "constant" | "property" | "event";

export type GlintSymbol = {
  name: string;
  kind: GlintSymbolKind;
  range: Range;
  selectionRange: Range;
  detail?: string;
  children?: GlintSymbol[];
};

export function getDocumentSymbols(program: Program | null): GlintSymbol[] {
  if (!program) return [];

  const out: GlintSymbol[] = [];
  for (const decl of program.body) {
    switch (decl.kind) {
      case "GlobalDeclaration":
        out.push(symbolFromGlobal(decl));
        break;
      case "FunctionDeclaration":
        out.push(symbolFromFunction(decl));
        break;
      case "SignalDeclaration":
        out.push(symbolFromSignal(decl));
        break;
    }
  }

  return out.sort((a, b) => a.range.start.offset - b.range.start.offset);
}

/* =========================================================
   Per-declaration
   ========================================================= */

function symbolFromGlobal(node: GlobalDeclaration): GlintSymbol {
  const kind: GlintSymbolKind = node.exportAnnotation ? "property" : node.mutable ? "variable" : "constant";
  const prefix = node.exportAnnotation ? "@export " : "";
  return {
    name: node.name.name,
    kind,
    range: node.range,
    selectionRange: node.name.range,
    detail: `${prefix}${node.mutable ? "let mut" : "let"}${typeSuffix(node.typeAnnotation)}`,
  };
}

function symbolFromFunction(node: FunctionDeclaration): GlintSymbol {
  const ret = node.returnType ? ` -> ${node.returnType.name}` : "";
  return {
    name: node.name.name,
    kind: "function",
    range: node.range,
    selectionRange: node.name.range,
    detail: `fn(${paramList(node.params)})${ret}`,
    children: node.params.map(symbolFromParam),
  };
}

function symbolFromSignal(node: SignalDeclaration): GlintSymbol {
  return {
    name: node.name.name,
    kind: "event",
    range: node.range,
    selectionRange: node.name.range,
    detail: `signal(${paramList(node.params)})`,
  };
}

function symbolFromParam(p: Parameter): GlintSymbol {
  return {
    name: p.name.name,
    kind: "variable",
    range: p.range,
    selectionRange: p.name.range,
    detail: p.typeAnnotation.name,
  };
}

function paramList(params: Parameter[]): string {
  return params.map((p) => `${p.name.name}: ${p.typeAnnotation.name}`).join(", ");
}

function typeSuffix(t: TypeRef | null): string {
  return t ? `: ${t.name}` : "";
}
