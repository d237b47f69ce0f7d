// src/diagnostics/codes.ts
//
// Flat error-code registry. Codes are stable and additive: tooling lists them
// with listErrorCodes() and never needs to know about the phase that emits
// them.

import registry from "./codes.json";

export const ERROR_FAMILIES = [
  "lexical",
  "syntax",
  "type",
  "signal",
  "lifecycle",
  "struct",
  "export",
  "runtime",
  "lint",
] as const;

export type ErrorFamily = (typeof ERROR_FAMILIES)[number];

export type ErrorCodeInfo = {
  code: string;
  family: ErrorFamily;
  title: string;
};

export function isErrorFamily(x: string): x is ErrorFamily {
  return (ERROR_FAMILIES as readonly string[]).includes(x);
}

const TABLE: ReadonlyMap<string, ErrorCodeInfo> = (() => {
  const m = new Map<string, ErrorCodeInfo>();
  for (const row of registry) {
    if (!isErrorFamily(row.family)) {
      throw new Error(`codes.json: unknown family '${row.family}' for ${row.code}`);
    }
    m.set(row.code, { code: row.code, family: row.family, title: row.title });
  }
  return m;
})();

export function describeErrorCode(code: string): ErrorCodeInfo | undefined {
  return TABLE.get(code);
}

export function isKnownErrorCode(code: string): boolean {
  return TABLE.has(code);
}

export function listErrorCodes(family?: ErrorFamily): ErrorCodeInfo[] {
  const all = [...TABLE.values()];
  return family ? all.filter((c) => c.family === family) : all;
}

export function familyLabel(family: ErrorFamily): string {
  switch (family) {
    case "lexical":
      return "Lexical Error";
    case "syntax":
      return "Syntax Error";
    case "type":
      return "Type Error";
    case "signal":
      return "Signal Error";
    case "lifecycle":
      return "Lifecycle Error";
    case "struct":
      return "Struct Literal Error";
    case "export":
      return "Export Error";
    case "runtime":
      return "Runtime Error";
    case "lint":
      return "Warning";
  }
}
