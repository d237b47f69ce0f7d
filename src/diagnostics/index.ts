// src/diagnostics/index.ts
//
// Diagnostics barrel: the shared diagnostic model, the code registry, lint and
// identifier suggestions.

export * from "./codes";
export * from "./errors";
export * from "./lint";
export * from "./suggest";
