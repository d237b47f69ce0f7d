// src/index.ts
//
// Glint public API
// ----------------
// One import point for embedders: compile a script, create an instance bound
// to a host node, drive its lifecycle and edit its exported properties.
//
//   const compiled = compile(source);
//   if (!compiled.ok) report(compiled.error);
//   const inst = Instance.create(compiled.value.program, { host, self });

export { compile, analyzeText, DEFAULT_COMPILE_OPTIONS } from "./language/compile";
export type { AnalysisResult, CompileOptions, CompiledScript, StageTimings } from "./language/compile";
export { loadGlintConfig, resolveConfig, findGlintProjectRoot, DEFAULT_CONFIG, CONFIG_FILE_NAME } from "./language/configuration";
export type { GlintConfig, ResolvedGlintConfig } from "./language/configuration";

export { tokenize, TokenKind } from "./core/lexer";
export type { Token, LexError, LexResult } from "./core/lexer";
export { parseSource, parseTokens } from "./core/parser";
export type { ParseResult } from "./core/parser";
export { checkProgram } from "./core/semantic";
export type { CheckResult, FunctionInfo, GlobalInfo, SymbolInfo } from "./core/semantic";
export type * from "./core/ast";
export type { GlintType } from "./core/types";

export { createCompiledProgram, findProperty } from "./core/program";
export type { CompiledProgram } from "./core/program";
export { Instance, DEFAULT_MAX_CALL_DEPTH } from "./core/instance";
export type { InstanceOptions, PropertyError, PropertyErrorKind, PropertySnapshot, PropertyValues } from "./core/instance";
export { ScriptRuntimeError, RUNTIME_FAULT_CODES } from "./core/evaluator";
export type { NodeField, RuntimeFault, RuntimeFaultKind, ScriptHost } from "./core/evaluator";
export { formatHintString, parseHintString, clampToHint } from "./core/metadata";
export type { PropertyHint, PropertyMetadata, SignalMetadata } from "./core/metadata";
export * from "./core/values";
export { LIFECYCLE, BUILTINS } from "./core/builtins";
export type { LifecycleKind, BuiltinName } from "./core/builtins";

export {
  describeErrorCode,
  listErrorCodes,
  isKnownErrorCode,
  formatDiagnostic,
  formatDiagnostics,
  renderDiagnostic,
  hasErrors,
} from "./diagnostics";
export type { Diagnostic, ErrorCodeInfo, ErrorFamily, Severity } from "./diagnostics";

export { SceneHost } from "./runner/host";
export { runScriptSource, faultToDiagnostic } from "./runner/run";
export type { RunOptions, RunResult } from "./runner/run";

export { createLogger, Logger } from "./utils/logger";
export type { LogLevel } from "./utils/logger";
export type { Result } from "./utils/result";
