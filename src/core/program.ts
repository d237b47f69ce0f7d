// src/core/program.ts
//
// The compiled, read-only form of a script. One CompiledProgram is shared by
// every Instance running that script; nothing writes to it after creation.

import type { Program } from "./ast";
import type { LifecycleKind } from "./builtins";
import type { PropertyMetadata, SignalMetadata } from "./metadata";
import type { BindingNode, CheckResult, FunctionInfo, GlobalInfo } from "./semantic";
import type { GlintType } from "./types";

export type CompiledProgram = {
  readonly filename: string | null;
  readonly ast: Program;
  /** Declaration order, which is also initialization order. */
  readonly globals: readonly GlobalInfo[];
  readonly functions: ReadonlyMap<string, FunctionInfo>;
  readonly signals: ReadonlyMap<string, SignalMetadata>;
  readonly properties: readonly PropertyMetadata[];
  readonly lifecycle: ReadonlyMap<LifecycleKind, string>;
  readonly bindingTypes: ReadonlyMap<BindingNode, GlintType>;
};

export function createCompiledProgram(ast: Program, check: CheckResult, filename: string | null = null): CompiledProgram {
  return Object.freeze({
    filename,
    ast,
    globals: Object.freeze([...check.globals]),
    functions: check.functions,
    signals: new Map(check.signals.map((s): [string, SignalMetadata] => [s.name, s])),
    properties: Object.freeze([...check.properties]),
    lifecycle: check.lifecycle,
    bindingTypes: check.bindingTypes,
  });
}

export function findProperty(program: CompiledProgram, name: string): PropertyMetadata | undefined {
  return program.properties.find((p) => p.name === name);
}
