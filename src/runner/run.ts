// src/runner/run.ts
//
// Glint Runner
// ------------
// Runs a script end-to-end against the headless SceneHost:
//
// 1) compile()        -> lex + parse + check + lint
// 2) Instance.create  -> globals seeded, bound to the scene root
// 3) lifecycle        -> _enter_tree, _ready, then `frames` times
//                        _process(delta) and _physics_process(delta),
//                        then _exit_tree
//
// Used by the CLI (`glint run`) and by tests (output is captured).
//
// Exports:
//   - runScriptSource(source, options): RunResult
//   - faultToDiagnostic(fault): Diagnostic

import { UNKNOWN_RANGE } from "../core/ast";
import type { LifecycleKind } from "../core/builtins";
import type { RuntimeFault } from "../core/evaluator";
import { Instance, type PropertyValues } from "../core/instance";
import { float, type RuntimeValue } from "../core/values";
import { error as mkError, type Diagnostic } from "../diagnostics/errors";
import { compile, type CompileOptions } from "../language/compile";
import { SILENT_LOGGER, type Logger } from "../utils/logger";
import { SceneHost } from "./host";

/* =========================================================
   Public types
   ========================================================= */

export type RunOptions = {
  filename?: string;
  /** Frames to simulate (default 1). */
  frames?: number;
  /** Seconds per frame (default 1/60). */
  delta?: number;
  compile?: Omit<CompileOptions, "filename" | "logger">;
  properties?: PropertyValues;
  maxCallDepth?: number;
  /** Reuse a host (e.g. with extra nodes); a fresh one is created otherwise. */
  host?: SceneHost;
  logger?: Logger;
};

export const EXIT_OK = 0;
export const EXIT_COMPILE_ERROR = 1;
export const EXIT_RUNTIME_FAULT = 2;

export type RunResult = {
  ok: boolean;
  exitCode: number;
  /** Everything the script printed, newline-terminated. */
  stdout: string;
  /** Compile diagnostics (warnings on success), plus the fault if any. */
  diagnostics: Diagnostic[];
  fault?: RuntimeFault;
  host: SceneHost;
  instance: Instance | null;
  /** Lifecycle callbacks that ran, in order. */
  calls: string[];
};

export const DEFAULT_FRAMES = 1;
export const DEFAULT_DELTA = 1 / 60;

/* =========================================================
   Runner
   ========================================================= */

export function runScriptSource(source: string, options: RunOptions = {}): RunResult {
  const log = (options.logger ?? SILENT_LOGGER).child("run");
  const host = options.host ?? new SceneHost();
  const frames = options.frames ?? DEFAULT_FRAMES;
  const delta: RuntimeValue = float(options.delta ?? DEFAULT_DELTA);
  const calls: string[] = [];

  const compiled = compile(source, { ...options.compile, filename: options.filename, logger: options.logger });
  if (!compiled.ok) {
    return {
      ok: false,
      exitCode: EXIT_COMPILE_ERROR,
      stdout: host.stdout(),
      diagnostics: compiled.error,
      host,
      instance: null,
      calls,
    };
  }

  const { program, warnings } = compiled.value;
  const fail = (fault: RuntimeFault, instance: Instance | null): RunResult => {
    log.warn(`Runtime fault ${fault.code}: ${fault.message}`);
    return {
      ok: false,
      exitCode: EXIT_RUNTIME_FAULT,
      stdout: host.stdout(),
      diagnostics: [...warnings, faultToDiagnostic(fault)],
      fault,
      host,
      instance,
      calls,
    };
  };

  const created = Instance.create(program, {
    host,
    self: host.root,
    properties: options.properties,
    maxCallDepth: options.maxCallDepth,
    logger: options.logger,
  });
  if (!created.ok) return fail(created.error, null);
  const instance = created.value;

  const schedule: Array<[LifecycleKind, RuntimeValue[]]> = [
    ["enter_tree", []],
    ["ready", []],
  ];
  for (let i = 0; i < frames; i++) {
    schedule.push(["process", [delta]], ["physics_process", [delta]]);
  }
  schedule.push(["exit_tree", []]);

  for (const [kind, args] of schedule) {
    if (!instance.handles(kind)) continue;
    calls.push(kind);
    const r = instance.invokeLifecycle(kind, args);
    if (!r.ok) return fail(r.error, instance);
  }

  log.debug(`Ran ${calls.length} callbacks over ${frames} frame${frames === 1 ? "" : "s"}`);

  return {
    ok: true,
    exitCode: EXIT_OK,
    stdout: host.stdout(),
    diagnostics: warnings,
    host,
    instance,
    calls,
  };
}

/** Presents a runtime fault with the same shape as a compile diagnostic. */
export function faultToDiagnostic(fault: RuntimeFault): Diagnostic {
  const trace = fault.trace.length > 0 ? `in ${fault.trace.join(" <- ")}` : undefined;
  return mkError(fault.code, `${fault.kind}: ${fault.message}`, fault.range ?? UNKNOWN_RANGE, "runtime", trace);
}
