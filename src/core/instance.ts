// src/core/instance.ts
//
// Glint Instance
// --------------
// Runtime state bound 1:1 to a host object. Owns the values of the script's
// globals; shares the compiled program read-only with every other instance of
// the same script.
//
// Host-facing methods return Result values and never throw.

import type { LifecycleKind } from "./builtins";
import { Environment, Evaluator, ScriptRuntimeError, type RuntimeFault, type ScriptHost } from "./evaluator";
import { clampToHint, type PropertyMetadata } from "./metadata";
import { findProperty, type CompiledProgram } from "./program";
import { VOID, coerceTo, isFiniteValue, typeOfValue, type NodeRef, type RuntimeValue } from "./values";
import { SILENT_LOGGER, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

/* =========================================================
   Types
   ========================================================= */

export type PropertyErrorKind = "UnknownProperty" | "TypeMismatch" | "NonFinite" | "NotInEnum";

export type PropertyError = {
  kind: PropertyErrorKind;
  property: string;
  message: string;
};

export type PropertyValues = Readonly<Record<string, RuntimeValue>> | ReadonlyMap<string, RuntimeValue>;

export type InstanceOptions = {
  host: ScriptHost;
  /** The host object this instance is attached to. */
  self: NodeRef;
  /** Host-provided exported values, applied after the globals are seeded. */
  properties?: PropertyValues;
  maxCallDepth?: number;
  logger?: Logger;
};

export type PropertySnapshot = PropertyMetadata & { value: RuntimeValue };

export const DEFAULT_MAX_CALL_DEPTH = 256;

/* =========================================================
   Instance
   ========================================================= */

export class Instance {
  public readonly program: CompiledProgram;
  private readonly options: InstanceOptions;
  private readonly globals = new Map<string, RuntimeValue>();
  private readonly evaluator: Evaluator;
  private readonly log: Logger;

  private constructor(program: CompiledProgram, options: InstanceOptions) {
    this.program = program;
    this.options = options;
    this.log = options.logger ?? SILENT_LOGGER;
    this.evaluator = new Evaluator(program, new Environment(this.globals), {
      host: options.host,
      self: options.self,
      maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
    });
  }

  /**
   * Builds an instance: every global initializer runs once, in declaration
   * order, then host-provided property values are applied. Fails only when an
   * initializer faults (for example a freed `self`).
   */
  static create(program: CompiledProgram, options: InstanceOptions): Result<Instance, RuntimeFault> {
    const inst = new Instance(program, options);

    for (const g of program.globals) {
      try {
        inst.globals.set(g.name, inst.evaluator.evaluateGlobal(g.decl));
      } catch (e) {
        const fault = toFault(e);
        inst.log.warn(`Initializing '${g.name}' failed: ${fault.code} ${fault.message}`);
        return err(fault);
      }
    }

    for (const [name, value] of entriesOf(options.properties)) {
      const r = inst.setProperty(name, value);
      if (!r.ok) inst.log.warn(`Ignoring host value for '${name}': ${r.error.message}`);
    }

    return ok(inst);
  }

  /* =========================================================
     Calls
     ========================================================= */

  invoke(name: string, args: readonly RuntimeValue[] = []): Result<RuntimeValue, RuntimeFault> {
    const fn = this.program.functions.get(name);
    if (!fn) return err(new ScriptRuntimeError("UnknownFunction", `Function '${name}' is not defined`));

    if (args.length !== fn.params.length) {
      return err(
        new ScriptRuntimeError(
          "ArgumentMismatch",
          `Function '${name}' expects ${fn.params.length} argument${fn.params.length === 1 ? "" : "s"}, got ${args.length}`
        )
      );
    }

    const bound: RuntimeValue[] = [];
    for (let i = 0; i < args.length; i++) {
      const p = fn.params[i];
      const v = coerceTo(args[i], p.type);
      if (!v) {
        return err(
          new ScriptRuntimeError(
            "ArgumentMismatch",
            `Argument '${p.name}' of '${name}' expects ${p.type}, got ${typeOfValue(args[i])}`
          )
        );
      }
      bound.push(v);
    }

    try {
      return ok(this.evaluator.callFunction(name, bound));
    } catch (e) {
      const fault = toFault(e);
      this.log.warn(`${name}() failed: ${fault.code} ${fault.message}`, { trace: fault.trace });
      return err(fault);
    }
  }

  /** Runs the callback for `kind`; a script without one returns Void. */
  invokeLifecycle(kind: LifecycleKind, args: readonly RuntimeValue[] = []): Result<RuntimeValue, RuntimeFault> {
    const name = this.program.lifecycle.get(kind);
    if (!name) return ok(VOID);
    return this.invoke(name, args);
  }

  handles(kind: LifecycleKind): boolean {
    return this.program.lifecycle.has(kind);
  }

  /* =========================================================
     Properties
     ========================================================= */

  getProperty(name: string): RuntimeValue | undefined {
    return findProperty(this.program, name) ? this.globals.get(name) : undefined;
  }

  listProperties(): PropertySnapshot[] {
    return this.program.properties.map((p) => ({ ...p, value: this.globals.get(p.name) ?? p.defaultValue }));
  }

  /**
   * Writes an exported property. Ints are accepted for f32 properties and
   * numbers outside a range hint are clamped into it.
   */
  setProperty(name: string, value: RuntimeValue): Result<void, PropertyError> {
    const meta = findProperty(this.program, name);
    if (!meta) return err(propertyError("UnknownProperty", name, `'${name}' is not an exported property`));

    const coerced = coerceTo(value, meta.type);
    if (!coerced) {
      return err(
        propertyError("TypeMismatch", name, `'${name}' is ${meta.type}, got ${typeOfValue(value)}`)
      );
    }

    if (!isFiniteValue(coerced)) {
      return err(propertyError("NonFinite", name, `'${name}' only accepts finite numbers`));
    }

    if (meta.hint.kind === "enum") {
      const values = meta.hint.values;
      const inEnum =
        coerced.kind === "Str"
          ? values.includes(coerced.value)
          : coerced.kind === "Int" && coerced.value >= 0 && coerced.value < values.length;
      if (!inEnum) {
        return err(propertyError("NotInEnum", name, `'${name}' must be one of: ${values.join(", ")}`));
      }
    }

    this.globals.set(name, clampToHint(coerced, meta.hint));
    return ok(undefined);
  }

  /** Any global, exported or not. */
  getGlobal(name: string): RuntimeValue | undefined {
    return this.globals.get(name);
  }

  /* =========================================================
     Hot reload
     ========================================================= */

  /**
   * Builds a new instance for a recompiled script. Exported values whose name
   * and type still match are carried over; the rest are dropped.
   */
  reload(program: CompiledProgram): Result<Instance, RuntimeFault> {
    const kept = new Map<string, RuntimeValue>();
    const dropped: string[] = [];

    for (const p of this.program.properties) {
      const next = findProperty(program, p.name);
      const value = this.globals.get(p.name);
      if (next && value && next.type === p.type) kept.set(p.name, value);
      else dropped.push(p.name);
    }

    this.log.debug(`Reloading script: kept ${kept.size} propert${kept.size === 1 ? "y" : "ies"}`, { dropped });
    return Instance.create(program, { ...this.options, properties: kept });
  }
}

/* =========================================================
   Helpers
   ========================================================= */

function propertyError(kind: PropertyErrorKind, property: string, message: string): PropertyError {
  return { kind, property, message };
}

function entriesOf(values: PropertyValues | undefined): Array<[string, RuntimeValue]> {
  if (!values) return [];
  if (isValueMap(values)) return [...values.entries()];
  return Object.entries(values);
}

function isValueMap(values: PropertyValues): values is ReadonlyMap<string, RuntimeValue> {
  return values instanceof Map;
}

/** Host exceptions and other surprises become Internal faults. */
function toFault(e: unknown): RuntimeFault {
  if (e instanceof ScriptRuntimeError) return e;
  const fault = new ScriptRuntimeError("Internal", e instanceof Error ? e.message : String(e));
  fault.cause = e;
  return fault;
}
