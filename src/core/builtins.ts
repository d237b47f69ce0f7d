// src/core/builtins.ts
//
// Built-in functions and lifecycle callbacks.
//
// The checker validates calls against these tables, the evaluator dispatches
// on BuiltinName, and the language server reads the docs for hover.

import type { GlintType } from "./types";

/* =========================================================
   Built-in functions
   ========================================================= */

export const BUILTIN_NAMES = ["print", "emit_signal", "get_node", "get_parent", "has_node", "find_child"] as const;

export type BuiltinName = (typeof BUILTIN_NAMES)[number];

export type BuiltinSignature = {
  name: BuiltinName;
  /**
   * Fixed parameter list, or "variadic" for functions whose arguments are
   * checked by a dedicated rule (print, emit_signal).
   */
  params: ReadonlyArray<{ name: string; type: GlintType }> | "variadic";
  returns: GlintType;
  doc: string;
};

export const BUILTINS: Readonly<Record<BuiltinName, BuiltinSignature>> = Object.freeze({
  print: {
    name: "print",
    params: "variadic",
    returns: "void",
    doc: "Writes its arguments, separated by spaces, to the host output.",
  },
  emit_signal: {
    name: "emit_signal",
    params: "variadic",
    returns: "void",
    doc: 'Emits a declared signal: `emit_signal("name", args...)`.',
  },
  get_node: {
    name: "get_node",
    params: [{ name: "path", type: "String" }],
    returns: "Node",
    doc: "Looks up a node by path relative to `self`.",
  },
  get_parent: {
    name: "get_parent",
    params: [],
    returns: "Node",
    doc: "Returns the parent of `self`.",
  },
  has_node: {
    name: "has_node",
    params: [{ name: "path", type: "String" }],
    returns: "bool",
    doc: "True when a node exists at the given path relative to `self`.",
  },
  find_child: {
    name: "find_child",
    params: [{ name: "name", type: "String" }],
    returns: "Node",
    doc: "Searches the descendants of `self` for a node with the given name.",
  },
});

export function isBuiltinName(name: string): name is BuiltinName {
  return (BUILTIN_NAMES as readonly string[]).includes(name);
}

export function builtinSignatureText(sig: BuiltinSignature): string {
  const params = sig.params === "variadic" ? "..." : sig.params.map((p) => `${p.name}: ${p.type}`).join(", ");
  return `fn ${sig.name}(${params}) -> ${sig.returns}`;
}

/* =========================================================
   Lifecycle callbacks
   ========================================================= */

export const LIFECYCLE_KINDS = ["ready", "process", "physics_process", "input", "enter_tree", "exit_tree"] as const;

export type LifecycleKind = (typeof LIFECYCLE_KINDS)[number];

export type LifecycleSignature = {
  kind: LifecycleKind;
  functionName: string;
  params: ReadonlyArray<{ name: string; type: GlintType }>;
  doc: string;
};

export const LIFECYCLE: Readonly<Record<LifecycleKind, LifecycleSignature>> = Object.freeze({
  ready: {
    kind: "ready",
    functionName: "_ready",
    params: [],
    doc: "Called once when the node and its children are ready.",
  },
  process: {
    kind: "process",
    functionName: "_process",
    params: [{ name: "delta", type: "f32" }],
    doc: "Called every frame with the elapsed time in seconds.",
  },
  physics_process: {
    kind: "physics_process",
    functionName: "_physics_process",
    params: [{ name: "delta", type: "f32" }],
    doc: "Called every physics tick with the fixed step in seconds.",
  },
  input: {
    kind: "input",
    functionName: "_input",
    params: [{ name: "event", type: "InputEvent" }],
    doc: "Called for each input event delivered to the node.",
  },
  enter_tree: {
    kind: "enter_tree",
    functionName: "_enter_tree",
    params: [],
    doc: "Called when the node enters the scene tree.",
  },
  exit_tree: {
    kind: "exit_tree",
    functionName: "_exit_tree",
    params: [],
    doc: "Called when the node is about to leave the scene tree.",
  },
});

const LIFECYCLE_BY_NAME: ReadonlyMap<string, LifecycleKind> = new Map(
  LIFECYCLE_KINDS.map((k): [string, LifecycleKind] => [LIFECYCLE[k].functionName, k])
);

export function lifecycleKindOf(functionName: string): LifecycleKind | null {
  return LIFECYCLE_BY_NAME.get(functionName) ?? null;
}

export function lifecycleSignatureText(sig: LifecycleSignature): string {
  return `fn ${sig.functionName}(${sig.params.map((p) => `${p.name}: ${p.type}`).join(", ")})`;
}
