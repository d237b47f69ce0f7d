// src/core/evaluator.ts
//
// Glint Evaluator (tree-walking runtime)
// -------------------------------------
// Executes type-checked Glint code against one instance's globals.
//
// - Synchronous: the host calls in and blocks until the call returns.
// - Values are immutable; a write through `a.b.c` reads the outer value,
//   rebuilds each level and stores the result back (linear in path length).
// - Every Node dereference first asks the host whether the node is alive.
//
// The evaluator throws ScriptRuntimeError; the Instance turns those into
// Result values for the host.

import type {
  AssignStatement,
  BlockStatement,
  CallExpression,
  Expression,
  FunctionDeclaration,
  GlobalDeclaration,
  Identifier,
  Range,
  Statement,
} from "./ast";
import type { BindingNode, FunctionInfo } from "./semantic";
import type { SignalMetadata } from "./metadata";
import type { GlintType } from "./types";
import {
  VOID,
  bool,
  buildStruct,
  coerceTo,
  float,
  formatValue,
  getField,
  int,
  node,
  str,
  typeOfValue,
  valuesEqual,
  withField,
  type NodeRef,
  type RuntimeValue,
} from "./values";

/* =========================================================
   Host Services
   ========================================================= */

export const NODE_FIELD_NAMES = ["position", "rotation", "scale", "name"] as const;

export type NodeField = (typeof NODE_FIELD_NAMES)[number];

export function isNodeField(name: string): name is NodeField {
  return (NODE_FIELD_NAMES as readonly string[]).includes(name);
}

/**
 * What the runtime needs from the engine. Node handles are opaque: the host
 * decides what an id means, when two handles are equal and when one is dead.
 */
export interface ScriptHost {
  /** One line from `print`. */
  print(line: string): void;

  isAlive(ref: NodeRef): boolean;
  /** Handle equality; defaults to comparing ids. */
  sameNode?(a: NodeRef, b: NodeRef): boolean;

  getNodeProperty(ref: NodeRef, field: NodeField): RuntimeValue;
  setNodeProperty(ref: NodeRef, field: NodeField, value: RuntimeValue): void;

  /** Path lookup relative to `from`; null when nothing is there. */
  getNode(from: NodeRef, path: string): NodeRef | null;
  getParent(ref: NodeRef): NodeRef | null;
  findChild(from: NodeRef, name: string): NodeRef | null;

  emitSignal(from: NodeRef, signal: string, args: RuntimeValue[]): void;
}

/* =========================================================
   Errors
   ========================================================= */

export const RUNTIME_FAULT_CODES = {
  DivisionByZero: "E400",
  InvalidReference: "E402",
  StackOverflow: "E403",
  NodeNotFound: "E405",
  UnknownFunction: "E413",
  ArgumentMismatch: "E414",
  Internal: "E415",
} as const;

export type RuntimeFaultKind = keyof typeof RUNTIME_FAULT_CODES;

export class ScriptRuntimeError extends Error {
  public readonly kind: RuntimeFaultKind;
  public readonly code: string;
  public readonly range?: Range;
  /** Script functions being executed, innermost first. */
  public readonly trace: string[] = [];

  constructor(kind: RuntimeFaultKind, message: string, range?: Range) {
    super(message);
    this.name = "ScriptRuntimeError";
    this.kind = kind;
    this.code = RUNTIME_FAULT_CODES[kind];
    this.range = range;
  }
}

/** What `Instance.invoke` reports to the host. */
export type RuntimeFault = ScriptRuntimeError;

function internal(message: string, range?: Range): ScriptRuntimeError {
  return new ScriptRuntimeError("Internal", message, range);
}

/* =========================================================
   Environment
   ========================================================= */

type Scope = Map<string, RuntimeValue>;

/**
 * Instance globals plus the block scopes of the running call. A call swaps in
 * a fresh scope stack, so callees never see their caller's locals.
 */
export class Environment {
  public readonly globals: Map<string, RuntimeValue>;
  private scopes: Scope[] = [];

  constructor(globals: Map<string, RuntimeValue>) {
    this.globals = globals;
  }

  enterCall(): Scope[] {
    const saved = this.scopes;
    this.scopes = [new Map()];
    return saved;
  }

  exitCall(saved: Scope[]): void {
    this.scopes = saved;
  }

  pushScope(): void {
    this.scopes.push(new Map());
  }

  popScope(): void {
    this.scopes.pop();
  }

  declare(name: string, value: RuntimeValue): void {
    const top = this.scopes[this.scopes.length - 1];
    if (top) top.set(name, value);
    else this.globals.set(name, value);
  }

  get(name: string): RuntimeValue | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const v = this.scopes[i].get(name);
      if (v) return v;
    }
    return this.globals.get(name);
  }

  /** Writes to the innermost binding; false when there is none. */
  assign(name: string, value: RuntimeValue): boolean {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      if (this.scopes[i].has(name)) {
        this.scopes[i].set(name, value);
        return true;
      }
    }
    if (!this.globals.has(name)) return false;
    this.globals.set(name, value);
    return true;
  }
}

/* =========================================================
   Control Flow Signals
   ========================================================= */

class ReturnSignal extends Error {
  constructor(public readonly value: RuntimeValue) {
    super("return");
  }
}

/* =========================================================
   Evaluator
   ========================================================= */

/** The compiled tables the evaluator reads. */
export type ExecutableProgram = {
  readonly functions: ReadonlyMap<string, FunctionInfo>;
  readonly signals: ReadonlyMap<string, SignalMetadata>;
  readonly bindingTypes: ReadonlyMap<BindingNode, GlintType>;
};

export type EvaluatorOptions = {
  host: ScriptHost;
  /** The node the script is attached to (`self`). */
  self: NodeRef;
  maxCallDepth: number;
};

export class Evaluator {
  private readonly program: ExecutableProgram;
  private readonly env: Environment;
  private readonly host: ScriptHost;
  private readonly self: NodeRef;
  private readonly maxCallDepth: number;
  private callDepth = 0;

  constructor(program: ExecutableProgram, env: Environment, options: EvaluatorOptions) {
    this.program = program;
    this.env = env;
    this.host = options.host;
    this.self = options.self;
    this.maxCallDepth = options.maxCallDepth;
  }

  /** Runs one global initializer; the caller stores the result. */
  evaluateGlobal(decl: GlobalDeclaration): RuntimeValue {
    return this.coerceBinding(decl, this.evalExpression(decl.initializer));
  }

  /** Calls a script function with already validated arguments. */
  callFunction(name: string, args: readonly RuntimeValue[], range?: Range): RuntimeValue {
    const fn = this.program.functions.get(name);
    if (!fn) throw new ScriptRuntimeError("UnknownFunction", `Function '${name}' is not defined`, range);

    if (this.callDepth >= this.maxCallDepth) {
      throw new ScriptRuntimeError(
        "StackOverflow",
        `Maximum call depth of ${this.maxCallDepth} exceeded in '${name}'`,
        range ?? fn.decl.name.range
      );
    }

    const saved = this.env.enterCall();
    this.callDepth++;
    try {
      fn.decl.params.forEach((p, i) => {
        this.env.declare(p.name.name, this.coerceBinding(p, args[i] ?? VOID));
      });
      return this.runBody(fn, fn.decl);
    } catch (e) {
      if (e instanceof ScriptRuntimeError) e.trace.push(name);
      throw e;
    } finally {
      this.callDepth--;
      this.env.exitCall(saved);
    }
  }

  private runBody(fn: FunctionInfo, decl: FunctionDeclaration): RuntimeValue {
    try {
      for (const st of decl.body.body) this.execStatement(st);
    } catch (e) {
      if (!(e instanceof ReturnSignal)) throw e;
      if (fn.returns === "void") return VOID;
      return coerceTo(e.value, fn.returns) ?? e.value;
    }

    if (fn.returns !== "void") {
      throw internal(`Function '${fn.name}' ended without returning a ${fn.returns}`, decl.name.range);
    }
    return VOID;
  }

  /* =========================================================
     Statements
     ========================================================= */

  private execStatement(st: Statement): void {
    switch (st.kind) {
      case "BlockStatement":
        this.execBlock(st);
        return;
      case "LetStatement":
        this.env.declare(st.name.name, this.coerceBinding(st, this.evalExpression(st.initializer)));
        return;
      case "AssignStatement":
        this.execAssign(st);
        return;
      case "IfStatement":
        if (this.evalCondition(st.test)) this.execBlock(st.consequent);
        else if (st.alternate) this.execStatement(st.alternate);
        return;
      case "WhileStatement":
        while (this.evalCondition(st.test)) this.execBlock(st.body);
        return;
      case "ReturnStatement":
        throw new ReturnSignal(st.argument ? this.evalExpression(st.argument) : VOID);
      case "ExpressionStatement":
        this.evalExpression(st.expression);
        return;
    }
  }

  private execBlock(b: BlockStatement): void {
    this.env.pushScope();
    try {
      for (const st of b.body) this.execStatement(st);
    } finally {
      this.env.popScope();
    }
  }

  private evalCondition(e: Expression): boolean {
    const v = this.evalExpression(e);
    if (v.kind !== "Bool") throw internal(`Condition evaluated to ${typeOfValue(v)}`, e.range);
    return v.value;
  }

  private execAssign(st: AssignStatement): void {
    const { target, operator } = st;
    const rhs = this.evalExpression(st.value);

    if (target.root.kind === "SelfExpression") {
      this.writePath(node(this.self), target.path.map((p) => p.name), 0, rhs, operator, st.range);
      return;
    }

    const name = target.root.name;
    const current = this.lookup(target.root);
    const next =
      target.path.length === 0
        ? this.combine(current, rhs, operator, st.range)
        : this.writePath(current, target.path.map((p) => p.name), 0, rhs, operator, st.range);

    if (!this.env.assign(name, next)) throw internal(`Assignment to undeclared '${name}'`, target.range);
  }

  /**
   * Read-modify-write of `base.path[i..]`. Returns the rebuilt base; for a Node
   * the write already went to the host and the handle itself is returned.
   */
  private writePath(
    base: RuntimeValue,
    path: readonly string[],
    i: number,
    rhs: RuntimeValue,
    op: AssignStatement["operator"],
    range: Range
  ): RuntimeValue {
    const field = path[i];
    const last = i === path.length - 1;

    if (base.kind === "Node") {
      if (!isNodeField(field)) throw internal(`Node has no field '${field}'`, range);
      this.checkAlive(base.ref, range);
      const old = this.host.getNodeProperty(base.ref, field);
      const next = last ? this.combine(old, rhs, op, range) : this.writePath(old, path, i + 1, rhs, op, range);
      this.host.setNodeProperty(base.ref, field, next);
      return base;
    }

    const old = getField(base, field);
    if (!old) throw internal(`${typeOfValue(base)} has no field '${field}'`, range);
    const next = last ? this.combine(old, rhs, op, range) : this.writePath(old, path, i + 1, rhs, op, range);

    const rebuilt = withField(base, field, next);
    if (!rebuilt) throw internal(`Cannot store ${typeOfValue(next)} into ${typeOfValue(base)}.${field}`, range);
    return rebuilt;
  }

  /** New value for a target holding `old`; keeps the target's type. */
  private combine(old: RuntimeValue, rhs: RuntimeValue, op: AssignStatement["operator"], range: Range): RuntimeValue {
    const value = op === "=" ? rhs : this.binary(op.charAt(0), old, rhs, range);
    return coerceTo(value, typeOfValue(old)) ?? value;
  }

  /* =========================================================
     Expressions
     ========================================================= */

  private evalExpression(e: Expression): RuntimeValue {
    switch (e.kind) {
      case "IntLiteral":
        return int(e.value);
      case "FloatLiteral":
        return float(e.value);
      case "BoolLiteral":
        return bool(e.value);
      case "StringLiteral":
        return str(e.value);
      case "Identifier":
        return this.lookup(e);
      case "SelfExpression":
        return node(this.self);
      case "FieldAccess": {
        const base = this.evalExpression(e.object);
        const field = e.field.name;
        if (base.kind === "Node") {
          if (!isNodeField(field)) throw internal(`Node has no field '${field}'`, e.field.range);
          this.checkAlive(base.ref, e.range);
          return this.host.getNodeProperty(base.ref, field);
        }
        const v = getField(base, field);
        if (!v) throw internal(`${typeOfValue(base)} has no field '${field}'`, e.field.range);
        return v;
      }
      case "CallExpression":
        return this.evalCall(e);
      case "UnaryExpression": {
        const v = this.evalExpression(e.argument);
        if (e.operator === "!") {
          if (v.kind !== "Bool") throw internal(`'!' applied to ${typeOfValue(v)}`, e.range);
          return bool(!v.value);
        }
        if (v.kind === "Int") return int(-v.value);
        if (v.kind === "Float") return float(-v.value);
        throw internal(`'-' applied to ${typeOfValue(v)}`, e.range);
      }
      case "BinaryExpression": {
        // short-circuit
        if (e.operator === "&&" || e.operator === "||") {
          const left = this.evalCondition(e.left);
          if (e.operator === "&&" ? !left : left) return bool(left);
          return bool(this.evalCondition(e.right));
        }
        return this.binary(e.operator, this.evalExpression(e.left), this.evalExpression(e.right), e.range);
      }
      case "StructLiteral": {
        const fields = new Map<string, RuntimeValue>();
        for (const f of e.fields) fields.set(f.name.name, this.evalExpression(f.value));
        const typeName = e.typeName.name;
        const built =
          typeName === "Vector2" || typeName === "Color" || typeName === "Rect2" || typeName === "Transform2D"
            ? buildStruct(typeName, fields)
            : null;
        if (!built) throw internal(`Invalid ${typeName} literal`, e.range);
        return built;
      }
    }
  }

  private binary(op: string, l: RuntimeValue, r: RuntimeValue, range: Range): RuntimeValue {
    switch (op) {
      case "==":
        return bool(valuesEqual(l, r, this.host.sameNode?.bind(this.host)));
      case "!=":
        return bool(!valuesEqual(l, r, this.host.sameNode?.bind(this.host)));
    }

    if (op === "+" && l.kind === "Str" && r.kind === "Str") return str(l.value + r.value);

    if ((l.kind !== "Int" && l.kind !== "Float") || (r.kind !== "Int" && r.kind !== "Float")) {
      throw internal(`Operator '${op}' applied to ${typeOfValue(l)} and ${typeOfValue(r)}`, range);
    }

    const a = l.value;
    const b = r.value;

    switch (op) {
      case "<":
        return bool(a < b);
      case "<=":
        return bool(a <= b);
      case ">":
        return bool(a > b);
      case ">=":
        return bool(a >= b);
    }

    if (l.kind === "Int" && r.kind === "Int") {
      switch (op) {
        case "+":
          return int(a + b);
        case "-":
          return int(a - b);
        case "*":
          return int(Math.imul(a, b));
        case "/":
          if (b === 0) throw new ScriptRuntimeError("DivisionByZero", "Integer division by zero", range);
          return int(Math.trunc(a / b));
      }
    } else {
      switch (op) {
        case "+":
          return float(a + b);
        case "-":
          return float(a - b);
        case "*":
          return float(a * b);
        case "/":
          return float(a / b);
      }
    }

    throw internal(`Unknown operator '${op}'`, range);
  }

  /* =========================================================
     Calls
     ========================================================= */

  private evalCall(e: CallExpression): RuntimeValue {
    const name = e.callee.name;

    switch (name) {
      case "print": {
        const parts = e.args.map((a) => formatValue(this.evalExpression(a)));
        this.host.print(parts.join(" "));
        return VOID;
      }
      case "emit_signal":
        this.emitSignal(e);
        return VOID;
      case "get_node": {
        const path = this.stringArg(e, 0);
        this.checkAlive(this.self, e.range);
        return node(this.found(this.host.getNode(this.self, path), `Node not found at path '${path}'`, e.range));
      }
      case "has_node": {
        const path = this.stringArg(e, 0);
        this.checkAlive(this.self, e.range);
        return bool(this.host.getNode(this.self, path) !== null);
      }
      case "get_parent":
        this.checkAlive(this.self, e.range);
        return node(this.found(this.host.getParent(this.self), "Node has no parent", e.range));
      case "find_child": {
        const childName = this.stringArg(e, 0);
        this.checkAlive(this.self, e.range);
        return node(this.found(this.host.findChild(this.self, childName), `No child named '${childName}'`, e.range));
      }
    }

    const args = e.args.map((a) => this.evalExpression(a));
    return this.callFunction(name, args, e.range);
  }

  private emitSignal(e: CallExpression): void {
    const [first, ...rest] = e.args;
    if (!first || first.kind !== "StringLiteral") throw internal("emit_signal() without a signal name", e.range);

    const signal = this.program.signals.get(first.value);
    if (!signal) throw internal(`Signal '${first.value}' is not declared`, first.range);

    const args = rest.map((a, i) => {
      const v = this.evalExpression(a);
      const type = signal.params[i]?.type;
      return type ? (coerceTo(v, type) ?? v) : v;
    });

    this.checkAlive(this.self, e.range);
    this.host.emitSignal(this.self, signal.name, args);
  }

  private stringArg(e: CallExpression, i: number): string {
    const arg = e.args[i];
    if (!arg) throw internal(`Missing argument ${i + 1} of '${e.callee.name}'`, e.range);
    const v = this.evalExpression(arg);
    if (v.kind !== "Str") throw internal(`Argument ${i + 1} of '${e.callee.name}' is ${typeOfValue(v)}`, arg.range);
    return v.value;
  }

  private found(ref: NodeRef | null, message: string, range: Range): NodeRef {
    if (!ref) throw new ScriptRuntimeError("NodeNotFound", message, range);
    return ref;
  }

  /* =========================================================
     Helpers
     ========================================================= */

  private lookup(id: Identifier): RuntimeValue {
    const v = this.env.get(id.name);
    if (!v) throw internal(`Variable '${id.name}' has no value`, id.range);
    return v;
  }

  private checkAlive(ref: NodeRef, range: Range): void {
    if (!this.host.isAlive(ref)) {
      throw new ScriptRuntimeError("InvalidReference", `Node ${ref.id} has been freed`, range);
    }
  }

  private coerceBinding(decl: BindingNode, value: RuntimeValue): RuntimeValue {
    const type = this.program.bindingTypes.get(decl);
    if (!type || type === "unknown") return value;
    return coerceTo(value, type) ?? value;
  }
}
