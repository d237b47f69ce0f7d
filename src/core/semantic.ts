// src/core/semantic.ts
//
// Glint Type Checker
// ------------------
// Walks a parsed Program with a scope chain, gives every expression a type and
// reports diagnostics. It never stops at the first problem: after recording a
// diagnostic the offending expression gets type `unknown`, which is accepted
// everywhere, and checking carries on.
//
// Passes:
//   1. signatures: functions, signals, lifecycle tags (so calls may refer to
//      functions declared later)
//   2. globals, in declaration order (a global only sees earlier globals)
//   3. function bodies
//
// Besides diagnostics the checker produces the tables the runtime needs:
// exported-property metadata, signal metadata, function signatures and the
// declared type of every binding.

import type {
  AssignStatement,
  BlockStatement,
  CallExpression,
  Expression,
  FieldAccess,
  FunctionDeclaration,
  GlobalDeclaration,
  HintCall,
  Identifier,
  LetStatement,
  Parameter,
  Program,
  Range,
  Statement,
  StructLiteral,
  TypeRef,
} from "./ast";
import { programFunctions, programGlobals, programSignals, targetToString } from "./ast";
import {
  BUILTINS,
  BUILTIN_NAMES,
  LIFECYCLE,
  isBuiltinName,
  lifecycleKindOf,
  lifecycleSignatureText,
  type LifecycleKind,
} from "./builtins";
import {
  DEFAULT_RANGE_STEP,
  HINT_LIST_SEPARATOR,
  evaluateConstant,
  type PropertyHint,
  type PropertyMetadata,
  type SignalMetadata,
} from "./metadata";
import {
  ANNOTATABLE_TYPES,
  EXPORTABLE_TYPES,
  STRUCT_FIELDS,
  fieldType,
  fieldsOf,
  isAssignable,
  isComparableForEquality,
  isExportable,
  isNumeric,
  isStructType,
  isTypeName,
  numericResult,
  type GlintType,
} from "./types";
import { error as mkError, type Diagnostic } from "../diagnostics/errors";
import { didYouMean } from "../diagnostics/suggest";

/* =========================================================
   Public types
   ========================================================= */

export type SymbolKind = "global" | "local" | "param";

export type SymbolInfo = {
  name: string;
  kind: SymbolKind;
  type: GlintType;
  mutable: boolean;
  range: Range;
  reads: number;
  writes: number;
};

export type FunctionInfo = {
  name: string;
  params: Array<{ name: string; type: GlintType }>;
  returns: GlintType;
  lifecycle: LifecycleKind | null;
  decl: FunctionDeclaration;
};

export type GlobalInfo = {
  name: string;
  type: GlintType;
  mutable: boolean;
  exported: boolean;
  decl: GlobalDeclaration;
};

/** Declarations that introduce a binding with a declared (or inferred) type. */
export type BindingNode = GlobalDeclaration | LetStatement | Parameter;

export type CheckResult = {
  diagnostics: Diagnostic[];
  properties: PropertyMetadata[];
  signals: SignalMetadata[];
  functions: Map<string, FunctionInfo>;
  globals: GlobalInfo[];
  /** Lifecycle kind -> function name, resolved once here. */
  lifecycle: Map<LifecycleKind, string>;
  bindingTypes: Map<BindingNode, GlintType>;
  /** Locals, parameters and globals with usage counts (for lint). */
  symbols: SymbolInfo[];
};

/* =========================================================
   Scope
   ========================================================= */

type ScopeKind = "global" | "function" | "block";

class Scope {
  public readonly kind: ScopeKind;
  private readonly parent: Scope | null;
  private readonly symbols = new Map<string, SymbolInfo>();

  constructor(kind: ScopeKind, parent: Scope | null) {
    this.kind = kind;
    this.parent = parent;
  }

  define(sym: SymbolInfo): boolean {
    if (this.symbols.has(sym.name)) return false;
    this.symbols.set(sym.name, sym);
    return true;
  }

  resolve(name: string): SymbolInfo | null {
    return this.symbols.get(name) ?? this.parent?.resolve(name) ?? null;
  }

  visibleNames(): string[] {
    return [...this.symbols.keys(), ...(this.parent?.visibleNames() ?? [])];
  }
}

/* =========================================================
   Entry point
   ========================================================= */

export function checkProgram(program: Program): CheckResult {
  return new TypeChecker(program).run();
}

// Common misspellings from other languages.
const TYPE_ALIAS_HINTS: Readonly<Record<string, GlintType>> = {
  int: "i32",
  float: "f32",
  string: "String",
  str: "String",
  boolean: "bool",
  Vec2: "Vector2",
};

const HINT_KINDS = ["range", "enum", "file"] as const;

class TypeChecker {
  private readonly program: Program;
  private readonly diagnostics: Diagnostic[] = [];

  private readonly functions = new Map<string, FunctionInfo>();
  private readonly signals = new Map<string, SignalMetadata>();
  private readonly properties: PropertyMetadata[] = [];
  private readonly globals: GlobalInfo[] = [];
  private readonly lifecycle = new Map<LifecycleKind, string>();
  private readonly bindingTypes = new Map<BindingNode, GlintType>();
  private readonly symbols: SymbolInfo[] = [];

  private readonly globalScope = new Scope("global", null);
  private scope: Scope = this.globalScope;

  private currentFunction: FunctionInfo | null = null;
  private inGlobalInitializer = false;

  constructor(program: Program) {
    this.program = program;
  }

  run(): CheckResult {
    this.collectSignatures();

    for (const g of programGlobals(this.program)) this.checkGlobal(g);

    for (const fn of programFunctions(this.program)) {
      const info = this.functions.get(fn.name.name);
      // duplicates keep the first signature; their bodies are still checked
      this.checkFunctionBody(fn, info && info.decl === fn ? info : this.signatureOf(fn, false));
    }

    return {
      diagnostics: this.diagnostics,
      properties: this.properties,
      signals: [...this.signals.values()],
      functions: this.functions,
      globals: this.globals,
      lifecycle: this.lifecycle,
      bindingTypes: this.bindingTypes,
      symbols: this.symbols,
    };
  }

  /* =========================================================
     Pass 1: signatures
     ========================================================= */

  private collectSignatures(): void {
    for (const s of programSignals(this.program)) {
      const name = s.name.name;
      if (this.signals.has(name)) {
        this.error(s.name.range, "E301", `Signal '${name}' is already declared`);
        continue;
      }
      const seen = new Set<string>();
      const params: SignalMetadata["params"] = [];
      for (const p of s.params) {
        if (seen.has(p.name.name)) {
          this.error(p.name.range, "E208", `Duplicate parameter '${p.name.name}' in signal '${name}'`);
        }
        seen.add(p.name.name);
        params.push({ name: p.name.name, type: this.resolveType(p.typeAnnotation, false) });
      }
      this.signals.set(name, { name, params });
    }

    for (const fn of programFunctions(this.program)) {
      const name = fn.name.name;

      if (isBuiltinName(name)) {
        this.error(fn.name.range, "E208", `Function '${name}' conflicts with a built-in function`);
        continue;
      }
      if (this.functions.has(name)) {
        this.error(fn.name.range, "E208", `Function '${name}' is already defined`);
        continue;
      }

      const info = this.signatureOf(fn, true);
      this.functions.set(name, info);
      if (info.lifecycle) {
        this.checkLifecycleSignature(info);
        this.lifecycle.set(info.lifecycle, name);
      }
    }
  }

  private signatureOf(fn: FunctionDeclaration, report: boolean): FunctionInfo {
    const params = fn.params.map((p) => ({
      name: p.name.name,
      type: report ? this.resolveType(p.typeAnnotation, false) : this.peekType(p.typeAnnotation),
    }));
    const returns = fn.returnType
      ? report
        ? this.resolveType(fn.returnType, true)
        : this.peekType(fn.returnType)
      : "void";
    return { name: fn.name.name, params, returns, lifecycle: lifecycleKindOf(fn.name.name), decl: fn };
  }

  private checkLifecycleSignature(info: FunctionInfo): void {
    if (!info.lifecycle) return;
    const expected = LIFECYCLE[info.lifecycle];

    const paramsOk =
      info.params.length === expected.params.length &&
      info.params.every((p, i) => p.type === "unknown" || p.type === expected.params[i].type);
    const returnOk = info.returns === "void" || info.returns === "unknown";

    if (!paramsOk || !returnOk) {
      this.error(
        info.decl.name.range,
        "E305",
        `Lifecycle function '${info.name}' has the wrong signature`,
        `Expected '${lifecycleSignatureText(expected)}' returning void.`
      );
    }
  }

  /* =========================================================
     Pass 2: globals
     ========================================================= */

  private checkGlobal(g: GlobalDeclaration): void {
    const name = g.name.name;

    this.inGlobalInitializer = true;
    const type = this.checkBindingInitializer(g.typeAnnotation, g.initializer, name);
    this.inGlobalInitializer = false;

    this.bindingTypes.set(g, type);

    const sym: SymbolInfo = {
      name,
      kind: "global",
      type,
      mutable: g.mutable,
      range: g.name.range,
      reads: 0,
      writes: 0,
    };
    if (!this.globalScope.define(sym)) {
      this.error(g.name.range, "E208", `Global variable '${name}' is already defined`);
      return;
    }
    this.symbols.push(sym);
    this.globals.push({ name, type, mutable: g.mutable, exported: g.exportAnnotation !== null, decl: g });

    if (g.exportAnnotation) this.checkExport(g, type);
  }

  /** Shared by globals and locals: returns the binding's type. */
  private checkBindingInitializer(annotation: TypeRef | null, init: Expression, name: string): GlintType {
    const initType = this.typeOf(init);

    if (annotation) {
      const declared = this.resolveType(annotation, false);
      if (!isAssignable(initType, declared)) {
        this.error(
          init.range,
          "E200",
          `Type mismatch: '${name}' is declared as ${declared} but initialized with ${initType}`,
          coercionHint(initType, declared)
        );
      }
      return declared;
    }

    if (initType === "void") {
      this.error(
        init.range,
        "E218",
        `Cannot infer a type for '${name}' from a void expression`,
        `Add a type annotation: 'let ${name}: <type> = ...'.`
      );
      return "unknown";
    }

    return initType;
  }

  /* =========================================================
     Export annotations
     ========================================================= */

  private checkExport(g: GlobalDeclaration, type: GlintType): void {
    const annotation = g.exportAnnotation;
    if (!annotation) return;

    const name = g.name.name;
    let ok = true;

    if (!g.mutable) {
      this.error(
        g.name.range,
        "E812",
        `Exported variable '${name}' must be mutable`,
        `Declare it as '@export let mut ${name}'.`
      );
      ok = false;
    }

    if (type === "unknown") return;

    if (!isExportable(type)) {
      this.error(
        g.name.range,
        "E801",
        `Type ${type} cannot be exported`,
        `Exportable types: ${EXPORTABLE_TYPES.join(", ")}.`
      );
      return;
    }

    const defaultValue = evaluateConstant(g.initializer, type);
    if (!defaultValue) {
      this.error(
        g.initializer.range,
        "E813",
        `Default value of exported variable '${name}' must be a compile-time constant`,
        "Use a literal, a negated number or a struct literal of literals."
      );
      ok = false;
    }

    const hint = annotation.hint ? this.checkHint(annotation.hint, type) : { kind: "none" as const };
    if (!hint) ok = false;

    if (hint && defaultValue && hint.kind === "enum") {
      const inList =
        defaultValue.kind === "Str"
          ? hint.values.includes(defaultValue.value)
          : defaultValue.kind === "Int" && defaultValue.value >= 0 && defaultValue.value < hint.values.length;
      if (!inList) {
        this.error(
          g.initializer.range,
          "E807",
          `Default value of '${name}' is not one of the enum values`,
          type === "i32" ? `Use an index between 0 and ${hint.values.length - 1}.` : `Use one of: ${hint.values.join(", ")}.`
        );
        ok = false;
      }
    }

    if (ok && hint && defaultValue) {
      this.properties.push({ name, type, hint, defaultValue });
    }
  }

  /** Validates a hint against the property type; null after reporting a problem. */
  private checkHint(h: HintCall, type: GlintType): PropertyHint | null {
    switch (h.name.name) {
      case "range":
        return this.checkRangeHint(h, type);
      case "enum": {
        if (type !== "i32" && type !== "String") {
          this.error(h.range, "E803", `enum() hint requires an i32 or String property, found ${type}`);
          return null;
        }
        const values = this.hintStrings(h);
        return values ? { kind: "enum", values } : null;
      }
      case "file": {
        if (type !== "String") {
          this.error(h.range, "E804", `file() hint requires a String property, found ${type}`);
          return null;
        }
        const filters = this.hintStrings(h);
        return filters ? { kind: "file", filter: filters.join(HINT_LIST_SEPARATOR) } : null;
      }
      default:
        this.error(h.name.range, "E806", `Unknown export hint '${h.name.name}'`, didYouMean(h.name.name, HINT_KINDS));
        return null;
    }
  }

  private checkRangeHint(h: HintCall, type: GlintType): PropertyHint | null {
    if (type !== "i32" && type !== "f32") {
      this.error(h.range, "E802", `range() hint requires an i32 or f32 property, found ${type}`);
      return null;
    }

    if (h.args.length < 2 || h.args.length > 3) {
      this.error(h.range, "E805", `range() expects 2 or 3 arguments (min, max, step), found ${h.args.length}`);
      return null;
    }

    const nums: number[] = [];
    for (const arg of h.args) {
      const v = evaluateConstant(arg, type);
      if (!v || (v.kind !== "Int" && v.kind !== "Float")) {
        this.error(
          arg.range,
          "E805",
          type === "i32" ? "range() arguments of an i32 property must be integer constants" : "range() arguments must be numeric constants"
        );
        return null;
      }
      nums.push(v.value);
    }

    const [min, max] = nums;
    const step = nums[2] ?? DEFAULT_RANGE_STEP[type];

    if (min > max) {
      this.error(h.range, "E805", `range() minimum ${min} is greater than maximum ${max}`);
      return null;
    }
    if (step <= 0) {
      this.error(h.args[2]?.range ?? h.range, "E805", "range() step must be greater than zero");
      return null;
    }

    return { kind: "range", min, max, step };
  }

  /** One or more non-empty string literals without the list separator. */
  private hintStrings(h: HintCall): string[] | null {
    if (h.args.length === 0) {
      this.error(h.range, "E808", `${h.name.name}() needs at least one value`);
      return null;
    }

    const out: string[] = [];
    for (const arg of h.args) {
      if (arg.kind !== "StringLiteral" || arg.value === "" || arg.value.includes(HINT_LIST_SEPARATOR)) {
        this.error(
          arg.range,
          "E808",
          `${h.name.name}() values must be non-empty string literals without '${HINT_LIST_SEPARATOR}'`
        );
        return null;
      }
      out.push(arg.value);
    }
    return out;
  }

  /* =========================================================
     Pass 3: function bodies
     ========================================================= */

  private checkFunctionBody(fn: FunctionDeclaration, info: FunctionInfo): void {
    this.currentFunction = info;
    this.withScope("function", () => {
      fn.params.forEach((p, i) => {
        const type = info.params[i]?.type ?? "unknown";
        this.bindingTypes.set(p, type);
        const sym: SymbolInfo = {
          name: p.name.name,
          kind: "param",
          type,
          mutable: false,
          range: p.name.range,
          reads: 0,
          writes: 0,
        };
        if (!this.scope.define(sym)) {
          this.error(p.name.range, "E208", `Duplicate parameter '${p.name.name}' in function '${info.name}'`);
          return;
        }
        this.symbols.push(sym);
      });

      // the body shares the parameter scope
      for (const st of fn.body.body) this.checkStatement(st);
    });

    if (info.returns !== "void" && info.returns !== "unknown" && !alwaysReturns(fn.body)) {
      this.error(
        fn.name.range,
        "E206",
        `Function '${info.name}' must return a value of type ${info.returns} on every path`
      );
    }

    this.currentFunction = null;
  }

  private checkStatement(st: Statement): void {
    switch (st.kind) {
      case "BlockStatement":
        this.checkBlock(st);
        return;
      case "LetStatement":
        this.checkLet(st);
        return;
      case "AssignStatement":
        this.checkAssign(st);
        return;
      case "IfStatement": {
        this.checkCondition(st.test, "if");
        this.checkBlock(st.consequent);
        if (st.alternate) this.checkStatement(st.alternate);
        return;
      }
      case "WhileStatement":
        this.checkCondition(st.test, "while");
        this.checkBlock(st.body);
        return;
      case "ReturnStatement":
        this.checkReturn(st.argument, st.range);
        return;
      case "ExpressionStatement":
        this.typeOf(st.expression);
        return;
    }
  }

  private checkBlock(b: BlockStatement): void {
    this.withScope("block", () => {
      for (const st of b.body) this.checkStatement(st);
    });
  }

  private checkLet(st: LetStatement): void {
    const name = st.name.name;
    const type = this.checkBindingInitializer(st.typeAnnotation, st.initializer, name);
    this.bindingTypes.set(st, type);

    const sym: SymbolInfo = {
      name,
      kind: "local",
      type,
      mutable: st.mutable,
      range: st.name.range,
      reads: 0,
      writes: 0,
    };
    if (!this.scope.define(sym)) {
      this.error(st.name.range, "E208", `Variable '${name}' is already defined in this scope`);
      return;
    }
    this.symbols.push(sym);
  }

  private checkCondition(test: Expression, what: "if" | "while"): void {
    const t = this.typeOf(test);
    if (t !== "bool" && t !== "unknown") {
      this.error(test.range, "E211", `Condition of '${what}' must be bool, found ${t}`);
    }
  }

  private checkReturn(argument: Expression | null, range: Range): void {
    const fn = this.currentFunction;
    if (!fn) return;

    if (!argument) {
      if (fn.returns !== "void" && fn.returns !== "unknown") {
        this.error(range, "E206", `Function '${fn.name}' must return a value of type ${fn.returns}`);
      }
      return;
    }

    const t = this.typeOf(argument);
    if (fn.returns === "void") {
      this.error(argument.range, "E206", `Function '${fn.name}' returns void but a value of type ${t} is returned`);
      return;
    }
    if (!isAssignable(t, fn.returns)) {
      this.error(argument.range, "E206", `Return type mismatch: expected ${fn.returns}, found ${t}`);
    }
  }

  private checkAssign(st: AssignStatement): void {
    const { target, operator } = st;
    const compound = operator !== "=";

    let targetType: GlintType;
    let sym: SymbolInfo | null = null;
    let throughNode = false;

    if (target.root.kind === "SelfExpression") {
      if (target.path.length === 0) {
        this.error(target.range, "E217", "Cannot assign to 'self'");
        this.typeOf(st.value);
        return;
      }
      targetType = "Node";
    } else {
      sym = this.lookupVariable(target.root);
      targetType = sym?.type ?? "unknown";
      if (sym) sym.writes++;
    }

    for (const seg of target.path) {
      if (targetType === "Node") throughNode = true;
      targetType = this.fieldTypeOrReport(targetType, seg);
    }

    // writes through a Node handle change the host object, not the binding
    if (sym && !sym.mutable && !throughNode) {
      const hint = sym.kind === "param" ? "Parameters are immutable." : `Declare it as 'let mut ${sym.name}'.`;
      if (compound) {
        this.error(target.range, "E216", `Cannot use '${operator}' on immutable variable '${sym.name}'`, hint);
      } else {
        this.error(target.range, "E207", `Cannot assign to immutable variable '${sym.name}'`, hint);
      }
    }

    const valueType = this.typeOf(st.value);
    if (targetType === "unknown" || valueType === "unknown") return;

    if (!compound) {
      if (!isAssignable(valueType, targetType)) {
        this.error(
          st.value.range,
          "E219",
          `Cannot assign a value of type ${valueType} to '${targetToString(st.target)}' of type ${targetType}`,
          coercionHint(valueType, targetType)
        );
      }
      return;
    }

    if (operator === "+=" && targetType === "String" && valueType === "String") return;

    if (!isNumeric(targetType) || !isNumeric(valueType)) {
      this.error(
        st.range,
        "E212",
        `Operator '${operator}' requires numeric operands, found ${targetType} and ${valueType}`
      );
      return;
    }

    const resultType = numericResult(targetType, valueType);
    if (!isAssignable(resultType, targetType)) {
      this.error(
        st.value.range,
        "E219",
        `Cannot apply '${operator}' with a ${valueType} value to '${targetToString(st.target)}' of type ${targetType}`,
        coercionHint(valueType, targetType)
      );
    }
  }

  /* =========================================================
     Expressions
     ========================================================= */

  private typeOf(e: Expression): GlintType {
    switch (e.kind) {
      case "IntLiteral":
        return "i32";
      case "FloatLiteral":
        return "f32";
      case "BoolLiteral":
        return "bool";
      case "StringLiteral":
        return "String";
      case "SelfExpression":
        return "Node";
      case "Identifier": {
        const sym = this.lookupVariable(e);
        if (!sym) return "unknown";
        sym.reads++;
        return sym.type;
      }
      case "FieldAccess":
        return this.typeOfFieldAccess(e);
      case "CallExpression":
        return this.typeOfCall(e);
      case "UnaryExpression": {
        const t = this.typeOf(e.argument);
        if (t === "unknown") return "unknown";
        if (e.operator === "-") {
          if (isNumeric(t)) return t;
          this.error(e.range, "E213", `Operator '-' cannot be applied to ${t}`);
          return "unknown";
        }
        if (t === "bool") return "bool";
        this.error(e.range, "E213", `Operator '!' cannot be applied to ${t}`);
        return "unknown";
      }
      case "BinaryExpression":
        return this.typeOfBinary(e.operator, this.typeOf(e.left), this.typeOf(e.right), e.range);
      case "StructLiteral":
        return this.typeOfStructLiteral(e);
    }
  }

  private typeOfBinary(op: string, l: GlintType, r: GlintType, range: Range): GlintType {
    const unknown = l === "unknown" || r === "unknown";

    switch (op) {
      case "+":
        if (l === "String" && r === "String") return "String";
        if (unknown) return "unknown";
        if (isNumeric(l) && isNumeric(r)) return numericResult(l, r);
        break;
      case "-":
      case "*":
      case "/":
        if (unknown) return "unknown";
        if (isNumeric(l) && isNumeric(r)) return numericResult(l, r);
        break;
      case "<":
      case "<=":
      case ">":
      case ">=":
        if (unknown || (isNumeric(l) && isNumeric(r))) return "bool";
        break;
      case "==":
      case "!=":
        if (isComparableForEquality(l, r)) return "bool";
        this.error(range, "E212", `Cannot compare ${l} with ${r} using '${op}'`);
        return "bool";
      case "&&":
      case "||":
        if (unknown || (l === "bool" && r === "bool")) return "bool";
        this.error(range, "E212", `Operator '${op}' requires bool operands, found ${l} and ${r}`);
        return "bool";
    }

    this.error(range, "E212", `Operator '${op}' cannot be applied to ${l} and ${r}`);
    return "unknown";
  }

  private typeOfFieldAccess(e: FieldAccess): GlintType {
    const base = this.typeOf(e.object);
    return this.fieldTypeOrReport(base, e.field);
  }

  private fieldTypeOrReport(base: GlintType, field: Identifier): GlintType {
    if (base === "unknown") return "unknown";

    const table = fieldsOf(base);
    if (!table) {
      this.error(field.range, "E209", `Cannot access field '${field.name}' on type ${base}`);
      return "unknown";
    }

    const t = fieldType(base, field.name);
    if (!t) {
      const names = Object.keys(table);
      this.error(
        field.range,
        "E215",
        `Type ${base} has no field '${field.name}'`,
        didYouMean(field.name, names) ?? `Available fields: ${names.join(", ")}.`
      );
      return "unknown";
    }
    return t;
  }

  private typeOfCall(e: CallExpression): GlintType {
    const name = e.callee.name;

    if (isBuiltinName(name)) {
      switch (name) {
        case "print":
          for (const a of e.args) {
            if (this.typeOf(a) === "void") this.error(a.range, "E205", "Cannot print a void value");
          }
          return "void";
        case "emit_signal":
          this.checkEmitSignal(e);
          return "void";
        default: {
          const sig = BUILTINS[name];
          if (sig.params !== "variadic") this.checkArguments(name, sig.params, e);
          return sig.returns;
        }
      }
    }

    const fn = this.functions.get(name);
    if (!fn) {
      for (const a of e.args) this.typeOf(a);
      this.error(
        e.callee.range,
        "E202",
        `Undefined function '${name}'`,
        didYouMean(name, [...this.functions.keys(), ...BUILTIN_NAMES])
      );
      return "unknown";
    }

    if (this.inGlobalInitializer) {
      this.error(
        e.callee.range,
        "E220",
        `Cannot call '${name}' in a global initializer`,
        "Global initializers run before the script is ready; move the call into _ready()."
      );
    }

    this.checkArguments(name, fn.params, e);
    return fn.returns;
  }

  private checkArguments(name: string, params: ReadonlyArray<{ name: string; type: GlintType }>, e: CallExpression): void {
    const types = e.args.map((a) => this.typeOf(a));

    if (types.length !== params.length) {
      this.error(
        e.range,
        "E204",
        `Function '${name}' expects ${params.length} argument${params.length === 1 ? "" : "s"}, found ${types.length}`
      );
      return;
    }

    types.forEach((t, i) => {
      const p = params[i];
      if (!isAssignable(t, p.type)) {
        this.error(
          e.args[i].range,
          "E205",
          `Argument '${p.name}' of '${name}' expects ${p.type}, found ${t}`,
          coercionHint(t, p.type)
        );
      }
    });
  }

  private checkEmitSignal(e: CallExpression): void {
    const [first, ...rest] = e.args;
    const restTypes = rest.map((a) => this.typeOf(a));

    if (!first) {
      this.error(e.range, "E204", "emit_signal() expects a signal name as its first argument");
      return;
    }
    if (first.kind !== "StringLiteral") {
      this.typeOf(first);
      this.error(first.range, "E205", "The first argument of emit_signal() must be a string literal");
      return;
    }

    const signal = this.signals.get(first.value);
    if (!signal) {
      this.error(
        first.range,
        "E302",
        `Undefined signal '${first.value}'`,
        didYouMean(first.value, this.signals.keys()) ?? `Declare it with 'signal ${first.value}(...);'.`
      );
      return;
    }

    if (restTypes.length !== signal.params.length) {
      this.error(
        e.range,
        "E303",
        `Signal '${signal.name}' expects ${signal.params.length} argument${signal.params.length === 1 ? "" : "s"}, found ${restTypes.length}`
      );
      return;
    }

    restTypes.forEach((t, i) => {
      const p = signal.params[i];
      if (!isAssignable(t, p.type)) {
        this.error(
          rest[i].range,
          "E304",
          `Argument '${p.name}' of signal '${signal.name}' expects ${p.type}, found ${t}`,
          coercionHint(t, p.type)
        );
      }
    });
  }

  private typeOfStructLiteral(e: StructLiteral): GlintType {
    const typeName = e.typeName.name;
    const valueTypes = e.fields.map((f) => this.typeOf(f.value));

    if (!isTypeName(typeName) || !isStructType(typeName)) {
      const known = isTypeName(typeName);
      this.error(
        e.typeName.range,
        "E700",
        known ? `Type ${typeName} cannot be built with a struct literal` : `Unknown struct type '${typeName}'`,
        known ? "Struct literals exist for Vector2, Color, Rect2 and Transform2D." : didYouMean(typeName, Object.keys(STRUCT_FIELDS))
      );
      return "unknown";
    }

    const declared = STRUCT_FIELDS[typeName];
    const declaredNames = Object.keys(declared);
    const seen = new Set<string>();

    e.fields.forEach((f, i) => {
      const fname = f.name.name;
      if (seen.has(fname)) {
        this.error(f.name.range, "E702", `Duplicate field '${fname}' in ${typeName} literal`);
        return;
      }
      seen.add(fname);

      const expected = fieldType(typeName, fname);
      if (!expected) {
        this.error(
          f.name.range,
          "E703",
          `${typeName} has no field '${fname}'`,
          didYouMean(fname, declaredNames) ?? `Fields of ${typeName}: ${declaredNames.join(", ")}.`
        );
        return;
      }

      const actual = valueTypes[i];
      if (!isAssignable(actual, expected)) {
        this.error(
          f.value.range,
          "E704",
          `Field '${fname}' of ${typeName} expects ${expected}, found ${actual}`,
          coercionHint(actual, expected)
        );
      }
    });

    const missing = declaredNames.filter((n) => !seen.has(n));
    if (missing.length > 0) {
      this.error(
        e.range,
        "E701",
        `Missing field${missing.length === 1 ? "" : "s"} ${missing.map((m) => `'${m}'`).join(", ")} in ${typeName} literal`
      );
    }

    return typeName;
  }

  /* =========================================================
     Names & types
     ========================================================= */

  private lookupVariable(id: Identifier): SymbolInfo | null {
    const sym = this.scope.resolve(id.name);
    if (sym) return sym;

    this.error(id.range, "E201", `Undefined variable '${id.name}'`, didYouMean(id.name, this.scope.visibleNames()));
    return null;
  }

  private resolveType(ref: TypeRef, allowVoid: boolean): GlintType {
    const t = this.peekType(ref);
    if (t === "unknown") {
      const alias = TYPE_ALIAS_HINTS[ref.name];
      this.error(
        ref.range,
        "E203",
        `Undefined type '${ref.name}'`,
        alias ? `Did you mean '${alias}'?` : didYouMean(ref.name, ANNOTATABLE_TYPES)
      );
      return "unknown";
    }
    if (t === "void" && !allowVoid) {
      this.error(ref.range, "E200", "Type 'void' is only allowed as a return type");
      return "unknown";
    }
    return t;
  }

  /** Resolves without reporting. */
  private peekType(ref: TypeRef): GlintType {
    return isTypeName(ref.name) && ref.name !== "unknown" ? ref.name : "unknown";
  }

  /* =========================================================
     Helpers
     ========================================================= */

  private withScope(kind: ScopeKind, fn: () => void): void {
    const prev = this.scope;
    this.scope = new Scope(kind, prev);
    try {
      fn();
    } finally {
      this.scope = prev;
    }
  }

  private error(range: Range, code: string, message: string, hint?: string): void {
    this.diagnostics.push(mkError(code, message, range, "checker", hint));
  }
}

/* =========================================================
   Free helpers
   ========================================================= */

/** True when every path through the statement ends in a `return`. */
export function alwaysReturns(st: Statement): boolean {
  switch (st.kind) {
    case "ReturnStatement":
      return true;
    case "BlockStatement":
      return st.body.some(alwaysReturns);
    case "IfStatement":
      return st.alternate !== null && alwaysReturns(st.consequent) && alwaysReturns(st.alternate);
    default:
      return false;
  }
}

function coercionHint(from: GlintType, to: GlintType): string | undefined {
  if (from === "f32" && to === "i32") return "f32 never converts to i32 implicitly.";
  return undefined;
}
