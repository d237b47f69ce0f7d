// src/core/metadata.ts
//
// Exported-property and signal metadata
// -------------------------------------
// Built by the checker, read by the host to generate inspector fields. Hint
// payloads render to the inspector's string form and parse back unchanged.

import type { Expression } from "./ast";
import { isStructType, type GlintType } from "./types";
import {
  bool,
  buildStruct,
  coerceTo,
  float,
  int,
  str,
  type NumericValue,
  type RuntimeValue,
} from "./values";

export type PropertyHint =
  | { kind: "none" }
  | { kind: "range"; min: number; max: number; step: number }
  | { kind: "enum"; values: string[] }
  | { kind: "file"; filter: string };

export type PropertyHintKind = PropertyHint["kind"];

export type PropertyMetadata = {
  name: string;
  type: GlintType;
  hint: PropertyHint;
  defaultValue: RuntimeValue;
};

export type SignalMetadata = {
  name: string;
  params: Array<{ name: string; type: GlintType }>;
};

export const DEFAULT_RANGE_STEP: Readonly<Record<"i32" | "f32", number>> = Object.freeze({
  i32: 1,
  f32: 0.001,
});

/** Separator used for enum values and file filters in the inspector string. */
export const HINT_LIST_SEPARATOR = ",";

/* =========================================================
   Hint strings
   ========================================================= */

export function formatHintString(hint: PropertyHint): string {
  switch (hint.kind) {
    case "none":
      return "";
    case "range":
      return [hint.min, hint.max, hint.step].map(String).join(HINT_LIST_SEPARATOR);
    case "enum":
      return hint.values.join(HINT_LIST_SEPARATOR);
    case "file":
      return hint.filter;
  }
}

export function parseHintString(kind: PropertyHintKind, text: string): PropertyHint | null {
  switch (kind) {
    case "none":
      return text === "" ? { kind: "none" } : null;
    case "range": {
      const parts = text.split(HINT_LIST_SEPARATOR).map((p) => Number(p.trim()));
      if (parts.length !== 3 || parts.some((n) => !Number.isFinite(n))) return null;
      const [min, max, step] = parts;
      return { kind: "range", min, max, step };
    }
    case "enum":
      return text === "" ? null : { kind: "enum", values: text.split(HINT_LIST_SEPARATOR) };
    case "file":
      return text === "" ? null : { kind: "file", filter: text };
  }
}

/* =========================================================
   Range clamp
   ========================================================= */

/** Clamps a numeric value into a Range hint; other hints leave it untouched. */
export function clampToHint(value: RuntimeValue, hint: PropertyHint): RuntimeValue {
  if (hint.kind !== "range") return value;
  if (value.kind !== "Int" && value.kind !== "Float") return value;
  return clampNumeric(value, hint.min, hint.max);
}

function clampNumeric(v: NumericValue, min: number, max: number): NumericValue {
  const clamped = Math.min(max, Math.max(min, v.value));
  return v.kind === "Int" ? int(clamped) : float(clamped);
}

/* =========================================================
   Compile-time constants
   ========================================================= */

/**
 * Folds a literal expression into a value of `type`, or returns null when the
 * expression is not a compile-time constant (or has the wrong type).
 *
 * Constants are literals, negated numeric constants, `!` of a bool constant
 * and struct literals whose fields are all constants.
 */
export function evaluateConstant(expr: Expression, type: GlintType): RuntimeValue | null {
  const v = foldConstant(expr);
  return v ? coerceTo(v, type) : null;
}

function foldConstant(expr: Expression): RuntimeValue | null {
  switch (expr.kind) {
    case "IntLiteral":
      return int(expr.value);
    case "FloatLiteral":
      return float(expr.value);
    case "BoolLiteral":
      return bool(expr.value);
    case "StringLiteral":
      return str(expr.value);
    case "UnaryExpression": {
      const inner = foldConstant(expr.argument);
      if (!inner) return null;
      if (expr.operator === "-") {
        if (inner.kind === "Int") return int(-inner.value);
        if (inner.kind === "Float") return float(-inner.value);
        return null;
      }
      return inner.kind === "Bool" ? bool(!inner.value) : null;
    }
    case "StructLiteral": {
      const structType = asGlintTypeName(expr.typeName.name);
      if (!isStructType(structType)) return null;
      const fields = new Map<string, RuntimeValue>();
      for (const f of expr.fields) {
        const fv = foldConstant(f.value);
        if (!fv) return null;
        fields.set(f.name.name, fv);
      }
      return buildStruct(structType, fields);
    }
    default:
      return null;
  }
}

function asGlintTypeName(name: string): GlintType {
  switch (name) {
    case "Vector2":
    case "Color":
    case "Rect2":
    case "Transform2D":
      return name;
    default:
      return "unknown";
  }
}
