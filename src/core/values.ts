// src/core/values.ts
//
// Runtime values
// --------------
// Values are immutable and passed by value: writing `p.x` builds a new
// Vector2 and stores it back, it never mutates a shared object.
//
// i32 arithmetic wraps to 32 bits; every f32 result goes through Math.fround.

import type { GlintType, StructTypeName } from "./types";

/** Opaque host handle. Equality and liveness are answered by the host. */
export type NodeRef = {
  readonly id: string | number;
};

export type IntValue = { readonly kind: "Int"; readonly value: number };
export type FloatValue = { readonly kind: "Float"; readonly value: number };
export type BoolValue = { readonly kind: "Bool"; readonly value: boolean };
export type StrValue = { readonly kind: "Str"; readonly value: string };
export type Vector2Value = { readonly kind: "Vector2"; readonly x: number; readonly y: number };
export type ColorValue = {
  readonly kind: "Color";
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
};
export type Rect2Value = { readonly kind: "Rect2"; readonly position: Vector2Value; readonly size: Vector2Value };
export type Transform2DValue = {
  readonly kind: "Transform2D";
  readonly position: Vector2Value;
  readonly rotation: number;
  readonly scale: Vector2Value;
};
export type NodeValue = { readonly kind: "Node"; readonly ref: NodeRef };
export type InputEventValue = { readonly kind: "InputEvent"; readonly action: string; readonly pressed: boolean };
export type VoidValue = { readonly kind: "Void" };

export type StructValue = Vector2Value | ColorValue | Rect2Value | Transform2DValue;

export type RuntimeValue =
  | IntValue
  | FloatValue
  | BoolValue
  | StrValue
  | StructValue
  | NodeValue
  | InputEventValue
  | VoidValue;

export type NumericValue = IntValue | FloatValue;

/* =========================================================
   Constructors
   ========================================================= */

export const VOID: VoidValue = Object.freeze({ kind: "Void" });

export function int(n: number): IntValue {
  return { kind: "Int", value: n | 0 };
}

export function float(n: number): FloatValue {
  return { kind: "Float", value: Math.fround(n) };
}

export function bool(b: boolean): BoolValue {
  return { kind: "Bool", value: b };
}

export function str(s: string): StrValue {
  return { kind: "Str", value: s };
}

export function vector2(x: number, y: number): Vector2Value {
  return { kind: "Vector2", x: Math.fround(x), y: Math.fround(y) };
}

export function color(r: number, g: number, b: number, a = 1): ColorValue {
  return { kind: "Color", r: Math.fround(r), g: Math.fround(g), b: Math.fround(b), a: Math.fround(a) };
}

export function rect2(position: Vector2Value, size: Vector2Value): Rect2Value {
  return { kind: "Rect2", position, size };
}

export function transform2d(position: Vector2Value, rotation: number, scale: Vector2Value): Transform2DValue {
  return { kind: "Transform2D", position, rotation: Math.fround(rotation), scale };
}

export function node(ref: NodeRef): NodeValue {
  return { kind: "Node", ref };
}

export function inputEvent(action: string, pressed: boolean): InputEventValue {
  return { kind: "InputEvent", action, pressed };
}

/* =========================================================
   Types
   ========================================================= */

export function typeOfValue(v: RuntimeValue): GlintType {
  switch (v.kind) {
    case "Int":
      return "i32";
    case "Float":
      return "f32";
    case "Bool":
      return "bool";
    case "Str":
      return "String";
    case "Vector2":
    case "Color":
    case "Rect2":
    case "Transform2D":
      return v.kind;
    case "Node":
      return "Node";
    case "InputEvent":
      return "InputEvent";
    case "Void":
      return "void";
  }
}

/** Returns `v` converted to `type` (only i32 -> f32 converts), or null. */
export function coerceTo(v: RuntimeValue, type: GlintType): RuntimeValue | null {
  if (typeOfValue(v) === type) return v;
  if (v.kind === "Int" && type === "f32") return float(v.value);
  return null;
}

export function isNumericValue(v: RuntimeValue): v is NumericValue {
  return v.kind === "Int" || v.kind === "Float";
}

/** False when any float component is NaN or infinite. */
export function isFiniteValue(v: RuntimeValue): boolean {
  switch (v.kind) {
    case "Float":
      return Number.isFinite(v.value);
    case "Vector2":
      return Number.isFinite(v.x) && Number.isFinite(v.y);
    case "Color":
      return [v.r, v.g, v.b, v.a].every(Number.isFinite);
    case "Rect2":
      return isFiniteValue(v.position) && isFiniteValue(v.size);
    case "Transform2D":
      return isFiniteValue(v.position) && Number.isFinite(v.rotation) && isFiniteValue(v.scale);
    default:
      return true;
  }
}

/* =========================================================
   Fields (by value)
   ========================================================= */

export function getField(v: RuntimeValue, field: string): RuntimeValue | null {
  switch (v.kind) {
    case "Vector2":
      if (field === "x") return float(v.x);
      if (field === "y") return float(v.y);
      return null;
    case "Color":
      if (field === "r") return float(v.r);
      if (field === "g") return float(v.g);
      if (field === "b") return float(v.b);
      if (field === "a") return float(v.a);
      return null;
    case "Rect2":
      if (field === "position") return v.position;
      if (field === "size") return v.size;
      return null;
    case "Transform2D":
      if (field === "position") return v.position;
      if (field === "rotation") return float(v.rotation);
      if (field === "scale") return v.scale;
      return null;
    case "InputEvent":
      if (field === "action") return str(v.action);
      if (field === "pressed") return bool(v.pressed);
      return null;
    default:
      return null;
  }
}

/**
 * Copy of `v` with one field replaced, or null when the field does not exist
 * or `next` has the wrong type. Ints are accepted for float fields.
 */
export function withField(v: RuntimeValue, field: string, next: RuntimeValue): RuntimeValue | null {
  const f = next.kind === "Int" ? float(next.value) : next;

  switch (v.kind) {
    case "Vector2":
      if (f.kind !== "Float") return null;
      if (field === "x") return vector2(f.value, v.y);
      if (field === "y") return vector2(v.x, f.value);
      return null;
    case "Color":
      if (f.kind !== "Float") return null;
      if (field === "r") return color(f.value, v.g, v.b, v.a);
      if (field === "g") return color(v.r, f.value, v.b, v.a);
      if (field === "b") return color(v.r, v.g, f.value, v.a);
      if (field === "a") return color(v.r, v.g, v.b, f.value);
      return null;
    case "Rect2":
      if (f.kind !== "Vector2") return null;
      if (field === "position") return rect2(f, v.size);
      if (field === "size") return rect2(v.position, f);
      return null;
    case "Transform2D":
      if (field === "rotation") return f.kind === "Float" ? transform2d(v.position, f.value, v.scale) : null;
      if (f.kind !== "Vector2") return null;
      if (field === "position") return transform2d(f, v.rotation, v.scale);
      if (field === "scale") return transform2d(v.position, v.rotation, f);
      return null;
    case "InputEvent":
      if (field === "action" && f.kind === "Str") return inputEvent(f.value, v.pressed);
      if (field === "pressed" && f.kind === "Bool") return inputEvent(v.action, f.value);
      return null;
    default:
      return null;
  }
}

/** Builds a struct from a complete field map; null on a missing or mistyped field. */
export function buildStruct(type: StructTypeName, fields: ReadonlyMap<string, RuntimeValue>): StructValue | null {
  const num = (name: string): number | null => {
    const v = fields.get(name);
    if (!v || !isNumericValue(v)) return null;
    return v.value;
  };
  const vec = (name: string): Vector2Value | null => {
    const v = fields.get(name);
    return v && v.kind === "Vector2" ? v : null;
  };

  switch (type) {
    case "Vector2": {
      const x = num("x");
      const y = num("y");
      return x === null || y === null ? null : vector2(x, y);
    }
    case "Color": {
      const r = num("r");
      const g = num("g");
      const b = num("b");
      const a = num("a");
      return r === null || g === null || b === null || a === null ? null : color(r, g, b, a);
    }
    case "Rect2": {
      const position = vec("position");
      const size = vec("size");
      return position && size ? rect2(position, size) : null;
    }
    case "Transform2D": {
      const position = vec("position");
      const rotation = num("rotation");
      const scale = vec("scale");
      return position && rotation !== null && scale ? transform2d(position, rotation, scale) : null;
    }
  }
}

/* =========================================================
   Equality
   ========================================================= */

export type NodeEquality = (a: NodeRef, b: NodeRef) => boolean;

const sameId: NodeEquality = (a, b) => a.id === b.id;

/** Structural equality; an Int and a Float compare by numeric value. */
export function valuesEqual(a: RuntimeValue, b: RuntimeValue, nodeEquals: NodeEquality = sameId): boolean {
  if (isNumericValue(a) && isNumericValue(b)) return a.value === b.value;

  switch (a.kind) {
    case "Bool":
      return b.kind === "Bool" && a.value === b.value;
    case "Str":
      return b.kind === "Str" && a.value === b.value;
    case "Vector2":
      return b.kind === "Vector2" && a.x === b.x && a.y === b.y;
    case "Color":
      return b.kind === "Color" && a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
    case "Rect2":
      return b.kind === "Rect2" && valuesEqual(a.position, b.position) && valuesEqual(a.size, b.size);
    case "Transform2D":
      return (
        b.kind === "Transform2D" &&
        valuesEqual(a.position, b.position) &&
        a.rotation === b.rotation &&
        valuesEqual(a.scale, b.scale)
      );
    case "Node":
      return b.kind === "Node" && nodeEquals(a.ref, b.ref);
    case "InputEvent":
      return b.kind === "InputEvent" && a.action === b.action && a.pressed === b.pressed;
    case "Void":
      return b.kind === "Void";
    default:
      return false;
  }
}

/* =========================================================
   Formatting (print)
   ========================================================= */

/** Shortest decimal that reads back as the same f32; integral values keep ".0". */
export function formatFloat(n: number): string {
  if (!Number.isFinite(n)) return Number.isNaN(n) ? "NaN" : n > 0 ? "inf" : "-inf";

  let text = String(n);
  for (let p = 1; p <= 9; p++) {
    const candidate = Number(n.toPrecision(p));
    if (Math.fround(candidate) === n) {
      text = String(candidate);
      break;
    }
  }

  return /[.e]/.test(text) ? text : `${text}.0`;
}

function formatVector2(v: Vector2Value): string {
  return `Vector2(${formatFloat(v.x)}, ${formatFloat(v.y)})`;
}

export function formatValue(v: RuntimeValue): string {
  switch (v.kind) {
    case "Int":
      return String(v.value);
    case "Float":
      return formatFloat(v.value);
    case "Bool":
      return v.value ? "true" : "false";
    case "Str":
      return v.value;
    case "Vector2":
      return formatVector2(v);
    case "Color":
      return `Color(${[v.r, v.g, v.b, v.a].map(formatFloat).join(", ")})`;
    case "Rect2":
      return `Rect2(${formatVector2(v.position)}, ${formatVector2(v.size)})`;
    case "Transform2D":
      return `Transform2D(${formatVector2(v.position)}, ${formatFloat(v.rotation)}, ${formatVector2(v.scale)})`;
    case "Node":
      return `Node(${v.ref.id})`;
    case "InputEvent":
      return `InputEvent(${v.action}, ${v.pressed ? "true" : "false"})`;
    case "Void":
      return "nil";
  }
}
