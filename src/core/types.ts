// src/core/types.ts
//
// Glint Type System
// -----------------
// The language has a closed set of types. Structured types carry a fixed field
// table; `unknown` only exists inside the checker, after an error has already
// been reported, so one mistake does not cascade into many.

export const TYPE_NAMES = [
  "i32",
  "f32",
  "bool",
  "String",
  "void",
  "Vector2",
  "Color",
  "Rect2",
  "Transform2D",
  "Node",
  "InputEvent",
  "unknown",
] as const;

export type GlintType = (typeof TYPE_NAMES)[number];

/** Names a user may write in a type annotation. */
export const ANNOTATABLE_TYPES: readonly GlintType[] = TYPE_NAMES.filter((t) => t !== "unknown");

export type StructTypeName = "Vector2" | "Color" | "Rect2" | "Transform2D";

export type FieldTable = Readonly<Record<string, GlintType>>;

export const STRUCT_FIELDS: Readonly<Record<StructTypeName, FieldTable>> = Object.freeze({
  Vector2: { x: "f32", y: "f32" },
  Color: { r: "f32", g: "f32", b: "f32", a: "f32" },
  Rect2: { position: "Vector2", size: "Vector2" },
  Transform2D: { position: "Vector2", rotation: "f32", scale: "Vector2" },
});

/** Host-backed fields: reads and writes go through the host. */
export const NODE_FIELDS: FieldTable = Object.freeze({
  position: "Vector2",
  rotation: "f32",
  scale: "Vector2",
  name: "String",
});

export const INPUT_EVENT_FIELDS: FieldTable = Object.freeze({
  action: "String",
  pressed: "bool",
});

export const EXPORTABLE_TYPES: readonly GlintType[] = [
  "i32",
  "f32",
  "bool",
  "String",
  "Vector2",
  "Color",
  "Rect2",
  "Transform2D",
];

/* =========================================================
   Predicates
   ========================================================= */

export function isTypeName(name: string): name is GlintType {
  return (TYPE_NAMES as readonly string[]).includes(name);
}

export function isStructType(t: GlintType): t is StructTypeName {
  return t === "Vector2" || t === "Color" || t === "Rect2" || t === "Transform2D";
}

export function isNumeric(t: GlintType): boolean {
  return t === "i32" || t === "f32";
}

export function isExportable(t: GlintType): boolean {
  return EXPORTABLE_TYPES.includes(t);
}

/** Types that support `.field` access, and their field tables. */
export function fieldsOf(t: GlintType): FieldTable | null {
  if (isStructType(t)) return STRUCT_FIELDS[t];
  if (t === "Node") return NODE_FIELDS;
  if (t === "InputEvent") return INPUT_EVENT_FIELDS;
  return null;
}

export function fieldType(t: GlintType, field: string): GlintType | null {
  const table = fieldsOf(t);
  if (!table || !Object.prototype.hasOwnProperty.call(table, field)) return null;
  return table[field];
}

/* =========================================================
   Relations
   ========================================================= */

/**
 * `from` may be used where `to` is expected. The only implicit conversion is
 * i32 -> f32; `unknown` is accepted both ways.
 */
export function isAssignable(from: GlintType, to: GlintType): boolean {
  if (from === "unknown" || to === "unknown") return true;
  if (from === to) return true;
  return from === "i32" && to === "f32";
}

/** Result type of an arithmetic operator on two numerics. */
export function numericResult(a: GlintType, b: GlintType): GlintType {
  if (a === "unknown" || b === "unknown") return "unknown";
  return a === "f32" || b === "f32" ? "f32" : "i32";
}

/** == and != accept equal types, or a numeric pair. */
export function isComparableForEquality(a: GlintType, b: GlintType): boolean {
  if (a === "unknown" || b === "unknown") return true;
  if (a === "void" || b === "void") return false;
  if (a === b) return true;
  return isNumeric(a) && isNumeric(b);
}
