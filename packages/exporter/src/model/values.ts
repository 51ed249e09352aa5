import type { Result } from "@matgraph/core/result";
import type { CoercionError } from "./errors.js";

export type Vector2 = readonly [number, number];
export type Vector3 = readonly [number, number, number];
export type Vector4 = readonly [number, number, number, number];

export type FloatState =
  | "finite"
  | "positiveInfinity"
  | "negativeInfinity"
  | "nan";

export type SpecialFloatState = Exclude<FloatState, "finite">;

/** Integers of every host width, Integer64 and IntegerPtr included. */
export type IntValue = { kind: "int"; value: bigint };

export type FloatValue =
  | { kind: "float"; state: "finite"; value: number }
  | { kind: "float"; state: SpecialFloatState };

export type BoolValue = { kind: "bool"; value: boolean };

export type StringValue = { kind: "string"; value: string };

/** An interned bare identifier, such as a shader type name. */
export type SymbolValue = { kind: "symbol"; name: string };

/** RGBA, each channel in the 0-255 domain. */
export type ColorValue = { kind: "color"; channels: Vector4 };

export type Point2Value = { kind: "point2"; components: Vector2 };
export type Point3Value = { kind: "point3"; components: Vector3 };
export type Point4Value = { kind: "point4"; components: Vector4 };

export type Matrix3Value = {
  kind: "matrix3";
  rows: readonly [Vector3, Vector3, Vector3, Vector3];
};

/** Set bit positions, ascending and without duplicates. */
export type BitSetValue = { kind: "bitset"; bits: readonly number[] };

/**
 * Values that encode on their own, without reference to any node.
 */
export type ScalarValue =
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | SymbolValue
  | ColorValue
  | Point2Value
  | Point3Value
  | Point4Value
  | Matrix3Value
  | BitSetValue;

export type SequenceValue<TNode> = {
  kind: "sequence";
  items: readonly ClassifiedValue<TNode>[];
};

export type NodeReference<TNode> = { kind: "reference"; node: TNode };

/**
 * A value of a class the classifier does not know. `text` is the outcome of
 * coercing it to a string, attempted once at classification time.
 */
export type UnknownValue = {
  kind: "unknown";
  raw: unknown;
  text: Result<string, CoercionError>;
};

export type ClassifiedValue<TNode = unknown> =
  | ScalarValue
  | SequenceValue<TNode>
  | NodeReference<TNode>
  | UnknownValue;

export type PropertyEntry<TNode> = {
  readonly name: string;
  readonly value: ClassifiedValue<TNode>;
};

/** Why the walker stopped descending at a key path. */
export type TruncationReason = "cycle" | "depth" | "reference";

export function floatValue(value: number): FloatValue {
  if (Number.isNaN(value)) return { kind: "float", state: "nan" };
  if (value === Infinity) return { kind: "float", state: "positiveInfinity" };
  if (value === -Infinity) return { kind: "float", state: "negativeInfinity" };
  return { kind: "float", state: "finite", value };
}

/**
 * Inverse of floatValue.
 */
export function floatNumber(value: FloatValue): number {
  switch (value.state) {
    case "finite":
      return value.value;
    case "positiveInfinity":
      return Infinity;
    case "negativeInfinity":
      return -Infinity;
    case "nan":
      return NaN;
  }
}

export function containsReference<TNode>(value: ClassifiedValue<TNode>): boolean {
  if (value.kind === "reference") return true;
  if (value.kind === "sequence") return value.items.some(containsReference);
  return false;
}

/**
 * Every unknown value inside `value` whose text coercion failed.
 */
export function coercionFailures<TNode>(
  value: ClassifiedValue<TNode>
): CoercionError[] {
  if (value.kind === "unknown") {
    return value.text.success ? [] : [value.text.error];
  }
  if (value.kind === "sequence") {
    return value.items.flatMap((item) => coercionFailures(item));
  }
  return [];
}
