import { isScalar, isSeq, type YAMLSeq } from "yaml";
import { type Result, ok, err } from "@matgraph/core/result";
import type { ScalarValue, Vector2, Vector3, Vector4 } from "../model/values.js";
import type { DecodeError } from "./types.js";

export type CompositeKind =
  | "color"
  | "point2"
  | "point3"
  | "point4"
  | "matrix3"
  | "bitset";

/** Reads one number out of a parsed scalar value. */
export type NumberReader = (value: unknown) => number | undefined;

export const structureError = (path: string, message: string): DecodeError => ({
  type: "structure",
  path,
  message,
});

export const readYamlNumber: NumberReader = (value) => {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return undefined;
};

const JSON_SPECIAL_NUMBERS: ReadonlyMap<string, number> = new Map([
  ["inf", Infinity],
  ["-inf", -Infinity],
  ["nan", NaN],
]);

export const readJsonNumber: NumberReader = (value) => {
  if (typeof value === "string") return JSON_SPECIAL_NUMBERS.get(value);
  return readYamlNumber(value);
};

function readNumbers(
  items: readonly unknown[],
  where: string,
  read: NumberReader
): Result<number[], DecodeError> {
  const numbers: number[] = [];
  for (const item of items) {
    const value = isScalar(item) ? read(item.value) : undefined;
    if (value === undefined) {
      return err(structureError(where, "expected a number"));
    }
    numbers.push(value);
  }
  return ok(numbers);
}

const toVector2 = ([x, y, ...rest]: number[]): Vector2 | undefined =>
  x !== undefined && y !== undefined && rest.length === 0 ? [x, y] : undefined;

const toVector3 = ([x, y, z, ...rest]: number[]): Vector3 | undefined =>
  x !== undefined && y !== undefined && z !== undefined && rest.length === 0
    ? [x, y, z]
    : undefined;

const toVector4 = ([x, y, z, w, ...rest]: number[]): Vector4 | undefined =>
  x !== undefined &&
  y !== undefined &&
  z !== undefined &&
  w !== undefined &&
  rest.length === 0
    ? [x, y, z, w]
    : undefined;

function decodeMatrixRows(
  seq: YAMLSeq<unknown>,
  where: string,
  read: NumberReader
): Result<ScalarValue, DecodeError> {
  const rows: Vector3[] = [];
  for (const item of seq.items) {
    if (!isSeq(item)) {
      return err(structureError(where, "matrix row is not a sequence"));
    }
    const numbers = readNumbers(item.items, where, read);
    if (!numbers.success) return numbers;
    const row = toVector3(numbers.data);
    if (row === undefined) {
      return err(structureError(where, "matrix row needs 3 components"));
    }
    rows.push(row);
  }
  const [row1, row2, row3, row4, ...rest] = rows;
  if (!row1 || !row2 || !row3 || !row4 || rest.length > 0) {
    return err(structureError(where, "matrix needs 4 rows"));
  }
  return ok({ kind: "matrix3", rows: [row1, row2, row3, row4] });
}

/**
 * Decode the payload sequence of a color, point, matrix or bit array. The
 * grammars share these layouts and differ only in how special floats are
 * spelled, which `read` takes care of.
 */
export function decodeComposite(
  kind: CompositeKind,
  seq: YAMLSeq<unknown>,
  where: string,
  read: NumberReader
): Result<ScalarValue, DecodeError> {
  if (kind === "matrix3") return decodeMatrixRows(seq, where, read);

  const numbers = readNumbers(seq.items, where, read);
  if (!numbers.success) return numbers;

  switch (kind) {
    case "color": {
      const channels = toVector4(numbers.data);
      return channels
        ? ok({ kind: "color", channels })
        : err(structureError(where, "color needs 4 channels"));
    }
    case "point2": {
      const components = toVector2(numbers.data);
      return components
        ? ok({ kind: "point2", components })
        : err(structureError(where, "point2 needs 2 components"));
    }
    case "point3": {
      const components = toVector3(numbers.data);
      return components
        ? ok({ kind: "point3", components })
        : err(structureError(where, "point3 needs 3 components"));
    }
    case "point4": {
      const components = toVector4(numbers.data);
      return components
        ? ok({ kind: "point4", components })
        : err(structureError(where, "point4 needs 4 components"));
    }
    case "bitset":
      return numbers.data.every((bit) => Number.isInteger(bit) && bit >= 0)
        ? ok({ kind: "bitset", bits: numbers.data })
        : err(structureError(where, "bit positions must be non-negative integers"));
  }
}
