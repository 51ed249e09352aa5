import type { ClassifiedValue, UnknownValue } from "../model/values.js";

/** Local YAML tags of the tagged-scalar and prefixed-key styles. */
export const YamlTag = {
  name: "!name",
  color: "!color",
  point2: "!point2",
  point3: "!point3",
  point4: "!point4",
  matrix3: "!matrix3",
  bitarray: "!bitarray",
  unknown: "!unknown",
  truncated: "!truncated",
} as const;

/** `type` field of the flow-mapping style, by value kind. */
export const FlowType = {
  int: "int",
  float: "float",
  bool: "bool",
  string: "string",
  symbol: "name",
  color: "color",
  point2: "point2",
  point3: "point3",
  point4: "point4",
  matrix3: "matrix3",
  bitset: "bitarray",
  sequence: "array",
  unknown: "unknown",
  truncated: "truncated",
} as const satisfies Record<
  Exclude<ClassifiedValue["kind"], "reference"> | "truncated",
  string
>;

export type FlowType = (typeof FlowType)[keyof typeof FlowType];

/** Written in place of an unknown value that refused to become a string. */
export const UNPRINTABLE_SENTINEL = "<unprintable>";

export function unknownText(value: UnknownValue): string {
  return value.text.success ? value.text.data : UNPRINTABLE_SENTINEL;
}
