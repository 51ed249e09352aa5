import type { ScalarValue, TruncationReason } from "../model/values.js";

export type DecodedValue =
  | ScalarValue
  | { kind: "sequence"; items: readonly DecodedValue[] }
  | { kind: "unknown"; text: string }
  | { kind: "truncated"; reason: TruncationReason };

export type DecodedNode = { kind: "node"; entries: readonly DecodedEntry[] };

export type DecodedEntry = { key: string; value: DecodedValue | DecodedNode };

export type DecodeError =
  | { type: "syntax"; message: string }
  | { type: "structure"; path: string; message: string };
