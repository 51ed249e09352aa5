import {
  isMap,
  isScalar,
  isSeq,
  parseDocument,
  type YAMLMap,
  type YAMLSeq,
} from "yaml";
import type { FormatStyle } from "@matgraph/core/configuration";
import { joinKeyPath } from "@matgraph/core/key-path";
import { type Result, ok, err } from "@matgraph/core/result";
import { FlowType, YamlTag } from "../encode/tags.js";
import { type TruncationReason, floatValue } from "../model/values.js";
import {
  type CompositeKind,
  decodeComposite,
  readJsonNumber,
  readYamlNumber,
  structureError,
} from "./composite.js";
import type {
  DecodeError,
  DecodedEntry,
  DecodedNode,
  DecodedValue,
} from "./types.js";

type Decoded<T> = Result<T, DecodeError>;

type ValueDecoder = (node: unknown, where: string) => Decoded<DecodedValue | DecodedNode>;

const TRUNCATION_REASONS: readonly TruncationReason[] = ["cycle", "depth", "reference"];

const YAML_COMPOSITE_TAGS: ReadonlyMap<string, CompositeKind> = new Map([
  [YamlTag.color, "color"],
  [YamlTag.point2, "point2"],
  [YamlTag.point3, "point3"],
  [YamlTag.point4, "point4"],
  [YamlTag.matrix3, "matrix3"],
  [YamlTag.bitarray, "bitset"],
]);

const FLOW_COMPOSITE_TYPES: ReadonlyMap<string, CompositeKind> = new Map([
  [FlowType.color, "color"],
  [FlowType.point2, "point2"],
  [FlowType.point3, "point3"],
  [FlowType.point4, "point4"],
  [FlowType.matrix3, "matrix3"],
  [FlowType.bitset, "bitset"],
]);

const childPath = (where: string, key: string): string =>
  where === "" ? key : `${where}.${key}`;

function parseRoot(text: string): Decoded<YAMLMap<unknown, unknown>> {
  // BigInt integers keep `1` and `1.0` apart.
  const document = parseDocument(text, { intAsBigInt: true });
  if (document.errors.length > 0) {
    return err({
      type: "syntax",
      message: document.errors.map((error) => error.message).join("; "),
    });
  }
  const root = document.contents;
  if (!isMap(root)) {
    return err(structureError("", "document is not a mapping"));
  }
  return ok(root);
}

function decodeEntries(
  map: YAMLMap<unknown, unknown>,
  where: string,
  decodeValue: ValueDecoder
): Decoded<DecodedNode> {
  const entries: DecodedEntry[] = [];
  for (const pair of map.items) {
    if (!isScalar(pair.key)) {
      return err(structureError(where, "mapping key is not a scalar"));
    }
    const key = String(pair.key.value);
    const value = decodeValue(pair.value, childPath(where, key));
    if (!value.success) return value;
    entries.push({ key, value: value.data });
  }
  return ok({ kind: "node", entries });
}

function decodeReason(value: unknown, where: string): Decoded<DecodedValue> {
  const reason = TRUNCATION_REASONS.find((candidate) => candidate === value);
  if (reason === undefined) {
    return err(structureError(where, `unknown truncation reason: ${String(value)}`));
  }
  return ok({ kind: "truncated", reason });
}

function decodeItems(
  seq: YAMLSeq<unknown>,
  where: string,
  decodeItem: (node: unknown, where: string) => Decoded<DecodedValue>
): Decoded<DecodedValue> {
  const items: DecodedValue[] = [];
  for (const [index, node] of seq.items.entries()) {
    const item = decodeItem(node, childPath(where, String(index)));
    if (!item.success) return item;
    items.push(item.data);
  }
  return ok({ kind: "sequence", items });
}

// ---------------------------------------------------------------------------
// tagged-scalar and prefixed-key
// ---------------------------------------------------------------------------

function decodeNativeScalar(value: unknown, where: string): Decoded<DecodedValue> {
  switch (typeof value) {
    case "bigint":
      return ok({ kind: "int", value });
    case "number":
      return ok(floatValue(value));
    case "boolean":
      return ok({ kind: "bool", value });
    case "string":
      return ok({ kind: "string", value });
    default:
      return err(structureError(where, "unsupported scalar"));
  }
}

function decodeTaggedLeaf(node: unknown, where: string): Decoded<DecodedValue> {
  if (isSeq(node)) {
    if (node.tag === undefined) {
      return decodeItems(node, where, decodeTaggedLeaf);
    }
    const kind = YAML_COMPOSITE_TAGS.get(node.tag);
    if (kind === undefined) {
      return err(structureError(where, `unsupported tag ${node.tag}`));
    }
    return decodeComposite(kind, node, where, readYamlNumber);
  }

  if (isScalar(node)) {
    switch (node.tag) {
      case undefined:
        return decodeNativeScalar(node.value, where);
      case YamlTag.name:
        return ok({ kind: "symbol", name: String(node.value) });
      case YamlTag.unknown:
        return ok({ kind: "unknown", text: String(node.value) });
      case YamlTag.truncated:
        return decodeReason(node.value, where);
      default:
        return err(structureError(where, `unsupported tag ${node.tag}`));
    }
  }

  return err(structureError(where, "expected a scalar or a sequence"));
}

const decodeTaggedValue: ValueDecoder = (node, where) => {
  if (isMap(node)) return decodeEntries(node, where, decodeTaggedValue);
  return decodeTaggedLeaf(node, where);
};

// ---------------------------------------------------------------------------
// flow-mapping
// ---------------------------------------------------------------------------

function findValue(map: YAMLMap<unknown, unknown>, key: string): unknown {
  return map.items.find((pair) => isScalar(pair.key) && pair.key.value === key)
    ?.value;
}

/** The `type` of a `{"type": ..., "value": ...}` mapping, if it is one. */
function flowTypeOf(map: YAMLMap<unknown, unknown>): string | undefined {
  const type = findValue(map, "type");
  return isScalar(type) && typeof type.value === "string" ? type.value : undefined;
}

function decodeTypedPayload(
  type: string,
  payload: unknown,
  where: string
): Decoded<DecodedValue> {
  const composite = FLOW_COMPOSITE_TYPES.get(type);
  if (composite !== undefined) {
    return isSeq(payload)
      ? decodeComposite(composite, payload, where, readJsonNumber)
      : err(structureError(where, `${type} value is not an array`));
  }
  if (type === FlowType.sequence) {
    return isSeq(payload)
      ? decodeItems(payload, where, decodeTypedValue)
      : err(structureError(where, "array value is not an array"));
  }

  const value = isScalar(payload) ? payload.value : undefined;
  switch (type) {
    case FlowType.int:
      if (typeof value === "bigint") return ok({ kind: "int", value });
      break;
    case FlowType.float: {
      const number: number | undefined = readJsonNumber(value);
      if (number !== undefined) return ok(floatValue(number));
      break;
    }
    case FlowType.bool:
      if (typeof value === "boolean") return ok({ kind: "bool", value });
      break;
    case FlowType.string:
      if (typeof value === "string") return ok({ kind: "string", value });
      break;
    case FlowType.symbol:
      if (typeof value === "string") return ok({ kind: "symbol", name: value });
      break;
    case FlowType.unknown:
      if (typeof value === "string") return ok({ kind: "unknown", text: value });
      break;
    case FlowType.truncated:
      return decodeReason(value, where);
    default:
      return err(structureError(where, `unsupported type ${type}`));
  }
  return err(structureError(where, `malformed ${type} value`));
}

function decodeTypedValue(node: unknown, where: string): Decoded<DecodedValue> {
  const type = isMap(node) ? flowTypeOf(node) : undefined;
  if (!isMap(node) || type === undefined) {
    return err(structureError(where, "expected a typed value"));
  }
  return decodeTypedPayload(type, findValue(node, "value"), where);
}

const decodeFlowValue: ValueDecoder = (node, where) => {
  if (!isMap(node)) {
    return err(structureError(where, "expected an object"));
  }
  // A node's own "type" property holds a typed mapping, never a string.
  if (flowTypeOf(node) !== undefined) return decodeTypedValue(node, where);
  return decodeEntries(node, where, decodeFlowValue);
};

// ---------------------------------------------------------------------------
// public API
// ---------------------------------------------------------------------------

const decoders: Record<FormatStyle, ValueDecoder> = {
  "flow-mapping": decodeFlowValue,
  "tagged-scalar": decodeTaggedValue,
  "prefixed-key": decodeTaggedValue,
};

/**
 * Parse a document produced in `style` back into keyed values.
 */
export function decodeDocument(
  text: string,
  style: FormatStyle
): Decoded<DecodedNode> {
  const root = parseRoot(text);
  if (!root.success) return root;
  return decodeEntries(root.data, "", decoders[style]);
}

/**
 * Parse a single `key: value` fragment as returned by `encode`.
 */
export function decodeEntry(
  fragment: string,
  style: FormatStyle
): Decoded<DecodedEntry> {
  const text = style === "flow-mapping" ? `{${fragment}}` : fragment;
  const decoded = decodeDocument(text, style);
  if (!decoded.success) return decoded;
  const [entry, ...rest] = decoded.data.entries;
  if (entry === undefined || rest.length > 0) {
    return err(structureError("", "expected exactly one entry"));
  }
  return ok(entry);
}

/**
 * Leaf values of a decoded document by dotted key path, in document order.
 * Empty nodes contribute nothing.
 */
export function flattenDecoded(
  node: DecodedNode,
  style: FormatStyle
): Map<string, DecodedValue> {
  const leaves = new Map<string, DecodedValue>();
  const visit = (current: DecodedNode, prefix: string[]): void => {
    for (const { key, value } of current.entries) {
      const path = style === "prefixed-key" ? [key] : [...prefix, key];
      if (value.kind === "node") {
        visit(value, path);
      } else {
        leaves.set(joinKeyPath(path), value);
      }
    }
  };
  visit(node, []);
  return leaves;
}
