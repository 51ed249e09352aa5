import type { FormatStyle } from "@matgraph/core/configuration";
import { type KeyPath, lastSegment } from "@matgraph/core/key-path";
import type { ClassifiedValue, TruncationReason } from "../model/values.js";
import type { FileExtension, Grammar } from "./Grammar.js";
import {
  JSON_SPECIAL_FLOATS,
  formatComponents,
  formatFloat,
  formatInteger,
} from "./numbers.js";
import { doubleQuote } from "./quote.js";
import { FlowType, unknownText } from "./tags.js";

const typed = (type: FlowType, payload: string): string =>
  `{"type": "${type}", "value": ${payload}}`;

/**
 * JSON objects keyed by property name, every value wrapped as
 * `{"type": ..., "value": ...}`.
 */
export class FlowMappingGrammar implements Grammar {
  readonly style: FormatStyle = "flow-mapping";
  readonly extension: FileExtension = ".json";
  readonly separator = ",";

  documentOpen(): string {
    return "{";
  }

  documentClose(): string {
    return "}";
  }

  emptyDocument(): string {
    return "{}";
  }

  entry(path: KeyPath, value: ClassifiedValue): string {
    return `${this.key(path)}: ${this.literal(value)}`;
  }

  nodeOpen(path: KeyPath): string {
    return `${this.key(path)}: {`;
  }

  nodeClose(): string {
    return "}";
  }

  emptyNode(path: KeyPath): string {
    return `${this.key(path)}: {}`;
  }

  truncated(path: KeyPath, reason: TruncationReason): string {
    return `${this.key(path)}: ${typed(FlowType.truncated, doubleQuote(reason))}`;
  }

  literal(value: ClassifiedValue): string {
    switch (value.kind) {
      case "int":
        return typed(FlowType.int, formatInteger(value.value));
      case "float":
        return typed(FlowType.float, formatFloat(value, JSON_SPECIAL_FLOATS));
      case "bool":
        return typed(FlowType.bool, value.value ? "true" : "false");
      case "string":
        return typed(FlowType.string, doubleQuote(value.value));
      case "symbol":
        return typed(FlowType.symbol, doubleQuote(value.name));
      case "color":
        return typed(
          FlowType.color,
          formatComponents(value.channels, JSON_SPECIAL_FLOATS)
        );
      case "point2":
      case "point3":
      case "point4":
        return typed(
          FlowType[value.kind],
          formatComponents(value.components, JSON_SPECIAL_FLOATS)
        );
      case "matrix3": {
        const rows = value.rows.map((row) =>
          formatComponents(row, JSON_SPECIAL_FLOATS)
        );
        return typed(FlowType.matrix3, `[${rows.join(", ")}]`);
      }
      case "bitset":
        return typed(
          FlowType.bitset,
          `[${value.bits.map(formatInteger).join(", ")}]`
        );
      case "sequence": {
        const items = value.items.map((item) => this.literal(item));
        return typed(FlowType.sequence, `[${items.join(", ")}]`);
      }
      case "reference":
        return typed(FlowType.truncated, doubleQuote("reference"));
      case "unknown":
        return typed(FlowType.unknown, doubleQuote(unknownText(value)));
    }
  }

  private key(path: KeyPath): string {
    return doubleQuote(lastSegment(path));
  }
}
