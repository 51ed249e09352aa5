import type { FormatStyle } from "@matgraph/core/configuration";
import { type KeyPath, lastSegment } from "@matgraph/core/key-path";
import { isDottedIdentifier, isValidIdentifier } from "@matgraph/core/naming";
import type { ClassifiedValue, TruncationReason } from "../model/values.js";
import type { FileExtension, Grammar } from "./Grammar.js";
import {
  YAML_SPECIAL_FLOATS,
  formatComponents,
  formatFloat,
  formatInteger,
} from "./numbers.js";
import { doubleQuote } from "./quote.js";
import { YamlTag, unknownText } from "./tags.js";

// Plain scalars YAML would read as something other than a string.
const YAML_RESERVED_WORD = /^(?:true|false|null|yes|no|on|off|y|n)$/i;

// YAML reads at most 1024 characters of an implicit key.
const IMPLICIT_KEY_LIMIT = 1024;

/**
 * YAML block mappings keyed by property name. Ints, floats and booleans are
 * bare; every type YAML has no native scalar for carries a local tag.
 *
 * @example
 * diffuse: !color [200.0, 64.0, 32.0, 255.0]
 * glossiness: 10
 * texmap_diffuse:
 *   coords:
 *     blur: 0.5
 */
export class TaggedScalarGrammar implements Grammar {
  readonly style: FormatStyle = "tagged-scalar";
  readonly extension: FileExtension = ".yaml";
  readonly separator = "";

  documentOpen(): string | undefined {
    return undefined;
  }

  documentClose(): string | undefined {
    return undefined;
  }

  emptyDocument(): string {
    return "{}";
  }

  entry(path: KeyPath, value: ClassifiedValue): string {
    return this.pair(path, this.literal(value));
  }

  nodeOpen(path: KeyPath): string {
    return this.pair(path, undefined);
  }

  nodeClose(): string | undefined {
    return undefined;
  }

  emptyNode(path: KeyPath): string {
    return this.pair(path, "{}");
  }

  truncated(path: KeyPath, reason: TruncationReason): string {
    return this.pair(path, `${YamlTag.truncated} ${reason}`);
  }

  literal(value: ClassifiedValue): string {
    switch (value.kind) {
      case "int":
        return formatInteger(value.value);
      case "float":
        return formatFloat(value, YAML_SPECIAL_FLOATS);
      case "bool":
        return value.value ? "true" : "false";
      case "string":
        return this.quote(value.value);
      case "symbol": {
        const name = isValidIdentifier(value.name)
          ? value.name
          : this.quote(value.name);
        return `${YamlTag.name} ${name}`;
      }
      case "color":
        return `${YamlTag.color} ${formatComponents(value.channels, YAML_SPECIAL_FLOATS)}`;
      case "point2":
      case "point3":
      case "point4":
        return `${YamlTag[value.kind]} ${formatComponents(value.components, YAML_SPECIAL_FLOATS)}`;
      case "matrix3": {
        const rows = value.rows.map((row) =>
          formatComponents(row, YAML_SPECIAL_FLOATS)
        );
        return `${YamlTag.matrix3} [${rows.join(", ")}]`;
      }
      case "bitset":
        return `${YamlTag.bitarray} [${value.bits.map(formatInteger).join(", ")}]`;
      case "sequence":
        return `[${value.items.map((item) => this.literal(item)).join(", ")}]`;
      case "reference":
        return `${YamlTag.truncated} reference`;
      case "unknown":
        return `${YamlTag.unknown} ${this.quote(unknownText(value))}`;
    }
  }

  /** Key text before quoting. */
  protected keyText(path: KeyPath): string {
    return lastSegment(path);
  }

  protected quote(text: string): string {
    return doubleQuote(text);
  }

  /**
   * `key: value`, or `key:` before a nested block. Keys too long to be
   * implicit are written as explicit `? key` lines.
   */
  private pair(path: KeyPath, value: string | undefined): string {
    const key = this.key(path);
    const head = key.length < IMPLICIT_KEY_LIMIT ? key : `? ${key}\n`;
    return value === undefined ? `${head}:` : `${head}: ${value}`;
  }

  private key(path: KeyPath): string {
    const text = this.keyText(path);
    if (isDottedIdentifier(text) && !YAML_RESERVED_WORD.test(text)) {
      return text;
    }
    return this.quote(text);
  }
}
