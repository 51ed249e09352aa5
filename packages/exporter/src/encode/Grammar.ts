import type { FormatStyle } from "@matgraph/core/configuration";
import type { KeyPath } from "@matgraph/core/key-path";
import type { ClassifiedValue, TruncationReason } from "../model/values.js";

export type FileExtension = ".json" | ".yaml";

/**
 * Textual grammar of one output style. Methods return text without
 * indentation, usually a single line; the walker decides where it goes.
 */
export interface Grammar {
  readonly style: FormatStyle;
  readonly extension: FileExtension;
  /** Appended to every entry that is followed by a sibling. */
  readonly separator: string;

  /** Line opening a non-empty document, if the grammar has one. */
  documentOpen(): string | undefined;
  documentClose(): string | undefined;
  emptyDocument(): string;

  /** Complete `key: value` entry for a value that is not expanded. */
  entry(path: KeyPath, value: ClassifiedValue): string;
  /** Literal for a value, without its key. */
  literal(value: ClassifiedValue): string;

  nodeOpen(path: KeyPath): string;
  nodeClose(): string | undefined;
  emptyNode(path: KeyPath): string;

  truncated(path: KeyPath, reason: TruncationReason): string;
}
