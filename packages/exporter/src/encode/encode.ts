import type { FormatStyle } from "@matgraph/core/configuration";
import type { KeyPath } from "@matgraph/core/key-path";
import type { ClassifiedValue } from "../model/values.js";
import { FlowMappingGrammar } from "./FlowMappingGrammar.js";
import type { Grammar } from "./Grammar.js";
import { PrefixedKeyGrammar } from "./PrefixedKeyGrammar.js";
import { TaggedScalarGrammar } from "./TaggedScalarGrammar.js";

const grammars: Record<FormatStyle, Grammar> = {
  "flow-mapping": new FlowMappingGrammar(),
  "tagged-scalar": new TaggedScalarGrammar(),
  "prefixed-key": new PrefixedKeyGrammar(),
};

export function grammarFor(style: FormatStyle): Grammar {
  return grammars[style];
}

/**
 * Render one property as a `key: value` fragment in the given style.
 */
export function encode(
  path: KeyPath,
  value: ClassifiedValue,
  style: FormatStyle
): string {
  return grammarFor(style).entry(path, value);
}
