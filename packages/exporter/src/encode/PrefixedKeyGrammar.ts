import type { FormatStyle } from "@matgraph/core/configuration";
import { type KeyPath, joinKeyPath } from "@matgraph/core/key-path";
import { singleQuote } from "./quote.js";
import { TaggedScalarGrammar } from "./TaggedScalarGrammar.js";

/**
 * Tagged-scalar values under keys that spell the whole path from the
 * material, so any line can be located without reading its parents.
 *
 * @example
 * texmap_diffuse:
 *   texmap_diffuse.coords:
 *     texmap_diffuse.coords.blur: 0.5
 *   texmap_diffuse.filename: 'C:\maps\brick.png'
 */
export class PrefixedKeyGrammar extends TaggedScalarGrammar {
  override readonly style: FormatStyle = "prefixed-key";

  protected override keyText(path: KeyPath): string {
    return joinKeyPath(path);
  }

  protected override quote(text: string): string {
    return singleQuote(text);
  }
}
