import type { FormatStyle } from "@matgraph/core/configuration";
import type { WalkReport } from "../walk/types.js";

/**
 * Finished text of one top-level material. Frozen once assembled.
 */
export interface EncodedDocument {
  readonly materialName: string;
  readonly fileName: string;
  readonly style: FormatStyle;
  readonly text: string;
  /** md5 of `text`. */
  readonly digest: string;
  readonly report: Readonly<WalkReport>;
}
