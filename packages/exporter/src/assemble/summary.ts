import type { FormatStyle } from "@matgraph/core/configuration";
import type { WriteError } from "../model/errors.js";
import type { WalkReport } from "../walk/types.js";

export interface ExportedMaterial {
  materialName: string;
  path: string;
  digest: string;
  report: Readonly<WalkReport>;
}

export interface FailedMaterial {
  materialName: string;
  path: string;
  error: WriteError;
}

export interface ExportSummary {
  library: string;
  style: FormatStyle;
  succeeded: ExportedMaterial[];
  failed: FailedMaterial[];
}

const issueCount = (report: Readonly<WalkReport>): number =>
  report.readFailures +
  report.introspectionFailures +
  report.coercionFailures +
  report.depthLimited;

/**
 * @example
 * formatSummary(summary)
 * // 'Exported 1 of 2 materials from "Bricks" (1 failed, 3 issues)'
 */
export function formatSummary(summary: ExportSummary): string {
  const total = summary.succeeded.length + summary.failed.length;
  const issues = summary.succeeded.reduce(
    (sum, material) => sum + issueCount(material.report),
    0
  );
  return (
    `Exported ${summary.succeeded.length} of ${total} materials ` +
    `from "${summary.library}" ` +
    `(${summary.failed.length} failed, ${issues} ${issues === 1 ? "issue" : "issues"})`
  );
}
