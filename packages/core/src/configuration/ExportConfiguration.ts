import { z } from "zod";
import { type Result, ok, err } from "../result/result.js";

export const DEFAULT_MAX_DEPTH = 20;

export const FormatStyle = z.enum(["flow-mapping", "tagged-scalar", "prefixed-key"]);

export type FormatStyle = z.infer<typeof FormatStyle>;

export const ExportConfiguration = z.object({
  style: FormatStyle.describe(
    `Output grammar: "flow-mapping" (JSON), "tagged-scalar" (YAML) or "prefixed-key" (YAML with dotted keys)`
  ).default("prefixed-key"),
  maxDepth: z
    .number()
    .int()
    .nonnegative()
    .describe(`Number of nested node references followed before a branch is cut`)
    .default(DEFAULT_MAX_DEPTH),
  outputDirectory: z
    .string()
    .describe(`Directory that receives one file per exported material`)
    .default("."),
  excludeProperties: z
    .array(z.string())
    .describe(
      `picomatch (https://www.npmjs.com/package/picomatch) globs matched against dotted key paths; matching properties are not read`
    )
    .default([]),
  debug: z
    .boolean()
    .describe(`Log every visited node`)
    .default(false),
});

export type ExportConfiguration = z.infer<typeof ExportConfiguration>;

export type ExportConfigurationInput = z.input<typeof ExportConfiguration>;

export function parseExportConfiguration(
  input: unknown
): Result<ExportConfiguration, string> {
  const parsed = ExportConfiguration.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const message = parsed.error.issues
    .map((issue) => {
      const where = issue.path.map(String).join(".");
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
  return err(message);
}
