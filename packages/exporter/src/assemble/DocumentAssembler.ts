import * as path from "node:path";
import picomatch from "picomatch";
import type { ExportConfiguration } from "@matgraph/core/configuration";
import { digestText } from "@matgraph/core/hash";
import { type KeyPath, joinKeyPath } from "@matgraph/core/key-path";
import { MAX_NAME_LENGTH, sanitize } from "@matgraph/core/naming";
import { describeThrown, err, tryCatch } from "@matgraph/core/result";
import { grammarFor } from "../encode/encode.js";
import type { Grammar } from "../encode/Grammar.js";
import type { MaterialHost, MaterialLibrary } from "../host/MaterialHost.js";
import type { Logger } from "../log/ExportLog.js";
import { type WriteError, formatExportError } from "../model/errors.js";
import { Reflector } from "../reflect/Reflector.js";
import { OutputSink } from "../sink/OutputSink.js";
import type { VFS, VFSError, WriteFileResult } from "../vfs/VFS.js";
import { GraphWalker } from "../walk/GraphWalker.js";
import type { EncodedDocument } from "./EncodedDocument.js";
import { type ExportSummary, formatSummary } from "./summary.js";

const createExclusion = (
  patterns: readonly string[]
): ((path: KeyPath) => boolean) => {
  if (patterns.length === 0) return () => false;
  const isMatch = picomatch([...patterns]);
  return (keyPath) => isMatch(joinKeyPath(keyPath));
};

/**
 * Pick a file name stem not yet used in this batch: "Brick", "Brick_2", ...
 * Suffixed stems stay within the sanitized length limit.
 */
const claimStem = (base: string, taken: Set<string>): string => {
  let stem = base;
  for (let n = 2; taken.has(stem); n++) {
    const suffix = `_${n}`;
    stem = base.slice(0, MAX_NAME_LENGTH - suffix.length) + suffix;
  }
  taken.add(stem);
  return stem;
};

/**
 * Turns a material library into one encoded document per material and
 * writes each through the VFS.
 */
export class DocumentAssembler<TNode extends object> {
  private readonly reflector: Reflector<TNode>;
  private readonly grammar: Grammar;
  private readonly isExcluded: (path: KeyPath) => boolean;

  constructor(
    host: MaterialHost<TNode>,
    private readonly vfs: VFS,
    private readonly configuration: ExportConfiguration,
    private readonly log: Logger
  ) {
    this.reflector = new Reflector(host);
    this.grammar = grammarFor(configuration.style);
    this.isExcluded = createExclusion(configuration.excludeProperties);
  }

  /**
   * Encode one material. Never throws: host failures end up in the log and
   * in the document's report. `stem` overrides the sanitized material name
   * as the file name stem.
   */
  assemble(material: TNode, stem?: string): EncodedDocument {
    const materialName = this.reflector.nodeName(material);
    const sink = new OutputSink();
    const walker = new GraphWalker(this.reflector, this.grammar, this.log, {
      maxDepth: this.configuration.maxDepth,
      isExcluded: this.isExcluded,
    });
    const report = walker.walk(material, sink);
    const text = sink.toString();

    return Object.freeze({
      materialName,
      fileName: (stem ?? sanitize(materialName)) + this.grammar.extension,
      style: this.grammar.style,
      text,
      digest: digestText(text),
      report: Object.freeze(report),
    });
  }

  async exportLibrary(library: MaterialLibrary<TNode>): Promise<ExportSummary> {
    const summary: ExportSummary = {
      library: library.name,
      style: this.grammar.style,
      succeeded: [],
      failed: [],
    };

    const materials = tryCatch(() => [...library.materials()], describeThrown);
    if (!materials.success) {
      this.log.error(
        `Cannot list materials of "${library.name}": ${materials.error}`
      );
      this.log.info(formatSummary(summary));
      return summary;
    }

    const total = materials.data.length;
    this.log.info(
      `Exporting ${total} materials from "${library.name}" as ${this.grammar.style}`
    );

    const taken = new Set<string>();
    for (const [index, material] of materials.data.entries()) {
      const stem = claimStem(sanitize(this.reflector.nodeName(material)), taken);
      const document = this.assemble(material, stem);
      const filePath = path.join(
        this.configuration.outputDirectory,
        document.fileName
      );

      const written = await this.write(filePath, document.text);
      if (written.success) {
        this.log.info(`[${index + 1}/${total}] ${filePath}`);
        summary.succeeded.push({
          materialName: document.materialName,
          path: filePath,
          digest: document.digest,
          report: document.report,
        });
      } else {
        const error: WriteError = {
          type: "write",
          path: filePath,
          cause: written.error,
        };
        this.log.error(`[${index + 1}/${total}] ${formatExportError(error)}`);
        summary.failed.push({
          materialName: document.materialName,
          path: filePath,
          error,
        });
      }
    }

    this.log.info(formatSummary(summary));
    return summary;
  }

  private async write(filePath: string, content: string): Promise<WriteFileResult> {
    try {
      return await this.vfs.writeFile(filePath, content);
    } catch (thrown) {
      const error: VFSError = {
        type: "unknown",
        path: filePath,
        message: describeThrown(thrown),
      };
      return err(error);
    }
  }
}
