import {
  ExportConfiguration,
  type ExportConfigurationInput,
} from "@matgraph/core/configuration";
import { DocumentAssembler } from "./assemble/DocumentAssembler.js";
import type { ExportSummary } from "./assemble/summary.js";
import type { MaterialHost, MaterialLibrary } from "./host/MaterialHost.js";
import { ExportLog, type Logger } from "./log/ExportLog.js";
import { NodeVFS } from "./vfs/NodeVFS.js";
import type { VFS } from "./vfs/VFS.js";

export { DocumentAssembler } from "./assemble/DocumentAssembler.js";
export type { EncodedDocument } from "./assemble/EncodedDocument.js";
export {
  type ExportSummary,
  type ExportedMaterial,
  type FailedMaterial,
  formatSummary,
} from "./assemble/summary.js";
export { TypeClassifier, unknownValue } from "./classify/TypeClassifier.js";
export {
  decodeDocument,
  decodeEntry,
  flattenDecoded,
} from "./decode/decode.js";
export type {
  DecodeError,
  DecodedEntry,
  DecodedNode,
  DecodedValue,
} from "./decode/types.js";
export { encode, grammarFor } from "./encode/encode.js";
export type { FileExtension, Grammar } from "./encode/Grammar.js";
export { formatFiniteFloat } from "./encode/numbers.js";
export { UNPRINTABLE_SENTINEL } from "./encode/tags.js";
export { HostClass } from "./host/HostClass.js";
export type { MaterialHost, MaterialLibrary } from "./host/MaterialHost.js";
export {
  BitArray,
  Color,
  Matrix3,
  MemoryHost,
  MemoryLibrary,
  MemoryNode,
  type MemoryNodeKind,
  Point2,
  Point3,
  Point4,
  ReadFailure,
} from "./host/MemoryHost.js";
export {
  ExportLog,
  type ExportLogOptions,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./log/ExportLog.js";
export {
  type CoercionError,
  type ExportError,
  type IntrospectionError,
  type PropertyReadError,
  type WriteError,
  formatExportError,
} from "./model/errors.js";
export type {
  ClassifiedValue,
  PropertyEntry,
  ScalarValue,
  TruncationReason,
} from "./model/values.js";
export { floatValue } from "./model/values.js";
export { Reflector } from "./reflect/Reflector.js";
export { OutputSink } from "./sink/OutputSink.js";
export { MemoryVFS, type MemoryVFSOptions } from "./vfs/MemoryVFS.js";
export { NodeVFS } from "./vfs/NodeVFS.js";
export type { VFS, VFSError, WriteFileResult } from "./vfs/VFS.js";
export { GraphWalker } from "./walk/GraphWalker.js";
export {
  DEFAULT_MAX_DEPTH,
  type WalkOptions,
  type WalkReport,
} from "./walk/types.js";

export interface ExportMaterialLibraryOptions<TNode extends object> {
  host: MaterialHost<TNode>;
  library: MaterialLibrary<TNode>;
  /** Default: files on disk */
  vfs?: VFS;
  configuration?: ExportConfigurationInput;
  log?: Logger;
}

/**
 * Export every material of `library` with defaults filled in. Throws a
 * ZodError for an invalid configuration; everything after that is reported
 * through the log and the returned summary.
 */
export async function exportMaterialLibrary<TNode extends object>(
  options: ExportMaterialLibraryOptions<TNode>
): Promise<ExportSummary> {
  const configuration = ExportConfiguration.parse(options.configuration ?? {});
  const log = options.log ?? new ExportLog({ debug: configuration.debug });
  const assembler = new DocumentAssembler(
    options.host,
    options.vfs ?? new NodeVFS(),
    configuration,
    log
  );
  return assembler.exportLibrary(options.library);
}
