import type { Result } from "@matgraph/core/result";

export type VFSError =
  | { type: "notFound"; path: string }
  | { type: "permissionDenied"; path: string }
  | { type: "unknown"; path: string; message: string };

export type ReadFileResult = Result<string, VFSError>;

export type WriteFileResult = Result<void, VFSError>;

/**
 * File access used by the exporter. Implementations report failures through
 * the returned Result and do not reject.
 */
export interface VFS {
  readFile(path: string): Promise<ReadFileResult>;
  writeFile(path: string, content: string): Promise<WriteFileResult>;
}
