import picomatch from "picomatch";
import { ok, err } from "@matgraph/core/result";
import type { VFS, ReadFileResult, WriteFileResult } from "./VFS.js";

export interface MemoryVFSOptions {
  /** Globs of paths whose writes fail with permissionDenied. */
  deny?: string[];
}

export class MemoryVFS implements VFS {
  private files: Map<string, string>;
  private isDenied: (path: string) => boolean;

  constructor(
    files: Record<string, string> | Map<string, string> = {},
    options: MemoryVFSOptions = {}
  ) {
    this.files = files instanceof Map ? files : new Map(Object.entries(files));
    this.isDenied =
      options.deny && options.deny.length > 0
        ? picomatch(options.deny)
        : () => false;
  }

  async readFile(path: string): Promise<ReadFileResult> {
    const content = this.files.get(path);
    if (content === undefined) {
      return err({ type: "notFound", path });
    }
    return ok(content);
  }

  async writeFile(path: string, content: string): Promise<WriteFileResult> {
    if (this.isDenied(path)) {
      return err({ type: "permissionDenied", path });
    }
    this.files.set(path, content);
    return ok(undefined);
  }

  /** Paths written so far, in write order. */
  paths(): string[] {
    return [...this.files.keys()];
  }
}
