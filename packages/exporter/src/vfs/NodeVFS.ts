import * as fs from "node:fs/promises";
import { ok, err } from "@matgraph/core/result";
import type { VFS, VFSError, ReadFileResult, WriteFileResult } from "./VFS.js";

export class NodeVFS implements VFS {
  async readFile(filePath: string): Promise<ReadFileResult> {
    try {
      const content = await fs.readFile(filePath, "utf-8");
      return ok(content);
    } catch (error) {
      return err(this.mapError(filePath, error));
    }
  }

  async writeFile(filePath: string, content: string): Promise<WriteFileResult> {
    try {
      await fs.writeFile(filePath, content, "utf-8");
      return ok(undefined);
    } catch (error) {
      return err(this.mapError(filePath, error));
    }
  }

  private mapError(filePath: string, error: unknown): VFSError {
    if (error instanceof Error && "code" in error) {
      const code = error.code;
      if (code === "ENOENT") {
        return { type: "notFound", path: filePath };
      }
      if (code === "EACCES" || code === "EPERM") {
        return { type: "permissionDenied", path: filePath };
      }
    }
    const message = error instanceof Error ? error.message : String(error);
    return { type: "unknown", path: filePath, message };
  }
}
