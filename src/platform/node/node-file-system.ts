import { access, rm } from "node:fs/promises";
import { constants } from "node:fs";
import { OutputDirectoryNotFoundError } from "../../core/errors/index.js";
import type { FileSystemPort } from "../../core/ports/file-system.port.js";

export class NodeFileSystem implements FileSystemPort {
  public async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async removeDirectory(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true });
    } catch (error) {
      if (isNotFound(error)) {
        throw new OutputDirectoryNotFoundError(path);
      }
      throw error;
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
