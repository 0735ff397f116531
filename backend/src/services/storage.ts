/**
 * Audio Blob Storage
 *
 * Raw upload bytes on the local filesystem, one file per storage name,
 * all inside a single root directory.
 */

import fs from "fs";
import fsPromises from "fs/promises";
import path from "path";
import type { Readable } from "stream";
import { NotFoundError, StorageWriteError } from "../errors.js";
import type { BlobStorage, ByteRange } from "../types/index.js";

/**
 * True if `name` is a single path segment that cannot escape the root
 */
export function isSafeStorageName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !name.includes("/") &&
    !name.includes("\\") &&
    !name.includes("\0")
  );
}

export class FileSystemStorage implements BlobStorage {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  /**
   * Create the root directory if it does not exist
   */
  ensureRoot(): void {
    fs.mkdirSync(this.rootDir, { recursive: true });
  }

  getRoot(): string {
    return this.rootDir;
  }

  private resolve(storageName: string): string {
    if (!isSafeStorageName(storageName)) {
      throw new NotFoundError("File not found");
    }
    return path.join(this.rootDir, storageName);
  }

  /**
   * Write all bytes under `storageName` and return the byte count.
   * A failed write leaves no file behind.
   */
  async write(storageName: string, content: Buffer): Promise<number> {
    if (!isSafeStorageName(storageName)) {
      throw new StorageWriteError("Failed to save file: invalid storage name");
    }
    const filePath = path.join(this.rootDir, storageName);

    try {
      // "wx" so a name collision never overwrites another track's blob
      await fsPromises.writeFile(filePath, content, { flag: "wx" });
    } catch (error) {
      // Only remove what this call may have created
      if (!isErrorCode(error, "EEXIST")) {
        await fsPromises.unlink(filePath).catch(() => undefined);
      }
      throw new StorageWriteError("Failed to save file", { cause: error });
    }

    return content.length;
  }

  async exists(storageName: string): Promise<boolean> {
    if (!isSafeStorageName(storageName)) {
      return false;
    }
    try {
      const stat = await fsPromises.stat(path.join(this.rootDir, storageName));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async stat(storageName: string): Promise<{ size: number }> {
    const filePath = this.resolve(storageName);
    let stat: fs.Stats;
    try {
      stat = await fsPromises.stat(filePath);
    } catch {
      throw new NotFoundError("File not found");
    }
    if (!stat.isFile()) {
      throw new NotFoundError("File not found");
    }
    return { size: stat.size };
  }

  /**
   * Open a read stream over the whole blob, or over an inclusive byte range
   */
  async createReadStream(storageName: string, range?: ByteRange): Promise<Readable> {
    await this.stat(storageName);
    const filePath = this.resolve(storageName);
    return range
      ? fs.createReadStream(filePath, { start: range.start, end: range.end })
      : fs.createReadStream(filePath);
  }

  /**
   * Best-effort removal. Failures are logged, never thrown.
   */
  async delete(storageName: string): Promise<void> {
    if (!isSafeStorageName(storageName)) {
      console.warn(`Refusing to delete unsafe storage name: ${storageName}`);
      return;
    }
    try {
      await fsPromises.unlink(path.join(this.rootDir, storageName));
    } catch (error) {
      console.warn(`Failed to delete blob ${storageName}:`, error);
    }
  }
}

function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
