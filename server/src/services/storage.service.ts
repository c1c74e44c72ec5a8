import fs from "fs";
import crypto from "crypto";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { sanitizeFilename } from "../utils/sanitizer";

/**
 * Append-only byte sink backing one upload. References are opaque to callers.
 */
export interface BlobStore {
  create(filename: string): Promise<string>;
  /**
   * Writes `bytes` starting at `offset` and drops anything the blob held
   * beyond that point.
   */
  append(ref: string, offset: number, bytes: Buffer): Promise<void>;
  checksum(ref: string, algorithm: string): Promise<string>;
  /** Resolves false when the blob was already gone. */
  delete(ref: string): Promise<boolean>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class DiskBlobStore implements BlobStore {
  private root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    logger.info(`DiskBlobStore initialized at ${this.root}`);
  }

  async ensureRoot(): Promise<void> {
    await fs.promises.mkdir(this.root, { recursive: true });
  }

  async create(filename: string): Promise<string> {
    const ref = `${uuidv4()}-${sanitizeFilename(filename)}.part`;
    await fs.promises.writeFile(this.resolve(ref), Buffer.alloc(0), {
      flag: "wx",
    });
    logger.debug(`Created blob ${ref}`);
    return ref;
  }

  async append(ref: string, offset: number, bytes: Buffer): Promise<void> {
    const handle = await fs.promises.open(this.resolve(ref), "r+");
    try {
      await handle.truncate(offset);
      let written = 0;
      while (written < bytes.length) {
        const { bytesWritten } = await handle.write(
          bytes,
          written,
          bytes.length - written,
          offset + written,
        );
        written += bytesWritten;
      }
    } finally {
      await handle.close();
    }
  }

  async checksum(ref: string, algorithm: string): Promise<string> {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(this.resolve(ref));

    return new Promise((resolve, reject) => {
      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => resolve(hash.digest("hex")));
    });
  }

  async delete(ref: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.resolve(ref));
      logger.debug(`Deleted blob ${ref}`);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      logger.error(`Error deleting blob ${ref}:`, error);
      throw error;
    }
  }

  private resolve(ref: string): string {
    // refs are generated by create(); anything with a separator is foreign
    if (path.basename(ref) !== ref) {
      throw new Error(`Invalid blob reference: ${ref}`);
    }
    return path.join(this.root, ref);
  }
}
