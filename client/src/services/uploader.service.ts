import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { hashFile, readRange } from "../utils/checksum";
import {
  ChunkPayload,
  ChunkReply,
  ServerRejectedError,
  UploadTransport,
} from "./transport.service";

export interface UploaderOptions {
  chunkSize: number;
  maxRetries?: number;
  baseDelay?: number;
}

export interface UploadResult {
  uploadId: string;
  size: number;
  resumedFrom: number;
  chunksSent: number;
}

/**
 * Sends a local file to the server in sequential chunks, resuming from
 * whatever offset the server already holds.
 */
export class UploaderService {
  private chunkSize: number;
  private maxRetries: number;
  private baseDelay: number;

  constructor(
    private readonly transport: UploadTransport,
    options: UploaderOptions,
  ) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new Error(`Invalid chunk size: ${options.chunkSize}`);
    }
    this.chunkSize = options.chunkSize;
    this.maxRetries = options.maxRetries ?? 5;
    this.baseDelay = options.baseDelay ?? 1000; // 1 second
  }

  async uploadFile(filePath: string): Promise<UploadResult> {
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    const { size } = await fs.promises.stat(filePath);
    if (size === 0) {
      throw new Error(`Refusing to upload empty file: ${filePath}`);
    }

    const uploadId = await hashFile(filePath, "md5");
    const filename = path.basename(filePath);

    let offset = await this.transport.getOffset(uploadId);
    if (offset === size) {
      const status = await this.transport.getStatus(uploadId);
      if (status === "FAILED") {
        throw new Error(
          `Upload ${uploadId} failed checksum verification on the server`,
        );
      }
      if (status === "COMPLETE") {
        logger.info(`Server already holds all ${size} bytes of ${filename}`, {
          uploadId,
        });
        return { uploadId, size, resumedFrom: offset, chunksSent: 0 };
      }
      // all bytes arrived but were never verified; send them again
      offset = 0;
    }
    if (offset > size) {
      offset = 0;
    }

    const resumedFrom = offset;
    let chunksSent = 0;

    logger.info(`Uploading ${filename} (${size} bytes)`, {
      uploadId,
      resumedFrom,
    });

    while (offset < size) {
      const end = Math.min(offset + this.chunkSize, size) - 1;
      const bytes = await readRange(filePath, offset, end);

      const reply = await this.sendWithRetry({
        uploadId,
        filename,
        start: offset,
        end,
        total: size,
        bytes,
      });
      offset = reply.offset;
      chunksSent++;
    }

    logger.info(`Upload successful for ${filename}`, {
      uploadId,
      size,
      chunksSent,
    });
    return { uploadId, size, resumedFrom, chunksSent };
  }

  private async sendWithRetry(chunk: ChunkPayload): Promise<ChunkReply> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug(
          `Chunk ${chunk.start}-${chunk.end}/${chunk.total} attempt ${attempt}/${this.maxRetries}`,
        );
        return await this.transport.sendChunk(chunk);
      } catch (error) {
        if (error instanceof ServerRejectedError && !error.retryable) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(
          `Chunk attempt ${attempt} failed for ${chunk.uploadId}: ${lastError.message}`,
        );

        if (attempt < this.maxRetries) {
          const delay = this.baseDelay * Math.pow(2, attempt - 1); // Exponential backoff
          logger.info(`Retrying in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw new Error(
      `Chunk upload failed after ${this.maxRetries} attempts: ${lastError?.message}`,
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
