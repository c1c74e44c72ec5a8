import { BlobStore } from "./storage.service";
import { Clock } from "../utils/clock";
import logger from "../utils/logger";
import {
  GoneError,
  InvalidChunkError,
  InvalidStateError,
  OffsetMismatchError,
} from "../utils/errors";
import { AssemblyResult, UploadRecord } from "../models/upload.model";

export interface ExpiryPolicy {
  expirationSeconds: number;
}

export function expiresOn(record: UploadRecord, policy: ExpiryPolicy): Date {
  return new Date(
    new Date(record.createdOn).getTime() + policy.expirationSeconds * 1000,
  );
}

export function isExpired(
  record: UploadRecord,
  policy: ExpiryPolicy,
  now: Date,
): boolean {
  return now.getTime() > expiresOn(record, policy).getTime();
}

/**
 * Validates a chunk against the record it targets and appends it to the
 * record's blob. Only exact-offset continuation or a restart at byte 0 is
 * accepted. The assembler never finalizes an upload; it reports whether the
 * chunk was the last one and leaves completion to the caller.
 */
export class ChunkAssembler {
  constructor(
    private readonly blobs: BlobStore,
    private readonly clock: Clock,
    private readonly policy: ExpiryPolicy,
  ) {}

  async append(
    record: UploadRecord,
    rangeStart: number,
    rangeEnd: number,
    totalSize: number,
    chunk: Buffer,
  ): Promise<AssemblyResult> {
    this.assertWritable(record);

    if (rangeStart !== record.offset) {
      if (rangeStart === 0) {
        logger.info(`Restart requested for upload ${record.uploadId}`, {
          owner: record.owner,
          previousOffset: record.offset,
        });
        return { kind: "restart" };
      }
      throw new OffsetMismatchError(record.offset, rangeStart);
    }

    const expectedLength = rangeEnd - rangeStart + 1;
    if (chunk.length !== expectedLength) {
      throw new InvalidChunkError(expectedLength, chunk.length);
    }

    await this.blobs.append(record.blobRef, record.offset, chunk);
    record.offset += chunk.length;

    logger.debug(`Appended chunk to upload ${record.uploadId}`, {
      range: `${rangeStart}-${rangeEnd}/${totalSize}`,
      offset: record.offset,
    });

    return { kind: "appended", final: rangeEnd + 1 === totalSize };
  }

  assertWritable(record: UploadRecord): void {
    if (isExpired(record, this.policy, this.clock.now())) {
      throw new GoneError();
    }
    if (record.status === "COMPLETE") {
      throw new InvalidStateError("complete");
    }
    if (record.status === "FAILED") {
      throw new InvalidStateError("failed");
    }
  }
}
