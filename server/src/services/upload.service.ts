import { v4 as uuidv4 } from "uuid";
import { BlobStore } from "./storage.service";
import { UploadRepository } from "./db.service";
import { ChunkAssembler, expiresOn } from "./chunk-assembler.service";
import { Clock } from "../utils/clock";
import logger from "../utils/logger";
import {
  ChecksumMismatchError,
  InvalidStateError,
} from "../utils/errors";
import {
  AssemblyResult,
  ChunkRequest,
  SweepOptions,
  SweepResult,
  UploadRecord,
  UploadStatusView,
} from "../models/upload.model";

/**
 * Optional strategies that customize the upload flow. Every hook defaults to
 * doing nothing, or to answering with the status view.
 */
export interface UploadHooks<TContext = unknown> {
  /** Extra request validation. Throw to reject before anything is written. */
  validate?(request: ChunkRequest<TContext>): void | Promise<void>;
  /** Attributes stored on a record when it is first created. */
  getExtraAttrs?(
    request: ChunkRequest<TContext>,
  ): Record<string, string> | Promise<Record<string, string>>;
  preSave?(
    record: UploadRecord,
    request: ChunkRequest<TContext>,
    isNew: boolean,
  ): void | Promise<void>;
  postSave?(
    record: UploadRecord,
    request: ChunkRequest<TContext>,
    isNew: boolean,
  ): void | Promise<void>;
  /** Body returned while the upload is still in progress. */
  getResponseData?(
    record: UploadRecord,
    view: UploadStatusView,
    request: ChunkRequest<TContext>,
  ): object | Promise<object>;
  /** Body returned once the upload has been verified and completed. */
  onCompletion?(
    record: UploadRecord,
    view: UploadStatusView,
    request: ChunkRequest<TContext>,
  ): object | Promise<object>;
}

export interface UploadLifecycleOptions {
  expirationSeconds: number;
  checksumAlgorithm: string;
}

/**
 * Drives one chunk request from record lookup to completion, and owns the
 * offset query and the expiry sweep.
 */
export class UploadLifecycleService<TContext = unknown> {
  private readonly assembler: ChunkAssembler;

  constructor(
    private readonly repository: UploadRepository,
    private readonly blobs: BlobStore,
    private readonly clock: Clock,
    private readonly options: UploadLifecycleOptions,
    private readonly hooks: UploadHooks<TContext> = {},
  ) {
    this.assembler = new ChunkAssembler(blobs, clock, options);
  }

  async handleChunk(request: ChunkRequest<TContext>): Promise<object> {
    const { owner, uploadId, rangeStart, rangeEnd, totalSize } = request;

    const existing = await this.repository.findByOwnerAndId(owner, uploadId);

    if (this.hooks.validate) {
      await this.hooks.validate(request);
    }

    let record = existing ?? (await this.createRecord(request));
    let isNew = existing === null;

    let result = await this.appendChunk(record, isNew, request);
    if (result.kind === "restart") {
      await this.discard(record);
      record = await this.createRecord(request);
      isNew = true;
      result = await this.appendChunk(record, isNew, request);
    }
    if (result.kind !== "appended") {
      throw new Error(`Restart of upload ${uploadId} did not take effect`);
    }

    await this.save(record, request, isNew);

    if (!result.final) {
      return this.responseData(record, request);
    }

    if (record.status === "COMPLETE") {
      throw new InvalidStateError("complete");
    }

    const actual = await this.blobs.checksum(
      record.blobRef,
      this.options.checksumAlgorithm,
    );
    if (actual !== request.checksum.toLowerCase()) {
      record.status = "FAILED";
      await this.save(record, request, false);
      logger.warn(`Checksum mismatch for upload ${uploadId}`, {
        owner,
        size: totalSize,
        range: `${rangeStart}-${rangeEnd}`,
      });
      throw new ChecksumMismatchError(this.options.checksumAlgorithm);
    }

    record.status = "COMPLETE";
    record.completedOn = this.clock.now().toISOString();
    await this.save(record, request, false);

    logger.info(`Upload complete: ${uploadId}`, {
      owner,
      size: record.offset,
    });

    if (this.hooks.onCompletion) {
      return this.hooks.onCompletion(record, this.statusView(record), request);
    }
    return this.responseData(record, request);
  }

  /**
   * Bytes stored so far. An unknown upload reads as 0 so clients can probe
   * before their first chunk.
   */
  async queryOffset(owner: string, uploadId: string): Promise<number> {
    const record = await this.repository.findByOwnerAndId(owner, uploadId);
    return record ? record.offset : 0;
  }

  async listUploads(owner: string): Promise<UploadRecord[]> {
    return this.repository.listByOwner(owner);
  }

  async sweepExpired(options: SweepOptions): Promise<SweepResult> {
    const total = await this.repository.count(options.owner);
    const cutoff = new Date(
      this.clock.now().getTime() - this.options.expirationSeconds * 1000,
    ).toISOString();
    const expired = await this.repository.listCreatedBefore(
      cutoff,
      options.owner,
    );

    if (options.dryRun) {
      return { deleted: expired.length, total };
    }

    let deleted = 0;
    for (const record of expired) {
      const removed = await this.repository.delete(record.recordId);
      if (!removed) {
        logger.debug(`Upload record ${record.recordId} already removed`);
        continue;
      }
      await this.blobs.delete(record.blobRef);
      deleted++;
    }

    logger.info(`Expired uploads swept`, { deleted, total, cutoff });
    return { deleted, total };
  }

  statusView(record: UploadRecord): UploadStatusView {
    return {
      upload_id: record.uploadId,
      offset: record.offset,
      expires: expiresOn(record, this.options).toISOString(),
    };
  }

  private async createRecord(
    request: ChunkRequest<TContext>,
  ): Promise<UploadRecord> {
    const attrs = this.hooks.getExtraAttrs
      ? await this.hooks.getExtraAttrs(request)
      : {};
    const blobRef = await this.blobs.create(request.filename);

    return {
      recordId: uuidv4(),
      uploadId: request.uploadId,
      owner: request.owner,
      filename: request.filename,
      offset: 0,
      status: "IN_PROGRESS",
      blobRef,
      createdOn: this.clock.now().toISOString(),
      attrs,
    };
  }

  private async appendChunk(
    record: UploadRecord,
    isNew: boolean,
    request: ChunkRequest<TContext>,
  ): Promise<AssemblyResult> {
    try {
      return await this.assembler.append(
        record,
        request.rangeStart,
        request.rangeEnd,
        request.totalSize,
        request.chunk,
      );
    } catch (error) {
      if (isNew) {
        // never persisted, so nothing else references this blob
        await this.blobs.delete(record.blobRef);
      }
      throw error;
    }
  }

  private async discard(record: UploadRecord): Promise<void> {
    await this.repository.delete(record.recordId);
    await this.blobs.delete(record.blobRef);
    logger.info(`Discarded upload ${record.uploadId} for restart`, {
      owner: record.owner,
      offset: record.offset,
    });
  }

  private async save(
    record: UploadRecord,
    request: ChunkRequest<TContext>,
    isNew: boolean,
  ): Promise<void> {
    if (this.hooks.preSave) {
      await this.hooks.preSave(record, request, isNew);
    }
    if (isNew) {
      await this.repository.insert(record);
    } else {
      await this.repository.update(record);
    }
    if (this.hooks.postSave) {
      await this.hooks.postSave(record, request, isNew);
    }
  }

  private async responseData(
    record: UploadRecord,
    request: ChunkRequest<TContext>,
  ): Promise<object> {
    const view = this.statusView(record);
    if (this.hooks.getResponseData) {
      return this.hooks.getResponseData(record, view, request);
    }
    return view;
  }
}
