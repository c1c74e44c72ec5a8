import { SqliteUploadRepository } from "../src/services/db.service";
import {
  UploadHooks,
  UploadLifecycleService,
} from "../src/services/upload.service";
import { ChunkRequest } from "../src/models/upload.model";
import {
  BadRequestError,
  ChecksumMismatchError,
  GoneError,
  InvalidChunkError,
  InvalidStateError,
  OffsetMismatchError,
} from "../src/utils/errors";
import { InMemoryBlobStore } from "./helpers/memory-blob-store";
import { ManualClock } from "./helpers/manual-clock";
import { PAYLOAD, T0, md5 } from "./helpers/fixtures";

const CHECKSUM = md5(PAYLOAD);

function chunk(
  start: number,
  end: number,
  overrides: Partial<ChunkRequest<undefined>> = {},
): ChunkRequest<undefined> {
  return {
    owner: "alice",
    uploadId: CHECKSUM,
    filename: "data.bin",
    rangeStart: start,
    rangeEnd: end,
    totalSize: 10,
    chunk: PAYLOAD.subarray(start, end + 1),
    checksum: CHECKSUM,
    context: undefined,
    ...overrides,
  };
}

describe("UploadLifecycleService", () => {
  let repository: SqliteUploadRepository;
  let blobs: InMemoryBlobStore;
  let clock: ManualClock;

  function createService(hooks: UploadHooks<undefined> = {}) {
    return new UploadLifecycleService<undefined>(
      repository,
      blobs,
      clock,
      { expirationSeconds: 3600, checksumAlgorithm: "md5" },
      hooks,
    );
  }

  beforeEach(async () => {
    repository = new SqliteUploadRepository(":memory:");
    await repository.init();
    blobs = new InMemoryBlobStore();
    clock = new ManualClock(T0);
  });

  afterEach(async () => {
    await repository.close();
  });

  describe("handleChunk", () => {
    it("completes a two chunk upload with a matching checksum", async () => {
      const service = createService();

      const first = await service.handleChunk(chunk(0, 4));
      expect(first).toEqual({
        upload_id: CHECKSUM,
        offset: 5,
        expires: "2026-01-01T01:00:00.000Z",
      });

      clock.advance(10);
      const second = await service.handleChunk(chunk(5, 9));
      expect(second).toEqual({
        upload_id: CHECKSUM,
        offset: 10,
        expires: "2026-01-01T01:00:00.000Z",
      });

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record).toMatchObject({
        offset: 10,
        status: "COMPLETE",
        createdOn: T0,
        completedOn: "2026-01-01T00:00:10.000Z",
      });
      expect(blobs.contents(record?.blobRef ?? "")).toBe("0123456789");
    });

    it("marks the upload failed when the checksum does not match", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));

      const attempt = service.handleChunk(chunk(5, 9, { checksum: "0".repeat(32) }));
      await expect(attempt).rejects.toBeInstanceOf(ChecksumMismatchError);
      await expect(attempt).rejects.toThrow("md5 checksum does not match");

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record).toMatchObject({ offset: 10, status: "FAILED" });
      expect(record?.completedOn).toBeUndefined();
    });

    it("accepts an upper-case checksum", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 9, { checksum: CHECKSUM.toUpperCase() }));

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record?.status).toBe("COMPLETE");
    });

    it("rejects a mismatched offset and leaves the record alone", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));

      await expect(service.handleChunk(chunk(7, 9))).rejects.toBeInstanceOf(
        OffsetMismatchError,
      );

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record).toMatchObject({ offset: 5, status: "IN_PROGRESS" });
      expect(blobs.contents(record?.blobRef ?? "")).toBe("01234");
    });

    it("rejects a first chunk that does not start at zero", async () => {
      const service = createService();

      await expect(service.handleChunk(chunk(5, 9))).rejects.toMatchObject({
        expected: 0,
        got: 5,
      });
      expect(await repository.count()).toBe(0);
      expect(blobs.blobs.size).toBe(0);
    });

    it("replaces the record and blob when a chunk restarts at zero", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));
      const before = await repository.findByOwnerAndId("alice", CHECKSUM);

      const result = await service.handleChunk(chunk(0, 2));
      expect(result).toMatchObject({ offset: 3 });

      const after = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(after?.recordId).not.toBe(before?.recordId);
      expect(after?.offset).toBe(3);
      expect(blobs.blobs.has(before?.blobRef ?? "")).toBe(false);
      expect(blobs.contents(after?.blobRef ?? "")).toBe("012");
      expect(await repository.count()).toBe(1);
    });

    it("fails with Gone when an expired upload is continued", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));
      clock.advance(3601);

      await expect(service.handleChunk(chunk(5, 9))).rejects.toBeInstanceOf(
        GoneError,
      );
      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record?.offset).toBe(5);
    });

    it("fails with Gone when an expired upload is restarted at zero", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));
      const expired = await repository.findByOwnerAndId("alice", CHECKSUM);
      clock.advance(3601);

      await expect(service.handleChunk(chunk(0, 4))).rejects.toBeInstanceOf(
        GoneError,
      );
      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record).toEqual(expired);
      expect(blobs.contents(expired?.blobRef ?? "")).toBe("01234");
      expect(await repository.count()).toBe(1);
    });

    it("rejects a repeated final chunk without verifying the checksum again", async () => {
      const service = createService();
      const checksum = jest.spyOn(blobs, "checksum");
      await service.handleChunk(chunk(0, 4));
      await service.handleChunk(chunk(5, 9));
      expect(checksum).toHaveBeenCalledTimes(1);

      const attempt = service.handleChunk(chunk(5, 9));
      await expect(attempt).rejects.toBeInstanceOf(InvalidStateError);
      await expect(attempt).rejects.toThrow(
        'Upload has already been marked as "complete"',
      );
      expect(checksum).toHaveBeenCalledTimes(1);
    });

    it("does not restart a complete upload", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 9));

      await expect(service.handleChunk(chunk(0, 4))).rejects.toBeInstanceOf(
        InvalidStateError,
      );
      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record?.status).toBe("COMPLETE");
    });

    it("refuses chunks for a failed upload", async () => {
      const service = createService();
      await expect(
        service.handleChunk(chunk(0, 9, { checksum: "bad" })),
      ).rejects.toBeInstanceOf(ChecksumMismatchError);

      await expect(service.handleChunk(chunk(0, 9))).rejects.toThrow(
        'Upload has already been marked as "failed"',
      );
    });

    it("cleans up the blob of a new upload whose first chunk is rejected", async () => {
      const service = createService();

      await expect(
        service.handleChunk(chunk(0, 4, { chunk: Buffer.from("012") })),
      ).rejects.toBeInstanceOf(InvalidChunkError);
      expect(blobs.blobs.size).toBe(0);
      expect(await repository.count()).toBe(0);
    });

    it("keeps uploads of different owners apart", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));
      await service.handleChunk(chunk(0, 2, { owner: "bob" }));

      expect(await service.queryOffset("alice", CHECKSUM)).toBe(5);
      expect(await service.queryOffset("bob", CHECKSUM)).toBe(3);
    });
  });

  describe("hooks", () => {
    it("aborts before anything is written when validation fails", async () => {
      const service = createService({
        validate() {
          throw new BadRequestError("quota exceeded");
        },
      });

      await expect(service.handleChunk(chunk(0, 4))).rejects.toThrow(
        "quota exceeded",
      );
      expect(blobs.blobs.size).toBe(0);
      expect(await repository.count()).toBe(0);
    });

    it("stores extra attributes on new records", async () => {
      const service = createService({
        getExtraAttrs: () => ({ source: "camera" }),
      });
      await service.handleChunk(chunk(0, 4));

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record?.attrs).toEqual({ source: "camera" });
    });

    it("wraps every save with preSave and postSave", async () => {
      const calls: string[] = [];
      const service = createService({
        preSave: (record, request, isNew) => {
          calls.push(`pre:${record.status}:${isNew}`);
        },
        postSave: (record, request, isNew) => {
          calls.push(`post:${record.status}:${isNew}`);
        },
      });

      await service.handleChunk(chunk(0, 4));
      await service.handleChunk(chunk(5, 9));

      expect(calls).toEqual([
        "pre:IN_PROGRESS:true",
        "post:IN_PROGRESS:true",
        "pre:IN_PROGRESS:false",
        "post:IN_PROGRESS:false",
        "pre:COMPLETE:false",
        "post:COMPLETE:false",
      ]);
    });

    it("lets preSave change what gets persisted", async () => {
      const service = createService({
        preSave: (record) => {
          record.attrs = { ...record.attrs, savedAt: record.offset.toString() };
        },
      });
      await service.handleChunk(chunk(0, 4));

      const record = await repository.findByOwnerAndId("alice", CHECKSUM);
      expect(record?.attrs).toEqual({ savedAt: "5" });
    });

    it("uses custom response data and completion payloads", async () => {
      const service = createService({
        getResponseData: (record, view) => ({ progress: view.offset / 10 }),
        onCompletion: (record) => ({ done: true, id: record.uploadId }),
      });

      expect(await service.handleChunk(chunk(0, 4))).toEqual({ progress: 0.5 });
      expect(await service.handleChunk(chunk(5, 9))).toEqual({
        done: true,
        id: CHECKSUM,
      });
    });

    it("answers completion with the response data by default", async () => {
      const service = createService({
        getResponseData: () => ({ custom: true }),
      });

      expect(await service.handleChunk(chunk(0, 9))).toEqual({ custom: true });
    });
  });

  describe("queryOffset", () => {
    it("returns 0 for an unknown upload", async () => {
      const service = createService();
      expect(await service.queryOffset("alice", "unknown")).toBe(0);
    });

    it("returns the persisted offset", async () => {
      const service = createService();
      await service.handleChunk(chunk(0, 4));
      expect(await service.queryOffset("alice", CHECKSUM)).toBe(5);
      expect(await service.queryOffset("bob", CHECKSUM)).toBe(0);
    });
  });

  describe("sweepExpired", () => {
    async function seed(service: UploadLifecycleService<undefined>) {
      await service.handleChunk(chunk(0, 4, { uploadId: "old-alice" }));
      await service.handleChunk(chunk(0, 4, { uploadId: "old-bob", owner: "bob" }));
      clock.advance(7200);
      await service.handleChunk(chunk(0, 4, { uploadId: "fresh-alice" }));
    }

    it("only counts in dry-run mode", async () => {
      const service = createService();
      await seed(service);

      expect(await service.sweepExpired({ dryRun: true })).toEqual({
        deleted: 2,
        total: 3,
      });
      expect(await repository.count()).toBe(3);
      expect(blobs.blobs.size).toBe(3);
    });

    it("deletes the same records the dry run counted", async () => {
      const service = createService();
      await seed(service);
      const dryRun = await service.sweepExpired({ dryRun: true });

      const result = await service.sweepExpired({ dryRun: false });
      expect(result).toEqual(dryRun);
      expect(await repository.count()).toBe(1);
      expect(blobs.blobs.size).toBe(1);
      expect(await service.queryOffset("alice", "fresh-alice")).toBe(5);
      expect(await service.queryOffset("alice", "old-alice")).toBe(0);
    });

    it("can be scoped to one owner", async () => {
      const service = createService();
      await seed(service);

      expect(
        await service.sweepExpired({ dryRun: false, owner: "alice" }),
      ).toEqual({ deleted: 1, total: 2 });
      expect(await service.queryOffset("bob", "old-bob")).toBe(5);
    });

    it("skips records that vanish mid-sweep", async () => {
      const service = createService();
      await seed(service);
      const stale = await repository.listCreatedBefore("2026-01-01T01:00:00.000Z");
      await repository.delete(stale[0].recordId);
      jest.spyOn(repository, "listCreatedBefore").mockResolvedValueOnce(stale);

      expect(await service.sweepExpired({ dryRun: false })).toEqual({
        deleted: 1,
        total: 2,
      });
      expect(await repository.count()).toBe(1);
    });
  });
});
