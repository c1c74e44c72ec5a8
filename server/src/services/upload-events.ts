import { UploadEventPublisher } from "./broker.service";
import { UploadHooks } from "./upload.service";
import { Clock } from "../utils/clock";

/**
 * Hooks that announce finished uploads: `upload_complete` once the checksum
 * verifies, `upload_failed` when the record is saved as FAILED.
 */
export function createEventHooks<TContext>(
  publisher: UploadEventPublisher,
  clock: Clock,
): UploadHooks<TContext> {
  return {
    async postSave(record) {
      if (record.status !== "FAILED") return;
      await publisher.publish({
        event: "upload_failed",
        uploadId: record.uploadId,
        owner: record.owner,
        reason: "checksum mismatch",
        timestamp: clock.now().toISOString(),
      });
    },

    async onCompletion(record, view, request) {
      await publisher.publish({
        event: "upload_complete",
        uploadId: record.uploadId,
        owner: record.owner,
        size: record.offset,
        checksum: request.checksum.toLowerCase(),
        timestamp: clock.now().toISOString(),
      });
      return view;
    },
  };
}
