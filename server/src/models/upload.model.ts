export type UploadStatus = "IN_PROGRESS" | "COMPLETE" | "FAILED";

export interface UploadRecord {
  recordId: string;
  uploadId: string;
  owner: string;
  filename: string;
  offset: number;
  status: UploadStatus;
  blobRef: string;
  createdOn: string;
  completedOn?: string;
  attrs: Record<string, string>;
}

// Wire shape returned to clients, hence snake_case.
export interface UploadStatusView {
  upload_id: string;
  offset: number;
  expires: string;
}

export interface ChunkRequest<TContext = unknown> {
  owner: string;
  uploadId: string;
  filename: string;
  rangeStart: number;
  rangeEnd: number;
  totalSize: number;
  chunk: Buffer;
  checksum: string;
  context: TContext;
}

export type AssemblyResult =
  | { kind: "appended"; final: boolean }
  | { kind: "restart" };

export interface SweepOptions {
  dryRun: boolean;
  owner?: string;
}

export interface SweepResult {
  deleted: number;
  total: number;
}

export interface UploadCompleteEvent {
  event: "upload_complete";
  uploadId: string;
  owner: string;
  size: number;
  checksum: string;
  timestamp: string;
}

export interface UploadFailedEvent {
  event: "upload_failed";
  uploadId: string;
  owner: string;
  reason: string;
  timestamp: string;
}

export type UploadEvent = UploadCompleteEvent | UploadFailedEvent;
