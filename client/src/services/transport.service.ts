import axios, { AxiosInstance } from "axios";

export interface ChunkPayload {
  uploadId: string;
  filename: string;
  start: number;
  end: number;
  total: number;
  bytes: Buffer;
}

export interface ChunkReply {
  offset: number;
}

export type RemoteUploadStatus = "IN_PROGRESS" | "COMPLETE" | "FAILED";

interface UploadListReply {
  uploads: { upload_id: string; status: RemoteUploadStatus }[];
}

/**
 * How the uploader talks to the server. Kept narrow so tests can drive the
 * uploader without HTTP.
 */
export interface UploadTransport {
  getOffset(uploadId: string): Promise<number>;
  /** Null when the server holds no record of the upload. */
  getStatus(uploadId: string): Promise<RemoteUploadStatus | null>;
  sendChunk(chunk: ChunkPayload): Promise<ChunkReply>;
}

/**
 * The server answered with an error status. `status` is the HTTP code.
 */
export class ServerRejectedError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ServerRejectedError";
    this.status = status;
    Object.setPrototypeOf(this, ServerRejectedError.prototype);
  }

  get retryable(): boolean {
    return this.status >= 500 || this.status === 429;
  }
}

export interface HttpTransportOptions {
  serverUrl: string;
  apiKey: string;
  fileFieldName?: string;
  idFieldName?: string;
  timeoutMs?: number;
}

function toServerError(error: unknown): unknown {
  if (axios.isAxiosError(error) && error.response) {
    const data: unknown = error.response.data;
    const message =
      typeof data === "object" &&
      data !== null &&
      "error" in data &&
      typeof data.error === "string"
        ? data.error
        : error.message;
    return new ServerRejectedError(error.response.status, message);
  }
  return error;
}

export class HttpUploadTransport implements UploadTransport {
  private http: AxiosInstance;
  private fileFieldName: string;
  private idFieldName: string;

  constructor(options: HttpTransportOptions) {
    this.http = axios.create({
      baseURL: options.serverUrl,
      timeout: options.timeoutMs ?? 60000,
      headers: { Authorization: `Bearer ${options.apiKey}` },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
    this.fileFieldName = options.fileFieldName ?? "file";
    this.idFieldName = options.idFieldName ?? "md5";
  }

  async getOffset(uploadId: string): Promise<number> {
    try {
      const { data } = await this.http.get<ChunkReply>(
        `/uploads/${encodeURIComponent(uploadId)}`,
      );
      return data.offset;
    } catch (error) {
      throw toServerError(error);
    }
  }

  async getStatus(uploadId: string): Promise<RemoteUploadStatus | null> {
    try {
      const { data } = await this.http.get<UploadListReply>("/uploads");
      const entry = data.uploads.find((upload) => upload.upload_id === uploadId);
      return entry ? entry.status : null;
    } catch (error) {
      throw toServerError(error);
    }
  }

  async sendChunk(chunk: ChunkPayload): Promise<ChunkReply> {
    const form = new FormData();
    form.append(this.idFieldName, chunk.uploadId);
    form.append(this.fileFieldName, new Blob([chunk.bytes]), chunk.filename);

    try {
      const { data } = await this.http.post<ChunkReply>("/uploads", form, {
        headers: {
          "Content-Range": `bytes ${chunk.start}-${chunk.end}/${chunk.total}`,
        },
      });
      return data;
    } catch (error) {
      throw toServerError(error);
    }
  }
}
