import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import { UploadRecord, UploadStatus } from "../models/upload.model";

/**
 * Persistent store for upload records. Owner scoping lives here, not in the
 * core.
 */
export interface UploadRepository {
  findByOwnerAndId(owner: string, uploadId: string): Promise<UploadRecord | null>;
  listByOwner(owner: string): Promise<UploadRecord[]>;
  /** Records created strictly before `cutoff`, optionally for one owner. */
  listCreatedBefore(cutoff: string, owner?: string): Promise<UploadRecord[]>;
  count(owner?: string): Promise<number>;
  insert(record: UploadRecord): Promise<void>;
  update(record: UploadRecord): Promise<void>;
  /** Resolves false when no record had that id. */
  delete(recordId: string): Promise<boolean>;
}

interface UploadRow {
  record_id: string;
  upload_id: string;
  owner: string;
  filename: string;
  byte_offset: number;
  status: UploadStatus;
  blob_ref: string;
  attrs: string;
  created_on: string;
  completed_on: string | null;
}

function toRecord(row: UploadRow): UploadRecord {
  return {
    recordId: row.record_id,
    uploadId: row.upload_id,
    owner: row.owner,
    filename: row.filename,
    offset: row.byte_offset,
    status: row.status,
    blobRef: row.blob_ref,
    attrs: JSON.parse(row.attrs),
    createdOn: row.created_on,
    completedOn: row.completed_on ?? undefined,
  };
}

export class SqliteUploadRepository implements UploadRepository {
  private db: sqlite3.Database;

  constructor(dbPath: string) {
    this.db = new (sqlite3.verbose().Database)(dbPath, (err) => {
      if (err) {
        logger.error("Could not connect to database", err);
      } else {
        logger.info(`Connected to database at ${dbPath}`);
      }
    });
  }

  async init(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS chunked_uploads (
        record_id TEXT PRIMARY KEY,
        upload_id TEXT NOT NULL,
        owner TEXT NOT NULL,
        filename TEXT NOT NULL,
        byte_offset BIGINT NOT NULL DEFAULT 0,
        status TEXT NOT NULL,
        blob_ref TEXT NOT NULL,
        attrs TEXT NOT NULL DEFAULT '{}',
        created_on TEXT NOT NULL,
        completed_on TEXT
      )
    `);
    await this.run(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_chunked_uploads_owner_upload
        ON chunked_uploads(owner, upload_id)
    `);
    await this.run(`
      CREATE INDEX IF NOT EXISTS idx_chunked_uploads_created
        ON chunked_uploads(created_on)
    `);
  }

  async findByOwnerAndId(
    owner: string,
    uploadId: string,
  ): Promise<UploadRecord | null> {
    const row = await this.get(
      "SELECT * FROM chunked_uploads WHERE owner = ? AND upload_id = ?",
      [owner, uploadId],
    );
    return row ? toRecord(row) : null;
  }

  async listByOwner(owner: string): Promise<UploadRecord[]> {
    const rows = await this.all(
      "SELECT * FROM chunked_uploads WHERE owner = ? ORDER BY created_on DESC",
      [owner],
    );
    return rows.map(toRecord);
  }

  async listCreatedBefore(
    cutoff: string,
    owner?: string,
  ): Promise<UploadRecord[]> {
    const rows =
      owner === undefined
        ? await this.all(
            "SELECT * FROM chunked_uploads WHERE created_on < ? ORDER BY created_on",
            [cutoff],
          )
        : await this.all(
            "SELECT * FROM chunked_uploads WHERE created_on < ? AND owner = ? ORDER BY created_on",
            [cutoff, owner],
          );
    return rows.map(toRecord);
  }

  async count(owner?: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const sql =
        owner === undefined
          ? "SELECT COUNT(*) AS total FROM chunked_uploads"
          : "SELECT COUNT(*) AS total FROM chunked_uploads WHERE owner = ?";
      const params = owner === undefined ? [] : [owner];
      this.db.get(sql, params, (err, row) => {
        if (err) reject(err);
        else resolve((row as { total: number }).total);
      });
    });
  }

  async insert(record: UploadRecord): Promise<void> {
    await this.run(
      `
        INSERT INTO chunked_uploads (
          record_id, upload_id, owner, filename, byte_offset,
          status, blob_ref, attrs, created_on, completed_on
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        record.recordId,
        record.uploadId,
        record.owner,
        record.filename,
        record.offset,
        record.status,
        record.blobRef,
        JSON.stringify(record.attrs),
        record.createdOn,
        record.completedOn ?? null,
      ],
    );
  }

  async update(record: UploadRecord): Promise<void> {
    const changes = await this.run(
      `
        UPDATE chunked_uploads
        SET byte_offset = ?, status = ?, attrs = ?, completed_on = ?
        WHERE record_id = ?
      `,
      [
        record.offset,
        record.status,
        JSON.stringify(record.attrs),
        record.completedOn ?? null,
        record.recordId,
      ],
    );
    if (changes === 0) {
      throw new Error(`Upload record ${record.recordId} no longer exists`);
    }
  }

  async delete(recordId: string): Promise<boolean> {
    const changes = await this.run(
      "DELETE FROM chunked_uploads WHERE record_id = ?",
      [recordId],
    );
    return changes > 0;
  }

  async close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private run(sql: string, params: unknown[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) reject(err);
        else resolve(this.changes);
      });
    });
  }

  private get(sql: string, params: unknown[]): Promise<UploadRow | null> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err, row) => {
        if (err) reject(err);
        else resolve((row as UploadRow) || null);
      });
    });
  }

  private all(sql: string, params: unknown[]): Promise<UploadRow[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) reject(err);
        else resolve((rows as UploadRow[]) || []);
      });
    });
  }
}
