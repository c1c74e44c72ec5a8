import { Request, Response, NextFunction } from "express";
import Joi from "joi";
import { UploadLifecycleService } from "../services/upload.service";
import { getOwner } from "../middleware/auth.middleware";
import { BadRequestError } from "../utils/errors";
import {
  DEFAULT_CONTENT_RANGE_PATTERN,
  parseContentRange,
} from "../utils/content-range";

export interface UploadControllerOptions {
  idFieldName: string;
  contentRangePattern?: RegExp;
}

const uploadIdSchema = Joi.string()
  .pattern(/^[a-zA-Z0-9_-]+$/)
  .max(128)
  .required();

function validateUploadId(value: unknown, field: string): string {
  const { error, value: uploadId } = uploadIdSchema.validate(value);
  if (error) {
    throw new BadRequestError(`Invalid ${field} format: ${error.message}`);
  }
  return uploadId;
}

export function createUploadController(
  service: UploadLifecycleService<Request>,
  options: UploadControllerOptions,
) {
  const { idFieldName } = options;
  const pattern = options.contentRangePattern ?? DEFAULT_CONTENT_RANGE_PATTERN;

  async function uploadChunk(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const chunk = req.file;
      if (!chunk) {
        throw new BadRequestError("No chunk file was submitted");
      }

      const body: Record<string, unknown> = req.body ?? {};
      if (body[idFieldName] === undefined) {
        throw new BadRequestError(`No ${idFieldName} was submitted`);
      }
      const uploadId = validateUploadId(body[idFieldName], idFieldName);

      const range = parseContentRange(req.header("content-range"), pattern);

      const result = await service.handleChunk({
        owner: getOwner(res),
        uploadId,
        filename: chunk.originalname,
        rangeStart: range.start,
        rangeEnd: range.end,
        totalSize: range.total,
        chunk: chunk.buffer,
        checksum: uploadId,
        context: req,
      });

      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  }

  async function getOffset(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const uploadId = validateUploadId(req.params.uploadId, "uploadId");
      const offset = await service.queryOffset(getOwner(res), uploadId);
      res.status(200).json({ offset });
    } catch (error) {
      next(error);
    }
  }

  async function listUploads(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const records = await service.listUploads(getOwner(res));
      res.status(200).json({
        uploads: records.map((record) => ({
          ...service.statusView(record),
          filename: record.filename,
          status: record.status,
          created_on: record.createdOn,
          completed_on: record.completedOn ?? null,
        })),
      });
    } catch (error) {
      next(error);
    }
  }

  return { uploadChunk, getOffset, listUploads };
}

export async function healthCheck(req: Request, res: Response): Promise<void> {
  res
    .status(200)
    .json({ status: "healthy", timestamp: new Date().toISOString() });
}
