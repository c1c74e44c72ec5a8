import { Request, Response, NextFunction } from "express";
import multer from "multer";
import logger from "../utils/logger";
import { UploadError } from "../utils/errors";

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  // express only treats four-argument functions as error handlers
  next: NextFunction,
): void {
  if (error instanceof UploadError) {
    logger.warn(`Rejected ${req.method} ${req.path}: ${error.message}`, {
      code: error.code,
      owner: res.locals.owner,
    });
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof multer.MulterError) {
    logger.warn(`Rejected ${req.method} ${req.path}: ${error.message}`, {
      code: error.code,
    });
    res.status(400).json({ error: error.message });
    return;
  }

  logger.error(`Error handling ${req.method} ${req.path}:`, error);
  res.status(500).json({ error: "Internal server error" });
}
