import express, { Express, Request } from "express";
import cors from "cors";
import multer from "multer";
import { UploadLifecycleService } from "./services/upload.service";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import { errorHandler } from "./middleware/error.middleware";
import {
  createUploadController,
  healthCheck,
} from "./controllers/upload.controller";

export interface AppOptions {
  apiKeys: ReadonlyMap<string, string>;
  fileFieldName: string;
  idFieldName: string;
  maxChunkBytes: number;
  contentRangePattern?: RegExp;
}

export function createApp(
  service: UploadLifecycleService<Request>,
  options: AppOptions,
): Express {
  const app = express();
  const authMiddleware = createAuthMiddleware(options.apiKeys);
  const chunkUpload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxChunkBytes, files: 1 },
  }).single(options.fileFieldName);
  const uploadController = createUploadController(service, {
    idFieldName: options.idFieldName,
    contentRangePattern: options.contentRangePattern,
  });

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Public routes
  app.get("/health", healthCheck);

  // Protected routes
  app.post("/uploads", authMiddleware, chunkUpload, uploadController.uploadChunk);
  app.get("/uploads", authMiddleware, uploadController.listUploads);
  app.get("/uploads/:uploadId", authMiddleware, uploadController.getOffset);

  app.use(errorHandler);

  return app;
}
