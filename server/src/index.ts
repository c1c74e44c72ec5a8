import dotenv from "dotenv";
import { Request } from "express";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { SqliteUploadRepository } from "./services/db.service";
import { DiskBlobStore } from "./services/storage.service";
import { BrokerService } from "./services/broker.service";
import { UploadHooks, UploadLifecycleService } from "./services/upload.service";
import { createEventHooks } from "./services/upload-events";
import { systemClock } from "./utils/clock";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startServer() {
  const config = loadConfig();

  const repository = new SqliteUploadRepository(config.dbPath);
  const blobs = new DiskBlobStore(config.uploadDir);
  const broker = config.redisUrl ? new BrokerService(config.redisUrl) : null;

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      if (broker) await broker.disconnect();
      await repository.close();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  // Initialize services
  logger.info("Initializing services...");
  await repository.init();
  await blobs.ensureRoot();

  let hooks: UploadHooks<Request> = {};
  if (broker) {
    await broker.connect();
    hooks = createEventHooks<Request>(broker, systemClock);
  } else {
    logger.info("REDIS_URL not set, upload events are disabled");
  }

  const service = new UploadLifecycleService<Request>(
    repository,
    blobs,
    systemClock,
    {
      expirationSeconds: config.expirationSeconds,
      checksumAlgorithm: config.checksumAlgorithm,
    },
    hooks,
  );

  const app = createApp(service, {
    apiKeys: config.apiKeys,
    fileFieldName: config.fileFieldName,
    idFieldName: config.idFieldName,
    maxChunkBytes: config.maxChunkBytes,
  });

  // Start HTTP server
  app.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server listening on port ${config.port}`);
    logger.info("Server ready to accept requests");
  });
}

startServer().catch((error) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
