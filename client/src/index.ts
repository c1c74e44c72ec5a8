import dotenv from "dotenv";
import os from "os";
import path from "path";
import { HttpUploadTransport } from "./services/transport.service";
import { UploaderService } from "./services/uploader.service";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const serverUrl = process.env.SERVER_URL || "http://localhost:8080";
const apiKey = process.env.SERVER_API_KEY;
const filePath =
  process.env.FILE_PATH || path.join(os.homedir(), "file_to_upload.bin");
const chunkSize = parseInt(process.env.CHUNK_SIZE || "1048576", 10);

if (!apiKey) {
  logger.error("SERVER_API_KEY environment variable is required");
  process.exit(1);
}

async function startClient(key: string) {
  logger.info(`Uploading ${filePath} to ${serverUrl}`);

  const transport = new HttpUploadTransport({ serverUrl, apiKey: key });
  const uploader = new UploaderService(transport, { chunkSize });
  const result = await uploader.uploadFile(filePath);

  logger.info(`Done: ${result.uploadId}`, {
    size: result.size,
    resumedFrom: result.resumedFrom,
    chunksSent: result.chunksSent,
  });
}

startClient(apiKey).catch((error) => {
  logger.error("Upload failed:", error);
  process.exit(1);
});
