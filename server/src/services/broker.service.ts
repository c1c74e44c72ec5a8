import { createClient } from "redis";
import logger from "../utils/logger";
import { UploadEvent } from "../models/upload.model";

export const UPLOAD_EVENTS_CHANNEL = "events:uploads";

export interface UploadEventPublisher {
  publish(event: UploadEvent): Promise<void>;
}

export class BrokerService implements UploadEventPublisher {
  private publisher: ReturnType<typeof createClient>;
  private isConnected: boolean = false;

  constructor(redisUrl: string) {
    this.publisher = createClient({ url: redisUrl });
    this.publisher.on("error", (err) =>
      logger.error("Redis Publisher Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.publisher.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) return;
    await this.publisher.quit();
    this.isConnected = false;
    logger.info("BrokerService disconnected from Redis");
  }

  async publish(event: UploadEvent): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    await this.publisher.publish(UPLOAD_EVENTS_CHANNEL, JSON.stringify(event));
    logger.info(`Published ${event.event} to ${UPLOAD_EVENTS_CHANNEL}`, {
      uploadId: event.uploadId,
    });
  }
}
