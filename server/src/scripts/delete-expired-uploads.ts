#!/usr/bin/env node
import dotenv from "dotenv";
import { Command } from "commander";
import { loadConfig } from "../config";
import { SqliteUploadRepository } from "../services/db.service";
import { DiskBlobStore } from "../services/storage.service";
import { UploadLifecycleService } from "../services/upload.service";
import { SweepResult } from "../models/upload.model";
import { systemClock } from "../utils/clock";
import logger from "../utils/logger";

export function formatSweepResult(result: SweepResult, pretend: boolean): string {
  return pretend
    ? `${result.deleted} expired uploads would be deleted, of ${result.total} total uploads`
    : `${result.deleted} expired uploads deleted, of ${result.total} total uploads`;
}

async function main(): Promise<void> {
  dotenv.config();

  const program = new Command();
  program
    .name("delete-expired-uploads")
    .description("Deletes chunked uploads that have already expired.")
    .option(
      "--pretend",
      "Do not remove anything, just tell how many would be removed.",
      false,
    )
    .option("--owner <owner>", "Only consider uploads belonging to this owner");
  program.parse(process.argv);
  const options = program.opts<{ pretend: boolean; owner?: string }>();

  const config = loadConfig();
  const repository = new SqliteUploadRepository(config.dbPath);
  await repository.init();

  try {
    const service = new UploadLifecycleService(
      repository,
      new DiskBlobStore(config.uploadDir),
      systemClock,
      {
        expirationSeconds: config.expirationSeconds,
        checksumAlgorithm: config.checksumAlgorithm,
      },
    );

    if (options.pretend) {
      console.log("Called with --pretend option, nothing done, just pretending");
    }
    const result = await service.sweepExpired({
      dryRun: options.pretend,
      owner: options.owner,
    });
    console.log(formatSweepResult(result, options.pretend));
  } finally {
    await repository.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error("Expired upload sweep failed:", error);
    process.exit(1);
  });
}
