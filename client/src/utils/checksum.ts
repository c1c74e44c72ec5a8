import fs from "fs";
import crypto from "crypto";

/**
 * Hex digest of a whole file, streamed so large files never sit in memory.
 */
export function hashFile(
  filePath: string,
  algorithm: string = "md5",
): Promise<string> {
  const hash = crypto.createHash(algorithm);
  const fileStream = fs.createReadStream(filePath);

  return new Promise((resolve, reject) => {
    fileStream.on("data", (chunk) => hash.update(chunk));
    fileStream.on("error", reject);
    fileStream.on("end", () => resolve(hash.digest("hex")));
  });
}

export async function readRange(
  filePath: string,
  start: number,
  end: number,
): Promise<Buffer> {
  const length = end - start + 1;
  const buffer = Buffer.alloc(length);
  const handle = await fs.promises.open(filePath, "r");
  try {
    let read = 0;
    while (read < length) {
      const { bytesRead } = await handle.read(
        buffer,
        read,
        length - read,
        start + read,
      );
      if (bytesRead === 0) {
        throw new Error(`Unexpected end of ${filePath} at byte ${start + read}`);
      }
      read += bytesRead;
    }
  } finally {
    await handle.close();
  }
  return buffer;
}
