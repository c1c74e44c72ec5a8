import crypto from "crypto";

export const T0 = "2026-01-01T00:00:00.000Z";

export const PAYLOAD = Buffer.from("0123456789");

export function md5(data: Buffer): string {
  return crypto.createHash("md5").update(data).digest("hex");
}
