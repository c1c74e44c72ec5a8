import Joi from "joi";
import path from "path";

export interface ServerConfig {
  port: number;
  dbPath: string;
  uploadDir: string;
  expirationSeconds: number;
  fileFieldName: string;
  idFieldName: string;
  maxChunkBytes: number;
  checksumAlgorithm: string;
  apiKeys: Map<string, string>;
  redisUrl?: string;
}

const envSchema = Joi.object({
  SERVER_PORT: Joi.number().port().default(8080),
  DB_PATH: Joi.string().default(path.join(process.cwd(), "uploads.db")),
  UPLOAD_DIR: Joi.string().default(
    path.join(process.cwd(), "chunked_uploads"),
  ),
  UPLOAD_EXPIRATION_SEC: Joi.number().integer().positive().default(86400),
  UPLOAD_FIELD_NAME: Joi.string().default("file"),
  UPLOAD_ID_FIELD: Joi.string().default("md5"),
  MAX_CHUNK_BYTES: Joi.number()
    .integer()
    .positive()
    .default(10 * 1024 * 1024),
  CHECKSUM_ALGORITHM: Joi.string()
    .valid("md5", "sha1", "sha256")
    .default("md5"),
  API_KEYS: Joi.string()
    .pattern(/^[A-Za-z0-9_-]+:[^,\s]+(,[A-Za-z0-9_-]+:[^,\s]+)*$/)
    .required(),
  REDIS_URL: Joi.string().uri().optional(),
}).unknown(true);

interface ValidatedEnv {
  SERVER_PORT: number;
  DB_PATH: string;
  UPLOAD_DIR: string;
  UPLOAD_EXPIRATION_SEC: number;
  UPLOAD_FIELD_NAME: string;
  UPLOAD_ID_FIELD: string;
  MAX_CHUNK_BYTES: number;
  CHECKSUM_ALGORITHM: string;
  API_KEYS: string;
  REDIS_URL?: string;
}

/**
 * Parses `owner:key,owner:key` into a key -> owner lookup.
 */
export function parseApiKeys(raw: string): Map<string, string> {
  const keys = new Map<string, string>();
  for (const pair of raw.split(",")) {
    const sep = pair.indexOf(":");
    keys.set(pair.slice(sep + 1), pair.slice(0, sep));
  }
  return keys;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const { error, value } = envSchema.validate(env, { convert: true });
  if (error) {
    throw new Error(`Invalid server configuration: ${error.message}`);
  }
  const validated: ValidatedEnv = value;

  return {
    port: validated.SERVER_PORT,
    dbPath: validated.DB_PATH,
    uploadDir: validated.UPLOAD_DIR,
    expirationSeconds: validated.UPLOAD_EXPIRATION_SEC,
    fileFieldName: validated.UPLOAD_FIELD_NAME,
    idFieldName: validated.UPLOAD_ID_FIELD,
    maxChunkBytes: validated.MAX_CHUNK_BYTES,
    checksumAlgorithm: validated.CHECKSUM_ALGORITHM,
    apiKeys: parseApiKeys(validated.API_KEYS),
    redisUrl: validated.REDIS_URL,
  };
}
