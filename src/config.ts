import { z } from "zod";
import { ConfigError } from "./utils/errors";
import { type LogLevel, parseLogLevel } from "./utils/logger";

/**
 * Default configuration values for the chunker
 */

/** Maximum number of characters per chunk */
export const DEFAULT_CHUNK_SIZE = 4000;

/** Environment variable overriding the default chunk size */
export const CHUNK_SIZE_ENV = "MDCHUNK_CHUNK_SIZE";

/** Environment variable selecting the log level ("error", "warn", "info", "debug") */
export const LOG_LEVEL_ENV = "MDCHUNK_LOG_LEVEL";

const chunkSizeSchema = z.coerce
  .number({ invalid_type_error: "must be a number" })
  .int("must be a whole number")
  .positive("must be greater than zero");

/**
 * Resolves the chunk size from an explicit value (a command line option),
 * then the environment, then the default.
 * @throws {ConfigError} If the chosen value is not a positive integer
 */
export function resolveChunkSize(
  value: string | number | undefined,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const raw = value ?? env[CHUNK_SIZE_ENV];
  if (raw === undefined || raw === "") {
    return DEFAULT_CHUNK_SIZE;
  }

  const result = chunkSizeSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join(", ");
    throw new ConfigError(`Invalid chunk size "${raw}": ${reason}`, "chunkSize");
  }
  return result.data;
}

/**
 * Reads the log level from the environment. Unset means "keep the default".
 * @throws {ConfigError} If the variable names no known level
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const level = parseLogLevel(raw);
  if (level === undefined) {
    throw new ConfigError(`Invalid log level "${raw}"`, "logLevel");
  }
  return level;
}
