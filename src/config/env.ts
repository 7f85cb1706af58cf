/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a numeric variable is malformed.
 */

/** Server configuration */
export const PORT = getIntEnv("PORT", 8001);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Root directory for dated download folders */
export const DOWNLOAD_DIR = process.env.DOWNLOAD_DIR || "./download";
/** CLI default when --download-dir is not given */
export const CLI_DOWNLOAD_DIR = process.env.DOWNLOAD_DIR || "./downloads";

/** Redis configuration (BullMQ) */
export const REDIS_URL = process.env.REDIS_URL || "redis://localhost:6379";

/** Worker pool size: how many tasks may run at the same time */
export const WORKER_CONCURRENCY = getIntEnv("WORKER_CONCURRENCY", 10);

/** How long POST /video-info waits for a quick answer before telling the client to poll */
export const VIDEO_INFO_WAIT_MS = getIntEnv("VIDEO_INFO_WAIT_MS", 2000);

/** yt-dlp binary; resolved from PATH unless overridden */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
/** Optional Netscape cookie file passed to yt-dlp for platforms that gate content */
export const YTDLP_COOKIES_PATH = process.env.YTDLP_COOKIES_PATH;

/**
 * Helper to read an integer variable with a default.
 * Throws immediately if the variable is set but not a positive integer.
 */
export function getIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid integer for environment variable ${key}: ${raw}`);
  }
  return value;
}
