/**
 * yt-dlp Service
 * Runs the yt-dlp binary for metadata probes, flat playlist listings and downloads.
 */

import { execa } from "execa";
import { z } from "zod";
import { YTDLP_COOKIES_PATH, YTDLP_PATH } from "../../config/env.js";
import { ExtractorError } from "../../utils/errors.js";
import { serviceLog } from "../../utils/logger.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/139.0.0.0 Safari/537.36";

/**
 * yt-dlp flags in camelCase, e.g. `{ extractAudio: true, audioFormat: "wav" }`
 * becomes `--extract-audio --audio-format wav`.
 */
export type YtdlpFlags = Record<string, string | number | boolean | undefined>;

const flatEntrySchema = z
  .object({
    id: z.string().nullish(),
    url: z.string().nullish(),
    title: z.string().nullish(),
  })
  .passthrough();

export const mediaInfoSchema = z
  .object({
    id: z.string().nullish(),
    title: z.string().nullish(),
    duration: z.number().nullish(),
    uploader: z.string().nullish(),
    view_count: z.number().nullish(),
    description: z.string().nullish(),
    upload_date: z.string().nullish(),
    webpage_url: z.string().nullish(),
    thumbnail: z.string().nullish(),
    subtitles: z.record(z.unknown()).nullish(),
    automatic_captions: z.record(z.unknown()).nullish(),
    entries: z.array(flatEntrySchema.nullable()).nullish(),
  })
  .passthrough();

export type MediaInfo = z.infer<typeof mediaInfoSchema>;
export type FlatEntry = z.infer<typeof flatEntrySchema>;

/**
 * The operations the downloader needs from an extraction backend.
 */
export interface MediaExtractor {
  /** Metadata for one item, nothing written to disk */
  probe(url: string): Promise<MediaInfo>;
  /** Playlist/channel listing without resolving each entry */
  listEntries(url: string): Promise<MediaInfo>;
  /** Runs a download; output location comes from the `output` flag */
  download(url: string, flags: YtdlpFlags): Promise<void>;
}

/**
 * Converts camelCase flags to yt-dlp arguments.
 * `true` emits the bare switch; `false` and `undefined` are dropped.
 */
export function toArgs(flags: YtdlpFlags): string[] {
  const args: string[] = [];

  for (const [key, value] of Object.entries(flags)) {
    if (value === undefined || value === false) {
      continue;
    }
    const flag = `--${key.replace(/[A-Z]/g, (char) => `-${char.toLowerCase()}`)}`;
    if (value === true) {
      args.push(flag);
    } else {
      args.push(flag, String(value));
    }
  }

  return args;
}

/**
 * Pulls the useful part out of a failed execa run.
 */
function describeFailure(error: unknown): { message: string; exitCode: number | null } {
  if (error instanceof Error) {
    const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
    const exitCode = "exitCode" in error && typeof error.exitCode === "number" ? error.exitCode : null;
    return { message: stderr || error.message, exitCode };
  }
  return { message: String(error), exitCode: null };
}

function parseMediaInfo(stdout: string, url: string): MediaInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new ExtractorError(`yt-dlp returned invalid JSON for ${url}`);
  }

  const parsed = mediaInfoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractorError(`Unexpected yt-dlp metadata for ${url}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Extractor backed by the yt-dlp binary.
 */
export class YtdlpExtractor implements MediaExtractor {
  constructor(
    private readonly binaryPath: string = YTDLP_PATH,
    private readonly cookiesPath: string | undefined = YTDLP_COOKIES_PATH
  ) {}

  async probe(url: string): Promise<MediaInfo> {
    serviceLog.info(`[ytdlp] Fetching metadata: ${url}`);
    const stdout = await this.run(url, { dumpSingleJson: true, noPlaylist: true });
    return parseMediaInfo(stdout, url);
  }

  async listEntries(url: string): Promise<MediaInfo> {
    serviceLog.info(`[ytdlp] Listing entries: ${url}`);
    const stdout = await this.run(url, { dumpSingleJson: true, flatPlaylist: true });
    return parseMediaInfo(stdout, url);
  }

  async download(url: string, flags: YtdlpFlags): Promise<void> {
    serviceLog.info(`[ytdlp] Downloading: ${url} -> ${String(flags.output)}`);
    await this.run(url, { ...flags, quiet: true, noWarnings: true });
  }

  private async run(url: string, flags: YtdlpFlags): Promise<string> {
    const args = toArgs({
      ...flags,
      userAgent: USER_AGENT,
      cookies: this.cookiesPath,
    });

    try {
      const { stdout } = await execa(this.binaryPath, [...args, url]);
      return stdout;
    } catch (error) {
      const { message, exitCode } = describeFailure(error);
      serviceLog.error(`[ytdlp] ✗ ${url}: ${message}`);
      throw new ExtractorError(message, exitCode);
    }
  }
}
