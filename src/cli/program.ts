/**
 * CLI program
 * social-dl [url] [--headless] [--verbose] [--download-dir DIR] [--batch FILE]
 */

import { Command, CommanderError } from "commander";
import { readFile } from "fs/promises";
import { CLI_DOWNLOAD_DIR } from "../config/env.js";
import { downloadFromUrls, isItemSuccessful } from "../services/business/batchDownloadService.js";
import type { DownloadContext } from "../services/business/downloadVideoService.js";
import { getVideoInfo } from "../services/business/videoInfoService.js";
import { YtdlpExtractor, type MediaExtractor } from "../services/external/ytdlp.js";
import type { BatchItem, DownloadOptions, DownloadResult } from "../types/download.js";
import { createCliLogger, type CliLogger } from "../utils/cliLogger.js";
import { getGenericErrorMessage } from "../utils/errorMessages.js";
import { errorMessage } from "../utils/errors.js";
import { muteServiceLogs } from "../utils/logger.js";

export interface CliOptions {
  headless?: boolean;
  downloadDir: string;
  batch?: string;
  video: boolean;
  audio: boolean;
  subtitles: boolean;
  info?: boolean;
  verbose?: boolean;
}

export interface CliDeps {
  extractor?: MediaExtractor;
  logger?: CliLogger;
}

export function buildProgram(): Command {
  return new Command()
    .name("social-dl")
    .description("Download videos, audio and subtitles from social media platforms")
    .argument("[url]", "Social media video, playlist or channel URL")
    .option("--headless", "Plain output for scripts and CI (no spinner, no colour)")
    .option("--download-dir <dir>", "Directory to save downloads", CLI_DOWNLOAD_DIR)
    .option("--batch <file>", "File containing URLs (one per line)")
    .option("--no-video", "Skip the video file")
    .option("--no-audio", "Skip the audio file")
    .option("--no-subtitles", "Skip subtitles")
    .option("--info", "Print metadata instead of downloading")
    .option("--verbose", "Also print service logs ([download], [batch], [ytdlp])")
    .exitOverride();
}

/**
 * Reads a batch file: one URL per line, blank lines skipped.
 */
export async function readBatchFile(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, "utf-8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function describePaths(logger: CliLogger, result: DownloadResult): void {
  if (result.paths.video) logger.stats("Video", result.paths.video);
  if (result.paths.audio) logger.stats("Audio", result.paths.audio);
  for (const [language, subtitlePath] of Object.entries(result.paths.subtitles)) {
    logger.stats(`Subtitles (${language})`, subtitlePath);
  }
}

function failureReason(item: BatchItem): string {
  if (item.kind === "item") {
    return item.error ? `${getGenericErrorMessage(item.error)}: ${item.error}` : "unknown error";
  }
  if (item.error) {
    return `${getGenericErrorMessage(item.error)}: ${item.error}`;
  }
  return `${item.failedDownloads} of ${item.totalVideos} videos failed`;
}

async function printInfo(logger: CliLogger, extractor: MediaExtractor, urls: string[]): Promise<void> {
  for (const [index, url] of urls.entries()) {
    if (urls.length > 1) {
      logger.step(index + 1, urls.length, `Processing: ${url}`);
    }
    logger.startSpinner(`Fetching info for ${url}`);
    try {
      const info = await getVideoInfo(extractor, url);
      logger.stopSpinner();
      logger.success(info.title ?? url);
      logger.stats("Uploader", info.uploader ?? "N/A");
      logger.stats("Duration", info.duration !== null ? `${info.duration}s` : "N/A");
      logger.stats("Views", info.viewCount ?? "N/A");
      logger.stats("Uploaded", info.uploadDate ?? "N/A");
      logger.stats("Subtitles", info.subtitles.join(", ") || "none");
      logger.stats("Auto captions", info.automaticCaptions.join(", ") || "none");
    } catch (error) {
      logger.stopSpinner();
      logger.error(`Failed to fetch info for ${url}: ${errorMessage(error)}`);
    }
  }
}

async function download(
  logger: CliLogger,
  context: DownloadContext,
  urls: string[],
  downloadOptions: DownloadOptions,
  isBatch: boolean
): Promise<void> {
  const result = await downloadFromUrls(context, urls, downloadOptions, {
    onInputStart: (inputUrl, index, total) => {
      if (isBatch) {
        logger.step(index + 1, total, `Processing: ${inputUrl}`);
      } else {
        logger.info(`Processing: ${inputUrl}`);
      }
    },
    onItem: (item) => {
      if (item.success) describePaths(logger, item);
    },
    onInputDone: (item) => {
      const ok = isItemSuccessful(item);
      if (isBatch) {
        if (ok) logger.success(`Successfully processed: ${item.url}`);
        else logger.error(`Failed to process: ${item.url} (${failureReason(item)})`);
      } else {
        if (ok) logger.success(`Successfully downloaded ${item.url}`);
        else logger.error(`Failed to download ${item.url} (${failureReason(item)})`);
      }
    },
  });

  logger.header("Download summary");
  logger.stats("Output directory", result.downloadDirectory);
  logger.stats("Total URLs", result.totalUrls);
  logger.stats("Total videos", result.totalVideos);
  logger.stats("Successful", result.successfulDownloads);
  logger.stats("Failed", result.failedDownloads);
}

/**
 * Runs the CLI and resolves its exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    // Commander already printed the problem (or the help text)
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const [url] = program.args;
  const logger = deps.logger ?? createCliLogger({ headless: options.headless === true });

  if ((!url && !options.batch) || (url && options.batch)) {
    logger.error("Error: Please provide exactly one of a URL or a batch file");
    console.log(program.helpInformation());
    return 1;
  }

  const extractor = deps.extractor ?? new YtdlpExtractor();
  const context: DownloadContext = { downloadDir: options.downloadDir, extractor };
  const downloadOptions: DownloadOptions = {
    video: options.video,
    audio: options.audio,
    subtitles: options.subtitles,
  };

  let urls: string[];
  if (options.batch) {
    try {
      urls = await readBatchFile(options.batch);
    } catch (error) {
      logger.error(`Error: Cannot read batch file ${options.batch}: ${errorMessage(error)}`);
      return 1;
    }
    logger.info(`Processing ${urls.length} URLs from batch file...`);
  } else {
    urls = url ? [url] : [];
  }

  const wasMuted = muteServiceLogs(options.verbose !== true);
  try {
    if (options.info) {
      await printInfo(logger, extractor, urls);
      return 0;
    }
    await download(logger, context, urls, downloadOptions, Boolean(options.batch));
    return 0;
  } finally {
    muteServiceLogs(wasMuted);
  }
}
