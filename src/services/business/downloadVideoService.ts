/**
 * Download Video Service
 * Downloads one item (video, audio and/or subtitles) into its own folder
 * under the dated download directory.
 */

import { access, mkdir, readdir, rename, rm } from "fs/promises";
import path from "path";
import type { MediaExtractor, YtdlpFlags } from "../external/ytdlp.js";
import type { DownloadPaths, DownloadRequest, DownloadResult } from "../../types/download.js";
import { classifyPlatform } from "./platformService.js";
import { errorMessage } from "../../utils/errors.js";
import { KeyedLock } from "../../utils/keyedLock.js";
import { serviceLog } from "../../utils/logger.js";
import { formatDateFolder, sanitizeTitle, subtitleLanguage, unixTimestamp } from "../../utils/fileNaming.js";
import {
  AUDIO_EXTENSION,
  OutputStems,
  StoragePaths,
  SUBTITLE_EXTENSION,
  VIDEO_EXTENSION,
} from "../../utils/storagePaths.js";

export interface DownloadContext {
  /** Root download directory; dated folders are created beneath it */
  downloadDir: string;
  extractor: MediaExtractor;
  /** Clock used for timestamps and the date folder */
  now?: () => Date;
  /** Date folder (YYYY-MM-DD) to use instead of today's, e.g. the one a batch reports */
  dateFolder?: string;
}

const VIDEO_FORMAT = "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best";
const AUDIO_FORMAT = "bestaudio/best";

/** Every track, including auto-generated captions */
const SUBTITLE_FLAGS: YtdlpFlags = {
  writeSubs: true,
  writeAutoSubs: true,
  subLangs: "all",
  subFormat: SUBTITLE_EXTENSION,
};

/** Attempts on the same item folder run one at a time */
const itemFolders = new KeyedLock();

/** Files an attempt may create: `video.*`, `audio.*`, `sub.*` */
const OWN_PREFIXES = Object.values(OutputStems).map((stem) => `${stem}.`);

export function currentTime(context: DownloadContext): Date {
  return context.now ? context.now() : new Date();
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Renames `{stem}.{lang}.vtt` files to `sub-{lang}.vtt`.
 * Returns language → final path for every file moved.
 */
async function collectSubtitles(itemDir: string, stem: string): Promise<Record<string, string>> {
  const subtitles: Record<string, string> = {};

  for (const fileName of await readdir(itemDir)) {
    const language = subtitleLanguage(fileName, stem, SUBTITLE_EXTENSION);
    if (!language) {
      continue;
    }
    const target = StoragePaths.subtitle(itemDir, language);
    await rename(path.join(itemDir, fileName), target);
    subtitles[language] = target;
    serviceLog.info(`[download] ✓ Subtitle downloaded: ${target}`);
  }

  return subtitles;
}

/**
 * Deletes files this run created under its own output stems that are not
 * part of the result (intermediate formats, tracks nobody asked for).
 */
async function removeUnrequested(itemDir: string, existingBefore: Set<string>, paths: DownloadPaths): Promise<void> {
  const kept = new Set(
    [paths.video, paths.audio, ...Object.values(paths.subtitles)]
      .filter((filePath): filePath is string => filePath !== null)
      .map((filePath) => path.basename(filePath))
  );

  for (const fileName of await readdir(itemDir)) {
    const own = OWN_PREFIXES.some((prefix) => fileName.startsWith(prefix));
    if (!own || existingBefore.has(fileName) || kept.has(fileName)) {
      continue;
    }
    await rm(path.join(itemDir, fileName), { force: true, recursive: true });
    serviceLog.info(`[download] Removed unrequested file: ${fileName}`);
  }
}

/**
 * Downloads a single item.
 * Never throws: failures come back as `success: false` with the error message.
 */
export async function downloadSingleVideo(
  context: DownloadContext,
  request: DownloadRequest
): Promise<DownloadResult> {
  const { url } = request;
  const { extractor } = context;
  const startedAt = currentTime(context);

  const paths: DownloadPaths = { video: null, audio: null, subtitles: {} };
  const platform = classifyPlatform(url);
  const timestamp = unixTimestamp(startedAt);

  try {
    const info = await extractor.probe(url);
    const folder = sanitizeTitle(info.title ?? "unknown");
    const dateFolder = context.dateFolder ?? formatDateFolder(startedAt);
    const itemDir = StoragePaths.item(context.downloadDir, dateFolder, folder);

    await itemFolders.run(itemDir, async () => {
      await mkdir(itemDir, { recursive: true });
      const existingBefore = new Set(await readdir(itemDir));

      serviceLog.info(`[download] ${platform}: "${info.title ?? "unknown"}" -> ${itemDir}`);

      if (request.wantVideo) {
        await extractor.download(url, {
          format: VIDEO_FORMAT,
          output: StoragePaths.template(itemDir, OutputStems.video),
          recodeVideo: VIDEO_EXTENSION,
          noPlaylist: true,
          ...(request.wantSubtitles ? SUBTITLE_FLAGS : {}),
        });

        const videoPath = StoragePaths.video(itemDir);
        if (await fileExists(videoPath)) {
          paths.video = videoPath;
          serviceLog.info(`[download] ✓ Video downloaded: ${videoPath}`);
        }

        if (request.wantSubtitles) {
          Object.assign(paths.subtitles, await collectSubtitles(itemDir, OutputStems.video));
        }
      }

      if (request.wantAudio) {
        await extractor.download(url, {
          format: AUDIO_FORMAT,
          output: StoragePaths.template(itemDir, OutputStems.audio),
          extractAudio: true,
          audioFormat: AUDIO_EXTENSION,
          audioQuality: "192K",
          noPlaylist: true,
        });

        const audioPath = StoragePaths.audio(itemDir);
        if (await fileExists(audioPath)) {
          paths.audio = audioPath;
          serviceLog.info(`[download] ✓ Audio downloaded: ${audioPath}`);
        }
      }

      if (request.wantSubtitles && Object.keys(paths.subtitles).length === 0) {
        await extractor.download(url, {
          skipDownload: true,
          output: StoragePaths.template(itemDir, OutputStems.subtitles),
          noPlaylist: true,
          ...SUBTITLE_FLAGS,
        });
        Object.assign(paths.subtitles, await collectSubtitles(itemDir, OutputStems.subtitles));
      }

      await removeUnrequested(itemDir, existingBefore, paths);
    });

    return { kind: "item", url, platform, timestamp, success: true, paths, error: null };
  } catch (error) {
    const message = errorMessage(error);
    serviceLog.error(`[download] ✗ Error downloading ${url}: ${message}`);
    return { kind: "item", url, platform, timestamp, success: false, paths, error: message };
  }
}
