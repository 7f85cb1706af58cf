/**
 * Download layout helpers.
 * Structure: {downloadDir}/{YYYY-MM-DD}/{sanitized-title}/{video.mp4|audio.wav|sub-{lang}.vtt}
 */

import path from "path";

export const VIDEO_EXTENSION = "mp4";
export const AUDIO_EXTENSION = "wav";
export const SUBTITLE_EXTENSION = "vtt";

/** yt-dlp output stems; `%(ext)s` is filled in by yt-dlp */
export const OutputStems = {
  video: "video",
  audio: "audio",
  subtitles: "sub",
} as const;

export const StoragePaths = {
  /** Per-day folder: {downloadDir}/{date} */
  day: (downloadDir: string, date: string) => path.join(downloadDir, date),

  /** Per-item folder: {downloadDir}/{date}/{folder} */
  item: (downloadDir: string, date: string, folder: string) => path.join(downloadDir, date, folder),

  /** yt-dlp output template inside an item folder */
  template: (itemDir: string, stem: string) => path.join(itemDir, `${stem}.%(ext)s`),

  video: (itemDir: string) => path.join(itemDir, `${OutputStems.video}.${VIDEO_EXTENSION}`),

  audio: (itemDir: string) => path.join(itemDir, `${OutputStems.audio}.${AUDIO_EXTENSION}`),

  /** Final subtitle name: sub-{lang}.vtt */
  subtitle: (itemDir: string, language: string) =>
    path.join(itemDir, `sub-${language}.${SUBTITLE_EXTENSION}`),
} as const;
