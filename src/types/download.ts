/**
 * Download domain types shared by the CLI, the HTTP API and the worker.
 */

import type { Platform } from "../services/business/platformService.js";

/** Which assets to fetch for every item. */
export interface DownloadOptions {
  video: boolean;
  audio: boolean;
  subtitles: boolean;
}

export const DEFAULT_DOWNLOAD_OPTIONS: Readonly<DownloadOptions> = {
  video: true,
  audio: true,
  subtitles: true,
};

export interface DownloadRequest {
  readonly url: string;
  readonly wantVideo: boolean;
  readonly wantAudio: boolean;
  readonly wantSubtitles: boolean;
}

export interface DownloadPaths {
  video: string | null;
  audio: string | null;
  /** Language code → subtitle file */
  subtitles: Record<string, string>;
}

/** Outcome of one single-item attempt. */
export interface DownloadResult {
  kind: "item";
  url: string;
  platform: Platform;
  /** Unix seconds at the start of the attempt */
  timestamp: string;
  success: boolean;
  paths: DownloadPaths;
  error: string | null;
}

export type CollectionType = "playlist" | "channel";

/** Summary of an expanded playlist, channel or creator profile. */
export interface CollectionResult {
  kind: "collection";
  url: string;
  type: CollectionType;
  totalVideos: number;
  successfulDownloads: number;
  failedDownloads: number;
  videos: DownloadResult[];
  error: string | null;
}

export type BatchItem = DownloadResult | CollectionResult;

export interface BatchResult {
  /** YYYY-MM-DD folder the run wrote into */
  date: string;
  downloadDirectory: string;
  totalUrls: number;
  totalVideos: number;
  successfulDownloads: number;
  failedDownloads: number;
  items: BatchItem[];
}

export interface VideoInfo {
  title: string | null;
  duration: number | null;
  uploader: string | null;
  viewCount: number | null;
  description: string | null;
  uploadDate: string | null;
  webpageUrl: string;
  thumbnail: string | null;
  subtitles: string[];
  automaticCaptions: string[];
}

export function toDownloadRequest(url: string, options: DownloadOptions): DownloadRequest {
  return {
    url,
    wantVideo: options.video,
    wantAudio: options.audio,
    wantSubtitles: options.subtitles,
  };
}
