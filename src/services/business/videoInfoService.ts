/**
 * Video Info Service
 * Metadata lookup without downloading anything.
 */

import type { MediaExtractor } from "../external/ytdlp.js";
import type { VideoInfo } from "../../types/download.js";

export async function getVideoInfo(extractor: MediaExtractor, url: string): Promise<VideoInfo> {
  const info = await extractor.probe(url);

  return {
    title: info.title ?? null,
    duration: info.duration ?? null,
    uploader: info.uploader ?? null,
    viewCount: info.view_count ?? null,
    description: info.description ?? null,
    uploadDate: info.upload_date ?? null,
    webpageUrl: info.webpage_url ?? url,
    thumbnail: info.thumbnail ?? null,
    subtitles: Object.keys(info.subtitles ?? {}),
    automaticCaptions: Object.keys(info.automatic_captions ?? {}),
  };
}
