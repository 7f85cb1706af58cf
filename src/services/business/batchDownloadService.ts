/**
 * Batch Download Service
 * Runs the single-item downloader over a list of URLs, expanding
 * collections, strictly one item at a time and in input order.
 */

import type {
  BatchItem,
  BatchResult,
  CollectionResult,
  DownloadOptions,
  DownloadResult,
} from "../../types/download.js";
import { DEFAULT_DOWNLOAD_OPTIONS, toDownloadRequest } from "../../types/download.js";
import { collectionType, expandCollection, isCollection } from "./collectionService.js";
import { currentTime, downloadSingleVideo, type DownloadContext } from "./downloadVideoService.js";
import { errorMessage } from "../../utils/errors.js";
import { formatDateFolder } from "../../utils/fileNaming.js";
import { StoragePaths } from "../../utils/storagePaths.js";
import { serviceLog } from "../../utils/logger.js";

export interface BatchHooks {
  /** Called before each input URL */
  onInputStart?: (url: string, index: number, total: number) => void;
  /** Called once an input URL (single item or whole collection) is done */
  onInputDone?: (item: BatchItem, index: number, total: number) => void;
  /** Called after every finished item, including collection members */
  onItem?: (result: DownloadResult) => void;
}

interface Counters {
  totalVideos: number;
  successfulDownloads: number;
  failedDownloads: number;
}

function count(counters: Counters, result: DownloadResult): void {
  counters.totalVideos += 1;
  if (result.success) {
    counters.successfulDownloads += 1;
  } else {
    counters.failedDownloads += 1;
  }
}

/**
 * Downloads every item of a playlist, channel or profile.
 * A listing failure yields an empty summary carrying the error.
 */
export async function downloadCollection(
  context: DownloadContext,
  url: string,
  options: DownloadOptions = DEFAULT_DOWNLOAD_OPTIONS,
  hooks: BatchHooks = {}
): Promise<CollectionResult> {
  const result: CollectionResult = {
    kind: "collection",
    url,
    type: collectionType(url),
    totalVideos: 0,
    successfulDownloads: 0,
    failedDownloads: 0,
    videos: [],
    error: null,
  };

  let itemUrls: string[];
  try {
    ({ itemUrls } = await expandCollection(context.extractor, url));
  } catch (error) {
    result.error = errorMessage(error);
    serviceLog.error(`[batch] ✗ Error processing ${result.type} ${url}: ${result.error}`);
    return result;
  }

  for (const [index, itemUrl] of itemUrls.entries()) {
    serviceLog.info(`[batch] [${index + 1}/${itemUrls.length}] Processing: ${itemUrl}`);
    const itemResult = await downloadSingleVideo(context, toDownloadRequest(itemUrl, options));
    result.videos.push(itemResult);
    count(result, itemResult);
    hooks.onItem?.(itemResult);
  }

  return result;
}

/**
 * Downloads from one URL or many. Collections are expanded; everything
 * else is downloaded as a single item. Duplicates are processed again.
 */
export async function downloadFromUrls(
  context: DownloadContext,
  urls: string | string[],
  options: DownloadOptions = DEFAULT_DOWNLOAD_OPTIONS,
  hooks: BatchHooks = {}
): Promise<BatchResult> {
  const inputs = typeof urls === "string" ? [urls] : urls;
  const date = context.dateFolder ?? formatDateFolder(currentTime(context));
  // Every item lands under the reported day folder, even past midnight
  const itemContext: DownloadContext = { ...context, dateFolder: date };

  const batch: BatchResult = {
    date,
    downloadDirectory: StoragePaths.day(context.downloadDir, date),
    totalUrls: inputs.length,
    totalVideos: 0,
    successfulDownloads: 0,
    failedDownloads: 0,
    items: [],
  };

  for (const [index, url] of inputs.entries()) {
    serviceLog.info(`[batch] Processing: ${url}`);
    hooks.onInputStart?.(url, index, inputs.length);

    let item: BatchItem;
    if (isCollection(url)) {
      item = await downloadCollection(itemContext, url, options, hooks);
      batch.totalVideos += item.totalVideos;
      batch.successfulDownloads += item.successfulDownloads;
      batch.failedDownloads += item.failedDownloads;
    } else {
      item = await downloadSingleVideo(itemContext, toDownloadRequest(url, options));
      count(batch, item);
      hooks.onItem?.(item);
    }
    batch.items.push(item);
    hooks.onInputDone?.(item, index, inputs.length);
  }

  serviceLog.info("[batch] ──── Download summary ────");
  serviceLog.info(`[batch] Date: ${batch.date}`);
  serviceLog.info(`[batch] Output directory: ${batch.downloadDirectory}`);
  serviceLog.info(`[batch] Total URLs processed: ${batch.totalUrls}`);
  serviceLog.info(`[batch] Total videos found: ${batch.totalVideos}`);
  serviceLog.info(`[batch] Successful downloads: ${batch.successfulDownloads}`);
  serviceLog.info(`[batch] Failed downloads: ${batch.failedDownloads}`);

  return batch;
}

/**
 * True when a batch item finished without any failed download.
 */
export function isItemSuccessful(item: BatchItem): boolean {
  if (item.kind === "item") {
    return item.success;
  }
  return item.error === null && item.failedDownloads === 0;
}
