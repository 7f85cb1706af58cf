/**
 * Collection Service
 * Detects playlist/channel/profile URLs and lists the items they contain.
 */

import type { MediaExtractor } from "../external/ytdlp.js";
import type { CollectionType } from "../../types/download.js";
import { classifyPlatform, getPlatformProfile } from "./platformService.js";
import { serviceLog } from "../../utils/logger.js";

export interface CollectionListing {
  url: string;
  type: CollectionType;
  /** Item URLs in listing order */
  itemUrls: string[];
}

export function isCollection(url: string): boolean {
  return getPlatformProfile(classifyPlatform(url)).isCollectionUrl(url);
}

export function collectionType(url: string): CollectionType {
  return url.includes("playlist") ? "playlist" : "channel";
}

/**
 * Lists the members of a collection through a flat listing.
 * A listing without entries is treated as a single item.
 * Listing errors are not caught here.
 */
export async function expandCollection(extractor: MediaExtractor, url: string): Promise<CollectionListing> {
  const type = collectionType(url);
  const profile = getPlatformProfile(classifyPlatform(url));
  const listing = await extractor.listEntries(url);

  if (!listing.entries) {
    return { url, type, itemUrls: [url] };
  }

  const itemUrls: string[] = [];
  for (const entry of listing.entries) {
    if (!entry) {
      continue;
    }
    const itemUrl = entry.url || (entry.id ? profile.itemUrl(entry.id) : null);
    if (itemUrl) {
      itemUrls.push(itemUrl);
    }
  }

  serviceLog.info(`[collection] Found ${itemUrls.length} videos in ${type}: ${url}`);
  return { url, type, itemUrls };
}
