/**
 * Platform Service
 * Identifies the social platform behind a URL and exposes what each
 * platform supports (collection URLs, canonical item links).
 */

export const PLATFORMS = ["tiktok", "instagram", "facebook", "youtube", "twitter", "unknown"] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface PlatformProfile {
  label: string;
  /** Hostname fragments that identify the platform */
  hosts: readonly string[];
  /** True when the URL lists many items rather than naming one */
  isCollectionUrl: (url: string) => boolean;
  /** Builds an item link from a bare id returned by a flat listing */
  itemUrl: (id: string) => string | null;
}

const never = () => false;
const noItemUrl = () => null;

/**
 * Order matters: the first profile whose host matches wins.
 */
export const PLATFORM_PROFILES = {
  tiktok: {
    label: "TikTok",
    hosts: ["tiktok.com"],
    // Creator profile without a specific video
    isCollectionUrl: (url) => url.includes("tiktok.com/@") && !url.includes("/video/"),
    itemUrl: noItemUrl,
  },
  instagram: {
    label: "Instagram",
    hosts: ["instagram.com"],
    isCollectionUrl: never,
    itemUrl: noItemUrl,
  },
  facebook: {
    label: "Facebook",
    hosts: ["facebook.com", "fb.com"],
    isCollectionUrl: never,
    itemUrl: noItemUrl,
  },
  youtube: {
    label: "YouTube",
    hosts: ["youtube.com", "youtu.be"],
    isCollectionUrl: (url) =>
      url.includes("youtube.com") &&
      ["/playlist?", "/channel/", "/@", "/c/"].some((marker) => url.includes(marker)),
    itemUrl: (id) => `https://www.youtube.com/watch?v=${id}`,
  },
  twitter: {
    label: "Twitter / X",
    hosts: ["twitter.com", "x.com"],
    isCollectionUrl: never,
    itemUrl: noItemUrl,
  },
  unknown: {
    label: "Unknown",
    hosts: [],
    isCollectionUrl: never,
    itemUrl: noItemUrl,
  },
} satisfies Record<Platform, PlatformProfile>;

/**
 * Maps a URL to a platform by hostname.
 * Never throws: anything that does not parse is "unknown".
 */
export function classifyPlatform(url: string): Platform {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return "unknown";
  }

  for (const platform of PLATFORMS) {
    if (PLATFORM_PROFILES[platform].hosts.some((host) => hostname.includes(host))) {
      return platform;
    }
  }
  return "unknown";
}

export function getPlatformProfile(platform: Platform): PlatformProfile {
  return PLATFORM_PROFILES[platform];
}
