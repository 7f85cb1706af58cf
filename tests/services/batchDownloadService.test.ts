import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  downloadCollection,
  downloadFromUrls,
  isItemSuccessful,
} from "../../src/services/business/batchDownloadService.js";
import type { DownloadContext } from "../../src/services/business/downloadVideoService.js";
import type { BatchItem, DownloadOptions } from "../../src/types/download.js";
import { FakeExtractor, type FakeExtractorOptions } from "../helpers/fakeExtractor.js";

const NOW = new Date(2026, 9, 19, 12, 0, 0);
const AUDIO_ONLY: DownloadOptions = { video: false, audio: true, subtitles: false };

const YOUTUBE_ITEM = "https://www.youtube.com/watch?v=AAA";
const TIKTOK_ITEM = "https://www.tiktok.com/@creator/video/123";
const PLAYLIST = "https://www.youtube.com/playlist?list=PL123";

describe("batch downloads", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "batch-download-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function setup(options: FakeExtractorOptions = {}): { context: DownloadContext; extractor: FakeExtractor } {
    const extractor = new FakeExtractor(options);
    return { context: { downloadDir: root, extractor, now: () => NOW }, extractor };
  }

  describe("downloadFromUrls", () => {
    it("downloads items from different platforms in input order", async () => {
      const { context } = setup({
        titles: { [YOUTUBE_ITEM]: "First Clip", [TIKTOK_ITEM]: "Second Clip" },
      });

      const batch = await downloadFromUrls(context, [YOUTUBE_ITEM, TIKTOK_ITEM], AUDIO_ONLY);

      expect(batch).toMatchObject({
        date: "2026-10-19",
        downloadDirectory: path.join(root, "2026-10-19"),
        totalUrls: 2,
        totalVideos: 2,
        successfulDownloads: 2,
        failedDownloads: 0,
      });
      expect(batch.items.map((item) => (item.kind === "item" ? item.platform : item.kind))).toEqual([
        "youtube",
        "tiktok",
      ]);
      expect(batch.items.map((item) => item.url)).toEqual([YOUTUBE_ITEM, TIKTOK_ITEM]);
    });

    it("accepts a single URL string", async () => {
      const { context } = setup();

      const batch = await downloadFromUrls(context, YOUTUBE_ITEM, AUDIO_ONLY);

      expect(batch.totalUrls).toBe(1);
      expect(batch.items).toHaveLength(1);
    });

    it("returns one entry per input and counts failures", async () => {
      const broken = "https://www.instagram.com/reel/broken/";
      const { context } = setup({ probeFailures: { [broken]: new Error("Video unavailable") } });

      const batch = await downloadFromUrls(context, [YOUTUBE_ITEM, broken, TIKTOK_ITEM], AUDIO_ONLY);

      expect(batch.items).toHaveLength(3);
      expect(batch.items.map(isItemSuccessful)).toEqual([true, false, true]);
      expect(batch.successfulDownloads).toBe(2);
      expect(batch.failedDownloads).toBe(1);
      expect(batch.successfulDownloads + batch.failedDownloads).toBe(batch.totalVideos);
    });

    it("processes duplicates again", async () => {
      const { context, extractor } = setup();

      const batch = await downloadFromUrls(context, [YOUTUBE_ITEM, YOUTUBE_ITEM], AUDIO_ONLY);

      expect(batch.items).toHaveLength(2);
      expect(extractor.probes).toEqual([YOUTUBE_ITEM, YOUTUBE_ITEM]);
    });

    it("expands collections and adds their counts to the batch", async () => {
      const { context, extractor } = setup({
        listings: { [PLAYLIST]: [{ id: "a1" }, { id: "b2" }] },
      });

      const batch = await downloadFromUrls(context, [PLAYLIST, TIKTOK_ITEM], AUDIO_ONLY);

      expect(batch.totalUrls).toBe(2);
      expect(batch.totalVideos).toBe(3);
      expect(batch.successfulDownloads).toBe(3);
      expect(batch.items).toHaveLength(2);
      expect(batch.items[0]).toMatchObject({
        kind: "collection",
        type: "playlist",
        totalVideos: 2,
        successfulDownloads: 2,
        failedDownloads: 0,
        error: null,
      });
      expect(extractor.probes).toEqual([
        "https://www.youtube.com/watch?v=a1",
        "https://www.youtube.com/watch?v=b2",
        TIKTOK_ITEM,
      ]);
    });

    it("downloads video and subtitles without audio from two platforms", async () => {
      const { context } = setup({
        titles: { [YOUTUBE_ITEM]: "First Clip", [TIKTOK_ITEM]: "Second Clip" },
        subtitleLanguages: ["en"],
      });

      const batch = await downloadFromUrls(context, [YOUTUBE_ITEM, TIKTOK_ITEM], {
        video: true,
        audio: false,
        subtitles: true,
      });

      expect(batch.totalUrls).toBe(2);
      expect(batch.successfulDownloads).toBe(2);
      const [first, second] = batch.items;
      expect(first).toMatchObject({ kind: "item", platform: "youtube", success: true });
      expect(second).toMatchObject({ kind: "item", platform: "tiktok", success: true });
      expect(first.kind === "item" ? first.paths : null).toEqual({
        video: path.join(root, "2026-10-19", "First Clip", "video.mp4"),
        audio: null,
        subtitles: { en: path.join(root, "2026-10-19", "First Clip", "sub-en.vtt") },
      });
      expect(second.kind === "item" ? second.paths : null).toEqual({
        video: path.join(root, "2026-10-19", "Second Clip", "video.mp4"),
        audio: null,
        subtitles: { en: path.join(root, "2026-10-19", "Second Clip", "sub-en.vtt") },
      });
    });

    it("carries on with later inputs after a collection fails to list", async () => {
      const profile = "https://www.tiktok.com/@creator";
      const { context } = setup({ listingFailures: { [profile]: new Error("Unable to extract secondary user ID") } });

      const batch = await downloadFromUrls(context, [profile, YOUTUBE_ITEM], AUDIO_ONLY);

      expect(batch.items).toHaveLength(2);
      expect(batch.items[0]).toMatchObject({
        kind: "collection",
        error: "Unable to extract secondary user ID",
        totalVideos: 0,
        successfulDownloads: 0,
        failedDownloads: 0,
      });
      expect(batch.items[1]).toMatchObject({ kind: "item", url: YOUTUBE_ITEM, success: true });
      expect(batch).toMatchObject({ totalVideos: 1, successfulDownloads: 1, failedDownloads: 0 });
    });

    it("keeps every item under the reported day folder when the clock passes midnight", async () => {
      const extractor = new FakeExtractor({
        titles: { [YOUTUBE_ITEM]: "First Clip" },
        listings: { [PLAYLIST]: [{ id: "a1" }] },
      });
      const times = [new Date(2026, 9, 19, 23, 59, 59)];
      const now = () => times.shift() ?? new Date(2026, 9, 20, 0, 0, 1);

      const batch = await downloadFromUrls({ downloadDir: root, extractor, now }, [YOUTUBE_ITEM, PLAYLIST], AUDIO_ONLY);

      expect(batch.date).toBe("2026-10-19");
      expect(batch.downloadDirectory).toBe(path.join(root, "2026-10-19"));
      const [single, collection] = batch.items;
      expect(single.kind === "item" ? single.paths.audio : null).toBe(
        path.join(root, "2026-10-19", "First Clip", "audio.wav")
      );
      expect(collection.kind === "collection" ? collection.videos[0].paths.audio : null).toBe(
        path.join(root, "2026-10-19", "Test Video", "audio.wav")
      );
    });

    it("reports progress through hooks", async () => {
      const { context } = setup({ listings: { [PLAYLIST]: [{ id: "a1" }, { id: "b2" }] } });
      const started: string[] = [];
      const done: Array<[BatchItem["kind"], number, number]> = [];
      const items: string[] = [];

      await downloadFromUrls(context, [YOUTUBE_ITEM, PLAYLIST], AUDIO_ONLY, {
        onInputStart: (url, index, total) => started.push(`${index + 1}/${total} ${url}`),
        onInputDone: (item, index, total) => done.push([item.kind, index, total]),
        onItem: (result) => items.push(result.url),
      });

      expect(started).toEqual([`1/2 ${YOUTUBE_ITEM}`, `2/2 ${PLAYLIST}`]);
      expect(done).toEqual([
        ["item", 0, 2],
        ["collection", 1, 2],
      ]);
      expect(items).toEqual([
        YOUTUBE_ITEM,
        "https://www.youtube.com/watch?v=a1",
        "https://www.youtube.com/watch?v=b2",
      ]);
    });
  });

  describe("downloadCollection", () => {
    it("returns an empty summary with the error when listing fails", async () => {
      const profile = "https://www.tiktok.com/@creator";
      const { context } = setup({ listingFailures: { [profile]: new Error("Unable to extract secondary user ID") } });

      const result = await downloadCollection(context, profile, AUDIO_ONLY);

      expect(result).toEqual({
        kind: "collection",
        url: profile,
        type: "channel",
        totalVideos: 0,
        successfulDownloads: 0,
        failedDownloads: 0,
        videos: [],
        error: "Unable to extract secondary user ID",
      });
      expect(isItemSuccessful(result)).toBe(false);
    });

    it("keeps going after a member fails", async () => {
      const { context } = setup({
        listings: { [PLAYLIST]: [{ id: "a1" }, { id: "b2" }] },
        probeFailures: { "https://www.youtube.com/watch?v=a1": new Error("Private video") },
      });

      const result = await downloadCollection(context, PLAYLIST, AUDIO_ONLY);

      expect(result.totalVideos).toBe(2);
      expect(result.failedDownloads).toBe(1);
      expect(result.successfulDownloads).toBe(1);
      expect(result.videos.map((video) => video.error)).toEqual(["Private video", null]);
      expect(isItemSuccessful(result)).toBe(false);
    });
  });
});
