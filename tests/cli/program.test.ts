import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readBatchFile, runCli } from "../../src/cli/program.js";
import { formatDateFolder } from "../../src/utils/fileNaming.js";
import type { CliLogger } from "../../src/utils/cliLogger.js";
import { muteServiceLogs } from "../../src/utils/logger.js";
import { FakeExtractor } from "../helpers/fakeExtractor.js";

const ITEM_URL = "https://www.youtube.com/watch?v=AAA";
const TIKTOK_URL = "https://www.tiktok.com/@creator/video/123";

/** Records every call as one line */
function recordingLogger(): CliLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    success: (message) => lines.push(`success ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    step: (step, total, message) => lines.push(`step [${step}/${total}] ${message}`),
    startSpinner: (message) => lines.push(`spinner ${message}`),
    stopSpinner: () => undefined,
    header: (title) => lines.push(`header ${title}`),
    stats: (label, value) => lines.push(`stats ${label}: ${value}`),
  };
}

describe("runCli", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "social-dl-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("needs a URL or a batch file", async () => {
    const logger = recordingLogger();

    const code = await runCli([], { logger, extractor: new FakeExtractor() });

    expect(code).toBe(1);
    expect(logger.lines).toEqual(["error Error: Please provide exactly one of a URL or a batch file"]);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("Usage: social-dl"));
  });

  it("refuses a URL together with a batch file", async () => {
    const logger = recordingLogger();

    const code = await runCli([ITEM_URL, "--batch", "urls.txt"], { logger, extractor: new FakeExtractor() });

    expect(code).toBe(1);
    expect(logger.lines[0]).toBe("error Error: Please provide exactly one of a URL or a batch file");
  });

  it("fails when the batch file cannot be read", async () => {
    const logger = recordingLogger();
    const missing = path.join(root, "missing.txt");

    const code = await runCli(["--batch", missing], { logger, extractor: new FakeExtractor() });

    expect(code).toBe(1);
    expect(logger.lines[0]).toMatch(/^error Error: Cannot read batch file .*missing\.txt: /);
  });

  it("returns commander's exit code for unknown options", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const code = await runCli(["--bogus"], { logger: recordingLogger(), extractor: new FakeExtractor() });

    expect(code).toBe(1);
  });

  it("downloads a single URL and prints a summary", async () => {
    const logger = recordingLogger();
    const extractor = new FakeExtractor();

    const code = await runCli([ITEM_URL, "--download-dir", root, "--no-video", "--no-subtitles"], {
      logger,
      extractor,
    });

    const dayDir = path.join(root, formatDateFolder(new Date()));
    expect(code).toBe(0);
    expect(logger.lines).toEqual([
      `info Processing: ${ITEM_URL}`,
      `stats Audio: ${path.join(dayDir, "Test Video", "audio.wav")}`,
      `success Successfully downloaded ${ITEM_URL}`,
      "header Download summary",
      `stats Output directory: ${dayDir}`,
      "stats Total URLs: 1",
      "stats Total videos: 1",
      "stats Successful: 1",
      "stats Failed: 0",
    ]);
    expect(extractor.downloads).toHaveLength(1);
    expect(extractor.downloads[0].flags.extractAudio).toBe(true);
  });

  it("keeps service logs off the console unless --verbose is given", async () => {
    const args = [ITEM_URL, "--download-dir", root, "--no-video", "--no-subtitles", "--headless"];

    await runCli(args, { logger: recordingLogger(), extractor: new FakeExtractor() });

    expect(console.log).not.toHaveBeenCalled();
    expect(muteServiceLogs(false)).toBe(false);
  });

  it("prints service logs with --verbose", async () => {
    const args = [ITEM_URL, "--download-dir", root, "--no-video", "--no-subtitles", "--verbose"];

    await runCli(args, { logger: recordingLogger(), extractor: new FakeExtractor() });

    expect(console.log).toHaveBeenCalledWith("[batch] ──── Download summary ────");
    expect(console.log).toHaveBeenCalledWith("[batch] Total URLs processed: 1");
  });

  it("processes every line of a batch file and keeps going after failures", async () => {
    const logger = recordingLogger();
    const batchFile = path.join(root, "urls.txt");
    await writeFile(batchFile, `${ITEM_URL}\n\n  ${TIKTOK_URL}  \n`);
    const extractor = new FakeExtractor({ probeFailures: { [ITEM_URL]: new Error("ERROR: Video unavailable") } });

    const code = await runCli(["--batch", batchFile, "--download-dir", root, "--no-video", "--no-subtitles"], {
      logger,
      extractor,
    });

    expect(code).toBe(0);
    expect(logger.lines).toEqual(
      expect.arrayContaining([
        "info Processing 2 URLs from batch file...",
        `step [1/2] Processing: ${ITEM_URL}`,
        `error Failed to process: ${ITEM_URL} (Video unavailable: ERROR: Video unavailable)`,
        `step [2/2] Processing: ${TIKTOK_URL}`,
        `success Successfully processed: ${TIKTOK_URL}`,
        "stats Successful: 1",
        "stats Failed: 1",
      ])
    );
  });

  it("prints metadata with --info and downloads nothing", async () => {
    const logger = recordingLogger();
    const extractor = new FakeExtractor({ titles: { [ITEM_URL]: "Launch Day" } });

    const code = await runCli([ITEM_URL, "--info"], { logger, extractor });

    expect(code).toBe(0);
    expect(extractor.downloads).toHaveLength(0);
    expect(logger.lines).toEqual([
      `spinner Fetching info for ${ITEM_URL}`,
      "success Launch Day",
      "stats Uploader: Test Uploader",
      "stats Duration: 42s",
      "stats Views: 1000",
      "stats Uploaded: 20260101",
      "stats Subtitles: en",
      "stats Auto captions: fr, de",
    ]);
  });
});

describe("readBatchFile", () => {
  it("trims lines and skips blanks", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "batch-file-"));
    const file = path.join(dir, "urls.txt");
    await writeFile(file, "  https://a.example/1\r\n\r\nhttps://b.example/2\n   \n");

    try {
      expect(await readBatchFile(file)).toEqual(["https://a.example/1", "https://b.example/2"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
