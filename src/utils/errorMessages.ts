/**
 * Error Message Utility
 * Converts extractor errors into short user-facing reasons.
 */

/**
 * Converts a technical error to a generic user-friendly message
 */
export function getGenericErrorMessage(error: unknown): string {
  const errorStr = String(error).toLowerCase();

  if (errorStr.includes("unsupported url")) {
    return "Unsupported URL";
  }
  if (errorStr.includes("private") || errorStr.includes("login required") || errorStr.includes("403")) {
    return "Video is private";
  }
  if (errorStr.includes("unavailable") || errorStr.includes("not available") || errorStr.includes("404")) {
    return "Video unavailable";
  }
  if (errorStr.includes("copyright") || errorStr.includes("blocked")) {
    return "Video blocked";
  }
  if (errorStr.includes("ffmpeg") || errorStr.includes("postprocess") || errorStr.includes("convert")) {
    return "Media conversion failed";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Network timeout";
  }
  if (errorStr.includes("enoent") || errorStr.includes("eacces") || errorStr.includes("enospc")) {
    return "File system error";
  }
  if (errorStr.includes("yt-dlp") || errorStr.includes("download")) {
    return "Download failed";
  }

  // Generic fallback
  return "Processing failed";
}
