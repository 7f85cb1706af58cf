/**
 * File naming rules for downloaded items.
 */

export const MAX_FOLDER_NAME_LENGTH = 100;

/**
 * Turns a media title into a folder name: letters, digits, spaces,
 * hyphens and underscores only, at most 100 characters.
 */
export function sanitizeTitle(title: string): string {
  const safe = Array.from(title)
    .filter((char) => /^[\p{L}\p{N} _-]$/u.test(char))
    .join("")
    .trimEnd();

  const truncated = Array.from(safe).slice(0, MAX_FOLDER_NAME_LENGTH).join("");
  return truncated || "unknown";
}

/**
 * Local-time YYYY-MM-DD used as the per-day folder.
 */
export function formatDateFolder(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/** Unix seconds, as used in result timestamps */
export function unixTimestamp(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}

/**
 * Matches yt-dlp subtitle output such as `video.en-US.vtt` and
 * returns the language code, or null for any other file.
 */
export function subtitleLanguage(fileName: string, stem: string, extension: string): string | null {
  const prefix = `${stem}.`;
  const suffix = `.${extension}`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) {
    return null;
  }

  const language = fileName.slice(prefix.length, fileName.length - suffix.length);
  return language && !language.includes("/") ? language : null;
}
