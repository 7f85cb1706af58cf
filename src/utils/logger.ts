/**
 * Service log lines ([download], [batch], [collection], [ytdlp]).
 * Written to the console unless muted; the CLI mutes them unless --verbose is given.
 */

let muted = false;

/**
 * Mutes or unmutes service logs.
 * Returns the previous setting so callers can restore it.
 */
export function muteServiceLogs(value: boolean): boolean {
  const previous = muted;
  muted = value;
  return previous;
}

export const serviceLog = {
  info(...args: unknown[]): void {
    if (!muted) console.log(...args);
  },

  error(...args: unknown[]): void {
    if (!muted) console.error(...args);
  },
};
