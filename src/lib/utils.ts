/**
 * Rounds a duration in seconds to two decimals.
 */
export function roundSeconds(seconds: number): number {
  return Math.round(seconds * 100) / 100;
}

/**
 * Formats a duration as seconds, minutes or hours, e.g. `12.50 seconds`.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(2)} seconds`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(2)} minutes`;
  }
  return `${(seconds / 3600).toFixed(2)} hours`;
}

/**
 * Host portion of a URL (port included). Unparseable input is returned as is
 * so it still lands in a report group of its own.
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

export function elapsedSince(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1e9;
}
