/**
 * Parse a human-readable duration string into milliseconds.
 *
 * Supported formats:
 *   "30s"     → 30 * 1000
 *   "10m"     → 10 * 60 * 1000
 *   "1h30m"   → (60 + 30) * 60 * 1000
 *   "1m30s"   → 90 * 1000
 *   "500ms"   → 500
 *   "0s"      → 0
 *
 * @param duration - A duration string like "30s", "10m", "1h30m", "500ms"
 * @returns Duration in milliseconds
 * @throws Error if the format is invalid
 */
export function parseDuration(duration: string): number {
  if (!duration || duration.trim().length === 0) {
    throw new Error(`Invalid duration: empty string`);
  }

  const pattern = /^(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+)s)?(?:(\d+)ms)?$/;
  const match = pattern.exec(duration.trim());

  if (!match || match.slice(1).every((part) => part === undefined)) {
    throw new Error(
      `Invalid duration format: "${duration}". Expected format like "30s", "10m", "1h30m", "500ms"`,
    );
  }

  const hours = match[1] ? parseInt(match[1], 10) : 0;
  const minutes = match[2] ? parseInt(match[2], 10) : 0;
  const seconds = match[3] ? parseInt(match[3], 10) : 0;
  const millis = match[4] ? parseInt(match[4], 10) : 0;

  return (hours * 3600 + minutes * 60 + seconds) * 1000 + millis;
}

/** Render milliseconds the way the run log prints elapsed time ("45s", "1500ms"). */
export function formatDuration(ms: number): string {
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
