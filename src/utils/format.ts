const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

/**
 * Human-readable size with one decimal, e.g. `512.0B`, `1.5KB`, `2.3MB`.
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(1)}${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)}TB`;
}

/**
 * Bucketed age of `then` relative to `now`: seconds under a minute, minutes
 * under an hour, hours under a day, days beyond that.
 */
export function formatTimeAgo(then: Date, now: Date): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - then.getTime()) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ago`;
  return `${Math.floor(seconds / 86400)}d ago`;
}

export function countLines(text: string): number {
  let count = 1;
  for (const char of text) {
    if (char === '\n') count += 1;
  }
  return count;
}
