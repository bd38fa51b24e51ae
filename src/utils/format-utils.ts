const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human readable size in 1024-based units with one decimal place.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Seconds as "42s" below a minute, "1.5m" above.
 */
export function formatDuration(seconds: number): string {
  return seconds > 60
    ? `${(seconds / 60).toFixed(1)}m`
    : `${seconds.toFixed(0)}s`;
}
