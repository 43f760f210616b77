/**
 * Formatting Utilities
 *
 * Human-readable formatting for sizes, durations and pixel dimensions.
 */

/**
 * Format a byte count as a human-readable string
 *
 * @param bytes - Byte count
 * @param decimals - Decimal places, default 1
 *
 * @example
 * ```typescript
 * formatSize(1024);        // "1.0 KB"
 * formatSize(1536);        // "1.5 KB"
 * formatSize(1048576);     // "1.0 MB"
 * formatSize(1073741824);  // "1.0 GB"
 * formatSize(500);         // "500 B"
 * ```
 */
export function formatSize(bytes: number, decimals: number = 1): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return 'Invalid size';

  const units = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const k = 1024;

  const i = Math.floor(Math.log(bytes) / Math.log(k));
  const unitIndex = Math.min(i, units.length - 1);

  if (unitIndex === 0) {
    return `${bytes} ${units[0]}`;
  }

  const size = bytes / Math.pow(k, unitIndex);
  return `${size.toFixed(decimals)} ${units[unitIndex]}`;
}

/**
 * Format a duration in milliseconds as a human-readable string
 *
 * Fractional milliseconds are rounded.
 *
 * @example
 * ```typescript
 * formatDurationMs(500);      // "500ms"
 * formatDurationMs(1500);     // "1.5s"
 * formatDurationMs(65000);    // "1m 5s"
 * formatDurationMs(3661000);  // "1h 1m 1s"
 * ```
 */
export function formatDurationMs(ms: number): string {
  if (ms < 0) return 'Invalid duration';
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    const remainingMinutes = minutes % 60;
    const remainingSeconds = seconds % 60;
    if (remainingSeconds > 0) {
      return `${hours}h ${remainingMinutes}m ${remainingSeconds}s`;
    }
    return `${hours}h ${remainingMinutes}m`;
  }

  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return `${minutes}m ${remainingSeconds}s`;
  }

  // Under a minute: fractional seconds
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Format pixel dimensions as `WIDTHxHEIGHT`
 *
 * @example
 * ```typescript
 * formatDimensions(1790, 1210); // "1790x1210"
 * ```
 */
export function formatDimensions(width: number, height: number): string {
  return `${width}x${height}`;
}
