import bytesLib from 'bytes';

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format a kilobyte quantity (node memory is reported in KB).
 */
export function formatKilobytes(kb: number): string {
  return formatBytes(kb * 1024);
}

/**
 * Format a CPU percentage for display.
 */
export function formatCpu(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/**
 * Format the time elapsed since `since` as "42s ago", "5m ago" or "3h ago".
 */
export function formatTimeAgo(since: Date | string, now: Date = new Date()): string {
  const then = typeof since === 'string' ? new Date(since) : since;
  const elapsedMs = now.getTime() - then.getTime();
  if (Number.isNaN(elapsedMs) || elapsedMs < 0) return 'unknown';

  const seconds = Math.floor(elapsedMs / 1000);
  if (seconds < 60) return `${seconds}s ago`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
  return `${Math.floor(seconds / 3600)}h ago`;
}
