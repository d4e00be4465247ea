/**
 * Format bytes to human-readable size
 * Example: 1900000000 → "1.77 GB", 512 → "512 B"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;

  const units = ['KB', 'MB', 'GB', 'TB'];
  let size = bytes / 1024;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  // GB and above get two decimals, otherwise one
  const decimals = unitIndex >= 2 ? 2 : 1;
  return `${size.toFixed(decimals)} ${units[unitIndex]}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Format a date as local "YYYY-MM-DD HH:MM:SS"
 */
export function formatDateTime(date: Date): string {
  if (isNaN(date.getTime())) return '';
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Format an elapsed time in milliseconds
 * Example: 850 → "850ms", 12500 → "12.5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Truncate from the left, keeping the tail (useful for paths)
 */
export function truncateStart(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return '...' + str.slice(str.length - maxLength + 3);
}

/**
 * Pad a string to a specific length
 */
export function pad(str: string, length: number, char = ' '): string {
  return str.padEnd(length, char);
}
