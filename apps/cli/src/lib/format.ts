/**
 * Value formatting for terminal output
 */

const TITLE_WIDTH = 40;

export function truncateTitle(title: string, width: number = TITLE_WIDTH): string {
  return title.length > width ? `${title.slice(0, width)}...` : title;
}

/**
 * Seconds → `m:ss` (minutes are not rolled into hours)
 */
export function formatLength(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function formatViews(views: number): string {
  return views.toLocaleString('en-US');
}

/**
 * `2024-03-09...` → `09/03/2024`; anything else is shown as-is
 */
export function formatPublishDate(date: string | undefined): string {
  if (!date) return 'unknown';
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(date);
  if (!match) return date;
  const [, year, month, day] = match;
  return `${day}/${month}/${year}`;
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

export function formatProgress(downloadedBytes: number, totalBytes?: number): string {
  if (!totalBytes) {
    return formatBytes(downloadedBytes);
  }
  const percent = Math.min(100, Math.floor((downloadedBytes / totalBytes) * 100));
  return `${percent}% (${formatBytes(downloadedBytes)} / ${formatBytes(totalBytes)})`;
}
