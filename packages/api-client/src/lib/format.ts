/** Display helpers shared by summaries and status reports. */

export function truncate(text: string, length = 1024): string {
  return text.length <= length ? text : `${text.slice(0, length - 3)}...`;
}

/** Keeps the tail of a long value, e.g. an image tag: `…yolks:java_17`. */
export function truncateStart(text: string, length = 80): string {
  return text.length <= length ? text : `…${text.slice(text.length - (length - 1))}`;
}

/** Panel limits are in MB; 0 and negatives mean "no limit". */
export function formatMegabytes(mb: number): string {
  if (mb <= 0) return 'Unlimited';
  if (mb >= 1024) return `${(mb / 1024).toFixed(1)} GB`;
  return `${mb} MB`;
}

/** Live usage figures from the control API are in bytes. */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 MB';
  const mb = bytes / 1_048_576;
  return mb >= 1024 ? `${(mb / 1024).toFixed(2)} GB` : `${mb.toFixed(1)} MB`;
}

/** `93784000` → `1d 2h 3m`; at most three units, `—` when not running. */
export function formatUptime(ms: number): string {
  if (ms <= 0) return '—';
  let seconds = Math.floor(ms / 1000);
  let minutes = Math.floor(seconds / 60);
  seconds %= 60;
  let hours = Math.floor(minutes / 60);
  minutes %= 60;
  const days = Math.floor(hours / 24);
  hours %= 24;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return parts.slice(0, 3).join(' ');
}
