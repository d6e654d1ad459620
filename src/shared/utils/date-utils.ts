const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Get a date formatted as YYYY-MM-DD (UTC)
 */
export function getUtcDateString(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Build S3 key with date-based folder structure
 * Example: threat_intel/reports/2026-01-19/threat-intelligence-report-<id>.json
 */
export function buildDateBasedS3Key(
  prefix: string,
  filename: string,
  dateString?: string
): string {
  const date = dateString || getUtcDateString();

  // Remove trailing slash from prefix if present
  const cleanPrefix = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;

  return `${cleanPrefix}/${date}/${filename}`;
}

/**
 * Extract filename from S3 key
 */
export function extractFilename(s3Key: string): string {
  const parts = s3Key.split('/');
  return parts[parts.length - 1];
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 60 * 60 * 1000);
}

/**
 * Milliseconds since epoch, or null when the value does not parse
 */
export function parseTimestamp(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Absolute gap between two ISO timestamps in seconds, null if either is invalid
 */
export function secondsBetween(a: string, b: string): number | null {
  const first = parseTimestamp(a);
  const second = parseTimestamp(b);
  if (first === null || second === null) {
    return null;
  }
  return Math.abs(first - second) / 1000;
}

export function isOnOrAfter(timestamp: string, since: Date): boolean {
  const ms = parseTimestamp(timestamp);
  return ms !== null && ms >= since.getTime();
}

/**
 * Human readable gap, e.g. "45 minutes" or "3.5 hours"
 */
export function describeDuration(seconds: number): string {
  if (seconds < 3600) {
    const minutes = Math.round(seconds / 60);
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  return `${(seconds / 3600).toFixed(1)} hours`;
}
