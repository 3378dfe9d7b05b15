function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in UTC, used to key report file names
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC
 */
export function displayTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Reverse of fileTimestamp(); null when the text is not a valid timestamp
 */
export function parseFileTimestamp(value: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  return fileTimestamp(date) === value ? date : null;
}
