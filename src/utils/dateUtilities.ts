/**
 * Date utilities for wall-clock timestamps.
 *
 * Apple Health writes every timestamp in the wearer's local clock with an
 * offset ("2024-12-21 23:45:30 -0800"). Bedtimes and night dates only make
 * sense in that local clock, so timestamps are kept as wall-clock values:
 * the local date and time are stored in the UTC fields of a Date and always
 * read back with the UTC getters. The offset is discarded.
 */

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

// "YYYY-MM-DD HH:MM:SS", optional fraction, optional "Z", "±HHMM" or "±HH:MM"
const HEALTH_DATE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:\s*(?:Z|[+-]\d{2}:?\d{2}))?$/;

/**
 * Check if a Date object is valid (not NaN).
 */
export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse an Apple Health timestamp into a wall-clock Date.
 * Returns an Invalid Date for anything that is not a real calendar date and time.
 */
export function parseHealthDate(text: string | undefined): Date {
  const match = text === undefined ? null : HEALTH_DATE_REGEX.exec(text.trim());
  if (!match) return new Date(Number.NaN);

  const [year, month, day, hours, minutes, seconds] = match
    .slice(1, 7)
    .map((part) => Number.parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));

  // Reject rollovers such as "2024-02-30" or "25:00:00"
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return new Date(Number.NaN);
  }

  return date;
}

/**
 * Convert a real instant to the wall-clock representation in the host's timezone.
 */
export function toWallClock(instant: Date): Date {
  return new Date(instant.getTime() - instant.getTimezoneOffset() * MS_PER_MINUTE);
}

/**
 * Current time as a wall-clock Date.
 */
export function currentWallClock(): Date {
  return toWallClock(new Date());
}

/**
 * Format a wall-clock Date as its YYYY-MM-DD calendar date.
 */
export function getDateKey(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Format a wall-clock Date as HH:MM.
 */
export function formatTime(date: Date): string {
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

/**
 * Format a wall-clock Date as "YYYY-MM-DD HH:MM:SS".
 */
export function formatDateTime(date: Date): string {
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');
  return `${getDateKey(date)} ${formatTime(date)}:${seconds}`;
}

// Scaled values within this distance of .5 count as exact halves
const HALF_TOLERANCE = 1e-9;

/**
 * Round a number to specified decimal places, halves to even.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);

  if (Math.abs(scaled - floor - 0.5) < HALF_TOLERANCE) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}
