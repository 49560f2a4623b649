/**
 * Civil-time helpers. All arithmetic is done on UTC milliseconds so the host
 * time zone never leaks in.
 */

export interface LocalCivilInstant {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
}

/**
 * UTC milliseconds for a wall-clock reading, treating it as if it were UTC.
 * Uses setUTCFullYear so years 0-99 are not remapped to 1900-1999.
 */
export function wallClockMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second = 0
): number {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, minute, second, 0);
  return d.getTime();
}

/**
 * Convert a local civil instant to an absolute UTC instant given the offset
 * in force (minutes east of UTC; may be fractional for local mean time).
 */
export function localToUtc(local: LocalCivilInstant, utcOffsetMinutes: number): Date {
  const wall = wallClockMillis(local.year, local.month, local.day, local.hour, local.minute);
  return new Date(wall - Math.round(utcOffsetMinutes * 60_000));
}
