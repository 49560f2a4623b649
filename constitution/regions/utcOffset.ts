/**
 * UTC offsets from the IANA rules bundled with the runtime's Intl data.
 * Historical rules (summer time, local mean time) come with them.
 */

import { wallClockMillis, type LocalCivilInstant } from "../../astro/localTime.js";

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Offset (minutes east of UTC) in force at an absolute instant.
 */
export function utcOffsetMinutesAtInstant(timeZone: string, utcMillis: number): number {
  const wholeSecond = Math.floor(utcMillis / 1000) * 1000;
  const parts = formatterFor(timeZone).formatToParts(new Date(wholeSecond));
  const part = (type: Intl.DateTimeFormatPartTypes): number => {
    const found = parts.find((p) => p.type === type);
    if (!found) {
      throw new Error(`Intl returned no ${type} for ${timeZone}`);
    }
    return Number(found.value);
  };

  const wall = wallClockMillis(
    part("year"),
    part("month"),
    part("day"),
    part("hour"),
    part("minute"),
    part("second")
  );
  return (wall - wholeSecond) / 60_000;
}

/**
 * Offset in force at a local civil time. Two passes so instants next to a
 * transition settle on the rule that applies on the wall clock.
 */
export function utcOffsetMinutesAt(timeZone: string, local: LocalCivilInstant): number {
  const wall = wallClockMillis(local.year, local.month, local.day, local.hour, local.minute);
  const first = utcOffsetMinutesAtInstant(timeZone, wall);
  return utcOffsetMinutesAtInstant(timeZone, wall - first * 60_000);
}
