import type { BodyId } from "../schemas/natalPositions.schema.js";
import { EphemerisUnavailableError } from "./errors.js";

export type PositionQuery = {
  body: BodyId;
  instant_utc: Date;
  latitude: number;
  longitude: number;
};

/**
 * Ecliptic position primitive. Implementations must be safe to call from
 * concurrent requests and return the raw (not necessarily normalized)
 * ecliptic longitude in degrees, or throw EphemerisUnavailableError.
 */
export interface EphemerisProvider {
  readonly engine: string;
  positionOf(query: PositionQuery): number;
}

/**
 * Birth years served, read on the local civil calendar: 1900 through 2100.
 */
export const SUPPORTED_CIVIL_YEARS = { first: 1900, last: 2100 } as const;

const DAY_MS = 86_400_000;

/**
 * Instants the engine accepts, in UTC. One day of margin on each side so every
 * local time in a supported civil year stays inside, whatever its offset.
 */
export const SUPPORTED_EPHEMERIS_RANGE = {
  start_ms: Date.UTC(SUPPORTED_CIVIL_YEARS.first, 0, 1) - DAY_MS,
  end_ms: Date.UTC(SUPPORTED_CIVIL_YEARS.last + 1, 0, 1) + DAY_MS,
} as const;

export function isSupportedCivilYear(year: number): boolean {
  return year >= SUPPORTED_CIVIL_YEARS.first && year <= SUPPORTED_CIVIL_YEARS.last;
}

export function assertSupportedCivilYear(year: number): void {
  if (isSupportedCivilYear(year)) return;
  throw new EphemerisUnavailableError(
    `Ephemeris has no data for birth year ${year}; supported years are ` +
      `${SUPPORTED_CIVIL_YEARS.first}-${SUPPORTED_CIVIL_YEARS.last} local time`
  );
}

export function isSupportedInstant(instant: Date): boolean {
  const t = instant.getTime();
  return (
    Number.isFinite(t) &&
    t >= SUPPORTED_EPHEMERIS_RANGE.start_ms &&
    t < SUPPORTED_EPHEMERIS_RANGE.end_ms
  );
}

export function assertSupportedInstant(instant: Date): void {
  if (isSupportedInstant(instant)) return;
  const label = Number.isFinite(instant.getTime()) ? instant.toISOString() : "invalid date";
  throw new EphemerisUnavailableError(
    `Ephemeris has no data for ${label}; supported range is 1899-12-31T00:00Z to 2101-01-02T00:00Z`,
    Number.isFinite(instant.getTime()) ? instant.toISOString() : undefined
  );
}
