/**
 * Natal positions for the seven tracked bodies.
 *
 * Deterministic: one ephemeris query per body, in body order. Ephemeris
 * failures propagate; nothing here substitutes a default position.
 */

import { EphemerisUnavailableError } from "./ephemeris/errors.js";
import type { EphemerisProvider } from "./ephemeris/ephemerisProvider.js";
import {
  BODY_IDS,
  NatalPositionsSchema,
  type BodyId,
  type CelestialPosition,
} from "./schemas/natalPositions.schema.js";
import { normalizeLongitude, signForLongitude } from "./zodiac.js";

export interface ComputeNatalPositionsInput {
  instant_utc: Date;
  latitude: number;
  longitude: number;
}

function queryBody(
  ephemeris: EphemerisProvider,
  body: BodyId,
  input: ComputeNatalPositionsInput
): number {
  let raw: number;
  try {
    raw = ephemeris.positionOf({
      body,
      instant_utc: input.instant_utc,
      latitude: input.latitude,
      longitude: input.longitude,
    });
  } catch (err) {
    if (err instanceof EphemerisUnavailableError) throw err;
    throw new EphemerisUnavailableError(
      `Ephemeris (${ephemeris.engine}) failed for ${body}: ${
        err instanceof Error ? err.message : String(err)
      }`,
      input.instant_utc.toISOString(),
      { cause: err }
    );
  }

  if (!Number.isFinite(raw)) {
    throw new EphemerisUnavailableError(
      `Ephemeris (${ephemeris.engine}) returned a non-finite longitude for ${body}`,
      input.instant_utc.toISOString()
    );
  }
  return raw;
}

export function computeNatalPositions(
  input: ComputeNatalPositionsInput,
  ephemeris: EphemerisProvider
): readonly CelestialPosition[] {
  const positions = BODY_IDS.map((body): CelestialPosition => {
    const longitude = normalizeLongitude(queryBody(ephemeris, body, input));
    return Object.freeze({ body, longitude, ...signForLongitude(longitude) });
  });

  NatalPositionsSchema.parse(positions);
  return Object.freeze(positions);
}
