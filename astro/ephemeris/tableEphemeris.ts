import type { BodyId } from "../schemas/natalPositions.schema.js";
import {
  assertSupportedInstant,
  type EphemerisProvider,
  type PositionQuery,
} from "./ephemerisProvider.js";

/**
 * In-process ephemeris stand-in: fixed longitudes per body, every query recorded.
 * Honors the supported range so range failures behave like the real engine.
 */
export function createTableEphemeris(
  longitudes: Record<BodyId, number>
): EphemerisProvider & { calls: PositionQuery[] } {
  const calls: PositionQuery[] = [];
  return {
    engine: "table",
    calls,
    positionOf(query) {
      calls.push(query);
      assertSupportedInstant(query.instant_utc);
      return longitudes[query.body];
    },
  };
}
