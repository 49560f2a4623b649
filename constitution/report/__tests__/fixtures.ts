import { computeNatalPositions } from "../../../astro/computeNatalPositions.js";
import { createTableEphemeris } from "../../../astro/ephemeris/tableEphemeris.js";
import { localToUtc } from "../../../astro/localTime.js";
import type { BodyId } from "../../../astro/schemas/natalPositions.schema.js";
import { resolveArchetypeForPositions } from "../../archetypes/archetypeTable.js";
import { computeElementBalance } from "../../classification/elements.js";
import { EQUAL_WEIGHTING } from "../../classification/weightingPolicy.js";
import { parseBirthInput } from "../../input/birthInput.schema.js";
import { resolveRegion } from "../../regions/regionTable.js";
import { buildReportFacts, type ReportFacts } from "../reportFacts.js";

/** Sun in Taurus, Moon in Aquarius: earth 3, water 2, fire 1, air 1. */
export const TARO_LONGITUDES: Record<BodyId, number> = {
  sun: 54.3,
  moon: 321,
  mercury: 40,
  venus: 10,
  mars: 335,
  jupiter: 100,
  saturn: 293,
};

/** Every body in Taurus. */
export const ALL_EARTH_LONGITUDES: Record<BodyId, number> = {
  sun: 40,
  moon: 45,
  mercury: 50,
  venus: 35,
  mars: 31,
  jupiter: 55,
  saturn: 59,
};

export const TARO_BIRTH = {
  name: "Taro",
  year: 1990,
  month: 5,
  day: 15,
  hour: 14,
  minute: 30,
  region: "tokyo",
};

export function buildFixtureFacts(longitudes: Record<BodyId, number> = TARO_LONGITUDES): ReportFacts {
  const birth = parseBirthInput(TARO_BIRTH);
  const geo = resolveRegion(birth.region, birth);
  const instant_utc = localToUtc(birth, geo.utc_offset_minutes);
  const positions = computeNatalPositions(
    { instant_utc, latitude: geo.latitude, longitude: geo.longitude },
    createTableEphemeris(longitudes)
  );
  return buildReportFacts({
    birth,
    geo,
    instant_utc,
    positions,
    element_balance: computeElementBalance(positions, EQUAL_WEIGHTING),
    archetype: resolveArchetypeForPositions(positions),
  });
}
