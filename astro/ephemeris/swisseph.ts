import { createRequire } from "node:module";
import fs from "node:fs";
import path from "node:path";

import type { BodyId } from "../schemas/natalPositions.schema.js";
import { EphemerisUnavailableError } from "./errors.js";
import {
  assertSupportedInstant,
  type EphemerisProvider,
  type PositionQuery,
} from "./ephemerisProvider.js";

const require = createRequire(import.meta.url);

const REQUIRED_PREFIXES = ["sepl_", "semo_"];

/**
 * The subset of the `swisseph` binding used here. Loaded lazily so the range
 * guard and the rest of the pipeline work without the native module.
 */
interface SwissephBinding {
  SE_GREG_CAL: number;
  SE_SUN: number;
  SE_MOON: number;
  SE_MERCURY: number;
  SE_VENUS: number;
  SE_MARS: number;
  SE_JUPITER: number;
  SE_SATURN: number;
  SEFLG_SWIEPH: number;
  SEFLG_MOSEPH: number;
  SEFLG_SPEED: number;
  SEFLG_TOPOCTR: number;
  swe_set_ephe_path(path: string): void;
  swe_set_topo(geolon: number, geolat: number, altitude: number): void;
  swe_julday(year: number, month: number, day: number, hour: number, gregflag: number): number;
  swe_calc_ut(tjd_ut: number, ipl: number, iflag: number): unknown;
}

let binding: SwissephBinding | undefined;

function loadBinding(): SwissephBinding {
  if (binding) return binding;
  try {
    const loaded: SwissephBinding = require("swisseph");
    binding = loaded;
    return loaded;
  } catch (err) {
    throw new EphemerisUnavailableError(
      "Swiss Ephemeris binding (swisseph) could not be loaded",
      undefined,
      { cause: err }
    );
  }
}

function bodyCode(swe: SwissephBinding, body: BodyId): number {
  switch (body) {
    case "sun":
      return swe.SE_SUN;
    case "moon":
      return swe.SE_MOON;
    case "mercury":
      return swe.SE_MERCURY;
    case "venus":
      return swe.SE_VENUS;
    case "mars":
      return swe.SE_MARS;
    case "jupiter":
      return swe.SE_JUPITER;
    case "saturn":
      return swe.SE_SATURN;
  }
}

/**
 * Check that a Swiss Ephemeris data directory holds the planetary and lunar
 * .se1 files. Throws with the reason when it does not.
 */
export function ensureEphePath(ephePath: string): string {
  const resolved = path.resolve(ephePath);
  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris data files not found at ${resolved}. ` +
        "Point SWISSEPH_PATH at a directory of .se1 files or leave it unset."
    );
  }

  if (!stats.isDirectory()) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris path ${resolved} is not a directory.`
    );
  }

  const se1Files = fs
    .readdirSync(resolved)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris .se1 files incomplete in ${resolved}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ") || "none"}.`
    );
  }
  return resolved;
}

function julianDayUT(swe: SwissephBinding, instant: Date): number {
  const hour =
    instant.getUTCHours() +
    instant.getUTCMinutes() / 60 +
    instant.getUTCSeconds() / 3600;
  const jd = swe.swe_julday(
    instant.getUTCFullYear(),
    instant.getUTCMonth() + 1,
    instant.getUTCDate(),
    hour,
    swe.SE_GREG_CAL
  );
  if (!Number.isFinite(jd)) {
    throw new EphemerisUnavailableError(
      "Failed to compute Julian Day",
      instant.toISOString()
    );
  }
  return jd;
}

function readNumber(result: object, key: string): number | undefined {
  const value: unknown = Reflect.get(result, key);
  return typeof value === "number" ? value : undefined;
}

function readCalcResult(
  result: unknown,
  instant: Date,
  body: BodyId
): { longitude: number; flags: number | undefined } {
  if (!result || typeof result !== "object") {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris returned no result for ${body}`,
      instant.toISOString()
    );
  }

  const error: unknown = Reflect.get(result, "error");
  if (typeof error === "string" && error.length > 0) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris failed for ${body}: ${error}`,
      instant.toISOString()
    );
  }

  const flags = readNumber(result, "rflag") ?? readNumber(result, "flag");
  if (typeof flags === "number" && flags < 0) {
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris calculation failed for ${body}`,
      instant.toISOString()
    );
  }

  const longitude = readNumber(result, "longitude");
  if (longitude === undefined || !Number.isFinite(longitude)) {
    const keys = Object.keys(result).join(", ") || "none";
    throw new EphemerisUnavailableError(
      `Swiss Ephemeris returned invalid data for ${body} (keys: ${keys}).`,
      instant.toISOString()
    );
  }
  return { longitude, flags };
}

export type SwissEphemerisOptions = {
  /** Directory of .se1 files. Unset → built-in Moshier theory (no files needed). */
  ephePath?: string;
  /** Observer-centred positions at the query's latitude/longitude instead of geocentric. */
  topocentric?: boolean;
};

/**
 * Tropical ecliptic longitudes from the Swiss Ephemeris.
 */
export function createSwissEphemeris(
  options: SwissEphemerisOptions = {}
): EphemerisProvider & { mode: "swieph" | "moshier" } {
  const ephePath = options.ephePath ? ensureEphePath(options.ephePath) : undefined;
  const mode = ephePath ? "swieph" : "moshier";
  let initialized = false;

  function init(): SwissephBinding {
    const swe = loadBinding();
    if (!initialized) {
      if (ephePath) swe.swe_set_ephe_path(ephePath);
      initialized = true;
    }
    return swe;
  }

  return {
    engine: `swisseph:${mode}${options.topocentric ? ":topocentric" : ""}`,
    mode,
    positionOf(query: PositionQuery): number {
      assertSupportedInstant(query.instant_utc);
      const swe = init();

      let flags = (mode === "swieph" ? swe.SEFLG_SWIEPH : swe.SEFLG_MOSEPH) | swe.SEFLG_SPEED;
      if (options.topocentric) {
        swe.swe_set_topo(query.longitude, query.latitude, 0);
        flags |= swe.SEFLG_TOPOCTR;
      }

      const jd = julianDayUT(swe, query.instant_utc);
      const result = swe.swe_calc_ut(jd, bodyCode(swe, query.body), flags);
      const { longitude, flags: returned } = readCalcResult(
        result,
        query.instant_utc,
        query.body
      );

      if (mode === "swieph" && typeof returned === "number") {
        if (returned & swe.SEFLG_MOSEPH) {
          throw new EphemerisUnavailableError(
            "Swiss Ephemeris fell back to Moshier (SEFLG_MOSEPH) unexpectedly",
            query.instant_utc.toISOString()
          );
        }
      }
      return longitude;
    },
  };
}
