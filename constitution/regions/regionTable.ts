import { z } from "zod";

import type { LocalCivilInstant } from "../../astro/localTime.js";
import { UnsupportedRegionError } from "../errors.js";
import regionRows from "./regions.json" with { type: "json" };
import { utcOffsetMinutesAt } from "./utcOffset.js";

const RegionSchema = z.object({
  code: z.string().regex(/^[a-z]+$/),
  name_ja: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timezone: z.string().min(1),
});

export type Region = Readonly<z.infer<typeof RegionSchema>>;

export type GeoReference = Readonly<{
  region_code: string;
  region_name: string;
  latitude: number;
  longitude: number;
  timezone: string;
  utc_offset_minutes: number;
}>;

const REGIONS: readonly Region[] = Object.freeze(
  z.array(RegionSchema).min(1).parse(regionRows).map((r) => Object.freeze(r))
);

/**
 * Lookup keys: romanized code (any case), full Japanese name, and the
 * Japanese name without its 都/府/県 suffix.
 */
const REGION_INDEX: ReadonlyMap<string, Region> = (() => {
  const index = new Map<string, Region>();
  for (const region of REGIONS) {
    const keys = [region.code, region.name_ja, region.name_ja.replace(/[都府県]$/, "")];
    for (const key of keys) {
      if (index.has(key) && index.get(key) !== region) {
        throw new Error(`Duplicate region key in region table: ${key}`);
      }
      index.set(key, region);
    }
  }
  return index;
})();

export function listRegions(): readonly Region[] {
  return REGIONS;
}

export function findRegion(code: string): Region | undefined {
  const key = code.trim();
  return REGION_INDEX.get(key.toLowerCase()) ?? REGION_INDEX.get(key);
}

export function resolveRegion(code: string, local: LocalCivilInstant): GeoReference {
  const region = findRegion(code);
  if (!region) {
    throw new UnsupportedRegionError(code);
  }
  return Object.freeze({
    region_code: region.code,
    region_name: region.name_ja,
    latitude: region.latitude,
    longitude: region.longitude,
    timezone: region.timezone,
    utc_offset_minutes: utcOffsetMinutesAt(region.timezone, local),
  });
}
