import { describe, expect, it } from "vitest";
import { computeNatalPositions } from "../../../astro/computeNatalPositions.js";
import { createTableEphemeris } from "../../../astro/ephemeris/tableEphemeris.js";
import { ELEMENTS } from "../../classification/elements.js";
import { TARO_LONGITUDES } from "../../report/__tests__/fixtures.js";
import {
  listArchetypes,
  resolveArchetype,
  resolveArchetypeForPositions,
} from "../archetypeTable.js";

describe("archetype table", () => {
  it("has sixteen distinct archetypes", () => {
    const all = listArchetypes();
    expect(all).toHaveLength(16);
    expect(new Set(all.map((a) => a.id)).size).toBe(16);
    expect(new Set(all.map((a) => a.display_name)).size).toBe(16);
  });

  it("resolves every sun/moon element pair to its own archetype", () => {
    const seen = new Set<string>();
    for (const sun of ELEMENTS) {
      for (const moon of ELEMENTS) {
        const archetype = resolveArchetype(sun, moon);
        expect(archetype.key).toBe(`${sun}:${moon}`);
        expect(archetype.sun_element).toBe(sun);
        expect(archetype.moon_element).toBe(moon);
        seen.add(archetype.id);
      }
    }
    expect(seen.size).toBe(16);
  });

  it("maps earth sun and air moon to the Garden", () => {
    const garden = resolveArchetype("earth", "air");
    expect(garden.id).toBe("garden");
    expect(garden.display_name).toBe("The Garden（庭園）");
    expect(garden.tendency_tags).toEqual(["調和", "計画性", "育成力"]);
  });

  it("depends only on the sun and moon", () => {
    const at = (longitudes: typeof TARO_LONGITUDES) =>
      computeNatalPositions(
        { instant_utc: new Date("1990-05-15T05:30:00Z"), latitude: 35.6762, longitude: 139.6503 },
        createTableEphemeris(longitudes)
      );
    const base = resolveArchetypeForPositions(at(TARO_LONGITUDES));
    const shifted = resolveArchetypeForPositions(
      at({ ...TARO_LONGITUDES, mercury: 200, venus: 250, mars: 5, jupiter: 95, saturn: 130 })
    );
    expect(shifted).toBe(base);
  });
});
