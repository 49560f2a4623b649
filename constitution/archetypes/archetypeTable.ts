/**
 * The sixteen archetypes, keyed by (Sun element, Moon element).
 *
 * Static reference data: validated once at load, frozen, never computed per
 * request. The lookup is total over the 4×4 element pairs.
 */

import { z } from "zod";

import type { CelestialPosition } from "../../astro/schemas/natalPositions.schema.js";
import { ELEMENTS, elementForSign, type Element } from "../classification/elements.js";
import archetypeRows from "./archetypes.json" with { type: "json" };

export type ArchetypeKey = `${Element}:${Element}`;

const ElementSchema = z.enum(ELEMENTS);

const ArchetypeSchema = z.object({
  key: z.string(),
  id: z.string().regex(/^[a-z]+$/),
  display_name: z.string().min(1),
  short_description: z.string().min(1),
  tendency_tags: z.array(z.string().min(1)).min(1),
  narrative: z.string().min(1),
  constitution: z.object({
    energy: z.string().min(1),
    rhythm: z.string().min(1),
    care_focus: z.string().min(1),
  }),
});

export type Archetype = Readonly<{
  key: ArchetypeKey;
  id: string;
  sun_element: Element;
  moon_element: Element;
  display_name: string;
  short_description: string;
  tendency_tags: readonly string[];
  narrative: string;
  constitution: Readonly<{ energy: string; rhythm: string; care_focus: string }>;
}>;

export function archetypeKey(sun: Element, moon: Element): ArchetypeKey {
  return `${sun}:${moon}`;
}

function parseKey(key: string): { sun: Element; moon: Element } {
  const [sun, moon, ...rest] = key.split(":");
  if (rest.length) {
    throw new Error(`Malformed archetype key: ${key}`);
  }
  return { sun: ElementSchema.parse(sun), moon: ElementSchema.parse(moon) };
}

const ARCHETYPES: ReadonlyMap<ArchetypeKey, Archetype> = (() => {
  const rows = z.array(ArchetypeSchema).parse(archetypeRows);
  const table = new Map<ArchetypeKey, Archetype>();
  const ids = new Set<string>();
  const names = new Set<string>();

  for (const row of rows) {
    const { sun, moon } = parseKey(row.key);
    const key = archetypeKey(sun, moon);
    if (table.has(key)) throw new Error(`Duplicate archetype key: ${key}`);
    if (ids.has(row.id)) throw new Error(`Duplicate archetype id: ${row.id}`);
    if (names.has(row.display_name)) {
      throw new Error(`Duplicate archetype name: ${row.display_name}`);
    }
    ids.add(row.id);
    names.add(row.display_name);
    table.set(
      key,
      Object.freeze({
        key,
        id: row.id,
        sun_element: sun,
        moon_element: moon,
        display_name: row.display_name,
        short_description: row.short_description,
        narrative: row.narrative,
        tendency_tags: Object.freeze([...row.tendency_tags]),
        constitution: Object.freeze({ ...row.constitution }),
      })
    );
  }

  for (const sun of ELEMENTS) {
    for (const moon of ELEMENTS) {
      if (!table.has(archetypeKey(sun, moon))) {
        throw new Error(`Archetype table is missing ${archetypeKey(sun, moon)}`);
      }
    }
  }
  return table;
})();

export function resolveArchetype(sun: Element, moon: Element): Archetype {
  const archetype = ARCHETYPES.get(archetypeKey(sun, moon));
  if (!archetype) {
    // Unreachable: the table is checked for all sixteen pairs at load.
    throw new Error(`No archetype for ${archetypeKey(sun, moon)}`);
  }
  return archetype;
}

/**
 * Only the Sun and Moon decide the archetype; the other five bodies feed
 * the element balance, not this lookup.
 */
export function resolveArchetypeForPositions(
  positions: readonly CelestialPosition[]
): Archetype {
  const sun = positions.find((p) => p.body === "sun");
  const moon = positions.find((p) => p.body === "moon");
  if (!sun || !moon) {
    throw new Error("Archetype resolution needs both Sun and Moon positions");
  }
  return resolveArchetype(elementForSign(sun.sign), elementForSign(moon.sign));
}

export function listArchetypes(): Archetype[] {
  return [...ARCHETYPES.values()];
}
