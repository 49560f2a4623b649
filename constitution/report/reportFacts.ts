/**
 * ReportFacts: everything known about one request, and the only input the
 * text generator and the fallback renderer receive. Built per request,
 * frozen, never stored.
 */

import type { CelestialPosition } from "../../astro/schemas/natalPositions.schema.js";
import type { Archetype } from "../archetypes/archetypeTable.js";
import {
  computeTendencyScores,
  lackingElements,
  rankElements,
  toElementPercentages,
  type Element,
  type ElementBalance,
  type ElementRecord,
} from "../classification/elements.js";
import { formatBirthLocal, type BirthInput } from "../input/birthInput.schema.js";
import type { GeoReference } from "../regions/regionTable.js";
import { DISCLAIMER } from "./reportTargets.js";

export type ReportFacts = Readonly<{
  birth: BirthInput;
  birth_local: string;
  geo: GeoReference;
  instant_utc: string;
  positions: readonly CelestialPosition[];
  element_balance: ElementBalance;
  tendency_scores: ElementRecord;
  element_percentages: ElementRecord;
  dominant_elements: readonly Element[];
  lacking_elements: readonly Element[];
  archetype: Archetype;
  disclaimer: string;
}>;

export function buildReportFacts(input: {
  birth: BirthInput;
  geo: GeoReference;
  instant_utc: Date;
  positions: readonly CelestialPosition[];
  element_balance: ElementBalance;
  archetype: Archetype;
}): ReportFacts {
  const tendency_scores = computeTendencyScores(input.element_balance);
  return Object.freeze({
    birth: input.birth,
    birth_local: formatBirthLocal(input.birth),
    geo: input.geo,
    instant_utc: input.instant_utc.toISOString(),
    positions: input.positions,
    element_balance: input.element_balance,
    tendency_scores,
    element_percentages: toElementPercentages(tendency_scores),
    dominant_elements: Object.freeze(rankElements(input.element_balance)),
    lacking_elements: Object.freeze(lackingElements(input.element_balance)),
    archetype: input.archetype,
    disclaimer: DISCLAIMER,
  });
}

export function positionOf(facts: ReportFacts, body: CelestialPosition["body"]): CelestialPosition {
  const position = facts.positions.find((p) => p.body === body);
  if (!position) {
    throw new Error(`ReportFacts has no position for ${body}`);
  }
  return position;
}
