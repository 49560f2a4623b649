/**
 * Element classification: sign → element, element balance, tendency scores.
 */

import type {
  CelestialPosition,
  SignName,
} from "../../astro/schemas/natalPositions.schema.js";
import { assertPolicyTotal, ELEMENT_TOTAL, type WeightingPolicy, type WeightingPolicyId } from "./weightingPolicy.js";

export const ELEMENTS = ["fire", "earth", "air", "water"] as const;
export type Element = (typeof ELEMENTS)[number];

export type ElementRecord = Readonly<Record<Element, number>>;

/** Cyclic assignment from aries: fire, earth, air, water. */
export const SIGN_ELEMENTS: Readonly<Record<SignName, Element>> = Object.freeze({
  aries: "fire",
  taurus: "earth",
  gemini: "air",
  cancer: "water",
  leo: "fire",
  virgo: "earth",
  libra: "air",
  scorpio: "water",
  sagittarius: "fire",
  capricorn: "earth",
  aquarius: "air",
  pisces: "water",
});

export function elementForSign(sign: SignName): Element {
  return SIGN_ELEMENTS[sign];
}

export type ElementBalance = Readonly<{
  weights: ElementRecord;
  total: number;
  policy: WeightingPolicyId;
}>;

function emptyRecord(): Record<Element, number> {
  return { fire: 0, earth: 0, air: 0, water: 0 };
}

export function computeElementBalance(
  positions: readonly CelestialPosition[],
  policy: WeightingPolicy
): ElementBalance {
  assertPolicyTotal(policy);
  const weights = emptyRecord();
  for (const position of positions) {
    weights[elementForSign(position.sign)] += policy.weights[position.body];
  }
  return Object.freeze({
    weights: Object.freeze(weights),
    total: ELEMENT_TOTAL,
    policy: policy.id,
  });
}

/** weight / total per element; the four scores sum to 1. */
export function computeTendencyScores(balance: ElementBalance): ElementRecord {
  const scores = emptyRecord();
  for (const element of ELEMENTS) {
    scores[element] = balance.weights[element] / balance.total;
  }
  return Object.freeze(scores);
}

/** Display percentages, one decimal. */
export function toElementPercentages(scores: ElementRecord): ElementRecord {
  const pct = emptyRecord();
  for (const element of ELEMENTS) {
    pct[element] = Math.round(scores[element] * 1000) / 10;
  }
  return Object.freeze(pct);
}

/**
 * Elements ordered strongest first. Equal weights keep canonical order
 * (fire, earth, air, water).
 */
export function rankElements(balance: ElementBalance): Element[] {
  return [...ELEMENTS].sort((a, b) => {
    const diff = balance.weights[b] - balance.weights[a];
    if (Math.abs(diff) > 1e-9) return diff;
    return ELEMENTS.indexOf(a) - ELEMENTS.indexOf(b);
  });
}

export function lackingElements(balance: ElementBalance): Element[] {
  return ELEMENTS.filter((element) => balance.weights[element] <= 1e-9);
}
