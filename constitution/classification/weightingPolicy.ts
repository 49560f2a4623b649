/**
 * Element weighting policies.
 *
 * Every policy distributes the same total (ELEMENT_TOTAL) across the seven
 * bodies so element balances stay comparable as percentages.
 */

import { BODY_IDS, type BodyId } from "../../astro/schemas/natalPositions.schema.js";

export const ELEMENT_TOTAL = 7;

export type WeightingPolicyId = "equal" | "luminaries";

export type WeightingPolicy = {
  id: WeightingPolicyId;
  weights: Readonly<Record<BodyId, number>>;
};

/** One unit per body. */
export const EQUAL_WEIGHTING: WeightingPolicy = {
  id: "equal",
  weights: {
    sun: 1,
    moon: 1,
    mercury: 1,
    venus: 1,
    mars: 1,
    jupiter: 1,
    saturn: 1,
  },
};

/** Sun and Moon count double; the remaining five share what is left. */
export const LUMINARIES_WEIGHTING: WeightingPolicy = {
  id: "luminaries",
  weights: {
    sun: 2,
    moon: 2,
    mercury: 0.6,
    venus: 0.6,
    mars: 0.6,
    jupiter: 0.6,
    saturn: 0.6,
  },
};

const POLICIES: Record<WeightingPolicyId, WeightingPolicy> = {
  equal: EQUAL_WEIGHTING,
  luminaries: LUMINARIES_WEIGHTING,
};

export function assertPolicyTotal(policy: WeightingPolicy): void {
  const sum = BODY_IDS.reduce((acc, body) => acc + policy.weights[body], 0);
  const negative = BODY_IDS.filter((body) => policy.weights[body] < 0);
  if (negative.length) {
    throw new Error(`Weighting policy ${policy.id} has negative weights: ${negative.join(", ")}`);
  }
  if (Math.abs(sum - ELEMENT_TOTAL) > 1e-9) {
    throw new Error(
      `Weighting policy ${policy.id} sums to ${sum}, expected ${ELEMENT_TOTAL}`
    );
  }
}

export function getWeightingPolicy(id: WeightingPolicyId): WeightingPolicy {
  const policy = POLICIES[id];
  assertPolicyTotal(policy);
  return policy;
}
