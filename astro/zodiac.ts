/**
 * Pure zodiac geometry. No interpretation here.
 */

import { SIGN_NAMES, type SignName } from "./schemas/natalPositions.schema.js";

export const SIGN_WIDTH_DEG = 30;

/**
 * Normalize degrees to the [0, 360) range.
 * Already-normalized values come back unchanged.
 */
export function normalizeLongitude(value: number): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Longitude must be a finite number (got ${value})`);
  }
  let v = value % 360;
  if (v < 0) v += 360;
  // A tiny negative remainder plus 360 can round up to exactly 360.
  if (v >= 360) v -= 360;
  return v === 0 ? 0 : v;
}

export type SignPlacement = {
  sign: SignName;
  sign_index: number;
  degree_in_sign: number;
};

/**
 * Sign slot for an ecliptic longitude: floor(lon / 30) mod 12, degree = lon mod 30.
 */
export function signForLongitude(longitude: number): SignPlacement {
  const lon = normalizeLongitude(longitude);
  const sign_index = Math.floor(lon / SIGN_WIDTH_DEG) % SIGN_NAMES.length;
  return {
    sign: SIGN_NAMES[sign_index],
    sign_index,
    degree_in_sign: lon % SIGN_WIDTH_DEG,
  };
}
