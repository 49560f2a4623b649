import { z } from "zod";

/**
 * Zod schema for natal positions.
 *
 * Tropical zodiac, 0° = aries. Longitudes are normalized before a sign is
 * derived, so `longitude` is always in [0, 360) and `degree_in_sign` in [0, 30).
 */

export const SIGN_NAMES = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export const BODY_IDS = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
] as const;

export const SignNameSchema = z.enum(SIGN_NAMES);
export const BodyIdSchema = z.enum(BODY_IDS);

export const CelestialPositionSchema = z.object({
  body: BodyIdSchema,
  longitude: z.number().min(0).lt(360),
  sign: SignNameSchema,
  sign_index: z.number().int().min(0).max(11),
  degree_in_sign: z.number().min(0).lt(30),
});

export const NatalPositionsSchema = z
  .array(CelestialPositionSchema)
  .length(BODY_IDS.length)
  .refine(
    (positions) => positions.every((p, i) => p.body === BODY_IDS[i]),
    { message: "positions must list every tracked body once, in body order" }
  );

export type SignName = z.infer<typeof SignNameSchema>;
export type BodyId = z.infer<typeof BodyIdSchema>;
export type CelestialPosition = z.infer<typeof CelestialPositionSchema>;
