import { z } from "zod";

import type { LocalCivilInstant } from "../../astro/localTime.js";
import { InvalidInputError } from "../errors.js";

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Integer field: a number, or a string of decimal digits (form posts).
 * Blank strings, null, booleans and hex or exponent forms are rejected.
 */
function wholeNumber(min: number, max: number) {
  return z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .regex(/^\d+$/, "Expected decimal digits")
        .transform(Number),
    ])
    .pipe(z.number().int().min(min).max(max));
}

/**
 * Birth request fields. Seconds are not accepted. Whether the region is
 * recognized is decided by the region table, not here.
 */
export const BirthInputSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    year: wholeNumber(1, 9999),
    month: wholeNumber(1, 12),
    day: wholeNumber(1, 31),
    hour: wholeNumber(0, 23),
    minute: wholeNumber(0, 59),
    region: z.string().trim().min(1),
  })
  .superRefine((input, ctx) => {
    const max = daysInMonth(input.year, input.month);
    if (input.day > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["day"],
        message: `${input.year}-${input.month} has only ${max} days`,
      });
    }
  });

export type BirthInput = Readonly<z.infer<typeof BirthInputSchema>> & LocalCivilInstant;

export function parseBirthInput(raw: unknown): BirthInput {
  const parsed = BirthInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(
      parsed.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return Object.freeze(parsed.data);
}

/** "1990年5月15日 14時30分" */
export function formatBirthLocal(input: LocalCivilInstant): string {
  const minute = String(input.minute).padStart(2, "0");
  return `${input.year}年${input.month}月${input.day}日 ${input.hour}時${minute}分`;
}
