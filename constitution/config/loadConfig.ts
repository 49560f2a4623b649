import { z } from "zod";

import { ConfigError } from "../errors.js";

const optionalString = z.string().trim().min(1).optional();

const ConfigSchema = z.object({
  OPENAI_API_KEY: optionalString,
  CONSTITUTION_LLM_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  CONSTITUTION_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
  CONSTITUTION_LENGTH_TOLERANCE: z.coerce.number().gt(0).lt(1).default(0.2),
  CONSTITUTION_ELEMENT_WEIGHTING: z.enum(["equal", "luminaries"]).default("equal"),
  SWISSEPH_PATH: optionalString,
});

export type ConstitutionConfig = {
  openai_api_key?: string;
  llm_model: string;
  llm_timeout_ms: number;
  length_tolerance: number;
  element_weighting: "equal" | "luminaries";
  swisseph_path?: string;
};

/**
 * Read configuration from environment variables. Empty strings count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ConstitutionConfig {
  const emptyAsUnset = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = ConfigSchema.safeParse(emptyAsUnset);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const c = parsed.data;
  return {
    openai_api_key: c.OPENAI_API_KEY,
    llm_model: c.CONSTITUTION_LLM_MODEL,
    llm_timeout_ms: c.CONSTITUTION_LLM_TIMEOUT_MS,
    length_tolerance: c.CONSTITUTION_LENGTH_TOLERANCE,
    element_weighting: c.CONSTITUTION_ELEMENT_WEIGHTING,
    swisseph_path: c.SWISSEPH_PATH,
  };
}
