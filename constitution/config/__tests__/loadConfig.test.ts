import { describe, expect, it } from "vitest";
import { ConfigError } from "../../errors.js";
import { loadConfig } from "../loadConfig.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      openai_api_key: undefined,
      llm_model: "gpt-4.1-mini",
      llm_timeout_ms: 45_000,
      length_tolerance: 0.2,
      element_weighting: "equal",
      swisseph_path: undefined,
    });
  });

  it("reads and coerces configured values", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      CONSTITUTION_LLM_MODEL: "gpt-4o",
      CONSTITUTION_LLM_TIMEOUT_MS: "1500",
      CONSTITUTION_LENGTH_TOLERANCE: "0.1",
      CONSTITUTION_ELEMENT_WEIGHTING: "luminaries",
      SWISSEPH_PATH: "./ephe",
    });
    expect(config).toEqual({
      openai_api_key: "test-secret",
      llm_model: "gpt-4o",
      llm_timeout_ms: 1_500,
      length_tolerance: 0.1,
      element_weighting: "luminaries",
      swisseph_path: "./ephe",
    });
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "", CONSTITUTION_LLM_TIMEOUT_MS: "" });
    expect(config.openai_api_key).toBeUndefined();
    expect(config.llm_timeout_ms).toBe(45_000);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ CONSTITUTION_LENGTH_TOLERANCE: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ CONSTITUTION_LLM_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ CONSTITUTION_ELEMENT_WEIGHTING: "planets" })).toThrow(
      /CONSTITUTION_ELEMENT_WEIGHTING/
    );
  });
});
