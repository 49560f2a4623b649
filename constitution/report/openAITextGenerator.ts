import { GenerationServiceError, GenerationTimeoutError } from "../errors.js";
import { buildReportPrompt } from "./buildReportPrompt.js";
import { invokeLLM, REPORT_LLM_CONFIG, type LLMInvocationConfig } from "./invokeLLM.js";
import { REPORT_TARGETS } from "./reportTargets.js";
import type { TextGenerator } from "./textGenerator.js";

/**
 * Chat-completions backed generator. One request per call, no retries.
 */
export function createOpenAITextGenerator(options: {
  api_key?: string;
  model?: string;
  timeout_ms?: number;
}): TextGenerator {
  return {
    name: "openai",
    async generate(request) {
      const target = request.template_id === "short_report" ? REPORT_TARGETS.short : REPORT_TARGETS.detailed;
      const config: LLMInvocationConfig = {
        ...REPORT_LLM_CONFIG,
        api_key: options.api_key,
        model: options.model ?? REPORT_LLM_CONFIG.model,
        timeout_ms: options.timeout_ms ?? REPORT_LLM_CONFIG.timeout_ms,
        max_tokens: target.max_tokens,
      };

      const prompt = buildReportPrompt(request.template_id, request.facts, request.target_length);
      const result = await invokeLLM(prompt, config, request.signal);

      if (result.status === "ok") {
        return result.text;
      }
      if (result.error_type === "timeout") {
        throw new GenerationTimeoutError(config.timeout_ms);
      }
      throw new GenerationServiceError(result.message, result.error_type);
    },
  };
}
