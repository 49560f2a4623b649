import { GenerationServiceError } from "../errors.js";
import type { ReportFacts } from "./reportFacts.js";
import type { ReportTemplateId } from "./reportTargets.js";

export type GenerationRequest = {
  template_id: ReportTemplateId;
  facts: ReportFacts;
  target_length: number;
  /** Aborted by the caller when its timeout fires. */
  signal?: AbortSignal;
};

/**
 * Prose generation boundary. Resolves with the generated text or rejects
 * with GenerationTimeoutError / GenerationServiceError.
 */
export interface TextGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

/**
 * Deterministic stand-in: every request goes to `responder`, and is recorded.
 */
export function createScriptedTextGenerator(
  responder: (request: GenerationRequest) => string | Promise<string>
): TextGenerator & { requests: GenerationRequest[] } {
  const requests: GenerationRequest[] = [];
  return {
    name: "scripted",
    requests,
    async generate(request) {
      requests.push(request);
      return responder(request);
    },
  };
}

/**
 * Generator that always fails; forces the deterministic renderer.
 */
export function createUnavailableTextGenerator(
  reason = "text generation disabled"
): TextGenerator {
  return {
    name: "unavailable",
    async generate() {
      throw new GenerationServiceError(reason, "provider_error");
    },
  };
}
