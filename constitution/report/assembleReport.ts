/**
 * Report assembly.
 *
 *   COMPUTED_FACTS → GENERATING → RENDERED
 *                              ↘ FALLBACK_RENDERED
 *
 * One generation attempt per report, bounded by timeout_ms. Any failure of
 * that attempt (error, timeout, empty or out-of-band text) lands in
 * FALLBACK_RENDERED; nothing here throws for a generation problem.
 */

import { GenerationServiceError, GenerationTimeoutError } from "../errors.js";
import { reportLogHelpers } from "../logging/reportLog.js";
import type { ReportFacts } from "./reportFacts.js";
import { REPORT_TARGETS, type ReportKind } from "./reportTargets.js";
import { renderFallbackReport } from "./renderFallbackReport.js";
import type { GenerationRequest, TextGenerator } from "./textGenerator.js";

export type ReportState = "COMPUTED_FACTS" | "GENERATING" | "RENDERED" | "FALLBACK_RENDERED";

export type FallbackReason = "timeout" | "service_error" | "empty_text" | "too_short" | "too_long";

export type LengthCheck = {
  length: number;
  target: number;
  min: number;
  max: number;
  within: boolean;
};

export type AssembledReport = {
  kind: ReportKind;
  state: Extract<ReportState, "RENDERED" | "FALLBACK_RENDERED">;
  source: "generator" | "fallback";
  text: string;
  character_count: number;
  length_check: LengthCheck | null;
  fallback_reason?: FallbackReason;
  transitions: ReportState[];
};

export type AssembleReportDeps = {
  generator: TextGenerator;
  timeout_ms: number;
  length_tolerance: number;
  request_id: string;
};

/** Characters as the reader counts them (code points, not UTF-16 units). */
export function countCharacters(text: string): number {
  return Array.from(text).length;
}

export function checkReportLength(text: string, target: number, tolerance: number): LengthCheck {
  const length = countCharacters(text);
  const min = Math.round(target * (1 - tolerance));
  const max = Math.round(target * (1 + tolerance));
  return { length, target, min, max, within: length >= min && length <= max };
}

async function generateWithTimeout(
  generator: TextGenerator,
  request: Omit<GenerationRequest, "signal">,
  timeout_ms: number
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationTimeoutError(timeout_ms));
    }, timeout_ms);
  });

  try {
    return await Promise.race([
      generator.generate({ ...request, signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function classifyFailure(err: unknown): { reason: FallbackReason; code: string; message: string } {
  if (err instanceof GenerationTimeoutError) {
    return { reason: "timeout", code: err.code, message: err.message };
  }
  if (err instanceof GenerationServiceError) {
    return { reason: "service_error", code: err.code, message: err.message };
  }
  // Anything else thrown by the collaborator is still a collaborator failure.
  const wrapped = new GenerationServiceError(
    err instanceof Error ? err.message : String(err),
    "unknown",
    { cause: err }
  );
  return { reason: "service_error", code: wrapped.code, message: wrapped.message };
}

export async function assembleReport(
  kind: ReportKind,
  facts: ReportFacts,
  deps: AssembleReportDeps
): Promise<AssembledReport> {
  const target = REPORT_TARGETS[kind];
  const transitions: ReportState[] = ["COMPUTED_FACTS", "GENERATING"];
  const started = Date.now();
  let fallback_reason: FallbackReason;
  let length_check: LengthCheck | null = null;

  reportLogHelpers.generateStarted({
    request_id: deps.request_id,
    report_kind: kind,
    target_length: target.target_length,
  });

  try {
    const text = (
      await generateWithTimeout(
        deps.generator,
        { template_id: target.template_id, facts, target_length: target.target_length },
        deps.timeout_ms
      )
    ).trim();

    if (!text) {
      fallback_reason = "empty_text";
      reportLogHelpers.generateFailed({
        request_id: deps.request_id,
        report_kind: kind,
        error_code: "empty_text",
        error_message: "generator returned empty text",
        duration_ms: Date.now() - started,
      });
    } else {
      length_check = checkReportLength(text, target.target_length, deps.length_tolerance);
      if (length_check.within) {
        reportLogHelpers.generateSucceeded({
          request_id: deps.request_id,
          report_kind: kind,
          character_count: length_check.length,
          duration_ms: Date.now() - started,
        });
        transitions.push("RENDERED");
        return {
          kind,
          state: "RENDERED",
          source: "generator",
          text,
          character_count: length_check.length,
          length_check,
          transitions,
        };
      }

      fallback_reason = length_check.length < length_check.min ? "too_short" : "too_long";
      reportLogHelpers.lengthRejected({
        request_id: deps.request_id,
        report_kind: kind,
        character_count: length_check.length,
        min: length_check.min,
        max: length_check.max,
      });
    }
  } catch (err) {
    const failure = classifyFailure(err);
    fallback_reason = failure.reason;
    reportLogHelpers.generateFailed({
      request_id: deps.request_id,
      report_kind: kind,
      error_code: failure.code,
      error_message: failure.message,
      duration_ms: Date.now() - started,
    });
  }

  const text = renderFallbackReport(kind, facts);
  const character_count = countCharacters(text);
  reportLogHelpers.fallbackRendered({
    request_id: deps.request_id,
    report_kind: kind,
    reason: fallback_reason,
    character_count,
  });
  transitions.push("FALLBACK_RENDERED");

  return {
    kind,
    state: "FALLBACK_RENDERED",
    source: "fallback",
    text,
    character_count,
    length_check,
    fallback_reason,
    transitions,
  };
}
