import { z } from "zod";

import type { AssembledPrompt } from "./buildReportPrompt.js";

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export type LLMInvocationConfig = {
  model: string;
  api_key?: string;
  temperature: number;
  max_tokens: number;
  timeout_ms: number;
};

export type LLMInvocationResult =
  | {
      status: "ok";
      text: string;
      model: string;
      usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
      };
    }
  | {
      status: "error";
      error_type: "timeout" | "provider_error" | "invalid_response" | "unknown";
      message: string;
    };

export const REPORT_LLM_CONFIG: LLMInvocationConfig = {
  model: "gpt-4.1-mini",
  temperature: 0.7,
  max_tokens: 2_000,
  timeout_ms: 45_000,
};

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export function buildChatCompletionBody(prompt: AssembledPrompt, config: LLMInvocationConfig) {
  return {
    model: config.model,
    messages: [
      { role: "system", content: prompt.system_prompt },
      { role: "user", content: prompt.user_prompt },
    ],
    temperature: config.temperature,
    max_tokens: config.max_tokens,
    stream: false,
  };
}

/**
 * One controller that aborts on our own deadline or when the caller's signal
 * fires. `release` must run once the request settles.
 */
function linkAbort(timeout_ms: number, signal?: AbortSignal) {
  const controller = new AbortController();
  const abort = () => controller.abort();
  const timer = setTimeout(abort, timeout_ms);
  if (signal?.aborted) abort();
  signal?.addEventListener("abort", abort, { once: true });

  return {
    signal: controller.signal,
    release() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", abort);
    },
  };
}

async function readCompletion(response: Response, fallbackModel: string): Promise<LLMInvocationResult> {
  if (!response.ok) {
    const errorText = await safeReadError(response);
    return {
      status: "error",
      error_type: "provider_error",
      message: `OpenAI error ${response.status}: ${errorText}`,
    };
  }

  const parsed = ChatCompletionSchema.safeParse(await response.json());
  if (!parsed.success) {
    return { status: "error", error_type: "invalid_response", message: "OpenAI returned an unexpected body" };
  }

  const content = parsed.data.choices[0].message.content;
  if (typeof content !== "string" || content.trim() === "") {
    return { status: "error", error_type: "invalid_response", message: "OpenAI returned empty content" };
  }

  return {
    status: "ok",
    text: content,
    model: parsed.data.model ?? fallbackModel,
    usage: parsed.data.usage,
  };
}

export async function invokeLLM(
  prompt: AssembledPrompt,
  config: LLMInvocationConfig = REPORT_LLM_CONFIG,
  signal?: AbortSignal
): Promise<LLMInvocationResult> {
  if (!config.api_key) {
    return { status: "error", error_type: "provider_error", message: "OPENAI_API_KEY is not set" };
  }

  const link = linkAbort(config.timeout_ms, signal);
  try {
    const response = await fetch(CHAT_COMPLETIONS_URL, {
      method: "POST",
      signal: link.signal,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.api_key}`,
      },
      body: JSON.stringify(buildChatCompletionBody(prompt, config)),
    });
    return await readCompletion(response, config.model);
  } catch (err) {
    if (link.signal.aborted) {
      return { status: "error", error_type: "timeout", message: "LLM invocation timed out" };
    }
    return {
      status: "error",
      error_type: "provider_error",
      message: err instanceof Error ? err.message : "OpenAI invocation failed",
    };
  } finally {
    link.release();
  }
}

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}
