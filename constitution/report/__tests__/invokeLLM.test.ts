import { afterEach, describe, expect, it, vi } from "vitest";
import { buildChatCompletionBody, invokeLLM, REPORT_LLM_CONFIG } from "../invokeLLM.js";

const prompt = { system_prompt: "system text", user_prompt: "user text" };
const config = { ...REPORT_LLM_CONFIG, api_key: "test-secret" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function hangingFetch() {
  return vi.fn(
    (_url: string, init?: RequestInit) =>
      new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      })
  );
}

describe("invokeLLM", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports a provider error without calling out when no key is configured", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const result = await invokeLLM(prompt, { ...REPORT_LLM_CONFIG, api_key: undefined });

    expect(result).toEqual({
      status: "error",
      error_type: "provider_error",
      message: "OPENAI_API_KEY is not set",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("sends one chat completion request and returns its text", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        model: "gpt-4.1-mini-2025-04-14",
        choices: [{ message: { content: "鑑定文" } }],
        usage: { total_tokens: 42 },
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await invokeLLM(prompt, config);

    expect(result).toEqual({
      status: "ok",
      text: "鑑定文",
      model: "gpt-4.1-mini-2025-04-14",
      usage: { total_tokens: 42 },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(init).toMatchObject({
      method: "POST",
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "gpt-4.1-mini",
      max_tokens: 2_000,
      stream: false,
      messages: [
        { role: "system", content: "system text" },
        { role: "user", content: "user text" },
      ],
    });
  });

  it("sends only the settings this project uses", () => {
    const body = buildChatCompletionBody(prompt, { ...config, temperature: 0.5, max_tokens: 900 });
    expect(Object.keys(body).sort()).toEqual(["max_tokens", "messages", "model", "stream", "temperature"]);
    expect(body).toMatchObject({ temperature: 0.5, max_tokens: 900, stream: false });
  });

  it("maps HTTP failures to provider errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("boom", { status: 500 }))
    );
    expect(await invokeLLM(prompt, config)).toEqual({
      status: "error",
      error_type: "provider_error",
      message: "OpenAI error 500: boom",
    });
  });

  it("rejects empty content", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ choices: [{ message: { content: "  " } }] }))
    );
    const result = await invokeLLM(prompt, config);
    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error_type).toBe("invalid_response");
    }
  });

  it("rejects malformed payloads", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));
    const result = await invokeLLM(prompt, config);
    expect(result).toMatchObject({ status: "error", error_type: "invalid_response" });
  });

  it("times out", async () => {
    vi.stubGlobal("fetch", hangingFetch());
    const result = await invokeLLM(prompt, { ...config, timeout_ms: 10 });
    expect(result).toEqual({
      status: "error",
      error_type: "timeout",
      message: "LLM invocation timed out",
    });
  });

  it("follows the caller's abort signal", async () => {
    vi.stubGlobal("fetch", hangingFetch());
    const controller = new AbortController();
    const pending = invokeLLM(prompt, config, controller.signal);
    controller.abort();
    expect(await pending).toMatchObject({ status: "error", error_type: "timeout" });
  });
});
