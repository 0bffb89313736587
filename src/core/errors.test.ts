import { describe, expect, it } from "vitest";

import {
  classifyProviderError,
  failureResponse,
  missingCredentialResponse,
  ProviderCallError,
  successResponse,
} from "./errors.js";

const meta = { provider: "openai" as const, label: "OpenAI", model: "gpt-4" };

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("classifyProviderError", () => {
  it("keeps the kind of our own errors", () => {
    expect(classifyProviderError(new ProviderCallError("content_blocked", "x"))).toBe(
      "content_blocked",
    );
  });

  it("reads structured status codes first", () => {
    expect(classifyProviderError(withStatus("denied", 401))).toBe("authentication_rejected");
    expect(classifyProviderError(withStatus("denied", 403))).toBe("authentication_rejected");
    expect(classifyProviderError(withStatus("slow down", 429))).toBe("rate_limit_exceeded");
  });

  it("falls back to message markers", () => {
    expect(classifyProviderError(new Error("You exceeded your current quota"))).toBe(
      "rate_limit_exceeded",
    );
    expect(classifyProviderError(new Error("[429 Too Many Requests] Resource exhausted"))).toBe(
      "rate_limit_exceeded",
    );
    expect(classifyProviderError(new Error("Incorrect API key provided: test-***"))).toBe(
      "authentication_rejected",
    );
  });

  it("does not match markers inside other words", () => {
    expect(classifyProviderError(new Error("Failed to generate content"))).toBe(
      "provider_failure",
    );
    expect(classifyProviderError(new Error("request id 14290 failed"))).toBe("provider_failure");
  });

  it("handles non-Error throws", () => {
    expect(classifyProviderError("rate limit hit")).toBe("rate_limit_exceeded");
    expect(classifyProviderError(undefined)).toBe("provider_failure");
  });
});

describe("envelopes", () => {
  it("builds a success envelope with whole, non-negative tokens", () => {
    expect(successResponse({ provider: "openai", model: "gpt-4" }, "hi", 12.7)).toEqual({
      reply: "hi",
      model: "gpt-4",
      provider: "openai",
      tokens: 12,
      status: "success",
    });
    expect(successResponse({ provider: "openai", model: "gpt-4" }, "hi", Number.NaN).tokens).toBe(
      0,
    );
  });

  it("reports a missing credential", () => {
    expect(missingCredentialResponse(meta)).toEqual({
      reply: "[OpenAI gpt-4] No API key provided",
      model: "gpt-4",
      provider: "openai",
      tokens: 0,
      status: "error",
      error: "No API key",
      errorKind: "missing_credential",
    });
  });

  it("uses fixed texts for rate limits and auth failures", () => {
    const limited = failureResponse(meta, withStatus("429 Too Many Requests", 429));
    expect(limited.reply).toBe(
      "[OpenAI gpt-4] Rate limit exceeded. Please wait and try again, or check your API quota.",
    );
    expect(limited.error).toBe("Rate limit exceeded - quota exhausted");

    const rejected = failureResponse(meta, withStatus("bad key", 401));
    expect(rejected.reply).toBe("[OpenAI gpt-4] Authentication failed. Please check your API key.");
    expect(rejected.error).toBe("bad key");
  });

  it("prefixes foreign failures with Error:", () => {
    const res = failureResponse(meta, new Error("socket hang up"));
    expect(res.reply).toBe("[OpenAI gpt-4] Error: socket hang up");
    expect(res.error).toBe("socket hang up");
    expect(res.errorKind).toBe("provider_failure");
    expect(res.tokens).toBe(0);
  });

  it("keeps our own failure messages as they are", () => {
    const res = failureResponse(
      meta,
      new ProviderCallError("provider_failure", "No response generated"),
    );
    expect(res.reply).toBe("[OpenAI gpt-4] No response generated");
  });

  it("reports blocked content", () => {
    const res = failureResponse(meta, new ProviderCallError("content_blocked", "Blocked: SAFETY"));
    expect(res.reply).toBe("[OpenAI gpt-4] Content was blocked by safety filters");
    expect(res.error).toBe("Content blocked by safety filters");
  });
});
