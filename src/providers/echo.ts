// providers/echo.ts
// No network. Reflects the caller's message; the terminal fallback for unknown models.
import {
  renderPrompt,
  USER_TURN_DELIMITER,
  userMessageOf,
} from "../core/context.js";
import { successResponse } from "../core/errors.js";
import type { AdapterInput, ProviderAdapter, ProviderResponse } from "../core/types.js";

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function echoReply(model: string, input: AdapterInput): ProviderResponse {
  const prompt = renderPrompt(input);
  const message = userMessageOf(input);
  // Delimiter check on the flat prompt: a bare message that itself contains
  // "User:" also counts as carrying context.
  const hasContext = prompt.includes(USER_TURN_DELIMITER);

  let reply: string;
  if (hasContext) {
    const contextPart = prompt.split(USER_TURN_DELIMITER)[0]?.trim() ?? "";
    reply =
      `[Echo Mode - ${model}]\n\n` +
      `✅ Context Received (${contextPart.length} chars)\n\n` +
      `📝 Your message: ${message}\n\n` +
      `🤖 Response: I received your message with injected context. In production, this would be processed by ${model}.`;
  } else {
    reply =
      `[Echo Mode - ${model}]\n\n` +
      `📝 Your message: ${message}\n\n` +
      `🤖 Response: I received your message. In production, this would be processed by ${model}.`;
  }

  return successResponse({ provider: "echo", model }, reply, wordCount(prompt));
}

export function createEchoAdapter(): ProviderAdapter {
  return {
    provider: "echo",
    async call(model, input) {
      return echoReply(model, input);
    },
  };
}
