// providers/anthropic.ts
import Anthropic from "@anthropic-ai/sdk";

import { SYSTEM_PROMPT } from "../core/context.js";
import {
  errorMessage,
  missingCredentialResponse,
  ProviderCallError,
  successResponse,
} from "../core/errors.js";
import type {
  AdapterInput,
  CallSettings,
  ProviderAdapter,
} from "../core/types.js";
import { guardedCall, resolveCredential, systemText } from "./shared.js";

type MessageParams = Anthropic.Messages.MessageCreateParamsNonStreaming;
type MessageParam = Anthropic.Messages.MessageParam;

export type AnthropicResult = Readonly<{
  model: string;
  content: ReadonlyArray<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}>;

export type AnthropicClient = Readonly<{
  create(params: MessageParams): Promise<AnthropicResult>;
}>;

export type AnthropicClientFactory = (
  opts: Readonly<{ apiKey: string; timeoutMs: number }>,
) => AnthropicClient;

export const createAnthropicClient: AnthropicClientFactory = (opts) => {
  const client = new Anthropic({
    apiKey: opts.apiKey,
    timeout: opts.timeoutMs,
    maxRetries: 0,
  });
  return { create: (params) => client.messages.create(params) };
};

/**
 * Anthropic takes the system text separately and has no system role in
 * messages, so system entries in the history are dropped.
 */
export function toAnthropic(input: AdapterInput): {
  system: string;
  messages: MessageParam[];
} {
  if (input.kind === "prompt") {
    return {
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: input.prompt }],
    };
  }

  const ctx = input.context;
  const messages: MessageParam[] = [];
  for (const h of ctx.history) {
    if (h.role === "system") continue;
    messages.push({ role: h.role, content: h.content });
  }
  messages.push({ role: "user", content: ctx.userMessage });

  return { system: systemText(ctx), messages };
}

function extractText(res: AnthropicResult): string {
  const parts: string[] = [];
  for (const block of res.content) {
    if (block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    }
  }
  return parts.join("");
}

export type AnthropicAdapterOptions = Readonly<{
  settings: CallSettings;
  createClient?: AnthropicClientFactory;
}>;

export function createAnthropicAdapter(
  opts: AnthropicAdapterOptions,
): ProviderAdapter {
  const createClient = opts.createClient ?? createAnthropicClient;

  return {
    provider: "anthropic",
    async call(model, input, credential) {
      const meta = { provider: "anthropic" as const, label: "Anthropic", model };

      const apiKey = resolveCredential("anthropic", credential);
      if (!apiKey) return missingCredentialResponse(meta);

      return guardedCall(meta, async () => {
        let client: AnthropicClient;
        try {
          client = createClient({ apiKey, timeoutMs: opts.settings.timeoutMs });
        } catch (e) {
          throw new ProviderCallError(
            "unsupported_capability",
            `anthropic library not installed: ${errorMessage(e)}`,
          );
        }

        const { system, messages } = toAnthropic(input);
        const res = await client.create({
          model,
          system,
          messages,
          max_tokens: opts.settings.maxTokens,
          temperature: opts.settings.temperature,
        });

        const text = extractText(res);
        if (!text) {
          if (res.stop_reason === "refusal") {
            throw new ProviderCallError("content_blocked", "Refused by the model");
          }
          throw new ProviderCallError("provider_failure", "No response generated");
        }

        return successResponse(
          { provider: "anthropic", model: res.model || model },
          text,
          res.usage.input_tokens + res.usage.output_tokens,
        );
      });
    },
  };
}
