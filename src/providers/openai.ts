// providers/openai.ts
// OpenAI chat completions, also used for DeepSeek, Groq and local OpenAI-compatible servers.
import OpenAI from "openai";

import {
  errorMessage,
  missingCredentialResponse,
  ProviderCallError,
  successResponse,
} from "../core/errors.js";
import type {
  AdapterInput,
  CallSettings,
  CredentialedProvider,
  ProviderAdapter,
  ProviderTag,
} from "../core/types.js";
import {
  guardedCall,
  resolveCredential,
  toChatTurns,
  type ChatTurn,
} from "./shared.js";

type ChatParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

/** The slice of a chat completion this adapter reads. */
export type ChatCompletionResult = Readonly<{
  model: string;
  choices: ReadonlyArray<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { total_tokens: number } | null;
}>;

export type ChatCompletionsClient = Readonly<{
  complete(params: ChatParams): Promise<ChatCompletionResult>;
}>;

export type OpenAiClientOptions = Readonly<{
  apiKey: string;
  baseURL?: string;
  timeoutMs: number;
}>;

export type OpenAiClientFactory = (opts: OpenAiClientOptions) => ChatCompletionsClient;

export const createOpenAiClient: OpenAiClientFactory = (opts) => {
  const client = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    timeout: opts.timeoutMs,
    // no retry policy at this layer
    maxRetries: 0,
  });
  return { complete: (params) => client.chat.completions.create(params) };
};

export type OpenAiCompatibleOptions = Readonly<{
  provider: ProviderTag;
  label: string;
  /**
   * Where the fallback key comes from. null: the server takes no key
   * (local servers), a placeholder is sent instead.
   */
  credentialFrom: CredentialedProvider | null;
  baseUrl?: string;
  settings: CallSettings;
  createClient?: OpenAiClientFactory;
}>;

const NO_KEY_PLACEHOLDER = "not-needed";

function toMessageParam(turn: ChatTurn): ChatMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
    default: {
      const neverRole: never = turn.role;
      throw new Error(`Unsupported role: ${neverRole}`);
    }
  }
}

export function toOpenAiMessages(input: AdapterInput): ChatMessageParam[] {
  return toChatTurns(input).map(toMessageParam);
}

export function createOpenAiCompatibleAdapter(
  opts: OpenAiCompatibleOptions,
): ProviderAdapter {
  const createClient = opts.createClient ?? createOpenAiClient;

  return {
    provider: opts.provider,
    async call(model, input, credential) {
      const meta = { provider: opts.provider, label: opts.label, model };

      const apiKey =
        opts.credentialFrom === null
          ? credential?.trim() || NO_KEY_PLACEHOLDER
          : resolveCredential(opts.credentialFrom, credential);
      if (!apiKey) return missingCredentialResponse(meta);

      return guardedCall(meta, async () => {
        let client: ChatCompletionsClient;
        try {
          client = createClient({
            apiKey,
            baseURL: opts.baseUrl,
            timeoutMs: opts.settings.timeoutMs,
          });
        } catch (e) {
          throw new ProviderCallError(
            "unsupported_capability",
            `openai library not installed: ${errorMessage(e)}`,
          );
        }

        const res = await client.complete({
          model,
          messages: toOpenAiMessages(input),
          temperature: opts.settings.temperature,
          max_tokens: opts.settings.maxTokens,
        });

        const choice = res.choices[0];
        const text = choice?.message.content ?? "";
        if (!text) {
          if (choice?.finish_reason === "content_filter") {
            throw new ProviderCallError("content_blocked", "Content filtered");
          }
          throw new ProviderCallError("provider_failure", "No response generated");
        }

        return successResponse(
          { provider: opts.provider, model: res.model || model },
          text,
          res.usage?.total_tokens ?? 0,
        );
      });
    },
  };
}
