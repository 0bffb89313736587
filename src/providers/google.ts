// providers/google.ts
// Gemini through @google/genai, or the older @google/generative-ai when only that one loads.
// The backend is picked once per adapter by probing which library can be imported.
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
import { logEvent } from "../logger.js";
import { guardedCall, resolveCredential } from "./shared.js";

/** Requested names that do not exist upstream map to the nearest available model. */
export const GEMINI_MODEL_REMAP: Readonly<Record<string, string>> = {
  "gemini-2.5-flash": "gemini-2.0-flash",
  "gemini-2.5-pro": "gemini-1.5-pro",
  "gemini-2.0-flash-lite": "gemini-2.0-flash",
};

export function remapGeminiModel(model: string): string {
  return GEMINI_MODEL_REMAP[model] ?? model;
}

export type GeminiContent = {
  role: "user" | "model";
  parts: { text: string }[];
};

export type GeminiResult = Readonly<{
  text?: string;
  /** promptFeedback.blockReason, or "SAFETY" when the candidate was stopped for safety */
  blockReason?: string;
  totalTokens?: number;
}>;

export type GeminiRequest = Readonly<{
  apiKey: string;
  model: string;
  input: AdapterInput;
  settings: CallSettings;
}>;

export type GeminiBackend = Readonly<{
  library: string;
  generate(req: GeminiRequest): Promise<GeminiResult>;
}>;

export type GeminiBackendLoader = () => Promise<GeminiBackend>;

function foldedSystem(input: AdapterInput): string | undefined {
  if (input.kind === "prompt") return undefined;
  const { systemPrompt, memoryBlock } = input.context;
  return memoryBlock ? `${systemPrompt}\n${memoryBlock}` : systemPrompt;
}

/**
 * Gemini has no system role here: the system text is folded into the
 * first user turn. Non-user history entries become "model" turns.
 */
export function toGeminiContents(input: AdapterInput): GeminiContent[] {
  if (input.kind === "prompt") {
    return [{ role: "user", parts: [{ text: input.prompt }] }];
  }

  const ctx = input.context;
  const contents: GeminiContent[] = ctx.history.map((h): GeminiContent => ({
    role: h.role === "user" ? "user" : "model",
    parts: [{ text: h.content }],
  }));
  contents.push({ role: "user", parts: [{ text: ctx.userMessage }] });

  const system = foldedSystem(input);
  const first = contents.find((c) => c.role === "user");
  if (system && first) {
    first.parts = [{ text: `${system}\n\nUser: ${first.parts[0]?.text ?? ""}` }];
  }
  return contents;
}

/**
 * Single prompt for the legacy client: system, memories, a history
 * section, then the user's turn.
 */
export function toLegacyPrompt(input: AdapterInput): string {
  if (input.kind === "prompt") return input.prompt;

  const ctx = input.context;
  let prompt = foldedSystem(input) ?? "";
  if (ctx.history.length) {
    prompt += "\n\n=== Conversation History ===\n";
    for (const h of ctx.history) {
      prompt += `${h.role}: ${h.content}\n`;
    }
  }
  prompt += `\n\nUser: ${ctx.userMessage}`;
  return prompt;
}

function safetyStop(finishReason: string | undefined): string | undefined {
  return finishReason === "SAFETY" ? "SAFETY" : undefined;
}

export const loadGenaiBackend: GeminiBackendLoader = async () => {
  const { GoogleGenAI } = await import("@google/genai");
  return {
    library: "@google/genai",
    async generate({ apiKey, model, input, settings }) {
      const ai = new GoogleGenAI({
        apiKey,
        httpOptions: { timeout: settings.timeoutMs },
      });
      const res = await ai.models.generateContent({
        model,
        contents: toGeminiContents(input),
        config: {
          temperature: settings.temperature,
          maxOutputTokens: settings.maxTokens,
        },
      });
      const finishReason: string | undefined = res.candidates?.[0]?.finishReason;
      return {
        text: res.text,
        blockReason: res.promptFeedback?.blockReason ?? safetyStop(finishReason),
        totalTokens: res.usageMetadata?.totalTokenCount,
      };
    },
  };
};

export const loadLegacyBackend: GeminiBackendLoader = async () => {
  const { GoogleGenerativeAI } = await import("@google/generative-ai");
  return {
    library: "@google/generative-ai",
    async generate({ apiKey, model, input, settings }) {
      const genModel = new GoogleGenerativeAI(apiKey).getGenerativeModel(
        {
          model,
          generationConfig: {
            temperature: settings.temperature,
            maxOutputTokens: settings.maxTokens,
          },
        },
        { timeout: settings.timeoutMs },
      );
      const { response } = await genModel.generateContent(toLegacyPrompt(input));
      const finishReason: string | undefined = response.candidates?.[0]?.finishReason;
      const blockReason =
        response.promptFeedback?.blockReason ?? safetyStop(finishReason);
      return {
        // text() throws on blocked responses
        text: blockReason ? undefined : response.text(),
        blockReason,
        totalTokens: response.usageMetadata?.totalTokenCount,
      };
    },
  };
};

/**
 * First loader that succeeds wins; null when none does.
 */
export async function probeGeminiBackend(
  loaders: readonly GeminiBackendLoader[],
): Promise<GeminiBackend | null> {
  for (const load of loaders) {
    try {
      return await load();
    } catch (e) {
      await logEvent({
        level: "warn",
        event: "google_backend_unavailable",
        provider: "google",
        message: errorMessage(e),
      });
    }
  }
  return null;
}

export type GoogleAdapterOptions = Readonly<{
  settings: CallSettings;
  /** Tried in order; defaults to @google/genai then @google/generative-ai */
  loaders?: readonly GeminiBackendLoader[];
}>;

export function createGoogleAdapter(opts: GoogleAdapterOptions): ProviderAdapter {
  // probed once, at construction; probeGeminiBackend never rejects
  const backend = probeGeminiBackend(
    opts.loaders ?? [loadGenaiBackend, loadLegacyBackend],
  );

  return {
    provider: "google",
    async call(model, input, credential) {
      const actualModel = remapGeminiModel(model);

      const apiKey = resolveCredential("google", credential);
      if (!apiKey) {
        return missingCredentialResponse({ provider: "google", label: "Google", model });
      }

      const meta = { provider: "google" as const, label: "Google", model: actualModel };
      return guardedCall(meta, async () => {
        const selected = await backend;
        if (!selected) {
          throw new ProviderCallError(
            "unsupported_capability",
            "Neither @google/genai nor @google/generative-ai library installed",
          );
        }

        const res = await selected.generate({
          apiKey,
          model: actualModel,
          input,
          settings: opts.settings,
        });

        if (!res.text) {
          if (res.blockReason) {
            throw new ProviderCallError("content_blocked", `Blocked: ${res.blockReason}`);
          }
          throw new ProviderCallError("provider_failure", "No response generated");
        }

        return successResponse(
          { provider: "google", model: actualModel },
          res.text,
          res.totalTokens ?? 0,
        );
      });
    },
  };
}
