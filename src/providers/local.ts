// providers/local.ts
import { successResponse } from "../core/errors.js";
import type { CallSettings, ProviderAdapter } from "../core/types.js";
import {
  createOpenAiCompatibleAdapter,
  type OpenAiClientFactory,
} from "./openai.js";

export type LocalAdapterOptions = Readonly<{
  /** OpenAI-compatible endpoint of a local server (Ollama, LM Studio) */
  baseUrl?: string;
  settings: CallSettings;
  createClient?: OpenAiClientFactory;
}>;

/**
 * With a base URL: a keyless OpenAI-compatible call to the local server.
 * Without one: an offline placeholder that always succeeds.
 */
export function createLocalAdapter(opts: LocalAdapterOptions): ProviderAdapter {
  if (opts.baseUrl) {
    return createOpenAiCompatibleAdapter({
      provider: "local",
      label: "Local",
      credentialFrom: null,
      baseUrl: opts.baseUrl,
      settings: opts.settings,
      createClient: opts.createClient,
    });
  }

  return {
    provider: "local",
    async call(model) {
      return successResponse(
        { provider: "local", model },
        `[Local ${model}] This is a placeholder response. Integrate local model server for production.`,
        0,
      );
    },
  };
}
