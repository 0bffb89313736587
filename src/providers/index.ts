// providers/index.ts
import type { RouterConfig } from "../config.js";
import type { ProviderAdapter, ProviderTag } from "../core/types.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createEchoAdapter } from "./echo.js";
import { createGoogleAdapter } from "./google.js";
import { createLocalAdapter } from "./local.js";
import { createOpenAiCompatibleAdapter } from "./openai.js";

export type AdapterSet = Readonly<Partial<Record<ProviderTag, ProviderAdapter>>>;

export function createDefaultAdapters(config: RouterConfig): AdapterSet {
  const settings = config.call;

  return {
    openai: createOpenAiCompatibleAdapter({
      provider: "openai",
      label: "OpenAI",
      credentialFrom: "openai",
      settings,
    }),
    deepseek: createOpenAiCompatibleAdapter({
      provider: "deepseek",
      label: "DeepSeek",
      credentialFrom: "deepseek",
      baseUrl: config.deepseek.baseUrl,
      settings,
    }),
    groq: createOpenAiCompatibleAdapter({
      provider: "groq",
      label: "Groq",
      credentialFrom: "groq",
      baseUrl: config.groq.baseUrl,
      settings,
    }),
    anthropic: createAnthropicAdapter({ settings }),
    google: createGoogleAdapter({ settings }),
    local: createLocalAdapter({ baseUrl: config.local.baseUrl, settings }),
    echo: createEchoAdapter(),
  };
}

export { createAnthropicAdapter } from "./anthropic.js";
export { createEchoAdapter, echoReply } from "./echo.js";
export {
  createGoogleAdapter,
  loadGenaiBackend,
  loadLegacyBackend,
  remapGeminiModel,
} from "./google.js";
export { createLocalAdapter } from "./local.js";
export { createOpenAiCompatibleAdapter } from "./openai.js";
