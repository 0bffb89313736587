export { loadConfig, envCredential, PROVIDER_ENV_KEYS } from "./config.js";
export type { RouterConfig } from "./config.js";

export {
  buildContext,
  renderMemoryBlock,
  selectHistory,
  HISTORY_LIMIT,
  SYSTEM_PROMPT,
} from "./core/context.js";
export { classifyProviderError, ProviderCallError } from "./core/errors.js";
export {
  DEFAULT_MODEL_REGISTRY,
  DEFAULT_MODELS,
  FALLBACK_PROVIDER,
  LEGACY_ALIASES,
  ModelRegistry,
  stripCosmeticPrefix,
} from "./core/registry.js";
export type { RegistryEntry } from "./core/registry.js";
export { createDefaultRouter, createRouter } from "./core/router.js";
export type { Router, RouterOptions } from "./core/router.js";
export type * from "./core/types.js";

export {
  createAnthropicAdapter,
  createDefaultAdapters,
  createEchoAdapter,
  createGoogleAdapter,
  createLocalAdapter,
  createOpenAiCompatibleAdapter,
  loadGenaiBackend,
  loadLegacyBackend,
} from "./providers/index.js";
export type { AdapterSet } from "./providers/index.js";
