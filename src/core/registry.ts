// core/registry.ts
import type { ProviderTag } from "./types.js";

export type RegistryEntry = readonly [identifier: string, provider: ProviderTag];

/** Provider used for every identifier the registry does not know. */
export const FALLBACK_PROVIDER: ProviderTag = "echo";

// Frontends send ids like "model-gpt-4"; the prefix carries no meaning.
const COSMETIC_PREFIX = /^(?:model-)+/i;

export function stripCosmeticPrefix(identifier: string): string {
  let name = identifier.trim();
  let prev: string;
  do {
    prev = name;
    name = name.replace(COSMETIC_PREFIX, "").trim();
  } while (name !== prev);
  return name;
}

export const DEFAULT_MODELS: readonly RegistryEntry[] = [
  ["gpt-4", "openai"],
  ["gpt-4-turbo", "openai"],
  ["gpt-4o", "openai"],
  ["gpt-3.5-turbo", "openai"],

  ["claude-3-opus", "anthropic"],
  ["claude-3-sonnet", "anthropic"],
  ["claude-3-haiku", "anthropic"],
  ["claude-3.5-sonnet", "anthropic"],

  ["gemini-2.0-flash", "google"],
  ["gemini-2.0-flash-exp", "google"],
  ["gemini-2.0-flash-lite", "google"],
  ["gemini-1.5-flash", "google"],
  ["gemini-1.5-pro", "google"],
  // remapped to available upstream models by the Google adapter
  ["gemini-2.5-flash", "google"],
  ["gemini-2.5-pro", "google"],

  ["deepseek-chat", "deepseek"],
  ["deepseek-coder", "deepseek"],

  ["llama-3.3-70b-versatile", "groq"],
  ["llama-3.1-8b-instant", "groq"],
  ["llama3-70b-8192", "groq"],
  ["llama3-8b-8192", "groq"],
  ["mixtral-8x7b-32768", "groq"],
  ["gemma2-9b-it", "groq"],

  ["echo", "echo"],
  ["local", "local"],
];

/** Old dotless ids still stored on existing conversations. */
export const LEGACY_ALIASES: Readonly<Record<string, string>> = {
  "gemini-20-flash": "gemini-2.0-flash",
  "gemini-15-flash": "gemini-1.5-flash",
  "gemini-15-pro": "gemini-1.5-pro",
  gpt4o: "gpt-4o",
  gpt4: "gpt-4",
  "gpt4-turbo": "gpt-4-turbo",
  "gpt35-turbo": "gpt-3.5-turbo",
  "claude3-opus": "claude-3-opus",
  "claude3-sonnet": "claude-3-sonnet",
  "claude3-haiku": "claude-3-haiku",
  "claude35-sonnet": "claude-3.5-sonnet",
};

type Match = Readonly<{ key: string; provider: ProviderTag }>;

/**
 * Immutable identifier → provider mapping.
 * Built once, shared by every call; there is no way to mutate it afterwards.
 */
export class ModelRegistry {
  private readonly models: ReadonlyMap<string, ProviderTag>;
  /** lowercased key → canonical key */
  private readonly folded: ReadonlyMap<string, string>;
  /** lowercased alias → canonical key */
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(
    entries: Iterable<RegistryEntry>,
    aliases: Readonly<Record<string, string>> = {},
  ) {
    const models = new Map<string, ProviderTag>();
    const folded = new Map<string, string>();

    for (const [identifier, provider] of entries) {
      if (!identifier.trim()) {
        throw new Error("Registry identifiers must not be empty");
      }
      if (stripCosmeticPrefix(identifier) !== identifier) {
        throw new Error(
          `Registry identifier carries the cosmetic prefix or padding: "${identifier}"`,
        );
      }
      const lower = identifier.toLowerCase();
      const clash = folded.get(lower);
      if (clash !== undefined) {
        throw new Error(
          `Duplicate registry identifier: "${identifier}" (already registered as "${clash}")`,
        );
      }
      models.set(identifier, provider);
      folded.set(lower, identifier);
    }

    const aliasMap = new Map<string, string>();
    for (const [alias, target] of Object.entries(aliases)) {
      if (!models.has(target)) {
        throw new Error(`Alias "${alias}" points at unknown model "${target}"`);
      }
      if (folded.has(alias.toLowerCase())) {
        throw new Error(`Alias "${alias}" shadows a registered model`);
      }
      aliasMap.set(alias.toLowerCase(), target);
    }

    this.models = models;
    this.folded = folded;
    this.aliases = aliasMap;
    Object.freeze(this);
  }

  /**
   * Lookup precedence: prefix strip, legacy alias, exact match,
   * then case-insensitive match.
   */
  private lookup(identifier: string): Match | undefined {
    const stripped = stripCosmeticPrefix(identifier);
    const name = this.aliases.get(stripped.toLowerCase()) ?? stripped;

    const exact = this.models.get(name);
    if (exact !== undefined) return { key: name, provider: exact };

    const key = this.folded.get(name.toLowerCase());
    if (key === undefined) return undefined;
    const provider = this.models.get(key);
    return provider === undefined ? undefined : { key, provider };
  }

  resolveProvider(identifier: string): ProviderTag {
    return this.lookup(identifier)?.provider ?? FALLBACK_PROVIDER;
  }

  /**
   * Canonical registry key, or the prefix-stripped input when unknown.
   * Idempotent.
   */
  normalize(identifier: string): string {
    return this.lookup(identifier)?.key ?? stripCosmeticPrefix(identifier);
  }

  has(identifier: string): boolean {
    return this.lookup(identifier) !== undefined;
  }

  /** Known id, or an id that extends a known one ("gpt-4-0613"). */
  isSupported(identifier: string): boolean {
    if (this.has(identifier)) return true;
    const name = stripCosmeticPrefix(identifier).toLowerCase();
    if (!name) return false;
    for (const lower of this.folded.keys()) {
      if (name.startsWith(lower)) return true;
    }
    return false;
  }

  listByProvider(): Partial<Record<ProviderTag, string[]>> {
    const out: Partial<Record<ProviderTag, string[]>> = {};
    for (const [identifier, provider] of this.models) {
      const list = out[provider] ?? [];
      list.push(identifier);
      out[provider] = list;
    }
    return out;
  }

  identifiers(): string[] {
    return [...this.models.keys()];
  }
}

export const DEFAULT_MODEL_REGISTRY = new ModelRegistry(
  DEFAULT_MODELS,
  LEGACY_ALIASES,
);
