import { describe, expect, it } from "vitest";

import {
  DEFAULT_MODEL_REGISTRY,
  DEFAULT_MODELS,
  ModelRegistry,
  stripCosmeticPrefix,
} from "./registry.js";

const registry = DEFAULT_MODEL_REGISTRY;

describe("stripCosmeticPrefix", () => {
  it("removes repeated model- prefixes in any case", () => {
    expect(stripCosmeticPrefix("model-gpt-4")).toBe("gpt-4");
    expect(stripCosmeticPrefix("MODEL-model-gpt-4")).toBe("gpt-4");
    expect(stripCosmeticPrefix("  model- gpt4 ")).toBe("gpt4");
  });

  it("keeps model- in the middle of a name", () => {
    expect(stripCosmeticPrefix("unknown-model-xyz")).toBe("unknown-model-xyz");
  });
});

describe("ModelRegistry.resolveProvider", () => {
  it("maps known identifiers", () => {
    expect(registry.resolveProvider("gpt-4")).toBe("openai");
    expect(registry.resolveProvider("claude-3.5-sonnet")).toBe("anthropic");
    expect(registry.resolveProvider("gemini-1.5-pro")).toBe("google");
    expect(registry.resolveProvider("deepseek-coder")).toBe("deepseek");
    expect(registry.resolveProvider("gemma2-9b-it")).toBe("groq");
    expect(registry.resolveProvider("local")).toBe("local");
  });

  it("returns the same provider regardless of letter case", () => {
    for (const [id, provider] of DEFAULT_MODELS) {
      expect(registry.resolveProvider(id.toUpperCase())).toBe(provider);
      expect(registry.resolveProvider(id.toLowerCase())).toBe(provider);
    }
  });

  it("ignores the cosmetic prefix", () => {
    expect(registry.resolveProvider("model-gemini-2.0-flash")).toBe("google");
  });

  it("falls back to echo for unknown identifiers", () => {
    expect(registry.resolveProvider("model-unknown-model-xyz")).toBe("echo");
    expect(registry.resolveProvider("")).toBe("echo");
  });

  it("resolves legacy dotless ids", () => {
    expect(registry.resolveProvider("model-claude35-sonnet")).toBe("anthropic");
    expect(registry.resolveProvider("GEMINI-15-PRO")).toBe("google");
  });
});

describe("ModelRegistry.normalize", () => {
  it("returns the canonical key", () => {
    expect(registry.normalize("MODEL-GPT-4O")).toBe("gpt-4o");
    expect(registry.normalize("model-gpt4o")).toBe("gpt-4o");
    expect(registry.normalize("Gemini-2.0-Flash")).toBe("gemini-2.0-flash");
  });

  it("passes unknown names through without the prefix", () => {
    expect(registry.normalize("model-unknown-model-xyz")).toBe("unknown-model-xyz");
    expect(registry.normalize("Some-Custom-Model")).toBe("Some-Custom-Model");
  });

  it("is idempotent", () => {
    const samples = [
      "gpt-4",
      "GPT-4O",
      "model-model-claude-3-opus",
      "model-unknown-model-xyz",
      "  model- gpt4 ",
      "gemini-20-flash",
      "",
      "model-",
      "Some-Thing",
    ];
    for (const s of samples) {
      const once = registry.normalize(s);
      expect(registry.normalize(once)).toBe(once);
    }
  });
});

describe("ModelRegistry.isSupported", () => {
  it("accepts known ids and ids extending a known one", () => {
    expect(registry.isSupported("gpt-4")).toBe(true);
    expect(registry.isSupported("model-claude-3-haiku")).toBe(true);
    expect(registry.isSupported("gpt-4-0613")).toBe(true);
  });

  it("rejects unknown ids", () => {
    expect(registry.isSupported("unknown-x")).toBe(false);
    expect(registry.isSupported("model-")).toBe(false);
  });
});

describe("ModelRegistry.listByProvider", () => {
  it("groups identifiers in registry order", () => {
    const grouped = registry.listByProvider();
    expect(grouped.groq).toEqual([
      "llama-3.3-70b-versatile",
      "llama-3.1-8b-instant",
      "llama3-70b-8192",
      "llama3-8b-8192",
      "mixtral-8x7b-32768",
      "gemma2-9b-it",
    ]);
    expect(grouped.echo).toEqual(["echo"]);
    expect(grouped.deepseek).toEqual(["deepseek-chat", "deepseek-coder"]);
  });
});

describe("ModelRegistry construction", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it("rejects identifiers differing only in case", () => {
    expect(
      () =>
        new ModelRegistry([
          ["my-model", "openai"],
          ["MY-MODEL", "groq"],
        ]),
    ).toThrow(/Duplicate registry identifier/);
  });

  it("rejects prefixed identifiers", () => {
    expect(() => new ModelRegistry([["model-x", "openai"]])).toThrow(/cosmetic prefix/);
  });

  it("rejects aliases pointing nowhere", () => {
    expect(
      () => new ModelRegistry([["gpt-4", "openai"]], { gpt5: "gpt-5" }),
    ).toThrow(/unknown model/);
  });

  it("uses a custom mapping", () => {
    const custom = new ModelRegistry([["house-model", "local"]]);
    expect(custom.resolveProvider("model-HOUSE-MODEL")).toBe("local");
    expect(custom.resolveProvider("gpt-4")).toBe("echo");
  });
});
