import "dotenv/config";
import type { CallSettings, CredentialedProvider } from "./core/types.js";
import type { LogLevel } from "./logger.js";

function env(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function numberEnv(name: string, fallback: number): number {
  const raw = env(name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`Invalid numeric env variable: ${name}=${raw}`);
  }
  return n;
}

const LOG_LEVELS: readonly (LogLevel | "silent")[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

function logLevelEnv(): LogLevel | "silent" {
  const raw = env("LOG_LEVEL")?.toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? "info";
}

export const PROVIDER_ENV_KEYS = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_AI_API_KEY",
  deepseek: "DEEPSEEK_API_KEY",
  groq: "GROQ_API_KEY",
} as const satisfies Record<CredentialedProvider, string>;

/**
 * Process-wide fallback credential. Read on every call, never cached.
 */
export function envCredential(provider: CredentialedProvider): string | undefined {
  return env(PROVIDER_ENV_KEYS[provider]);
}

export type RouterConfig = Readonly<{
  call: CallSettings;
  deepseek: { baseUrl: string };
  groq: { baseUrl: string };
  local: { baseUrl?: string };
  logging: { level: LogLevel | "silent"; file: string };
}>;

export function loadConfig(): RouterConfig {
  return {
    call: {
      temperature: numberEnv("LLM_TEMPERATURE", 0.7),
      maxTokens: numberEnv("LLM_MAX_TOKENS", 2000),
      timeoutMs: numberEnv("LLM_TIMEOUT_MS", 60_000),
    },
    deepseek: {
      baseUrl: env("DEEPSEEK_BASE_URL") ?? "https://api.deepseek.com",
    },
    groq: {
      baseUrl: env("GROQ_BASE_URL") ?? "https://api.groq.com/openai/v1",
    },
    local: {
      // Ollama: http://localhost:11434/v1
      baseUrl: env("LOCAL_LLM_BASE_URL"),
    },
    logging: loadLogSettings(),
  };
}

export function loadLogSettings(): RouterConfig["logging"] {
  return {
    level: logLevelEnv(),
    file: env("LOG_FILE") ?? "logs/app.log",
  };
}
