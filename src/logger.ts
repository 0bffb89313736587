import { promises as fs } from "node:fs";
import path from "node:path";

import { loadLogSettings } from "./config.js";
import type { ProviderResponse } from "./core/types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: string;
  level: LogLevel;
  event: string;

  provider?: string;
  model?: string;
  requested?: string;
  status?: string;
  mode?: "conversation" | "prompt";

  ms?: number;

  errorClass?: string;
  message?: string;
  details?: unknown;
};

const RANK: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function nowISO() {
  return new Date().toISOString();
}

/**
 * Appends one JSON line to the log file. Never throws: the caller is
 * usually in the middle of building a response envelope.
 */
export async function logEvent(ev: Omit<LogEvent, "ts">): Promise<void> {
  const settings = loadLogSettings();
  if (RANK[ev.level] < RANK[settings.level]) return;

  const file = path.resolve(settings.file);
  const line = JSON.stringify({ ts: nowISO(), ...ev }) + "\n";
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.appendFile(file, line, "utf8");
  } catch (e) {
    console.error("log write failed:", e);
  }
}

export async function withTiming(
  meta: Omit<LogEvent, "ts" | "level" | "event" | "ms">,
  fn: () => Promise<ProviderResponse>,
): Promise<ProviderResponse> {
  const start = Date.now();
  const res = await fn();
  const ms = Date.now() - start;
  await logEvent({
    ...meta,
    level: res.status === "success" ? "info" : "warn",
    event: "llm_call",
    ms,
    provider: res.provider,
    model: res.model,
    status: res.status,
    errorClass: res.errorKind,
    message: res.error,
  });
  return res;
}
