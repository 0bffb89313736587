// core/errors.ts
import type {
  ProviderErrorKind,
  ProviderResponse,
  ProviderTag,
} from "./types.js";

/**
 * Raised inside adapters for failures the adapter itself detects
 * (missing library, blocked content, empty answer). Never leaves an adapter.
 */
export class ProviderCallError extends Error {
  constructor(
    readonly kind: ProviderErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ProviderCallError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e ?? "");
}

function statusOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("status" in e)) return undefined;
  const status = e.status;
  return typeof status === "number" ? status : undefined;
}

// Text markers are the fallback when the SDK gives no status code.
const RATE_LIMIT_MARKERS =
  /\b429\b|\bquota\b|rate[ _-]?limit|too many requests|resource[ _-]?exhausted/i;
const AUTH_MARKERS =
  /\b401\b|\b403\b|unauthori[sz]ed|invalid[ _-]?api[ _-]?key|incorrect api key|api key not valid|permission denied/i;

export function classifyProviderError(e: unknown): ProviderErrorKind {
  if (e instanceof ProviderCallError) return e.kind;

  const status = statusOf(e);
  if (status === 401 || status === 403) return "authentication_rejected";
  if (status === 429) return "rate_limit_exceeded";

  const msg = errorMessage(e);
  if (RATE_LIMIT_MARKERS.test(msg)) return "rate_limit_exceeded";
  if (AUTH_MARKERS.test(msg)) return "authentication_rejected";

  return "provider_failure";
}

export type EnvelopeMeta = Readonly<{
  provider: ProviderTag;
  /** Display name used in replies ("OpenAI", "Google") */
  label: string;
  model: string;
}>;

export function successResponse(
  meta: Omit<EnvelopeMeta, "label">,
  reply: string,
  tokens: number,
): ProviderResponse {
  return {
    reply,
    model: meta.model,
    provider: meta.provider,
    tokens: Number.isFinite(tokens) ? Math.max(0, Math.trunc(tokens)) : 0,
    status: "success",
  };
}

export function missingCredentialResponse(meta: EnvelopeMeta): ProviderResponse {
  return failureResponse(
    meta,
    new ProviderCallError("missing_credential", "No API key"),
  );
}

/**
 * Maps any failure onto the error envelope. Each kind has its own reply text.
 */
export function failureResponse(
  meta: EnvelopeMeta,
  e: unknown,
): ProviderResponse {
  const kind = classifyProviderError(e);
  const msg = errorMessage(e);
  const prefix = `[${meta.label} ${meta.model}]`;

  let reply: string;
  let error: string;

  switch (kind) {
    case "missing_credential":
      reply = `${prefix} No API key provided`;
      error = "No API key";
      break;
    case "unsupported_capability":
      reply = `${prefix} ${msg}`;
      error = "Library not installed";
      break;
    case "authentication_rejected":
      reply = `${prefix} Authentication failed. Please check your API key.`;
      error = msg;
      break;
    case "rate_limit_exceeded":
      reply = `${prefix} Rate limit exceeded. Please wait and try again, or check your API quota.`;
      error = "Rate limit exceeded - quota exhausted";
      break;
    case "content_blocked":
      reply = `${prefix} Content was blocked by safety filters`;
      error = "Content blocked by safety filters";
      break;
    case "provider_failure":
      // Our own failures already read well; foreign ones get an "Error:" lead.
      reply =
        e instanceof ProviderCallError
          ? `${prefix} ${msg}`
          : `${prefix} Error: ${msg}`;
      error = msg;
      break;
    default: {
      const neverKind: never = kind;
      throw new Error(`Unhandled error kind: ${neverKind}`);
    }
  }

  return {
    reply,
    model: meta.model,
    provider: meta.provider,
    tokens: 0,
    status: "error",
    error,
    errorKind: kind,
  };
}
