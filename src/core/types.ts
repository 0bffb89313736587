// core/types.ts
// Single source of truth for the router's typing.
// Every provider answer is normalized into ProviderResponse; nothing provider-specific leaks out.

export type ProviderTag =
  | "openai"
  | "anthropic"
  | "google"
  | "deepseek"
  | "groq"
  | "local"
  | "echo";

/** Providers that need an API key (local and echo never do). */
export type CredentialedProvider = Exclude<ProviderTag, "local" | "echo">;

export type MessageRole = "system" | "user" | "assistant";

// -------------------------
// Records owned by collaborators (read-only here)
// -------------------------

export type StoredMessage = Readonly<{
  role: MessageRole;
  content: string;
  /** Date, ISO-8601 string or epoch millis */
  timestamp: Date | string | number;
}>;

export type MemoryRecord = Readonly<{
  title: string;
  content: string;
}>;

/**
 * Link between a conversation and a memory.
 * isActive is flipped by other parts of the system; it is only read here.
 */
export type InjectedMemoryLink = Readonly<{
  memory: MemoryRecord;
  isActive: boolean;
}>;

export type ConversationRecord = Readonly<{
  id?: string;
  /** Raw model identifier, possibly prefixed ("model-gpt-4") */
  modelId: string;
  messages: readonly StoredMessage[];
  memoryLinks: readonly InjectedMemoryLink[];
}>;

// -------------------------
// Provider-neutral context
// -------------------------

export type HistoryEntry = Readonly<{
  role: MessageRole;
  content: string;
  /** epoch millis */
  timestamp: number;
}>;

export type ConversationContext = Readonly<{
  systemPrompt: string;
  /** Rendered active memories, "" when none are active */
  memoryBlock: string;
  /** Oldest first, bounded; never contains the current turn */
  history: readonly HistoryEntry[];
  userMessage: string;
}>;

/**
 * What an adapter is asked to answer:
 * - conversation: full context built from a stored conversation
 * - prompt: legacy flat prompt (context already folded in) plus the bare user text
 */
export type AdapterInput =
  | Readonly<{ kind: "conversation"; context: ConversationContext }>
  | Readonly<{ kind: "prompt"; prompt: string; userMessage: string }>;

// -------------------------
// Envelope
// -------------------------

export type ProviderErrorKind =
  | "missing_credential"
  | "unsupported_capability"
  | "authentication_rejected"
  | "rate_limit_exceeded"
  | "content_blocked"
  | "provider_failure";

export type ResponseStatus = "success" | "error";

export type ProviderResponse = Readonly<{
  reply: string;
  /** Model that served the call (may differ from the requested one) */
  model: string;
  provider: ProviderTag;
  /** Provider-reported total, 0 when unavailable */
  tokens: number;
  status: ResponseStatus;
  error?: string;
  errorKind?: ProviderErrorKind;
}>;

/**
 * Uniform adapter contract.
 * call() must resolve for every input; failures come back as status "error".
 */
export type ProviderAdapter = Readonly<{
  provider: ProviderTag;
  call(
    model: string,
    input: AdapterInput,
    credential?: string | null,
  ): Promise<ProviderResponse>;
}>;

export type CallSettings = Readonly<{
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}>;
