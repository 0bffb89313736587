// core/context.ts
import type {
  AdapterInput,
  ConversationContext,
  ConversationRecord,
  HistoryEntry,
  InjectedMemoryLink,
} from "./types.js";

export const SYSTEM_PROMPT = "You are a helpful AI assistant.";

/** Caps prompt size; not adjustable per call. */
export const HISTORY_LIMIT = 10;

/** Separates injected context from the user's turn in flat prompts. */
export const USER_TURN_DELIMITER = "User:";

function toMillis(ts: Date | string | number): number {
  const ms =
    ts instanceof Date ? ts.getTime() : typeof ts === "number" ? ts : Date.parse(ts);
  // unparseable timestamps sort as oldest
  return Number.isFinite(ms) ? ms : 0;
}

export function renderMemoryBlock(links: readonly InjectedMemoryLink[]): string {
  const active = links.filter((l) => l.isActive);
  if (!active.length) return "";

  let text = "\n\n=== Injected Context ===\n";
  for (const link of active) {
    text += `\n[${link.memory.title}]\n${link.memory.content}\n`;
  }
  text += "\n=== End Context ===\n";
  return text;
}

export function selectHistory(
  messages: ConversationRecord["messages"],
  limit = HISTORY_LIMIT,
): HistoryEntry[] {
  const entries = messages.map((m) => ({
    role: m.role,
    content: m.content,
    timestamp: toMillis(m.timestamp),
  }));
  // Array.prototype.sort is stable, so equal timestamps keep stored order
  entries.sort((a, b) => a.timestamp - b.timestamp);
  return limit > 0 ? entries.slice(-limit) : [];
}

export function buildContext(
  conversation: ConversationRecord,
  userMessage: string,
): ConversationContext {
  return {
    systemPrompt: SYSTEM_PROMPT,
    memoryBlock: renderMemoryBlock(conversation.memoryLinks),
    history: selectHistory(conversation.messages),
    userMessage,
  };
}

/**
 * Legacy flat prompt: injected context, then the user's turn.
 */
export function joinPrompt(context: string, prompt: string): string {
  return context ? `${context}\n\n${USER_TURN_DELIMITER} ${prompt}` : prompt;
}

/**
 * One-string rendering for adapters without message structure.
 * Only the memory block counts as context here; the system prompt is implied.
 */
export function renderPrompt(input: AdapterInput): string {
  if (input.kind === "prompt") return input.prompt;
  const { memoryBlock, userMessage } = input.context;
  return joinPrompt(memoryBlock.trim(), userMessage);
}

export function userMessageOf(input: AdapterInput): string {
  return input.kind === "prompt" ? input.userMessage : input.context.userMessage;
}
