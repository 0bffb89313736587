// providers/shared.ts
// Pieces every adapter uses: credential fallback, message shaping, the no-throw guard.
import { envCredential } from "../config.js";
import { failureResponse, type EnvelopeMeta } from "../core/errors.js";
import type {
  AdapterInput,
  ConversationContext,
  CredentialedProvider,
  MessageRole,
  ProviderResponse,
} from "../core/types.js";

export type ChatTurn = Readonly<{
  role: MessageRole;
  content: string;
}>;

/**
 * Explicit credential first, then the provider's env variable.
 * Blank strings count as absent.
 */
export function resolveCredential(
  provider: CredentialedProvider,
  credential?: string | null,
): string | undefined {
  const explicit = credential?.trim();
  return explicit ? explicit : envCredential(provider);
}

export function systemText(ctx: ConversationContext): string {
  return ctx.systemPrompt + ctx.memoryBlock;
}

/**
 * system (prompt + memories) → history → current user turn.
 * A legacy prompt becomes a single user turn.
 */
export function toChatTurns(input: AdapterInput): ChatTurn[] {
  if (input.kind === "prompt") {
    return [{ role: "user", content: input.prompt }];
  }

  const ctx = input.context;
  return [
    { role: "system", content: systemText(ctx) },
    ...ctx.history.map((h) => ({ role: h.role, content: h.content })),
    { role: "user", content: ctx.userMessage },
  ];
}

/**
 * Runs one provider call; whatever is thrown comes back as an error envelope.
 */
export async function guardedCall(
  meta: EnvelopeMeta,
  fn: () => Promise<ProviderResponse>,
): Promise<ProviderResponse> {
  try {
    return await fn();
  } catch (e) {
    return failureResponse(meta, e);
  }
}
