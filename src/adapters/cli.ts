import { promises as fs } from "node:fs";

import { createDefaultRouter, type Router } from "../core/router.js";
import { errorMessage } from "../core/errors.js";
import type {
  ConversationRecord,
  InjectedMemoryLink,
  MessageRole,
  ProviderResponse,
  StoredMessage,
} from "../core/types.js";
import { logEvent } from "../logger.js";

type Command = "ask" | "models" | "check" | "help";

type Args = {
  command: Command;

  // ask
  model?: string;
  context?: string;
  key?: string;
  conversation?: string;
  json: boolean;

  // free text input (prompt for ask, identifier for check)
  input: string;
};

export function parseArgs(argv: string[]): Args {
  let model: string | undefined;
  let context: string | undefined;
  let key: string | undefined;
  let conversation: string | undefined;
  let json = false;

  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];

    if (a === "--model" || a === "-m") model = argv[++i];
    else if (a === "--context") context = argv[++i];
    else if (a === "--key") key = argv[++i];
    else if (a === "--conversation") conversation = argv[++i];
    else if (a === "--json") json = true;
    else if (a !== undefined) rest.push(a);
  }

  const [first = "", ...tail] = rest;
  const command: Command =
    first === "ask" || first === "models" || first === "check" ? first : "help";

  return {
    command,
    model,
    context,
    key,
    conversation,
    json,
    input: (command === "help" ? rest : tail).join(" ").trim(),
  };
}

function printHelp(out: (line: string) => void) {
  out(
    `
Usage:
  chat-model-router models
  chat-model-router check <model-id>
  chat-model-router ask --model gpt-4o "Hello world"
  chat-model-router ask --model echo --context "Project notes..." "Summarize"
  chat-model-router ask --conversation conv.json "Next question"

Options:
  --model, -m <id>       model identifier (overrides the conversation's modelId)
  --context <text>       injected context for a bare prompt
  --conversation <file>  JSON conversation record (modelId, messages, memoryLinks)
  --key <credential>     API key; falls back to the provider's env variable
  --json                 print the raw response envelope
  `.trim(),
  );
}

// -------------------------
// Conversation file parsing
// -------------------------

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isRole(v: unknown): v is MessageRole {
  return v === "system" || v === "user" || v === "assistant";
}

function parseMessage(v: unknown, i: number): StoredMessage {
  if (
    !isRecord(v) ||
    !isRole(v.role) ||
    typeof v.content !== "string" ||
    (typeof v.timestamp !== "string" && typeof v.timestamp !== "number")
  ) {
    throw new Error(
      `messages[${i}] must have role (system|user|assistant), content and timestamp`,
    );
  }
  return { role: v.role, content: v.content, timestamp: v.timestamp };
}

function parseLink(v: unknown, i: number): InjectedMemoryLink {
  if (
    !isRecord(v) ||
    !isRecord(v.memory) ||
    typeof v.memory.title !== "string" ||
    typeof v.memory.content !== "string"
  ) {
    throw new Error(`memoryLinks[${i}] must have memory.title and memory.content`);
  }
  return {
    memory: { title: v.memory.title, content: v.memory.content },
    isActive: v.isActive !== false,
  };
}

export function parseConversationRecord(raw: unknown): ConversationRecord {
  if (!isRecord(raw)) throw new Error("Conversation file must hold a JSON object");
  if (typeof raw.modelId !== "string") throw new Error("Conversation needs a modelId");

  const messages = raw.messages ?? [];
  const links = raw.memoryLinks ?? [];
  if (!Array.isArray(messages)) throw new Error("messages must be an array");
  if (!Array.isArray(links)) throw new Error("memoryLinks must be an array");

  return {
    id: typeof raw.id === "string" ? raw.id : undefined,
    modelId: raw.modelId,
    messages: messages.map(parseMessage),
    memoryLinks: links.map(parseLink),
  };
}

// -------------------------
// Main
// -------------------------

export type CliDeps = {
  router?: Router;
  out?: (line: string) => void;
  err?: (line: string) => void;
  readFile?: (path: string) => Promise<string>;
};

/** Resolves to the process exit code. */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const readFile = deps.readFile ?? ((p: string) => fs.readFile(p, "utf8"));
  const args = parseArgs(argv);

  if (args.command === "help") {
    printHelp(out);
    return 0;
  }

  const router = deps.router ?? createDefaultRouter();

  if (args.command === "models") {
    for (const [provider, ids] of Object.entries(router.listSupportedModels())) {
      out(`${provider}: ${(ids ?? []).join(", ")}`);
    }
    return 0;
  }

  if (args.command === "check") {
    if (!args.input) {
      err("Missing model identifier.");
      return 1;
    }
    const supported = router.isModelSupported(args.input);
    const provider = router.registry.resolveProvider(args.input);
    const normalized = router.registry.normalize(args.input);
    out(`${args.input} -> ${normalized} [provider=${provider}] supported=${supported}`);
    return supported ? 0 : 1;
  }

  // ask
  if (!args.input) {
    err("Missing prompt.");
    return 1;
  }

  let res: ProviderResponse;
  if (args.conversation) {
    let conversation: ConversationRecord;
    try {
      conversation = parseConversationRecord(
        JSON.parse(await readFile(args.conversation)),
      );
    } catch (e) {
      err(`Cannot load conversation ${args.conversation}: ${errorMessage(e)}`);
      await logEvent({
        level: "error",
        event: "cli_conversation_invalid",
        message: errorMessage(e),
      });
      return 1;
    }
    if (args.model) conversation = { ...conversation, modelId: args.model };
    res = await router.complete(conversation, args.input, args.key);
  } else {
    if (!args.model) {
      err("Missing --model (or --conversation).");
      return 1;
    }
    res = await router.complete(args.model, args.input, args.context, args.key);
  }

  if (args.json) {
    out(JSON.stringify(res, null, 2));
  } else {
    out(`[provider=${res.provider}/${res.model}] [status=${res.status}] [tokens=${res.tokens}]`);
    out(res.reply);
  }
  return res.status === "success" ? 0 : 1;
}
