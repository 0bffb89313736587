// core/router.ts
import { loadConfig, type RouterConfig } from "../config.js";
import { withTiming } from "../logger.js";
import { createDefaultAdapters, type AdapterSet } from "../providers/index.js";
import { createEchoAdapter } from "../providers/echo.js";
import { buildContext, joinPrompt } from "./context.js";
import { failureResponse } from "./errors.js";
import { DEFAULT_MODEL_REGISTRY, ModelRegistry } from "./registry.js";
import type {
  AdapterInput,
  ConversationRecord,
  ProviderAdapter,
  ProviderResponse,
  ProviderTag,
} from "./types.js";

export type RouterOptions = Readonly<{
  registry?: ModelRegistry;
  adapters: AdapterSet;
}>;

export interface Router {
  readonly registry: ModelRegistry;

  /** Context-aware turn on a stored conversation. */
  complete(
    conversation: ConversationRecord,
    userMessage: string,
    credential?: string | null,
  ): Promise<ProviderResponse>;
  /** Legacy: bare model name and prompt, optional injected context text. */
  complete(
    modelName: string,
    prompt: string,
    context?: string,
    credential?: string | null,
  ): Promise<ProviderResponse>;

  isModelSupported(identifier: string): boolean;
  listSupportedModels(): Partial<Record<ProviderTag, string[]>>;
}

const echoFallback = createEchoAdapter();

export function createRouter(opts: RouterOptions): Router {
  const registry = opts.registry ?? DEFAULT_MODEL_REGISTRY;
  const adapters = opts.adapters;

  // Unknown tags and tags without an adapter both end up in echo mode.
  function selectAdapter(provider: ProviderTag): ProviderAdapter {
    return adapters[provider] ?? adapters.echo ?? echoFallback;
  }

  async function dispatch(
    requested: string,
    input: AdapterInput,
    credential: string | null | undefined,
  ): Promise<ProviderResponse> {
    const provider = registry.resolveProvider(requested);
    const model = registry.normalize(requested);
    const adapter = selectAdapter(provider);

    return withTiming({ requested, mode: input.kind }, async () => {
      try {
        return await adapter.call(model, input, credential);
      } catch (e) {
        // adapters are not supposed to reject; keep the envelope contract anyway
        return failureResponse(
          { provider: adapter.provider, label: adapter.provider, model },
          e,
        );
      }
    });
  }

  function complete(
    conversation: ConversationRecord,
    userMessage: string,
    credential?: string | null,
  ): Promise<ProviderResponse>;
  function complete(
    modelName: string,
    prompt: string,
    context?: string,
    credential?: string | null,
  ): Promise<ProviderResponse>;
  function complete(
    target: ConversationRecord | string,
    message: string,
    contextOrCredential?: string | null,
    credential?: string | null,
  ): Promise<ProviderResponse> {
    if (typeof target === "string") {
      const prompt = joinPrompt(contextOrCredential ?? "", message);
      return dispatch(
        target,
        { kind: "prompt", prompt, userMessage: message },
        credential,
      );
    }

    return dispatch(
      target.modelId,
      { kind: "conversation", context: buildContext(target, message) },
      contextOrCredential,
    );
  }

  return {
    registry,
    complete,
    isModelSupported: (identifier) => registry.isSupported(identifier),
    listSupportedModels: () => registry.listByProvider(),
  };
}

/**
 * Router over every built-in adapter, configured from the environment.
 */
export function createDefaultRouter(
  config: RouterConfig = loadConfig(),
  registry: ModelRegistry = DEFAULT_MODEL_REGISTRY,
): Router {
  return createRouter({ registry, adapters: createDefaultAdapters(config) });
}
