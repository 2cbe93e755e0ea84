import type { ProviderSettings } from "../runtime/config.js";
import type { ProviderId } from "../types.js";
import { createClaudeProvider } from "./claude.js";
import { createOpenAiProvider } from "./openai.js";
import type { ModelProvider, ProviderResolver } from "./types.js";

export function createModelProvider(providerId: ProviderId, settings: ProviderSettings, fetchFn?: typeof fetch): ModelProvider {
  const options = {
    apiKey: settings.apiKeys[providerId],
    baseUrl: settings.id === providerId ? settings.baseUrl : "",
    timeoutMs: settings.timeoutMs,
    fetchFn
  };

  return providerId === "claude" ? createClaudeProvider(options) : createOpenAiProvider(options);
}

export function createProviderResolver(settings: ProviderSettings, fetchFn?: typeof fetch): ProviderResolver {
  const cache = new Map<ProviderId, ModelProvider>();
  return (providerId) => {
    const cached = cache.get(providerId);
    if (cached) {
      return cached;
    }
    const provider = createModelProvider(providerId, settings, fetchFn);
    cache.set(providerId, provider);
    return provider;
  };
}
