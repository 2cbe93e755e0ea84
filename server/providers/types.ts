import type { Message, ProviderId, ToolDeclaration } from "../types.js";

export interface ProviderRequest {
  model: string;
  messages: Message[];
  tools: ToolDeclaration[];
  signal?: AbortSignal;
  log?: (message: string) => void;
}

export interface ProviderUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ProviderResponse {
  message: Message;
  usage?: ProviderUsage;
  stopReason?: string;
}

export interface ModelProvider {
  readonly id: ProviderId;
  request(input: ProviderRequest): Promise<ProviderResponse>;
}

export type ProviderResolver = (providerId: ProviderId) => ModelProvider;

export interface ProviderClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}
