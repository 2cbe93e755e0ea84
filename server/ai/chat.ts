import { nanoid } from "nanoid";
import type { EngineServices } from "../engine/container.js";
import { nowIso } from "../storage/helpers.js";
import type { ChatSession, ProviderId } from "../types.js";
import { buildTextMessage } from "./conversation.js";
import { buildChatSystemMessage } from "./directives.js";
import { runConversationLoop, type ToolExecutionRecord } from "./loop.js";
import { buildChatTools } from "./tools.js";

export interface ChatReply {
  sessionId: string;
  reply: string;
  toolExecutionResults: ToolExecutionRecord[];
  completed: boolean;
  maxTurnsReached: boolean;
  error?: string;
}

export interface ChatMessageOptions {
  provider?: ProviderId;
  model?: string;
  signal?: AbortSignal;
}

export interface ChatRuntime {
  sendMessage: (sessionId: string | null, text: string, options?: ChatMessageOptions) => Promise<ChatReply>;
  getSession: (sessionId: string) => ChatSession | undefined;
}

/**
 * Interactive conversations over the same loop as AI steps. Sessions keep
 * their history between messages; the system message is rebuilt each time
 * so it always lists the tools currently registered.
 */
export function createChatRuntime(services: EngineServices): ChatRuntime {
  function loadOrCreateSession(sessionId: string | null): ChatSession {
    const existing = sessionId ? services.store.getChatSession(sessionId) : undefined;
    if (existing) {
      return existing;
    }
    const now = nowIso();
    return { id: sessionId ?? nanoid(), messages: [], createdAt: now, updatedAt: now };
  }

  async function sendMessage(sessionId: string | null, text: string, options: ChatMessageOptions = {}): Promise<ChatReply> {
    const session = loadOrCreateSession(sessionId);
    const tools = buildChatTools(services.registry, services.settings.enabledTools);
    const providerId = options.provider ?? services.settings.provider;
    const model = options.model?.trim() || services.settings.model;
    const history = [...session.messages, buildTextMessage("user", text)];

    const outcome = await runConversationLoop({
      messages: [buildChatSystemMessage(tools), ...history],
      tools,
      provider: services.providers(providerId),
      model,
      mode: "chat",
      maxTurns: services.settings.maxTurns,
      toolSource: services.registry,
      context: { engineData: {}, signal: options.signal },
      log: (message) => console.info(`[chat] ${session.id}: ${message}`),
      signal: options.signal
    });

    services.store.saveChatSession({ ...session, messages: outcome.messages.slice(1) });

    return {
      sessionId: session.id,
      reply: outcome.finalContent,
      toolExecutionResults: outcome.toolExecutionResults,
      completed: outcome.completed,
      maxTurnsReached: outcome.maxTurnsReached,
      ...(outcome.error !== undefined ? { error: outcome.error } : {})
    };
  }

  return {
    sendMessage,
    getSession: (sessionId) => services.store.getChatSession(sessionId)
  };
}
