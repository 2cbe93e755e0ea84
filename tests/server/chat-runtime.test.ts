import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createChatRuntime } from "../../server/ai/chat.js";
import type { EngineConfig } from "../../server/runtime/config.js";
import { createEngineHarness, type EngineHarness } from "../helpers/engineHarness.js";
import { assistantCalls, assistantText, createScriptedProvider, type ScriptedTurn } from "../helpers/fakeProvider.js";
import { SEARCH_TOOL_NAME, createTestExtension } from "../helpers/testExtension.js";

describe("chat runtime", () => {
  let harness: EngineHarness | null = null;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await harness?.cleanup();
    harness = null;
  });

  async function setup(turns: ScriptedTurn[], config: Partial<EngineConfig> = {}) {
    const provider = createScriptedProvider(turns);
    const testExtension = createTestExtension();
    harness = await createEngineHarness({ extensions: [testExtension.extension], provider, config });
    return { chat: createChatRuntime(harness.services), provider, searches: testExtension.searches };
  }

  it("answers with tools and stores the session history", async () => {
    const { chat, provider, searches } = await setup([
      assistantCalls([{ name: SEARCH_TOOL_NAME, args: { query: "ferry timetable" } }]),
      assistantText("Ferries resume on Monday.")
    ]);

    const reply = await chat.sendMessage(null, "When do the ferries run again?");

    expect(reply.reply).toBe("Ferries resume on Monday.");
    expect(reply.completed).toBe(true);
    expect(reply.maxTurnsReached).toBe(false);
    expect(reply.error).toBeUndefined();
    expect(reply.toolExecutionResults.map((record) => record.result)).toEqual([
      { success: true, results: ["result for ferry timetable"] }
    ]);
    expect(searches).toEqual([{ query: "ferry timetable" }]);
    expect(provider.requests[0]?.tools.map((tool) => tool.name)).toEqual([SEARCH_TOOL_NAME]);

    const session = chat.getSession(reply.sessionId);
    expect(session?.messages.map((message) => message.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(session?.messages[0]).toEqual({
      role: "user",
      parts: [{ type: "text", text: "When do the ferries run again?" }]
    });
  });

  it("continues an existing session with its earlier messages", async () => {
    const { chat, provider } = await setup([assistantText("Hello."), assistantText("Still here.")]);

    const first = await chat.sendMessage(null, "Hi");
    const second = await chat.sendMessage(first.sessionId, "Are you there?");

    expect(second.sessionId).toBe(first.sessionId);
    expect(second.reply).toBe("Still here.");
    const secondRequest = provider.requests[1]?.messages ?? [];
    expect(secondRequest.map((message) => message.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(chat.getSession(first.sessionId)?.messages).toHaveLength(4);
  });

  it("offers only the globally enabled tools", async () => {
    const { chat, provider } = await setup([assistantText("No tools needed.")], { enabledTools: ["fetch_page"] });

    await chat.sendMessage("session-1", "Hello");

    expect(provider.requests[0]?.tools).toEqual([]);
    expect(chat.getSession("session-1")?.messages).toHaveLength(2);
  });

  it("returns the provider error and keeps the user's message", async () => {
    const { chat } = await setup([new Error("invalid api key")]);

    const reply = await chat.sendMessage(null, "Hello");

    expect(reply.error).toBe("invalid api key");
    expect(reply.reply).toBe("");
    expect(reply.completed).toBe(false);
    expect(chat.getSession(reply.sessionId)?.messages).toEqual([
      { role: "user", parts: [{ type: "text", text: "Hello" }] }
    ]);
  });
});
