import { describe, expect, it, vi } from "vitest";

import { createClaudeProvider, fromClaudeResponse, toClaudeRequest } from "../../server/providers/claude.js";
import { ProviderApiError, ProviderResponseError } from "../../server/providers/shared.js";
import type { Message } from "../../server/types.js";

const conversation: Message[] = [
  { role: "system", parts: [{ type: "text", text: "Be brief." }] },
  { role: "user", parts: [{ type: "text", text: "Find harbour news" }] },
  {
    role: "assistant",
    parts: [
      { type: "text", text: "Searching." },
      { type: "function_call", call: { id: "toolu_1", name: "web_search", args: { query: "harbour" } } }
    ]
  },
  {
    role: "user",
    parts: [
      {
        type: "function_response",
        response: { callId: "toolu_1", name: "web_search", result: { success: false, error: "search offline" } }
      }
    ]
  },
  { role: "user", parts: [{ type: "text", text: "Try once more." }] }
];

describe("claude provider", () => {
  it("moves system text out and merges consecutive turns of the same role", () => {
    expect(toClaudeRequest(conversation)).toEqual({
      system: "Be brief.",
      messages: [
        { role: "user", content: [{ type: "text", text: "Find harbour news" }] },
        {
          role: "assistant",
          content: [
            { type: "text", text: "Searching." },
            { type: "tool_use", id: "toolu_1", name: "web_search", input: { query: "harbour" } }
          ]
        },
        {
          role: "user",
          content: [
            {
              type: "tool_result",
              tool_use_id: "toolu_1",
              content: '{"success":false,"error":"search offline"}',
              is_error: true
            },
            { type: "text", text: "Try once more." }
          ]
        }
      ]
    });
  });

  it("keeps text and tool use blocks and skips the rest", () => {
    const response = fromClaudeResponse({
      stop_reason: "tool_use",
      content: [
        { type: "thinking" },
        { type: "text", text: "Let me check." },
        { type: "tool_use", id: "toolu_2", name: "web_search", input: { query: "ferries" } }
      ],
      usage: { input_tokens: 5, output_tokens: 7 }
    });

    expect(response).toEqual({
      message: {
        role: "assistant",
        parts: [
          { type: "text", text: "Let me check." },
          { type: "function_call", call: { id: "toolu_2", name: "web_search", args: { query: "ferries" } } }
        ]
      },
      stopReason: "tool_use",
      usage: { inputTokens: 5, outputTokens: 7 }
    });
  });

  it("rejects a body without a content list", () => {
    expect(() => fromClaudeResponse({ id: "msg_1" })).toThrow(ProviderResponseError);
  });

  it("sends the messages request with the api key headers", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify({ stop_reason: "end_turn", content: [{ type: "text", text: "Done." }] }), {
        status: 200,
        headers: { "content-type": "application/json" }
      })
    );
    const provider = createClaudeProvider({ apiKey: "test-key", timeoutMs: 5_000, fetchFn });

    const response = await provider.request({
      model: "claude-sonnet-4-5",
      messages: conversation.slice(0, 2),
      tools: [{ name: "web_search", description: "Search the web", parameters: { type: "object" } }]
    });

    expect(response.message.parts).toEqual([{ type: "text", text: "Done." }]);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "x-api-key": "test-key",
      "anthropic-version": "2023-06-01"
    });
    expect(JSON.parse(typeof init?.body === "string" ? init.body : "null")).toEqual({
      model: "claude-sonnet-4-5",
      max_tokens: 4_096,
      messages: [{ role: "user", content: [{ type: "text", text: "Find harbour news" }] }],
      system: "Be brief.",
      tools: [{ name: "web_search", description: "Search the web", input_schema: { type: "object" } }],
      tool_choice: { type: "auto" }
    });
  });

  it("reports api failures with the Claude label", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response("overloaded", { status: 529 }));
    const provider = createClaudeProvider({ apiKey: "test-key", timeoutMs: 5_000, fetchFn });

    const failure = provider.request({ model: "claude-sonnet-4-5", messages: conversation.slice(1, 2), tools: [] });

    await expect(failure).rejects.toBeInstanceOf(ProviderApiError);
    await expect(failure).rejects.toThrow("Claude request failed (529): overloaded");
  });
});
