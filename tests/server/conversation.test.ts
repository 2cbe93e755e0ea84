import { describe, expect, it } from "vitest";

import {
  buildDuplicateCallResult,
  buildFunctionResponse,
  buildFunctionResponseMessage,
  buildTextMessage,
  collectFunctionCalls,
  extractFunctionCalls,
  extractText,
  isDuplicateToolCall,
  summarizeToolResult,
  toolCallSignature
} from "../../server/ai/conversation.js";
import type { Message } from "../../server/types.js";

describe("conversation manager", () => {
  const assistant: Message = {
    role: "assistant",
    parts: [
      { type: "text", text: "Looking that up. " },
      { type: "function_call", call: { id: "call-1", name: "web_search", args: { query: "tides", limit: 3 } } },
      { type: "text", text: "One moment." }
    ]
  };

  it("joins text parts and trims the result", () => {
    expect(extractText(assistant)).toBe("Looking that up. \nOne moment.");
    expect(extractText(buildTextMessage("user", "  hi  "))).toBe("hi");
  });

  it("extracts function calls in order", () => {
    expect(extractFunctionCalls(assistant)).toEqual([
      { id: "call-1", name: "web_search", args: { query: "tides", limit: 3 } }
    ]);
    expect(collectFunctionCalls([buildTextMessage("system", "rules"), assistant, assistant])).toHaveLength(2);
  });

  it("builds signatures that ignore argument key order", () => {
    const left = toolCallSignature({ name: "web_search", args: { query: "tides", filters: { region: "eu", year: 2026 } } });
    const right = toolCallSignature({ name: "web_search", args: { filters: { year: 2026, region: "eu" }, query: "tides" } });

    expect(left).toBe(right);
    expect(left).toBe('web_search::{"filters":{"region":"eu","year":2026},"query":"tides"}');
  });

  it("treats same name with different arguments as a new call", () => {
    const prior = [{ id: "a", name: "web_search", args: { query: "tides" } }];

    expect(isDuplicateToolCall(prior, { id: "b", name: "web_search", args: { query: "tides" } })).toBe(true);
    expect(isDuplicateToolCall(prior, { id: "c", name: "web_search", args: { query: "waves" } })).toBe(false);
    expect(isDuplicateToolCall(prior, { id: "d", name: "news_search", args: { query: "tides" } })).toBe(false);
  });

  it("describes a rejected duplicate to the model", () => {
    expect(buildDuplicateCallResult({ id: "x", name: "web_search", args: {} })).toEqual({
      success: false,
      duplicate: true,
      error:
        "Duplicate tool call: web_search was already called with these exact parameters. Use different parameters or a different tool."
    });
  });

  it("wraps tool results as user function responses", () => {
    const call = { id: "call-9", name: "web_search", args: { query: "tides" } };
    const message = buildFunctionResponseMessage(buildFunctionResponse(call, { success: true, count: 2 }));

    expect(message).toEqual({
      role: "user",
      parts: [{ type: "function_response", response: { callId: "call-9", name: "web_search", result: { success: true, count: 2 } } }]
    });
  });

  it("summarises tool results for the job log", () => {
    expect(summarizeToolResult({ success: true })).toBe("succeeded");
    expect(summarizeToolResult({ success: true, post_id: "p1", url: "u" })).toBe("succeeded (post_id, url)");
    expect(summarizeToolResult({ success: false, error: "quota" })).toBe("failed: quota");
    expect(summarizeToolResult({ success: false })).toBe("failed: unknown error");
  });
});
