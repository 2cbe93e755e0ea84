import { z } from "zod";
import type { Message, MessagePart, ToolDeclaration } from "../types.js";
import { CLAUDE_DEFAULT_URL, ProviderResponseError, maybeRecord, postJson } from "./shared.js";
import type { ModelProvider, ProviderClientOptions, ProviderRequest, ProviderResponse } from "./types.js";

const CLAUDE_MAX_OUTPUT_TOKENS = 4_096;

const messagesResponseSchema = z.object({
  stop_reason: z.string().nullable().optional(),
  content: z.array(
    z.union([
      z.object({ type: z.literal("text"), text: z.string() }),
      z.object({ type: z.literal("tool_use"), id: z.string(), name: z.string(), input: z.unknown() }),
      z.object({ type: z.string() })
    ])
  ),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional()
    })
    .optional()
});

type ClaudeContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface ClaudeMessage {
  role: "user" | "assistant";
  content: ClaudeContentBlock[];
}

function toContentBlock(part: MessagePart): ClaudeContentBlock {
  switch (part.type) {
    case "text":
      return { type: "text", text: part.text };
    case "function_call":
      return { type: "tool_use", id: part.call.id, name: part.call.name, input: part.call.args };
    case "function_response":
      return {
        type: "tool_result",
        tool_use_id: part.response.callId,
        content: JSON.stringify(part.response.result),
        ...(part.response.result.success === false ? { is_error: true } : {})
      };
  }
}

/** Splits system text out and merges consecutive turns, which the Messages API requires. */
export function toClaudeRequest(messages: Message[]): { system: string; messages: ClaudeMessage[] } {
  const systemChunks: string[] = [];
  const mapped: ClaudeMessage[] = [];

  for (const message of messages) {
    if (message.role === "system") {
      for (const part of message.parts) {
        if (part.type === "text") {
          systemChunks.push(part.text);
        }
      }
      continue;
    }

    const blocks = message.parts.map(toContentBlock);
    if (blocks.length === 0) {
      continue;
    }

    const previous = mapped[mapped.length - 1];
    if (previous && previous.role === message.role) {
      previous.content.push(...blocks);
    } else {
      mapped.push({ role: message.role, content: blocks });
    }
  }

  return { system: systemChunks.join("\n\n"), messages: mapped };
}

export function toClaudeTools(tools: ToolDeclaration[]): Array<Record<string, unknown>> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters
  }));
}

export function fromClaudeResponse(body: unknown): ProviderResponse {
  const parsed = messagesResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderResponseError("claude", `Claude response did not match the messages shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const parts: MessagePart[] = [];
  for (const block of parsed.data.content) {
    if ("text" in block && block.type === "text" && block.text.trim().length > 0) {
      parts.push({ type: "text", text: block.text });
    } else if ("id" in block && block.type === "tool_use") {
      parts.push({
        type: "function_call",
        call: { id: block.id, name: block.name, args: maybeRecord(block.input) ?? {} }
      });
    }
  }

  const usage = parsed.data.usage;
  return {
    message: { role: "assistant", parts },
    ...(parsed.data.stop_reason ? { stopReason: parsed.data.stop_reason } : {}),
    ...(usage ? { usage: { inputTokens: usage.input_tokens ?? 0, outputTokens: usage.output_tokens ?? 0 } } : {})
  };
}

export function createClaudeProvider(options: ProviderClientOptions): ModelProvider {
  const endpoint = `${(options.baseUrl || CLAUDE_DEFAULT_URL).replace(/\/$/, "")}/messages`;
  const fetchFn = options.fetchFn ?? fetch;

  return {
    id: "claude",
    async request(input: ProviderRequest): Promise<ProviderResponse> {
      const { system, messages } = toClaudeRequest(input.messages);
      const requestBody: Record<string, unknown> = {
        model: input.model,
        max_tokens: CLAUDE_MAX_OUTPUT_TOKENS,
        messages
      };
      if (system.length > 0) {
        requestBody.system = system;
      }
      if (input.tools.length > 0) {
        requestBody.tools = toClaudeTools(input.tools);
        requestBody.tool_choice = { type: "auto" };
      }

      const body = await postJson({
        providerId: "claude",
        url: endpoint,
        headers: {
          "x-api-key": options.apiKey,
          "anthropic-version": "2023-06-01"
        },
        body: requestBody,
        timeoutMs: options.timeoutMs,
        signal: input.signal,
        fetchFn,
        log: input.log
      });
      return fromClaudeResponse(body);
    }
  };
}
