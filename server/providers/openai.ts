import { nanoid } from "nanoid";
import { z } from "zod";
import type { Message, MessagePart, ToolDeclaration } from "../types.js";
import {
  OPENAI_DEFAULT_URL,
  ProviderResponseError,
  parseJsonRecordLoose,
  postJson
} from "./shared.js";
import type { ModelProvider, ProviderClientOptions, ProviderRequest, ProviderResponse } from "./types.js";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.unknown()
                })
              })
            )
            .optional()
        })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional()
    })
    .optional()
});

type OpenAiMessage =
  | { role: "system" | "user"; content: string }
  | { role: "tool"; tool_call_id: string; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{ id: string; type: "function"; function: { name: string; arguments: string } }>;
    };

function joinText(parts: MessagePart[]): string {
  return parts
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n\n");
}

export function toOpenAiMessages(messages: Message[]): OpenAiMessage[] {
  const mapped: OpenAiMessage[] = [];

  for (const message of messages) {
    const text = joinText(message.parts);

    if (message.role === "assistant") {
      const toolCalls = message.parts.flatMap((part) =>
        part.type === "function_call"
          ? [
              {
                id: part.call.id,
                type: "function" as const,
                function: { name: part.call.name, arguments: JSON.stringify(part.call.args) }
              }
            ]
          : []
      );
      mapped.push({
        role: "assistant",
        content: text.length > 0 ? text : null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {})
      });
      continue;
    }

    for (const part of message.parts) {
      if (part.type === "function_response") {
        mapped.push({
          role: "tool",
          tool_call_id: part.response.callId,
          content: JSON.stringify(part.response.result)
        });
      }
    }

    if (text.length > 0) {
      mapped.push({ role: message.role, content: text });
    }
  }

  return mapped;
}

export function toOpenAiTools(tools: ToolDeclaration[]): Array<Record<string, unknown>> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters
    }
  }));
}

export function fromOpenAiResponse(body: unknown): ProviderResponse {
  const parsed = chatCompletionSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderResponseError("openai", `OpenAI response did not match the chat completion shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const choice = parsed.data.choices[0];
  const parts: MessagePart[] = [];
  const content = choice.message.content ?? "";
  if (content.trim().length > 0) {
    parts.push({ type: "text", text: content });
  }

  for (const toolCall of choice.message.tool_calls ?? []) {
    parts.push({
      type: "function_call",
      call: {
        id: toolCall.id ?? `call_${nanoid(12)}`,
        name: toolCall.function.name,
        args: parseJsonRecordLoose(toolCall.function.arguments) ?? {}
      }
    });
  }

  const usage = parsed.data.usage;
  return {
    message: { role: "assistant", parts },
    ...(choice.finish_reason ? { stopReason: choice.finish_reason } : {}),
    ...(usage
      ? { usage: { inputTokens: usage.prompt_tokens ?? 0, outputTokens: usage.completion_tokens ?? 0 } }
      : {})
  };
}

export function createOpenAiProvider(options: ProviderClientOptions): ModelProvider {
  const endpoint = `${(options.baseUrl || OPENAI_DEFAULT_URL).replace(/\/$/, "")}/chat/completions`;
  const fetchFn = options.fetchFn ?? fetch;

  return {
    id: "openai",
    async request(input: ProviderRequest): Promise<ProviderResponse> {
      const requestBody: Record<string, unknown> = {
        model: input.model,
        messages: toOpenAiMessages(input.messages)
      };
      if (input.tools.length > 0) {
        requestBody.tools = toOpenAiTools(input.tools);
        requestBody.tool_choice = "auto";
      }

      const body = await postJson({
        providerId: "openai",
        url: endpoint,
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body: requestBody,
        timeoutMs: options.timeoutMs,
        signal: input.signal,
        fetchFn,
        log: input.log
      });
      return fromOpenAiResponse(body);
    }
  };
}
