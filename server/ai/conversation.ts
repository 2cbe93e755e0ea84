import type { FunctionCall, FunctionResponse, Message, MessageRole, ToolResult } from "../types.js";

export function buildTextMessage(role: MessageRole, text: string): Message {
  return { role, parts: [{ type: "text", text }] };
}

export function buildFunctionResponseMessage(response: FunctionResponse): Message {
  return { role: "user", parts: [{ type: "function_response", response }] };
}

export function buildFunctionResponse(call: FunctionCall, result: ToolResult): FunctionResponse {
  return {
    callId: call.id,
    name: call.name,
    result: { ...result }
  };
}

export function extractText(message: Message): string {
  return message.parts
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n")
    .trim();
}

export function extractFunctionCalls(message: Message): FunctionCall[] {
  return message.parts.flatMap((part) => (part.type === "function_call" ? [part.call] : []));
}

export function collectFunctionCalls(messages: Message[]): FunctionCall[] {
  return messages.flatMap(extractFunctionCalls);
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([key, entry]) => [key, canonicalize(entry)])
    );
  }
  return value;
}

/** Name plus argument map with keys sorted, so key order never hides a repeat. */
export function toolCallSignature(call: Pick<FunctionCall, "name" | "args">): string {
  return `${call.name}::${JSON.stringify(canonicalize(call.args))}`;
}

export function isDuplicateToolCall(priorCalls: FunctionCall[], call: FunctionCall): boolean {
  const signature = toolCallSignature(call);
  return priorCalls.some((prior) => toolCallSignature(prior) === signature);
}

export function buildDuplicateCallResult(call: FunctionCall): ToolResult {
  return {
    success: false,
    duplicate: true,
    error: `Duplicate tool call: ${call.name} was already called with these exact parameters. Use different parameters or a different tool.`
  };
}

export function summarizeToolResult(result: ToolResult): string {
  if (!result.success) {
    return `failed: ${result.error ?? "unknown error"}`;
  }
  const fields = Object.keys(result).filter((key) => key !== "success");
  return fields.length > 0 ? `succeeded (${fields.join(", ")})` : "succeeded";
}
