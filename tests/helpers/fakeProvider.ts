import type { ModelProvider, ProviderRequest } from "../../server/providers/types.js";
import type { FunctionCall, Message, ProviderId } from "../../server/types.js";

export type ScriptedTurn = Message | Error;

export interface ScriptedProvider extends ModelProvider {
  requests: Array<Pick<ProviderRequest, "model" | "messages" | "tools">>;
}

export function assistantText(text: string): Message {
  return { role: "assistant", parts: [{ type: "text", text }] };
}

export function assistantCalls(calls: Array<Omit<FunctionCall, "id"> & { id?: string }>, text?: string): Message {
  return {
    role: "assistant",
    parts: [
      ...(text ? [{ type: "text" as const, text }] : []),
      ...calls.map((call, index) => ({
        type: "function_call" as const,
        call: { id: call.id ?? `call_${call.name}_${index}`, name: call.name, args: call.args }
      }))
    ]
  };
}

/** Replays one scripted turn per request and records what it was asked. */
export function createScriptedProvider(turns: ScriptedTurn[], id: ProviderId = "openai"): ScriptedProvider {
  const queue = [...turns];
  const requests: ScriptedProvider["requests"] = [];

  return {
    id,
    requests,
    async request(input) {
      requests.push(structuredClone({ model: input.model, messages: input.messages, tools: input.tools }));
      const next = queue.shift();
      if (!next) {
        throw new Error("No scripted provider turn left");
      }
      if (next instanceof Error) {
        throw next;
      }
      return { message: structuredClone(next) };
    }
  };
}
