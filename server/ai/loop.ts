import { clampMaxTurns } from "../runtime/config.js";
import { describeError } from "../errors.js";
import type { ModelProvider } from "../providers/types.js";
import type { ConversationMode, FunctionCall, Message, ToolMetadata, ToolResult } from "../types.js";
import {
  buildDuplicateCallResult,
  buildFunctionResponse,
  buildFunctionResponseMessage,
  collectFunctionCalls,
  extractFunctionCalls,
  extractText,
  isDuplicateToolCall,
  summarizeToolResult
} from "./conversation.js";
import { executeToolCall, type ToolExecutionContext, type ToolImplementationSource } from "./toolExecutor.js";
import { indexTools } from "./tools.js";

export interface ConversationLoopInput {
  messages: Message[];
  tools: ToolMetadata[];
  provider: ModelProvider;
  model: string;
  mode: ConversationMode;
  maxTurns?: number;
  toolSource: ToolImplementationSource;
  context: ToolExecutionContext;
  log?: (message: string) => void;
  signal?: AbortSignal;
}

export interface ToolExecutionRecord {
  turn: number;
  call: FunctionCall;
  result: ToolResult;
  isHandlerTool: boolean;
  handler?: string;
}

export interface ConversationLoopResult {
  messages: Message[];
  finalContent: string;
  turnCount: number;
  completed: boolean;
  maxTurnsReached: boolean;
  toolExecutionResults: ToolExecutionRecord[];
  duplicateCallCount: number;
  error?: string;
}

export async function runConversationLoop(input: ConversationLoopInput): Promise<ConversationLoopResult> {
  const maxTurns = clampMaxTurns(input.maxTurns);
  const toolsByName = indexTools(input.tools);
  const declarations = input.tools.map((tool) => tool.declaration);
  const messages: Message[] = [...input.messages];
  const toolExecutionResults: ToolExecutionRecord[] = [];
  const log = input.log;
  let turnCount = 0;
  let completed = false;
  let maxTurnsReached = false;
  let finalContent = "";
  let duplicateCallCount = 0;

  log?.(`Conversation started: mode=${input.mode}, model=${input.model}, tools=${declarations.length}, maxTurns=${maxTurns}`);

  while (!completed) {
    if (turnCount >= maxTurns) {
      maxTurnsReached = true;
      log?.(`Maximum turns reached (${maxTurns}); returning last content (chars=${finalContent.length}).`);
      console.warn(`[ai-loop] Conversation stopped at the ${maxTurns} turn limit without completing.`);
      break;
    }

    turnCount += 1;
    const roundStartedAt = Date.now();
    log?.(`Provider round ${turnCount} started`);

    let response: Message;
    try {
      const providerResponse = await input.provider.request({
        model: input.model,
        messages,
        tools: declarations,
        signal: input.signal,
        log
      });
      response = providerResponse.message;
    } catch (error) {
      const message = describeError(error);
      log?.(`Provider round ${turnCount} failed in ${Date.now() - roundStartedAt}ms: ${message}`);
      return {
        messages,
        finalContent,
        turnCount,
        completed: false,
        maxTurnsReached: false,
        toolExecutionResults,
        duplicateCallCount,
        error: message
      };
    }

    const priorCalls = collectFunctionCalls(messages);
    messages.push(response);

    const text = extractText(response);
    if (text.length > 0) {
      finalContent = text;
    }

    const calls = extractFunctionCalls(response);
    if (calls.length === 0) {
      log?.(`Provider round ${turnCount} completed with final output (no tool calls).`);
      completed = true;
      break;
    }

    log?.(`Provider round ${turnCount} requested ${calls.length} tool call(s).`);

    for (const call of calls) {
      if (isDuplicateToolCall(priorCalls, call)) {
        duplicateCallCount += 1;
        log?.(`Tool call rejected as duplicate: ${call.name}`);
        messages.push(buildFunctionResponseMessage(buildFunctionResponse(call, buildDuplicateCallResult(call))));
        priorCalls.push(call);
        continue;
      }
      priorCalls.push(call);

      const tool = toolsByName.get(call.name);
      const toolStartedAt = Date.now();
      const result = await executeToolCall(call, toolsByName, input.toolSource, input.context);
      log?.(`Tool ${call.name} ${summarizeToolResult(result)} in ${Date.now() - toolStartedAt}ms`);

      messages.push(buildFunctionResponseMessage(buildFunctionResponse(call, result)));
      toolExecutionResults.push({
        turn: turnCount,
        call,
        result,
        isHandlerTool: tool?.isHandlerTool === true,
        ...(tool?.handler ? { handler: tool.handler } : {})
      });

      if (input.mode === "pipeline" && tool?.isHandlerTool === true && result.success) {
        log?.(`Handler tool ${call.name} succeeded; conversation complete.`);
        completed = true;
        break;
      }
    }
  }

  return {
    messages,
    finalContent,
    turnCount,
    completed,
    maxTurnsReached,
    toolExecutionResults,
    duplicateCallCount
  };
}
