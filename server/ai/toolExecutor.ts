import type { ToolImplementation } from "../engine/contracts.js";
import { ToolClassMissingError, ToolNotFoundError, describeError, isToolClassMissingError } from "../errors.js";
import type { EngineData, FunctionCall, ToolMetadata, ToolResult } from "../types.js";

export interface ToolExecutionContext {
  jobId?: string;
  flowStepId?: string;
  engineData: EngineData;
  signal?: AbortSignal;
}

export interface ToolImplementationSource {
  getToolImplementation(binding: string): ToolImplementation | undefined;
}

export function buildToolParameters(
  call: FunctionCall,
  context: ToolExecutionContext
): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context.engineData)) {
    parameters[key] = value;
  }
  Object.assign(parameters, call.args);
  if (context.jobId) {
    parameters.job_id = context.jobId;
  }
  if (context.flowStepId) {
    parameters.flow_step_id = context.flowStepId;
  }
  return parameters;
}

export function resolveToolImplementation(
  call: FunctionCall,
  tools: ReadonlyMap<string, ToolMetadata>,
  source: ToolImplementationSource
): { tool: ToolMetadata; implementation: ToolImplementation } {
  const tool = tools.get(call.name);
  if (!tool) {
    throw new ToolNotFoundError(call.name);
  }

  const implementation = source.getToolImplementation(tool.binding);
  if (!implementation) {
    throw new ToolClassMissingError(call.name, tool.binding);
  }

  return { tool, implementation };
}

/**
 * Runs one tool call. Never throws: lookup failures and handler exceptions
 * come back as `{ success: false }` results for the model to read.
 */
export async function executeToolCall(
  call: FunctionCall,
  tools: ReadonlyMap<string, ToolMetadata>,
  source: ToolImplementationSource,
  context: ToolExecutionContext
): Promise<ToolResult> {
  let resolved: { tool: ToolMetadata; implementation: ToolImplementation };
  try {
    resolved = resolveToolImplementation(call, tools, source);
  } catch (error) {
    return {
      success: false,
      error: describeError(error),
      error_code: isToolClassMissingError(error) ? "tool_class_missing" : "tool_not_found"
    };
  }

  try {
    const result = await resolved.implementation({
      toolName: call.name,
      parameters: buildToolParameters(call, context),
      handlerConfig: resolved.tool.handlerConfig ?? {},
      signal: context.signal
    });
    if (typeof result !== "object" || result === null || typeof result.success !== "boolean") {
      return { success: false, error: `Tool ${call.name} returned a malformed result.` };
    }
    return result;
  } catch (error) {
    return {
      success: false,
      error: `Tool ${call.name} threw: ${describeError(error)}`
    };
  }
}
