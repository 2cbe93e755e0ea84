import { addDataPacket, createDataPacket, findHandlerCompletion, stampPacket } from "../engine/dataPacket.js";
import type { EngineServices } from "../engine/container.js";
import type { Step, StepPayload } from "../engine/contracts.js";
import type { StepFactory } from "../engine/registry.js";
import { HandlerExecutionError, HandlerNotFoundError, StepConfigError } from "../errors.js";
import type { ToolResult } from "../types.js";

type ActionStepType = "publish" | "update";

function readCompletionResult(value: unknown): ToolResult | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const success = record.success;
  if (typeof success !== "boolean") {
    return undefined;
  }
  const error = record.error;
  return { ...record, success, ...(typeof error === "string" ? { error } : {}) };
}

function buildHandlerParameters(payload: StepPayload): Record<string, unknown> {
  return {
    ...payload.engineData,
    job_id: payload.jobId,
    flow_step_id: payload.flowStepId
  };
}

/**
 * Publish and update steps. When the AI step right before already ran this
 * handler through a tool call, its recorded result is reported instead of
 * acting twice.
 */
export function createHandlerActionStep(stepType: ActionStepType): StepFactory {
  return (services: EngineServices): Step => ({
    async execute(payload, context) {
      const config = payload.flowStepConfig;
      if (config.stepType === "ai" || config.stepType !== stepType) {
        throw new StepConfigError([`stepType: expected ${stepType}, received ${config.stepType}`]);
      }

      let result: ToolResult | undefined;
      let reused = false;
      const completion = findHandlerCompletion(payload.data, config.handler, context.previousStep?.flowStepId);
      if (completion) {
        result = readCompletionResult(completion.metadata.handler_result);
        reused = result !== undefined;
      }

      if (!result) {
        const handler = services.registry.getHandler(config.handler);
        if (!handler?.execute || handler.stepType !== stepType) {
          throw new HandlerNotFoundError(config.handler, stepType);
        }
        result = await handler.execute({
          payload,
          config,
          parameters: buildHandlerParameters(payload),
          log: context.log,
          signal: context.signal
        });
      }

      if (!result.success) {
        throw new HandlerExecutionError(config.handler, result.error ?? "handler reported failure", result);
      }

      context.log(
        reused
          ? `Handler ${config.handler} already completed in the AI step; reusing its result.`
          : `Handler ${config.handler} completed.`
      );

      const packet = createDataPacket({
        title: `${stepType === "publish" ? "Published" : "Updated"} via ${config.handler}`,
        body: JSON.stringify(result),
        metadata: {
          type: `${stepType}_result`,
          handler: config.handler,
          reused_ai_result: reused
        },
        processing: { result }
      });
      return addDataPacket(payload.data, stampPacket(packet, payload.flowStepId, stepType));
    }
  });
}
