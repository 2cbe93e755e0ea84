import { buildPipelineSeedMessages } from "../ai/directives.js";
import { runConversationLoop } from "../ai/loop.js";
import { buildPipelineTools } from "../ai/tools.js";
import { addDataPacket, createDataPacket, createHandlerCompletionPacket, stampPacket } from "../engine/dataPacket.js";
import type { EngineServices } from "../engine/container.js";
import type { Step, StepPayload } from "../engine/contracts.js";
import { ProviderRequestFailure, StepConfigError } from "../errors.js";
import { resolveDefaultModel } from "../runtime/config.js";
import type { AiStepConfig, ProviderId } from "../types.js";

function resolveModel(config: AiStepConfig, payload: StepPayload, providerId: ProviderId): string {
  const configured = config.model?.trim();
  if (configured) {
    return configured;
  }
  return providerId === payload.settings.provider ? payload.settings.model : resolveDefaultModel(providerId);
}

export function createAiStep(services: EngineServices): Step {
  return {
    async execute(payload, context) {
      const config = payload.flowStepConfig;
      if (config.stepType !== "ai") {
        throw new StepConfigError([`stepType: expected ai, received ${config.stepType}`]);
      }

      const tools = buildPipelineTools(services.registry, {
        previousStep: context.previousStep,
        nextStep: context.nextStep,
        stepEnabledTools: config.enabledTools,
        allowedByConfig: payload.settings.enabledTools
      });
      const providerId = config.provider ?? payload.settings.provider;
      const model = resolveModel(config, payload, providerId);
      const jobContext = services.store.getJob(payload.jobId)?.context ?? "";

      const outcome = await runConversationLoop({
        messages: buildPipelineSeedMessages({
          systemPrompt: config.systemPrompt,
          userMessage: config.userMessage,
          jobContext,
          data: payload.data,
          tools
        }),
        tools,
        provider: services.providers(providerId),
        model,
        mode: "pipeline",
        maxTurns: config.maxTurns ?? payload.settings.maxTurns,
        toolSource: services.registry,
        context: {
          jobId: payload.jobId,
          flowStepId: payload.flowStepId,
          engineData: payload.engineData,
          signal: context.signal
        },
        log: context.log,
        signal: context.signal
      });

      if (outcome.error !== undefined) {
        throw new ProviderRequestFailure(providerId, model, outcome.error);
      }

      const response = stampPacket(
        createDataPacket({
          title: "AI response",
          body: outcome.finalContent,
          metadata: {
            type: "ai_response",
            provider: providerId,
            model,
            turn_count: outcome.turnCount,
            completed: outcome.completed,
            max_turns_reached: outcome.maxTurnsReached
          },
          processing: {
            tool_calls: outcome.toolExecutionResults.map((record) => ({
              name: record.call.name,
              success: record.result.success
            })),
            duplicate_calls: outcome.duplicateCallCount
          }
        }),
        payload.flowStepId,
        "ai"
      );
      let data = addDataPacket(payload.data, response);

      const handlerRun = outcome.toolExecutionResults.find((record) => record.isHandlerTool && record.result.success);
      if (handlerRun?.handler) {
        data = addDataPacket(
          data,
          createHandlerCompletionPacket({
            handler: handlerRun.handler,
            toolName: handlerRun.call.name,
            flowStepId: payload.flowStepId,
            result: handlerRun.result
          })
        );
      }

      return data;
    }
  };
}
