import type { EngineExtension } from "../engine/registry.js";
import { createAiStep } from "./aiStep.js";
import { createFetchStep } from "./fetchStep.js";
import { createHandlerActionStep } from "./handlerActionStep.js";

export const builtinStepsExtension: EngineExtension = {
  name: "builtin-steps",
  register: (registry) => {
    registry
      .registerStepType("fetch", createFetchStep)
      .registerStepType("ai", createAiStep)
      .registerStepType("publish", createHandlerActionStep("publish"))
      .registerStepType("update", createHandlerActionStep("update"));
  }
};
