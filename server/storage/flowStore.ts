import { nanoid } from "nanoid";
import { decodeFlowSchedule, decodeStepConfig } from "../engine/stepConfig.js";
import type { Flow, FlowInput, FlowSchedule, FlowStep } from "../types.js";
import type { FlowStateContainer } from "./contracts.js";
import { nowIso } from "./helpers.js";

function normalizeSteps(input: FlowInput): FlowStep[] {
  const seen = new Set<string>();
  return input.steps.map((step, index) => {
    const requestedId = step.flowStepId?.trim() ?? "";
    const flowStepId = requestedId.length > 0 && !seen.has(requestedId) ? requestedId : nanoid();
    seen.add(flowStepId);
    return {
      flowStepId,
      executionOrder: index,
      config: decodeStepConfig(step.config)
    };
  });
}

export function orderFlowSteps(flow: Flow): FlowStep[] {
  return [...flow.steps].sort((left, right) => left.executionOrder - right.executionOrder);
}

export function createFlow(state: FlowStateContainer, input: FlowInput): Flow {
  const now = nowIso();
  const flow: Flow = {
    id: nanoid(),
    pipelineId: input.pipelineId?.trim() || nanoid(),
    name: input.name.trim() || "Untitled flow",
    steps: normalizeSteps(input),
    schedule: decodeFlowSchedule(input.schedule),
    createdAt: now,
    updatedAt: now
  };

  state.flows.unshift(flow);
  return flow;
}

export function getFlow(state: FlowStateContainer, flowId: string): Flow | undefined {
  return state.flows.find((entry) => entry.id === flowId);
}

export function findFlowStep(state: FlowStateContainer, flowStepId: string): { flow: Flow; step: FlowStep } | undefined {
  for (const flow of state.flows) {
    const step = flow.steps.find((entry) => entry.flowStepId === flowStepId);
    if (step) {
      return { flow, step };
    }
  }
  return undefined;
}

export function setFlowSchedule(state: FlowStateContainer, flowId: string, schedule: FlowSchedule): Flow | undefined {
  const index = state.flows.findIndex((entry) => entry.id === flowId);
  if (index === -1) {
    return undefined;
  }

  const updated: Flow = {
    ...state.flows[index],
    schedule: decodeFlowSchedule(schedule),
    updatedAt: nowIso()
  };
  state.flows[index] = updated;
  return updated;
}

export function deleteFlow(state: FlowStateContainer, flowId: string): boolean {
  const previousCount = state.flows.length;
  state.flows = state.flows.filter((entry) => entry.id !== flowId);
  return state.flows.length !== previousCount;
}
