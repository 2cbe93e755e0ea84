import { StepTypeNotFoundError } from "../errors.js";
import type { DataPacket } from "../types.js";
import type { EngineServices } from "./container.js";
import type { StepContext, StepPayload } from "./contracts.js";
import { dataPacketSchema } from "./dataPacket.js";

export type DispatchResult =
  | { kind: "packets"; packets: DataPacket[] }
  | { kind: "empty" }
  | { kind: "invalid"; detail: string };

function isEmptyRecord(value: unknown): boolean {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

/** Maps whatever a step returned onto the three outcomes the orchestrator acts on. */
export function normalizeStepResult(result: unknown): DispatchResult {
  if (Array.isArray(result)) {
    if (result.length === 0) {
      return { kind: "empty" };
    }
    const packets: DataPacket[] = [];
    for (const [index, entry] of result.entries()) {
      const decoded = dataPacketSchema.safeParse(entry);
      if (!decoded.success) {
        return { kind: "invalid", detail: `packet ${index} is malformed: ${decoded.error.issues[0]?.message ?? "invalid"}` };
      }
      packets.push(decoded.data);
    }
    return { kind: "packets", packets };
  }

  if (isEmptyRecord(result)) {
    return { kind: "empty" };
  }

  return { kind: "invalid", detail: `step returned ${result === null ? "null" : typeof result} instead of a packet list` };
}

export interface StepDispatcher {
  dispatch: (payload: StepPayload, context: StepContext) => Promise<DispatchResult>;
}

export function createStepDispatcher(services: EngineServices): StepDispatcher {
  async function dispatch(payload: StepPayload, context: StepContext): Promise<DispatchResult> {
    const stepType = payload.flowStepConfig.stepType;
    const factory = services.registry.resolveStepFactory(stepType);
    if (!factory) {
      throw new StepTypeNotFoundError(stepType);
    }

    const step = factory(services);
    const result: unknown = await step.execute(payload, context);
    return normalizeStepResult(result);
  }

  return { dispatch };
}
