import type { EngineSettingsView } from "../runtime/config.js";
import type {
  DataPacket,
  EngineData,
  FlowStep,
  HandlerStepConfig,
  StepConfig,
  ToolDeclaration,
  ToolResult
} from "../types.js";
import type { ProcessedItemsGate } from "./dedup.js";

export interface StepPayload {
  jobId: string;
  flowId: string;
  pipelineId: string;
  flowStepId: string;
  flowStepConfig: StepConfig;
  data: DataPacket[];
  engineData: EngineData;
  settings: EngineSettingsView;
}

/** An empty object or empty array means the step found nothing to do. */
export type StepExecutionResult = DataPacket[] | Record<string, never>;

export interface StepContext {
  previousStep?: FlowStep;
  nextStep?: FlowStep;
  gate: ProcessedItemsGate;
  mergeEngineData: (patch: EngineData) => EngineData;
  log: (message: string) => void;
  signal?: AbortSignal;
}

export interface Step {
  execute(payload: StepPayload, context: StepContext): Promise<StepExecutionResult>;
}

export interface ToolInvocation {
  toolName: string;
  parameters: Record<string, unknown>;
  handlerConfig: Record<string, unknown>;
  signal?: AbortSignal;
}

export type ToolImplementation = (invocation: ToolInvocation) => Promise<ToolResult> | ToolResult;

export interface HandlerToolDefinition {
  declaration: ToolDeclaration;
  binding: string;
}

export interface HandlerFetchInput {
  payload: StepPayload;
  config: HandlerStepConfig;
  gate: ProcessedItemsGate;
  mergeEngineData: (patch: EngineData) => EngineData;
  log: (message: string) => void;
  signal?: AbortSignal;
}

export interface HandlerExecuteInput {
  payload: StepPayload;
  config: HandlerStepConfig;
  parameters: Record<string, unknown>;
  log: (message: string) => void;
  signal?: AbortSignal;
}

export interface HandlerDefinition {
  slug: string;
  stepType: HandlerStepConfig["stepType"];
  /** Fetch handlers return new packets for items not yet processed. */
  fetch?: (input: HandlerFetchInput) => Promise<DataPacket[]>;
  /** Publish and update handlers act on the incoming packets directly. */
  execute?: (input: HandlerExecuteInput) => Promise<ToolResult>;
  /** Tools advertised to an AI step placed next to this handler's step. */
  tools?: (handlerConfig: Record<string, unknown>) => HandlerToolDefinition[];
}

export interface GlobalToolDefinition {
  declaration: ToolDeclaration;
  binding: string;
}
