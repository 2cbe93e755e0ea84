export type JobStatus = "pending" | "running" | "completed" | "completed_no_items" | "failed";
export type TerminalJobStatus = Extract<JobStatus, "completed" | "completed_no_items" | "failed">;
export type JobSource = "manual" | "schedule" | "api";
export type StepType = "fetch" | "ai" | "publish" | "update";
export type ProviderId = "openai" | "claude";
export type ConversationMode = "pipeline" | "chat";
export type TaskStatus = "queued" | "leased" | "done" | "dead";
export type ScheduleInterval =
  | "every_5_minutes"
  | "hourly"
  | "every_2_hours"
  | "every_4_hours"
  | "qtrdaily"
  | "twicedaily"
  | "daily"
  | "weekly";

export type JobFailureReason =
  | "exception"
  | "non_array_payload_returned"
  | "step_type_not_found_in_registry"
  | "flow_step_not_found"
  | "data_packet_unavailable"
  | "task_delivery_exhausted"
  | "orphaned_job"
  | "cancelled";

export interface PacketContent {
  title: string;
  body: string;
}

export interface PacketAttachment {
  path: string;
  mimeType: string;
  name?: string;
}

export interface DataPacket {
  content: PacketContent;
  metadata: Record<string, unknown>;
  attachments: PacketAttachment[];
  processing: Record<string, unknown>;
}

export type EngineData = Record<string, string>;

export interface FetchStepConfig {
  stepType: "fetch";
  handler: string;
  handlerConfig: Record<string, unknown>;
}

export interface AiStepConfig {
  stepType: "ai";
  systemPrompt: string;
  userMessage?: string;
  provider?: ProviderId;
  model?: string;
  enabledTools: string[];
  maxTurns?: number;
}

export interface PublishStepConfig {
  stepType: "publish";
  handler: string;
  handlerConfig: Record<string, unknown>;
}

export interface UpdateStepConfig {
  stepType: "update";
  handler: string;
  handlerConfig: Record<string, unknown>;
}

export type StepConfig = FetchStepConfig | AiStepConfig | PublishStepConfig | UpdateStepConfig;
export type HandlerStepConfig = FetchStepConfig | PublishStepConfig | UpdateStepConfig;

export interface FlowStep {
  flowStepId: string;
  executionOrder: number;
  config: StepConfig;
}

export type FlowSchedule =
  | { kind: "manual" }
  | { kind: "once"; runAt: string }
  | { kind: "interval"; interval: ScheduleInterval };

export interface Flow {
  id: string;
  pipelineId: string;
  name: string;
  steps: FlowStep[];
  schedule: FlowSchedule;
  createdAt: string;
  updatedAt: string;
}

export interface JobFailure {
  reason: JobFailureReason;
  message: string;
  context: Record<string, unknown>;
}

export interface Job {
  id: string;
  flowId: string;
  pipelineId: string;
  flowStepIds: string[];
  status: JobStatus;
  currentStepIndex: number;
  context: string;
  source: JobSource;
  failure: JobFailure | null;
  logs: string[];
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface ProcessedItem {
  flowStepId: string;
  sourceType: string;
  itemIdentifier: string;
  jobId: string;
  createdAt: string;
}

export interface ProcessedItemCriteria {
  jobId?: string;
  flowStepId?: string;
  sourceType?: string;
  flowId?: string;
  pipelineId?: string;
}

export type DataRef =
  | { kind: "inline"; packets: DataPacket[] }
  | { kind: "file"; flowId: string; path: string; storedAt: string };

export interface QueueTask {
  id: string;
  jobId: string;
  flowStepId: string;
  dataRef: DataRef;
  status: TaskStatus;
  attempts: number;
  availableAt: string;
  leaseExpiresAt?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
}

export interface FunctionCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface FunctionResponse {
  callId: string;
  name: string;
  result: Record<string, unknown>;
}

export type MessageRole = "user" | "assistant" | "system";

export type MessagePart =
  | { type: "text"; text: string }
  | { type: "function_call"; call: FunctionCall }
  | { type: "function_response"; response: FunctionResponse };

export interface Message {
  role: MessageRole;
  parts: MessagePart[];
}

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolMetadata {
  declaration: ToolDeclaration;
  binding: string;
  isHandlerTool: boolean;
  handler?: string;
  handlerConfig?: Record<string, unknown>;
}

export interface ToolResult {
  success: boolean;
  error?: string;
  [field: string]: unknown;
}

export interface ChatSession {
  id: string;
  messages: Message[];
  createdAt: string;
  updatedAt: string;
}

export interface EngineState {
  flows: Flow[];
  jobs: Job[];
  tasks: QueueTask[];
  processedItems: ProcessedItem[];
  engineData: Record<string, EngineData>;
  scheduleMarkers: Record<string, string>;
  chatSessions: ChatSession[];
}
