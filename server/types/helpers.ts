import type { DataRef, FlowSchedule, JobSource, StepConfig } from "./contracts.js";

export interface FlowStepInput {
  flowStepId?: string;
  config: StepConfig;
}

export interface FlowInput {
  pipelineId?: string;
  name: string;
  steps: FlowStepInput[];
  schedule?: FlowSchedule;
}

export interface JobTrigger {
  context: string;
  source: JobSource;
}

export interface TaskInput {
  jobId: string;
  flowStepId: string;
  dataRef: DataRef;
}
