import type { EngineState } from "../types.js";

export interface FlowStateContainer {
  flows: EngineState["flows"];
}

export interface JobStateContainer {
  jobs: EngineState["jobs"];
}

export interface TaskStateContainer {
  tasks: EngineState["tasks"];
}

export interface ProcessedItemStateContainer extends FlowStateContainer {
  processedItems: EngineState["processedItems"];
}
