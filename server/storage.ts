import { resolveDataRootPath, resolveStateFilePath } from "./runtime/dataPaths.js";
import { deepClone, ensureStateFile, nowIso, readStateFile, writeStateFile } from "./storage/helpers.js";
import {
  createFlow as createFlowInState,
  deleteFlow as deleteFlowInState,
  findFlowStep as findFlowStepInState,
  getFlow as getFlowInState,
  setFlowSchedule as setFlowScheduleInState
} from "./storage/flowStore.js";
import {
  appendJobLog as appendJobLogInState,
  createJob as createJobInState,
  getJob as getJobInState,
  isJobAtStep,
  listJobs as listJobsInState,
  updateJob as updateJobInState,
  type JobListFilter
} from "./storage/jobStore.js";
import {
  deleteProcessedItems as deleteProcessedItemsInState,
  hasProcessedItem as hasProcessedItemInState,
  insertProcessedItem as insertProcessedItemInState,
  purgeProcessedItemsBefore as purgeProcessedItemsInState,
  type ProcessedItemKey
} from "./storage/processedItemStore.js";
import {
  ackTask as ackTaskInState,
  deadLetterTask as deadLetterTaskInState,
  enqueueTask as enqueueTaskInState,
  leaseNextTask as leaseNextTaskInState,
  listTasks as listTasksInState,
  pruneFinishedTasks as pruneFinishedTasksInState,
  releaseExpiredLeases as releaseExpiredLeasesInState,
  releaseTask as releaseTaskInState,
  type TaskListFilter
} from "./storage/taskStore.js";
import type {
  ChatSession,
  EngineData,
  EngineState,
  Flow,
  FlowInput,
  FlowSchedule,
  FlowStep,
  Job,
  JobTrigger,
  ProcessedItem,
  ProcessedItemCriteria,
  QueueTask,
  TaskInput
} from "./types.js";

const MAX_CHAT_SESSIONS = 200;

/**
 * JSON file backed store. Every mutation runs against a draft copy and is
 * written to disk before the in-memory state is replaced.
 */
export class LocalStore {
  private state: EngineState;

  constructor(private readonly dbPath: string = resolveStateFilePath(resolveDataRootPath())) {
    ensureStateFile(this.dbPath);
    this.state = readStateFile(this.dbPath);
  }

  private mutate<T>(operation: (draft: EngineState) => T): T {
    const draft = deepClone(this.state);
    const result = operation(draft);
    writeStateFile(this.dbPath, draft);
    this.state = draft;
    return deepClone(result);
  }

  getState(): EngineState {
    return deepClone(this.state);
  }

  listFlows(): Flow[] {
    return deepClone(this.state.flows);
  }

  getFlow(flowId: string): Flow | undefined {
    const flow = getFlowInState(this.state, flowId);
    return flow ? deepClone(flow) : undefined;
  }

  findFlowStep(flowStepId: string): { flow: Flow; step: FlowStep } | undefined {
    const found = findFlowStepInState(this.state, flowStepId);
    return found ? deepClone(found) : undefined;
  }

  createFlow(input: FlowInput): Flow {
    return this.mutate((draft) => createFlowInState(draft, input));
  }

  setFlowSchedule(flowId: string, schedule: FlowSchedule): Flow | undefined {
    return this.mutate((draft) => setFlowScheduleInState(draft, flowId, schedule));
  }

  deleteFlow(flowId: string): boolean {
    return this.mutate((draft) => {
      const deleted = deleteFlowInState(draft, flowId);
      if (deleted) {
        delete draft.scheduleMarkers[flowId];
      }
      return deleted;
    });
  }

  createJob(flow: Flow, trigger: JobTrigger): Job {
    return this.mutate((draft) => createJobInState(draft, flow, trigger));
  }

  getJob(jobId: string): Job | undefined {
    const job = getJobInState(this.state, jobId);
    return job ? deepClone(job) : undefined;
  }

  listJobs(filter?: JobListFilter): Job[] {
    return deepClone(listJobsInState(this.state, filter));
  }

  updateJob(jobId: string, updater: (job: Job) => Job): Job | undefined {
    return this.mutate((draft) => updateJobInState(draft, jobId, updater));
  }

  appendJobLog(jobId: string, message: string): void {
    this.mutate((draft) => appendJobLogInState(draft, jobId, message));
  }

  /**
   * Queues the next step and moves the job cursor in one write. Returns
   * undefined when the job is gone, terminal, or no longer at `fromFlowStepId`.
   */
  handOffJob(jobId: string, fromFlowStepId: string, input: TaskInput, now?: Date): { job: Job; task: QueueTask } | undefined {
    const current = getJobInState(this.state, jobId);
    if (!current || !isJobAtStep(current, fromFlowStepId)) {
      return undefined;
    }
    return this.mutate((draft) => {
      const job = updateJobInState(draft, jobId, (previous) => ({
        ...previous,
        currentStepIndex: previous.currentStepIndex + 1
      }));
      if (!job) {
        return undefined;
      }
      const task = enqueueTaskInState(draft, input, now);
      return { job, task };
    });
  }

  /** Same guard as handOffJob, for the step that ends the job. */
  finishJob(jobId: string, fromFlowStepId: string, status: "completed" | "completed_no_items"): Job | undefined {
    const current = getJobInState(this.state, jobId);
    if (!current || !isJobAtStep(current, fromFlowStepId)) {
      return undefined;
    }
    return this.mutate((draft) =>
      updateJobInState(draft, jobId, (previous) => ({
        ...previous,
        status,
        currentStepIndex: status === "completed" ? previous.flowStepIds.length : previous.currentStepIndex
      }))
    );
  }

  enqueueTask(input: TaskInput, now?: Date): QueueTask {
    return this.mutate((draft) => enqueueTaskInState(draft, input, now));
  }

  leaseNextTask(now: Date, leaseMs: number): QueueTask | undefined {
    if (!this.state.tasks.some((task) => task.status === "queued")) {
      return undefined;
    }
    return this.mutate((draft) => leaseNextTaskInState(draft, now, leaseMs));
  }

  ackTask(taskId: string, now?: Date): QueueTask | undefined {
    return this.mutate((draft) => ackTaskInState(draft, taskId, now));
  }

  releaseTask(taskId: string, delayMs: number, error: string, now?: Date): QueueTask | undefined {
    return this.mutate((draft) => releaseTaskInState(draft, taskId, delayMs, error, now));
  }

  deadLetterTask(taskId: string, error: string, now?: Date): QueueTask | undefined {
    return this.mutate((draft) => deadLetterTaskInState(draft, taskId, error, now));
  }

  releaseExpiredLeases(now: Date): QueueTask[] {
    if (!this.state.tasks.some((task) => task.status === "leased")) {
      return [];
    }
    return this.mutate((draft) => releaseExpiredLeasesInState(draft, now));
  }

  listTasks(filter?: TaskListFilter): QueueTask[] {
    return deepClone(listTasksInState(this.state, filter));
  }

  pruneFinishedTasks(before: Date): number {
    return this.mutate((draft) => pruneFinishedTasksInState(draft, before));
  }

  hasProcessedItem(key: ProcessedItemKey): boolean {
    return hasProcessedItemInState(this.state, key);
  }

  insertProcessedItem(record: ProcessedItem): boolean {
    if (hasProcessedItemInState(this.state, record)) {
      return false;
    }
    return this.mutate((draft) => insertProcessedItemInState(draft, record));
  }

  listProcessedItems(): ProcessedItem[] {
    return deepClone(this.state.processedItems);
  }

  deleteProcessedItems(criteria: ProcessedItemCriteria): number {
    return this.mutate((draft) => deleteProcessedItemsInState(draft, criteria));
  }

  purgeProcessedItems(before: Date): number {
    return this.mutate((draft) => purgeProcessedItemsInState(draft, before));
  }

  getEngineData(jobId: string): EngineData {
    return { ...(this.state.engineData[jobId] ?? {}) };
  }

  mergeEngineData(jobId: string, patch: EngineData): EngineData {
    return this.mutate((draft) => {
      const merged = { ...(draft.engineData[jobId] ?? {}), ...patch };
      draft.engineData[jobId] = merged;
      return merged;
    });
  }

  deleteEngineData(jobId: string): void {
    if (!(jobId in this.state.engineData)) {
      return;
    }
    this.mutate((draft) => {
      delete draft.engineData[jobId];
    });
  }

  getScheduleMarkers(): Map<string, string> {
    return new Map(Object.entries(this.state.scheduleMarkers));
  }

  saveScheduleMarkers(markers: Map<string, string>): void {
    this.mutate((draft) => {
      draft.scheduleMarkers = Object.fromEntries(markers.entries());
    });
  }

  getChatSession(sessionId: string): ChatSession | undefined {
    const session = this.state.chatSessions.find((entry) => entry.id === sessionId);
    return session ? deepClone(session) : undefined;
  }

  saveChatSession(session: ChatSession): ChatSession {
    return this.mutate((draft) => {
      const saved: ChatSession = { ...session, updatedAt: nowIso() };
      draft.chatSessions = [saved, ...draft.chatSessions.filter((entry) => entry.id !== session.id)].slice(
        0,
        MAX_CHAT_SESSIONS
      );
      return saved;
    });
  }
}
