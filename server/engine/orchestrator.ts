import { isAbortError } from "../abort.js";
import { FlowNotFoundError, describeError, isStepTypeNotFoundError } from "../errors.js";
import { isJobAtStep, isTerminalJobStatus } from "../storage/jobStore.js";
import { orderFlowSteps } from "../storage/flowStore.js";
import type {
  DataPacket,
  DataRef,
  Flow,
  FlowStep,
  Job,
  JobFailureReason,
  JobSource,
  JobTrigger,
  QueueTask
} from "../types.js";
import type { EngineServices } from "./container.js";
import type { StepContext, StepPayload } from "./contracts.js";
import { createStepDispatcher, type DispatchResult, type StepDispatcher } from "./dispatcher.js";
import type { ProcessedItemsGate } from "./dedup.js";

export type StepOutcome = "skipped" | "advanced" | "completed" | "completed_no_items" | "failed";

export interface ExecuteStepResult {
  outcome: StepOutcome;
  jobId: string;
  flowStepId: string;
  detail?: string;
}

export interface ExecuteStepOptions {
  dataRef?: DataRef;
  signal?: AbortSignal;
}

export interface Orchestrator {
  createJob: (flowId: string, trigger: JobTrigger) => Job;
  enqueueStep: (jobId: string, flowStepId: string, data: DataPacket[]) => Promise<QueueTask>;
  executeStep: (jobId: string, flowStepId: string, options?: ExecuteStepOptions) => Promise<ExecuteStepResult>;
  failJob: (jobId: string, reason: JobFailureReason, context?: Record<string, unknown>) => Job | undefined;
  cancelJob: (jobId: string, message?: string) => Job | undefined;
  createAndRun: (flowId: string, context: string, source?: JobSource) => Promise<string>;
  getJob: (jobId: string) => Job | undefined;
}

const emptyDataRef: DataRef = { kind: "inline", packets: [] };

function readContextMessage(context: Record<string, unknown>, fallback: string): string {
  const message = context.message;
  return typeof message === "string" && message.length > 0 ? message : fallback;
}

export function createOrchestrator(services: EngineServices, dispatcher: StepDispatcher = createStepDispatcher(services)): Orchestrator {
  const { store } = services;

  function jobLog(jobId: string, message: string): void {
    store.appendJobLog(jobId, message);
  }

  function createJob(flowId: string, trigger: JobTrigger): Job {
    const flow = store.getFlow(flowId);
    if (!flow) {
      throw new FlowNotFoundError(flowId);
    }
    if (flow.steps.length === 0) {
      throw new FlowNotFoundError(flowId, "flow has no steps");
    }

    return store.createJob(flow, trigger);
  }

  async function enqueueStep(jobId: string, flowStepId: string, data: DataPacket[]): Promise<QueueTask> {
    const job = store.getJob(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} does not exist.`);
    }

    const dataRef = await services.packets.store(data, { flowId: job.flowId, jobId, flowStepId });
    return store.enqueueTask({ jobId, flowStepId, dataRef });
  }

  async function cleanupJobData(job: Job): Promise<void> {
    try {
      store.deleteEngineData(job.id);
      await services.packets.deleteJobPackets(job.flowId, job.id);
    } catch (error) {
      console.error(`[orchestrator] Cleanup for job ${job.id} failed:`, error);
    }
  }

  function failJob(jobId: string, reason: JobFailureReason, context: Record<string, unknown> = {}): Job | undefined {
    const current = store.getJob(jobId);
    if (!current || isTerminalJobStatus(current.status)) {
      return undefined;
    }

    const message = readContextMessage(context, reason);
    const failed = store.updateJob(jobId, (job) => ({
      ...job,
      status: "failed",
      failure: { reason, message, context }
    }));
    jobLog(jobId, `Job failed (${reason}): ${message}`);
    store.deleteEngineData(jobId);
    console.error(`[orchestrator] Job ${jobId} failed (${reason}): ${message}`);
    return failed;
  }

  function cancelJob(jobId: string, message = "Job cancelled."): Job | undefined {
    const job = store.getJob(jobId);
    return failJob(jobId, "cancelled", {
      flowStepId: job ? job.flowStepIds[job.currentStepIndex] ?? null : null,
      message
    });
  }

  function findNeighbours(flow: Flow, flowStepId: string): { previousStep?: FlowStep; nextStep?: FlowStep } {
    const ordered = orderFlowSteps(flow);
    const index = ordered.findIndex((step) => step.flowStepId === flowStepId);
    return {
      ...(index > 0 ? { previousStep: ordered[index - 1] } : {}),
      ...(index >= 0 && index + 1 < ordered.length ? { nextStep: ordered[index + 1] } : {})
    };
  }

  async function finishJob(
    job: Job,
    flowStepId: string,
    status: "completed" | "completed_no_items",
    gate: ProcessedItemsGate | null
  ): Promise<Job | undefined> {
    const finished = store.finishJob(job.id, flowStepId, status);
    if (!finished) {
      return undefined;
    }
    if (gate) {
      const committed = gate.commit(job.id);
      if (committed > 0) {
        jobLog(job.id, `Recorded ${committed} processed item(s).`);
      }
    }
    jobLog(job.id, status === "completed" ? "Job completed." : "Job completed with no items to process.");
    await cleanupJobData(job);
    return finished;
  }

  /** Why a delivery may no longer act on the job, or undefined while it still may. */
  function describeStaleDelivery(jobId: string, flowStepId: string): string | undefined {
    const job = store.getJob(jobId);
    if (!job) {
      return "job does not exist";
    }
    if (isTerminalJobStatus(job.status)) {
      return `job is already ${job.status}`;
    }
    if (!isJobAtStep(job, flowStepId)) {
      return `job is at step ${job.currentStepIndex} (${job.flowStepIds[job.currentStepIndex] ?? "none"})`;
    }
    return undefined;
  }

  async function executeStep(jobId: string, flowStepId: string, options: ExecuteStepOptions = {}): Promise<ExecuteStepResult> {
    const skip = (detail: string): ExecuteStepResult => {
      console.info(`[orchestrator] Skipped ${flowStepId} for job ${jobId}: ${detail}`);
      return { outcome: "skipped", jobId, flowStepId, detail };
    };
    const fail = (reason: JobFailureReason, context: Record<string, unknown>): ExecuteStepResult => {
      const stale = describeStaleDelivery(jobId, flowStepId);
      if (stale) {
        return skip(stale);
      }
      failJob(jobId, reason, { flowStepId, ...context });
      return { outcome: "failed", jobId, flowStepId, detail: reason };
    };

    const stale = describeStaleDelivery(jobId, flowStepId);
    const job = store.getJob(jobId);
    if (stale || !job) {
      return skip(stale ?? "job does not exist");
    }

    const located = store.findFlowStep(flowStepId);
    if (!located || located.flow.id !== job.flowId) {
      return fail("flow_step_not_found", { message: `Flow step ${flowStepId} no longer exists in flow ${job.flowId}.` });
    }
    const { flow, step } = located;

    if (job.status === "pending") {
      store.updateJob(jobId, (current) => ({ ...current, status: "running" }));
    }
    const stepNumber = job.currentStepIndex + 1;
    jobLog(jobId, `Step ${stepNumber}/${job.flowStepIds.length} (${step.config.stepType}) started: ${flowStepId}`);

    let data: DataPacket[];
    try {
      data = await services.packets.retrieve(options.dataRef ?? emptyDataRef, job.flowId);
    } catch (error) {
      return fail("data_packet_unavailable", { message: describeError(error) });
    }

    const gate = services.dedup.createGate(flowStepId);
    const payload: StepPayload = {
      jobId,
      flowId: flow.id,
      pipelineId: flow.pipelineId,
      flowStepId,
      flowStepConfig: step.config,
      data,
      engineData: store.getEngineData(jobId),
      settings: services.settings
    };
    const context: StepContext = {
      ...findNeighbours(flow, flowStepId),
      gate,
      mergeEngineData: (patch) => store.mergeEngineData(jobId, patch),
      log: (message) => jobLog(jobId, message),
      signal: options.signal
    };

    let result: DispatchResult;
    try {
      result = await dispatcher.dispatch(payload, context);
    } catch (error) {
      if (options.signal?.aborted && isAbortError(error)) {
        throw error;
      }
      if (isStepTypeNotFoundError(error)) {
        return fail("step_type_not_found_in_registry", { message: error.message, stepType: error.stepType });
      }
      return fail("exception", {
        message: describeError(error),
        ...(error instanceof Error && error.stack ? { stack: error.stack } : {})
      });
    }

    const staleAfterStep = describeStaleDelivery(jobId, flowStepId);
    if (staleAfterStep) {
      return skip(`${staleAfterStep} after the step ran`);
    }

    if (result.kind === "invalid") {
      return fail("non_array_payload_returned", { message: `Step ${flowStepId} returned an invalid result: ${result.detail}` });
    }

    if (result.kind === "empty") {
      if (!(await finishJob(job, flowStepId, "completed_no_items", null))) {
        return skip("job changed before it could complete");
      }
      return { outcome: "completed_no_items", jobId, flowStepId };
    }

    jobLog(jobId, `Step ${stepNumber} produced ${result.packets.length} packet(s).`);

    const nextFlowStepId = job.flowStepIds[job.currentStepIndex + 1];
    if (!nextFlowStepId) {
      if (!(await finishJob(job, flowStepId, "completed", gate))) {
        return skip("job changed before it could complete");
      }
      return { outcome: "completed", jobId, flowStepId };
    }

    const dataRef = await services.packets.store(result.packets, { flowId: job.flowId, jobId, flowStepId: nextFlowStepId });
    const handOff = store.handOffJob(jobId, flowStepId, { jobId, flowStepId: nextFlowStepId, dataRef });
    if (!handOff) {
      return skip(`hand-off refused: ${describeStaleDelivery(jobId, flowStepId) ?? "job changed"}`);
    }
    const committed = gate.commit(jobId);
    if (committed > 0) {
      jobLog(jobId, `Recorded ${committed} processed item(s).`);
    }
    return { outcome: "advanced", jobId, flowStepId, detail: nextFlowStepId };
  }

  async function createAndRun(flowId: string, context: string, source: JobSource = "manual"): Promise<string> {
    const job = createJob(flowId, { context, source });
    const firstStepId = job.flowStepIds[0];
    if (!firstStepId) {
      throw new FlowNotFoundError(flowId, "flow has no steps");
    }
    await enqueueStep(job.id, firstStepId, []);
    return job.id;
  }

  return {
    createJob,
    enqueueStep,
    executeStep,
    failJob,
    cancelJob,
    createAndRun,
    getJob: (jobId) => store.getJob(jobId)
  };
}
