import { nanoid } from "nanoid";
import { JobTransitionError } from "../errors.js";
import type { Flow, Job, JobStatus, JobTrigger, TerminalJobStatus } from "../types.js";
import type { JobStateContainer } from "./contracts.js";
import { orderFlowSteps } from "./flowStore.js";
import { nowIso } from "./helpers.js";

const MAX_JOB_LOG_LINES = 400;

const terminalStatuses = new Set<JobStatus>(["completed", "completed_no_items", "failed"]);

const allowedTransitions: Record<JobStatus, ReadonlySet<JobStatus>> = {
  pending: new Set<JobStatus>(["pending", "running", "failed"]),
  running: new Set<JobStatus>(["running", "completed", "completed_no_items", "failed"]),
  completed: new Set<JobStatus>(["completed"]),
  completed_no_items: new Set<JobStatus>(["completed_no_items"]),
  failed: new Set<JobStatus>(["failed"])
};

export function isTerminalJobStatus(status: JobStatus): status is TerminalJobStatus {
  return terminalStatuses.has(status);
}

/** True while the job is live and its cursor points at `flowStepId`. */
export function isJobAtStep(job: Job, flowStepId: string): boolean {
  return !isTerminalJobStatus(job.status) && job.flowStepIds[job.currentStepIndex] === flowStepId;
}

function formatLogLine(message: string, at: string): string {
  return `[${at}] ${message}`;
}

export function createJob(state: JobStateContainer, flow: Flow, trigger: JobTrigger): Job {
  const now = nowIso();
  const job: Job = {
    id: nanoid(),
    flowId: flow.id,
    pipelineId: flow.pipelineId,
    flowStepIds: orderFlowSteps(flow).map((step) => step.flowStepId),
    status: "pending",
    currentStepIndex: 0,
    context: trigger.context,
    source: trigger.source,
    failure: null,
    logs: [formatLogLine(`Job created (${trigger.source})`, now)],
    createdAt: now,
    updatedAt: now
  };

  state.jobs.unshift(job);
  return job;
}

export function getJob(state: JobStateContainer, jobId: string): Job | undefined {
  return state.jobs.find((entry) => entry.id === jobId);
}

export function assertJobUpdate(previous: Job, next: Job): void {
  if (!allowedTransitions[previous.status].has(next.status)) {
    throw new JobTransitionError(previous.id, previous.status, next.status);
  }

  if (next.currentStepIndex < previous.currentStepIndex || next.currentStepIndex > next.flowStepIds.length) {
    throw new Error(
      `Job ${previous.id} step index cannot move from ${previous.currentStepIndex} to ${next.currentStepIndex}.`
    );
  }
}

/**
 * Applies an update and stamps lifecycle timestamps. Throws when the update
 * would reopen a terminal job or move the step cursor backwards.
 */
export function updateJob(
  state: JobStateContainer,
  jobId: string,
  updater: (job: Job) => Job
): Job | undefined {
  const index = state.jobs.findIndex((entry) => entry.id === jobId);
  if (index === -1) {
    return undefined;
  }

  const previous = state.jobs[index];
  const candidate = updater(previous);
  assertJobUpdate(previous, candidate);

  const now = nowIso();
  const next: Job = {
    ...candidate,
    id: previous.id,
    flowStepIds: previous.flowStepIds,
    updatedAt: now
  };

  if (previous.status !== "running" && next.status === "running" && !next.startedAt) {
    next.startedAt = now;
  }
  if (!isTerminalJobStatus(previous.status) && isTerminalJobStatus(next.status)) {
    next.completedAt = now;
  }

  state.jobs[index] = next;
  return next;
}

export function appendJobLog(state: JobStateContainer, jobId: string, message: string): void {
  const job = getJob(state, jobId);
  if (!job) {
    return;
  }

  job.logs = [...job.logs, formatLogLine(message, nowIso())].slice(-MAX_JOB_LOG_LINES);
}

export interface JobListFilter {
  flowId?: string;
  status?: JobStatus;
  limit?: number;
}

export function listJobs(state: JobStateContainer, filter: JobListFilter = {}): Job[] {
  return state.jobs
    .filter((job) => (filter.flowId ? job.flowId === filter.flowId : true))
    .filter((job) => (filter.status ? job.status === filter.status : true))
    .slice(0, filter.limit ?? 100);
}
