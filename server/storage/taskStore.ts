import { nanoid } from "nanoid";
import type { QueueTask, TaskInput, TaskStatus } from "../types.js";
import type { TaskStateContainer } from "./contracts.js";

function toIso(date: Date): string {
  return date.toISOString();
}

function isDue(timestamp: string | undefined, now: Date): boolean {
  if (!timestamp) {
    return true;
  }
  const parsed = Date.parse(timestamp);
  return !Number.isFinite(parsed) || parsed <= now.getTime();
}

function patchTask(
  state: TaskStateContainer,
  taskId: string,
  patch: (task: QueueTask) => QueueTask
): QueueTask | undefined {
  const index = state.tasks.findIndex((entry) => entry.id === taskId);
  if (index === -1) {
    return undefined;
  }

  state.tasks[index] = patch(state.tasks[index]);
  return state.tasks[index];
}

export function enqueueTask(state: TaskStateContainer, input: TaskInput, now: Date = new Date()): QueueTask {
  const at = toIso(now);
  const task: QueueTask = {
    id: nanoid(),
    jobId: input.jobId,
    flowStepId: input.flowStepId,
    dataRef: input.dataRef,
    status: "queued",
    attempts: 0,
    availableAt: at,
    createdAt: at,
    updatedAt: at
  };

  state.tasks.push(task);
  return task;
}

export function leaseNextTask(state: TaskStateContainer, now: Date, leaseMs: number): QueueTask | undefined {
  const candidate = state.tasks.find((task) => task.status === "queued" && isDue(task.availableAt, now));
  if (!candidate) {
    return undefined;
  }

  return patchTask(state, candidate.id, (task) => ({
    ...task,
    status: "leased",
    attempts: task.attempts + 1,
    leaseExpiresAt: toIso(new Date(now.getTime() + leaseMs)),
    updatedAt: toIso(now)
  }));
}

export function ackTask(state: TaskStateContainer, taskId: string, now: Date = new Date()): QueueTask | undefined {
  return patchTask(state, taskId, (task) => ({
    ...task,
    status: "done",
    leaseExpiresAt: undefined,
    updatedAt: toIso(now)
  }));
}

export function releaseTask(
  state: TaskStateContainer,
  taskId: string,
  delayMs: number,
  error: string,
  now: Date = new Date()
): QueueTask | undefined {
  return patchTask(state, taskId, (task) => ({
    ...task,
    status: "queued",
    availableAt: toIso(new Date(now.getTime() + delayMs)),
    leaseExpiresAt: undefined,
    lastError: error,
    updatedAt: toIso(now)
  }));
}

export function deadLetterTask(
  state: TaskStateContainer,
  taskId: string,
  error: string,
  now: Date = new Date()
): QueueTask | undefined {
  return patchTask(state, taskId, (task) => ({
    ...task,
    status: "dead",
    leaseExpiresAt: undefined,
    lastError: error,
    updatedAt: toIso(now)
  }));
}

/** Returns leases whose holder stopped renewing them to the queue. */
export function releaseExpiredLeases(state: TaskStateContainer, now: Date): QueueTask[] {
  const released: QueueTask[] = [];
  state.tasks = state.tasks.map((task) => {
    if (task.status !== "leased" || !isDue(task.leaseExpiresAt, now)) {
      return task;
    }

    const requeued: QueueTask = {
      ...task,
      status: "queued",
      availableAt: toIso(now),
      leaseExpiresAt: undefined,
      lastError: task.lastError ?? "Lease expired before acknowledgement",
      updatedAt: toIso(now)
    };
    released.push(requeued);
    return requeued;
  });
  return released;
}

export interface TaskListFilter {
  jobId?: string;
  status?: TaskStatus;
}

export function listTasks(state: TaskStateContainer, filter: TaskListFilter = {}): QueueTask[] {
  return state.tasks.filter(
    (task) => (filter.jobId ? task.jobId === filter.jobId : true) && (filter.status ? task.status === filter.status : true)
  );
}

export function pruneFinishedTasks(state: TaskStateContainer, before: Date): number {
  const previousCount = state.tasks.length;
  state.tasks = state.tasks.filter((task) => task.status !== "done" || Date.parse(task.updatedAt) >= before.getTime());
  return previousCount - state.tasks.length;
}
