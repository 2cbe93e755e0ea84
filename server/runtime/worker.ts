import { describeError } from "../errors.js";
import type { Orchestrator } from "../engine/orchestrator.js";
import type { LocalStore } from "../storage.js";
import type { QueueTask } from "../types.js";

export interface QueueWorkerRuntimeDependencies {
  store: LocalStore;
  orchestrator: Pick<Orchestrator, "executeStep" | "failJob">;
  leaseMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  maxTasksPerTick: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface DrainSummary {
  processed: number;
  acknowledged: number;
  released: number;
  deadLettered: number;
}

const emptySummary = (): DrainSummary => ({ processed: 0, acknowledged: 0, released: 0, deadLettered: 0 });

type TaskDisposition = "acknowledged" | "released" | "deadLettered";

/**
 * Leases queued step tasks and hands them to the orchestrator. A task is
 * acknowledged once executeStep returns, whatever the job outcome was; only
 * infrastructure errors thrown out of executeStep put it back on the queue.
 * Each tick first returns expired leases to the queue, so a task leased by a
 * process that died is picked up again without a restart.
 */
export function createQueueWorkerRuntime(deps: QueueWorkerRuntimeDependencies): {
  drainQueue: () => Promise<DrainSummary>;
  processTask: (task: QueueTask) => Promise<TaskDisposition>;
  whenIdle: () => Promise<void>;
} {
  const now = deps.now ?? (() => new Date());
  let activeDrain: Promise<DrainSummary> | null = null;

  async function processTask(task: QueueTask): Promise<TaskDisposition> {
    try {
      await deps.orchestrator.executeStep(task.jobId, task.flowStepId, {
        dataRef: task.dataRef,
        signal: deps.signal
      });
      deps.store.ackTask(task.id, now());
      return "acknowledged";
    } catch (error) {
      const message = describeError(error);

      if (deps.signal?.aborted) {
        deps.store.releaseTask(task.id, 0, `Interrupted by shutdown: ${message}`, now());
        console.warn(`[worker] Task ${task.id} interrupted by shutdown; returned to the queue.`);
        return "released";
      }

      if (task.attempts >= deps.maxAttempts) {
        deps.store.deadLetterTask(task.id, message, now());
        deps.orchestrator.failJob(task.jobId, "task_delivery_exhausted", {
          flowStepId: task.flowStepId,
          taskId: task.id,
          attempts: task.attempts,
          message: `Step task failed ${task.attempts} time(s): ${message}`
        });
        console.error(`[worker] Task ${task.id} dead-lettered after ${task.attempts} attempt(s):`, error);
        return "deadLettered";
      }

      deps.store.releaseTask(task.id, deps.retryDelayMs, message, now());
      console.warn(
        `[worker] Task ${task.id} attempt ${task.attempts}/${deps.maxAttempts} failed; retrying in ${deps.retryDelayMs}ms: ${message}`
      );
      return "released";
    }
  }

  async function runDrain(): Promise<DrainSummary> {
    const summary = emptySummary();
    const reclaimed = deps.store.releaseExpiredLeases(now());
    if (reclaimed.length > 0) {
      console.warn(`[worker] Returned ${reclaimed.length} expired lease(s) to the queue.`);
    }

    while (summary.processed < deps.maxTasksPerTick && !deps.signal?.aborted) {
      const task = deps.store.leaseNextTask(now(), deps.leaseMs);
      if (!task) {
        break;
      }

      summary.processed += 1;
      const disposition = await processTask(task);
      summary[disposition] += 1;
    }

    return summary;
  }

  function drainQueue(): Promise<DrainSummary> {
    if (activeDrain) {
      return Promise.resolve(emptySummary());
    }

    const drain = runDrain().finally(() => {
      activeDrain = null;
    });
    activeDrain = drain;
    return drain;
  }

  /** Resolves once the drain in progress, if any, has settled. */
  async function whenIdle(): Promise<void> {
    if (activeDrain) {
      await Promise.allSettled([activeDrain]);
    }
  }

  return {
    drainQueue,
    processTask,
    whenIdle
  };
}
