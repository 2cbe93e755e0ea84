import type { Orchestrator } from "../engine/orchestrator.js";
import type { LocalStore } from "../storage.js";
import { isTerminalJobStatus } from "../storage/jobStore.js";
import type { TaskStatus } from "../types.js";

export interface EngineRecoveryRuntimeDependencies {
  store: LocalStore;
  orchestrator: Pick<Orchestrator, "failJob">;
  now?: () => Date;
}

export interface RecoverySummary {
  releasedTasks: number;
  orphanedJobs: number;
}

const liveTaskStatuses = new Set<TaskStatus>(["queued", "leased"]);

export function createEngineRecoveryRuntime(deps: EngineRecoveryRuntimeDependencies): {
  recoverInterruptedJobs: () => Promise<RecoverySummary>;
} {
  const now = deps.now ?? (() => new Date());

  async function recoverInterruptedJobs(): Promise<RecoverySummary> {
    const released = deps.store.releaseExpiredLeases(now());
    for (const task of released) {
      console.info(`[recovery] Lease on task ${task.id} (job ${task.jobId}) expired; task re-queued.`);
    }

    const state = deps.store.getState();
    const jobsWithLiveTasks = new Set(
      state.tasks.filter((task) => liveTaskStatuses.has(task.status)).map((task) => task.jobId)
    );

    let orphanedJobs = 0;
    for (const job of state.jobs) {
      if (isTerminalJobStatus(job.status) || jobsWithLiveTasks.has(job.id)) {
        continue;
      }

      const flowStepId = job.flowStepIds[job.currentStepIndex] ?? null;
      deps.orchestrator.failJob(job.id, "orphaned_job", {
        flowStepId,
        message: `Job was ${job.status} at step ${job.currentStepIndex + 1} with no queued task after restart.`
      });
      console.info(`[recovery] Failed orphaned job ${job.id} for flow ${job.flowId}.`);
      orphanedJobs += 1;
    }

    return { releasedTasks: released.length, orphanedJobs };
  }

  return {
    recoverInterruptedJobs
  };
}
