import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Orchestrator } from "../../server/engine/orchestrator.js";
import { createEngineRecoveryRuntime } from "../../server/runtime/recovery.js";
import type { LocalStore } from "../../server/storage.js";
import type { Flow } from "../../server/types.js";
import { createTempStore } from "../helpers/tempStore.js";

const RESTART = new Date("2026-03-02T09:00:00.000Z");

describe("engine recovery runtime", () => {
  let store: LocalStore;
  let cleanup: () => Promise<void>;
  let flow: Flow;
  const failJob = vi.fn<Orchestrator["failJob"]>();

  beforeEach(async () => {
    const temp = await createTempStore();
    store = temp.store;
    cleanup = temp.cleanup;
    failJob.mockReset();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    flow = store.createFlow({
      name: "Recipes",
      steps: [
        { flowStepId: "fetch", config: { stepType: "fetch", handler: "rss", handlerConfig: {} } },
        { flowStepId: "publish", config: { stepType: "publish", handler: "blog", handlerConfig: {} } }
      ]
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanup();
  });

  function recover() {
    return createEngineRecoveryRuntime({ store, orchestrator: { failJob }, now: () => RESTART }).recoverInterruptedJobs();
  }

  it("re-queues tasks whose lease ran out while the process was down", async () => {
    const job = store.createJob(flow, { context: "", source: "manual" });
    const task = store.enqueueTask(
      { jobId: job.id, flowStepId: "fetch", dataRef: { kind: "inline", packets: [] } },
      new Date("2026-03-02T08:00:00.000Z")
    );
    store.leaseNextTask(new Date("2026-03-02T08:00:00.000Z"), 60_000);

    const summary = await recover();

    expect(summary).toEqual({ releasedTasks: 1, orphanedJobs: 0 });
    expect(store.listTasks()).toMatchObject([
      {
        id: task.id,
        status: "queued",
        attempts: 1,
        availableAt: RESTART.toISOString(),
        lastError: "Lease expired before acknowledgement"
      }
    ]);
    expect(failJob).not.toHaveBeenCalled();
  });

  it("keeps leases that have not expired yet", async () => {
    const job = store.createJob(flow, { context: "", source: "manual" });
    store.enqueueTask({ jobId: job.id, flowStepId: "fetch", dataRef: { kind: "inline", packets: [] } }, RESTART);
    store.leaseNextTask(RESTART, 60_000);

    expect(await recover()).toEqual({ releasedTasks: 0, orphanedJobs: 0 });
    expect(store.listTasks()[0]?.status).toBe("leased");
  });

  it("fails running jobs that have no task left to carry them", async () => {
    const orphan = store.createJob(flow, { context: "", source: "schedule" });
    store.updateJob(orphan.id, (job) => ({ ...job, status: "running", currentStepIndex: 1 }));
    const finished = store.createJob(flow, { context: "", source: "manual" });
    store.updateJob(finished.id, (job) => ({ ...job, status: "running" }));
    store.updateJob(finished.id, (job) => ({ ...job, status: "completed", currentStepIndex: 2 }));

    const summary = await recover();

    expect(summary).toEqual({ releasedTasks: 0, orphanedJobs: 1 });
    expect(failJob).toHaveBeenCalledTimes(1);
    expect(failJob).toHaveBeenCalledWith(orphan.id, "orphaned_job", {
      flowStepId: "publish",
      message: "Job was running at step 2 with no queued task after restart."
    });
  });
});
