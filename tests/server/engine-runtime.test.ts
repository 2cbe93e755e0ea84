import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createEngineRuntime } from "../../server/runtime/kernel.js";
import type { SchedulerTimerHandle } from "../../server/runtime/bootstrap.js";
import { createTempStore } from "../helpers/tempStore.js";
import { createTestExtension } from "../helpers/testExtension.js";

describe("engine runtime", () => {
  let cleanup: () => Promise<void> = async () => undefined;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanup();
  });

  it("drains queued jobs on start and stops its loops", async () => {
    const temp = await createTempStore();
    cleanup = temp.cleanup;
    const { extension, published } = createTestExtension({ feedItems: [{ id: "item-7", title: "Market day" }] });
    const setIntervalFn = vi.fn((_handler: () => void, _timeoutMs: number): SchedulerTimerHandle => ({}));
    const clearIntervalFn = vi.fn<(handle: SchedulerTimerHandle) => void>();
    const runtime = createEngineRuntime({
      env: {},
      store: temp.store,
      config: { dataDir: temp.dataDir },
      extensions: [extension],
      setIntervalFn,
      clearIntervalFn
    });
    const flow = temp.store.createFlow({
      name: "Market news",
      steps: [
        { config: { stepType: "fetch", handler: "test_feed", handlerConfig: {} } },
        { config: { stepType: "publish", handler: "test_publisher", handlerConfig: {} } }
      ]
    });
    const jobId = await runtime.orchestrator.createAndRun(flow.id, "Cover market day");

    await runtime.start();

    expect(runtime.orchestrator.getJob(jobId)?.status).toBe("completed");
    expect(published).toHaveLength(1);
    expect(setIntervalFn.mock.calls.map((call) => call[1])).toEqual([15_000, 1_000, 3_600_000]);
    expect(await runtime.runRetentionCleanup()).toEqual({ processedItems: 0, packetDirectories: 0, tasks: 0 });

    await runtime.stop();
    expect(clearIntervalFn).toHaveBeenCalledTimes(3);
    expect((await runtime.drainQueue()).processed).toBe(0);
  });
});
