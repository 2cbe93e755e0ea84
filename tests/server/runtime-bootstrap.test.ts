import { describe, expect, it, vi } from "vitest";

import {
  initializeRuntimeBootstrap,
  type RuntimeBootstrapDependencies,
  type SchedulerTimerHandle
} from "../../server/runtime/bootstrap.js";

function createDeps(calls: string[], overrides: Partial<RuntimeBootstrapDependencies> = {}): RuntimeBootstrapDependencies {
  const record = (name: string) => async () => {
    calls.push(name);
  };

  return {
    enableWorker: true,
    enableScheduler: true,
    enableRecovery: true,
    ensureScheduleMarkersLoaded: record("ensure-markers"),
    recoverInterruptedJobs: record("recover"),
    tickFlowSchedules: record("tick"),
    drainQueue: record("drain"),
    runRetentionCleanup: record("retention"),
    workerPollIntervalMs: 1_000,
    schedulerPollIntervalMs: 15_000,
    retentionIntervalMs: 3_600_000,
    ...overrides
  };
}

describe("runtime bootstrap", () => {
  it("recovers before the first scheduler tick and queue drain, then starts every loop", async () => {
    const calls: string[] = [];
    const handles: SchedulerTimerHandle[] = [];
    const setIntervalFn = vi.fn((_handler: () => void, _timeoutMs: number) => {
      const handle: SchedulerTimerHandle = { unref: vi.fn() };
      handles.push(handle);
      return handle;
    });
    const clearIntervalFn = vi.fn<(handle: SchedulerTimerHandle) => void>();

    const bootstrap = await initializeRuntimeBootstrap(createDeps(calls, { setIntervalFn, clearIntervalFn }));

    expect(calls).toEqual(["ensure-markers", "recover", "tick", "drain"]);
    expect(setIntervalFn.mock.calls.map((call) => call[1])).toEqual([15_000, 1_000, 3_600_000]);
    for (const handle of handles) {
      expect(handle.unref).toHaveBeenCalledTimes(1);
    }

    bootstrap.dispose();
    expect(clearIntervalFn.mock.calls.map((call) => call[0])).toEqual(handles);
  });

  it("leaves timers referenced when the process should stay alive", async () => {
    const handle: SchedulerTimerHandle = { unref: vi.fn() };

    await initializeRuntimeBootstrap(
      createDeps([], { keepProcessAlive: true, setIntervalFn: () => handle, clearIntervalFn: () => undefined })
    );

    expect(handle.unref).not.toHaveBeenCalled();
  });

  it("only runs retention when worker, scheduler and recovery are disabled", async () => {
    const calls: string[] = [];
    const setIntervalFn = vi.fn((_handler: () => void, _timeoutMs: number): SchedulerTimerHandle => ({}));

    const bootstrap = await initializeRuntimeBootstrap(
      createDeps(calls, {
        enableWorker: false,
        enableScheduler: false,
        enableRecovery: false,
        setIntervalFn,
        clearIntervalFn: () => undefined
      })
    );

    expect(calls).toEqual([]);
    expect(setIntervalFn).toHaveBeenCalledTimes(1);
    expect(setIntervalFn).toHaveBeenCalledWith(expect.any(Function), 3_600_000);
    bootstrap.dispose();
  });

  it("logs loop failures instead of letting them escape", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const ticks: Array<() => void> = [];
    const failure = new Error("store locked");
    let drains = 0;

    await initializeRuntimeBootstrap(
      createDeps([], {
        enableScheduler: false,
        enableRecovery: false,
        drainQueue: async () => {
          drains += 1;
          if (drains > 1) {
            throw failure;
          }
        },
        setIntervalFn: (handler) => {
          ticks.push(handler);
          return {};
        },
        clearIntervalFn: () => undefined
      })
    );

    ticks[0]?.();
    await vi.waitFor(() => {
      expect(errorSpy).toHaveBeenCalledWith("[worker-tick-error]", failure);
    });
    errorSpy.mockRestore();
  });
});
