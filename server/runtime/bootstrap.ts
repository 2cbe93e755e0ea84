export interface SchedulerTimerHandle {
  unref?: () => void;
}

type SetIntervalFn = (handler: () => void, timeoutMs: number) => SchedulerTimerHandle;
type ClearIntervalFn = (handle: SchedulerTimerHandle) => void;

export interface RuntimeBootstrapDependencies {
  enableWorker: boolean;
  enableScheduler: boolean;
  enableRecovery: boolean;
  ensureScheduleMarkersLoaded: () => Promise<void>;
  tickFlowSchedules: () => Promise<unknown>;
  recoverInterruptedJobs: () => Promise<unknown>;
  drainQueue: () => Promise<unknown>;
  runRetentionCleanup: () => Promise<unknown>;
  workerPollIntervalMs: number;
  schedulerPollIntervalMs: number;
  retentionIntervalMs: number;
  /** Leave timers referenced so they keep the process running. */
  keepProcessAlive?: boolean;
  setIntervalFn?: SetIntervalFn;
  clearIntervalFn?: ClearIntervalFn;
}

export interface RuntimeBootstrapHandle {
  dispose: () => void;
}

const liveTimers = new WeakMap<SchedulerTimerHandle, NodeJS.Timeout>();

const defaultSetInterval: SetIntervalFn = (handler, timeoutMs) => {
  const timer = setInterval(handler, timeoutMs);
  const handle: SchedulerTimerHandle = {
    unref: () => {
      timer.unref();
    }
  };
  liveTimers.set(handle, timer);
  return handle;
};

const defaultClearInterval: ClearIntervalFn = (handle) => {
  const timer = liveTimers.get(handle);
  if (timer) {
    clearInterval(timer);
    liveTimers.delete(handle);
  }
};

function runLogged(task: () => Promise<unknown>, tag: string): void {
  task().catch((error: unknown) => {
    console.error(tag, error);
  });
}

export async function initializeRuntimeBootstrap(
  deps: RuntimeBootstrapDependencies
): Promise<RuntimeBootstrapHandle> {
  const setIntervalFn = deps.setIntervalFn ?? defaultSetInterval;
  const clearIntervalFn = deps.clearIntervalFn ?? defaultClearInterval;
  const handles: SchedulerTimerHandle[] = [];

  const startLoop = (task: () => Promise<unknown>, intervalMs: number, tag: string): void => {
    const handle = setIntervalFn(() => {
      runLogged(task, tag);
    }, intervalMs);

    if (!deps.keepProcessAlive && typeof handle.unref === "function") {
      handle.unref();
    }
    handles.push(handle);
  };

  if (deps.enableScheduler) {
    await deps.ensureScheduleMarkersLoaded();
  }

  if (deps.enableRecovery) {
    await deps.recoverInterruptedJobs();
  }

  if (deps.enableScheduler) {
    await deps.tickFlowSchedules();
    startLoop(deps.tickFlowSchedules, deps.schedulerPollIntervalMs, "[scheduler-tick-error]");
  }

  if (deps.enableWorker) {
    await deps.drainQueue();
    startLoop(deps.drainQueue, deps.workerPollIntervalMs, "[worker-tick-error]");
  }

  startLoop(deps.runRetentionCleanup, deps.retentionIntervalMs, "[retention-cleanup-error]");

  return {
    dispose: () => {
      for (const handle of handles.splice(0)) {
        clearIntervalFn(handle);
      }
    }
  };
}
