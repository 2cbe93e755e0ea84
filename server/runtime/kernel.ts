import { createChatRuntime, type ChatRuntime } from "../ai/chat.js";
import { createEngineServices, type EngineServices, type EngineServicesOptions } from "../engine/container.js";
import { createOrchestrator, type Orchestrator } from "../engine/orchestrator.js";
import type { Flow, FlowSchedule } from "../types.js";
import { initializeRuntimeBootstrap, type RuntimeBootstrapDependencies, type RuntimeBootstrapHandle } from "./bootstrap.js";
import { createEngineRecoveryRuntime, type RecoverySummary } from "./recovery.js";
import { createFlowScheduleRuntime } from "./scheduler.js";
import { createQueueWorkerRuntime, type DrainSummary } from "./worker.js";

const DAY_MS = 86_400_000;
const RETENTION_INTERVAL_MS = 3_600_000;

export interface EngineRuntimeOptions extends EngineServicesOptions {
  keepProcessAlive?: boolean;
  setIntervalFn?: RuntimeBootstrapDependencies["setIntervalFn"];
  clearIntervalFn?: RuntimeBootstrapDependencies["clearIntervalFn"];
}

export interface RetentionSummary {
  processedItems: number;
  packetDirectories: number;
  tasks: number;
}

export interface EngineRuntime {
  services: EngineServices;
  orchestrator: Orchestrator;
  chat: ChatRuntime;
  runFlowLater: (flowId: string, schedule: FlowSchedule) => Flow;
  drainQueue: () => Promise<DrainSummary>;
  tickFlowSchedules: () => Promise<string[]>;
  recoverInterruptedJobs: () => Promise<RecoverySummary>;
  runRetentionCleanup: () => Promise<RetentionSummary>;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export function createEngineRuntime(options: EngineRuntimeOptions = {}): EngineRuntime {
  const services = createEngineServices(options);
  const { config, store } = services;
  const shutdown = new AbortController();
  const orchestrator = createOrchestrator(services);
  const chat = createChatRuntime(services);

  const { drainQueue, whenIdle } = createQueueWorkerRuntime({
    store,
    orchestrator,
    leaseMs: config.taskLeaseMs,
    maxAttempts: config.taskMaxAttempts,
    retryDelayMs: config.taskRetryDelayMs,
    maxTasksPerTick: config.workerMaxTasksPerTick,
    signal: shutdown.signal
  });
  const { recoverInterruptedJobs } = createEngineRecoveryRuntime({ store, orchestrator });
  const { ensureScheduleMarkersLoaded, tickFlowSchedules, runFlowLater } = createFlowScheduleRuntime({
    store,
    createAndRun: orchestrator.createAndRun
  });

  async function runRetentionCleanup(): Promise<RetentionSummary> {
    const now = new Date();
    const packetCutoff = new Date(now.getTime() - config.packetRetentionDays * DAY_MS);
    const summary: RetentionSummary = {
      processedItems: services.dedup.purgeOlderThan(config.processedItemRetentionDays, now),
      packetDirectories: await services.packets.purgeOlderThan(packetCutoff),
      tasks: store.pruneFinishedTasks(packetCutoff)
    };

    if (summary.processedItems + summary.packetDirectories + summary.tasks > 0) {
      console.info(
        `[retention] Removed ${summary.processedItems} processed item(s), ${summary.packetDirectories} packet folder(s), ${summary.tasks} finished task(s).`
      );
    }
    return summary;
  }

  let bootstrapHandle: RuntimeBootstrapHandle | null = null;
  let starting: Promise<void> | null = null;

  function start(): Promise<void> {
    if (starting) {
      return starting;
    }

    console.info(
      `[runtime] Starting engine (data=${config.dataDir}, provider=${config.provider.id}, model=${config.provider.model}, extensions=${services.registry.listLoadedExtensions().join(",")})`
    );
    starting = initializeRuntimeBootstrap({
      enableWorker: config.enableWorker,
      enableScheduler: config.enableScheduler,
      enableRecovery: config.enableRecovery,
      ensureScheduleMarkersLoaded,
      tickFlowSchedules,
      recoverInterruptedJobs,
      drainQueue,
      runRetentionCleanup,
      workerPollIntervalMs: config.workerPollIntervalMs,
      schedulerPollIntervalMs: config.schedulerPollIntervalMs,
      retentionIntervalMs: RETENTION_INTERVAL_MS,
      keepProcessAlive: options.keepProcessAlive,
      setIntervalFn: options.setIntervalFn,
      clearIntervalFn: options.clearIntervalFn
    }).then((handle) => {
      bootstrapHandle = handle;
    });
    return starting;
  }

  /** Stops the loops, then waits for the task in flight to be acked or released. */
  async function stop(): Promise<void> {
    shutdown.abort();
    if (bootstrapHandle) {
      bootstrapHandle.dispose();
      bootstrapHandle = null;
    }
    await whenIdle();
  }

  return {
    services,
    orchestrator,
    chat,
    runFlowLater,
    drainQueue,
    tickFlowSchedules,
    recoverInterruptedJobs,
    runRetentionCleanup,
    start,
    stop
  };
}
