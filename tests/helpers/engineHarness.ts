import { createEngineServices, type EngineServices } from "../../server/engine/container.js";
import type { EngineExtension } from "../../server/engine/registry.js";
import { createOrchestrator, type Orchestrator } from "../../server/engine/orchestrator.js";
import type { ModelProvider } from "../../server/providers/types.js";
import type { EngineConfig } from "../../server/runtime/config.js";
import { createQueueWorkerRuntime, type DrainSummary } from "../../server/runtime/worker.js";
import { createTempStore } from "./tempStore.js";

export interface EngineHarness {
  services: EngineServices;
  orchestrator: Orchestrator;
  drainQueue: () => Promise<DrainSummary>;
  runUntilIdle: () => Promise<number>;
  cleanup: () => Promise<void>;
}

export async function createEngineHarness(input: {
  extensions?: EngineExtension[];
  provider?: ModelProvider;
  config?: Partial<EngineConfig>;
} = {}): Promise<EngineHarness> {
  const { store, dataDir, cleanup } = await createTempStore();
  const provider = input.provider;
  const services = createEngineServices({
    env: {},
    store,
    config: { dataDir, ...(input.config ?? {}) },
    extensions: input.extensions ?? [],
    providers: () => {
      if (!provider) {
        throw new Error("No provider configured for this test");
      }
      return provider;
    }
  });
  const orchestrator = createOrchestrator(services);
  const { drainQueue } = createQueueWorkerRuntime({
    store,
    orchestrator,
    leaseMs: services.config.taskLeaseMs,
    maxAttempts: services.config.taskMaxAttempts,
    retryDelayMs: 0,
    maxTasksPerTick: 10
  });

  async function runUntilIdle(): Promise<number> {
    let total = 0;
    for (let round = 0; round < 20; round += 1) {
      const summary = await drainQueue();
      total += summary.processed;
      if (summary.processed === 0) {
        break;
      }
    }
    return total;
  }

  return { services, orchestrator, drainQueue, runUntilIdle, cleanup };
}
