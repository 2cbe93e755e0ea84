import { PacketRepository } from "../packets/packetRepository.js";
import { createProviderResolver } from "../providers/factory.js";
import type { ProviderResolver } from "../providers/types.js";
import { createSettingsView, resolveEngineConfig, type EngineConfig, type EngineSettingsView } from "../runtime/config.js";
import { resolvePacketsRootPath, resolveStateFilePath } from "../runtime/dataPaths.js";
import { builtinStepsExtension } from "../steps/index.js";
import { LocalStore } from "../storage.js";
import { DeduplicationTracker } from "./dedup.js";
import { ExtensionRegistry, type EngineExtension } from "./registry.js";

/** Everything a step, the orchestrator or a runtime loop may reach. Built once per process. */
export interface EngineServices {
  config: EngineConfig;
  settings: EngineSettingsView;
  store: LocalStore;
  packets: PacketRepository;
  dedup: DeduplicationTracker;
  registry: ExtensionRegistry;
  providers: ProviderResolver;
}

export interface EngineServicesOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<EngineConfig>;
  store?: LocalStore;
  packets?: PacketRepository;
  providers?: ProviderResolver;
  extensions?: EngineExtension[];
  fetchFn?: typeof fetch;
}

export function createEngineServices(options: EngineServicesOptions = {}): EngineServices {
  const config: EngineConfig = Object.freeze({
    ...resolveEngineConfig(options.env),
    ...(options.config ?? {})
  });
  const store = options.store ?? new LocalStore(resolveStateFilePath(config.dataDir));
  const registry = new ExtensionRegistry().load([builtinStepsExtension, ...(options.extensions ?? [])]);

  return {
    config,
    settings: createSettingsView(config),
    store,
    packets: options.packets ?? new PacketRepository(resolvePacketsRootPath(config.dataDir), config.packetInlineLimitBytes),
    dedup: new DeduplicationTracker(store),
    registry,
    providers: options.providers ?? createProviderResolver(config.provider, options.fetchFn)
  };
}
