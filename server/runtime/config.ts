import type { ProviderId } from "../types.js";
import { resolveDataRootPath } from "./dataPaths.js";

export interface ProviderSettings {
  id: ProviderId;
  model: string;
  apiKeys: Record<ProviderId, string>;
  baseUrl: string;
  timeoutMs: number;
}

export interface EngineConfig {
  dataDir: string;
  maxTurns: number;
  enableWorker: boolean;
  enableScheduler: boolean;
  enableRecovery: boolean;
  workerPollIntervalMs: number;
  workerMaxTasksPerTick: number;
  taskLeaseMs: number;
  taskMaxAttempts: number;
  taskRetryDelayMs: number;
  schedulerPollIntervalMs: number;
  packetInlineLimitBytes: number;
  processedItemRetentionDays: number;
  packetRetentionDays: number;
  enabledTools: string[];
  provider: ProviderSettings;
}

/** Read-only slice of the configuration handed to step implementations. */
export interface EngineSettingsView {
  readonly maxTurns: number;
  readonly provider: ProviderId;
  readonly model: string;
  readonly enabledTools: readonly string[];
}

export const DEFAULT_MAX_TURNS = 12;
export const MIN_MAX_TURNS = 1;
export const MAX_MAX_TURNS = 50;

const defaultModels: Record<ProviderId, string> = {
  openai: "gpt-4o-mini",
  claude: "claude-sonnet-4-5"
};

export function resolveDefaultModel(providerId: ProviderId): string {
  return defaultModels[providerId];
}

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function clampMaxTurns(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return DEFAULT_MAX_TURNS;
  }

  return Math.max(MIN_MAX_TURNS, Math.min(MAX_MAX_TURNS, Math.floor(value)));
}

export function resolveProviderId(raw: string | undefined): ProviderId {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === "claude" || normalized === "anthropic") {
    return "claude";
  }

  return "openai";
}

export function normalizeOptionalUrl(raw: string | undefined): string {
  if (!raw) {
    return "";
  }

  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return "";
  }

  try {
    return new URL(trimmed).toString().replace(/\/+$/, "");
  } catch {
    return "";
  }
}

export function parseListEnv(raw: string | undefined): string[] {
  return [
    ...new Set(
      (raw ?? "")
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
    )
  ];
}

export function resolveEngineConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): EngineConfig {
  const providerId = resolveProviderId(env.FLOWLINE_AI_PROVIDER);

  return {
    dataDir: resolveDataRootPath(env, cwd),
    maxTurns: parseIntEnv(env.FLOWLINE_MAX_TURNS, DEFAULT_MAX_TURNS, MIN_MAX_TURNS, MAX_MAX_TURNS),
    enableWorker: parseBooleanEnv(env.FLOWLINE_ENABLE_WORKER, true),
    enableScheduler: parseBooleanEnv(env.FLOWLINE_ENABLE_SCHEDULER, true),
    enableRecovery: parseBooleanEnv(env.FLOWLINE_ENABLE_RECOVERY, true),
    workerPollIntervalMs: parseIntEnv(env.FLOWLINE_WORKER_POLL_INTERVAL_MS, 1_000, 50, 60_000),
    workerMaxTasksPerTick: parseIntEnv(env.FLOWLINE_WORKER_MAX_TASKS_PER_TICK, 25, 1, 1_000),
    taskLeaseMs: parseIntEnv(env.FLOWLINE_TASK_LEASE_MS, 600_000, 1_000, 86_400_000),
    taskMaxAttempts: parseIntEnv(env.FLOWLINE_TASK_MAX_ATTEMPTS, 3, 1, 20),
    taskRetryDelayMs: parseIntEnv(env.FLOWLINE_TASK_RETRY_DELAY_MS, 30_000, 0, 3_600_000),
    schedulerPollIntervalMs: parseIntEnv(env.FLOWLINE_SCHEDULER_POLL_INTERVAL_MS, 15_000, 1_000, 600_000),
    packetInlineLimitBytes: parseIntEnv(env.FLOWLINE_PACKET_INLINE_LIMIT_BYTES, 16_384, 0, 10_485_760),
    processedItemRetentionDays: parseIntEnv(env.FLOWLINE_PROCESSED_ITEM_RETENTION_DAYS, 90, 1, 3_650),
    packetRetentionDays: parseIntEnv(env.FLOWLINE_PACKET_RETENTION_DAYS, 7, 1, 365),
    enabledTools: parseListEnv(env.FLOWLINE_ENABLED_TOOLS),
    provider: {
      id: providerId,
      model: env.FLOWLINE_AI_MODEL?.trim() || defaultModels[providerId],
      apiKeys: {
        openai: (env.OPENAI_API_KEY ?? "").trim(),
        claude: (env.ANTHROPIC_API_KEY ?? "").trim()
      },
      baseUrl: normalizeOptionalUrl(env.FLOWLINE_AI_BASE_URL),
      timeoutMs: parseIntEnv(env.FLOWLINE_PROVIDER_TIMEOUT_MS, 120_000, 1_000, 900_000)
    }
  };
}

export function createSettingsView(config: EngineConfig): EngineSettingsView {
  return Object.freeze({
    maxTurns: config.maxTurns,
    provider: config.provider.id,
    model: config.provider.model,
    enabledTools: Object.freeze([...config.enabledTools])
  });
}
