import { scheduleIntervalSeconds } from "../engine/stepConfig.js";
import type { Orchestrator } from "../engine/orchestrator.js";
import { FlowNotFoundError } from "../errors.js";
import type { LocalStore } from "../storage.js";
import { isTerminalJobStatus } from "../storage/jobStore.js";
import type { Flow, FlowSchedule } from "../types.js";

export interface FlowScheduleRuntimeDependencies {
  store: LocalStore;
  createAndRun: Orchestrator["createAndRun"];
  now?: () => Date;
}

function describeSchedule(schedule: FlowSchedule): string {
  switch (schedule.kind) {
    case "manual":
      return "manual";
    case "once":
      return `once at ${schedule.runAt}`;
    case "interval":
      return schedule.interval;
  }
}

function isIntervalDue(lastRunMarker: string | undefined, intervalSeconds: number, now: Date): boolean {
  if (!lastRunMarker) {
    return true;
  }
  const lastRunAt = Date.parse(lastRunMarker);
  if (!Number.isFinite(lastRunAt)) {
    return true;
  }
  return now.getTime() - lastRunAt >= intervalSeconds * 1_000;
}

export function createFlowScheduleRuntime(deps: FlowScheduleRuntimeDependencies): {
  ensureScheduleMarkersLoaded: () => Promise<void>;
  tickFlowSchedules: () => Promise<string[]>;
  runFlowLater: (flowId: string, schedule: FlowSchedule) => Flow;
} {
  const now = deps.now ?? (() => new Date());
  const lastRunMarkerByFlow = new Map<string, string>();
  let schedulerTickActive = false;
  let scheduleMarkersLoaded = false;

  async function ensureScheduleMarkersLoaded(): Promise<void> {
    if (scheduleMarkersLoaded) {
      return;
    }

    try {
      lastRunMarkerByFlow.clear();
      for (const [flowId, marker] of deps.store.getScheduleMarkers().entries()) {
        lastRunMarkerByFlow.set(flowId, marker);
      }
    } catch (error) {
      console.error("[scheduler-state-load-error]", error);
    } finally {
      scheduleMarkersLoaded = true;
    }
  }

  function listActiveFlowIds(): Set<string> {
    const active = new Set<string>();
    for (const job of deps.store.getState().jobs) {
      if (!isTerminalJobStatus(job.status)) {
        active.add(job.flowId);
      }
    }
    return active;
  }

  function isDue(flow: Flow, at: Date): boolean {
    const schedule = flow.schedule;
    switch (schedule.kind) {
      case "manual":
        return false;
      case "once": {
        const runAt = Date.parse(schedule.runAt);
        return Number.isFinite(runAt) && runAt <= at.getTime();
      }
      case "interval":
        return isIntervalDue(lastRunMarkerByFlow.get(flow.id), scheduleIntervalSeconds[schedule.interval], at);
    }
  }

  async function tickFlowSchedules(): Promise<string[]> {
    if (schedulerTickActive) {
      return [];
    }

    schedulerTickActive = true;
    const startedJobIds: string[] = [];

    try {
      await ensureScheduleMarkersLoaded();

      const tickAt = now();
      const flows = deps.store.listFlows();
      const knownIds = new Set(flows.map((flow) => flow.id));
      let markersDirty = false;

      for (const flowId of [...lastRunMarkerByFlow.keys()]) {
        if (!knownIds.has(flowId)) {
          lastRunMarkerByFlow.delete(flowId);
          markersDirty = true;
        }
      }

      const activeFlowIds = listActiveFlowIds();

      for (const flow of flows) {
        if (!isDue(flow, tickAt)) {
          continue;
        }

        if (activeFlowIds.has(flow.id)) {
          console.info(`[scheduler] Skipping ${flow.name}: a job for this flow is still active.`);
          continue;
        }

        lastRunMarkerByFlow.set(flow.id, tickAt.toISOString());
        markersDirty = true;

        if (flow.schedule.kind === "once") {
          deps.store.setFlowSchedule(flow.id, { kind: "manual" });
        }

        try {
          const jobId = await deps.createAndRun(flow.id, `Scheduled run (${describeSchedule(flow.schedule)})`, "schedule");
          startedJobIds.push(jobId);
          activeFlowIds.add(flow.id);
          console.info(`[scheduler] Started job ${jobId} for ${flow.name}.`);
        } catch (error) {
          console.error(`[scheduler] Failed to start scheduled job for ${flow.name}:`, error);
        }
      }

      if (markersDirty) {
        deps.store.saveScheduleMarkers(lastRunMarkerByFlow);
      }
    } catch (error) {
      console.error("[scheduler-tick-error]", error);
    } finally {
      schedulerTickActive = false;
    }

    return startedJobIds;
  }

  function runFlowLater(flowId: string, schedule: FlowSchedule): Flow {
    const updated = deps.store.setFlowSchedule(flowId, schedule);
    if (!updated) {
      throw new FlowNotFoundError(flowId);
    }

    lastRunMarkerByFlow.delete(flowId);
    const storedMarkers = deps.store.getScheduleMarkers();
    if (storedMarkers.delete(flowId)) {
      deps.store.saveScheduleMarkers(storedMarkers);
    }
    console.info(`[scheduler] Flow ${updated.name} scheduled: ${describeSchedule(updated.schedule)}.`);
    return updated;
  }

  return {
    ensureScheduleMarkersLoaded,
    tickFlowSchedules,
    runFlowLater
  };
}
