import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DeduplicationTracker } from "../../server/engine/dedup.js";
import type { LocalStore } from "../../server/storage.js";
import { createTempStore } from "../helpers/tempStore.js";

describe("deduplication tracker", () => {
  let store: LocalStore;
  let cleanup: () => Promise<void>;
  let tracker: DeduplicationTracker;

  beforeEach(async () => {
    const temp = await createTempStore();
    store = temp.store;
    cleanup = temp.cleanup;
    tracker = new DeduplicationTracker(store);
  });

  afterEach(async () => {
    await cleanup();
  });

  it("records a triple once and reports the repeat as already processed", () => {
    expect(tracker.isProcessed("step-1", "rss", "item-1")).toBe(false);

    expect(tracker.markProcessed("step-1", "rss", "item-1", "job-1")).toBe(true);
    expect(tracker.markProcessed("step-1", "rss", "item-1", "job-2")).toBe(false);

    expect(tracker.isProcessed("step-1", "rss", "item-1")).toBe(true);
    expect(store.listProcessedItems()).toHaveLength(1);
    expect(store.listProcessedItems()[0]?.jobId).toBe("job-1");
  });

  it("scopes records to the flow step and source type", () => {
    tracker.markProcessed("step-1", "rss", "item-1", "job-1");

    expect(tracker.isProcessed("step-2", "rss", "item-1")).toBe(false);
    expect(tracker.isProcessed("step-1", "files", "item-1")).toBe(false);
  });

  it("keeps gate claims pending until they are committed", () => {
    const gate = tracker.createGate("step-1");

    gate.claim("rss", "item-1");
    gate.claim("rss", "item-2");

    expect(gate.isProcessed("rss", "item-1")).toBe(true);
    expect(tracker.isProcessed("step-1", "rss", "item-1")).toBe(false);
    expect(gate.pendingClaims()).toEqual([
      { sourceType: "rss", itemIdentifier: "item-1" },
      { sourceType: "rss", itemIdentifier: "item-2" }
    ]);

    expect(gate.commit("job-1")).toBe(2);
    expect(gate.pendingClaims()).toEqual([]);
    expect(tracker.isProcessed("step-1", "rss", "item-2")).toBe(true);
  });

  it("counts only new inserts when committing", () => {
    tracker.markProcessed("step-1", "rss", "item-1", "job-0");
    const gate = tracker.createGate("step-1");
    gate.claim("rss", "item-1");
    gate.claim("rss", "item-3");

    expect(gate.commit("job-1")).toBe(1);
  });

  it("deletes records by criteria and ignores empty criteria", () => {
    tracker.markProcessed("step-1", "rss", "item-1", "job-1");
    tracker.markProcessed("step-1", "files", "item-2", "job-1");
    tracker.markProcessed("step-2", "rss", "item-3", "job-2");

    expect(tracker.deleteProcessed({})).toBe(0);
    expect(tracker.deleteProcessed({ sourceType: "rss" })).toBe(2);
    expect(tracker.deleteProcessed({ jobId: "job-1" })).toBe(1);
    expect(store.listProcessedItems()).toEqual([]);
  });

  it("deletes records for every step of a flow", () => {
    const flow = store.createFlow({
      name: "News",
      steps: [
        { flowStepId: "fetch-a", config: { stepType: "fetch", handler: "rss", handlerConfig: {} } },
        { flowStepId: "publish-a", config: { stepType: "publish", handler: "site", handlerConfig: {} } }
      ]
    });
    tracker.markProcessed("fetch-a", "rss", "item-1", "job-1");
    tracker.markProcessed("other-step", "rss", "item-1", "job-9");

    expect(tracker.deleteProcessed({ flowId: flow.id })).toBe(1);
    expect(store.listProcessedItems().map((item) => item.flowStepId)).toEqual(["other-step"]);
  });

  it("purges records older than the retention window", () => {
    tracker.markProcessed("step-1", "rss", "item-1", "job-1");
    const now = new Date();

    expect(tracker.purgeOlderThan(90, now)).toBe(0);
    expect(tracker.purgeOlderThan(90, new Date(now.getTime() + 91 * 86_400_000))).toBe(1);
  });
});
