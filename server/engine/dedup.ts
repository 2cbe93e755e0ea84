import type { LocalStore } from "../storage.js";
import type { ProcessedItemCriteria } from "../types.js";

const DAY_MS = 86_400_000;

export interface ItemClaim {
  sourceType: string;
  itemIdentifier: string;
}

export class DeduplicationTracker {
  constructor(private readonly store: LocalStore) {}

  isProcessed(flowStepId: string, sourceType: string, itemIdentifier: string): boolean {
    return this.store.hasProcessedItem({ flowStepId, sourceType, itemIdentifier });
  }

  /** Returns false when the triple was already recorded; that is not an error. */
  markProcessed(flowStepId: string, sourceType: string, itemIdentifier: string, jobId: string): boolean {
    return this.store.insertProcessedItem({
      flowStepId,
      sourceType,
      itemIdentifier,
      jobId,
      createdAt: new Date().toISOString()
    });
  }

  deleteProcessed(criteria: ProcessedItemCriteria): number {
    return this.store.deleteProcessedItems(criteria);
  }

  purgeOlderThan(retentionDays: number, now: Date = new Date()): number {
    return this.store.purgeProcessedItems(new Date(now.getTime() - retentionDays * DAY_MS));
  }

  createGate(flowStepId: string): ProcessedItemsGate {
    return new ProcessedItemsGate(this, flowStepId);
  }
}

/**
 * Step-scoped view handed to fetch handlers. Claims stay pending until the
 * orchestrator has durably handed the packets to the next step.
 */
export class ProcessedItemsGate {
  private readonly claims = new Map<string, ItemClaim>();

  constructor(
    private readonly tracker: DeduplicationTracker,
    readonly flowStepId: string
  ) {}

  isProcessed(sourceType: string, itemIdentifier: string): boolean {
    return (
      this.claims.has(`${sourceType}\u0000${itemIdentifier}`) ||
      this.tracker.isProcessed(this.flowStepId, sourceType, itemIdentifier)
    );
  }

  claim(sourceType: string, itemIdentifier: string): void {
    this.claims.set(`${sourceType}\u0000${itemIdentifier}`, { sourceType, itemIdentifier });
  }

  pendingClaims(): ItemClaim[] {
    return [...this.claims.values()];
  }

  commit(jobId: string): number {
    let inserted = 0;
    for (const claim of this.claims.values()) {
      if (this.tracker.markProcessed(this.flowStepId, claim.sourceType, claim.itemIdentifier, jobId)) {
        inserted += 1;
      }
    }
    this.claims.clear();
    return inserted;
  }
}
