import type { ProcessedItem, ProcessedItemCriteria } from "../types.js";
import type { ProcessedItemStateContainer } from "./contracts.js";

export interface ProcessedItemKey {
  flowStepId: string;
  sourceType: string;
  itemIdentifier: string;
}

function matchesKey(item: ProcessedItem, key: ProcessedItemKey): boolean {
  return (
    item.flowStepId === key.flowStepId &&
    item.sourceType === key.sourceType &&
    item.itemIdentifier === key.itemIdentifier
  );
}

export function hasProcessedItem(state: ProcessedItemStateContainer, key: ProcessedItemKey): boolean {
  return state.processedItems.some((item) => matchesKey(item, key));
}

/**
 * Inserts the record unless the triple already exists. The check and the
 * insert run in one synchronous call, so of two racing inserts only one wins.
 */
export function insertProcessedItem(state: ProcessedItemStateContainer, record: ProcessedItem): boolean {
  if (hasProcessedItem(state, record)) {
    return false;
  }

  state.processedItems.push(record);
  return true;
}

function resolveFlowStepIds(state: ProcessedItemStateContainer, criteria: ProcessedItemCriteria): Set<string> | null {
  if (!criteria.flowId && !criteria.pipelineId) {
    return null;
  }

  const ids = new Set<string>();
  for (const flow of state.flows) {
    if (criteria.flowId && flow.id !== criteria.flowId) {
      continue;
    }
    if (criteria.pipelineId && flow.pipelineId !== criteria.pipelineId) {
      continue;
    }
    for (const step of flow.steps) {
      ids.add(step.flowStepId);
    }
  }
  return ids;
}

export function deleteProcessedItems(state: ProcessedItemStateContainer, criteria: ProcessedItemCriteria): number {
  const hasCriteria = Object.values(criteria).some((value) => typeof value === "string" && value.length > 0);
  if (!hasCriteria) {
    return 0;
  }

  const scopedStepIds = resolveFlowStepIds(state, criteria);
  const previousCount = state.processedItems.length;
  state.processedItems = state.processedItems.filter((item) => {
    const matches =
      (criteria.jobId ? item.jobId === criteria.jobId : true) &&
      (criteria.flowStepId ? item.flowStepId === criteria.flowStepId : true) &&
      (criteria.sourceType ? item.sourceType === criteria.sourceType : true) &&
      (scopedStepIds ? scopedStepIds.has(item.flowStepId) : true);
    return !matches;
  });

  return previousCount - state.processedItems.length;
}

export function purgeProcessedItemsBefore(state: ProcessedItemStateContainer, before: Date): number {
  const previousCount = state.processedItems.length;
  state.processedItems = state.processedItems.filter((item) => Date.parse(item.createdAt) >= before.getTime());
  return previousCount - state.processedItems.length;
}
