import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export interface IndexPlanEntry {
  keys: IndexSpecification;
  options: CreateIndexesOptions;
}

/**
 * Index plan for a result collection. Applied to the staging collection before
 * it is renamed over the live one, so the live collection always has them.
 * - `_id` is the WorkItem identifier (unique by construction)
 * - position: keeps enumerator order on load
 * - status: progress queries ("how many succeeded")
 */
export const mongoIndexes: { resultCollection: readonly IndexPlanEntry[] } = {
  resultCollection: [
    { keys: { position: 1 }, options: { unique: true } },
    { keys: { status: 1 }, options: {} }
  ]
};
