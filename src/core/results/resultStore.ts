import type { WorkItem } from "../work/workItem";
import type { FetchResult } from "./fetchResult";

export type StoredResult = FetchResult & { fetchedAt: string };

/**
 * Identifier -> outcome. Iteration order is first-insertion order and is what the
 * repositories write, so an unchanged store always serializes to the same bytes.
 */
export type ResultStore = ReadonlyMap<string, StoredResult>;

export type ItemOutcome = {
  item: WorkItem;
  result: FetchResult;
  fetchedAt: string;
};

export const emptyStore = (): ResultStore => new Map();

export const completedKeys = (store: ResultStore): Set<string> => {
  const keys = new Set<string>();
  for (const [key, stored] of store) {
    if (stored.status === "success") keys.add(key);
  }
  return keys;
};

export const remainingWork = (enumerated: readonly WorkItem[], store: ResultStore): WorkItem[] => {
  const done = completedKeys(store);
  return enumerated.filter((item) => !done.has(item.key));
};

/**
 * A Success is final. Anything else may be replaced by a later outcome.
 */
export const mergeResults = (store: ResultStore, outcomes: readonly ItemOutcome[]): ResultStore => {
  const next = new Map(store);
  for (const { item, result, fetchedAt } of outcomes) {
    const existing = next.get(item.key);
    if (existing?.status === "success") continue;
    next.set(item.key, { ...result, fetchedAt });
  }
  return next;
};
