import type { FetchClient } from "../../ports/FetchClient";
import type { ResultRepository } from "../../ports/ResultRepository";
import type { WorkItem } from "../../core/work/workItem";
import { isRateLimited, type FetchFailure, type FetchResult } from "../../core/results/fetchResult";
import {
  completedKeys,
  mergeResults,
  remainingWork,
  type ItemOutcome,
  type ResultStore
} from "../../core/results/resultStore";
import { retry } from "../../shared/retry/retry";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";
import type { FetcherConfigInput } from "./fetcher.config";
import { resolveFetcherConfig } from "./fetcher.config";
import {
  createFetchRunSummaryTracker,
  wrapStoreLoadFailure,
  wrapStoreWriteFailure,
  type FetchRunSummary
} from "./fetch.error-handler";

class RateLimitSignal extends Error {
  constructor(readonly result: FetchFailure) {
    super(result.detail);
    this.name = "RateLimitSignal";
  }
}

export type BatchFetchDeps = {
  source: string;
  client: FetchClient;
  repo: ResultRepository;
  items: readonly WorkItem[];
  config?: FetcherConfigInput;
  sleep?: Sleep;
  now?: () => Date;
};

/**
 * Fetches every enumerated item that has no Success in the store yet, one at a
 * time and in enumerator order, committing progress as it goes.
 *
 * A rate-limited response commits pending results, sleeps for the backoff and
 * retries the same item. Other failures are stored and left for the next run.
 */
export const runBatchFetch = async (deps: BatchFetchDeps): Promise<FetchRunSummary> => {
  const { source, client, repo } = deps;
  const config = resolveFetcherConfig(deps.config);
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());

  let store: ResultStore;
  try {
    store = await repo.load();
  } catch (error) {
    throw wrapStoreLoadFailure(error, source);
  }

  const remaining = remainingWork(deps.items, store);
  const planned = config.maxItems != null ? remaining.slice(0, config.maxItems) : remaining;
  const tracker = createFetchRunSummaryTracker({
    source,
    enumerated: deps.items.length,
    alreadyComplete: completedKeys(store).size
  });
  tracker.setStoredRows(store.size);

  console.log(JSON.stringify({
    event: "fetch.started",
    source,
    enumerated: deps.items.length,
    stored: store.size,
    remaining: remaining.length,
    planned: planned.length
  }));

  let pending: ItemOutcome[] = [];

  const commit = async (index: number) => {
    if (pending.length === 0) return;

    const next = mergeResults(store, pending);
    try {
      await repo.persist(next);
    } catch (error) {
      throw wrapStoreWriteFailure(error, { source, index });
    }
    store = next;
    tracker.addCommit(store.size);
    console.log(JSON.stringify({ event: "fetch.committed", source, index, added: pending.length, storedRows: store.size }));
    pending = [];
  };

  const fetchWithBackoff = async (
    item: WorkItem,
    index: number
  ): Promise<{ result: FetchResult; exhausted: boolean }> => {
    try {
      const result = await retry(
        async () => {
          const result = await client.fetch(item);
          if (isRateLimited(result)) throw new RateLimitSignal(result);
          return result;
        },
        {
          retries: config.maxRateLimitRetries ?? Number.POSITIVE_INFINITY,
          delayMs: config.rateLimitBackoffMs,
          sleep,
          shouldRetry: (err) =>
            err instanceof RateLimitSignal ? { retry: true, delayMs: err.result.retryAfterMs } : false,
          onRetry: async ({ attempt, delayMs }) => {
            const pauses = tracker.addRateLimitPause();
            console.warn(JSON.stringify({
              event: "fetch.rate_limited",
              source,
              identifier: item.key,
              index,
              attempt,
              pauses,
              backoffMs: delayMs
            }));
            await commit(index - 1);
          }
        }
      );
      return { result, exhausted: false };
    } catch (err) {
      if (err instanceof RateLimitSignal) return { result: err.result, exhausted: true };
      throw err;
    }
  };

  for (let index = 0; index < planned.length; index += 1) {
    const item = planned[index];
    const { result, exhausted } = await fetchWithBackoff(item, index);

    pending.push({ item, result, fetchedAt: now().toISOString() });
    tracker.addResult(result);

    if (result.status === "success") {
      console.log(JSON.stringify({ event: "fetch.item", source, identifier: item.key, index, total: planned.length, status: "success" }));
    } else {
      console.warn(JSON.stringify({
        event: "fetch.item_failed",
        source,
        identifier: item.key,
        index,
        total: planned.length,
        kind: result.kind,
        httpStatus: result.httpStatus ?? null,
        detail: result.detail
      }));
    }

    if (exhausted) {
      tracker.halt("halted_rate_limited");
      await commit(index);
      break;
    }

    if (pending.length >= config.commitEvery) {
      await commit(index);
    }
  }

  await commit(planned.length - 1);

  const summary = tracker.summary();
  console.log(JSON.stringify({ event: "fetch.completed", ...summary }));
  return summary;
};
