import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from "../time/sleep";

/**
 * Keeps a minimum pause between consecutive calls (no external deps).
 * Usage:
 *   const pace = createPacer(350);
 *   for (const item of items) { await pace(() => call(item)); }
 *
 * The pause is measured from the end of the previous call, whatever its
 * outcome, so a slow call is still followed by the full delay.
 */
export const createPacer = (
  minIntervalMs: number,
  opts: { sleep?: Sleep; clock?: Clock } = {}
) => {
  if (!Number.isInteger(minIntervalMs) || minIntervalMs < 0) {
    throw new Error("minIntervalMs must be an integer >= 0");
  }

  const sleep = opts.sleep ?? defaultSleep;
  const clock = opts.clock ?? systemClock;
  let lastCallEndedAt: number | undefined;

  return async <T>(call: () => Promise<T>): Promise<T> => {
    if (lastCallEndedAt != null) {
      const waitMs = lastCallEndedAt + minIntervalMs - clock();
      if (waitMs > 0) await sleep(waitMs);
    }
    try {
      return await call();
    } finally {
      lastCallEndedAt = clock();
    }
  };
};

export type Pacer = ReturnType<typeof createPacer>;
