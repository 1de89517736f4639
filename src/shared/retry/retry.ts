import { sleep as defaultSleep, type Sleep } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = { attempt: number; delayMs: number; error: unknown };

export type RetryOptions = {
  retries: number;          // extra attempts after the first; Infinity retries until shouldRetry says no
  delayMs: number;          // fixed pause between attempts
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext) => void | Promise<void>;   // awaited before the pause
  onGiveUp?: (ctx: { attempt: number; error: unknown }) => void;
  sleep?: Sleep;
};

const resolveDelay = (base: number, decision: RetryDecision): number => {
  if (typeof decision === "boolean" || decision.delayMs == null) return base;
  const custom = decision.delayMs;
  // A server-provided delay can only lengthen the pause, never shorten it.
  return Number.isFinite(custom) && custom > base ? custom : base;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, delayMs, shouldRetry, onRetry, onGiveUp, sleep = defaultSleep } = opts;
  if (!(retries >= 0)) throw new Error("retries must be >= 0");

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const wantsRetry = typeof decision === "boolean" ? decision : decision.retry;
      if (!wantsRetry || attempt >= retries) {
        onGiveUp?.({ attempt: attempt + 1, error: err });
        throw err;
      }

      const waitMs = resolveDelay(delayMs, decision);
      await onRetry?.({ attempt: attempt + 1, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
