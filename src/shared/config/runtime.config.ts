import {
  defaultFetcherConfig,
  fetcherCaps,
  type FetcherConfig,
  validateFetcherConfig
} from "../../application/batch-fetch/fetcher.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  interCallDelayMs: { min: 0, max: 60000 },
  minRows: { min: 0, max: 100000 }
} as const;

export type RuntimeConfig = {
  fetcherConfig: FetcherConfig;
  timeoutMs: number;
  /** Source default applies when absent. */
  interCallDelayMs?: number;
  /** Source default applies when absent. */
  minRows?: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const fetcherConfig: FetcherConfig = {
    commitEvery: parseOptionalIntInRange(env, "FETCH_COMMIT_EVERY", fetcherCaps.commitEvery) ?? defaultFetcherConfig.commitEvery,
    rateLimitBackoffMs:
      parseOptionalIntInRange(env, "FETCH_RATE_LIMIT_BACKOFF_MS", fetcherCaps.rateLimitBackoffMs) ??
      defaultFetcherConfig.rateLimitBackoffMs
  };
  const maxRateLimitRetries = parseOptionalIntInRange(env, "FETCH_RATE_LIMIT_MAX_RETRIES", fetcherCaps.maxRateLimitRetries);
  if (maxRateLimitRetries != null) fetcherConfig.maxRateLimitRetries = maxRateLimitRetries;
  const maxItems = parseOptionalIntInRange(env, "FETCH_MAX_ITEMS", fetcherCaps.maxItems);
  if (maxItems != null) fetcherConfig.maxItems = maxItems;

  const runtime: RuntimeConfig = {
    fetcherConfig: validateFetcherConfig(fetcherConfig),
    timeoutMs: parseOptionalIntInRange(env, "FETCH_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 30000
  };
  const interCallDelayMs = parseOptionalIntInRange(env, "FETCH_INTER_CALL_DELAY_MS", runtimeCaps.interCallDelayMs);
  if (interCallDelayMs != null) runtime.interCallDelayMs = interCallDelayMs;
  const minRows = parseOptionalIntInRange(env, "STORE_MIN_ROWS", runtimeCaps.minRows);
  if (minRows != null) runtime.minRows = minRows;

  return runtime;
};
