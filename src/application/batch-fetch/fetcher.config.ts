export type FetcherConfig = {
  /** Persist after this many new results; the tail is always persisted. */
  commitEvery: number;
  rateLimitBackoffMs: number;
  /** Unbounded when absent. */
  maxRateLimitRetries?: number;
  /** Fetch at most this many remaining items in one run. */
  maxItems?: number;
};

export type FetcherConfigInput = Partial<FetcherConfig>;

export const defaultFetcherConfig: FetcherConfig = {
  commitEvery: 1,
  rateLimitBackoffMs: 3_660_000
};

export const fetcherCaps = {
  commitEvery: { min: 1, max: 10000 },
  rateLimitBackoffMs: { min: 0, max: 7_200_000 },
  maxRateLimitRetries: { min: 0, max: 1000 },
  maxItems: { min: 1, max: 100000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateFetcherConfig = (config: FetcherConfig): FetcherConfig => {
  assertIntegerInRange("commitEvery", config.commitEvery, fetcherCaps.commitEvery.min, fetcherCaps.commitEvery.max);
  assertIntegerInRange(
    "rateLimitBackoffMs",
    config.rateLimitBackoffMs,
    fetcherCaps.rateLimitBackoffMs.min,
    fetcherCaps.rateLimitBackoffMs.max
  );
  if (config.maxRateLimitRetries != null) {
    assertIntegerInRange(
      "maxRateLimitRetries",
      config.maxRateLimitRetries,
      fetcherCaps.maxRateLimitRetries.min,
      fetcherCaps.maxRateLimitRetries.max
    );
  }
  if (config.maxItems != null) {
    assertIntegerInRange("maxItems", config.maxItems, fetcherCaps.maxItems.min, fetcherCaps.maxItems.max);
  }
  return config;
};

export const resolveFetcherConfig = (input: FetcherConfigInput = {}): FetcherConfig => {
  const config: FetcherConfig = {
    commitEvery: input.commitEvery ?? defaultFetcherConfig.commitEvery,
    rateLimitBackoffMs: input.rateLimitBackoffMs ?? defaultFetcherConfig.rateLimitBackoffMs
  };
  if (input.maxRateLimitRetries != null) config.maxRateLimitRetries = input.maxRateLimitRetries;
  if (input.maxItems != null) config.maxItems = input.maxItems;
  return validateFetcherConfig(config);
};
