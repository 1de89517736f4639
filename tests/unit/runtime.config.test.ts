import { resolveFetcherConfig } from "../../src/application/batch-fetch/fetcher.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      timeoutMs: 30000,
      fetcherConfig: { commitEvery: 1, rateLimitBackoffMs: 3_660_000 }
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      FETCH_TIMEOUT_MS: "120000",
      FETCH_INTER_CALL_DELAY_MS: "0",
      FETCH_RATE_LIMIT_BACKOFF_MS: "7200000",
      FETCH_RATE_LIMIT_MAX_RETRIES: "0",
      FETCH_COMMIT_EVERY: "10000",
      FETCH_MAX_ITEMS: "1",
      STORE_MIN_ROWS: "100000"
    });

    expect(runtime).toEqual({
      timeoutMs: 120000,
      interCallDelayMs: 0,
      minRows: 100000,
      fetcherConfig: {
        commitEvery: 10000,
        rateLimitBackoffMs: 7200000,
        maxRateLimitRetries: 0,
        maxItems: 1
      }
    });
  });

  it.each([
    { env: { FETCH_TIMEOUT_MS: "999" }, message: "FETCH_TIMEOUT_MS=999 is out of allowed range [1000..120000]" },
    {
      env: { FETCH_INTER_CALL_DELAY_MS: "60001" },
      message: "FETCH_INTER_CALL_DELAY_MS=60001 is out of allowed range [0..60000]"
    },
    {
      env: { FETCH_RATE_LIMIT_BACKOFF_MS: "-1" },
      message: "FETCH_RATE_LIMIT_BACKOFF_MS=-1 is out of allowed range [0..7200000]"
    },
    {
      env: { FETCH_RATE_LIMIT_MAX_RETRIES: "1001" },
      message: "FETCH_RATE_LIMIT_MAX_RETRIES=1001 is out of allowed range [0..1000]"
    },
    { env: { FETCH_COMMIT_EVERY: "0" }, message: "FETCH_COMMIT_EVERY=0 is out of allowed range [1..10000]" },
    { env: { FETCH_MAX_ITEMS: "1.5" }, message: "FETCH_MAX_ITEMS=1.5 is out of allowed range [1..100000]" },
    { env: { STORE_MIN_ROWS: "abc" }, message: "STORE_MIN_ROWS=abc is out of allowed range [0..100000]" }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });

  it("treats blank values as unset", () => {
    expect(loadRuntimeConfigFromEnv({ FETCH_TIMEOUT_MS: "  ", STORE_MIN_ROWS: "" }).timeoutMs).toBe(30000);
  });
});

describe("resolveFetcherConfig", () => {
  it("keeps optional caps only when given", () => {
    expect(resolveFetcherConfig({ maxItems: 5 })).toEqual({
      commitEvery: 1,
      rateLimitBackoffMs: 3_660_000,
      maxItems: 5
    });
  });

  it("rejects a negative retry cap", () => {
    expect(() => resolveFetcherConfig({ maxRateLimitRetries: -1 })).toThrow(
      "maxRateLimitRetries=-1 is out of allowed range [0..1000]"
    );
  });
});
