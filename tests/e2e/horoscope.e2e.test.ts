import { promises as fs } from "fs";
import type { AddressInfo } from "net";
import os from "os";
import path from "path";
import { runFetch } from "../../src/composition/root";
import { zodiacSigns } from "../../src/core/work/enumerators";
import type { ResultRecord } from "../../src/core/results/resultRecord";
import { createFakeSourceServer, type FakeSourceOptions } from "../../src/fake-source-server";

const startFakeSource = async (opts: FakeSourceOptions) => {
  const fake = createFakeSourceServer(opts);
  await new Promise<void>((resolve) => {
    fake.server.listen(0, "127.0.0.1", () => resolve());
  });
  const address = fake.server.address() as AddressInfo;
  return {
    ...fake,
    baseUrl: `http://127.0.0.1:${address.port}/horoscope`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        fake.server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

describe("horoscope fetch (e2e)", () => {
  let dir: string;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "batch-fetch-e2e-"));
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const envFor = (baseUrl: string): NodeJS.ProcessEnv => ({
    ROXY_API_KEY: "test-token",
    ROXY_BASE_URL: baseUrl,
    STORE_DIR: dir,
    FETCH_TIMEOUT_MS: "1000",
    FETCH_INTER_CALL_DELAY_MS: "0",
    FETCH_RATE_LIMIT_BACKOFF_MS: "0"
  });

  const readRecords = async (): Promise<ResultRecord[]> =>
    JSON.parse(await fs.readFile(path.join(dir, "horoscope.json"), "utf8"));

  it("stores every sign, then refetches only the failures", async () => {
    const flaky = await startFakeSource({
      delayMs: { taurus: 1500 },
      failWith: { leo: 500 },
      malformed: ["cancer"],
      rateLimitFirst: { virgo: 1 }
    });

    try {
      const first = await runFetch("horoscope", envFor(flaky.baseUrl));

      expect(first).toEqual({
        source: "horoscope",
        status: "completed",
        enumerated: 12,
        alreadyComplete: 0,
        attempted: 12,
        succeeded: 9,
        failed: 3,
        failuresByKind: { timeout: 1, http_error: 1, malformed_response: 1 },
        rateLimitPauses: 1,
        commits: 12,
        storedRows: 12
      });
      expect(flaky.requestCount("virgo")).toBe(2);
    } finally {
      await flaky.close();
    }

    const records = await readRecords();
    expect(records.map((record) => record.identifier)).toEqual([...zodiacSigns]);
    expect(records[1]).toMatchObject({ identifier: "taurus", status: "failure", error: { kind: "timeout" } });
    expect(records[4]).toMatchObject({
      identifier: "leo",
      status: "failure",
      error: { kind: "http_error", httpStatus: 500 }
    });
    expect(records[0]).toMatchObject({
      identifier: "aries",
      status: "success",
      payload: { sign: "aries", date: "2026-10-18", horoscope: "A steady day for aries." }
    });
    expect(JSON.stringify(records)).not.toContain("test-token");

    const healthy = await startFakeSource({});
    try {
      const second = await runFetch("horoscope", envFor(healthy.baseUrl));

      expect(second).toMatchObject({ alreadyComplete: 9, attempted: 3, succeeded: 3, storedRows: 12 });
      expect(zodiacSigns.filter((sign) => healthy.requestCount(sign) > 0)).toEqual(["taurus", "cancer", "leo"]);
    } finally {
      await healthy.close();
    }

    const after = await readRecords();
    expect(after.every((record) => record.status === "success")).toBe(true);
    expect(after[0]).toEqual(records[0]);
  }, 20000);

  it("writes nothing when the store is already complete", async () => {
    const healthy = await startFakeSource({});
    try {
      await runFetch("horoscope", envFor(healthy.baseUrl));
      const before = await fs.readFile(path.join(dir, "horoscope.json"), "utf8");

      const rerun = await runFetch("horoscope", envFor(healthy.baseUrl));

      expect(rerun.attempted).toBe(0);
      expect(rerun.commits).toBe(0);
      expect(await fs.readFile(path.join(dir, "horoscope.json"), "utf8")).toBe(before);
    } finally {
      await healthy.close();
    }
  });

  it("writes a CSV store when asked to", async () => {
    const healthy = await startFakeSource({ failWith: { pisces: 503 } });
    try {
      await runFetch("horoscope", { ...envFor(healthy.baseUrl), STORE_BACKEND: "csv" });
    } finally {
      await healthy.close();
    }

    const lines = (await fs.readFile(path.join(dir, "horoscope.csv"), "utf8")).trim().split("\n");
    expect(lines).toHaveLength(13);
    expect(lines[12]).toMatch(/^pisces,failure,http_error,503,Request failed with 503: http:\/\/127\.0\.0\.1:\d+\/horoscope\/pisces\?token=REDACTED,,/);
  });
});
