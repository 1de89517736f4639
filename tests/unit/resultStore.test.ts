import { failure, success } from "../../src/core/results/fetchResult";
import {
  completedKeys,
  mergeResults,
  remainingWork,
  type ResultStore,
  type StoredResult
} from "../../src/core/results/resultStore";
import { createWorkItem } from "../../src/core/work/workItem";

const earlier = "2026-10-17T08:00:00.000Z";
const later = "2026-10-18T08:00:00.000Z";

const items = ["aries", "taurus", "gemini"].map((sign) => createWorkItem(sign));

const storedBefore = (): ResultStore =>
  new Map<string, StoredResult>([
    ["aries", { ...failure("timeout", "Request timeout after 30000ms"), fetchedAt: earlier }],
    ["taurus", { ...success({ sign: "taurus" }), fetchedAt: earlier }]
  ]);

describe("remainingWork", () => {
  it("keeps enumerator order and retries earlier failures", () => {
    expect(remainingWork(items, storedBefore()).map((item) => item.key)).toEqual(["aries", "gemini"]);
  });

  it("returns everything for an empty store", () => {
    expect(remainingWork(items, new Map()).map((item) => item.key)).toEqual(["aries", "taurus", "gemini"]);
  });

  it("only counts successes as completed", () => {
    expect(Array.from(completedKeys(storedBefore()))).toEqual(["taurus"]);
  });
});

describe("mergeResults", () => {
  it("replaces failures, never overwrites a success and appends new keys", () => {
    const before = storedBefore();
    const merged = mergeResults(before, [
      { item: items[0], result: success({ sign: "aries" }), fetchedAt: later },
      { item: items[1], result: failure("http_error", "Request failed with 500", { httpStatus: 500 }), fetchedAt: later },
      { item: items[2], result: failure("rate_limited", "Rate limited (429)"), fetchedAt: later }
    ]);

    expect(Array.from(merged.keys())).toEqual(["aries", "taurus", "gemini"]);
    expect(merged.get("aries")).toEqual({ status: "success", payload: { sign: "aries" }, fetchedAt: later });
    expect(merged.get("taurus")).toEqual({ status: "success", payload: { sign: "taurus" }, fetchedAt: earlier });
    expect(merged.get("gemini")).toEqual({
      status: "failure",
      kind: "rate_limited",
      detail: "Rate limited (429)",
      fetchedAt: later
    });
  });

  it("does not mutate the store it was given", () => {
    const before = storedBefore();
    mergeResults(before, [{ item: items[0], result: success({}), fetchedAt: later }]);

    expect(before.get("aries")?.status).toBe("failure");
    expect(before.size).toBe(2);
  });

  it("lets a newer failure replace an older one", () => {
    const merged = mergeResults(storedBefore(), [
      { item: items[0], result: failure("http_error", "Request failed: connection reset"), fetchedAt: later }
    ]);

    expect(merged.get("aries")).toEqual({
      status: "failure",
      kind: "http_error",
      detail: "Request failed: connection reset",
      fetchedAt: later
    });
  });
});
