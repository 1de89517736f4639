import { z } from "zod";
import type { FetchSource } from "../../ports/FetchClient";

// The index is one document covering every country, keyed or listed.
const equalityIndexSchema = z.union([z.array(z.record(z.unknown())), z.record(z.unknown())]);

export const equalityIndexItemKey = "all";

export const createEqualityIndexSource = (opts: { baseUrl: string }): FetchSource => ({
  name: "equality-index",
  baseUrl: opts.baseUrl,
  request: () => ({ path: "/equality-index", query: { format: "json" } }),
  parse: (body) => {
    const data = equalityIndexSchema.parse(body);
    const entries = Array.isArray(data) ? data.length : Object.keys(data).length;
    if (entries === 0) {
      throw new Error("Equality index response is empty");
    }
    return { entry_count: entries, data };
  }
});
