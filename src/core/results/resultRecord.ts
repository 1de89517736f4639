import { z } from "zod";
import { failure, success, type FetchResult } from "./fetchResult";
import type { ResultStore, StoredResult } from "./resultStore";

/**
 * Persisted shape of one store entry, shared by every repository.
 */
export type ResultRecord = {
  identifier: string;
  status: "success" | "failure";
  payload?: Record<string, unknown>;
  error?: {
    kind: "timeout" | "http_error" | "rate_limited" | "malformed_response";
    detail: string;
    httpStatus?: number;
  };
  fetchedAt: string;
};

export const resultRecordSchema = z.discriminatedUnion("status", [
  z.object({
    identifier: z.string().min(1),
    status: z.literal("success"),
    payload: z.record(z.unknown()),
    fetchedAt: z.string()
  }),
  z.object({
    identifier: z.string().min(1),
    status: z.literal("failure"),
    error: z.object({
      kind: z.enum(["timeout", "http_error", "rate_limited", "malformed_response"]),
      detail: z.string(),
      httpStatus: z.number().int().optional()
    }),
    fetchedAt: z.string()
  })
]);

export const toRecord = (identifier: string, stored: StoredResult): ResultRecord => {
  if (stored.status === "success") {
    return { identifier, status: "success", payload: stored.payload, fetchedAt: stored.fetchedAt };
  }

  const error: NonNullable<ResultRecord["error"]> = { kind: stored.kind, detail: stored.detail };
  if (stored.httpStatus != null) error.httpStatus = stored.httpStatus;
  return { identifier, status: "failure", error, fetchedAt: stored.fetchedAt };
};

export const toRecords = (store: ResultStore): ResultRecord[] =>
  Array.from(store, ([identifier, stored]) => toRecord(identifier, stored));

/**
 * Throws a ZodError when any record does not match the persisted shape.
 * Later duplicates of an identifier replace earlier ones.
 */
export const fromRecords = (records: unknown): ResultStore => {
  const parsed = z.array(resultRecordSchema).parse(records);
  const store = new Map<string, StoredResult>();
  for (const record of parsed) {
    const result: FetchResult =
      record.status === "success"
        ? success(record.payload)
        : failure(record.error.kind, record.error.detail, { httpStatus: record.error.httpStatus });
    store.set(record.identifier, { ...result, fetchedAt: record.fetchedAt });
  }
  return store;
};
