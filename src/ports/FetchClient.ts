import type { FetchResult, Payload } from "../core/results/fetchResult";
import type { WorkItem } from "../core/work/workItem";

export type QueryValue = string | number | boolean;

export type SourceRequest = {
  path: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
};

/**
 * Everything that differs between upstream APIs. The HTTP mechanics (timeout,
 * pacing, status classification) live in the client and are shared.
 */
export interface FetchSource {
  readonly name: string;
  readonly baseUrl: string;
  /** Query keys whose values must never reach a log line. */
  readonly secretQueryKeys?: readonly string[];
  request(item: WorkItem): SourceRequest;
  /** Throws on an unexpected body; the client maps that to `malformed_response`. */
  parse(body: unknown, item: WorkItem): Payload;
}

export interface FetchClient {
  fetch(item: WorkItem): Promise<FetchResult>;
}
