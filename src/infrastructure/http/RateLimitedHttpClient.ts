import { ZodError } from "zod";
import type { FetchClient, FetchSource, SourceRequest } from "../../ports/FetchClient";
import type { WorkItem } from "../../core/work/workItem";
import { failure, success, type FetchResult } from "../../core/results/fetchResult";
import { createPacer, type Pacer } from "../../shared/pacing/pacer";
import type { Clock, Sleep } from "../../shared/time/sleep";
import { errorMessage } from "../../shared/errors/errorMessage";

export type HttpClientOptions = {
  timeoutMs: number;
  interCallDelayMs: number;
  sleep?: Sleep;
  clock?: Clock;
};

const rateLimitStatuses = new Set([403, 429]);

export const buildRequestUrl = (baseUrl: string, request: SourceRequest): URL => {
  const url = new URL(baseUrl);
  const basePath = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  const path = request.path.startsWith("/") ? request.path : `/${request.path}`;
  url.pathname = `${basePath}${path}`;
  for (const [key, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(key, String(value));
  }
  return url;
};

export const redactUrl = (url: URL, secretKeys: readonly string[]): string => {
  const safe = new URL(url.toString());
  for (const key of secretKeys) {
    if (safe.searchParams.has(key)) safe.searchParams.set(key, "REDACTED");
  }
  return `${safe.origin}${safe.pathname}${safe.search}`;
};

/** Seconds form only; HTTP-date values are ignored. */
export const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (header == null || !/^\d+$/.test(header.trim())) return undefined;
  return Number(header.trim()) * 1000;
};

const describeError = (err: unknown): string => {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
  }
  return errorMessage(err);
};

/**
 * One GET per work item against a single upstream source, using native fetch
 * (Node 20). Never rejects: every outcome is a FetchResult.
 */
export class RateLimitedHttpClient implements FetchClient {
  private readonly pace: Pacer;

  constructor(
    private readonly source: FetchSource,
    private readonly options: HttpClientOptions
  ) {
    this.pace = createPacer(options.interCallDelayMs, { sleep: options.sleep, clock: options.clock });
  }

  async fetch(item: WorkItem): Promise<FetchResult> {
    let request: SourceRequest;
    let url: URL;
    try {
      request = this.source.request(item);
      url = buildRequestUrl(this.source.baseUrl, request);
    } catch (err) {
      return failure("malformed_response", `Cannot build request for ${item.key}: ${describeError(err)}`);
    }
    const safeRequestUrl = redactUrl(url, this.source.secretQueryKeys ?? []);

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    let res: Response;
    let text: string;
    try {
      const exchange = await this.pace(async () => {
        timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
        const response = await fetch(url.toString(), {
          headers: { Accept: "application/json", ...request.headers },
          signal: controller.signal
        });
        return { response, body: await response.text() };
      });
      res = exchange.response;
      text = exchange.body;
    } catch (err) {
      if (controller.signal.aborted) {
        return failure("timeout", `Request timeout after ${this.options.timeoutMs}ms: ${safeRequestUrl}`);
      }
      return failure("http_error", `Request failed: ${safeRequestUrl}: ${describeError(err)}`);
    } finally {
      clearTimeout(timeout);
    }

    if (rateLimitStatuses.has(res.status)) {
      return failure("rate_limited", `Rate limited (${res.status}): ${safeRequestUrl}`, {
        httpStatus: res.status,
        retryAfterMs: parseRetryAfterMs(res.headers.get("retry-after"))
      });
    }

    if (!res.ok) {
      // Error bodies are never logged or stored.
      return failure("http_error", `Request failed with ${res.status}: ${safeRequestUrl}`, {
        httpStatus: res.status
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return failure("malformed_response", `Response is not JSON: ${safeRequestUrl}`, {
        httpStatus: res.status
      });
    }

    try {
      return success(this.source.parse(body, item));
    } catch (err) {
      return failure("malformed_response", `Unexpected response shape from ${safeRequestUrl}: ${describeError(err)}`, {
        httpStatus: res.status
      });
    }
  }
}
