import { buildRequestUrl, redactUrl } from "./RateLimitedHttpClient";
import type { SourceRequest } from "../../ports/FetchClient";
import { errorMessage } from "../../shared/errors/errorMessage";

export class SetupRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "SetupRequestError";
    this.status = status;
  }
}

export type SetupRequest = SourceRequest & {
  method?: "GET" | "POST";
  form?: Record<string, string>;
  secretQueryKeys?: readonly string[];
  timeoutMs: number;
};

/**
 * One-off request made while preparing a run (tokens, catalogs). Unlike the
 * per-item client this throws, since nothing can be fetched without it.
 */
export const requestJson = async (baseUrl: string, request: SetupRequest): Promise<unknown> => {
  const url = buildRequestUrl(baseUrl, request);
  const safeRequestUrl = redactUrl(url, request.secretQueryKeys ?? []);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
  let res: Response;
  try {
    res = await fetch(url.toString(), {
      method: request.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...(request.form ? { "Content-Type": "application/x-www-form-urlencoded" } : {}),
        ...request.headers
      },
      body: request.form ? new URLSearchParams(request.form).toString() : undefined,
      signal: controller.signal
    });
    if (!res.ok) {
      await res.text().catch(() => "");
      throw new SetupRequestError(`Setup request failed with ${res.status}: ${safeRequestUrl}`, res.status);
    }
    return await res.json();
  } catch (err) {
    if (err instanceof SetupRequestError) throw err;
    if (controller.signal.aborted) {
      throw new SetupRequestError(`Setup request timeout after ${request.timeoutMs}ms: ${safeRequestUrl}`);
    }
    throw new SetupRequestError(
      `Setup request failed: ${safeRequestUrl}: ${errorMessage(err)}`
    );
  } finally {
    clearTimeout(timeout);
  }
};
