export type FailureKind = "timeout" | "http_error" | "rate_limited" | "malformed_response";

export type Payload = Record<string, unknown>;

export type FetchSuccess = {
  status: "success";
  payload: Payload;
};

export type FetchFailure = {
  status: "failure";
  kind: FailureKind;
  detail: string;
  httpStatus?: number;
  retryAfterMs?: number;
};

export type FetchResult = FetchSuccess | FetchFailure;

export const success = (payload: Payload): FetchSuccess => ({ status: "success", payload });

export const failure = (
  kind: FailureKind,
  detail: string,
  extra: Pick<FetchFailure, "httpStatus" | "retryAfterMs"> = {}
): FetchFailure => {
  const result: FetchFailure = { status: "failure", kind, detail };
  if (extra.httpStatus != null) result.httpStatus = extra.httpStatus;
  if (extra.retryAfterMs != null) result.retryAfterMs = extra.retryAfterMs;
  return result;
};

export const isRateLimited = (result: FetchResult): result is FetchFailure =>
  result.status === "failure" && result.kind === "rate_limited";
