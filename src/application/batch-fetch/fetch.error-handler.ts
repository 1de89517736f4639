import type { FailureKind, FetchResult } from "../../core/results/fetchResult";
import { StoreShrinkRefusedError, StoreUnreadableError } from "../../core/results/storeGuard";
import { errorMessage } from "../../shared/errors/errorMessage";

export type FatalErrorCode =
  | "missing_credential"
  | "unknown_source"
  | "catalog_unavailable"
  | "enumeration_failed"
  | "setup_request_failed"
  | "store_unreadable"
  | "store_shrink_refused"
  | "store_write_failed";

export type FatalErrorContext = Partial<{
  source: string;
  identifier: string;
  index: number;
  storedRows: number;
  nextRows: number;
  minRows: number;
}>;

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

/**
 * Aborts the run. Raised before the first fetch for setup problems, or during
 * a commit when the store refuses or fails the write.
 */
export class BatchFetchFatalError extends Error {
  readonly code: FatalErrorCode;
  readonly context: FatalErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: FatalErrorCode; message: string; context?: FatalErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "BatchFetchFatalError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const missingCredential = (source: string, variable: string): BatchFetchFatalError =>
  new BatchFetchFatalError({
    code: "missing_credential",
    message: `${variable} is not set; the ${source} source cannot run without it`,
    context: { source }
  });

export const wrapStoreLoadFailure = (reason: unknown, source: string): BatchFetchFatalError => {
  if (reason instanceof BatchFetchFatalError) return reason;
  return new BatchFetchFatalError({
    code: "store_unreadable",
    message: reason instanceof StoreUnreadableError ? reason.message : `Result store load failed: ${errorMessage(reason)}`,
    context: { source },
    cause: unwrapCause(reason)
  });
};

export const wrapStoreWriteFailure = (
  reason: unknown,
  context: Pick<FatalErrorContext, "source" | "index">
): BatchFetchFatalError => {
  if (reason instanceof StoreShrinkRefusedError) {
    return new BatchFetchFatalError({
      code: "store_shrink_refused",
      message: reason.message,
      context: { ...context, storedRows: reason.storedRows, nextRows: reason.nextRows, minRows: reason.minRows },
      cause: reason
    });
  }

  return new BatchFetchFatalError({
    code: "store_write_failed",
    message: `Result store write failed after index=${context.index ?? "?"}: ${errorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });
};

export type RunStatus = "completed" | "halted_rate_limited";

export type FetchRunSummary = {
  source: string;
  status: RunStatus;
  enumerated: number;
  alreadyComplete: number;
  attempted: number;
  succeeded: number;
  failed: number;
  failuresByKind: Partial<Record<FailureKind, number>>;
  rateLimitPauses: number;
  commits: number;
  storedRows: number;
};

export const createFetchRunSummaryTracker = (init: { source: string; enumerated: number; alreadyComplete: number }) => {
  let attempted = 0;
  let succeeded = 0;
  let rateLimitPauses = 0;
  let commits = 0;
  let storedRows = 0;
  let status: RunStatus = "completed";
  const failuresByKind: Partial<Record<FailureKind, number>> = {};

  return {
    addResult: (result: FetchResult) => {
      attempted += 1;
      if (result.status === "success") {
        succeeded += 1;
        return;
      }
      failuresByKind[result.kind] = (failuresByKind[result.kind] ?? 0) + 1;
    },
    addRateLimitPause: () => {
      rateLimitPauses += 1;
      return rateLimitPauses;
    },
    addCommit: (rows: number) => {
      commits += 1;
      storedRows = rows;
    },
    setStoredRows: (rows: number) => {
      storedRows = rows;
    },
    halt: (reason: RunStatus) => {
      status = reason;
    },
    summary: (): FetchRunSummary => ({
      source: init.source,
      status,
      enumerated: init.enumerated,
      alreadyComplete: init.alreadyComplete,
      attempted,
      succeeded,
      failed: attempted - succeeded,
      failuresByKind: { ...failuresByKind },
      rateLimitPauses,
      commits,
      storedRows
    })
  };
};
