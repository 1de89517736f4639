import { runBatchFetch } from "../application/batch-fetch/batchFetch.usecase";
import { BatchFetchFatalError, type FetchRunSummary } from "../application/batch-fetch/fetch.error-handler";
import { RateLimitedHttpClient } from "../infrastructure/http/RateLimitedHttpClient";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createResultRepository } from "./repositories";
import { isSourceName, prepareSource, sourceNames } from "./sources";

export const runFetch = async (
  sourceName: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<FetchRunSummary> => {
  if (!isSourceName(sourceName)) {
    throw new BatchFetchFatalError({
      code: "unknown_source",
      message: `Unknown source "${sourceName}". Available: ${sourceNames.join(", ")}`
    });
  }

  const settings = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);
  const setup = await prepareSource(sourceName, {
    env: settings,
    timeoutMs: runtime.timeoutMs,
    now: () => new Date()
  });

  const client = new RateLimitedHttpClient(setup.source, {
    timeoutMs: runtime.timeoutMs,
    interCallDelayMs: runtime.interCallDelayMs ?? setup.interCallDelayMs
  });
  const repo = createResultRepository(settings, sourceName, runtime.minRows ?? setup.minRows);

  try {
    return await runBatchFetch({
      source: sourceName,
      client,
      repo,
      items: setup.items,
      config: runtime.fetcherConfig
    });
  } finally {
    await repo.close?.();
  }
};
