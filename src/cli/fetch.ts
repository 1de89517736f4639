#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { runFetch } from "../composition/root";
import { sourceNames } from "../composition/sources";
import { z } from "zod";
import type { FatalErrorContext } from "../application/batch-fetch/fetch.error-handler";
import { errorMessage } from "../shared/errors/errorMessage";

type CliErrorEnvelope = {
  event: "fetch.failed";
  name: string;
  message: string;
  code?: string;
  context?: FatalErrorContext;
  stack?: string;
};

const contextText = z.string().min(1).optional().catch(undefined);
const contextCount = z.number().finite().optional().catch(undefined);

// Only these keys may reach the terminal; anything else on `context` is dropped.
const printableContextSchema = z.object({
  source: contextText,
  identifier: contextText,
  index: contextCount,
  storedRows: contextCount,
  nextRows: contextCount,
  minRows: contextCount
});

const printableContext = (value: unknown): FatalErrorContext | undefined => {
  const parsed = printableContextSchema.safeParse(value);
  if (!parsed.success) return undefined;
  return Object.values(parsed.data).some((field) => field !== undefined) ? parsed.data : undefined;
};

const stringField = (value: unknown, key: "name" | "code" | "stack"): string | undefined => {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" && field !== "" ? field : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.toLowerCase() ?? "");

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const code = stringField(err, "code");
  const context = typeof err === "object" && err !== null ? printableContext(Reflect.get(err, "context")) : undefined;
  const stack = includeStack ? stringField(err, "stack") : undefined;

  return {
    event: "fetch.failed",
    name: stringField(err, "name") ?? "Error",
    message: errorMessage(err),
    ...(code ? { code } : {}),
    ...(context ? { context } : {}),
    ...(stack ? { stack } : {})
  };
};

export const usage = (): string =>
  `Usage: batch-fetch <source>\n       batch-fetch --list\nSources: ${sourceNames.join(", ")}`;

export const executeFetchCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  const [command] = argv;

  if (command === "--list") {
    // eslint-disable-next-line no-console
    console.log(sourceNames.join("\n"));
    return;
  }

  if (command === "--help" || command === "-h") {
    // eslint-disable-next-line no-console
    console.log(usage());
    return;
  }

  if (command == null) {
    // eslint-disable-next-line no-console
    console.error(usage());
    process.exit(2);
  }

  try {
    await runFetch(command);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  loadDotenv();
  void executeFetchCli();
}
