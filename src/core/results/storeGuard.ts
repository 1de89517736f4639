import { errorMessage } from "../../shared/errors/errorMessage";

export class StoreShrinkRefusedError extends Error {
  readonly nextRows: number;
  readonly storedRows: number;
  readonly minRows: number;

  constructor(args: { nextRows: number; storedRows: number; minRows: number; target: string }) {
    super(
      `Refusing to overwrite ${args.target}: only ${args.nextRows} rows ` +
        `(stored=${args.storedRows}, minRows=${args.minRows})`
    );
    this.name = "StoreShrinkRefusedError";
    this.nextRows = args.nextRows;
    this.storedRows = args.storedRows;
    this.minRows = args.minRows;
  }
}

export class StoreUnreadableError extends Error {
  readonly cause?: unknown;

  constructor(target: string, cause: unknown) {
    super(`Result store ${target} exists but cannot be read: ${errorMessage(cause)}`);
    this.name = "StoreUnreadableError";
    this.cause = cause;
  }
}

/**
 * A write may not leave fewer than `minRows` rows behind when the store on
 * disk currently holds more than it would.
 */
export const assertPersistAllowed = (args: {
  nextRows: number;
  storedRows: number;
  minRows: number;
  target: string;
}): void => {
  if (args.nextRows < args.minRows && args.nextRows < args.storedRows) {
    throw new StoreShrinkRefusedError(args);
  }
};
