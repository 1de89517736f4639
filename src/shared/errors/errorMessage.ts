/**
 * Message of a thrown value. Checks the shape instead of `instanceof Error`,
 * which fails for errors created in another realm (Node internals under Jest).
 */
export const errorMessage = (err: unknown): string =>
  typeof err === "object" && err !== null && "message" in err && typeof err.message === "string"
    ? err.message
    : String(err);
