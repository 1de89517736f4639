export type WorkItem = {
  key: string;
  params: Readonly<Record<string, string>>;
};

export const createWorkItem = (key: string, params: Record<string, string> = {}): WorkItem => {
  const normalized = key.trim();
  if (normalized === "") {
    throw new Error("WorkItem key must be a non-empty string");
  }
  return Object.freeze({ key: normalized, params: Object.freeze({ ...params }) });
};

/** `("JFK", "FRA")` becomes `JFK-FRA`. */
export const routeKey = (origin: string, destination: string): string => `${origin}-${destination}`;
