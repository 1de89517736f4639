import type { ResultStore } from "../core/results/resultStore";

export interface ResultRepository {
  /** Empty store when nothing has been persisted yet. */
  load(): Promise<ResultStore>;
  /** Replaces the persisted store as a whole, atomically. */
  persist(store: ResultStore): Promise<void>;
  close?(): Promise<void>;
}
