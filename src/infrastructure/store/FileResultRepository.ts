import type { ResultRepository } from "../../ports/ResultRepository";
import type { ResultStore } from "../../core/results/resultStore";
import { emptyStore } from "../../core/results/resultStore";
import { assertPersistAllowed, StoreUnreadableError } from "../../core/results/storeGuard";
import { readFileIfExists, writeFileAtomic } from "./atomicWrite";

export type StoreCodec = {
  encode(store: ResultStore): string;
  /** Throws when the text is not a valid store. */
  decode(text: string): ResultStore;
};

/**
 * Single-file result store. Every persist rewrites the whole file through a
 * temp file and a rename.
 */
export class FileResultRepository implements ResultRepository {
  private storedRows?: number;

  constructor(
    private readonly filePath: string,
    private readonly codec: StoreCodec,
    private readonly minRows = 1
  ) {}

  async load(): Promise<ResultStore> {
    const text = await readFileIfExists(this.filePath);
    if (text == null) {
      this.storedRows = 0;
      return emptyStore();
    }

    let store: ResultStore;
    try {
      store = this.codec.decode(text);
    } catch (err) {
      throw new StoreUnreadableError(this.filePath, err);
    }
    this.storedRows = store.size;
    return store;
  }

  async persist(store: ResultStore): Promise<void> {
    const storedRows = this.storedRows ?? (await this.load()).size;
    assertPersistAllowed({
      nextRows: store.size,
      storedRows,
      minRows: this.minRows,
      target: this.filePath
    });

    await writeFileAtomic(this.filePath, this.codec.encode(store));
    this.storedRows = store.size;
  }
}
