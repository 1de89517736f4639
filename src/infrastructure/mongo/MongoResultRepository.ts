import type { Db, MongoClient } from "mongodb";
import type { ResultRepository } from "../../ports/ResultRepository";
import { emptyStore, type ResultStore } from "../../core/results/resultStore";
import { fromRecords, toRecords, type ResultRecord } from "../../core/results/resultRecord";
import { assertPersistAllowed, StoreUnreadableError } from "../../core/results/storeGuard";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type ResultDoc = Omit<ResultRecord, "identifier"> & {
  _id: string;
  position: number;
};

export const toResultDocs = (store: ResultStore): ResultDoc[] =>
  toRecords(store).map(({ identifier, ...rest }, position) => ({ _id: identifier, position, ...rest }));

export const fromResultDocs = (docs: readonly ResultDoc[]): ResultStore =>
  fromRecords(
    [...docs]
      .sort((a, b) => a.position - b.position)
      .map(({ _id, position: _position, ...rest }) => ({ identifier: _id, ...rest }))
  );

/**
 * Result store kept as one collection per source. A persist builds the full
 * collection under a staging name and renames it over the live one with
 * `dropTarget`, which replaces the whole table in a single server-side step.
 */
export class MongoResultRepository implements ResultRepository {
  private client?: MongoClient;
  private db?: Db;
  private storedRows?: number;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName: string,
    private readonly collectionName: string,
    private readonly minRows = 1
  ) {}

  private async getDb(): Promise<Db> {
    if (this.db) return this.db;

    this.client = await createMongoClient(this.mongoUri);
    this.db = this.client.db(this.dbName);
    return this.db;
  }

  private get stagingName(): string {
    return `${this.collectionName}__staging`;
  }

  async load(): Promise<ResultStore> {
    const db = await this.getDb();
    const docs = await db.collection<ResultDoc>(this.collectionName).find({}).toArray();
    if (docs.length === 0) {
      this.storedRows = 0;
      return emptyStore();
    }

    let store: ResultStore;
    try {
      store = fromResultDocs(docs);
    } catch (err) {
      throw new StoreUnreadableError(`${this.dbName}.${this.collectionName}`, err);
    }
    this.storedRows = store.size;
    return store;
  }

  async persist(store: ResultStore): Promise<void> {
    const db = await this.getDb();
    const storedRows =
      this.storedRows ?? (await db.collection<ResultDoc>(this.collectionName).countDocuments());
    assertPersistAllowed({
      nextRows: store.size,
      storedRows,
      minRows: this.minRows,
      target: `${this.dbName}.${this.collectionName}`
    });

    const docs = toResultDocs(store);
    const staging = db.collection<ResultDoc>(this.stagingName);
    // Leftovers from a run killed mid-persist.
    await staging.deleteMany({});
    for (const idx of mongoIndexes.resultCollection) {
      await staging.createIndex(idx.keys, idx.options);
    }
    if (docs.length > 0) {
      await staging.insertMany(docs, { ordered: true });
    }
    await staging.rename(this.collectionName, { dropTarget: true });
    this.storedRows = store.size;
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.db = undefined;
  }
}
