import path from "path";
import type { ResultRepository } from "../ports/ResultRepository";
import type { Env } from "../shared/config/env";
import { FileResultRepository } from "../infrastructure/store/FileResultRepository";
import { jsonStoreCodec } from "../infrastructure/store/jsonCodec";
import { csvStoreCodec } from "../infrastructure/store/csvCodec";
import { MongoResultRepository } from "../infrastructure/mongo/MongoResultRepository";

export const createResultRepository = (env: Env, sourceName: string, minRows: number): ResultRepository => {
  switch (env.STORE_BACKEND) {
    case "json":
      return new FileResultRepository(path.join(env.STORE_DIR, `${sourceName}.json`), jsonStoreCodec, minRows);
    case "csv":
      return new FileResultRepository(path.join(env.STORE_DIR, `${sourceName}.csv`), csvStoreCodec, minRows);
    case "mongo":
      return new MongoResultRepository(env.MONGO_URI, env.MONGO_DB, sourceName.replace(/-/g, "_"), minRows);
  }
};
