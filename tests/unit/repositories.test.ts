import path from "path";
import { createResultRepository } from "../../src/composition/repositories";
import { FileResultRepository } from "../../src/infrastructure/store/FileResultRepository";
import { MongoResultRepository } from "../../src/infrastructure/mongo/MongoResultRepository";
import { loadEnv } from "../../src/shared/config/env";

describe("createResultRepository", () => {
  it("stores each source in its own JSON file by default", () => {
    const repo = createResultRepository(loadEnv({ STORE_DIR: "/tmp/results" }), "numbeo-indices", 50);

    expect(repo).toBeInstanceOf(FileResultRepository);
    expect(repo).toMatchObject({ filePath: path.join("/tmp/results", "numbeo-indices.json"), minRows: 50 });
  });

  it("uses a CSV file for the csv backend", () => {
    const repo = createResultRepository(loadEnv({ STORE_BACKEND: "csv", STORE_DIR: "/tmp/results" }), "unsplash", 1);

    expect(repo).toMatchObject({ filePath: path.join("/tmp/results", "unsplash.csv") });
  });

  it("uses one collection per source for the mongo backend", () => {
    const repo = createResultRepository(loadEnv({ STORE_BACKEND: "mongo" }), "travel-warnings", 1);

    expect(repo).toBeInstanceOf(MongoResultRepository);
    expect(repo).toMatchObject({ dbName: "travel_data", collectionName: "travel_warnings" });
  });
});
