import { MongoClient } from "mongodb";

export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { serverSelectionTimeoutMS: 10000 });
  await client.connect();
  return client;
};
