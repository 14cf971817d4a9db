import { MongoClient } from "mongodb";

export type { Collection, Db, Document } from "mongodb";

let client: MongoClient | null = null;

export const getMongoClient = async (uri = process.env.MONGO_URI) => {
  if (client) {
    return client;
  }
  if (!uri) {
    throw new Error("Missing required env var: MONGO_URI");
  }
  const created = new MongoClient(uri);
  await created.connect();
  client = created;
  return created;
};

export const getDatabase = async (name: string) => {
  const connected = await getMongoClient();
  return connected.db(name);
};

export const closeMongoClient = async () => {
  if (!client) {
    return;
  }
  const current = client;
  client = null;
  await current.close();
};
