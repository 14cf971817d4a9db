import { getDatabase, type Document } from "@speaker-index/db";
import { getSourceConfig, type SourceConfig } from "../config/sources";
import type { CanonicalProfile, RawDocument, SourceName } from "../lib/types";
import type { ProfileRepository, SourceReader } from "./types";

type StoredProfile = CanonicalProfile & { _id: string };

const READ_BATCH_SIZE = 500;
const WRITE_BATCH_SIZE = 500;

export class MongoSourceReader implements SourceReader {
  async *read(source: SourceName): AsyncIterable<RawDocument> {
    const config = getSourceConfig(source);
    const db = await getDatabase(config.database);

    for (const collection of config.collections) {
      const cursor = db.collection(collection).find({}).sort({ _id: 1 });
      let batch: Document[] = [];
      for await (const doc of cursor) {
        batch.push(doc);
        if (batch.length >= READ_BATCH_SIZE) {
          yield* await this.prepare(config, collection, batch);
          batch = [];
        }
      }
      if (batch.length) {
        yield* await this.prepare(config, collection, batch);
      }
    }
  }

  private async prepare(config: SourceConfig, collection: string, docs: Document[]) {
    const details = config.details ? await this.loadDetails(config, docs) : null;
    return docs.map((doc): RawDocument => {
      const prepared: RawDocument = { ...doc };
      if (config.collectionTag) {
        prepared[config.collectionTag] = collection;
      }
      if (config.details && details) {
        const key = doc[config.details.localField];
        const detail = key === undefined ? undefined : details.get(String(key));
        if (detail) {
          prepared.details = detail;
        }
      }
      return prepared;
    });
  }

  private async loadDetails(config: SourceConfig, docs: Document[]) {
    const join = config.details;
    const byKey = new Map<string, Document>();
    if (!join) {
      return byKey;
    }
    const keys = docs
      .map((doc) => doc[join.localField])
      .filter((key) => key !== undefined && key !== null);
    if (!keys.length) {
      return byKey;
    }
    const db = await getDatabase(config.database);
    const rows = await db
      .collection(join.collection)
      .find({ [join.foreignField]: { $in: keys } })
      .toArray();
    for (const row of rows) {
      const key = row[join.foreignField];
      if (key !== undefined && key !== null && !byKey.has(String(key))) {
        byKey.set(String(key), row);
      }
    }
    return byKey;
  }
}

export class MongoRepository implements ProfileRepository {
  private readonly database: string;
  private readonly collection: string;

  constructor(options: { database: string; collection: string }) {
    this.database = options.database;
    this.collection = options.collection;
  }

  private async getCollection() {
    const db = await getDatabase(this.database);
    return db.collection<StoredProfile>(this.collection);
  }

  async listProfiles(): Promise<CanonicalProfile[]> {
    const collection = await this.getCollection();
    const records = await collection.find({}).sort({ _id: 1 }).toArray();
    return records.map(({ _id, ...profile }) => profile);
  }

  async upsertProfiles(profiles: CanonicalProfile[]): Promise<number> {
    const collection = await this.getCollection();
    let written = 0;
    for (let index = 0; index < profiles.length; index += WRITE_BATCH_SIZE) {
      const chunk = profiles.slice(index, index + WRITE_BATCH_SIZE);
      const result = await collection.bulkWrite(
        chunk.map((profile) => ({
          replaceOne: {
            filter: { _id: profile.profileId },
            replacement: profile,
            upsert: true,
          },
        })),
        { ordered: true },
      );
      written += result.upsertedCount + result.matchedCount;
    }
    return written;
  }
}
