import type { CanonicalProfile, RawDocument, SourceName } from "../lib/types";
import type { ProfileRepository, SourceReader } from "./types";

export class MemorySourceReader implements SourceReader {
  private readonly documents: Partial<Record<SourceName, RawDocument[]>>;

  constructor(documents: Partial<Record<SourceName, RawDocument[]>>) {
    this.documents = documents;
  }

  async *read(source: SourceName): AsyncIterable<RawDocument> {
    for (const doc of this.documents[source] ?? []) {
      yield doc;
    }
  }
}

export class MemoryRepository implements ProfileRepository {
  private readonly profiles = new Map<string, CanonicalProfile>();

  constructor(profiles: CanonicalProfile[] = []) {
    for (const profile of profiles) {
      this.profiles.set(profile.profileId, structuredClone(profile));
    }
  }

  async listProfiles(): Promise<CanonicalProfile[]> {
    return Array.from(this.profiles.values())
      .sort((a, b) => (a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0))
      .map((profile) => structuredClone(profile));
  }

  async upsertProfiles(profiles: CanonicalProfile[]): Promise<number> {
    for (const profile of profiles) {
      this.profiles.set(profile.profileId, structuredClone(profile));
    }
    return profiles.length;
  }

  get size() {
    return this.profiles.size;
  }

  snapshot() {
    return JSON.stringify(
      Array.from(this.profiles.values()).sort((a, b) =>
        a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0,
      ),
    );
  }
}
