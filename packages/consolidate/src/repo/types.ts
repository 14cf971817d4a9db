import type { CanonicalProfile, RawDocument, SourceName } from "../lib/types";

export interface SourceReader {
  // Documents in a stable order; finite per source.
  read(source: SourceName): AsyncIterable<RawDocument>;
}

export interface ProfileRepository {
  listProfiles(): Promise<CanonicalProfile[]>;
  upsertProfiles(profiles: CanonicalProfile[]): Promise<number>;
}
