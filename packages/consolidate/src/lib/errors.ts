import type { SourceName } from "./types";

export class DocumentRejectedError extends Error {
  readonly source: SourceName;
  readonly documentId: string | null;

  constructor(source: SourceName, reason: string, documentId: string | null = null) {
    super(`[${source}] rejected${documentId ? ` ${documentId}` : ""}: ${reason}`);
    this.name = "DocumentRejectedError";
    this.source = source;
    this.documentId = documentId;
  }
}
