import { existsSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { readJsonFile } from "../lib/json";
import type { RawDocument, SourceName } from "../lib/types";
import type { SourceReader } from "./types";

const documentsSchema = z.array(z.record(z.unknown()));

// Reads `<directory>/<source>.json`, each a JSON array of raw documents.
export class FileSourceReader implements SourceReader {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  async *read(source: SourceName): AsyncIterable<RawDocument> {
    const filePath = resolve(this.directory, `${source}.json`);
    if (!existsSync(filePath)) {
      console.warn(`[consolidate][${source}] no input file at ${filePath}`);
      return;
    }
    for (const doc of readJsonFile(filePath, documentsSchema)) {
      yield doc;
    }
  }
}
