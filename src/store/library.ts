import fs from "node:fs";
import pLimit from "p-limit";
import { LibrarySchema, type SongMetadata } from "../types.js";
import { writeJsonAtomic } from "./songStore.js";

/**
 * The song catalog: one JSON array of metadata records. Appends are queued
 * so concurrent jobs never overwrite each other's entries.
 */
export class LibraryIndex {
  private readonly writes = pLimit(1);

  constructor(readonly filePath: string) {}

  async list(): Promise<SongMetadata[]> {
    return this.read();
  }

  async findByUrl(sourceUrl: string): Promise<SongMetadata | null> {
    return this.read().find((song) => song.source_url === sourceUrl) ?? null;
  }

  append(metadata: SongMetadata): Promise<void> {
    return this.writes(() => {
      const library = this.read();
      library.push(metadata);
      writeJsonAtomic(this.filePath, library);
    });
  }

  private read(): SongMetadata[] {
    if (!fs.existsSync(this.filePath)) return [];
    return LibrarySchema.parse(JSON.parse(fs.readFileSync(this.filePath, "utf-8")));
  }
}
