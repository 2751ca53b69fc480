import path from "node:path";
import fs from "node:fs";
import {
  AUDIO_FILE_NAME,
  LYRICS_FILE_NAME,
  METADATA_FILE_NAME,
} from "../constants.js";
import { NotFoundError } from "../errors.js";
import {
  SegmentSchema,
  SongMetadataSchema,
  type Segment,
  type SongMetadata,
  type SongRecord,
} from "../types.js";

const SONG_ID_PATTERN = /^[A-Za-z0-9-]+$/;

/** Writes JSON beside its destination and renames it into place. */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2), "utf-8");
  fs.renameSync(tmpPath, filePath);
}

/**
 * Per-song assets on disk: `<songsDir>/<songId>/{audio.mp3,lyrics.json,metadata.json}`.
 */
export class SongStore {
  constructor(readonly songsDir: string) {}

  isValidId(songId: string): boolean {
    return SONG_ID_PATTERN.test(songId);
  }

  songDir(songId: string): string {
    if (!this.isValidId(songId)) {
      throw new NotFoundError(`Song not found: ${songId}`);
    }
    return path.join(this.songsDir, songId);
  }

  ensureSongDir(songId: string): string {
    const dir = this.songDir(songId);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  audioPath(songId: string): string {
    return path.join(this.songDir(songId), AUDIO_FILE_NAME);
  }

  hasAudio(songId: string): boolean {
    return this.isValidId(songId) && fs.existsSync(this.audioPath(songId));
  }

  saveSong(songId: string, segments: Segment[], metadata: SongMetadata): void {
    const dir = this.ensureSongDir(songId);
    writeJsonAtomic(path.join(dir, LYRICS_FILE_NAME), segments);
    writeJsonAtomic(path.join(dir, METADATA_FILE_NAME), metadata);
  }

  readSong(songId: string): SongRecord {
    const dir = this.songDir(songId);
    const metadataPath = path.join(dir, METADATA_FILE_NAME);
    const lyricsPath = path.join(dir, LYRICS_FILE_NAME);
    if (!fs.existsSync(metadataPath) || !fs.existsSync(lyricsPath)) {
      throw new NotFoundError(`Song not found: ${songId}`);
    }
    const metadata = SongMetadataSchema.parse(
      JSON.parse(fs.readFileSync(metadataPath, "utf-8"))
    );
    const lyrics = SegmentSchema.array().parse(
      JSON.parse(fs.readFileSync(lyricsPath, "utf-8"))
    );
    return { metadata, lyrics };
  }

  removeSong(songId: string): void {
    fs.rmSync(this.songDir(songId), { recursive: true, force: true });
  }
}
