import fs from "node:fs";
import type { Readable } from "node:stream";
import { MEDIA_CHUNK_BYTES } from "../constants.js";
import { NotFoundError, RangeNotSatisfiableError } from "../errors.js";
import type { SongStore } from "../store/songStore.js";

export interface ByteRange {
  start: number;
  end: number; // inclusive
}

export interface MediaResponse {
  statusCode: 200 | 206;
  headers: Record<string, string>;
  stream: Readable;
}

const RANGE_SPEC = /^(\d+)-(\d*)$/;

/**
 * Parses `bytes=<start>-<end>` against a file size. Only the first range of
 * a multi-range header is used; an omitted end means the last byte.
 */
export function parseRangeHeader(header: string, size: number): ByteRange {
  const trimmed = header.trim();
  if (!trimmed.startsWith("bytes=")) {
    throw new RangeNotSatisfiableError(`Unsupported range unit: ${header}`, size);
  }
  const first = trimmed.slice("bytes=".length).split(",")[0].trim();
  const match = RANGE_SPEC.exec(first);
  if (!match) {
    throw new RangeNotSatisfiableError(`Malformed range: ${header}`, size);
  }

  const start = Number(match[1]);
  const end = match[2] ? Number(match[2]) : size - 1;
  if (start >= size || end >= size || start > end) {
    throw new RangeNotSatisfiableError(`Range not satisfiable: ${header}`, size);
  }
  return { start, end };
}

export class RangeMediaServer {
  constructor(private readonly songs: SongStore) {}

  serve(songId: string, rangeHeader?: string): MediaResponse {
    if (!this.songs.hasAudio(songId)) {
      throw new NotFoundError("Audio file not found");
    }
    const audioPath = this.songs.audioPath(songId);
    const size = fs.statSync(audioPath).size;

    if (rangeHeader === undefined) {
      return {
        statusCode: 200,
        headers: {
          "Content-Type": "audio/mpeg",
          "Content-Length": String(size),
          "Accept-Ranges": "bytes",
        },
        stream: fs.createReadStream(audioPath, { highWaterMark: MEDIA_CHUNK_BYTES }),
      };
    }

    const { start, end } = parseRangeHeader(rangeHeader, size);
    return {
      statusCode: 206,
      headers: {
        "Content-Range": `bytes ${start}-${end}/${size}`,
        "Accept-Ranges": "bytes",
        "Content-Length": String(end - start + 1),
        "Content-Type": "audio/mpeg",
      },
      stream: fs.createReadStream(audioPath, { start, end, highWaterMark: MEDIA_CHUNK_BYTES }),
    };
  }
}
