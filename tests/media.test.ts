import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, RangeNotSatisfiableError } from "../src/errors.js";
import { RangeMediaServer, parseRangeHeader } from "../src/media/rangeServer.js";
import { SongStore } from "../src/store/songStore.js";
import { makeTempDir, removeDir } from "./helpers.js";

async function collect(stream: Readable): Promise<Buffer[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return chunks;
}

function patternBytes(size: number): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buf[i] = i % 251;
  return buf;
}

describe("parseRangeHeader", () => {
  it("parses an explicit start and end", () => {
    expect(parseRangeHeader("bytes=100-199", 1000)).toEqual({ start: 100, end: 199 });
  });

  it("defaults an open end to the last byte", () => {
    expect(parseRangeHeader("bytes=500-", 1000)).toEqual({ start: 500, end: 999 });
  });

  it("uses only the first range of a multi-range header", () => {
    expect(parseRangeHeader("bytes=0-1,5-6", 1000)).toEqual({ start: 0, end: 1 });
  });

  it.each([
    ["bytes=abc", "malformed"],
    ["items=0-10", "wrong unit"],
    ["bytes=-500", "suffix form"],
    ["bytes=5-2", "start after end"],
    ["bytes=1000-", "start past the end"],
    ["bytes=900-1000", "end past the end"],
  ])("rejects %s (%s)", (header) => {
    expect(() => parseRangeHeader(header, 1000)).toThrow(RangeNotSatisfiableError);
  });
});

describe("RangeMediaServer", () => {
  let songsDir: string;
  let songs: SongStore;
  let server: RangeMediaServer;
  let data: Buffer;

  beforeEach(() => {
    songsDir = makeTempDir();
    songs = new SongStore(songsDir);
    server = new RangeMediaServer(songs);
    data = patternBytes(1000);
    fs.mkdirSync(path.join(songsDir, "song-1"));
    fs.writeFileSync(path.join(songsDir, "song-1", "audio.mp3"), data);
  });

  afterEach(() => removeDir(songsDir));

  it("serves a byte range with partial-content headers", async () => {
    const res = server.serve("song-1", "bytes=100-199");
    expect(res.statusCode).toBe(206);
    expect(res.headers).toEqual({
      "Content-Range": "bytes 100-199/1000",
      "Accept-Ranges": "bytes",
      "Content-Length": "100",
      "Content-Type": "audio/mpeg",
    });
    const body = Buffer.concat(await collect(res.stream));
    expect(body.length).toBe(100);
    expect(body.equals(data.subarray(100, 200))).toBe(true);
  });

  it("serves the whole file without a range header", async () => {
    const res = server.serve("song-1");
    expect(res.statusCode).toBe(200);
    expect(res.headers["Content-Length"]).toBe("1000");
    expect(res.headers["Accept-Ranges"]).toBe("bytes");
    const body = Buffer.concat(await collect(res.stream));
    expect(body.equals(data)).toBe(true);
  });

  it("reads large spans in 8 KiB chunks", async () => {
    const big = patternBytes(20000);
    fs.writeFileSync(path.join(songsDir, "song-1", "audio.mp3"), big);

    const res = server.serve("song-1", "bytes=0-19999");
    const chunks = await collect(res.stream);
    expect(chunks.map((c) => c.length)).toEqual([8192, 8192, 3616]);
    expect(Buffer.concat(chunks).equals(big)).toBe(true);
  });

  it("rejects malformed ranges instead of serving the whole file", () => {
    expect(() => server.serve("song-1", "bytes=oops")).toThrow(RangeNotSatisfiableError);
  });

  it("throws NotFound for unknown or unsafe song ids", () => {
    expect(() => server.serve("missing")).toThrow(NotFoundError);
    expect(() => server.serve("../song-1")).toThrow(NotFoundError);
  });
});
