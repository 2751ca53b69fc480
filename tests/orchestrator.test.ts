import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JobOrchestrator } from "../src/async/orchestrator.js";
import { modelFallbackChain } from "../src/constants.js";
import { InvalidSourceError } from "../src/errors.js";
import { AudioAcquirer } from "../src/pipeline/download.js";
import { ModelManager } from "../src/pipeline/models.js";
import type { RecognitionOptions, RecognitionResult } from "../src/pipeline/models.js";
import { WhisperTranscriber } from "../src/pipeline/transcribe.js";
import { TranslationAligner } from "../src/pipeline/translate.js";
import { LibraryIndex } from "../src/store/library.js";
import { SongStore } from "../src/store/songStore.js";
import { FakeDownloader, FakeSpeechEngine, makeTempDir, removeDir, silentLogger } from "./helpers.js";

const URL = "https://www.youtube.com/watch?v=abc123XYZ";

function spanishSong(_file: string, opts: RecognitionOptions): RecognitionResult {
  if (opts.task === "translate") {
    return {
      language: "es",
      segments: [
        { start: 0.3, end: 2, text: "Hello" },
        { start: 3.9, end: 6, text: "Goodbye" },
      ],
    };
  }
  return {
    language: "es",
    segments: [
      { start: 0, end: 2, text: " Hola " },
      { start: 4, end: 6, text: "Adiós" },
    ],
  };
}

describe("JobOrchestrator", () => {
  let root: string;
  let songs: SongStore;
  let library: LibraryIndex;
  let downloader: FakeDownloader;
  let engine: FakeSpeechEngine;

  function orchestrator(): JobOrchestrator {
    const models = new ModelManager(engine, modelFallbackChain("large-v3"), silentLogger);
    return new JobOrchestrator({
      audio: new AudioAcquirer(downloader, songs, silentLogger),
      transcriber: new WhisperTranscriber(models, silentLogger),
      translator: new TranslationAligner(models, silentLogger),
      songs,
      library,
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    root = makeTempDir();
    songs = new SongStore(path.join(root, "songs"));
    library = new LibraryIndex(path.join(root, "library.json"));
    downloader = new FakeDownloader({ info: { title: "Canción", duration: 200 } });
    engine = new FakeSpeechEngine(spanishSong);
  });

  afterEach(() => removeDir(root));

  it("rejects unparsable URLs before creating a job", async () => {
    const jobs = orchestrator();
    await expect(jobs.submit("https://example.com/video")).rejects.toBeInstanceOf(InvalidSourceError);
    await expect(jobs.submit("   ")).rejects.toBeInstanceOf(InvalidSourceError);
    expect(downloader.infoLookups).toBe(0);
  });

  it("runs the pipeline in the background and completes the job", async () => {
    const jobs = orchestrator();

    const outcome = await jobs.submit(URL, { translate: true });
    expect(outcome.alreadyProcessed).toBe(false);
    expect(jobs.status(outcome.songId).status).toBe("processing");

    const job = await jobs.waitFor(outcome.songId);
    expect(job.status).toBe("completed");
    expect(job.step).toBe("Completed");
    if (job.status !== "completed") return;

    expect(job.result).toMatchObject({
      song_id: outcome.songId,
      title: "Canción",
      duration_seconds: 200,
      detected_language: "es",
      source_url: URL,
    });

    const stored = songs.readSong(outcome.songId);
    expect(stored.lyrics).toEqual([
      { start: 0, end: 2, text: "Hola", translated: "Hello" },
      { start: 4, end: 6, text: "Adiós", translated: "Goodbye" },
    ]);
    expect(await library.list()).toEqual([job.result]);
  });

  it("skips translation unless requested", async () => {
    const jobs = orchestrator();
    const { songId } = await jobs.submit(URL);
    await jobs.waitFor(songId);

    expect(songs.readSong(songId).lyrics).toEqual([
      { start: 0, end: 2, text: "Hola" },
      { start: 4, end: 6, text: "Adiós" },
    ]);
    expect(engine.calls.map((c) => c.opts.task)).toEqual(["transcribe"]);
  });

  it("returns the catalogued song for a URL processed before", async () => {
    const jobs = orchestrator();
    const first = await jobs.submit(URL);
    await jobs.waitFor(first.songId);

    const second = await jobs.submit(`  ${URL} `);

    expect(second).toMatchObject({ alreadyProcessed: true, songId: first.songId });
    expect(await library.list()).toHaveLength(1);
    expect(fs.readdirSync(path.join(root, "songs"))).toEqual([first.songId]);
    expect(downloader.downloads).toBe(1);
  });

  it("shares one job between concurrent submissions of the same URL", async () => {
    const jobs = orchestrator();

    const [a, b] = await Promise.all([jobs.submit(URL), jobs.submit(URL)]);
    await jobs.drain();

    expect(b.songId).toBe(a.songId);
    expect(downloader.downloads).toBe(1);
    expect(await library.list()).toHaveLength(1);
  });

  it("marks the job failed when acquisition raises and keeps it out of the library", async () => {
    downloader = new FakeDownloader({ failDownload: "Video unavailable" });
    const jobs = orchestrator();

    const { songId } = await jobs.submit(URL);
    const job = await jobs.waitFor(songId);

    expect(job).toMatchObject({
      status: "error",
      step: "Failed",
      errorDetail: "Audio download failed: Video unavailable",
    });
    expect(await library.list()).toEqual([]);
    expect(fs.existsSync(path.join(root, "songs", songId))).toBe(false);
  });

  it("marks the job failed when every model tier fails", async () => {
    engine = new FakeSpeechEngine(spanishSong, {
      "large-v3": "x",
      medium: "x",
      base: "x",
      tiny: "x",
    });
    const jobs = orchestrator();

    const { songId } = await jobs.submit(URL);
    const job = await jobs.waitFor(songId);

    expect(job.status).toBe("error");
    if (job.status !== "error") return;
    expect(job.errorDetail).toContain("All model tiers failed to load");
    expect(await library.list()).toEqual([]);
  });

  it("lets the URL be submitted again after a failed job", async () => {
    downloader = new FakeDownloader({ failDownload: "timeout" });
    const jobs = orchestrator();
    const first = await jobs.submit(URL);
    await jobs.waitFor(first.songId);

    const second = await jobs.submit(URL);
    expect(second.alreadyProcessed).toBe(false);
    expect(second.songId).not.toBe(first.songId);
    await jobs.drain();
  });

  it("forgets settled jobs while keeping their status", async () => {
    const jobs = orchestrator();
    const { songId } = await jobs.submit(URL);
    expect(jobs.activeJobs).toBe(1);

    await jobs.waitFor(songId);

    expect(jobs.activeJobs).toBe(0);
    const again = await jobs.waitFor(songId);
    expect(again.status).toBe("completed");
  });

  it("reports unknown ids without throwing", () => {
    expect(orchestrator().status("nope")).toEqual({ jobId: "nope", status: "unknown", step: "unknown" });
  });
});
