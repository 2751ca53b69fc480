import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pino } from "pino";
import type { WhisperModel } from "../src/constants.js";
import type {
  AudioDownloader,
  DownloadProgress,
  VideoInfo,
} from "../src/pipeline/download.js";
import type {
  RecognitionOptions,
  RecognitionResult,
  SpeechEngine,
  SpeechModel,
} from "../src/pipeline/models.js";

export const silentLogger = pino({ level: "silent" });

export function makeTempDir(prefix = "songs-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type Recognizer = (filePath: string, opts: RecognitionOptions) => RecognitionResult | Promise<RecognitionResult>;

/** Speech engine stand-in: load failures per tier, scripted recognition. */
export class FakeSpeechEngine implements SpeechEngine {
  readonly loads: WhisperModel[] = [];
  readonly calls: Array<{ model: WhisperModel; opts: RecognitionOptions }> = [];
  released: WhisperModel[] = [];
  cacheClears = 0;

  constructor(
    private readonly recognizer: Recognizer,
    private readonly loadFailures: Partial<Record<WhisperModel, string>> = {}
  ) {}

  async load(model: WhisperModel): Promise<SpeechModel> {
    this.loads.push(model);
    const failure = this.loadFailures[model];
    if (failure) throw new Error(failure);
    return {
      name: model,
      recognize: async (filePath, opts) => {
        this.calls.push({ model, opts });
        return this.recognizer(filePath, opts);
      },
      release: async () => {
        this.released.push(model);
      },
    };
  }

  async clearCache(): Promise<boolean> {
    this.cacheClears += 1;
    return true;
  }
}

/** Downloader stand-in that writes a fixed payload under a title-based name. */
export class FakeDownloader implements AudioDownloader {
  downloads = 0;
  infoLookups = 0;

  constructor(
    private readonly options: {
      info?: VideoInfo;
      payload?: Buffer;
      fileName?: string;
      failInfo?: string;
      failDownload?: string;
      progress?: DownloadProgress[];
    } = {}
  ) {}

  async fetchInfo(): Promise<VideoInfo> {
    this.infoLookups += 1;
    if (this.options.failInfo) throw new Error(this.options.failInfo);
    return this.options.info ?? { title: "Test Song", duration: 180 };
  }

  async download(
    _sourceUrl: string,
    outDir: string,
    onProgress: (progress: DownloadProgress) => void
  ): Promise<void> {
    this.downloads += 1;
    if (this.options.failDownload) throw new Error(this.options.failDownload);
    for (const p of this.options.progress ?? []) onProgress(p);
    fs.writeFileSync(
      path.join(outDir, this.options.fileName ?? "Test Song.mp3"),
      this.options.payload ?? Buffer.from("fake-mp3-bytes")
    );
  }
}
