import path from "node:path";
import fs from "node:fs";
import readline from "node:readline";
import { execa } from "execa";
import { z } from "zod";
import type { ServiceConfig } from "../config.js";
import { AUDIO_FILE_NAME } from "../constants.js";
import { AcquisitionError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { SongStore } from "../store/songStore.js";
import type { ProgressSink } from "../types.js";
import { runCommand } from "../utils/process.js";

export interface VideoInfo {
  title: string;
  duration: number; // seconds
}

export type DownloadProgress =
  | { kind: "downloading"; downloadedBytes: number; totalBytes?: number; etaSeconds?: number }
  | { kind: "converting" };

/** The external engine that resolves a URL and writes its audio to disk. */
export interface AudioDownloader {
  fetchInfo(sourceUrl: string): Promise<VideoInfo>;
  download(
    sourceUrl: string,
    outDir: string,
    onProgress: (progress: DownloadProgress) => void
  ): Promise<void>;
}

export interface AcquiredAudio {
  filePath: string;
  title: string;
  duration: number;
}

const InfoSchema = z.object({
  title: z.string().optional(),
  duration: z.number().nullish(),
});

const PROGRESS_PREFIX = "progress:";
const PROGRESS_TEMPLATE =
  `download:${PROGRESS_PREFIX}%(progress.downloaded_bytes)s:%(progress.total_bytes)s:%(progress.total_bytes_estimate)s:%(progress.eta)s`;

function numberOrUndefined(raw: string | undefined): number | undefined {
  if (!raw || raw === "NA" || raw === "None") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/** Parses one stdout line of yt-dlp run with our progress template. */
export function parseProgressLine(line: string): DownloadProgress | null {
  const trimmed = line.trim();
  if (trimmed.startsWith("[ExtractAudio]")) return { kind: "converting" };
  if (!trimmed.startsWith(PROGRESS_PREFIX)) return null;

  const [downloaded, total, estimate, eta] = trimmed.slice(PROGRESS_PREFIX.length).split(":");
  const downloadedBytes = numberOrUndefined(downloaded);
  if (downloadedBytes === undefined) return null;
  return {
    kind: "downloading",
    downloadedBytes,
    totalBytes: numberOrUndefined(total) ?? numberOrUndefined(estimate),
    etaSeconds: numberOrUndefined(eta),
  };
}

function fmtEta(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const m = Math.floor(total / 60);
  const s = total % 60;
  return `${m}:${s.toString().padStart(2, "0")}`;
}

function fmtMiB(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatDownloadProgress(progress: DownloadProgress): string {
  if (progress.kind === "converting") return "Converting audio...";
  const { downloadedBytes, totalBytes, etaSeconds } = progress;
  const eta = etaSeconds !== undefined ? ` (ETA ${fmtEta(etaSeconds)})` : "";
  if (totalBytes && totalBytes > 0) {
    const pct = Math.min(100, (downloadedBytes / totalBytes) * 100);
    return `Downloading audio... ${pct.toFixed(1)}%${eta}`;
  }
  return `Downloading audio... ${fmtMiB(downloadedBytes)}${eta}`;
}

export class YtDlpDownloader implements AudioDownloader {
  constructor(private readonly cfg: Pick<ServiceConfig, "ytdlpCmd" | "ffmpegCmd">) {}

  async fetchInfo(sourceUrl: string): Promise<VideoInfo> {
    const { stdout } = await runCommand(this.cfg.ytdlpCmd, [
      "--dump-single-json",
      "--skip-download",
      "--no-warnings",
      sourceUrl,
    ]);
    const info = InfoSchema.parse(JSON.parse(stdout));
    return {
      title: info.title ?? "Unknown",
      duration: info.duration ?? 0,
    };
  }

  async download(
    sourceUrl: string,
    outDir: string,
    onProgress: (progress: DownloadProgress) => void
  ): Promise<void> {
    const subprocess = execa(this.cfg.ytdlpCmd, [
      "--format", "bestaudio/best",
      "--extract-audio",
      "--audio-format", "mp3",
      "--audio-quality", "192K",
      "--ffmpeg-location", this.cfg.ffmpegCmd,
      "--output", path.join(outDir, "%(title)s.%(ext)s"),
      "--newline",
      "--progress-template", PROGRESS_TEMPLATE,
      sourceUrl,
    ]);

    const lines = subprocess.stdout
      ? readline.createInterface({ input: subprocess.stdout })
      : null;
    lines?.on("line", (line) => {
      const progress = parseProgressLine(line);
      if (progress) onProgress(progress);
    });

    try {
      await subprocess;
    } finally {
      // No progress may reach the job once the download has settled
      lines?.close();
    }
  }
}

/**
 * Acquisition stage: yields exactly one `audio.mp3` in the song directory,
 * reusing a previous download when one is already there.
 */
export class AudioAcquirer {
  constructor(
    private readonly downloader: AudioDownloader,
    private readonly songs: SongStore,
    private readonly logger: Logger
  ) {}

  async acquire(sourceUrl: string, songId: string, progress: ProgressSink): Promise<AcquiredAudio> {
    const songDir = this.songs.ensureSongDir(songId);
    const audioPath = path.join(songDir, AUDIO_FILE_NAME);

    if (fs.existsSync(audioPath)) {
      progress("Using previously downloaded audio...");
      const info = await this.downloader.fetchInfo(sourceUrl).catch((err: unknown) => {
        this.logger.warn({ err, songId }, "Metadata refetch failed for existing audio");
        return { title: "Unknown", duration: 0 };
      });
      return { filePath: audioPath, ...info };
    }

    try {
      progress("Fetching video info...");
      const info = await this.downloader.fetchInfo(sourceUrl);

      progress("Downloading audio...");
      await this.downloader.download(sourceUrl, songDir, (p) => progress(formatDownloadProgress(p)));

      this.relocateAudio(songDir, audioPath);
      this.logger.info({ songId, title: info.title }, "Audio acquired");
      return { filePath: audioPath, ...info };
    } catch (err) {
      if (err instanceof AcquisitionError) throw err;
      throw new AcquisitionError(`Audio download failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  // The engine names the file after the video title; move it to the canonical
  // name, unless the title already produced it
  private relocateAudio(songDir: string, audioPath: string): void {
    const produced = fs
      .readdirSync(songDir)
      .filter((f) => f.toLowerCase().endsWith(".mp3"))
      .sort();
    if (produced.length === 0) {
      throw new AcquisitionError("Downloader did not produce an audio file");
    }
    const keep = produced.includes(AUDIO_FILE_NAME) ? AUDIO_FILE_NAME : produced[0];
    if (keep !== AUDIO_FILE_NAME) {
      fs.renameSync(path.join(songDir, keep), audioPath);
    }
    for (const extra of produced) {
      if (extra !== keep && extra !== AUDIO_FILE_NAME) {
        fs.rmSync(path.join(songDir, extra), { force: true });
      }
    }
  }
}
