import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import {
  DEFAULT_WHISPER_MODEL,
  isValidModel,
  modelFallbackChain,
  type WhisperModel,
} from "./constants.js";

export interface ServiceConfig {
  port: number;
  host: string;
  songsDir: string;
  libraryPath: string;
  ffmpegCmd: string;
  ytdlpCmd: string;
  // Local ASR service configuration
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localAsrModel: WhisperModel; // target tier
  modelTiers: WhisperModel[]; // target first, then the fallbacks
  localTimeoutMs: number; // timeout for local transcription requests
  progressIntervalMs: number;
  logLevel: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const songsDir = path.resolve(env.SONGS_DIR || path.join(rootDir, "songs"));
  const libraryPath = path.resolve(
    env.LIBRARY_PATH || path.join(rootDir, "library.json")
  );
  const ffmpegCmd = env.FFMPEG_CMD || "ffmpeg";
  const ytdlpCmd = env.YTDLP_CMD || "yt-dlp";
  const port = parseInt(env.PORT || "5688", 10);
  const host = env.HOST || "0.0.0.0";

  // Local ASR service configuration
  const localAsrBaseUrl = env.LOCAL_ASR_BASE_URL || "http://localhost:5689";
  const requestedModel = env.LOCAL_ASR_MODEL || DEFAULT_WHISPER_MODEL;
  const localAsrModel = isValidModel(requestedModel)
    ? requestedModel
    : DEFAULT_WHISPER_MODEL;
  const localTimeoutMs = Math.max(
    60000,
    parseInt(env.LOCAL_TIMEOUT_MS || "7200000", 10) || 7200000
  ); // Default 2 hours for full file processing
  const progressIntervalMs =
    parseInt(env.PROGRESS_INTERVAL_MS || "5000", 10) || 5000;

  ensureDir(songsDir);
  ensureDir(path.dirname(libraryPath));

  return {
    port,
    host,
    songsDir,
    libraryPath,
    ffmpegCmd,
    ytdlpCmd,
    localAsrBaseUrl,
    localAsrModel,
    modelTiers: modelFallbackChain(localAsrModel),
    localTimeoutMs,
    progressIntervalMs,
    logLevel: env.LOG_LEVEL || "info",
  };
}
