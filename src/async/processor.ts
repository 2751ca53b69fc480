import { TRANSLATION_TARGET } from "../constants.js";
import type { Logger } from "../logger.js";
import type { AcquiredAudio } from "../pipeline/download.js";
import type { TranscriptionOutcome } from "../pipeline/transcribe.js";
import type { LibraryIndex } from "../store/library.js";
import type { SongStore } from "../store/songStore.js";
import type {
  ProcessOptions,
  ProgressSink,
  Segment,
  SongMetadata,
} from "../types.js";

export interface AudioSource {
  acquire(sourceUrl: string, songId: string, progress: ProgressSink): Promise<AcquiredAudio>;
}

export interface Transcriber {
  transcribe(filePath: string, forcedLanguage: string | undefined, progress: ProgressSink): Promise<TranscriptionOutcome>;
}

export interface Translator {
  align(segments: Segment[], targetLanguage: string, filePath: string, progress: ProgressSink): Promise<Segment[]>;
}

export interface PipelineStages {
  audio: AudioSource;
  transcriber: Transcriber;
  translator: Translator;
  songs: SongStore;
  library: LibraryIndex;
  logger: Logger;
}

export interface PipelineJob {
  songId: string;
  sourceUrl: string;
  opts: ProcessOptions;
}

/**
 * Runs acquisition → transcription → translation → persistence for one song.
 * Stages run strictly in order; the first failure rejects.
 */
export async function processSong(
  stages: PipelineStages,
  job: PipelineJob,
  progress: ProgressSink
): Promise<SongMetadata> {
  const { songId, sourceUrl, opts } = job;
  const log = stages.logger.child({ songId });

  progress("Downloading audio...");
  const audio = await stages.audio.acquire(sourceUrl, songId, progress);
  log.info({ title: audio.title, duration: audio.duration }, "Acquisition finished");

  progress("Transcribing audio...");
  const { segments, language } = await stages.transcriber.transcribe(audio.filePath, opts.language, progress);
  log.info({ language, segments: segments.length }, "Transcription finished");

  let finalSegments = segments;
  if (opts.translate && language !== TRANSLATION_TARGET) {
    progress("Translating to English...");
    finalSegments = await stages.translator.align(segments, TRANSLATION_TARGET, audio.filePath, progress);
  }

  progress("Saving song data...");
  const metadata: SongMetadata = {
    song_id: songId,
    title: audio.title,
    duration_seconds: audio.duration,
    detected_language: language,
    source_url: sourceUrl,
    created_at: Date.now() / 1000,
  };
  stages.songs.saveSong(songId, finalSegments, metadata);
  await stages.library.append(metadata);
  return metadata;
}
