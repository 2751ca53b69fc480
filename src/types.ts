import { z } from "zod";

export const SegmentSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string(),
  translated: z.string().optional(),
});

/** A timed span of recognized text, in seconds. */
export type Segment = z.infer<typeof SegmentSchema>;

export const SongMetadataSchema = z.object({
  song_id: z.string(),
  title: z.string(),
  duration_seconds: z.number(),
  detected_language: z.string(),
  source_url: z.string(),
  created_at: z.number(), // epoch seconds
});

export type SongMetadata = z.infer<typeof SongMetadataSchema>;

export const LibrarySchema = z.array(SongMetadataSchema);

export interface SongRecord {
  metadata: SongMetadata;
  lyrics: Segment[];
}

export interface ProcessOptions {
  translate?: boolean;
  language?: string; // forced source language, e.g. "hi"
}

export type JobStatus = "queued" | "processing" | "completed" | "error";

export interface JobRecord {
  jobId: string;
  sourceUrl: string;
  status: JobStatus;
  step: string;
  result?: SongMetadata;
  errorDetail?: string;
  createdAt: number;
  updatedAt: number;
}

export interface UnknownJob {
  jobId: string;
  status: "unknown";
  step: "unknown";
}

export type JobSnapshot = JobRecord | UnknownJob;

export type SubmitOutcome =
  | { alreadyProcessed: true; songId: string; metadata: SongMetadata }
  | { alreadyProcessed: false; songId: string };

/** Receives human-readable step descriptions while a stage runs. */
export type ProgressSink = (step: string) => void;
