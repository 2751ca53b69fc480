import crypto from "node:crypto";
import { InvalidSourceError, errorMessage } from "../errors.js";
import { JobStore } from "../store/jobStore.js";
import type {
  JobSnapshot,
  ProcessOptions,
  SubmitOutcome,
} from "../types.js";
import { extractVideoId } from "../utils/youtube.js";
import { processSong, type PipelineStages } from "./processor.js";

function newJobId(): string {
  return crypto.randomUUID();
}

/**
 * Accepts processing requests and runs each as a background job. The job id
 * doubles as the song id of the stored result.
 */
export class JobOrchestrator {
  private readonly jobs = new JobStore();
  private readonly running = new Map<string, Promise<void>>();
  // Source URLs with a job still running, so concurrent submits share one job
  private readonly inFlight = new Map<string, string>();

  constructor(private readonly stages: PipelineStages) {}

  async submit(sourceUrl: string, opts: ProcessOptions = {}): Promise<SubmitOutcome> {
    const url = sourceUrl.trim();
    if (!url) {
      throw new InvalidSourceError("No URL provided");
    }
    if (!extractVideoId(url)) {
      throw new InvalidSourceError("Invalid YouTube URL");
    }

    const existing = await this.stages.library.findByUrl(url);
    if (existing) {
      return { alreadyProcessed: true, songId: existing.song_id, metadata: existing };
    }
    const runningId = this.inFlight.get(url);
    if (runningId) {
      return { alreadyProcessed: false, songId: runningId };
    }

    const jobId = newJobId();
    const now = Date.now();
    this.jobs.insert({
      jobId,
      sourceUrl: url,
      status: "queued",
      step: "Queued",
      createdAt: now,
      updatedAt: now,
    });
    this.inFlight.set(url, jobId);
    this.jobs.update(jobId, { status: "processing", step: "Starting..." });

    this.running.set(jobId, this.run(jobId, url, opts));
    return { alreadyProcessed: false, songId: jobId };
  }

  /** Jobs whose pipeline has not settled yet. */
  get activeJobs(): number {
    return this.running.size;
  }

  status(jobId: string): JobSnapshot {
    return this.jobs.snapshot(jobId);
  }

  /** Resolves once the job has reached a terminal state, or at once if it already has. */
  async waitFor(jobId: string): Promise<JobSnapshot> {
    await this.running.get(jobId);
    return this.status(jobId);
  }

  async drain(): Promise<void> {
    await Promise.all(this.running.values());
  }

  // Never rejects: failures end up in the job record
  private async run(jobId: string, sourceUrl: string, opts: ProcessOptions): Promise<void> {
    const log = this.stages.logger.child({ jobId });
    log.info({ sourceUrl, opts }, "Processing job");
    try {
      const metadata = await processSong(
        this.stages,
        { songId: jobId, sourceUrl, opts },
        (step) => this.jobs.update(jobId, { step })
      );
      this.jobs.update(jobId, { status: "completed", step: "Completed", result: metadata });
      log.info("Job completed");
    } catch (err) {
      log.error({ err }, "Job failed");
      this.discardAssets(jobId);
      this.jobs.update(jobId, { status: "error", step: "Failed", errorDetail: errorMessage(err) });
    } finally {
      this.inFlight.delete(sourceUrl);
      this.running.delete(jobId);
    }
  }

  private discardAssets(songId: string): void {
    try {
      this.stages.songs.removeSong(songId);
    } catch (cleanupError) {
      this.stages.logger.warn({ err: cleanupError, songId }, "Cleanup after failure warning");
    }
  }
}
