import type { JobRecord, JobSnapshot } from "../types.js";

// In-memory storage - job status is not persisted across restarts.
// Records are frozen and replaced whole on every update, so a reader only
// ever sees a complete snapshot.
export class JobStore {
  private readonly jobs = new Map<string, Readonly<JobRecord>>();

  insert(job: JobRecord): void {
    this.jobs.set(job.jobId, Object.freeze({ ...job }));
  }

  update(id: string, patch: Partial<Omit<JobRecord, "jobId" | "sourceUrl" | "createdAt">>): void {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`Job not found: ${id}`);
    if (job.status === "completed" || job.status === "error") {
      throw new Error(`Job ${id} is already ${job.status}`);
    }
    this.jobs.set(id, Object.freeze({ ...job, ...patch, updatedAt: Date.now() }));
  }

  get(id: string): JobRecord | null {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  snapshot(id: string): JobSnapshot {
    return this.get(id) ?? { jobId: id, status: "unknown", step: "unknown" };
  }
}
