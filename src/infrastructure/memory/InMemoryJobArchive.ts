import type { Job } from "../../core/jobs/Job";
import type { JobArchive } from "../../ports/JobArchive";

/**
 * Process-local archive; the default when no MongoDB is configured.
 * Holds at most `maxEntries` jobs and evicts the oldest first.
 */
export class InMemoryJobArchive implements JobArchive {
  private readonly jobs = new Map<string, Job>();

  constructor(private readonly maxEntries = 10_000) {}

  async save(job: Job): Promise<void> {
    this.jobs.delete(job.id);
    this.jobs.set(job.id, { ...job });
    while (this.jobs.size > this.maxEntries) {
      const oldest = this.jobs.keys().next();
      if (oldest.done) break;
      this.jobs.delete(oldest.value);
    }
  }

  async get(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  async close(): Promise<void> {
    this.jobs.clear();
  }
}
