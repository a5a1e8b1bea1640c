import type { Job } from "../core/jobs/Job";

/**
 * Durable home of terminal jobs once they leave the live registry.
 */
export type JobArchive = {
  save(job: Job): Promise<void>;
  get(jobId: string): Promise<Job | null>;
  close(): Promise<void>;
};
