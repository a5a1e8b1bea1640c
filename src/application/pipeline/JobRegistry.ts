import { PipelineError } from "../../core/errors/PipelineError";
import type { Job, JobError, JobStatus, StoredArtifact } from "../../core/jobs/Job";
import { assertTransition, isTerminalStatus } from "../../core/jobs/Job";

export type JobCounts = Record<JobStatus, number>;

const emptyCounts = (): JobCounts => ({ queued: 0, fetching: 0, transcoding: 0, done: 0, failed: 0 });

const snapshot = (job: Job): Job => ({ ...job, result: job.result ? { ...job.result } : undefined });

/**
 * Live job table. All state changes go through `transition`, which enforces the job state machine;
 * `claim`/`release` track which worker owns a job; a job has at most one owner.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly owners = new Map<string, string>();
  private readonly cancelRequests = new Set<string>();
  private lastFailure?: Date;

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(job: Job): void {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} is already registered`);
    }
    this.jobs.set(job.id, { ...job });
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  get(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    if (!job) return undefined;
    const view = snapshot(job);
    if (this.cancelRequests.has(jobId)) view.cancelRequested = true;
    return view;
  }

  /**
   * First registered job that matches and is neither failed nor on its way to failing.
   */
  findReusable(matches: (job: Job) => boolean): Job | undefined {
    for (const job of this.jobs.values()) {
      if (job.status === "failed" || this.cancelRequests.has(job.id)) continue;
      if (matches(job)) return snapshot(job);
    }
    return undefined;
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new PipelineError({ code: "JobNotFound", message: `Job ${jobId} not found`, context: { jobId } });
    }
    return job;
  }

  claim(jobId: string, workerId: string): Job {
    const job = this.require(jobId);
    const owner = this.owners.get(jobId);
    if (owner != null) {
      throw new Error(`Job ${jobId} is already owned by ${owner}; ${workerId} cannot claim it`);
    }
    this.owners.set(jobId, workerId);
    job.workerId = workerId;
    return snapshot(job);
  }

  release(jobId: string, workerId: string): void {
    if (this.owners.get(jobId) === workerId) {
      this.owners.delete(jobId);
    }
  }

  ownerOf(jobId: string): string | undefined {
    return this.owners.get(jobId);
  }

  transition(
    jobId: string,
    to: JobStatus,
    patch: { error?: JobError; result?: StoredArtifact; fetchAttempts?: number } = {}
  ): Job {
    const job = this.require(jobId);
    assertTransition(job, to, patch.error?.code);

    const at = this.now();
    job.status = to;
    job.updatedAt = at;
    if (to === "fetching") job.startedAt = at;
    if (patch.fetchAttempts != null) job.fetchAttempts = patch.fetchAttempts;
    if (patch.result) job.result = { ...patch.result };
    if (patch.error) job.error = { ...patch.error };
    if (isTerminalStatus(to)) {
      job.completedAt = at;
      this.cancelRequests.delete(jobId);
    }
    if (to === "failed") this.lastFailure = at;
    return snapshot(job);
  }

  /**
   * Marks a claimed job for cooperative cancellation. Returns false for unknown or finished jobs.
   */
  requestCancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) return false;
    this.cancelRequests.add(jobId);
    return true;
  }

  isCancelRequested(jobId: string): boolean {
    return this.cancelRequests.has(jobId);
  }

  /**
   * Terminal jobs whose completion is strictly older than `cutoff`.
   */
  expiredBefore(cutoff: Date): Job[] {
    const expired: Job[] = [];
    for (const job of this.jobs.values()) {
      if (isTerminalStatus(job.status) && job.completedAt && job.completedAt.getTime() < cutoff.getTime()) {
        expired.push(snapshot(job));
      }
    }
    return expired;
  }

  evict(jobId: string): void {
    this.jobs.delete(jobId);
    this.owners.delete(jobId);
    this.cancelRequests.delete(jobId);
  }

  counts(): JobCounts {
    const counts = emptyCounts();
    for (const job of this.jobs.values()) counts[job.status] += 1;
    return counts;
  }

  lastFailureAt(): Date | undefined {
    return this.lastFailure;
  }
}
