import { PipelineError, asPipelineError } from "../../core/errors/PipelineError";
import type { Job, JobError } from "../../core/jobs/Job";
import { isTerminalStatus } from "../../core/jobs/Job";
import { newJobId } from "../../core/jobs/jobId";
import { resolveOutputTarget } from "../../core/media/formats";
import { extractUrls, normalizeSourceUrl, safeUrlForLog, validateSourceUrl } from "../../core/media/sourceUrl";
import type { ArtifactStorage } from "../../ports/ArtifactStorage";
import type { JobArchive } from "../../ports/JobArchive";
import type { Logger } from "../../shared/logging/logger";
import { silentLogger } from "../../shared/logging/logger";
import type { BoundedJobQueue } from "../../shared/queue/BoundedJobQueue";
import type { JobCounts, JobRegistry } from "../pipeline/JobRegistry";
import type { QueuedJob, WorkerPool } from "../pipeline/WorkerPool";

export type RequestOptions = {
  bitrateKbps?: number;
  // page the media was found on; sent as Referer when fetching
  referer?: string;
};

export type TextRequestResult = {
  jobIds: string[];
  rejected?: { url: string; error: JobError };
};

export type HealthSnapshot = {
  status: "ok" | "degraded";
  accepting: boolean;
  timestamp: string;
  queueDepth: number;
  queueCapacity: number;
  activeWorkers: number;
  idleWorkers: number;
  workerCount: number;
  lastFailureAt: string | null;
  jobs: JobCounts;
  storage: { usedBytes: number; quotaBytes: number };
  ffmpegAvailable: boolean | null;
};

export type RequestGatewayDeps = {
  queue: BoundedJobQueue<QueuedJob>;
  registry: JobRegistry;
  storage: ArtifactStorage;
  archive: JobArchive;
  pool: Pick<WorkerPool, "stats">;
  ffmpegAvailable?: () => boolean | null;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Intake and read side of the pipeline. Intake is synchronous: a job id is returned once the job is queued,
 * and capacity problems surface as thrown PipelineErrors before any job exists.
 */
export class RequestGateway {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: RequestGatewayDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * A repeat of a live, non-failed job for the same source and output returns that job's id.
   */
  request(url: string, format: string, options: RequestOptions = {}): string {
    const target = resolveOutputTarget(format, options.bitrateKbps);
    const referer = options.referer != null ? validateSourceUrl(options.referer).toString() : undefined;
    const sourceUrl = normalizeSourceUrl(url);

    const existing = this.deps.registry.findReusable(
      (job) =>
        job.sourceUrl === sourceUrl &&
        job.format === target.format &&
        resolveOutputTarget(job.format, job.bitrateKbps).bitrateKbps === target.bitrateKbps
    );
    if (existing) {
      this.logger.info("job.duplicate", { jobId: existing.id, url: safeUrlForLog(sourceUrl), status: existing.status });
      return existing.id;
    }

    if (!this.deps.storage.hasCapacity()) {
      const { usedBytes, quotaBytes } = this.deps.storage.usage();
      throw new PipelineError({
        code: "StorageFull",
        message: `Disk quota exhausted (${usedBytes}/${quotaBytes} bytes used)`
      });
    }

    const createdAt = this.now();
    const job: Job = {
      id: newJobId(),
      sourceUrl,
      referer,
      format: target.format,
      bitrateKbps: options.bitrateKbps,
      status: "queued",
      createdAt,
      updatedAt: createdAt
    };

    // submit first: a QueueFull/QueueClosed rejection leaves nothing registered
    this.deps.queue.submit({ id: job.id });
    this.deps.registry.add(job);
    this.logger.info("job.queued", {
      jobId: job.id,
      url: safeUrlForLog(job.sourceUrl),
      format: job.format,
      queueDepth: this.deps.queue.depth
    });
    return job.id;
  }

  /**
   * Submits every link found in a chat-style message. Stops at the first rejected submission.
   */
  requestFromText(text: string, format: string, options: RequestOptions = {}): TextRequestResult {
    const urls = extractUrls(text);
    if (urls.length === 0) {
      throw new PipelineError({ code: "InvalidSource", message: "No http(s) or www. links found in text" });
    }

    const jobIds: string[] = [];
    for (const url of urls) {
      try {
        jobIds.push(this.request(url, format, options));
      } catch (err) {
        const error = asPipelineError(err);
        return { jobIds, rejected: { url, error: { code: error.code, message: error.message } } };
      }
    }
    return { jobIds };
  }

  async status(jobId: string): Promise<Job | null> {
    return this.deps.registry.get(jobId) ?? this.deps.archive.get(jobId);
  }

  /**
   * Queued jobs fail immediately with Cancelled; claimed jobs are flagged and stop at the next phase boundary.
   * Finished jobs are returned unchanged.
   */
  async cancel(jobId: string): Promise<Job> {
    const { registry, queue } = this.deps;
    const live = registry.get(jobId);
    if (!live) {
      const archived = await this.deps.archive.get(jobId);
      if (archived) return archived;
      throw new PipelineError({ code: "JobNotFound", message: `Job ${jobId} not found`, context: { jobId } });
    }
    if (isTerminalStatus(live.status)) return live;

    if (queue.remove(jobId)) {
      const cancelled = registry.transition(jobId, "failed", {
        error: { code: "Cancelled", message: `Job ${jobId} was cancelled before processing started` }
      });
      this.logger.info("job.cancelled", { jobId, phase: "queued" });
      return cancelled;
    }

    registry.requestCancel(jobId);
    this.logger.info("job.cancel_requested", { jobId, status: live.status });
    return registry.get(jobId) ?? live;
  }

  health(): HealthSnapshot {
    const { queue, registry, storage, pool } = this.deps;
    const workers = pool.stats();
    const usage = storage.usage();
    const accepting = !queue.isClosed && workers.running && storage.hasCapacity();
    const lastFailure = registry.lastFailureAt();

    return {
      status: accepting ? "ok" : "degraded",
      accepting,
      timestamp: this.now().toISOString(),
      queueDepth: queue.depth,
      queueCapacity: queue.capacity,
      activeWorkers: workers.activeWorkers,
      idleWorkers: workers.idleWorkers,
      workerCount: workers.workerCount,
      lastFailureAt: lastFailure ? lastFailure.toISOString() : null,
      jobs: registry.counts(),
      storage: { usedBytes: usage.usedBytes, quotaBytes: usage.quotaBytes },
      ffmpegAvailable: this.deps.ffmpegAvailable ? this.deps.ffmpegAvailable() : null
    };
  }
}
