import { isPipelineError, toErrorMessage } from "../../core/errors/PipelineError";
import type { Job } from "../../core/jobs/Job";
import type { BoundedJobQueue } from "../../shared/queue/BoundedJobQueue";
import type { Logger } from "../../shared/logging/logger";
import { silentLogger } from "../../shared/logging/logger";

export type QueuedJob = Pick<Job, "id">;

export type ProcessFn = (jobId: string, workerId: string) => Promise<unknown>;

export type WorkerPoolStats = {
  workerCount: number;
  activeWorkers: number;
  idleWorkers: number;
  running: boolean;
};

/**
 * Fixed set of worker loops. Each loop owns at most one job at a time and only ever blocks itself.
 */
export class WorkerPool {
  private readonly active = new Set<string>();
  private loops: Array<Promise<void>> = [];
  private running = false;
  private readonly logger: Logger;

  constructor(
    private readonly queue: BoundedJobQueue<QueuedJob>,
    private readonly process: ProcessFn,
    private readonly workerCount: number,
    logger?: Logger
  ) {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new Error("workerCount must be an integer >= 1");
    }
    this.logger = logger ?? silentLogger;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loops = Array.from({ length: this.workerCount }, (_, index) => this.runWorker(`worker-${index + 1}`));
  }

  /**
   * Closes the queue; workers finish what is already queued and then exit.
   */
  async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.loops);
    this.running = false;
  }

  stats(): WorkerPoolStats {
    return {
      workerCount: this.workerCount,
      activeWorkers: this.active.size,
      idleWorkers: this.running ? this.workerCount - this.active.size : 0,
      running: this.running
    };
  }

  private async runWorker(workerId: string): Promise<void> {
    while (true) {
      let job: QueuedJob;
      try {
        job = await this.queue.dequeue();
      } catch (err) {
        if (isPipelineError(err, "QueueClosed")) return;
        throw err;
      }

      this.active.add(workerId);
      try {
        await this.process(job.id, workerId);
      } catch (err) {
        // processJob records job failures itself; reaching here means the job could not be driven at all
        this.logger.error("worker.unexpected_error", { workerId, jobId: job.id, message: toErrorMessage(err) });
      } finally {
        this.active.delete(workerId);
      }
    }
  }
}
