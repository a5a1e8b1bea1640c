import type { PipelineErrorCode } from "../errors/PipelineError";
import { PipelineError } from "../errors/PipelineError";
import type { OutputFormat } from "../media/formats";

export type JobStatus = "queued" | "fetching" | "transcoding" | "done" | "failed";

export type TerminalJobStatus = Extract<JobStatus, "done" | "failed">;

export type StoredArtifact = {
  jobId: string;
  fileName: string;
  path: string;
  sizeBytes: number;
  createdAt: Date;
};

export type JobError = {
  code: PipelineErrorCode;
  message: string;
  diagnostics?: string;
};

export type Job = {
  id: string;
  sourceUrl: string;
  referer?: string;
  format: OutputFormat;
  bitrateKbps?: number;
  status: JobStatus;
  createdAt: Date;
  updatedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  workerId?: string;
  fetchAttempts?: number;
  result?: StoredArtifact;
  error?: JobError;
  // set on live snapshots while a cancellation is pending
  cancelRequested?: boolean;
};

const allowedTransitions: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["fetching", "failed"],
  fetching: ["transcoding", "failed"],
  transcoding: ["done", "failed"],
  done: [],
  failed: []
};

export const isTerminalStatus = (status: JobStatus): status is TerminalJobStatus =>
  status === "done" || status === "failed";

/**
 * queued -> failed is only reachable through cancellation before a worker claims the job.
 */
export const assertTransition = (job: Pick<Job, "id" | "status">, to: JobStatus, errorCode?: PipelineErrorCode) => {
  const allowed = allowedTransitions[job.status].includes(to);
  const cancelOnly = job.status === "queued" && to === "failed" && errorCode !== "Cancelled";
  if (!allowed || cancelOnly) {
    throw new PipelineError({
      code: "InvalidTransition",
      message: `Job ${job.id} cannot move from ${job.status} to ${to}`,
      context: { jobId: job.id }
    });
  }
};
