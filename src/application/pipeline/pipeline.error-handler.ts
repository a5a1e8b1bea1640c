import { asPipelineError, PipelineError, type PipelineErrorCode } from "../../core/errors/PipelineError";
import type { JobError, JobStatus } from "../../core/jobs/Job";

export type JobPhase = Extract<JobStatus, "fetching" | "transcoding">;

export const cancelledError = (jobId: string, boundary: string) =>
  new PipelineError({
    code: "Cancelled",
    message: `Job ${jobId} was cancelled ${boundary}`,
    context: { jobId }
  });

/**
 * Errors a job can end with. Anything else reaching a worker is reported as Internal.
 */
const jobFailureCodes: ReadonlySet<PipelineErrorCode> = new Set<PipelineErrorCode>([
  "InvalidSource",
  "UnsupportedFormat",
  "FetchFailed",
  "Timeout",
  "TranscodeTimeout",
  "TranscodeFailed",
  "StorageFull",
  "Cancelled",
  "Internal"
]);

export type JobFailedLog = {
  event: "job.failed";
  jobId: string;
  phase: JobPhase;
  code: PipelineErrorCode;
  message: string;
};

export const classifyJobFailure = (
  reason: unknown,
  context: { jobId: string; phase: JobPhase }
): { error: JobError; log: JobFailedLog } => {
  const pipelineError = asPipelineError(reason, { jobId: context.jobId });
  const code = jobFailureCodes.has(pipelineError.code) ? pipelineError.code : "Internal";
  const error: JobError = { code, message: pipelineError.message };
  if (pipelineError.diagnostics) error.diagnostics = pipelineError.diagnostics;

  return {
    error,
    log: {
      event: "job.failed",
      jobId: context.jobId,
      phase: context.phase,
      code,
      message: pipelineError.message
    }
  };
};
