import { rm } from "fs/promises";
import path from "path";
import { toErrorMessage } from "../../core/errors/PipelineError";
import type { Job } from "../../core/jobs/Job";
import { resolveOutputTarget } from "../../core/media/formats";
import type { ArtifactStorage } from "../../ports/ArtifactStorage";
import type { MediaFetcher } from "../../ports/MediaFetcher";
import type { Transcoder } from "../../ports/Transcoder";
import type { Logger } from "../../shared/logging/logger";
import { silentLogger } from "../../shared/logging/logger";
import type { JobRegistry } from "./JobRegistry";
import { cancelledError, classifyJobFailure, type JobPhase } from "./pipeline.error-handler";

export type JobProcessorDeps = {
  registry: JobRegistry;
  fetcher: MediaFetcher;
  transcoder: Transcoder;
  storage: ArtifactStorage;
  workDir: string;
  logger?: Logger;
};

/**
 * Drives one claimed job through fetch -> transcode -> publish and always leaves it terminal.
 * Cancellation is checked at the phase boundaries only; a running fetch or ffmpeg process is not interrupted.
 */
export const processJob = async (jobId: string, workerId: string, deps: JobProcessorDeps): Promise<Job> => {
  const { registry, fetcher, transcoder, storage } = deps;
  const logger = deps.logger ?? silentLogger;
  const claimed = registry.claim(jobId, workerId);
  let phase: JobPhase = "fetching";

  const ensureNotCancelled = (boundary: string) => {
    if (registry.isCancelRequested(jobId)) throw cancelledError(jobId, boundary);
  };

  try {
    // cancelled between the hand-off and the claim: the job never starts
    if (registry.isCancelRequested(jobId)) {
      logger.info("job.cancelled", { jobId, workerId, phase: "queued" });
      return registry.transition(jobId, "failed", {
        error: { code: "Cancelled", message: `Job ${jobId} was cancelled before processing started` }
      });
    }

    registry.transition(jobId, "fetching");
    logger.info("job.state", { jobId, workerId, status: "fetching" });

    const target = resolveOutputTarget(claimed.format, claimed.bitrateKbps);
    const fetched = await fetcher.fetch(claimed.sourceUrl, { jobId, referer: claimed.referer });
    ensureNotCancelled("after fetch");

    phase = "transcoding";
    registry.transition(jobId, "transcoding", { fetchAttempts: fetched.attempts });
    logger.info("job.state", { jobId, workerId, status: "transcoding", sourceBytes: fetched.sizeBytes });

    const output = await transcoder.transcode(fetched.path, target, { jobId });
    ensureNotCancelled("before publish");

    const artifact = await storage.publish(output.path, jobId, output.extension);
    const done = registry.transition(jobId, "done", { result: artifact });
    logger.info("job.state", { jobId, workerId, status: "done", fileName: artifact.fileName, sizeBytes: artifact.sizeBytes });
    return done;
  } catch (err) {
    const { error, log } = classifyJobFailure(err, { jobId, phase });
    const { event, ...fields } = log;
    logger.warn(event, { ...fields, workerId });
    return registry.transition(jobId, "failed", { error });
  } finally {
    await rm(path.join(deps.workDir, jobId), { recursive: true, force: true }).catch((err: unknown) => {
      logger.error("job.workdir_cleanup_failed", { jobId, message: toErrorMessage(err) });
    });
    registry.release(jobId, workerId);
  }
};
