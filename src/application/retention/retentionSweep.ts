import { toErrorMessage } from "../../core/errors/PipelineError";
import type { ArtifactStorage } from "../../ports/ArtifactStorage";
import type { JobArchive } from "../../ports/JobArchive";
import type { Logger } from "../../shared/logging/logger";
import { silentLogger } from "../../shared/logging/logger";
import type { JobRegistry } from "../pipeline/JobRegistry";

export type RetentionDeps = {
  registry: JobRegistry;
  storage: ArtifactStorage;
  archive: JobArchive;
  retentionMs: number;
  logger?: Logger;
  now?: () => Date;
};

export type SweepSummary = {
  archivedJobs: number;
  removedArtifacts: number;
  orphanArtifacts: number;
  archiveFailures: number;
};

/**
 * Evicts terminal jobs older than the retention window: archive, drop from the live registry, then delete the artifact.
 * Remaining old files without a live job are removed last.
 */
export const sweepExpired = async (deps: RetentionDeps): Promise<SweepSummary> => {
  const { registry, storage, archive } = deps;
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ? deps.now() : new Date();
  const cutoff = new Date(now.getTime() - deps.retentionMs);

  const summary: SweepSummary = { archivedJobs: 0, removedArtifacts: 0, orphanArtifacts: 0, archiveFailures: 0 };

  for (const job of registry.expiredBefore(cutoff)) {
    try {
      await archive.save(job);
    } catch (err) {
      summary.archiveFailures += 1;
      logger.error("retention.archive_failed", { jobId: job.id, message: toErrorMessage(err) });
      continue;
    }
    registry.evict(job.id);
    summary.archivedJobs += 1;

    if (job.status === "done" && (await storage.remove(job.id))) {
      summary.removedArtifacts += 1;
    }
  }

  const orphans = await storage.cleanup(cutoff, (jobId) => registry.has(jobId));
  summary.orphanArtifacts = orphans.length;

  if (summary.archivedJobs > 0 || summary.orphanArtifacts > 0 || summary.archiveFailures > 0) {
    logger.info("retention.swept", { cutoff: cutoff.toISOString(), ...summary });
  }
  return summary;
};

export const startRetentionLoop = (deps: RetentionDeps, intervalMs: number): { stop: () => void } => {
  const logger = deps.logger ?? silentLogger;
  let sweeping = false;

  const timer = setInterval(() => {
    if (sweeping) return;
    sweeping = true;
    void sweepExpired(deps)
      .catch((err: unknown) => {
        logger.error("retention.sweep_failed", { message: toErrorMessage(err) });
      })
      .finally(() => {
        sweeping = false;
      });
  }, intervalMs);
  timer.unref();

  return {
    stop: () => clearInterval(timer)
  };
};
