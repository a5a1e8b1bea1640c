import { mkdir } from "fs/promises";
import type http from "http";
import { RequestGateway } from "../application/gateway/RequestGateway";
import { JobRegistry } from "../application/pipeline/JobRegistry";
import type { PipelineConfig } from "../application/pipeline/pipeline.config";
import { processJob } from "../application/pipeline/processJob";
import { WorkerPool, type QueuedJob } from "../application/pipeline/WorkerPool";
import { startRetentionLoop } from "../application/retention/retentionSweep";
import { FfmpegTranscoder } from "../infrastructure/ffmpeg/FfmpegTranscoder";
import { LocalArtifactStorage } from "../infrastructure/fs/LocalArtifactStorage";
import { HttpMediaFetcher } from "../infrastructure/http/HttpMediaFetcher";
import { InMemoryJobArchive } from "../infrastructure/memory/InMemoryJobArchive";
import { MongoJobArchive } from "../infrastructure/mongo/MongoJobArchive";
import type { JobArchive } from "../ports/JobArchive";
import type { MediaFetcher } from "../ports/MediaFetcher";
import type { Transcoder } from "../ports/Transcoder";
import { createServer } from "../server";
import { loadEnv, type Env } from "../shared/config/env";
import { loadPipelineConfigFromEnv } from "../shared/config/runtime.config";
import { createJsonLogger, type Logger } from "../shared/logging/logger";
import { BoundedJobQueue } from "../shared/queue/BoundedJobQueue";

export type PipelineOverrides = Partial<{
  fetcher: MediaFetcher;
  transcoder: Transcoder;
  archive: JobArchive;
}>;

export type Pipeline = {
  gateway: RequestGateway;
  registry: JobRegistry;
  queue: BoundedJobQueue<QueuedJob>;
  pool: WorkerPool;
  storage: LocalArtifactStorage;
  archive: JobArchive;
  stop: () => Promise<void>;
};

export type RunningService = {
  pipeline: Pipeline;
  server: http.Server;
  stop: () => Promise<void>;
};

const createArchive = (env: Env): JobArchive =>
  env.JOB_ARCHIVE === "mongo" ? new MongoJobArchive(env.MONGO_URI) : new InMemoryJobArchive();

export const createPipeline = async (deps: {
  env: Env;
  config: PipelineConfig;
  logger: Logger;
  overrides?: PipelineOverrides;
}): Promise<Pipeline> => {
  const { env, config, logger, overrides = {} } = deps;

  await mkdir(env.WORK_DIR, { recursive: true });
  const storage = new LocalArtifactStorage({ directory: env.DOWNLOAD_DIR, quotaBytes: config.diskQuotaBytes });
  await storage.init();

  const archive = overrides.archive ?? createArchive(env);
  const fetcher =
    overrides.fetcher ??
    new HttpMediaFetcher({
      workDir: env.WORK_DIR,
      timeoutMs: config.fetchTimeoutMs,
      maxDownloadBytes: config.maxDownloadBytes,
      retryPolicy: {
        maxAttempts: config.fetchMaxAttempts,
        minDelayMs: config.fetchMinDelayMs,
        maxDelayMs: config.fetchMaxDelayMs
      },
      logger
    });

  let ffmpegAvailable: boolean | null = null;
  let transcoder: Transcoder;
  if (overrides.transcoder) {
    transcoder = overrides.transcoder;
  } else {
    const ffmpeg = new FfmpegTranscoder({
      ffmpegPath: env.FFMPEG_PATH,
      workDir: env.WORK_DIR,
      timeoutMs: config.transcodeTimeoutMs
    });
    const probe = await ffmpeg.probe();
    ffmpegAvailable = probe.available;
    if (probe.available) {
      logger.info("ffmpeg.probe", { available: true, muxerCount: probe.muxerCount });
    } else {
      logger.warn("ffmpeg.probe", { available: false, error: probe.error });
    }
    transcoder = ffmpeg;
  }

  const registry = new JobRegistry();
  const queue = new BoundedJobQueue<QueuedJob>(config.queueCapacity);
  const pool = new WorkerPool(
    queue,
    (jobId, workerId) =>
      processJob(jobId, workerId, { registry, fetcher, transcoder, storage, workDir: env.WORK_DIR, logger }),
    config.workerCount,
    logger
  );
  const gateway = new RequestGateway({
    queue,
    registry,
    storage,
    archive,
    pool,
    ffmpegAvailable: () => ffmpegAvailable,
    logger
  });
  const retention = startRetentionLoop(
    { registry, storage, archive, retentionMs: config.retentionMs, logger },
    config.sweepIntervalMs
  );

  pool.start();

  return {
    gateway,
    registry,
    queue,
    pool,
    storage,
    archive,
    stop: async () => {
      retention.stop();
      try {
        await pool.stop();
      } finally {
        await archive.close();
      }
    }
  };
};

export const startService = async (): Promise<RunningService> => {
  const env = loadEnv();
  const config = loadPipelineConfigFromEnv();
  const logger = createJsonLogger();

  const pipeline = await createPipeline({ env, config, logger });
  const server = createServer(pipeline.gateway, logger);

  try {
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(env.PORT, () => {
        server.off("error", reject);
        resolve();
      });
    });
  } catch (err) {
    await pipeline.stop();
    throw err;
  }

  logger.info("service.started", {
    port: env.PORT,
    downloadDir: env.DOWNLOAD_DIR,
    workers: config.workerCount,
    queueCapacity: config.queueCapacity,
    archive: env.JOB_ARCHIVE
  });

  return {
    pipeline,
    server,
    stop: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await pipeline.stop();
      logger.info("service.stopped", {});
    }
  };
};
