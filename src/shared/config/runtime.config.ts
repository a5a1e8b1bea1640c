import {
  defaultPipelineConfig,
  pipelineCaps,
  pipelineConfigKeys,
  type PipelineConfig,
  validatePipelineConfig
} from "../../application/pipeline/pipeline.config";

const envNames: Record<keyof PipelineConfig, string> = {
  workerCount: "WORKER_COUNT",
  queueCapacity: "QUEUE_CAPACITY",
  fetchMaxAttempts: "FETCH_MAX_ATTEMPTS",
  fetchTimeoutMs: "FETCH_TIMEOUT_MS",
  fetchMinDelayMs: "FETCH_MIN_DELAY_MS",
  fetchMaxDelayMs: "FETCH_MAX_DELAY_MS",
  maxDownloadBytes: "MAX_DOWNLOAD_BYTES",
  transcodeTimeoutMs: "TRANSCODE_TIMEOUT_MS",
  retentionMs: "RETENTION_MS",
  sweepIntervalMs: "SWEEP_INTERVAL_MS",
  diskQuotaBytes: "DISK_QUOTA_BYTES"
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadPipelineConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
  const config: PipelineConfig = { ...defaultPipelineConfig };
  for (const key of pipelineConfigKeys) {
    config[key] = parseOptionalIntInRange(env, envNames[key], pipelineCaps[key]) ?? defaultPipelineConfig[key];
  }
  return validatePipelineConfig(config);
};
