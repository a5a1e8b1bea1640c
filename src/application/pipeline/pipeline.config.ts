export type PipelineConfig = {
  workerCount: number;
  queueCapacity: number;
  fetchMaxAttempts: number;
  fetchTimeoutMs: number;
  fetchMinDelayMs: number;
  fetchMaxDelayMs: number;
  maxDownloadBytes: number;
  transcodeTimeoutMs: number;
  retentionMs: number;
  sweepIntervalMs: number;
  diskQuotaBytes: number;
};

export type PipelineConfigInput = Partial<PipelineConfig>;

export const pipelineConfigKeys: ReadonlyArray<keyof PipelineConfig> = [
  "workerCount",
  "queueCapacity",
  "fetchMaxAttempts",
  "fetchTimeoutMs",
  "fetchMinDelayMs",
  "fetchMaxDelayMs",
  "maxDownloadBytes",
  "transcodeTimeoutMs",
  "retentionMs",
  "sweepIntervalMs",
  "diskQuotaBytes"
];

const GiB = 1024 * 1024 * 1024;

export const defaultPipelineConfig: PipelineConfig = {
  workerCount: 2,
  queueCapacity: 100,
  fetchMaxAttempts: 3,
  fetchTimeoutMs: 60_000,
  fetchMinDelayMs: 500,
  fetchMaxDelayMs: 8_000,
  maxDownloadBytes: 2 * GiB,
  transcodeTimeoutMs: 300_000,
  retentionMs: 24 * 60 * 60 * 1000,
  sweepIntervalMs: 10 * 60 * 1000,
  diskQuotaBytes: 10 * GiB
};

export const pipelineCaps = {
  workerCount: { min: 1, max: 32 },
  queueCapacity: { min: 1, max: 10_000 },
  fetchMaxAttempts: { min: 1, max: 10 },
  fetchTimeoutMs: { min: 1_000, max: 600_000 },
  fetchMinDelayMs: { min: 0, max: 60_000 },
  fetchMaxDelayMs: { min: 0, max: 60_000 },
  maxDownloadBytes: { min: 1, max: Number.MAX_SAFE_INTEGER },
  transcodeTimeoutMs: { min: 1_000, max: 3_600_000 },
  retentionMs: { min: 60_000, max: 30 * 24 * 60 * 60 * 1000 },
  sweepIntervalMs: { min: 1_000, max: 24 * 60 * 60 * 1000 },
  diskQuotaBytes: { min: 1, max: Number.MAX_SAFE_INTEGER }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  for (const key of pipelineConfigKeys) {
    assertIntegerInRange(key, config[key], pipelineCaps[key].min, pipelineCaps[key].max);
  }
  if (config.fetchMinDelayMs > config.fetchMaxDelayMs) {
    throw new Error(
      `fetchMinDelayMs=${config.fetchMinDelayMs} must not exceed fetchMaxDelayMs=${config.fetchMaxDelayMs}`
    );
  }
  return config;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({ ...defaultPipelineConfig, ...input });
