import { randomUUID } from "crypto";

const jobIdPattern = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export const newJobId = (): string => randomUUID();

/**
 * Job ids end up in file names; only path-safe ids are accepted.
 */
export const assertSafeJobId = (jobId: string): string => {
  if (!jobIdPattern.test(jobId)) {
    throw new Error(`Unsafe job id: ${JSON.stringify(jobId)}`);
  }
  return jobId;
};
