export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffFn = (ctx: { attempt: number; minDelayMs: number; maxDelayMs: number }) => number;

export type RetryOptions = {
  maxAttempts: number;      // total tries including the first one (e.g. 3 means up to 2 retries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  backoffFn?: BackoffFn;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

// attempt is zero-based: the delay before the second try uses attempt=0
export const exponentialBackoff: BackoffFn = ({ attempt, minDelayMs, maxDelayMs }) =>
  Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    maxAttempts,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    backoffFn = exponentialBackoff,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleepFn = sleep
  } = opts;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error("maxAttempts must be an integer >= 1");
  }

  let attempt = 0;
  while (true) {
    try {
      return await fn(attempt + 1);
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt + 1 >= maxAttempts || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : Math.max(0, backoffFn({ attempt, minDelayMs, maxDelayMs }));
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};
