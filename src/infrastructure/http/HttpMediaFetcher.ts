import { mkdir, open, rm } from "fs/promises";
import path from "path";
import { PipelineError, toErrorMessage } from "../../core/errors/PipelineError";
import { assertSafeJobId } from "../../core/jobs/jobId";
import { safeUrlForLog, validateSourceUrl } from "../../core/media/sourceUrl";
import type { FetchedMedia, FetchRequest, MediaFetcher } from "../../ports/MediaFetcher";
import type { Logger } from "../../shared/logging/logger";
import { silentLogger } from "../../shared/logging/logger";
import { retry, type BackoffFn } from "../../shared/retry/retry";

export type FetchRetryPolicy = {
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  backoffFn?: BackoffFn;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

export type HttpMediaFetcherOptions = {
  workDir: string;
  timeoutMs: number;
  maxDownloadBytes: number;
  retryPolicy: FetchRetryPolicy;
  logger?: Logger;
  userAgent?: string;
};

export const defaultUserAgent = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

class AttemptFailure extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly extra: { status?: number; timedOut?: boolean; retryDelayMs?: number; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "AttemptFailure";
  }
}

const isTransientStatus = (status: number) => status === 408 || status === 429 || status >= 500;

const parseRetryAfterMs = (value: string | null): number | undefined => {
  if (value && /^\d+$/.test(value)) return Number(value) * 1000;
  return undefined;
};

/**
 * Streams a remote resource into `<workDir>/<jobId>/source` using native fetch (Node 20).
 */
export class HttpMediaFetcher implements MediaFetcher {
  private readonly logger: Logger;

  constructor(private readonly options: HttpMediaFetcherOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async fetch(rawUrl: string, request: FetchRequest): Promise<FetchedMedia> {
    const url = validateSourceUrl(rawUrl);
    const referer = request.referer != null ? validateSourceUrl(request.referer).toString() : undefined;
    const jobId = assertSafeJobId(request.jobId);
    const safeUrl = safeUrlForLog(url);
    const { maxAttempts } = this.options.retryPolicy;

    const jobDir = path.join(this.options.workDir, jobId);
    await mkdir(jobDir, { recursive: true });
    const targetPath = path.join(jobDir, "source");

    let attempts = 0;
    try {
      const media = await retry(
        async (attempt) => {
          attempts = attempt;
          return this.downloadOnce(url, targetPath, referer);
        },
        {
          ...this.options.retryPolicy,
          shouldRetry: (err) => {
            if (!(err instanceof AttemptFailure) || !err.retryable) return false;
            return { retry: true, delayMs: err.extra.retryDelayMs };
          },
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn("fetch.retry", {
              jobId,
              url: safeUrl,
              status: error instanceof AttemptFailure ? error.extra.status ?? null : null,
              reason: toErrorMessage(error),
              attempt,
              maxAttempts,
              delayMs
            });
          },
          onGiveUp: ({ attempt, error }) => {
            this.logger.warn("fetch.give_up", {
              jobId,
              url: safeUrl,
              status: error instanceof AttemptFailure ? error.extra.status ?? null : null,
              reason: toErrorMessage(error),
              attempt,
              maxAttempts
            });
          }
        }
      );
      return { ...media, attempts };
    } catch (err) {
      await rm(targetPath, { force: true });
      throw this.toPipelineError(err, { jobId, url: safeUrl, attempt: attempts, maxAttempts });
    }
  }

  private async downloadOnce(
    url: URL,
    targetPath: string,
    referer?: string
  ): Promise<Omit<FetchedMedia, "attempts">> {
    const { timeoutMs, maxDownloadBytes } = this.options;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const headers: Record<string, string> = { "User-Agent": this.options.userAgent ?? defaultUserAgent };
    if (referer) headers.Referer = referer;

    try {
      let res: Response;
      try {
        res = await fetch(url, { headers, redirect: "follow", signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new AttemptFailure(`Fetch timeout after ${timeoutMs}ms`, true, { timedOut: true });
        }
        throw new AttemptFailure(`Network error: ${toErrorMessage(err)}`, true, { cause: err });
      }

      if (!res.ok) {
        await res.body?.cancel().catch(() => undefined);
        throw new AttemptFailure(`HTTP ${res.status}`, isTransientStatus(res.status), {
          status: res.status,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
        });
      }

      const declaredLength = Number(res.headers.get("content-length") ?? "NaN");
      if (Number.isFinite(declaredLength) && declaredLength > maxDownloadBytes) {
        await res.body?.cancel().catch(() => undefined);
        throw new AttemptFailure(`Resource is larger than ${maxDownloadBytes} bytes`, false, { status: res.status });
      }

      const sizeBytes = await this.writeBody(res, targetPath, controller);
      const contentType = res.headers.get("content-type") ?? undefined;
      return { path: targetPath, sizeBytes, contentType };
    } finally {
      clearTimeout(timeout);
    }
  }

  private async writeBody(res: Response, targetPath: string, controller: AbortController): Promise<number> {
    const { timeoutMs, maxDownloadBytes } = this.options;
    const file = await open(targetPath, "w");
    let written = 0;
    try {
      if (!res.body) return 0;
      const reader = res.body.getReader();
      while (true) {
        const chunk = await reader.read().catch((err: unknown) => {
          if (controller.signal.aborted) {
            throw new AttemptFailure(`Fetch timeout after ${timeoutMs}ms`, true, { timedOut: true });
          }
          throw new AttemptFailure(`Body read failed: ${toErrorMessage(err)}`, true, { cause: err });
        });
        if (chunk.done) break;

        written += chunk.value.byteLength;
        if (written > maxDownloadBytes) {
          controller.abort();
          throw new AttemptFailure(`Resource is larger than ${maxDownloadBytes} bytes`, false);
        }
        await file.write(chunk.value);
      }
      return written;
    } finally {
      await file.close();
    }
  }

  private toPipelineError(
    err: unknown,
    context: { jobId: string; url: string; attempt: number; maxAttempts: number }
  ): PipelineError {
    if (err instanceof PipelineError) return err;
    if (err instanceof AttemptFailure) {
      const attempts = `${context.attempt}/${context.maxAttempts}`;
      if (err.extra.timedOut) {
        return new PipelineError({
          code: "Timeout",
          message: `${err.message} (attempt ${attempts})`,
          context: { ...context, timeoutMs: this.options.timeoutMs }
        });
      }
      return new PipelineError({
        code: "FetchFailed",
        message: `Fetch failed after attempt ${attempts}: ${err.message}`,
        context: err.extra.status != null ? { ...context, status: err.extra.status } : context,
        cause: err.extra.cause
      });
    }
    return new PipelineError({
      code: "FetchFailed",
      message: `Fetch failed: ${toErrorMessage(err)}`,
      context,
      cause: err
    });
  }
}
