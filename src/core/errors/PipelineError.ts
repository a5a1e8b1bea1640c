export type PipelineErrorCode =
  | "InvalidSource"
  | "UnsupportedFormat"
  | "FetchFailed"
  | "Timeout"
  | "TranscodeTimeout"
  | "TranscodeFailed"
  | "StorageFull"
  | "QueueFull"
  | "QueueClosed"
  | "Cancelled"
  | "JobNotFound"
  | "InvalidTransition"
  | "Internal";

export type PipelineErrorContext = Partial<{
  jobId: string;
  url: string;
  attempt: number;
  maxAttempts: number;
  status: number;
  exitCode: number;
  timeoutMs: number;
}>;

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly context: PipelineErrorContext;
  readonly diagnostics?: string;
  readonly cause?: unknown;

  constructor(args: {
    code: PipelineErrorCode;
    message: string;
    context?: PipelineErrorContext;
    diagnostics?: string;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "PipelineError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.diagnostics = args.diagnostics;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isPipelineError = (value: unknown, code?: PipelineErrorCode): value is PipelineError =>
  value instanceof PipelineError && (code == null || value.code === code);

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

/**
 * Anything that is not already a PipelineError is an unexpected failure.
 */
export const asPipelineError = (reason: unknown, context: PipelineErrorContext = {}): PipelineError => {
  if (reason instanceof PipelineError) return reason;
  return new PipelineError({
    code: "Internal",
    message: `Unexpected failure: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });
};

export type ErrorReport = {
  code: PipelineErrorCode;
  message: string;
  context?: PipelineErrorContext;
  stack?: string;
};

/**
 * Log-ready view of a failure. Causes are left out; context urls are already sanitized where errors are raised.
 */
export const toErrorReport = (reason: unknown, options: { includeStack?: boolean } = {}): ErrorReport => {
  const report: ErrorReport =
    reason instanceof PipelineError
      ? { code: reason.code, message: reason.message }
      : { code: "Internal", message: toErrorMessage(reason) };
  if (reason instanceof PipelineError && Object.keys(reason.context).length > 0) {
    report.context = { ...reason.context };
  }
  if (options.includeStack && reason instanceof Error && reason.stack) {
    report.stack = reason.stack;
  }
  return report;
};
