import type { JobStatus } from "../../core/jobs/DpsJob";

export type JobFailureCode = "job_failed" | "poll_timeout" | "poll_aborted" | "job_not_terminal";

export type JobErrorContext = {
  jobId: string;
  status?: JobStatus;
  attempts?: number;
  transportErrors?: number;
  elapsedMs?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class JobLifecycleError extends Error {
  readonly code: JobFailureCode;
  readonly context: JobErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: JobFailureCode; message: string; context: JobErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "JobLifecycleError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class JobFailedError extends JobLifecycleError {
  readonly errorDetails?: string;
  readonly traceback: string[];

  constructor(args: { context: JobErrorContext; errorDetails?: string; traceback?: string[] }) {
    super({
      code: "job_failed",
      message: `Job ${args.context.jobId} finished with status ${args.context.status ?? "Failed"}`,
      context: args.context
    });
    this.name = "JobFailedError";
    this.errorDetails = args.errorDetails;
    this.traceback = args.traceback ?? [];
  }
}

/**
 * `lastAttempt` tells whether the budget ran out while the job was still
 * pending or while the status endpoint kept failing.
 */
export class JobPollTimeoutError extends JobLifecycleError {
  readonly lastAttempt: "pending" | "transport_error";

  constructor(args: { context: JobErrorContext; lastAttempt: "pending" | "transport_error"; cause?: unknown }) {
    super({
      code: "poll_timeout",
      message: `Polling job ${args.context.jobId} exceeded its budget after ${args.context.attempts ?? 0} attempts`,
      context: args.context,
      cause: args.cause
    });
    this.name = "JobPollTimeoutError";
    this.lastAttempt = args.lastAttempt;
  }
}

export class JobPollAbortedError extends JobLifecycleError {
  constructor(args: { context: JobErrorContext; cause?: unknown }) {
    super({
      code: "poll_aborted",
      message: `Polling job ${args.context.jobId} was aborted`,
      context: args.context,
      cause: args.cause
    });
    this.name = "JobPollAbortedError";
  }
}

export class JobStateError extends JobLifecycleError {
  constructor(args: { context: JobErrorContext; operation: string }) {
    super({
      code: "job_not_terminal",
      message: `Cannot ${args.operation} for job ${args.context.jobId} while it is ${args.context.status ?? "pending"}`,
      context: args.context
    });
    this.name = "JobStateError";
  }
}
