import { isPendingStatus, type DpsJob, type JobStatus } from "../../core/jobs/DpsJob";
import { StatusDocumentParseError } from "../../core/jobs/statusDocument";
import { computeBackoffDelayMs, sleep as defaultSleep } from "../../shared/retry/backoff";
import type { JobHandle } from "./jobHandle";
import { JobFailedError, JobPollAbortedError, JobPollTimeoutError, toErrorMessage } from "./job.errors";
import { resolvePollerConfig, type PollerConfigInput } from "./poller.config";

export type PollAttempt =
  | { kind: "pending"; status: JobStatus }
  | { kind: "done"; job: DpsJob }
  | { kind: "transport_error"; error: unknown };

export type PollSummary = {
  job: DpsJob;
  attempts: number;
  transportErrors: number;
  elapsedMs: number;
};

export type PollOptions = {
  config?: PollerConfigInput;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

/**
 * One status refresh. A request that fails is reported, not thrown; a document
 * that cannot be parsed is thrown, since retrying will not fix it.
 */
export const pollJobOnce = async (handle: JobHandle, signal?: AbortSignal): Promise<PollAttempt> => {
  try {
    const job = await handle.refreshStatus({ signal });
    return isPendingStatus(job.status) ? { kind: "pending", status: job.status } : { kind: "done", job };
  } catch (err) {
    if (err instanceof StatusDocumentParseError) throw err;
    return { kind: "transport_error", error: err };
  }
};

export const pollJobUntilTerminal = async (handle: JobHandle, options: PollOptions = {}): Promise<PollSummary> => {
  const config = resolvePollerConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const { signal } = options;
  const startedAt = now();

  let attempts = 0;
  let transportErrors = 0;
  const context = () => ({
    jobId: handle.job.id,
    status: handle.job.status,
    attempts,
    transportErrors,
    elapsedMs: now() - startedAt
  });

  while (true) {
    if (signal?.aborted) throw new JobPollAbortedError({ context: context(), cause: signal.reason });

    const attempt = await pollJobOnce(handle, signal);
    attempts += 1;

    if (attempt.kind === "done") {
      return { job: attempt.job, attempts, transportErrors, elapsedMs: now() - startedAt };
    }
    if (signal?.aborted) throw new JobPollAbortedError({ context: context(), cause: signal.reason });

    if (attempt.kind === "transport_error") {
      transportErrors += 1;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "job.poll_transport_error",
        jobId: handle.job.id,
        attempt: attempts,
        reason: toErrorMessage(attempt.error)
      }));
    } else {
      // eslint-disable-next-line no-console
      console.debug(JSON.stringify({
        event: "job.poll_pending",
        jobId: handle.job.id,
        status: attempt.status,
        attempt: attempts
      }));
    }

    const delayMs = computeBackoffDelayMs(config, attempts - 1, now() - startedAt);
    if (delayMs == null) {
      throw new JobPollTimeoutError({
        context: context(),
        lastAttempt: attempt.kind,
        cause: attempt.kind === "transport_error" ? attempt.error : undefined
      });
    }
    await sleep(delayMs, signal);
  }
};

/**
 * Polls to a terminal status and turns `Failed` into a `JobFailedError`
 * carrying the job's traceback when the results document has one.
 * `Dismissed`, `Deduped` and `Offline` are returned like `Succeeded`.
 */
export const waitForJobSuccess = async (handle: JobHandle, options: PollOptions = {}): Promise<PollSummary> => {
  const summary = await pollJobUntilTerminal(handle, options);
  if (summary.job.status !== "Failed") return summary;

  const traceback = await handle.refreshResult({ signal: options.signal }).then(
    (job) => job.traceback,
    (err: unknown) => {
      // eslint-disable-next-line no-console
      console.debug(JSON.stringify({
        event: "job.attributes_unavailable",
        jobId: summary.job.id,
        attribute: "results",
        reason: toErrorMessage(err)
      }));
      return [];
    }
  );
  throw new JobFailedError({
    context: { jobId: summary.job.id, status: summary.job.status, attempts: summary.attempts },
    errorDetails: summary.job.errorDetails,
    traceback
  });
};
