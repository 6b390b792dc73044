import { JobLifecycleError, type JobErrorContext } from "../application/jobs/job.errors";
import { RetrievalError, type RetrievalErrorContext } from "../application/retrieval/retrieval.errors";
import { runWaitForJob } from "../composition/root";
import { StatusDocumentParseError, type StatusDocumentKind } from "../core/jobs/statusDocument";
import { DpsRequestError } from "../infrastructure/dps/DpsHttpClient";

type CliErrorEnvelope = {
  event: "job.wait_failed";
  name: string;
  message: string;
  code?: string;
  context?: JobErrorContext | RetrievalErrorContext | { url: string; status?: number };
  document?: StatusDocumentKind;
  stack?: string;
};

type ErrorDetails = Pick<CliErrorEnvelope, "code" | "context" | "document">;

const dpsRequestCode = (err: DpsRequestError): string => {
  if (err.isAborted) return "request_aborted";
  if (err.isTimeout) return "request_timeout";
  return "request_failed";
};

// Only fields the typed errors declare are copied; causes, raw bodies and tracebacks stay out.
const describeError = (err: Error): ErrorDetails => {
  if (err instanceof JobLifecycleError) {
    const { jobId, status, attempts, transportErrors, elapsedMs } = err.context;
    return { code: err.code, context: { jobId, status, attempts, transportErrors, elapsedMs } };
  }
  if (err instanceof RetrievalError) {
    const { url, status, auth } = err.context;
    return { code: err.code, context: { url, status, auth } };
  }
  if (err instanceof DpsRequestError) {
    return { code: dpsRequestCode(err), context: { url: err.requestUrl, status: err.status } };
  }
  if (err instanceof StatusDocumentParseError) {
    return { code: err.code, document: err.documentKind };
  }
  return {};
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.toLowerCase() ?? "");

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  return {
    event: "job.wait_failed",
    name: error.name,
    message: error.message,
    ...describeError(error),
    ...(includeStack && error.stack ? { stack: error.stack } : {})
  };
};

export const executeWaitJobCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const jobId = argv[0]?.trim();
    if (!jobId) throw new Error("Usage: wait-job <jobId>");

    const { job, attempts, transportErrors, elapsedMs } = await runWaitForJob(jobId, { signal: controller.signal });
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "job.wait_completed",
      jobId: job.id,
      status: job.status,
      attempts,
      transportErrors,
      elapsedMs,
      outputs: job.outputs
    }));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
};

if (require.main === module) {
  void executeWaitJobCli();
}
