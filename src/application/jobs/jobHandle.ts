import {
  createAttachedJob,
  createJobFromAck,
  isTerminalStatus,
  type DpsJob,
  type JobSpec,
  type SubmissionAck
} from "../../core/jobs/DpsJob";
import {
  parseMetricsDocument,
  parseResultsDocument,
  parseStatusDocument,
  parseSubmissionAck,
  StatusDocumentParseError
} from "../../core/jobs/statusDocument";
import type { DismissResponse, DpsClient, RequestOptions, SubmissionResponse } from "../../ports/DpsClient";
import { JobStateError, toErrorMessage } from "./job.errors";

/**
 * A rejected or unreadable submission still produces an acknowledgment; only
 * transport faults escape as errors.
 */
export const toSubmissionAck = (response: SubmissionResponse): SubmissionAck => {
  try {
    return parseSubmissionAck(response.body);
  } catch (err) {
    if (!(err instanceof StatusDocumentParseError)) throw err;
    return {
      status: "failed",
      httpStatusCode: response.httpStatus,
      jobId: "",
      details: response.body
    };
  }
};

export class JobHandle {
  private constructor(
    private readonly client: DpsClient,
    private readonly state: DpsJob
  ) {}

  static async submit(client: DpsClient, spec: JobSpec, options: RequestOptions = {}): Promise<JobHandle> {
    const response = await client.submitJob(spec, options);
    const ack = toSubmissionAck(response);
    if (ack.status === "failed") {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "job.submission_failed",
        algoId: spec.algoId,
        httpStatus: ack.httpStatusCode
      }));
    }
    return new JobHandle(client, createJobFromAck(ack));
  }

  static attach(client: DpsClient, jobId: string): JobHandle {
    return new JobHandle(client, createAttachedJob(jobId));
  }

  get job(): Readonly<DpsJob> {
    return this.state;
  }

  async refreshStatus(options: RequestOptions = {}): Promise<DpsJob> {
    const doc = parseStatusDocument(await this.client.fetchJobStatus(this.state.id, options));
    if (doc.jobId) this.state.id = doc.jobId;
    this.state.status = doc.status;
    return this.state;
  }

  /**
   * Replaces `outputs` and `traceback` with the latest results document, so
   * calling it again never duplicates entries.
   */
  async refreshResult(options: RequestOptions = {}): Promise<DpsJob> {
    this.assertTerminal("retrieve results");
    const doc = parseResultsDocument(await this.client.fetchJobResult(this.state.id, options));
    this.state.outputs = doc.outputs;
    this.state.traceback = doc.traceback;
    return this.state;
  }

  async refreshMetrics(options: RequestOptions = {}): Promise<DpsJob> {
    this.assertTerminal("retrieve metrics");
    const doc = parseMetricsDocument(await this.client.fetchJobMetrics(this.state.id, options));
    this.state.metrics = doc.metrics;
    this.state.usage = doc.usage;
    return this.state;
  }

  /** Fire-and-forget dismissal; refresh the status to observe `Dismissed`. */
  async cancel(options: RequestOptions = {}): Promise<DismissResponse> {
    return this.client.dismissJob(this.state.id, options);
  }

  /**
   * Status, then results and metrics for finished jobs. A failed job may have
   * neither, so those two lookups are best-effort.
   */
  async retrieveAttributes(options: RequestOptions = {}): Promise<DpsJob> {
    await this.refreshStatus(options);
    if (this.state.status !== "Succeeded" && this.state.status !== "Failed") return this.state;

    for (const [attribute, refresh] of [
      ["results", () => this.refreshResult(options)],
      ["metrics", () => this.refreshMetrics(options)]
    ] as const) {
      try {
        await refresh();
      } catch (err) {
        // eslint-disable-next-line no-console
        console.debug(JSON.stringify({
          event: "job.attributes_unavailable",
          jobId: this.state.id,
          attribute,
          reason: toErrorMessage(err)
        }));
      }
    }
    return this.state;
  }

  private assertTerminal(operation: string): void {
    if (!isTerminalStatus(this.state.status)) {
      throw new JobStateError({ context: { jobId: this.state.id, status: this.state.status }, operation });
    }
  }
}
