import type { JobSpec } from "../../core/jobs/DpsJob";
import type { DismissResponse, DpsClient, RequestOptions, SubmissionResponse } from "../../ports/DpsClient";
import { buildApiHeaders } from "../../shared/http/headers";

export class DpsRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly isAborted: boolean;
  readonly requestUrl: string;
  readonly cause?: unknown;

  constructor(args: {
    message: string;
    requestUrl: string;
    status?: number;
    isTimeout?: boolean;
    isAborted?: boolean;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "DpsRequestError";
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.isAborted = args.isAborted ?? false;
    this.requestUrl = args.requestUrl;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type DpsHttpClientOptions = {
  jobUrl: string;
  apiToken?: string;
  proxyTicket?: string;
  timeoutMs?: number;
};

type HttpMethod = "GET" | "POST";

/**
 * Thin `fetch` client for the job endpoints. One request per call: retrying is
 * the poller's job, not the transport's.
 */
export class DpsHttpClient implements DpsClient {
  private readonly jobUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: DpsHttpClientOptions) {
    this.jobUrl = options.jobUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async submitJob(spec: JobSpec, options: RequestOptions = {}): Promise<SubmissionResponse> {
    const body = JSON.stringify({
      algo_id: spec.algoId,
      version: spec.version,
      queue: spec.queue,
      identifier: spec.identifier,
      username: spec.username ?? "anonymous",
      inputs: spec.inputs ?? {}
    });
    const res = await this.request("POST", this.jobUrl, {
      contentType: "application/json",
      body,
      signal: options.signal,
      allowErrorStatus: true
    });
    return { httpStatus: res.status, body: res.body };
  }

  async fetchJobStatus(jobId: string, options: RequestOptions = {}): Promise<string> {
    const res = await this.request("GET", `${this.jobUrl}/${encodeURIComponent(jobId)}/status`, {
      contentType: "application/xml",
      signal: options.signal
    });
    return res.body;
  }

  async fetchJobResult(jobId: string, options: RequestOptions = {}): Promise<string> {
    const res = await this.request("GET", `${this.jobUrl}/${encodeURIComponent(jobId)}`, {
      contentType: "application/xml",
      signal: options.signal
    });
    return res.body;
  }

  async fetchJobMetrics(jobId: string, options: RequestOptions = {}): Promise<string> {
    const res = await this.request("GET", `${this.jobUrl}/${encodeURIComponent(jobId)}/metrics`, {
      contentType: "application/xml",
      signal: options.signal
    });
    return res.body;
  }

  async dismissJob(jobId: string, options: RequestOptions = {}): Promise<DismissResponse> {
    const res = await this.request("POST", `${this.jobUrl}/revoke/${encodeURIComponent(jobId)}`, {
      contentType: "application/xml",
      signal: options.signal
    });
    return { httpStatus: res.status, body: res.body };
  }

  private async request(
    method: HttpMethod,
    target: string,
    opts: { contentType: string; body?: string; signal?: AbortSignal; allowErrorStatus?: boolean }
  ): Promise<{ status: number; body: string }> {
    const url = new URL(target);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    if (opts.signal?.aborted) {
      throw new DpsRequestError({ message: "DPS request aborted", requestUrl: safeRequestUrl, isAborted: true });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    opts.signal?.addEventListener("abort", forwardAbort, { once: true });

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: buildApiHeaders({
          contentType: opts.contentType,
          token: this.options.apiToken,
          proxyTicket: this.options.proxyTicket
        }),
        body: opts.body,
        signal: controller.signal
      });
    } catch (err) {
      if (opts.signal?.aborted) {
        throw new DpsRequestError({ message: "DPS request aborted", requestUrl: safeRequestUrl, isAborted: true, cause: err });
      }
      if (controller.signal.aborted) {
        throw new DpsRequestError({
          message: `DPS request timeout after ${this.timeoutMs}ms`,
          requestUrl: safeRequestUrl,
          isTimeout: true,
          cause: err
        });
      }
      throw new DpsRequestError({
        message: `DPS request failed: ${err instanceof Error ? err.message : String(err)}`,
        requestUrl: safeRequestUrl,
        cause: err
      });
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener("abort", forwardAbort);
    }

    const body = await res.text();
    if (!res.ok && !opts.allowErrorStatus) {
      throw new DpsRequestError({
        message: `DPS request failed: ${res.status}`,
        requestUrl: safeRequestUrl,
        status: res.status
      });
    }
    return { status: res.status, body };
  }
}
