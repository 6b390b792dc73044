import type { JobSpec } from "../core/jobs/DpsJob";

export type RequestOptions = {
  signal?: AbortSignal;
};

/**
 * Raw HTTP outcome of a submission. Any status code is returned, not thrown:
 * a rejected submission is still an answer.
 */
export type SubmissionResponse = {
  httpStatus: number;
  body: string;
};

export type DismissResponse = {
  httpStatus: number;
  body: string;
};

export interface DpsClient {
  submitJob(spec: JobSpec, options?: RequestOptions): Promise<SubmissionResponse>;
  fetchJobStatus(jobId: string, options?: RequestOptions): Promise<string>;
  fetchJobResult(jobId: string, options?: RequestOptions): Promise<string>;
  fetchJobMetrics(jobId: string, options?: RequestOptions): Promise<string>;
  dismissJob(jobId: string, options?: RequestOptions): Promise<DismissResponse>;
}
