export const jobStatuses = [
  "Accepted",
  "Running",
  "Succeeded",
  "Failed",
  "Dismissed",
  "Deduped",
  "Offline"
] as const;

export type JobStatus = (typeof jobStatuses)[number];

export const terminalJobStatuses: ReadonlySet<JobStatus> = new Set<JobStatus>([
  "Succeeded",
  "Failed",
  "Dismissed",
  "Deduped",
  "Offline"
]);

export type SubmissionStatus = "success" | "failed";

/**
 * Typed view over the metrics document. Counters are numbers when the
 * service sends a numeric value, otherwise they stay as the raw string.
 */
export type JobResourceUsage = {
  machineType?: string;
  architecture?: string;
  machineMemorySize?: number | string;
  directorySize?: number | string;
  operatingSystem?: string;
  jobStartTime?: string;
  jobEndTime?: string;
  jobDurationSeconds?: number | string;
  cpuUsage?: number | string;
  cacheUsage?: number | string;
  memUsage?: number | string;
  maxMemUsage?: number | string;
  swapUsage?: number | string;
  readIoStats?: number | string;
  writeIoStats?: number | string;
  syncIoStats?: number | string;
  asyncIoStats?: number | string;
  totalIoStats?: number | string;
};

export type DpsJob = {
  id: string;
  status: JobStatus;
  submission: SubmissionStatus;
  responseCode: number;
  errorDetails?: string;
  outputs: string[];
  traceback: string[];
  metrics: Record<string, string>;
  usage: JobResourceUsage;
};

export type JobSpec = {
  algoId: string;
  version: string;
  queue: string;
  identifier: string;
  username?: string;
  inputs?: Record<string, string | number | boolean>;
};

export const isTerminalStatus = (status: JobStatus): boolean => terminalJobStatuses.has(status);

export const isPendingStatus = (status: string): boolean => {
  const normalized = status.toLowerCase();
  return normalized === "accepted" || normalized === "running";
};

export const normalizeJobStatus = (raw: string): JobStatus | undefined => {
  const wanted = raw.trim().toLowerCase();
  return jobStatuses.find((status) => status.toLowerCase() === wanted);
};

export type SubmissionAck = {
  status: SubmissionStatus;
  httpStatusCode: number;
  jobId: string;
  details?: string;
};

export const createJobFromAck = (ack: SubmissionAck): DpsJob => {
  const job: DpsJob = {
    id: ack.jobId,
    status: ack.status === "success" ? "Accepted" : "Failed",
    submission: ack.status,
    responseCode: ack.httpStatusCode,
    outputs: [],
    traceback: [],
    metrics: {},
    usage: {}
  };
  if (ack.details != null) {
    job.errorDetails = ack.details;
  }
  return job;
};

// A job attached by id starts from the service's initial state until its first refresh.
export const createAttachedJob = (jobId: string): DpsJob => ({
  id: jobId,
  status: "Accepted",
  submission: "success",
  responseCode: 200,
  outputs: [],
  traceback: [],
  metrics: {},
  usage: {}
});
