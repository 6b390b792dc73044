import fs from "fs";
import path from "path";
import { hasCallerCredentials, type RequestHeaders } from "../http/headers";

export type AuthContext =
  | { kind: "unauthenticated" }
  | { kind: "job_runtime_token"; machineToken: string; jobId: string; tokenEndpoint: string }
  | { kind: "proxy_delegate"; apiHeaders: RequestHeaders; relayEndpoint: string };

// Written into the working directory of every job the batch system runs.
export const jobSentinelFiles = {
  jobDescriptor: "_job.json",
  machineToken: "_maap_dps_token.txt"
} as const;

export type AuthContextSources = {
  cwd: string;
  tokenEndpoint: string;
  relayEndpoint: string;
  apiHeaders: RequestHeaders;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readJobIdFromDescriptor = (contents: string): string => {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch {
    throw new Error(`${jobSentinelFiles.jobDescriptor} is not valid JSON`);
  }

  const jobInfo = isRecord(json) ? json.job_info : undefined;
  const payload = isRecord(jobInfo) ? jobInfo.job_payload : undefined;
  const taskId = isRecord(payload) ? payload.payload_task_id : undefined;
  if (typeof taskId !== "string" || taskId.trim() === "") {
    throw new Error(`${jobSentinelFiles.jobDescriptor} has no job_info.job_payload.payload_task_id`);
  }
  return taskId.trim();
};

/**
 * Decides once, at startup, how a 401 from a data archive is escalated:
 * inside a running job both sentinel files exist and the job's machine token is
 * exchanged for archive tokens; elsewhere the caller's own API credentials are
 * relayed through the platform.
 */
export const detectAuthContext = (sources: AuthContextSources): AuthContext => {
  const descriptorPath = path.join(sources.cwd, jobSentinelFiles.jobDescriptor);
  const tokenPath = path.join(sources.cwd, jobSentinelFiles.machineToken);

  if (fs.existsSync(descriptorPath) && fs.existsSync(tokenPath)) {
    return {
      kind: "job_runtime_token",
      machineToken: fs.readFileSync(tokenPath, "utf8").replace(/\r?\n/g, ""),
      jobId: readJobIdFromDescriptor(fs.readFileSync(descriptorPath, "utf8")),
      tokenEndpoint: sources.tokenEndpoint
    };
  }

  if (hasCallerCredentials(sources.apiHeaders)) {
    return { kind: "proxy_delegate", apiHeaders: sources.apiHeaders, relayEndpoint: sources.relayEndpoint };
  }

  return { kind: "unauthenticated" };
};
