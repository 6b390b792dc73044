export * from "./core/jobs/DpsJob";
export * from "./core/jobs/statusDocument";
export * from "./core/granules/granule.types";
export * from "./core/granules/locationResolver";
export * from "./core/granules/catalogResult";
export * from "./application/jobs/job.errors";
export * from "./application/jobs/jobHandle";
export * from "./application/jobs/jobPoller";
export * from "./application/jobs/poller.config";
export * from "./application/retrieval/retrieval.errors";
export * from "./application/retrieval/retriever";
export * from "./infrastructure/dps/DpsHttpClient";
export * from "./infrastructure/s3/S3ObjectStore";
export * from "./infrastructure/ftp/BasicFtpClient";
export * from "./shared/auth/authContext";
export * from "./shared/config/env";
export * from "./shared/config/runtime.config";
export * from "./shared/http/headers";
export * from "./shared/retry/backoff";
export { createDpsSession, runWaitForJob, type DpsSession } from "./composition/root";
export type { DpsClient, RequestOptions, SubmissionResponse, DismissResponse } from "./ports/DpsClient";
export type { ObjectStore, ObjectRef } from "./ports/ObjectStore";
export type { FtpClient } from "./ports/FtpClient";
