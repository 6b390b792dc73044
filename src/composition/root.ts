import { JobHandle } from "../application/jobs/jobHandle";
import { waitForJobSuccess, type PollSummary } from "../application/jobs/jobPoller";
import { Retriever } from "../application/retrieval/retriever";
import { DpsHttpClient } from "../infrastructure/dps/DpsHttpClient";
import { BasicFtpClient } from "../infrastructure/ftp/BasicFtpClient";
import { S3ObjectStore } from "../infrastructure/s3/S3ObjectStore";
import { detectAuthContext, type AuthContext } from "../shared/auth/authContext";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";
import { buildApiHeaders } from "../shared/http/headers";

export type DpsSession = {
  env: Env;
  runtime: RuntimeConfig;
  authContext: AuthContext;
  client: DpsHttpClient;
  retriever: Retriever;
};

export const createDpsSession = (
  processEnv: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): DpsSession => {
  const env = loadEnv(processEnv);
  const runtime = loadRuntimeConfigFromEnv(processEnv);

  const authContext = detectAuthContext({
    cwd,
    tokenEndpoint: env.DPS_TOKEN_URL,
    relayEndpoint: env.CMR_FILE_URL,
    apiHeaders: buildApiHeaders({
      contentType: "application/json",
      token: env.DPS_API_TOKEN,
      proxyTicket: env.DPS_PROXY_TICKET
    })
  });

  const client = new DpsHttpClient({
    jobUrl: env.DPS_JOB_URL,
    apiToken: env.DPS_API_TOKEN,
    proxyTicket: env.DPS_PROXY_TICKET,
    timeoutMs: runtime.timeoutMs
  });

  const retriever = new Retriever({
    authContext,
    objectStore: S3ObjectStore.forRegion(env.AWS_REGION),
    ftpClient: new BasicFtpClient(runtime.timeoutMs),
    timeoutMs: runtime.timeoutMs
  });

  return { env, runtime, authContext, client, retriever };
};

export const runWaitForJob = async (jobId: string, options: { signal?: AbortSignal } = {}): Promise<PollSummary> => {
  const session = createDpsSession();
  const handle = JobHandle.attach(session.client, jobId);

  const summary = await waitForJobSuccess(handle, { config: session.runtime.pollerConfig, signal: options.signal });
  const job = await handle.retrieveAttributes({ signal: options.signal });
  return { ...summary, job };
};
