export type Env = {
  DPS_API_ROOT: string;
  DPS_JOB_URL: string;
  DPS_TOKEN_URL: string;
  CMR_FILE_URL: string;
  CATALOG_HOST: string;
  DPS_API_TOKEN: string;
  DPS_PROXY_TICKET?: string;
  AWS_REGION: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value.replace(/\/+$/, "");
};

const optionalString = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const DPS_API_ROOT = validateHttpUrl(
    "DPS_API_ROOT",
    optionalString(env.DPS_API_ROOT) ?? "https://api.maap-project.org/api"
  );
  const DPS_JOB_URL = validateHttpUrl("DPS_JOB_URL", optionalString(env.DPS_JOB_URL) ?? `${DPS_API_ROOT}/dps/job`);
  const DPS_TOKEN_URL = validateHttpUrl(
    "DPS_TOKEN_URL",
    optionalString(env.DPS_TOKEN_URL) ?? `${DPS_API_ROOT}/members/dps/userAccessToken`
  );
  const CMR_FILE_URL = validateHttpUrl(
    "CMR_FILE_URL",
    optionalString(env.CMR_FILE_URL) ?? `${DPS_API_ROOT}/cmr/granules`
  );
  const CATALOG_HOST = optionalString(env.CATALOG_HOST) ?? "cmr.maap-project.org";
  const DPS_API_TOKEN = optionalString(env.DPS_API_TOKEN) ?? "";
  const AWS_REGION = optionalString(env.AWS_REGION) ?? "us-west-2";

  const loaded: Env = {
    DPS_API_ROOT,
    DPS_JOB_URL,
    DPS_TOKEN_URL,
    CMR_FILE_URL,
    CATALOG_HOST,
    DPS_API_TOKEN,
    AWS_REGION
  };

  const DPS_PROXY_TICKET = optionalString(env.DPS_PROXY_TICKET);
  if (DPS_PROXY_TICKET) loaded.DPS_PROXY_TICKET = DPS_PROXY_TICKET;

  return loaded;
};
