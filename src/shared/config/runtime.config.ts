import {
  defaultPollerConfig,
  pollerCaps,
  type PollerConfig,
  validatePollerConfig
} from "../../application/jobs/poller.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 300_000 },
  maxTotalSeconds: { min: 1, max: pollerCaps.maxTotalMs.max / 1000 }
} as const;

export type RuntimeConfig = {
  pollerConfig: PollerConfig;
  timeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const maxTotalSeconds = parseOptionalIntInRange(env, "POLL_MAX_TOTAL_SECONDS", runtimeCaps.maxTotalSeconds);

  const pollerConfig = validatePollerConfig({
    baseDelayMs: parseOptionalIntInRange(env, "POLL_BASE_DELAY_MS", pollerCaps.baseDelayMs) ?? defaultPollerConfig.baseDelayMs,
    maxIntervalMs:
      parseOptionalIntInRange(env, "POLL_MAX_INTERVAL_MS", pollerCaps.maxIntervalMs) ?? defaultPollerConfig.maxIntervalMs,
    maxTotalMs: maxTotalSeconds != null ? maxTotalSeconds * 1000 : defaultPollerConfig.maxTotalMs
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "DPS_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 30_000;

  return { pollerConfig, timeoutMs };
};
