import type { BackoffPolicy } from "../../shared/retry/backoff";

export type PollerConfig = BackoffPolicy;

export type PollerConfigInput = Partial<PollerConfig>;

export const defaultPollerConfig: PollerConfig = {
  baseDelayMs: 1000,
  maxIntervalMs: 64_000,
  maxTotalMs: 172_800_000
};

export const pollerCaps = {
  baseDelayMs: { min: 1, max: 64_000 },
  maxIntervalMs: { min: 1, max: 64_000 },
  maxTotalMs: { min: 1, max: 172_800_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePollerConfig = (config: PollerConfig): PollerConfig => {
  assertIntegerInRange("baseDelayMs", config.baseDelayMs, pollerCaps.baseDelayMs.min, pollerCaps.baseDelayMs.max);
  assertIntegerInRange("maxIntervalMs", config.maxIntervalMs, pollerCaps.maxIntervalMs.min, pollerCaps.maxIntervalMs.max);
  assertIntegerInRange("maxTotalMs", config.maxTotalMs, pollerCaps.maxTotalMs.min, pollerCaps.maxTotalMs.max);
  return config;
};

export const resolvePollerConfig = (input: PollerConfigInput = {}): PollerConfig =>
  validatePollerConfig({
    baseDelayMs: input.baseDelayMs ?? defaultPollerConfig.baseDelayMs,
    maxIntervalMs: input.maxIntervalMs ?? defaultPollerConfig.maxIntervalMs,
    maxTotalMs: input.maxTotalMs ?? defaultPollerConfig.maxTotalMs
  });
