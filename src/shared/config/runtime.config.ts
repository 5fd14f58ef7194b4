import {
  defaultResolverConfig,
  resolverCaps,
  type ResolverConfig,
  validateResolverConfig
} from "../../application/jobs/resolver.config";

export const runtimeCaps = {
  httpTimeoutMs: { min: 1000, max: 120000 }
} as const;

export type RuntimeConfig = {
  resolverConfig: ResolverConfig;
  httpTimeoutMs: number;
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
  const resolverConfig = validateResolverConfig({
    pollIntervalMs:
      parseOptionalIntInRange(env, "JOB_POLL_INTERVAL_MS", resolverCaps.pollIntervalMs) ??
      defaultResolverConfig.pollIntervalMs,
    pollTimeoutMs:
      parseOptionalIntInRange(env, "JOB_POLL_TIMEOUT_MS", resolverCaps.pollTimeoutMs) ??
      defaultResolverConfig.pollTimeoutMs,
    concurrency:
      parseOptionalIntInRange(env, "JOB_WAIT_CONCURRENCY", resolverCaps.concurrency) ??
      defaultResolverConfig.concurrency
  });

  const httpTimeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.httpTimeoutMs) ?? 30000;

  return { resolverConfig, httpTimeoutMs };
};
