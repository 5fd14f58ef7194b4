export type ResolverConfig = {
  pollIntervalMs: number;
  pollTimeoutMs: number;
  concurrency: number;
};

export type ResolverConfigInput = Partial<ResolverConfig>;

export const defaultResolverConfig: ResolverConfig = {
  pollIntervalMs: 2000,
  pollTimeoutMs: 5 * 60 * 1000,
  concurrency: 3
};

export const resolverCaps = {
  pollIntervalMs: { min: 1, max: 60000 },
  pollTimeoutMs: { min: 1, max: 60 * 60 * 1000 },
  concurrency: { min: 1, max: 50 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateResolverConfig = (config: ResolverConfig): ResolverConfig => {
  const { pollIntervalMs, pollTimeoutMs, concurrency } = resolverCaps;
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, pollIntervalMs.min, pollIntervalMs.max);
  assertIntegerInRange("pollTimeoutMs", config.pollTimeoutMs, pollTimeoutMs.min, pollTimeoutMs.max);
  assertIntegerInRange("concurrency", config.concurrency, concurrency.min, concurrency.max);
  return config;
};

export const resolveResolverConfig = (input: ResolverConfigInput = {}): ResolverConfig =>
  validateResolverConfig({
    pollIntervalMs: input.pollIntervalMs ?? defaultResolverConfig.pollIntervalMs,
    pollTimeoutMs: input.pollTimeoutMs ?? defaultResolverConfig.pollTimeoutMs,
    concurrency: input.concurrency ?? defaultResolverConfig.concurrency
  });
