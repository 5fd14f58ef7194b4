import { JobResolver } from "../application/jobs/JobResolver";
import { ControlPlaneOperations } from "../application/operations/ControlPlaneOperations";
import { FetchTransport } from "../infrastructure/http/FetchTransport";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type JobsClient = {
  jobs: JobResolver;
  operations: ControlPlaneOperations;
};

export const createJobsClient = (env: NodeJS.ProcessEnv = process.env): JobsClient => {
  const { CF_API_URL, CF_ACCESS_TOKEN } = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);

  const transport = new FetchTransport(CF_API_URL, {
    accessToken: CF_ACCESS_TOKEN,
    timeoutMs: runtime.httpTimeoutMs
  });

  return {
    jobs: new JobResolver(transport, runtime.resolverConfig),
    operations: new ControlPlaneOperations(transport)
  };
};
