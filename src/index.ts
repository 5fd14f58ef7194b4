export * from "./core/errors";
export * from "./core/jobs/Job";
export { decodeJob, decodeJobPayload } from "./core/jobs/decodeJob";
export * from "./core/outcome/Outcome";
export { classifyResponse, extractJobId, noContent, schemaDecoder, type ResourceDecoder } from "./core/outcome/classifyResponse";
export type { HttpMethod, QueryParams, Transport, TransportRequest, TransportResponse } from "./ports/Transport";
export { FetchTransport, type FetchTransportOptions } from "./infrastructure/http/FetchTransport";
export {
  JobResolver,
  type BatchResolution,
  type PollResult,
  type ResolveOptions
} from "./application/jobs/JobResolver";
export { defaultResolverConfig, type ResolverConfig, type ResolverConfigInput } from "./application/jobs/resolver.config";
export { settleOutcome, type Settled } from "./application/jobs/settleOutcome";
export * from "./application/operations/ControlPlaneOperations";
export { createJobsClient, type JobsClient } from "./composition/root";
