import { JobFailedError, JobNotFoundError, PollTimeoutError, TransportError } from "../../core/errors";
import { decodeJob, extractApiErrors } from "../../core/jobs/decodeJob";
import { isTerminalJobState, JobStates, type Job } from "../../core/jobs/Job";
import { failedResponseError, isSuccessStatus, wrapTransportFailure } from "../../core/responseError";
import type { Transport, TransportResponse } from "../../ports/Transport";
import { createLimiter } from "../../shared/concurrency/limiter";
import { createDeadline } from "../../shared/time/deadline";
import { sleep } from "../../shared/time/sleep";
import { resolveResolverConfig, type ResolverConfig, type ResolverConfigInput } from "./resolver.config";

export type ResolveOptions = {
  signal?: AbortSignal;
};

/**
 * Outcome of one polling session. Every variant carries the last job state
 * that was observed, including the failure ones.
 */
export type PollResult =
  | { outcome: "complete"; job: Job }
  | { outcome: "failed"; job: Job; error: JobFailedError }
  | { outcome: "timeout"; job: Job; error: PollTimeoutError };

export type BatchResolution =
  | { jobId: string; status: "settled"; result: PollResult }
  | { jobId: string; status: "errored"; error: unknown };

const assertJobId = (jobId: string) => {
  if (typeof jobId !== "string" || jobId.trim() === "") {
    throw new Error("jobId must be a non-empty string");
  }
};

// Only failures raised by the abort itself count as a timeout.
const isAbortFailure = (err: unknown, signal: AbortSignal): boolean =>
  signal.aborted && (err === signal.reason || (err instanceof TransportError && err.cause === signal.reason));

export const jobPath = (jobId: string): string => `/v3/jobs/${encodeURIComponent(jobId)}`;

export class JobResolver {
  readonly config: ResolverConfig;

  constructor(
    private readonly transport: Transport,
    config: ResolverConfigInput = {}
  ) {
    this.config = resolveResolverConfig(config);
  }

  /**
   * Reads the current state of a job once.
   */
  async fetch(jobId: string, options: ResolveOptions = {}): Promise<Job> {
    assertJobId(jobId);
    const request = { method: "GET" as const, path: jobPath(jobId) };

    let response: TransportResponse;
    try {
      response = await this.transport.request({ ...request, signal: options.signal });
    } catch (err) {
      throw wrapTransportFailure(err, request);
    }

    if (response.status === 404) {
      throw new JobNotFoundError({ jobId, path: request.path, apiErrors: extractApiErrors(response.body) });
    }
    if (!isSuccessStatus(response.status)) {
      throw failedResponseError(response, request);
    }

    return decodeJob(response.body);
  }

  /**
   * Polls a job until it is COMPLETE or FAILED, the poll timeout elapses, or
   * `options.signal` aborts. Transport and decode failures reject; a deadline
   * hit before any successful read rejects with `PollTimeoutError`.
   */
  async resolve(jobId: string, options: ResolveOptions = {}): Promise<PollResult> {
    assertJobId(jobId);
    const startedAt = Date.now();
    const deadline = createDeadline(this.config.pollTimeoutMs, options.signal);
    let attempts = 0;
    let last: Job | undefined;

    try {
      for (;;) {
        if (attempts > 0) await sleep(this.config.pollIntervalMs, deadline.signal);
        deadline.signal.throwIfAborted();

        attempts += 1;
        const current = await this.fetch(jobId, { signal: deadline.signal });
        last = current;

        if (isTerminalJobState(current.state)) {
          return this.settle(current, attempts, startedAt);
        }
      }
    } catch (err) {
      if (!isAbortFailure(err, deadline.signal)) throw err;

      const error = new PollTimeoutError({ jobId, job: last, reason: deadline.signal.reason });
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "job.poll_timeout",
        jobId,
        operation: last?.operation ?? null,
        state: last?.state ?? null,
        attempts,
        elapsedMs: Date.now() - startedAt
      }));
      if (!last) throw error;
      return { outcome: "timeout", job: last, error };
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Like `resolve`, but returns the job only when it completed and throws the
   * `JobFailedError` / `PollTimeoutError` otherwise.
   */
  async waitForJob(jobId: string, options: ResolveOptions = {}): Promise<Job> {
    const result = await this.resolve(jobId, options);
    if (result.outcome === "complete") return result.job;
    throw result.error;
  }

  /**
   * Resolves several jobs with at most `config.concurrency` polling loops in
   * flight. One entry per id, in input order; a failing loop does not stop
   * the others.
   */
  async resolveAll(jobIds: string[], options: ResolveOptions = {}): Promise<BatchResolution[]> {
    const limit = createLimiter(this.config.concurrency);

    return Promise.all(
      jobIds.map(async (jobId): Promise<BatchResolution> => {
        try {
          const result = await limit(() => this.resolve(jobId, options), options.signal);
          return { jobId, status: "settled", result };
        } catch (error) {
          return { jobId, status: "errored", error };
        }
      })
    );
  }

  private settle(job: Job, attempts: number, startedAt: number): PollResult {
    if (job.state !== JobStates.failed) {
      return { outcome: "complete", job };
    }

    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "job.failed",
      jobId: job.guid,
      operation: job.operation,
      errorCount: job.errors.length,
      attempts,
      elapsedMs: Date.now() - startedAt
    }));
    return { outcome: "failed", job, error: new JobFailedError(job) };
  }
}
