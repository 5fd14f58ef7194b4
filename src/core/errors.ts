import type { ApiError, Job } from "./jobs/Job";

export type ControlPlaneErrorCode =
  | "transport_failed"
  | "job_not_found"
  | "decode_failed"
  | "job_failed"
  | "poll_timeout"
  | "malformed_async_response";

export class ControlPlaneError extends Error {
  readonly code: ControlPlaneErrorCode;
  readonly cause?: unknown;

  constructor(args: { code: ControlPlaneErrorCode; message: string; cause?: unknown }) {
    super(args.message);
    this.name = "ControlPlaneError";
    this.code = args.code;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type TransportErrorArgs = {
  message: string;
  method: string;
  path: string;
  status?: number;
  apiErrors?: ApiError[];
  isTimeout?: boolean;
  cause?: unknown;
};

/**
 * The HTTP exchange failed outright: no response, or a non-2xx status that
 * carries no job semantics.
 */
export class TransportError extends ControlPlaneError {
  readonly method: string;
  readonly path: string;
  readonly status?: number;
  readonly apiErrors: ApiError[];
  readonly isTimeout: boolean;

  constructor(args: TransportErrorArgs, code: ControlPlaneErrorCode = "transport_failed") {
    super({ code, message: args.message, cause: args.cause });
    this.name = "TransportError";
    this.method = args.method;
    this.path = args.path;
    this.status = args.status;
    this.apiErrors = args.apiErrors ?? [];
    this.isTimeout = args.isTimeout ?? false;
  }
}

export class JobNotFoundError extends TransportError {
  readonly jobId: string;

  constructor(args: { jobId: string; path: string; apiErrors?: ApiError[] }) {
    super(
      {
        message: `job ${args.jobId} not found`,
        method: "GET",
        path: args.path,
        status: 404,
        apiErrors: args.apiErrors
      },
      "job_not_found"
    );
    this.name = "JobNotFoundError";
    this.jobId = args.jobId;
  }
}

export class DecodeError extends ControlPlaneError {
  readonly issue: string;

  constructor(args: { subject: string; issue: string; cause?: unknown }) {
    super({ code: "decode_failed", message: `invalid ${args.subject}: ${args.issue}`, cause: args.cause });
    this.name = "DecodeError";
    this.issue = args.issue;
  }
}

export const formatJobErrors = (job: Job): string => {
  if (job.errors.length === 0) return "no error details available";
  if (job.errors.length === 1) return job.errors[0]?.detail ?? "";

  const lines = job.errors.map((err, index) => `\n  ${index + 1}. ${err.detail}`);
  return `multiple errors:${lines.join("")}`;
};

export class JobFailedError extends ControlPlaneError {
  readonly job: Job;

  constructor(job: Job) {
    super({
      code: "job_failed",
      message: `job ${job.guid} (${job.operation}) failed: ${formatJobErrors(job)}`
    });
    this.name = "JobFailedError";
    this.job = job;
  }
}

const describeReason = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  if (reason === undefined) return "aborted";
  return String(reason);
};

/**
 * The poll deadline or the caller's signal fired before a terminal state was
 * observed. `job` is the last successfully fetched state, when there is one.
 */
export class PollTimeoutError extends ControlPlaneError {
  readonly jobId: string;
  readonly job?: Job;

  constructor(args: { jobId: string; job?: Job; reason: unknown }) {
    const state = args.job ? ` (last state ${args.job.state})` : "";
    super({
      code: "poll_timeout",
      message: `timed out waiting for job ${args.jobId} to complete${state}: ${describeReason(args.reason)}`,
      cause: args.reason
    });
    this.name = "PollTimeoutError";
    this.jobId = args.jobId;
    this.job = args.job;
  }
}

export class MalformedAsyncResponseError extends ControlPlaneError {
  readonly status: number;
  readonly location?: string;

  constructor(args: { status: number; location?: string; reason: string }) {
    super({ code: "malformed_async_response", message: `malformed ${args.status} response: ${args.reason}` });
    this.name = "MalformedAsyncResponseError";
    this.status = args.status;
    this.location = args.location;
  }
}
