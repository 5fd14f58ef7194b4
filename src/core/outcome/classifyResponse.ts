import type { ZodTypeAny, output } from "zod";
import type { TransportResponse } from "../../ports/Transport";
import { decodeWith, parseJsonBody } from "../decode";
import { MalformedAsyncResponseError } from "../errors";
import { failedResponseError, headerValue, isSuccessStatus, type RequestLine } from "../responseError";
import { pending, resolved, type Outcome } from "./Outcome";

const ACCEPTED = 202;
const JOB_PATH = /\/jobs\/([^/]+)\/?$/;

/**
 * Turns the parsed body of a synchronous success into the caller's resource.
 * Receives `undefined` when the response had no body.
 */
export type ResourceDecoder<T> = (payload: unknown) => T;

export const schemaDecoder =
  <S extends ZodTypeAny>(schema: S, subject: string): ResourceDecoder<output<S>> =>
  (payload) =>
    decodeWith(schema, payload, subject);

// For endpoints that answer a synchronous success with 204 and no body.
export const noContent: ResourceDecoder<undefined> = () => undefined;

export const extractJobId = (location: string): string | undefined => {
  try {
    const { pathname } = new URL(location, "http://control-plane.invalid");
    const match = JOB_PATH.exec(pathname);
    return match?.[1] ? decodeURIComponent(match[1]) : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Decides whether a mutating call already finished or left a job behind:
 * - 202 with a Location pointing at `/jobs/{id}` is pending on that job;
 * - any other 2xx is resolved with the decoded body;
 * - 202 without a usable job location is a contract violation.
 */
export const classifyResponse = <T>(
  response: TransportResponse,
  decodeResource: ResourceDecoder<T>,
  request: RequestLine
): Outcome<T> => {
  if (!isSuccessStatus(response.status)) {
    throw failedResponseError(response, request);
  }

  if (response.status === ACCEPTED) {
    const location = headerValue(response.headers, "location");
    if (location === undefined || location.trim() === "") {
      throw new MalformedAsyncResponseError({ status: response.status, reason: "missing Location header" });
    }

    const jobId = extractJobId(location.trim());
    if (jobId === undefined) {
      throw new MalformedAsyncResponseError({
        status: response.status,
        location,
        reason: `Location ${location} does not point at a job`
      });
    }

    return pending(jobId);
  }

  const payload = response.body.trim() === "" ? undefined : parseJsonBody(response.body, "response body");
  return resolved(decodeResource(payload));
};
