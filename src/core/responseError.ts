import type { TransportRequest, TransportResponse } from "../ports/Transport";
import { TransportError } from "./errors";
import { extractApiErrors } from "./jobs/decodeJob";

export type RequestLine = Pick<TransportRequest, "method" | "path">;

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

export const headerValue = (headers: Record<string, string>, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
};

/**
 * Builds the error for a non-2xx response. The body is only mined for the
 * control plane's error envelope and is never copied into the message.
 */
export const failedResponseError = (response: TransportResponse, request: RequestLine): TransportError => {
  const apiErrors = extractApiErrors(response.body);
  const first = apiErrors[0];
  const suffix = first ? ` ${first.title}: ${first.detail} (code: ${first.code})` : "";
  return new TransportError({
    message: `${request.method} ${request.path} failed: ${response.status}${suffix}`,
    method: request.method,
    path: request.path,
    status: response.status,
    apiErrors
  });
};

export const wrapTransportFailure = (reason: unknown, request: RequestLine): TransportError => {
  if (reason instanceof TransportError) return reason;
  const message = reason instanceof Error ? reason.message : String(reason);
  return new TransportError({
    message: `${request.method} ${request.path} failed: ${message}`,
    method: request.method,
    path: request.path,
    cause: reason
  });
};
