import { TransportError } from "../../core/errors";
import { wrapTransportFailure } from "../../core/responseError";
import type { Transport, TransportRequest, TransportResponse } from "../../ports/Transport";

export type FetchTransportOptions = {
  accessToken?: string;
  timeoutMs?: number;
};

const buildUrl = (baseUrl: string, req: TransportRequest): URL => {
  const url = new URL(baseUrl);
  const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
  const path = req.path.startsWith("/") ? req.path : `/${req.path}`;
  url.pathname = `${base}${path}`;

  for (const [key, value] of Object.entries(req.query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url;
};

const hasHeader = (headers: Record<string, string>, name: string) =>
  Object.keys(headers).some((key) => key.toLowerCase() === name);

const encodeBody = (body: unknown, headers: Record<string, string>): string | undefined => {
  if (body === undefined) return undefined;
  if (typeof body === "string") return body;
  if (!hasHeader(headers, "content-type")) headers["content-type"] = "application/json";
  return JSON.stringify(body);
};

/**
 * Control-plane transport over Node's native fetch. Every HTTP status is
 * returned to the caller; only a missing response rejects.
 */
export class FetchTransport implements Transport {
  private readonly accessToken: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    options: FetchTransportOptions = {}
  ) {
    this.accessToken = options.accessToken ?? "";
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const url = buildUrl(this.baseUrl, req);
    // query strings may carry filters with user data; keep them out of logs
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const headers: Record<string, string> = { accept: "application/json", ...req.headers };
    if (this.accessToken) headers.authorization = `bearer ${this.accessToken}`;
    const body = encodeBody(req.body, headers);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    req.signal?.addEventListener("abort", onCallerAbort, { once: true });

    let res: Response;
    let text: string;
    try {
      req.signal?.throwIfAborted();
      res = await fetch(url.toString(), {
        method: req.method,
        headers,
        body,
        signal: controller.signal
      });
      text = await res.text();
    } catch (err) {
      const callerAborted = req.signal?.aborted === true;
      const timedOut = controller.signal.aborted && !callerAborted;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.request_failed",
        method: req.method,
        url: safeRequestUrl,
        reason: callerAborted ? "aborted" : timedOut ? "timeout" : "network"
      }));

      if (callerAborted) throw req.signal?.reason;
      if (timedOut) {
        throw new TransportError({
          message: `${req.method} ${req.path} timed out after ${this.timeoutMs}ms`,
          method: req.method,
          path: req.path,
          isTimeout: true,
          cause: err
        });
      }
      throw wrapTransportFailure(err, req);
    } finally {
      clearTimeout(timeout);
      req.signal?.removeEventListener("abort", onCallerAbort);
    }

    const responseHeaders: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    return {
      status: res.status,
      headers: responseHeaders,
      body: text
    };
  }
}
