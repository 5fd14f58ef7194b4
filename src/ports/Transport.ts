export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type TransportRequest = {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

export type TransportResponse = {
  status: number;
  headers: Record<string, string>; // lower-cased names
  body: string;
};

/**
 * Resolves for every HTTP status; rejects only when no response was obtained.
 */
export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
}
