export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type Query = Record<string, string | number>;

export type ApiRequest = {
  method: HttpMethod;
  /** Path relative to the API host, segments already encoded, e.g. "/orgs/acme/repos". */
  path: string;
  query?: Query;
  body?: unknown;
};

export type ApiResponse = {
  url: string;
  status: number;
  headers: Record<string, string | number | undefined>;
  data: unknown;
};

/** Issues one request; resolves with the response whatever its status, rejects only when none arrived. */
export type ApiTransport = (request: ApiRequest) => Promise<ApiResponse>;

export type ApiRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is ApiRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
