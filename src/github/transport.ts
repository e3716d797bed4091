import { Octokit } from "@octokit/rest";
import { isRecord, type ApiResponse, type ApiTransport } from "./types.js";

export type OctokitTransportOptions = {
  baseUrl: string;
  token: string;
  apiVersion: string;
  userAgent?: string;
};

function toHeaders(value: unknown): ApiResponse["headers"] {
  const headers: ApiResponse["headers"] = {};
  if (isRecord(value)) {
    for (const [key, v] of Object.entries(value)) {
      if (typeof v === "string" || typeof v === "number") {
        headers[key.toLowerCase()] = v;
      }
    }
  }
  return headers;
}

// Octokit rejects 4xx/5xx with a RequestError that still carries the response.
function failedResponse(error: unknown): ApiResponse | null {
  if (!(error instanceof Error) || !("response" in error)) {
    return null;
  }
  const response = error.response;
  if (!isRecord(response) || typeof response.status !== "number") {
    return null;
  }
  return {
    url: typeof response.url === "string" ? response.url : "",
    status: response.status,
    headers: toHeaders(response.headers),
    data: response.data
  };
}

export function createOctokitTransport(opts: OctokitTransportOptions): ApiTransport {
  const octokit = new Octokit({
    baseUrl: opts.baseUrl,
    userAgent: opts.userAgent ?? "ruleset-admin"
  });
  const headers = {
    accept: "application/vnd.github+json",
    authorization: `Bearer ${opts.token}`,
    "content-type": "application/json",
    "x-github-api-version": opts.apiVersion
  };

  return async (request) => {
    try {
      const response = await octokit.request(`${request.method} ${request.path}`, {
        ...request.query,
        ...(request.body === undefined ? {} : { data: request.body }),
        headers
      });
      return {
        url: response.url,
        status: response.status,
        headers: toHeaders(response.headers),
        data: response.data
      };
    } catch (error) {
      const response = failedResponse(error);
      if (response) {
        return response;
      }
      throw error;
    }
  };
}
