import type { HttpClient } from "./types.js";

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

export interface GitHubClientOptions {
  readonly baseUrl?: string;
  readonly token?: string;
  readonly fetch?: typeof fetch;
}

export function createGitHubHttpClient(
  options: GitHubClientOptions = {},
): HttpClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_GITHUB_API_URL).replace(
    /\/+$/,
    "",
  );
  const doFetch = options.fetch ?? fetch;

  return async (request) => {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      ...request.headers,
    };
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`;
    }

    const hasBody = request.method !== "GET" && request.method !== "HEAD";
    return await doFetch(`${baseUrl}${request.url}`, {
      method: request.method,
      headers,
      body: hasBody ? request.body : undefined,
      signal: request.signal,
    });
  };
}
