export interface HttpRequest {
  readonly method: string;
  /** Path and query string, relative to the API root. */
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly signal?: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  text(): Promise<string>;
}

/**
 * Transport used by `github.request`. Authentication, base URL, timeouts
 * and retries belong to the implementation.
 */
export type HttpClient = (request: HttpRequest) => Promise<HttpResponse>;

export interface GitHubResponse {
  readonly statusCode: number;
  readonly body: unknown;
}
