export {
  createGitHubRequestBuiltin,
  githubRequest,
  prepareRequest,
  parsePathParams,
  valueToString,
  GITHUB_REQUEST,
  USER_AGENT,
} from "./github-request.js";
export {
  createGitHubHttpClient,
  DEFAULT_GITHUB_API_URL,
} from "./github-client.js";
export type {
  GitHubResponse,
  HttpClient,
  HttpRequest,
  HttpResponse,
} from "./types.js";
