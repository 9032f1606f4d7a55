import { BuiltinError } from "../engine/errors.js";
import { isRecord } from "../evaluator/builtin-host.js";
import type { Builtin, BuiltinContext } from "../evaluator/types.js";
import type { GitHubResponse, HttpClient } from "./types.js";

export const GITHUB_REQUEST = "github.request";
export const USER_AGENT = "rulegate";

const PATH_PARAM_PATTERN = /\{[a-z]+\}/g;
const QUERY_METHODS = new Set(["GET", "POST"]);
const PLACEHOLDER_ORIGIN = "http://rulegate.invalid";

export interface PreparedRequest {
  readonly method: string;
  readonly url: string;
  readonly body: string;
}

export function createGitHubRequestBuiltin(client: HttpClient): Builtin {
  return {
    name: GITHUB_REQUEST,
    arity: 2,
    memoize: true,
    call: async (args, context) => {
      const [line, data] = args;
      if (typeof line !== "string") {
        throw new BuiltinError(GITHUB_REQUEST, "operand 1 must be a string");
      }
      if (!isRecord(data)) {
        throw new BuiltinError(GITHUB_REQUEST, "operand 2 must be an object");
      }
      return await githubRequest(client, line, data, context);
    },
  };
}

export async function githubRequest(
  client: HttpClient,
  line: string,
  data: Readonly<Record<string, unknown>>,
  context: BuiltinContext = {},
): Promise<GitHubResponse> {
  const prepared = prepareRequest(line, data);

  let status: number;
  let text: string;
  try {
    const response = await client({
      method: prepared.method,
      url: prepared.url,
      headers: {
        "User-Agent": USER_AGENT,
        "Content-Type": "application/json",
      },
      body: prepared.body,
      signal: context.signal,
    });
    status = response.status;
    text = await response.text();
  } catch (error) {
    throw new BuiltinError(
      GITHUB_REQUEST,
      `${prepared.method} ${prepared.url}: ${describe(error)}`,
      { cause: error },
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(text) as unknown;
  } catch (error) {
    throw new BuiltinError(
      GITHUB_REQUEST,
      `decode response of ${prepared.method} ${prepared.url}: ${describe(error)}`,
      { cause: error },
    );
  }

  if (status === 403) {
    const message = isRecord(body) ? body.message : undefined;
    throw new BuiltinError(GITHUB_REQUEST, `forbidden: ${String(message)}`);
  }

  return { statusCode: status, body };
}

/**
 * Resolves a "METHOD /path/{param}" line against data. Path parameters
 * are consumed first; for GET and POST the remaining keys go to the
 * query string, otherwise they form the JSON body.
 */
export function prepareRequest(
  line: string,
  data: Readonly<Record<string, unknown>>,
): PreparedRequest {
  const separator = line.indexOf(" ");
  if (separator < 0) {
    throw new BuiltinError(GITHUB_REQUEST, `malformed request line: ${line}`);
  }

  const method = line.slice(0, separator).toUpperCase();
  let path = line.slice(separator + 1);
  const remaining: Record<string, unknown> = { ...data };

  for (const param of parsePathParams(path)) {
    const value = valueToString(remaining[param]);
    path = path.replace(`{${param}}`, () => value);
    delete remaining[param];
  }

  let url: URL;
  try {
    url = new URL(path, PLACEHOLDER_ORIGIN);
  } catch (error) {
    throw new BuiltinError(GITHUB_REQUEST, `invalid path: ${path}`, {
      cause: error,
    });
  }

  if (QUERY_METHODS.has(method)) {
    for (const [key, value] of Object.entries(remaining)) {
      url.searchParams.append(key, valueToString(value));
      delete remaining[key];
    }
  }
  url.searchParams.sort();

  return {
    method,
    url: `${url.pathname}${url.search}`,
    body: JSON.stringify(remaining),
  };
}

export function parsePathParams(path: string): string[] {
  const matches = path.match(PATH_PARAM_PATTERN) ?? [];
  return matches.map((match) => match.slice(1, -1));
}

export function valueToString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  throw new BuiltinError(
    GITHUB_REQUEST,
    `parse error: can't parse '${String(value)}' to string`,
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
