import { describe, expect, it } from "vitest";
import { createGitHubHttpClient } from "../../src/builtins/github-client.js";
import {
  createGitHubRequestBuiltin,
  githubRequest,
  prepareRequest,
} from "../../src/builtins/github-request.js";
import type {
  HttpClient,
  HttpRequest,
  HttpResponse,
} from "../../src/builtins/types.js";
import { BuiltinError } from "../../src/engine/errors.js";
import {
  BuiltinCache,
  invokeBuiltin,
} from "../../src/evaluator/builtin-host.js";

function recordingClient(
  status: number,
  body: string,
): { client: HttpClient; requests: HttpRequest[] } {
  const requests: HttpRequest[] = [];
  const client: HttpClient = async (request) => {
    requests.push(request);
    return { status, text: async () => body };
  };
  return { client, requests };
}

describe("prepareRequest", () => {
  it("fills path params and moves the rest to the query for GET", () => {
    const data = { owner: "o", repo: "r", state: "open" };
    const prepared = prepareRequest("GET /repos/{owner}/{repo}/issues", data);

    expect(prepared).toEqual({
      method: "GET",
      url: "/repos/o/r/issues?state=open",
      body: "{}",
    });
    expect(data).toEqual({ owner: "o", repo: "r", state: "open" });
  });

  it("inserts path values literally", () => {
    const prepared = prepareRequest("GET /repos/{owner}/{repo}", {
      owner: "a$&b",
      repo: "x$'y",
    });

    expect(prepared).toEqual({
      method: "GET",
      url: "/repos/a$&b/x$'y",
      body: "{}",
    });
  });

  it("keeps remaining keys in the body for PATCH", () => {
    const prepared = prepareRequest("patch /repos/{owner}/{repo}", {
      owner: "o",
      repo: "r",
      description: "<b>tools</b> & more",
      has_wiki: false,
    });

    expect(prepared).toEqual({
      method: "PATCH",
      url: "/repos/o/r",
      body: '{"description":"<b>tools</b> & more","has_wiki":false}',
    });
  });

  it("sorts query parameters by key and keeps the path query", () => {
    const prepared = prepareRequest("GET /orgs/{org}/repos?type=public", {
      org: "acme",
      sort: "updated",
      per_page: 100,
    });

    expect(prepared.url).toBe(
      "/orgs/acme/repos?per_page=100&sort=updated&type=public",
    );
  });

  it("places POST data in the query string", () => {
    const prepared = prepareRequest("POST /markdown", { text: "hello world" });
    expect(prepared.url).toBe("/markdown?text=hello+world");
    expect(prepared.body).toBe("{}");
  });

  it("accepts numbers as path params", () => {
    const prepared = prepareRequest(
      "GET /repos/{owner}/{repo}/pulls/{number}",
      { owner: "o", repo: "r", number: 42 },
    );
    expect(prepared.url).toBe("/repos/o/r/pulls/42");
  });

  it("rejects a line without a space", () => {
    expect(() => prepareRequest("GET/repos", {})).toThrow(
      "github.request: malformed request line: GET/repos",
    );
  });

  it("rejects missing and unsupported path params", () => {
    expect(() => prepareRequest("GET /repos/{owner}", {})).toThrow(
      "github.request: parse error: can't parse 'undefined' to string",
    );
    expect(() =>
      prepareRequest("GET /repos/{owner}", { owner: true }),
    ).toThrow("github.request: parse error: can't parse 'true' to string");
  });

  it("rejects non-scalar query values", () => {
    expect(() =>
      prepareRequest("GET /user/repos", { visibility: ["all"] }),
    ).toThrowError(BuiltinError);
  });
});

describe("githubRequest", () => {
  it("sends JSON headers and wraps the decoded response", async () => {
    const { client, requests } = recordingClient(200, '[{"number":7}]');

    const response = await githubRequest(
      client,
      "GET /repos/{owner}/{repo}/issues",
      { owner: "o", repo: "r", state: "open" },
    );

    expect(response).toEqual({ statusCode: 200, body: [{ number: 7 }] });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      method: "GET",
      url: "/repos/o/r/issues?state=open",
      body: "{}",
      headers: {
        "User-Agent": "rulegate",
        "Content-Type": "application/json",
      },
    });
  });

  it("returns non-forbidden error statuses as values", async () => {
    const { client } = recordingClient(404, '{"message":"Not Found"}');
    const response = await githubRequest(client, "GET /repos/{owner}", {
      owner: "gone",
    });
    expect(response).toEqual({
      statusCode: 404,
      body: { message: "Not Found" },
    });
  });

  it("turns a 403 into an error", async () => {
    const { client } = recordingClient(403, '{"message":"rate limited"}');
    const request = githubRequest(client, "GET /rate_limit", {});

    await expect(request).rejects.toBeInstanceOf(BuiltinError);
    await expect(request).rejects.toThrow("forbidden: rate limited");
  });

  it("fails on a body that is not JSON", async () => {
    const { client } = recordingClient(200, "<html>maintenance</html>");
    await expect(githubRequest(client, "GET /meta", {})).rejects.toThrow(
      "github.request: decode response of GET /meta",
    );
  });

  it("wraps transport failures", async () => {
    const client: HttpClient = async () => {
      throw new Error("socket hang up");
    };
    await expect(githubRequest(client, "GET /meta", {})).rejects.toThrow(
      "github.request: GET /meta: socket hang up",
    );
  });

  it("passes the abort signal to the client", async () => {
    const { client, requests } = recordingClient(200, "{}");
    const controller = new AbortController();
    await githubRequest(client, "GET /meta", {}, { signal: controller.signal });
    expect(requests[0]?.signal).toBe(controller.signal);
  });
});

describe("github.request builtin", () => {
  it("validates operands", async () => {
    const { client } = recordingClient(200, "{}");
    const builtin = createGitHubRequestBuiltin(client);

    await expect(invokeBuiltin(builtin, [1, {}], {})).rejects.toThrow(
      "github.request: operand 1 must be a string",
    );
    await expect(
      invokeBuiltin(builtin, ["GET /meta", "x"], {}),
    ).rejects.toThrow("github.request: operand 2 must be an object");
    await expect(invokeBuiltin(builtin, ["GET /meta"], {})).rejects.toThrow(
      "github.request: expected 2 arguments, got 1",
    );
  });

  it("memoizes identical calls within one cache", async () => {
    const { client, requests } = recordingClient(200, '{"ok":true}');
    const builtin = createGitHubRequestBuiltin(client);
    const cache = new BuiltinCache();

    const first = await invokeBuiltin(
      builtin,
      ["GET /repos/{owner}/{repo}", { owner: "o", repo: "r" }],
      { cache },
    );
    const second = await invokeBuiltin(
      builtin,
      ["GET /repos/{owner}/{repo}", { repo: "r", owner: "o" }],
      { cache },
    );
    await invokeBuiltin(
      builtin,
      ["GET /repos/{owner}/{repo}", { owner: "o", repo: "other" }],
      { cache },
    );

    expect(first).toEqual({ statusCode: 200, body: { ok: true } });
    expect(second).toBe(first);
    expect(requests).toHaveLength(2);
    expect(cache.size).toBe(2);
  });

  it("calls through without a cache", async () => {
    const { client, requests } = recordingClient(200, "{}");
    const builtin = createGitHubRequestBuiltin(client);
    const args = ["GET /meta", {}];

    await invokeBuiltin(builtin, args, {});
    await invokeBuiltin(builtin, args, {});
    expect(requests).toHaveLength(2);
  });
});

describe("GitHub http client", () => {
  it("resolves the url and adds the token", async () => {
    const calls: { url: string; init: RequestInit | undefined }[] = [];
    const fakeFetch: typeof fetch = async (input, init) => {
      calls.push({ url: String(input), init });
      return new Response('{"login":"octo"}', { status: 200 });
    };
    const client = createGitHubHttpClient({
      baseUrl: "https://github.example.com/api/v3/",
      token: "test-token",
      fetch: fakeFetch,
    });

    const response: HttpResponse = await client({
      method: "GET",
      url: "/user?per_page=1",
      headers: { "User-Agent": "rulegate" },
      body: "{}",
    });

    expect(await response.text()).toBe('{"login":"octo"}');
    expect(calls[0]?.url).toBe(
      "https://github.example.com/api/v3/user?per_page=1",
    );
    expect(calls[0]?.init?.body).toBeUndefined();
    expect(calls[0]?.init?.headers).toEqual({
      Accept: "application/vnd.github+json",
      "User-Agent": "rulegate",
      Authorization: "Bearer test-token",
    });
  });

  it("sends the body for other methods", async () => {
    const bodies: unknown[] = [];
    const fakeFetch: typeof fetch = async (_input, init) => {
      bodies.push(init?.body);
      return new Response("{}", { status: 200 });
    };
    const client = createGitHubHttpClient({ fetch: fakeFetch });

    await client({
      method: "PATCH",
      url: "/repos/o/r",
      headers: {},
      body: '{"has_wiki":false}',
    });
    expect(bodies).toEqual(['{"has_wiki":false}']);
  });
});
