import * as core from "@actions/core";
import * as github from "@actions/github";
import { createGitHubHttpClient } from "../src/builtins/github-client.js";
import { createGitHubRequestBuiltin } from "../src/builtins/github-request.js";
import { resolvePolicyPaths } from "../src/cli/runtime-paths.js";
import { Engine } from "../src/engine/engine.js";
import { OpaServerEvaluator } from "../src/evaluator/opa-server.js";
import { summarizeReports } from "../src/report/report-builder.js";
import type { Report } from "../src/report/types.js";

async function run(): Promise<void> {
  const token = process.env.GITHUB_TOKEN ?? core.getInput("github-token");
  if (!token) {
    core.setFailed("Missing GITHUB_TOKEN");
    return;
  }

  const policyPaths = core
    .getInput("policy")
    .split(/[\n,]/)
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  const opaUrl = core.getInput("opa-url") || undefined;

  const octokit = github.getOctokit(token);
  const { owner, repo } = github.context.repo;
  const repository = await octokit.rest.repos.get({ owner, repo });

  const client = createGitHubHttpClient({
    baseUrl: process.env.GITHUB_API_URL,
    token,
  });
  const engine = await Engine.load(await resolvePolicyPaths(policyPaths), {
    evaluator: new OpaServerEvaluator({ url: opaUrl }),
    builtins: [createGitHubRequestBuiltin(client)],
    log: (message) => core.debug(message),
  });

  const reports: Report[] = [];
  try {
    for (const namespace of engine.namespaces()) {
      reports.push(await engine.check(namespace, repository.data));
    }
  } finally {
    await engine.close();
  }

  const summary = summarizeReports(reports);
  core.setOutput("report", JSON.stringify({ summary, reports }));
  core.info(
    `${summary.rules} rules checked: ${summary.passed} passed, ` +
      `${summary.warnings} warnings, ${summary.failures} failures`,
  );

  if (summary.failures > 0) {
    core.setFailed(`${summary.failures} policy failures in ${owner}/${repo}`);
  }
}

run().catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
