import fs from "node:fs/promises";
import { createGitHubRequestBuiltin } from "../builtins/github-request.js";
import { createGitHubHttpClient } from "../builtins/github-client.js";
import { Engine } from "../engine/engine.js";
import { OpaServerEvaluator } from "../evaluator/opa-server.js";
import type { Builtin, RuleEvaluator } from "../evaluator/types.js";
import { summarizeReports } from "../report/report-builder.js";
import type { Report, ReportSummary } from "../report/types.js";
import { loadInputDocument } from "./input-loader.js";
import { resolvePolicyPaths } from "./runtime-paths.js";

export interface EngineSetupOptions {
  readonly policyPaths?: readonly string[];
  readonly opaUrl?: string;
  readonly githubUrl?: string;
  readonly githubToken?: string;
  readonly log?: (message: string) => void;
}

export interface CheckOptions extends EngineSetupOptions {
  readonly input: string;
  readonly namespaces?: readonly string[];
  readonly out?: string;
}

export interface CheckResult {
  readonly reports: readonly Report[];
  readonly summary: ReportSummary;
  readonly output: string;
}

export interface CommandDependencies<P> {
  readonly evaluator?: RuleEvaluator<P>;
  readonly fetch?: typeof fetch;
}

export async function runCheckCommand<P>(
  options: CheckOptions,
  dependencies: CommandDependencies<P> = {},
): Promise<CheckResult> {
  const input = await loadInputDocument(options.input);
  const engine = await setupEngine(options, dependencies);
  const reports: Report[] = [];
  try {
    const namespaces =
      options.namespaces && options.namespaces.length > 0
        ? options.namespaces
        : engine.namespaces();
    for (const namespace of namespaces) {
      options.log?.(`checking namespace ${namespace}`);
      reports.push(await engine.check(namespace, input));
    }
  } finally {
    await engine.close();
  }

  const summary = summarizeReports(reports);
  const output = JSON.stringify({ summary, reports }, null, 2);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return { reports, summary, output };
}

export async function runNamespacesCommand<P>(
  options: EngineSetupOptions,
  dependencies: CommandDependencies<P> = {},
): Promise<string[]> {
  const engine = await setupEngine(options, dependencies);
  try {
    return engine.namespaces();
  } finally {
    await engine.close();
  }
}

async function setupEngine<P>(
  options: EngineSetupOptions,
  dependencies: CommandDependencies<P>,
): Promise<Engine<unknown>> {
  const policyPaths = await resolvePolicyPaths(options.policyPaths);
  const builtins = buildBuiltins(options, dependencies.fetch);
  if (dependencies.evaluator) {
    return await Engine.load(policyPaths, {
      evaluator: dependencies.evaluator,
      builtins,
      log: options.log,
    });
  }

  return await Engine.load(policyPaths, {
    evaluator: new OpaServerEvaluator({
      url: options.opaUrl,
      fetch: dependencies.fetch,
    }),
    builtins,
    log: options.log,
  });
}

function buildBuiltins(
  options: EngineSetupOptions,
  fetchImpl: typeof fetch | undefined,
): Builtin[] {
  const client = createGitHubHttpClient({
    baseUrl: options.githubUrl,
    token: options.githubToken,
    fetch: fetchImpl,
  });
  return [createGitHubRequestBuiltin(client)];
}
