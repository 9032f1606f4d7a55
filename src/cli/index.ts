#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { DEFAULT_GITHUB_API_URL } from "../builtins/github-client.js";
import { DEFAULT_OPA_URL } from "../evaluator/opa-server.js";
import { runCheckCommand, runNamespacesCommand } from "./check-command.js";
import { findPackageVersion } from "./package-version.js";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("rulegate")
  .version(toolVersion)
  .option("--verbose", "Trace rule queries on stderr")
  .option(
    "--opa-url <url>",
    "OPA server URL",
    process.env.OPA_URL ?? DEFAULT_OPA_URL,
  )
  .option(
    "--github-url <url>",
    "GitHub API URL used by github.request (not available on an OPA server)",
    process.env.GITHUB_API_URL ?? DEFAULT_GITHUB_API_URL,
  );

program
  .command("check")
  .argument("<input>", "Input document (JSON or YAML)")
  .option("--policy <path...>", "Policy files or directories")
  .option("--namespace <namespace...>", "Namespaces to check (default: all)")
  .option("--out <file>", "Write report to file")
  .action(async (input: string, options) => {
    const globals = program.opts();
    try {
      const result = await runCheckCommand({
        input,
        policyPaths: options.policy,
        namespaces: options.namespace,
        out: options.out,
        opaUrl: globals.opaUrl,
        githubUrl: globals.githubUrl,
        githubToken: process.env.GITHUB_TOKEN,
        log: globals.verbose ? writeTrace : undefined,
      });

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }

      if (result.summary.failures > 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("namespaces")
  .option("--policy <path...>", "Policy files or directories")
  .action(async (options) => {
    const globals = program.opts();
    try {
      const namespaces = await runNamespacesCommand({
        policyPaths: options.policy,
        opaUrl: globals.opaUrl,
        log: globals.verbose ? writeTrace : undefined,
      });
      await writeStdout(namespaces.map((value) => `${value}\n`).join(""));
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

async function loadVersion(): Promise<string> {
  // Sources run from src/cli, the build from dist/src/cli.
  const dir = path.dirname(fileURLToPath(import.meta.url));
  return (await findPackageVersion(dir)) ?? "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function writeTrace(message: string): void {
  process.stderr.write(`${message}\n`);
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}
