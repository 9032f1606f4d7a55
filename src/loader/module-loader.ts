import fs from "node:fs/promises";
import { LoadError } from "../engine/errors.js";
import type { RuleEvaluator, RuleModule } from "../evaluator/types.js";
import { discoverModuleFiles } from "./module-discovery.js";

export async function loadModules<P>(
  paths: readonly string[],
  evaluator: RuleEvaluator<P>,
): Promise<Map<string, RuleModule>> {
  let files: string[];
  try {
    files = await discoverModuleFiles(paths, evaluator.moduleExtension);
  } catch (error) {
    throw new LoadError(describe(error), { cause: error });
  }

  if (files.length === 0) {
    throw new LoadError(`no policies found in [${paths.join(", ")}]`);
  }

  const modules = new Map<string, RuleModule>();
  for (const file of files) {
    modules.set(file, await loadModule(file, evaluator));
  }
  return modules;
}

async function loadModule<P>(
  file: string,
  evaluator: RuleEvaluator<P>,
): Promise<RuleModule> {
  try {
    const source = await fs.readFile(file, "utf8");
    return await evaluator.parse(file, source);
  } catch (error) {
    throw new LoadError(`${file}: ${describe(error)}`, { cause: error });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
