import fs from "node:fs/promises";
import path from "node:path";

const DEFAULT_POLICY_DIRECTORIES = ["policy", path.join(".github", "policy")];

export async function resolvePolicyPaths(
  customPaths?: readonly string[],
  cwd: string = process.cwd(),
): Promise<string[]> {
  if (customPaths && customPaths.length > 0) {
    return customPaths.map((value) => path.resolve(cwd, value));
  }

  for (const directory of DEFAULT_POLICY_DIRECTORIES) {
    const candidate = path.resolve(cwd, directory);
    if (await existsDirectory(candidate)) {
      return [candidate];
    }
  }

  throw new Error(
    "Unable to find a policy directory. Pass --policy <path> to choose one.",
  );
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
