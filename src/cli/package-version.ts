import fs from "node:fs/promises";
import path from "node:path";
import { isRecord } from "../evaluator/builtin-host.js";

/**
 * Version from the nearest package.json at or above `startDir`, or
 * undefined when none is found or it has no version.
 */
export async function findPackageVersion(
  startDir: string,
): Promise<string | undefined> {
  let dir = path.resolve(startDir);
  for (;;) {
    const raw = await readIfExists(path.join(dir, "package.json"));
    if (raw !== undefined) {
      const json: unknown = JSON.parse(raw);
      return isRecord(json) && typeof json.version === "string"
        ? json.version
        : undefined;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
