import fs from "node:fs/promises";
import path from "node:path";

const IGNORED_DIRECTORIES = new Set([".git", "node_modules"]);

/**
 * Collects every file under `paths` whose name ends in `extension`.
 * Files named explicitly are taken only when they carry the extension.
 */
export async function discoverModuleFiles(
  paths: readonly string[],
  extension: string,
): Promise<string[]> {
  const files: string[] = [];
  const seen = new Set<string>();

  for (const target of paths) {
    const absolute = path.resolve(target);
    const stats = await fs.stat(absolute);
    if (stats.isDirectory()) {
      await walkDirectory(absolute, extension, files, seen);
      continue;
    }
    if (stats.isFile() && absolute.endsWith(extension)) {
      addFile(absolute, files, seen);
    }
  }

  return files;
}

async function walkDirectory(
  directory: string,
  extension: string,
  files: string[],
  seen: Set<string>,
): Promise<void> {
  let entries = await fs.readdir(directory, { withFileTypes: true });
  entries = entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const absolute = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (IGNORED_DIRECTORIES.has(entry.name)) {
        continue;
      }
      await walkDirectory(absolute, extension, files, seen);
      continue;
    }
    if (entry.isFile() && entry.name.endsWith(extension)) {
      addFile(absolute, files, seen);
    }
  }
}

function addFile(file: string, files: string[], seen: Set<string>): void {
  if (seen.has(file)) {
    return;
  }
  seen.add(file);
  files.push(file);
}
