import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";

const JSON_EXTENSIONS = new Set([".json"]);

/**
 * Reads the document rules are checked against. JSON files are parsed as
 * JSON; anything else goes through the YAML loader.
 */
export async function loadInputDocument(inputPath: string): Promise<unknown> {
  const raw = await fs.readFile(inputPath, "utf8");
  const extension = path.extname(inputPath).toLowerCase();

  try {
    if (JSON_EXTENSIONS.has(extension)) {
      return JSON.parse(raw) as unknown;
    }
    return yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid input document ${inputPath}: ${message}`, {
      cause: error,
    });
  }
}
