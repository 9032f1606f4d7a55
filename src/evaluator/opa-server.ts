import crypto from "node:crypto";
import path from "node:path";
import { isRecord } from "./builtin-host.js";
import type {
  Annotation,
  AnnotationScope,
  CompileOptions,
  EvaluateOptions,
  ModuleRule,
  Outcome,
  ResultSet,
  RuleEvaluator,
  RuleModule,
} from "./types.js";

export const DEFAULT_OPA_URL = "http://localhost:8181";
export const REGO_EXTENSION = ".rego";

const ANNOTATION_SCOPES = new Set<string>([
  "rule",
  "package",
  "document",
  "subpackages",
]);

export interface OpaServerOptions {
  readonly url?: string;
  readonly fetch?: typeof fetch;
  /** Policy ids are derived from file paths relative to this directory. */
  readonly rootDir?: string;
  /** Leading policy id segment; a random one per evaluator by default. */
  readonly runId?: string;
}

export interface OpaProgram {
  readonly url: string;
  readonly policyIds: readonly string[];
}

interface RuleLocation {
  readonly rule: ModuleRule;
  readonly row: number;
}

/**
 * Evaluates rules on an Open Policy Agent server through its REST API.
 * Modules are uploaded when parsed, under ids scoped to this evaluator,
 * and deleted by `release`. Host builtins cannot be registered on a
 * remote server, so modules calling one fail to compile.
 */
export class OpaServerEvaluator implements RuleEvaluator<OpaProgram> {
  readonly moduleExtension = REGO_EXTENSION;
  private readonly url: string;
  private readonly doFetch: typeof fetch;
  private readonly rootDir: string;
  private readonly runId: string;
  private readonly policyIds = new Map<string, string>();

  constructor(options: OpaServerOptions = {}) {
    this.url = (options.url ?? DEFAULT_OPA_URL).replace(/\/+$/, "");
    this.doFetch = options.fetch ?? fetch;
    this.rootDir = options.rootDir ?? process.cwd();
    this.runId = options.runId ?? `rulegate-${crypto.randomUUID()}`;
  }

  async parse(file: string, source: string): Promise<RuleModule> {
    const id = this.policyIdFor(file);
    const endpoint = this.policyEndpoint(id);

    const upload = await this.doFetch(endpoint, {
      method: "PUT",
      headers: { "Content-Type": "text/plain" },
      body: source,
    });
    if (!upload.ok) {
      throw new Error(await readServerError(upload));
    }
    this.policyIds.set(file, id);

    const response = await this.doFetch(endpoint);
    if (!response.ok) {
      throw new Error(await readServerError(response));
    }
    const payload: unknown = await response.json();
    const ast =
      isRecord(payload) && isRecord(payload.result)
        ? payload.result.ast
        : undefined;
    if (!isRecord(ast)) {
      throw new Error(`policy ${id} has no AST in server response`);
    }

    return moduleFromAst(file, source, ast);
  }

  async compile(
    modules: ReadonlyMap<string, RuleModule>,
    options: CompileOptions,
  ): Promise<Outcome<OpaProgram, readonly string[]>> {
    const errors: string[] = [];
    const policyIds: string[] = [];

    for (const [file, module] of modules) {
      for (const builtin of options.builtins) {
        if (callsFunction(module.source, builtin.name)) {
          errors.push(
            `${file}: builtin ${builtin.name} is not available on an OPA server`,
          );
        }
      }
      const id = this.policyIds.get(file);
      if (!id) {
        errors.push(`${file}: module was not uploaded`);
        continue;
      }
      policyIds.push(id);
    }

    if (errors.length > 0) {
      return { ok: false, error: errors };
    }
    return { ok: true, value: { url: this.url, policyIds } };
  }

  async evaluate(
    program: OpaProgram,
    query: string,
    input: unknown,
    options: EvaluateOptions = {},
  ): Promise<ResultSet> {
    const response = await this.doFetch(`${program.url}/v1/query`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ query, input }),
      signal: options.signal,
    });
    if (!response.ok) {
      throw new Error(await readServerError(response));
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload) || payload.result === undefined) {
      return [];
    }
    if (!Array.isArray(payload.result)) {
      throw new Error(`query ${query}: unexpected result shape`);
    }
    return payload.result;
  }

  async release(): Promise<void> {
    const failures: string[] = [];
    for (const [file, id] of Array.from(this.policyIds)) {
      const response = await this.doFetch(this.policyEndpoint(id), {
        method: "DELETE",
      });
      if (response.ok || response.status === 404) {
        this.policyIds.delete(file);
        continue;
      }
      failures.push(`${id}: ${await readServerError(response)}`);
    }
    if (failures.length > 0) {
      throw new Error(`failed to delete policies: ${failures.join("; ")}`);
    }
  }

  private policyEndpoint(id: string): string {
    return `${this.url}/v1/policies/${encodeURI(id)}`;
  }

  private policyIdFor(file: string): string {
    const relative = path
      .relative(this.rootDir, path.resolve(file))
      .split(path.sep)
      .join(path.posix.sep)
      .replace(/^(\.\.\/)+/, "")
      .replace(/[^A-Za-z0-9_./-]/g, "_");
    return `${this.runId}/${relative}`;
  }
}

export function moduleFromAst(
  file: string,
  source: string,
  ast: Record<string, unknown>,
): RuleModule {
  const packagePath = packagePathOf(ast.package);
  const locations: RuleLocation[] = [];
  const rules: ModuleRule[] = [];

  for (const entry of asArray(ast.rules)) {
    if (!isRecord(entry)) {
      continue;
    }
    const name = ruleNameOf(entry.head);
    if (!name) {
      continue;
    }
    const rule = { name, path: `${packagePath}.${name}` };
    rules.push(rule);
    const row = rowOf(entry.location);
    if (row !== undefined) {
      locations.push({ rule, row });
    }
  }

  const annotations: Annotation[] = [];
  for (const entry of asArray(ast.annotations)) {
    if (!isRecord(entry) || typeof entry.scope !== "string") {
      continue;
    }
    if (!isAnnotationScope(entry.scope)) {
      continue;
    }
    annotations.push({
      scope: entry.scope,
      targetPath:
        entry.scope === "rule"
          ? (ruleAfter(locations, rowOf(entry.location)) ?? "")
          : packagePath,
      title: typeof entry.title === "string" ? entry.title : undefined,
      description:
        typeof entry.description === "string" ? entry.description : undefined,
      custom: isRecord(entry.custom) ? entry.custom : undefined,
    });
  }

  return { file, packagePath, source, rules, annotations };
}

function packagePathOf(pkg: unknown): string {
  if (!isRecord(pkg)) {
    throw new Error("module AST has no package");
  }
  const segments = asArray(pkg.path).map((term) =>
    isRecord(term) ? String(term.value) : String(term),
  );
  if (segments.length === 0) {
    throw new Error("module AST has an empty package path");
  }
  return segments.join(".");
}

function ruleNameOf(head: unknown): string | undefined {
  if (!isRecord(head)) {
    return undefined;
  }
  if (typeof head.name === "string" && head.name) {
    return head.name;
  }
  const [first] = asArray(head.ref);
  if (isRecord(first) && typeof first.value === "string") {
    return first.value;
  }
  return undefined;
}

function ruleAfter(
  locations: readonly RuleLocation[],
  row: number | undefined,
): string | undefined {
  if (row === undefined) {
    return undefined;
  }
  let best: RuleLocation | undefined;
  for (const location of locations) {
    if (location.row <= row) {
      continue;
    }
    if (!best || location.row < best.row) {
      best = location;
    }
  }
  return best?.rule.path;
}

/** True when `name(` appears as a call outside comments and strings. */
export function callsFunction(source: string, name: string): boolean {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`(?<![\\w.])${escaped}\\s*\\(`);
  return source.split("\n").some((line) => pattern.test(codeOf(line)));
}

function codeOf(line: string): string {
  let code = "";
  let quote: string | undefined;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index] ?? "";
    if (quote) {
      if (char === "\\" && quote === '"') {
        index += 1;
      } else if (char === quote) {
        quote = undefined;
      }
      continue;
    }
    if (char === "#") {
      break;
    }
    if (char === '"' || char === "`") {
      quote = char;
      continue;
    }
    code += char;
  }
  return code;
}

function rowOf(location: unknown): number | undefined {
  if (isRecord(location) && typeof location.row === "number") {
    return location.row;
  }
  return undefined;
}

function isAnnotationScope(value: string): value is AnnotationScope {
  return ANNOTATION_SCOPES.has(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

async function readServerError(response: Response): Promise<string> {
  const text = await response.text();
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return `opa server responded ${response.status}: ${text}`;
  }
  if (!isRecord(payload)) {
    return `opa server responded ${response.status}`;
  }
  const details = asArray(payload.errors)
    .map((error) => (isRecord(error) ? String(error.message) : String(error)))
    .filter((message) => message.length > 0);
  const message =
    typeof payload.message === "string" ? payload.message : "request failed";
  return details.length > 0 ? `${message}: ${details.join("; ")}` : message;
}
