import { BuiltinError } from "../engine/errors.js";
import type { Builtin, BuiltinContext } from "./types.js";

/**
 * Calls of memoizable builtins made during one evaluation. Create one per
 * query and drop it afterwards.
 */
export class BuiltinCache {
  private readonly entries = new Map<string, Promise<unknown>>();

  get size(): number {
    return this.entries.size;
  }

  resolve(key: string, call: () => Promise<unknown>): Promise<unknown> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    const pending = call();
    this.entries.set(key, pending);
    return pending;
  }
}

export async function invokeBuiltin(
  builtin: Builtin,
  args: readonly unknown[],
  context: BuiltinContext & { readonly cache?: BuiltinCache },
): Promise<unknown> {
  if (args.length !== builtin.arity) {
    throw new BuiltinError(
      builtin.name,
      `expected ${builtin.arity} arguments, got ${args.length}`,
    );
  }

  const call = () => builtin.call(args, { signal: context.signal });
  if (!builtin.memoize || !context.cache) {
    return await call();
  }
  return await context.cache.resolve(
    `${builtin.name}:${canonicalKey(args)}`,
    call,
  );
}

export function findBuiltin(
  builtins: readonly Builtin[],
  name: string,
): Builtin | undefined {
  return builtins.find((builtin) => builtin.name === name);
}

/**
 * JSON encoding with object keys sorted at every level, so that equal
 * values produce equal keys whatever their insertion order.
 */
export function canonicalKey(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalKey(item)).join(",")}]`;
  }
  if (isRecord(value)) {
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
