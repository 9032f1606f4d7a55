export type AnnotationScope = "rule" | "package" | "document" | "subpackages";

export interface Annotation {
  readonly scope: AnnotationScope;
  readonly targetPath: string;
  readonly title?: string;
  readonly description?: string;
  readonly custom?: Readonly<Record<string, unknown>>;
}

export interface ModuleRule {
  readonly name: string;
  readonly path: string;
}

export interface RuleModule {
  readonly file: string;
  readonly packagePath: string;
  readonly source: string;
  readonly rules: readonly ModuleRule[];
  readonly annotations: readonly Annotation[];
}

export type Outcome<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface BuiltinContext {
  readonly signal?: AbortSignal;
}

/**
 * A host function callable from rule bodies.
 */
export interface Builtin {
  readonly name: string;
  readonly arity: number;
  /** Identical arguments within one evaluation may share a single call. */
  readonly memoize: boolean;
  readonly call: (
    args: readonly unknown[],
    context: BuiltinContext,
  ) => Promise<unknown>;
}

export interface CompileOptions {
  readonly builtins: readonly Builtin[];
}

export interface EvaluateOptions {
  readonly signal?: AbortSignal;
}

export type ResultSet = readonly unknown[];

/**
 * The rule language runtime. rulegate never parses or evaluates rules
 * itself; everything goes through this interface.
 */
export interface RuleEvaluator<P> {
  readonly moduleExtension: string;
  parse(file: string, source: string): Promise<RuleModule>;
  compile(
    modules: ReadonlyMap<string, RuleModule>,
    options: CompileOptions,
  ): Promise<Outcome<P, readonly string[]>>;
  evaluate(
    program: P,
    query: string,
    input: unknown,
    options?: EvaluateOptions,
  ): Promise<ResultSet>;
  /** Drops whatever `parse` and `compile` left behind on the evaluator. */
  release?(): Promise<void>;
}
