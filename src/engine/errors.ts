export type EngineStage = "load" | "compiler" | "query";

export class EngineError extends Error {
  readonly stage: EngineStage;

  constructor(stage: EngineStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineError";
    this.stage = stage;
  }
}

export class LoadError extends EngineError {
  constructor(detail: string, options?: ErrorOptions) {
    super("load", `load: ${detail}`, options);
    this.name = "LoadError";
  }
}

export class CompileError extends EngineError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super("compiler", `compiler: ${errors.join("; ")}`);
    this.name = "CompileError";
    this.errors = errors;
  }
}

export class QueryError extends EngineError {
  readonly rule: string;
  readonly query: string;

  constructor(rule: string, query: string, options: { cause: unknown }) {
    super("query", `check: query rule: ${rule}: ${describe(options.cause)}`, {
      cause: options.cause,
    });
    this.name = "QueryError";
    this.rule = rule;
    this.query = query;
  }
}

export class BuiltinError extends Error {
  readonly builtin: string;

  constructor(builtin: string, message: string, options?: ErrorOptions) {
    super(`${builtin}: ${message}`, options);
    this.name = "BuiltinError";
    this.builtin = builtin;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
