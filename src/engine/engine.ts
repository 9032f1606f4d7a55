import { loadModules } from "../loader/module-loader.js";
import { ReportBuilder } from "../report/report-builder.js";
import type { Report } from "../report/types.js";
import type {
  Builtin,
  EvaluateOptions,
  RuleEvaluator,
  RuleModule,
} from "../evaluator/types.js";
import { CompileError } from "./errors.js";
import { executeRuleQuery } from "./query-executor.js";
import {
  discoverRules,
  indexModule,
  type IndexedModule,
} from "./rule-discovery.js";

export interface EngineOptions<P> {
  readonly evaluator: RuleEvaluator<P>;
  readonly builtins?: readonly Builtin[];
  readonly log?: (message: string) => void;
}

export class Engine<P> {
  private readonly indexed: readonly IndexedModule[];

  private constructor(
    private readonly evaluator: RuleEvaluator<P>,
    private readonly loaded: ReadonlyMap<string, RuleModule>,
    private readonly compiled: P,
    private readonly log?: (message: string) => void,
  ) {
    this.indexed = Array.from(loaded.values(), (module) => indexModule(module));
  }

  static async load<P>(
    paths: readonly string[],
    options: EngineOptions<P>,
  ): Promise<Engine<P>> {
    try {
      const modules = await loadModules(paths, options.evaluator);
      const compiled = await options.evaluator.compile(modules, {
        builtins: options.builtins ?? [],
      });
      if (!compiled.ok) {
        throw new CompileError(compiled.error);
      }
      return new Engine(
        options.evaluator,
        modules,
        compiled.value,
        options.log,
      );
    } catch (error) {
      await options.evaluator.release?.();
      throw error;
    }
  }

  /** Releases the evaluator's resources. The engine is unusable afterwards. */
  async close(): Promise<void> {
    await this.evaluator.release?.();
  }

  /**
   * Namespaces of the loaded modules in first-seen order. Names differing
   * only in case count once.
   */
  namespaces(): string[] {
    const namespaces: string[] = [];
    const seen = new Set<string>();
    for (const { namespace } of this.indexed) {
      const key = namespace.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      namespaces.push(namespace);
    }
    return namespaces;
  }

  modules(): ReadonlyMap<string, RuleModule> {
    return this.loaded;
  }

  program(): P {
    return this.compiled;
  }

  async check(
    namespace: string,
    input: unknown,
    options: EvaluateOptions = {},
  ): Promise<Report> {
    const report = new ReportBuilder(namespace);
    discoverRules(this.indexed, namespace, report);

    for (const rule of report.listRules()) {
      options.signal?.throwIfAborted();
      const result = await executeRuleQuery(
        this.evaluator,
        this.compiled,
        rule,
        input,
        options,
      );
      const verdict = result.passed ? "passed" : "failed";
      this.log?.(`query ${result.query}: ${verdict}`);
      report.addResult(result);
    }

    return report.build();
  }
}
