import { readFileSync } from "fs";

import Handlebars from "handlebars";

import {
  InvalidGeneratorArgumentError,
  TemplateConfigError,
  UnknownGeneratorError,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { collectHelperCalls } from "./calls.js";
import { BUILTIN_HELPERS, splitHelperArguments } from "./helpers.js";

import type { Generator } from "../generators/index.js";
import type { HelperFunction } from "./helpers.js";

type CompileOptions = NonNullable<Parameters<typeof Handlebars.compile>[1]>;
type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

const HELPER_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const log = logger.child("[templates]");

/**
 * Template engine options
 */
export interface EngineOptions {
  /** Drop the newline after a standalone block tag */
  trimBlocks: boolean;
  /** Drop the indentation before a standalone block tag */
  lstripBlocks: boolean;
  /** Helper name -> Handlebars template rendered with `value` and the hash arguments */
  extraFilters: Readonly<Record<string, string>>;
  /** Helper name -> constant value */
  extraGlobals: Readonly<Record<string, unknown>>;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  trimBlocks: true,
  lstripBlocks: true,
  extraFilters: {},
  extraGlobals: {},
};

export interface TemplateEnvironmentOptions {
  /** Session generators, exposed as helpers under their registry names */
  generators?: ReadonlyMap<string, Generator>;
  engine?: Partial<EngineOptions>;
}

/**
 * Data variables (`@name`) visible while rendering
 */
export type TemplateData = Readonly<Record<string, unknown>>;

/**
 * Handlebars environment for one render session.
 *
 * Each instance owns an isolated `Handlebars.create()` runtime with the
 * authoring helpers, one helper per generator and the model's extra filters and
 * globals. Templates run in strict mode: undefined variables throw.
 *
 * @example
 * ```typescript
 * const env = new TemplateEnvironment({ generators });
 * const text = env.render("port: {{random \"int\" min=1 max=9}}", "inline", {});
 * ```
 */
export class TemplateEnvironment {
  private readonly handlebars: typeof Handlebars;
  private readonly compileOptions: CompileOptions;
  private readonly builtinNames: ReadonlySet<string>;

  constructor(options: TemplateEnvironmentOptions = {}) {
    const engine: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS, ...options.engine };

    this.handlebars = Handlebars.create();
    const builtins = new Set(Object.keys(this.handlebars.helpers));

    for (const [name, helper] of Object.entries(BUILTIN_HELPERS)) {
      this.handlebars.registerHelper(name, helper);
      builtins.add(name);
    }

    for (const [name, generator] of options.generators ?? new Map<string, Generator>()) {
      if (builtins.has(name)) {
        throw new TemplateConfigError(`Generator '${name}' collides with a built-in helper`, { name });
      }
      this.handlebars.registerHelper(name, this.generatorHelper(name, generator));
      builtins.add(name);
    }
    this.builtinNames = builtins;

    if (engine.trimBlocks !== engine.lstripBlocks) {
      log.warn(
        "trim_blocks and lstrip_blocks only apply together; standalone block lines are kept verbatim"
      );
    }
    this.compileOptions = {
      strict: true,
      noEscape: true,
      ignoreStandalone: !(engine.trimBlocks && engine.lstripBlocks),
    };

    this.registerExtras(engine);
  }

  /**
   * Names of all registered helpers: built-ins, generators and extras
   */
  get helperNames(): string[] {
    return Object.keys(this.handlebars.helpers).sort();
  }

  /**
   * Whether a helper name is reserved by Handlebars, modelsmith or a generator
   */
  isBuiltin(name: string): boolean {
    return this.builtinNames.has(name);
  }

  /**
   * Check and compile a template.
   *
   * @throws UnknownGeneratorError when the template calls an unregistered helper
   */
  compile(source: string, templateName: string): (namespace: object, data?: TemplateData) => string {
    const program = this.handlebars.parse(source, { ignoreStandalone: this.compileOptions.ignoreStandalone });
    for (const call of collectHelperCalls(program)) {
      if (!Object.hasOwn(this.handlebars.helpers, call.name)) {
        throw new UnknownGeneratorError(call.name, { template: templateName, line: call.line });
      }
    }

    const template = this.handlebars.compile(source, this.templateOptions());
    return (namespace, data = {}) => template(namespace, { data });
  }

  /**
   * Render template text against a namespace
   */
  render(source: string, templateName: string, namespace: object, data: TemplateData = {}): string {
    return this.compile(source, templateName)(namespace, data);
  }

  /**
   * Read a template file and render it
   */
  renderFile(path: string, namespace: object, data: TemplateData = {}): string {
    return this.render(readFileSync(path, "utf-8"), path, namespace, data);
  }

  /**
   * Compile options listing every registered helper as known, so strict mode
   * does not look up parameterless helper calls on the namespace
   */
  private templateOptions(): CompileOptions {
    const knownHelpers = Object.fromEntries(Object.keys(this.handlebars.helpers).map((name) => [name, true]));
    return { ...this.compileOptions, knownHelpers };
  }

  private generatorHelper(name: string, generator: Generator): HelperFunction {
    return (...args) => {
      const { params, hash } = splitHelperArguments(args);
      const [method = generator.defaultMethod, ...rest] = params;
      if (typeof method !== "string") {
        throw new InvalidGeneratorArgumentError(name, String(method), "method", "expected a method name");
      }
      return generator.invoke({ generator: name, method, args: rest, kwargs: hash });
    };
  }

  private registerExtras(engine: EngineOptions): void {
    const filterNames = Object.keys(engine.extraFilters);
    const globalNames = Object.keys(engine.extraGlobals);

    for (const name of [...filterNames, ...globalNames]) {
      if (!HELPER_NAME_PATTERN.test(name)) {
        throw new TemplateConfigError(`Invalid helper name '${name}'`, { name });
      }
      if (this.builtinNames.has(name)) {
        throw new TemplateConfigError(`'${name}' collides with a built-in helper or generator`, { name });
      }
    }
    const both = filterNames.filter((name) => Object.hasOwn(engine.extraGlobals, name));
    if (both.length > 0) {
      throw new TemplateConfigError(`Defined as both filter and global: ${both.join(", ")}`, { names: both });
    }

    for (const [name, value] of Object.entries(engine.extraGlobals)) {
      this.handlebars.registerHelper(name, () => value);
    }

    const filters = Object.entries(engine.extraFilters).map(([name, source]) => {
      let program: hbs.AST.Program;
      try {
        program = this.handlebars.parse(source);
      } catch (error) {
        throw new TemplateConfigError(`Filter '${name}' is not a valid template`, {
          name,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
      let template: CompiledTemplate | undefined;
      const helper: HelperFunction = (...args) => {
        const { params, hash, data } = splitHelperArguments(args);
        template ??= this.handlebars.compile(source, this.templateOptions());
        return template({ ...hash, value: params[0] }, { data });
      };
      this.handlebars.registerHelper(name, helper);
      return { name, program };
    });

    // filters may call each other, so check their helper calls once all are registered
    for (const { name, program } of filters) {
      for (const call of collectHelperCalls(program)) {
        if (!Object.hasOwn(this.handlebars.helpers, call.name)) {
          throw new TemplateConfigError(`Filter '${name}' calls unknown helper '${call.name}'`, {
            name,
            helper: call.name,
          });
        }
      }
    }
  }
}
