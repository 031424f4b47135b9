/**
 * Model Renderer
 *
 * Orchestrates one render session of a model directory into a destination
 * directory: context, then plan, then every plan entry in order.
 */

import { mkdirSync } from "fs";
import { join, resolve } from "path";

import { convertInputs, loadModelConfig, toEngineOptions, toPluginPolicy } from "../config/index.js";
import { DEFAULT_REFERENCE_DATE, createGeneratorRegistry } from "../generators/index.js";
import { ModelsmithError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok } from "../lib/result.js";
import { SeededRandom, resolveSeed } from "../random/index.js";
import { TemplateEnvironment } from "../templates/index.js";

import { ContextResolver } from "./context-resolver.js";
import { PlanResolver } from "./plan-resolver.js";
import { TaskExecutor } from "./tasks.js";

import type { GeneratorFactory, GeneratorRegistry } from "../generators/index.js";
import type { Result } from "../lib/result.js";
import type { Context } from "./context.schema.js";
import type { PlanRoots } from "./plan-resolver.js";
import type { Plan } from "./plan.schema.js";

const log = logger.child("[renderer]");

export type RenderState =
  | "INIT"
  | "CONTEXT_RESOLVED"
  | "PLAN_RESOLVED"
  | "RENDERING"
  | "DONE"
  | "FAILED";

/**
 * File names inside the model root
 */
export interface ModelFiles {
  config: string;
  context: string;
  plan: string;
}

export const DEFAULT_MODEL_FILES: ModelFiles = {
  config: "config.yml",
  context: "context.yml.hbs",
  plan: "templates.yml.hbs",
};

export interface ModelRendererOptions {
  /** Model directory holding the config, context and plan templates */
  modelRoot: string;
  /** Directory the rendered files are written to (created when missing) */
  destinationRoot: string;
  /** Overrides the model config's seed */
  seed?: number;
  /** Overrides the model config's `reference_date` */
  referenceDate?: Date;
  /** Raw input values by name, converted to the types the model declares */
  inputs?: Readonly<Record<string, string>>;
  /** Host generators, added to the selected built-ins */
  generators?: Readonly<Record<string, GeneratorFactory>>;
  /** Registry to select from instead of the built-in generators */
  registry?: GeneratorRegistry;
  files?: Partial<ModelFiles>;
}

export interface RenderOutcome {
  seed: number;
  /** "Now" the generators used for relative dates */
  referenceDate: Date;
  context: Context;
  plan: Plan;
  /** Destination-relative paths of the written files, in write order */
  written: string[];
}

/**
 * Renders a model once.
 *
 * States: `INIT -> CONTEXT_RESOLVED -> PLAN_RESOLVED -> RENDERING -> DONE`; any
 * failure moves to `FAILED`. Files already written stay on disk.
 *
 * @example
 * ```typescript
 * const renderer = new ModelRenderer({ modelRoot: "./model", destinationRoot: "./out", seed: 42 });
 * const result = renderer.render();
 * if (result.success) {
 *   console.log(result.data.written);
 * } else {
 *   console.error(result.error.toJSON());
 * }
 * ```
 */
export class ModelRenderer {
  private currentState: RenderState = "INIT";
  private failedStage: RenderState | undefined;
  private readonly roots: PlanRoots;
  private readonly files: ModelFiles;

  constructor(private readonly options: ModelRendererOptions) {
    this.roots = {
      source: resolve(options.modelRoot),
      destination: resolve(options.destinationRoot),
    };
    this.files = { ...DEFAULT_MODEL_FILES, ...options.files };
  }

  get state(): RenderState {
    return this.currentState;
  }

  /**
   * The state the session failed in, once it is `FAILED`
   */
  get failure(): RenderState | undefined {
    return this.failedStage;
  }

  /**
   * Run the session. A renderer runs once; later calls fail.
   */
  render(): Result<RenderOutcome, ModelsmithError> {
    if (this.currentState !== "INIT") {
      return err(
        new ModelsmithError("Model renderer has already run", "RENDERER_ALREADY_RUN", {
          state: this.currentState,
        })
      );
    }

    try {
      return ok(this.execute());
    } catch (error) {
      this.failedStage = this.currentState;
      this.currentState = "FAILED";
      const failure =
        error instanceof ModelsmithError
          ? error
          : new ModelsmithError(
              error instanceof Error ? error.message : String(error),
              "INTERNAL_ERROR",
              { stage: this.failedStage },
              { cause: error }
            );
      log.error(`Rendering failed in state ${this.failedStage}: ${failure.message}`);
      return err(failure);
    }
  }

  private execute(): RenderOutcome {
    const { modelRoot } = this.options;
    log.debug(`Rendering ${modelRoot} into ${this.roots.destination}`);

    const config = loadModelConfig(join(this.roots.source, this.files.config));
    const seed = resolveSeed(this.options.seed, config.seed);
    log.debug(`Using seed ${seed}`);

    const { values: inputs, unused } = convertInputs(config.inputs, this.options.inputs ?? {});
    for (const name of unused) {
      log.warn(`Input '${name}' is not declared by the model and is ignored`);
    }

    const registry = (this.options.registry ?? createGeneratorRegistry()).select(toPluginPolicy(config.plugin));
    for (const [name, factory] of Object.entries(this.options.generators ?? {})) {
      registry.register(name, factory);
    }
    const referenceDate = this.options.referenceDate ?? config.reference_date ?? DEFAULT_REFERENCE_DATE;
    const generators = registry.instantiate(new SeededRandom(seed), { referenceDate });
    log.debug(`Generators: ${[...generators.keys()].join(", ") || "<none>"}`);

    const environment = new TemplateEnvironment({
      generators,
      engine: toEngineOptions(config.engine),
    });

    const context = new ContextResolver(environment, inputs).resolve(join(this.roots.source, this.files.context));
    this.currentState = "CONTEXT_RESOLVED";

    const plan = new PlanResolver(environment, inputs).resolve(
      join(this.roots.source, this.files.plan),
      context,
      this.roots
    );
    this.currentState = "PLAN_RESOLVED";

    this.currentState = "RENDERING";
    mkdirSync(this.roots.destination, { recursive: true });
    const executor = new TaskExecutor(environment, context, inputs, this.roots);
    for (const entry of plan) {
      executor.runEntry(entry);
    }

    this.currentState = "DONE";
    log.success(`Rendered ${executor.written.length} files into ${this.roots.destination}`);
    return { seed, referenceDate, context, plan, written: [...executor.written] };
  }
}

/**
 * Render a model in one call
 */
export function renderModel(options: ModelRendererOptions): Result<RenderOutcome, ModelsmithError> {
  return new ModelRenderer(options).render();
}
