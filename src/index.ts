/**
 * Modelsmith - render template specific models from seeded, template independent models
 *
 * @packageDocumentation
 */

// Rendering pipeline
export {
  ModelRenderer,
  renderModel,
  DEFAULT_MODEL_FILES,
  ContextResolver,
  PlanResolver,
  TaskExecutor,
  validatePlanPaths,
  isWithin,
  resolveWithin,
  ContextSchema,
  ContextValueSchema,
  PlanSchema,
  PlanEntrySchema,
} from "./model/index.js";

export type {
  ModelRendererOptions,
  ModelFiles,
  RenderOutcome,
  RenderState,
  RenderTask,
  RenderTaskKind,
  PlanRoots,
  Context,
  ContextValue,
  Plan,
  PlanEntry,
  FileEntry,
  DirEntry,
} from "./model/index.js";

// Generators
export {
  GeneratorRegistry,
  createGeneratorRegistry,
  BUILTIN_GENERATORS,
  DEFAULT_REFERENCE_DATE,
  MethodTableGenerator,
  defineMethod,
  UniformGenerator,
  FakeDataGenerator,
  NumericArrayGenerator,
} from "./generators/index.js";

export type {
  Generator,
  GeneratorCall,
  GeneratorFactory,
  GeneratorMethod,
  GeneratorSession,
  PluginPolicy,
  RegistryOptions,
} from "./generators/index.js";

// Random source
export { SeededRandom, createSeed, resolveSeed } from "./random/index.js";

// Template environment
export { TemplateEnvironment, DEFAULT_ENGINE_OPTIONS, BUILTIN_HELPERS } from "./templates/index.js";
export type { EngineOptions, TemplateEnvironmentOptions, HelperFunction } from "./templates/index.js";

// Model configuration
export {
  ModelConfigSchema,
  loadModelConfig,
  parseModelConfig,
  convertInputs,
  INPUT_TYPES,
} from "./config/index.js";
export type { ModelConfigDocument, InputDeclaration, InputType } from "./config/index.js";

// Library utilities
export {
  ModelsmithError,
  ValidationError,
  ConfigError,
  InputVariableError,
  UnknownGeneratorError,
  DuplicateGeneratorError,
  InvalidGeneratorArgumentError,
  TemplateConfigError,
  ContextTemplateError,
  ContextRenderError,
  PlanTemplateError,
  PlanRenderError,
  PathTraversalError,
  RenderTaskError,
  ok,
  err,
  unwrap,
  unwrapOr,
  andThen,
  tryCatch,
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
