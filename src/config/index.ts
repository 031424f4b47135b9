/**
 * Model Configuration
 *
 * Schema and loader for a model's `config.yml`, plus host input conversion.
 */

export {
  ModelConfigSchema,
  PluginConfigSchema,
  EngineConfigSchema,
  InputDeclarationSchema,
  InputTypeSchema,
  INPUT_TYPES,
  type ModelConfigDocument,
  type PluginConfig,
  type EngineConfig,
  type InputDeclaration,
  type InputType,
} from "./schema.js";
export { loadModelConfig, parseModelConfig, toPluginPolicy, toEngineOptions } from "./loader.js";
export { convertInputs, parseRawInput, type ConvertedInputs } from "./inputs.js";
