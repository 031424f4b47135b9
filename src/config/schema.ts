import { z } from "zod";

/**
 * Input names usable as `{{@inputs.<name>}}`
 */
const INPUT_NAME_PATTERN = /^[A-Za-z_][\w-]*$/;

/**
 * Which generator plugins a model may use (regular expressions, anchored at the start)
 */
export const PluginConfigSchema = z
  .object({
    include_names: z.array(z.string()).default([".*"]),
    exclude_names: z.array(z.string()).default([]),
  })
  .strict();

/**
 * Template engine options. Exactly these keys are recognized.
 */
export const EngineConfigSchema = z
  .object({
    trim_blocks: z.boolean().default(true),
    lstrip_blocks: z.boolean().default(true),
    /** helper name -> Handlebars template rendered with `value` and the hash arguments */
    extra_filters: z.record(z.string(), z.string()).default({}),
    /** helper name -> constant value */
    extra_globals: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const InputTypeSchema = z.enum(["str", "int", "float", "bool", "list", "dict", "any"]);

/**
 * A host input variable the model declares
 */
export const InputDeclarationSchema = z
  .object({
    type: InputTypeSchema.default("str"),
    required: z.boolean().default(false),
    description: z.string().optional(),
    /** Raw strings are parsed like host inputs; other values are used as they are */
    default: z.unknown().optional(),
  })
  .strict();

/**
 * The model configuration document (`config.yml`)
 *
 * @example
 * ```yaml
 * seed: 1337
 * reference_date: "2024-06-01T00:00:00Z"
 * plugin:
 *   exclude_names: ["faker"]
 * engine:
 *   extra_globals:
 *     company: ACME
 * inputs:
 *   employee_count:
 *     type: int
 *     required: true
 * ```
 */
export const ModelConfigSchema = z
  .object({
    seed: z
      .number()
      .int()
      .refine((seed) => Number.isSafeInteger(seed), "seed must be a safe integer")
      .optional(),
    /** "Now" for generated dates; any string or number `Date` accepts */
    reference_date: z.union([z.string(), z.number()]).pipe(z.coerce.date()).optional(),
    plugin: PluginConfigSchema.default({}),
    engine: EngineConfigSchema.default({}),
    inputs: z
      .record(z.string().regex(INPUT_NAME_PATTERN, "Invalid input name"), InputDeclarationSchema)
      .default({}),
  })
  .strict();

export type PluginConfig = z.infer<typeof PluginConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type InputType = z.infer<typeof InputTypeSchema>;
export type InputDeclaration = z.infer<typeof InputDeclarationSchema>;
export type ModelConfigDocument = z.infer<typeof ModelConfigSchema>;

export const INPUT_TYPES = InputTypeSchema.options;
