/**
 * Template Environment
 *
 * Handlebars runtime shared by the context, plan and file templates:
 * - Strict variable lookup and unescaped output
 * - Authoring helpers (`json`, `yaml`, `joinPath`, `int`, ...)
 * - One helper per session generator
 * - Model-defined extra filters and globals
 *
 * @example
 * ```typescript
 * import { TemplateEnvironment } from "@/templates";
 *
 * const env = new TemplateEnvironment({ generators });
 * env.render("{{upper name}}", "inline", { name: "db" }); // "DB"
 * ```
 */

export {
  TemplateEnvironment,
  DEFAULT_ENGINE_OPTIONS,
  type EngineOptions,
  type TemplateEnvironmentOptions,
  type TemplateData,
} from "./environment.js";
export { BUILTIN_HELPERS, splitHelperArguments, type HelperFunction, type HelperArguments } from "./helpers.js";
export { collectHelperCalls, type HelperCall } from "./calls.js";
export { parseStructured, stringifyStructured } from "./yaml.js";
