/**
 * Model Rendering
 *
 * The two-phase pipeline from a model directory to a rendered tree:
 * - Context Resolver: context template -> Context mapping
 * - Plan Resolver: plan template + Context -> ordered plan entries
 * - Render tasks: plan entries -> directories, copies and rendered files
 * - ModelRenderer: the session state machine tying them together
 *
 * @example
 * ```typescript
 * import { renderModel } from "modelsmith";
 *
 * const result = renderModel({ modelRoot: "./model", destinationRoot: "./out", seed: 7 });
 * if (result.success) {
 *   console.log(result.data.context);
 * }
 * ```
 */

export {
  ModelRenderer,
  renderModel,
  DEFAULT_MODEL_FILES,
  type ModelRendererOptions,
  type ModelFiles,
  type RenderOutcome,
  type RenderState,
} from "./renderer.js";
export { ContextResolver } from "./context-resolver.js";
export { PlanResolver, validatePlanPaths, type PlanRoots } from "./plan-resolver.js";
export { TaskExecutor, walkTree, type RenderTask, type RenderTaskKind, type TaskLocals } from "./tasks.js";
export { isWithin, resolveWithin } from "./paths.js";
export { ContextSchema, ContextValueSchema, deepFreeze, type Context, type ContextValue } from "./context.schema.js";
export {
  PlanSchema,
  PlanEntrySchema,
  FileEntrySchema,
  DirEntrySchema,
  type Plan,
  type PlanEntry,
  type FileEntry,
  type DirEntry,
} from "./plan.schema.js";
