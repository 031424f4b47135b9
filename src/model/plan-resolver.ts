/**
 * Template Plan Resolver
 *
 * Second rendering phase: the plan template expands, against the Context, to
 * the ordered list of files and directories to render.
 */

import { PlanRenderError, PlanTemplateError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { describeDocument, expandDocument } from "./document.js";
import { resolveWithin } from "./paths.js";
import { PlanSchema } from "./plan.schema.js";

import type { TemplateEnvironment } from "../templates/index.js";
import type { Context } from "./context.schema.js";
import type { Plan, PlanEntry } from "./plan.schema.js";

const log = logger.child("[plan]");

/**
 * Where plan paths resolve and must stay
 */
export interface PlanRoots {
  /** Model root; every `src` must stay inside it */
  source: string;
  /** Destination root; every `dest` must stay inside it */
  destination: string;
}

/**
 * Check every `src` and `dest` of a plan, nested directory contents included
 *
 * @throws PathTraversalError for the first path that leaves its root
 */
export function validatePlanPaths(
  entries: readonly PlanEntry[],
  roots: PlanRoots,
  bases: PlanRoots = roots
): void {
  for (const entry of entries) {
    const source = resolveWithin(roots.source, bases.source, entry.src, "source");
    const destination = resolveWithin(roots.destination, bases.destination, entry.dest, "destination");
    if (entry.type === "dir" && entry.contents !== undefined) {
      validatePlanPaths(entry.contents, roots, { source, destination });
    }
  }
}

export class PlanResolver {
  constructor(
    private readonly environment: TemplateEnvironment,
    private readonly inputs: Readonly<Record<string, unknown>> = {}
  ) {}

  /**
   * Render the plan template against the Context and validate the entries
   *
   * @throws PlanTemplateError when the template does not expand
   * @throws PlanRenderError when the result is not a list of plan entries
   * @throws PathTraversalError when a path leaves the model or destination root
   */
  resolve(templatePath: string, context: Context, roots: PlanRoots): Plan {
    log.debug(`Resolving plan from ${templatePath}`);

    const document = expandDocument(
      this.environment,
      templatePath,
      context,
      { inputs: this.inputs },
      {
        template: (cause) => new PlanTemplateError(templatePath, { cause }),
        parse: (cause) => new PlanRenderError(templatePath, "rendered text is not valid YAML", {}, { cause }),
      }
    );

    if (document === null) {
      return [];
    }
    if (!Array.isArray(document)) {
      throw new PlanRenderError(templatePath, `expected a sequence, got ${describeDocument(document)}`);
    }

    const result = PlanSchema.safeParse(document);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new PlanRenderError(templatePath, issues.join("; "), { issues });
    }

    validatePlanPaths(result.data, roots);
    log.debug(`Plan has ${result.data.length} entries`);
    return result.data;
  }
}
