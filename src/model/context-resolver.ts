/**
 * Context Resolver
 *
 * First rendering phase: the context template expands to a YAML mapping that
 * becomes the Context. Nothing but helpers, generators and `@inputs` is
 * visible while it renders, so keys cannot refer to each other.
 */

import { ContextRenderError, ContextTemplateError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { ContextSchema, deepFreeze } from "./context.schema.js";
import { describeDocument, expandDocument } from "./document.js";

import type { TemplateEnvironment } from "../templates/index.js";
import type { Context } from "./context.schema.js";

const log = logger.child("[context]");

export class ContextResolver {
  constructor(
    private readonly environment: TemplateEnvironment,
    private readonly inputs: Readonly<Record<string, unknown>> = {}
  ) {}

  /**
   * Render the context template in a single pass and validate the mapping
   *
   * @throws ContextTemplateError when the template does not expand
   * @throws ContextRenderError when the result is not a mapping of plain values
   */
  resolve(templatePath: string): Context {
    log.debug(`Resolving context from ${templatePath}`);

    const document = expandDocument(
      this.environment,
      templatePath,
      {},
      { inputs: this.inputs },
      {
        template: (cause) => new ContextTemplateError(templatePath, { cause }),
        parse: (cause) =>
          new ContextRenderError(templatePath, "rendered text is not valid YAML", {}, { cause }),
      }
    );

    if (document === null) {
      return deepFreeze<Context>({});
    }
    if (typeof document !== "object" || Array.isArray(document)) {
      throw new ContextRenderError(templatePath, `expected a mapping, got ${describeDocument(document)}`);
    }

    const result = ContextSchema.safeParse(document);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new ContextRenderError(templatePath, issues.join("; "), { issues });
    }

    log.debug(`Context has ${Object.keys(result.data).length} keys`);
    return deepFreeze(result.data);
  }
}
