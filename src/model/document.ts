import { readFileSync } from "fs";

import { InvalidGeneratorArgumentError, UnknownGeneratorError } from "../lib/errors.js";
import { parseStructured } from "../templates/index.js";

import type { TemplateData, TemplateEnvironment } from "../templates/index.js";

/**
 * Error constructors for one kind of structured template
 */
export interface DocumentErrors {
  /** Reading or expanding the template failed */
  template: (cause: unknown) => Error;
  /** The expanded text is not YAML */
  parse: (cause: unknown) => Error;
}

/**
 * Errors raised by generators reach the host unchanged
 */
export function isGeneratorError(error: unknown): boolean {
  return error instanceof UnknownGeneratorError || error instanceof InvalidGeneratorArgumentError;
}

/**
 * Read a template file, expand it and parse the result as YAML
 */
export function expandDocument(
  environment: TemplateEnvironment,
  templatePath: string,
  namespace: object,
  data: TemplateData,
  errors: DocumentErrors
): unknown {
  let text: string;
  try {
    text = environment.render(readFileSync(templatePath, "utf-8"), templatePath, namespace, data);
  } catch (error) {
    if (isGeneratorError(error)) {
      throw error;
    }
    throw errors.template(error);
  }

  try {
    return parseStructured(text);
  } catch (error) {
    throw errors.parse(error);
  }
}

/**
 * Describe the YAML type of a parsed value for error messages
 */
export function describeDocument(value: unknown): string {
  if (value === null) return "an empty document";
  if (Array.isArray(value)) return "a sequence";
  if (typeof value === "object") return "a mapping";
  return `a scalar (${typeof value})`;
}
