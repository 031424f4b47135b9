import { z } from "zod";

import { InputVariableError } from "../lib/errors.js";

import type { InputDeclaration, InputType } from "./schema.js";

const INPUT_VALUE_SCHEMAS: Record<InputType, z.ZodTypeAny> = {
  str: z.string(),
  int: z.number().int(),
  float: z.number(),
  bool: z.boolean(),
  list: z.array(z.unknown()),
  dict: z.record(z.string(), z.unknown()),
  any: z.unknown(),
};

/**
 * Result of matching host inputs against the model's declarations
 */
export interface ConvertedInputs {
  /** Typed values by input name */
  values: Record<string, unknown>;
  /** Host inputs the model does not declare */
  unused: string[];
}

/**
 * Parse a raw host value: JSON when it parses, otherwise the string itself
 */
export function parseRawInput(raw: string, type: InputType): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  // strings are taken as given unless they were JSON-quoted
  if (type === "str" && typeof parsed !== "string") {
    return raw;
  }
  return parsed;
}

/**
 * Convert raw host inputs to the types the model declares
 *
 * @throws InputVariableError for missing required inputs or values of the wrong type
 */
export function convertInputs(
  declarations: Readonly<Record<string, InputDeclaration>>,
  raw: Readonly<Record<string, string>>
): ConvertedInputs {
  const values: Record<string, unknown> = {};
  const missing: string[] = [];

  for (const [name, declaration] of Object.entries(declarations)) {
    let value: unknown;
    if (Object.hasOwn(raw, name)) {
      value = parseRawInput(raw[name] ?? "", declaration.type);
    } else if (declaration.default !== undefined) {
      value =
        typeof declaration.default === "string"
          ? parseRawInput(declaration.default, declaration.type)
          : declaration.default;
    } else {
      if (declaration.required) {
        missing.push(name);
      }
      continue;
    }

    const result = INPUT_VALUE_SCHEMAS[declaration.type].safeParse(value);
    if (!result.success) {
      throw new InputVariableError(`Input '${name}' is not a valid ${declaration.type}`, {
        input: name,
        type: declaration.type,
        issues: result.error.issues,
      });
    }
    values[name] = result.data;
  }

  if (missing.length > 0) {
    throw new InputVariableError(`Missing required input variables: ${missing.join(", ")}`, { missing });
  }

  const unused = Object.keys(raw).filter((name) => !Object.hasOwn(declarations, name));
  return { values, unused };
}
