import { z } from "zod";

import { InvalidGeneratorArgumentError } from "../lib/errors.js";

import type { Generator, GeneratorCall } from "./types.js";

/**
 * A generator method with named parameters validated by a zod schema
 */
export interface GeneratorMethod {
  /** Parameter names in positional binding order */
  readonly params: readonly string[];
  run(call: GeneratorCall): unknown;
}

/**
 * Define a method. Positional arguments bind to `params` in order, hash
 * arguments by name; the merged arguments are parsed with `schema`.
 *
 * @example
 * ```typescript
 * const int = defineMethod(
 *   ["min", "max"],
 *   z.object({ min: z.number().int(), max: z.number().int() }).strict(),
 *   ({ min, max }) => random.int(min, max)
 * );
 * ```
 */
export function defineMethod<S extends z.ZodTypeAny>(
  params: readonly string[],
  schema: S,
  execute: (input: z.output<S>) => unknown
): GeneratorMethod {
  return {
    params,
    run(call: GeneratorCall): unknown {
      const parsed = schema.safeParse(bindArguments(params, call));
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new InvalidGeneratorArgumentError(
          call.generator,
          call.method,
          issue === undefined ? "arguments" : issueParameter(issue),
          issue?.message ?? "invalid arguments"
        );
      }
      return execute(parsed.data);
    },
  };
}

/**
 * Merge positional and hash arguments into one keyword mapping
 */
export function bindArguments(
  params: readonly string[],
  call: GeneratorCall
): Record<string, unknown> {
  if (call.args.length > params.length) {
    throw new InvalidGeneratorArgumentError(
      call.generator,
      call.method,
      "args",
      `expected at most ${params.length} positional arguments, got ${call.args.length}`
    );
  }

  const bound: Record<string, unknown> = { ...call.kwargs };
  call.args.forEach((value, index) => {
    const name = params[index];
    if (name === undefined) {
      return;
    }
    if (Object.hasOwn(call.kwargs, name)) {
      throw new InvalidGeneratorArgumentError(
        call.generator,
        call.method,
        name,
        "given both positionally and by name"
      );
    }
    bound[name] = value;
  });
  return bound;
}

function issueParameter(issue: z.ZodIssue): string {
  if (issue.code === "unrecognized_keys") {
    return issue.keys[0] ?? "arguments";
  }
  const head = issue.path[0];
  return head === undefined ? "arguments" : String(head);
}

/**
 * Generator backed by a fixed table of methods
 */
export abstract class MethodTableGenerator implements Generator {
  abstract readonly defaultMethod: string;
  protected abstract readonly table: Readonly<Record<string, GeneratorMethod>>;

  /**
   * Names of the available methods
   */
  methods(): string[] {
    return Object.keys(this.table);
  }

  invoke(call: GeneratorCall): unknown {
    const method = Object.hasOwn(this.table, call.method) ? this.table[call.method] : undefined;
    if (method === undefined) {
      throw new InvalidGeneratorArgumentError(
        call.generator,
        call.method,
        "method",
        `unknown method, expected one of ${this.methods().join(", ")}`
      );
    }
    return method.run(call);
  }
}
