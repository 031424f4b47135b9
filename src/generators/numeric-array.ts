import { z } from "zod";

import { defineMethod, MethodTableGenerator } from "./method.js";

import type { SeededRandom } from "../random/index.js";
import type { GeneratorMethod } from "./method.js";

/**
 * A scalar or arbitrarily nested plain array of scalars
 */
export type Nested<T> = T | Nested<T>[];

const SizeSchema = z
  .union([z.number().int().nonnegative(), z.array(z.number().int().nonnegative())])
  .optional();

type Size = z.infer<typeof SizeSchema>;

const UniformArgsSchema = z
  .object({ low: z.number().default(0), high: z.number().default(1), size: SizeSchema })
  .strict()
  .refine((args) => args.low <= args.high, { message: "low must not exceed high", path: ["low"] });

const NormalArgsSchema = z
  .object({ loc: z.number().default(0), scale: z.number().nonnegative().default(1), size: SizeSchema })
  .strict();

const IntegersArgsSchema = z
  .object({ low: z.number().int().default(0), high: z.number().int().optional(), size: SizeSchema })
  .strict()
  .refine((args) => (args.high === undefined ? args.low > 0 : args.high > args.low), {
    message: "high must be greater than low",
    path: ["high"],
  });

const ChoiceArgsSchema = z
  .object({
    items: z.array(z.unknown()).min(1, "items must not be empty"),
    size: SizeSchema,
    replace: z.boolean().default(true),
  })
  .strict()
  .refine((args) => args.replace || countOf(args.size) <= args.items.length, {
    message: "cannot take more items than available without replacement",
    path: ["size"],
  });

/**
 * Number of samples a size describes
 */
function countOf(size: Size): number {
  if (size === undefined) {
    return 1;
  }
  if (typeof size === "number") {
    return size;
  }
  return size.reduce((product, dimension) => product * dimension, 1);
}

/**
 * Build a nested array of the given shape, or a single sample without one
 */
export function fillShape<T>(size: Size, sample: () => T): Nested<T> {
  if (size === undefined) {
    return sample();
  }
  const dimensions = typeof size === "number" ? [size] : size;
  const build = (depth: number): Nested<T> => {
    const length = dimensions[depth];
    if (length === undefined) {
      return sample();
    }
    return Array.from({ length }, () => build(depth + 1));
  };
  return build(0);
}

/**
 * Numeric arrays with a configurable shape and distribution.
 *
 * Results are nested plain arrays so they serialize straight into a context.
 *
 * @example
 * ```yaml
 * weights: {{json (numpy "uniform" low=0 high=10 size=3)}}
 * matrix: {{json (numpy "normal" size=(list 2 2))}}
 * ```
 */
export class NumericArrayGenerator extends MethodTableGenerator {
  readonly defaultMethod = "uniform";
  protected readonly table: Readonly<Record<string, GeneratorMethod>>;

  constructor(private readonly random: SeededRandom) {
    super();
    this.table = {
      uniform: defineMethod(["low", "high", "size"], UniformArgsSchema, ({ low, high, size }) =>
        fillShape(size, () => low + this.random.float() * (high - low))
      ),
      normal: defineMethod(["loc", "scale", "size"], NormalArgsSchema, ({ loc, scale, size }) =>
        fillShape(size, () => loc + scale * this.random.gaussian())
      ),
      integers: defineMethod(["low", "high", "size"], IntegersArgsSchema, ({ low, high, size }) => {
        // a single bound is the exclusive upper limit from 0
        const [from, to] = high === undefined ? [0, low] : [low, high];
        return fillShape(size, () => this.random.int(from, to - 1));
      }),
      choice: defineMethod(["items", "size", "replace"], ChoiceArgsSchema, ({ items, size, replace }) => {
        if (replace) {
          return fillShape(size, () => this.random.choice(items));
        }
        const pool = this.random.shuffle(items);
        let next = 0;
        return fillShape(size, () => pool[next++]);
      }),
      permutation: defineMethod(["items"], z.object({ items: z.array(z.unknown()) }).strict(), ({ items }) =>
        this.random.shuffle(items)
      ),
    };
  }
}
