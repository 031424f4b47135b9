import { z } from "zod";

import { defineMethod, MethodTableGenerator } from "./method.js";

import type { SeededRandom } from "../random/index.js";
import type { GeneratorMethod } from "./method.js";

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

const IntArgsSchema = z
  .object({
    min: z.number().int().default(0),
    max: z.number().int().default(100),
  })
  .strict()
  .refine((args) => args.min <= args.max, { message: "min must not exceed max", path: ["min"] });

const FloatArgsSchema = z
  .object({
    min: z.number().default(0),
    max: z.number().default(1),
  })
  .strict()
  .refine((args) => args.min <= args.max, { message: "min must not exceed max", path: ["min"] });

const BoolArgsSchema = z
  .object({
    p: z.number().min(0).max(1).default(0.5),
  })
  .strict();

const ItemsSchema = z.array(z.unknown());

const ChoiceArgsSchema = z.object({ items: ItemsSchema.min(1, "items must not be empty") }).strict();

const SampleArgsSchema = z
  .object({
    items: ItemsSchema,
    k: z.number().int().nonnegative(),
  })
  .strict()
  .refine((args) => args.k <= args.items.length, { message: "k exceeds the number of items", path: ["k"] });

const StringArgsSchema = z
  .object({
    length: z.number().int().nonnegative().default(8),
    alphabet: z.string().min(1, "alphabet must not be empty").default(ALPHANUMERIC),
  })
  .strict();

/**
 * Uniform random values: scalars, choices and strings.
 *
 * @example
 * ```yaml
 * port: {{random "int" min=1024 max=65535}}
 * tier: {{random "choice" (list "gold" "silver" "bronze")}}
 * token: {{random "string" length=16}}
 * ```
 */
export class UniformGenerator extends MethodTableGenerator {
  readonly defaultMethod = "float";
  protected readonly table: Readonly<Record<string, GeneratorMethod>>;

  constructor(private readonly random: SeededRandom) {
    super();
    this.table = {
      int: defineMethod(["min", "max"], IntArgsSchema, ({ min, max }) => this.random.int(min, max)),
      float: defineMethod(["min", "max"], FloatArgsSchema, ({ min, max }) => min + this.random.float() * (max - min)),
      bool: defineMethod(["p"], BoolArgsSchema, ({ p }) => this.random.float() < p),
      choice: defineMethod(["items"], ChoiceArgsSchema, ({ items }) => this.random.choice(items)),
      sample: defineMethod(["items", "k"], SampleArgsSchema, ({ items, k }) => this.random.shuffle(items).slice(0, k)),
      shuffle: defineMethod(["items"], z.object({ items: ItemsSchema }).strict(), ({ items }) => this.random.shuffle(items)),
      string: defineMethod(["length", "alphabet"], StringArgsSchema, ({ length, alphabet }) => {
        const characters = [...alphabet];
        return Array.from({ length }, () => this.random.choice(characters)).join("");
      }),
      uuid: defineMethod([], z.object({}).strict(), () => this.uuid()),
    };
  }

  /**
   * RFC 4122 version 4 UUID built from the seeded source
   */
  private uuid(): string {
    const bytes = Array.from({ length: 16 }, () => this.random.int(0, 255));
    bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x40;
    bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;
    const hex = bytes.map((byte) => byte.toString(16).padStart(2, "0")).join("");
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }
}
