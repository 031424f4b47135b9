import {
  DuplicateGeneratorError,
  UnknownGeneratorError,
  ValidationError,
} from "../lib/errors.js";

import { FakeDataGenerator } from "./fake.js";
import { NumericArrayGenerator } from "./numeric-array.js";
import { UniformGenerator } from "./uniform.js";

import type { SeededRandom } from "../random/index.js";
import { DEFAULT_REFERENCE_DATE } from "./types.js";

import type { Generator, GeneratorFactory, GeneratorSession } from "./types.js";

/** Generator names double as template helper names */
const GENERATOR_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Which registered generators a model may use
 */
export interface PluginPolicy {
  include: readonly RegExp[];
  exclude: readonly RegExp[];
}

/**
 * Generators shipped with modelsmith
 */
export const BUILTIN_GENERATORS: Readonly<Record<string, GeneratorFactory>> = {
  random: (random) => new UniformGenerator(random),
  faker: (random, session) => new FakeDataGenerator(random, session.referenceDate),
  numpy: (random) => new NumericArrayGenerator(random),
};

/**
 * Name to factory table for one render session.
 *
 * There is no shared instance: every session builds or receives its own.
 *
 * @example
 * ```typescript
 * const registry = createGeneratorRegistry({
 *   extra: { dice: (random) => new DiceGenerator(random) },
 * });
 * registry.list(); // Set { "random", "faker", "numpy", "dice" }
 * ```
 */
export class GeneratorRegistry {
  private readonly factories = new Map<string, GeneratorFactory>();

  get size(): number {
    return this.factories.size;
  }

  /**
   * Register a factory under a new name
   */
  register(name: string, factory: GeneratorFactory): this {
    if (!GENERATOR_NAME_PATTERN.test(name)) {
      throw new ValidationError(`Invalid generator name: ${name}`, { generator: name });
    }
    if (this.factories.has(name)) {
      throw new DuplicateGeneratorError(name);
    }
    this.factories.set(name, factory);
    return this;
  }

  get(name: string): GeneratorFactory {
    const factory = this.factories.get(name);
    if (factory === undefined) {
      throw new UnknownGeneratorError(name);
    }
    return factory;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  list(): ReadonlySet<string> {
    return new Set(this.factories.keys());
  }

  /**
   * New registry holding only the generators the policy allows
   */
  select(policy: PluginPolicy): GeneratorRegistry {
    const selected = new GeneratorRegistry();
    for (const [name, factory] of this.factories) {
      const included = policy.include.some((pattern) => pattern.test(name));
      const excluded = policy.exclude.some((pattern) => pattern.test(name));
      if (included && !excluded) {
        selected.register(name, factory);
      }
    }
    return selected;
  }

  /**
   * Create one generator per registered name, in registration order
   */
  instantiate(
    random: SeededRandom,
    session: GeneratorSession = { referenceDate: DEFAULT_REFERENCE_DATE }
  ): Map<string, Generator> {
    const generators = new Map<string, Generator>();
    for (const [name, factory] of this.factories) {
      generators.set(name, factory(random, session));
    }
    return generators;
  }
}

export interface RegistryOptions {
  /** Register the built-in generators (default true) */
  builtins?: boolean;
  /** Host supplied generators, registered after the built-ins */
  extra?: Readonly<Record<string, GeneratorFactory>>;
}

export function createGeneratorRegistry(options: RegistryOptions = {}): GeneratorRegistry {
  const registry = new GeneratorRegistry();
  if (options.builtins ?? true) {
    for (const [name, factory] of Object.entries(BUILTIN_GENERATORS)) {
      registry.register(name, factory);
    }
  }
  for (const [name, factory] of Object.entries(options.extra ?? {})) {
    registry.register(name, factory);
  }
  return registry;
}
