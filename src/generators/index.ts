/**
 * Generators
 *
 * Pluggable value producers callable from templates as helpers:
 * - `random`: uniform scalars, choices and strings
 * - `faker`: localized fake data
 * - `numpy`: numeric arrays with a shape and distribution
 *
 * All of them draw from the session's SeededRandom.
 */

export {
  GeneratorRegistry,
  createGeneratorRegistry,
  BUILTIN_GENERATORS,
  type PluginPolicy,
  type RegistryOptions,
} from "./registry.js";
export { defineMethod, bindArguments, MethodTableGenerator, type GeneratorMethod } from "./method.js";
export { UniformGenerator } from "./uniform.js";
export { FakeDataGenerator, createRandomizer } from "./fake.js";
export { NumericArrayGenerator, fillShape, type Nested } from "./numeric-array.js";
export { toPlainValue } from "./values.js";
export { DEFAULT_REFERENCE_DATE } from "./types.js";
export type { Generator, GeneratorCall, GeneratorFactory, GeneratorSession } from "./types.js";
