import type { SeededRandom } from "../random/index.js";

/**
 * A single generator invocation coming from a template
 */
export interface GeneratorCall {
  /** Name the generator is registered under */
  generator: string;
  /** Method to run, e.g. `int` or `person.fullName` */
  method: string;
  /** Positional arguments after the method name */
  args: readonly unknown[];
  /** Hash (keyword) arguments */
  kwargs: Readonly<Record<string, unknown>>;
}

/**
 * A value producer reachable from templates.
 *
 * Implementations must draw all randomness from the session's SeededRandom.
 */
export interface Generator {
  /** Method used when a template calls the generator without one */
  readonly defaultMethod: string;
  invoke(call: GeneratorCall): unknown;
}

/**
 * Fixed "now" of a session when neither the host nor the model sets one
 */
export const DEFAULT_REFERENCE_DATE = new Date("2020-01-01T00:00:00.000Z");

/**
 * Session-wide settings handed to every generator factory
 */
export interface GeneratorSession {
  /** Instant that date methods relative to the current time count from */
  referenceDate: Date;
}

/**
 * Creates a generator bound to the session's random source
 */
export type GeneratorFactory = (random: SeededRandom, session: GeneratorSession) => Generator;
