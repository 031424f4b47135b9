import { Faker, allLocales, base, en } from "@faker-js/faker";

import { InvalidGeneratorArgumentError } from "../lib/errors.js";

import { DEFAULT_REFERENCE_DATE } from "./types.js";
import { toPlainValue } from "./values.js";

import type { LocaleDefinition, Randomizer } from "@faker-js/faker";
import type { SeededRandom } from "../random/index.js";
import type { Generator, GeneratorCall } from "./types.js";

const DEFAULT_LOCALE = "en";

/** `<module>.<method>`, e.g. `person.fullName` */
const METHOD_PATTERN = /^([a-z][A-Za-z]*)\.([a-z][A-Za-z0-9]*)$/;

const LOCALES: ReadonlyMap<string, LocaleDefinition> = new Map(Object.entries(allLocales));

/**
 * Faker randomizer drawing from the session random source
 */
export function createRandomizer(random: SeededRandom): Randomizer {
  return {
    next: () => random.float(),
    seed: (seed: number | number[]) => {
      random.reseed(Array.isArray(seed) ? (seed[0] ?? 0) : seed);
    },
  };
}

/**
 * Human-readable fake data from `@faker-js/faker`.
 *
 * The method is a faker module path; `locale` picks the locale, any other hash
 * argument goes into an options object passed last. Date methods count from
 * the session's reference date, never from the wall clock.
 *
 * @example
 * ```yaml
 * user:
 *   name: {{faker "person.fullName" locale="de_AT"}}
 *   email: {{faker "internet.email"}}
 *   city: {{faker "location.city"}}
 * ```
 */
export class FakeDataGenerator implements Generator {
  readonly defaultMethod = "person.fullName";
  private readonly randomizer: Randomizer;
  private readonly fakers = new Map<string, Faker>();

  constructor(
    random: SeededRandom,
    private readonly referenceDate: Date = DEFAULT_REFERENCE_DATE
  ) {
    this.randomizer = createRandomizer(random);
  }

  invoke(call: GeneratorCall): unknown {
    const match = METHOD_PATTERN.exec(call.method);
    if (match === null) {
      throw new InvalidGeneratorArgumentError(call.generator, call.method, "method", "expected <module>.<method>");
    }
    const [, moduleName = "", methodName = ""] = match;

    const { locale, ...options } = call.kwargs;
    if (locale !== undefined && typeof locale !== "string") {
      throw new InvalidGeneratorArgumentError(call.generator, call.method, "locale", "expected a locale name");
    }
    const faker = this.fakerFor(call, locale ?? DEFAULT_LOCALE);

    const fakerModule: unknown = Reflect.get(faker, moduleName);
    const method: unknown =
      typeof fakerModule === "object" && fakerModule !== null ? Reflect.get(fakerModule, methodName) : undefined;
    if (typeof method !== "function") {
      throw new InvalidGeneratorArgumentError(call.generator, call.method, "method", "no such faker method");
    }

    const args = Object.keys(options).length > 0 ? [...call.args, options] : [...call.args];
    try {
      const value: unknown = Reflect.apply(method, fakerModule, args);
      return toPlainValue(value);
    } catch (error) {
      throw new InvalidGeneratorArgumentError(
        call.generator,
        call.method,
        "args",
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private fakerFor(call: GeneratorCall, locale: string): Faker {
    const cached = this.fakers.get(locale);
    if (cached !== undefined) {
      return cached;
    }
    const definition = LOCALES.get(locale);
    if (definition === undefined) {
      throw new InvalidGeneratorArgumentError(call.generator, call.method, "locale", `unknown locale '${locale}'`);
    }
    const faker = new Faker({ locale: [definition, en, base], randomizer: this.randomizer });
    faker.setDefaultRefDate(this.referenceDate);
    this.fakers.set(locale, faker);
    return faker;
  }
}
