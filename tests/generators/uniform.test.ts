import { describe, it, expect } from "vitest";

import { UniformGenerator } from "@/generators/uniform.js";
import { InvalidGeneratorArgumentError } from "@/lib/errors.js";
import { SeededRandom } from "@/random/index.js";

import type { GeneratorCall } from "@/generators/types.js";

function call(method: string, kwargs: Record<string, unknown> = {}, args: unknown[] = []): GeneratorCall {
  return { generator: "random", method, args, kwargs };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("UniformGenerator", () => {
  it("draws integers within inclusive bounds", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    for (let i = 0; i < 50; i++) {
      const value = generator.invoke(call("int", { min: 1, max: 6 }));
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(6);
    }
  });

  it("returns the single value of a degenerate range", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    expect(generator.invoke(call("int", { min: 4, max: 4 }))).toBe(4);
  });

  it("binds positional arguments in parameter order", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    expect(generator.invoke(call("int", {}, [9, 9]))).toBe(9);
  });

  it("rejects min greater than max on parameter min", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    const error = catchError(() => generator.invoke(call("int", { min: 10, max: 1 })));
    expect(error).toBeInstanceOf(InvalidGeneratorArgumentError);
    if (error instanceof InvalidGeneratorArgumentError) {
      expect(error.generator).toBe("random");
      expect(error.method).toBe("int");
      expect(error.parameter).toBe("min");
    }
  });

  it("rejects unknown keyword arguments by name", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    const error = catchError(() => generator.invoke(call("int", { maximum: 3 })));
    expect(error).toBeInstanceOf(InvalidGeneratorArgumentError);
    if (error instanceof InvalidGeneratorArgumentError) {
      expect(error.parameter).toBe("maximum");
    }
  });

  it("rejects a parameter given twice", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    expect(() => generator.invoke(call("int", { min: 1 }, [2]))).toThrow("given both positionally and by name");
  });

  it("rejects too many positional arguments", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    expect(() => generator.invoke(call("bool", {}, [0.5, 1]))).toThrow(InvalidGeneratorArgumentError);
  });

  it("rejects unknown methods on parameter method", () => {
    const generator = new UniformGenerator(new SeededRandom(5));
    const error = catchError(() => generator.invoke(call("gauss")));
    expect(error).toBeInstanceOf(InvalidGeneratorArgumentError);
    if (error instanceof InvalidGeneratorArgumentError) {
      expect(error.parameter).toBe("method");
    }
  });

  it("draws floats within the range", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    const value = generator.invoke(call("float", { min: 2, max: 3 }));
    expect(value).toBeGreaterThanOrEqual(2);
    expect(value).toBeLessThan(3);
  });

  it("honours bool probability extremes", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    expect(generator.invoke(call("bool", { p: 1 }))).toBe(true);
    expect(generator.invoke(call("bool", { p: 0 }))).toBe(false);
    expect(() => generator.invoke(call("bool", { p: 2 }))).toThrow(InvalidGeneratorArgumentError);
  });

  it("chooses, samples and shuffles items", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    const items = ["a", "b", "c", "d"];
    expect(items).toContain(generator.invoke(call("choice", { items })));

    const sample = generator.invoke(call("sample", { items, k: 2 }));
    expect(Array.isArray(sample) ? sample.length : -1).toBe(2);
    expect(new Set(Array.isArray(sample) ? sample : []).size).toBe(2);

    const shuffled = generator.invoke(call("shuffle", { items }));
    expect(Array.isArray(shuffled) ? [...shuffled].sort() : []).toEqual(items);
  });

  it("rejects an empty choice and an oversized sample", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    expect(() => generator.invoke(call("choice", { items: [] }))).toThrow(InvalidGeneratorArgumentError);
    const error = catchError(() => generator.invoke(call("sample", { items: ["a"], k: 2 })));
    expect(error instanceof InvalidGeneratorArgumentError ? error.parameter : undefined).toBe("k");
  });

  it("builds strings from the alphabet", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    expect(generator.invoke(call("string", { length: 12, alphabet: "xy" }))).toMatch(/^[xy]{12}$/);
    expect(generator.invoke(call("string"))).toMatch(/^[A-Za-z0-9]{8}$/);
  });

  it("rejects a negative string length", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    const error = catchError(() => generator.invoke(call("string", { length: -1 })));
    expect(error instanceof InvalidGeneratorArgumentError ? error.parameter : undefined).toBe("length");
  });

  it("creates version 4 UUIDs", () => {
    const generator = new UniformGenerator(new SeededRandom(8));
    expect(generator.invoke(call("uuid"))).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("repeats values for the same seed", () => {
    const first = new UniformGenerator(new SeededRandom(21));
    const second = new UniformGenerator(new SeededRandom(21));
    const methods = ["int", "float", "string", "uuid"];
    expect(methods.map((method) => first.invoke(call(method)))).toEqual(
      methods.map((method) => second.invoke(call(method)))
    );
  });

  it("lists its methods", () => {
    expect(new UniformGenerator(new SeededRandom(1)).methods()).toEqual([
      "int",
      "float",
      "bool",
      "choice",
      "sample",
      "shuffle",
      "string",
      "uuid",
    ]);
  });
});
