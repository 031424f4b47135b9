import { describe, it, expect } from "vitest";
import {
  ModelsmithError,
  ValidationError,
  ConfigError,
  UnknownGeneratorError,
  InvalidGeneratorArgumentError,
  ContextTemplateError,
  PathTraversalError,
  RenderTaskError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("ModelsmithError", () => {
    it("should create a basic error", () => {
      const error = new ModelsmithError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("ModelsmithError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ModelsmithError);
    });

    it("should keep the cause", () => {
      const cause = new Error("disk full");
      const error = new ModelsmithError("Write failed", "WRITE", undefined, { cause });
      expect(error.cause).toBe(cause);
    });

    it("should serialize to JSON", () => {
      const error = new ModelsmithError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "ModelsmithError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ValidationError and ConfigError", () => {
    it("should carry their codes", () => {
      expect(new ValidationError("bad").code).toBe("VALIDATION_ERROR");
      expect(new ConfigError("bad").code).toBe("CONFIG_ERROR");
      expect(new ConfigError("bad")).toBeInstanceOf(ModelsmithError);
    });
  });

  describe("UnknownGeneratorError", () => {
    it("should name the generator and keep the location", () => {
      const error = new UnknownGeneratorError("doesnotexist", { template: "context.yml.hbs", line: 3 });
      expect(error.message).toBe("Unknown generator: doesnotexist");
      expect(error.generator).toBe("doesnotexist");
      expect(error.context).toEqual({ template: "context.yml.hbs", line: 3, generator: "doesnotexist" });
    });
  });

  describe("InvalidGeneratorArgumentError", () => {
    it("should name generator, method and parameter", () => {
      const error = new InvalidGeneratorArgumentError("random", "int", "min", "min must not exceed max");
      expect(error.message).toBe("Invalid argument 'min' for random.int: min must not exceed max");
      expect(error.parameter).toBe("min");
      expect(error.code).toBe("INVALID_GENERATOR_ARGUMENT");
    });
  });

  describe("wrapping errors", () => {
    it("should describe the cause in the message", () => {
      const cause = new Error('"name" not defined in [object Object]');
      const error = new ContextTemplateError("/model/context.yml.hbs", { cause });
      expect(error.message).toBe(
        'Failed to expand context template /model/context.yml.hbs: "name" not defined in [object Object]'
      );
      expect(error.cause).toBe(cause);
    });

    it("should identify the failing task", () => {
      const error = new RenderTaskError("/model/b.hbs", "/out/b.txt", { cause: "boom" });
      expect(error.source).toBe("/model/b.hbs");
      expect(error.destination).toBe("/out/b.txt");
      expect(error.message).toBe("Failed to render /model/b.hbs -> /out/b.txt: boom");
    });

    it("should report the escaping path", () => {
      const error = new PathTraversalError("../escape.txt", "/out", "destination");
      expect(error.message).toBe("Plan destination '../escape.txt' escapes /out");
      expect(error.context).toEqual({ path: "../escape.txt", root: "/out", kind: "destination" });
    });
  });
});
