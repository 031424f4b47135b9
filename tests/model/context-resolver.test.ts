import { join } from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createGeneratorRegistry } from "@/generators/index.js";
import {
  ContextRenderError,
  ContextTemplateError,
  InvalidGeneratorArgumentError,
  UnknownGeneratorError,
} from "@/lib/errors.js";
import { ContextResolver } from "@/model/context-resolver.js";
import { SeededRandom } from "@/random/index.js";
import { TemplateEnvironment } from "@/templates/environment.js";

import { createWorkspace, type Workspace } from "../fixtures/workspace.js";

function resolver(seed = 1, inputs: Record<string, unknown> = {}): ContextResolver {
  const generators = createGeneratorRegistry().instantiate(new SeededRandom(seed));
  return new ContextResolver(new TemplateEnvironment({ generators }), inputs);
}

describe("ContextResolver", () => {
  let ws: Workspace;
  let path: string;

  beforeEach(() => {
    ws = createWorkspace();
    path = join(ws.model, "context.yml.hbs");
  });

  afterEach(() => {
    ws.cleanup();
  });

  it("renders the template and parses the mapping", () => {
    ws.write(
      "context.yml.hbs",
      [
        "name: demo",
        'replicas: {{random "int" min=3 max=3}}',
        "hosts: {{json (list \"web\" \"db\")}}",
        "nested:",
        "  enabled: true",
        "",
      ].join("\n")
    );
    expect(resolver().resolve(path)).toEqual({
      name: "demo",
      replicas: 3,
      hosts: ["web", "db"],
      nested: { enabled: true },
    });
  });

  it("keeps the key order of the document", () => {
    ws.write("context.yml.hbs", "zeta: 1\nalpha: 2\nmid: 3\n");
    expect(Object.keys(resolver().resolve(path))).toEqual(["zeta", "alpha", "mid"]);
  });

  it("returns a frozen context", () => {
    ws.write("context.yml.hbs", "list: [1, 2]\nmap:\n  a: 1\n");
    const context = resolver().resolve(path);
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context["list"])).toBe(true);
    expect(Object.isFrozen(context["map"])).toBe(true);
  });

  it("gives the same context for the same seed", () => {
    ws.write("context.yml.hbs", 'token: {{random "string" length=12}}\nperson: "{{faker "person.fullName"}}"\n');
    expect(resolver(5).resolve(path)).toEqual(resolver(5).resolve(path));
  });

  it("gives different contexts for different seeds", () => {
    ws.write("context.yml.hbs", 'token: {{random "string" length=16}}\n');
    expect(resolver(5).resolve(path)).not.toEqual(resolver(6).resolve(path));
  });

  it("exposes declared inputs as @inputs", () => {
    ws.write("context.yml.hbs", "replicas: {{@inputs.replicas}}\n");
    expect(resolver(1, { replicas: 4 }).resolve(path)).toEqual({ replicas: 4 });
  });

  it("returns an empty context for an empty document", () => {
    ws.write("context.yml.hbs", "# nothing yet\n");
    expect(resolver().resolve(path)).toEqual({});
  });

  it("does not resolve references to earlier keys", () => {
    ws.write("context.yml.hbs", 'name: {{random "choice" (list "a" "b")}}\ngreeting: hello {{name}}\n');
    try {
      resolver().resolve(path);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ContextTemplateError);
      expect(error instanceof ContextTemplateError ? error.message : "").toContain('"name" not defined');
    }
  });

  it("fails on unknown generators with UnknownGeneratorError", () => {
    ws.write("context.yml.hbs", 'value: {{doesnotexist "int"}}\n');
    expect(() => resolver().resolve(path)).toThrow(UnknownGeneratorError);
  });

  it("passes generator argument errors through", () => {
    ws.write("context.yml.hbs", 'value: {{random "int" min=10 max=1}}\n');
    expect(() => resolver().resolve(path)).toThrow(InvalidGeneratorArgumentError);
  });

  it("wraps helper failures as template errors", () => {
    ws.write("context.yml.hbs", 'value: {{int "many"}}\n');
    expect(() => resolver().resolve(path)).toThrow(ContextTemplateError);
  });

  it("fails when the template is missing", () => {
    expect(() => resolver().resolve(path)).toThrow(ContextTemplateError);
  });

  it("rejects a document that is not a mapping", () => {
    ws.write("context.yml.hbs", "- a\n- b\n");
    expect(() => resolver().resolve(path)).toThrow("expected a mapping, got a sequence");
  });

  it("rejects text that is not YAML", () => {
    ws.write("context.yml.hbs", "key: [unclosed\n");
    expect(() => resolver().resolve(path)).toThrow(ContextRenderError);
  });
});
