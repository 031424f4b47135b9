import { join } from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createGeneratorRegistry } from "@/generators/index.js";
import { PathTraversalError, PlanRenderError, PlanTemplateError } from "@/lib/errors.js";
import { PlanResolver, validatePlanPaths } from "@/model/plan-resolver.js";
import { isWithin } from "@/model/paths.js";
import { SeededRandom } from "@/random/index.js";
import { TemplateEnvironment } from "@/templates/environment.js";

import { createWorkspace, type Workspace } from "../fixtures/workspace.js";

import type { PlanRoots } from "@/model/plan-resolver.js";

function resolver(): PlanResolver {
  const generators = createGeneratorRegistry().instantiate(new SeededRandom(1));
  return new PlanResolver(new TemplateEnvironment({ generators }), { owner: "ops" });
}

describe("PlanResolver", () => {
  let ws: Workspace;
  let path: string;
  let roots: PlanRoots;

  beforeEach(() => {
    ws = createWorkspace();
    path = join(ws.model, "templates.yml.hbs");
    roots = { source: ws.model, destination: ws.out };
  });

  afterEach(() => {
    ws.cleanup();
  });

  it("renders entries against the context", () => {
    ws.write(
      "templates.yml.hbs",
      [
        "{{#each services}}",
        "- src: service.yml.hbs",
        "  dest: {{joinPath \"services\" this \"config.yml\"}}",
        "  extra:",
        "    service: {{this}}",
        "{{/each}}",
        "",
      ].join("\n")
    );
    expect(resolver().resolve(path, { services: ["web", "db"] }, roots)).toEqual([
      { type: "file", src: "service.yml.hbs", dest: "services/web/config.yml", extra: { service: "web" } },
      { type: "file", src: "service.yml.hbs", dest: "services/db/config.yml", extra: { service: "db" } },
    ]);
  });

  it("applies directory defaults and nested contents", () => {
    ws.write(
      "templates.yml.hbs",
      [
        "- type: dir",
        "  src: conf",
        "  dest: etc",
        "  contents:",
        "    - src: app.hbs",
        "      dest: app.conf",
        "- type: dir",
        "  src: static",
        "  dest: public",
        "  copy: ['**/*.png']",
        "",
      ].join("\n")
    );
    expect(resolver().resolve(path, {}, roots)).toEqual([
      {
        type: "dir",
        src: "conf",
        dest: "etc",
        extra: {},
        copy: [],
        contents: [{ type: "file", src: "app.hbs", dest: "app.conf", extra: {} }],
      },
      { type: "dir", src: "static", dest: "public", extra: {}, copy: ["**/*.png"] },
    ]);
  });

  it("exposes inputs as @inputs", () => {
    ws.write("templates.yml.hbs", "- src: a.hbs\n  dest: {{@inputs.owner}}.txt\n");
    expect(resolver().resolve(path, {}, roots)[0]?.dest).toBe("ops.txt");
  });

  it("returns an empty plan for an empty document", () => {
    ws.write("templates.yml.hbs", "{{#if enabled}}\n- src: a\n  dest: b\n{{/if}}\n");
    expect(resolver().resolve(path, { enabled: false }, roots)).toEqual([]);
  });

  it("rejects a document that is not a sequence", () => {
    ws.write("templates.yml.hbs", "src: a\ndest: b\n");
    expect(() => resolver().resolve(path, {}, roots)).toThrow("expected a sequence, got a mapping");
  });

  it("rejects invalid entries", () => {
    ws.write("templates.yml.hbs", "- src: a\n");
    expect(() => resolver().resolve(path, {}, roots)).toThrow(PlanRenderError);
    ws.write("templates.yml.hbs", "- type: link\n  src: a\n  dest: b\n");
    expect(() => resolver().resolve(path, {}, roots)).toThrow(PlanRenderError);
  });

  it("wraps undefined context variables as template errors", () => {
    ws.write("templates.yml.hbs", "- src: {{missing}}\n  dest: b\n");
    expect(() => resolver().resolve(path, {}, roots)).toThrow(PlanTemplateError);
  });

  it("rejects destinations outside the destination root", () => {
    ws.write("templates.yml.hbs", "- src: a.hbs\n  dest: ../escape.txt\n");
    try {
      resolver().resolve(path, {}, roots);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PathTraversalError);
      if (error instanceof PathTraversalError) {
        expect(error.kind).toBe("destination");
        expect(error.path).toBe("../escape.txt");
      }
    }
  });

  it("rejects sources outside the model root", () => {
    ws.write("templates.yml.hbs", "- src: /etc/hostname\n  dest: host.txt\n");
    expect(() => resolver().resolve(path, {}, roots)).toThrow(PathTraversalError);
  });

  it("checks nested paths against their directory", () => {
    ws.write(
      "templates.yml.hbs",
      ["- type: dir", "  src: conf", "  dest: etc", "  contents:", "    - src: a.hbs", "      dest: ../../up.txt", ""].join(
        "\n"
      )
    );
    expect(() => resolver().resolve(path, {}, roots)).toThrow(PathTraversalError);
  });
});

describe("validatePlanPaths", () => {
  const roots = { source: "/models/demo", destination: "/out" };

  it("accepts paths that stay inside after normalisation", () => {
    expect(() =>
      validatePlanPaths([{ type: "file", src: "a/../b.hbs", dest: "x/./y.txt", extra: {} }], roots)
    ).not.toThrow();
  });

  it("accepts nested paths that climb back into the directory's parent", () => {
    expect(() =>
      validatePlanPaths(
        [
          {
            type: "dir",
            src: "conf",
            dest: "etc",
            extra: {},
            copy: [],
            contents: [{ type: "file", src: "../top.hbs", dest: "../top.txt", extra: {} }],
          },
        ],
        roots
      )
    ).not.toThrow();
  });
});

describe("isWithin", () => {
  it("treats the root itself as inside", () => {
    expect(isWithin("/out", "/out")).toBe(true);
  });

  it("does not confuse sibling prefixes", () => {
    expect(isWithin("/out", "/output/file")).toBe(false);
    expect(isWithin("/out", "/out/..file")).toBe(true);
  });
});
