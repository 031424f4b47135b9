/**
 * Template injection resistance tests.
 *
 * Values that reach a template through inputs or the Context are output as
 * data; they are never compiled again.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { renderModel } from "@/model/renderer.js";

import { createWorkspace, type Workspace } from "../fixtures/workspace.js";

describe("Template Injection Resistance", () => {
  let ws: Workspace;

  beforeEach(() => {
    ws = createWorkspace();
    ws.write("config.yml", "inputs:\n  payload:\n    required: true\n");
    ws.write("context.yml.hbs", "payload: {{json @inputs.payload}}\n");
    ws.write("templates.yml.hbs", "- src: out.hbs\n  dest: out.txt\n");
    ws.write("out.hbs", "{{payload}}");
  });

  afterEach(() => {
    ws.cleanup();
  });

  const payloads = [
    "{{process.env.SECRET}}",
    '{{random "int"}}',
    "{{#each items}}{{../constructor}}{{/each}}",
    "${process.exit(1)}",
    "x\nadmin: true",
    "'; rm -rf / #",
  ];

  for (const payload of payloads) {
    it(`keeps ${JSON.stringify(payload)} as plain data`, () => {
      const result = renderModel({ modelRoot: ws.model, destinationRoot: ws.out, seed: 1, inputs: { payload } });

      expect(result.success ? result.data.context : undefined).toEqual({ payload });
      expect(ws.read("out.txt")).toBe(payload);
    });
  }
});
