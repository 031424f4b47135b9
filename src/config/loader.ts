/**
 * Model Configuration Loading
 *
 * Reads `config.yml` from a model directory and turns it into the plugin
 * policy and engine options the render session needs.
 */

import { existsSync, readFileSync } from "fs";

import YAML from "yaml";

import { ConfigError } from "../lib/errors.js";

import { ModelConfigSchema } from "./schema.js";

import type { PluginPolicy } from "../generators/index.js";
import type { EngineOptions } from "../templates/index.js";
import type { ModelConfigDocument, PluginConfig, EngineConfig } from "./schema.js";

/**
 * Validate a parsed configuration document. `null` (an empty file) gives the defaults.
 *
 * @throws ConfigError listing every schema issue
 */
export function parseModelConfig(document: unknown, source = "<inline>"): ModelConfigDocument {
  const result = ModelConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid model configuration in ${source}: ${issues.join("; ")}`, {
      source,
      issues,
    });
  }
  return result.data;
}

/**
 * Load a model configuration file. A missing file gives the defaults.
 */
export function loadModelConfig(path: string): ModelConfigDocument {
  if (!existsSync(path)) {
    return parseModelConfig(null, path);
  }

  let document: unknown;
  try {
    document = YAML.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read model configuration ${path}`, { source: path }, { cause: error });
  }
  return parseModelConfig(document, path);
}

function compilePattern(pattern: string, key: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (error) {
    throw new ConfigError(`Invalid pattern in plugin.${key}: ${pattern}`, { key, pattern }, { cause: error });
  }
}

/**
 * Compile `plugin.include_names` / `plugin.exclude_names`, anchored at the start of the name
 */
export function toPluginPolicy(config: PluginConfig): PluginPolicy {
  return {
    include: config.include_names.map((pattern) => compilePattern(pattern, "include_names")),
    exclude: config.exclude_names.map((pattern) => compilePattern(pattern, "exclude_names")),
  };
}

export function toEngineOptions(config: EngineConfig): EngineOptions {
  return {
    trimBlocks: config.trim_blocks,
    lstripBlocks: config.lstrip_blocks,
    extraFilters: config.extra_filters,
    extraGlobals: config.extra_globals,
  };
}
