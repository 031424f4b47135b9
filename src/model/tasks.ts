/**
 * Render Tasks
 *
 * Plan entries expand, when their turn comes, into directory, template and
 * copy tasks that run strictly in order.
 */

import { copyFileSync, mkdirSync, readdirSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";

import { minimatch } from "minimatch";

import { RenderTaskError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { assertWithin, toRelativePosix } from "./paths.js";

import type { TemplateEnvironment } from "../templates/index.js";
import type { Context, ContextValue } from "./context.schema.js";
import type { PlanRoots } from "./plan-resolver.js";
import type { DirEntry, PlanEntry } from "./plan.schema.js";

const log = logger.child("[render]");

export type RenderTaskKind = "directory" | "template" | "copy";

/**
 * Extras visible to a file template as `@parent` and `@local`
 */
export interface TaskLocals {
  parent: Readonly<Record<string, ContextValue>>;
  local: Readonly<Record<string, ContextValue>>;
}

/**
 * One step of the render phase with absolute paths
 */
export interface RenderTask {
  kind: RenderTaskKind;
  /** Template or file to copy; absent for directories */
  source?: string;
  destination: string;
  locals: TaskLocals;
}

interface TreeItem {
  /** Path relative to the walked directory, forward slashes */
  path: string;
  isDirectory: boolean;
}

/**
 * Regular files and directories below `root`, depth first in name order.
 * Symbolic links and special files are skipped.
 */
export function walkTree(root: string, prefix = ""): TreeItem[] {
  const items: TreeItem[] = [];
  const entries = readdirSync(join(root, prefix), { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  for (const entry of entries) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      items.push({ path, isDirectory: true });
      items.push(...walkTree(root, path));
    } else if (entry.isFile()) {
      items.push({ path, isDirectory: false });
    }
  }
  return items;
}

function expandDirectory(
  entry: DirEntry,
  source: string,
  destination: string,
  parent: Readonly<Record<string, ContextValue>>
): RenderTask[] {
  const locals: TaskLocals = { parent: { ...parent, ...entry.extra }, local: {} };
  const tasks: RenderTask[] = [{ kind: "directory", destination, locals }];
  const mirror = entry.contents === undefined;

  if (entry.copy.length === 0 && !mirror) {
    return tasks;
  }

  for (const item of walkTree(source)) {
    const target = join(destination, item.path);
    if (item.isDirectory) {
      if (mirror) {
        tasks.push({ kind: "directory", destination: target, locals });
      }
      continue;
    }
    const copied = entry.copy.some((pattern) => minimatch(item.path, pattern, { dot: true }));
    if (copied) {
      tasks.push({ kind: "copy", source: join(source, item.path), destination: target, locals });
    } else if (mirror) {
      tasks.push({ kind: "template", source: join(source, item.path), destination: target, locals });
    }
  }
  return tasks;
}

/**
 * Runs render tasks against the Context, recording every file written
 *
 * @example
 * ```typescript
 * const executor = new TaskExecutor(environment, context, inputs, roots);
 * for (const entry of plan) {
 *   executor.runEntry(entry);
 * }
 * executor.written; // ["README.md", "srv/app.yml"]
 * ```
 */
export class TaskExecutor {
  private readonly files: string[] = [];

  constructor(
    private readonly environment: TemplateEnvironment,
    private readonly context: Context,
    private readonly inputs: Readonly<Record<string, unknown>>,
    private readonly roots: PlanRoots
  ) {}

  /**
   * Destination-relative paths of the files written so far, in write order
   */
  get written(): readonly string[] {
    return this.files;
  }

  /**
   * Expand one plan entry (relative to `bases`) into tasks, including nested directory contents
   *
   * @throws RenderTaskError when a source directory cannot be read
   */
  expand(
    entry: PlanEntry,
    bases: PlanRoots = this.roots,
    parent: Readonly<Record<string, ContextValue>> = {}
  ): RenderTask[] {
    const source = resolve(bases.source, entry.src);
    const destination = resolve(bases.destination, entry.dest);

    if (entry.type === "file") {
      return [{ kind: "template", source, destination, locals: { parent, local: entry.extra } }];
    }

    let tasks: RenderTask[];
    try {
      tasks = expandDirectory(entry, source, destination, parent);
    } catch (error) {
      throw new RenderTaskError(source, destination, { cause: error });
    }

    const nested = { source, destination };
    const nestedParent = { ...parent, ...entry.extra };
    for (const child of entry.contents ?? []) {
      tasks.push(...this.expand(child, nested, nestedParent));
    }
    return tasks;
  }

  /**
   * Run a single task
   *
   * @throws PathTraversalError when a symlink on disk leads the task outside its root
   * @throws RenderTaskError wrapping whatever made the task fail
   */
  run(task: RenderTask): void {
    if (task.source !== undefined) {
      assertWithin(this.roots.source, task.source, "source", toRelativePosix(this.roots.source, task.source));
    }
    assertWithin(
      this.roots.destination,
      task.destination,
      "destination",
      toRelativePosix(this.roots.destination, task.destination)
    );

    try {
      switch (task.kind) {
        case "directory":
          mkdirSync(task.destination, { recursive: true });
          return;
        case "copy":
          this.copy(task);
          return;
        case "template":
          this.renderTemplate(task);
          return;
      }
    } catch (error) {
      throw new RenderTaskError(task.source, task.destination, { cause: error });
    }
  }

  /**
   * Expand an entry and run its tasks in order, stopping at the first failure
   */
  runEntry(entry: PlanEntry): void {
    for (const task of this.expand(entry)) {
      this.run(task);
    }
  }

  private copy(task: RenderTask): void {
    const source = requireSource(task);
    mkdirSync(dirname(task.destination), { recursive: true });
    copyFileSync(source, task.destination);
    this.record(task.destination);
  }

  private renderTemplate(task: RenderTask): void {
    const source = requireSource(task);
    const text = this.environment.renderFile(source, this.context, {
      inputs: this.inputs,
      parent: task.locals.parent,
      local: task.locals.local,
    });
    mkdirSync(dirname(task.destination), { recursive: true });
    writeFileSync(task.destination, text, "utf-8");
    this.record(task.destination);
  }

  private record(destination: string): void {
    const path = toRelativePosix(this.roots.destination, destination);
    log.debug(`Wrote ${path}`);
    this.files.push(path);
  }
}

function requireSource(task: RenderTask): string {
  if (task.source === undefined) {
    throw new Error(`${task.kind} task for ${task.destination} has no source`);
  }
  return task.source;
}
