/**
 * Temporary model and output directories for rendering tests.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

export interface Workspace {
  /** Model root */
  model: string;
  /** Destination root */
  out: string;
  /** Write a file below the model root, creating parent directories */
  write(path: string, content: string): void;
  /** Read a rendered file below the destination root */
  read(path: string): string;
  exists(path: string): boolean;
  /** Every file below the destination root, sorted, forward slashes */
  files(): string[];
  cleanup(): void;
}

function listFiles(root: string, prefix = ""): string[] {
  if (!existsSync(join(root, prefix))) {
    return [];
  }
  return readdirSync(join(root, prefix))
    .sort()
    .flatMap((name) => {
      const path = prefix ? `${prefix}/${name}` : name;
      return statSync(join(root, path)).isDirectory() ? listFiles(root, path) : [path];
    });
}

export function createWorkspace(): Workspace {
  const base = mkdtempSync(join(tmpdir(), "modelsmith-"));
  const model = join(base, "model");
  const out = join(base, "out");
  mkdirSync(model);

  return {
    model,
    out,
    write(path, content) {
      mkdirSync(dirname(join(model, path)), { recursive: true });
      writeFileSync(join(model, path), content);
    },
    read(path) {
      return readFileSync(join(out, path), "utf-8");
    },
    exists(path) {
      return existsSync(join(out, path));
    },
    files() {
      return listFiles(out);
    },
    cleanup() {
      rmSync(base, { recursive: true, force: true });
    },
  };
}

/**
 * Every file below a directory with its content, for comparing output trees
 */
export function readTree(root: string): Record<string, string> {
  return Object.fromEntries(listFiles(root).map((path) => [path, readFileSync(join(root, path), "utf-8")]));
}
