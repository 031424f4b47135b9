import { lstatSync, realpathSync } from "fs";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "path";

import { PathTraversalError } from "../lib/errors.js";

/**
 * Whether `path` is `root` itself or lies below it (lexically, symlinks are not followed)
 */
export function isWithin(root: string, path: string): boolean {
  const rel = relative(resolve(root), resolve(path));
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

function isSymbolicLink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Real path of `path`: symlinks are resolved up to its deepest existing
 * ancestor and the missing segments below it are appended unchanged.
 * `undefined` when that ancestor is a dangling symlink.
 */
export function realpathOfNearest(path: string): string | undefined {
  const missing: string[] = [];
  let current = resolve(path);
  for (;;) {
    try {
      return join(realpathSync(current), ...missing);
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
    }
    if (isSymbolicLink(current)) {
      return undefined;
    }
    const parent = dirname(current);
    if (parent === current) {
      return join(current, ...missing);
    }
    missing.unshift(basename(current));
    current = parent;
  }
}

/**
 * Whether `path` stays below `root` once symlinks on both are followed
 */
export function isRealWithin(root: string, path: string): boolean {
  const realRoot = realpathOfNearest(root);
  const realPath = realpathOfNearest(path);
  return realRoot !== undefined && realPath !== undefined && isWithin(realRoot, realPath);
}

/**
 * Require `path` to stay inside `root`, by its text and by what it points to on disk
 *
 * @throws PathTraversalError with `reported` as the offending path
 */
export function assertWithin(
  root: string,
  path: string,
  kind: "source" | "destination",
  reported: string = path
): void {
  if (!isWithin(root, path) || !isRealWithin(root, path)) {
    throw new PathTraversalError(reported, root, kind);
  }
}

/**
 * Resolve `path` against `base` and require the result to stay inside `root`
 *
 * @throws PathTraversalError when the resolved path escapes `root`
 */
export function resolveWithin(
  root: string,
  base: string,
  path: string,
  kind: "source" | "destination"
): string {
  const resolved = resolve(base, path);
  assertWithin(root, resolved, kind, path);
  return resolved;
}

/**
 * `path` relative to `root`, with forward slashes
 */
export function toRelativePosix(root: string, path: string): string {
  return relative(root, path).split(sep).join("/");
}
