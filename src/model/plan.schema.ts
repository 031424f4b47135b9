import { z } from "zod";

import { ContextValueSchema } from "./context.schema.js";

import type { ContextValue } from "./context.schema.js";

/**
 * Render one template file.
 *
 * `src` is relative to the model root (or the enclosing directory's `src`),
 * `dest` to the destination root (or the enclosing directory's `dest`).
 */
export interface FileEntry {
  type: "file";
  name?: string | undefined;
  src: string;
  dest: string;
  /** Exposed to the file's template as `@local` */
  extra: Record<string, ContextValue>;
}

/**
 * Render a directory: its nested `contents`, or every file below `src` when
 * there are none
 */
export interface DirEntry {
  type: "dir";
  name?: string | undefined;
  src: string;
  dest: string;
  /** Merged into `@parent` for everything below this directory */
  extra: Record<string, ContextValue>;
  /** Globs (relative to `src`) of files copied verbatim instead of rendered */
  copy: string[];
  contents?: PlanEntry[] | undefined;
}

export type PlanEntry = FileEntry | DirEntry;

/**
 * The resolved Plan, in render order
 */
export type Plan = readonly PlanEntry[];

const PathSchema = z.string().min(1, "Path must not be empty");

const ExtraSchema = z.record(z.string(), ContextValueSchema).default({});

export const FileEntrySchema = z
  .object({
    type: z.literal("file").default("file"),
    name: z.string().optional(),
    src: PathSchema,
    dest: PathSchema,
    extra: ExtraSchema,
  })
  .strict();

export const DirEntrySchema: z.ZodType<DirEntry, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.literal("dir"),
      name: z.string().optional(),
      src: PathSchema,
      dest: PathSchema,
      extra: ExtraSchema,
      copy: z.array(z.string().min(1)).default([]),
      contents: z.array(PlanEntrySchema).optional(),
    })
    .strict()
);

export const PlanEntrySchema: z.ZodType<PlanEntry, z.ZodTypeDef, unknown> = z.union([
  DirEntrySchema,
  FileEntrySchema,
]);

/**
 * The rendered plan document: a sequence of entries
 *
 * @example
 * ```yaml
 * - src: README.md.hbs
 *   dest: README.md
 * - type: dir
 *   src: services
 *   dest: srv
 *   copy: ["**\/*.png"]
 *   extra:
 *     owner: ops
 * ```
 */
export const PlanSchema = z.array(PlanEntrySchema);
