import { z } from "zod";

/**
 * A value a Context may hold: YAML scalars, sequences and mappings
 */
export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(z.string(), ContextValueSchema),
  ])
);

/**
 * The resolved Context: read-only once the context template has rendered
 */
export type Context = Readonly<Record<string, ContextValue>>;

export const ContextSchema = z.record(z.string(), ContextValueSchema);

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
