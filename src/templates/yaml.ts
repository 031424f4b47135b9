import YAML from "yaml";

/**
 * Parse rendered template text as a YAML 1.2 document.
 *
 * Returns `null` for an empty document. Throws the `yaml` package's parse
 * errors unchanged.
 */
export function parseStructured(text: string): unknown {
  const value: unknown = YAML.parse(text);
  return value ?? null;
}

/**
 * Serialize plain data as a YAML block document without the trailing newline
 */
export function stringifyStructured(value: unknown): string {
  return YAML.stringify(value).trimEnd();
}
