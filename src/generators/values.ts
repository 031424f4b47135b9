/**
 * Convert a generator result into plain data a context can hold.
 *
 * Dates become ISO strings, bigints decimal strings; arrays and plain objects
 * are converted element by element. Functions and symbols become null.
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toPlainValue(item));
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return value;
    case "bigint":
      return value.toString();
    case "object":
      return Object.fromEntries(
        Object.entries(value).map(([key, item]: [string, unknown]) => [key, toPlainValue(item)])
      );
    default:
      return null;
  }
}
