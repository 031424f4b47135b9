import { posix } from "path";

import { ValidationError } from "../lib/errors.js";

import { stringifyStructured } from "./yaml.js";

/**
 * Shape of a Handlebars helper as registered by modelsmith
 */
export type HelperFunction = (...args: unknown[]) => unknown;

/**
 * Positional parameters, hash and data of a helper call
 */
export interface HelperArguments {
  params: unknown[];
  hash: Record<string, unknown>;
  data: unknown;
}

/**
 * Handlebars passes its options object last; split it from the parameters
 */
export function splitHelperArguments(args: readonly unknown[]): HelperArguments {
  const last = args[args.length - 1];
  if (typeof last === "object" && last !== null && "hash" in last && "name" in last) {
    const hash: unknown = last.hash;
    return {
      params: args.slice(0, -1),
      hash: typeof hash === "object" && hash !== null ? Object.fromEntries(Object.entries(hash)) : {},
      data: "data" in last ? last.data : undefined,
    };
  }
  return { params: [...args], hash: {}, data: undefined };
}

function toNumber(helper: string, value: unknown): number {
  const number = typeof value === "string" ? Number(value.trim()) : Number(value);
  if (Number.isNaN(number) || value === null || value === "") {
    throw new ValidationError(`${helper}: cannot convert ${JSON.stringify(value)} to a number`, { helper, value });
  }
  return number;
}

function toText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0", ""]);

function toBoolean(value: unknown): boolean {
  if (typeof value === "string") {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    throw new ValidationError(`bool: cannot convert ${JSON.stringify(value)} to a boolean`, { helper: "bool", value });
  }
  return Boolean(value);
}

function range(start: number, end: number | undefined, step: number): number[] {
  const [from, to] = end === undefined ? [0, start] : [start, end];
  if (step === 0 || !Number.isInteger(step) || !Number.isInteger(from) || !Number.isInteger(to)) {
    throw new ValidationError("range: bounds and step must be integers and step must not be 0", { from, to, step });
  }
  const values: number[] = [];
  for (let i = from; step > 0 ? i < to : i > to; i += step) {
    values.push(i);
  }
  return values;
}

/**
 * Authoring helpers available in every template.
 *
 * @example
 * ```handlebars
 * hosts: {{json (list "web" "db")}}
 * path: {{joinPath "srv" name "config.yml"}}
 * replicas: {{int replicas}}
 * ```
 */
export const BUILTIN_HELPERS: Readonly<Record<string, HelperFunction>> = {
  // structured output
  json: (...args) => {
    const { params, hash } = splitHelperArguments(args);
    const indent = typeof hash["indent"] === "number" ? hash["indent"] : undefined;
    return JSON.stringify(params[0] ?? null, null, indent);
  },
  yaml: (...args) => stringifyStructured(splitHelperArguments(args).params[0] ?? null),
  list: (...args) => splitHelperArguments(args).params,
  dict: (...args) => splitHelperArguments(args).hash,
  range: (...args) => {
    const { params, hash } = splitHelperArguments(args);
    const step = hash["step"] ?? params[2] ?? 1;
    return range(
      toNumber("range", params[0]),
      params[1] === undefined ? undefined : toNumber("range", params[1]),
      toNumber("range", step)
    );
  },

  // paths
  joinPath: (...args) => posix.join(...splitHelperArguments(args).params.map(toText)),
  basename: (...args) => posix.basename(toText(splitHelperArguments(args).params[0])),
  dirname: (...args) => posix.dirname(toText(splitHelperArguments(args).params[0])),

  // type coercion
  int: (...args) => Math.trunc(toNumber("int", splitHelperArguments(args).params[0])),
  float: (...args) => toNumber("float", splitHelperArguments(args).params[0]),
  str: (...args) => toText(splitHelperArguments(args).params[0]),
  bool: (...args) => toBoolean(splitHelperArguments(args).params[0]),

  // text and values
  upper: (...args) => toText(splitHelperArguments(args).params[0]).toUpperCase(),
  lower: (...args) => toText(splitHelperArguments(args).params[0]).toLowerCase(),
  default: (...args) => {
    const [value, fallback] = splitHelperArguments(args).params;
    return value ?? fallback;
  },
  join: (...args) => {
    const [items, separator] = splitHelperArguments(args).params;
    if (!Array.isArray(items)) return "";
    return items.map(toText).join(typeof separator === "string" ? separator : ", ");
  },
  length: (...args) => {
    const [value] = splitHelperArguments(args).params;
    if (typeof value === "string" || Array.isArray(value)) return value.length;
    if (typeof value === "object" && value !== null) return Object.keys(value).length;
    return 0;
  },
  eq: (...args) => {
    const [left, right] = splitHelperArguments(args).params;
    return left === right;
  },
  add: (...args) => {
    const [left, right] = splitHelperArguments(args).params;
    return toNumber("add", left) + toNumber("add", right);
  },
  multiply: (...args) => {
    const [left, right] = splitHelperArguments(args).params;
    return toNumber("multiply", left) * toNumber("multiply", right);
  },
};
