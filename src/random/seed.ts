import { randomInt } from "node:crypto";

/** Largest seed created when the host gives none (2^48 - 1, randomInt's limit) */
const MAX_CREATED_SEED = 2 ** 48 - 1;

/**
 * Create a fresh, non-reproducible seed
 */
export function createSeed(): number {
  return randomInt(0, MAX_CREATED_SEED);
}

/**
 * Pick the seed for a session: host value, then model config, then a fresh one
 */
export function resolveSeed(hostSeed: number | undefined, configSeed: number | undefined): number {
  return hostSeed ?? configSeed ?? createSeed();
}
