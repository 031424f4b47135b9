export { SeededRandom } from "./seeded-random.js";
export { createSeed, resolveSeed } from "./seed.js";
