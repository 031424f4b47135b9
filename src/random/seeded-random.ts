/**
 * Seeded random source shared by every generator and helper of a render session.
 *
 * SplitMix64 expands the seed into the two 64-bit words of a Xoroshiro128+
 * state. The same seed always yields the same sequence, so a TIM rendered twice
 * with one seed produces identical output.
 *
 * Not safe for concurrent use: one instance belongs to one session.
 *
 * @example
 * ```typescript
 * const random = new SeededRandom(1337);
 * random.int(1, 6);           // 1..6 inclusive
 * random.float();             // [0, 1)
 * random.choice(["a", "b"]);  // "a" or "b"
 * ```
 */

const UINT64_MASK = 0xffffffffffffffffn;
const UINT64_RANGE = 0x10000000000000000n;
const UINT32_RANGE = 0x100000000;
const SPLITMIX64_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX64_MUL_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_MUL_2 = 0x94d049bb133111ebn;

export class SeededRandom {
  private state0 = 0n;
  private state1 = 0n;
  private currentSeed = 0;

  constructor(seed: number) {
    this.reseed(seed);
  }

  /**
   * The seed this source was (last) initialised with
   */
  get seed(): number {
    return this.currentSeed;
  }

  /**
   * Reset the state from a new seed
   */
  reseed(seed: number): void {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.currentSeed = seed;
    let z = BigInt.asUintN(64, BigInt(seed));
    z = (z + SPLITMIX64_GAMMA) & UINT64_MASK;
    this.state0 = splitMix64(z);
    z = (z + SPLITMIX64_GAMMA) & UINT64_MASK;
    this.state1 = splitMix64(z);
    // Xoroshiro must not start from the all-zero state
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n;
    }
  }

  /**
   * Xoroshiro128+ step
   */
  private next64(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MASK;

    s1 ^= s0;
    this.state0 = (rotl(s0, 24n) ^ s1 ^ (s1 << 16n)) & UINT64_MASK;
    this.state1 = rotl(s1, 37n);

    return result;
  }

  /**
   * Uniform 32-bit unsigned integer (upper half of the 64-bit output)
   */
  nextUint32(): number {
    return Number(this.next64() >> 32n) >>> 0;
  }

  /**
   * Uniform float in [0, 1)
   */
  float(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  /**
   * Uniform integer in [min, max], both inclusive. Ranges wider than 2^32 draw
   * from the full 64-bit output with rejection sampling.
   */
  int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`max (${max}) must not be below min (${min})`);
    }
    const span = max - min + 1;
    if (span <= UINT32_RANGE) {
      return min + Math.floor(this.float() * span);
    }
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new RangeError(`Wide ranges need safe integer bounds, got [${min}, ${max}]`);
    }
    return min + Number(this.below(BigInt(max) - BigInt(min) + 1n));
  }

  /**
   * Uniform bigint in [0, bound)
   */
  private below(bound: bigint): bigint {
    // largest multiple of bound that fits in 64 bits
    const limit = UINT64_RANGE - (UINT64_RANGE % bound);
    for (;;) {
      const value = this.next64();
      if (value < limit) {
        return value % bound;
      }
    }
  }

  /**
   * Standard normal sample (Box-Muller)
   */
  gaussian(): number {
    // 1 - float() lies in (0, 1], keeping the logarithm finite
    const u1 = 1 - this.float();
    const u2 = this.float();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  /**
   * Fisher-Yates shuffle; does not modify the input
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot choose from an empty list");
    }
    return items[this.int(0, items.length - 1)];
  }
}

function splitMix64(value: bigint): bigint {
  let z = value;
  z = ((z ^ (z >> 30n)) * SPLITMIX64_MUL_1) & UINT64_MASK;
  z = ((z ^ (z >> 27n)) * SPLITMIX64_MUL_2) & UINT64_MASK;
  return z ^ (z >> 31n);
}

function rotl(x: bigint, k: bigint): bigint {
  return ((x << k) | (x >> (64n - k))) & UINT64_MASK;
}
