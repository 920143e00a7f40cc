const STATE_SIZE = 624;
const SHIFT_SIZE = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;
const DEFAULT_SEED = 5489;
const ARRAY_INIT_SEED = 19650218;
const TWO_POW_32 = 0x100000000;

export interface RandomGenerator {
  /** Uniform integer in `[0, upperExclusive)`. */
  randBelow: (upperExclusive: number) => number;
}

const bitLength = (value: number): number => 32 - Math.clz32(value);

/**
 * MT19937 with the reference `init_by_array` seeding. Integer seeds are
 * keyed by their 32-bit words, least significant first, so seeded
 * shuffles match other MT19937-based tooling that seeds the same way.
 */
export class MersenneTwister implements RandomGenerator {
  private readonly state = new Uint32Array(STATE_SIZE);
  private index = STATE_SIZE + 1;

  constructor(key?: readonly number[]) {
    if (key) {
      this.initByArray(key);
    }
  }

  static fromSeed(seed: number): MersenneTwister {
    if (!Number.isSafeInteger(seed)) {
      throw new Error(`Seed must be a safe integer, received ${seed}.`);
    }

    const magnitude = Math.abs(seed);
    const low = magnitude % TWO_POW_32;
    const high = Math.floor(magnitude / TWO_POW_32);
    return new MersenneTwister(high > 0 ? [low, high] : [low]);
  }

  nextUint32(): number {
    if (this.index >= STATE_SIZE) {
      if (this.index === STATE_SIZE + 1) {
        this.initGenrand(DEFAULT_SEED);
      }
      this.twist();
    }

    let y = this.state[this.index];
    this.index += 1;
    y ^= y >>> 11;
    y ^= (y << 7) & 0x9d2c5680;
    y ^= (y << 15) & 0xefc60000;
    y ^= y >>> 18;
    return y >>> 0;
  }

  getRandBits(bits: number): number {
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new RangeError(`bits must be an integer in [1, 32], received ${bits}.`);
    }
    return this.nextUint32() >>> (32 - bits);
  }

  randBelow(upperExclusive: number): number {
    if (
      !Number.isInteger(upperExclusive) ||
      upperExclusive <= 0 ||
      upperExclusive > LOWER_MASK
    ) {
      throw new RangeError(
        `upperExclusive must be a positive 31-bit integer, received ${upperExclusive}.`,
      );
    }

    // Rejection sampling over the top k bits keeps the draw unbiased.
    const bits = bitLength(upperExclusive);
    let value = this.getRandBits(bits);
    while (value >= upperExclusive) {
      value = this.getRandBits(bits);
    }
    return value;
  }

  private initGenrand(seed: number): void {
    const mt = this.state;
    mt[0] = seed >>> 0;
    for (let i = 1; i < STATE_SIZE; i += 1) {
      const previous = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = Math.imul(1812433253, previous) + i;
    }
    this.index = STATE_SIZE;
  }

  private initByArray(key: readonly number[]): void {
    const mt = this.state;
    const keyLength = Math.max(key.length, 1);
    this.initGenrand(ARRAY_INIT_SEED);

    let i = 1;
    let j = 0;
    for (let k = Math.max(STATE_SIZE, keyLength); k > 0; k -= 1) {
      const previous = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = (mt[i] ^ Math.imul(previous, 1664525)) + (key[j] ?? 0) + j;
      i += 1;
      j += 1;
      if (i >= STATE_SIZE) {
        mt[0] = mt[STATE_SIZE - 1];
        i = 1;
      }
      if (j >= keyLength) {
        j = 0;
      }
    }

    for (let k = STATE_SIZE - 1; k > 0; k -= 1) {
      const previous = mt[i - 1] ^ (mt[i - 1] >>> 30);
      mt[i] = (mt[i] ^ Math.imul(previous, 1566083941)) - i;
      i += 1;
      if (i >= STATE_SIZE) {
        mt[0] = mt[STATE_SIZE - 1];
        i = 1;
      }
    }

    mt[0] = UPPER_MASK;
  }

  private twist(): void {
    const mt = this.state;
    for (let kk = 0; kk < STATE_SIZE; kk += 1) {
      const y = (mt[kk] & UPPER_MASK) | (mt[(kk + 1) % STATE_SIZE] & LOWER_MASK);
      mt[kk] =
        mt[(kk + SHIFT_SIZE) % STATE_SIZE] ^
        (y >>> 1) ^
        ((y & 1) !== 0 ? MATRIX_A : 0);
    }
    this.index = 0;
  }
}

export const createSeededRandom = (seed: number): MersenneTwister =>
  MersenneTwister.fromSeed(seed);

/** Fisher–Yates, walking from the last index down. */
export const shuffleInPlace = <T>(items: T[], rng: RandomGenerator): void => {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = rng.randBelow(i + 1);
    const swap = items[i];
    items[i] = items[j];
    items[j] = swap;
  }
};
