/**
 * @lsmgen/test-utils - Random Number Utilities
 *
 * Seedable pseudo-random number generator for reproducible fixtures.
 * Uses xorshift128+ with state kept to 64 bits.
 */

const BITS_64 = 64;

function splitmix(seed: number): bigint {
  let s = BigInt.asUintN(BITS_64, BigInt(seed));
  s = BigInt.asUintN(BITS_64, (s ^ (s >> 30n)) * 0xbf58476d1ce4e5b9n);
  s = BigInt.asUintN(BITS_64, (s ^ (s >> 27n)) * 0x94d049bb133111ebn);
  return s ^ (s >> 31n);
}

/**
 * Seedable PRNG using xorshift128+
 */
export class SeededRandom {
  private state0: bigint;
  private state1: bigint;

  constructor(readonly seed: number = Date.now()) {
    this.state0 = splitmix(seed);
    this.state1 = splitmix(seed + 1);
  }

  /**
   * Get next random 64-bit value
   */
  private next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    const result = BigInt.asUintN(BITS_64, s0 + s1);
    this.state0 = s0;
    s1 = BigInt.asUintN(BITS_64, s1 ^ (s1 << 23n));
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n);
    return result;
  }

  /**
   * Get random float in [0, 1)
   */
  random(): number {
    const value = this.next();
    return Number(value & 0x1FFFFFFFFFFFFFn) / 0x20000000000000;
  }

  /**
   * Get random integer in [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  /**
   * Get random boolean with given probability of true
   */
  bool(probability: number = 0.5): boolean {
    return this.random() < probability;
  }

  /**
   * Pick random element from a non-empty array
   */
  pick<T>(array: readonly T[]): T {
    return array[this.int(0, array.length - 1)];
  }

  /**
   * Generate random string of given length
   */
  string(length: number, charset: string = 'abcdefghijklmnopqrstuvwxyz0123456789'): string {
    let result = '';
    for (let i = 0; i < length; i++) {
      result += charset[this.int(0, charset.length - 1)];
    }
    return result;
  }

  /**
   * Generate UUID v4
   */
  uuid(): string {
    const hex = '0123456789abcdef';
    let uuid = '';
    for (let i = 0; i < 36; i++) {
      if (i === 8 || i === 13 || i === 18 || i === 23) {
        uuid += '-';
      } else if (i === 14) {
        uuid += '4';
      } else if (i === 19) {
        uuid += hex[this.int(8, 11)];
      } else {
        uuid += hex[this.int(0, 15)];
      }
    }
    return uuid;
  }
}

/**
 * Create random instance with specific seed
 */
export function createRandom(seed: number): SeededRandom {
  return new SeededRandom(seed);
}
