/**
 * Seeded PRNG (32-bit xorshift128+ variant) owned by a single consumer.
 *
 * Nothing here touches a process-wide generator: two instances built from the
 * same seed always produce the same stream, whatever else runs in the process.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  readonly seed: number;
  private _s0: number;
  private _s1: number;
  private _spare: number | null = null;

  constructor(seed = 0) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.seed = seed;
    // Fold the high word in so seeds above 2^32 still differ.
    const lo = seed >>> 0;
    const hi = Math.floor(seed / 0x100000000) >>> 0;
    this._s0 = (lo ^ 0x9e3779b9) >>> 0;
    this._s1 = (hi ^ lo ^ 0xdeadbeef) >>> 0;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1 >>> 0;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Standard normal sample (Marsaglia polar method, spare cached). */
  nextGauss(): number {
    if (this._spare !== null) {
      const spare = this._spare;
      this._spare = null;
      return spare;
    }
    let u: number, v: number, s: number;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const mul = Math.sqrt((-2.0 * Math.log(s)) / s);
    this._spare = v * mul;
    return u * mul;
  }

  /** Row-major `rows × cols` block of standard normal samples. */
  gaussianMatrix(rows: number, cols: number): Float64Array {
    const out = new Float64Array(rows * cols);
    for (let i = 0; i < out.length; i++) out[i] = this.nextGauss();
    return out;
  }
}
