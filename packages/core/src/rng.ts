/**
 * Seeded PRNG (xorshift128+) so parameter initialization is reproducible.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _s0 = 0;
  private _s1 = 0;
  private _seed = 0;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this._seed = s;
    this._s0 = s;
    this._s1 = s ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  state(): number {
    return this._seed;
  }

  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  uniform(lo: number, hi: number): number {
    return lo + (hi - lo) * this.next();
  }
}

/** Process-wide RNG used when a module is built without one. */
export const defaultRng: Rng = new SeededRng(Date.now() & 0x7fffffff);
