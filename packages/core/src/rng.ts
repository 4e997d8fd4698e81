/**
 * Seeded PRNG (xorshift128+) for reproducible weight init and sampling.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private s0 = 0;
  private s1 = 0;
  private spare: number | null = null;

  constructor(seed = 42) {
    this.seed(seed);
  }

  seed(s: number): void {
    this.s0 = s | 0;
    this.s1 = (s ^ 0xdeadbeef) | 0;
    this.spare = null;
    // discard the first outputs: low-entropy seeds start correlated
    for (let i = 0; i < 20; i++) this.next();
  }

  /** Uniform in [0, 1). */
  next(): number {
    let x = this.s0;
    const y = this.s1;
    this.s0 = y;
    x ^= x << 23;
    x ^= x >>> 17;
    x ^= y;
    x ^= y >>> 26;
    this.s1 = x;
    return ((this.s0 + this.s1) >>> 0) / 0x100000000;
  }

  /** Uniform integer in [0, n). */
  nextInt(n: number): number {
    return Math.min(n - 1, Math.floor(this.next() * n));
  }

  /** Standard normal sample (Marsaglia polar method). */
  nextGauss(): number {
    if (this.spare !== null) {
      const s = this.spare;
      this.spare = null;
      return s;
    }
    let u: number, v: number, s: number;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const k = Math.sqrt((-2 * Math.log(s)) / s);
    this.spare = v * k;
    return u * k;
  }
}
