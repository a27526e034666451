/**
 * Subsystem interfaces (ports).
 */
import { Context } from "effect";

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  /** Returns a number in [0, 1). */
  next(): number;
  /** Returns a number in [lo, hi). */
  uniform(lo: number, hi: number): number;
  /** The seed the current stream started from. */
  state(): number;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
