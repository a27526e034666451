/**
 * Effect layers for dependency injection.
 */
import { Layer } from "effect";
import { RngService, SeededRng, type Rng } from "@valuegraph/core";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number) =>
  Layer.succeed(RngService, new SeededRng(seed));

export const RngFrom = (rng: Rng) =>
  Layer.succeed(RngService, rng);
