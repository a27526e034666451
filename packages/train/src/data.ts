/**
 * Minimal data pipeline: labelled samples from JSON, shuffled minibatches.
 */
import { Effect } from "effect";
import { TrainError, type Rng } from "@valuegraph/core";

export interface Sample {
  readonly x: readonly number[];
  readonly y: readonly number[];
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === "number");
}

/**
 * Validate parsed JSON of the form `[{ "x": number[], "y": number | number[] }]`.
 * A scalar `y` becomes a one-element target.
 */
export function parseSamples(raw: unknown): Sample[] {
  if (!Array.isArray(raw)) {
    throw new TrainError({ message: "samples must be a JSON array" });
  }
  return raw.map((entry: unknown, i) => {
    if (typeof entry !== "object" || entry === null) {
      throw new TrainError({ message: `sample ${i} is not an object` });
    }
    const x: unknown = "x" in entry ? entry.x : undefined;
    const y: unknown = "y" in entry ? entry.y : undefined;
    if (!isNumberArray(x)) {
      throw new TrainError({ message: `sample ${i}: "x" must be an array of numbers` });
    }
    if (typeof y === "number") return { x, y: [y] };
    if (!isNumberArray(y)) {
      throw new TrainError({ message: `sample ${i}: "y" must be a number or an array of numbers` });
    }
    return { x, y };
  });
}

export function loadSamples(path: string): Effect.Effect<Sample[], TrainError> {
  return Effect.tryPromise({
    try: async () => {
      const fs = await import("node:fs/promises");
      const raw = await fs.readFile(path, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    },
    catch: (e) => new TrainError({ message: `Failed to load samples from ${path}: ${e}`, cause: e }),
  }).pipe(
    Effect.flatMap((raw) => Effect.try({
      try: () => parseSamples(raw),
      catch: (e) => e instanceof TrainError ? e : new TrainError({ message: String(e), cause: e }),
    })),
  );
}

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], rng: Rng): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}

/** A shuffled batch of `batchSize` samples, or all of them when batchSize is 0. */
export function nextBatch(samples: readonly Sample[], rng: Rng, batchSize: number): Sample[] {
  const shuffled = shuffle(samples, rng);
  return batchSize > 0 ? shuffled.slice(0, batchSize) : shuffled;
}
