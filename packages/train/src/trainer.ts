/**
 * Training loop: shuffled minibatches, sum-of-squares loss, SGD.
 *
 * Runs as an Effect program that needs RngService and logs through the
 * Effect logger.
 */
import { Effect } from "effect";
import {
  ConfigError, TrainError, RngService,
  defaultTrainConfig, validateTrainConfig,
  type TrainConfig,
} from "@valuegraph/core";
import type { Value } from "@valuegraph/autograd";
import type { MLP } from "@valuegraph/nn";
import { nextBatch, type Sample } from "./data.js";
import { sse } from "./loss.js";
import { SGD } from "./optimizers.js";

export interface TrainReport {
  readonly iters: number;
  /** Loss of every step, before that step's update. */
  readonly losses: readonly number[];
  readonly finalLoss: number;
}

/** Summed loss of `model` over `batch`; builds a fresh graph. */
export function batchLoss(model: MLP, batch: readonly Sample[]): Value {
  const predictions: Value[] = [];
  const targets: number[] = [];
  for (const s of batch) {
    predictions.push(...model.forwardAll(s.x));
    targets.push(...s.y);
  }
  return sse(predictions, targets);
}

/** Forward pass returning plain numbers. */
export function predict(model: MLP, x: readonly number[]): number[] {
  return model.forwardAll(x).map((v) => v.value);
}

export function train(
  model: MLP,
  samples: readonly Sample[],
  config: TrainConfig = defaultTrainConfig,
): Effect.Effect<TrainReport, ConfigError | TrainError, RngService> {
  return Effect.gen(function* () {
    yield* Effect.try({
      try: () => validateTrainConfig(config),
      catch: (e) => e instanceof ConfigError ? e : new ConfigError({ message: String(e), cause: e }),
    });
    if (samples.length === 0) {
      return yield* Effect.fail(new TrainError({ message: "No training samples" }));
    }

    const rng = yield* RngService;
    const optimizer = new SGD(model.parameters(), { lr: config.lr });
    const losses: number[] = [];
    yield* Effect.logInfo(`training ${model} on ${samples.length} samples for ${config.iters} iters`);

    for (let iter = 1; iter <= config.iters; iter++) {
      const batch = nextBatch(samples, rng, config.batchSize);
      const loss = yield* Effect.try({
        try: () => batchLoss(model, batch),
        catch: (e) => new TrainError({ message: `Forward pass failed at iter ${iter}: ${e}`, cause: e }),
      });
      if (!Number.isFinite(loss.value)) {
        return yield* Effect.fail(new TrainError({ message: `Loss became non-finite (${loss.value}) at iter ${iter}` }));
      }

      optimizer.zeroGrad();
      loss.backward();
      optimizer.step();
      losses.push(loss.value);

      yield* Effect.logDebug(`iter ${iter} loss=${loss.value}`);
      const logNow = iter === config.iters || (config.logInterval > 0 && iter % config.logInterval === 0);
      if (logNow) {
        yield* Effect.logInfo(`iter ${iter}/${config.iters} | loss ${loss.value.toFixed(6)}`);
      }
    }

    return { iters: config.iters, losses, finalLoss: losses[losses.length - 1] };
  }).pipe(Effect.withSpan("train"));
}
