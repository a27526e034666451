/**
 * Command: valuegraph train
 */
import { Effect } from "effect";
import { parseKV, intArg, intListArg, floatArg, strArg, loadConfig } from "../parse.js";
import {
  SeededRng, defaultModelConfig, defaultTrainConfig, parseActivation, parseLogLevelName,
  type ModelConfig, type TrainConfig,
} from "@valuegraph/core";
import { MLP } from "@valuegraph/nn";
import { train, loadSamples, predict, type Sample } from "@valuegraph/train";
import { RngFrom, loggingLayer, withSpan } from "@valuegraph/effect-runtime";

/** Used when no --data file is given: the sign of x0 * x1, plus noise inputs. */
const toySamples: readonly Sample[] = [
  { x: [1.5, 2.0, -0.5], y: [1] },
  { x: [-1.0, 2.5, 0.3], y: [-1] },
  { x: [0.8, -1.2, 1.0], y: [-1] },
  { x: [-2.0, -0.7, -1.1], y: [1] },
];

export async function trainCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const outputActivation = kv["outputActivation"];

  const samples = kv["data"]
    ? await Effect.runPromise(loadSamples(kv["data"]))
    : [...toySamples];

  const trainConfig: TrainConfig = {
    iters: intArg(kv, "iters", defaultTrainConfig.iters),
    lr: floatArg(kv, "lr", defaultTrainConfig.lr),
    batchSize: intArg(kv, "batch", defaultTrainConfig.batchSize),
    seed: intArg(kv, "seed", defaultTrainConfig.seed),
    logLevel: parseLogLevelName(strArg(kv, "log", defaultTrainConfig.logLevel)),
    logInterval: intArg(kv, "logInterval", defaultTrainConfig.logInterval),
  };

  const modelConfig: ModelConfig = {
    inputWidth: samples[0]?.x.length ?? defaultModelConfig.inputWidth,
    layerWidths: intListArg(kv, "layers", defaultModelConfig.layerWidths),
    activation: parseActivation(strArg(kv, "activation", defaultModelConfig.activation)),
    outputActivation: outputActivation
      ? parseActivation(outputActivation, "outputActivation")
      : undefined,
  };

  const rng = new SeededRng(trainConfig.seed);
  const model = MLP.fromConfig(modelConfig, rng);

  const program = withSpan("cli.train", train(model, samples, trainConfig)).pipe(
    Effect.provide(RngFrom(rng)),
    Effect.provide(loggingLayer(trainConfig.logLevel)),
  );
  const report = await Effect.runPromise(program);

  console.log(`\nfinal loss: ${report.finalLoss.toFixed(6)} after ${report.iters} iters`);
  for (const s of samples) {
    const out = predict(model, s.x).map((v) => v.toFixed(4)).join(", ");
    console.log(`  x=[${s.x.join(", ")}]  y=[${s.y.join(", ")}]  pred=[${out}]`);
  }
}
