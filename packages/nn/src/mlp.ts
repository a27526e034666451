/**
 * Multilayer perceptron: layers chained so that layer i's neuron count is
 * layer i+1's input width.
 */
import { defaultRng, validateModelConfig, type Activation, type ModelConfig, type Rng } from "@valuegraph/core";
import { Value, type Operand } from "@valuegraph/autograd";
import { Module, assertWidth } from "./module.js";
import { Layer } from "./layer.js";

export interface MLPOptions {
  /** Activation of every layer; defaults to "tanh". */
  readonly activation?: Activation;
  /** Overrides `activation` on the last layer only. */
  readonly outputActivation?: Activation;
  readonly rng?: Rng;
}

export class MLP extends Module implements Iterable<Layer> {
  readonly inputWidth: number;
  readonly layers: readonly Layer[];

  constructor(inputWidth: number, layerWidths: readonly number[], options: MLPOptions = {}) {
    super();
    const rng = options.rng ?? defaultRng;
    const activation = options.activation ?? "tanh";
    const last = layerWidths.length - 1;
    const sizes = [inputWidth, ...layerWidths];

    this.inputWidth = inputWidth;
    this.layers = layerWidths.map((width, i) => new Layer(sizes[i], width, {
      rng,
      activation: i === last ? options.outputActivation ?? activation : activation,
    }));
  }

  /** Build from a validated ModelConfig. */
  static fromConfig(config: ModelConfig, rng?: Rng): MLP {
    validateModelConfig(config);
    return new MLP(config.inputWidth, config.layerWidths, {
      activation: config.activation,
      outputActivation: config.outputActivation,
      rng,
    });
  }

  /** Output nodes of the last layer, always as a sequence. */
  forwardAll(x: readonly Operand[]): Value[] {
    assertWidth("MLP", this.inputWidth, x.length);
    let h = x.map((xi) => Value.from(xi));
    for (const layer of this.layers) h = layer.forwardAll(h);
    return h;
  }

  /** Like forwardAll, but a single-output model returns its node bare. */
  forward(x: readonly Operand[]): Value | Value[] {
    const outs = this.forwardAll(x);
    return outs.length === 1 ? outs[0] : outs;
  }

  parameters(): Value[] {
    return this.layers.flatMap((l) => l.parameters());
  }

  [Symbol.iterator](): Iterator<Layer> {
    return this.layers[Symbol.iterator]();
  }

  toString(): string {
    return `MLP of [${this.layers.join(", ")}]`;
  }
}
