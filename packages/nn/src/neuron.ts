import { defaultRng, type Activation, type Rng } from "@valuegraph/core";
import { Value, sum, type Operand } from "@valuegraph/autograd";
import { Module, activate, assertWidth } from "./module.js";

export interface NeuronOptions {
  /** Defaults to "tanh". */
  readonly activation?: Activation;
  /** Source of the uniform [-1, 1) initial weights. */
  readonly rng?: Rng;
}

/** activation(w · x + b) over a fixed number of inputs. */
export class Neuron extends Module {
  readonly inputWidth: number;
  readonly weights: readonly Value[];
  readonly bias: Value;
  readonly activation: Activation;

  constructor(inputWidth: number, options: NeuronOptions = {}) {
    super();
    const rng = options.rng ?? defaultRng;
    this.inputWidth = inputWidth;
    this.activation = options.activation ?? "tanh";
    this.weights = Array.from({ length: inputWidth }, () => new Value(rng.uniform(-1, 1)));
    this.bias = new Value(rng.uniform(-1, 1));
  }

  forward(x: readonly Operand[]): Value {
    assertWidth(this.toString(), this.inputWidth, x.length);
    const act = sum(this.weights.map((w, i) => w.mul(x[i])), this.bias);
    return activate(act, this.activation);
  }

  parameters(): Value[] {
    return [...this.weights, this.bias];
  }

  toString(): string {
    return `Neuron(${this.inputWidth})`;
  }
}
