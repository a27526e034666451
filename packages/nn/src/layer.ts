import type { Value, Operand } from "@valuegraph/autograd";
import { Module, assertWidth } from "./module.js";
import { Neuron, type NeuronOptions } from "./neuron.js";

/** A row of neurons that all read the same input. */
export class Layer extends Module implements Iterable<Neuron> {
  readonly inputWidth: number;
  readonly neurons: readonly Neuron[];

  constructor(inputWidth: number, outputWidth: number, options: NeuronOptions = {}) {
    super();
    this.inputWidth = inputWidth;
    this.neurons = Array.from({ length: outputWidth }, () => new Neuron(inputWidth, options));
  }

  get outputWidth(): number {
    return this.neurons.length;
  }

  /** One output per neuron, in neuron order. */
  forwardAll(x: readonly Operand[]): Value[] {
    assertWidth(`Layer(${this.inputWidth}, ${this.outputWidth})`, this.inputWidth, x.length);
    return this.neurons.map((n) => n.forward(x));
  }

  /** Like forwardAll, but a single-neuron layer returns its output bare. */
  forward(x: readonly Operand[]): Value | Value[] {
    const outs = this.forwardAll(x);
    return outs.length === 1 ? outs[0] : outs;
  }

  parameters(): Value[] {
    return this.neurons.flatMap((n) => n.parameters());
  }

  [Symbol.iterator](): Iterator<Neuron> {
    return this.neurons[Symbol.iterator]();
  }

  toString(): string {
    return `Layer of [${this.neurons.join(", ")}]`;
  }
}
