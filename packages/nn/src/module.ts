/**
 * Base class for anything that owns learnable parameters.
 */
import { DimensionMismatch } from "@valuegraph/core";
import type { Activation } from "@valuegraph/core";
import type { Value } from "@valuegraph/autograd";

export abstract class Module {
  /** Learnable leaves in a fixed order: optimizers index into this list. */
  abstract parameters(): Value[];

  /** Reset grad on every parameter. Intermediate nodes are left alone. */
  zeroGrad(): void {
    for (const p of this.parameters()) p.grad = 0;
  }
}

export function assertWidth(owner: string, expected: number, actual: number): void {
  if (expected !== actual) {
    throw new DimensionMismatch({
      message: `${owner} expects ${expected} inputs, got ${actual}`,
      expected,
      actual,
    });
  }
}

export function activate(x: Value, activation: Activation): Value {
  switch (activation) {
    case "tanh": return x.tanh();
    case "relu": return x.relu();
    case "linear": return x;
  }
}
