/**
 * Optimizers over scalar parameters.
 *
 * They read `grad` and write `value` on the leaves a Module hands out from
 * parameters(); nothing else in the graph is touched.
 */
import type { Value } from "@valuegraph/autograd";

export interface Optimizer {
  readonly name: string;
  step(): void;
  zeroGrad(): void;
}

// ── SGD ────────────────────────────────────────────────────────────────────

export interface SGDConfig {
  lr: number;
}

export class SGD implements Optimizer {
  readonly name = "sgd";
  private _step = 0;
  private readonly params: readonly Value[];
  lr: number;

  constructor(params: readonly Value[], config: Partial<SGDConfig> = {}) {
    this.params = params;
    this.lr = config.lr ?? 0.01;
  }

  /** p.value -= lr * p.grad for every parameter. */
  step(): void {
    for (const p of this.params) p.value -= this.lr * p.grad;
    this._step++;
  }

  zeroGrad(): void {
    for (const p of this.params) p.grad = 0;
  }

  get stepCount(): number {
    return this._step;
  }
}
