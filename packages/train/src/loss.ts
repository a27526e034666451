import { DimensionMismatch } from "@valuegraph/core";
import { sum, type Operand, type Value } from "@valuegraph/autograd";

/** Sum of squared errors, Σ (pᵢ − tᵢ)². */
export function sse(predictions: readonly Value[], targets: readonly Operand[]): Value {
  if (predictions.length !== targets.length) {
    throw new DimensionMismatch({
      message: `sse: ${predictions.length} predictions for ${targets.length} targets`,
      expected: predictions.length,
      actual: targets.length,
    });
  }
  return sum(predictions.map((p, i) => p.sub(targets[i]).pow(2)));
}
