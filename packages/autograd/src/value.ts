/**
 * Scalar reverse-mode autograd.
 *
 * A Value is one vertex of the computational graph. Leaves are built with
 * `new Value(x)`; every operation returns a fresh Value that records its
 * operands and the local derivative rule needed to push its gradient back
 * onto them. backward() orders the reachable DAG and runs those rules from
 * the root down to the leaves.
 */
import { InvalidExponentType } from "@valuegraph/core";
import { topologicalOrder } from "./topo.js";

/** Anything an operation accepts: a graph node or a plain number. */
export type Operand = Value | number;

// ── Local rules ────────────────────────────────────────────────────────────

/** How a node was produced; fixed at construction, dispatched on by propagate(). */
export type LocalRule =
  | { readonly kind: "leaf" }
  | { readonly kind: "add"; readonly lhs: Value; readonly rhs: Value }
  | { readonly kind: "mul"; readonly lhs: Value; readonly rhs: Value }
  | { readonly kind: "pow"; readonly base: Value; readonly exponent: number }
  | { readonly kind: "exp"; readonly input: Value }
  | { readonly kind: "tanh"; readonly input: Value }
  | { readonly kind: "relu"; readonly input: Value };

const LEAF: LocalRule = { kind: "leaf" };

function ruleInputs(rule: LocalRule): Value[] {
  switch (rule.kind) {
    case "leaf": return [];
    case "add":
    case "mul": return rule.lhs === rule.rhs ? [rule.lhs] : [rule.lhs, rule.rhs];
    case "pow": return [rule.base];
    case "exp":
    case "tanh":
    case "relu": return [rule.input];
  }
}

function ruleTag(rule: LocalRule): string {
  switch (rule.kind) {
    case "leaf": return "";
    case "add": return "+";
    case "mul": return "*";
    case "pow": return `**${rule.exponent}`;
    case "exp":
    case "tanh":
    case "relu": return rule.kind;
  }
}

// ── Value ──────────────────────────────────────────────────────────────────
let _nextId = 0;

export class Value {
  readonly id: number;
  /** Forward result. Only optimizers write it, and only on parameters. */
  value: number;
  /** Accumulated d(root)/d(this) from the last backward pass(es). */
  grad = 0;
  /** Distinct nodes this one was computed from; empty for leaves. */
  readonly operands: readonly Value[];
  /** Diagnostic tag of the producing operation ("+", "*", "tanh", ...). */
  readonly op: string;
  readonly rule: LocalRule;
  label: string;

  constructor(value: number, label = "", rule: LocalRule = LEAF) {
    this.id = _nextId++;
    this.value = value;
    this.label = label;
    this.rule = rule;
    this.operands = ruleInputs(rule);
    this.op = ruleTag(rule);
  }

  /** Coerce a plain number into a leaf; Values pass through unchanged. */
  static from(x: Operand): Value {
    return x instanceof Value ? x : new Value(x);
  }

  // ── Primitive operations ────────────────────────────────────────────────

  add(other: Operand): Value {
    const o = Value.from(other);
    return new Value(this.value + o.value, "", { kind: "add", lhs: this, rhs: o });
  }

  mul(other: Operand): Value {
    const o = Value.from(other);
    return new Value(this.value * o.value, "", { kind: "mul", lhs: this, rhs: o });
  }

  /** Raise to a constant power. Node-valued exponents are not supported. */
  pow(exponent: Operand): Value {
    if (typeof exponent !== "number") {
      throw new InvalidExponentType({
        message: `pow only supports number exponents, got a Value (id=${exponent.id})`,
      });
    }
    return new Value(this.value ** exponent, "", { kind: "pow", base: this, exponent });
  }

  exp(): Value {
    return new Value(Math.exp(this.value), "", { kind: "exp", input: this });
  }

  tanh(): Value {
    const e = Math.exp(2 * this.value);
    return new Value((e - 1) / (e + 1), "", { kind: "tanh", input: this });
  }

  relu(): Value {
    return new Value(Math.max(0, this.value), "", { kind: "relu", input: this });
  }

  // ── Derived operations ──────────────────────────────────────────────────

  neg(): Value {
    return this.mul(-1);
  }

  sub(other: Operand): Value {
    return this.add(Value.from(other).neg());
  }

  /** other - this */
  rsub(other: Operand): Value {
    return Value.from(other).sub(this);
  }

  /** Division by a zero-valued node gives ±Infinity or NaN, not an error. */
  div(other: Operand): Value {
    return this.mul(Value.from(other).pow(-1));
  }

  /** other / this */
  rdiv(other: Operand): Value {
    return Value.from(other).div(this);
  }

  abs(): Value {
    return this.value < 0 ? this.neg() : this;
  }

  // ── Comparison (no graph effect) ────────────────────────────────────────

  gt(other: Operand): boolean {
    return this.value > Value.from(other).value;
  }

  lt(other: Operand): boolean {
    return this.value < Value.from(other).value;
  }

  // ── Backward ────────────────────────────────────────────────────────────

  /**
   * Push this node's gradient onto its operands. Accumulates, so a node used
   * along several paths sums the contribution of each.
   */
  propagate(): void {
    const rule = this.rule;
    const g = this.grad;
    switch (rule.kind) {
      case "leaf":
        return;
      case "add":
        rule.lhs.grad += g;
        rule.rhs.grad += g;
        return;
      case "mul":
        rule.lhs.grad += rule.rhs.value * g;
        rule.rhs.grad += rule.lhs.value * g;
        return;
      case "pow":
        rule.base.grad += rule.exponent * rule.base.value ** (rule.exponent - 1) * g;
        return;
      case "exp":
        rule.input.grad += this.value * g;
        return;
      case "tanh":
        rule.input.grad += (1 - this.value ** 2) * g;
        return;
      case "relu":
        rule.input.grad += (this.value > 0 ? 1 : 0) * g;
        return;
    }
  }

  /**
   * Backpropagate from this node: seed grad = 1 and run every reachable
   * node's local rule in reverse topological order.
   *
   * Gradients are not reset first; call zeroGrad() on the owning module
   * between passes over overlapping graphs.
   */
  backward(): void {
    const order = topologicalOrder<Value>(this);
    this.grad = 1;
    for (let i = order.length - 1; i >= 0; i--) {
      order[i].propagate();
    }
  }

  toString(): string {
    const prefix = this.label ? `${this.label}: ` : "";
    return `${prefix}Value(value=${this.value}, grad=${this.grad})`;
  }
}

/** start + values[0] + values[1] + ... as a chain of add nodes. */
export function sum(values: readonly Operand[], start: Operand = 0): Value {
  let acc = Value.from(start);
  for (const v of values) acc = acc.add(v);
  return acc;
}
