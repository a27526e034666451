import { describe, it, expect } from "vitest";
import { Value, sum, topologicalOrder } from "@valuegraph/autograd";

describe("backward", () => {
  it("accumulates x + x", () => {
    const x = new Value(3);
    const y = x.add(x);
    y.backward();
    expect(x.grad).toBe(2);
  });

  it("applies the product rule", () => {
    const a = new Value(3);
    const b = new Value(4);
    const y = a.mul(b);
    y.backward();
    expect(a.grad).toBe(4);
    expect(b.grad).toBe(3);
  });

  it("chains through tanh", () => {
    const x = new Value(0);
    const y = x.tanh();
    y.backward();
    expect(y.value).toBe(0);
    expect(x.grad).toBe(1);
  });

  it("applies the power rule", () => {
    const x = new Value(2);
    const y = x.pow(3);
    y.backward();
    expect(y.value).toBe(8);
    expect(x.grad).toBe(12);
  });

  it("differentiates exp and relu", () => {
    const x = new Value(1);
    const e = x.exp();
    e.backward();
    expect(x.grad).toBeCloseTo(Math.E, 12);

    const p = new Value(3);
    p.relu().backward();
    expect(p.grad).toBe(1);

    const n = new Value(-2);
    n.relu().backward();
    expect(n.grad).toBe(0);

    const z = new Value(0);
    z.relu().backward();
    expect(z.grad).toBe(0);
  });

  it("matches hand-computed gradients on a multi-level expression", () => {
    const a = new Value(2, "a");
    const b = new Value(-3, "b");
    const c = new Value(10, "c");
    const e = a.mul(b);
    const d = e.add(c);
    const f = new Value(-2, "f");
    const L = d.mul(f);

    L.backward();

    expect(L.value).toBe(-8);
    expect(L.grad).toBe(1);
    expect(d.grad).toBe(-2);
    expect(f.grad).toBe(4);
    expect(e.grad).toBe(-2);
    expect(c.grad).toBe(-2);
    expect(a.grad).toBe(6);
    expect(b.grad).toBe(-4);
  });

  it("sums contributions from every path through a shared node", () => {
    // y = x*x + x, dy/dx = 2x + 1
    const x = new Value(3);
    const y = x.mul(x).add(x);
    y.backward();
    expect(y.value).toBe(12);
    expect(x.grad).toBe(7);
  });

  it("propagates a node only after all of its consumers", () => {
    // s feeds both t and u; both must reach s before s pushes to x.
    const x = new Value(0.5);
    const s = x.mul(2);
    const t = s.tanh();
    const u = s.pow(2);
    const y = t.add(u);
    y.backward();

    const sv = 1;
    const expectedS = (1 - Math.tanh(sv) ** 2) + 2 * sv;
    expect(s.grad).toBeCloseTo(expectedS, 12);
    expect(x.grad).toBeCloseTo(2 * expectedS, 12);
  });

  it("only seeds the gradient on a leaf root", () => {
    const v = new Value(5);
    v.backward();
    expect(v.grad).toBe(1);
  });

  it("does not reset gradients between passes", () => {
    const x = new Value(2);
    const y = x.mul(3);
    y.backward();
    y.backward();
    expect(x.grad).toBe(6);
  });

  it("handles graphs deeper than the call stack", () => {
    const x = new Value(1);
    let acc = new Value(0);
    for (let i = 0; i < 50_000; i++) acc = acc.add(x);
    acc.backward();
    expect(acc.value).toBe(50_000);
    expect(x.grad).toBe(50_000);
  });

  it("agrees with a central finite difference", () => {
    const f = (xv: number, yv: number): Value => {
      const x = new Value(xv);
      const y = new Value(yv);
      return x.mul(y).tanh().add(x.div(y)).sub(y.pow(2).exp().mul(0.1));
    };
    const x0 = 0.7, y0 = -1.3, eps = 1e-6;

    const x = new Value(x0);
    const y = new Value(y0);
    const out = x.mul(y).tanh().add(x.div(y)).sub(y.pow(2).exp().mul(0.1));
    out.backward();

    const numX = (f(x0 + eps, y0).value - f(x0 - eps, y0).value) / (2 * eps);
    const numY = (f(x0, y0 + eps).value - f(x0, y0 - eps).value) / (2 * eps);
    expect(x.grad).toBeCloseTo(numX, 4);
    expect(y.grad).toBeCloseTo(numY, 4);
  });
});

describe("topologicalOrder", () => {
  it("lists operands before the nodes built from them", () => {
    const a = new Value(1);
    const b = new Value(2);
    const c = a.mul(b);
    const d = c.add(a);

    const order = topologicalOrder<Value>(d);
    expect(order.map((n) => n.id)).toEqual([a.id, b.id, c.id, d.id]);
  });

  it("visits each node once", () => {
    const x = new Value(1);
    const y = sum([x, x, x.mul(x)]);
    const order = topologicalOrder<Value>(y);
    expect(new Set(order).size).toBe(order.length);
    for (const node of order) {
      const at = order.indexOf(node);
      for (const operand of node.operands) {
        expect(order.indexOf(operand)).toBeLessThan(at);
      }
    }
    expect(order[order.length - 1]).toBe(y);
  });
});
