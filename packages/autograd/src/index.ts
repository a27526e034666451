export { Value, sum, type Operand, type LocalRule } from "./value.js";
export { topologicalOrder, type GraphNode } from "./topo.js";
