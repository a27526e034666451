export { Module } from "./module.js";
export { Neuron, type NeuronOptions } from "./neuron.js";
export { Layer } from "./layer.js";
export { MLP, type MLPOptions } from "./mlp.js";
