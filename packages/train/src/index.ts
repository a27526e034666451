export { type Sample, parseSamples, loadSamples, shuffle, nextBatch } from "./data.js";
export { sse } from "./loss.js";
export { type Optimizer, type SGDConfig, SGD } from "./optimizers.js";
export { type TrainReport, train, batchLoss, predict } from "./trainer.js";
