export {
  InvalidExponentType,
  DimensionMismatch,
  ConfigError,
  TrainError,
} from "./errors.js";
export { type Rng, RngService } from "./interfaces.js";
export { SeededRng, defaultRng } from "./rng.js";
export {
  type Activation,
  type ModelConfig,
  type TrainConfig,
  type LogLevelName,
  activations,
  logLevelNames,
  isActivation,
  parseActivation,
  parseLogLevelName,
  defaultModelConfig,
  defaultTrainConfig,
  validateModelConfig,
  validateTrainConfig,
} from "./types.js";
