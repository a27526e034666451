/**
 * Core config types and defaults.
 */
import { ConfigError } from "./errors.js";

// ── Activation ─────────────────────────────────────────────────────────────
export type Activation = "tanh" | "relu" | "linear";

export const activations: readonly Activation[] = ["tanh", "relu", "linear"];

export function isActivation(name: string): name is Activation {
  return activations.some((a) => a === name);
}

/** Narrow a user-supplied name, throwing ConfigError when it is not an Activation. */
export function parseActivation(name: string, field = "activation"): Activation {
  if (!isActivation(name)) {
    throw new ConfigError({ message: `Invalid ${field}: "${name}". Valid: ${activations.join(", ")}` });
  }
  return name;
}

// ── Model config ───────────────────────────────────────────────────────────
export interface ModelConfig {
  readonly inputWidth: number;
  readonly layerWidths: readonly number[];
  readonly activation: Activation;
  /** Activation of the last layer; defaults to `activation` when omitted. */
  readonly outputActivation?: Activation;
}

export const defaultModelConfig: ModelConfig = {
  inputWidth: 3,
  layerWidths: [4, 4, 1],
  activation: "tanh",
};

// ── Training config ────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export const logLevelNames: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export function parseLogLevelName(name: string): LogLevelName {
  const level = logLevelNames.find((l) => l === name);
  if (level === undefined) {
    throw new ConfigError({ message: `Invalid log level: "${name}". Valid: ${logLevelNames.join(", ")}` });
  }
  return level;
}

export interface TrainConfig {
  readonly iters: number;
  readonly lr: number;
  /** Samples per step, drawn after a shuffle (0 = the whole dataset). */
  readonly batchSize: number;
  readonly seed: number;
  readonly logLevel: LogLevelName;
  /** Log the loss every N iterations (0 = only the last one). */
  readonly logInterval: number;
}

export const defaultTrainConfig: TrainConfig = {
  iters: 100,
  lr: 0.05,
  batchSize: 0,
  seed: 42,
  logLevel: "info",
  logInterval: 10,
};

// ── Validation ─────────────────────────────────────────────────────────────

function isWidth(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

/** Validate a ModelConfig, throwing ConfigError on invalid values. */
export function validateModelConfig(config: ModelConfig): void {
  if (!isWidth(config.inputWidth)) {
    throw new ConfigError({ message: `inputWidth must be an integer >= 1, got ${config.inputWidth}` });
  }
  if (config.layerWidths.length === 0) {
    throw new ConfigError({ message: "layerWidths must name at least one layer" });
  }
  for (const w of config.layerWidths) {
    if (!isWidth(w)) {
      throw new ConfigError({ message: `layer widths must be integers >= 1, got ${w}` });
    }
  }
  parseActivation(config.activation);
  if (config.outputActivation !== undefined) {
    parseActivation(config.outputActivation, "outputActivation");
  }
}

/** Validate a TrainConfig, throwing ConfigError on invalid values. */
export function validateTrainConfig(config: TrainConfig): void {
  if (!Number.isInteger(config.iters) || config.iters < 1) {
    throw new ConfigError({ message: `iters must be an integer >= 1, got ${config.iters}` });
  }
  if (!(config.lr > 0) || !Number.isFinite(config.lr)) {
    throw new ConfigError({ message: `lr must be a finite number > 0, got ${config.lr}` });
  }
  if (!Number.isInteger(config.batchSize) || config.batchSize < 0) {
    throw new ConfigError({ message: `batchSize must be an integer >= 0, got ${config.batchSize}` });
  }
  if (!Number.isInteger(config.seed)) {
    throw new ConfigError({ message: `seed must be an integer, got ${config.seed}` });
  }
  if (!Number.isInteger(config.logInterval) || config.logInterval < 0) {
    throw new ConfigError({ message: `logInterval must be an integer >= 0, got ${config.logInterval}` });
  }
}
