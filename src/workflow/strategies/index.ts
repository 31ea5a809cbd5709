import type { PatchflowConfig } from "../../config/schema.js";
import { ConfigurationError } from "../../core/errors.js";
import { ParallelStrategy } from "./parallel.js";
import { SequentialStrategy } from "./sequential.js";
import type { ExecutionStrategy, ProcessingMode } from "./types.js";

export { ParallelStrategy, type ParallelStrategyOptions } from "./parallel.js";
export { SequentialStrategy } from "./sequential.js";
export type {
  ExecutionStrategy,
  ProcessingMode,
  StrategyContext,
  StrategyResult,
  StrategyTiming,
} from "./types.js";

export type StrategyRegistry = ReadonlyMap<ProcessingMode, ExecutionStrategy>;

export function createDefaultStrategies(): StrategyRegistry {
  return new Map<ProcessingMode, ExecutionStrategy>([
    ["sequential", new SequentialStrategy()],
    ["parallel", new ParallelStrategy()],
  ]);
}

export function processingModeFor(config: Pick<PatchflowConfig, "parallel">): ProcessingMode {
  return config.parallel ? "parallel" : "sequential";
}

export function selectStrategy(strategies: StrategyRegistry, mode: ProcessingMode): ExecutionStrategy {
  const strategy = strategies.get(mode);
  if (!strategy) {
    throw new ConfigurationError(`No execution strategy registered for "${mode}" mode`);
  }
  return strategy;
}
