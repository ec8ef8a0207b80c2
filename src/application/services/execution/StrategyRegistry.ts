import type { StrategyName } from "../../../domain/models/routing.ts";
import { CascadeStrategy } from "./CascadeStrategy.ts";
import type { ExecutionStrategy } from "./ExecutionStrategy.ts";
import { ParallelStrategy } from "./ParallelStrategy.ts";

/**
 * Ordered list of execution strategies; the first one is the fallback
 */
export class StrategyRegistry {
  private readonly strategies: ExecutionStrategy[];

  constructor(strategies: ReadonlyArray<ExecutionStrategy> = [new ParallelStrategy(), new CascadeStrategy()]) {
    this.strategies = [...strategies];
  }

  get(name: StrategyName): ExecutionStrategy {
    return this.strategies.find((s) => s.name === name) ?? this.strategies[0];
  }
}
