import { debug } from "../../../config/logger.ts";
import type { DispatchAttempt, ExecutionStrategy, StrategyContext } from "./ExecutionStrategy.ts";

/**
 * Dispatches every candidate at once. Each dispatch carries the same timeout,
 * so together they share one deadline; a slow or failing provider never cancels its siblings.
 */
export class ParallelStrategy implements ExecutionStrategy {
  readonly name = "parallel";

  async execute(context: StrategyContext): Promise<DispatchAttempt[]> {
    debug(
      `[PARALLEL] Dispatching to ${context.candidates.map((c) => c.provider).join(", ")}`,
    );
    return await Promise.all(context.candidates.map((candidate) => context.dispatch(candidate)));
  }
}
