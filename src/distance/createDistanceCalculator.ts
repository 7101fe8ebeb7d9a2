import {
  type CalculatorConfig,
  type CalculatorConfigInput,
  CalculatorConfigSchema,
  type CostModel,
} from "../config/Config.schemas.js";
import { consoleLogger } from "../logging/ConsoleDistanceLogger.js";
import type { DistanceLogger } from "../logging/DistanceLogger.js";
import { iterativeDistance } from "./iterativeDistance.js";
import { createSuffixPairCache, memoizedDistance } from "./memoizedDistance.js";
import { naiveDistance } from "./naiveDistance.js";
import { assertDistanceInput } from "./validateInput.js";

export interface CalculatorOptions extends CalculatorConfigInput {
  /** Defaults to the console logger */
  logger?: DistanceLogger;
}

export interface CacheStats {
  /** Suffix pairs currently stored */
  entries: number;
  /** Suffix pairs computed from scratch */
  freshComputations: number;
  /** Lookups answered without recomputation */
  hits: number;
}

/**
 * Weighted edit distance between two strings, with one cost model shared
 * by three interchangeable evaluators. All three return the same value for
 * the same inputs.
 */
export interface DistanceCalculator {
  readonly costs: CostModel;
  /** Exponential time. Warns above the configured input length. */
  distanceNaive(source: string, target: string): number;
  /** Fills the instance cache, which is kept across calls. */
  distanceMemoized(source: string, target: string): number;
  /** O(|source|·|target|), stateless. */
  distanceIterative(source: string, target: string): number;
  cacheStats(): CacheStats;
  clearCache(): void;
}

/**
 * Creates a calculator with its own memoization cache.
 *
 * @example
 * const calculator = createDistanceCalculator({ costs: { changeCost: 1 } });
 * calculator.distanceIterative("kitten", "sitting") // 3
 *
 * @throws ZodError if the configuration is invalid
 */
export const createDistanceCalculator = (
  options: CalculatorOptions = {},
): DistanceCalculator => {
  const { logger = consoleLogger, ...configInput } = options;
  const config: CalculatorConfig = CalculatorConfigSchema.parse(configInput);
  const costs: CostModel = Object.freeze(config.costs);
  const cache = createSuffixPairCache(costs);

  return {
    costs,

    distanceNaive(source, target) {
      assertDistanceInput(source, "source");
      assertDistanceInput(target, "target");
      const length = source.length + target.length;
      if (length > config.naiveWarnThreshold) {
        logger.warn(
          `Naive evaluation of ${length} characters grows exponentially, prefer distanceIterative`,
        );
      }
      return naiveDistance(costs, source, target);
    },

    distanceMemoized(source, target) {
      assertDistanceInput(source, "source");
      assertDistanceInput(target, "target");
      return memoizedDistance(cache, source, target);
    },

    distanceIterative(source, target) {
      assertDistanceInput(source, "source");
      assertDistanceInput(target, "target");
      return iterativeDistance(costs, source, target);
    },

    cacheStats() {
      return {
        entries: cache.size,
        freshComputations: cache.freshComputations,
        hits: cache.hits,
      };
    },

    clearCache() {
      const dropped = cache.clear();
      logger.info(`Cleared ${dropped} memoized entries`);
    },
  };
};
