export {
  type CalculatorConfig,
  type CalculatorConfigInput,
  CalculatorConfigSchema,
  type CostModel,
  type CostModelInput,
  CostModelSchema,
} from "./config/Config.schemas.js";
export { DEFAULT_COST_MODEL, defineCostModel } from "./config/defineCostModel.js";
export {
  type CacheStats,
  type CalculatorOptions,
  createDistanceCalculator,
  type DistanceCalculator,
} from "./distance/createDistanceCalculator.js";
export { iterativeDistance } from "./distance/iterativeDistance.js";
export {
  createSuffixPairCache,
  memoizedDistance,
  type SuffixPairCache,
} from "./distance/memoizedDistance.js";
export { naiveDistance } from "./distance/naiveDistance.js";
export {
  assertDistanceInput,
  InvalidDistanceInputError,
} from "./distance/validateInput.js";
export {
  consoleLogger,
  createConsoleDistanceLogger,
} from "./logging/ConsoleDistanceLogger.js";
export type { DistanceLogger } from "./logging/DistanceLogger.js";
export { silentLogger } from "./logging/SilentDistanceLogger.js";
