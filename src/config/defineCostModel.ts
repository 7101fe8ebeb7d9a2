import {
  type CostModel,
  type CostModelInput,
  CostModelSchema,
} from "./Config.schemas.js";

/**
 * Validates a cost model and freezes it.
 * Omitted weights fall back to the defaults (add 1, remove 1, change 1.5).
 *
 * Negative weights are rejected rather than clamped: the recurrence only
 * yields a minimum when every edit costs at least zero.
 *
 * @example
 * defineCostModel({ changeCost: 2 })
 * // { addCost: 1, removeCost: 1, changeCost: 2 }
 *
 * @throws ZodError if a weight is negative, non-finite or not a number
 */
export const defineCostModel = (input: CostModelInput = {}): CostModel => {
  return Object.freeze(CostModelSchema.parse(input));
};

export const DEFAULT_COST_MODEL: CostModel = defineCostModel();
