import type { CostModel } from "../config/Config.schemas.js";

/**
 * Weighted edit distance by direct recursion, with no memoization.
 *
 * Transforms `source` into `target` from the front: equal leading
 * characters are consumed for free, otherwise the cheapest of add
 * (consume a target character), remove (consume a source character) and
 * change (consume both) is taken.
 *
 * The call tree grows exponentially with input length. Use it as a
 * correctness baseline on short strings only. `costs` comes from
 * `defineCostModel`, which rejects negative weights.
 *
 * @example
 * naiveDistance(DEFAULT_COST_MODEL, "CAT", "DOG") // 4.5
 */
export const naiveDistance = (
  costs: CostModel,
  source: string,
  target: string,
): number => {
  const distanceFrom = (i: number, j: number): number => {
    if (i === source.length) {
      return (target.length - j) * costs.addCost;
    }
    if (j === target.length) {
      return (source.length - i) * costs.removeCost;
    }
    if (source.charCodeAt(i) === target.charCodeAt(j)) {
      return distanceFrom(i + 1, j + 1);
    }
    return Math.min(
      costs.addCost + distanceFrom(i, j + 1),
      costs.removeCost + distanceFrom(i + 1, j),
      costs.changeCost + distanceFrom(i + 1, j + 1),
    );
  };

  return distanceFrom(0, 0);
};
