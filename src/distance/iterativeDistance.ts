import type { CostModel } from "../config/Config.schemas.js";

/**
 * Weighted edit distance by bottom-up matrix filling.
 *
 * Rows count target characters consumed, columns count source characters
 * consumed. Moving down adds a target character, moving right removes a
 * source character, moving diagonally keeps or changes one.
 *
 *        ""  C    A    T
 *   ""   0   1    2    3
 *   D    1   1.5  2.5  3.5
 *   O    2   2.5  3    4
 *   G    3   3.5  4    4.5
 *
 * O(|source|·|target|) time and space, no recursion, no state kept between
 * calls. `costs` comes from `defineCostModel`.
 */
export const iterativeDistance = (
  costs: CostModel,
  source: string,
  target: string,
): number => {
  const columns = source.length + 1;
  const rows = target.length + 1;
  const matrix: number[][] = [];

  for (let y = 0; y < rows; y++) {
    const row = new Array<number>(columns).fill(0);
    row[0] = y * costs.addCost;
    matrix.push(row);
  }
  const firstRow = matrix[0] as number[];
  for (let x = 0; x < columns; x++) {
    firstRow[x] = x * costs.removeCost;
  }

  for (let y = 1; y < rows; y++) {
    const above = matrix[y - 1] as number[];
    const current = matrix[y] as number[];
    const targetChar = target.charCodeAt(y - 1);

    for (let x = 1; x < columns; x++) {
      const changeCost =
        source.charCodeAt(x - 1) === targetChar ? 0 : costs.changeCost;
      current[x] = Math.min(
        (above[x] as number) + costs.addCost,
        (current[x - 1] as number) + costs.removeCost,
        (above[x - 1] as number) + changeCost,
      );
    }
  }

  return (matrix[rows - 1] as number[])[columns - 1] as number;
};
