import type { CostModel } from "../config/Config.schemas.js";

/**
 * Distances of already solved suffix pairs, owned by one calculator.
 *
 * Keys compare by string value on both halves, so a suffix pair reached
 * from a different top-level call hits the same entry. Entries are written
 * once and never evicted; only `clear()` drops them. Every entry was
 * computed under `costs`, the model the cache was created with.
 */
export interface SuffixPairCache {
  readonly costs: CostModel;
  get(sourceSuffix: string, targetSuffix: string): number | undefined;
  set(sourceSuffix: string, targetSuffix: string, distance: number): void;
  /** Number of stored suffix pairs */
  readonly size: number;
  /** Mismatched pairs computed from scratch since creation or last clear */
  readonly freshComputations: number;
  /** Lookups answered from the cache since creation or last clear */
  readonly hits: number;
  recordFreshComputation(): void;
  /** Drops every entry and resets the counters. Returns the dropped count. */
  clear(): number;
}

export const createSuffixPairCache = (costs: CostModel): SuffixPairCache => {
  const bySource = new Map<string, Map<string, number>>();
  let size = 0;
  let freshComputations = 0;
  let hits = 0;

  return {
    costs,

    get(sourceSuffix, targetSuffix) {
      const distance = bySource.get(sourceSuffix)?.get(targetSuffix);
      if (distance !== undefined) {
        hits++;
      }
      return distance;
    },

    set(sourceSuffix, targetSuffix, distance) {
      let byTarget = bySource.get(sourceSuffix);
      if (!byTarget) {
        byTarget = new Map<string, number>();
        bySource.set(sourceSuffix, byTarget);
      }
      if (!byTarget.has(targetSuffix)) {
        size++;
      }
      byTarget.set(targetSuffix, distance);
    },

    get size() {
      return size;
    },

    get freshComputations() {
      return freshComputations;
    },

    get hits() {
      return hits;
    },

    recordFreshComputation() {
      freshComputations++;
    },

    clear() {
      const dropped = size;
      bySource.clear();
      size = 0;
      freshComputations = 0;
      hits = 0;
      return dropped;
    },
  };
};

interface PendingPair {
  i: number;
  j: number;
  sourceSuffix: string;
  targetSuffix: string;
  /** Edit cost of the branch that led from the parent pair to this one */
  viaCost: number;
  /** Totals of the add, remove and change branches resolved so far */
  totals: number[];
}

const BRANCHES = [
  { di: 0, dj: 1, cost: "addCost" },
  { di: 1, dj: 0, cost: "removeCost" },
  { di: 1, dj: 1, cost: "changeCost" },
] as const;

/**
 * Weighted edit distance over suffix pairs, memoized in `cache` and
 * weighted by the cache's own cost model.
 *
 * Same recurrence and base cases as `naiveDistance`, walked depth-first
 * with an explicit stack so input length is not bounded by the call stack.
 * The cache is consulted before the leading characters are compared. Only
 * mismatched pairs are stored: a pair with equal leading characters
 * resolves to the pair one character shorter, which is cached in turn once
 * it mismatches. Each distinct suffix pair is therefore computed at most
 * once per cache.
 */
export const memoizedDistance = (
  cache: SuffixPairCache,
  source: string,
  target: string,
): number => {
  const { costs } = cache;

  // Resolves (i, j) to a distance, or to the mismatched pair it reduces to.
  const settle = (
    i: number,
    j: number,
    viaCost: number,
  ): number | PendingPair => {
    for (;;) {
      if (i === source.length) {
        return (target.length - j) * costs.addCost;
      }
      if (j === target.length) {
        return (source.length - i) * costs.removeCost;
      }

      const sourceSuffix = source.slice(i);
      const targetSuffix = target.slice(j);
      const cached = cache.get(sourceSuffix, targetSuffix);
      if (cached !== undefined) {
        return cached;
      }

      if (source.charCodeAt(i) !== target.charCodeAt(j)) {
        cache.recordFreshComputation();
        return { i, j, sourceSuffix, targetSuffix, viaCost, totals: [] };
      }
      i++;
      j++;
    }
  };

  const root = settle(0, 0, 0);
  if (typeof root === "number") {
    return root;
  }

  const stack: PendingPair[] = [root];
  let distance = 0;

  for (let pair = stack.at(-1); pair; pair = stack.at(-1)) {
    const branch = BRANCHES[pair.totals.length];

    if (branch) {
      const branchCost = costs[branch.cost];
      const next = settle(pair.i + branch.di, pair.j + branch.dj, branchCost);
      if (typeof next === "number") {
        pair.totals.push(branchCost + next);
      } else {
        stack.push(next);
      }
      continue;
    }

    distance = Math.min(...pair.totals);
    cache.set(pair.sourceSuffix, pair.targetSuffix, distance);
    stack.pop();
    stack.at(-1)?.totals.push(pair.viaCost + distance);
  }

  return distance;
};
