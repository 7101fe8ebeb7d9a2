import { describe, expect, it } from "vitest";
import {
  createDistanceCalculator,
  DEFAULT_COST_MODEL,
  iterativeDistance,
  silentLogger,
} from "./index.js";

describe("public entry point", () => {
  it("exposes a working calculator and the standalone evaluators", () => {
    const calculator = createDistanceCalculator({ logger: silentLogger });

    expect(calculator.distanceIterative("CAT", "DOG")).toBe(4.5);
    expect(iterativeDistance(DEFAULT_COST_MODEL, "CAT", "DOG")).toBe(4.5);
  });
});
