import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { CalculatorConfigSchema, CostModelSchema } from "./Config.schemas.js";

describe("Config.schemas", () => {
  describe("CostModelSchema", () => {
    it("fills every weight with its default", () => {
      expect(CostModelSchema.parse({})).toEqual({
        addCost: 1,
        removeCost: 1,
        changeCost: 1.5,
      });
    });

    it("keeps explicit weights, including zero", () => {
      const result = CostModelSchema.parse({
        addCost: 0,
        removeCost: 2.5,
        changeCost: 0.25,
      });
      expect(result).toEqual({ addCost: 0, removeCost: 2.5, changeCost: 0.25 });
    });

    it("rejects a negative add cost", () => {
      expect(() => CostModelSchema.parse({ addCost: -1 })).toThrow(ZodError);
    });

    it("rejects a negative remove cost", () => {
      expect(() => CostModelSchema.parse({ removeCost: -0.5 })).toThrow(
        ZodError,
      );
    });

    it("rejects a negative change cost", () => {
      expect(() => CostModelSchema.parse({ changeCost: -3 })).toThrow(ZodError);
    });

    it("rejects NaN and infinite weights", () => {
      expect(() => CostModelSchema.parse({ addCost: Number.NaN })).toThrow();
      expect(() =>
        CostModelSchema.parse({ changeCost: Number.POSITIVE_INFINITY }),
      ).toThrow();
    });

    it("rejects non-numeric weights", () => {
      expect(() => CostModelSchema.parse({ removeCost: "1" })).toThrow(
        ZodError,
      );
    });
  });

  describe("CalculatorConfigSchema", () => {
    it("defaults costs and warn threshold", () => {
      const result = CalculatorConfigSchema.parse({});
      expect(result).toEqual({
        costs: { addCost: 1, removeCost: 1, changeCost: 1.5 },
        naiveWarnThreshold: 24,
      });
    });

    it("merges partial costs with defaults", () => {
      const result = CalculatorConfigSchema.parse({ costs: { addCost: 3 } });
      expect(result.costs).toEqual({ addCost: 3, removeCost: 1, changeCost: 1.5 });
    });

    it("rejects a zero warn threshold", () => {
      expect(() =>
        CalculatorConfigSchema.parse({ naiveWarnThreshold: 0 }),
      ).toThrow(ZodError);
    });

    it("rejects a fractional warn threshold", () => {
      expect(() =>
        CalculatorConfigSchema.parse({ naiveWarnThreshold: 2.5 }),
      ).toThrow(ZodError);
    });
  });
});
