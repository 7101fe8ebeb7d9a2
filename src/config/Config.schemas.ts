import { z } from "zod";

// --- Schemas ---

const CostSchema = z.number().finite().nonnegative();

/**
 * Branded so that evaluators only accept weights that went through this
 * schema (`defineCostModel` or a calculator's config).
 */
export const CostModelSchema = z
  .object({
    /** Cost of inserting one character of the target (default: 1) */
    addCost: CostSchema.default(1),
    /** Cost of deleting one character of the source (default: 1) */
    removeCost: CostSchema.default(1),
    /** Cost of substituting one character for another (default: 1.5) */
    changeCost: CostSchema.default(1.5),
  })
  .brand<"CostModel">();

export const CalculatorConfigSchema = z.object({
  /** Edit operation weights, fixed for the calculator's lifetime */
  costs: CostModelSchema.default({}),
  /**
   * Combined input length above which the naive evaluator warns that the
   * iterative one should be used instead (default: 24)
   */
  naiveWarnThreshold: z.number().int().positive().default(24),
});

// --- Inferred Types ---

export type CostModel = Readonly<z.infer<typeof CostModelSchema>>;
export type CostModelInput = z.input<typeof CostModelSchema>;
export type CalculatorConfig = z.infer<typeof CalculatorConfigSchema>;
export type CalculatorConfigInput = z.input<typeof CalculatorConfigSchema>;
