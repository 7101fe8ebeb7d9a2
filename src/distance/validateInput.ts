/**
 * Thrown when a distance operation receives something other than a string.
 * Empty strings are valid input and never raise this.
 */
export class InvalidDistanceInputError extends TypeError {
  public readonly code = "ERR_INVALID_DISTANCE_INPUT";

  constructor(
    public readonly argument: string,
    received: unknown,
  ) {
    super(
      `Expected '${argument}' to be a string, received ${describeValue(received)}`,
    );
    this.name = "InvalidDistanceInputError";
  }
}

const describeValue = (value: unknown): string => {
  if (value === null) {
    return "null";
  }
  return typeof value;
};

/**
 * Narrows an operand to a string, rejecting absent values from untyped callers.
 *
 * @example
 * assertDistanceInput(null, "source")
 * // throws InvalidDistanceInputError: Expected 'source' to be a string, received null
 */
export function assertDistanceInput(
  value: unknown,
  argument: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new InvalidDistanceInputError(argument, value);
  }
}
