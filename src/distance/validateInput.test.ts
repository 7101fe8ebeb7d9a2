import { describe, expect, it } from "vitest";
import {
  assertDistanceInput,
  InvalidDistanceInputError,
} from "./validateInput.js";

describe(assertDistanceInput.name, () => {
  it("accepts strings, including the empty string", () => {
    expect(() => assertDistanceInput("kitten", "source")).not.toThrow();
    expect(() => assertDistanceInput("", "target")).not.toThrow();
  });

  it("rejects null with the argument name", () => {
    expect(() => assertDistanceInput(null, "source")).toThrow(
      "Expected 'source' to be a string, received null",
    );
  });

  it("rejects undefined", () => {
    expect(() => assertDistanceInput(undefined, "target")).toThrow(
      "Expected 'target' to be a string, received undefined",
    );
  });

  it("rejects non-string values", () => {
    expect(() => assertDistanceInput(42, "source")).toThrow(
      InvalidDistanceInputError,
    );
  });

  it("raises a TypeError carrying the argument and code", () => {
    let caught: unknown;
    try {
      assertDistanceInput(null, "target");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TypeError);
    expect(caught).toBeInstanceOf(InvalidDistanceInputError);
    if (caught instanceof InvalidDistanceInputError) {
      expect(caught.argument).toBe("target");
      expect(caught.code).toBe("ERR_INVALID_DISTANCE_INPUT");
      expect(caught.name).toBe("InvalidDistanceInputError");
    }
  });
});
