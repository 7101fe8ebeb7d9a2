import type { DistanceLogger } from "./DistanceLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: DistanceLogger = {
  info(): void {},
  warn(): void {},
};
