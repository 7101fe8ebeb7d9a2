/**
 * Logging interface for the distance calculator.
 *
 * Output is status information only (guidelines and cache housekeeping),
 * never results. Console implementations write to stderr.
 *
 * @example
 * ```typescript
 * logger.warn("Naive evaluation of 40 characters, prefer distanceIterative");
 * logger.info("Cleared 120 memoized entries");
 * ```
 */
export interface DistanceLogger {
  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;
}
