import chalk from "chalk";
import type { DistanceLogger } from "./DistanceLogger.js";

const PREFIX = chalk.dim("[edit-distance]");

/**
 * Terminal logger with colors. All output goes to stderr.
 */
export const createConsoleDistanceLogger = (): DistanceLogger => {
  return {
    info(message: string): void {
      console.error(`${PREFIX} ${message}`);
    },

    warn(message: string): void {
      console.error(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
    },
  };
};

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleDistanceLogger();
