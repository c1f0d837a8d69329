/**
 * Logger Interface for Library Code
 *
 * The pipeline and gateways accept a Logger by injection. The CLI passes its
 * CommandContext (which satisfies this interface), tests pass silentLogger.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default logger when none is injected. Warnings only.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
