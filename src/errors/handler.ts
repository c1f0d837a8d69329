/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for the terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 */

import chalk from 'chalk';
import { CLIError, GatewayError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Present for gateway failures only */
  gateway?: string;
  kind?: string;
  stack?: string;
}

function toJSON(error: CLIError, verbose: boolean): string {
  const output: ErrorOutput = {
    error: error.message,
    code: error.code,
    hint: error.hint,
    stack: verbose ? error.stack : undefined,
  };
  if (error instanceof GatewayError) {
    output.gateway = error.gateway;
    output.kind = error.kind;
  }
  return JSON.stringify(output, null, 2);
}

function appendStack(lines: string[], stack: string | undefined): void {
  if (!stack) return;
  lines.push('');
  lines.push(chalk.dim('Traza de la pila:'));
  lines.push(chalk.dim(stack));
}

/**
 * Format an error for display.
 *
 * Kept apart from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      return toJSON(error, verbose);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Sugerencia: ') + error.hint);
    }

    if (verbose) {
      appendStack(lines, error.stack);
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      appendStack(lines, error.stack);
    } else {
      lines.push(chalk.dim('Sugerencia: ') + 'Ejecuta con --verbose para ver más detalles');
    }

    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler for `uncaughtException` / `unhandledRejection`.
 *
 * Options are captured at setup time; event handlers only receive the error.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
