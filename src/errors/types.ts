/**
 * Error type definitions for the manuals chat CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - A structured failure kind for gateway errors, so callers branch on
 *   `kind` instead of inspecting message text
 */

/**
 * Base class for all CLI errors.
 *
 * hint: tells the user HOW to fix the problem
 * code: process exit code, lets scripts tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Missing AZURE_* environment variable
 * - Endpoint that is not an http(s) URL
 *
 * Raised before the pipeline is built; the pipeline never sees it.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Crea un archivo .env basado en .env.example',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Problemas:\n  ${issues.join('\n  ')}`
        : 'Revisa los valores e inténtalo de nuevo';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Which external collaborator failed */
export type GatewayName = 'search' | 'generation';

/**
 * Failure classification for gateway errors.
 *
 * - 'rate_limit': the service throttled the request (HTTP 429 or equivalent)
 * - 'failure': anything else (network, auth, malformed response)
 */
export type GatewayErrorKind = 'rate_limit' | 'failure';

/**
 * Thrown by the search and generation gateways.
 *
 * The orchestrator converts these into user-facing answers; they only reach
 * the CLI error handler when a gateway is used directly.
 *
 * Exit code 7: Gateway error
 */
export class GatewayError extends CLIError {
  public readonly gateway: GatewayName;
  public readonly kind: GatewayErrorKind;
  /** HTTP status reported by the service, when there was one */
  public readonly status?: number;

  constructor(
    gateway: GatewayName,
    kind: GatewayErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(
      message,
      kind === 'rate_limit'
        ? 'Espera un momento antes de volver a preguntar, o reduce --top-k'
        : 'Ejecuta: manuals check  para revisar la configuración de Azure',
      7
    );
    this.name = 'GatewayError';
    this.gateway = gateway;
    this.kind = kind;
    this.status = options.status;
    // Error#cause: the original SDK error
    this.cause = options.cause;
  }
}
