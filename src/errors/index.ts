/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Missing AZURE_SEARCH_ENDPOINT');
 */

// Error types
export {
  CLIError,
  ConfigError,
  ValidationError,
  GatewayError,
  type GatewayName,
  type GatewayErrorKind,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
