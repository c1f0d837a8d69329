/**
 * Gateway Error Classification
 *
 * Turns whatever an SDK throws into a GatewayError with a structured kind.
 * Both Azure SDKs attach the HTTP status to their errors (`status` on the
 * openai client, `statusCode` on RestError); the message check covers
 * errors that only describe the throttling in text.
 */

import { GatewayError, type GatewayName } from '../errors/index.js';

/**
 * Phrases that identify a throttled request, compared lowercase.
 */
export const RATE_LIMIT_MARKERS = [
  'rate limit',
  'límite de tasa alcanzado',
  'too many requests',
] as const;

/**
 * Read the HTTP status an SDK error carries, if any.
 */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Case-insensitive match of the rate-limit phrases.
 */
export function isRateLimitMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Wrap an SDK error for the given gateway.
 *
 * GatewayErrors pass through unchanged.
 *
 * @param serviceLabel - Human-readable service name used in the message
 */
export function toGatewayError(
  gateway: GatewayName,
  error: unknown,
  serviceLabel: string
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const status = getStatusCode(error);
  const message = getErrorMessage(error);

  if (status === 429 || isRateLimitMessage(message)) {
    return new GatewayError(
      gateway,
      'rate_limit',
      `Límite de tasa alcanzado en ${serviceLabel}. ${message}`,
      { status, cause: error }
    );
  }

  return new GatewayError(gateway, 'failure', `${serviceLabel}: ${message}`, {
    status,
    cause: error,
  });
}
