/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands every option over as a string; these schemas coerce and
 * bound them before they reach the pipeline.
 */

import { z } from 'zod';
import {
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_K,
  MAX_TOP_K,
  MIN_TOP_K,
} from '../agent/types.js';

// ============================================================================
// QUESTION OPTIONS (ask, chat, /set)
// ============================================================================

const TOP_K_MESSAGE = `top-k debe ser un número entero entre ${MIN_TOP_K} y ${MAX_TOP_K}`;
const TEMPERATURE_MESSAGE = 'temperature debe ser un número entre 0 y 1';

export const TopKSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, TOP_K_MESSAGE)
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().min(MIN_TOP_K, TOP_K_MESSAGE).max(MAX_TOP_K, TOP_K_MESSAGE));

export const TemperatureSchema = z
  .string()
  .trim()
  .min(1, TEMPERATURE_MESSAGE)
  .transform((val) => Number(val))
  .pipe(
    z
      .number({ invalid_type_error: TEMPERATURE_MESSAGE })
      .min(0, TEMPERATURE_MESSAGE)
      .max(1, TEMPERATURE_MESSAGE)
  );

export const AskOptionsSchema = z.object({
  topK: TopKSchema.default(String(DEFAULT_TOP_K)),
  temperature: TemperatureSchema.default(DEFAULT_TEMPERATURE.toFixed(1)),
});

export type AskOptions = z.output<typeof AskOptionsSchema>;

export const MAX_QUESTION_LENGTH = 2000;

/** The positional question of `ask`, checked after trimming */
export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'La pregunta no puede estar vacía')
    .max(
      MAX_QUESTION_LENGTH,
      `La pregunta es demasiado larga (máximo ${MAX_QUESTION_LENGTH} caracteres)`
    ),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(AskOptionsSchema, cmdOptions);
 * if (!result.success) {
 *   throw new CLIError(result.error);
 * }
 * const { topK, temperature } = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validación fallida:\n  ${errors}` };
}
