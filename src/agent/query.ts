/**
 * Query validation
 *
 * The pipeline itself never throws, so bad input is rejected here, before a
 * run starts.
 */

import { ValidationError } from '../errors/index.js';
import { QuerySchema, type Query } from './types.js';

/**
 * Validate a user turn.
 *
 * @throws ValidationError listing every invalid field
 *
 * @example
 * ```typescript
 * const query = parseQuery({ text: question, topK: 3, temperature: 0.2 });
 * const outcome = await pipeline.run(query);
 * ```
 */
export function parseQuery(input: {
  text: string;
  topK: number;
  temperature: number;
}): Query {
  const result = QuerySchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    });
    throw new ValidationError('Parámetros de la pregunta no válidos', issues);
  }

  return result.data;
}
