/**
 * Context Builder
 *
 * Selects, truncates and bounds retrieved passages into the context sent to
 * the model. Pure: no I/O, no shared state.
 *
 * Bounds, applied in order:
 * 1. each passage is cut to `maxCharsPerChunk` (+ marker)
 * 2. chunks are added while the running total stays within `maxTotalContext`
 * 3. a first chunk that alone exceeds `maxTotalContext` is cut to
 *    `maxTotalContext` (+ marker) and becomes the only entry
 *
 * Step 3 cuts to `maxTotalContext`, not `maxCharsPerChunk`. With the default
 * bounds it never triggers (2000 + marker < 6000); it matters only when
 * `maxCharsPerChunk` is configured above `maxTotalContext`.
 *
 * @example
 * ```typescript
 * const { chunks, hasContent } = buildContext(passages);
 * if (!hasContent) {
 *   // every passage was empty
 * }
 * ```
 */

import { z } from 'zod';
import type { RetrievedPassage } from '../providers/types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_CHARS_PER_CHUNK = 2000;
export const MAX_TOTAL_CONTEXT = 6000;

/** Appended to every chunk that was cut */
export const TRUNCATION_MARKER = '... [texto truncado]';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

export const ContextBuilderOptionsSchema = z.object({
  maxCharsPerChunk: z
    .number()
    .int('maxCharsPerChunk debe ser un número entero')
    .positive('maxCharsPerChunk debe ser positivo')
    .optional(),
  maxTotalContext: z
    .number()
    .int('maxTotalContext debe ser un número entero')
    .positive('maxTotalContext debe ser positivo')
    .optional(),
});

export type ContextBuilderOptions = z.infer<typeof ContextBuilderOptionsSchema>;

export const DEFAULT_CONTEXT_BOUNDS: Required<ContextBuilderOptions> = {
  maxCharsPerChunk: MAX_CHARS_PER_CHUNK,
  maxTotalContext: MAX_TOTAL_CONTEXT,
};

// ============================================================================
// RESULT
// ============================================================================

export interface ContextBundle {
  /** Included chunk texts, in retrieval order */
  chunks: string[];
  /** False only when no passage had content */
  hasContent: boolean;
  /** Aggregate length of `chunks` */
  totalChars: number;
  /** How many included chunks carry the truncation marker */
  truncatedCount: number;
  /** Non-empty passages left out because the total budget ran out */
  droppedCount: number;
}

// ============================================================================
// BUILDER
// ============================================================================

function truncate(text: string, limit: number): string {
  return text.slice(0, limit) + TRUNCATION_MARKER;
}

/**
 * Build the bounded context for a list of ranked passages.
 *
 * @throws ZodError if a bound is not a positive integer
 */
export function buildContext(
  passages: ReadonlyArray<Pick<RetrievedPassage, 'content'>>,
  options?: ContextBuilderOptions
): ContextBundle {
  if (options) {
    ContextBuilderOptionsSchema.parse(options);
  }

  const maxCharsPerChunk =
    options?.maxCharsPerChunk ?? DEFAULT_CONTEXT_BOUNDS.maxCharsPerChunk;
  const maxTotalContext =
    options?.maxTotalContext ?? DEFAULT_CONTEXT_BOUNDS.maxTotalContext;

  const usable = passages.filter((passage) => passage.content);
  const chunks: string[] = [];
  let totalChars = 0;
  let truncatedCount = 0;

  for (const passage of usable) {
    let chunk = passage.content;
    let wasTruncated = false;

    if (chunk.length > maxCharsPerChunk) {
      chunk = truncate(chunk, maxCharsPerChunk);
      wasTruncated = true;
    }

    if (totalChars + chunk.length > maxTotalContext) {
      if (chunks.length > 0) {
        break;
      }
      // First chunk alone is over budget
      chunk = truncate(chunk, maxTotalContext);
      chunks.push(chunk);
      totalChars = chunk.length;
      truncatedCount = 1;
      break;
    }

    chunks.push(chunk);
    totalChars += chunk.length;
    if (wasTruncated) {
      truncatedCount++;
    }
  }

  return {
    chunks,
    hasContent: chunks.length > 0,
    totalChars,
    truncatedCount,
    droppedCount: usable.length - chunks.length,
  };
}
