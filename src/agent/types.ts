/**
 * RAG Pipeline Types
 *
 * Query validation schema, result types and the closed set of pipeline
 * outcomes. Callers switch on `PipelineOutcome.kind` instead of inspecting
 * answer text.
 */

import { z } from 'zod';
import type { GatewayName } from '../errors/index.js';

// ============================================================================
// QUERY
// ============================================================================

export const MIN_TOP_K = 1;
export const MAX_TOP_K = 10;
export const DEFAULT_TOP_K = 3;
export const DEFAULT_TEMPERATURE = 1.0;

/**
 * One user turn.
 *
 * `text` is trimmed; `topK` and `temperature` carry the same bounds as the
 * CLI options.
 */
export const QuerySchema = z.object({
  text: z.string().trim().min(1, 'La pregunta no puede estar vacía'),
  topK: z
    .number()
    .int('top_k debe ser un número entero')
    .min(MIN_TOP_K, `top_k debe estar entre ${MIN_TOP_K} y ${MAX_TOP_K}`)
    .max(MAX_TOP_K, `top_k debe estar entre ${MIN_TOP_K} y ${MAX_TOP_K}`),
  temperature: z
    .number()
    .min(0, 'temperature debe estar entre 0 y 1')
    .max(1, 'temperature debe estar entre 0 y 1'),
});

export type Query = Readonly<z.infer<typeof QuerySchema>>;

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Citation for one retrieved passage.
 *
 * `path` and `pageNumber` are present only when the passage carried them.
 */
export interface SourceReference {
  source: string;
  score: number;
  path?: string;
  pageNumber?: number;
}

/**
 * What the UI renders: the answer text and its sources.
 */
export interface AnswerResult {
  answer: string;
  sources: SourceReference[];
}

/**
 * Every way a pipeline run can end.
 *
 * Only 'success' carries sources; every other variant answers with a fixed
 * or error-derived message and no sources.
 */
export type PipelineOutcome =
  | {
      kind: 'success';
      answer: string;
      sources: SourceReference[];
      /** Context fragments actually sent to the model */
      contextChunks: string[];
    }
  | { kind: 'no_results'; answer: string }
  | { kind: 'empty_content'; answer: string; retrievedCount: number }
  | { kind: 'rate_limited'; answer: string; gateway?: GatewayName; message: string }
  | { kind: 'gateway_failure'; answer: string; gateway?: GatewayName; message: string };

export type PipelineOutcomeKind = PipelineOutcome['kind'];
