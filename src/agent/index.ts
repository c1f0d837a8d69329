/**
 * Agent Module
 *
 * RAG (Retrieval-Augmented Generation) pipeline over the indexed manuals.
 *
 * The pipeline:
 * 1. Searches the manual index for passages relevant to the question
 * 2. Builds a bounded context from the passages
 * 3. Asks the model to answer from that context only
 * 4. Returns the answer with one citation per retrieved passage
 *
 * @example
 * ```typescript
 * import { createRAGPipeline, formatCitations } from './agent/index.js';
 * import { loadConfig } from './config/index.js';
 *
 * const pipeline = createRAGPipeline(loadConfig());
 * const { answer, sources } = await pipeline.answer('¿Cómo se calibra el sensor?', 3, 0.2);
 *
 * console.log(answer);
 * console.log(formatCitations(sources));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Pipeline
// ============================================================================

export {
  RAGPipeline,
  createRAGPipeline,
  toAnswerResult,
  toSourceReferences,
  isRateLimited,
  type RAGPipelineOptions,
} from './rag-pipeline.js';

export { parseQuery } from './query.js';

export {
  buildContext,
  ContextBuilderOptionsSchema,
  DEFAULT_CONTEXT_BOUNDS,
  MAX_CHARS_PER_CHUNK,
  MAX_TOTAL_CONTEXT,
  TRUNCATION_MARKER,
  type ContextBuilderOptions,
  type ContextBundle,
} from './context-builder.js';

// ============================================================================
// Prompts & Messages
// ============================================================================

export {
  SYSTEM_PROMPT,
  INSUFFICIENT_CONTEXT_REPLY,
  NO_RESULTS_ANSWER,
  EMPTY_CONTENT_ANSWER,
  RATE_LIMIT_HEADING,
  FAILURE_HEADING,
  rateLimitAnswer,
  failureAnswer,
} from './prompts.js';

// ============================================================================
// Citations
// ============================================================================

export {
  formatCitation,
  formatCitations,
  formatCitationJSON,
  formatCitationsJSON,
  SOURCES_HEADING,
  type CitationJSON,
  type CitationsOutputJSON,
} from './citations.js';

// ============================================================================
// Types & Schemas
// ============================================================================

export {
  QuerySchema,
  MIN_TOP_K,
  MAX_TOP_K,
  DEFAULT_TOP_K,
  DEFAULT_TEMPERATURE,
} from './types.js';

export type {
  Query,
  SourceReference,
  AnswerResult,
  PipelineOutcome,
  PipelineOutcomeKind,
} from './types.js';
