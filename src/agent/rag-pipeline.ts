/**
 * RAG Pipeline
 *
 * Orchestrates one question-answer turn:
 *
 * ```
 * question
 *     │
 *     ▼
 * SearchGateway.search(question, topK)
 *     │   [] ─────────────────────────────► no_results
 *     ▼
 * buildContext(passages)
 *     │   no usable text ─────────────────► empty_content
 *     ▼
 * GenerationGateway.generate(SYSTEM_PROMPT, question, chunks, temperature)
 *     │   GatewayError / any error ───────► rate_limited | gateway_failure
 *     ▼
 * success { answer, sources }  (sources from ALL passages)
 * ```
 *
 * The pipeline is the only place where gateway errors become answers:
 * run() never rejects, and answer() rejects only for invalid input.
 *
 * It holds no per-request state, so one instance built at startup serves
 * concurrent questions. Conversation history belongs to the caller.
 *
 * @example
 * ```typescript
 * const pipeline = createRAGPipeline(loadConfig());
 *
 * const { answer, sources } = await pipeline.answer('¿Qué significa el código E-123?', 3, 0.2);
 * ```
 */

import type { AppConfig } from '../config/schema.js';
import { GatewayError } from '../errors/index.js';
import {
  getErrorMessage,
  isRateLimitMessage,
} from '../providers/error-classification.js';
import { createGateways, type GatewayFactoryOptions } from '../providers/factory.js';
import type {
  GenerationGateway,
  RetrievedPassage,
  SearchGateway,
} from '../providers/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import {
  buildContext,
  ContextBuilderOptionsSchema,
  DEFAULT_CONTEXT_BOUNDS,
  type ContextBuilderOptions,
} from './context-builder.js';
import {
  EMPTY_CONTENT_ANSWER,
  NO_RESULTS_ANSWER,
  SYSTEM_PROMPT,
  failureAnswer,
  rateLimitAnswer,
} from './prompts.js';
import { parseQuery } from './query.js';
import {
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_K,
  type AnswerResult,
  type PipelineOutcome,
  type Query,
  type SourceReference,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RAGPipelineOptions {
  logger?: Logger;
  /**
   * Context bounds, fixed for the pipeline's lifetime.
   * Defaults: 2000 chars per chunk, 6000 in total.
   */
  contextBounds?: ContextBuilderOptions;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * One citation per retrieved passage, in retrieval order.
 *
 * Built from the search results, not the context: a passage that was cut
 * or left out of the context is still cited.
 */
export function toSourceReferences(
  passages: readonly RetrievedPassage[]
): SourceReference[] {
  return passages.map((passage) => {
    const reference: SourceReference = {
      source: passage.source,
      score: passage.score,
    };
    if (passage.path !== undefined) {
      reference.path = passage.path;
    }
    if (passage.pageNumber !== undefined) {
      reference.pageNumber = passage.pageNumber;
    }
    return reference;
  });
}

/**
 * Tagged GatewayErrors are classified by kind; anything else by message.
 */
export function isRateLimited(error: unknown): boolean {
  if (error instanceof GatewayError) {
    return error.kind === 'rate_limit';
  }
  return isRateLimitMessage(getErrorMessage(error));
}

/**
 * Collapse an outcome to what the UI renders.
 */
export function toAnswerResult(outcome: PipelineOutcome): AnswerResult {
  if (outcome.kind === 'success') {
    return { answer: outcome.answer, sources: outcome.sources };
  }
  return { answer: outcome.answer, sources: [] };
}

// ============================================================================
// PIPELINE
// ============================================================================

export class RAGPipeline {
  private readonly searchGateway: SearchGateway;
  private readonly generationGateway: GenerationGateway;
  private readonly contextBounds: Required<ContextBuilderOptions>;
  private readonly logger: Logger;

  /**
   * @throws ZodError if `contextBounds` holds a non-positive or fractional bound
   */
  constructor(
    searchGateway: SearchGateway,
    generationGateway: GenerationGateway,
    options: RAGPipelineOptions = {}
  ) {
    const bounds = ContextBuilderOptionsSchema.parse(options.contextBounds ?? {});

    this.searchGateway = searchGateway;
    this.generationGateway = generationGateway;
    this.contextBounds = {
      maxCharsPerChunk: bounds.maxCharsPerChunk ?? DEFAULT_CONTEXT_BOUNDS.maxCharsPerChunk,
      maxTotalContext: bounds.maxTotalContext ?? DEFAULT_CONTEXT_BOUNDS.maxTotalContext,
    };
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Answer a question with its sources.
   *
   * Gateway failures come back as answers.
   *
   * @throws ValidationError for a blank question, `topK` outside 1-10 or
   * `temperature` outside 0-1
   */
  async answer(
    question: string,
    topK: number = DEFAULT_TOP_K,
    temperature: number = DEFAULT_TEMPERATURE
  ): Promise<AnswerResult> {
    const query = parseQuery({ text: question, topK, temperature });
    const outcome = await this.run(query);
    return toAnswerResult(outcome);
  }

  /**
   * Run one turn and report how it ended. Never rejects.
   */
  async run(query: Query): Promise<PipelineOutcome> {
    const { text, topK, temperature } = query;

    try {
      const passages = await this.searchGateway.search(text, topK);
      this.logger.debug?.(
        `Búsqueda (${this.searchGateway.name}): ${passages.length} fragmento(s) para top_k=${topK}`
      );

      if (passages.length === 0) {
        return { kind: 'no_results', answer: NO_RESULTS_ANSWER };
      }

      const context = buildContext(passages, this.contextBounds);
      this.logger.debug?.(
        `Contexto: ${context.chunks.length} fragmento(s), ${context.totalChars} caracteres, ` +
          `${context.truncatedCount} truncado(s), ${context.droppedCount} descartado(s)`
      );

      if (!context.hasContent) {
        return {
          kind: 'empty_content',
          answer: EMPTY_CONTENT_ANSWER,
          retrievedCount: passages.length,
        };
      }

      const answer = await this.generationGateway.generate(
        SYSTEM_PROMPT,
        text,
        context.chunks,
        temperature
      );

      return {
        kind: 'success',
        answer,
        sources: toSourceReferences(passages),
        contextChunks: context.chunks,
      };
    } catch (error) {
      return this.toFailureOutcome(error);
    }
  }

  private toFailureOutcome(error: unknown): PipelineOutcome {
    const message = getErrorMessage(error);
    const gateway = error instanceof GatewayError ? error.gateway : undefined;

    if (isRateLimited(error)) {
      this.logger.warn(`Límite de tasa${gateway ? ` (${gateway})` : ''}: ${message}`);
      return { kind: 'rate_limited', answer: rateLimitAnswer(message), gateway, message };
    }

    this.logger.warn(`Fallo del servicio${gateway ? ` (${gateway})` : ''}: ${message}`);
    return { kind: 'gateway_failure', answer: failureAnswer(message), gateway, message };
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Build the pipeline and its Azure gateways from a validated configuration.
 *
 * Call once at startup and share the instance.
 */
export function createRAGPipeline(
  config: AppConfig,
  options: RAGPipelineOptions & GatewayFactoryOptions = {}
): RAGPipeline {
  const gateways = createGateways(config, {
    logger: options.logger,
    maxTokens: options.maxTokens,
  });

  return new RAGPipeline(gateways.search, gateways.generation, options);
}
