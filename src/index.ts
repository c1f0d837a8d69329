/**
 * Manuals RAG - Library Entry Point
 *
 * The CLI (`manuals`) is the primary interface:
 * ```bash
 * manuals check                         # Verify the Azure configuration
 * manuals ask "¿Qué indica la alarma?"  # One question
 * manuals chat                          # Interactive REPL
 * ```
 *
 * This module exports the pipeline for embedding it in another surface
 * (a web handler, a bot), with the gateway interfaces for custom backends.
 *
 * @example
 * ```typescript
 * import { createRAGPipeline, loadConfig } from 'manuals-rag-chat';
 *
 * const pipeline = createRAGPipeline(loadConfig());
 * const { answer, sources } = await pipeline.answer('¿Cómo se reemplaza el filtro?');
 * ```
 *
 * @example Custom gateways
 * ```typescript
 * import { RAGPipeline, type SearchGateway, type GenerationGateway } from 'manuals-rag-chat';
 *
 * const pipeline = new RAGPipeline(mySearch, myGeneration);
 * const outcome = await pipeline.run({ text: question, topK: 3, temperature: 0.2 });
 * if (outcome.kind === 'rate_limited') {
 *   // back off
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';

export type {
  RetrievedPassage,
  SearchGateway,
  GenerationGateway,
} from './providers/index.js';
export {
  AzureSearchGateway,
  AzureOpenAIGateway,
  createGateways,
  type Gateways,
  type GatewayFactoryOptions,
} from './providers/index.js';

export { loadConfig, type AppConfig } from './config/index.js';

export {
  CLIError,
  ConfigError,
  ValidationError,
  GatewayError,
  type GatewayName,
  type GatewayErrorKind,
} from './errors/index.js';

export type { Logger } from './utils/logger.js';
export type { GlobalOptions, CommandContext } from './cli/types.js';
