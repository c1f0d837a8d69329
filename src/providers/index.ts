/**
 * Providers Module
 *
 * Gateways to the external services the RAG pipeline depends on:
 * Azure AI Search for retrieval and Azure OpenAI for generation.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createGateways } from './providers/index.js';
 * const { search, generation } = createGateways(loadConfig());
 * ```
 */

export type {
  RetrievedPassage,
  SearchGateway,
  GenerationGateway,
} from './types.js';

export {
  AzureSearchGateway,
  toRetrievedPassage,
  UNKNOWN_SOURCE,
  type ManualSearchDocument,
  type AzureSearchGatewayOptions,
} from './azure-search.js';

export {
  AzureOpenAIGateway,
  buildUserMessage,
  type AzureOpenAIGatewayOptions,
} from './azure-openai.js';

export {
  toGatewayError,
  isRateLimitMessage,
  getStatusCode,
  getErrorMessage,
  RATE_LIMIT_MARKERS,
} from './error-classification.js';

export { createGateways, type Gateways, type GatewayFactoryOptions } from './factory.js';
