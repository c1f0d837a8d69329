/**
 * Azure AI Search Gateway
 *
 * Text-only query against the manuals index. The index is populated by the
 * blob indexer, so document names and locations arrive in the
 * `metadata_storage_*` fields; this gateway maps them onto RetrievedPassage.
 *
 * SECURITY: the API key goes straight into the credential object and is
 * never logged.
 */

import { AzureKeyCredential, SearchClient } from '@azure/search-documents';
import type { SearchConfig } from '../config/schema.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { toGatewayError } from './error-classification.js';
import type { RetrievedPassage, SearchGateway } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Fields of an index document that the pipeline reads.
 *
 * Everything is optional: a blob that failed text extraction has no
 * `content`, and custom indexes may lack page numbers.
 */
export interface ManualSearchDocument {
  content?: string | null;
  metadata_storage_name?: string | null;
  metadata_storage_path?: string | null;
  pageNumber?: number | null;
}

export interface AzureSearchGatewayOptions {
  /** Retries performed by the SDK pipeline on transient failures */
  maxRetries?: number;
  logger?: Logger;
}

/** Source name used when the index document carries none */
export const UNKNOWN_SOURCE = 'Desconocido';

// ============================================================================
// MAPPING
// ============================================================================

/**
 * Convert an index document into a RetrievedPassage.
 *
 * `path` and `pageNumber` are only set when the document has them, so
 * consumers can rely on `'path' in passage`.
 */
export function toRetrievedPassage(
  document: ManualSearchDocument,
  score: number
): RetrievedPassage {
  const passage: {
    content: string;
    source: string;
    score: number;
    path?: string;
    pageNumber?: number;
  } = {
    content: document.content ?? '',
    source: document.metadata_storage_name || UNKNOWN_SOURCE,
    score,
  };

  if (document.metadata_storage_path) {
    passage.path = document.metadata_storage_path;
  }
  if (typeof document.pageNumber === 'number') {
    passage.pageNumber = document.pageNumber;
  }

  return passage;
}

// ============================================================================
// GATEWAY
// ============================================================================

export class AzureSearchGateway implements SearchGateway {
  readonly name = 'azure-search';

  private readonly client: SearchClient<ManualSearchDocument>;
  private readonly logger: Logger;

  constructor(config: SearchConfig, options: AzureSearchGatewayOptions = {}) {
    this.client = new SearchClient<ManualSearchDocument>(
      config.endpoint,
      config.indexName,
      new AzureKeyCredential(config.apiKey),
      { retryOptions: { maxRetries: options.maxRetries } }
    );
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Run a simple full-text query and collect up to `topK` ranked passages.
   *
   * @throws GatewayError on any service or network failure
   */
  async search(query: string, topK: number): Promise<RetrievedPassage[]> {
    const passages: RetrievedPassage[] = [];

    try {
      const response = await this.client.search(query, { top: topK });

      for await (const result of response.results) {
        if (passages.length >= topK) {
          break;
        }
        passages.push(toRetrievedPassage(result.document, result.score));
      }
    } catch (error) {
      throw toGatewayError('search', error, 'Azure AI Search');
    }

    this.logger.debug?.(`Azure AI Search devolvió ${passages.length} fragmento(s)`);
    return passages;
  }
}
