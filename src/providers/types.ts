/**
 * Gateway Contracts
 *
 * The two external collaborators of the RAG pipeline, described by what the
 * orchestrator needs from them. Implementations live beside this file
 * (azure-search.ts, azure-openai.ts); tests substitute in-process fakes.
 */

/**
 * One ranked hit from the document index.
 *
 * Gateways return these in descending relevance order; the order is
 * significant and the pipeline never reorders it.
 */
export interface RetrievedPassage {
  /** Passage text ("" when the index stored none) */
  readonly content: string;
  /** Document name, e.g. the manual's file name */
  readonly source: string;
  readonly pageNumber?: number;
  /** Relevance score from the search backend, higher = more relevant */
  readonly score: number;
  /** Storage location of the document, when the index exposes it */
  readonly path?: string;
}

/**
 * Text search over the manuals index.
 *
 * Contract:
 * - at most `topK` passages, ranked by descending score
 * - network/auth/quota failures throw a GatewayError with gateway 'search';
 *   they are never reported as an empty result
 */
export interface SearchGateway {
  readonly name: string;
  search(query: string, topK: number): Promise<RetrievedPassage[]>;
}

/**
 * Text generation grounded on context passages.
 *
 * Contract:
 * - returns the generated answer text
 * - throttling throws a GatewayError with kind 'rate_limit'; every other
 *   failure throws a GatewayError with kind 'failure'
 */
export interface GenerationGateway {
  readonly name: string;
  generate(
    systemPrompt: string,
    userMessage: string,
    contextChunks: readonly string[],
    temperature: number
  ): Promise<string>;
}
