/**
 * Citation Formatter
 *
 * Renders the sources of an answer for the terminal and for `--json`
 * output. One numbered line per retrieved passage:
 *
 * ```
 * 1. manual-x200.pdf (pág. 14) - Relevancia: 0.87
 * 2. guia-rapida.pdf - Relevancia: 0.75
 * ```
 *
 * The page appears only when the passage carried one, the relevance only
 * when the score is positive.
 *
 * @example
 * ```typescript
 * const { answer, sources } = await pipeline.answer(question);
 * console.log(answer);
 * console.log(formatCitations(sources));
 * ```
 */

import type { SourceReference } from './types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/**
 * JSON output for a single citation, flattened for jq.
 */
export interface CitationJSON {
  /** 1-based position, matching the text output */
  index: number;
  source: string;
  score: number;
  /** null when the passage carried no page */
  pageNumber: number | null;
  /** null when the passage carried no storage path */
  path: string | null;
}

export interface CitationsOutputJSON {
  count: number;
  citations: CitationJSON[];
}

/** Heading printed above the list of sources */
export const SOURCES_HEADING = '📚 Fuentes utilizadas:';

// ============================================================================
// TEXT FORMATTING
// ============================================================================

/**
 * Format one citation line.
 *
 * @param index - 1-based position in the list
 *
 * @example
 * ```typescript
 * formatCitation({ source: 'manual.pdf', score: 0.8734, pageNumber: 14 }, 1)
 * // "1. manual.pdf (pág. 14) - Relevancia: 0.87"
 * ```
 */
export function formatCitation(source: SourceReference, index: number): string {
  let line = `${index}. ${source.source}`;
  if (source.pageNumber !== undefined) {
    line += ` (pág. ${source.pageNumber})`;
  }
  if (source.score > 0) {
    line += ` - Relevancia: ${source.score.toFixed(2)}`;
  }
  return line;
}

/**
 * Format every citation, one per line. Empty string for no sources.
 */
export function formatCitations(sources: readonly SourceReference[]): string {
  return sources.map((source, i) => formatCitation(source, i + 1)).join('\n');
}

// ============================================================================
// JSON FORMATTING
// ============================================================================

export function formatCitationJSON(source: SourceReference, index: number): CitationJSON {
  return {
    index,
    source: source.source,
    score: source.score,
    pageNumber: source.pageNumber ?? null,
    path: source.path ?? null,
  };
}

export function formatCitationsJSON(sources: readonly SourceReference[]): CitationsOutputJSON {
  return {
    count: sources.length,
    citations: sources.map((source, i) => formatCitationJSON(source, i + 1)),
  };
}
