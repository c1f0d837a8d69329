/**
 * Citation Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatCitation,
  formatCitationJSON,
  formatCitations,
  formatCitationsJSON,
  SOURCES_HEADING,
} from '../citations.js';
import type { SourceReference } from '../types.js';

const sources: SourceReference[] = [
  { source: 'bomba-x200.pdf', score: 2.3145, pageNumber: 14, path: 'https://storage/m/bomba-x200.pdf' },
  { source: 'guia-rapida.pdf', score: 0.75 },
  { source: 'anexo.pdf', score: 0 },
];

describe('formatCitation', () => {
  it('includes page and relevance when available', () => {
    expect(
      formatCitation({ source: 'bomba-x200.pdf', score: 2.3145, pageNumber: 14 }, 1)
    ).toBe('1. bomba-x200.pdf (pág. 14) - Relevancia: 2.31');
  });

  it('omits the page when the passage carried none', () => {
    expect(formatCitation({ source: 'guia-rapida.pdf', score: 0.75 }, 2)).toBe(
      '2. guia-rapida.pdf - Relevancia: 0.75'
    );
  });

  it('omits the relevance for a zero score', () => {
    expect(formatCitation({ source: 'anexo.pdf', score: 0 }, 3)).toBe('3. anexo.pdf');
  });
});

describe('formatCitations', () => {
  it('numbers every source on its own line', () => {
    expect(formatCitations(sources)).toBe(
      [
        '1. bomba-x200.pdf (pág. 14) - Relevancia: 2.31',
        '2. guia-rapida.pdf - Relevancia: 0.75',
        '3. anexo.pdf',
      ].join('\n')
    );
  });

  it('lists every source, however many there are', () => {
    const many = Array.from({ length: 10 }, (_, i) => ({ source: `m${i + 1}.pdf`, score: 1 }));

    const lines = formatCitations(many).split('\n');

    expect(lines).toHaveLength(10);
    expect(lines[9]).toBe('10. m10.pdf - Relevancia: 1.00');
  });

  it('returns an empty string for no sources', () => {
    expect(formatCitations([])).toBe('');
  });

  it('uses the Spanish heading', () => {
    expect(SOURCES_HEADING).toBe('📚 Fuentes utilizadas:');
  });
});

describe('JSON formatting', () => {
  it('flattens optional fields to null', () => {
    expect(formatCitationJSON({ source: 'guia-rapida.pdf', score: 0.75 }, 2)).toEqual({
      index: 2,
      source: 'guia-rapida.pdf',
      score: 0.75,
      pageNumber: null,
      path: null,
    });
  });

  it('keeps the unrounded score and 1-based indexes', () => {
    const output = formatCitationsJSON(sources);

    expect(output.count).toBe(3);
    expect(output.citations[0]).toEqual({
      index: 1,
      source: 'bomba-x200.pdf',
      score: 2.3145,
      pageNumber: 14,
      path: 'https://storage/m/bomba-x200.pdf',
    });
    expect(output.citations.map((c) => c.index)).toEqual([1, 2, 3]);
  });
});
