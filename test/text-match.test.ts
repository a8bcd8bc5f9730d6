import { describe, it, expect } from 'vitest';
import { editSimilarity, extensionOf, filenameStem, jaccard, levenshtein, matchTier, prepareTarget, tokenize } from '../src/services/text-match.js';

const fuzzy = { minSimilarity: 0.8, minLength: 4 };

describe('text matching', () => {
  it('splits coded filenames into tokens', () => {
    expect(tokenize('RLV_TRM_i3_TD.pdf')).toEqual(['rlv', 'trm', 'i3', 'td', 'pdf']);
  });

  it('measures edit distance', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(editSimilarity('harbor point', 'harbr point')).toBeCloseTo(11 / 12, 6);
  });

  it('measures token overlap', () => {
    expect(jaccard(['a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3, 6);
    expect(jaccard([], [])).toBe(0);
  });

  it('finds the strongest tier an identifier matches at', () => {
    const target = prepareTarget('Harbor Point rent roll', 'hpt-2024 notes', 'point_harbor_summary.xlsx');

    expect(matchTier('harbor point', target, fuzzy)).toBe('exact_token');
    expect(matchTier('point harbor summary', target, fuzzy)).toBe('exact_token');
    expect(matchTier('rent harbor', target, fuzzy)).toBe('all_words');
    expect(matchTier('pt-20', target, fuzzy)).toBe('substring');
    expect(matchTier('harbour point', target, fuzzy)).toBe('fuzzy');
    expect(matchTier('cedar ridge', target, fuzzy)).toBeNull();
  });

  it('skips fuzzy matching for short identifiers', () => {
    expect(matchTier('hpx', prepareTarget('hpt report'), fuzzy)).toBeNull();
  });

  it('extracts stems and extensions', () => {
    expect(filenameStem('Q3_Report-final.PDF')).toBe('q3_report-final');
    expect(extensionOf('Q3_Report-final.PDF')).toBe('.pdf');
    expect(extensionOf('README')).toBe('');
    expect(extensionOf('.env')).toBe('');
  });
});
