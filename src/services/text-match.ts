//text primitives shared by the identifier, the classifier and similarity lookup
import type { MatchTier } from '../models/index.js';

//lowercase alphanumeric runs; "_", "-", "." and spaces all separate words
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(t => t.length > 0);
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost));
    }
    prev = row;
  }
  return prev[b.length] ?? Math.max(a.length, b.length);
}

//1 for identical strings, 0 for nothing in common
export function editSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 1 : 1 - levenshtein(a, b) / longest;
}

export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const left = new Set(a), right = new Set(b);
  if (!left.size && !right.size) return 0;
  let shared = 0;
  for (const t of left) if (right.has(t)) shared++;
  return shared / (left.size + right.size - shared);
}

//text prepared once per attachment and matched against many identifiers
export interface MatchTarget {
  text: string;
  tokens: string[];
  tokenSet: Set<string>;
}

export function prepareTarget(...parts: (string | undefined)[]): MatchTarget {
  const text = parts.filter((p): p is string => Boolean(p)).join(' ').toLowerCase();
  const tokens = tokenize(text);
  return { text, tokens, tokenSet: new Set(tokens) };
}

function containsSequence(tokens: string[], sequence: string[]): boolean {
  outer: for (let i = 0; i + sequence.length <= tokens.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (tokens[i + j] !== sequence[j]) continue outer;
    }
    return true;
  }
  return false;
}

export interface FuzzyOptions {
  minSimilarity: number;
  minLength: number;
}

//strongest tier at which the identifier occurs in the target, null when it does not
export function matchTier(identifier: string, target: MatchTarget, fuzzy: FuzzyOptions): MatchTier | null {
  const idTokens = tokenize(identifier);
  if (!idTokens.length) return null;
  if (containsSequence(target.tokens, idTokens)) return 'exact_token';
  if (idTokens.every(t => target.tokenSet.has(t))) return 'all_words';
  if (target.text.includes(identifier.toLowerCase())) return 'substring';

  const phrase = idTokens.join(' ');
  if (phrase.length < fuzzy.minLength) return null;
  for (let i = 0; i + idTokens.length <= target.tokens.length; i++) {
    const window = target.tokens.slice(i, i + idTokens.length).join(' ');
    if (editSimilarity(phrase, window) >= fuzzy.minSimilarity) return 'fuzzy';
  }
  return null;
}

//"Q3_Report-final.PDF" -> "q3_report-final"
export function filenameStem(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return (dot > 0 ? filename.slice(0, dot) : filename).toLowerCase();
}

export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(dot).toLowerCase() : '';
}
