//in-process similarity over the episodic log; an embedding index can take its place
import type { SimilarExperience } from '../models/index.js';
import type { SimilarityLookup, SimilarityOptions, SimilarityQuery } from '../models/ports.js';
import type { EpisodicStore } from '../repository/index.js';
import { jaccard, tokenize } from './text-match.js';

export class EpisodicSimilarityLookup implements SimilarityLookup {
  constructor(private episodic: EpisodicStore) {}

  async findSimilar(query: SimilarityQuery, options: SimilarityOptions): Promise<SimilarExperience[]> {
    options.signal?.throwIfAborted();
    const queryTokens = tokenize(`${query.filename} ${query.subject}`);
    if (!queryTokens.length) return [];

    return this.episodic.list()
      .map(f => ({ record: f.data, similarity: jaccard(queryTokens, tokenize(`${f.data.filename} ${f.data.subject}`)) }))
      .filter(e => e.similarity >= options.minSimilarity)
      .sort((a, b) => b.similarity - a.similarity || b.record.recordedAt.localeCompare(a.record.recordedAt))
      .slice(0, options.limit);
  }
}
