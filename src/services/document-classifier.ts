//document classification: which category within the asset's category set?
import type { AssetType, ClassificationPattern, ClassificationResult, ClassifierConfig, ExperienceConfig, RationaleEntry, SimilarExperience } from '../models/index.js';
import { DEFAULT_CLASSIFIER, DEFAULT_EXPERIENCE } from '../models/index.js';
import { UnknownAssetTypeError } from '../errors.js';
import { createLogger } from '../logger.js';
import { clamp01, roundScore } from './confidence.js';
import { extensionOf, tokenize } from './text-match.js';

const log = createLogger('document-classifier');

export interface ClassificationInput {
  assetType: AssetType | null;
  filename: string;
  subject?: string;
  body?: string;
  allowedCategories: string[];
  patterns: ClassificationPattern[];
  senderTrusted: boolean;
  experiences: SimilarExperience[];
}

export interface IDocumentClassifier {
  classify(input: ClassificationInput): ClassificationResult;
}

export class DocumentClassifier implements IDocumentClassifier {
  private readonly compiled = new Map<string, (text: string) => boolean>();

  constructor(private config: ClassifierConfig = DEFAULT_CLASSIFIER, private experience: ExperienceConfig = DEFAULT_EXPERIENCE) {}

  //stored category set for the asset type, or the default set when none is known
  allowedCategories(assetType: AssetType | null, lookup: (assetType: AssetType) => string[] | undefined): string[] {
    if (!assetType) return this.config.defaultCategories;
    const categories = lookup(assetType);
    if (categories?.length) return categories;
    const err = new UnknownAssetTypeError(assetType);
    log.warn({ err: err.message, assetType }, 'falling back to default categories');
    return this.config.defaultCategories;
  }

  classify(input: ClassificationInput): ClassificationResult {
    const text = `${input.filename} ${input.subject ?? ''} ${input.body ?? ''}`;
    const allowed = new Set(input.allowedCategories);
    const scores = new Map<string, number>();
    const rationale: RationaleEntry[] = [];
    const matchedPatterns: string[] = [];

    //1. patterns
    for (const p of input.patterns) {
      if (!allowed.has(p.category) || !this.matcherFor(p.pattern)(text)) continue;
      const weight = this.weightOf(p);
      scores.set(p.category, Math.min((scores.get(p.category) ?? 0) + weight, 1));
      matchedPatterns.push(p.pattern);
      rationale.push({ kind: 'pattern', label: `${p.category}: /${p.pattern}/`, delta: roundScore(weight) });
    }

    //2. human corrections on similar documents
    for (const { record, similarity } of input.experiences) {
      if (record.source !== 'human_correction' || !allowed.has(record.predictedCategory)) continue;
      const delta = roundScore(this.experience.correctionWeight * similarity);
      scores.set(record.predictedCategory, Math.min((scores.get(record.predictedCategory) ?? 0) + delta, 1));
      rationale.push({ kind: 'experience', label: `${record.predictedCategory}: corrected "${record.filename}"`, delta });
    }

    //3. best category, ties keep allowed-category order
    let category: string | null = null;
    let best = 0;
    for (const c of input.allowedCategories) {
      const s = scores.get(c) ?? 0;
      if (s > best) { best = s; category = c; }
    }

    //4. fallback takes no adjustments
    if (!category) {
      rationale.push({ kind: 'fallback', label: 'no pattern or experience matched', delta: this.config.fallbackConfidence });
      return { category: this.config.fallbackCategory, confidence: this.config.fallbackConfidence, fallback: true, matchedPatterns, rationale };
    }

    //5. adjustments
    let confidence = best;
    for (const entry of this.adjustments(input)) {
      confidence += entry.delta;
      rationale.push(entry);
    }
    return { category, confidence: roundScore(clamp01(confidence)), fallback: false, matchedPatterns, rationale };
  }

  private adjustments(input: ClassificationInput): RationaleEntry[] {
    const c = this.config;
    const entries: RationaleEntry[] = [];
    const filename = input.filename.toLowerCase();
    const keyword = c.professionalKeywords.find(k => filename.includes(k));
    if (keyword) entries.push({ kind: 'adjustment', label: `professional filename keyword "${keyword}"`, delta: c.professionalKeywordBonus });

    const ext = extensionOf(input.filename);
    if (c.documentExtensions.includes(ext)) entries.push({ kind: 'adjustment', label: `document format ${ext}`, delta: c.documentExtensionBonus });

    const subject = input.subject ?? '';
    if (subject.length >= c.minSubjectLength) {
      const subjectTokens = new Set(tokenize(subject));
      const business = c.businessSubjectKeywords.find(k => subjectTokens.has(k));
      if (business) entries.push({ kind: 'adjustment', label: `business subject keyword "${business}"`, delta: c.businessSubjectBonus });
    }

    if (input.senderTrusted) entries.push({ kind: 'adjustment', label: 'trusted sender', delta: c.trustedSenderBonus });
    return entries;
  }

  private weightOf(p: ClassificationPattern): number {
    return p.weight ?? this.config.patternWeights[p.pattern] ?? Math.min(p.pattern.length / this.config.lengthWeightDivisor, 1);
  }

  //case-insensitive regex; a pattern that does not compile is matched literally
  private matcherFor(pattern: string): (text: string) => boolean {
    const cached = this.compiled.get(pattern);
    if (cached) return cached;
    let matcher: (text: string) => boolean;
    try {
      const re = new RegExp(pattern, 'i');
      matcher = text => re.test(text);
    } catch (err) {
      log.warn({ pattern, err: err instanceof Error ? err.message : String(err) }, 'invalid pattern, using literal match');
      const literal = pattern.toLowerCase();
      matcher = text => text.toLowerCase().includes(literal);
    }
    this.compiled.set(pattern, matcher);
    return matcher;
  }
}
