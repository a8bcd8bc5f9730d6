//tunable parameters of the router, every value can be overridden through loadConfig
import type { ConfidenceLevel } from './index.js';

//canonical routing threshold table, all checks are ">="
export interface ThresholdConfig {
  high: number;
  medium: number;
  low: number;
}

export interface AssetMatchConfig {
  exactTokenScore: number;
  allWordsScore: number;
  substringScore: number;
  fuzzyScore: number;
  fuzzySimilarity: number;
  fuzzyMinLength: number;
  extraIdentifierBonus: number;
  maxIdentifierBonus: number;
  genericIdentifierPenalty: number;
  filenameDilutionRatio: number;
  filenameDilutionPenalty: number;
  senderMatchConfidence: number;
  senderTrustFloor: number;
  minAssetConfidence: number;
  ambiguityMargin: number;
  relevanceKeywords: string[];
}

export interface ClassifierConfig {
  fallbackCategory: string;
  fallbackConfidence: number;
  lengthWeightDivisor: number;
  patternWeights: Record<string, number>;
  professionalKeywords: string[];
  professionalKeywordBonus: number;
  documentExtensions: string[];
  documentExtensionBonus: number;
  businessSubjectKeywords: string[];
  businessSubjectBonus: number;
  minSubjectLength: number;
  trustedSenderBonus: number;
  defaultCategories: string[];
}

export interface ExperienceConfig {
  timeoutMs: number;
  minSimilarity: number;
  limit: number;
  correctionWeight: number;
  autoWeight: number;
  maxAssetBoost: number;
}

export interface RetentionConfig {
  maxRecords: number;
  maxAgeDays: number;
  correctionAgeMultiplier: number;
}

export interface ConcurrencyConfig {
  maxConcurrentEmails: number;
  maxConcurrentAttachments: number;
}

export interface LearningConfig {
  conflictMargin: number;
  defaultConfidence: ConfidenceLevel;
  correctionConfidence: ConfidenceLevel;
  learnSenderAssociations: boolean;
  learnedSenderTrust: number;
}

export interface BootstrapConfig {
  //a 'loading' marker older than this is taken over by the next bootstrap
  staleClaimMs: number;
}

export interface RouterConfig {
  thresholds: ThresholdConfig;
  assetMatch: AssetMatchConfig;
  classifier: ClassifierConfig;
  experience: ExperienceConfig;
  retention: RetentionConfig;
  concurrency: ConcurrencyConfig;
  learning: LearningConfig;
  bootstrap: BootstrapConfig;
}

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  high: 0.85,
  medium: 0.65,
  low: 0.4,
};

export const DEFAULT_ASSET_MATCH: AssetMatchConfig = {
  exactTokenScore: 0.95,
  allWordsScore: 0.85,
  substringScore: 0.75,
  fuzzyScore: 0.65,
  fuzzySimilarity: 0.8,
  fuzzyMinLength: 4,
  extraIdentifierBonus: 0.1,
  maxIdentifierBonus: 0.3,
  genericIdentifierPenalty: 0.15,
  filenameDilutionRatio: 0.1,
  filenameDilutionPenalty: 0.05,
  senderMatchConfidence: 0.95,
  senderTrustFloor: 0.5,
  minAssetConfidence: 0.5,
  ambiguityMargin: 0.05,
  //generic finance vocabulary, deliberately separate from asset identifiers
  relevanceKeywords: [
    'fund', 'capital', 'investment', 'portfolio', 'loan', 'property', 'real', 'estate', 'credit',
    'equity', 'partners', 'holdings', 'group', 'report', 'deal', 'asset', 'financial', 'quarterly',
  ],
};

export const DEFAULT_CLASSIFIER: ClassifierConfig = {
  fallbackCategory: 'uncategorized',
  fallbackConfidence: 0.3,
  lengthWeightDivisor: 20,
  patternWeights: {},
  professionalKeywords: ['report', 'statement', 'summary'],
  professionalKeywordBonus: 0.1,
  documentExtensions: ['.pdf', '.docx', '.doc', '.xlsx', '.xls', '.pptx', '.csv'],
  documentExtensionBonus: 0.05,
  businessSubjectKeywords: ['financial', 'report', 'statement', 'loan', 'lease', 'rent', 'quarterly', 'compliance', 'valuation', 'investor'],
  businessSubjectBonus: 0.05,
  minSubjectLength: 10,
  trustedSenderBonus: 0.1,
  defaultCategories: ['correspondence', 'legal_documents', 'tax_documents', 'insurance'],
};

export const DEFAULT_EXPERIENCE: ExperienceConfig = {
  timeoutMs: 2000,
  minSimilarity: 0.3,
  limit: 10,
  correctionWeight: 0.3,
  autoWeight: 0.1,
  maxAssetBoost: 0.4,
};

export const DEFAULT_RETENTION: RetentionConfig = {
  maxRecords: 5000,
  maxAgeDays: 365,
  correctionAgeMultiplier: 3,
};

export const DEFAULT_CONCURRENCY: ConcurrencyConfig = {
  maxConcurrentEmails: 3,
  maxConcurrentAttachments: 5,
};

export const DEFAULT_LEARNING: LearningConfig = {
  conflictMargin: 1,
  defaultConfidence: 'medium',
  correctionConfidence: 'high',
  learnSenderAssociations: true,
  learnedSenderTrust: 0.6,
};

export const DEFAULT_BOOTSTRAP: BootstrapConfig = {
  staleClaimMs: 10 * 60 * 1000,
};

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  assetMatch: DEFAULT_ASSET_MATCH,
  classifier: DEFAULT_CLASSIFIER,
  experience: DEFAULT_EXPERIENCE,
  retention: DEFAULT_RETENTION,
  concurrency: DEFAULT_CONCURRENCY,
  learning: DEFAULT_LEARNING,
  bootstrap: DEFAULT_BOOTSTRAP,
};
