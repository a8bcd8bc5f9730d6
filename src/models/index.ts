//core data contracts of the asset document router
//every store, service and port speaks in these types

//asset and document vocabulary
export const ASSET_TYPES = ['commercial_real_estate', 'private_credit', 'private_equity', 'infrastructure'] as const;
export type AssetType = (typeof ASSET_TYPES)[number];

export const SECURITY_LEVELS = ['safe', 'restricted', 'dangerous'] as const;
export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

//knowledge confidence tiers, ordered weakest to strongest
export const CONFIDENCE_LEVELS = ['experimental', 'low', 'medium', 'high'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const UNCATEGORIZED = 'uncategorized';

//knowledge partitions
export type Collection = 'semantic' | 'procedural' | 'episodic' | 'contact';
export const COLLECTIONS: readonly Collection[] = ['semantic', 'procedural', 'episodic', 'contact'];

export type FactKind =
  | 'asset'
  | 'category_set'
  | 'file_type_rule'
  | 'feedback'
  | 'classification_pattern'
  | 'business_rule'
  | 'experience'
  | 'sender_mapping';

//semantic facts
export interface AssetProfile {
  assetId: string;
  dealName: string;
  displayName: string;
  assetType: AssetType;
  identifiers: string[];
  businessContext: Record<string, string | number | boolean>;
  active: boolean;
}

export interface CategorySet {
  assetType: AssetType;
  categories: string[];
}

export interface FileTypeRule {
  extension: string;
  isAllowed: boolean;
  securityLevel: SecurityLevel;
  assetTypes: AssetType[];
  documentCategories: string[];
  successCount: number;
  failureCount: number;
  confidence: ConfidenceLevel;
}

export interface HumanFeedback {
  filename: string;
  subject: string;
  sender?: string;
  correctedCategory: string;
  correctedAssetId: string | null;
  originalCategory?: string;
  originalAssetId?: string | null;
  reviewer?: string;
}

//procedural rules
export interface ClassificationPattern {
  assetType: AssetType;
  category: string;
  pattern: string;
  weight?: number;
}

export interface BusinessRule {
  ruleId: string;
  category: string;
  statement: string;
  parameters: Record<string, number>;
}

//episodic experience
export type ExperienceSource = 'auto' | 'human_correction';

export interface EpisodicRecord {
  filename: string;
  subject: string;
  excerpt: string;
  predictedCategory: string;
  assetId: string | null;
  assetType: AssetType | null;
  confidence: number;
  source: ExperienceSource;
  recordedAt: string;
}

//sender trust
export interface SenderMapping {
  senderEmail: string;
  assetIds: string[];
  trustScore: number;
  organization?: string;
  name?: string;
}

//a fact as it sits in a store
export interface StoredFact<T> {
  id: string;
  collection: Collection;
  kind: FactKind;
  key: string;
  fingerprint: string;
  confidence: ConfidenceLevel;
  data: T;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

//conflicts
export type ConflictType =
  | 'asset_type_conflict'
  | 'file_permission_conflict'
  | 'security_level_conflict'
  | 'sender_organization_conflict'
  | 'rule_contradiction';

export type ConflictSeverity = 'high' | 'medium';
export type ConflictAction = 'update' | 'reject' | 'human_review';
export type ConflictResolution = 'pending' | 'updated' | 'rejected' | 'human_review';
export type HumanConflictDecision = 'accept_candidate' | 'keep_existing';

export interface DetectedConflict {
  type: ConflictType;
  severity: ConflictSeverity;
  detail: string;
}

export interface ConflictRecord {
  id: string;
  collection: Collection;
  kind: FactKind;
  identityKey: string;
  conflictType: ConflictType;
  severity: ConflictSeverity;
  contradictions: string[];
  existingId: string;
  existingConfidence: ConfidenceLevel;
  candidate: unknown;
  candidateConfidence: ConfidenceLevel;
  action: ConflictAction;
  resolution: ConflictResolution;
  humanDecision: HumanConflictDecision | null;
  resolvedBy: string | null;
  createdAt: Date;
  resolvedAt: Date | null;
}

//audit trail of accepted mutations
export type AuditAction = 'insert' | 'update' | 'adjust' | 'conflict';

export interface AuditEntry {
  collection: Collection;
  kind: FactKind;
  itemId: string;
  action: AuditAction;
  rationale: string;
  timestamp: string;
}

//inbound mail
export interface InboundAttachment {
  filename: string;
  content: Buffer;
}

export interface InboundEmail {
  id: string;
  sender: string;
  subject?: string;
  body?: string;
  receivedAt?: Date;
  attachments: InboundAttachment[];
}

//asset identification output
export type MatchTier = 'exact_token' | 'all_words' | 'substring' | 'fuzzy';

export interface AssetSignal {
  source: 'sender' | 'identifier' | 'bonus' | 'penalty' | 'experience';
  detail: string;
  delta: number;
}

export interface AssetCandidate {
  assetId: string;
  assetType: AssetType;
  confidence: number;
  signals: AssetSignal[];
}

//document classification output
export interface RationaleEntry {
  kind: 'pattern' | 'experience' | 'adjustment' | 'fallback';
  label: string;
  delta: number;
}

export interface ClassificationResult {
  category: string;
  confidence: number;
  fallback: boolean;
  matchedPatterns: string[];
  rationale: RationaleEntry[];
}

//similar past experience handed in by the similarity capability
export interface SimilarExperience {
  record: EpisodicRecord;
  similarity: number;
}

//routing
export type ConfidenceBand = 'HIGH' | 'MEDIUM' | 'LOW' | 'VERY_LOW';
export type RouteAction = 'auto_process' | 'process_with_confirmation' | 'asset_review' | 'general_review' | 'skip_duplicate';
export type ReviewReason =
  | 'low_confidence'
  | 'very_low_confidence'
  | 'no_asset_match'
  | 'blocked_file_type'
  | 'security_threat';
export type RouteStatus = 'stored' | 'pending_review' | 'duplicate';

export interface RoutingDecision {
  attachmentId: string;
  emailId: string;
  filename: string;
  status: RouteStatus;
  band: ConfidenceBand;
  action: RouteAction;
  assetId: string | null;
  category: string;
  confidence: number;
  requiresConfirmation: boolean;
  reviewReason: ReviewReason | null;
  reviewItemId: string | null;
  documentRef: string | null;
  duplicateOf: string | null;
  degraded: boolean;
  assetCandidates: AssetCandidate[];
  classification: ClassificationResult | null;
  reasoning: string[];
}

//human review queue
export type ReviewQueueName = 'asset_review' | 'general_review';
export type ReviewStatus = 'pending' | 'resolved';
export type ReviewOutcome = 'stored' | 'discarded';

export interface ReviewItem {
  id: string;
  queue: ReviewQueueName;
  reason: ReviewReason;
  status: ReviewStatus;
  attachmentId: string;
  emailId: string;
  sender: string;
  subject: string;
  excerpt: string;
  filename: string;
  documentRef: string | null;
  predictedAssetId: string | null;
  predictedCategory: string;
  confidence: number;
  createdAt: Date;
  resolvedAt: Date | null;
  resolution: ReviewOutcome | null;
  correctedAssetId: string | null;
  correctedCategory: string | null;
  reviewer: string | null;
}

export type ReviewResolution =
  | { action: 'store'; assetId: string; category: string; reviewer?: string }
  | { action: 'discard'; reviewer?: string };

//knowledge statistics
export interface CollectionStats {
  total: number;
  byKind: Partial<Record<FactKind, number>>;
}

export interface KnowledgeStats {
  collections: Record<Collection, CollectionStats>;
  pendingConflicts: number;
  totalConflicts: number;
  pendingReviews: number;
  auditEntries: number;
}

export * from './config.js';
export type * from './ports.js';
