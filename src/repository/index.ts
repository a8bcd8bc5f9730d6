export { initializeDatabase, closeDatabase } from './database.js';
export { canonicalize, computeFingerprint } from './fingerprint.js';
export { SqliteKnowledgeStore, type KnowledgeStore, type ParseOutcome, type HistoryEntry } from './knowledge-store.js';
export { SemanticStore, AssetProfileStore, CategorySetStore, FileTypeRuleStore, FeedbackStore } from './semantic-store.js';
export { ProceduralStore, ClassificationPatternStore, BusinessRuleStore } from './procedural-store.js';
export { EpisodicStore } from './episodic-store.js';
export { ContactStore } from './contact-store.js';
export { ConflictRepository, type IConflictRepository, type ConflictFilter } from './conflict-repository.js';
export { AuditRepository, type IAuditRepository } from './audit-repository.js';
export { ReviewRepository, type IReviewRepository, type ReviewFilter, type ReviewUpdate } from './review-repository.js';
export { BootstrapRepository, type BootstrapMarker, type BootstrapStatus } from './bootstrap-repository.js';
export { AttachmentRepository, type ProcessedAttachment } from './attachment-repository.js';
export { KnowledgeBase } from './knowledge-base.js';
