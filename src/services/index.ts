//public API of the routing services
//the single controlled entry point into the pipeline

export { tierOf, strongerLevel, resolveConflictAction, bandOf, clamp01, roundScore } from './confidence.js';
export { KeyedMutex } from './keyed-mutex.js';
export { mapWithConcurrency, withTimeout, type Settled } from './concurrency.js';
export { tokenize, levenshtein, editSimilarity, jaccard, matchTier, prepareTarget, filenameStem, extensionOf, type MatchTarget, type FuzzyOptions } from './text-match.js';
export { DeduplicationGate, type IDeduplicationGate, type IngestOutcome, type IngestResult, type IngestOptions } from './dedup-gate.js';
export { AssetIdentifier, type IAssetIdentifier, type IdentificationContext, type SenderLookup } from './asset-identifier.js';
export { DocumentClassifier, type IDocumentClassifier, type ClassificationInput } from './document-classifier.js';
export { decideRoute, transition, TERMINAL_STATES, type Route, type RouteInput, type PipelineState, type PipelineEvent } from './routing.js';
export { EpisodicSimilarityLookup } from './similarity.js';
export { FeedbackService, type FeedbackContext, type FeedbackResult } from './feedback.js';
export { ReviewQueue, type EnqueueParams } from './review-queue.js';
export { KnowledgeBootstrapper, type BootstrapRecord, type BootstrapReport } from './bootstrap.js';
export { DocumentProcessor, type IDocumentProcessor, type ProcessorDeps, type ClassifyOptions, type AttachmentOutcome, type EmailResult } from './processor.js';
