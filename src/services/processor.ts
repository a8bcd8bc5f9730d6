//stateful workflow orchestrator: Scan → Dedupe → Screen → Recall → Identify → Classify → Route → Commit
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type {
  AssetCandidate, ClassificationResult, ConflictRecord, HumanConflictDecision, InboundAttachment, InboundEmail, KnowledgeStats,
  ReviewItem, ReviewResolution, RouterConfig, RoutingDecision, SimilarExperience,
} from '../models/index.js';
import { DEFAULT_ROUTER_CONFIG } from '../models/index.js';
import type { DocumentSink, EmailSource, ScanVerdict, SecurityScanner, SimilarityLookup, SimilarityQuery } from '../models/ports.js';
import { inboundEmailSchema } from '../models/schemas.js';
import type { KnowledgeBase, ProcessedAttachment, ReviewFilter } from '../repository/index.js';
import { ClassificationCancelledError, SimilarityTimeoutError, ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import { AssetIdentifier } from './asset-identifier.js';
import { KnowledgeBootstrapper, type BootstrapReport } from './bootstrap.js';
import { mapWithConcurrency, withTimeout } from './concurrency.js';
import { DeduplicationGate } from './dedup-gate.js';
import { DocumentClassifier } from './document-classifier.js';
import { FeedbackService, type FeedbackContext, type FeedbackResult } from './feedback.js';
import { ReviewQueue } from './review-queue.js';
import { decideRoute, transition, type PipelineState, type Route } from './routing.js';
import { EpisodicSimilarityLookup } from './similarity.js';
import { extensionOf } from './text-match.js';

const log = createLogger('processor');

const EXCERPT_LENGTH = 200;

export interface ProcessorDeps {
  kb: KnowledgeBase;
  sink: DocumentSink;
  config?: RouterConfig;
  scanner?: SecurityScanner;
  similarity?: SimilarityLookup;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export type AttachmentOutcome =
  | { filename: string; status: 'processed'; decision: RoutingDecision }
  | { filename: string; status: 'failed'; error: string };

export interface EmailResult {
  emailId: string;
  outcomes: AttachmentOutcome[];
  error?: string;
}

//public processor interface
export interface IDocumentProcessor {
  classifyAttachment(email: InboundEmail, attachment: InboundAttachment, options?: ClassifyOptions): Promise<RoutingDecision>;
  processEmail(email: InboundEmail, options?: ClassifyOptions): Promise<EmailResult>;
  processEmails(source: EmailSource, options?: ClassifyOptions): Promise<EmailResult[]>;
  recordFeedback(filename: string, context: FeedbackContext, correctedCategory: string, correctedAssetId: string | null): Promise<FeedbackResult>;
  getPendingConflicts(): ConflictRecord[];
  resolveConflict(conflictId: string, decision: HumanConflictDecision, reviewer?: string): Promise<ConflictRecord>;
  getKnowledgeStats(): KnowledgeStats;
  listPendingReviews(filter?: ReviewFilter): ReviewItem[];
  resolveReview(reviewId: string, resolution: ReviewResolution): Promise<ReviewItem>;
  bootstrapFromDirectory(dir: string): Promise<BootstrapReport[]>;
}

//what a single attachment carries through the pipeline
interface Pending {
  attachmentId: string;
  email: InboundEmail;
  attachment: InboundAttachment;
  contentHash: string;
  degraded: boolean;
  candidates: AssetCandidate[];
  classification: ClassificationResult | null;
}

//main orchestrator implementation
export class DocumentProcessor implements IDocumentProcessor {
  readonly gate: DeduplicationGate;
  readonly bootstrapper: KnowledgeBootstrapper;
  readonly reviewQueue: ReviewQueue;
  private readonly kb: KnowledgeBase;
  private readonly sink: DocumentSink;
  private readonly config: RouterConfig;
  private readonly scanner?: SecurityScanner;
  private readonly similarity: SimilarityLookup;
  private readonly identifier: AssetIdentifier;
  private readonly classifier: DocumentClassifier;
  private readonly feedback: FeedbackService;

  constructor(deps: ProcessorDeps) {
    this.kb = deps.kb;
    this.sink = deps.sink;
    this.config = deps.config ?? DEFAULT_ROUTER_CONFIG;
    this.scanner = deps.scanner;
    this.similarity = deps.similarity ?? new EpisodicSimilarityLookup(deps.kb.episodic);
    this.gate = new DeduplicationGate(deps.kb, this.config.learning);
    this.identifier = new AssetIdentifier(this.config.assetMatch, this.config.experience);
    this.classifier = new DocumentClassifier(this.config.classifier, this.config.experience);
    this.feedback = new FeedbackService(deps.kb, this.gate, this.config.learning);
    this.reviewQueue = new ReviewQueue(deps.kb, deps.sink, this.feedback);
    this.bootstrapper = new KnowledgeBootstrapper(deps.kb, this.gate, this.config.bootstrap);
  }

  //process a single attachment through the full pipeline
  async classifyAttachment(email: InboundEmail, attachment: InboundAttachment, options: ClassifyOptions = {}): Promise<RoutingDecision> {
    const { signal } = options;
    const filename = attachment.filename;
    const ensureActive = (): void => { if (signal?.aborted) throw new ClassificationCancelledError(filename); };
    const p: Pending = {
      attachmentId: uuidv4(), email, attachment, contentHash: createHash('sha256').update(attachment.content).digest('hex'),
      degraded: false, candidates: [], classification: null,
    };
    let state: PipelineState = 'received';
    ensureActive();

    //Step 1: security scan
    const verdict: ScanVerdict = this.scanner ? await this.cancellable(filename, signal, this.scanner.scan(attachment, signal)) : { clean: true };
    if (!verdict.clean) {
      state = transition(state, { type: 'screen_failed' });
      const route = decideRoute({ candidates: [], classification: null, threat: verdict.threat ?? 'unspecified threat' }, this.config.thresholds);
      ensureActive();
      //threats are never persisted, only the review item is
      const review = this.enqueueReview(p, route, null);
      log.warn({ filename, threat: verdict.threat, emailId: email.id }, 'attachment failed security scan');
      return this.toDecision(p, route, state, { reviewItemId: review.id });
    }
    state = transition(state, { type: 'screen_passed' });

    //Step 2: duplicate content
    const prior = this.kb.attachments.findByHash(p.contentHash);
    if (prior) return this.duplicateDecision(p, prior);

    //Step 3: file type screen
    const ext = extensionOf(filename) || '(none)';
    const rule = this.kb.semantic.fileTypes.findRule(filename);
    if (!rule || !rule.data.isAllowed || rule.data.securityLevel === 'dangerous') {
      state = transition(state, { type: 'screen_failed' });
      const route = decideRoute({ candidates: [], classification: null, blockedFileType: rule ? ext : `${ext} (unknown)` }, this.config.thresholds);
      ensureActive();
      return this.commit(p, route, state, false);
    }

    //Step 4: recall similar experience, degraded when the lookup is slow or down
    const query: SimilarityQuery = { filename, subject: email.subject ?? '', body: email.body ?? '' };
    const experiences = await this.recall(query, signal, p);

    //Step 5: identify the asset
    p.candidates = this.identifier.identify(
      { filename, subject: email.subject, body: email.body, sender: email.sender },
      this.kb.semantic.assets.findActive(),
      s => this.kb.contact.findBySender(s),
      experiences,
      this.kb.procedural.rules.parametersFor('matching_parameters'),
    );

    //Step 6: classify within the asset's category set
    const top = p.candidates[0];
    const assetType = top?.assetType ?? null;
    const mapping = email.sender ? this.kb.contact.findBySender(email.sender) : undefined;
    p.classification = this.classifier.classify({
      assetType, filename, subject: email.subject, body: email.body,
      allowedCategories: this.classifier.allowedCategories(assetType, t => this.kb.semantic.categorySets.categoriesFor(t)),
      patterns: assetType ? this.kb.procedural.patterns.findForAssetType(assetType) : [],
      senderTrusted: mapping !== undefined && mapping.trustScore >= this.config.assetMatch.senderTrustFloor,
      experiences,
    });
    state = transition(state, { type: 'scored' });

    //Step 7: route
    const route = decideRoute({ candidates: p.candidates, classification: p.classification }, this.config.thresholds, this.config.assetMatch.ambiguityMargin);
    state = transition(state, { type: 'routed', action: route.action });

    //Step 8: commit, nothing before this point has written anything
    ensureActive();
    return this.commit(p, route, state, true);
  }

  private async commit(p: Pending, route: Route, state: PipelineState, learn: boolean): Promise<RoutingDecision> {
    const { attachment, email } = p;
    const top = state === 'stored' ? p.candidates[0] : undefined;
    const claimed = this.kb.attachments.record({
      contentHash: p.contentHash, attachmentId: p.attachmentId, filename: attachment.filename, assetId: top?.assetId ?? null,
      category: route.category, status: top ? 'stored' : 'pending_review', documentRef: null, processedAt: new Date(),
    });
    if (!claimed) {
      const prior = this.kb.attachments.findByHash(p.contentHash);
      if (prior) return this.duplicateDecision(p, prior);
    }

    let reviewItemId: string | null = null;
    let documentRef: string;
    try {
      if (top) {
        documentRef = await this.sink.store({ assetId: top.assetId, assetType: top.assetType, category: route.category }, attachment);
      } else {
        documentRef = await this.sink.hold(attachment);
        reviewItemId = this.enqueueReview(p, route, documentRef).id;
      }
    } catch (err) {
      //the content was never placed, so a retry must not see it as a duplicate
      this.kb.attachments.release(p.attachmentId);
      log.error({ filename: attachment.filename, emailId: email.id, err: err instanceof Error ? err.message : String(err) }, 'document sink failed, claim released');
      throw err;
    }
    this.kb.attachments.setDocumentRef(p.attachmentId, documentRef);

    if (learn) {
      await this.gate.ingest(this.kb.episodic, {
        filename: attachment.filename, subject: email.subject ?? '', excerpt: (email.body ?? '').slice(0, EXCERPT_LENGTH),
        predictedCategory: route.category, assetId: route.assetId, assetType: p.candidates.find(c => c.assetId === route.assetId)?.assetType ?? null,
        confidence: route.confidence, source: 'auto', recordedAt: new Date().toISOString(),
      });
      await this.gate.adjust(this.kb.semantic.fileTypes, extensionOf(attachment.filename), `${attachment.filename} ${top ? 'stored' : 'sent to review'}`,
        r => (top ? { ...r, successCount: r.successCount + 1 } : { ...r, failureCount: r.failureCount + 1 }));
    }

    log.info({ filename: attachment.filename, emailId: email.id, action: route.action, assetId: route.assetId, category: route.category, confidence: route.confidence }, 'attachment routed');
    return this.toDecision(p, route, state, { reviewItemId, documentRef });
  }

  private async recall(query: SimilarityQuery, signal: AbortSignal | undefined, p: Pending): Promise<SimilarExperience[]> {
    const { timeoutMs, limit, minSimilarity } = this.config.experience;
    try {
      return await withTimeout(s => this.similarity.findSimilar(query, { limit, minSimilarity, signal: s }), timeoutMs, signal);
    } catch (err) {
      if (signal?.aborted) throw new ClassificationCancelledError(query.filename);
      p.degraded = true;
      log.warn({ filename: query.filename, err: err instanceof Error ? err.message : String(err) },
        err instanceof SimilarityTimeoutError ? 'similarity lookup timed out, continuing without experience' : 'similarity lookup failed, continuing without experience');
      return [];
    }
  }

  private async cancellable<T>(filename: string, signal: AbortSignal | undefined, work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (err) {
      if (signal?.aborted) throw new ClassificationCancelledError(filename);
      throw err;
    }
  }

  private enqueueReview(p: Pending, route: Route, documentRef: string | null): ReviewItem {
    return this.reviewQueue.enqueue({
      queue: route.action === 'asset_review' ? 'asset_review' : 'general_review',
      reason: route.reviewReason ?? 'very_low_confidence',
      attachmentId: p.attachmentId, emailId: p.email.id, sender: p.email.sender, subject: p.email.subject ?? '',
      excerpt: (p.email.body ?? '').slice(0, EXCERPT_LENGTH), filename: p.attachment.filename, documentRef,
      predictedAssetId: route.assetId, predictedCategory: route.category, confidence: route.confidence,
    });
  }

  private duplicateDecision(p: Pending, prior: ProcessedAttachment): RoutingDecision {
    log.info({ filename: p.attachment.filename, duplicateOf: prior.attachmentId }, 'duplicate attachment skipped');
    const route: Route = {
      action: 'skip_duplicate', band: 'HIGH', confidence: 1, assetId: prior.assetId, category: prior.category,
      requiresConfirmation: false, reviewReason: null, reasoning: [`identical content already processed as ${prior.filename} (${prior.status})`],
    };
    return this.toDecision(p, route, transition('received', { type: 'duplicate_found' }), { duplicateOf: prior.attachmentId, documentRef: prior.documentRef });
  }

  private toDecision(p: Pending, route: Route, state: PipelineState, extra: { reviewItemId?: string | null; documentRef?: string | null; duplicateOf?: string }): RoutingDecision {
    const reasoning = [...route.reasoning];
    if (p.degraded) reasoning.push('similarity lookup unavailable, decided without past experience');
    const top = p.candidates[0];
    if (top) reasoning.push(...top.signals.map(s => `${top.assetId}: ${s.detail} (${s.delta >= 0 ? '+' : ''}${s.delta})`));
    if (p.classification) reasoning.push(...p.classification.rationale.map(r => `${r.kind}: ${r.label} (${r.delta >= 0 ? '+' : ''}${r.delta})`));

    return {
      attachmentId: p.attachmentId, emailId: p.email.id, filename: p.attachment.filename,
      status: state === 'duplicate' ? 'duplicate' : state === 'stored' ? 'stored' : 'pending_review',
      band: route.band, action: route.action, assetId: route.assetId, category: route.category, confidence: route.confidence,
      requiresConfirmation: route.requiresConfirmation, reviewReason: route.reviewReason,
      reviewItemId: extra.reviewItemId ?? null, documentRef: extra.documentRef ?? null, duplicateOf: extra.duplicateOf ?? null,
      degraded: p.degraded, assetCandidates: p.candidates, classification: p.classification, reasoning,
    };
  }

  //all attachments of one email under a bounded pool; a failing attachment does not stop its siblings
  async processEmail(email: InboundEmail, options: ClassifyOptions = {}): Promise<EmailResult> {
    const parsed = inboundEmailSchema.safeParse(email);
    if (!parsed.success) throw ValidationError.fromZod(`email ${email.id}`, parsed.error);
    const valid: InboundEmail = parsed.data;

    const results = await mapWithConcurrency(valid.attachments, this.config.concurrency.maxConcurrentAttachments,
      attachment => this.classifyAttachment(valid, attachment, options));
    const outcomes = results.map((r, i): AttachmentOutcome => {
      const filename = valid.attachments[i]?.filename ?? '';
      if (r.ok) return { filename, status: 'processed', decision: r.value };
      const error = r.error instanceof Error ? r.error.message : String(r.error);
      log.error({ filename, emailId: valid.id, err: error }, 'attachment processing failed');
      return { filename, status: 'failed', error };
    });
    return { emailId: valid.id, outcomes };
  }

  async processEmails(source: EmailSource, options: ClassifyOptions = {}): Promise<EmailResult[]> {
    const emails: InboundEmail[] = [];
    for await (const email of source) emails.push(email);

    const results = await mapWithConcurrency(emails, this.config.concurrency.maxConcurrentEmails, email => this.processEmail(email, options));
    return results.map((r, i): EmailResult => {
      if (r.ok) return r.value;
      const error = r.error instanceof Error ? r.error.message : String(r.error);
      log.error({ emailId: emails[i]?.id, err: error }, 'email processing failed');
      return { emailId: emails[i]?.id ?? '', outcomes: [], error };
    });
  }

  recordFeedback(filename: string, context: FeedbackContext, correctedCategory: string, correctedAssetId: string | null): Promise<FeedbackResult> {
    return this.feedback.recordFeedback(filename, context, correctedCategory, correctedAssetId);
  }

  getPendingConflicts(): ConflictRecord[] {
    return this.gate.getPendingConflicts();
  }

  resolveConflict(conflictId: string, decision: HumanConflictDecision, reviewer?: string): Promise<ConflictRecord> {
    return this.gate.resolveConflict(conflictId, decision, reviewer);
  }

  getKnowledgeStats(): KnowledgeStats {
    return {
      collections: this.kb.collectionStats(),
      pendingConflicts: this.kb.conflicts.count({ resolution: 'pending' }),
      totalConflicts: this.kb.conflicts.count(),
      pendingReviews: this.kb.reviews.countPending(),
      auditEntries: this.kb.audit.count(),
    };
  }

  listPendingReviews(filter?: ReviewFilter): ReviewItem[] {
    return this.reviewQueue.listPending(filter);
  }

  resolveReview(reviewId: string, resolution: ReviewResolution): Promise<ReviewItem> {
    return this.reviewQueue.resolve(reviewId, resolution);
  }

  bootstrapFromDirectory(dir: string): Promise<BootstrapReport[]> {
    return this.bootstrapper.bootstrapFromDirectory(dir);
  }
}
