//human review queue: items wait here until a reviewer stores or discards them
import { v4 as uuidv4 } from 'uuid';
import type { ReviewItem, ReviewQueueName, ReviewReason, ReviewResolution } from '../models/index.js';
import type { DocumentSink } from '../models/ports.js';
import type { KnowledgeBase, ReviewFilter, ReviewUpdate } from '../repository/index.js';
import { ReviewStateError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { FeedbackService } from './feedback.js';

const log = createLogger('review-queue');

export interface EnqueueParams {
  queue: ReviewQueueName;
  reason: ReviewReason;
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
}

export class ReviewQueue {
  constructor(private kb: KnowledgeBase, private sink: DocumentSink, private feedback: FeedbackService) {}

  enqueue(params: EnqueueParams): ReviewItem {
    const item: ReviewItem = {
      ...params, id: uuidv4(), status: 'pending', createdAt: new Date(), resolvedAt: null,
      resolution: null, correctedAssetId: null, correctedCategory: null, reviewer: null,
    };
    this.kb.reviews.save(item);
    log.info({ reviewId: item.id, queue: item.queue, reason: item.reason, filename: item.filename }, 'queued for review');
    return item;
  }

  listPending(filter?: ReviewFilter): ReviewItem[] {
    return this.kb.reviews.findPending(filter);
  }

  async resolve(reviewId: string, resolution: ReviewResolution): Promise<ReviewItem> {
    const item = this.kb.reviews.findById(reviewId);
    if (!item) throw new ReviewStateError(reviewId, 'not found');
    if (item.status !== 'pending') throw new ReviewStateError(reviewId, 'already resolved');
    const context = { subject: item.subject, body: item.excerpt, sender: item.sender || undefined, originalCategory: item.predictedCategory, originalAssetId: item.predictedAssetId, reviewer: resolution.reviewer };

    if (resolution.action === 'store') {
      const asset = this.kb.semantic.assets.findAsset(resolution.assetId);
      if (!asset) throw new ReviewStateError(reviewId, `unknown asset ${resolution.assetId}`);
      if (!item.documentRef) throw new ReviewStateError(reviewId, 'no document is held for this item');
      const documentRef = await this.sink.relocate(item.documentRef, { assetId: asset.assetId, assetType: asset.assetType, category: resolution.category });
      this.markResolved(reviewId, { resolution: 'stored', correctedAssetId: asset.assetId, correctedCategory: resolution.category, reviewer: resolution.reviewer ?? null, documentRef });
      this.kb.attachments.markStored(item.attachmentId, asset.assetId, resolution.category, documentRef);
      await this.feedback.recordFeedback(item.filename, context, resolution.category, asset.assetId);
    } else {
      if (item.documentRef) await this.sink.discard(item.documentRef);
      this.markResolved(reviewId, { resolution: 'discarded', correctedAssetId: null, correctedCategory: null, reviewer: resolution.reviewer ?? null, documentRef: null });
      await this.feedback.recordCorrection(item.filename, context, 'discarded', null, null);
    }

    const resolved = this.kb.reviews.findById(reviewId);
    if (!resolved) throw new ReviewStateError(reviewId, 'not found');
    log.info({ reviewId, resolution: resolved.resolution, reviewer: resolved.reviewer }, 'review resolved');
    return resolved;
  }

  private markResolved(reviewId: string, update: ReviewUpdate): void {
    if (!this.kb.reviews.resolve(reviewId, update)) throw new ReviewStateError(reviewId, 'resolved concurrently');
  }
}
