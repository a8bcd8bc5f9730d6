//human review queue persistence
import Database from 'better-sqlite3';
import type { ReviewItem, ReviewOutcome, ReviewQueueName, ReviewReason, ReviewStatus } from '../models/index.js';

export interface ReviewFilter {
  queue?: ReviewQueueName;
  reason?: ReviewReason;
  assetId?: string;
}

export interface ReviewUpdate {
  resolution: ReviewOutcome;
  correctedAssetId: string | null;
  correctedCategory: string | null;
  reviewer: string | null;
  documentRef: string | null;
}

export interface IReviewRepository {
  save(item: ReviewItem): void;
  findById(id: string): ReviewItem | undefined;
  findPending(filter?: ReviewFilter): ReviewItem[];
  resolve(id: string, update: ReviewUpdate): boolean;
  countPending(): number;
}

export class ReviewRepository implements IReviewRepository {
  constructor(private db: Database.Database) {}

  save(i: ReviewItem): void {
    this.db.prepare(`INSERT INTO review_items (id, queue, reason, status, attachment_id, email_id, sender, subject, excerpt, filename, document_ref, predicted_asset_id, predicted_category, confidence, created_at, resolved_at, resolution, corrected_asset_id, corrected_category, reviewer) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(i.id, i.queue, i.reason, i.status, i.attachmentId, i.emailId, i.sender, i.subject, i.excerpt, i.filename, i.documentRef, i.predictedAssetId, i.predictedCategory,
        i.confidence, i.createdAt.toISOString(), i.resolvedAt?.toISOString() ?? null, i.resolution, i.correctedAssetId, i.correctedCategory, i.reviewer);
  }

  findById(id: string): ReviewItem | undefined {
    const row = this.db.prepare(`SELECT * FROM review_items WHERE id = ?`).get(id) as ReviewRow | undefined;
    return row ? this.toItem(row) : undefined;
  }

  findPending(filter: ReviewFilter = {}): ReviewItem[] {
    const clauses = [`status = 'pending'`], values: string[] = [];
    if (filter.queue) { clauses.push('queue = ?'); values.push(filter.queue); }
    if (filter.reason) { clauses.push('reason = ?'); values.push(filter.reason); }
    if (filter.assetId) { clauses.push('predicted_asset_id = ?'); values.push(filter.assetId); }
    return (this.db.prepare(`SELECT * FROM review_items WHERE ${clauses.join(' AND ')} ORDER BY created_at ASC, rowid ASC`).all(...values) as ReviewRow[])
      .map(r => this.toItem(r));
  }

  //pending -> resolved happens once
  resolve(id: string, u: ReviewUpdate): boolean {
    const result = this.db.prepare(`UPDATE review_items SET status = 'resolved', resolved_at = ?, resolution = ?, corrected_asset_id = ?, corrected_category = ?, reviewer = ?, document_ref = COALESCE(?, document_ref) WHERE id = ? AND status = 'pending'`)
      .run(new Date().toISOString(), u.resolution, u.correctedAssetId, u.correctedCategory, u.reviewer, u.documentRef, id);
    return result.changes > 0;
  }

  countPending(): number {
    return (this.db.prepare(`SELECT COUNT(*) AS n FROM review_items WHERE status = 'pending'`).get() as { n: number }).n;
  }

  private toItem(r: ReviewRow): ReviewItem {
    return {
      id: r.id, queue: r.queue as ReviewQueueName, reason: r.reason as ReviewReason, status: r.status as ReviewStatus,
      attachmentId: r.attachment_id, emailId: r.email_id, sender: r.sender, subject: r.subject, excerpt: r.excerpt, filename: r.filename, documentRef: r.document_ref,
      predictedAssetId: r.predicted_asset_id, predictedCategory: r.predicted_category, confidence: r.confidence,
      createdAt: new Date(r.created_at), resolvedAt: r.resolved_at ? new Date(r.resolved_at) : null,
      resolution: r.resolution as ReviewOutcome | null, correctedAssetId: r.corrected_asset_id, correctedCategory: r.corrected_category, reviewer: r.reviewer,
    };
  }
}

interface ReviewRow {
  id: string; queue: string; reason: string; status: string; attachment_id: string; email_id: string; sender: string; subject: string; excerpt: string; filename: string;
  document_ref: string | null; predicted_asset_id: string | null; predicted_category: string; confidence: number; created_at: string;
  resolved_at: string | null; resolution: string | null; corrected_asset_id: string | null; corrected_category: string | null; reviewer: string | null;
}
