//processed attachments, keyed by content hash for duplicate detection
import Database from 'better-sqlite3';
import type { RouteStatus } from '../models/index.js';

export interface ProcessedAttachment {
  contentHash: string;
  attachmentId: string;
  filename: string;
  assetId: string | null;
  category: string;
  status: RouteStatus;
  documentRef: string | null;
  processedAt: Date;
}

export class AttachmentRepository {
  constructor(private db: Database.Database) {}

  findByHash(contentHash: string): ProcessedAttachment | undefined {
    const row = this.db.prepare(`SELECT * FROM processed_attachments WHERE content_hash = ?`).get(contentHash) as AttachmentRow | undefined;
    return row ? {
      contentHash: row.content_hash, attachmentId: row.attachment_id, filename: row.filename, assetId: row.asset_id, category: row.category,
      status: row.status as RouteStatus, documentRef: row.document_ref, processedAt: new Date(row.processed_at),
    } : undefined;
  }

  //false when the same content was already recorded
  record(p: ProcessedAttachment): boolean {
    return this.db.prepare(`INSERT OR IGNORE INTO processed_attachments (content_hash, attachment_id, filename, asset_id, category, status, document_ref, processed_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(p.contentHash, p.attachmentId, p.filename, p.assetId, p.category, p.status, p.documentRef, p.processedAt.toISOString()).changes > 0;
  }

  //drops a claim whose document never reached the sink
  release(attachmentId: string): boolean {
    return this.db.prepare(`DELETE FROM processed_attachments WHERE attachment_id = ? AND document_ref IS NULL`).run(attachmentId).changes > 0;
  }

  setDocumentRef(attachmentId: string, documentRef: string): void {
    this.db.prepare(`UPDATE processed_attachments SET document_ref = ? WHERE attachment_id = ?`).run(documentRef, attachmentId);
  }

  markStored(attachmentId: string, assetId: string, category: string, documentRef: string): void {
    this.db.prepare(`UPDATE processed_attachments SET status = 'stored', asset_id = ?, category = ?, document_ref = ? WHERE attachment_id = ?`)
      .run(assetId, category, documentRef, attachmentId);
  }

  count(): number {
    return (this.db.prepare(`SELECT COUNT(*) AS n FROM processed_attachments`).get() as { n: number }).n;
  }
}

interface AttachmentRow {
  content_hash: string; attachment_id: string; filename: string; asset_id: string | null; category: string;
  status: string; document_ref: string | null; processed_at: string;
}
