//append-only audit trail of knowledge mutations and conflicts
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AuditAction, AuditEntry, Collection, FactKind } from '../models/index.js';

export interface IAuditRepository {
  append(entry: AuditEntry): void;
  getAuditTrail(itemId: string): AuditEntry[];
  recent(limit: number): AuditEntry[];
  count(): number;
}

export class AuditRepository implements IAuditRepository {
  constructor(private db: Database.Database) {}

  append(e: AuditEntry): void {
    this.db.prepare(`INSERT INTO audit_trail (id, collection, kind, item_id, action, rationale, timestamp) VALUES (?, ?, ?, ?, ?, ?, ?)`)
      .run(uuidv4(), e.collection, e.kind, e.itemId, e.action, e.rationale, e.timestamp);
  }

  getAuditTrail(itemId: string): AuditEntry[] {
    return (this.db.prepare(`SELECT * FROM audit_trail WHERE item_id = ? ORDER BY timestamp ASC, rowid ASC`).all(itemId) as AuditRow[]).map(this.toEntry);
  }

  recent(limit: number): AuditEntry[] {
    return (this.db.prepare(`SELECT * FROM audit_trail ORDER BY timestamp DESC, rowid DESC LIMIT ?`).all(limit) as AuditRow[]).map(this.toEntry);
  }

  count(): number {
    return (this.db.prepare(`SELECT COUNT(*) AS n FROM audit_trail`).get() as { n: number }).n;
  }

  private toEntry(r: AuditRow): AuditEntry {
    return {
      collection: r.collection as Collection, kind: r.kind as FactKind, itemId: r.item_id,
      action: r.action as AuditAction, rationale: r.rationale, timestamp: r.timestamp,
    };
  }
}

interface AuditRow { id: string; collection: string; kind: string; item_id: string; action: string; rationale: string; timestamp: string; }
