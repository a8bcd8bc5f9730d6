//conflict records written by the deduplication gate
import Database from 'better-sqlite3';
import type {
  Collection, ConfidenceLevel, ConflictAction, ConflictRecord, ConflictResolution, ConflictSeverity, ConflictType, FactKind, HumanConflictDecision,
} from '../models/index.js';

export interface ConflictFilter {
  resolution?: ConflictResolution;
  collection?: Collection;
  kind?: FactKind;
}

export interface IConflictRepository {
  save(record: ConflictRecord): void;
  findById(id: string): ConflictRecord | undefined;
  findPending(): ConflictRecord[];
  list(filter?: ConflictFilter): ConflictRecord[];
  markResolved(id: string, resolution: ConflictResolution, decision: HumanConflictDecision, resolvedBy: string | null): boolean;
  count(filter?: ConflictFilter): number;
}

export class ConflictRepository implements IConflictRepository {
  constructor(private db: Database.Database) {}

  save(c: ConflictRecord): void {
    this.db.prepare(`INSERT INTO conflict_records (id, collection, kind, identity_key, conflict_type, severity, contradictions, existing_id, existing_confidence, candidate, candidate_confidence, action, resolution, human_decision, resolved_by, created_at, resolved_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(c.id, c.collection, c.kind, c.identityKey, c.conflictType, c.severity, JSON.stringify(c.contradictions), c.existingId, c.existingConfidence,
        JSON.stringify(c.candidate), c.candidateConfidence, c.action, c.resolution, c.humanDecision, c.resolvedBy, c.createdAt.toISOString(), c.resolvedAt?.toISOString() ?? null);
  }

  findById(id: string): ConflictRecord | undefined {
    const row = this.db.prepare(`SELECT * FROM conflict_records WHERE id = ?`).get(id) as ConflictRow | undefined;
    return row ? this.toRecord(row) : undefined;
  }

  findPending(): ConflictRecord[] {
    return this.list({ resolution: 'pending' });
  }

  list(filter: ConflictFilter = {}): ConflictRecord[] {
    const { where, values } = this.buildWhere(filter);
    return (this.db.prepare(`SELECT * FROM conflict_records ${where} ORDER BY created_at ASC, rowid ASC`).all(...values) as ConflictRow[]).map(r => this.toRecord(r));
  }

  //only a pending record can be resolved, returns false when it already was
  markResolved(id: string, resolution: ConflictResolution, decision: HumanConflictDecision, resolvedBy: string | null): boolean {
    const result = this.db.prepare(`UPDATE conflict_records SET resolution = ?, human_decision = ?, resolved_by = ?, resolved_at = ? WHERE id = ? AND resolution = 'pending'`)
      .run(resolution, decision, resolvedBy, new Date().toISOString(), id);
    return result.changes > 0;
  }

  count(filter: ConflictFilter = {}): number {
    const { where, values } = this.buildWhere(filter);
    return (this.db.prepare(`SELECT COUNT(*) AS n FROM conflict_records ${where}`).get(...values) as { n: number }).n;
  }

  private buildWhere(filter: ConflictFilter): { where: string; values: string[] } {
    const clauses: string[] = [], values: string[] = [];
    if (filter.resolution) { clauses.push('resolution = ?'); values.push(filter.resolution); }
    if (filter.collection) { clauses.push('collection = ?'); values.push(filter.collection); }
    if (filter.kind) { clauses.push('kind = ?'); values.push(filter.kind); }
    return { where: clauses.length ? `WHERE ${clauses.join(' AND ')}` : '', values };
  }

  private toRecord(r: ConflictRow): ConflictRecord {
    return {
      id: r.id, collection: r.collection as Collection, kind: r.kind as FactKind, identityKey: r.identity_key,
      conflictType: r.conflict_type as ConflictType, severity: r.severity as ConflictSeverity, contradictions: JSON.parse(r.contradictions) as string[],
      existingId: r.existing_id, existingConfidence: r.existing_confidence as ConfidenceLevel,
      candidate: JSON.parse(r.candidate) as unknown, candidateConfidence: r.candidate_confidence as ConfidenceLevel,
      action: r.action as ConflictAction, resolution: r.resolution as ConflictResolution,
      humanDecision: r.human_decision as HumanConflictDecision | null, resolvedBy: r.resolved_by,
      createdAt: new Date(r.created_at), resolvedAt: r.resolved_at ? new Date(r.resolved_at) : null,
    };
  }
}

//row types (DB → App mapping)
interface ConflictRow {
  id: string; collection: string; kind: string; identity_key: string; conflict_type: string; severity: string; contradictions: string;
  existing_id: string; existing_confidence: string; candidate: string; candidate_confidence: string; action: string; resolution: string;
  human_decision: string | null; resolved_by: string | null; created_at: string; resolved_at: string | null;
}
