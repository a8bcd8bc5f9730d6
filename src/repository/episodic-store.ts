//episodic partition: append-only log of past decisions and human corrections
import Database from 'better-sqlite3';
import type { Collection, EpisodicRecord, FactKind, RetentionConfig, StoredFact } from '../models/index.js';
import { DEFAULT_RETENTION } from '../models/index.js';
import { episodicRecordSchema } from '../models/schemas.js';
import { SqliteKnowledgeStore, type KnowledgeRow } from './knowledge-store.js';

const DAY_MS = 864e5;

export class EpisodicStore extends SqliteKnowledgeStore<EpisodicRecord> {
  readonly collection: Collection = 'episodic';
  readonly kind: FactKind = 'experience';
  protected readonly schema = episodicRecordSchema;

  constructor(db: Database.Database, private readonly retention: RetentionConfig = DEFAULT_RETENTION) {
    super(db);
  }

  //experiences have no natural key, identical content is the same experience
  identityKey(item: EpisodicRecord): string {
    return this.fingerprint(item);
  }

  protected fingerprintContent(item: EpisodicRecord): unknown {
    const { recordedAt: _t, ...content } = item;
    return content;
  }

  onInserted(_fact: StoredFact<EpisodicRecord>): void {
    this.enforceRetention();
  }

  //evicts by age first, then by size; corrections outlive auto records
  enforceRetention(now: Date = new Date()): number {
    const { maxAgeDays, correctionAgeMultiplier, maxRecords } = this.retention;
    const autoCutoff = new Date(now.getTime() - maxAgeDays * DAY_MS).toISOString();
    const correctionCutoff = new Date(now.getTime() - maxAgeDays * correctionAgeMultiplier * DAY_MS).toISOString();

    let evicted = this.db.prepare(`
      DELETE FROM knowledge_items WHERE kind = ? AND (
        (json_extract(data, '$.source') = 'auto' AND json_extract(data, '$.recordedAt') < ?) OR
        (json_extract(data, '$.source') = 'human_correction' AND json_extract(data, '$.recordedAt') < ?)
      )`).run(this.kind, autoCutoff, correctionCutoff).changes;

    const excess = this.count() - maxRecords;
    if (excess > 0) {
      evicted += this.db.prepare(`
        DELETE FROM knowledge_items WHERE id IN (
          SELECT id FROM knowledge_items WHERE kind = ?
          ORDER BY CASE WHEN json_extract(data, '$.source') = 'human_correction' THEN 1 ELSE 0 END ASC,
                   json_extract(data, '$.recordedAt') ASC, rowid ASC
          LIMIT ?
        )`).run(this.kind, excess).changes;
    }
    return evicted;
  }

  recent(limit: number): EpisodicRecord[] {
    return (this.db.prepare(`SELECT * FROM knowledge_items WHERE kind = ? ORDER BY json_extract(data, '$.recordedAt') DESC, rowid DESC LIMIT ?`).all(this.kind, limit) as KnowledgeRow[])
      .map(r => this.toFact(r).data);
  }

  corrections(): EpisodicRecord[] {
    return this.list().map(f => f.data).filter(r => r.source === 'human_correction');
  }
}
