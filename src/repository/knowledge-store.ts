//shared contract of the four knowledge partitions and its SQLite-backed base
//every partition stores its facts in knowledge_items; a subclass per fact kind
//supplies validation, identity, fingerprint content and the conflict hook
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import type { Collection, ConfidenceLevel, DetectedConflict, FactKind, StoredFact } from '../models/index.js';
import { confidenceLevelSchema } from '../models/schemas.js';
import { formatZodIssues } from '../errors.js';
import { computeFingerprint } from './fingerprint.js';

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export interface KnowledgeStore<T> {
  readonly collection: Collection;
  readonly kind: FactKind;
  parse(raw: unknown): ParseOutcome<T>;
  //invariants spanning stored facts; the gate runs these under the write lock
  validate(item: T): string[];
  identityKey(item: T): string;
  //mutex key guarding writes of the fact with this identity
  lockKey(key: string): string;
  fingerprint(item: T): string;
  //confidence carried by the fact itself, if any
  intrinsicConfidence(item: T): ConfidenceLevel | undefined;
  detectConflicts(existing: T, candidate: T): DetectedConflict[];
  //non-contradictory refinement of an existing fact
  merge(existing: T, candidate: T): T;
  findById(id: string): StoredFact<T> | undefined;
  findByKey(key: string): StoredFact<T> | undefined;
  findByFingerprint(fingerprint: string): StoredFact<T> | undefined;
  list(): StoredFact<T>[];
  count(): number;
  insert(item: T, confidence: ConfidenceLevel): StoredFact<T>;
  update(id: string, item: T, confidence: ConfidenceLevel, rationale: string): StoredFact<T>;
  //runs inside the inserting transaction
  onInserted(fact: StoredFact<T>): void;
}

export abstract class SqliteKnowledgeStore<T> implements KnowledgeStore<T> {
  abstract readonly collection: Collection;
  abstract readonly kind: FactKind;
  protected abstract readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(protected readonly db: Database.Database) {}

  abstract identityKey(item: T): string;

  //normalized content that defines "the same fact"
  protected abstract fingerprintContent(item: T): unknown;

  //single-item checks the schema cannot express
  protected checkItem(_item: T): string[] {
    return [];
  }

  validate(_item: T): string[] {
    return [];
  }

  lockKey(key: string): string {
    return `${this.kind}:${key}`;
  }

  parse(raw: unknown): ParseOutcome<T> {
    const result = this.schema.safeParse(raw);
    if (!result.success) return { ok: false, issues: formatZodIssues(result.error) };
    const issues = this.checkItem(result.data);
    return issues.length ? { ok: false, issues } : { ok: true, value: result.data };
  }

  fingerprint(item: T): string {
    return computeFingerprint(this.kind, this.fingerprintContent(item));
  }

  intrinsicConfidence(_item: T): ConfidenceLevel | undefined {
    return undefined;
  }

  detectConflicts(_existing: T, _candidate: T): DetectedConflict[] {
    return [];
  }

  merge(_existing: T, candidate: T): T {
    return candidate;
  }

  onInserted(_fact: StoredFact<T>): void {}

  findById(id: string): StoredFact<T> | undefined {
    const row = this.db.prepare(`SELECT * FROM knowledge_items WHERE id = ? AND kind = ?`).get(id, this.kind) as KnowledgeRow | undefined;
    return row ? this.toFact(row) : undefined;
  }

  findByKey(key: string): StoredFact<T> | undefined {
    const row = this.db.prepare(`SELECT * FROM knowledge_items WHERE kind = ? AND identity_key = ?`).get(this.kind, key) as KnowledgeRow | undefined;
    return row ? this.toFact(row) : undefined;
  }

  findByFingerprint(fingerprint: string): StoredFact<T> | undefined {
    const row = this.db.prepare(`SELECT * FROM knowledge_items WHERE kind = ? AND fingerprint = ? LIMIT 1`).get(this.kind, fingerprint) as KnowledgeRow | undefined;
    return row ? this.toFact(row) : undefined;
  }

  list(): StoredFact<T>[] {
    return (this.db.prepare(`SELECT * FROM knowledge_items WHERE kind = ? ORDER BY created_at ASC, rowid ASC`).all(this.kind) as KnowledgeRow[])
      .map(r => this.toFact(r));
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM knowledge_items WHERE kind = ?`).get(this.kind) as { n: number };
    return row.n;
  }

  insert(item: T, confidence: ConfidenceLevel): StoredFact<T> {
    const now = new Date().toISOString();
    const id = uuidv4();
    this.db.prepare(`INSERT INTO knowledge_items (id, collection, kind, identity_key, fingerprint, confidence_level, data, version, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`)
      .run(id, this.collection, this.kind, this.identityKey(item), this.fingerprint(item), confidence, JSON.stringify(item), now, now);
    const fact: StoredFact<T> = {
      id, collection: this.collection, kind: this.kind, key: this.identityKey(item), fingerprint: this.fingerprint(item),
      confidence, data: item, version: 1, createdAt: new Date(now), updatedAt: new Date(now),
    };
    this.onInserted(fact);
    return fact;
  }

  //previous version is kept in knowledge_history
  update(id: string, item: T, confidence: ConfidenceLevel, rationale: string): StoredFact<T> {
    return this.db.transaction((): StoredFact<T> => {
      const previous = this.db.prepare(`SELECT * FROM knowledge_items WHERE id = ? AND kind = ?`).get(id, this.kind) as KnowledgeRow | undefined;
      if (!previous) throw new Error(`${this.kind} ${id} not found`);
      const now = new Date().toISOString();
      this.db.prepare(`INSERT INTO knowledge_history (id, item_id, version, fingerprint, confidence_level, data, replaced_at, rationale) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`)
        .run(uuidv4(), id, previous.version, previous.fingerprint, previous.confidence_level, previous.data, now, rationale);
      this.db.prepare(`UPDATE knowledge_items SET identity_key = ?, fingerprint = ?, confidence_level = ?, data = ?, version = version + 1, updated_at = ? WHERE id = ?`)
        .run(this.identityKey(item), this.fingerprint(item), confidence, JSON.stringify(item), now, id);
      return {
        id, collection: this.collection, kind: this.kind, key: this.identityKey(item), fingerprint: this.fingerprint(item),
        confidence, data: item, version: previous.version + 1, createdAt: new Date(previous.created_at), updatedAt: new Date(now),
      };
    })();
  }

  historyOf(id: string): HistoryEntry<T>[] {
    return (this.db.prepare(`SELECT version, confidence_level, data, replaced_at, rationale FROM knowledge_history WHERE item_id = ? ORDER BY version ASC`).all(id) as HistoryRow[])
      .map(r => ({ version: r.version, confidence: confidenceLevelSchema.parse(r.confidence_level), data: this.schema.parse(JSON.parse(r.data)), replacedAt: new Date(r.replaced_at), rationale: r.rationale }));
  }

  protected toFact(r: KnowledgeRow): StoredFact<T> {
    return {
      id: r.id, collection: this.collection, kind: this.kind, key: r.identity_key, fingerprint: r.fingerprint,
      confidence: confidenceLevelSchema.parse(r.confidence_level), data: this.schema.parse(JSON.parse(r.data)),
      version: r.version, createdAt: new Date(r.created_at), updatedAt: new Date(r.updated_at),
    };
  }
}

export interface HistoryEntry<T> {
  version: number;
  confidence: ConfidenceLevel;
  data: T;
  replacedAt: Date;
  rationale: string;
}

//row types (DB → App mapping)
export interface KnowledgeRow { id: string; collection: string; kind: string; identity_key: string; fingerprint: string; confidence_level: string; data: string; version: number; created_at: string; updated_at: string; }
interface HistoryRow { version: number; confidence_level: string; data: string; replaced_at: string; rationale: string; }
