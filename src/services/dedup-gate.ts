//deduplication gate: the single entry point for every knowledge write
//validate -> fingerprint -> identity collision -> conflict detection -> resolution
import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEntry, ConfidenceLevel, ConflictRecord, ConflictResolution, DetectedConflict, HumanConflictDecision, LearningConfig, StoredFact,
} from '../models/index.js';
import { DEFAULT_LEARNING } from '../models/index.js';
import type { KnowledgeBase, KnowledgeStore, ConflictFilter } from '../repository/index.js';
import { ConflictStateError, StorageUnavailableError, isStorageFailure } from '../errors.js';
import { createLogger } from '../logger.js';
import { resolveConflictAction, strongerLevel } from './confidence.js';
import { KeyedMutex } from './keyed-mutex.js';

const log = createLogger('dedup-gate');

export type IngestOutcome = 'inserted' | 'updated' | 'rejected' | 'queued_for_review' | 'duplicate';

export interface IngestResult {
  outcome: IngestOutcome;
  id: string | null;
  conflictId?: string;
  issues?: string[];
  rationale: string;
}

export interface IngestOptions {
  confidence?: ConfidenceLevel;
  rationale?: string;
}

export interface IDeduplicationGate {
  ingest<T>(store: KnowledgeStore<T>, raw: unknown, options?: IngestOptions): Promise<IngestResult>;
  adjust<T>(store: KnowledgeStore<T>, key: string, rationale: string, updater: (current: T) => T): Promise<StoredFact<T> | undefined>;
  getPendingConflicts(): ConflictRecord[];
  listConflicts(filter?: ConflictFilter): ConflictRecord[];
  resolveConflict(conflictId: string, decision: HumanConflictDecision, reviewer?: string): Promise<ConflictRecord>;
}

const SEVERITY_RANK = { high: 2, medium: 1 } as const;

export class DeduplicationGate implements IDeduplicationGate {
  private readonly mutex = new KeyedMutex();

  constructor(private kb: KnowledgeBase, private learning: LearningConfig = DEFAULT_LEARNING) {}

  async ingest<T>(store: KnowledgeStore<T>, raw: unknown, options: IngestOptions = {}): Promise<IngestResult> {
    const parsed = store.parse(raw);
    if (!parsed.ok) {
      log.warn({ kind: store.kind, issues: parsed.issues }, 'candidate rejected by validation');
      return { outcome: 'rejected', id: null, issues: parsed.issues, rationale: `validation failed: ${parsed.issues.join('; ')}` };
    }
    const item = parsed.value;
    const key = store.identityKey(item);
    const confidence = options.confidence ?? store.intrinsicConfidence(item) ?? this.learning.defaultConfidence;

    return this.mutex.runExclusive(store.lockKey(key), () =>
      this.withStorage('ingest', () => this.kb.db.transaction(() => this.ingestLocked(store, item, key, confidence, options.rationale))()));
  }

  private ingestLocked<T>(store: KnowledgeStore<T>, item: T, key: string, confidence: ConfidenceLevel, reason?: string): IngestResult {
    //cross-item invariants see every write committed before this one
    const issues = store.validate(item);
    if (issues.length) {
      log.warn({ kind: store.kind, key, issues }, 'candidate rejected by validation');
      return { outcome: 'rejected', id: null, issues, rationale: `validation failed: ${issues.join('; ')}` };
    }

    const duplicate = store.findByFingerprint(store.fingerprint(item));
    if (duplicate) {
      return { outcome: 'duplicate', id: duplicate.id, rationale: `identical ${store.kind} already stored as ${duplicate.id}` };
    }

    const existing = store.findByKey(key);
    if (!existing) {
      const fact = store.insert(item, confidence);
      const rationale = reason ?? `new ${store.kind} "${key}" at ${confidence} confidence`;
      this.audit(store, fact.id, 'insert', rationale);
      return { outcome: 'inserted', id: fact.id, rationale };
    }

    const contradictions = store.detectConflicts(existing.data, item);
    if (!contradictions.length) return this.refine(store, existing, item, confidence, reason);
    return this.resolve(store, existing, item, confidence, contradictions);
  }

  //same identity, nothing contradicts: fold the candidate into the existing fact
  private refine<T>(store: KnowledgeStore<T>, existing: StoredFact<T>, item: T, confidence: ConfidenceLevel, reason?: string): IngestResult {
    const merged = store.merge(existing.data, item);
    const level = strongerLevel(existing.confidence, confidence);
    if (store.fingerprint(merged) === existing.fingerprint && level === existing.confidence) {
      return { outcome: 'duplicate', id: existing.id, rationale: `candidate adds nothing to ${store.kind} "${existing.key}"` };
    }
    const rationale = reason ?? `refined ${store.kind} "${existing.key}" (${existing.confidence} -> ${level})`;
    const updated = store.update(existing.id, merged, level, rationale);
    this.audit(store, updated.id, 'update', rationale);
    return { outcome: 'updated', id: updated.id, rationale };
  }

  private resolve<T>(store: KnowledgeStore<T>, existing: StoredFact<T>, item: T, confidence: ConfidenceLevel, contradictions: DetectedConflict[]): IngestResult {
    const primary = [...contradictions].sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity])[0] ?? contradictions[0];
    if (!primary) throw new Error('resolve called without contradictions');
    const action = resolveConflictAction(existing.confidence, confidence, this.learning.conflictMargin);
    const resolution: ConflictResolution = action === 'update' ? 'updated' : action === 'reject' ? 'rejected' : 'pending';
    const summary = contradictions.map(c => c.detail).join('; ');

    const record: ConflictRecord = {
      id: uuidv4(), collection: store.collection, kind: store.kind, identityKey: existing.key,
      conflictType: primary.type, severity: primary.severity, contradictions: contradictions.map(c => `${c.type}: ${c.detail}`),
      existingId: existing.id, existingConfidence: existing.confidence, candidate: item, candidateConfidence: confidence,
      action, resolution, humanDecision: null, resolvedBy: null, createdAt: new Date(), resolvedAt: action === 'human_review' ? null : new Date(),
    };
    this.kb.conflicts.save(record);
    this.audit(store, existing.id, 'conflict', `${primary.type} (${primary.severity}): ${summary}; ${existing.confidence} vs ${confidence} -> ${action}`);
    log.warn({ kind: store.kind, key: existing.key, conflictType: primary.type, action }, 'knowledge conflict detected');

    if (action === 'update') {
      const rationale = `candidate at ${confidence} supersedes ${existing.confidence}: ${summary}`;
      store.update(existing.id, item, confidence, rationale);
      this.audit(store, existing.id, 'update', rationale);
      return { outcome: 'updated', id: existing.id, conflictId: record.id, rationale };
    }
    if (action === 'reject') {
      return { outcome: 'rejected', id: existing.id, conflictId: record.id, rationale: `existing ${existing.confidence} fact outranks candidate at ${confidence}: ${summary}` };
    }
    return { outcome: 'queued_for_review', id: existing.id, conflictId: record.id, rationale: `${existing.confidence} vs ${confidence} is too close to call: ${summary}` };
  }

  //guarded read-modify-write of a stored fact, e.g. usage counters
  async adjust<T>(store: KnowledgeStore<T>, key: string, rationale: string, updater: (current: T) => T): Promise<StoredFact<T> | undefined> {
    return this.mutex.runExclusive(store.lockKey(key), () => this.withStorage('adjust', () => this.kb.db.transaction(() => {
      const current = store.findByKey(key);
      if (!current) return undefined;
      const parsed = store.parse(updater(current.data));
      const issues = parsed.ok ? store.validate(parsed.value) : parsed.issues;
      if (!parsed.ok || issues.length) {
        log.warn({ kind: store.kind, key, issues }, 'adjustment rejected by validation');
        return undefined;
      }
      const updated = store.update(current.id, parsed.value, current.confidence, rationale);
      this.audit(store, updated.id, 'adjust', rationale);
      return updated;
    })()));
  }

  getPendingConflicts(): ConflictRecord[] {
    return this.kb.conflicts.findPending();
  }

  listConflicts(filter?: ConflictFilter): ConflictRecord[] {
    return this.kb.conflicts.list(filter);
  }

  async resolveConflict(conflictId: string, decision: HumanConflictDecision, reviewer?: string): Promise<ConflictRecord> {
    const record = this.kb.conflicts.findById(conflictId);
    if (!record) throw new ConflictStateError(conflictId, 'not found');
    if (record.resolution !== 'pending') throw new ConflictStateError(conflictId, `already ${record.resolution}`);
    const store = this.kb.storeFor(record.kind);

    return this.mutex.runExclusive(store.lockKey(record.identityKey), () => this.withStorage('resolveConflict', () => this.kb.db.transaction(() => {
      if (decision === 'accept_candidate') {
        const parsed = store.parse(record.candidate);
        const issues = parsed.ok ? store.validate(parsed.value) : parsed.issues;
        if (!parsed.ok || issues.length) throw new ConflictStateError(conflictId, `candidate no longer valid: ${issues.join('; ')}`);
        const rationale = `conflict ${conflictId} resolved by ${reviewer ?? 'reviewer'}: candidate accepted`;
        const current = store.findById(record.existingId) ?? store.findByKey(record.identityKey);
        const fact = current
          ? store.update(current.id, parsed.value, record.candidateConfidence, rationale)
          : store.insert(parsed.value, record.candidateConfidence);
        this.audit(store, fact.id, current ? 'update' : 'insert', rationale);
      } else {
        this.audit(store, record.existingId, 'conflict', `conflict ${conflictId} resolved by ${reviewer ?? 'reviewer'}: existing kept`);
      }
      if (!this.kb.conflicts.markResolved(conflictId, 'human_review', decision, reviewer ?? null)) {
        throw new ConflictStateError(conflictId, 'resolved concurrently');
      }
      const resolved = this.kb.conflicts.findById(conflictId);
      if (!resolved) throw new ConflictStateError(conflictId, 'not found');
      log.info({ conflictId, decision, reviewer }, 'conflict resolved');
      return resolved;
    })()));
  }

  private audit<T>(store: KnowledgeStore<T>, itemId: string, action: AuditEntry['action'], rationale: string): void {
    this.kb.audit.append({ collection: store.collection, kind: store.kind, itemId, action, rationale, timestamp: new Date().toISOString() });
  }

  private withStorage<R>(operation: string, fn: () => R): R {
    try {
      return fn();
    } catch (err) {
      if (isStorageFailure(err)) {
        log.error({ err, operation }, 'storage unavailable');
        throw new StorageUnavailableError(operation, err);
      }
      throw err;
    }
  }
}
