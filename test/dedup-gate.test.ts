import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestKnowledgeBase, cleanupTestDatabase, makeAsset } from './setup.js';
import { DeduplicationGate } from '../src/services/dedup-gate.js';
import { resolveConflictAction } from '../src/services/confidence.js';
import { KeyedMutex } from '../src/services/keyed-mutex.js';
import type { KnowledgeBase } from '../src/repository/index.js';
import { ConflictStateError } from '../src/errors.js';

describe('conflict resolution table', () => {
  it('updates only when the candidate is clearly stronger', () => {
    expect(resolveConflictAction('low', 'high')).toBe('update');
    expect(resolveConflictAction('experimental', 'medium')).toBe('update');
    expect(resolveConflictAction('medium', 'high')).toBe('human_review');
    expect(resolveConflictAction('medium', 'high', 0)).toBe('update');
  });

  it('rejects a weaker candidate and sends ties to a human', () => {
    expect(resolveConflictAction('high', 'low')).toBe('reject');
    expect(resolveConflictAction('high', 'medium')).toBe('reject');
    expect(resolveConflictAction('medium', 'medium')).toBe('human_review');
  });
});

describe('DeduplicationGate', () => {
  let db: Database.Database, kb: KnowledgeBase, gate: DeduplicationGate;

  beforeEach(() => { const s = createTestKnowledgeBase(); db = s.db; kb = s.kb; gate = new DeduplicationGate(kb); });
  afterEach(() => cleanupTestDatabase(db));

  it('stores a fact once and reports re-ingestion as duplicate', async () => {
    const first = await gate.ingest(kb.semantic.assets, makeAsset());
    const second = await gate.ingest(kb.semantic.assets, makeAsset());

    expect(first.outcome).toBe('inserted');
    expect(second).toMatchObject({ outcome: 'duplicate', id: first.id });
    expect(kb.semantic.assets.count()).toBe(1);
    expect(kb.audit.getAuditTrail(first.id ?? '').map(e => e.action)).toEqual(['insert']);
  });

  it('ignores case and identifier order when fingerprinting', async () => {
    const first = await gate.ingest(kb.semantic.assets, makeAsset());
    const reordered = await gate.ingest(kb.semantic.assets, makeAsset({ dealName: 'ALPHA TOWER', identifiers: ['AT-1', 'Alpha Tower'] }));

    expect(reordered).toMatchObject({ outcome: 'duplicate', id: first.id });
  });

  it('rejects invalid candidates without writing', async () => {
    const result = await gate.ingest(kb.semantic.assets, makeAsset({ identifiers: [] }));

    expect(result.outcome).toBe('rejected');
    expect(result.id).toBeNull();
    expect(result.issues).toEqual(['[identifiers] at least one identifier is required']);
    expect(kb.semantic.assets.count()).toBe(0);
  });

  it('keeps identifier sets disjoint across assets', async () => {
    await gate.ingest(kb.semantic.assets, makeAsset());
    const result = await gate.ingest(kb.semantic.assets, makeAsset({ assetId: 'OTHER', identifiers: ['Alpha Tower', 'other'] }));

    expect(result.outcome).toBe('rejected');
    expect(result.issues).toEqual(['identifiers "alpha tower" already belong to asset ALPHA-TOWER']);
  });

  it('keeps identifier sets disjoint when two assets are ingested at once', async () => {
    const [a, b] = await Promise.all([
      gate.ingest(kb.semantic.assets, makeAsset({ assetId: 'A', identifiers: ['shared', 'a1'] })),
      gate.ingest(kb.semantic.assets, makeAsset({ assetId: 'B', identifiers: ['shared', 'b1'] })),
    ]);

    expect(a?.outcome).toBe('inserted');
    expect(b).toMatchObject({ outcome: 'rejected', id: null, issues: ['identifiers "shared" already belong to asset A'] });
    expect(kb.semantic.assets.list().map(f => f.data.assetId)).toEqual(['A']);
  });

  it('serializes every asset write on one lock', () => {
    expect(kb.semantic.assets.lockKey('A')).toBe(kb.semantic.assets.lockKey('B'));
    expect(kb.semantic.fileTypes.lockKey('pdf')).not.toBe(kb.semantic.fileTypes.lockKey('doc'));
  });

  it('lets a high-confidence rule replace a low-confidence contradicting one', async () => {
    const low = await gate.ingest(kb.semantic.fileTypes, { extension: 'pdf', isAllowed: false, securityLevel: 'safe', confidence: 'low' });
    const high = await gate.ingest(kb.semantic.fileTypes, { extension: '.PDF', isAllowed: true, securityLevel: 'safe', confidence: 'high' });

    expect(low.outcome).toBe('inserted');
    expect(high.outcome).toBe('updated');
    expect(high.id).toBe(low.id);
    expect(high.conflictId).toBeDefined();

    const rule = kb.semantic.fileTypes.findRule('report.pdf');
    expect(rule?.data.isAllowed).toBe(true);
    expect(rule?.confidence).toBe('high');
    expect(rule?.version).toBe(2);

    const [conflict] = gate.listConflicts();
    expect(conflict).toMatchObject({
      conflictType: 'file_permission_conflict', severity: 'high', action: 'update', resolution: 'updated',
      existingConfidence: 'low', candidateConfidence: 'high',
      contradictions: ['file_permission_conflict: .pdf is denied, candidate says allowed'],
    });

    const history = kb.semantic.fileTypes.historyOf(low.id ?? '');
    expect(history).toHaveLength(1);
    expect(history[0]?.data.isAllowed).toBe(false);
    expect(history[0]?.confidence).toBe('low');
    expect(kb.audit.getAuditTrail(low.id ?? '').map(e => e.action)).toEqual(['insert', 'conflict', 'update']);
  });

  it('keeps a high-confidence rule when a weaker one contradicts it', async () => {
    await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: true, securityLevel: 'safe', confidence: 'high' });
    const low = await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: false, securityLevel: 'safe', confidence: 'low' });

    expect(low.outcome).toBe('rejected');
    expect(kb.semantic.fileTypes.findRule('a.pdf')?.data.isAllowed).toBe(true);
    expect(gate.listConflicts({ resolution: 'rejected' })).toHaveLength(1);
    expect(gate.getPendingConflicts()).toHaveLength(0);
  });

  it('queues equally confident contradictions for a human', async () => {
    await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: true, securityLevel: 'safe', confidence: 'medium' });
    const result = await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: false, securityLevel: 'restricted', confidence: 'medium' });

    expect(result.outcome).toBe('queued_for_review');
    const pending = gate.getPendingConflicts();
    expect(pending).toHaveLength(1);
    expect(pending[0]?.conflictType).toBe('file_permission_conflict');
    expect(pending[0]?.contradictions).toHaveLength(2);
    expect(kb.semantic.fileTypes.findRule('a.pdf')?.data.isAllowed).toBe(true);
  });

  it('applies the candidate when a reviewer accepts it', async () => {
    await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: true, securityLevel: 'safe', confidence: 'medium' });
    const { conflictId } = await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: false, securityLevel: 'restricted', confidence: 'medium' });

    const resolved = await gate.resolveConflict(conflictId ?? '', 'accept_candidate', 'ops');

    expect(resolved).toMatchObject({ resolution: 'human_review', humanDecision: 'accept_candidate', resolvedBy: 'ops' });
    expect(resolved.resolvedAt).toBeInstanceOf(Date);
    const rule = kb.semantic.fileTypes.findRule('a.pdf');
    expect(rule?.data).toMatchObject({ isAllowed: false, securityLevel: 'restricted' });
    expect(rule?.confidence).toBe('medium');
    expect(gate.getPendingConflicts()).toHaveLength(0);
  });

  it('leaves the fact alone when a reviewer keeps it, and resolves only once', async () => {
    await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: true, securityLevel: 'safe', confidence: 'medium' });
    const { conflictId } = await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: false, securityLevel: 'safe', confidence: 'medium' });
    const id = conflictId ?? '';

    const resolved = await gate.resolveConflict(id, 'keep_existing');

    expect(resolved.humanDecision).toBe('keep_existing');
    expect(kb.semantic.fileTypes.findRule('a.pdf')?.data.isAllowed).toBe(true);
    await expect(gate.resolveConflict(id, 'accept_candidate')).rejects.toBeInstanceOf(ConflictStateError);
    await expect(gate.resolveConflict('missing', 'keep_existing')).rejects.toThrow('Conflict missing cannot be resolved: not found');
  });

  it('merges non-contradicting refinements and ignores ones that add nothing', async () => {
    await gate.ingest(kb.semantic.categorySets, { assetType: 'private_credit', categories: ['loan_documents'] });
    const grown = await gate.ingest(kb.semantic.categorySets, { assetType: 'private_credit', categories: ['Credit Memo'] });
    const subset = await gate.ingest(kb.semantic.categorySets, { assetType: 'private_credit', categories: ['loan_documents'] });

    expect(grown.outcome).toBe('updated');
    expect(subset.outcome).toBe('duplicate');
    expect(kb.semantic.categorySets.categoriesFor('private_credit')).toEqual(['loan_documents', 'credit_memo']);
  });

  it('flags a sender claimed by two organizations', async () => {
    await gate.ingest(kb.contact, { senderEmail: 'desk@test.example', assetIds: ['A'], trustScore: 0.7, organization: 'Acme Servicing' });
    const result = await gate.ingest(kb.contact, { senderEmail: 'Desk <DESK@test.example>', assetIds: ['A'], trustScore: 0.7, organization: 'Other Capital' });

    expect(result.outcome).toBe('queued_for_review');
    expect(gate.getPendingConflicts()[0]).toMatchObject({ conflictType: 'sender_organization_conflict', severity: 'medium' });
  });

  it('serializes concurrent writers to the same identity', async () => {
    const results = await Promise.all(['A-0', 'A-1', 'A-2', 'A-3', 'A-4'].map(assetId =>
      gate.ingest(kb.contact, { senderEmail: 'desk@test.example', assetIds: [assetId], trustScore: 0.7 })));

    expect(results.map(r => r.outcome)).toEqual(['inserted', 'updated', 'updated', 'updated', 'updated']);
    expect(kb.contact.findBySender('desk@test.example')?.assetIds).toEqual(['A-0', 'A-1', 'A-2', 'A-3', 'A-4']);
    expect(kb.contact.count()).toBe(1);
  });

  it('adjusts counters through the gate and audits the change', async () => {
    const { id } = await gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: true, securityLevel: 'safe' });
    await gate.adjust(kb.semantic.fileTypes, '.pdf', 'stored a.pdf', r => ({ ...r, successCount: r.successCount + 1 }));
    const updated = await gate.adjust(kb.semantic.fileTypes, '.pdf', 'stored b.pdf', r => ({ ...r, successCount: r.successCount + 1 }));

    expect(updated?.data.successCount).toBe(2);
    expect(updated?.confidence).toBe('medium');
    expect(kb.audit.getAuditTrail(id ?? '').map(e => e.action)).toEqual(['insert', 'adjust', 'adjust']);
    expect(await gate.adjust(kb.semantic.fileTypes, '.xyz', 'nothing', r => r)).toBeUndefined();
  });
});

describe('KeyedMutex', () => {
  const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

  it('runs tasks with the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string, ms: number) => async (): Promise<void> => { log.push(`${name}:start`); await sleep(ms); log.push(`${name}:end`); };

    await Promise.all([mutex.runExclusive('k', task('a', 20)), mutex.runExclusive('k', task('b', 1))]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('lets different keys interleave', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string, ms: number) => async (): Promise<void> => { log.push(`${name}:start`); await sleep(ms); log.push(`${name}:end`); };

    await Promise.all([mutex.runExclusive('a', task('a', 20)), mutex.runExclusive('b', task('b', 1))]);

    expect(log).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
  });

  it('releases the key when the task throws', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(await mutex.runExclusive('k', () => 'next')).toBe('next');
  });
});
