import { createHash } from 'crypto';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createBootstrappedProcessor, cleanupTestDatabase, loadEmailById, makeEmail } from './setup.js';
import { DocumentProcessor } from '../src/services/processor.js';
import type { KnowledgeBase } from '../src/repository/index.js';
import { MemoryDocumentSink } from '../src/adapters/memory-sink.js';
import { SignatureScanner } from '../src/adapters/signature-scanner.js';
import { ClassificationCancelledError } from '../src/errors.js';
import { DEFAULT_EXPERIENCE, DEFAULT_ROUTER_CONFIG } from '../src/models/index.js';
import type { DocumentDestination, InboundAttachment, InboundEmail, SimilarExperience, SimilarityLookup } from '../src/models/index.js';

function firstAttachment(email: InboundEmail): InboundAttachment {
  const [attachment] = email.attachments;
  if (!attachment) throw new Error(`email ${email.id} has no attachments`);
  return attachment;
}

//rejects documents whose name starts with "broken"
class FailingSink extends MemoryDocumentSink {
  async store(destination: DocumentDestination, attachment: InboundAttachment): Promise<string> {
    if (attachment.filename.startsWith('broken')) throw new Error('disk full');
    return super.store(destination, attachment);
  }
}

//fails the first store, then behaves
class FlakySink extends MemoryDocumentSink {
  private failed = false;

  async store(destination: DocumentDestination, attachment: InboundAttachment): Promise<string> {
    if (!this.failed) {
      this.failed = true;
      throw new Error('disk full');
    }
    return super.store(destination, attachment);
  }
}

describe('DocumentProcessor', () => {
  let db: Database.Database, kb: KnowledgeBase, sink: MemoryDocumentSink, processor: DocumentProcessor;

  beforeEach(async () => { const s = await createBootstrappedProcessor(); db = s.db; kb = s.kb; sink = s.sink; processor = s.processor; });
  afterEach(() => cleanupTestDatabase(db));

  it('files a coded term loan attachment under its asset automatically', async () => {
    const email = loadEmailById('t-i3-001');

    const decision = await processor.classifyAttachment(email, firstAttachment(email));

    expect(decision).toMatchObject({
      status: 'stored', action: 'auto_process', band: 'HIGH', assetId: 'I3-TL', category: 'loan_documents',
      confidence: 0.95, requiresConfirmation: false, reviewReason: null, degraded: false,
    });
    expect(decision.documentRef?.startsWith('I3-TL/loan_documents/')).toBe(true);
    expect(decision.reasoning[0]).toBe('asset I3-TL at 0.95, category loan_documents at 1, routing confidence 0.95 (HIGH)');
    expect(sink.list()).toHaveLength(1);
    expect(kb.episodic.count()).toBe(1);
    expect(kb.semantic.fileTypes.findRule('.pdf')?.data.successCount).toBe(1);
  });

  it('skips content it has already processed', async () => {
    const email = loadEmailById('t-i3-001');
    const first = await processor.classifyAttachment(email, firstAttachment(email));

    const again = await processor.classifyAttachment({ ...email, id: 't-i3-resend' }, firstAttachment(email));

    expect(again).toMatchObject({ status: 'duplicate', action: 'skip_duplicate', duplicateOf: first.attachmentId, documentRef: first.documentRef, assetId: 'I3-TL' });
    expect(sink.list()).toHaveLength(1);
    expect(kb.episodic.count()).toBe(1);
  });

  it('gains confidence after a human confirms a similar document', async () => {
    const firstEmail = loadEmailById('t-harbor-001');
    const first = await processor.classifyAttachment(firstEmail, firstAttachment(firstEmail));
    expect(first).toMatchObject({ status: 'stored', action: 'process_with_confirmation', band: 'MEDIUM', assetId: 'HARBOR-POINT', category: 'appraisal', confidence: 0.65 });

    const feedback = await processor.recordFeedback('valuation_2024.pdf', { subject: 'Harbr Point appraisal', sender: 'pm@thirdparty.example' }, 'appraisal', 'HARBOR-POINT');
    expect(feedback.feedback.outcome).toBe('inserted');
    expect(feedback.experience.outcome).toBe('inserted');
    expect(feedback.senderAssociation?.outcome).toBe('inserted');

    const secondEmail = loadEmailById('t-harbor-002');
    const second = await processor.classifyAttachment(secondEmail, firstAttachment(secondEmail));
    expect(second).toMatchObject({ status: 'stored', action: 'auto_process', band: 'HIGH', assetId: 'HARBOR-POINT', category: 'appraisal', confidence: 1 });
  });

  it('files loan docs from an unmapped sender by filename code and wording', async () => {
    const email = makeEmail({
      id: 't-i3-short', sender: 'analyst@unmapped.example', subject: 'i3 loan docs', body: 'attached find the loan documents for the i3 deal',
      files: { 'RLV_TRM_i3_TD.pdf': 'loan package' },
    });

    const decision = await processor.classifyAttachment(email, firstAttachment(email));

    expect(decision).toMatchObject({ status: 'stored', action: 'auto_process', band: 'HIGH', assetId: 'I3-TL', category: 'loan_documents', confidence: 0.95 });
    expect(decision.reasoning[0]).toBe('asset I3-TL at 0.95, category loan_documents at 1, routing confidence 0.95 (HIGH)');
  });

  it('rejects feedback that names an unknown asset', async () => {
    await expect(processor.recordFeedback('a.pdf', {}, 'appraisal', 'NO-SUCH-ASSET')).rejects.toThrow('unknown asset NO-SUCH-ASSET');
  });

  it('holds blocked and unknown file types for review without learning from them', async () => {
    const result = await processor.processEmail(loadEmailById('t-mixed-001'));
    const decisions = result.outcomes.map(o => (o.status === 'processed' ? o.decision : undefined));

    expect(decisions.map(d => d?.reviewReason)).toEqual(['blocked_file_type', 'blocked_file_type', 'blocked_file_type']);
    expect(decisions.map(d => d?.reasoning[0])).toEqual([
      'file type .zip is not accepted', 'file type .xyz (unknown) is not accepted', 'file type .exe is not accepted',
    ]);
    expect(decisions.every(d => d?.status === 'pending_review' && d.documentRef?.startsWith('_review/'))).toBe(true);
    expect(processor.listPendingReviews({ reason: 'blocked_file_type' })).toHaveLength(3);
    expect(kb.semantic.fileTypes.findRule('.zip')?.data.failureCount).toBe(0);
    expect(kb.episodic.count()).toBe(0);
  });

  it('flags threats and never stores them', async () => {
    const scanned = new DocumentProcessor({ kb, sink, scanner: new SignatureScanner() });

    const result = await scanned.processEmail(loadEmailById('t-mixed-001'));
    const exe = result.outcomes[2];
    if (exe?.status !== 'processed') throw new Error('setup.exe was not processed');

    expect(exe.decision).toMatchObject({
      status: 'pending_review', reviewReason: 'security_threat', documentRef: null, reasoning: ['security scan flagged: windows executable'],
    });
    expect(sink.list()).toHaveLength(2);
    expect(scanned.listPendingReviews({ reason: 'security_threat' })).toHaveLength(1);
  });

  it('keeps processing siblings when one attachment fails', async () => {
    const failing = new FailingSink();
    const isolated = new DocumentProcessor({ kb, sink: failing });
    const email = makeEmail({
      id: 't-fail', sender: 'agent@lender.example', subject: 'RLV TRM i3 term loan documents', body: 'Executed term loan agreement attached.',
      files: { 'RLV_TRM_i3_TD.pdf': 'copy one', 'broken_i3.pdf': 'copy two' },
    });

    const result = await isolated.processEmail(email);

    expect(result.outcomes.map(o => o.status)).toEqual(['processed', 'failed']);
    expect(result.outcomes[1]).toEqual({ filename: 'broken_i3.pdf', status: 'failed', error: 'disk full' });
    expect(failing.list()).toHaveLength(1);
  });

  it('stores content on retry after the sink failed the first attempt', async () => {
    const flaky = new FlakySink();
    const retrying = new DocumentProcessor({ kb, sink: flaky });
    const email = loadEmailById('t-i3-001');
    const attachment = firstAttachment(email);

    await expect(retrying.classifyAttachment(email, attachment)).rejects.toThrow('disk full');
    expect(kb.attachments.count()).toBe(0);

    const retry = await retrying.classifyAttachment(email, attachment);

    expect(retry).toMatchObject({ status: 'stored', action: 'auto_process', assetId: 'I3-TL' });
    expect(retry.documentRef?.startsWith('I3-TL/loan_documents/')).toBe(true);
    expect(flaky.list()).toHaveLength(1);
    expect(kb.attachments.findByHash(createHash('sha256').update(attachment.content).digest('hex'))?.documentRef).toBe(retry.documentRef);
  });

  it('decides without experience when the similarity lookup is too slow', async () => {
    const hanging: SimilarityLookup = {
      findSimilar: (_query, { signal }) => new Promise<SimilarExperience[]>((_, reject) => signal?.addEventListener('abort', () => reject(new Error('aborted')))),
    };
    const config = { ...DEFAULT_ROUTER_CONFIG, experience: { ...DEFAULT_EXPERIENCE, timeoutMs: 20 } };
    const slow = new DocumentProcessor({ kb, sink, config, similarity: hanging });
    const email = loadEmailById('t-i3-001');

    const decision = await slow.classifyAttachment(email, firstAttachment(email));

    expect(decision).toMatchObject({ status: 'stored', assetId: 'I3-TL', degraded: true });
    expect(decision.reasoning).toContain('similarity lookup unavailable, decided without past experience');
  });

  it('decides without experience when the similarity lookup fails', async () => {
    const offline: SimilarityLookup = { findSimilar: async () => { throw new Error('index offline'); } };
    const degraded = new DocumentProcessor({ kb, sink, similarity: offline });
    const email = loadEmailById('t-i3-001');

    expect((await degraded.classifyAttachment(email, firstAttachment(email))).degraded).toBe(true);
  });

  it('writes nothing when cancelled before it starts', async () => {
    const email = loadEmailById('t-i3-001');

    await expect(processor.classifyAttachment(email, firstAttachment(email), { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(ClassificationCancelledError);
    expect(kb.attachments.count()).toBe(0);
    expect(kb.episodic.count()).toBe(0);
  });

  it('writes nothing when cancelled before commit', async () => {
    const controller = new AbortController();
    const cancelling: SimilarityLookup = { findSimilar: async () => { controller.abort(); return []; } };
    const cancellable = new DocumentProcessor({ kb, sink, similarity: cancelling });
    const email = loadEmailById('t-i3-001');

    await expect(cancellable.classifyAttachment(email, firstAttachment(email), { signal: controller.signal })).rejects.toThrow('was cancelled before commit');
    expect(kb.attachments.count()).toBe(0);
    expect(kb.episodic.count()).toBe(0);
    expect(sink.list()).toHaveLength(0);
  });

  it('processes a stream of emails and reports invalid ones', async () => {
    async function* inbox(): AsyncGenerator<InboundEmail> {
      yield loadEmailById('t-i3-001');
      yield makeEmail({ id: '' });
      yield loadEmailById('t-unknown-001');
    }

    const results = await processor.processEmails(inbox());

    expect(results.map(r => r.emailId)).toEqual(['t-i3-001', '', 't-unknown-001']);
    expect(results[1]?.error).toContain('failed validation');
    const statuses = results.map(r => r.outcomes.map(o => (o.status === 'processed' ? o.decision.status : o.status)));
    expect(statuses).toEqual([['stored'], [], ['pending_review']]);
  });

  it('reports knowledge statistics', () => {
    const stats = processor.getKnowledgeStats();

    expect(stats.collections.semantic).toEqual({ total: 20, byKind: { asset: 5, category_set: 4, file_type_rule: 11, feedback: 0 } });
    expect(stats.collections.procedural.total).toBe(30);
    expect(stats.collections.episodic.total).toBe(0);
    expect(stats.collections.contact.total).toBe(3);
    expect(stats).toMatchObject({ pendingConflicts: 0, totalConflicts: 0, pendingReviews: 0, auditEntries: 53 });
  });

  it('exposes pending knowledge conflicts for resolution', async () => {
    const result = await processor.gate.ingest(kb.semantic.fileTypes, { extension: '.doc', isAllowed: false, securityLevel: 'restricted', confidence: 'medium' });
    expect(result.outcome).toBe('queued_for_review');
    expect(processor.getPendingConflicts()).toHaveLength(1);

    await processor.resolveConflict(result.conflictId ?? '', 'keep_existing', 'ops');

    expect(processor.getPendingConflicts()).toHaveLength(0);
    expect(kb.semantic.fileTypes.findRule('memo.doc')?.data.isAllowed).toBe(true);
  });
});
