import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { createTestKnowledgeBase, cleanupTestDatabase, daysAgo, makeExperience } from './setup.js';
import { DeduplicationGate } from '../src/services/dedup-gate.js';
import { EpisodicSimilarityLookup } from '../src/services/similarity.js';
import { canonicalize } from '../src/repository/fingerprint.js';
import type { KnowledgeBase } from '../src/repository/index.js';

describe('canonicalize', () => {
  it('normalizes case, whitespace, key order and primitive array order', () => {
    expect(canonicalize({ b: ' Foo  Bar ', a: ['Y', 'x'], c: undefined })).toEqual({ a: ['x', 'y'], b: 'foo bar' });
  });
});

describe('episodic retention', () => {
  let db: Database.Database, kb: KnowledgeBase, gate: DeduplicationGate;

  beforeEach(() => {
    const s = createTestKnowledgeBase({ maxRecords: 3, maxAgeDays: 30, correctionAgeMultiplier: 3 });
    db = s.db; kb = s.kb; gate = new DeduplicationGate(kb);
  });
  afterEach(() => cleanupTestDatabase(db));

  const remember = (filename: string, days: number, source: 'auto' | 'human_correction' = 'auto') =>
    gate.ingest(kb.episodic, makeExperience({ filename, source, recordedAt: daysAgo(days) }));

  it('expires auto records by age and keeps corrections longer', async () => {
    await remember('old-auto.pdf', 40);
    await remember('old-correction.pdf', 40, 'human_correction');
    await remember('ancient-correction.pdf', 100, 'human_correction');

    expect(kb.episodic.list().map(f => f.data.filename)).toEqual(['old-correction.pdf']);
  });

  it('evicts the oldest auto records first when over capacity', async () => {
    await remember('a5.pdf', 5);
    await remember('a4.pdf', 4);
    await remember('a3.pdf', 3);
    await remember('c10.pdf', 10, 'human_correction');
    await remember('a2.pdf', 2);

    expect(kb.episodic.count()).toBe(3);
    expect(kb.episodic.recent(3).map(r => r.filename)).toEqual(['a2.pdf', 'a3.pdf', 'c10.pdf']);
    expect(kb.episodic.corrections().map(r => r.filename)).toEqual(['c10.pdf']);
  });

  it('treats the same experience recorded twice as one', async () => {
    const first = await remember('a1.pdf', 1);
    const second = await remember('a1.pdf', 0);

    expect(second).toMatchObject({ outcome: 'duplicate', id: first.id });
  });
});

describe('procedural and contact stores', () => {
  let db: Database.Database, kb: KnowledgeBase;

  beforeEach(() => { const s = createTestKnowledgeBase(); db = s.db; kb = s.kb; });
  afterEach(() => cleanupTestDatabase(db));

  it('detects rules that flip always and never', () => {
    const rules = kb.procedural.rules;
    const always = { ruleId: 'r1', category: 'cre', statement: 'Rent rolls are always filed monthly', parameters: {} };

    expect(rules.detectConflicts(always, { ...always, statement: 'Rent rolls are never filed monthly' })).toEqual([
      { type: 'rule_contradiction', severity: 'high', detail: "rule r1: 'always' vs 'never'" },
    ]);
    expect(rules.detectConflicts(always, { ...always, statement: 'Rent rolls are always filed by the 5th' })).toEqual([]);
  });

  it('does not read "must not" as "must"', () => {
    const rules = kb.procedural.rules;
    const must = { ruleId: 'r2', category: 'ops', statement: 'Appraisals must be approved', parameters: {} };

    expect(rules.detectConflicts(must, { ...must, statement: 'Appraisals must not be approved' })).toHaveLength(1);
    expect(rules.detectConflicts({ ...must, statement: 'Appraisals must not be approved' }, { ...must, statement: 'Drafts must not be approved' })).toEqual([]);
  });

  it('rejects patterns that are not valid regular expressions', () => {
    const parsed = kb.procedural.patterns.parse({ assetType: 'private_credit', category: 'credit_memo', pattern: '(unclosed' });

    expect(parsed.ok).toBe(false);
    expect(!parsed.ok && parsed.issues[0]?.startsWith('pattern "(unclosed" is not a valid regular expression')).toBe(true);
  });

  it('merges rule parameters within a category, later rules winning', () => {
    kb.procedural.rules.insert({ ruleId: 'r-a', category: 'matching_parameters', statement: 'first', parameters: { x: 1, y: 2 } }, 'medium');
    kb.procedural.rules.insert({ ruleId: 'r-b', category: 'matching_parameters', statement: 'second', parameters: { y: 3 } }, 'medium');

    expect(kb.procedural.rules.parametersFor('matching_parameters')).toEqual({ x: 1, y: 3 });
    expect(kb.procedural.rules.parametersFor('other')).toEqual({});
  });

  it('finds sender mappings by normalized address and by asset', () => {
    kb.contact.insert({ senderEmail: 'desk@test.example', assetIds: ['A', 'B'], trustScore: 0.7 }, 'medium');

    expect(kb.contact.findBySender('Desk <DESK@Test.example>')?.assetIds).toEqual(['A', 'B']);
    expect(kb.contact.findByAsset('B').map(m => m.senderEmail)).toEqual(['desk@test.example']);
    expect(kb.contact.findByAsset('C')).toEqual([]);
  });

  it('registers every store under its kind', () => {
    expect(kb.storeFor('asset')).toBe(kb.semantic.assets);
    expect(kb.storesIn('procedural').map(s => s.kind)).toEqual(['classification_pattern', 'business_rule']);
  });
});

describe('EpisodicSimilarityLookup', () => {
  let db: Database.Database, kb: KnowledgeBase;

  beforeEach(() => { const s = createTestKnowledgeBase(); db = s.db; kb = s.kb; });
  afterEach(() => cleanupTestDatabase(db));

  it('ranks past documents by token overlap and drops weak matches', async () => {
    kb.episodic.insert(makeExperience({ filename: 'rent_roll_march.xlsx', subject: 'Monthly rent roll' }), 'medium');
    kb.episodic.insert(makeExperience({ filename: 'loan_agreement.pdf', subject: 'term loan' }), 'medium');
    const lookup = new EpisodicSimilarityLookup(kb.episodic);

    const found = await lookup.findSimilar({ filename: 'rent_roll_april.xlsx', subject: 'Monthly rent roll', body: '' }, { limit: 10, minSimilarity: 0.3 });

    expect(found).toHaveLength(1);
    expect(found[0]?.record.filename).toBe('rent_roll_march.xlsx');
    expect(found[0]?.similarity).toBeCloseTo(4 / 6, 6);
  });

  it('stops when its signal is aborted', async () => {
    const lookup = new EpisodicSimilarityLookup(kb.episodic);
    await expect(lookup.findSimilar({ filename: 'a.pdf', subject: '', body: '' }, { limit: 10, minSimilarity: 0.3, signal: AbortSignal.abort() })).rejects.toThrow();
  });
});
