//one-time loading of reference knowledge, guarded by a persisted marker per collection
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { z } from 'zod';
import type { Collection, FactKind } from '../models/index.js';
import { DEFAULT_BOOTSTRAP, type BootstrapConfig } from '../models/index.js';
import {
  assetRecordSchema, businessRuleRecordSchema, categoryRecordSchema, fileTypeRecordSchema, patternRecordSchema, senderRecordSchema,
} from '../models/schemas.js';
import type { KnowledgeBase } from '../repository/index.js';
import { ValidationError, formatZodIssues } from '../errors.js';
import { createLogger } from '../logger.js';
import type { IDeduplicationGate, IngestOutcome } from './dedup-gate.js';

const log = createLogger('bootstrap');

export interface BootstrapRecord {
  kind: FactKind;
  data: unknown;
}

export interface BootstrapReport {
  collection: Collection;
  status: 'loaded' | 'already_loaded' | 'in_progress';
  counts: Record<IngestOutcome, number>;
  issues: string[];
}

//file name -> collection, kind and on-disk record schema
const SOURCE_FILES: { file: string; collection: Collection; kind: FactKind; schema: z.ZodType<unknown, z.ZodTypeDef, unknown> }[] = [
  { file: 'assets.json', collection: 'semantic', kind: 'asset', schema: assetRecordSchema },
  { file: 'file_types.json', collection: 'semantic', kind: 'file_type_rule', schema: fileTypeRecordSchema },
  { file: 'categories.json', collection: 'semantic', kind: 'category_set', schema: categoryRecordSchema },
  { file: 'patterns.json', collection: 'procedural', kind: 'classification_pattern', schema: patternRecordSchema },
  { file: 'business_rules.json', collection: 'procedural', kind: 'business_rule', schema: businessRuleRecordSchema },
  { file: 'senders.json', collection: 'contact', kind: 'sender_mapping', schema: senderRecordSchema },
];

const emptyCounts = (): Record<IngestOutcome, number> => ({ inserted: 0, updated: 0, rejected: 0, queued_for_review: 0, duplicate: 0 });

export class KnowledgeBootstrapper {
  constructor(private kb: KnowledgeBase, private gate: IDeduplicationGate, private config: BootstrapConfig = DEFAULT_BOOTSTRAP) {}

  async bootstrap(collection: Collection, records: BootstrapRecord[]): Promise<BootstrapReport> {
    const claim = this.kb.markers.claim(collection, new Date(Date.now() - this.config.staleClaimMs));
    if (claim === 'loaded') {
      log.info({ collection }, 'collection already bootstrapped, skipping');
      return { collection, status: 'already_loaded', counts: emptyCounts(), issues: [] };
    }
    if (claim === 'in_progress') {
      log.warn({ collection }, 'collection is being bootstrapped by another loader, skipping');
      return { collection, status: 'in_progress', counts: emptyCounts(), issues: [] };
    }
    if (claim === 'reclaimed') log.warn({ collection }, 'taking over an unfinished bootstrap');

    const counts = emptyCounts();
    const issues: string[] = [];
    try {
      for (const record of records) {
        const store = this.kb.storeFor(record.kind);
        if (store.collection !== collection) throw new ValidationError('bootstrap record', [`${record.kind} does not belong to ${collection}`]);
        const result = await this.gate.ingest(store, record.data, { rationale: `bootstrap of ${collection}` });
        counts[result.outcome]++;
        if (result.issues) issues.push(...result.issues.map(i => `${record.kind}: ${i}`));
      }
      this.kb.markers.complete(collection, counts.inserted + counts.updated);
    } catch (err) {
      this.kb.markers.release(collection);
      log.error({ err, collection }, 'bootstrap failed, marker released');
      throw err;
    }

    log.info({ collection, ...counts }, 'collection bootstrapped');
    return { collection, status: 'loaded', counts, issues };
  }

  //loads the snake_case knowledge files found in dir; missing files are skipped
  async bootstrapFromDirectory(dir: string): Promise<BootstrapReport[]> {
    const byCollection = new Map<Collection, BootstrapRecord[]>();
    const fileIssues: string[] = [];

    for (const source of SOURCE_FILES) {
      const raw = await readJson(join(dir, source.file));
      if (raw === undefined) continue;
      if (!Array.isArray(raw)) throw new ValidationError(source.file, ['expected a JSON array']);
      const records = byCollection.get(source.collection) ?? [];
      raw.forEach((entry: unknown, index: number) => {
        const parsed = source.schema.safeParse(entry);
        if (parsed.success) records.push({ kind: source.kind, data: parsed.data });
        else fileIssues.push(...formatZodIssues(parsed.error).map(i => `${source.file}[${index}] ${i}`));
      });
      byCollection.set(source.collection, records);
    }

    const reports: BootstrapReport[] = [];
    for (const [collection, records] of byCollection) {
      const report = await this.bootstrap(collection, records);
      const own = fileIssues.filter(i => SOURCE_FILES.some(s => s.collection === collection && i.startsWith(s.file)));
      report.counts.rejected += report.status === 'loaded' ? own.length : 0;
      if (report.status === 'loaded') report.issues.unshift(...own);
      reports.push(report);
    }
    return reports;
  }
}

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new ValidationError(path, [err instanceof Error ? err.message : String(err)]);
  }
}
