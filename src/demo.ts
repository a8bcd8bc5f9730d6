#!/usr/bin/env node
import { readFileSync, existsSync, unlinkSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { initEnv, loadConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { initializeDatabase, closeDatabase } from './repository/database.js';
import { KnowledgeBase } from './repository/knowledge-base.js';
import { DocumentProcessor } from './services/processor.js';
import { MemoryDocumentSink } from './adapters/memory-sink.js';
import { SignatureScanner } from './adapters/signature-scanner.js';
import type { InboundEmail, RoutingDecision } from './models/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const root = join(__dirname, '..');

//parse CLI flags
const args = process.argv.slice(2);
const [useFresh, useMemory] = [['--fresh', '-f'], ['--memory', '-m']].map(f => f.some(x => args.includes(x)));

//ANSI color helpers
const c = { reset: '\x1b[0m', bright: '\x1b[1m', dim: '\x1b[2m', green: '\x1b[32m', yellow: '\x1b[33m', blue: '\x1b[34m', magenta: '\x1b[35m', cyan: '\x1b[36m', red: '\x1b[31m' };

//console output helpers
const log = console.log, confColor = (s: number) => s >= 0.85 ? c.green : s >= 0.65 ? c.yellow : c.red;
const header = (t: string) => log(`\n${c.bright}${c.cyan}${'='.repeat(70)}\n ${t}\n${'='.repeat(70)}${c.reset}`);
const subHeader = (t: string) => log(`\n${c.bright}${c.blue}${'-'.repeat(50)}\n ${t}\n${'-'.repeat(50)}${c.reset}`);

//sample emails carry attachment content as text
const sampleSchema = z.array(z.object({
  id: z.string(), sender: z.string(), subject: z.string(), body: z.string(),
  attachments: z.array(z.object({ filename: z.string(), content: z.string() })),
}));
const loadEmails = (): InboundEmail[] =>
  sampleSchema.parse(JSON.parse(readFileSync(join(root, 'data', 'samples', 'emails.json'), 'utf-8')))
    .map(e => ({ ...e, attachments: e.attachments.map(a => ({ filename: a.filename, content: Buffer.from(a.content) })) }));

const printDecision = (d: RoutingDecision) => {
  const status = d.status === 'stored' ? c.green : d.status === 'duplicate' ? c.dim : c.yellow;
  log(`${c.yellow}${d.filename}${c.reset} → ${status}${d.status}${c.reset} action=${d.action} asset=${d.assetId ?? '-'} category=${d.category} conf=${confColor(d.confidence)}${d.confidence.toFixed(3)}${c.reset}${d.reviewReason ? ` reason=${d.reviewReason}` : ''}`);
  d.reasoning.slice(0, 4).forEach(r => log(`${c.dim}  · ${r}${c.reset}`));
};

//entry point
async function main() {
  initEnv();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log(`${c.bright}${c.cyan}\n${'='.repeat(70)}\n  ASSET DOCUMENT ROUTER - DEMO\n${'='.repeat(70)}${c.reset}`);
  const dbPath = useMemory ? ':memory:' : config.databasePath;
  if (useFresh && !useMemory && existsSync(dbPath)) { unlinkSync(dbPath); log(`${c.yellow}Cleared database${c.reset}`); }
  const db = initializeDatabase(dbPath);
  const kb = new KnowledgeBase(db, config.router.retention);
  const proc = new DocumentProcessor({ kb, sink: new MemoryDocumentSink(), scanner: new SignatureScanner(), config: config.router });
  log(`${c.dim}Usage: npm run demo [--fresh|-f] [--memory|-m]${c.reset}`);

  try {
    header('Demo 1: Bootstrap knowledge');
    for (const r of await proc.bootstrapFromDirectory(join(root, 'data', 'knowledge'))) {
      log(`${r.collection}: ${r.status === 'loaded' ? c.green : c.dim}${r.status}${c.reset} inserted=${r.counts.inserted} rejected=${r.counts.rejected}`);
    }

    header('Demo 2: Route inbound email');
    const emails = loadEmails();
    for (const result of await proc.processEmails(emails)) {
      subHeader(`Email ${result.emailId}`);
      result.outcomes.forEach(o => o.status === 'processed' ? printDecision(o.decision) : log(`${c.red}${o.filename} failed: ${o.error}${c.reset}`));
    }

    header('Demo 3: Reviewer feedback');
    const pending = proc.listPendingReviews({ reason: 'no_asset_match' })[0];
    if (pending) {
      log(`${c.magenta}Reviewer files ${pending.filename} under HARBOR-POINT / appraisal${c.reset}`);
      const item = await proc.resolveReview(pending.id, { action: 'store', assetId: 'HARBOR-POINT', category: 'appraisal', reviewer: 'demo' });
      log(`${c.green}Review ${item.id} → ${item.resolution}${c.reset}`);
    }

    header('Demo 4: Conflicting knowledge');
    const rule = await proc.gate.ingest(kb.semantic.fileTypes, { extension: '.pdf', isAllowed: false, securityLevel: 'restricted', confidence: 'medium' });
    log(`.pdf disallowed at medium confidence → ${c.yellow}${rule.outcome}${c.reset} (${rule.rationale})`);
    proc.getPendingConflicts().forEach(cf => log(`${c.magenta}pending ${cf.conflictType} on ${cf.identityKey}${c.reset}`));

    header('Knowledge stats');
    const stats = proc.getKnowledgeStats();
    Object.entries(stats.collections).forEach(([name, s]) => log(`${name}: ${s.total}`));
    log(`conflicts: ${stats.pendingConflicts} pending / ${stats.totalConflicts} total, reviews pending: ${stats.pendingReviews}, audit entries: ${stats.auditEntries}`);
  } finally { closeDatabase(db); }
}
main().catch(console.error);
