// Test setup and configuration

import Database from 'better-sqlite3';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { initializeDatabase } from '../src/repository/database.js';
import { KnowledgeBase } from '../src/repository/knowledge-base.js';
import { DocumentProcessor, type ProcessorDeps } from '../src/services/processor.js';
import { MemoryDocumentSink } from '../src/adapters/memory-sink.js';
import type { RetentionConfig } from '../src/models/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// seed knowledge shipped with the project
export const KNOWLEDGE_DIR = join(__dirname, '..', 'data', 'knowledge');

// Utility functions for tests
export function createTestDatabase(): Database.Database {
  return initializeDatabase(':memory:');
}

export function createTestKnowledgeBase(retention?: RetentionConfig): { db: Database.Database; kb: KnowledgeBase } {
  const db = createTestDatabase();
  return { db, kb: new KnowledgeBase(db, retention) };
}

// Create a test processor over an in-memory database and document sink
export function createTestProcessor(deps: Partial<Omit<ProcessorDeps, 'kb'>> = {}): {
  db: Database.Database; kb: KnowledgeBase; sink: MemoryDocumentSink; processor: DocumentProcessor;
} {
  const { db, kb } = createTestKnowledgeBase();
  const sink = new MemoryDocumentSink();
  const processor = new DocumentProcessor({ kb, sink, ...deps });
  return { db, kb, sink, processor };
}

// same, with the seed knowledge loaded
export async function createBootstrappedProcessor(deps: Partial<Omit<ProcessorDeps, 'kb'>> = {}): Promise<ReturnType<typeof createTestProcessor>> {
  const setup = createTestProcessor(deps);
  await setup.processor.bootstrapFromDirectory(KNOWLEDGE_DIR);
  return setup;
}

// Cleanup function to close database connections
export function cleanupTestDatabase(db: Database.Database): void {
  db.close();
}

// Re-export fixture utilities
export * from './fixtures/index.js';
