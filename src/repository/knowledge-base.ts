//wires the four partitions and the governance tables over one database
import Database from 'better-sqlite3';
import { COLLECTIONS, DEFAULT_RETENTION } from '../models/index.js';
import type { Collection, CollectionStats, FactKind, RetentionConfig } from '../models/index.js';
import { AttachmentRepository } from './attachment-repository.js';
import { AuditRepository } from './audit-repository.js';
import { BootstrapRepository } from './bootstrap-repository.js';
import { ConflictRepository } from './conflict-repository.js';
import { ContactStore } from './contact-store.js';
import { EpisodicStore } from './episodic-store.js';
import type { KnowledgeStore } from './knowledge-store.js';
import { ProceduralStore } from './procedural-store.js';
import { ReviewRepository } from './review-repository.js';
import { SemanticStore } from './semantic-store.js';

export class KnowledgeBase {
  readonly semantic: SemanticStore;
  readonly procedural: ProceduralStore;
  readonly episodic: EpisodicStore;
  readonly contact: ContactStore;
  readonly conflicts: ConflictRepository;
  readonly audit: AuditRepository;
  readonly reviews: ReviewRepository;
  readonly markers: BootstrapRepository;
  readonly attachments: AttachmentRepository;
  private readonly registry = new Map<FactKind, KnowledgeStore<unknown>>();

  constructor(readonly db: Database.Database, retention: RetentionConfig = DEFAULT_RETENTION) {
    this.semantic = new SemanticStore(db);
    this.procedural = new ProceduralStore(db);
    this.episodic = new EpisodicStore(db, retention);
    this.contact = new ContactStore(db);
    this.conflicts = new ConflictRepository(db);
    this.audit = new AuditRepository(db);
    this.reviews = new ReviewRepository(db);
    this.markers = new BootstrapRepository(db);
    this.attachments = new AttachmentRepository(db);

    const stores: KnowledgeStore<unknown>[] = [
      this.semantic.assets, this.semantic.categorySets, this.semantic.fileTypes, this.semantic.feedback,
      this.procedural.patterns, this.procedural.rules, this.episodic, this.contact,
    ];
    for (const store of stores) this.registry.set(store.kind, store);
  }

  storeFor(kind: FactKind): KnowledgeStore<unknown> {
    const store = this.registry.get(kind);
    if (!store) throw new Error(`No store registered for kind ${kind}`);
    return store;
  }

  storesIn(collection: Collection): KnowledgeStore<unknown>[] {
    return [...this.registry.values()].filter(s => s.collection === collection);
  }

  collectionStats(): Record<Collection, CollectionStats> {
    const entries = COLLECTIONS.map((collection): [Collection, CollectionStats] => {
      const byKind: Partial<Record<FactKind, number>> = {};
      let total = 0;
      for (const store of this.storesIn(collection)) {
        const n = store.count();
        byKind[store.kind] = n;
        total += n;
      }
      return [collection, { total, byKind }];
    });
    return {
      semantic: statsOf(entries, 'semantic'), procedural: statsOf(entries, 'procedural'),
      episodic: statsOf(entries, 'episodic'), contact: statsOf(entries, 'contact'),
    };
  }
}

function statsOf(entries: [Collection, CollectionStats][], collection: Collection): CollectionStats {
  return entries.find(([c]) => c === collection)?.[1] ?? { total: 0, byKind: {} };
}
