//semantic partition: facts about assets, category sets, file types and human feedback
import Database from 'better-sqlite3';
import type {
  AssetProfile, AssetType, CategorySet, Collection, ConfidenceLevel, DetectedConflict, FactKind, FileTypeRule, HumanFeedback, StoredFact,
} from '../models/index.js';
import { assetProfileSchema, categorySetSchema, fileTypeRuleSchema, humanFeedbackSchema, normalizeExtension } from '../models/schemas.js';
import { SqliteKnowledgeStore } from './knowledge-store.js';

export class AssetProfileStore extends SqliteKnowledgeStore<AssetProfile> {
  readonly collection: Collection = 'semantic';
  readonly kind: FactKind = 'asset';
  protected readonly schema = assetProfileSchema;

  identityKey(item: AssetProfile): string {
    return item.assetId;
  }

  protected fingerprintContent(item: AssetProfile): unknown {
    return item;
  }

  //disjointness spans every asset, so all asset writes share one lock
  lockKey(_key: string): string {
    return this.kind;
  }

  //identifier sets must stay disjoint across assets
  validate(item: AssetProfile): string[] {
    const issues: string[] = [];
    const mine = new Set(item.identifiers);
    for (const other of this.list()) {
      if (other.data.assetId === item.assetId) continue;
      const shared = other.data.identifiers.filter(i => mine.has(i));
      if (shared.length) issues.push(`identifiers ${shared.map(s => `"${s}"`).join(', ')} already belong to asset ${other.data.assetId}`);
    }
    return issues;
  }

  detectConflicts(existing: AssetProfile, candidate: AssetProfile): DetectedConflict[] {
    return existing.assetType === candidate.assetType ? [] : [{
      type: 'asset_type_conflict', severity: 'high',
      detail: `asset ${existing.assetId} is ${existing.assetType}, candidate says ${candidate.assetType}`,
    }];
  }

  findActive(): AssetProfile[] {
    return this.list().map(f => f.data).filter(a => a.active);
  }

  findAsset(assetId: string): AssetProfile | undefined {
    return this.findByKey(assetId)?.data;
  }
}

export class CategorySetStore extends SqliteKnowledgeStore<CategorySet> {
  readonly collection: Collection = 'semantic';
  readonly kind: FactKind = 'category_set';
  protected readonly schema = categorySetSchema;

  identityKey(item: CategorySet): string {
    return item.assetType;
  }

  protected fingerprintContent(item: CategorySet): unknown {
    return item;
  }

  //category sets only grow
  merge(existing: CategorySet, candidate: CategorySet): CategorySet {
    return { assetType: existing.assetType, categories: [...new Set([...existing.categories, ...candidate.categories])] };
  }

  categoriesFor(assetType: AssetType): string[] | undefined {
    return this.findByKey(assetType)?.data.categories;
  }
}

export class FileTypeRuleStore extends SqliteKnowledgeStore<FileTypeRule> {
  readonly collection: Collection = 'semantic';
  readonly kind: FactKind = 'file_type_rule';
  protected readonly schema = fileTypeRuleSchema;

  identityKey(item: FileTypeRule): string {
    return item.extension;
  }

  //usage counters and confidence are bookkeeping, not content
  protected fingerprintContent(item: FileTypeRule): unknown {
    const { successCount: _s, failureCount: _f, confidence: _c, ...content } = item;
    return content;
  }

  intrinsicConfidence(item: FileTypeRule): ConfidenceLevel {
    return item.confidence;
  }

  detectConflicts(existing: FileTypeRule, candidate: FileTypeRule): DetectedConflict[] {
    const conflicts: DetectedConflict[] = [];
    if (existing.isAllowed !== candidate.isAllowed) {
      conflicts.push({
        type: 'file_permission_conflict', severity: 'high',
        detail: `${existing.extension} is ${existing.isAllowed ? 'allowed' : 'denied'}, candidate says ${candidate.isAllowed ? 'allowed' : 'denied'}`,
      });
    }
    if (existing.securityLevel !== candidate.securityLevel) {
      conflicts.push({
        type: 'security_level_conflict', severity: 'medium',
        detail: `${existing.extension} security level ${existing.securityLevel} vs ${candidate.securityLevel}`,
      });
    }
    return conflicts;
  }

  //counters never go backwards on a refinement
  merge(existing: FileTypeRule, candidate: FileTypeRule): FileTypeRule {
    return {
      ...candidate,
      successCount: Math.max(existing.successCount, candidate.successCount),
      failureCount: Math.max(existing.failureCount, candidate.failureCount),
    };
  }

  findRule(extensionOrFilename: string): StoredFact<FileTypeRule> | undefined {
    const dot = extensionOrFilename.lastIndexOf('.');
    if (dot < 0) return undefined;
    return this.findByKey(normalizeExtension(extensionOrFilename.slice(dot)));
  }
}

export class FeedbackStore extends SqliteKnowledgeStore<HumanFeedback> {
  readonly collection: Collection = 'semantic';
  readonly kind: FactKind = 'feedback';
  protected readonly schema = humanFeedbackSchema;

  identityKey(item: HumanFeedback): string {
    return `${item.filename.toLowerCase()}|${item.correctedAssetId ?? '-'}|${item.correctedCategory}`;
  }

  protected fingerprintContent(item: HumanFeedback): unknown {
    return { filename: item.filename, correctedAssetId: item.correctedAssetId, correctedCategory: item.correctedCategory, subject: item.subject };
  }
}

//facade over the semantic partition
export class SemanticStore {
  readonly assets: AssetProfileStore;
  readonly categorySets: CategorySetStore;
  readonly fileTypes: FileTypeRuleStore;
  readonly feedback: FeedbackStore;

  constructor(db: Database.Database) {
    this.assets = new AssetProfileStore(db);
    this.categorySets = new CategorySetStore(db);
    this.fileTypes = new FileTypeRuleStore(db);
    this.feedback = new FeedbackStore(db);
  }
}
