//procedural partition: classification patterns and business rules
import Database from 'better-sqlite3';
import type { AssetType, BusinessRule, ClassificationPattern, Collection, DetectedConflict, FactKind } from '../models/index.js';
import { businessRuleSchema, classificationPatternSchema } from '../models/schemas.js';
import { SqliteKnowledgeStore } from './knowledge-store.js';

export class ClassificationPatternStore extends SqliteKnowledgeStore<ClassificationPattern> {
  readonly collection: Collection = 'procedural';
  readonly kind: FactKind = 'classification_pattern';
  protected readonly schema = classificationPatternSchema;

  identityKey(item: ClassificationPattern): string {
    return `${item.assetType}|${item.category}|${item.pattern.toLowerCase()}`;
  }

  protected fingerprintContent(item: ClassificationPattern): unknown {
    return item;
  }

  protected checkItem(item: ClassificationPattern): string[] {
    try {
      new RegExp(item.pattern, 'i');
      return [];
    } catch (err) {
      return [`pattern "${item.pattern}" is not a valid regular expression: ${err instanceof Error ? err.message : String(err)}`];
    }
  }

  findForAssetType(assetType: AssetType): ClassificationPattern[] {
    return this.list().map(f => f.data).filter(p => p.assetType === assetType);
  }
}

//statement pairs that cannot both hold for the same rule
const CONTRADICTION_PAIRS: [string, string][] = [
  ['always', 'never'],
  ['required', 'forbidden'],
  ['allowed', 'prohibited'],
  ['must', 'must not'],
];

function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`\\b${phrase.replace(/\s+/g, '\\s+')}\\b`, 'i').test(text);
}

//"must" inside "must not" does not count as the positive form
function assertsPositive(text: string, positive: string, negative: string): boolean {
  if (!containsPhrase(text, positive)) return false;
  return !negative.startsWith(positive) || containsPhrase(text.replace(new RegExp(negative.replace(/\s+/g, '\\s+'), 'gi'), ''), positive);
}

export class BusinessRuleStore extends SqliteKnowledgeStore<BusinessRule> {
  readonly collection: Collection = 'procedural';
  readonly kind: FactKind = 'business_rule';
  protected readonly schema = businessRuleSchema;

  identityKey(item: BusinessRule): string {
    return item.ruleId;
  }

  protected fingerprintContent(item: BusinessRule): unknown {
    return item;
  }

  detectConflicts(existing: BusinessRule, candidate: BusinessRule): DetectedConflict[] {
    const conflicts: DetectedConflict[] = [];
    for (const [positive, negative] of CONTRADICTION_PAIRS) {
      const flipped =
        (assertsPositive(candidate.statement, positive, negative) && containsPhrase(existing.statement, negative)) ||
        (containsPhrase(candidate.statement, negative) && assertsPositive(existing.statement, positive, negative));
      if (flipped) {
        conflicts.push({ type: 'rule_contradiction', severity: 'high', detail: `rule ${existing.ruleId}: '${positive}' vs '${negative}'` });
      }
    }
    return conflicts;
  }

  findByCategory(category: string): BusinessRule[] {
    return this.list().map(f => f.data).filter(r => r.category === category);
  }

  //numeric parameters of every rule in a category, later rules win
  parametersFor(category: string): Record<string, number> {
    return this.findByCategory(category).reduce<Record<string, number>>((acc, r) => ({ ...acc, ...r.parameters }), {});
  }
}

//facade over the procedural partition
export class ProceduralStore {
  readonly patterns: ClassificationPatternStore;
  readonly rules: BusinessRuleStore;

  constructor(db: Database.Database) {
    this.patterns = new ClassificationPatternStore(db);
    this.rules = new BusinessRuleStore(db);
  }
}
