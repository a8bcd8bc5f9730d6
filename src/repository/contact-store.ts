//contact partition: sender -> asset trust mappings
import type { Collection, DetectedConflict, FactKind, SenderMapping } from '../models/index.js';
import { normalizeSender, senderMappingSchema } from '../models/schemas.js';
import { SqliteKnowledgeStore } from './knowledge-store.js';

export class ContactStore extends SqliteKnowledgeStore<SenderMapping> {
  readonly collection: Collection = 'contact';
  readonly kind: FactKind = 'sender_mapping';
  protected readonly schema = senderMappingSchema;

  identityKey(item: SenderMapping): string {
    return item.senderEmail;
  }

  protected fingerprintContent(item: SenderMapping): unknown {
    return item;
  }

  detectConflicts(existing: SenderMapping, candidate: SenderMapping): DetectedConflict[] {
    if (!existing.organization || !candidate.organization) return [];
    if (existing.organization.trim().toLowerCase() === candidate.organization.trim().toLowerCase()) return [];
    return [{
      type: 'sender_organization_conflict', severity: 'medium',
      detail: `${existing.senderEmail} belongs to "${existing.organization}", candidate says "${candidate.organization}"`,
    }];
  }

  //learned associations accumulate, latest trust score wins
  merge(existing: SenderMapping, candidate: SenderMapping): SenderMapping {
    return {
      senderEmail: existing.senderEmail,
      assetIds: [...new Set([...existing.assetIds, ...candidate.assetIds])],
      trustScore: candidate.trustScore,
      organization: candidate.organization ?? existing.organization,
      name: candidate.name ?? existing.name,
    };
  }

  findBySender(sender: string): SenderMapping | undefined {
    return this.findByKey(normalizeSender(sender))?.data;
  }

  findByAsset(assetId: string): SenderMapping[] {
    return this.list().map(f => f.data).filter(m => m.assetIds.includes(assetId));
  }
}
