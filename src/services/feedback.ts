//learning from humans: corrections become feedback facts, episodic corrections and sender associations
import type { AssetType, LearningConfig } from '../models/index.js';
import { DEFAULT_LEARNING } from '../models/index.js';
import { normalizeSender } from '../models/schemas.js';
import type { KnowledgeBase } from '../repository/index.js';
import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { IDeduplicationGate, IngestResult } from './dedup-gate.js';

const log = createLogger('feedback');

export interface FeedbackContext {
  subject?: string;
  body?: string;
  sender?: string;
  originalCategory?: string;
  originalAssetId?: string | null;
  reviewer?: string;
}

export interface FeedbackResult {
  feedback: IngestResult;
  experience: IngestResult;
  senderAssociation: IngestResult | null;
}

const EXCERPT_LENGTH = 200;

export class FeedbackService {
  constructor(private kb: KnowledgeBase, private gate: IDeduplicationGate, private learning: LearningConfig = DEFAULT_LEARNING) {}

  async recordFeedback(filename: string, context: FeedbackContext, correctedCategory: string, correctedAssetId: string | null): Promise<FeedbackResult> {
    const assetType = this.assetTypeOf(correctedAssetId);
    const confidence = this.learning.correctionConfidence;

    const feedback = await this.gate.ingest(this.kb.semantic.feedback, {
      filename, subject: context.subject ?? '', sender: context.sender, correctedCategory, correctedAssetId,
      originalCategory: context.originalCategory, originalAssetId: context.originalAssetId, reviewer: context.reviewer,
    }, { confidence, rationale: `human feedback on ${filename}: ${correctedAssetId ?? 'no asset'} / ${correctedCategory}` });

    const experience = await this.recordCorrection(filename, context, correctedCategory, correctedAssetId, assetType);

    let senderAssociation: IngestResult | null = null;
    if (this.learning.learnSenderAssociations && context.sender && correctedAssetId) {
      senderAssociation = await this.learnSender(context.sender, correctedAssetId);
    }

    log.info({ filename, correctedCategory, correctedAssetId, feedback: feedback.outcome, experience: experience.outcome }, 'feedback recorded');
    return { feedback, experience, senderAssociation };
  }

  //a human_correction episodic record, also used when a reviewer discards a document
  async recordCorrection(filename: string, context: FeedbackContext, category: string, assetId: string | null, assetType: AssetType | null = this.assetTypeOf(assetId)): Promise<IngestResult> {
    return this.gate.ingest(this.kb.episodic, {
      filename, subject: context.subject ?? '', excerpt: (context.body ?? '').slice(0, EXCERPT_LENGTH),
      predictedCategory: category, assetId, assetType, confidence: 1, source: 'human_correction', recordedAt: new Date().toISOString(),
    }, { confidence: this.learning.correctionConfidence });
  }

  //trust never drops below what was already granted
  private async learnSender(sender: string, assetId: string): Promise<IngestResult> {
    const existing = this.kb.contact.findBySender(sender);
    const trustScore = Math.max(existing?.trustScore ?? 0, this.learning.learnedSenderTrust);
    return this.gate.ingest(this.kb.contact, { senderEmail: normalizeSender(sender), assetIds: [assetId], trustScore },
      { rationale: `learned ${normalizeSender(sender)} -> ${assetId} from feedback` });
  }

  private assetTypeOf(assetId: string | null): AssetType | null {
    if (!assetId) return null;
    const asset = this.kb.semantic.assets.findAsset(assetId);
    if (!asset) throw new ValidationError('feedback', [`unknown asset ${assetId}`]);
    return asset.assetType;
  }
}
