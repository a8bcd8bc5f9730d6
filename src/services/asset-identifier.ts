//asset identification: which asset is this attachment about?
//sender seed + identifier match tiers + bonuses/penalties + experience boost
import type { AssetCandidate, AssetMatchConfig, AssetProfile, AssetSignal, ExperienceConfig, MatchTier, SenderMapping, SimilarExperience } from '../models/index.js';
import { DEFAULT_ASSET_MATCH, DEFAULT_EXPERIENCE } from '../models/index.js';
import { clamp01, roundScore } from './confidence.js';
import { filenameStem, matchTier, prepareTarget, tokenize, type MatchTarget } from './text-match.js';

export interface IdentificationContext {
  filename: string;
  subject?: string;
  body?: string;
  sender?: string;
}

export type SenderLookup = (sender: string) => SenderMapping | undefined;

interface IdentifierMatch {
  identifier: string;
  tier: MatchTier;
  score: number;
  generic: boolean;
  inFilename: boolean;
}

export interface IAssetIdentifier {
  identify(context: IdentificationContext, assets: AssetProfile[], senderLookup: SenderLookup, experiences: SimilarExperience[], overrides?: Record<string, number>): AssetCandidate[];
}

export class AssetIdentifier implements IAssetIdentifier {
  private readonly relevance: Set<string>;

  constructor(private config: AssetMatchConfig = DEFAULT_ASSET_MATCH, private experience: ExperienceConfig = DEFAULT_EXPERIENCE) {
    this.relevance = new Set(config.relevanceKeywords.map(k => k.toLowerCase()));
  }

  identify(context: IdentificationContext, assets: AssetProfile[], senderLookup: SenderLookup, experiences: SimilarExperience[], overrides: Record<string, number> = {}): AssetCandidate[] {
    const active = assets.filter(a => a.active);
    if (!active.length) return [];

    const target = prepareTarget(context.subject, context.body, context.filename);
    const filenameTarget = prepareTarget(context.filename);
    const stem = filenameStem(context.filename);
    const mapping = context.sender ? senderLookup(context.sender) : undefined;
    //business rules in "matching_parameters" may retune the tiers
    const tierScores: Record<MatchTier, number> = {
      exact_token: overrides['exact_token_score'] ?? this.config.exactTokenScore,
      all_words: overrides['all_words_score'] ?? this.config.allWordsScore,
      substring: overrides['substring_score'] ?? this.config.substringScore,
      fuzzy: overrides['fuzzy_score'] ?? this.config.fuzzyScore,
    };

    const candidates: AssetCandidate[] = [];
    for (const asset of active) {
      const signals: AssetSignal[] = [];
      let score = 0;

      //1. sender seed
      if (mapping && mapping.trustScore >= this.config.senderTrustFloor && mapping.assetIds.includes(asset.assetId)) {
        score = this.config.senderMatchConfidence;
        signals.push({ source: 'sender', detail: `${mapping.senderEmail} is a trusted sender for ${asset.assetId} (trust ${mapping.trustScore})`, delta: score });
      }

      //2-3. identifiers
      const matches = this.matchIdentifiers(asset, target, filenameTarget, tierScores);
      const identifierScore = this.scoreMatches(matches, stem, signals);
      score = Math.max(score, identifierScore);

      //4. experience
      const boost = this.experienceBoost(asset.assetId, experiences);
      if (boost > 0) {
        signals.push({ source: 'experience', detail: `similar past documents were filed under ${asset.assetId}`, delta: boost });
        score += boost;
      }

      //5. clip and threshold
      const confidence = roundScore(clamp01(score));
      if (confidence >= this.config.minAssetConfidence) {
        candidates.push({ assetId: asset.assetId, assetType: asset.assetType, confidence, signals });
      }
    }

    return candidates.sort((a, b) => b.confidence - a.confidence || a.assetId.localeCompare(b.assetId));
  }

  private matchIdentifiers(asset: AssetProfile, target: MatchTarget, filenameTarget: MatchTarget, tierScores: Record<MatchTier, number>): IdentifierMatch[] {
    //deal and display names count as identifiers too
    const identifiers = [...new Set([...asset.identifiers, asset.dealName, asset.displayName].map(i => i.trim().toLowerCase()).filter(i => i.length > 0))];
    const fuzzy = { minSimilarity: this.config.fuzzySimilarity, minLength: this.config.fuzzyMinLength };
    const matches: IdentifierMatch[] = [];
    for (const identifier of identifiers) {
      const tier = matchTier(identifier, target, fuzzy);
      if (!tier) continue;
      const tokens = tokenize(identifier);
      matches.push({
        identifier, tier, score: tierScores[tier],
        generic: tokens.length > 0 && tokens.every(t => this.relevance.has(t)),
        inFilename: matchTier(identifier, filenameTarget, fuzzy) !== null,
      });
    }
    return matches;
  }

  private scoreMatches(matches: IdentifierMatch[], stem: string, signals: AssetSignal[]): number {
    if (!matches.length) return 0;
    const effective = (m: IdentifierMatch): number => m.score - (m.generic ? this.config.genericIdentifierPenalty : 0);
    const best = matches.reduce((a, b) => (effective(b) > effective(a) ? b : a));

    let score = best.score;
    signals.push({ source: 'identifier', detail: `"${best.identifier}" matched as ${best.tier}`, delta: best.score });
    if (best.generic) {
      score -= this.config.genericIdentifierPenalty;
      signals.push({ source: 'penalty', detail: `"${best.identifier}" is generic finance vocabulary`, delta: -this.config.genericIdentifierPenalty });
    }

    //generic identifiers never earn the bonus
    const extra = matches.filter(m => m !== best && !m.generic).length;
    if (extra > 0) {
      const bonus = Math.min(extra * this.config.extraIdentifierBonus, this.config.maxIdentifierBonus);
      score += bonus;
      signals.push({ source: 'bonus', detail: `${extra} more specific identifier(s) matched`, delta: bonus });
    }

    if (best.inFilename && stem.length > 0 && best.identifier.length / stem.length < this.config.filenameDilutionRatio) {
      score -= this.config.filenameDilutionPenalty;
      signals.push({ source: 'penalty', detail: `"${best.identifier}" is a small part of a long filename`, delta: -this.config.filenameDilutionPenalty });
    }
    return score;
  }

  private experienceBoost(assetId: string, experiences: SimilarExperience[]): number {
    let boost = 0;
    for (const { record, similarity } of experiences) {
      if (record.assetId !== assetId) continue;
      const weight = record.source === 'human_correction' ? this.experience.correctionWeight : this.experience.autoWeight;
      boost += weight * similarity;
    }
    return roundScore(Math.min(boost, this.experience.maxAssetBoost));
  }
}
