//routing decision and the attachment pipeline state machine
import type { AssetCandidate, ClassificationResult, ConfidenceBand, ReviewReason, RouteAction, ThresholdConfig } from '../models/index.js';
import { DEFAULT_THRESHOLDS } from '../models/index.js';
import { bandOf, roundScore } from './confidence.js';

export interface RouteInput {
  candidates: AssetCandidate[];
  classification: ClassificationResult | null;
  threat?: string;
  blockedFileType?: string;
}

export interface Route {
  action: RouteAction;
  band: ConfidenceBand;
  confidence: number;
  assetId: string | null;
  category: string;
  requiresConfirmation: boolean;
  reviewReason: ReviewReason | null;
  reasoning: string[];
}

export function decideRoute(input: RouteInput, thresholds: ThresholdConfig = DEFAULT_THRESHOLDS, ambiguityMargin = 0.05): Route {
  const category = input.classification?.category ?? 'uncategorized';
  const review = (reason: ReviewReason, confidence: number, assetId: string | null, note: string, action: RouteAction = 'general_review'): Route => ({
    action, band: bandOf(confidence, thresholds), confidence, assetId, category, requiresConfirmation: false, reviewReason: reason, reasoning: [note],
  });

  if (input.threat) return review('security_threat', 0, null, `security scan flagged: ${input.threat}`);
  if (input.blockedFileType) return review('blocked_file_type', 0, null, `file type ${input.blockedFileType} is not accepted`);

  const [top, second] = input.candidates;
  if (!top) return review('no_asset_match', 0, null, 'no asset matched above the minimum confidence');
  if (!input.classification) return review('very_low_confidence', 0, top.assetId, 'document was not classified');

  const confidence = roundScore(Math.min(top.confidence, input.classification.confidence));
  const band = bandOf(confidence, thresholds);
  const basis = `asset ${top.assetId} at ${top.confidence}, category ${category} at ${input.classification.confidence}, routing confidence ${confidence} (${band})`;

  switch (band) {
    case 'HIGH':
      return { action: 'auto_process', band, confidence, assetId: top.assetId, category, requiresConfirmation: false, reviewReason: null, reasoning: [basis] };
    case 'MEDIUM':
      return { action: 'process_with_confirmation', band, confidence, assetId: top.assetId, category, requiresConfirmation: true, reviewReason: null, reasoning: [basis, 'stored, awaiting confirmation'] };
    case 'LOW':
      if (second && roundScore(top.confidence - second.confidence) <= ambiguityMargin) {
        const route = review('low_confidence', confidence, top.assetId, basis);
        route.reasoning.push(`${top.assetId} and ${second.assetId} are within ${ambiguityMargin} of each other`);
        return route;
      }
      return review('low_confidence', confidence, top.assetId, basis, 'asset_review');
    case 'VERY_LOW':
      return review('very_low_confidence', confidence, top.assetId, basis);
  }
}

//pipeline states of a single attachment; stored, pending_review and duplicate are terminal
export type PipelineState = 'received' | 'screened' | 'scored' | 'stored' | 'pending_review' | 'duplicate';

export type PipelineEvent =
  | { type: 'screen_passed' }
  | { type: 'screen_failed' }
  | { type: 'duplicate_found' }
  | { type: 'scored' }
  | { type: 'routed'; action: RouteAction };

export const TERMINAL_STATES: readonly PipelineState[] = ['stored', 'pending_review', 'duplicate'];

export function transition(state: PipelineState, event: PipelineEvent): PipelineState {
  switch (state) {
    case 'received':
      if (event.type === 'screen_passed') return 'screened';
      if (event.type === 'screen_failed') return 'pending_review';
      if (event.type === 'duplicate_found') return 'duplicate';
      break;
    case 'screened':
      if (event.type === 'duplicate_found') return 'duplicate';
      if (event.type === 'screen_failed') return 'pending_review';
      if (event.type === 'scored') return 'scored';
      break;
    case 'scored':
      if (event.type === 'routed') {
        return event.action === 'auto_process' || event.action === 'process_with_confirmation' ? 'stored' : 'pending_review';
      }
      break;
    case 'stored':
    case 'pending_review':
    case 'duplicate':
      break;
  }
  throw new Error(`Invalid pipeline transition: ${event.type} from ${state}`);
}
