/**
 * Confidence Classifier
 * Maps a consensus score plus corroboration counts to an ordinal level
 */

import {
  CONFIDENCE_BOOSTS,
  CONFIDENCE_LABELS,
  CONFIDENCE_THRESHOLDS,
  type BoostConfig,
} from '../config/constants.js';
import { AttributionConfidence, type ConfidenceLabel } from '../types/index.js';

export interface ClassificationInput {
  consolidationScore: number;
  /** Distinct source names across all contributing attributions */
  sourceCount: number;
  evidenceCount: number;
}

export interface Classification {
  level: AttributionConfidence;
  finalScore: number;
  sourceBoost: number;
  evidenceBoost: number;
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Bucket a [0,1] score. No boosts.
 */
export function levelForScore(score: number): AttributionConfidence {
  for (const { level, min } of CONFIDENCE_THRESHOLDS) {
    if (score >= min) return level;
  }
  return AttributionConfidence.VERY_LOW;
}

export function confidenceLabel(level: AttributionConfidence): ConfidenceLabel {
  return CONFIDENCE_LABELS[level];
}

export class ConfidenceClassifier {
  constructor(private readonly boosts: BoostConfig = CONFIDENCE_BOOSTS) {}

  classify(input: ClassificationInput): Classification {
    const sourceBoost = Math.min(this.boosts.maxSource, input.sourceCount * this.boosts.perSource);
    const evidenceBoost = Math.min(this.boosts.maxEvidence, input.evidenceCount * this.boosts.perEvidence);
    const finalScore = clamp(input.consolidationScore + sourceBoost + evidenceBoost);

    return {
      level: levelForScore(finalScore),
      finalScore,
      sourceBoost,
      evidenceBoost,
    };
  }
}
