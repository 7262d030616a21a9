/**
 * Wire format
 * Confidence levels leave the process as their labels
 */

import { confidenceLabel } from '../services/confidence-classifier.js';
import type {
  Attribution,
  AttributionConsolidation,
  ConfidenceLabel,
  ConflictSummary,
} from '../types/index.js';

export type AttributionResponse = Omit<Attribution, 'confidence'> & { confidence: ConfidenceLabel };

export type ConsolidationResponse = Omit<AttributionConsolidation, 'overallConfidence' | 'attributions'> & {
  overallConfidence: ConfidenceLabel;
  attributions: AttributionResponse[];
};

export type ConflictResponse = Omit<ConflictSummary, 'overallConfidence'> & {
  overallConfidence: ConfidenceLabel;
};

export function serializeAttribution(attribution: Attribution): AttributionResponse {
  return { ...attribution, confidence: confidenceLabel(attribution.confidence) };
}

export function serializeConsolidation(consolidation: AttributionConsolidation): ConsolidationResponse {
  return {
    ...consolidation,
    overallConfidence: confidenceLabel(consolidation.overallConfidence),
    attributions: consolidation.attributions.map(serializeAttribution),
  };
}

export function serializeConflict(conflict: ConflictSummary): ConflictResponse {
  return { ...conflict, overallConfidence: confidenceLabel(conflict.overallConfidence) };
}
