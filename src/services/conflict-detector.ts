/**
 * Conflict Detector Service
 *
 * Responsibilities:
 * - Decide whether sources disagree on who controls an address
 * - Split contributing source names into supporting or conflicting
 * - Report per-entity scores and the score gap between the top two groups
 *
 * Any identity disagreement is a conflict, whatever the confidence gap.
 * The gap is reported for callers that want to rank conflicts.
 */

import type { Attribution } from '../types/index.js';
import type { EntityGroup } from './consensus-engine.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ConflictAnalysis {
  hasConflict: boolean;
  supportingSources: string[];
  conflictingSources: string[];
  entityCount: number;
  sourceCount: number;
  entityScores: Record<string, number>;
  /** Best minus second-best group score; 0 with a single group */
  scoreGap: number;
}

// ============================================================================
// CONFLICT DETECTOR
// ============================================================================

export class ConflictDetector {
  /**
   * Analyze ranked entity groups (best first)
   */
  analyze(groups: readonly EntityGroup[]): ConflictAnalysis {
    const nonEmpty = groups.filter(g => g.attributions.length > 0);
    const sources = this.collectSourceNames(nonEmpty.flatMap(g => g.attributions));
    const hasConflict = nonEmpty.length > 1;

    const entityScores: Record<string, number> = {};
    for (const group of nonEmpty) {
      entityScores[group.entity] = group.score;
    }

    return {
      hasConflict,
      supportingSources: hasConflict ? [] : sources,
      conflictingSources: hasConflict ? sources : [],
      entityCount: nonEmpty.length,
      sourceCount: sources.length,
      entityScores,
      scoreGap: nonEmpty.length > 1 ? nonEmpty[0].score - nonEmpty[1].score : 0,
    };
  }

  /**
   * Distinct source names, sorted
   */
  collectSourceNames(attributions: readonly Attribution[]): string[] {
    const names = new Set<string>();
    for (const attribution of attributions) {
      for (const contribution of attribution.sources) {
        names.add(contribution.sourceName);
      }
    }
    return [...names].sort();
  }
}
