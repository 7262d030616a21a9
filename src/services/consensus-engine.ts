/**
 * Consensus Engine
 *
 * Responsibilities:
 * - Group attributions by claimed entity
 * - Score each group by reliability-weighted raw confidence
 * - Pick a winner with a deterministic tie-break
 */

import { UNKNOWN_ENTITY, UNKNOWN_SOURCE_WEIGHT } from '../config/constants.js';
import type { Attribution } from '../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EntityGroup {
  entity: string;
  attributions: Attribution[];
  /** Σ(weight × rawConfidence) / Σ(weight) */
  score: number;
  totalWeight: number;
}

export interface ConsensusResult {
  /** Ranked best first */
  groups: EntityGroup[];
  winner: EntityGroup;
  consolidatedEntity: string | null;
  consolidatedEntityType: string | null;
  consolidationScore: number;
}

// ============================================================================
// ORDERING
// ============================================================================

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Canonical order for attributions so sums and outputs do not depend on
 * the order sources answered in.
 */
export function canonicalOrder(attributions: readonly Attribution[]): Attribution[] {
  return [...attributions].sort(
    (a, b) =>
      compareStrings(a.id, b.id) ||
      compareStrings(a.entity ?? UNKNOWN_ENTITY, b.entity ?? UNKNOWN_ENTITY)
  );
}

export function compareGroups(a: EntityGroup, b: EntityGroup): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.totalWeight !== b.totalWeight) return b.totalWeight - a.totalWeight;
  return compareStrings(a.entity, b.entity);
}

// ============================================================================
// CONSENSUS ENGINE
// ============================================================================

export class ConsensusEngine {
  private readonly weights: Record<string, number>;

  constructor(weights: Record<string, number>) {
    this.weights = { ...weights };
  }

  weightFor(sourceName: string): number {
    return this.weights[sourceName] ?? UNKNOWN_SOURCE_WEIGHT;
  }

  /**
   * Group attributions by entity key, keeping canonical order inside groups
   */
  groupByEntity(attributions: readonly Attribution[]): Map<string, Attribution[]> {
    const groups = new Map<string, Attribution[]>();
    for (const attribution of canonicalOrder(attributions)) {
      const key = attribution.entity ?? UNKNOWN_ENTITY;
      const group = groups.get(key);
      if (group) {
        group.push(attribution);
      } else {
        groups.set(key, [attribution]);
      }
    }
    return groups;
  }

  /**
   * One term per source contribution, not per attribution
   */
  scoreGroup(attributions: readonly Attribution[]): { score: number; totalWeight: number } {
    let weighted = 0;
    let totalWeight = 0;

    for (const attribution of attributions) {
      for (const contribution of attribution.sources) {
        const weight = this.weightFor(contribution.sourceName);
        weighted += weight * contribution.rawConfidence;
        totalWeight += weight;
      }
    }

    return {
      score: totalWeight > 0 ? weighted / totalWeight : 0,
      totalWeight,
    };
  }

  resolve(attributions: readonly Attribution[]): ConsensusResult {
    if (attributions.length === 0) {
      throw new Error('Cannot resolve consensus without attributions');
    }

    const groups: EntityGroup[] = [];
    for (const [entity, members] of this.groupByEntity(attributions)) {
      groups.push({ entity, attributions: members, ...this.scoreGroup(members) });
    }
    groups.sort(compareGroups);

    const winner = groups[0];
    const hasEntity = winner.entity !== UNKNOWN_ENTITY;

    return {
      groups,
      winner,
      consolidatedEntity: hasEntity ? winner.entity : null,
      consolidatedEntityType: hasEntity ? dominantEntityType(winner.attributions) : null,
      consolidationScore: winner.score,
    };
  }
}

/**
 * Most frequent entity type in a group; ties go to the smaller string
 */
function dominantEntityType(attributions: readonly Attribution[]): string | null {
  const counts = new Map<string, number>();
  for (const attribution of attributions) {
    if (attribution.entityType) {
      counts.set(attribution.entityType, (counts.get(attribution.entityType) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [entityType, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && entityType < best)) {
      best = entityType;
      bestCount = count;
    }
  }
  return best;
}
