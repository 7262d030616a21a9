// ============================================
// SHARED TEST FIXTURES
// ============================================

import { levelForScore } from '../confidence-classifier.js';
import type {
  AttributionStore,
  ConflictQuery,
  EntitySearchOptions,
  StaleConsolidation,
} from '../attribution-store.js';
import type {
  Attribution,
  AttributionConsolidation,
  Blockchain,
  ConflictSummary,
  EvidenceItem,
  PersistedStatistics,
} from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';
import { pino } from 'pino';

export const ADDRESS_A = '0x1111111111111111111111111111111111111111';
export const ADDRESS_B = '0x2222222222222222222222222222222222222222';
export const ADDRESS_C = '0x3333333333333333333333333333333333333333';

export const silentLogger: Logger = pino({ level: 'silent' });

export interface AttributionFixture {
  id?: string;
  source: string;
  rawConfidence: number;
  entity: string | null;
  entityType?: string | null;
  evidence?: EvidenceItem[];
  address?: string;
  blockchain?: Blockchain;
}

export function makeAttribution(fixture: AttributionFixture): Attribution {
  const evidence = fixture.evidence ?? [];
  return {
    id: fixture.id ?? `${fixture.source}-${fixture.entity ?? 'none'}`,
    address: fixture.address ?? ADDRESS_A,
    blockchain: fixture.blockchain ?? 'ethereum',
    entity: fixture.entity,
    entityType: fixture.entityType ?? null,
    confidence: levelForScore(fixture.rawConfidence),
    sources: [
      {
        sourceName: fixture.source,
        rawConfidence: fixture.rawConfidence,
        evidence,
        observedAt: null,
        details: {},
      },
    ],
    evidence,
    riskScore: 0.5,
    tags: [],
    metadata: {},
  };
}

const EMPTY_STATISTICS: PersistedStatistics = {
  windowDays: 30,
  totalAttributions: 0,
  uniqueAddresses: 0,
  uniqueEntities: 0,
  uniqueBlockchains: 0,
  avgRiskScore: 0,
  totalConsolidations: 0,
  avgConsolidationScore: 0,
  withConflicts: 0,
  withSupport: 0,
  confidenceDistribution: [],
};

/**
 * Keeps saved consolidations in a Map keyed like the real table
 */
export class InMemoryAttributionStore implements AttributionStore {
  readonly consolidations = new Map<string, AttributionConsolidation>();
  saveCalls = 0;
  deleteCalls = 0;
  failSaves = false;

  async saveConsolidation(consolidation: AttributionConsolidation): Promise<void> {
    this.saveCalls++;
    if (this.failSaves) {
      throw new Error('database unavailable');
    }
    this.consolidations.set(`${consolidation.blockchain}:${consolidation.address}`, consolidation);
  }

  async deleteConsolidation(address: string, blockchain: Blockchain): Promise<boolean> {
    this.deleteCalls++;
    return this.consolidations.delete(`${blockchain}:${address}`);
  }

  async searchByEntity(entity: string, options: EntitySearchOptions): Promise<Attribution[]> {
    const target = entity.toLowerCase();
    return [...this.consolidations.values()]
      .flatMap(c => c.attributions)
      .filter(a => a.entity !== null && a.entity.toLowerCase() === target)
      .filter(a => !options.blockchain || a.blockchain === options.blockchain)
      .filter(a => options.confidence === undefined || a.confidence === options.confidence)
      .slice(0, options.limit);
  }

  async getStatistics(windowDays: number): Promise<PersistedStatistics> {
    const all = [...this.consolidations.values()];
    return {
      ...EMPTY_STATISTICS,
      windowDays,
      totalConsolidations: all.length,
      withConflicts: all.filter(c => c.conflictingSources.length > 0).length,
      withSupport: all.filter(c => c.supportingSources.length > 0).length,
    };
  }

  async listConflicts(query: ConflictQuery): Promise<ConflictSummary[]> {
    return [...this.consolidations.values()]
      .filter(c => c.conflictingSources.length > 0)
      .filter(c => !query.blockchain || c.blockchain === query.blockchain)
      .filter(c => query.maxScoreGap === undefined || c.metadata.scoreGap <= query.maxScoreGap)
      .sort((a, b) => a.metadata.scoreGap - b.metadata.scoreGap)
      .slice(0, query.limit)
      .map(c => ({
        address: c.address,
        blockchain: c.blockchain,
        consolidatedEntity: c.consolidatedEntity,
        conflictingSources: c.conflictingSources,
        entityScores: c.metadata.entityScores,
        scoreGap: c.metadata.scoreGap,
        overallConfidence: c.overallConfidence,
        consolidatedAt: c.consolidatedAt,
      }));
  }

  async listStale(olderThan: Date, limit: number): Promise<StaleConsolidation[]> {
    return [...this.consolidations.values()]
      .filter(c => c.consolidatedAt < olderThan)
      .slice(0, limit)
      .map(c => ({ address: c.address, blockchain: c.blockchain }));
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
