/**
 * Attribution Store
 *
 * Persistence contract for consolidations plus the PostgreSQL implementation.
 * A consolidation and its attributions are written in one transaction,
 * keyed by (address, blockchain) and by attribution id respectively.
 */

import type postgres from 'postgres';
import { CONFIDENCE_LABELS } from '../config/constants.js';
import { getConnection, healthCheck } from '../db/connection.js';
import {
  attributionRowSchema,
  conflictRowSchema,
  decodeRows,
  staleRowSchema,
} from '../db/records.js';
import { canonicalJson } from '../utils/crypto.js';
import type { Logger } from '../utils/logger.js';
import type {
  Attribution,
  AttributionConfidence,
  AttributionConsolidation,
  Blockchain,
  ConfidenceLabel,
  ConflictSummary,
  PersistedStatistics,
} from '../types/index.js';

// ============================================================================
// CONTRACT
// ============================================================================

export interface EntitySearchOptions {
  blockchain?: Blockchain;
  /** Exact level */
  confidence?: AttributionConfidence;
  limit: number;
}

export interface ConflictQuery {
  blockchain?: Blockchain;
  /** Only conflicts whose best/second-best gap is at most this */
  maxScoreGap?: number;
  limit: number;
}

export interface StaleConsolidation {
  address: string;
  blockchain: Blockchain;
}

export interface AttributionStore {
  saveConsolidation(consolidation: AttributionConsolidation): Promise<void>;
  /** Remove the stored verdict and its attributions; false when nothing was stored */
  deleteConsolidation(address: string, blockchain: Blockchain): Promise<boolean>;
  searchByEntity(entity: string, options: EntitySearchOptions): Promise<Attribution[]>;
  getStatistics(windowDays: number): Promise<PersistedStatistics>;
  /** Ranked by score gap, closest disagreements first */
  listConflicts(query: ConflictQuery): Promise<ConflictSummary[]>;
  /** Consolidations last computed before `olderThan`, oldest first */
  listStale(olderThan: Date, limit: number): Promise<StaleConsolidation[]>;
  isHealthy(): Promise<boolean>;
}

// ============================================================================
// POSTGRES IMPLEMENTATION
// ============================================================================

interface AttributionCountsRow {
  total_attributions: number;
  unique_addresses: number;
  unique_entities: number;
  unique_blockchains: number;
  avg_risk_score: number | null;
}

interface ConfidenceCountRow {
  confidence: ConfidenceLabel;
  count: number;
}

interface ConsolidationCountsRow {
  total_consolidations: number;
  avg_consolidation_score: number | null;
  with_conflicts: number;
  with_support: number;
}

export class PostgresAttributionStore implements AttributionStore {
  private readonly sql: postgres.Sql;
  private readonly logger: Logger;

  constructor(logger: Logger, sql: postgres.Sql = getConnection()) {
    this.sql = sql;
    this.logger = logger.child({ component: 'attribution-store' });
  }

  async saveConsolidation(consolidation: AttributionConsolidation): Promise<void> {
    const { address, blockchain } = consolidation;
    const ids = consolidation.attributions.map(a => a.id);

    await this.sql.begin(async tx => {
      await tx`
        INSERT INTO attribution_consolidations (
          address,
          blockchain,
          consolidated_entity,
          consolidated_entity_type,
          overall_confidence,
          supporting_sources,
          conflicting_sources,
          evidence,
          consolidation_score,
          metadata,
          consolidated_at
        ) VALUES (
          ${address},
          ${blockchain},
          ${consolidation.consolidatedEntity},
          ${consolidation.consolidatedEntityType},
          ${CONFIDENCE_LABELS[consolidation.overallConfidence]},
          ${this.sql.array(consolidation.supportingSources)},
          ${this.sql.array(consolidation.conflictingSources)},
          ${canonicalJson(consolidation.evidence)}::jsonb,
          ${consolidation.consolidationScore},
          ${canonicalJson(consolidation.metadata)}::jsonb,
          ${consolidation.consolidatedAt}
        )
        ON CONFLICT (address, blockchain) DO UPDATE SET
          consolidated_entity = EXCLUDED.consolidated_entity,
          consolidated_entity_type = EXCLUDED.consolidated_entity_type,
          overall_confidence = EXCLUDED.overall_confidence,
          supporting_sources = EXCLUDED.supporting_sources,
          conflicting_sources = EXCLUDED.conflicting_sources,
          evidence = EXCLUDED.evidence,
          consolidation_score = EXCLUDED.consolidation_score,
          metadata = EXCLUDED.metadata,
          consolidated_at = EXCLUDED.consolidated_at,
          updated_at = NOW()
      `;

      for (const attribution of consolidation.attributions) {
        await tx`
          INSERT INTO cross_platform_attributions (
            id,
            address,
            blockchain,
            entity,
            entity_type,
            confidence,
            sources,
            evidence,
            risk_score,
            tags,
            metadata
          ) VALUES (
            ${attribution.id},
            ${attribution.address},
            ${attribution.blockchain},
            ${attribution.entity},
            ${attribution.entityType},
            ${CONFIDENCE_LABELS[attribution.confidence]},
            ${canonicalJson(attribution.sources)}::jsonb,
            ${canonicalJson(attribution.evidence)}::jsonb,
            ${attribution.riskScore},
            ${this.sql.array(attribution.tags)},
            ${canonicalJson(attribution.metadata)}::jsonb
          )
          ON CONFLICT (id) DO UPDATE SET
            entity = EXCLUDED.entity,
            entity_type = EXCLUDED.entity_type,
            confidence = EXCLUDED.confidence,
            sources = EXCLUDED.sources,
            evidence = EXCLUDED.evidence,
            risk_score = EXCLUDED.risk_score,
            tags = EXCLUDED.tags,
            metadata = EXCLUDED.metadata,
            updated_at = NOW()
        `;
      }

      // Attributions a source no longer reports
      await tx`
        DELETE FROM cross_platform_attributions
        WHERE address = ${address}
          AND blockchain = ${blockchain}
          AND NOT (id = ANY(${this.sql.array(ids)}))
      `;
    });

    this.logger.debug({ address, blockchain, attributions: ids.length }, 'Consolidation saved');
  }

  async deleteConsolidation(address: string, blockchain: Blockchain): Promise<boolean> {
    const removed = await this.sql.begin(async tx => {
      await tx`
        DELETE FROM cross_platform_attributions
        WHERE address = ${address} AND blockchain = ${blockchain}
      `;
      const result = await tx`
        DELETE FROM attribution_consolidations
        WHERE address = ${address} AND blockchain = ${blockchain}
      `;
      return result.count > 0;
    });

    this.logger.debug({ address, blockchain, removed }, 'Consolidation deleted');
    return removed;
  }

  async searchByEntity(entity: string, options: EntitySearchOptions): Promise<Attribution[]> {
    const sql = this.sql;
    const rows = await sql`
      SELECT id, address, blockchain, entity, entity_type, confidence,
             sources, evidence, risk_score, tags, metadata
      FROM cross_platform_attributions
      WHERE LOWER(entity) = LOWER(${entity})
        ${options.blockchain ? sql`AND blockchain = ${options.blockchain}` : sql``}
        ${options.confidence !== undefined ? sql`AND confidence = ${CONFIDENCE_LABELS[options.confidence]}` : sql``}
      ORDER BY risk_score DESC, updated_at DESC, id
      LIMIT ${options.limit}
    `;

    return decodeRows(attributionRowSchema, rows, (index, error) => {
      this.logger.warn({ entity, index, issues: error.issues.length }, 'Skipping unreadable attribution row');
    });
  }

  async getStatistics(windowDays: number): Promise<PersistedStatistics> {
    const sql = this.sql;

    const [counts] = await sql<AttributionCountsRow[]>`
      SELECT
        COUNT(*)::int AS total_attributions,
        COUNT(DISTINCT address)::int AS unique_addresses,
        COUNT(DISTINCT entity)::int AS unique_entities,
        COUNT(DISTINCT blockchain)::int AS unique_blockchains,
        AVG(risk_score)::float8 AS avg_risk_score
      FROM cross_platform_attributions
      WHERE updated_at >= NOW() - make_interval(days => ${windowDays})
    `;

    const distribution = await sql<ConfidenceCountRow[]>`
      SELECT confidence, COUNT(*)::int AS count
      FROM cross_platform_attributions
      WHERE updated_at >= NOW() - make_interval(days => ${windowDays})
      GROUP BY confidence
      ORDER BY confidence
    `;

    const [consolidations] = await sql<ConsolidationCountsRow[]>`
      SELECT
        COUNT(*)::int AS total_consolidations,
        AVG(consolidation_score)::float8 AS avg_consolidation_score,
        COUNT(*) FILTER (WHERE cardinality(conflicting_sources) > 0)::int AS with_conflicts,
        COUNT(*) FILTER (WHERE cardinality(supporting_sources) > 0)::int AS with_support
      FROM attribution_consolidations
      WHERE consolidated_at >= NOW() - make_interval(days => ${windowDays})
    `;

    return {
      windowDays,
      totalAttributions: counts?.total_attributions ?? 0,
      uniqueAddresses: counts?.unique_addresses ?? 0,
      uniqueEntities: counts?.unique_entities ?? 0,
      uniqueBlockchains: counts?.unique_blockchains ?? 0,
      avgRiskScore: counts?.avg_risk_score ?? 0,
      totalConsolidations: consolidations?.total_consolidations ?? 0,
      avgConsolidationScore: consolidations?.avg_consolidation_score ?? 0,
      withConflicts: consolidations?.with_conflicts ?? 0,
      withSupport: consolidations?.with_support ?? 0,
      confidenceDistribution: distribution.map(row => ({
        confidence: row.confidence,
        count: row.count,
      })),
    };
  }

  async listConflicts(query: ConflictQuery): Promise<ConflictSummary[]> {
    const sql = this.sql;
    const rows = await sql`
      SELECT address, blockchain, consolidated_entity, conflicting_sources,
             overall_confidence, metadata, consolidated_at
      FROM attribution_consolidations
      WHERE cardinality(conflicting_sources) > 0
        ${query.blockchain ? sql`AND blockchain = ${query.blockchain}` : sql``}
        ${query.maxScoreGap !== undefined
          ? sql`AND COALESCE((metadata->>'scoreGap')::float8, 0) <= ${query.maxScoreGap}`
          : sql``}
      ORDER BY COALESCE((metadata->>'scoreGap')::float8, 0) ASC, consolidated_at DESC, address
      LIMIT ${query.limit}
    `;

    return decodeRows(conflictRowSchema, rows, (index, error) => {
      this.logger.warn({ index, issues: error.issues.length }, 'Skipping unreadable consolidation row');
    });
  }

  async listStale(olderThan: Date, limit: number): Promise<StaleConsolidation[]> {
    const rows = await this.sql`
      SELECT address, blockchain
      FROM attribution_consolidations
      WHERE consolidated_at < ${olderThan}
      ORDER BY consolidated_at ASC
      LIMIT ${limit}
    `;

    return decodeRows(staleRowSchema, rows, (index, error) => {
      this.logger.warn({ index, issues: error.issues.length }, 'Skipping unreadable consolidation row');
    });
  }

  async isHealthy(): Promise<boolean> {
    return healthCheck(this.sql);
  }
}
