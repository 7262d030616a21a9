/**
 * PostgreSQL-backed collaborators
 * Read the tables owned by the victim report, threat feed and VASP subsystems
 */

import type postgres from 'postgres';
import { z } from 'zod';
import { getConnection } from '../db/connection.js';
import { isHexAddress } from '../utils/validation.js';
import type {
  Blockchain,
  ThreatIntelItem,
  VaspAttributionResult,
  VictimReport,
} from '../types/index.js';
import type {
  Collaborators,
  ThreatIntelligenceCollaborator,
  VaspAttributionCollaborator,
  VictimReportsCollaborator,
} from './index.js';

const evidenceSchema = z
  .array(z.union([z.string(), z.record(z.unknown())]))
  .nullable()
  .transform(value => value ?? []);

/**
 * Run a query, cancelling it on the server when the signal fires
 */
async function cancellable<T>(
  query: postgres.PendingQuery<postgres.Row[]>,
  signal: AbortSignal | undefined,
  decode: (rows: readonly unknown[]) => T
): Promise<T> {
  const onAbort = () => {
    query.cancel();
  };
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    return decode(await query);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}

// ============================================================================
// VICTIM REPORTS
// ============================================================================

const victimReportRowSchema = z
  .object({
    report_id: z.string(),
    scammer_entity: z.string().nullable(),
    severity: z.string(),
    status: z.string(),
    evidence: evidenceSchema,
    amount_lost: z.number().nullable(),
    reported_date: z.date().nullable(),
    platform: z.string().nullable(),
  })
  .transform((row): VictimReport => ({
    reportId: row.report_id,
    entity: row.scammer_entity,
    severity: row.severity,
    status: row.status,
    evidence: row.evidence,
    amountLost: row.amount_lost,
    reportedAt: row.reported_date,
    platform: row.platform,
  }));

export class PostgresVictimReportsCollaborator implements VictimReportsCollaborator {
  constructor(private readonly sql: postgres.Sql = getConnection()) {}

  async searchByAddress(address: string, signal?: AbortSignal): Promise<VictimReport[]> {
    // Hex addresses match in any case; base58 and bech32 addresses match exactly
    const matchesAddress = isHexAddress(address)
      ? this.sql`LOWER(scammer_address) = ${address.toLowerCase()}`
      : this.sql`scammer_address = ${address}`;
    const query = this.sql`
      SELECT report_id, scammer_entity, severity, status, evidence,
             amount_lost::float8 AS amount_lost, reported_date, platform
      FROM victim_reports
      WHERE ${matchesAddress}
      ORDER BY reported_date DESC NULLS LAST, report_id
      LIMIT 1000
    `;
    return cancellable(query, signal, rows => z.array(victimReportRowSchema).parse(rows));
  }
}

// ============================================================================
// THREAT INTELLIGENCE
// ============================================================================

const threatIntelRowSchema = z
  .object({
    id: z.string(),
    address: z.string(),
    entity: z.string().nullable(),
    threat_type: z.string(),
    threat_level: z.string(),
    confidence_score: z.number(),
    first_seen: z.date().nullable(),
    last_seen: z.date().nullable(),
    feed_source: z.string().nullable(),
    evidence: evidenceSchema,
  })
  .transform((row): ThreatIntelItem => ({
    id: row.id,
    address: row.address,
    entity: row.entity,
    threatType: row.threat_type,
    threatLevel: row.threat_level,
    confidenceScore: row.confidence_score,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    feedSource: row.feed_source,
    evidence: row.evidence,
  }));

export class PostgresThreatIntelligenceCollaborator implements ThreatIntelligenceCollaborator {
  constructor(private readonly sql: postgres.Sql = getConnection()) {}

  async search(addresses: string[], signal?: AbortSignal): Promise<ThreatIntelItem[]> {
    if (addresses.length === 0) return [];
    const hex = addresses.filter(isHexAddress).map(a => a.toLowerCase());
    const exact = addresses.filter(a => !isHexAddress(a));

    const query = this.sql`
      SELECT id::text AS id, address, entity, threat_type, threat_level,
             confidence_score::float8 AS confidence_score,
             first_seen, last_seen, feed_source, evidence
      FROM threat_intelligence
      WHERE (LOWER(address) = ANY(${this.sql.array(hex)}) OR address = ANY(${this.sql.array(exact)}))
        AND is_active IS NOT FALSE
      ORDER BY last_seen DESC NULLS LAST, id
    `;
    return cancellable(query, signal, rows => z.array(threatIntelRowSchema).parse(rows));
  }
}

// ============================================================================
// VASP REGISTRY
// ============================================================================

const vaspRowSchema = z
  .object({
    id: z.string(),
    vasp_id: z.string(),
    entity_type: z.string().nullable(),
    confidence_score: z.number(),
    verification_status: z.string(),
    risk_score: z.number(),
    evidence: evidenceSchema,
  })
  .transform((row): VaspAttributionResult => ({
    attributionId: row.id,
    vaspId: row.vasp_id,
    entityType: row.entity_type,
    confidenceScore: row.confidence_score,
    verificationStatus: row.verification_status,
    evidence: row.evidence,
    riskScore: row.risk_score,
  }));

export class PostgresVaspAttributionCollaborator implements VaspAttributionCollaborator {
  constructor(private readonly sql: postgres.Sql = getConnection()) {}

  /**
   * Highest-confidence registry attribution at or above the floor
   */
  async attribute(
    address: string,
    blockchain: Blockchain,
    minConfidence: number,
    signal?: AbortSignal
  ): Promise<VaspAttributionResult | null> {
    const matchesAddress = isHexAddress(address)
      ? this.sql`LOWER(address) = ${address.toLowerCase()}`
      : this.sql`address = ${address}`;
    const query = this.sql`
      SELECT id, vasp_id, entity_type,
             confidence_score::float8 AS confidence_score,
             verification_status,
             risk_score::float8 AS risk_score,
             evidence
      FROM vasp_attributions
      WHERE ${matchesAddress}
        AND blockchain = ${blockchain}
        AND confidence_score >= ${minConfidence}
      ORDER BY confidence_score DESC, id
      LIMIT 1
    `;
    const results = await cancellable(query, signal, rows => z.array(vaspRowSchema).parse(rows));
    return results.length > 0 ? results[0] : null;
  }
}

export function createPostgresCollaborators(sql: postgres.Sql = getConnection()): Collaborators {
  return {
    victimReports: new PostgresVictimReportsCollaborator(sql),
    threatIntelligence: new PostgresThreatIntelligenceCollaborator(sql),
    vaspRegistry: new PostgresVaspAttributionCollaborator(sql),
  };
}
