/**
 * Attribution Ledger Core Types
 * Type definitions shared by adapters, the consolidation engine and storage
 */

// ============================================================================
// CONFIDENCE
// ============================================================================

/**
 * Ordinal confidence. Numeric values are ranks, so `a >= b` compares levels.
 */
export enum AttributionConfidence {
  VERY_LOW = 0,
  LOW = 1,
  MEDIUM = 2,
  HIGH = 3,
  VERY_HIGH = 4,
  DEFINITIVE = 5,
}

export type ConfidenceLabel =
  | 'very_low'
  | 'low'
  | 'medium'
  | 'high'
  | 'very_high'
  | 'definitive';

// ============================================================================
// SOURCES & CHAINS
// ============================================================================

export type AttributionSourceName =
  | 'victim_reports'
  | 'threat_intelligence'
  | 'vasp_registry'
  | 'on_chain_analysis'
  | 'user_reports'
  | 'external_api'
  | 'manual_investigation';

/** Sources backed by an adapter; the rest only carry a weight. */
export type AdapterSourceName = Extract<
  AttributionSourceName,
  'victim_reports' | 'threat_intelligence' | 'vasp_registry' | 'on_chain_analysis'
>;

export type Blockchain =
  | 'bitcoin'
  | 'ethereum'
  | 'binance_smart_chain'
  | 'polygon'
  | 'arbitrum'
  | 'optimism'
  | 'solana'
  | 'tron'
  | 'xrpl'
  | 'avalanche'
  | 'fantom'
  | 'heco';

/** Opaque evidence artifact: an id, a URI, a tag, or a structured record. */
export type EvidenceItem = string | { [key: string]: unknown };

// ============================================================================
// ATTRIBUTION
// ============================================================================

export interface SourceContribution {
  /** Usually an AttributionSourceName; unknown names weigh 0.5 */
  sourceName: string;
  rawConfidence: number;
  evidence: EvidenceItem[];
  observedAt: Date | null;
  details: Record<string, unknown>;
}

export interface Attribution {
  id: string;
  address: string;
  blockchain: Blockchain;
  entity: string | null;
  entityType: string | null;
  confidence: AttributionConfidence;
  sources: SourceContribution[];
  evidence: EvidenceItem[];
  riskScore: number;
  tags: string[];
  metadata: Record<string, unknown>;
}

export interface ConsolidationMetadata {
  entityCount: number;
  sourceCount: number;
  hasConflicts: boolean;
  evidenceCount: number;
  entityScores: Record<string, number>;
  scoreGap: number;
}

export interface AttributionConsolidation {
  address: string;
  blockchain: Blockchain;
  attributions: Attribution[];
  consolidatedEntity: string | null;
  consolidatedEntityType: string | null;
  overallConfidence: AttributionConfidence;
  supportingSources: string[];
  conflictingSources: string[];
  evidence: EvidenceItem[];
  consolidationScore: number;
  metadata: ConsolidationMetadata;
  consolidatedAt: Date;
}

export interface ConsolidationFilters {
  /** Adapter sources to query; all enabled adapters when omitted */
  sources?: AdapterSourceName[];
  /** Results below this level are reported as not found */
  minConfidence?: AttributionConfidence;
}

// ============================================================================
// COLLABORATOR RECORDS
// ============================================================================

export type VictimReportStatus =
  | 'verified'
  | 'investigating'
  | 'pending'
  | 'false_positive'
  | 'resolved';

export type Severity = 'severe' | 'critical' | 'high' | 'medium' | 'low';

export interface VictimReport {
  reportId: string;
  entity: string | null;
  /** A Severity, or a collaborator-specific value scored as the default */
  severity: string;
  /** A VictimReportStatus, or a collaborator-specific value */
  status: string;
  evidence: EvidenceItem[];
  amountLost: number | null;
  reportedAt: Date | null;
  platform?: string | null;
}

export interface ThreatIntelItem {
  id: string;
  address: string;
  entity: string | null;
  threatType: string;
  /** A Severity, or a collaborator-specific value */
  threatLevel: string;
  confidenceScore: number;
  firstSeen: Date | null;
  lastSeen: Date | null;
  feedSource: string | null;
  evidence: EvidenceItem[];
}

export interface VaspAttributionResult {
  attributionId: string;
  vaspId: string;
  entityType: string | null;
  confidenceScore: number;
  verificationStatus: string;
  evidence: EvidenceItem[];
  riskScore: number;
}

// ============================================================================
// HEALTH & STATISTICS
// ============================================================================

export interface SourceHealth {
  source: AdapterSourceName;
  isHealthy: boolean;
  consecutiveFailures: number;
  totalFailures: number;
  totalTimeouts: number;
  lastError: string | null;
  lastCheckAt: string | null;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface PersistedStatistics {
  windowDays: number;
  totalAttributions: number;
  uniqueAddresses: number;
  uniqueEntities: number;
  uniqueBlockchains: number;
  avgRiskScore: number;
  totalConsolidations: number;
  avgConsolidationScore: number;
  withConflicts: number;
  withSupport: number;
  confidenceDistribution: Array<{ confidence: ConfidenceLabel; count: number }>;
}

export interface AttributionStatistics {
  persisted: PersistedStatistics | null;
  runtime: {
    consolidationsComputed: number;
    notFound: number;
    failures: number;
    cache: CacheStats;
    sources: SourceHealth[];
  };
  generatedAt: string;
}

export interface ConflictSummary {
  address: string;
  blockchain: Blockchain;
  consolidatedEntity: string | null;
  conflictingSources: string[];
  entityScores: Record<string, number>;
  scoreGap: number;
  overallConfidence: AttributionConfidence;
  consolidatedAt: Date;
}
