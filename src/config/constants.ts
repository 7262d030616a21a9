/**
 * Attribution Ledger Configuration Constants
 * Source reliability, confidence thresholds and per-source vocabulary mappings
 */

import {
  AttributionConfidence,
  type AdapterSourceName,
  type AttributionSourceName,
  type Blockchain,
  type ConfidenceLabel,
} from '../types/index.js';

// ============================================================================
// SOURCE RELIABILITY WEIGHTS
// ============================================================================
// Multiplies each source's raw confidence in the consensus average

export const DEFAULT_SOURCE_WEIGHTS: Record<AttributionSourceName, number> = {
  victim_reports: 0.8,
  threat_intelligence: 0.9,
  vasp_registry: 0.7,
  on_chain_analysis: 0.6,
  user_reports: 0.5,
  external_api: 0.8,
  manual_investigation: 1.0,
};

// Weight for source names outside the table above
export const UNKNOWN_SOURCE_WEIGHT = 0.5;

export const ADAPTER_SOURCES = [
  'victim_reports',
  'threat_intelligence',
  'vasp_registry',
  'on_chain_analysis',
] as const satisfies readonly AdapterSourceName[];

// Group key for attributions without an entity
export const UNKNOWN_ENTITY = 'unknown';

// ============================================================================
// CONFIDENCE LEVELS
// ============================================================================

// Evaluated top-down, first match wins
export const CONFIDENCE_THRESHOLDS: Array<{ level: AttributionConfidence; min: number }> = [
  { level: AttributionConfidence.DEFINITIVE, min: 0.95 },
  { level: AttributionConfidence.VERY_HIGH, min: 0.9 },
  { level: AttributionConfidence.HIGH, min: 0.7 },
  { level: AttributionConfidence.MEDIUM, min: 0.5 },
  { level: AttributionConfidence.LOW, min: 0.3 },
];

export const CONFIDENCE_LABELS: Record<AttributionConfidence, ConfidenceLabel> = {
  [AttributionConfidence.VERY_LOW]: 'very_low',
  [AttributionConfidence.LOW]: 'low',
  [AttributionConfidence.MEDIUM]: 'medium',
  [AttributionConfidence.HIGH]: 'high',
  [AttributionConfidence.VERY_HIGH]: 'very_high',
  [AttributionConfidence.DEFINITIVE]: 'definitive',
};

export const CONFIDENCE_FROM_LABEL: Record<ConfidenceLabel, AttributionConfidence> = {
  very_low: AttributionConfidence.VERY_LOW,
  low: AttributionConfidence.LOW,
  medium: AttributionConfidence.MEDIUM,
  high: AttributionConfidence.HIGH,
  very_high: AttributionConfidence.VERY_HIGH,
  definitive: AttributionConfidence.DEFINITIVE,
};

export interface BoostConfig {
  perSource: number;
  maxSource: number;
  perEvidence: number;
  maxEvidence: number;
}

// Corroboration boosts applied on top of the consensus score
export const CONFIDENCE_BOOSTS: BoostConfig = {
  perSource: 0.05,
  maxSource: 0.2,
  perEvidence: 0.02,
  maxEvidence: 0.1,
};

// ============================================================================
// VICTIM REPORT MAPPING
// ============================================================================

export const VICTIM_STATUS_CONFIDENCE: Record<string, number> = {
  verified: 0.9,
  investigating: 0.6,
  pending: 0.3,
  false_positive: 0.1,
  resolved: 0.8,
};

export const VICTIM_SEVERITY_ADJUSTMENT: Record<string, number> = {
  severe: 0.1,
  critical: 0.05,
  high: 0.0,
  medium: -0.05,
  low: -0.1,
};

// Loss amount that saturates the amount component of the risk score
export const LOSS_NORMALIZATION_USD = 100_000;
export const MAX_LOSS_RISK = 0.9;

// ============================================================================
// THREAT LEVEL MAPPING
// ============================================================================

export const THREAT_LEVEL_CONFIDENCE: Record<string, number> = {
  severe: 0.9,
  critical: 0.85,
  high: 0.8,
  medium: 0.6,
  low: 0.4,
};

// Shared by victim severity and threat level
export const SEVERITY_RISK: Record<string, number> = {
  severe: 0.9,
  critical: 0.95,
  high: 0.8,
  medium: 0.6,
  low: 0.4,
};

export const DEFAULT_MAPPED_SCORE = 0.5;

// ============================================================================
// BLOCKCHAINS
// ============================================================================

export const SUPPORTED_BLOCKCHAINS = [
  'bitcoin',
  'ethereum',
  'binance_smart_chain',
  'polygon',
  'arbitrum',
  'optimism',
  'solana',
  'tron',
  'xrpl',
  'avalanche',
  'fantom',
  'heco',
] as const satisfies readonly Blockchain[];

// Chains whose addresses are case-insensitive hex
export const EVM_BLOCKCHAINS: ReadonlySet<Blockchain> = new Set<Blockchain>([
  'ethereum',
  'binance_smart_chain',
  'polygon',
  'arbitrum',
  'optimism',
  'avalanche',
  'fantom',
  'heco',
]);

const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
const BASE58 = '1-9A-HJ-NP-Za-km-z';

export const ADDRESS_PATTERNS: Record<Blockchain, RegExp> = {
  bitcoin: /^(bc1[02-9ac-hj-np-z]{11,71}|[13][1-9A-HJ-NP-Za-km-z]{25,34})$/,
  ethereum: EVM_ADDRESS,
  binance_smart_chain: EVM_ADDRESS,
  polygon: EVM_ADDRESS,
  arbitrum: EVM_ADDRESS,
  optimism: EVM_ADDRESS,
  avalanche: EVM_ADDRESS,
  fantom: EVM_ADDRESS,
  heco: EVM_ADDRESS,
  solana: new RegExp(`^[${BASE58}]{32,44}$`),
  tron: new RegExp(`^T[${BASE58}]{33}$`),
  xrpl: new RegExp(`^r[${BASE58}]{24,34}$`),
};

// ============================================================================
// LIMITS
// ============================================================================

export const MAX_BATCH_ADDRESSES = 100;
export const MAX_SEARCH_LIMIT = 1000;
export const MAX_STATISTICS_WINDOW_DAYS = 365;
