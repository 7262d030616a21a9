/**
 * Collaborator contracts
 * Narrow lookups the consolidation core consumes from the intelligence subsystems
 */

import type {
  Attribution,
  Blockchain,
  ThreatIntelItem,
  VaspAttributionResult,
  VictimReport,
} from '../types/index.js';

export interface VictimReportsCollaborator {
  /** Reports naming the address as the perpetrator */
  searchByAddress(address: string, signal?: AbortSignal): Promise<VictimReport[]>;
}

export interface ThreatIntelligenceCollaborator {
  search(addresses: string[], signal?: AbortSignal): Promise<ThreatIntelItem[]>;
}

export interface VaspAttributionCollaborator {
  attribute(
    address: string,
    blockchain: Blockchain,
    minConfidence: number,
    signal?: AbortSignal
  ): Promise<VaspAttributionResult | null>;
}

export interface OnChainAnalysisCollaborator {
  analyze(address: string, blockchain: Blockchain, signal?: AbortSignal): Promise<Attribution[]>;
}

/**
 * On-chain heuristics are not wired to an analysis backend yet
 */
export class NoopOnChainAnalysisCollaborator implements OnChainAnalysisCollaborator {
  async analyze(): Promise<Attribution[]> {
    return [];
  }
}

export interface Collaborators {
  victimReports?: VictimReportsCollaborator;
  threatIntelligence?: ThreatIntelligenceCollaborator;
  vaspRegistry?: VaspAttributionCollaborator;
  onChainAnalysis?: OnChainAnalysisCollaborator;
}
