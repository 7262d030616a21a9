/**
 * Threat intelligence adapter
 * Feed items for the address, scored by threat level × feed confidence
 */

import {
  DEFAULT_MAPPED_SCORE,
  EVM_BLOCKCHAINS,
  SEVERITY_RISK,
  THREAT_LEVEL_CONFIDENCE,
} from '../../config/constants.js';
import { clamp } from '../confidence-classifier.js';
import { BaseSourceAdapter, type SourceAdapterOptions } from './base-adapter.js';
import type { ThreatIntelligenceCollaborator } from '../../collaborators/index.js';
import type { Attribution, Blockchain, ThreatIntelItem } from '../../types/index.js';

export function threatIntelConfidence(threatLevel: string, confidenceScore: number): number {
  const base = THREAT_LEVEL_CONFIDENCE[threatLevel] ?? DEFAULT_MAPPED_SCORE;
  return clamp(base * confidenceScore);
}

export class ThreatIntelligenceAdapter extends BaseSourceAdapter {
  readonly source = 'threat_intelligence' as const;

  constructor(
    private readonly collaborator: ThreatIntelligenceCollaborator,
    options: SourceAdapterOptions
  ) {
    super(options);
  }

  protected async query(address: string, blockchain: Blockchain, signal: AbortSignal): Promise<Attribution[]> {
    const items = await this.collaborator.search([address], signal);
    // Only hex addresses are case-insensitive; base58 case is significant
    const matches = EVM_BLOCKCHAINS.has(blockchain)
      ? (candidate: string) => candidate.toLowerCase() === address.toLowerCase()
      : (candidate: string) => candidate === address;

    return items
      .filter(item => matches(item.address))
      .map(item => this.toAttribution(item, address, blockchain));
  }

  private toAttribution(item: ThreatIntelItem, address: string, blockchain: Blockchain): Attribution {
    return this.createAttribution({
      recordId: item.id,
      address,
      blockchain,
      entity: item.entity,
      entityType: 'threat_actor',
      rawConfidence: threatIntelConfidence(item.threatLevel, item.confidenceScore),
      evidence: item.evidence,
      observedAt: item.lastSeen ?? item.firstSeen,
      details: {
        itemId: item.id,
        feedSource: item.feedSource,
        threatType: item.threatType,
        threatLevel: item.threatLevel,
        confidenceScore: item.confidenceScore,
      },
      riskScore: SEVERITY_RISK[item.threatLevel] ?? DEFAULT_MAPPED_SCORE,
      tags: ['threat_intelligence', item.threatType],
      metadata: {
        firstSeen: item.firstSeen ? item.firstSeen.toISOString() : null,
        lastSeen: item.lastSeen ? item.lastSeen.toISOString() : null,
      },
    });
  }
}
