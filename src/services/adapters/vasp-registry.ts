/**
 * VASP registry adapter
 * Registered service-provider attribution, scored by the registry itself
 */

import { BaseSourceAdapter, type SourceAdapterOptions } from './base-adapter.js';
import type { VaspAttributionCollaborator } from '../../collaborators/index.js';
import type { Attribution, Blockchain } from '../../types/index.js';

export interface VaspRegistryAdapterOptions extends SourceAdapterOptions {
  /** Floor passed through to the registry lookup */
  minConfidence: number;
}

export class VaspRegistryAdapter extends BaseSourceAdapter {
  readonly source = 'vasp_registry' as const;
  private readonly minConfidence: number;

  constructor(
    private readonly collaborator: VaspAttributionCollaborator,
    options: VaspRegistryAdapterOptions
  ) {
    super(options);
    this.minConfidence = options.minConfidence;
  }

  protected async query(address: string, blockchain: Blockchain, signal: AbortSignal): Promise<Attribution[]> {
    const result = await this.collaborator.attribute(address, blockchain, this.minConfidence, signal);
    if (!result) return [];

    return [
      this.createAttribution({
        recordId: result.attributionId,
        address,
        blockchain,
        entity: result.vaspId,
        entityType: result.entityType ?? 'unknown',
        rawConfidence: result.confidenceScore,
        evidence: result.evidence,
        observedAt: null,
        details: {
          attributionId: result.attributionId,
          verificationStatus: result.verificationStatus,
          confidenceScore: result.confidenceScore,
        },
        riskScore: result.riskScore,
        tags: ['vasp_registry', 'exchange', 'financial'],
        metadata: { verificationStatus: result.verificationStatus },
      }),
    ];
  }
}
