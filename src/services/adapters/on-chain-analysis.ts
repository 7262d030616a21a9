/**
 * On-chain analysis adapter
 * Passes heuristic attributions through; the collaborator builds them itself
 */

import { BaseSourceAdapter, type SourceAdapterOptions } from './base-adapter.js';
import type { OnChainAnalysisCollaborator } from '../../collaborators/index.js';
import type { Attribution, Blockchain } from '../../types/index.js';

export class OnChainAnalysisAdapter extends BaseSourceAdapter {
  readonly source = 'on_chain_analysis' as const;

  constructor(
    private readonly collaborator: OnChainAnalysisCollaborator,
    options: SourceAdapterOptions
  ) {
    super(options);
  }

  protected async query(address: string, blockchain: Blockchain, signal: AbortSignal): Promise<Attribution[]> {
    const attributions = await this.collaborator.analyze(address, blockchain, signal);
    // Heuristics for a different subject are not ours to consolidate
    return attributions.filter(a => a.address === address && a.blockchain === blockchain);
  }
}
