/**
 * Source adapter registry
 */

import { NoopOnChainAnalysisCollaborator, type Collaborators } from '../../collaborators/index.js';
import type { Logger } from '../../utils/logger.js';
import type { SourceAdapter } from './base-adapter.js';
import { OnChainAnalysisAdapter } from './on-chain-analysis.js';
import { ThreatIntelligenceAdapter } from './threat-intelligence.js';
import { VaspRegistryAdapter } from './vasp-registry.js';
import { VictimReportsAdapter } from './victim-reports.js';

export interface AdapterFactoryOptions {
  timeoutMs: number;
  vaspMinConfidence: number;
  logger: Logger;
}

/**
 * One adapter per configured collaborator. On-chain analysis is always
 * present and falls back to the no-op collaborator.
 */
export function createSourceAdapters(
  collaborators: Collaborators,
  options: AdapterFactoryOptions
): SourceAdapter[] {
  const adapterOptions = (source: string) => ({
    timeoutMs: options.timeoutMs,
    logger: options.logger.child({ component: 'source-adapter', source }),
  });

  const adapters: SourceAdapter[] = [];

  if (collaborators.victimReports) {
    adapters.push(new VictimReportsAdapter(collaborators.victimReports, adapterOptions('victim_reports')));
  }
  if (collaborators.threatIntelligence) {
    adapters.push(
      new ThreatIntelligenceAdapter(collaborators.threatIntelligence, adapterOptions('threat_intelligence'))
    );
  }
  if (collaborators.vaspRegistry) {
    adapters.push(
      new VaspRegistryAdapter(collaborators.vaspRegistry, {
        ...adapterOptions('vasp_registry'),
        minConfidence: options.vaspMinConfidence,
      })
    );
  }
  adapters.push(
    new OnChainAnalysisAdapter(
      collaborators.onChainAnalysis ?? new NoopOnChainAnalysisCollaborator(),
      adapterOptions('on_chain_analysis')
    )
  );

  return adapters;
}

export { BaseSourceAdapter } from './base-adapter.js';
export type { SourceAdapter, SourceAdapterOptions, SourceLookup } from './base-adapter.js';
export { VictimReportsAdapter, victimReportConfidence, victimReportRisk } from './victim-reports.js';
export { ThreatIntelligenceAdapter, threatIntelConfidence } from './threat-intelligence.js';
export { VaspRegistryAdapter } from './vasp-registry.js';
export { OnChainAnalysisAdapter } from './on-chain-analysis.js';
