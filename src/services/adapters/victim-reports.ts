/**
 * Victim report adapter
 * Scam reports filed against an address, scored by review status and severity
 */

import {
  DEFAULT_MAPPED_SCORE,
  LOSS_NORMALIZATION_USD,
  MAX_LOSS_RISK,
  SEVERITY_RISK,
  VICTIM_SEVERITY_ADJUSTMENT,
  VICTIM_STATUS_CONFIDENCE,
} from '../../config/constants.js';
import { clamp } from '../confidence-classifier.js';
import { BaseSourceAdapter, type SourceAdapterOptions } from './base-adapter.js';
import type { VictimReportsCollaborator } from '../../collaborators/index.js';
import type { Attribution, Blockchain, VictimReport } from '../../types/index.js';

export function victimReportConfidence(status: string, severity: string): number {
  const base = VICTIM_STATUS_CONFIDENCE[status] ?? DEFAULT_MAPPED_SCORE;
  const adjustment = VICTIM_SEVERITY_ADJUSTMENT[severity] ?? 0;
  return clamp(base + adjustment);
}

export function victimReportRisk(severity: string, amountLost: number | null): number {
  const severityRisk = SEVERITY_RISK[severity] ?? DEFAULT_MAPPED_SCORE;
  if (amountLost && amountLost > 0) {
    const amountRisk = Math.min(MAX_LOSS_RISK, amountLost / LOSS_NORMALIZATION_USD);
    return (severityRisk + amountRisk) / 2;
  }
  return severityRisk;
}

export class VictimReportsAdapter extends BaseSourceAdapter {
  readonly source = 'victim_reports' as const;

  constructor(
    private readonly collaborator: VictimReportsCollaborator,
    options: SourceAdapterOptions
  ) {
    super(options);
  }

  protected async query(address: string, blockchain: Blockchain, signal: AbortSignal): Promise<Attribution[]> {
    const reports = await this.collaborator.searchByAddress(address, signal);
    return reports.map(report => this.toAttribution(report, address, blockchain));
  }

  private toAttribution(report: VictimReport, address: string, blockchain: Blockchain): Attribution {
    return this.createAttribution({
      recordId: report.reportId,
      address,
      blockchain,
      entity: report.entity,
      entityType: 'scammer',
      rawConfidence: victimReportConfidence(report.status, report.severity),
      evidence: report.evidence,
      observedAt: report.reportedAt,
      details: {
        reportId: report.reportId,
        severity: report.severity,
        status: report.status,
        platform: report.platform ?? null,
        amountLost: report.amountLost,
      },
      riskScore: victimReportRisk(report.severity, report.amountLost),
      tags: ['victim_report', 'scam', 'fraud'],
      metadata: {
        reportedAt: report.reportedAt ? report.reportedAt.toISOString() : null,
      },
    });
  }
}
