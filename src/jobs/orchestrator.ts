/**
 * Job Orchestrator
 * Re-runs stored consolidations whose inputs may have changed
 *
 * Stale consolidations are grouped by blockchain and pushed through the
 * batch path in chunks, with the cached copies invalidated first so every
 * address is recomputed from the sources.
 */

import { MAX_BATCH_ADDRESSES } from '../config/constants.js';
import type { AttributionEngine } from '../services/attribution-engine.js';
import type { AttributionStore, StaleConsolidation } from '../services/attribution-store.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Blockchain } from '../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ReconsolidationConfig {
  /** Consolidations computed longer ago than this are refreshed */
  olderThanHours: number;
  limit: number;
  maxConcurrent?: number;
  signal?: AbortSignal;
}

export interface ReconsolidationResult {
  startedAt: Date;
  completedAt: Date;
  duration: number;
  candidates: number;
  refreshed: number;
  unresolved: number;
  rejected: number;
  aborted: boolean;
  byBlockchain: Record<string, number>;
  success: boolean;
  summary: string;
}

export const DEFAULT_RECONSOLIDATION_CONFIG: ReconsolidationConfig = {
  olderThanHours: 24,
  limit: 500,
};

// ============================================================================
// JOB ORCHESTRATOR
// ============================================================================

export class JobOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly engine: AttributionEngine,
    private readonly store: AttributionStore,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'job-orchestrator' });
  }

  async runReconsolidation(
    config: Partial<ReconsolidationConfig> = {}
  ): Promise<ReconsolidationResult> {
    const { olderThanHours, limit, maxConcurrent, signal } = { ...DEFAULT_RECONSOLIDATION_CONFIG, ...config };
    const startedAt = new Date();
    const cutoff = new Date(startedAt.getTime() - olderThanHours * 3600 * 1000);

    const stale = await this.store.listStale(cutoff, limit);
    this.logger.info({ candidates: stale.length, cutoff: cutoff.toISOString() }, 'Starting reconsolidation');

    let refreshed = 0;
    let unresolved = 0;
    let rejected = 0;
    const byBlockchain: Record<string, number> = {};

    for (const [blockchain, addresses] of groupByBlockchain(stale)) {
      for (let i = 0; i < addresses.length; i += MAX_BATCH_ADDRESSES) {
        if (signal?.aborted) break;
        const chunk = addresses.slice(i, i + MAX_BATCH_ADDRESSES);

        try {
          for (const address of chunk) {
            this.engine.invalidate(address, blockchain);
          }
          const results = await this.engine.consolidateMany(chunk, blockchain, { maxConcurrent, signal });

          for (const consolidation of results.values()) {
            if (consolidation) {
              refreshed++;
              byBlockchain[blockchain] = (byBlockchain[blockchain] ?? 0) + 1;
            } else {
              unresolved++;
            }
          }
        } catch (error) {
          rejected += chunk.length;
          this.logger.error({ blockchain, count: chunk.length, error: errorMessage(error) }, 'Reconsolidation chunk rejected');
        }
      }
    }

    const completedAt = new Date();
    const duration = completedAt.getTime() - startedAt.getTime();
    const aborted = signal?.aborted ?? false;
    const success = rejected === 0 && !aborted;

    const result: ReconsolidationResult = {
      startedAt,
      completedAt,
      duration,
      candidates: stale.length,
      refreshed,
      unresolved,
      rejected,
      aborted,
      byBlockchain,
      success,
      summary: '',
    };
    result.summary = this.generateSummary(result);

    this.logger.info({
      success,
      duration: `${duration}ms`,
      refreshed,
      unresolved,
      rejected,
    }, 'Reconsolidation completed');

    return result;
  }

  private generateSummary(result: ReconsolidationResult): string {
    const lines: string[] = [];

    lines.push(result.success ? 'Reconsolidation completed' : 'Reconsolidation completed with problems');
    lines.push(`  candidates: ${result.candidates}`);
    lines.push(`  refreshed:  ${result.refreshed}`);
    lines.push(`  unresolved: ${result.unresolved}`);
    if (result.rejected > 0) lines.push(`  rejected:   ${result.rejected}`);
    if (result.aborted) lines.push('  aborted before finishing');

    for (const [blockchain, count] of Object.entries(result.byBlockchain)) {
      lines.push(`  ${blockchain}: ${count}`);
    }

    return lines.join('\n');
  }
}

function groupByBlockchain(stale: readonly StaleConsolidation[]): Map<Blockchain, string[]> {
  const groups = new Map<Blockchain, string[]>();
  for (const { address, blockchain } of stale) {
    const group = groups.get(blockchain);
    if (group) {
      group.push(address);
    } else {
      groups.set(blockchain, [address]);
    }
  }
  return groups;
}

// ============================================================================
// CLI INTERFACE
// ============================================================================

/**
 * reconsolidate [olderThanHours] [limit]
 */
export async function runFromCLI(args: string[], orchestrator: JobOrchestrator): Promise<boolean> {
  const olderThanHours = parseInt(args[0] ?? '', 10);
  const limit = parseInt(args[1] ?? '', 10);

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const result = await orchestrator.runReconsolidation({
      olderThanHours: Number.isNaN(olderThanHours) ? DEFAULT_RECONSOLIDATION_CONFIG.olderThanHours : olderThanHours,
      limit: Number.isNaN(limit) ? DEFAULT_RECONSOLIDATION_CONFIG.limit : limit,
      signal: controller.signal,
    });
    console.log(result.summary);
    return result.success;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
