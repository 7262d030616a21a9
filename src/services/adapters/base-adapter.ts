// ============================================
// BASE SOURCE ADAPTER
// ============================================
// Abstract base class for all attribution source adapters.
// Handles timeouts, cancellation, health tracking and error containment.
//
// A failing or slow source never blocks consolidation: every error
// becomes an empty result plus a log line.

import { levelForScore, clamp } from '../confidence-classifier.js';
import { computeAttributionId } from '../../utils/crypto.js';
import {
  SourceTimeoutError,
  SourceUnavailableError,
  errorMessage,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type {
  AdapterSourceName,
  Attribution,
  Blockchain,
  EvidenceItem,
  SourceHealth,
} from '../../types/index.js';

/**
 * `complete` is false when the source failed, timed out or was cancelled,
 * so an empty list does not mean the source has nothing on the address.
 */
export interface SourceLookup {
  attributions: Attribution[];
  complete: boolean;
}

export interface SourceAdapter {
  readonly source: AdapterSourceName;
  /** Never rejects */
  lookup(address: string, blockchain: Blockchain, signal?: AbortSignal): Promise<SourceLookup>;
  /** Never rejects */
  fetch(address: string, blockchain: Blockchain, signal?: AbortSignal): Promise<Attribution[]>;
  getHealth(): SourceHealth;
}

export interface SourceAdapterOptions {
  timeoutMs: number;
  logger: Logger;
}

export interface AttributionDraft {
  recordId: string;
  address: string;
  blockchain: Blockchain;
  entity: string | null;
  entityType: string | null;
  rawConfidence: number;
  evidence: EvidenceItem[];
  observedAt: Date | null;
  details: Record<string, unknown>;
  riskScore: number;
  tags: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Abstract base class for attribution sources.
 * Subclasses implement `query` against their collaborator.
 */
export abstract class BaseSourceAdapter implements SourceAdapter {
  abstract readonly source: AdapterSourceName;

  protected readonly timeoutMs: number;
  protected readonly logger: Logger;
  private health: Omit<SourceHealth, 'source'> = {
    isHealthy: true,
    consecutiveFailures: 0,
    totalFailures: 0,
    totalTimeouts: 0,
    lastError: null,
    lastCheckAt: null,
  };

  constructor(options: SourceAdapterOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  protected abstract query(
    address: string,
    blockchain: Blockchain,
    signal: AbortSignal
  ): Promise<Attribution[]>;

  async fetch(address: string, blockchain: Blockchain, signal?: AbortSignal): Promise<Attribution[]> {
    const { attributions } = await this.lookup(address, blockchain, signal);
    return attributions;
  }

  async lookup(address: string, blockchain: Blockchain, signal?: AbortSignal): Promise<SourceLookup> {
    if (signal?.aborted) return { attributions: [], complete: false };

    const startTime = Date.now();
    try {
      const attributions = await this.withTimeout(
        lookupSignal => this.query(address, blockchain, lookupSignal),
        signal
      );
      this.recordSuccess();

      this.logger.debug({
        source: this.source,
        address,
        blockchain,
        count: attributions.length,
        duration: `${Date.now() - startTime}ms`,
      }, 'Source lookup completed');

      // An attribution always carries at least one contribution
      return { attributions: attributions.filter(a => a.sources.length > 0), complete: true };
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug({ source: this.source, address, blockchain }, 'Source lookup cancelled');
        return { attributions: [], complete: false };
      }

      const failure = error instanceof SourceTimeoutError
        ? error
        : new SourceUnavailableError(this.source, error);
      this.recordFailure(failure);

      this.logger.warn({
        source: this.source,
        address,
        blockchain,
        code: failure.code,
        error: failure.message,
      }, 'Source lookup failed, continuing without it');
      return { attributions: [], complete: false };
    }
  }

  getHealth(): SourceHealth {
    return { source: this.source, ...this.health };
  }

  /**
   * Build a single-contribution attribution from a source record.
   * Arrays and objects are copied; the record stays the collaborator's.
   */
  protected createAttribution(draft: AttributionDraft): Attribution {
    const rawConfidence = clamp(draft.rawConfidence);
    return {
      id: computeAttributionId(this.source, draft.blockchain, draft.address, draft.recordId),
      address: draft.address,
      blockchain: draft.blockchain,
      entity: draft.entity,
      entityType: draft.entityType,
      confidence: levelForScore(rawConfidence),
      sources: [
        {
          sourceName: this.source,
          rawConfidence,
          evidence: [...draft.evidence],
          observedAt: draft.observedAt,
          details: { ...draft.details },
        },
      ],
      evidence: [...draft.evidence],
      riskScore: clamp(draft.riskScore),
      tags: [...draft.tags],
      metadata: { ...draft.metadata },
    };
  }

  /**
   * Run a lookup with its own deadline, aborting it when the deadline
   * passes or the caller cancels.
   */
  private async withTimeout<T>(
    run: (signal: AbortSignal) => Promise<T>,
    parent?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const aborted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const timeout = new SourceTimeoutError(this.source, this.timeoutMs);
        controller.abort(timeout);
        reject(timeout);
      }, this.timeoutMs);

      if (parent) {
        onParentAbort = () => {
          controller.abort(parent.reason);
          reject(parent.reason instanceof Error ? parent.reason : new Error('Lookup cancelled'));
        };
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
    });

    try {
      return await Promise.race([run(controller.signal), aborted]);
    } finally {
      clearTimeout(timer);
      if (parent && onParentAbort) {
        parent.removeEventListener('abort', onParentAbort);
      }
    }
  }

  private recordSuccess(): void {
    this.health = {
      ...this.health,
      isHealthy: true,
      consecutiveFailures: 0,
      lastCheckAt: new Date().toISOString(),
    };
  }

  private recordFailure(error: SourceTimeoutError | SourceUnavailableError): void {
    const consecutiveFailures = this.health.consecutiveFailures + 1;
    this.health = {
      isHealthy: consecutiveFailures < 3,
      consecutiveFailures,
      totalFailures: this.health.totalFailures + 1,
      totalTimeouts: this.health.totalTimeouts + (error instanceof SourceTimeoutError ? 1 : 0),
      lastError: errorMessage(error),
      lastCheckAt: new Date().toISOString(),
    };
  }
}
