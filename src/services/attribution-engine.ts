/**
 * Attribution Engine
 *
 * Consolidates what independent sources claim about an address:
 * 1. Fan out to every enabled source adapter and join on all of them
 * 2. Resolve the entity by weighted consensus
 * 3. Classify confidence with corroboration boosts
 * 4. Annotate agreement or conflict
 * 5. Cache, persist and return an immutable consolidation
 */

import { z } from 'zod';
import {
  CONFIDENCE_LABELS,
  MAX_BATCH_ADDRESSES,
  MAX_SEARCH_LIMIT,
  MAX_STATISTICS_WINDOW_DAYS,
} from '../config/constants.js';
import type { EngineConfig } from '../config/engine.js';
import type { Collaborators } from '../collaborators/index.js';
import { InvalidInputError, LookupAbortedError, errorMessage } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  parseAddress,
  parseAddressList,
  parseBlockchain,
} from '../utils/validation.js';
import { createSourceAdapters, type SourceAdapter } from './adapters/index.js';
import type { AttributionStore } from './attribution-store.js';
import { BatchOrchestrator } from './batch-orchestrator.js';
import { ConfidenceClassifier } from './confidence-classifier.js';
import { ConflictDetector } from './conflict-detector.js';
import { ConsensusEngine, canonicalOrder } from './consensus-engine.js';
import { ResultCache } from './result-cache.js';
import type {
  Attribution,
  AttributionConfidence,
  AttributionConsolidation,
  AttributionStatistics,
  Blockchain,
  ConflictSummary,
  ConsolidationFilters,
  SourceHealth,
} from '../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AttributionEngineDeps {
  config: EngineConfig;
  collaborators: Collaborators;
  /** Without a store nothing is persisted and the stored-data queries return nothing */
  store?: AttributionStore | null;
  logger?: Logger;
  /** Cache clock, milliseconds since epoch */
  now?: () => number;
}

export interface BatchRequestOptions extends ConsolidationFilters {
  maxConcurrent?: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number, address: string) => void;
}

export interface EntitySearchRequest {
  blockchain?: string;
  confidence?: AttributionConfidence;
  limit?: number;
}

export interface ConflictRequest {
  blockchain?: string;
  maxScoreGap?: number;
  limit?: number;
}

interface ValidatedRequest {
  address: string;
  blockchain: Blockchain;
  sources?: ConsolidationFilters['sources'];
  minConfidence?: AttributionConfidence;
}

const DEFAULT_QUERY_LIMIT = 100;

const limitSchema = z.number().int().min(1).max(MAX_SEARCH_LIMIT);
const maxConcurrentSchema = z.number().int().min(1).max(MAX_BATCH_ADDRESSES);
const windowDaysSchema = z.number().int().min(1).max(MAX_STATISTICS_WINDOW_DAYS);
const scoreGapSchema = z.number().min(0).max(1);

function validateNumber(schema: z.ZodNumber, value: number, name: string): number {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${name}: ${result.error.issues[0]?.message ?? 'out of range'}`, result.error.issues);
  }
  return result.data;
}

// ============================================================================
// ATTRIBUTION ENGINE
// ============================================================================

export class AttributionEngine {
  private readonly config: EngineConfig;
  private readonly adapters: SourceAdapter[];
  private readonly store: AttributionStore | null;
  private readonly logger: Logger;
  private readonly consensus: ConsensusEngine;
  private readonly classifier = new ConfidenceClassifier();
  private readonly conflictDetector = new ConflictDetector();
  private readonly cache: ResultCache;
  private readonly batch: BatchOrchestrator;
  private counters = { consolidationsComputed: 0, notFound: 0, failures: 0 };

  constructor(deps: AttributionEngineDeps) {
    this.config = deps.config;
    this.store = deps.store ?? null;
    this.logger = (deps.logger ?? rootLogger).child({ component: 'attribution-engine' });
    this.adapters = createSourceAdapters(deps.collaborators, {
      timeoutMs: deps.config.sourceTimeoutMs,
      vaspMinConfidence: deps.config.vaspMinConfidence,
      logger: this.logger,
    });
    this.consensus = new ConsensusEngine(deps.config.sourceWeights);
    this.cache = new ResultCache({ ttlSeconds: deps.config.cacheTtlSeconds, now: deps.now });
    this.batch = new BatchOrchestrator(this.logger.child({ component: 'batch-orchestrator' }));
  }

  // ==========================================================================
  // CONSOLIDATION
  // ==========================================================================

  /**
   * Consolidated attribution for one address, or null when no source knows it
   * or the result is below `filters.minConfidence`.
   * Throws InvalidInputError before any source is queried.
   */
  async getAttribution(
    address: string,
    blockchain: string,
    filters: ConsolidationFilters = {},
    signal?: AbortSignal
  ): Promise<AttributionConsolidation | null> {
    const chain = parseBlockchain(blockchain);
    const request: ValidatedRequest = {
      address: parseAddress(address, chain),
      blockchain: chain,
      sources: filters.sources,
      minConfidence: filters.minConfidence,
    };
    return this.resolve(request, signal);
  }

  /**
   * One entry per distinct (normalized) address. A failing address maps to
   * null; on abort, addresses never started are absent.
   */
  async consolidateMany(
    addresses: readonly string[],
    blockchain: string,
    options: BatchRequestOptions = {}
  ): Promise<Map<string, AttributionConsolidation | null>> {
    const chain = parseBlockchain(blockchain);
    const normalized = parseAddressList(addresses, chain);
    const maxConcurrent = validateNumber(
      maxConcurrentSchema,
      options.maxConcurrent ?? this.config.maxConcurrent,
      'max_concurrent'
    );

    this.logger.info({ count: normalized.length, blockchain: chain, maxConcurrent }, 'Batch attribution started');

    return this.batch.run(
      normalized,
      (address, signal) =>
        this.resolve(
          { address, blockchain: chain, sources: options.sources, minConfidence: options.minConfidence },
          signal
        ),
      { maxConcurrent, signal: options.signal, onProgress: options.onProgress }
    );
  }

  /**
   * Build a consolidation from attributions already fetched for one address.
   * The inputs are copied before the result is frozen.
   */
  consolidate(
    address: string,
    blockchain: Blockchain,
    attributions: readonly Attribution[],
    consolidatedAt: Date = new Date()
  ): AttributionConsolidation {
    const ordered = canonicalOrder(attributions.map(attribution => structuredClone(attribution)));
    const consensus = this.consensus.resolve(ordered);
    const conflicts = this.conflictDetector.analyze(consensus.groups);
    const evidence = ordered.flatMap(a => a.evidence);

    const classification = this.classifier.classify({
      consolidationScore: consensus.consolidationScore,
      sourceCount: conflicts.sourceCount,
      evidenceCount: evidence.length,
    });

    return deepFreeze({
      address,
      blockchain,
      attributions: ordered,
      consolidatedEntity: consensus.consolidatedEntity,
      consolidatedEntityType: consensus.consolidatedEntityType,
      overallConfidence: classification.level,
      supportingSources: conflicts.supportingSources,
      conflictingSources: conflicts.conflictingSources,
      evidence,
      consolidationScore: consensus.consolidationScore,
      metadata: {
        entityCount: conflicts.entityCount,
        sourceCount: conflicts.sourceCount,
        hasConflicts: conflicts.hasConflict,
        evidenceCount: evidence.length,
        entityScores: conflicts.entityScores,
        scoreGap: conflicts.scoreGap,
      },
      consolidatedAt: new Date(consolidatedAt.getTime()),
    });
  }

  private async resolve(
    request: ValidatedRequest,
    signal?: AbortSignal
  ): Promise<AttributionConsolidation | null> {
    try {
      return await this.cache.getOrCompute(request, () => this.compute(request, signal));
    } catch (error) {
      if (error instanceof LookupAbortedError) {
        if (signal?.aborted) return null;
        // Joined a computation another caller cancelled
        return this.resolve(request, signal);
      }
      this.counters.failures++;
      this.logger.error({
        address: request.address,
        blockchain: request.blockchain,
        error: errorMessage(error),
      }, 'Consolidation failed');
      return null;
    }
  }

  private async compute(
    request: ValidatedRequest,
    signal?: AbortSignal
  ): Promise<AttributionConsolidation | null> {
    const { address, blockchain } = request;
    const adapters = this.selectAdapters(request.sources);

    const lookups = await Promise.all(adapters.map(adapter => adapter.lookup(address, blockchain, signal)));
    if (signal?.aborted) {
      throw new LookupAbortedError(address);
    }

    const attributions = lookups.flatMap(lookup => lookup.attributions);
    if (attributions.length === 0) {
      this.counters.notFound++;
      this.logger.debug({ address, blockchain }, 'No attributions found');
      // Every source answered and none reports the address any more
      if (!request.sources && lookups.every(lookup => lookup.complete)) {
        await this.forget(address, blockchain);
      }
      return null;
    }

    const consolidation = this.consolidate(address, blockchain, attributions);
    this.counters.consolidationsComputed++;

    this.logger.info({
      address,
      blockchain,
      entity: consolidation.consolidatedEntity,
      confidence: CONFIDENCE_LABELS[consolidation.overallConfidence],
      sources: consolidation.metadata.sourceCount,
      hasConflicts: consolidation.metadata.hasConflicts,
    }, 'Attribution consolidated');

    // A filtered view of the sources would overwrite the full record
    if (!request.sources) {
      await this.persist(consolidation);
    }

    if (request.minConfidence !== undefined && consolidation.overallConfidence < request.minConfidence) {
      return null;
    }
    return consolidation;
  }

  private selectAdapters(sources: ConsolidationFilters['sources']): SourceAdapter[] {
    if (!sources || sources.length === 0) return this.adapters;
    return this.adapters.filter(adapter => sources.includes(adapter.source));
  }

  private async persist(consolidation: AttributionConsolidation): Promise<void> {
    if (!this.store || !this.config.persistResults) return;
    try {
      await this.store.saveConsolidation(consolidation);
    } catch (error) {
      this.logger.error({
        address: consolidation.address,
        blockchain: consolidation.blockchain,
        error: errorMessage(error),
      }, 'Failed to persist consolidation');
    }
  }

  private async forget(address: string, blockchain: Blockchain): Promise<void> {
    if (!this.store || !this.config.persistResults) return;
    try {
      if (await this.store.deleteConsolidation(address, blockchain)) {
        this.logger.info({ address, blockchain }, 'Stored consolidation retracted');
      }
    } catch (error) {
      this.logger.error({ address, blockchain, error: errorMessage(error) }, 'Failed to delete consolidation');
    }
  }

  // ==========================================================================
  // STORED DATA
  // ==========================================================================

  async searchByEntity(entity: string, request: EntitySearchRequest = {}): Promise<Attribution[]> {
    const name = entity.trim();
    if (name.length === 0) {
      throw new InvalidInputError('Entity is required');
    }
    const blockchain = request.blockchain === undefined ? undefined : parseBlockchain(request.blockchain);
    const limit = validateNumber(limitSchema, request.limit ?? DEFAULT_QUERY_LIMIT, 'limit');

    if (!this.store) return [];
    return this.store.searchByEntity(name, { blockchain, confidence: request.confidence, limit });
  }

  async listConflicts(request: ConflictRequest = {}): Promise<ConflictSummary[]> {
    const blockchain = request.blockchain === undefined ? undefined : parseBlockchain(request.blockchain);
    const limit = validateNumber(limitSchema, request.limit ?? DEFAULT_QUERY_LIMIT, 'limit');
    const maxScoreGap = request.maxScoreGap === undefined
      ? undefined
      : validateNumber(scoreGapSchema, request.maxScoreGap, 'max_score_gap');

    if (!this.store) return [];
    return this.store.listConflicts({ blockchain, maxScoreGap, limit });
  }

  async getStatistics(windowDays = 30): Promise<AttributionStatistics> {
    const days = validateNumber(windowDaysSchema, windowDays, 'days');

    let persisted: AttributionStatistics['persisted'] = null;
    if (this.store) {
      try {
        persisted = await this.store.getStatistics(days);
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Failed to load stored statistics');
      }
    }

    return {
      persisted,
      runtime: {
        ...this.counters,
        cache: this.cache.getStats(),
        sources: this.getSourceHealth(),
      },
      generatedAt: new Date().toISOString(),
    };
  }

  getSourceHealth(): SourceHealth[] {
    return this.adapters.map(adapter => adapter.getHealth());
  }

  async isStoreHealthy(): Promise<boolean | null> {
    return this.store ? this.store.isHealthy() : null;
  }

  // ==========================================================================
  // CACHE
  // ==========================================================================

  clearCache(): void {
    this.cache.clear();
    this.logger.info('Attribution cache cleared');
  }

  /**
   * Drop every cached variant for an address; returns how many were removed
   */
  invalidate(address: string, blockchain: string): number {
    const chain = parseBlockchain(blockchain);
    const removed = this.cache.invalidateAddress(parseAddress(address, chain), chain);
    this.logger.debug({ address, blockchain: chain, removed }, 'Cache invalidated');
    return removed;
  }
}

/**
 * Build an engine. The entry points create one at startup and pass it on.
 */
export function createAttributionEngine(deps: AttributionEngineDeps): AttributionEngine {
  return new AttributionEngine(deps);
}
