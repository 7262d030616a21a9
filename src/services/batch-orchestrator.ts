/**
 * Batch Orchestrator
 *
 * Responsibilities:
 * - Run one task per distinct key with at most `maxConcurrent` in flight
 * - Isolate failures: a throwing task is logged and recorded as null
 * - Stop picking up keys once the caller aborts, returning what finished
 */

import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export type BatchTask<T> = (key: string, signal?: AbortSignal) => Promise<T | null>;

export interface BatchOptions {
  maxConcurrent: number;
  signal?: AbortSignal;
  /** Called after each key settles, successful or not */
  onProgress?: (completed: number, total: number, key: string) => void;
}

export interface BatchSummary {
  total: number;
  completed: number;
  failed: number;
  aborted: boolean;
  duration: number;
}

// ============================================================================
// BATCH ORCHESTRATOR
// ============================================================================

export class BatchOrchestrator {
  private readonly logger: Logger;
  private lastSummary: BatchSummary | null = null;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Results keyed in request order. Duplicate keys run once.
   * Keys never started because of an abort are absent from the map.
   */
  async run<T>(
    keys: readonly string[],
    task: BatchTask<T>,
    options: BatchOptions
  ): Promise<Map<string, T | null>> {
    const startTime = Date.now();
    const unique = [...new Set(keys)];
    const settled = new Map<string, T | null>();
    const { signal, onProgress } = options;
    const workerCount = Math.max(1, Math.min(options.maxConcurrent, unique.length));

    let next = 0;
    let completed = 0;
    let failed = 0;

    const worker = async (): Promise<void> => {
      while (next < unique.length && !signal?.aborted) {
        const key = unique[next++];

        let result: T | null;
        try {
          result = await task(key, signal);
        } catch (error) {
          failed++;
          result = null;
          this.logger.error({ key, error: errorMessage(error) }, 'Batch item failed');
        }

        settled.set(key, result);
        completed++;
        this.reportProgress(onProgress, completed, unique.length, key);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    this.lastSummary = {
      total: unique.length,
      completed,
      failed,
      aborted: signal?.aborted ?? false,
      duration: Date.now() - startTime,
    };

    if (this.lastSummary.aborted) {
      this.logger.warn(this.lastSummary, 'Batch aborted, returning partial results');
    } else {
      this.logger.info(this.lastSummary, 'Batch completed');
    }

    // Request order, not completion order
    const ordered = new Map<string, T | null>();
    for (const key of unique) {
      if (settled.has(key)) {
        ordered.set(key, settled.get(key) ?? null);
      }
    }
    return ordered;
  }

  getLastSummary(): BatchSummary | null {
    return this.lastSummary;
  }

  private reportProgress(
    onProgress: BatchOptions['onProgress'],
    completed: number,
    total: number,
    key: string
  ): void {
    if (!onProgress) return;
    try {
      onProgress(completed, total, key);
    } catch (error) {
      this.logger.warn({ key, error: errorMessage(error) }, 'Progress callback failed');
    }
  }
}
