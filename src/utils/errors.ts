/**
 * Attribution error taxonomy
 */

import type { ZodIssue } from 'zod';

export type AttributionErrorCode = 'INVALID_INPUT' | 'SOURCE_UNAVAILABLE' | 'SOURCE_TIMEOUT' | 'LOOKUP_ABORTED';

export class AttributionError extends Error {
  constructor(
    readonly code: AttributionErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Rejected request: raised before any collaborator is called
 */
export class InvalidInputError extends AttributionError {
  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super('INVALID_INPUT', message);
  }
}

export class SourceUnavailableError extends AttributionError {
  constructor(readonly source: string, cause: unknown) {
    super(
      'SOURCE_UNAVAILABLE',
      `Source ${source} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class SourceTimeoutError extends AttributionError {
  constructor(readonly source: string, readonly timeoutMs: number) {
    super('SOURCE_TIMEOUT', `Source ${source} timed out after ${timeoutMs}ms`);
  }
}

/**
 * A consolidation whose caller cancelled it. Never cached or reported as not found.
 */
export class LookupAbortedError extends AttributionError {
  constructor(readonly address: string) {
    super('LOOKUP_ABORTED', `Lookup for ${address} was cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
