/**
 * Row decoding
 * zod schemas for rows read back from the attribution tables
 */

import { z } from 'zod';
import { CONFIDENCE_FROM_LABEL } from '../config/constants.js';
import { blockchainSchema, confidenceLabelSchema } from '../utils/validation.js';
import type { Attribution, ConflictSummary } from '../types/index.js';

// ============================================================================
// SHARED
// ============================================================================

const evidenceItemSchema = z.union([z.string(), z.record(z.unknown())]);

const confidenceSchema = confidenceLabelSchema.transform(label => CONFIDENCE_FROM_LABEL[label]);

/** JSONB timestamps come back as ISO strings */
const nullableDateSchema = z
  .union([z.string(), z.date(), z.null()])
  .transform(value => (value === null ? null : new Date(value)));

const contributionSchema = z.object({
  sourceName: z.string(),
  rawConfidence: z.number(),
  evidence: z.array(evidenceItemSchema),
  observedAt: nullableDateSchema.optional().transform(value => value ?? null),
  details: z.record(z.unknown()).default({}),
});

// ============================================================================
// ATTRIBUTION ROWS
// ============================================================================

export const attributionRowSchema = z
  .object({
    id: z.string(),
    address: z.string(),
    blockchain: blockchainSchema,
    entity: z.string().nullable(),
    entity_type: z.string().nullable(),
    confidence: confidenceSchema,
    sources: z.array(contributionSchema).min(1),
    evidence: z.array(evidenceItemSchema),
    risk_score: z.number(),
    tags: z.array(z.string()),
    metadata: z.record(z.unknown()),
  })
  .transform((row): Attribution => ({
    id: row.id,
    address: row.address,
    blockchain: row.blockchain,
    entity: row.entity,
    entityType: row.entity_type,
    confidence: row.confidence,
    sources: row.sources,
    evidence: row.evidence,
    riskScore: row.risk_score,
    tags: row.tags,
    metadata: row.metadata,
  }));

// ============================================================================
// CONSOLIDATION ROWS
// ============================================================================

const conflictMetadataSchema = z.object({
  entityScores: z.record(z.number()).default({}),
  scoreGap: z.number().default(0),
});

export const conflictRowSchema = z
  .object({
    address: z.string(),
    blockchain: blockchainSchema,
    consolidated_entity: z.string().nullable(),
    conflicting_sources: z.array(z.string()),
    overall_confidence: confidenceSchema,
    metadata: conflictMetadataSchema,
    consolidated_at: z.date(),
  })
  .transform((row): ConflictSummary => ({
    address: row.address,
    blockchain: row.blockchain,
    consolidatedEntity: row.consolidated_entity,
    conflictingSources: row.conflicting_sources,
    entityScores: row.metadata.entityScores,
    scoreGap: row.metadata.scoreGap,
    overallConfidence: row.overall_confidence,
    consolidatedAt: row.consolidated_at,
  }));

export const staleRowSchema = z.object({
  address: z.string(),
  blockchain: blockchainSchema,
});

/**
 * Decode rows, dropping (and reporting) the ones that do not parse
 */
export function decodeRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: readonly unknown[],
  onInvalid: (index: number, error: z.ZodError) => void
): T[] {
  const decoded: T[] = [];
  rows.forEach((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      decoded.push(result.data);
    } else {
      onInvalid(index, result.error);
    }
  });
  return decoded;
}
