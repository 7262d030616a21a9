/**
 * Input validation
 * zod schemas for everything that reaches the engine from outside
 */

import { z } from 'zod';
import {
  ADAPTER_SOURCES,
  ADDRESS_PATTERNS,
  CONFIDENCE_FROM_LABEL,
  EVM_BLOCKCHAINS,
  MAX_BATCH_ADDRESSES,
  SUPPORTED_BLOCKCHAINS,
} from '../config/constants.js';
import { InvalidInputError } from './errors.js';
import type {
  AdapterSourceName,
  AttributionConfidence,
  Blockchain,
  ConfidenceLabel,
} from '../types/index.js';

// ============================================================================
// SCHEMAS
// ============================================================================

export const blockchainSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(SUPPORTED_BLOCKCHAINS, { errorMap: () => ({ message: 'Unsupported blockchain' }) }));

export const sourceSchema = z.enum(ADAPTER_SOURCES, {
  errorMap: () => ({ message: 'Unknown attribution source' }),
});

export const confidenceLabelSchema = z.enum(
  ['very_low', 'low', 'medium', 'high', 'very_high', 'definitive'],
  { errorMap: () => ({ message: 'Unknown confidence level' }) }
);

/** Accepts an array or a comma-separated string; "all" means no filter. */
export const sourcesFilterSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? value.split(',') : value))
  .transform(values => values.map(v => v.trim()).filter(v => v.length > 0))
  .transform(values => (values.includes('all') ? [] : values))
  .pipe(z.array(sourceSchema));

export const addressSchema = z.string().trim().min(1, 'Address is required').max(255);

// ============================================================================
// HELPERS
// ============================================================================

function fail(error: z.ZodError, context: string): never {
  const issue = error.issues[0];
  const detail = issue ? issue.message : 'invalid value';
  throw new InvalidInputError(`${context}: ${detail}`, error.issues);
}

export function parseBlockchain(value: unknown): Blockchain {
  const result = blockchainSchema.safeParse(value);
  if (!result.success) fail(result.error, `Invalid blockchain ${JSON.stringify(value)}`);
  return result.data;
}

/**
 * 0x-prefixed hex address, compared without regard to case
 */
export function isHexAddress(address: string): boolean {
  return ADDRESS_PATTERNS.ethereum.test(address);
}

/**
 * Validate an address against the format of its chain.
 * EVM addresses are lowercased; base58 and bech32 addresses keep their case.
 */
export function parseAddress(value: unknown, blockchain: Blockchain): string {
  const result = addressSchema.safeParse(value);
  if (!result.success) fail(result.error, 'Invalid address');

  const address = result.data;
  if (!ADDRESS_PATTERNS[blockchain].test(address)) {
    throw new InvalidInputError(`Invalid ${blockchain} address: ${address}`);
  }
  return EVM_BLOCKCHAINS.has(blockchain) ? address.toLowerCase() : address;
}

export function parseSources(value: unknown): AdapterSourceName[] | undefined {
  if (value === undefined || value === null) return undefined;
  const result = sourcesFilterSchema.safeParse(value);
  if (!result.success) fail(result.error, 'Invalid sources filter');
  return result.data.length > 0 ? result.data : undefined;
}

export function parseConfidenceLabel(value: unknown): AttributionConfidence | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const result = confidenceLabelSchema.safeParse(value);
  if (!result.success) fail(result.error, 'Invalid confidence level');
  const label: ConfidenceLabel = result.data;
  return CONFIDENCE_FROM_LABEL[label];
}

export function parseAddressList(values: unknown, blockchain: Blockchain): string[] {
  const result = z
    .array(z.unknown())
    .min(1, 'At least one address is required')
    .max(MAX_BATCH_ADDRESSES, `Maximum ${MAX_BATCH_ADDRESSES} addresses allowed per batch request`)
    .safeParse(values);
  if (!result.success) fail(result.error, 'Invalid address list');
  return result.data.map(value => parseAddress(value, blockchain));
}
