/**
 * Consolidation Engine Configuration
 * Cache, timeout, concurrency and weighting settings
 */

import { z } from 'zod';
import { DEFAULT_SOURCE_WEIGHTS, MAX_BATCH_ADDRESSES } from './constants.js';
import {
  getEnvBoolOrDefault,
  getEnvFloatOrDefault,
  getEnvIntOrDefault,
} from './env.js';

export interface EngineConfig {
  cacheTtlSeconds: number;
  /** Per-source lookup timeout */
  sourceTimeoutMs: number;
  /** Default bound on in-flight addresses in a batch */
  maxConcurrent: number;
  /** Floor passed to the VASP registry lookup */
  vaspMinConfidence: number;
  persistResults: boolean;
  sourceWeights: Record<string, number>;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cacheTtlSeconds: 1800,
  sourceTimeoutMs: 5000,
  maxConcurrent: 10,
  vaspMinConfidence: 0.3,
  persistResults: true,
  sourceWeights: { ...DEFAULT_SOURCE_WEIGHTS },
};

const sourceWeightsSchema = z.record(z.string().min(1), z.number().min(0).max(1));

/**
 * Parse ATTRIBUTION_SOURCE_WEIGHTS, a JSON object of weight overrides
 */
export function parseSourceWeights(raw: string | undefined): Record<string, number> {
  if (!raw) return { ...DEFAULT_SOURCE_WEIGHTS };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `ATTRIBUTION_SOURCE_WEIGHTS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = sourceWeightsSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`ATTRIBUTION_SOURCE_WEIGHTS is invalid: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  return { ...DEFAULT_SOURCE_WEIGHTS, ...result.data };
}

const cacheTtlSchema = z.number().int().min(1);
const sourceTimeoutSchema = z.number().int().min(1).max(120_000);
const maxConcurrentSchema = z.number().int().min(1).max(MAX_BATCH_ADDRESSES);
const vaspMinConfidenceSchema = z.number().min(0).max(1);

function checked(name: string, schema: z.ZodNumber, value: number): number {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`${name} is invalid: ${result.error.issues[0]?.message ?? 'out of range'}`);
  }
  return result.data;
}

const intSetting = (name: string, schema: z.ZodNumber, fallback: number) =>
  checked(name, schema, getEnvIntOrDefault(name, fallback));

const floatSetting = (name: string, schema: z.ZodNumber, fallback: number) =>
  checked(name, schema, getEnvFloatOrDefault(name, fallback));

/**
 * Read engine settings from the environment. Out-of-range values throw at startup.
 */
export function loadEngineConfig(): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  return {
    cacheTtlSeconds: intSetting('ATTRIBUTION_CACHE_TTL_SECONDS', cacheTtlSchema, defaults.cacheTtlSeconds),
    sourceTimeoutMs: intSetting('ATTRIBUTION_SOURCE_TIMEOUT_MS', sourceTimeoutSchema, defaults.sourceTimeoutMs),
    maxConcurrent: intSetting('ATTRIBUTION_MAX_CONCURRENT', maxConcurrentSchema, defaults.maxConcurrent),
    vaspMinConfidence: floatSetting('ATTRIBUTION_VASP_MIN_CONFIDENCE', vaspMinConfidenceSchema, defaults.vaspMinConfidence),
    persistResults: getEnvBoolOrDefault('ATTRIBUTION_PERSIST', defaults.persistResults),
    sourceWeights: parseSourceWeights(process.env.ATTRIBUTION_SOURCE_WEIGHTS),
  };
}
