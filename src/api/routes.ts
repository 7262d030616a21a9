/**
 * Attribution API Routes
 * REST endpoints for consolidated address attribution
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { MAX_BATCH_ADDRESSES } from '../config/constants.js';
import type { AttributionEngine } from '../services/attribution-engine.js';
import { InvalidInputError } from '../utils/errors.js';
import { parseAddress, parseBlockchain, parseConfidenceLabel, parseSources } from '../utils/validation.js';
import {
  serializeAttribution,
  serializeConflict,
  serializeConsolidation,
  type ConsolidationResponse,
} from './serializers.js';

// ============================================================================
// HELPERS
// ============================================================================

function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, context: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidInputError(`${context}: ${field}${issue ? issue.message : 'invalid value'}`, result.error.issues);
  }
  return result.data;
}

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required`, invalid_type_error: `${name} must be a string` });

const attributionQuerySchema = z.object({
  blockchain: requiredString('blockchain'),
  sources: z.string().optional(),
  min_confidence: z.string().optional(),
});

const batchBodySchema = z.object({
  addresses: z
    .array(z.string())
    .min(1, 'At least one address is required')
    .max(MAX_BATCH_ADDRESSES, `Maximum ${MAX_BATCH_ADDRESSES} addresses allowed per batch request`),
  blockchain: requiredString('blockchain'),
  sources: z.union([z.string(), z.array(z.string())]).optional(),
  min_confidence: z.string().optional(),
  max_concurrent: z.number().int().optional(),
});

const entitySearchQuerySchema = z.object({
  entity: requiredString('entity'),
  blockchain: z.string().optional(),
  confidence: z.string().optional(),
  limit: z.coerce.number().int().optional(),
});

const conflictQuerySchema = z.object({
  blockchain: z.string().optional(),
  max_score_gap: z.coerce.number().optional(),
  limit: z.coerce.number().int().optional(),
});

const statisticsQuerySchema = z.object({
  days: z.coerce.number().int().default(30),
});

const cacheQuerySchema = z
  .object({
    address: z.string().optional(),
    blockchain: z.string().optional(),
  })
  .refine(query => !query.address || query.blockchain, {
    message: 'blockchain is required when address is given',
    path: ['blockchain'],
  });

// ============================================================================
// ROUTES
// ============================================================================

export function createRoutes(engine: AttributionEngine): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', asyncHandler(async (_req, res) => {
    const database = await engine.isStoreHealthy();
    const healthy = database !== false;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      database: database === null ? 'not_configured' : database ? 'connected' : 'disconnected',
      sources: engine.getSourceHealth(),
      timestamp: new Date().toISOString(),
    });
  }));

  /**
   * GET /attributions/search/entity
   * Stored attributions for an entity name (case-insensitive)
   */
  router.get('/attributions/search/entity', asyncHandler(async (req, res) => {
    const query = parseRequest(entitySearchQuerySchema, req.query, 'Invalid search');

    const attributions = await engine.searchByEntity(query.entity, {
      blockchain: query.blockchain,
      confidence: parseConfidenceLabel(query.confidence),
      limit: query.limit,
    });

    res.json({
      entity: query.entity,
      attributions: attributions.map(serializeAttribution),
      count: attributions.length,
    });
  }));

  /**
   * GET /attributions/:address
   * Consolidated attribution across all sources
   */
  router.get('/attributions/:address', asyncHandler(async (req, res) => {
    const query = parseRequest(attributionQuerySchema, req.query, 'Invalid attribution request');

    const consolidation = await engine.getAttribution(req.params.address, query.blockchain, {
      sources: parseSources(query.sources),
      minConfidence: parseConfidenceLabel(query.min_confidence),
    });

    if (!consolidation) {
      res.status(404).json({
        error: 'No attribution found',
        address: req.params.address,
        blockchain: query.blockchain,
      });
      return;
    }

    res.json(serializeConsolidation(consolidation));
  }));

  /**
   * POST /attributions/batch
   * Body: { addresses, blockchain, sources?, min_confidence?, max_concurrent? }
   * Results are keyed by the addresses as sent. The batch stops when the client disconnects.
   */
  router.post('/attributions/batch', asyncHandler(async (req, res) => {
    const body = parseRequest(batchBodySchema, req.body, 'Invalid batch request');

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const results = await engine.consolidateMany(body.addresses, body.blockchain, {
      sources: parseSources(body.sources),
      minConfidence: parseConfidenceLabel(body.min_confidence),
      maxConcurrent: body.max_concurrent,
      signal: controller.signal,
    });
    if (controller.signal.aborted) return;

    const blockchain = parseBlockchain(body.blockchain);
    const serialized: Record<string, ConsolidationResponse | null> = {};
    for (const address of body.addresses) {
      const consolidation = results.get(parseAddress(address, blockchain));
      if (consolidation === undefined) continue;
      serialized[address] = consolidation ? serializeConsolidation(consolidation) : null;
    }

    res.json({ results: serialized, count: Object.keys(serialized).length });
  }));

  /**
   * GET /conflicts
   * Stored consolidations where sources disagree, closest calls first
   */
  router.get('/conflicts', asyncHandler(async (req, res) => {
    const query = parseRequest(conflictQuerySchema, req.query, 'Invalid conflict query');

    const conflicts = await engine.listConflicts({
      blockchain: query.blockchain,
      maxScoreGap: query.max_score_gap,
      limit: query.limit,
    });

    res.json({ conflicts: conflicts.map(serializeConflict), count: conflicts.length });
  }));

  /**
   * GET /statistics
   */
  router.get('/statistics', asyncHandler(async (req, res) => {
    const query = parseRequest(statisticsQuerySchema, req.query, 'Invalid statistics query');
    res.json(await engine.getStatistics(query.days));
  }));

  /**
   * DELETE /cache
   * Everything, or every cached variant of one address
   */
  router.delete('/cache', asyncHandler(async (req, res) => {
    const query = parseRequest(cacheQuerySchema, req.query, 'Invalid cache request');

    if (query.address && query.blockchain) {
      const removed = engine.invalidate(query.address, query.blockchain);
      res.json({ cleared: 'address', address: query.address, removed });
      return;
    }

    engine.clearCache();
    res.json({ cleared: 'all' });
  }));

  return router;
}
