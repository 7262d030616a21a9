import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig, parseSourceWeights } from '../engine.js';
import { DEFAULT_SOURCE_WEIGHTS } from '../constants.js';

describe('parseSourceWeights', () => {
  it('returns the defaults when unset', () => {
    expect(parseSourceWeights(undefined)).toEqual(DEFAULT_SOURCE_WEIGHTS);
  });

  it('merges overrides over the defaults', () => {
    const weights = parseSourceWeights('{"vasp_registry": 0.95, "partner_feed": 0.4}');

    expect(weights.vasp_registry).toBe(0.95);
    expect(weights.partner_feed).toBe(0.4);
    expect(weights.victim_reports).toBe(0.8);
  });

  it('rejects malformed JSON and out-of-range weights', () => {
    expect(() => parseSourceWeights('{vasp')).toThrow('ATTRIBUTION_SOURCE_WEIGHTS is not valid JSON');
    expect(() => parseSourceWeights('{"vasp_registry": 2}')).toThrow('ATTRIBUTION_SOURCE_WEIGHTS is invalid');
  });
});

describe('loadEngineConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses defaults without environment overrides', () => {
    vi.stubEnv('ATTRIBUTION_CACHE_TTL_SECONDS', '');
    vi.stubEnv('ATTRIBUTION_PERSIST', '');
    expect(loadEngineConfig()).toMatchObject({
      cacheTtlSeconds: DEFAULT_ENGINE_CONFIG.cacheTtlSeconds,
      persistResults: true,
    });
  });

  it('reads overrides from the environment', () => {
    vi.stubEnv('ATTRIBUTION_CACHE_TTL_SECONDS', '60');
    vi.stubEnv('ATTRIBUTION_MAX_CONCURRENT', '4');
    vi.stubEnv('ATTRIBUTION_VASP_MIN_CONFIDENCE', '0.5');
    vi.stubEnv('ATTRIBUTION_PERSIST', 'false');

    expect(loadEngineConfig()).toMatchObject({
      cacheTtlSeconds: 60,
      maxConcurrent: 4,
      vaspMinConfidence: 0.5,
      persistResults: false,
    });
  });

  it('rejects out-of-range values at load', () => {
    vi.stubEnv('ATTRIBUTION_MAX_CONCURRENT', '0');
    expect(() => loadEngineConfig()).toThrow('ATTRIBUTION_MAX_CONCURRENT is invalid');

    vi.stubEnv('ATTRIBUTION_MAX_CONCURRENT', '101');
    expect(() => loadEngineConfig()).toThrow('ATTRIBUTION_MAX_CONCURRENT is invalid');

    vi.stubEnv('ATTRIBUTION_MAX_CONCURRENT', '4');
    vi.stubEnv('ATTRIBUTION_SOURCE_TIMEOUT_MS', '0');
    expect(() => loadEngineConfig()).toThrow('ATTRIBUTION_SOURCE_TIMEOUT_MS is invalid');

    vi.stubEnv('ATTRIBUTION_SOURCE_TIMEOUT_MS', '');
    vi.stubEnv('ATTRIBUTION_VASP_MIN_CONFIDENCE', '1.5');
    expect(() => loadEngineConfig()).toThrow('ATTRIBUTION_VASP_MIN_CONFIDENCE is invalid');
  });

  it('ignores non-numeric values', () => {
    vi.stubEnv('ATTRIBUTION_SOURCE_TIMEOUT_MS', 'soon');
    expect(loadEngineConfig().sourceTimeoutMs).toBe(DEFAULT_ENGINE_CONFIG.sourceTimeoutMs);
  });
});
