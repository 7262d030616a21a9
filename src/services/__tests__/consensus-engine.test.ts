import { describe, it, expect } from 'vitest';
import { ConsensusEngine, canonicalOrder } from '../consensus-engine.js';
import { DEFAULT_SOURCE_WEIGHTS } from '../../config/constants.js';
import { makeAttribution } from './fixtures.js';

const engine = new ConsensusEngine(DEFAULT_SOURCE_WEIGHTS);

describe('ConsensusEngine', () => {
  describe('scoreGroup', () => {
    it('weights each contribution by source reliability', () => {
      const { score, totalWeight } = engine.scoreGroup([
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.8, entity: 'Exchange' }),
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.9, entity: 'Exchange' }),
      ]);

      expect(totalWeight).toBeCloseTo(1.7, 10);
      expect(score).toBeCloseTo(1.45 / 1.7, 10);
    });

    it('gives unknown source names a weight of 0.5', () => {
      expect(engine.weightFor('custom_feed')).toBe(0.5);

      const { score } = engine.scoreGroup([
        makeAttribution({ source: 'custom_feed', rawConfidence: 1, entity: 'X' }),
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.5, entity: 'X' }),
      ]);
      expect(score).toBeCloseTo(0.9 / 1.3, 10);
    });

    it('counts every contribution of a multi-source attribution', () => {
      const merged = makeAttribution({ source: 'victim_reports', rawConfidence: 0.8, entity: 'X' });
      merged.sources.push({
        sourceName: 'manual_investigation',
        rawConfidence: 1,
        evidence: [],
        observedAt: null,
        details: {},
      });

      const { score, totalWeight } = engine.scoreGroup([merged]);
      expect(totalWeight).toBeCloseTo(1.8, 10);
      expect(score).toBeCloseTo(1.64 / 1.8, 10);
    });
  });

  describe('resolve', () => {
    it('agrees on a single entity', () => {
      const result = engine.resolve([
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.8, entity: 'Exchange', entityType: 'exchange' }),
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.9, entity: 'Exchange', entityType: 'exchange' }),
      ]);

      expect(result.consolidatedEntity).toBe('Exchange');
      expect(result.consolidatedEntityType).toBe('exchange');
      expect(result.consolidationScore).toBeCloseTo(0.8529, 4);
      expect(result.groups).toHaveLength(1);
    });

    it('picks the higher scoring entity when sources disagree', () => {
      const result = engine.resolve([
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.8, entity: 'Exchange' }),
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.9, entity: 'Mixing Service' }),
      ]);

      expect(result.consolidatedEntity).toBe('Mixing Service');
      expect(result.consolidationScore).toBeCloseTo(0.9, 10);
      expect(result.groups.map(g => g.entity)).toEqual(['Mixing Service', 'Exchange']);
    });

    it('breaks score ties by total source weight', () => {
      const result = engine.resolve([
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.5, entity: 'Alpha' }),
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.5, entity: 'Beta' }),
      ]);

      expect(result.consolidatedEntity).toBe('Beta');
    });

    it('breaks full ties by the smaller entity name', () => {
      const result = engine.resolve([
        makeAttribution({ id: 'a', source: 'victim_reports', rawConfidence: 0.7, entity: 'Zeta' }),
        makeAttribution({ id: 'b', source: 'victim_reports', rawConfidence: 0.7, entity: 'Alpha' }),
      ]);

      expect(result.consolidatedEntity).toBe('Alpha');
    });

    it('returns no entity when every attribution is unknown', () => {
      const result = engine.resolve([
        makeAttribution({ id: 'a', source: 'victim_reports', rawConfidence: 0.4, entity: null }),
        makeAttribution({ id: 'b', source: 'threat_intelligence', rawConfidence: 0.6, entity: null }),
      ]);

      expect(result.consolidatedEntity).toBeNull();
      expect(result.consolidatedEntityType).toBeNull();
      expect(result.consolidationScore).toBeCloseTo((0.8 * 0.4 + 0.9 * 0.6) / 1.7, 10);
      expect(result.groups[0].entity).toBe('unknown');
    });

    it('returns no entity when the unknown group outscores named ones', () => {
      const result = engine.resolve([
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.9, entity: null }),
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.5, entity: 'Exchange' }),
      ]);

      expect(result.consolidatedEntity).toBeNull();
      expect(result.consolidationScore).toBeCloseTo(0.9, 10);
    });

    it('uses the most frequent entity type, ties to the smaller string', () => {
      const result = engine.resolve([
        makeAttribution({ id: 'a', source: 'victim_reports', rawConfidence: 0.8, entity: 'X', entityType: 'scammer' }),
        makeAttribution({ id: 'b', source: 'threat_intelligence', rawConfidence: 0.8, entity: 'X', entityType: 'threat_actor' }),
      ]);

      expect(result.consolidatedEntityType).toBe('scammer');
    });

    it('produces identical output for any input order', () => {
      const attributions = [
        makeAttribution({ source: 'victim_reports', rawConfidence: 0.8, entity: 'Exchange' }),
        makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.9, entity: 'Mixing Service' }),
        makeAttribution({ source: 'vasp_registry', rawConfidence: 0.7, entity: 'Exchange' }),
        makeAttribution({ source: 'on_chain_analysis', rawConfidence: 0.3, entity: null }),
      ];
      const expected = JSON.stringify(engine.resolve(attributions));

      const permutations = [
        [3, 2, 1, 0],
        [1, 3, 0, 2],
        [2, 0, 3, 1],
      ];
      for (const order of permutations) {
        const shuffled = order.map(i => attributions[i]);
        expect(JSON.stringify(engine.resolve(shuffled))).toBe(expected);
      }
    });

    it('rejects an empty input', () => {
      expect(() => engine.resolve([])).toThrow('Cannot resolve consensus without attributions');
    });
  });

  it('orders attributions by id', () => {
    const ordered = canonicalOrder([
      makeAttribution({ id: 'c', source: 'victim_reports', rawConfidence: 0.5, entity: 'X' }),
      makeAttribution({ id: 'a', source: 'victim_reports', rawConfidence: 0.5, entity: 'X' }),
      makeAttribution({ id: 'b', source: 'victim_reports', rawConfidence: 0.5, entity: 'X' }),
    ]);
    expect(ordered.map(a => a.id)).toEqual(['a', 'b', 'c']);
  });

  it('honours overridden weights', () => {
    const custom = new ConsensusEngine({ ...DEFAULT_SOURCE_WEIGHTS, victim_reports: 0.1 });
    const result = custom.resolve([
      makeAttribution({ source: 'victim_reports', rawConfidence: 1, entity: 'X' }),
      makeAttribution({ source: 'threat_intelligence', rawConfidence: 0.5, entity: 'X' }),
    ]);
    expect(result.consolidationScore).toBeCloseTo(0.55 / 1.0, 10);
  });
});
