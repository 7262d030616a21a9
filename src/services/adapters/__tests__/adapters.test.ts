import { describe, it, expect, vi } from 'vitest';
import {
  OnChainAnalysisAdapter,
  ThreatIntelligenceAdapter,
  VaspRegistryAdapter,
  VictimReportsAdapter,
  createSourceAdapters,
  threatIntelConfidence,
  victimReportConfidence,
  victimReportRisk,
} from '../index.js';
import { computeAttributionId } from '../../../utils/crypto.js';
import { AttributionConfidence } from '../../../types/index.js';
import type {
  Attribution,
  ThreatIntelItem,
  VaspAttributionResult,
  VictimReport,
} from '../../../types/index.js';
import { ADDRESS_A, makeAttribution, silentLogger } from '../../__tests__/fixtures.js';

const HEX_ADDRESS = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
const options = { timeoutMs: 1000, logger: silentLogger };

function victimReport(overrides: Partial<VictimReport> = {}): VictimReport {
  return {
    reportId: 'report-1',
    entity: 'Fake Airdrop Crew',
    severity: 'severe',
    status: 'verified',
    evidence: ['tx:0xfeed'],
    amountLost: 50_000,
    reportedAt: new Date('2024-03-01T12:00:00Z'),
    platform: 'telegram',
    ...overrides,
  };
}

function threatItem(overrides: Partial<ThreatIntelItem> = {}): ThreatIntelItem {
  return {
    id: 'item-1',
    address: HEX_ADDRESS.toUpperCase().replace('0X', '0x'),
    entity: 'Lazarus Test Group',
    threatType: 'phishing',
    threatLevel: 'high',
    confidenceScore: 0.5,
    firstSeen: new Date('2024-01-01T00:00:00Z'),
    lastSeen: new Date('2024-02-01T00:00:00Z'),
    feedSource: 'test-feed',
    evidence: [{ url: 'https://feed.example/item-1' }],
    ...overrides,
  };
}

const neverSettles = <T>() => new Promise<T>(() => undefined);

describe('victim report mapping', () => {
  it('adds the severity adjustment to the status base', () => {
    expect(victimReportConfidence('verified', 'severe')).toBe(1);
    expect(victimReportConfidence('investigating', 'critical')).toBeCloseTo(0.65, 10);
    expect(victimReportConfidence('pending', 'low')).toBeCloseTo(0.2, 10);
    expect(victimReportConfidence('false_positive', 'low')).toBe(0);
  });

  it('falls back to 0.5 for unknown vocabulary', () => {
    expect(victimReportConfidence('escalated', 'unrated')).toBe(0.5);
  });

  it('averages severity risk with the normalized loss', () => {
    expect(victimReportRisk('severe', 50_000)).toBeCloseTo(0.7, 10);
    expect(victimReportRisk('critical', 5_000_000)).toBeCloseTo(0.925, 10);
    expect(victimReportRisk('low', null)).toBe(0.4);
    expect(victimReportRisk('other', 0)).toBe(0.5);
  });
});

describe('VictimReportsAdapter', () => {
  it('maps reports to scammer attributions', async () => {
    const searchByAddress = vi.fn(async () => [victimReport()]);
    const adapter = new VictimReportsAdapter({ searchByAddress }, options);

    const [attribution] = await adapter.fetch(ADDRESS_A, 'ethereum');

    expect(searchByAddress).toHaveBeenCalledWith(ADDRESS_A, expect.any(AbortSignal));
    expect(attribution.id).toBe(computeAttributionId('victim_reports', 'ethereum', ADDRESS_A, 'report-1'));
    expect(attribution.entity).toBe('Fake Airdrop Crew');
    expect(attribution.entityType).toBe('scammer');
    expect(attribution.confidence).toBe(AttributionConfidence.DEFINITIVE);
    expect(attribution.sources).toHaveLength(1);
    expect(attribution.sources[0].sourceName).toBe('victim_reports');
    expect(attribution.sources[0].rawConfidence).toBe(1);
    expect(attribution.riskScore).toBeCloseTo(0.7, 10);
    expect(attribution.tags).toEqual(['victim_report', 'scam', 'fraud']);
    expect(attribution.metadata).toEqual({ reportedAt: '2024-03-01T12:00:00.000Z' });
  });
});

describe('ThreatIntelligenceAdapter', () => {
  it('keeps only items for the requested address, case-insensitively', async () => {
    const search = vi.fn(async () => [
      threatItem(),
      threatItem({ id: 'item-2', address: '0x9999999999999999999999999999999999999999' }),
    ]);
    const adapter = new ThreatIntelligenceAdapter({ search }, options);

    const attributions = await adapter.fetch(HEX_ADDRESS, 'ethereum');

    expect(search).toHaveBeenCalledWith([HEX_ADDRESS], expect.any(AbortSignal));
    expect(attributions).toHaveLength(1);
    expect(attributions[0].entityType).toBe('threat_actor');
    expect(attributions[0].sources[0].rawConfidence).toBeCloseTo(0.4, 10);
    expect(attributions[0].confidence).toBe(AttributionConfidence.LOW);
    expect(attributions[0].riskScore).toBe(0.8);
    expect(attributions[0].tags).toEqual(['threat_intelligence', 'phishing']);
  });

  it('matches base58 addresses exactly', async () => {
    const solana = 'SoLTestAddressForUnitTestsAbCdEfGh12345';
    const search = vi.fn(async () => [
      threatItem({ id: 'exact', address: solana }),
      threatItem({ id: 'other-case', address: solana.toLowerCase() }),
    ]);
    const adapter = new ThreatIntelligenceAdapter({ search }, options);

    const attributions = await adapter.fetch(solana, 'solana');

    expect(attributions.map(a => a.sources[0].details.itemId)).toEqual(['exact']);
  });

  it('multiplies the level base by the feed confidence', () => {
    expect(threatIntelConfidence('severe', 1)).toBe(0.9);
    expect(threatIntelConfidence('medium', 0.5)).toBeCloseTo(0.3, 10);
    expect(threatIntelConfidence('unlisted', 1)).toBe(0.5);
  });
});

describe('VaspRegistryAdapter', () => {
  const result: VaspAttributionResult = {
    attributionId: 'vasp-1',
    vaspId: 'Example Exchange',
    entityType: null,
    confidenceScore: 0.85,
    verificationStatus: 'verified',
    evidence: ['registry:example'],
    riskScore: 0.2,
  };

  it('passes the configured floor and maps the registry result', async () => {
    const attribute = vi.fn(async () => result);
    const adapter = new VaspRegistryAdapter({ attribute }, { ...options, minConfidence: 0.3 });

    const [attribution] = await adapter.fetch(ADDRESS_A, 'polygon');

    expect(attribute).toHaveBeenCalledWith(ADDRESS_A, 'polygon', 0.3, expect.any(AbortSignal));
    expect(attribution.entity).toBe('Example Exchange');
    expect(attribution.entityType).toBe('unknown');
    expect(attribution.confidence).toBe(AttributionConfidence.HIGH);
    expect(attribution.tags).toEqual(['vasp_registry', 'exchange', 'financial']);
    expect(attribution.metadata).toEqual({ verificationStatus: 'verified' });
  });

  it('returns nothing when the registry has no match', async () => {
    const adapter = new VaspRegistryAdapter({ attribute: async () => null }, { ...options, minConfidence: 0.3 });
    expect(await adapter.fetch(ADDRESS_A, 'ethereum')).toEqual([]);
  });
});

describe('OnChainAnalysisAdapter', () => {
  it('passes through attributions for the requested address only', async () => {
    const own = makeAttribution({ id: 'own', source: 'on_chain_analysis', rawConfidence: 0.6, entity: 'Cluster 7' });
    const other = makeAttribution({
      id: 'other',
      source: 'on_chain_analysis',
      rawConfidence: 0.6,
      entity: 'Cluster 8',
      address: HEX_ADDRESS,
    });
    const empty: Attribution = { ...makeAttribution({ id: 'empty', source: 'on_chain_analysis', rawConfidence: 0.6, entity: 'Cluster 9' }), sources: [] };

    const adapter = new OnChainAnalysisAdapter({ analyze: async () => [own, other, empty] }, options);

    expect(await adapter.fetch(ADDRESS_A, 'ethereum')).toEqual([own]);
  });
});

describe('failure containment', () => {
  it('turns collaborator errors into an empty result and tracks health', async () => {
    const searchByAddress = vi.fn(async (): Promise<VictimReport[]> => {
      throw new Error('connection refused');
    });
    const adapter = new VictimReportsAdapter({ searchByAddress }, options);

    expect(await adapter.fetch(ADDRESS_A, 'ethereum')).toEqual([]);
    expect(adapter.getHealth()).toMatchObject({
      source: 'victim_reports',
      isHealthy: true,
      consecutiveFailures: 1,
      totalFailures: 1,
      totalTimeouts: 0,
      lastError: 'Source victim_reports failed: connection refused',
    });

    await adapter.fetch(ADDRESS_A, 'ethereum');
    await adapter.fetch(ADDRESS_A, 'ethereum');
    expect(adapter.getHealth().isHealthy).toBe(false);
  });

  it('recovers health after a success', async () => {
    const searchByAddress = vi
      .fn<() => Promise<VictimReport[]>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce([]);
    const adapter = new VictimReportsAdapter({ searchByAddress }, options);

    await adapter.fetch(ADDRESS_A, 'ethereum');
    await adapter.fetch(ADDRESS_A, 'ethereum');

    expect(adapter.getHealth()).toMatchObject({ isHealthy: true, consecutiveFailures: 0, totalFailures: 1 });
  });

  it('times out slow lookups and aborts them', async () => {
    let received: AbortSignal | undefined;
    const search = vi.fn((_addresses: string[], signal?: AbortSignal) => {
      received = signal;
      return neverSettles<ThreatIntelItem[]>();
    });
    const adapter = new ThreatIntelligenceAdapter({ search }, { timeoutMs: 20, logger: silentLogger });

    expect(await adapter.fetch(HEX_ADDRESS, 'ethereum')).toEqual([]);
    expect(received?.aborted).toBe(true);
    expect(adapter.getHealth()).toMatchObject({
      totalTimeouts: 1,
      lastError: 'Source threat_intelligence timed out after 20ms',
    });
  });

  it('does not query when the caller already aborted', async () => {
    const searchByAddress = vi.fn(async () => [victimReport()]);
    const adapter = new VictimReportsAdapter({ searchByAddress }, options);
    const controller = new AbortController();
    controller.abort();

    expect(await adapter.fetch(ADDRESS_A, 'ethereum', controller.signal)).toEqual([]);
    expect(searchByAddress).not.toHaveBeenCalled();
  });

  it('stops on caller abort without counting a failure', async () => {
    const adapter = new VictimReportsAdapter({ searchByAddress: () => neverSettles<VictimReport[]>() }, options);
    const controller = new AbortController();

    const pending = adapter.fetch(ADDRESS_A, 'ethereum', controller.signal);
    controller.abort();

    expect(await pending).toEqual([]);
    expect(adapter.getHealth()).toMatchObject({ consecutiveFailures: 0, totalFailures: 0 });
  });
});

describe('lookup completeness', () => {
  it('marks answered lookups complete even when empty', async () => {
    const adapter = new VictimReportsAdapter({ searchByAddress: async () => [] }, options);

    expect(await adapter.lookup(ADDRESS_A, 'ethereum')).toEqual({ attributions: [], complete: true });
  });

  it('marks failed and cancelled lookups incomplete', async () => {
    const failing = new VictimReportsAdapter({
      searchByAddress: async (): Promise<VictimReport[]> => {
        throw new Error('connection refused');
      },
    }, options);
    const controller = new AbortController();
    controller.abort();

    expect(await failing.lookup(ADDRESS_A, 'ethereum')).toEqual({ attributions: [], complete: false });
    expect((await failing.lookup(ADDRESS_A, 'ethereum', controller.signal)).complete).toBe(false);
  });

  it('copies source records instead of sharing them', async () => {
    const report = victimReport({ evidence: ['tx:0xabc'] });
    const adapter = new VictimReportsAdapter({ searchByAddress: async () => [report] }, options);

    const [attribution] = await adapter.fetch(ADDRESS_A, 'ethereum');
    report.evidence.push('tx:0xdef');

    expect(attribution.evidence).toEqual(['tx:0xabc']);
    expect(attribution.sources[0].evidence).toEqual(['tx:0xabc']);
  });
});

describe('createSourceAdapters', () => {
  it('creates an adapter per collaborator plus on-chain analysis', () => {
    const adapters = createSourceAdapters(
      { victimReports: { searchByAddress: async () => [] }, vaspRegistry: { attribute: async () => null } },
      { timeoutMs: 100, vaspMinConfidence: 0.3, logger: silentLogger }
    );

    expect(adapters.map(a => a.source)).toEqual(['victim_reports', 'vasp_registry', 'on_chain_analysis']);
  });
});
