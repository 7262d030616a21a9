import { describe, it, expect } from 'vitest';
import {
  isHexAddress,
  parseAddress,
  parseAddressList,
  parseBlockchain,
  parseConfidenceLabel,
  parseSources,
} from '../validation.js';
import { InvalidInputError } from '../errors.js';
import { AttributionConfidence } from '../../types/index.js';

describe('parseBlockchain', () => {
  it('normalizes case and whitespace', () => {
    expect(parseBlockchain(' Ethereum ')).toBe('ethereum');
    expect(parseBlockchain('binance_smart_chain')).toBe('binance_smart_chain');
  });

  it('rejects unknown chains', () => {
    expect(() => parseBlockchain('dogecoin')).toThrow(InvalidInputError);
    expect(() => parseBlockchain(42)).toThrow(InvalidInputError);
  });
});

describe('parseAddress', () => {
  it('lowercases EVM addresses', () => {
    expect(parseAddress('0xABCDEFabcdef0000000000000000000000000001', 'polygon'))
      .toBe('0xabcdefabcdef0000000000000000000000000001');
  });

  it('keeps the case of base58 addresses', () => {
    const tron = 'TTestAddressForUnitTests1234567891';
    expect(parseAddress(tron, 'tron')).toBe(tron);
  });

  it('accepts bech32 bitcoin addresses', () => {
    const address = 'bc1qtestaddresszzzqqq0234567899acdefghjkmn';
    expect(parseAddress(address, 'bitcoin')).toBe(address);
  });

  it('rejects addresses in the wrong format for the chain', () => {
    expect(() => parseAddress('0x1234', 'ethereum')).toThrow('Invalid ethereum address: 0x1234');
    expect(() => parseAddress('0x1111111111111111111111111111111111111111', 'bitcoin')).toThrow(InvalidInputError);
    expect(() => parseAddress('', 'ethereum')).toThrow('Invalid address: Address is required');
  });
});

describe('isHexAddress', () => {
  it('recognizes 0x hex addresses in any case', () => {
    expect(isHexAddress('0xABCDEFabcdef0000000000000000000000000001')).toBe(true);
    expect(isHexAddress('TTestAddressForUnitTests1234567891')).toBe(false);
    expect(isHexAddress('0x1234')).toBe(false);
  });
});

describe('parseSources', () => {
  it('accepts comma-separated strings and arrays', () => {
    expect(parseSources('victim_reports, vasp_registry')).toEqual(['victim_reports', 'vasp_registry']);
    expect(parseSources(['threat_intelligence'])).toEqual(['threat_intelligence']);
  });

  it('treats "all" and empty input as no filter', () => {
    expect(parseSources('all')).toBeUndefined();
    expect(parseSources('')).toBeUndefined();
    expect(parseSources(undefined)).toBeUndefined();
  });

  it('rejects unknown sources', () => {
    expect(() => parseSources('victim_reports,rumours')).toThrow('Invalid sources filter: Unknown attribution source');
  });
});

describe('parseConfidenceLabel', () => {
  it('maps wire labels to ordered levels', () => {
    expect(parseConfidenceLabel('very_high')).toBe(AttributionConfidence.VERY_HIGH);
    expect(parseConfidenceLabel('very_low')).toBe(AttributionConfidence.VERY_LOW);
    expect(parseConfidenceLabel('')).toBeUndefined();
  });

  it('rejects unknown labels', () => {
    expect(() => parseConfidenceLabel('certain')).toThrow('Invalid confidence level: Unknown confidence level');
  });
});

describe('parseAddressList', () => {
  it('validates every address', () => {
    expect(parseAddressList(['0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA'], 'ethereum'))
      .toEqual(['0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa']);
    expect(() => parseAddressList(['0x1234'], 'ethereum')).toThrow(InvalidInputError);
  });

  it('enforces the batch size bounds', () => {
    expect(() => parseAddressList([], 'ethereum')).toThrow('Invalid address list: At least one address is required');
    const tooMany = Array.from({ length: 101 }, (_, i) => `0x${i.toString(16).padStart(40, '0')}`);
    expect(() => parseAddressList(tooMany, 'ethereum'))
      .toThrow('Invalid address list: Maximum 100 addresses allowed per batch request');
  });
});
