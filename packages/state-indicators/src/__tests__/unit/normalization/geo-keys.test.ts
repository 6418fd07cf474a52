import { describe, it, expect } from 'vitest';
import {
  InvalidKeyCounter,
  normalizeCountyFips,
  normalizeMicrodataState,
} from '../../../normalization/geo-keys.js';

describe('normalizeCountyFips', () => {
  it('accepts a 5-digit string and splits state and county', () => {
    expect(normalizeCountyFips('06037')).toEqual({
      ok: true,
      fips: '06037',
      stateFips: 6,
      countyFips: 37,
    });
  });

  it('trims whitespace around string identifiers', () => {
    const result = normalizeCountyFips(' 48201 ');
    expect(result.ok && result.fips).toBe('48201');
  });

  it('left-pads numeric identifiers', () => {
    expect(normalizeCountyFips(6037)).toEqual({
      ok: true,
      fips: '06037',
      stateFips: 6,
      countyFips: 37,
    });
  });

  it('rejects a 4-character string rather than guessing the lost zero', () => {
    expect(normalizeCountyFips('6037')).toEqual({ ok: false, reason: 'length', raw: '6037' });
  });

  it('rejects non-numeric identifiers', () => {
    expect(normalizeCountyFips('ABCDE')).toEqual({ ok: false, reason: 'non-numeric', raw: 'ABCDE' });
  });

  it('rejects 6-digit identifiers', () => {
    expect(normalizeCountyFips('123456')).toEqual({ ok: false, reason: 'length', raw: '123456' });
    expect(normalizeCountyFips(123456)).toEqual({ ok: false, reason: 'length', raw: '123456' });
  });

  it('rejects missing and fractional values', () => {
    expect(normalizeCountyFips('')).toEqual({ ok: false, reason: 'missing', raw: '' });
    expect(normalizeCountyFips(null)).toEqual({ ok: false, reason: 'missing', raw: '' });
    expect(normalizeCountyFips(6037.5)).toEqual({ ok: false, reason: 'non-numeric', raw: '6037.5' });
  });
});

describe('normalizeMicrodataState', () => {
  it('accepts any integer code from 1 to 99', () => {
    expect(normalizeMicrodataState(6)).toEqual({ ok: true, stateFips: 6 });
    expect(normalizeMicrodataState(99)).toEqual({ ok: true, stateFips: 99 });
  });

  it('rejects missing and out-of-range codes', () => {
    expect(normalizeMicrodataState(null)).toEqual({ ok: false, reason: 'missing' });
    expect(normalizeMicrodataState(0)).toEqual({ ok: false, reason: 'out-of-range' });
    expect(normalizeMicrodataState(100)).toEqual({ ok: false, reason: 'out-of-range' });
  });
});

describe('InvalidKeyCounter', () => {
  it('tallies by reason', () => {
    const counter = new InvalidKeyCounter();
    counter.record('length');
    counter.record('length');
    counter.record('non-numeric');

    expect(counter.total).toBe(3);
    expect(counter.toJSON()).toEqual({ length: 2, 'non-numeric': 1 });
  });
});
