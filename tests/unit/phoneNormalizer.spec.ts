// tests/unit/phoneNormalizer.spec.ts

import { describe, expect, it } from '@jest/globals';
import { isSupportedRegion, normalizePhoneNumber, supportedRegions } from '../../src/services/phoneNormalizer';
import type { NormalizeResult } from '../../src/types';

function e164Of(result: NormalizeResult): string | undefined {
  return result.ok ? result.phoneNumber.e164 : undefined;
}

function reasonOf(result: NormalizeResult): string | undefined {
  return result.ok ? undefined : result.error.reason;
}

describe('normalizePhoneNumber - international input', () => {
  it('accepts an E.164 number as is', () => {
    const result = normalizePhoneNumber('+15551234567', 'US');
    expect(result).toEqual({
      ok: true,
      phoneNumber: { e164: '+15551234567', callingCode: '1', nationalNumber: '5551234567', region: 'US' },
    });
  });

  it('takes the calling code from the number, not the region hint', () => {
    const result = normalizePhoneNumber('+44 7911 123456', 'US');
    expect(result.ok && result.phoneNumber).toEqual({
      e164: '+447911123456',
      callingCode: '44',
      nationalNumber: '7911123456',
      region: 'GB',
    });
  });

  it('treats a 00 prefix as international dialing', () => {
    expect(e164Of(normalizePhoneNumber('0033 6 12 34 56 78', 'US'))).toBe('+33612345678');
  });

  it('prefers the hinted region when it shares the calling code', () => {
    const asCanada = normalizePhoneNumber('+1 416 555 0199', 'CA');
    const asOther = normalizePhoneNumber('+1 416 555 0199', 'GB');
    expect(asCanada.ok && asCanada.phoneNumber.region).toBe('CA');
    expect(asOther.ok && asOther.phoneNumber.region).toBe('US');
    expect(e164Of(asCanada)).toBe('+14165550199');
  });

  it('ignores an unknown region hint for international numbers', () => {
    expect(e164Of(normalizePhoneNumber('+15551234567', 'ZZ'))).toBe('+15551234567');
  });

  it('drops a bracketed trunk digit after the calling code', () => {
    expect(e164Of(normalizePhoneNumber('+44 (0) 7911 123456', 'US'))).toBe('+447911123456');
    expect(e164Of(normalizePhoneNumber('0049 (0)30 1234567', 'US'))).toBe('+49301234567');
  });

  it('reports a calling code with no national digits as too short', () => {
    expect(reasonOf(normalizePhoneNumber('+1', 'US'))).toBe('too_short');
    expect(reasonOf(normalizePhoneNumber('+44', 'US'))).toBe('too_short');
  });

  it('rejects an unrecognized calling code', () => {
    expect(reasonOf(normalizePhoneNumber('+999123456789', 'US'))).toBe('unknown_region');
  });

  it('checks the national length for the calling code', () => {
    expect(reasonOf(normalizePhoneNumber('+1555', 'US'))).toBe('too_short');
    expect(reasonOf(normalizePhoneNumber('+49 12345678901234', 'DE'))).toBe('too_long');
    expect(e164Of(normalizePhoneNumber('+49 1234567890123', 'DE'))).toBe('+491234567890123');
  });
});

describe('normalizePhoneNumber - national input', () => {
  it('strips formatting characters', () => {
    expect(e164Of(normalizePhoneNumber('(555) 123-4567', 'US'))).toBe('+15551234567');
    expect(e164Of(normalizePhoneNumber('555.123.4567', 'US'))).toBe('+15551234567');
  });

  it('drops the trunk prefix', () => {
    expect(e164Of(normalizePhoneNumber('1-555-123-4567', 'US'))).toBe('+15551234567');
    expect(e164Of(normalizePhoneNumber('07911 123456', 'GB'))).toBe('+447911123456');
    expect(e164Of(normalizePhoneNumber('8 912 345 67 89', 'RU'))).toBe('+79123456789');
  });

  it('keeps a leading trunk digit that belongs to the national number', () => {
    expect(e164Of(normalizePhoneNumber('800 555 35 35', 'RU'))).toBe('+78005553535');
    expect(e164Of(normalizePhoneNumber('8 800 555 35 35', 'RU'))).toBe('+78005553535');
    expect(e164Of(normalizePhoneNumber('800 555 35 35', 'KZ'))).toBe('+78005553535');
  });

  it('accepts a lowercase region hint', () => {
    const result = normalizePhoneNumber('07911 123456', 'gb');
    expect(result.ok && result.phoneNumber.region).toBe('GB');
  });

  it('rejects numbers outside the region length', () => {
    expect(reasonOf(normalizePhoneNumber('555123', 'US'))).toBe('too_short');
    expect(reasonOf(normalizePhoneNumber('555123456789', 'US'))).toBe('too_long');
  });

  it('rejects an unknown region', () => {
    const result = normalizePhoneNumber('5551234567', 'ZZ');
    expect(reasonOf(result)).toBe('unknown_region');
    expect(result.ok ? null : result.error.message).toBe('Unknown region "ZZ" for national phone number');
  });
});

describe('normalizePhoneNumber - failures', () => {
  it('reports empty input', () => {
    expect(reasonOf(normalizePhoneNumber('', 'US'))).toBe('empty');
    expect(reasonOf(normalizePhoneNumber('   ', 'US'))).toBe('empty');
  });

  it('reports invalid characters', () => {
    expect(reasonOf(normalizePhoneNumber('not-a-number', 'US'))).toBe('invalid_characters');
    expect(reasonOf(normalizePhoneNumber('555-CALL-NOW', 'US'))).toBe('invalid_characters');
    expect(reasonOf(normalizePhoneNumber('+1+5551234567', 'US'))).toBe('invalid_characters');
  });

  it('reports a bare plus sign as too short', () => {
    expect(reasonOf(normalizePhoneNumber('+', 'US'))).toBe('too_short');
  });

  it('keeps the original input on the error', () => {
    const result = normalizePhoneNumber(' abc ', 'US');
    expect(result.ok ? null : result.error.input).toBe(' abc ');
  });

  it('returns errors instead of throwing', () => {
    expect(() => normalizePhoneNumber('☎', 'XX')).not.toThrow();
  });
});

describe('normalizePhoneNumber - idempotence', () => {
  it('gives the same result for the same input', () => {
    expect(normalizePhoneNumber('(555) 123-4567', 'US')).toEqual(normalizePhoneNumber('(555) 123-4567', 'US'));
  });

  it('is stable when fed its own output', () => {
    const first = e164Of(normalizePhoneNumber('07911 123456', 'GB'));
    expect(first).toBe('+447911123456');
    expect(e164Of(normalizePhoneNumber(first ?? '', 'GB'))).toBe(first);
  });

  it('returns frozen phone numbers', () => {
    const result = normalizePhoneNumber('+15551234567', 'US');
    expect(result.ok && Object.isFrozen(result.phoneNumber)).toBe(true);
  });
});

describe('region table', () => {
  it('knows common regions', () => {
    expect(isSupportedRegion('us')).toBe(true);
    expect(isSupportedRegion('SN')).toBe(true);
    expect(isSupportedRegion('ZZ')).toBe(false);
  });

  it('lists regions sorted', () => {
    const regions = supportedRegions();
    expect(regions).toContain('GB');
    expect([...regions].sort()).toEqual(regions);
  });
});
