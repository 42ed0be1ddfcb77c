/**
 * Phone number normalization
 *
 * Turns caller input ("(555) 123-4567", "+44 7911 123456", "0033 6 12 34 56 78")
 * into E.164. Offline only: numbering rules come from data/regions.json, there
 * is no carrier lookup.
 */

import regionData from '../data/regions.json';
import type {
  NormalizationError,
  NormalizationFailureReason,
  NormalizeResult,
  PhoneNumber,
  RegionRule,
} from '../types';

const E164_MIN_DIGITS = 8;
const E164_MAX_DIGITS = 15;
const INTERNATIONAL_DIALING_PREFIX = '00';

const FORMATTING_CHARS = /[\s().\-]/g;
// "+44 (0) 7911 123456": the bracketed trunk digit is not dialed from abroad.
const INTERNATIONAL_TRUNK_MARKER = /^(\+|00)\s*(\d{1,3})\s*\(0\)/;
const ALLOWED_CHARS = /^\+?\d*$/;

const rulesByRegion = new Map<string, RegionRule>(Object.entries(regionData));

const regionsByCallingCode = new Map<string, string[]>();
for (const [region, rule] of rulesByRegion) {
  const regions = regionsByCallingCode.get(rule.callingCode) ?? [];
  regions.push(region);
  regionsByCallingCode.set(rule.callingCode, regions);
}

const MAX_CALLING_CODE_LENGTH = 3;

export function isSupportedRegion(region: string): boolean {
  return rulesByRegion.has(region.trim().toUpperCase());
}

export function supportedRegions(): string[] {
  return [...rulesByRegion.keys()].sort();
}

function failure(reason: NormalizationFailureReason, input: string, message: string): NormalizeResult {
  const error: NormalizationError = Object.freeze({ reason, input, message });
  return Object.freeze({ ok: false as const, error });
}

function success(callingCode: string, nationalNumber: string, region: string): NormalizeResult {
  const phoneNumber: PhoneNumber = Object.freeze({
    e164: `+${callingCode}${nationalNumber}`,
    callingCode,
    nationalNumber,
    region,
  });
  return Object.freeze({ ok: true as const, phoneNumber });
}

// Calling codes are prefix-free, so the first hit is the only one.
function splitCallingCode(digits: string): { callingCode: string; rest: string } | null {
  for (let len = 1; len <= MAX_CALLING_CODE_LENGTH && len <= digits.length; len++) {
    const candidate = digits.slice(0, len);
    if (regionsByCallingCode.has(candidate)) {
      return { callingCode: candidate, rest: digits.slice(len) };
    }
  }
  return null;
}

function checkLength(
  input: string,
  callingCode: string,
  nationalNumber: string,
  rule: RegionRule,
  region: string
): NormalizeResult {
  const totalDigits = callingCode.length + nationalNumber.length;

  if (nationalNumber.length < rule.minLength || totalDigits < E164_MIN_DIGITS) {
    return failure(
      'too_short',
      input,
      `Phone number is too short for region ${region} (expected at least ${rule.minLength} national digits)`
    );
  }
  if (nationalNumber.length > rule.maxLength || totalDigits > E164_MAX_DIGITS) {
    return failure(
      'too_long',
      input,
      `Phone number is too long for region ${region} (expected at most ${rule.maxLength} national digits)`
    );
  }

  return success(callingCode, nationalNumber, region);
}

/**
 * Normalize a raw phone number to E.164.
 *
 * Input starting with "+" (or "00") is read as international and the calling
 * code comes from the number itself; the region hint then only decides whose
 * length rules apply when several regions share that calling code. Anything
 * else is read as a national number of `regionHint`.
 *
 * Never throws: a bad number is returned as a NormalizationError value.
 */
export function normalizePhoneNumber(raw: string, regionHint: string): NormalizeResult {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return failure('empty', raw, 'Phone number is empty');
  }

  const compact = trimmed.replace(INTERNATIONAL_TRUNK_MARKER, '$1$2').replace(FORMATTING_CHARS, '');
  if (!ALLOWED_CHARS.test(compact)) {
    return failure('invalid_characters', raw, 'Phone number contains characters other than digits and formatting');
  }

  const hint = regionHint.trim().toUpperCase();
  let digits = compact.replace('+', '');
  let international = compact.startsWith('+');

  if (!international && digits.startsWith(INTERNATIONAL_DIALING_PREFIX)) {
    international = true;
    digits = digits.slice(INTERNATIONAL_DIALING_PREFIX.length);
  }

  if (digits.length === 0) {
    return failure('too_short', raw, 'Phone number has no digits');
  }

  if (international) {
    const split = splitCallingCode(digits);
    if (!split) {
      return failure('unknown_region', raw, 'Phone number has an unrecognized country calling code');
    }

    const candidates = regionsByCallingCode.get(split.callingCode) ?? [];
    const region = candidates.includes(hint) ? hint : candidates[0];
    const rule = region ? rulesByRegion.get(region) : undefined;
    if (!region || !rule) {
      return failure('unknown_region', raw, 'Phone number has an unrecognized country calling code');
    }

    return checkLength(raw, split.callingCode, split.rest, rule, region);
  }

  const rule = rulesByRegion.get(hint);
  if (!rule) {
    return failure('unknown_region', raw, `Unknown region "${regionHint}" for national phone number`);
  }

  return checkLength(raw, rule.callingCode, stripTrunkPrefix(digits, rule), rule, hint);
}

// A leading trunk digit can also start a valid national number (RU "800 555 35 35"),
// so it is dropped only when what remains still has a valid national length.
function stripTrunkPrefix(digits: string, rule: RegionRule): string {
  if (!rule.trunkPrefix || !digits.startsWith(rule.trunkPrefix)) return digits;
  const stripped = digits.slice(rule.trunkPrefix.length);
  return stripped.length >= rule.minLength && stripped.length <= rule.maxLength ? stripped : digits;
}
