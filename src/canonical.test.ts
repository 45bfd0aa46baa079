import { describe, it, expect } from 'vitest';
import { canonicalizeMessage, canonicalizeScalar, doubleBitsFromEncoded, floatBitsFromEncoded } from './canonical';
import type { ScalarInput } from './corpus/scalars';
import { MalformedOracleOutputError, NonCanonicalEncodingError } from './errors';
import { fromHex } from './format';
import { COUNT } from './messages';

const int32 = (value: number): ScalarInput => ({ kind: 'int32', label: 'int32[0]', value, text: String(value) });

function errorOf(action: () => unknown): unknown {
  try {
    action();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('float bit patterns', () => {
  it('reads the payload after the tag', () => {
    expect(floatBitsFromEncoded(fromHex('0d0000c03f'))).toBe(0x3fc00000);
    expect(doubleBitsFromEncoded(fromHex('09000000000000f83f'))).toBe(0x3ff8000000000000n);
  });

  it('rejects a short blob', () => {
    expect(() => floatBitsFromEncoded(fromHex('0d0000c0'))).toThrow('expected at least 5 bytes, got 4');
  });
});

describe('canonicalizeScalar', () => {
  it('returns the decoded value with the oracle bytes', () => {
    const fixture = canonicalizeScalar(int32(150), fromHex('089601'));
    expect(fixture.label).toBe('int32[0]');
    expect(fixture.expected).toBe(150);
    expect(fixture.bytes).toEqual(fromHex('089601'));
    expect(fixture.bits).toBeUndefined();
  });

  it('rejects a blob for another field', () => {
    expect(() => canonicalizeScalar(int32(150), fromHex('109601'))).toThrow(
      'expected field 1 with wire type 0, got field 2 with wire type 0'
    );
  });

  it('rejects trailing bytes', () => {
    expect(() => canonicalizeScalar(int32(1), fromHex('080100'))).toThrow('1 trailing bytes');
  });

  it('rejects a different value', () => {
    expect(() => canonicalizeScalar(int32(150), fromHex('0801'))).toThrow('oracle encoded 1, intended 150');
  });

  it('wraps decode failures with their reason', () => {
    const err = errorOf(() => canonicalizeScalar(int32(150), fromHex('08')));
    expect(err).toBeInstanceOf(MalformedOracleOutputError);
    if (err instanceof MalformedOracleOutputError) {
      expect(err.details?.reason).toBe('truncated-stream');
      expect(err.field).toBe('int32[0]');
    }
  });

  it('keeps the bit pattern of floats', () => {
    const input: ScalarInput = { kind: 'float', label: 'float[2]', value: 1.5, text: '1.5' };
    expect(canonicalizeScalar(input, fromHex('0d0000c03f')).bits).toBe(0x3fc00000);
  });

  it('accepts any NaN payload for a NaN input', () => {
    const input: ScalarInput = { kind: 'float', label: 'float[7]', value: Number.NaN, text: 'nan' };
    const fixture = canonicalizeScalar(input, fromHex('0d0100c07f'));
    expect(fixture.bits).toBe(0x7fc00001);
    expect(fixture.expected).toBeNaN();
  });

  it('keeps the quiet NaN patterns of both widths', () => {
    const float: ScalarInput = { kind: 'float', label: 'float[8]', value: Number.NaN, text: 'nan' };
    const double: ScalarInput = { kind: 'double', label: 'double[8]', value: Number.NaN, text: 'nan' };
    expect(canonicalizeScalar(float, fromHex('0d0000c07f')).bits).toBe(0x7fc00000);
    expect(canonicalizeScalar(double, fromHex('09000000000000f87f')).bits).toBe(0x7ff8000000000000n);
  });

  it('tells negative zero from zero', () => {
    const input: ScalarInput = { kind: 'double', label: 'double[0]', value: 0, text: '0' };
    expect(() => canonicalizeScalar(input, fromHex('090000000000000080'))).toThrow(MalformedOracleOutputError);
  });
});

describe('canonicalizeMessage', () => {
  const input = { label: 'seed[0]', value: { key: 'a', value: 1 } };

  it('accepts canonical bytes', () => {
    const fixture = canonicalizeMessage(COUNT, input, fromHex('0a01611001'));
    expect(fixture.expected).toEqual({ key: 'a', value: 1 });
  });

  it('rejects bytes for a different message', () => {
    expect(() => canonicalizeMessage(COUNT, input, fromHex('0a01621001'))).toThrow('decoded message differs from the case');
  });

  it('rejects bytes out of field order', () => {
    const err = errorOf(() => canonicalizeMessage(COUNT, input, fromHex('10010a0161')));
    expect(err).toBeInstanceOf(NonCanonicalEncodingError);
    if (err instanceof NonCanonicalEncodingError) {
      expect(err.details).toEqual({ oracle: '10010a0161', reencoded: '0a01611001' });
    }
  });

  it('rejects bytes that do not decode', () => {
    expect(() => canonicalizeMessage(COUNT, input, fromHex('0a05'))).toThrow(MalformedOracleOutputError);
  });
});
