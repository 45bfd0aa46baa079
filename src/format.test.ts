import { describe, it, expect } from 'vitest';
import {
  camelCase,
  floatLiteral,
  floatText,
  fromBase64,
  fromHex,
  normalizeExponent,
  parseFloatToken,
  pascalCase,
  textBytesLiteral,
  textStringLiteral,
  toBase64,
  toHex,
  tsBytesLiteral,
} from './format';

describe('floats', () => {
  it('uses the reserved tokens for non-finite values', () => {
    expect(floatText(Number.NaN)).toBe('nan');
    expect(floatText(Number.POSITIVE_INFINITY)).toBe('inf');
    expect(floatText(Number.NEGATIVE_INFINITY)).toBe('-inf');
  });

  it('keeps the sign of negative zero', () => {
    expect(floatText(-0)).toBe('-0');
  });

  it('writes the shortest round-trip decimal', () => {
    expect(floatText(0.1)).toBe('0.1');
    expect(floatText(Math.fround(0.1))).toBe('0.10000000149011612');
  });

  it('drops the plus sign and leading zeros of exponents', () => {
    expect(floatText(1e21)).toBe('1e21');
    expect(normalizeExponent('1e-09')).toBe('1e-9');
    expect(normalizeExponent('2.5E+007')).toBe('2.5e7');
    expect(normalizeExponent('42')).toBe('42');
  });

  it('writes non-finite values as TypeScript expressions', () => {
    expect(floatLiteral(Number.NaN)).toBe('Number.NaN');
    expect(floatLiteral(Number.NEGATIVE_INFINITY)).toBe('Number.NEGATIVE_INFINITY');
    expect(floatLiteral(1.5)).toBe('1.5');
  });

  it('parses corpus tokens', () => {
    expect(parseFloatToken('nan')).toBeNaN();
    expect(parseFloatToken('-inf')).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloatToken('1e-20')).toBe(1e-20);
  });
});

describe('hex and base64', () => {
  it('writes lowercase hex', () => {
    expect(toHex(new Uint8Array([0, 255, 16]))).toBe('00ff10');
  });

  it('reads either case', () => {
    expect(fromHex('00FF10')).toEqual(new Uint8Array([0, 255, 16]));
  });

  it('encodes base64', () => {
    expect(toBase64(new Uint8Array([0x08, 0x80, 0x01]))).toBe('CIAB');
    expect(fromBase64('CIAB')).toEqual(new Uint8Array([0x08, 0x80, 0x01]));
  });
});

describe('text grammar literals', () => {
  it('escapes quotes, backslashes and control characters', () => {
    expect(textStringLiteral('a"b\\c\n')).toBe('"a\\"b\\\\c\\n"');
  });

  it('writes non-ASCII characters as UTF-8 byte escapes', () => {
    expect(textStringLiteral('é')).toBe('"\\xc3\\xa9"');
  });

  it('writes every byte of a byte string as an escape', () => {
    expect(textBytesLiteral(new Uint8Array([0x00, 0xff]))).toBe('"\\x00\\xff"');
    expect(textBytesLiteral(new Uint8Array(0))).toBe('""');
  });
});

describe('TypeScript literals', () => {
  it('writes byte arrays', () => {
    expect(tsBytesLiteral(new Uint8Array(0))).toBe('new Uint8Array(0)');
    expect(tsBytesLiteral(new Uint8Array([1, 255]))).toBe('new Uint8Array([0x01, 0xff])');
  });
});

describe('names', () => {
  it('converts schema names', () => {
    expect(camelCase('packed_values')).toBe('packedValues');
    expect(pascalCase('packed_values')).toBe('PackedValues');
    expect(pascalCase('sfixed32')).toBe('Sfixed32');
  });
});
