import { describe, it, expect } from 'vitest';
import type { MessageFixture } from '../canonical';
import { toHex } from '../format';
import { decodeMessage, encodeMessage, normalizeCase } from '../message';
import { COUNT, MIDDLE } from '../messages';
import { lastWinsFixtures, renderMessageArtifact, renderMessageLiteral, unknownFieldFixtures } from './message';

function countFixture(label: string, key: string, value: number | null): MessageFixture {
  const expected = normalizeCase(COUNT, { key, value });
  return { label, bytes: encodeMessage(COUNT, expected), expected };
}

describe('unknownFieldFixtures', () => {
  it('appends one field of each wire type past the highest field number', () => {
    const [derived] = unknownFieldFixtures(COUNT, [countFixture('empty', '', null)]);
    expect(derived.index).toBe(0);
    expect(toHex(derived.bytes)).toBe('189601' + '210807060504030201' + '2a03010203' + '3507000000');
  });

  it('leaves the decoded message unchanged', () => {
    const fixture = countFixture('k', 'k', 3);
    const [derived] = unknownFieldFixtures(COUNT, [fixture]);
    expect(decodeMessage(COUNT, derived.bytes)).toEqual(fixture.expected);
  });

  it('uses at most six fixtures', () => {
    const fixtures = Array.from({ length: 8 }, (_, i) => countFixture(`c${i}`, `k${i}`, i));
    expect(unknownFieldFixtures(COUNT, fixtures).map((d) => d.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });
});

describe('lastWinsFixtures', () => {
  it('repeats the first singular scalar field with a non-default value', () => {
    const fixtures = [countFixture('empty', '', null), countFixture('k', 'k', 1)];
    const lastWins = lastWinsFixtures(COUNT, fixtures);
    expect(lastWins?.field.name).toBe('key');
    expect(lastWins?.value).toBe('k');
    expect(lastWins?.fixtures.map((d) => toHex(d.bytes))).toEqual(['0a016b', '0a016b10010a016b']);
  });

  it('is undefined when every fixture holds the default', () => {
    expect(lastWinsFixtures(COUNT, [countFixture('empty', '', null)])).toBeUndefined();
  });

  it('decodes to the repeated value', () => {
    const lastWins = lastWinsFixtures(COUNT, [countFixture('a', 'a', 2), countFixture('b', 'b', null)]);
    expect(lastWins?.value).toBe('a');
    expect(lastWins && decodeMessage(COUNT, lastWins.fixtures[1].bytes)).toEqual({ key: 'a', value: undefined });
  });
});

describe('renderMessageLiteral', () => {
  it('lists every property', () => {
    expect(renderMessageLiteral(COUNT, { key: 'a', value: undefined })).toBe('{ key: "a", value: undefined }');
  });

  it('renders nested messages and typed scalars', () => {
    const value = normalizeCase(MIDDLE, { id: 1, data: new Uint8Array([1]), nested: { note: 'x' } });
    expect(renderMessageLiteral(MIDDLE, value)).toBe(
      '{ id: 1, values: [], packedValues: [], label: "", data: new Uint8Array([0x01]), ' +
        'nested: { count: 0n, flag: false, note: "x" }, status: 0, tags: [] }'
    );
  });
});

describe('renderMessageArtifact', () => {
  const expected = normalizeCase(MIDDLE, { id: 150, status: 'STATUS_OK' });
  const source = renderMessageArtifact(
    {
      tier: 'middle',
      message: MIDDLE,
      fixtures: [{ label: 'seed[0]', bytes: encodeMessage(MIDDLE, expected), expected }],
    },
    '../../src'
  );
  const lines = source.split('\n');

  it('imports the enum wrapper for enum fields', () => {
    expect(lines[4]).toBe('import { Enum, Reader, WireType, Writer } from "../../src";');
  });

  it('declares nested types before the root', () => {
    expect(lines.indexOf('interface Nested {')).toBeLessThan(lines.indexOf('interface Middle {'));
    expect(lines).toContain('  nested: Nested | undefined;');
    expect(lines).toContain('  packedValues: number[];');
  });

  it('accepts packed and unpacked runs of packable fields', () => {
    expect(lines).toContain('        if (tag.wireType === WireType.Bytes) {');
    expect(lines).toContain('          message.packedValues.push(...reader.readPacked((packed) => packed.readSint32().value));');
    expect(lines).toContain('          message.values.push(reader.readInt32());');
  });

  it('encodes implicit fields only when set', () => {
    expect(lines).toContain('  if (message.id !== 0) {');
    expect(lines).toContain('    writer.writeEnum(new Enum(message.status));');
  });

  it('writes the fixture table', () => {
    expect(lines).toContain(
      '  { label: "seed[0]", b64: "CJYBOAE=", expected: { id: 150, values: [], packedValues: [], label: "", ' +
        'data: new Uint8Array(0), nested: undefined, status: 1, tags: [] } },'
    );
  });

  it('derives the last-occurrence test from the first scalar field', () => {
    expect(lines).toContain('const lastWinsValue = 150;');
    expect(lines).toContain('  it("keeps the last occurrence of id", () => {');
  });
});
